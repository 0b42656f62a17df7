import { builtinModules } from 'node:module'
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vite'

export default defineConfig({
  resolve: {
    alias: {
      '@stageflow/core': fileURLToPath(new URL('../stageflow-core/src/index.ts', import.meta.url)),
    },
  },
  build: {
    target: 'node20',
    sourcemap: true,
    lib: {
      entry: 'src/cli.ts',
      formats: ['es'],
      fileName: 'cli',
    },
    rollupOptions: {
      external: [...builtinModules, /^node:/, 'typescript', 'js-yaml'],
    },
  },
})
