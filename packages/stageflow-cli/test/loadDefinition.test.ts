import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { loadPipelineDefinition, parsePipelineDefinition } from '../src/config/loadDefinition.js'

const createdDirectories: string[] = []

const createDirectory = async (): Promise<string> => {
  const directory = await mkdtemp(resolve(tmpdir(), 'stageflow-cli-definition-'))
  createdDirectories.push(directory)
  return directory
}

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

describe('loadPipelineDefinition', () => {
  it('loads pipeline.json', async () => {
    const directory = await createDirectory()
    await writeFile(
      resolve(directory, 'pipeline.json'),
      JSON.stringify({
        stages: [{ name: 'build', commands: ['npm run build'], artifacts: ['dist/**'] }],
      }),
      'utf8'
    )

    const loaded = await loadPipelineDefinition(directory)

    expect(loaded.definitionFilePath).toBe(resolve(directory, 'pipeline.json'))
    expect(loaded.definition.stages).toEqual([
      { name: 'build', commands: ['npm run build'], artifacts: ['dist/**'] },
    ])
  })

  it('prefers pipeline.yaml over pipeline.json', async () => {
    const directory = await createDirectory()
    await writeFile(resolve(directory, 'pipeline.json'), '{"stages": []}', 'utf8')
    await writeFile(
      resolve(directory, 'pipeline.yaml'),
      [
        'env:',
        '  CI: "true"',
        'stages:',
        '  - name: test',
        '    commands:',
        '      - program: npx',
        '        args: [vitest, run]',
        '    policy: continue-on-error',
        '    timeoutSeconds: 90',
        '  - name: report',
        '    dependsOn: [test]',
        '    condition:',
        '      runIfAnyFailed: [test]',
        '    commands: ["echo failed"]',
      ].join('\n'),
      'utf8'
    )

    const loaded = await loadPipelineDefinition(directory)

    expect(loaded.definitionFilePath).toBe(resolve(directory, 'pipeline.yaml'))
    expect(loaded.definition).toEqual({
      env: { CI: 'true' },
      stages: [
        {
          name: 'test',
          commands: [{ program: 'npx', args: ['vitest', 'run'] }],
          policy: 'continue-on-error',
          timeoutSeconds: 90,
        },
        {
          name: 'report',
          dependsOn: ['test'],
          condition: { runIfAnyFailed: ['test'] },
          commands: ['echo failed'],
        },
      ],
    })
  })

  it('loads pipeline.ts default export', async () => {
    const directory = await createDirectory()
    await writeFile(
      resolve(directory, 'pipeline.ts'),
      [
        'const lint: { name: string; commands: string[] } = { name: "lint", commands: ["npm run lint"] }',
        'export default {',
        '  stages: [lint]',
        '}',
      ].join('\n'),
      'utf8'
    )

    const loaded = await loadPipelineDefinition(directory)

    expect(loaded.definition.stages[0]?.name).toBe('lint')
  })

  it('loads a named pipeline export from an explicit path', async () => {
    const directory = await createDirectory()
    await writeFile(
      resolve(directory, 'release.ts'),
      'export const pipeline = { stages: [{ name: "tag", commands: ["git tag v1"] }] }\n',
      'utf8'
    )

    const loaded = await loadPipelineDefinition(directory, 'release.ts')

    expect(loaded.definition.stages[0]?.commands).toEqual(['git tag v1'])
  })

  it('fails when no definition exists', async () => {
    const directory = await createDirectory()

    await expect(loadPipelineDefinition(directory)).rejects.toThrow(
      'No pipeline definition found. Expected pipeline.ts, pipeline.yaml, pipeline.yml, pipeline.json'
    )
  })

  it('names the file when YAML cannot be parsed', async () => {
    const directory = await createDirectory()
    const filePath = resolve(directory, 'pipeline.yml')
    await writeFile(filePath, 'stages: [\n', 'utf8')

    await expect(loadPipelineDefinition(directory)).rejects.toThrow(`Failed to parse ${filePath}`)
  })
})

describe('parsePipelineDefinition', () => {
  it('reports the offending path', () => {
    expect(() =>
      parsePipelineDefinition({
        stages: [
          { name: 'build', commands: ['make'] },
          { name: 'deploy', commands: ['make deploy'], policy: 'optional' },
        ],
      })
    ).toThrow('stages[1].policy must be "required" or "continue-on-error"')

    expect(() => parsePipelineDefinition({ stages: [{ name: 'build', commands: [] }] })).toThrow(
      'stages[0].commands must be a non-empty array'
    )

    expect(() =>
      parsePipelineDefinition({
        stages: [{ name: 'e2e', commands: ['npm run e2e'], timeoutSeconds: 0 }],
      })
    ).toThrow('stages[0].timeoutSeconds must be a positive number')
  })

  it('rejects malformed conditions', () => {
    expect(() =>
      parsePipelineDefinition({
        stages: [{ name: 'notify', commands: ['notify'], condition: 'sometimes' }],
      })
    ).toThrow('stages[0].condition must be "always" or an object')

    expect(() =>
      parsePipelineDefinition({
        stages: [{ name: 'notify', commands: ['notify'], condition: { runIfSkipped: ['a'] } }],
      })
    ).toThrow('stages[0].condition.runIfSkipped is not a supported condition')
  })

  it('stringifies scalar arguments and environment values', () => {
    const definition = parsePipelineDefinition({
      env: { RETRIES: 3 },
      stages: [{ name: 'wait', commands: [{ program: 'sleep', args: [1] }] }],
    })

    expect(definition.env).toEqual({ RETRIES: '3' })
    expect(definition.stages[0]?.commands).toEqual([{ program: 'sleep', args: ['1'] }])
  })
})
