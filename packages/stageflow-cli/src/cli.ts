#!/usr/bin/env node

import { getCliHelpText, parseCliOptions } from './cliOptions.js'
import { runCliCommand } from './runPipeline.js'

const run = async (): Promise<void> => {
  const { help, ...options } = parseCliOptions(process.argv.slice(2), process.cwd())

  if (help) {
    process.stdout.write(`${getCliHelpText()}\n`)
    process.exitCode = 0
    return
  }

  process.exitCode = await runCliCommand(options)
}

void run().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
  process.stderr.write(`${message}\n`)
  process.exitCode = 1
})
