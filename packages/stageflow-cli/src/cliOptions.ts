import { resolve } from 'node:path'

import type { CliOutputFormat } from './config/types.js'

/**
 * CLI subcommands.
 */
export type CliCommand = 'run' | 'validate'

/**
 * Parsed CLI runtime options.
 */
export interface CliOptions {
  /** Selected subcommand. */
  readonly command: CliCommand
  /** Absolute working directory for definition lookup. */
  readonly cwd: string
  /** Optional explicit definition file path. */
  readonly definitionPath?: string
  /** Selected output format. */
  readonly format: CliOutputFormat
  /** Emits output of successful stages when true. */
  readonly verbose: boolean
  /** Environment overrides from `--env KEY=VALUE`. */
  readonly env: Readonly<Record<string, string>>
  /** Optional path of the artifact manifest written after the run. */
  readonly artifactsManifestPath?: string
  /** Prints usage and exits when true. */
  readonly help: boolean
}

/**
 * Parses process arguments for the stageflow CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws Error when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let command: CliCommand | undefined
  let definitionPath: string | undefined
  let format: CliOutputFormat = 'pretty'
  let verbose = false
  let artifactsManifestPath: string | undefined
  let help = false
  let cwd = baseCwd
  const env: Record<string, string> = {}

  const readValue = (flag: string, index: number): string => {
    const nextValue = argv[index + 1]
    if (nextValue === undefined || nextValue.startsWith('--')) {
      throw new Error(`${flag} requires a value`)
    }

    return nextValue
  }

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (argument === undefined) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      help = true
      continue
    }

    if (argument === '--verbose') {
      verbose = true
      continue
    }

    if (argument === '--format' || argument.startsWith('--format=')) {
      const value =
        argument === '--format' ? readValue('--format', index) : argument.slice('--format='.length)
      if (value !== 'pretty' && value !== 'json') {
        throw new Error('--format must be "pretty" or "json"')
      }
      format = value
      index += argument === '--format' ? 1 : 0
      continue
    }

    if (argument === '--cwd' || argument.startsWith('--cwd=')) {
      const value = argument === '--cwd' ? readValue('--cwd', index) : argument.slice('--cwd='.length)
      cwd = resolve(baseCwd, value)
      index += argument === '--cwd' ? 1 : 0
      continue
    }

    if (argument === '--env' || argument.startsWith('--env=')) {
      const value = argument === '--env' ? readValue('--env', index) : argument.slice('--env='.length)
      const [key, entryValue] = parseEnvAssignment(value)
      env[key] = entryValue
      index += argument === '--env' ? 1 : 0
      continue
    }

    if (argument === '--artifacts-manifest' || argument.startsWith('--artifacts-manifest=')) {
      artifactsManifestPath =
        argument === '--artifacts-manifest'
          ? readValue('--artifacts-manifest', index)
          : argument.slice('--artifacts-manifest='.length)
      index += argument === '--artifacts-manifest' ? 1 : 0
      continue
    }

    if (argument.startsWith('-')) {
      throw new Error(`Unknown argument: ${argument}`)
    }

    if (command === undefined) {
      if (argument !== 'run' && argument !== 'validate') {
        throw new Error(`Unknown command: ${argument}`)
      }
      command = argument
      continue
    }

    if (definitionPath === undefined) {
      definitionPath = argument
      continue
    }

    throw new Error(`Unexpected argument: ${argument}`)
  }

  if (command === undefined && !help) {
    throw new Error('Missing command. Use "stageflow run" or "stageflow validate"')
  }

  if (command === 'validate' && (artifactsManifestPath !== undefined || Object.keys(env).length > 0)) {
    throw new Error('--env and --artifacts-manifest are only supported by "stageflow run"')
  }

  return {
    command: command ?? 'run',
    cwd,
    ...(definitionPath !== undefined ? { definitionPath } : {}),
    format,
    verbose,
    env,
    ...(artifactsManifestPath !== undefined
      ? { artifactsManifestPath: resolve(cwd, artifactsManifestPath) }
      : {}),
    help,
  }
}

const parseEnvAssignment = (value: string): [string, string] => {
  const separatorIndex = value.indexOf('=')
  if (separatorIndex <= 0) {
    throw new Error(`--env expects KEY=VALUE (received "${value}")`)
  }

  return [value.slice(0, separatorIndex), value.slice(separatorIndex + 1)]
}

/**
 * Returns help text for the stageflow CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: stageflow <run|validate> [definition] [options]',
    '',
    'Commands:',
    '  run                         Execute the pipeline',
    '  validate                    Check the stage graph without running anything',
    '',
    'Options:',
    '  [definition]                Definition file (default: pipeline.ts, pipeline.yaml,',
    '                              pipeline.yml or pipeline.json)',
    '  --cwd <path>                Base working directory',
    '  --format <type>             Output format: pretty | json (default: pretty)',
    '  --verbose                   Show stdout/stderr of successful stages',
    '  --env <KEY=VALUE>           Override an environment value (repeatable, run only)',
    '  --artifacts-manifest <path> Write registered artifacts as JSON (run only)',
    '  -h, --help                  Show this help',
  ].join('\n')
}
