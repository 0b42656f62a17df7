import {
  createNodeCommandRunner,
  createPipelineEngine,
  finalizeRunReport,
  formatRunReportAsJson,
  validatePipelineGraph,
  writeArtifactManifest,
  type CommandRunner,
  type StageDefinition,
} from '@stageflow/core'

import type { CliOptions } from './cliOptions.js'
import { loadPipelineDefinition } from './config/loadDefinition.js'
import { mapDefinitionToPipeline } from './config/mapDefinitionToPipeline.js'
import type { CliOutputFormat } from './config/types.js'
import { PrettyReporter } from './reporters/prettyReporter.js'

/**
 * Runtime options for a CLI execution.
 */
export type RunCliCommandOptions = Omit<CliOptions, 'help'>

/**
 * Replaceable process-level collaborators.
 */
export interface RunCliCommandDependencies {
  /** Command runner, the child-process runner when omitted. */
  readonly runner?: CommandRunner
  /** Process environment used as the base environment. */
  readonly processEnv?: NodeJS.ProcessEnv
  /** Signals that abort a running pipeline. */
  readonly abortSignals?: readonly NodeJS.Signals[]
}

/**
 * Executes a CLI subcommand.
 *
 * @param options CLI runtime options.
 * @param dependencies Optional collaborators.
 * @returns Final exit code.
 * @throws Error when the definition cannot be loaded or the stage graph is invalid.
 */
export const runCliCommand = async (
  options: RunCliCommandOptions,
  dependencies: RunCliCommandDependencies = {}
): Promise<number> => {
  const loaded = await loadPipelineDefinition(options.cwd, options.definitionPath)
  const mapped = mapDefinitionToPipeline(
    loaded.definition,
    loaded.definitionFilePath,
    dependencies.processEnv ?? process.env,
    options.env
  )

  if (options.command === 'validate') {
    return printValidation(mapped.stages, loaded.definitionFilePath, options.format)
  }

  const controller = new AbortController()
  const abortSignals = dependencies.abortSignals ?? ['SIGINT', 'SIGTERM']
  const abort = (): void => {
    controller.abort()
  }

  const engine = createPipelineEngine({
    stages: mapped.stages,
    runner: dependencies.runner ?? createNodeCommandRunner(),
    reporters: options.format === 'pretty' ? [new PrettyReporter({ verbose: options.verbose })] : [],
    cwd: mapped.cwd,
    env: mapped.env,
    signal: controller.signal,
  })

  for (const signal of abortSignals) {
    process.once(signal, abort)
  }

  try {
    const run = await engine.run()
    const report = finalizeRunReport(run)

    if (options.artifactsManifestPath) {
      await writeArtifactManifest(run.artifacts, options.artifactsManifestPath)
    }

    if (options.format === 'json') {
      process.stdout.write(`${formatRunReportAsJson(report)}\n`)
    }

    return report.exitCode
  } finally {
    for (const signal of abortSignals) {
      process.off(signal, abort)
    }
  }
}

const printValidation = (
  stages: readonly StageDefinition[],
  definitionFilePath: string,
  format: CliOutputFormat
): number => {
  const validation = validatePipelineGraph(stages)

  if (format === 'json') {
    const payload = validation.valid
      ? { valid: true, order: validation.graph.order.map((stage) => stage.name) }
      : {
          valid: false,
          error: {
            kind: validation.error.kind,
            message: validation.error.message,
            stages: validation.error.stages,
          },
        }
    process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`)
    return validation.valid ? 0 : 1
  }

  if (!validation.valid) {
    process.stderr.write(`${validation.error.name}: ${validation.error.message}\n`)
    return 1
  }

  const order = validation.graph.order.map((stage) => stage.name)
  process.stdout.write(`${definitionFilePath}: ${order.length} stages valid\n`)
  process.stdout.write(`Execution order: ${order.join(' -> ')}\n`)
  return 0
}
