export type { CliCommand, CliOptions } from './cliOptions.js'
export { getCliHelpText, parseCliOptions } from './cliOptions.js'

export type {
  CliOutputFormat,
  DefinitionCommand,
  DefinitionCondition,
  DefinitionStage,
  PipelineDefinition,
} from './config/types.js'
export {
  loadPipelineDefinition,
  parsePipelineDefinition,
  type LoadedDefinition,
} from './config/loadDefinition.js'
export { mapDefinitionToPipeline, type MappedPipeline } from './config/mapDefinitionToPipeline.js'

export { PrettyReporter, type PrettyReporterOptions } from './reporters/prettyReporter.js'

export type { RunCliCommandDependencies, RunCliCommandOptions } from './runPipeline.js'
export { runCliCommand } from './runPipeline.js'
