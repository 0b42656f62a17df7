export type {
  CommandErrorKind,
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandRunner,
  CommandSpec,
} from './contracts/command.js'
export type {
  ReportRootCause,
  ReportStageRow,
  ReportWarning,
  RunReport,
} from './contracts/report.js'
export type { PipelineReporter } from './contracts/reporter.js'
export type { ArtifactMatch, PipelineRun, PipelineRunOptions, RunOutcome } from './contracts/run.js'
export { TERMINAL_RUN_OUTCOMES } from './contracts/run.js'
export type {
  CommandRecord,
  StageCondition,
  StageDefinition,
  StagePolicy,
  StageResult,
  StageStatus,
  StageStrategy,
} from './contracts/stage.js'
export { TERMINAL_STAGE_STATUSES } from './contracts/stage.js'

export { writeArtifactManifest } from './artifacts/artifactManifest.js'
export { resolveDeclaredArtifacts } from './artifacts/artifactResolver.js'
export { ArtifactStore, type ArtifactStoreReader } from './artifacts/artifactStore.js'
export {
  createNodeCommandRunner,
  type NodeCommandRunnerOptions,
} from './execution/nodeCommandRunner.js'
export { PipelineGraphError, type PipelineGraphErrorKind } from './graph/graphError.js'
export {
  buildPipelineGraph,
  PipelineGraph,
  validatePipelineGraph,
  type PipelineGraphValidation,
} from './graph/pipelineGraph.js'
export {
  finalizeRunReport,
  formatRunReport,
  formatRunReportAsJson,
  isIgnoredFailure,
  isRequiredFailure,
} from './reporters/runReport.js'
export {
  collectArtifactReferences,
  expandCommandTemplates,
  formatCommand,
} from './runner/commandTemplate.js'
export { createPipelineEngine, PipelineEngine } from './runner/pipelineEngine.js'
export { evaluateStageCondition } from './runner/stageCondition.js'
