import type { RunReport } from './report.js'
import type { StageDefinition, StageResult } from './stage.js'

/**
 * Event hooks for pipeline run reporting.
 */
export interface PipelineReporter {
  /**
   * Called once before any stage execution starts.
   *
   * @param runId Run identifier.
   * @param stages Stages in execution order.
   */
  onPipelineStart?(runId: string, stages: readonly StageDefinition[]): Promise<void> | void

  /**
   * Called when a stage moves to running, after its condition held.
   *
   * @param stage Stage definition.
   * @param index Zero-based position in execution order.
   */
  onStageStart?(stage: StageDefinition, index: number): Promise<void> | void

  /**
   * Called after a stage reaches a terminal state.
   *
   * @param result Stage result.
   * @param index Zero-based position in execution order.
   */
  onStageComplete?(result: StageResult, index: number): Promise<void> | void

  /**
   * Called for each declared artifact pattern that matched nothing.
   *
   * @param stageName Stage that declared the artifact.
   * @param pattern Unmatched pattern.
   * @param error Lookup error, when the pattern could not be resolved.
   */
  onArtifactMissing?(stageName: string, pattern: string, error?: string): Promise<void> | void

  /**
   * Called once after the run reaches a terminal outcome.
   *
   * @param report Finalized run report.
   */
  onPipelineComplete?(report: RunReport): Promise<void> | void
}
