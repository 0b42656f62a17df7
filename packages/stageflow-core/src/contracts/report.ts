import type { RunOutcome } from './run.js'
import type { StagePolicy, StageStatus } from './stage.js'

/**
 * One row of the per-stage status table.
 */
export interface ReportStageRow {
  /** Stage name. */
  readonly name: string
  /** Final stage status. */
  readonly status: StageStatus
  /** Declared policy. */
  readonly policy: StagePolicy
  /** Stage duration in milliseconds. */
  readonly durationMs: number
  /** Exit code of the deciding command. */
  readonly exitCode: number | null
  /** Number of registered artifacts. */
  readonly artifactCount: number
}

/**
 * Required failure that ended the run.
 */
export interface ReportRootCause {
  /** Failing stage. */
  readonly stage: string
  /** Final stage status (`failed_required` or `timed_out`). */
  readonly status: StageStatus
  /** Display form of the failing command, null when none ran. */
  readonly command: string | null
  /** Exit code of the failing command. */
  readonly exitCode: number | null
  /** Last lines of the failing command stderr. */
  readonly stderrTail: readonly string[]
}

/**
 * Non-fatal finding surfaced at the end of a run.
 */
export interface ReportWarning {
  /** Stage the warning belongs to. */
  readonly stage: string
  /** Warning kind. */
  readonly kind: 'FailedIgnored' | 'ArtifactMissing'
  /** Human-readable detail. */
  readonly message: string
}

/**
 * Terminal summary of one pipeline run.
 */
export interface RunReport {
  /** Run identifier. */
  readonly runId: string
  /** Final run outcome. */
  readonly outcome: RunOutcome
  /** Process exit code derived from the outcome. */
  readonly exitCode: 0 | 1 | 2
  /** Total run duration in milliseconds. */
  readonly durationMs: number
  /** Per-stage rows in execution order. */
  readonly stages: readonly ReportStageRow[]
  /** First required failure, if any. */
  readonly rootCause: ReportRootCause | null
  /** Ignored failures and missing artifacts. */
  readonly warnings: readonly ReportWarning[]
  /** Registered artifacts keyed by stage name. */
  readonly artifacts: Readonly<Record<string, readonly string[]>>
}
