import type { CommandErrorKind, CommandSpec } from './command.js'

/**
 * Failure propagation policy of a stage.
 */
export type StagePolicy = 'required' | 'continue-on-error'

/**
 * How the ordered command list of a stage decides the stage outcome.
 *
 * - `all`: every command must exit 0; execution stops at the first failure.
 * - `fallback`: commands are tried in order until one exits 0.
 */
export type StageStrategy = 'all' | 'fallback'

/**
 * Predicate over the outcomes of stages listed in `dependsOn`.
 */
export type StageCondition =
  | { readonly kind: 'always' }
  | { readonly kind: 'all_succeeded'; readonly stages: readonly string[] }
  | { readonly kind: 'any_failed'; readonly stages: readonly string[] }

/**
 * Lifecycle state of a stage inside one pipeline run.
 */
export type StageStatus =
  | 'blocked'
  | 'ready'
  | 'running'
  | 'succeeded'
  | 'failed_ignored'
  | 'failed_required'
  | 'skipped'
  | 'timed_out'
  | 'aborted'

/**
 * Statuses a stage never leaves once reached.
 */
export const TERMINAL_STAGE_STATUSES: ReadonlySet<StageStatus> = new Set<StageStatus>([
  'succeeded',
  'failed_ignored',
  'failed_required',
  'skipped',
  'timed_out',
  'aborted',
])

/**
 * Immutable definition of one pipeline stage.
 */
export interface StageDefinition {
  /** Unique stage name. */
  readonly name: string
  /** Ordered commands executed by this stage. */
  readonly commands: readonly CommandSpec[]
  /** Failure propagation policy. Defaults to `required`. */
  readonly policy?: StagePolicy
  /** Command list strategy. Defaults to `all`. */
  readonly strategy?: StageStrategy
  /** Stages that must reach a terminal state first. */
  readonly dependsOn?: readonly string[]
  /** Run condition evaluated when the stage becomes ready. Defaults to always. */
  readonly condition?: StageCondition
  /** Declared artifact path patterns relative to the stage directory. */
  readonly artifacts?: readonly string[]
  /** Wall-clock budget for the whole stage in milliseconds. */
  readonly timeoutMs?: number
  /** Working directory for the stage, resolved against the run directory. */
  readonly cwd?: string
  /** Environment overrides for every command of this stage. */
  readonly env?: Readonly<Record<string, string>>
}

/**
 * Captured outcome of one command inside a stage.
 */
export interface CommandRecord {
  /** Display form of the executed command after template expansion. */
  readonly command: string
  /** Exit code, -1 for launch failures, null when killed by signal. */
  readonly exitCode: number | null
  /** Failure classification, absent on success. */
  readonly errorKind?: CommandErrorKind
  /** Command duration in milliseconds. */
  readonly durationMs: number
  /** Captured stdout. */
  readonly stdout: string
  /** Captured stderr. */
  readonly stderr: string
}

/**
 * Recorded result of one stage.
 */
export interface StageResult {
  /** Stage name. */
  readonly name: string
  /** Terminal (or never promoted) status. */
  readonly status: StageStatus
  /** Policy the status was derived from. */
  readonly policy: StagePolicy
  /** Exit code of the deciding command, null when nothing ran. */
  readonly exitCode: number | null
  /** Classification of the deciding command failure. */
  readonly errorKind?: CommandErrorKind
  /** Start timestamp in Unix milliseconds, null when the stage never ran. */
  readonly startedAt: number | null
  /** Finish timestamp in Unix milliseconds, null when the stage never ran. */
  readonly finishedAt: number | null
  /** Stage duration in milliseconds. */
  readonly durationMs: number
  /** Captured output of every executed command, in order. */
  readonly commands: readonly CommandRecord[]
  /** Artifact paths registered for this stage. */
  readonly artifacts: readonly string[]
  /** Declared patterns that matched nothing. */
  readonly missingArtifacts: readonly string[]
  /** Lookup errors of missing patterns, keyed by pattern. */
  readonly artifactErrors?: Readonly<Record<string, string>>
  /** Explanation for `skipped`, `blocked` and `aborted` stages. */
  readonly skipReason?: string
}
