import type { CommandRunner } from './command.js'
import type { PipelineReporter } from './reporter.js'
import type { StageDefinition, StageResult } from './stage.js'

/**
 * Overall state of one pipeline run.
 */
export type RunOutcome = 'pending' | 'running' | 'succeeded' | 'failed_required' | 'aborted'

/**
 * Outcomes a run never leaves once reached.
 */
export const TERMINAL_RUN_OUTCOMES: ReadonlySet<RunOutcome> = new Set<RunOutcome>([
  'succeeded',
  'failed_required',
  'aborted',
])

/**
 * One execution instance of a pipeline graph.
 */
export interface PipelineRun {
  /** Unique run identifier. */
  readonly id: string
  /** Stage definitions in execution order. */
  readonly stages: readonly StageDefinition[]
  /** Stage results keyed by stage name, in execution order. */
  readonly results: Readonly<Record<string, StageResult>>
  /** Registered artifacts keyed by stage name. */
  readonly artifacts: Readonly<Record<string, readonly string[]>>
  /** Overall run outcome. */
  readonly outcome: RunOutcome
  /** Run start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Run finish timestamp in Unix milliseconds, null while running. */
  readonly finishedAt: number | null
}

/**
 * Runtime options used by the pipeline engine.
 */
export interface PipelineRunOptions {
  /** Stage definitions in declaration order. */
  readonly stages: readonly StageDefinition[]
  /** Command runner implementation. */
  readonly runner: CommandRunner
  /** Optional reporters for lifecycle hooks. */
  readonly reporters?: readonly PipelineReporter[]
  /** Base working directory for stages without their own. */
  readonly cwd?: string
  /** Base environment merged under stage and command overrides. */
  readonly env?: Readonly<Record<string, string>>
  /** Aborts the run and the in-flight command when triggered. */
  readonly signal?: AbortSignal
  /** Resolves declared artifact patterns; defaults to a file system lookup. */
  readonly resolveArtifacts?: (cwd: string, patterns: readonly string[]) => Promise<ArtifactMatch[]>
  /** Run identifier factory. */
  readonly createRunId?: (startedAt: number) => string
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}

/**
 * Matches found on disk for one declared artifact pattern.
 */
export interface ArtifactMatch {
  /** Declared pattern. */
  readonly pattern: string
  /** Absolute matching paths, sorted. */
  readonly paths: readonly string[]
  /** Why the pattern could not be resolved, when the lookup failed. */
  readonly error?: string
}
