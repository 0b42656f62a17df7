/**
 * Classification of a command that did not exit cleanly.
 */
export type CommandErrorKind = 'LaunchFailure' | 'NonZeroExit' | 'Timeout' | 'Aborted'

/**
 * Immutable specification of one external command.
 */
export interface CommandSpec {
  /** Program to execute, or the full command line when `shell` is true. */
  readonly program: string
  /** Arguments passed to the program when not running through a shell. */
  readonly args?: readonly string[]
  /** Runs `program` through the system shell when true. */
  readonly shell?: boolean
  /** Working directory override, resolved against the stage directory. */
  readonly cwd?: string
  /** Environment overrides applied to this command only. */
  readonly env?: Readonly<Record<string, string>>
}

/**
 * Input contract for command execution.
 */
export interface CommandExecutionRequest {
  /** Program or shell command line. */
  readonly program: string
  /** Program arguments. */
  readonly args: readonly string[]
  /** Runs through the system shell when true. */
  readonly shell: boolean
  /** Absolute working directory used for this process. */
  readonly cwd: string
  /** Complete environment for this process. */
  readonly env: Readonly<Record<string, string>>
  /** Optional process timeout in milliseconds. */
  readonly timeoutMs?: number
  /** Terminates the process when aborted. */
  readonly signal?: AbortSignal
}

/**
 * Output contract from one command execution.
 */
export interface CommandExecutionResult {
  /** True when the command exited with code 0. */
  readonly successful: boolean
  /** Exit code, -1 when the process could not start, null when killed by signal. */
  readonly exitCode: number | null
  /** Termination signal if the process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout content. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
  /** Total command duration in milliseconds. */
  readonly durationMs: number
  /** True when the command reached the timeout handling path. */
  readonly timedOut: boolean
  /** Failure classification, absent on success. */
  readonly errorKind?: CommandErrorKind
  /** Original error object for spawn-level failures. */
  readonly error?: unknown
}

/**
 * Asynchronous abstraction for command execution. Implementations resolve
 * for every outcome and never reject.
 *
 * @param request Execution input data.
 * @returns Command execution result.
 */
export type CommandRunner = (request: CommandExecutionRequest) => Promise<CommandExecutionResult>
