import { spawn, type ChildProcessByStdio } from 'node:child_process'
import type { Readable } from 'node:stream'

import type {
  CommandErrorKind,
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandRunner,
} from '../contracts/command.js'

/**
 * Options for the Node.js command runner.
 */
export interface NodeCommandRunnerOptions {
  /** Delay between SIGTERM and SIGKILL when terminating a process group. */
  readonly killGraceMs?: number
}

const DEFAULT_KILL_GRACE_MS = 2000

// Largest delay setTimeout accepts before it fires immediately.
const MAX_TIMER_DELAY_MS = 2_147_483_647

/**
 * Creates a command runner backed by `child_process.spawn`.
 *
 * Each command runs in its own process group so that a timeout or abort
 * terminates everything it started.
 *
 * @param options Runner options.
 * @returns Command runner implementation.
 */
export const createNodeCommandRunner = (options: NodeCommandRunnerOptions = {}): CommandRunner => {
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS

  return async (request: CommandExecutionRequest): Promise<CommandExecutionResult> => {
    const startedAt = Date.now()

    return await new Promise<CommandExecutionResult>((resolve) => {
      let stdout = ''
      let stderr = ''
      let timedOut = false
      let aborted = false
      let settled = false
      let timeoutHandle: NodeJS.Timeout | null = null
      let killHandle: NodeJS.Timeout | null = null

      if (request.signal?.aborted) {
        resolve({
          successful: false,
          exitCode: null,
          signal: null,
          stdout,
          stderr: 'Aborted: run was cancelled before the command started',
          durationMs: 0,
          timedOut: false,
          errorKind: 'Aborted',
        })
        return
      }

      const useProcessGroup = process.platform !== 'win32'
      let child: ChildProcessByStdio<null, Readable, Readable>
      try {
        child = spawn(request.program, [...request.args], {
          cwd: request.cwd,
          env: { ...request.env },
          shell: request.shell,
          detached: useProcessGroup,
          stdio: ['ignore', 'pipe', 'pipe'],
        })
      } catch (spawnError: unknown) {
        resolve(createLaunchFailure(spawnError, '', '', Date.now() - startedAt))
        return
      }

      const terminate = (): void => {
        signalProcess('SIGTERM')
        killHandle = setTimeout(() => {
          signalProcess('SIGKILL')
        }, killGraceMs)
      }

      const signalProcess = (signal: NodeJS.Signals): void => {
        if (child.pid === undefined) {
          return
        }

        // The group outlives the direct child while any descendant holds it.
        if (useProcessGroup) {
          try {
            process.kill(-child.pid, signal)
            return
          } catch (error: unknown) {
            if (isMissingProcessError(error)) {
              return
            }
          }
        }

        if (child.exitCode === null && child.signalCode === null) {
          child.kill(signal)
        }
      }

      const onAbort = (): void => {
        aborted = true
        terminate()
      }

      const settle = (result: CommandExecutionResult): void => {
        if (settled) {
          return
        }

        settled = true
        if (timeoutHandle) {
          clearTimeout(timeoutHandle)
        }
        if (killHandle) {
          clearTimeout(killHandle)
        }
        request.signal?.removeEventListener('abort', onAbort)
        resolve(result)
      }

      const armTimeout = (remainingMs: number): void => {
        timeoutHandle = setTimeout(
          () => {
            if (remainingMs > MAX_TIMER_DELAY_MS) {
              armTimeout(remainingMs - MAX_TIMER_DELAY_MS)
              return
            }

            timedOut = true
            terminate()
          },
          Math.min(remainingMs, MAX_TIMER_DELAY_MS)
        )
      }

      if (typeof request.timeoutMs === 'number' && request.timeoutMs > 0) {
        armTimeout(request.timeoutMs)
      }

      request.signal?.addEventListener('abort', onAbort, { once: true })

      child.stdout.setEncoding('utf8')
      child.stderr.setEncoding('utf8')

      child.stdout.on('data', (chunk: string) => {
        stdout += chunk
      })

      child.stderr.on('data', (chunk: string) => {
        stderr += chunk
      })

      child.on('error', (spawnError: Error) => {
        settle(createLaunchFailure(spawnError, stdout, stderr, Date.now() - startedAt))
      })

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        const errorKind = classifyExit(exitCode, timedOut, aborted)
        const notice =
          errorKind === 'Timeout'
            ? `Timeout: command exceeded ${request.timeoutMs ?? 0}ms and was terminated`
            : errorKind === 'Aborted'
              ? 'Aborted: run was cancelled while the command was running'
              : null

        settle({
          successful: errorKind === undefined,
          exitCode,
          signal,
          stdout,
          stderr: notice ? appendLine(stderr, notice) : stderr,
          durationMs: Date.now() - startedAt,
          timedOut,
          ...(errorKind ? { errorKind } : {}),
        })
      })
    })
  }
}

const createLaunchFailure = (
  error: unknown,
  stdout: string,
  stderr: string,
  durationMs: number
): CommandExecutionResult => {
  const message = error instanceof Error ? error.message : String(error)

  return {
    successful: false,
    exitCode: -1,
    signal: null,
    stdout,
    stderr: appendLine(stderr, `LaunchFailure: ${message}`),
    durationMs,
    timedOut: false,
    errorKind: 'LaunchFailure',
    error,
  }
}

const classifyExit = (
  exitCode: number | null,
  timedOut: boolean,
  aborted: boolean
): CommandErrorKind | undefined => {
  if (aborted) {
    return 'Aborted'
  }

  if (timedOut) {
    return 'Timeout'
  }

  return exitCode === 0 ? undefined : 'NonZeroExit'
}

const appendLine = (text: string, line: string): string => {
  if (text.length === 0 || text.endsWith('\n')) {
    return `${text}${line}`
  }

  return `${text}\n${line}`
}

const isMissingProcessError = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH'
}
