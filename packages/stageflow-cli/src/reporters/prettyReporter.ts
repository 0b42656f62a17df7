import {
  formatRunReport,
  isIgnoredFailure,
  isRequiredFailure,
  type CommandRecord,
  type PipelineReporter,
  type RunReport,
  type StageDefinition,
  type StageResult,
} from '@stageflow/core'

const STDERR_TAIL_LINES = 20

/**
 * Options for the pretty console reporter.
 */
export interface PrettyReporterOptions {
  /** Emits stdout/stderr also for successful stages. */
  readonly verbose: boolean
}

/**
 * Compact console reporter with failure-focused detail output.
 */
export class PrettyReporter implements PipelineReporter {
  private readonly options: PrettyReporterOptions

  /**
   * Creates a pretty reporter.
   *
   * @param options Reporter options.
   */
  public constructor(options: PrettyReporterOptions) {
    this.options = options
  }

  public onPipelineStart(runId: string, stages: readonly StageDefinition[]): void {
    process.stdout.write(colorize(`stageflow: ${runId} executing ${stages.length} stages\n`, 'blue'))
  }

  public onStageStart(stage: StageDefinition): void {
    process.stdout.write(colorize(`-> ${stage.name}\n`, 'blue'))
  }

  /**
   * Prints one line per finished stage. Failures add the failing command and
   * its output.
   *
   * @param result Stage result.
   */
  public onStageComplete(result: StageResult): void {
    const duration = `${result.durationMs}ms`

    if (result.status === 'succeeded') {
      const artifactText =
        result.artifacts.length > 0 ? ` (${result.artifacts.length} artifacts)` : ''
      process.stdout.write(colorize(`✓ ${result.name} ${duration}${artifactText}\n`, 'green'))
      if (this.options.verbose) {
        for (const record of result.commands) {
          this.printOutput(record)
        }
      }
      return
    }

    if (result.status === 'skipped') {
      process.stdout.write(
        colorize(`ℹ ${result.name} skipped (${result.skipReason ?? 'condition not met'})\n`, 'yellow')
      )
      return
    }

    const failingCommand = result.commands[result.commands.length - 1]

    if (isIgnoredFailure(result)) {
      process.stdout.write(
        colorize(
          `⚠ ${result.name} ${result.status} (continue-on-error, ${formatExit(result)}, ${duration})\n`,
          'yellow'
        )
      )
      if (failingCommand) {
        this.printOutput(failingCommand)
      }
      return
    }

    process.stdout.write(
      colorize(`✗ ${result.name} ${result.status} (${formatExit(result)}, ${duration})\n`, 'red')
    )
    if (!failingCommand) {
      return
    }

    process.stdout.write(`  command: ${failingCommand.command}\n`)
    if (isRequiredFailure(result)) {
      this.printOutput({ ...failingCommand, stderr: tail(failingCommand.stderr) })
      return
    }

    this.printOutput(failingCommand)
  }

  public onArtifactMissing(stageName: string, pattern: string, error?: string): void {
    const detail = error ? `could not be resolved (${error})` : 'matched no files'
    process.stdout.write(
      colorize(`  warning: artifact "${pattern}" of ${stageName} ${detail}\n`, 'yellow')
    )
  }

  /**
   * Prints the final report table and overall result.
   *
   * @param report Run report.
   */
  public onPipelineComplete(report: RunReport): void {
    process.stdout.write('\n')
    process.stdout.write(`${formatRunReport(report)}\n`)

    if (report.exitCode === 0) {
      process.stdout.write(colorize('Result: PASS\n', 'green'))
      return
    }

    process.stdout.write(
      colorize(report.outcome === 'aborted' ? 'Result: ABORTED\n' : 'Result: FAIL\n', 'red')
    )
  }

  private printOutput(record: CommandRecord): void {
    const stdout = record.stdout.trim()
    const stderr = record.stderr.trim()

    if (stdout) {
      process.stdout.write(colorize('  stdout:\n', 'yellow'))
      process.stdout.write(indent(stdout))
      process.stdout.write('\n')
    }

    if (stderr) {
      process.stdout.write(colorize('  stderr:\n', 'yellow'))
      process.stdout.write(indent(stderr))
      process.stdout.write('\n')
    }
  }
}

const formatExit = (result: StageResult): string => {
  if (result.errorKind === 'Timeout') {
    return 'timed out'
  }

  return result.exitCode === null ? 'no exit code' : `exit ${result.exitCode}`
}

const tail = (text: string): string => {
  return text.trimEnd().split(/\r?\n/u).slice(-STDERR_TAIL_LINES).join('\n')
}

const indent = (text: string): string => {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n')
}

const colorize = (text: string, color: 'red' | 'green' | 'yellow' | 'blue'): string => {
  const colors: Record<'red' | 'green' | 'yellow' | 'blue', string> = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
