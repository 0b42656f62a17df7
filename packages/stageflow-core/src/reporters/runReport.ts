import type { ReportRootCause, ReportStageRow, ReportWarning, RunReport } from '../contracts/report.js'
import { TERMINAL_RUN_OUTCOMES, type PipelineRun } from '../contracts/run.js'
import type { StageResult } from '../contracts/stage.js'

const STDERR_TAIL_LINES = 20

/**
 * Builds the terminal summary of a finished run.
 *
 * The function reads only the run state, so repeated calls on the same run
 * produce identical reports.
 *
 * @param run Finished pipeline run.
 * @returns Run report.
 * @throws Error when the run has not reached a terminal outcome.
 */
export const finalizeRunReport = (run: PipelineRun): RunReport => {
  if (!TERMINAL_RUN_OUTCOMES.has(run.outcome)) {
    throw new Error(`Run ${run.id} has not finished (outcome: ${run.outcome})`)
  }

  const results = run.stages
    .map((stage) => run.results[stage.name])
    .filter((result): result is StageResult => result !== undefined)

  const stages: ReportStageRow[] = results.map((result) => ({
    name: result.name,
    status: result.status,
    policy: result.policy,
    durationMs: result.durationMs,
    exitCode: result.exitCode,
    artifactCount: result.artifacts.length,
  }))

  const rootCauseResult = results.find(isRequiredFailure)

  return {
    runId: run.id,
    outcome: run.outcome,
    exitCode: run.outcome === 'succeeded' ? 0 : run.outcome === 'aborted' ? 2 : 1,
    durationMs: (run.finishedAt ?? run.startedAt) - run.startedAt,
    stages,
    rootCause: rootCauseResult ? buildRootCause(rootCauseResult) : null,
    warnings: results.flatMap(buildWarnings),
    artifacts: run.artifacts,
  }
}

/**
 * Checks whether a stage result ends the run under its policy.
 *
 * @param result Stage result.
 * @returns True for `failed_required` and for required stages that timed out.
 */
export const isRequiredFailure = (result: StageResult): boolean => {
  return (
    result.status === 'failed_required' ||
    (result.status === 'timed_out' && result.policy === 'required')
  )
}

/**
 * Checks whether a stage failed without stopping the run.
 *
 * @param result Stage result.
 * @returns True for `failed_ignored` and for continue-on-error stages that timed out.
 */
export const isIgnoredFailure = (result: StageResult): boolean => {
  return (
    result.status === 'failed_ignored' ||
    (result.status === 'timed_out' && result.policy === 'continue-on-error')
  )
}

/**
 * Renders a report as a fixed-width text summary.
 *
 * @param report Run report.
 * @returns Multi-line summary without trailing newline.
 */
export const formatRunReport = (report: RunReport): string => {
  const lines: string[] = [
    `Run ${report.runId}: ${report.outcome} (exit ${report.exitCode}) in ${report.durationMs}ms`,
    '',
  ]

  const header = ['STAGE', 'STATUS', 'POLICY', 'DURATION', 'EXIT']
  const rows = report.stages.map((row) => [
    row.name,
    row.status,
    row.policy,
    `${row.durationMs}ms`,
    row.exitCode === null ? '-' : String(row.exitCode),
  ])
  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row[column]?.length ?? 0))
  )

  for (const row of [header, ...rows]) {
    lines.push(
      row
        .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
        .join('  ')
        .trimEnd()
    )
  }

  if (report.rootCause) {
    const rootCause = report.rootCause
    const exitText = rootCause.exitCode === null ? 'no exit code' : `exit ${rootCause.exitCode}`
    lines.push('', `Root cause: stage "${rootCause.stage}" (${rootCause.status}, ${exitText})`)
    if (rootCause.command) {
      lines.push(`  command: ${rootCause.command}`)
    }
    if (rootCause.stderrTail.length > 0) {
      lines.push('  stderr:', ...rootCause.stderrTail.map((line) => `    ${line}`))
    }
  }

  if (report.warnings.length > 0) {
    lines.push('', `Warnings (${report.warnings.length}):`)
    for (const warning of report.warnings) {
      lines.push(`  - [${warning.kind}] ${warning.stage}: ${warning.message}`)
    }
  }

  return lines.join('\n')
}

const buildRootCause = (result: StageResult): ReportRootCause => {
  const failingCommand = result.commands[result.commands.length - 1]

  return {
    stage: result.name,
    status: result.status,
    command: failingCommand?.command ?? null,
    exitCode: result.exitCode,
    stderrTail: failingCommand ? tailLines(failingCommand.stderr, STDERR_TAIL_LINES) : [],
  }
}

const buildWarnings = (result: StageResult): ReportWarning[] => {
  const warnings: ReportWarning[] = []

  if (isIgnoredFailure(result)) {
    const detail =
      result.status === 'timed_out'
        ? 'timed out'
        : `failed with exit code ${result.exitCode === null ? 'none' : result.exitCode}`
    warnings.push({
      stage: result.name,
      kind: 'FailedIgnored',
      message: `${detail} (continue-on-error)`,
    })
  }

  for (const pattern of result.missingArtifacts) {
    const error = result.artifactErrors?.[pattern]
    warnings.push({
      stage: result.name,
      kind: 'ArtifactMissing',
      message: error
        ? `declared artifact "${pattern}" could not be resolved (${error})`
        : `declared artifact "${pattern}" matched no files`,
    })
  }

  return warnings
}

const tailLines = (text: string, count: number): string[] => {
  const lines = text.trimEnd().split(/\r?\n/u)
  if (lines.length === 1 && lines[0] === '') {
    return []
  }

  return lines.slice(-count)
}

/**
 * Serializes a report for `--format json`.
 *
 * @param report Run report.
 * @param indentation Spaces per level, 0 for a single line.
 * @returns JSON text without trailing newline.
 */
export const formatRunReportAsJson = (report: RunReport, indentation = 2): string => {
  return JSON.stringify(report, null, indentation)
}
