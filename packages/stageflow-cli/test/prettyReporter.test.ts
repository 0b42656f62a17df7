import { describe, expect, it, vi } from 'vitest'

import type { RunReport, StageResult } from '@stageflow/core'

import { PrettyReporter } from '../src/reporters/prettyReporter.js'

const ANSI_ESCAPE_PATTERN = new RegExp(String.raw`\u001B\[[0-?]*[ -/]*[@-~]`, 'gu')

describe('PrettyReporter', () => {
  it('prints the failing command and stderr tail of a required failure', () => {
    const reporter = new PrettyReporter({ verbose: false })
    const stderr = Array.from({ length: 25 }, (_, index) => `error line ${index + 1}`).join('\n')

    const output = captureStdout(() => {
      reporter.onStageComplete(
        createStageResult({
          name: 'build',
          status: 'failed_required',
          exitCode: 2,
          durationMs: 40,
          commands: [
            {
              command: 'npm run build',
              exitCode: 2,
              errorKind: 'NonZeroExit',
              durationMs: 40,
              stdout: '',
              stderr,
            },
          ],
        })
      )
    })
    const lines = output.split('\n')

    expect(lines[0]).toBe('✗ build failed_required (exit 2, 40ms)')
    expect(lines[1]).toBe('  command: npm run build')
    expect(lines[2]).toBe('  stderr:')
    expect(lines[3]).toBe('    error line 6')
    expect(lines[22]).toBe('    error line 25')
  })

  it('prints a warning banner for continue-on-error failures', () => {
    const reporter = new PrettyReporter({ verbose: false })
    const output = captureStdout(() => {
      reporter.onStageComplete(
        createStageResult({
          name: 'lint',
          status: 'failed_ignored',
          policy: 'continue-on-error',
          exitCode: 1,
          durationMs: 12,
          commands: [
            {
              command: 'eslint .',
              exitCode: 1,
              durationMs: 12,
              stdout: 'src/a.ts: 1 problem\n',
              stderr: '',
            },
          ],
        })
      )
    })

    expect(output).toBe(
      '⚠ lint failed_ignored (continue-on-error, exit 1, 12ms)\n  stdout:\n    src/a.ts: 1 problem\n'
    )
  })

  it('hides output of successful stages unless verbose', () => {
    const result = createStageResult({
      name: 'test',
      durationMs: 5,
      artifacts: ['/repo/coverage/lcov.info'],
      commands: [
        { command: 'vitest run', exitCode: 0, durationMs: 5, stdout: 'all green', stderr: '' },
      ],
    })

    const quiet = captureStdout(() => {
      new PrettyReporter({ verbose: false }).onStageComplete(result)
    })
    const verbose = captureStdout(() => {
      new PrettyReporter({ verbose: true }).onStageComplete(result)
    })

    expect(quiet).toBe('✓ test 5ms (1 artifacts)\n')
    expect(verbose).toBe('✓ test 5ms (1 artifacts)\n  stdout:\n    all green\n')
  })

  it('prints skip reasons and missing artifacts', () => {
    const reporter = new PrettyReporter({ verbose: false })
    const output = captureStdout(() => {
      reporter.onStageComplete(
        createStageResult({
          name: 'publish',
          status: 'skipped',
          skipReason: 'runIfAllSucceeded not met (lint did not succeed)',
        })
      )
      reporter.onArtifactMissing('build', 'dist/**')
    })

    expect(output).toBe(
      [
        'ℹ publish skipped (runIfAllSucceeded not met (lint did not succeed))',
        '  warning: artifact "dist/**" of build matched no files',
        '',
      ].join('\n')
    )
  })

  it('prints why an artifact pattern could not be resolved', () => {
    const reporter = new PrettyReporter({ verbose: false })
    const output = captureStdout(() => {
      reporter.onArtifactMissing('build', 'loop', 'ELOOP: too many symbolic links encountered')
    })

    expect(output).toBe(
      '  warning: artifact "loop" of build could not be resolved (ELOOP: too many symbolic links encountered)\n'
    )
  })

  it('closes with the report table and result line', () => {
    const report: RunReport = {
      runId: 'run-1',
      outcome: 'aborted',
      exitCode: 2,
      durationMs: 10,
      stages: [
        {
          name: 'build',
          status: 'aborted',
          policy: 'required',
          durationMs: 10,
          exitCode: null,
          artifactCount: 0,
        },
      ],
      rootCause: null,
      warnings: [],
      artifacts: {},
    }

    const output = captureStdout(() => {
      new PrettyReporter({ verbose: false }).onPipelineComplete(report)
    })

    expect(output).toBe(
      [
        '',
        'Run run-1: aborted (exit 2) in 10ms',
        '',
        'STAGE  STATUS   POLICY    DURATION  EXIT',
        'build  aborted  required  10ms      -',
        'Result: ABORTED',
        '',
      ].join('\n')
    )
  })
})

const createStageResult = (
  overrides: Partial<StageResult> & Pick<StageResult, 'name'>
): StageResult => {
  return {
    status: 'succeeded',
    policy: 'required',
    exitCode: 0,
    startedAt: 0,
    finishedAt: 1,
    durationMs: 1,
    commands: [],
    artifacts: [],
    missingArtifacts: [],
    ...overrides,
  }
}

const captureStdout = (callback: () => void): string => {
  const chunks: string[] = []
  const writeSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'))
      return true
    })

  try {
    callback()
  } finally {
    writeSpy.mockRestore()
  }

  return stripAnsi(chunks.join(''))
}

const stripAnsi = (text: string): string => {
  return text.replaceAll(ANSI_ESCAPE_PATTERN, '')
}
