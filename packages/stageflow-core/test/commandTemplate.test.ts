import { describe, expect, it } from 'vitest'

import { collectArtifactReferences, expandCommandTemplates, formatCommand } from '../src/index.js'

const lookup = (stageName: string): readonly string[] => {
  if (stageName === 'build') {
    return ['/repo/dist/a.js', '/repo/dist/b.js']
  }

  return []
}

describe('collectArtifactReferences', () => {
  it('collects references from program, arguments, cwd and env', () => {
    expect(
      collectArtifactReferences({
        program: 'upload-${artifacts:tools}',
        args: ['${artifacts:build}', '--extra=${artifacts: docs }'],
        cwd: '${artifacts:build}',
        env: { REPORT: '${artifacts:test}' },
      })
    ).toEqual(['tools', 'build', 'docs', 'test'])
  })

  it('returns nothing for plain commands', () => {
    expect(collectArtifactReferences({ program: 'npm', args: ['test'] })).toEqual([])
  })
})

describe('expandCommandTemplates', () => {
  it('spreads whole-argument templates and joins embedded ones', () => {
    expect(
      expandCommandTemplates(
        {
          program: 'tar',
          args: ['-czf', 'bundle.tgz', '${artifacts:build}', '--label=${artifacts:build}'],
        },
        lookup
      )
    ).toEqual({
      program: 'tar',
      args: [
        '-czf',
        'bundle.tgz',
        '/repo/dist/a.js',
        '/repo/dist/b.js',
        '--label=/repo/dist/a.js /repo/dist/b.js',
      ],
    })
  })

  it('drops whole-argument templates of stages without artifacts', () => {
    expect(expandCommandTemplates({ program: 'ls', args: ['${artifacts:lint}'] }, lookup)).toEqual({
      program: 'ls',
      args: [],
    })
  })

  it('expands shell command strings in place', () => {
    expect(
      expandCommandTemplates({ program: 'cat ${artifacts:build} | wc -l', shell: true }, lookup)
    ).toEqual({ program: 'cat /repo/dist/a.js /repo/dist/b.js | wc -l', shell: true })
  })

  it('quotes paths the shell would split or interpret', () => {
    const reports = (): readonly string[] => ['/tmp/out/my report.txt', "/tmp/out/it's.log"]

    expect(
      expandCommandTemplates(
        {
          program: 'cat ${artifacts:build}',
          args: ['${artifacts:build}'],
          env: { REPORTS: '${artifacts:build}' },
          shell: true,
        },
        reports
      )
    ).toEqual({
      program: "cat '/tmp/out/my report.txt' '/tmp/out/it'\\''s.log'",
      args: ["'/tmp/out/my report.txt'", "'/tmp/out/it'\\''s.log'"],
      env: { REPORTS: "/tmp/out/my report.txt /tmp/out/it's.log" },
      shell: true,
    })
  })
})

describe('formatCommand', () => {
  it('quotes arguments that need it', () => {
    expect(formatCommand({ program: 'git', args: ['commit', '-m', 'release notes', ''] })).toBe(
      "git commit -m 'release notes' ''"
    )
    expect(formatCommand({ program: 'echo', args: ["it's"] })).toBe("echo 'it'\\''s'")
  })

  it('prints shell commands verbatim', () => {
    expect(formatCommand({ program: 'npm test && echo done', shell: true })).toBe(
      'npm test && echo done'
    )
  })
})
