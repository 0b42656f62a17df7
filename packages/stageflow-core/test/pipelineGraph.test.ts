import { describe, expect, it } from 'vitest'

import type { StageDefinition } from '../src/index.js'
import { buildPipelineGraph, PipelineGraphError, validatePipelineGraph } from '../src/index.js'

const stage = (name: string, dependsOn: readonly string[] = []): StageDefinition => {
  return {
    name,
    commands: [{ program: 'npm', args: ['run', name] }],
    dependsOn,
  }
}

const captureGraphError = (stages: readonly StageDefinition[]): PipelineGraphError => {
  try {
    buildPipelineGraph(stages)
  } catch (error: unknown) {
    if (error instanceof PipelineGraphError) {
      return error
    }
    throw error
  }

  throw new Error('expected graph construction to fail')
}

describe('PipelineGraph', () => {
  it('breaks ties between ready stages by declaration order', () => {
    const graph = buildPipelineGraph([
      stage('deploy', ['build', 'lint']),
      stage('lint', ['build']),
      stage('build'),
      stage('docs'),
    ])

    expect(graph.order.map((entry) => entry.name)).toEqual(['build', 'lint', 'deploy', 'docs'])
  })

  it('places every stage after all of its dependencies', () => {
    const graph = buildPipelineGraph([
      stage('publish', ['package', 'scan']),
      stage('scan', ['build']),
      stage('install'),
      stage('package', ['build', 'test']),
      stage('test', ['install']),
      stage('build', ['install']),
      stage('lint', ['install']),
    ])
    const positions = new Map(graph.order.map((entry, index) => [entry.name, index]))

    for (const entry of graph.order) {
      for (const dependency of entry.dependsOn ?? []) {
        expect(positions.get(dependency)).toBeLessThan(positions.get(entry.name) ?? -1)
      }
    }
    expect(graph.order.map((entry) => entry.name)).toEqual([
      'install',
      'test',
      'build',
      'scan',
      'package',
      'publish',
      'lint',
    ])
  })

  it('rejects duplicate stage names', () => {
    const error = captureGraphError([stage('build'), stage('build')])

    expect(error.kind).toBe('DuplicateStageName')
    expect(error.message).toBe('Stage name "build" is declared more than once')
  })

  it('rejects unknown dependencies', () => {
    const error = captureGraphError([stage('build'), stage('lint', ['biuld'])])

    expect(error.kind).toBe('UnknownDependency')
    expect(error.message).toBe('Stage "lint" depends on unknown stage "biuld"')
    expect(error.stages).toEqual(['lint', 'biuld'])
  })

  it('rejects conditions that reference stages outside dependsOn', () => {
    const error = captureGraphError([
      stage('build'),
      stage('lint'),
      {
        ...stage('cleanup', ['build']),
        condition: { kind: 'any_failed', stages: ['lint'] },
      },
    ])

    expect(error.kind).toBe('UnknownDependency')
    expect(error.message).toBe(
      'Condition of stage "cleanup" references "lint", which is not listed in dependsOn'
    )
  })

  it('rejects a two-stage cycle with the cycle path', () => {
    const error = captureGraphError([
      stage('stageA'),
      stage('stageB', ['stageC']),
      stage('stageC', ['stageB']),
    ])

    expect(error.kind).toBe('CycleDetected')
    expect(error.stages).toEqual(['stageB', 'stageC', 'stageB'])
    expect(error.message).toBe('Dependency cycle detected: stageB -> stageC -> stageB')
  })

  it('treats a self dependency as a cycle', () => {
    const error = captureGraphError([stage('build', ['build'])])

    expect(error.kind).toBe('CycleDetected')
    expect(error.stages).toEqual(['build', 'build'])
  })

  it('rejects artifact templates that reference non-upstream stages', () => {
    const error = captureGraphError([
      stage('build'),
      stage('docs'),
      {
        name: 'deploy',
        dependsOn: ['build'],
        commands: [{ program: 'upload', args: ['${artifacts:docs}'] }],
      },
    ])

    expect(error.kind).toBe('UnknownDependency')
    expect(error.message).toBe(
      'Stage "deploy" references artifacts of "docs", which is not an upstream stage'
    )
  })

  it('accepts artifact templates that reference transitive dependencies', () => {
    const graph = buildPipelineGraph([
      stage('build'),
      stage('test', ['build']),
      {
        name: 'deploy',
        dependsOn: ['test'],
        commands: [{ program: 'upload', args: ['${artifacts:build}'] }],
      },
    ])

    expect(graph.transitiveDependenciesOf('deploy')).toEqual(new Set(['test', 'build']))
  })

  it('answers dependency queries', () => {
    const graph = buildPipelineGraph([
      stage('build'),
      stage('lint', ['build', 'build']),
      stage('deploy', ['build', 'lint']),
    ])

    expect(graph.dependenciesOf('lint')).toEqual(['build'])
    expect(graph.dependentsOf('build')).toEqual(['lint', 'deploy'])
    expect(graph.getStage('deploy')?.dependsOn).toEqual(['build', 'lint'])
    expect(graph.isReady('deploy', new Set(['build']))).toBe(false)
    expect(graph.isReady('deploy', new Set(['build', 'lint']))).toBe(true)
  })

  it('reports validation failures without throwing', () => {
    const validation = validatePipelineGraph([stage('a', ['b']), stage('b', ['a'])])

    expect(validation.valid).toBe(false)
    if (!validation.valid) {
      expect(validation.error.kind).toBe('CycleDetected')
    }
  })
})
