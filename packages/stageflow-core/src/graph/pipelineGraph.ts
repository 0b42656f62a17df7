import type { StageDefinition } from '../contracts/stage.js'
import { collectArtifactReferences } from '../runner/commandTemplate.js'

import { PipelineGraphError } from './graphError.js'

/**
 * Validation outcome returned by {@link validatePipelineGraph}.
 */
export type PipelineGraphValidation =
  | { readonly valid: true; readonly graph: PipelineGraph }
  | { readonly valid: false; readonly error: PipelineGraphError }

/**
 * Validated, acyclic stage graph with a deterministic linearization.
 */
export class PipelineGraph {
  /** Stages in execution order. */
  public readonly order: readonly StageDefinition[]

  private readonly stagesByName: ReadonlyMap<string, StageDefinition>
  private readonly dependents: ReadonlyMap<string, readonly string[]>

  private constructor(
    order: readonly StageDefinition[],
    stagesByName: ReadonlyMap<string, StageDefinition>,
    dependents: ReadonlyMap<string, readonly string[]>
  ) {
    this.order = order
    this.stagesByName = stagesByName
    this.dependents = dependents
  }

  /**
   * Validates stage definitions and builds the graph.
   *
   * Checks run in a fixed order: duplicate names, unknown dependencies
   * (including condition and artifact template references), then cycles.
   * The linearization is Kahn's algorithm where ties between ready stages
   * are broken by declaration order.
   *
   * @param stages Stage definitions in declaration order.
   * @returns Validated graph.
   * @throws PipelineGraphError when the definitions do not form a valid DAG.
   */
  public static build(stages: readonly StageDefinition[]): PipelineGraph {
    const stagesByName = indexStages(stages)
    assertKnownDependencies(stages, stagesByName)

    const dependents = new Map<string, string[]>()
    for (const stage of stages) {
      dependents.set(stage.name, [])
    }
    for (const stage of stages) {
      for (const dependency of uniqueDependencies(stage)) {
        dependents.get(dependency)?.push(stage.name)
      }
    }

    const order = linearize(stages, dependents)
    const graph = new PipelineGraph(order, stagesByName, dependents)
    graph.assertUpstreamArtifactReferences()
    return graph
  }

  /**
   * Returns a stage definition by name.
   *
   * @param name Stage name.
   * @returns Stage definition or undefined.
   */
  public getStage(name: string): StageDefinition | undefined {
    return this.stagesByName.get(name)
  }

  /**
   * Returns direct dependencies of a stage.
   *
   * @param name Stage name.
   * @returns Dependency names without duplicates.
   */
  public dependenciesOf(name: string): readonly string[] {
    const stage = this.stagesByName.get(name)
    return stage ? uniqueDependencies(stage) : []
  }

  /**
   * Returns stages that list the given stage in `dependsOn`.
   *
   * @param name Stage name.
   * @returns Dependent names in declaration order.
   */
  public dependentsOf(name: string): readonly string[] {
    return this.dependents.get(name) ?? []
  }

  /**
   * Returns every stage reachable through `dependsOn` edges.
   *
   * @param name Stage name.
   * @returns Transitive dependency names.
   */
  public transitiveDependenciesOf(name: string): ReadonlySet<string> {
    const visited = new Set<string>()
    const pending = [...this.dependenciesOf(name)]

    while (pending.length > 0) {
      const current = pending.pop()
      if (current === undefined || visited.has(current)) {
        continue
      }

      visited.add(current)
      pending.push(...this.dependenciesOf(current))
    }

    return visited
  }

  /**
   * Checks whether all dependencies of a stage are terminal.
   *
   * @param name Stage name.
   * @param terminalStages Names of stages that reached a terminal state.
   * @returns True when the stage may leave the blocked state.
   */
  public isReady(name: string, terminalStages: ReadonlySet<string>): boolean {
    return this.dependenciesOf(name).every((dependency) => terminalStages.has(dependency))
  }

  private assertUpstreamArtifactReferences(): void {
    for (const stage of this.order) {
      const upstream = this.transitiveDependenciesOf(stage.name)

      for (const command of stage.commands) {
        for (const reference of collectArtifactReferences(command)) {
          if (!upstream.has(reference)) {
            throw new PipelineGraphError(
              'UnknownDependency',
              `Stage "${stage.name}" references artifacts of "${reference}", which is not an upstream stage`,
              [stage.name, reference]
            )
          }
        }
      }
    }
  }
}

/**
 * Validates stage definitions and builds the graph.
 *
 * @param stages Stage definitions in declaration order.
 * @returns Validated graph.
 * @throws PipelineGraphError when the definitions do not form a valid DAG.
 */
export const buildPipelineGraph = (stages: readonly StageDefinition[]): PipelineGraph => {
  return PipelineGraph.build(stages)
}

/**
 * Validates stage definitions without throwing.
 *
 * @param stages Stage definitions in declaration order.
 * @returns Graph on success, graph error otherwise.
 */
export const validatePipelineGraph = (
  stages: readonly StageDefinition[]
): PipelineGraphValidation => {
  try {
    return { valid: true, graph: PipelineGraph.build(stages) }
  } catch (error: unknown) {
    if (error instanceof PipelineGraphError) {
      return { valid: false, error }
    }

    throw error
  }
}

const indexStages = (stages: readonly StageDefinition[]): Map<string, StageDefinition> => {
  const stagesByName = new Map<string, StageDefinition>()

  for (const stage of stages) {
    if (stagesByName.has(stage.name)) {
      throw new PipelineGraphError(
        'DuplicateStageName',
        `Stage name "${stage.name}" is declared more than once`,
        [stage.name]
      )
    }

    stagesByName.set(stage.name, stage)
  }

  return stagesByName
}

const assertKnownDependencies = (
  stages: readonly StageDefinition[],
  stagesByName: ReadonlyMap<string, StageDefinition>
): void => {
  for (const stage of stages) {
    const dependencies = uniqueDependencies(stage)

    for (const dependency of dependencies) {
      if (!stagesByName.has(dependency)) {
        throw new PipelineGraphError(
          'UnknownDependency',
          `Stage "${stage.name}" depends on unknown stage "${dependency}"`,
          [stage.name, dependency]
        )
      }
    }

    const condition = stage.condition
    if (!condition || condition.kind === 'always') {
      continue
    }

    for (const reference of condition.stages) {
      if (!dependencies.includes(reference)) {
        throw new PipelineGraphError(
          'UnknownDependency',
          `Condition of stage "${stage.name}" references "${reference}", which is not listed in dependsOn`,
          [stage.name, reference]
        )
      }
    }
  }
}

const linearize = (
  stages: readonly StageDefinition[],
  dependents: ReadonlyMap<string, readonly string[]>
): StageDefinition[] => {
  const declarationIndex = new Map(stages.map((stage, index) => [stage.name, index]))
  const remainingDependencies = new Map(
    stages.map((stage) => [stage.name, uniqueDependencies(stage).length])
  )

  const ready: StageDefinition[] = stages.filter((stage) => uniqueDependencies(stage).length === 0)
  const order: StageDefinition[] = []

  while (ready.length > 0) {
    const next = ready.shift()
    if (!next) {
      break
    }
    order.push(next)

    for (const dependentName of dependents.get(next.name) ?? []) {
      const remaining = (remainingDependencies.get(dependentName) ?? 0) - 1
      remainingDependencies.set(dependentName, remaining)
      if (remaining !== 0) {
        continue
      }

      const dependentIndex = declarationIndex.get(dependentName) ?? 0
      const dependent = stages[dependentIndex]
      if (!dependent) {
        continue
      }

      const insertAt = ready.findIndex(
        (candidate) => (declarationIndex.get(candidate.name) ?? 0) > dependentIndex
      )
      if (insertAt === -1) {
        ready.push(dependent)
      } else {
        ready.splice(insertAt, 0, dependent)
      }
    }
  }

  if (order.length !== stages.length) {
    const ordered = new Set(order.map((stage) => stage.name))
    const cycle = findCycle(stages.filter((stage) => !ordered.has(stage.name)))
    throw new PipelineGraphError(
      'CycleDetected',
      `Dependency cycle detected: ${cycle.join(' -> ')}`,
      cycle
    )
  }

  return order
}

const findCycle = (unresolved: readonly StageDefinition[]): string[] => {
  const byName = new Map(unresolved.map((stage) => [stage.name, stage]))
  const visited = new Set<string>()

  const visit = (name: string, path: readonly string[]): string[] | null => {
    const cycleStart = path.indexOf(name)
    if (cycleStart !== -1) {
      return [...path.slice(cycleStart), name]
    }

    if (visited.has(name)) {
      return null
    }
    visited.add(name)

    const stage = byName.get(name)
    if (!stage) {
      return null
    }

    for (const dependency of uniqueDependencies(stage)) {
      if (!byName.has(dependency)) {
        continue
      }

      const cycle = visit(dependency, [...path, name])
      if (cycle) {
        return cycle
      }
    }

    return null
  }

  for (const stage of unresolved) {
    const cycle = visit(stage.name, [])
    if (cycle) {
      return cycle
    }
  }

  return unresolved.map((stage) => stage.name)
}

const uniqueDependencies = (stage: StageDefinition): string[] => {
  return [...new Set(stage.dependsOn ?? [])]
}
