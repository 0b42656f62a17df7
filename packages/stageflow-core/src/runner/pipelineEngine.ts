import { resolve } from 'node:path'

import { ArtifactStore } from '../artifacts/artifactStore.js'
import { resolveDeclaredArtifacts } from '../artifacts/artifactResolver.js'
import type { CommandExecutionResult } from '../contracts/command.js'
import type { RunReport } from '../contracts/report.js'
import type { ArtifactMatch, PipelineRun, PipelineRunOptions, RunOutcome } from '../contracts/run.js'
import {
  TERMINAL_STAGE_STATUSES,
  type CommandRecord,
  type StageDefinition,
  type StageResult,
  type StageStatus,
} from '../contracts/stage.js'
import { buildPipelineGraph, type PipelineGraph } from '../graph/pipelineGraph.js'
import { finalizeRunReport, isRequiredFailure } from '../reporters/runReport.js'

import { expandCommandTemplates, formatCommand } from './commandTemplate.js'
import { evaluateStageCondition } from './stageCondition.js'

let runSequence = 0

/**
 * Sequential execution engine for a pipeline stage graph.
 *
 * The engine is the only writer of stage results and artifacts. Reporters
 * and callers observe immutable snapshots.
 */
export class PipelineEngine {
  private readonly options: Required<
    Pick<PipelineRunOptions, 'now' | 'createRunId' | 'resolveArtifacts' | 'env' | 'cwd'>
  > &
    Omit<PipelineRunOptions, 'now' | 'createRunId' | 'resolveArtifacts' | 'env' | 'cwd'>

  private readonly graph: PipelineGraph
  private readonly artifactStore = new ArtifactStore()
  private readonly results = new Map<string, StageResult>()
  private runId = ''
  private outcome: RunOutcome = 'pending'
  private startedAt = 0
  private finishedAt: number | null = null

  /**
   * Creates an engine and validates the stage graph.
   *
   * @param options Runtime options.
   * @throws PipelineGraphError when the stages do not form a valid DAG.
   */
  public constructor(options: PipelineRunOptions) {
    this.options = {
      ...options,
      cwd: options.cwd ?? process.cwd(),
      env: options.env ?? readProcessEnv(),
      now: options.now ?? Date.now,
      createRunId:
        options.createRunId ??
        ((startedAt: number): string => {
          runSequence += 1
          return `run-${startedAt.toString(36)}-${runSequence}`
        }),
      resolveArtifacts: options.resolveArtifacts ?? resolveDeclaredArtifacts,
    }
    this.graph = buildPipelineGraph(options.stages)
  }

  /**
   * Executes the stage graph once.
   *
   * @returns Frozen run state with a terminal outcome.
   * @throws Error when the engine already ran.
   */
  public async run(): Promise<PipelineRun> {
    if (this.outcome !== 'pending') {
      throw new Error('PipelineEngine can only run once')
    }

    this.startedAt = this.options.now()
    this.runId = this.options.createRunId(this.startedAt)
    this.outcome = 'running'

    for (const stage of this.graph.order) {
      this.record(createPendingResult(stage, 'blocked'))
    }

    await this.emitPipelineStart()

    let haltedBy: string | null = null
    let aborted = false

    for (const [index, stage] of this.graph.order.entries()) {
      if (this.options.signal?.aborted) {
        aborted = true
        break
      }

      if (!this.graph.isReady(stage.name, this.terminalStageNames())) {
        continue
      }

      this.transition(stage.name, 'ready')

      const condition = evaluateStageCondition(stage.condition, (name) => this.statusOf(name))
      if (!condition.holds) {
        const skipped: StageResult = {
          ...createPendingResult(stage, 'skipped'),
          skipReason: condition.reason,
        }
        this.record(skipped)
        await this.emitStageComplete(skipped, index)
        continue
      }

      this.transition(stage.name, 'running')
      await this.emitStageStart(stage, index)

      const result = await this.executeStage(stage)
      this.record(result)
      await this.emitStageComplete(result, index)

      if (result.status === 'aborted') {
        aborted = true
        break
      }

      if (isRequiredFailure(result)) {
        haltedBy = stage.name
        break
      }
    }

    this.finishRun(aborted, haltedBy)

    const run = this.snapshot()
    await this.emitPipelineComplete(finalizeRunReport(run))

    return run
  }

  /**
   * Returns an immutable snapshot of the current run state. Stage results,
   * their command records and artifact lists are frozen as well.
   *
   * @returns Pipeline run snapshot.
   */
  public snapshot(): PipelineRun {
    const results: Record<string, StageResult> = {}
    for (const stage of this.graph.order) {
      const result = this.results.get(stage.name)
      if (result) {
        results[stage.name] = freezeStageResult(result)
      }
    }

    return Object.freeze({
      id: this.runId,
      stages: this.graph.order,
      results: Object.freeze(results),
      artifacts: Object.freeze(this.artifactStore.all()),
      outcome: this.outcome,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
    })
  }

  private finishRun(aborted: boolean, haltedBy: string | null): void {
    for (const stage of this.graph.order) {
      const status = this.statusOf(stage.name)
      if (status === undefined || TERMINAL_STAGE_STATUSES.has(status)) {
        continue
      }

      if (aborted) {
        this.record({ ...createPendingResult(stage, 'aborted'), skipReason: 'run was aborted' })
        continue
      }

      this.record({
        ...createPendingResult(stage, 'blocked'),
        skipReason: haltedBy ? `halted after required stage "${haltedBy}" failed` : undefined,
      })
    }

    this.outcome = aborted ? 'aborted' : haltedBy ? 'failed_required' : 'succeeded'
    this.finishedAt = this.options.now()
  }

  private async executeStage(stage: StageDefinition): Promise<StageResult> {
    const startedAt = this.options.now()
    const policy = stage.policy ?? 'required'
    const strategy = stage.strategy ?? 'all'
    const stageCwd = resolve(this.options.cwd, stage.cwd ?? '.')
    const deadline = typeof stage.timeoutMs === 'number' ? startedAt + stage.timeoutMs : null

    const records: CommandRecord[] = []
    let deciding: CommandExecutionResult | null = null

    for (const command of stage.commands) {
      const remainingMs = deadline === null ? undefined : deadline - this.options.now()
      const expanded = expandCommandTemplates(command, (name) => this.artifactStore.list(name))

      const execution =
        remainingMs !== undefined && remainingMs <= 0
          ? createBudgetExhaustedResult(stage.timeoutMs ?? 0)
          : await this.options.runner({
              program: expanded.program,
              args: expanded.args ?? [],
              shell: expanded.shell ?? false,
              cwd: resolve(stageCwd, expanded.cwd ?? '.'),
              env: { ...this.options.env, ...stage.env, ...expanded.env },
              timeoutMs: remainingMs,
              signal: this.options.signal,
            })

      records.push({
        command: formatCommand(expanded),
        exitCode: execution.exitCode,
        ...(execution.errorKind ? { errorKind: execution.errorKind } : {}),
        durationMs: execution.durationMs,
        stdout: execution.stdout,
        stderr: execution.stderr,
      })
      deciding = execution

      const stopForStrategy = strategy === 'all' ? !execution.successful : execution.successful
      const stageEnded = execution.errorKind === 'Timeout' || execution.errorKind === 'Aborted'
      if (stopForStrategy || stageEnded) {
        break
      }
    }

    const status = resolveStageStatus(deciding, policy)
    const finishedAt = this.options.now()
    const base: StageResult = {
      name: stage.name,
      status,
      policy,
      exitCode: deciding?.exitCode ?? null,
      ...(deciding?.errorKind ? { errorKind: deciding.errorKind } : {}),
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
      commands: records,
      artifacts: [],
      missingArtifacts: [],
    }

    const declared = stage.artifacts ?? []
    if (declared.length === 0 || (status !== 'succeeded' && status !== 'failed_ignored')) {
      return base
    }

    return await this.collectArtifacts(base, await this.lookupArtifacts(stageCwd, declared))
  }

  private async lookupArtifacts(
    stageCwd: string,
    declared: readonly string[]
  ): Promise<readonly ArtifactMatch[]> {
    try {
      return await this.options.resolveArtifacts(stageCwd, declared)
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error)
      return declared.map((pattern) => ({ pattern, paths: [], error: message }))
    }
  }

  private async collectArtifacts(
    result: StageResult,
    matches: readonly ArtifactMatch[]
  ): Promise<StageResult> {
    const missingArtifacts: string[] = []
    const artifactErrors: Record<string, string> = {}

    for (const match of matches) {
      if (match.paths.length === 0) {
        missingArtifacts.push(match.pattern)
        if (match.error !== undefined) {
          artifactErrors[match.pattern] = match.error
        }
        await this.emitArtifactMissing(result.name, match.pattern, match.error)
        continue
      }

      this.artifactStore.register(result.name, match.paths)
    }

    return {
      ...result,
      artifacts: this.artifactStore.list(result.name),
      missingArtifacts,
      ...(Object.keys(artifactErrors).length > 0 ? { artifactErrors } : {}),
    }
  }

  private transition(stageName: string, status: StageStatus): void {
    const current = this.results.get(stageName)
    if (!current) {
      throw new Error(`Unknown stage: ${stageName}`)
    }

    this.record({ ...current, status })
  }

  private record(result: StageResult): void {
    const current = this.results.get(result.name)
    if (current && TERMINAL_STAGE_STATUSES.has(current.status)) {
      throw new Error(`Stage "${result.name}" already reached terminal status ${current.status}`)
    }

    this.results.set(result.name, result)
  }

  private statusOf(stageName: string): StageStatus | undefined {
    return this.results.get(stageName)?.status
  }

  private terminalStageNames(): ReadonlySet<string> {
    const names = new Set<string>()
    for (const [name, result] of this.results) {
      if (TERMINAL_STAGE_STATUSES.has(result.status)) {
        names.add(name)
      }
    }

    return names
  }

  private async emitPipelineStart(): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onPipelineStart?.(this.runId, this.graph.order)
    }
  }

  private async emitStageStart(stage: StageDefinition, index: number): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onStageStart?.(stage, index)
    }
  }

  private async emitStageComplete(result: StageResult, index: number): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onStageComplete?.(result, index)
    }
  }

  private async emitArtifactMissing(
    stageName: string,
    pattern: string,
    error: string | undefined
  ): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onArtifactMissing?.(stageName, pattern, error)
    }
  }

  private async emitPipelineComplete(report: RunReport): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onPipelineComplete?.(report)
    }
  }
}

/**
 * Creates a pipeline engine instance.
 *
 * @param options Runtime options.
 * @returns Pipeline engine.
 * @throws PipelineGraphError when the stages do not form a valid DAG.
 */
export const createPipelineEngine = (options: PipelineRunOptions): PipelineEngine => {
  return new PipelineEngine(options)
}

const resolveStageStatus = (
  deciding: CommandExecutionResult | null,
  policy: StageResult['policy']
): StageStatus => {
  if (!deciding || deciding.successful) {
    return 'succeeded'
  }

  if (deciding.errorKind === 'Aborted') {
    return 'aborted'
  }

  if (deciding.errorKind === 'Timeout') {
    return 'timed_out'
  }

  return policy === 'required' ? 'failed_required' : 'failed_ignored'
}

const createPendingResult = (stage: StageDefinition, status: StageStatus): StageResult => {
  return {
    name: stage.name,
    status,
    policy: stage.policy ?? 'required',
    exitCode: null,
    startedAt: null,
    finishedAt: null,
    durationMs: 0,
    commands: [],
    artifacts: [],
    missingArtifacts: [],
  }
}

const freezeStageResult = (result: StageResult): StageResult => {
  return Object.freeze({
    ...result,
    commands: Object.freeze(result.commands.map((record) => Object.freeze({ ...record }))),
    artifacts: Object.freeze([...result.artifacts]),
    missingArtifacts: Object.freeze([...result.missingArtifacts]),
    ...(result.artifactErrors ? { artifactErrors: Object.freeze({ ...result.artifactErrors }) } : {}),
  })
}

const createBudgetExhaustedResult = (timeoutMs: number): CommandExecutionResult => {
  return {
    successful: false,
    exitCode: null,
    signal: null,
    stdout: '',
    stderr: `Timeout: stage budget of ${timeoutMs}ms was exhausted before the command started`,
    durationMs: 0,
    timedOut: true,
    errorKind: 'Timeout',
  }
}

const readProcessEnv = (): Record<string, string> => {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (typeof value === 'string') {
      env[key] = value
    }
  }

  return env
}
