import { dirname, resolve } from 'node:path'

import type { CommandSpec, StageCondition, StageDefinition } from '@stageflow/core'

import type { DefinitionCondition, DefinitionStage, PipelineDefinition } from './types.js'

/**
 * Engine inputs derived from a definition file.
 */
export interface MappedPipeline {
  /** Engine stage definitions in declaration order. */
  readonly stages: readonly StageDefinition[]
  /** Absolute pipeline working directory. */
  readonly cwd: string
  /** Base environment for every command. */
  readonly env: Readonly<Record<string, string>>
}

/**
 * Maps a loaded definition to engine inputs.
 *
 * The base environment is the process environment, then the definition `env`,
 * then `--env` overrides.
 *
 * @param definition Parsed definition.
 * @param definitionFilePath Absolute path of the definition file.
 * @param processEnv Process environment.
 * @param envOverrides Values given with `--env`.
 * @returns Engine inputs.
 */
export const mapDefinitionToPipeline = (
  definition: PipelineDefinition,
  definitionFilePath: string,
  processEnv: NodeJS.ProcessEnv,
  envOverrides: Readonly<Record<string, string>> = {}
): MappedPipeline => {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(processEnv)) {
    if (typeof value === 'string') {
      env[key] = value
    }
  }

  return {
    stages: definition.stages.map(mapStage),
    cwd: resolve(dirname(definitionFilePath), definition.cwd ?? '.'),
    env: { ...env, ...definition.env, ...envOverrides },
  }
}

const mapStage = (stage: DefinitionStage): StageDefinition => {
  const condition = mapCondition(stage.condition)

  return {
    name: stage.name,
    commands: stage.commands.map((command): CommandSpec => {
      if (typeof command === 'string') {
        return { program: command, shell: true }
      }

      return { ...command }
    }),
    policy: stage.policy ?? 'required',
    strategy: stage.strategy ?? 'all',
    dependsOn: stage.dependsOn ?? [],
    ...(condition ? { condition } : {}),
    ...(stage.artifacts ? { artifacts: stage.artifacts } : {}),
    ...(stage.timeoutSeconds !== undefined
      ? { timeoutMs: Math.round(stage.timeoutSeconds * 1000) }
      : {}),
    ...(stage.cwd !== undefined ? { cwd: stage.cwd } : {}),
    ...(stage.env ? { env: stage.env } : {}),
  }
}

const mapCondition = (condition: DefinitionCondition | undefined): StageCondition | undefined => {
  if (condition === undefined) {
    return undefined
  }

  if (condition === 'always') {
    return { kind: 'always' }
  }

  if ('runIfAllSucceeded' in condition) {
    return { kind: 'all_succeeded', stages: condition.runIfAllSucceeded }
  }

  return { kind: 'any_failed', stages: condition.runIfAnyFailed }
}
