import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, extname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import { load as parseYaml } from 'js-yaml'
import ts from 'typescript'

import type {
  DefinitionCommand,
  DefinitionCondition,
  DefinitionStage,
  PipelineDefinition,
} from './types.js'

const DEFINITION_FILE_NAMES = ['pipeline.ts', 'pipeline.yaml', 'pipeline.yml', 'pipeline.json']

/**
 * Loaded definition with the file it came from.
 */
export interface LoadedDefinition {
  readonly definition: PipelineDefinition
  readonly definitionFilePath: string
}

/**
 * Loads and validates a pipeline definition file.
 *
 * @param cwd Base working directory.
 * @param definitionPath Optional explicit definition path.
 * @returns Parsed definition with its absolute path.
 * @throws Error when no definition is found or it is invalid.
 */
export const loadPipelineDefinition = async (
  cwd: string,
  definitionPath?: string
): Promise<LoadedDefinition> => {
  const definitionFilePath = await resolveDefinitionPath(cwd, definitionPath)
  if (!definitionFilePath) {
    throw new Error(`No pipeline definition found. Expected ${DEFINITION_FILE_NAMES.join(', ')}`)
  }

  const loaded = await loadDefinitionByExtension(definitionFilePath)

  return {
    definition: parsePipelineDefinition(loaded),
    definitionFilePath,
  }
}

const resolveDefinitionPath = async (cwd: string, definitionPath?: string): Promise<string | null> => {
  if (definitionPath) {
    return resolve(cwd, definitionPath)
  }

  for (const fileName of DEFINITION_FILE_NAMES) {
    const candidate = resolve(cwd, fileName)
    if (await isFile(candidate)) {
      return candidate
    }
  }

  return null
}

const isFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await stat(filePath)).isFile()
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false
    }

    throw error
  }
}

const loadDefinitionByExtension = async (definitionFilePath: string): Promise<unknown> => {
  const extension = extname(definitionFilePath)

  if (extension === '.json') {
    const content = await readFile(definitionFilePath, 'utf8')
    return parseWithLocation(definitionFilePath, () => JSON.parse(content))
  }

  if (extension === '.yaml' || extension === '.yml') {
    const content = await readFile(definitionFilePath, 'utf8')
    return parseWithLocation(definitionFilePath, () => parseYaml(content))
  }

  if (extension === '.ts' || extension === '.mts') {
    return await loadTypeScriptDefinition(definitionFilePath)
  }

  throw new Error(`Unsupported definition extension: ${definitionFilePath}`)
}

const parseWithLocation = (definitionFilePath: string, parse: () => unknown): unknown => {
  try {
    return parse()
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to parse ${definitionFilePath}: ${message}`)
  }
}

const loadTypeScriptDefinition = async (definitionFilePath: string): Promise<unknown> => {
  const source = await readFile(definitionFilePath, 'utf8')
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: definitionFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnostics(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(definitionFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new Error(`Failed to transpile ${definitionFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'stageflow-definition-'))
  const tempFilePath = resolve(tempDirectory, 'pipeline.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule: unknown = await import(moduleUrl)

    if (isRecord(loadedModule) && loadedModule.default !== undefined) {
      return unwrapNestedDefault(loadedModule.default)
    }

    if (isRecord(loadedModule) && loadedModule.pipeline !== undefined) {
      return loadedModule.pipeline
    }

    throw new Error(`Definition module ${definitionFilePath} must export default or named "pipeline"`)
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

const unwrapNestedDefault = (value: unknown): unknown => {
  if (isRecord(value) && 'default' in value) {
    return value.default
  }

  return value
}

/**
 * Validates an untyped value as a pipeline definition.
 *
 * Only the shape is checked here. Graph rules such as unknown dependencies
 * and cycles are left to the engine.
 *
 * @param value Parsed file content.
 * @returns Typed definition.
 * @throws Error naming the offending path.
 */
export const parsePipelineDefinition = (value: unknown): PipelineDefinition => {
  if (!isRecord(value)) {
    throw new Error('Definition must be an object')
  }

  const stagesValue = value.stages
  if (!Array.isArray(stagesValue)) {
    throw new Error('Definition must provide a stages array')
  }

  const stages = stagesValue.map(parseStage)
  const env = parseOptionalStringRecord(value.env, 'env')
  const cwd = parseOptionalString(value.cwd, 'cwd')

  return {
    stages,
    ...(env ? { env } : {}),
    ...(cwd !== undefined ? { cwd } : {}),
  }
}

const parseStage = (value: unknown, index: number): DefinitionStage => {
  const path = `stages[${index}]`
  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const name = parseRequiredString(value.name, `${path}.name`)
  const commands = parseCommands(value.commands, `${path}.commands`)
  const dependsOn = parseOptionalStringArray(value.dependsOn, `${path}.dependsOn`)
  const policy = parseOptionalEnum(value.policy, `${path}.policy`, ['required', 'continue-on-error'])
  const strategy = parseOptionalEnum(value.strategy, `${path}.strategy`, ['all', 'fallback'])
  const condition = parseOptionalCondition(value.condition, `${path}.condition`)
  const artifacts = parseOptionalStringArray(value.artifacts, `${path}.artifacts`)
  const timeoutSeconds = parseOptionalPositiveNumber(value.timeoutSeconds, `${path}.timeoutSeconds`)
  const cwd = parseOptionalString(value.cwd, `${path}.cwd`)
  const env = parseOptionalStringRecord(value.env, `${path}.env`)

  return {
    name,
    commands,
    ...(dependsOn ? { dependsOn } : {}),
    ...(policy ? { policy } : {}),
    ...(strategy ? { strategy } : {}),
    ...(condition ? { condition } : {}),
    ...(artifacts ? { artifacts } : {}),
    ...(timeoutSeconds !== undefined ? { timeoutSeconds } : {}),
    ...(cwd !== undefined ? { cwd } : {}),
    ...(env ? { env } : {}),
  }
}

const parseCommands = (value: unknown, path: string): readonly (string | DefinitionCommand)[] => {
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`${path} must be a non-empty array`)
  }

  return value.map((entry: unknown, index): string | DefinitionCommand => {
    const entryPath = `${path}[${index}]`
    if (typeof entry === 'string') {
      return parseRequiredString(entry, entryPath)
    }

    if (!isRecord(entry)) {
      throw new Error(`${entryPath} must be a string or an object`)
    }

    const program = parseRequiredString(entry.program, `${entryPath}.program`)
    const args = parseOptionalArgumentArray(entry.args, `${entryPath}.args`)
    const cwd = parseOptionalString(entry.cwd, `${entryPath}.cwd`)
    const env = parseOptionalStringRecord(entry.env, `${entryPath}.env`)

    return {
      program,
      ...(args ? { args } : {}),
      ...(cwd !== undefined ? { cwd } : {}),
      ...(env ? { env } : {}),
    }
  })
}

const parseOptionalCondition = (value: unknown, path: string): DefinitionCondition | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (value === 'always') {
    return value
  }

  if (!isRecord(value)) {
    throw new Error(`${path} must be "always" or an object`)
  }

  const keys = Object.keys(value)
  if (keys.length !== 1) {
    throw new Error(`${path} must have exactly one of runIfAllSucceeded, runIfAnyFailed`)
  }

  if (value.runIfAllSucceeded !== undefined) {
    return {
      runIfAllSucceeded: parseRequiredStringArray(
        value.runIfAllSucceeded,
        `${path}.runIfAllSucceeded`
      ),
    }
  }

  if (value.runIfAnyFailed !== undefined) {
    return {
      runIfAnyFailed: parseRequiredStringArray(value.runIfAnyFailed, `${path}.runIfAnyFailed`),
    }
  }

  throw new Error(`${path}.${keys[0] ?? ''} is not a supported condition`)
}

const parseOptionalEnum = <T extends string>(
  value: unknown,
  path: string,
  allowed: readonly T[]
): T | undefined => {
  if (value === undefined) {
    return undefined
  }

  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) {
    throw new Error(`${path} must be ${allowed.map((entry) => `"${entry}"`).join(' or ')}`)
  }

  return match
}

const parseRequiredString = (value: unknown, path: string): string => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new Error(`${path} must be a non-empty string`)
  }

  return value
}

const parseOptionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new Error(`${path} must be a string`)
  }

  return value
}

const parseOptionalPositiveNumber = (value: unknown, path: string): number | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new Error(`${path} must be a positive number`)
  }

  return value
}

const parseRequiredStringArray = (value: unknown, path: string): readonly string[] => {
  const parsed = parseOptionalStringArray(value, path)
  if (!parsed || parsed.length === 0) {
    throw new Error(`${path} must be a non-empty array`)
  }

  return parsed
}

const parseOptionalStringArray = (value: unknown, path: string): readonly string[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`)
  }

  const result: string[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new Error(`${path}[${index}] must be a non-empty string`)
    }
    result.push(entry)
  }

  return result
}

const parseOptionalArgumentArray = (value: unknown, path: string): readonly string[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`)
  }

  const result: string[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry === 'number' || typeof entry === 'boolean') {
      result.push(String(entry))
      continue
    }
    if (typeof entry !== 'string') {
      throw new Error(`${path}[${index}] must be a string`)
    }
    result.push(entry)
  }

  return result
}

const parseOptionalStringRecord = (
  value: unknown,
  path: string
): Readonly<Record<string, string>> | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const parsed: Record<string, string> = {}
  for (const [key, entryValue] of Object.entries(value)) {
    if (typeof entryValue === 'number' || typeof entryValue === 'boolean') {
      parsed[key] = String(entryValue)
      continue
    }
    if (typeof entryValue !== 'string') {
      throw new Error(`${path}.${key} must be a string`)
    }
    parsed[key] = entryValue
  }

  return parsed
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
