/**
 * Supported output formats for the CLI.
 */
export type CliOutputFormat = 'pretty' | 'json'

/**
 * Structured command entry of a definition file.
 */
export interface DefinitionCommand {
  /** Executable name or path. */
  readonly program: string
  /** Arguments passed without shell interpretation. */
  readonly args?: readonly string[]
  /** Working directory relative to the stage directory. */
  readonly cwd?: string
  /** Environment additions for this command. */
  readonly env?: Readonly<Record<string, string>>
}

/**
 * Run condition as written in a definition file.
 */
export type DefinitionCondition =
  | 'always'
  | { readonly runIfAllSucceeded: readonly string[] }
  | { readonly runIfAnyFailed: readonly string[] }

/**
 * User-facing stage definition.
 */
export interface DefinitionStage {
  /** Unique stage name. */
  readonly name: string
  /** Shell command strings or structured commands, run in order. */
  readonly commands: readonly (string | DefinitionCommand)[]
  /** Stages that must reach a terminal status first. */
  readonly dependsOn?: readonly string[]
  /** Failure policy, `required` when omitted. */
  readonly policy?: 'required' | 'continue-on-error'
  /** `all` runs every command, `fallback` stops at the first success. */
  readonly strategy?: 'all' | 'fallback'
  /** Optional run condition over dependency outcomes. */
  readonly condition?: DefinitionCondition
  /** Artifact path patterns relative to the stage directory. */
  readonly artifacts?: readonly string[]
  /** Whole-stage timeout in seconds. */
  readonly timeoutSeconds?: number
  /** Stage working directory relative to the pipeline directory. */
  readonly cwd?: string
  /** Environment additions for every command of the stage. */
  readonly env?: Readonly<Record<string, string>>
}

/**
 * Top-level pipeline definition model.
 */
export interface PipelineDefinition {
  /** Stage list in declaration order. */
  readonly stages: readonly DefinitionStage[]
  /** Base environment merged into all stages. */
  readonly env?: Readonly<Record<string, string>>
  /** Pipeline working directory relative to the definition file. */
  readonly cwd?: string
}
