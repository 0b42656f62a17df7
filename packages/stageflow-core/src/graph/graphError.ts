/**
 * Classification of a pipeline graph construction failure.
 */
export type PipelineGraphErrorKind = 'CycleDetected' | 'DuplicateStageName' | 'UnknownDependency'

/**
 * Fatal pipeline definition error raised before any stage executes.
 */
export class PipelineGraphError extends Error {
  /** Failure classification. */
  public readonly kind: PipelineGraphErrorKind
  /** Stage names involved, in diagnostic order. */
  public readonly stages: readonly string[]

  /**
   * Creates a graph error.
   *
   * @param kind Failure classification.
   * @param message Diagnostic message.
   * @param stages Stage names involved.
   */
  public constructor(kind: PipelineGraphErrorKind, message: string, stages: readonly string[]) {
    super(message)
    this.name = 'PipelineGraphError'
    this.kind = kind
    this.stages = stages
  }
}
