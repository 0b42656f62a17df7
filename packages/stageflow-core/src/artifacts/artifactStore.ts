/**
 * Read-only view of registered artifacts.
 */
export interface ArtifactStoreReader {
  /**
   * Lists artifacts registered for a stage.
   *
   * @param stageName Stage name.
   * @returns Paths in registration order.
   */
  list(stageName: string): readonly string[]

  /**
   * Returns every registered artifact keyed by stage name.
   *
   * @returns Mapping in stage registration order.
   */
  all(): Readonly<Record<string, readonly string[]>>
}

/**
 * Append-only registry of artifact paths produced by stages.
 */
export class ArtifactStore implements ArtifactStoreReader {
  private readonly entries = new Map<string, string[]>()

  /**
   * Registers artifact paths for a stage. Paths already registered for the
   * stage are ignored; new paths are appended in the given order.
   *
   * @param stageName Stage name.
   * @param paths Artifact locations.
   */
  public register(stageName: string, paths: readonly string[]): void {
    const existing = this.entries.get(stageName) ?? []

    for (const path of paths) {
      if (!existing.includes(path)) {
        existing.push(path)
      }
    }

    this.entries.set(stageName, existing)
  }

  public list(stageName: string): readonly string[] {
    return [...(this.entries.get(stageName) ?? [])]
  }

  public all(): Readonly<Record<string, readonly string[]>> {
    const snapshot: Record<string, readonly string[]> = {}
    for (const [stageName, paths] of this.entries) {
      snapshot[stageName] = [...paths]
    }

    return snapshot
  }
}
