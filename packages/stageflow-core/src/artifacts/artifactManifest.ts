import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

/**
 * Persists registered artifacts as a JSON manifest.
 *
 * @param artifacts Artifact paths keyed by stage name.
 * @param filePath Absolute manifest path.
 */
export const writeArtifactManifest = async (
  artifacts: Readonly<Record<string, readonly string[]>>,
  filePath: string
): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true })
  await writeFile(filePath, `${JSON.stringify({ artifacts }, null, 2)}\n`, 'utf8')
}
