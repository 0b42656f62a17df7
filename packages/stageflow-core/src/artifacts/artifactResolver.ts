import { readdir, stat } from 'node:fs/promises'
import { resolve } from 'node:path'

import type { ArtifactMatch } from '../contracts/run.js'

import { compileArtifactPattern, normalizeArtifactPath } from './pathPattern.js'

const SKIPPED_SEGMENTS = ['node_modules', '.git']

/**
 * Resolves declared artifact patterns against the file system.
 *
 * Literal patterns match when the path exists. Wildcard patterns walk the
 * directory in front of the first wildcard segment. `node_modules` and
 * `.git` are only walked when the pattern names them. A pattern whose lookup
 * fails yields no paths and carries the error message.
 *
 * @param cwd Stage working directory.
 * @param patterns Declared patterns.
 * @returns One match entry per pattern, paths absolute and sorted.
 */
export const resolveDeclaredArtifacts = async (
  cwd: string,
  patterns: readonly string[]
): Promise<ArtifactMatch[]> => {
  const matches: ArtifactMatch[] = []

  for (const pattern of patterns) {
    try {
      matches.push({ pattern, paths: await resolvePattern(cwd, pattern) })
    } catch (error: unknown) {
      matches.push({
        pattern,
        paths: [],
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  return matches
}

const resolvePattern = async (cwd: string, pattern: string): Promise<string[]> => {
  const compiled = compileArtifactPattern(pattern)

  if (!compiled.hasWildcard) {
    const absolutePath = resolve(cwd, compiled.source)
    return (await pathExists(absolutePath)) ? [absolutePath] : []
  }

  const baseDirectory = resolve(cwd, compiled.baseDirectory)
  const entries = await listEntries(baseDirectory)
  const skippedSegments = SKIPPED_SEGMENTS.filter((segment) => !compiled.source.includes(segment))

  return entries
    .map(normalizeArtifactPath)
    .filter((entry) => !entry.split('/').some((segment) => skippedSegments.includes(segment)))
    .map((entry) => (compiled.baseDirectory ? `${compiled.baseDirectory}/${entry}` : entry))
    .filter((relativePath) => compiled.matches(relativePath))
    .map((relativePath) => resolve(cwd, relativePath))
    .sort()
}

const pathExists = async (absolutePath: string): Promise<boolean> => {
  try {
    await stat(absolutePath)
    return true
  } catch (error: unknown) {
    if (isMissingPathError(error)) {
      return false
    }

    throw error
  }
}

const listEntries = async (directory: string): Promise<string[]> => {
  try {
    return await readdir(directory, { recursive: true })
  } catch (error: unknown) {
    if (isMissingPathError(error)) {
      return []
    }

    throw error
  }
}

const isMissingPathError = (error: unknown): boolean => {
  return (
    error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}
