/**
 * Normalizes a file path to forward slashes for cross-platform matching.
 *
 * @param filePath Raw file path.
 * @returns Normalized path.
 */
export const normalizeArtifactPath = (filePath: string): string => {
  return filePath.replaceAll('\\', '/')
}

/**
 * Compiled form of a declared artifact pattern.
 */
export interface ArtifactPathPattern {
  /** Pattern as declared, normalized. */
  readonly source: string
  /** True when the pattern contains `*` or `?`. */
  readonly hasWildcard: boolean
  /** Leading directory without wildcards, empty for the stage directory itself. */
  readonly baseDirectory: string
  /** Tests a path relative to the stage directory. */
  readonly matches: (relativePath: string) => boolean
}

/**
 * Compiles an artifact pattern.
 *
 * Supports `*` (any characters except `/`), `?` (one character except `/`)
 * and a `**` segment (any number of directories).
 *
 * @param pattern Declared pattern.
 * @returns Compiled pattern.
 */
export const compileArtifactPattern = (pattern: string): ArtifactPathPattern => {
  const segments = normalizeArtifactPath(pattern.trim()).split('/')
  while (segments.length > 1 && segments[0] === '.') {
    segments.shift()
  }

  const source = segments.join('/')
  const firstWildcard = segments.findIndex((segment) => /[*?]/u.test(segment))

  if (firstWildcard === -1) {
    return {
      source,
      hasWildcard: false,
      baseDirectory: source,
      matches: (relativePath: string): boolean => normalizeArtifactPath(relativePath) === source,
    }
  }

  const lastIndex = segments.length - 1
  const expression = segments
    .map((segment, index) => {
      if (segment === '**') {
        return index === lastIndex ? '.*' : '(?:[^/]+/)*'
      }

      return `${segmentExpression(segment)}${index === lastIndex ? '' : '/'}`
    })
    .join('')
  const pathRegex = new RegExp(`^${expression}$`, 'u')

  return {
    source,
    hasWildcard: true,
    baseDirectory: segments.slice(0, firstWildcard).join('/'),
    matches: (relativePath: string): boolean => pathRegex.test(normalizeArtifactPath(relativePath)),
  }
}

const segmentExpression = (segment: string): string => {
  return Array.from(segment, (character) => {
    if (character === '*') {
      return '[^/]*'
    }

    if (character === '?') {
      return '[^/]'
    }

    return /[\\^$.+()[\]{}|]/u.test(character) ? `\\${character}` : character
  }).join('')
}
