import type { CommandSpec } from '../contracts/command.js'

const ARTIFACT_TEMPLATE_PATTERN = /\$\{artifacts:([^}]+)\}/gu
const WHOLE_ARTIFACT_TEMPLATE_PATTERN = /^\$\{artifacts:([^}]+)\}$/u

/**
 * Looks up registered artifact paths for a stage.
 */
export type ArtifactLookup = (stageName: string) => readonly string[]

/**
 * Collects stage names referenced through `${artifacts:<stage>}` templates.
 *
 * @param command Command specification.
 * @returns Referenced stage names in first-seen order.
 */
export const collectArtifactReferences = (command: CommandSpec): readonly string[] => {
  const values = [
    command.program,
    ...(command.args ?? []),
    ...(command.cwd ? [command.cwd] : []),
    ...Object.values(command.env ?? {}),
  ]

  const references: string[] = []
  for (const value of values) {
    for (const match of value.matchAll(ARTIFACT_TEMPLATE_PATTERN)) {
      const stageName = match[1]?.trim()
      if (stageName && !references.includes(stageName)) {
        references.push(stageName)
      }
    }
  }

  return references
}

/**
 * Expands artifact templates inside a command specification.
 *
 * An argument consisting of a single template expands to one argument per
 * artifact path. Templates embedded in a larger value, in the program, in
 * `cwd` or in environment values join the paths with single spaces. For
 * shell commands the paths in the program and arguments are shell-quoted.
 *
 * @param command Command specification.
 * @param lookup Artifact lookup.
 * @returns Command specification without templates.
 */
export const expandCommandTemplates = (command: CommandSpec, lookup: ArtifactLookup): CommandSpec => {
  const pathsFor = (stageName: string, shellEvaluated: boolean): string[] => {
    const paths = lookup(stageName.trim())
    return shellEvaluated ? paths.map(quoteArgument) : [...paths]
  }

  const expandValue = (value: string, shellEvaluated = false): string => {
    return value.replace(ARTIFACT_TEMPLATE_PATTERN, (_, stageName: string) => {
      return pathsFor(stageName, shellEvaluated).join(' ')
    })
  }

  const shell = command.shell ?? false
  const args = command.args?.flatMap((argument) => {
    const wholeMatch = argument.match(WHOLE_ARTIFACT_TEMPLATE_PATTERN)
    if (wholeMatch?.[1]) {
      return pathsFor(wholeMatch[1], shell)
    }

    return [expandValue(argument, shell)]
  })

  const env = command.env
    ? Object.fromEntries(
        Object.entries(command.env).map(([key, value]) => [key, expandValue(value)])
      )
    : undefined

  return {
    ...command,
    program: expandValue(command.program, shell),
    ...(args ? { args } : {}),
    ...(command.cwd ? { cwd: expandValue(command.cwd) } : {}),
    ...(env ? { env } : {}),
  }
}

/**
 * Renders a command specification for logs and reports.
 *
 * @param command Command specification.
 * @returns Single-line display form.
 */
export const formatCommand = (command: CommandSpec): string => {
  if (command.shell) {
    return command.program
  }

  return [command.program, ...(command.args ?? []).map(quoteArgument)].join(' ')
}

const quoteArgument = (argument: string): string => {
  if (argument.length > 0 && /^[\w@%+=:,./-]+$/u.test(argument)) {
    return argument
  }

  return `'${argument.replaceAll("'", "'\\''")}'`
}
