export interface ParsedPublishArgs {
  dir: string
  domain?: string
  wip: boolean
  force: boolean
  ignore: Array<string>
}

/**
 * Extract a flag value from args, supporting both --flag=value and --flag value syntax.
 * Returns { value, consumed } where consumed is the number of args used (0 if no match).
 */
function extractFlagValue(
  args: Array<string>,
  index: number,
  flagName: string
): { value: string | null; consumed: number } {
  const arg = args[index]!
  const prefix = `${flagName}=`

  if (arg.startsWith(prefix)) {
    const value = arg.slice(prefix.length)
    if (!value) {
      throw new Error(`${flagName} requires a value`)
    }
    return { value, consumed: 1 }
  }

  if (arg === flagName) {
    const value = args[index + 1]
    if (!value || value.startsWith(`--`)) {
      throw new Error(`${flagName} requires a value`)
    }
    return { value, consumed: 2 }
  }

  return { value: null, consumed: 0 }
}

/**
 * Parse publish command arguments: the project directory, an optional
 * domain, and the publish flags.
 * @param args - Arguments after the command name
 * @throws Error if the directory is missing, a flag is unknown or an extra argument is given
 */
export function parsePublishArgs(args: Array<string>): ParsedPublishArgs {
  let wip = false
  let force = false
  const ignore: Array<string> = []
  const positionals: Array<string> = []

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!

    if (arg === `--wip`) {
      wip = true
      continue
    }

    if (arg === `--force`) {
      force = true
      continue
    }

    const ignoreResult = extractFlagValue(args, i, `--ignore`)
    if (ignoreResult.value !== null) {
      ignore.push(ignoreResult.value)
      i += ignoreResult.consumed - 1
      continue
    }

    if (arg.startsWith(`--`)) {
      throw new Error(`unknown flag: ${arg}`)
    }

    positionals.push(arg)
  }

  const [dir, domain, ...extra] = positionals
  if (!dir) {
    throw new Error(`missing project directory\n  Usage: surgekit publish <dir> [domain]`)
  }
  if (extra.length > 0) {
    throw new Error(`unexpected argument: ${extra[0]}`)
  }

  return { dir, domain, wip, force, ignore }
}
