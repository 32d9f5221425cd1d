#!/usr/bin/env node

import { STATUS_CODES } from "node:http"
import { resolve as resolvePath } from "node:path"
import { stderr, stdout } from "node:process"
import { fileURLToPath } from "node:url"
import {
  ApiError,
  SURGE_API,
  SurgeClient,
  basicAuth,
  createConsoleLogger,
  formatEvent,
  generateDomain,
  normalizeBaseUrl,
  tokenAuth,
} from "@surgekit/client"
import { parsePublishArgs } from "./parsePublishArgs.js"
import {
  validateDomainArg,
  validateEmail,
  validateToken,
  validateUrl,
} from "./validation.js"
import type { Auth, FetchClient, Logger } from "@surgekit/client"
import type { ParsedPublishArgs } from "./parsePublishArgs.js"

export type { ParsedPublishArgs }
export type { GlobalOptions, Env, CliIO, RunOptions }
export { parsePublishArgs }
export { parseGlobalOptions, formatErrorMessage, getUsageText, runCli }
export { validateUrl, validateToken, validateDomainArg, validateEmail }

type Env = Record<string, string | undefined>

interface GlobalOptions {
  endpoint: string
  token?: string
  login?: string
  debug: boolean
  insecure: boolean
}

interface CliIO {
  stdout: { write: (chunk: string) => unknown }
  stderr: { write: (chunk: string) => unknown }
}

interface RunOptions {
  env?: Env
  io?: CliIO

  /**
   * Custom fetch implementation (for testing).
   */
  fetch?: FetchClient

  logger?: Logger
}

/**
 * Parse global options (--endpoint, --token, --debug, --insecure) from args.
 * Falls back to SURGE_ENDPOINT/SURGE_TOKEN/SURGE_LOGIN when flags are not provided.
 * Returns the parsed options, remaining args, and any warnings.
 */
function parseGlobalOptions(
  args: Array<string>,
  env: Env = process.env
): {
  options: GlobalOptions
  remainingArgs: Array<string>
  warnings: Array<string>
} {
  let endpoint: string | undefined
  let token: string | undefined
  let debug = false
  let insecure = false
  const remainingArgs: Array<string> = []
  const warnings: Array<string> = []

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]!

    if (arg === `--endpoint`) {
      const value = args[i + 1]
      if (value === undefined || value.startsWith(`--`)) {
        throw new Error(
          `--endpoint requires a value\n  Example: --endpoint "https://surge.surge.sh"`
        )
      }
      const urlValidation = validateUrl(value)
      if (!urlValidation.valid) {
        throw new Error(urlValidation.error)
      }
      endpoint = normalizeBaseUrl(value)
      i++
    } else if (arg === `--token`) {
      const value = args[i + 1]
      if (value === undefined || value.startsWith(`--`)) {
        throw new Error(`--token requires a value`)
      }
      const tokenValidation = validateToken(value)
      if (!tokenValidation.valid) {
        throw new Error(tokenValidation.error)
      }
      if (tokenValidation.warning) {
        warnings.push(tokenValidation.warning)
      }
      token = value
      i++
    } else if (arg === `--debug`) {
      debug = true
    } else if (arg === `--insecure`) {
      insecure = true
    } else {
      remainingArgs.push(arg)
    }
  }

  if (!endpoint) {
    const fromEnv = env.SURGE_ENDPOINT || SURGE_API
    const urlValidation = validateUrl(fromEnv)
    if (!urlValidation.valid) {
      throw new Error(
        `Invalid SURGE_ENDPOINT environment variable: ${urlValidation.error}`
      )
    }
    endpoint = normalizeBaseUrl(fromEnv)
  }

  if (!token && env.SURGE_TOKEN) {
    const tokenValidation = validateToken(env.SURGE_TOKEN)
    if (!tokenValidation.valid) {
      throw new Error(
        `Invalid SURGE_TOKEN environment variable: ${tokenValidation.error}`
      )
    }
    if (tokenValidation.warning) {
      warnings.push(tokenValidation.warning)
    }
    token = env.SURGE_TOKEN
  }

  return {
    options: {
      endpoint,
      token,
      login: env.SURGE_LOGIN || undefined,
      debug,
      insecure,
    },
    remainingArgs,
    warnings,
  }
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Format client errors for the terminal. API rejections show the status
 * text and every server message.
 */
function formatErrorMessage(error: unknown): string {
  if (error instanceof ApiError) {
    const statusText = STATUS_CODES[error.status] ?? `HTTP Error`
    return `${statusText} (${error.status}): ${error.errors.join(`; `)}`
  }
  return getErrorMessage(error)
}

function getUsageText(): string {
  return `
Usage:
  surgekit publish <dir> [domain]         Publish a directory (a random domain if omitted)
  surgekit login <email> <password>       Exchange credentials for an API token
  surgekit list [domain]                  List projects, or the revisions of one domain
  surgekit teardown <domain>              Remove a domain and its content
  surgekit whoami                         Show the account for the current token

Global Options:
  --endpoint <url>        Publish API URL (overrides SURGE_ENDPOINT env var)
  --token <token>         API token (overrides SURGE_TOKEN env var)
  --debug                 Log every request
  --insecure              Skip TLS certificate validation
  --help, -h              Show this help message

Publish Options:
  --wip                   Publish to a throwaway preview domain
  --force                 Skip server-side confirmation
  --ignore <pattern>      Extra ignore pattern (repeatable)

Environment Variables:
  SURGE_ENDPOINT  Publish API URL (default: ${SURGE_API})
  SURGE_TOKEN     API token (overridden by --token flag)
  SURGE_LOGIN     Default email for login
`
}

interface CommandContext {
  client: SurgeClient
  options: GlobalOptions
  io: CliIO
  args: Array<string>
}

function requireAuth(ctx: CommandContext): Auth | undefined {
  if (ctx.options.token) return tokenAuth(ctx.options.token)
  ctx.io.stderr.write(`Error: Not logged in\n`)
  ctx.io.stderr.write(
    `  Run "surgekit login <email> <password>" and set SURGE_TOKEN, or pass --token\n`
  )
  return undefined
}

async function publishCommand(ctx: CommandContext): Promise<number> {
  const { client, io } = ctx

  let parsed: ParsedPublishArgs
  try {
    parsed = parsePublishArgs(ctx.args)
  } catch (error) {
    io.stderr.write(`Error: ${getErrorMessage(error)}\n`)
    return 1
  }

  const domain = parsed.domain ?? generateDomain()
  const validation = validateDomainArg(domain)
  if (!validation.valid) {
    io.stderr.write(`Error: ${validation.error}\n`)
    return 1
  }

  const auth = requireAuth(ctx)
  if (!auth) return 1

  try {
    const target = { domain, auth, force: parsed.force }
    const publishOptions = {
      argv: [parsed.dir, domain],
      ignore: parsed.ignore,
    }
    const response = parsed.wip
      ? await client.publishWip(parsed.dir, target, publishOptions)
      : await client.publish(parsed.dir, target, publishOptions)

    let failed = false
    for await (const event of response.events()) {
      io.stdout.write(`${formatEvent(event)}\n`)
      if (event.kind === `error`) failed = true
    }

    if (failed) {
      io.stderr.write(`Publish to "${response.domain}" failed\n`)
      return 1
    }
    io.stdout.write(`Published to https://${response.domain}\n`)
    return 0
  } catch (error) {
    io.stderr.write(`Failed to publish "${parsed.dir}" to "${domain}"\n`)
    io.stderr.write(`  ${formatErrorMessage(error)}\n`)
    return 1
  }
}

async function loginCommand(ctx: CommandContext): Promise<number> {
  const { client, io, args } = ctx
  const [first, second] = args
  const email = second === undefined ? ctx.options.login : first
  const password = second === undefined ? first : second

  if (!email || !password) {
    io.stderr.write(`Error: Missing email or password\n`)
    io.stderr.write(`  Usage: surgekit login <email> <password>\n`)
    return 1
  }
  const validation = validateEmail(email)
  if (!validation.valid) {
    io.stderr.write(`Error: ${validation.error}\n`)
    return 1
  }

  try {
    const result = await client.login(basicAuth(email, password))
    io.stdout.write(`Logged in as ${result.email}\n`)
    io.stdout.write(`  export SURGE_LOGIN=${result.email}\n`)
    io.stdout.write(`  export SURGE_TOKEN=${result.token}\n`)
    return 0
  } catch (error) {
    io.stderr.write(`Failed to log in as "${email}"\n`)
    io.stderr.write(`  ${formatErrorMessage(error)}\n`)
    return 1
  }
}

async function listCommand(ctx: CommandContext): Promise<number> {
  const { client, io } = ctx
  const domain = ctx.args[0]
  if (domain !== undefined) {
    const validation = validateDomainArg(domain)
    if (!validation.valid) {
      io.stderr.write(`Error: ${validation.error}\n`)
      return 1
    }
  }

  const auth = requireAuth(ctx)
  if (!auth) return 1

  try {
    const entries = await client.list(auth, domain)
    if (entries.length === 0) {
      io.stdout.write(domain ? `No revisions for "${domain}"\n` : `No projects\n`)
      return 0
    }
    for (const entry of entries) {
      const rev = entry.rev === undefined ? `` : `  rev ${entry.rev}`
      const age = entry.timeAgoInWords ? `  (${entry.timeAgoInWords})` : ``
      io.stdout.write(`${entry.domain}${rev}${age}\n`)
    }
    return 0
  } catch (error) {
    io.stderr.write(`Failed to list ${domain ? `"${domain}"` : `projects`}\n`)
    io.stderr.write(`  ${formatErrorMessage(error)}\n`)
    return 1
  }
}

async function teardownCommand(ctx: CommandContext): Promise<number> {
  const { client, io } = ctx
  const domain = ctx.args[0]
  if (domain === undefined) {
    io.stderr.write(`Error: Missing domain\n`)
    io.stderr.write(`  Usage: surgekit teardown <domain>\n`)
    return 1
  }
  const validation = validateDomainArg(domain)
  if (!validation.valid) {
    io.stderr.write(`Error: ${validation.error}\n`)
    return 1
  }

  const auth = requireAuth(ctx)
  if (!auth) return 1

  try {
    await client.teardown(domain, auth)
    io.stdout.write(`Domain torn down: "${domain}"\n`)
    return 0
  } catch (error) {
    io.stderr.write(`Failed to tear down "${domain}"\n`)
    io.stderr.write(`  ${formatErrorMessage(error)}\n`)
    return 1
  }
}

async function whoamiCommand(ctx: CommandContext): Promise<number> {
  const auth = requireAuth(ctx)
  if (!auth) return 1

  try {
    const account = await ctx.client.account(auth)
    ctx.io.stdout.write(`${account.email}\n`)
    return 0
  } catch (error) {
    ctx.io.stderr.write(`Failed to read account\n`)
    ctx.io.stderr.write(`  ${formatErrorMessage(error)}\n`)
    return 1
  }
}

const COMMANDS = new Map<string, (ctx: CommandContext) => Promise<number>>([
  [`publish`, publishCommand],
  [`login`, loginCommand],
  [`list`, listCommand],
  [`teardown`, teardownCommand],
  [`whoami`, whoamiCommand],
])

/**
 * Run the CLI with the given arguments and resolve to its exit code.
 */
async function runCli(
  rawArgs: Array<string>,
  runOptions: RunOptions = {}
): Promise<number> {
  const io = runOptions.io ?? { stdout, stderr }

  // Handle --help / -h early, before other parsing
  if (rawArgs.includes(`--help`) || rawArgs.includes(`-h`)) {
    io.stdout.write(getUsageText())
    return 0
  }

  let options: GlobalOptions
  let args: Array<string>
  let warnings: Array<string>

  try {
    const parsed = parseGlobalOptions(rawArgs, runOptions.env)
    options = parsed.options
    args = parsed.remainingArgs
    warnings = parsed.warnings
  } catch (error) {
    io.stderr.write(`Error: ${getErrorMessage(error)}\n`)
    return 1
  }

  for (const warning of warnings) {
    io.stderr.write(`${warning}\n`)
  }

  const [command, ...commandArgs] = args
  if (command === undefined) {
    io.stderr.write(`Error: No command specified\n`)
    io.stderr.write(getUsageText())
    return 1
  }

  const handler = COMMANDS.get(command)
  if (!handler) {
    if (command.startsWith(`-`)) {
      io.stderr.write(`Error: Unknown option "${command}"\n`)
    } else {
      io.stderr.write(`Error: Unknown command "${command}"\n`)
      io.stderr.write(
        `  Available commands: ${[...COMMANDS.keys()].join(`, `)}\n`
      )
    }
    io.stderr.write(`  Run "surgekit --help" for usage information\n`)
    return 1
  }

  let client: SurgeClient
  try {
    client = new SurgeClient({
      endpoint: options.endpoint,
      insecure: options.insecure,
      fetch: runOptions.fetch,
      logger: runOptions.logger ?? createConsoleLogger({ debug: options.debug }),
    })
  } catch (error) {
    io.stderr.write(`Error: ${getErrorMessage(error)}\n`)
    return 1
  }

  try {
    return await handler({ client, options, io, args: commandArgs })
  } finally {
    await client.close()
  }
}

// Only run when executed directly, not when imported as a module
function isMainModule(): boolean {
  if (!process.argv[1]) return false
  const scriptPath = resolvePath(process.argv[1])
  const modulePath = fileURLToPath(import.meta.url)
  return scriptPath === modulePath
}

if (isMainModule()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      stderr.write(`Fatal error: ${getErrorMessage(error)}\n`)
      process.exitCode = 1
    })
}
