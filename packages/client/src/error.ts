import type { Response } from "undici"

export type SurgeErrorCode =
  | `FILESYSTEM_ERROR`
  | `ARCHIVE_ERROR`
  | `HTTP_ERROR`
  | `API_ERROR`
  | `EVENT_ERROR`
  | `CONFIG_ERROR`

/**
 * Base class for every error raised by the client.
 * Branch on `code` (or `instanceof` the subclasses) for programmatic handling.
 */
export class SurgeError extends Error {
  /**
   * Structured error code for programmatic handling.
   */
  code: SurgeErrorCode

  constructor(message: string, code: SurgeErrorCode, options?: ErrorOptions) {
    super(message, options)
    this.name = `SurgeError`
    this.code = code
  }
}

/**
 * A project file or directory is missing, unreadable, or the project is empty.
 * Raised before any network traffic.
 */
export class FilesystemError extends SurgeError {
  /**
   * The path that could not be read, if known.
   */
  path?: string

  constructor(message: string, path?: string, options?: ErrorOptions) {
    super(message, `FILESYSTEM_ERROR`, options)
    this.name = `FilesystemError`
    this.path = path
  }

  /**
   * Wrap a Node.js filesystem error.
   */
  static fromCause(cause: unknown, path: string): FilesystemError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new FilesystemError(`Cannot read ${path}: ${reason}`, path, {
      cause,
    })
  }
}

/**
 * The archive could not be produced (entry too large, encoder failure).
 */
export class ArchiveError extends SurgeError {
  /**
   * Relative path of the offending entry, if known.
   */
  path?: string

  constructor(message: string, path?: string, options?: ErrorOptions) {
    super(message, `ARCHIVE_ERROR`, options)
    this.name = `ArchiveError`
    this.path = path
  }
}

/**
 * Connection, timeout or TLS failure. The remote state is unknown.
 */
export class HttpError extends SurgeError {
  url?: string

  constructor(message: string, url?: string, options?: ErrorOptions) {
    super(message, `HTTP_ERROR`, options)
    this.name = `HttpError`
    this.url = url
  }

  /**
   * Create an HttpError from whatever a fetch call rejected with.
   */
  static fromCause(cause: unknown, url: string): HttpError {
    return new HttpError(
      `Request to ${url} failed: ${describeCause(cause)}`,
      url,
      { cause }
    )
  }
}

/**
 * The server rejected the request.
 */
export class ApiError extends SurgeError {
  /**
   * HTTP status code.
   */
  status: number

  /**
   * Error messages reported by the server.
   */
  errors: Array<string>

  /**
   * The parsed JSON body, or the raw text when it was not JSON.
   */
  details?: unknown

  url?: string

  constructor(
    status: number,
    errors: Array<string>,
    details?: unknown,
    url?: string
  ) {
    super(
      `API error (status ${status})${url ? ` at ${url}` : ``}: ${errors.join(`; `)}`,
      `API_ERROR`
    )
    this.name = `ApiError`
    this.status = status
    this.errors = errors
    this.details = details
    this.url = url
  }

  /**
   * Create an ApiError from a non-success response, draining its body.
   */
  static async fromResponse(
    response: Response,
    url: string
  ): Promise<ApiError> {
    const status = response.status
    let text = ``

    if (!response.bodyUsed) {
      try {
        text = await response.text()
      } catch {
        // Body cut off; report the status alone
        text = ``
      }
    }

    const parsed = parseJson(text)
    const errors = parsed === undefined ? [] : extractErrors(parsed)

    if (errors.length === 0) {
      const fallback = text.trim() || response.statusText || `HTTP ${status}`
      errors.push(fallback)
    }

    return new ApiError(status, errors, parsed ?? text, url)
  }
}

/**
 * A single NDJSON line could not be decoded. Not fatal: the event sequence
 * continues with the next line.
 */
export class EventError extends SurgeError {
  /**
   * The offending line, without its terminator.
   */
  line: string

  constructor(message: string, line: string, options?: ErrorOptions) {
    super(message, `EVENT_ERROR`, options)
    this.name = `EventError`
    this.line = line
  }
}

/**
 * Invalid configuration, publish target or command-line input.
 */
export class ConfigError extends SurgeError {
  issues: Array<string>

  constructor(message: string, issues: Array<string> = []) {
    super(
      issues.length > 0 ? `${message}: ${issues.join(`, `)}` : message,
      `CONFIG_ERROR`
    )
    this.name = `ConfigError`
    this.issues = issues
  }
}

/**
 * Find the first SurgeError in an error's cause chain.
 * Used to recover archive failures that fetch wraps while reading the request body.
 */
export function findSurgeError(error: unknown): SurgeError | undefined {
  let current: unknown = error
  for (let depth = 0; depth < 8 && current instanceof Error; depth++) {
    if (current instanceof SurgeError) return current
    current = current.cause
  }
  return undefined
}

function describeCause(cause: unknown): string {
  if (!(cause instanceof Error)) return String(cause)
  // undici reports "fetch failed" and keeps the useful part in cause
  if (cause.cause instanceof Error && cause.cause.message) {
    return `${cause.message} (${cause.cause.message})`
  }
  return cause.message
}

function parseJson(text: string): unknown {
  if (!text.trim()) return undefined
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

function extractErrors(body: unknown): Array<string> {
  if (typeof body === `string`) {
    return body ? [body] : []
  }
  if (typeof body !== `object` || body === null || Array.isArray(body)) {
    return []
  }

  const errors = `errors` in body ? body.errors : undefined
  const message = `message` in body ? body.message : undefined
  const error = `error` in body ? body.error : undefined

  if (Array.isArray(errors)) {
    return errors.map((item) =>
      typeof item === `string` ? item : JSON.stringify(item)
    )
  }
  if (typeof errors === `string`) return [errors]
  if (typeof message === `string`) return [message]
  if (typeof error === `string`) return [error]
  return []
}
