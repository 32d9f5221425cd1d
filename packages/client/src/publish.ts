/**
 * Publish orchestration: pre-flight, archive upload and the event stream
 * that follows.
 */

import { createArchiveStream } from "./archive"
import { buildManifest } from "./collect"
import {
  ARCHIVE_CONTENT_TYPE,
  ARGV_HEADER,
  FILE_COUNT_HEADER,
  NDJSON_CONTENT_TYPE,
  PROJECT_SIZE_HEADER,
  SSL_HEADER,
  STAGE_HEADER,
  TIMESTAMP_HEADER,
  VERSION_HEADER,
} from "./constants"
import { EventError, HttpError, findSurgeError } from "./error"
import { chainAborter } from "./fetch"
import { noopLogger } from "./logger"
import { decodeEventStream } from "./ndjson"
import { resolveHeaders, validateDomain, wipDomain } from "./utils"
import type { Response } from "undici"
import type { Transport } from "./transport"
import type {
  EventResult,
  Logger,
  ProgressEvent,
  PublishOptions,
  PublishTarget,
} from "./types"

// ============================================================================
// Event Stream Response
// ============================================================================

export interface EventStreamInit {
  response: Response
  url: string
  domain: string
  isWip: boolean
  aborter: AbortController
  logger?: Logger
}

/**
 * A successful publish (or other streaming call) whose progress events are
 * still arriving.
 *
 * Iterate it for `EventResult`s, or use `events()` to get plain events and
 * fail on the first malformed line. The sequence can be consumed once.
 * Stopping early cancels the response body; the remote deployment is not
 * cancelled.
 */
export class PublishResponse implements AsyncIterable<EventResult> {
  /**
   * HTTP status of the upload response.
   */
  readonly status: number

  /**
   * Domain the archive was uploaded to (the preview domain for WIP publishes).
   */
  readonly domain: string

  readonly isWip: boolean

  readonly url: string

  readonly #response: Response
  readonly #aborter: AbortController
  readonly #logger: Logger
  #consumed = false

  constructor(init: EventStreamInit) {
    this.#response = init.response
    this.#aborter = init.aborter
    this.#logger = init.logger ?? noopLogger
    this.status = init.response.status
    this.url = init.url
    this.domain = init.domain
    this.isWip = init.isWip
  }

  [Symbol.asyncIterator](): AsyncIterator<EventResult> {
    if (this.#consumed) {
      throw new EventError(`Event stream has already been consumed`, ``)
    }
    this.#consumed = true
    return this.#decode()
  }

  /**
   * Events in arrival order. Throws the first EventError encountered.
   */
  async *events(): AsyncGenerator<ProgressEvent, void, undefined> {
    for await (const result of this) {
      if (!result.ok) throw result.error
      yield result.event
    }
  }

  /**
   * Drain the stream into an array.
   */
  async collect(): Promise<Array<ProgressEvent>> {
    const events: Array<ProgressEvent> = []
    for await (const event of this.events()) {
      events.push(event)
    }
    return events
  }

  /**
   * Stop reading events and release the connection.
   */
  cancel(reason?: unknown): void {
    if (this.#aborter.signal.aborted) return
    this.#logger.debug(`Cancelling event stream from ${this.url}`)
    this.#aborter.abort(reason ?? new HttpError(`Event stream cancelled`, this.url))
  }

  async *#decode(): AsyncGenerator<EventResult, void, undefined> {
    const body = this.#response.body
    if (!body) return

    const signal = this.#aborter.signal
    try {
      for await (const result of decodeEventStream(body, {
        logger: this.#logger,
        signal,
      })) {
        if (!result.ok) {
          this.#logger.warn(result.error.message)
        }
        yield result
      }
    } catch (err) {
      if (signal.aborted) return
      throw findSurgeError(err) ?? HttpError.fromCause(err, this.url)
    }
  }
}

// ============================================================================
// Publish
// ============================================================================

/**
 * The argv header payload: the invoking command line as the server expects it.
 */
export function buildArgv(
  endpoint: string,
  isWip: boolean,
  args: ReadonlyArray<string> = [],
  force = false
): Record<string, unknown> {
  const argv: Record<string, unknown> = {
    _: [...args],
    e: endpoint,
    endpoint,
    s: isWip,
    stage: isWip,
  }
  if (force) argv.force = true
  return argv
}

/**
 * Upload a project directory and return its event stream.
 *
 * Filesystem and archive problems are reported before any request is sent.
 *
 * @throws {ConfigError} if the domain is not a valid hostname
 * @throws {FilesystemError} if the project cannot be read or is empty
 * @throws {ArchiveError} if a file cannot be archived
 * @throws {HttpError} if the request fails before a response arrives
 * @throws {ApiError} if the server rejects the upload
 */
export async function publishProject(
  transport: Transport,
  root: string,
  target: PublishTarget,
  options: PublishOptions = {},
  logger: Logger = noopLogger
): Promise<PublishResponse> {
  const domain = validateDomain(target.domain)
  const isWip = target.isWip ?? false
  const uploadDomain = isWip ? wipDomain(domain) : domain

  const manifest = await buildManifest(root, { ignore: options.ignore, logger })
  logger.info(
    `Publishing ${manifest.fileCount} files (${manifest.projectSize} bytes) to ${uploadDomain}${isWip ? ` (preview)` : ``}`
  )

  const headers: Record<string, string> = {
    [VERSION_HEADER]: transport.config.version,
    [TIMESTAMP_HEADER]: new Date().toISOString(),
    [STAGE_HEADER]: String(isWip),
    [SSL_HEADER]: `null`,
    [ARGV_HEADER]: JSON.stringify(
      buildArgv(transport.config.endpoint, isWip, options.argv, target.force)
    ),
    [FILE_COUNT_HEADER]: String(manifest.fileCount),
    [PROJECT_SIZE_HEADER]: String(manifest.projectSize),
    ...(await resolveHeaders(options.headers)),
  }

  const aborter = new AbortController()
  const { signal } = chainAborter(aborter, options.signal)

  const response = await transport.request(`PUT`, uploadDomain, {
    auth: target.auth,
    headers,
    body: createArchiveStream(manifest, { logger }),
    contentType: ARCHIVE_CONTENT_TYPE,
    accept: NDJSON_CONTENT_TYPE,
    signal,
  })

  return new PublishResponse({
    response,
    url: transport.url(uploadDomain),
    domain: uploadDomain,
    isWip,
    aborter,
    logger,
  })
}
