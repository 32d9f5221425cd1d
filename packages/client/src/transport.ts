/**
 * HTTP transport: one request per call, failures mapped to the error taxonomy.
 */

import { Agent } from "undici"
import { authorizationHeader } from "./auth"
import { ApiError, HttpError, findSurgeError } from "./error"
import { createFetchWithTimeout, defaultFetch } from "./fetch"
import { noopLogger } from "./logger"
import type { Dispatcher, RequestInit, Response } from "undici"
import type { Config } from "./config"
import type { FetchClient } from "./fetch"
import type { Auth, Logger } from "./types"

export type HttpMethod = `GET` | `POST` | `PUT` | `DELETE`

/**
 * Request payload: a string is sent as-is, an async iterable is streamed.
 */
export type RequestBody = string | Uint8Array | AsyncIterable<Uint8Array>

export interface TransportOptions {
  config: Config

  /**
   * Custom fetch implementation (for testing).
   */
  fetch?: FetchClient

  logger?: Logger
}

export interface TransportRequest {
  auth?: Auth
  headers?: Record<string, string>
  body?: RequestBody
  contentType?: string
  accept?: string
  signal?: AbortSignal
}

export interface JsonRequest extends Omit<TransportRequest, `body` | `contentType`> {
  /**
   * Value sent as a JSON body.
   */
  json?: unknown
}

/**
 * Immutable HTTP layer shared by every call a client makes.
 */
export class Transport {
  readonly config: Config

  readonly #fetch: FetchClient
  readonly #logger: Logger
  readonly #dispatcher?: Dispatcher

  constructor(options: TransportOptions) {
    this.config = options.config
    this.#logger = options.logger ?? noopLogger
    this.#fetch = createFetchWithTimeout(
      options.fetch ?? defaultFetch,
      this.config.timeout
    )

    if (this.config.insecure) {
      this.#logger.warn(
        `TLS certificate validation is disabled for ${this.config.endpoint}`
      )
      this.#dispatcher = new Agent({ connect: { rejectUnauthorized: false } })
    }
  }

  /**
   * Absolute URL for an API path.
   */
  url(path: string): string {
    return `${this.config.endpoint}/${path.replace(/^\/+/, ``)}`
  }

  /**
   * Send one request. Resolves with the response once headers arrive and the
   * status is a success; the body is left unread.
   *
   * A server that rejects a streamed body with an error status and closes the
   * connection before reading it all surfaces as `HttpError` (broken pipe):
   * the runtime drops the response when the upload fails.
   *
   * @throws {HttpError} on connection, TLS, timeout or abort failure
   * @throws {ApiError} on a non-success status
   */
  async request(
    method: HttpMethod,
    path: string,
    request: TransportRequest = {}
  ): Promise<Response> {
    const url = this.url(path)

    const headers: Record<string, string> = {}
    if (request.accept) headers[`accept`] = request.accept
    if (request.contentType) headers[`content-type`] = request.contentType
    Object.assign(headers, request.headers)
    if (request.auth) headers[`authorization`] = authorizationHeader(request.auth)

    const init: RequestInit = {
      method,
      headers,
      signal: request.signal,
      dispatcher: this.#dispatcher,
    }
    if (request.body !== undefined) {
      init.body = request.body
      if (typeof request.body !== `string` && !(request.body instanceof Uint8Array)) {
        init.duplex = `half`
      }
    }

    this.#logger.debug(`${method} ${url}`)

    let response: Response
    try {
      response = await this.#fetch(url, init)
    } catch (err) {
      throw findSurgeError(err) ?? HttpError.fromCause(err, url)
    }

    this.#logger.debug(`${method} ${url} -> ${response.status}`)

    if (!response.ok) {
      throw await ApiError.fromResponse(response, url)
    }
    return response
  }

  /**
   * Send a request and parse the response body as JSON.
   * An empty body resolves to undefined; a non-JSON body to its text.
   */
  async json(
    method: HttpMethod,
    path: string,
    request: JsonRequest = {}
  ): Promise<unknown> {
    const { json, ...rest } = request
    const response = await this.request(method, path, {
      ...rest,
      accept: rest.accept ?? `application/json`,
      ...(json === undefined
        ? {}
        : { body: JSON.stringify(json), contentType: `application/json` }),
    })

    let text: string
    try {
      text = await response.text()
    } catch (err) {
      throw HttpError.fromCause(err, this.url(path))
    }

    if (!text.trim()) return undefined
    try {
      return JSON.parse(text)
    } catch {
      return text
    }
  }

  /**
   * Release pooled connections held by the insecure dispatcher, if any.
   */
  async close(): Promise<void> {
    await this.#dispatcher?.close()
  }
}
