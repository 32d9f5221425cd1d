import type { EventError } from "./error"

// ============================================================================
// Core Types
// ============================================================================

export type MaybePromise<T> = T | Promise<T>

/**
 * Parsed JSON object as received from the server.
 */
export type JsonObject = { [key: string]: unknown }

/**
 * Extra request headers. Values may be resolved lazily.
 */
export type HeadersRecord = {
  [key: string]: string | (() => MaybePromise<string>)
}

// ============================================================================
// Auth
// ============================================================================

export interface TokenAuth {
  type: `token`
  token: string
}

export interface BasicAuth {
  type: `basic`
  username: string
  password: string
}

/**
 * Credentials for a request: an API token or an email/password pair.
 */
export type Auth = TokenAuth | BasicAuth

// ============================================================================
// Logging
// ============================================================================

/**
 * Logging sink injected by the caller. The library never logs on its own.
 */
export interface Logger {
  debug: (message: string, ...args: Array<unknown>) => void
  info: (message: string, ...args: Array<unknown>) => void
  warn: (message: string, ...args: Array<unknown>) => void
  error: (message: string, ...args: Array<unknown>) => void
}

// ============================================================================
// Progress Events
// ============================================================================

interface EventBase {
  /**
   * Human-readable message sent by the server, or an empty string.
   */
  message: string

  /**
   * The full parsed payload, including fields the client does not model.
   */
  raw: JsonObject
}

export interface ProgressUpdateEvent extends EventBase {
  kind: `progress`
  id?: string
  written?: number
  total?: number
  end?: boolean
}

export interface UploadEvent extends EventBase {
  kind: `upload`
}

export interface FileEvent extends EventBase {
  kind: `file`
  path?: string
  size?: number
}

export interface SuccessEvent extends EventBase {
  kind: `success`
}

export interface ServerErrorEvent extends EventBase {
  kind: `error`
}

export interface CertEvent extends EventBase {
  kind: `cert`
  issuer: string
  altNames: Array<string>
  expiresInWords: string
}

export interface IpEvent extends EventBase {
  kind: `ip`
  ip: string
}

export interface InfoEvent extends EventBase {
  kind: `info`
  urls: Array<{ domain: string; name: string }>
}

export interface SubscriptionEvent extends EventBase {
  kind: `subscription`
  data?: unknown
}

/**
 * Catch-all for payloads the client does not recognise.
 */
export interface UnknownEvent extends EventBase {
  kind: `unknown`

  /**
   * The discriminator as sent on the wire, or an empty string if there was none.
   */
  type: string

  /**
   * The undecoded line.
   */
  text: string
}

export type ProgressEvent =
  | ProgressUpdateEvent
  | UploadEvent
  | FileEvent
  | SuccessEvent
  | ServerErrorEvent
  | CertEvent
  | IpEvent
  | InfoEvent
  | SubscriptionEvent
  | UnknownEvent

export type ProgressEventKind = ProgressEvent[`kind`]

/**
 * One item of a decoded event sequence.
 */
export type EventResult =
  | { ok: true; event: ProgressEvent }
  | { ok: false; error: EventError }

// ============================================================================
// Publish
// ============================================================================

export interface PublishTarget {
  /**
   * Hostname to publish to, e.g. `my-site.surge.sh`.
   */
  domain: string

  auth: Auth

  /**
   * Publish to a preview slot instead of production.
   */
  isWip?: boolean

  /**
   * Skip server-side confirmation prompts.
   */
  force?: boolean
}

export interface PublishOptions {
  /**
   * Extra request headers.
   */
  headers?: HeadersRecord

  /**
   * Positional command-line arguments reported to the server in the argv header.
   */
  argv?: Array<string>

  /**
   * Ignore patterns applied after the built-in defaults and before `.surgeignore` files.
   */
  ignore?: Array<string>

  /**
   * Aborting cancels the upload and the event stream.
   */
  signal?: AbortSignal
}
