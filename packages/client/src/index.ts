/**
 * Static site publishing client
 *
 * Packages a project directory into a tar.gz archive, streams it to the
 * publish API and relays the server's progress events as they arrive.
 *
 * @packageDocumentation
 */

// ============================================================================
// Client
// ============================================================================

export {
  SurgeClient,
  type ClientOptions,
  type EncryptOptions,
  type LoginResponse,
  type AccountInfo,
  type ListEntry,
} from "./client"

export {
  PublishResponse,
  publishProject,
  buildArgv,
  type EventStreamInit,
} from "./publish"

// ============================================================================
// Pipeline Stages
// ============================================================================

export {
  collectFiles,
  buildManifest,
  calculateMetadata,
  toArchivePath,
  type CollectedFile,
  type CollectOptions,
  type ProjectManifest,
} from "./collect"

export {
  IgnoreRuleSet,
  parseIgnorePattern,
  parseIgnoreFile,
  matchSegment,
  type IgnoreRule,
} from "./ignore"

export {
  ArchiveStream,
  createArchiveStream,
  archiveToBuffer,
  type ArchiveOptions,
} from "./archive"

export {
  Transport,
  type TransportOptions,
  type TransportRequest,
  type JsonRequest,
  type HttpMethod,
  type RequestBody,
} from "./transport"

export { decodeEventStream, parseLine, type DecodeOptions } from "./ndjson"

export { toEvent, formatEvent } from "./events"

// ============================================================================
// Configuration & Auth
// ============================================================================

export {
  createConfig,
  normalizeBaseUrl,
  type Config,
  type ConfigInput,
} from "./config"

export { tokenAuth, basicAuth, authorizationHeader } from "./auth"

export {
  createFetchWithTimeout,
  chainAborter,
  defaultFetch,
  type FetchClient,
} from "./fetch"

export {
  noopLogger,
  createConsoleLogger,
  type ConsoleLoggerOptions,
} from "./logger"

// ============================================================================
// Types
// ============================================================================

export type {
  MaybePromise,
  JsonObject,
  HeadersRecord,
  TokenAuth,
  BasicAuth,
  Auth,
  Logger,
  ProgressUpdateEvent,
  UploadEvent,
  FileEvent,
  SuccessEvent,
  ServerErrorEvent,
  CertEvent,
  IpEvent,
  InfoEvent,
  SubscriptionEvent,
  UnknownEvent,
  ProgressEvent,
  ProgressEventKind,
  EventResult,
  PublishTarget,
  PublishOptions,
} from "./types"

// ============================================================================
// Errors
// ============================================================================

export {
  SurgeError,
  FilesystemError,
  ArchiveError,
  HttpError,
  ApiError,
  EventError,
  ConfigError,
  findSurgeError,
  type SurgeErrorCode,
} from "./error"

// ============================================================================
// Utilities & Constants
// ============================================================================

export {
  resolveHeaders,
  validateDomain,
  wipDomain,
  chooseWords,
  generateDomain,
  jsonToArgv,
} from "./utils"

export {
  SURGE_API,
  DEFAULT_TIMEOUT_SECS,
  DEFAULT_CLIENT_VERSION,
  VERSION_HEADER,
  TIMESTAMP_HEADER,
  STAGE_HEADER,
  SSL_HEADER,
  ARGV_HEADER,
  FILE_COUNT_HEADER,
  PROJECT_SIZE_HEADER,
  ARCHIVE_CONTENT_TYPE,
  NDJSON_CONTENT_TYPE,
  MAX_ARCHIVE_ENTRY_SIZE,
  ARCHIVE_READ_CHUNK_SIZE,
  IGNORE_FILE_NAME,
  DEFAULT_IGNORE_PATTERNS,
} from "./constants"
