/**
 * Publish Protocol Constants
 *
 * Header names, media types and limits shared by the publish pipeline and the
 * management calls.
 */

// ============================================================================
// Endpoint
// ============================================================================

/**
 * Default API endpoint.
 */
export const SURGE_API = `https://surge.surge.sh`

/**
 * Default per-request timeout, in seconds.
 */
export const DEFAULT_TIMEOUT_SECS = 30

/**
 * Version reported to the server when the caller does not set one.
 */
export const DEFAULT_CLIENT_VERSION = `0.1.0`

// ============================================================================
// Request Headers
// ============================================================================

/**
 * Client version announced on every publish request.
 */
export const VERSION_HEADER = `version`

/**
 * RFC3339 time the publish request was issued.
 */
export const TIMESTAMP_HEADER = `timestamp`

/**
 * `true` for preview (WIP) deployments.
 */
export const STAGE_HEADER = `stage`

/**
 * SSL certificate bundle path; the client never uploads one inline.
 */
export const SSL_HEADER = `ssl`

/**
 * JSON encoding of the invoking command line (`{"_": [...], ...}`).
 */
export const ARGV_HEADER = `argv`

/**
 * Number of files in the archive.
 */
export const FILE_COUNT_HEADER = `file-count`

/**
 * Total uncompressed size of the archived files, in bytes.
 */
export const PROJECT_SIZE_HEADER = `project-size`

// ============================================================================
// Media Types
// ============================================================================

/**
 * Content type of the uploaded archive.
 */
export const ARCHIVE_CONTENT_TYPE = `application/gzip`

/**
 * Accept header for streaming endpoints.
 */
export const NDJSON_CONTENT_TYPE = `application/ndjson`

// ============================================================================
// Archive
// ============================================================================

/**
 * Largest file a ustar header can describe: an 11 digit octal size field.
 */
export const MAX_ARCHIVE_ENTRY_SIZE = 0o77777777777

/**
 * Upper bound on how much of a single file is read at a time while archiving.
 */
export const ARCHIVE_READ_CHUNK_SIZE = 64 * 1024

/**
 * Name of the per-directory ignore file.
 */
export const IGNORE_FILE_NAME = `.surgeignore`

/**
 * Patterns excluded from every archive, evaluated before any ignore file.
 */
export const DEFAULT_IGNORE_PATTERNS: ReadonlyArray<string> = [
  `.git`,
  `.hg`,
  `.svn`,
  `.DS_Store`,
  `node_modules`,
  `bower_components`,
  `*~`,
  `*.surge-archive.tmp`,
]
