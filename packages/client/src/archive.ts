/**
 * Streaming tar.gz builder for a collected project.
 */

import { Pack } from "tar"
import { ARCHIVE_READ_CHUNK_SIZE, MAX_ARCHIVE_ENTRY_SIZE } from "./constants"
import { ArchiveError, FilesystemError, SurgeError } from "./error"
import { noopLogger } from "./logger"
import type { ProjectManifest } from "./collect"
import type { Logger } from "./types"

export interface ArchiveOptions {
  logger?: Logger
}

/**
 * A gzip-compressed tar of the manifest's files, produced as it is read.
 *
 * Single use: the archive is built while it is iterated, one file at a time.
 */
export class ArchiveStream implements AsyncIterable<Uint8Array> {
  readonly manifest: ProjectManifest

  #logger: Logger
  #started = false
  #bytes = 0

  constructor(manifest: ProjectManifest, options: ArchiveOptions = {}) {
    this.manifest = manifest
    this.#logger = options.logger ?? noopLogger
  }

  /**
   * Compressed bytes emitted so far.
   */
  get bytesWritten(): number {
    return this.#bytes
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    if (this.#started) {
      throw new ArchiveError(`Archive stream has already been consumed`)
    }
    this.#started = true
    return this.#generate()
  }

  async *#generate(): AsyncGenerator<Uint8Array, void, undefined> {
    const { root, files } = this.manifest

    const pack = new Pack({
      cwd: root,
      gzip: true,
      portable: true,
      follow: true,
      strict: true,
      noDirRecurse: true,
      maxReadSize: ARCHIVE_READ_CHUNK_SIZE,
    })

    for (const file of files) {
      if (file.size > MAX_ARCHIVE_ENTRY_SIZE) {
        throw new ArchiveError(
          `File too large to archive: ${file.path} (${file.size} bytes, limit ${MAX_ARCHIVE_ENTRY_SIZE})`,
          file.path
        )
      }
      pack.add(file.path)
    }
    pack.end()

    this.#logger.debug(`Archiving ${files.length} files from ${root}`)

    try {
      for await (const chunk of pack) {
        const bytes = typeof chunk === `string` ? Buffer.from(chunk) : chunk
        this.#bytes += bytes.byteLength
        yield bytes
      }
    } catch (err) {
      throw toArchiveFailure(err, root)
    }

    this.#logger.debug(`Archive complete: ${this.#bytes} bytes`)
  }
}

/**
 * Start a streaming archive of the manifest's files.
 */
export function createArchiveStream(
  manifest: ProjectManifest,
  options: ArchiveOptions = {}
): ArchiveStream {
  return new ArchiveStream(manifest, options)
}

/**
 * Read a whole archive into memory. Intended for tests and small projects.
 */
export async function archiveToBuffer(
  manifest: ProjectManifest,
  options: ArchiveOptions = {}
): Promise<Buffer> {
  const chunks: Array<Uint8Array> = []
  for await (const chunk of createArchiveStream(manifest, options)) {
    chunks.push(chunk)
  }
  return Buffer.concat(chunks)
}

function toArchiveFailure(err: unknown, root: string): SurgeError {
  if (err instanceof SurgeError) return err

  // errno codes (ENOENT, EACCES, ...) come from reading a file
  if (
    err instanceof Error &&
    `code` in err &&
    typeof err.code === `string` &&
    /^E[A-Z]+$/.test(err.code)
  ) {
    const path = `path` in err && typeof err.path === `string` ? err.path : root
    return FilesystemError.fromCause(err, path)
  }

  const reason = err instanceof Error ? err.message : String(err)
  return new ArchiveError(`Failed to build archive: ${reason}`, undefined, {
    cause: err,
  })
}
