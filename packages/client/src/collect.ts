/**
 * Project traversal: walks a directory tree and yields the files to publish.
 *
 * Order is deterministic (lexicographic by full relative path) so identical
 * trees always produce identical archives. Symbolic links are followed only
 * when they resolve to a regular file inside the project root.
 */

import { constants as fsConstants } from "node:fs"
import { access, readFile, readdir, realpath, stat } from "node:fs/promises"
import { isAbsolute, join, relative, resolve, sep } from "node:path"
import { IGNORE_FILE_NAME, MAX_ARCHIVE_ENTRY_SIZE } from "./constants"
import { ArchiveError, FilesystemError } from "./error"
import { IgnoreRuleSet, parseIgnoreFile } from "./ignore"
import { noopLogger } from "./logger"
import type { Dirent, Stats } from "node:fs"
import type { Logger } from "./types"

/**
 * A regular file selected for publishing.
 */
export interface CollectedFile {
  /**
   * Root-relative path with forward slashes and no leading slash.
   */
  path: string

  /**
   * Absolute path the content is read from (the link target for symlinks).
   */
  absolutePath: string

  size: number

  /**
   * POSIX permission bits.
   */
  mode: number

  mtime: Date
}

export interface CollectOptions {
  /**
   * Extra patterns evaluated after the built-in defaults.
   */
  ignore?: ReadonlyArray<string>

  /**
   * Use this rule set instead of the defaults plus `ignore`.
   */
  rules?: IgnoreRuleSet

  /**
   * Read `.surgeignore` files found in the tree (default true).
   */
  ignoreFiles?: boolean

  logger?: Logger
}

/**
 * Files to publish plus the totals reported to the server.
 */
export interface ProjectManifest {
  /**
   * Absolute project root.
   */
  root: string
  files: Array<CollectedFile>
  fileCount: number
  projectSize: number
}

/**
 * Lazily walk a project directory, depth-first, yielding non-ignored regular files.
 *
 * @throws {FilesystemError} if the root is missing or any entry cannot be read
 */
export async function* collectFiles(
  root: string,
  options: CollectOptions = {}
): AsyncGenerator<CollectedFile, void, undefined> {
  const absoluteRoot = resolve(root)
  const logger = options.logger ?? noopLogger

  let rootStats: Stats
  try {
    rootStats = await stat(absoluteRoot)
  } catch (err) {
    throw new FilesystemError(
      `Invalid project directory: ${absoluteRoot} does not exist`,
      absoluteRoot,
      { cause: err }
    )
  }
  if (!rootStats.isDirectory()) {
    throw new FilesystemError(
      `Invalid project directory: ${absoluteRoot} is not a directory`,
      absoluteRoot
    )
  }

  const realRoot = await realpath(absoluteRoot).catch((err: unknown) => {
    throw FilesystemError.fromCause(err, absoluteRoot)
  })

  const walker = new Walker(
    absoluteRoot,
    realRoot,
    options.rules ?? IgnoreRuleSet.create(options.ignore),
    options.ignoreFiles ?? true,
    logger
  )

  yield* walker.walk(absoluteRoot, ``, walker.rules)
}

/**
 * Drain the collector and check every file against the archive limits.
 * Runs before any network call so filesystem and size problems fail fast.
 *
 * @throws {FilesystemError} if the project is unreadable or empty after filtering
 * @throws {ArchiveError} if a file is too large for a tar entry
 */
export async function buildManifest(
  root: string,
  options: CollectOptions = {}
): Promise<ProjectManifest> {
  const files: Array<CollectedFile> = []
  let projectSize = 0

  for await (const file of collectFiles(root, options)) {
    if (file.size > MAX_ARCHIVE_ENTRY_SIZE) {
      throw new ArchiveError(
        `File too large to archive: ${file.path} (${file.size} bytes, limit ${MAX_ARCHIVE_ENTRY_SIZE})`,
        file.path
      )
    }
    files.push(file)
    projectSize += file.size
  }

  const absoluteRoot = resolve(root)
  if (files.length === 0) {
    throw new FilesystemError(
      `Nothing to publish: ${absoluteRoot} is empty after applying ignore rules`,
      absoluteRoot
    )
  }

  options.logger?.debug(
    `Manifest for ${absoluteRoot}: ${files.length} files, ${projectSize} bytes`
  )

  return { root: absoluteRoot, files, fileCount: files.length, projectSize }
}

/**
 * File count and total size of a project after ignore filtering.
 */
export async function calculateMetadata(
  root: string,
  options: CollectOptions = {}
): Promise<{ fileCount: number; projectSize: number }> {
  let fileCount = 0
  let projectSize = 0
  for await (const file of collectFiles(root, options)) {
    fileCount++
    projectSize += file.size
  }
  return { fileCount, projectSize }
}

/**
 * Convert a host path relative to the root into the archive form.
 */
export function toArchivePath(relativePath: string): string {
  return relativePath.split(sep).join(`/`).replace(/^\/+/, ``)
}

class Walker {
  constructor(
    readonly root: string,
    readonly realRoot: string,
    readonly rules: IgnoreRuleSet,
    readonly readIgnoreFiles: boolean,
    readonly logger: Logger
  ) {}

  async *walk(
    dir: string,
    relDir: string,
    inherited: IgnoreRuleSet
  ): AsyncGenerator<CollectedFile, void, undefined> {
    const rules = this.readIgnoreFiles
      ? inherited.extend(await this.#readIgnoreFile(dir, relDir))
      : inherited

    let entries: Array<Dirent>
    try {
      entries = await readdir(dir, { withFileTypes: true })
    } catch (err) {
      throw FilesystemError.fromCause(err, dir)
    }

    for (const entry of sortEntries(entries)) {
      const rel = relDir ? `${relDir}/${entry.name}` : entry.name
      const absolute = join(dir, entry.name)

      if (entry.isDirectory()) {
        if (rules.isIgnored(rel, true)) {
          this.logger.debug(`Ignored directory: ${rel}`)
          continue
        }
        yield* this.walk(absolute, rel, rules)
      } else if (entry.isFile()) {
        if (rules.isIgnored(rel, false)) {
          this.logger.debug(`Ignored file: ${rel}`)
          continue
        }
        yield await this.#describe(rel, absolute, absolute)
      } else if (entry.isSymbolicLink()) {
        const target = await this.#resolveLink(absolute, rel)
        if (target === undefined || rules.isIgnored(rel, false)) continue
        yield await this.#describe(rel, absolute, target)
      }
    }
  }

  async #describe(
    rel: string,
    absolute: string,
    source: string
  ): Promise<CollectedFile> {
    try {
      const stats = await stat(absolute)
      await access(source, fsConstants.R_OK)
      return {
        path: rel,
        absolutePath: source,
        size: stats.size,
        mode: stats.mode & 0o7777,
        mtime: stats.mtime,
      }
    } catch (err) {
      throw FilesystemError.fromCause(err, absolute)
    }
  }

  /**
   * Real path of a link to a regular file inside the root, otherwise undefined.
   */
  async #resolveLink(absolute: string, rel: string): Promise<string | undefined> {
    let target: string
    try {
      target = await realpath(absolute)
    } catch {
      this.logger.debug(`Skipping dangling link: ${rel}`)
      return undefined
    }

    const fromRoot = relative(this.realRoot, target)
    if (fromRoot === `` || fromRoot.startsWith(`..`) || isAbsolute(fromRoot)) {
      this.logger.debug(`Skipping link outside project root: ${rel}`)
      return undefined
    }

    const stats = await stat(target).catch((err: unknown) => {
      throw FilesystemError.fromCause(err, absolute)
    })
    if (!stats.isFile()) {
      this.logger.debug(`Skipping link to non-file: ${rel}`)
      return undefined
    }
    return target
  }

  async #readIgnoreFile(dir: string, relDir: string) {
    const file = join(dir, IGNORE_FILE_NAME)
    let contents: string
    try {
      contents = await readFile(file, `utf8`)
    } catch (err) {
      if (isNotFound(err)) return []
      throw FilesystemError.fromCause(err, file)
    }
    const source = relDir ? `${relDir}/${IGNORE_FILE_NAME}` : IGNORE_FILE_NAME
    this.logger.debug(`Loaded ignore rules from ${source}`)
    return parseIgnoreFile(contents, relDir, source)
  }
}

/**
 * Sort so that a depth-first walk visits files in full-path lexicographic order:
 * a directory sorts as if its name ended in `/`.
 */
function sortEntries(entries: Array<Dirent>): Array<Dirent> {
  const key = (entry: Dirent) =>
    entry.isDirectory() ? `${entry.name}/` : entry.name
  return [...entries].sort((a, b) => {
    const ka = key(a)
    const kb = key(b)
    return ka < kb ? -1 : ka > kb ? 1 : 0
  })
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    `code` in err &&
    (err.code === `ENOENT` || err.code === `ENOTDIR`)
  )
}
