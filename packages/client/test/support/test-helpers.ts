/**
 * Test helper utilities: temporary project trees, archive inspection and
 * canned streaming responses.
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { dirname, join } from "node:path"
import { Parser } from "tar"
import { Response } from "undici"
import type { ReadEntry } from "tar"

/**
 * Create a temporary directory holding the given files.
 * Keys are forward-slash relative paths.
 */
export async function createTempProject(
  files: Record<string, string | Uint8Array>
): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), `surgekit-test-`))
  for (const [path, content] of Object.entries(files)) {
    const absolute = join(root, ...path.split(`/`))
    await mkdir(dirname(absolute), { recursive: true })
    await writeFile(absolute, content)
  }
  return root
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}

export interface ArchiveEntryInfo {
  path: string
  type: string
  size: number
  mode?: number
  uid?: number
  content: string
}

/**
 * Parse a tar.gz buffer into its entries, in archive order.
 */
export async function readArchive(
  data: Uint8Array
): Promise<Array<ArchiveEntryInfo>> {
  const entries: Array<ArchiveEntryInfo> = []

  await new Promise<void>((resolve, reject) => {
    const parser = new Parser()
    parser.on(`entry`, (entry: ReadEntry) => {
      const chunks: Array<Buffer> = []
      entry.on(`data`, (chunk: Buffer) => {
        chunks.push(chunk)
      })
      entry.on(`end`, () => {
        entries.push({
          path: entry.path,
          type: entry.type,
          size: entry.size ?? 0,
          mode: entry.mode,
          uid: entry.uid,
          content: Buffer.concat(chunks).toString(`utf8`),
        })
      })
    })
    parser.on(`end`, () => resolve())
    parser.on(`error`, reject)
    parser.end(Buffer.from(data))
  })

  return entries
}

/**
 * Concatenate every chunk of a byte iterable.
 */
export async function drain(
  source: AsyncIterable<Uint8Array>
): Promise<Buffer> {
  const chunks: Array<Uint8Array> = []
  for await (const chunk of source) {
    chunks.push(chunk)
  }
  return Buffer.concat(chunks)
}

/**
 * Split bytes into chunks of at most `size` bytes.
 */
export function chunksOf(bytes: Uint8Array, size: number): Array<Uint8Array> {
  const chunks: Array<Uint8Array> = []
  for (let i = 0; i < bytes.length; i += size) {
    chunks.push(bytes.slice(i, i + size))
  }
  return chunks
}

export async function* fromChunks(
  chunks: Iterable<Uint8Array | string>
): AsyncGenerator<Uint8Array, void, undefined> {
  const encoder = new TextEncoder()
  for (const chunk of chunks) {
    yield typeof chunk === `string` ? encoder.encode(chunk) : chunk
  }
}

/**
 * A streaming NDJSON response whose body arrives in the given chunks.
 */
export function ndjsonResponse(
  chunks: Array<string | Uint8Array>,
  status = 200
): Response {
  return new Response(fromChunks(chunks), {
    status,
    headers: { "content-type": `application/ndjson` },
  })
}

/**
 * A JSON response with the given status.
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": `application/json` },
  })
}

/**
 * Collect everything an async iterable yields.
 */
export async function toArray<T>(source: AsyncIterable<T>): Promise<Array<T>> {
  const items: Array<T> = []
  for await (const item of source) {
    items.push(item)
  }
  return items
}
