/**
 * Incremental NDJSON decoding for streamed progress events.
 *
 * Bytes are buffered until a `\n` arrives, so a line split across chunks,
 * or a multi-byte character split across chunks, decodes the same as if it
 * had arrived whole.
 */

import { EventError } from "./error"
import { toEvent } from "./events"
import { noopLogger } from "./logger"
import type { EventResult, Logger } from "./types"

const NEWLINE = 0x0a

export interface DecodeOptions {
  logger?: Logger

  /**
   * Stop decoding when aborted.
   */
  signal?: AbortSignal
}

/**
 * Decode a byte stream of NDJSON into event results.
 *
 * A malformed line yields `{ ok: false, error }` and decoding continues with
 * the next line. A non-blank remainder after the last newline gets one parse
 * attempt at end of stream and is dropped if it is not valid JSON.
 */
export async function* decodeEventStream(
  source: AsyncIterable<Uint8Array>,
  options: DecodeOptions = {}
): AsyncGenerator<EventResult, void, undefined> {
  const logger = options.logger ?? noopLogger
  const decoder = new TextDecoder()
  let buffer: Uint8Array = new Uint8Array(0)

  for await (const chunk of source) {
    if (options.signal?.aborted) break
    if (chunk.byteLength === 0) continue

    buffer = concat(buffer, chunk)

    let start = 0
    let newline = buffer.indexOf(NEWLINE, start)
    while (newline !== -1) {
      const line = stripCarriageReturn(
        decoder.decode(buffer.subarray(start, newline))
      )
      start = newline + 1

      if (line.trim() !== ``) {
        yield parseLine(line)
      }
      newline = buffer.indexOf(NEWLINE, start)
    }

    buffer = buffer.slice(start)
  }

  if (options.signal?.aborted) return

  const rest = stripCarriageReturn(decoder.decode(buffer))
  if (rest.trim() === ``) return

  const result = parseLine(rest)
  if (result.ok) {
    yield result
  } else {
    logger.debug(`Dropping incomplete trailing line: ${rest}`)
  }
}

/**
 * Parse one complete NDJSON line.
 */
export function parseLine(line: string): EventResult {
  let value: unknown
  try {
    value = JSON.parse(line)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    return {
      ok: false,
      error: new EventError(`Malformed event line: ${reason}`, line, {
        cause: err,
      }),
    }
  }
  return { ok: true, event: toEvent(value, line) }
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  if (a.byteLength === 0) return b
  const out = new Uint8Array(a.byteLength + b.byteLength)
  out.set(a, 0)
  out.set(b, a.byteLength)
  return out
}

function stripCarriageReturn(line: string): string {
  return line.endsWith(`\r`) ? line.slice(0, -1) : line
}
