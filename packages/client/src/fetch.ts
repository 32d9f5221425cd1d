/**
 * Fetch utilities: the injectable client type, timeouts and signal chaining.
 */

import { fetch as undiciFetch } from "undici"
import { HttpError } from "./error"
import type { RequestInit, Response } from "undici"

/**
 * The fetch signature the client depends on. Defaults to undici's `fetch`.
 */
export type FetchClient = (url: string, init: RequestInit) => Promise<Response>

export const defaultFetch: FetchClient = (url, init) => undiciFetch(url, init)

/**
 * Creates a fetch client that aborts if response headers do not arrive
 * within `timeoutSecs` of the call. The timer starts before the request body
 * is sent, so a streamed upload must also finish inside it. Once headers are
 * received the timer is cleared; reading the response body is not bounded.
 *
 * The request's own `signal` stays chained for the life of the response,
 * so aborting it also cancels a body that is still streaming.
 *
 * @param fetchClient - The base fetch client to wrap
 * @param timeoutSecs - Seconds allowed for sending the request and receiving headers
 */
export function createFetchWithTimeout(
  fetchClient: FetchClient,
  timeoutSecs: number
): FetchClient {
  return async (url, init) => {
    const aborter = new AbortController()
    const { signal, cleanup } = chainAborter(aborter, init.signal)

    const timer = setTimeout(() => {
      aborter.abort(
        new HttpError(
          `Request to ${url} timed out after ${timeoutSecs}s waiting for a response`,
          url
        )
      )
    }, timeoutSecs * 1000)

    try {
      return await fetchClient(url, { ...init, signal })
    } catch (err) {
      cleanup()
      throw err
    } finally {
      clearTimeout(timer)
    }
  }
}

/**
 * Chains an AbortController to an optional source signal.
 * If the source signal is aborted, the provided controller will also abort.
 */
export function chainAborter(
  aborter: AbortController,
  sourceSignal?: AbortSignal | null
): {
  signal: AbortSignal
  cleanup: () => void
} {
  let cleanup = noop
  if (!sourceSignal) {
    // no-op, nothing to chain to
  } else if (sourceSignal.aborted) {
    // source signal is already aborted, abort immediately
    aborter.abort(sourceSignal.reason)
  } else {
    // chain to source signal abort event
    const abortParent = () => aborter.abort(sourceSignal.reason)
    sourceSignal.addEventListener(`abort`, abortParent, {
      once: true,
      signal: aborter.signal,
    })
    cleanup = () => sourceSignal.removeEventListener(`abort`, abortParent)
  }

  return {
    signal: aborter.signal,
    cleanup,
  }
}

function noop() {}
