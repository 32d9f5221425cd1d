import { describe, expect, it, vi } from "vitest"
import { Response } from "undici"
import { HttpError } from "../src/error"
import { chainAborter, createFetchWithTimeout } from "../src/fetch"
import type { Mock } from "vitest"
import type { FetchClient } from "../src/fetch"

/**
 * A fetch that never answers and rejects once its signal aborts.
 */
const hangingFetch: FetchClient = (_url, init) =>
  new Promise((_resolve, reject) => {
    const signal = init.signal
    if (!signal) return
    signal.addEventListener(`abort`, () => reject(signal.reason), {
      once: true,
    })
  })

describe(`createFetchWithTimeout`, () => {
  it(`should return the response when headers arrive in time`, async () => {
    const response = new Response(`ok`, { status: 200 })
    const mockFetchClient: Mock<FetchClient> = vi.fn()
    mockFetchClient.mockResolvedValue(response)

    const fetchWithTimeout = createFetchWithTimeout(mockFetchClient, 1)
    const result = await fetchWithTimeout(`https://example.com`, {
      method: `GET`,
    })

    expect(result).toBe(response)
    expect(mockFetchClient).toHaveBeenCalledTimes(1)
    expect(mockFetchClient.mock.calls[0]?.[1].signal).toBeInstanceOf(
      AbortSignal
    )
  })

  it(`should abort with an HttpError when headers are late`, async () => {
    const fetchWithTimeout = createFetchWithTimeout(hangingFetch, 0.05)

    const error = await fetchWithTimeout(`https://example.com/slow`, {}).catch(
      (err: unknown) => err
    )

    expect(error).toBeInstanceOf(HttpError)
    expect(error).toHaveProperty(
      `message`,
      `Request to https://example.com/slow timed out after 0.05s waiting for a response`
    )
  })

  it(`should bound a slow request body as well as the wait for headers`, async () => {
    let sentChunks = 0
    const slowUpload: FetchClient = async (_url, init) => {
      for (let i = 0; i < 10; i++) {
        await new Promise((resolve) => setTimeout(resolve, 20))
        if (init.signal?.aborted) throw init.signal.reason
        sentChunks++
      }
      return new Response(`ok`, { status: 200 })
    }
    const fetchWithTimeout = createFetchWithTimeout(slowUpload, 0.05)

    const error = await fetchWithTimeout(`https://example.com/upload`, {
      method: `PUT`,
    }).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(HttpError)
    expect(sentChunks).toBeLessThan(10)
  })

  it(`should forward the caller's abort`, async () => {
    const controller = new AbortController()
    const fetchWithTimeout = createFetchWithTimeout(hangingFetch, 10)

    const pending = fetchWithTimeout(`https://example.com`, {
      signal: controller.signal,
    })
    controller.abort(`stop`)

    await expect(pending).rejects.toBe(`stop`)
  })
})

describe(`chainAborter`, () => {
  it(`should abort immediately for an aborted source`, () => {
    const source = new AbortController()
    source.abort(`early`)

    const { signal } = chainAborter(new AbortController(), source.signal)

    expect(signal.aborted).toBe(true)
    expect(signal.reason).toBe(`early`)
  })

  it(`should follow a later abort until cleaned up`, () => {
    const first = new AbortController()
    const chained = chainAborter(new AbortController(), first.signal)
    first.abort(`later`)
    expect(chained.signal.reason).toBe(`later`)

    const second = new AbortController()
    const detached = chainAborter(new AbortController(), second.signal)
    detached.cleanup()
    second.abort()
    expect(detached.signal.aborted).toBe(false)
  })

  it(`should work without a source`, () => {
    const { signal, cleanup } = chainAborter(new AbortController())
    cleanup()
    expect(signal.aborted).toBe(false)
  })
})
