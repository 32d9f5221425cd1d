/**
 * Mapping from decoded NDJSON payloads to typed progress events.
 */

import type {
  CertEvent,
  InfoEvent,
  JsonObject,
  ProgressEvent,
  ProgressUpdateEvent,
} from "./types"

/**
 * Turn one parsed NDJSON value into a ProgressEvent.
 *
 * The discriminator is read from `kind`, falling back to `type`. Payloads
 * with an unrecognised tag, a missing tag, or a known tag whose required
 * fields are absent become `unknown` events carrying the original line.
 */
export function toEvent(value: unknown, line: string): ProgressEvent {
  if (!isObject(value)) {
    return { kind: `unknown`, type: ``, text: line, message: ``, raw: { value } }
  }

  const raw = value
  const tag = str(raw.kind) ?? str(raw.type) ?? ``
  const message = str(raw.message) ?? ``

  const unknown = (): ProgressEvent => ({
    kind: `unknown`,
    type: tag,
    text: line,
    message,
    raw,
  })

  switch (tag) {
    case `progress`:
      return toProgress(raw, message)

    case `upload`:
      return { kind: `upload`, message, raw }

    case `success`:
      return { kind: `success`, message, raw }

    case `error`:
      return { kind: `error`, message, raw }

    case `file`:
      return {
        kind: `file`,
        path: str(raw.path) ?? str(raw.file),
        size: num(raw.size),
        message,
        raw,
      }

    case `cert`:
      return toCert(raw, message) ?? unknown()

    case `ip`: {
      const data = isObject(raw.data) ? raw.data : raw
      const ip = str(data.ip)
      return ip === undefined ? unknown() : { kind: `ip`, ip, message, raw }
    }

    case `info`:
      return toInfo(raw, message)

    case `subscription`:
      return { kind: `subscription`, data: raw.data, message, raw }

    default:
      return unknown()
  }
}

function toProgress(raw: JsonObject, message: string): ProgressUpdateEvent {
  const id = typeof raw.id === `number` ? String(raw.id) : str(raw.id)
  return {
    kind: `progress`,
    id,
    written: num(raw.written),
    total: num(raw.total),
    end: typeof raw.end === `boolean` ? raw.end : undefined,
    message,
    raw,
  }
}

function toCert(raw: JsonObject, message: string): CertEvent | undefined {
  if (!isObject(raw.data)) return undefined
  const data = raw.data
  const issuer = str(data.issuer)
  if (issuer === undefined) return undefined

  const names = Array.isArray(data.altnames)
    ? data.altnames
    : Array.isArray(data.altNames)
      ? data.altNames
      : []

  return {
    kind: `cert`,
    issuer,
    altNames: names.filter((name): name is string => typeof name === `string`),
    expiresInWords: str(data.expiresInWords) ?? ``,
    message,
    raw,
  }
}

function toInfo(raw: JsonObject, message: string): InfoEvent {
  const source = isObject(raw.data) && Array.isArray(raw.data.urls) ? raw.data : raw
  const urls: InfoEvent[`urls`] = []
  if (Array.isArray(source.urls)) {
    for (const item of source.urls) {
      if (!isObject(item)) continue
      const domain = str(item.domain)
      if (domain === undefined) continue
      urls.push({ domain, name: str(item.name) ?? `` })
    }
  }
  return { kind: `info`, urls, message, raw }
}

/**
 * Render an event as a single human-readable line.
 */
export function formatEvent(event: ProgressEvent): string {
  switch (event.kind) {
    case `progress`: {
      const written = event.written ?? 0
      const total = event.total ?? 0
      const percent = total > 0 ? Math.round((written / total) * 100) : 0
      return `[progress] ${event.id ?? `-`}: ${written}/${total} (${percent}%)${event.end ? ` done` : ``}`
    }
    case `file`:
      return `[file] ${event.path ?? event.message}`
    case `cert`:
      return `[cert] ${event.issuer} for ${event.altNames.join(`, `) || `-`}, expires ${event.expiresInWords || `unknown`}`
    case `ip`:
      return `[ip] ${event.ip}`
    case `info`:
      return `[info] ${event.urls.map((url) => url.domain).join(`, `) || event.message}`
    case `unknown`:
      return `[${event.type || `unknown`}] ${event.message || event.text}`
    default:
      return `[${event.kind}] ${event.message}`
  }
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === `object` && value !== null && !Array.isArray(value)
}

function str(value: unknown): string | undefined {
  return typeof value === `string` ? value : undefined
}

/**
 * Numbers may arrive as JSON numbers or numeric strings.
 */
function num(value: unknown): number | undefined {
  if (typeof value === `number` && Number.isFinite(value)) return value
  if (typeof value === `string` && value.trim() !== ``) {
    const parsed = Number(value)
    if (Number.isFinite(parsed)) return parsed
  }
  return undefined
}
