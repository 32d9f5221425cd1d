/**
 * Shared utility functions for the publish client.
 */

import { ConfigError } from "./error"
import words from "./words.json"
import type { HeadersRecord } from "./types"

/**
 * Resolve headers from HeadersRecord (supports async functions).
 */
export async function resolveHeaders(
  headers?: HeadersRecord
): Promise<Record<string, string>> {
  const resolved: Record<string, string> = {}

  if (!headers) {
    return resolved
  }

  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === `function`) {
      resolved[key] = await value()
    } else {
      resolved[key] = value
    }
  }

  return resolved
}

const LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/

/**
 * Check that a publish target is a fully qualified hostname and return it lowercased.
 *
 * @throws {ConfigError} if the domain is not a valid hostname
 */
export function validateDomain(domain: string): string {
  const normalized = domain.trim().toLowerCase().replace(/\.$/, ``)
  const issues: Array<string> = []

  if (normalized.length === 0) {
    issues.push(`domain is empty`)
  } else if (normalized.length > 253) {
    issues.push(`domain is longer than 253 characters`)
  } else if (/^[a-z]+:\/\//.test(normalized) || normalized.includes(`/`)) {
    issues.push(`expected a hostname without scheme or path`)
  } else {
    const labels = normalized.split(`.`)
    if (labels.length < 2) {
      issues.push(`expected a fully qualified hostname such as example.surge.sh`)
    }
    for (const label of labels) {
      if (!LABEL.test(label)) {
        issues.push(`invalid label "${label}"`)
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid domain "${domain}"`, issues)
  }
  return normalized
}

/**
 * Domain a preview (WIP) deployment is uploaded to.
 *
 * @throws {ConfigError} if the timestamp pushes the first label past 63 characters
 */
export function wipDomain(domain: string, now: number = Date.now()): string {
  return validateDomain(`${now}-${domain}`)
}

function pick(list: ReadonlyArray<string>, random: () => number): string {
  return list[Math.floor(random() * list.length)] ?? list[0] ?? `site`
}

/**
 * A memorable two-word identifier: adjective-noun, verb-noun or adjective-verb.
 */
export function chooseWords(random: () => number = Math.random): string {
  const { adjectives, nouns, verbs } = words
  switch (Math.floor(random() * 3)) {
    case 0:
      return `${pick(adjectives, random)}-${pick(nouns, random)}`
    case 1:
      return `${pick(verbs, random)}-${pick(nouns, random)}`
    default:
      return `${pick(adjectives, random)}-${pick(verbs, random)}`
  }
}

/**
 * Generate a random `.surge.sh` domain, optionally suffixed with a number in 0-9999.
 */
export function generateDomain(
  withNumber = false,
  random: () => number = Math.random
): string {
  const base = chooseWords(random)
  if (withNumber) {
    return `${base}-${Math.floor(random() * 10000)}.surge.sh`
  }
  return `${base}.surge.sh`
}

/**
 * Convert an argv-shaped object (`{"_": [...], key: value}`) into a flat
 * argument list: positionals first, then `--key value` for every other field.
 *
 * @throws {ConfigError} if the input is not a JSON object
 */
export function jsonToArgv(input: string | Record<string, unknown>): Array<string> {
  let parsed: unknown = input
  if (typeof input === `string`) {
    try {
      parsed = JSON.parse(input)
    } catch (err) {
      throw new ConfigError(`Invalid argv JSON`, [
        err instanceof Error ? err.message : String(err),
      ])
    }
  }
  if (typeof parsed !== `object` || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Invalid argv JSON`, [`expected an object`])
  }

  const args: Array<string> = []
  const entries = Object.entries(parsed)

  for (const [key, value] of entries) {
    if (key !== `_` || !Array.isArray(value)) continue
    for (const item of value) {
      if (typeof item === `string`) args.push(item)
    }
  }

  for (const [key, value] of entries) {
    if (key === `_` || value === undefined) continue
    args.push(`--${key}`)
    args.push(typeof value === `string` ? value : JSON.stringify(value))
  }

  return args
}
