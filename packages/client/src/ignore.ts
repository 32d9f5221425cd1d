/**
 * Ignore rules with `.gitignore` semantics.
 *
 * Patterns are compiled into segment lists and evaluated in order; the last
 * rule that matches a path decides whether it is excluded. Supported syntax:
 * - `*` and `?` within one path segment, `[abc]` / `[a-z]` / `[!a]` classes
 * - `**` matches zero or more whole segments; a trailing `**` after a name needs at least one
 * - leading `/`, or any `/` before the end, anchors the pattern to its base directory
 * - trailing `/` matches directories only
 * - leading `!` re-includes, `#` starts a comment, `\` escapes the next character
 */

import { DEFAULT_IGNORE_PATTERNS } from "./constants"

/**
 * A single compiled ignore rule.
 */
export interface IgnoreRule {
  /**
   * The pattern as written.
   */
  pattern: string

  /**
   * Re-include instead of exclude (`!pattern`).
   */
  negated: boolean

  /**
   * Only match directories (`pattern/`).
   */
  directoryOnly: boolean

  /**
   * Pattern split into segments; unanchored patterns start with `**`.
   */
  segments: ReadonlyArray<string>

  /**
   * Forward-slash directory, relative to the project root, the rule applies under.
   * Empty for the root.
   */
  base: string

  /**
   * Where the rule came from: `default`, `option`, or the ignore file's relative path.
   */
  source: string
}

/**
 * Compile one ignore-file line. Returns undefined for blank lines and comments.
 */
export function parseIgnorePattern(
  line: string,
  base = ``,
  source = `option`
): IgnoreRule | undefined {
  let pattern = trimTrailingWhitespace(line)
  if (pattern === `` || pattern.startsWith(`#`)) return undefined

  let negated = false
  if (pattern.startsWith(`!`)) {
    negated = true
    pattern = pattern.slice(1)
  } else if (pattern.startsWith(`\\!`) || pattern.startsWith(`\\#`)) {
    pattern = pattern.slice(1)
  }

  let directoryOnly = false
  if (pattern.endsWith(`/`) && !pattern.endsWith(`\\/`)) {
    directoryOnly = true
    pattern = pattern.replace(/\/+$/, ``)
  }

  let anchored = false
  if (pattern.startsWith(`/`)) {
    anchored = true
    pattern = pattern.replace(/^\/+/, ``)
  }
  if (pattern.includes(`/`)) {
    anchored = true
  }

  const segments = pattern.split(`/`).filter((segment) => segment.length > 0)
  if (segments.length === 0) return undefined

  return {
    pattern: line.trim(),
    negated,
    directoryOnly,
    segments: anchored || segments[0] === `**` ? segments : [`**`, ...segments],
    base: trimSlashes(base),
    source,
  }
}

/**
 * Compile the lines of an ignore file.
 */
export function parseIgnoreFile(
  contents: string,
  base = ``,
  source = `option`
): Array<IgnoreRule> {
  const rules: Array<IgnoreRule> = []
  for (const line of contents.split(/\r?\n/)) {
    const rule = parseIgnorePattern(line, base, source)
    if (rule) rules.push(rule)
  }
  return rules
}

/**
 * Ordered, immutable set of ignore rules.
 */
export class IgnoreRuleSet {
  readonly rules: ReadonlyArray<IgnoreRule>

  constructor(rules: ReadonlyArray<IgnoreRule> = []) {
    this.rules = rules
  }

  /**
   * Built-in defaults followed by the given patterns.
   */
  static create(patterns: ReadonlyArray<string> = []): IgnoreRuleSet {
    const rules: Array<IgnoreRule> = []
    for (const pattern of DEFAULT_IGNORE_PATTERNS) {
      const rule = parseIgnorePattern(pattern, ``, `default`)
      if (rule) rules.push(rule)
    }
    for (const pattern of patterns) {
      const rule = parseIgnorePattern(pattern, ``, `option`)
      if (rule) rules.push(rule)
    }
    return new IgnoreRuleSet(rules)
  }

  /**
   * A new set with extra rules evaluated after the existing ones.
   */
  extend(rules: ReadonlyArray<IgnoreRule>): IgnoreRuleSet {
    if (rules.length === 0) return this
    return new IgnoreRuleSet([...this.rules, ...rules])
  }

  /**
   * Whether a root-relative, forward-slash path is excluded.
   * A path under an excluded directory is excluded too, whatever later rules say.
   */
  isIgnored(path: string, isDirectory = false): boolean {
    const segments = trimSlashes(path)
      .split(`/`)
      .filter((segment) => segment.length > 0)

    for (let depth = 1; depth < segments.length; depth++) {
      if (this.#evaluate(segments.slice(0, depth), true)) {
        return true
      }
    }

    return this.#evaluate(segments, isDirectory)
  }

  /**
   * The last rule matching the path itself, ignoring parent directories.
   */
  match(path: string, isDirectory = false): IgnoreRule | undefined {
    const segments = trimSlashes(path)
      .split(`/`)
      .filter((segment) => segment.length > 0)
    return this.#lastMatch(segments, isDirectory)
  }

  #evaluate(segments: Array<string>, isDirectory: boolean): boolean {
    const rule = this.#lastMatch(segments, isDirectory)
    return rule !== undefined && !rule.negated
  }

  #lastMatch(
    segments: Array<string>,
    isDirectory: boolean
  ): IgnoreRule | undefined {
    for (let i = this.rules.length - 1; i >= 0; i--) {
      const rule = this.rules[i]!
      if (rule.directoryOnly && !isDirectory) continue

      const relative = relativeTo(segments, rule.base)
      if (relative && matchSegments(rule.segments, 0, relative, 0)) {
        return rule
      }
    }
    return undefined
  }
}

/**
 * Strip the rule's base directory from a path, or undefined if the path is not under it.
 */
function relativeTo(
  segments: Array<string>,
  base: string
): Array<string> | undefined {
  if (base === ``) return segments
  const baseSegments = base.split(`/`)
  if (segments.length <= baseSegments.length) return undefined
  for (let i = 0; i < baseSegments.length; i++) {
    if (segments[i] !== baseSegments[i]) return undefined
  }
  return segments.slice(baseSegments.length)
}

function matchSegments(
  pattern: ReadonlyArray<string>,
  pi: number,
  path: ReadonlyArray<string>,
  si: number
): boolean {
  while (pi < pattern.length && si < path.length) {
    const seg = pattern[pi]!

    if (seg === `**`) {
      // ** matches zero or more segments
      for (let i = si; i <= path.length; i++) {
        if (matchSegments(pattern, pi + 1, path, i)) {
          return true
        }
      }
      return false
    }

    if (!matchSegment(seg, path[si]!)) {
      return false
    }
    pi++
    si++
  }

  // `dir/**` matches what is inside `dir`, never `dir` itself
  if (
    si === path.length &&
    pi > 0 &&
    pi === pattern.length - 1 &&
    pattern[pi] === `**` &&
    pattern[pi - 1] !== `**`
  ) {
    return false
  }

  // Trailing ** matches zero segments
  while (pi < pattern.length && pattern[pi] === `**`) {
    pi++
  }

  return pi === pattern.length && si === path.length
}

/**
 * Match one path segment against a glob segment.
 * Backtracks to the most recent `*` on mismatch.
 */
export function matchSegment(pattern: string, text: string): boolean {
  let p = 0
  let t = 0
  let starP = -1
  let starT = 0

  while (t < text.length) {
    const ch = pattern[p]

    if (ch === `*`) {
      starP = p++
      starT = t
      continue
    }

    if (ch !== undefined) {
      const step = matchChar(pattern, p, text[t]!)
      if (step > 0) {
        p += step
        t++
        continue
      }
    }

    if (starP === -1) return false
    p = starP + 1
    t = ++starT
  }

  while (pattern[p] === `*`) p++
  return p === pattern.length
}

/**
 * Match a single character at pattern[p]. Returns how many pattern characters
 * were consumed, or 0 on mismatch.
 */
function matchChar(pattern: string, p: number, ch: string): number {
  const token = pattern[p]!

  if (token === `?`) return 1

  if (token === `\\` && p + 1 < pattern.length) {
    return pattern[p + 1] === ch ? 2 : 0
  }

  if (token === `[`) {
    const parsed = parseClass(pattern, p)
    if (parsed) {
      return parsed.test(ch) ? parsed.length : 0
    }
  }

  return token === ch ? 1 : 0
}

/**
 * Parse a `[...]` class starting at pattern[start]. Unterminated classes are literals.
 */
function parseClass(
  pattern: string,
  start: number
): { length: number; test: (ch: string) => boolean } | undefined {
  let i = start + 1
  let negate = false
  if (pattern[i] === `!` || pattern[i] === `^`) {
    negate = true
    i++
  }

  const ranges: Array<[string, string]> = []
  let first = true
  while (i < pattern.length && (pattern[i] !== `]` || first)) {
    first = false
    let lo = pattern[i]!
    if (lo === `\\` && i + 1 < pattern.length) {
      lo = pattern[++i]!
    }
    if (pattern[i + 1] === `-` && i + 2 < pattern.length && pattern[i + 2] !== `]`) {
      ranges.push([lo, pattern[i + 2]!])
      i += 3
    } else {
      ranges.push([lo, lo])
      i++
    }
  }

  if (i >= pattern.length) return undefined

  return {
    length: i - start + 1,
    test: (ch) => {
      const hit = ranges.some(([lo, hi]) => ch >= lo && ch <= hi)
      return negate ? !hit : hit
    },
  }
}

function trimTrailingWhitespace(line: string): string {
  let end = line.length
  while (end > 0 && /\s/.test(line[end - 1]!)) {
    if (end >= 2 && line[end - 2] === `\\`) break
    end--
  }
  return line.slice(0, end)
}

function trimSlashes(path: string): string {
  return path.replace(/^\/+/, ``).replace(/\/+$/, ``)
}
