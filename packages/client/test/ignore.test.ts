import { describe, expect, it } from "vitest"
import {
  IgnoreRuleSet,
  matchSegment,
  parseIgnoreFile,
  parseIgnorePattern,
} from "../src/ignore"

describe(`parseIgnorePattern`, () => {
  it(`should skip blank lines and comments`, () => {
    expect(parseIgnorePattern(``)).toBeUndefined()
    expect(parseIgnorePattern(`   `)).toBeUndefined()
    expect(parseIgnorePattern(`# a comment`)).toBeUndefined()
  })

  it(`should compile an unanchored pattern with a leading **`, () => {
    expect(parseIgnorePattern(`*.log`)).toEqual({
      pattern: `*.log`,
      negated: false,
      directoryOnly: false,
      segments: [`**`, `*.log`],
      base: ``,
      source: `option`,
    })
  })

  it(`should parse negation, directory-only and anchoring`, () => {
    const negated = parseIgnorePattern(`!keep.log`)
    expect(negated?.negated).toBe(true)
    expect(negated?.segments).toEqual([`**`, `keep.log`])

    const dirOnly = parseIgnorePattern(`build/`)
    expect(dirOnly?.directoryOnly).toBe(true)
    expect(dirOnly?.segments).toEqual([`**`, `build`])

    expect(parseIgnorePattern(`/dist`)?.segments).toEqual([`dist`])
    expect(parseIgnorePattern(`docs/*.md`)?.segments).toEqual([`docs`, `*.md`])
  })

  it(`should treat escaped # and ! as literals`, () => {
    expect(parseIgnorePattern(`\\#notes`)?.segments).toEqual([`**`, `#notes`])
    const bang = parseIgnorePattern(`\\!important`)
    expect(bang?.negated).toBe(false)
    expect(bang?.segments).toEqual([`**`, `!important`])
  })

  it(`should trim trailing whitespace`, () => {
    expect(parseIgnorePattern(`foo.txt   `)?.segments).toEqual([
      `**`,
      `foo.txt`,
    ])
  })
})

describe(`parseIgnoreFile`, () => {
  it(`should compile every rule line with its base and source`, () => {
    const rules = parseIgnoreFile(
      `# cache\n*.tmp\r\n\n!keep.tmp\n`,
      `sub`,
      `sub/.surgeignore`
    )
    expect(rules.map((rule) => rule.pattern)).toEqual([`*.tmp`, `!keep.tmp`])
    expect(rules.every((rule) => rule.base === `sub`)).toBe(true)
    expect(rules.every((rule) => rule.source === `sub/.surgeignore`)).toBe(
      true
    )
  })
})

describe(`IgnoreRuleSet`, () => {
  it(`should exclude the built-in defaults`, () => {
    const rules = IgnoreRuleSet.create()
    expect(rules.isIgnored(`node_modules`, true)).toBe(true)
    expect(rules.isIgnored(`node_modules/x.js`)).toBe(true)
    expect(rules.isIgnored(`src/node_modules/a.js`)).toBe(true)
    expect(rules.isIgnored(`.git/config`)).toBe(true)
    expect(rules.isIgnored(`.DS_Store`)).toBe(true)
    expect(rules.isIgnored(`backup~`)).toBe(true)
    expect(rules.isIgnored(`index.html`)).toBe(false)
    expect(rules.isIgnored(`css/style.css`)).toBe(false)
  })

  it(`should let the last matching rule win`, () => {
    const rules = IgnoreRuleSet.create([`*.log`, `!keep.log`])
    expect(rules.isIgnored(`debug.log`)).toBe(true)
    expect(rules.isIgnored(`keep.log`)).toBe(false)
    expect(rules.isIgnored(`logs/keep.log`)).toBe(false)
  })

  it(`should apply directory-only rules to directories alone`, () => {
    const rules = IgnoreRuleSet.create([`build/`])
    expect(rules.isIgnored(`build`, true)).toBe(true)
    expect(rules.isIgnored(`build`, false)).toBe(false)
    expect(rules.isIgnored(`build/out.js`)).toBe(true)
  })

  it(`should not re-include a file under an excluded directory`, () => {
    const rules = IgnoreRuleSet.create([`logs/`, `!logs/keep.txt`])
    expect(rules.isIgnored(`logs/keep.txt`)).toBe(true)
  })

  it(`should anchor patterns with a slash to the root`, () => {
    const rules = IgnoreRuleSet.create([`/dist`, `docs/*.md`])
    expect(rules.isIgnored(`dist/app.js`)).toBe(true)
    expect(rules.isIgnored(`src/dist/app.js`)).toBe(false)
    expect(rules.isIgnored(`docs/readme.md`)).toBe(true)
    expect(rules.isIgnored(`other/docs/readme.md`)).toBe(false)
  })

  it(`should match ** across any number of segments`, () => {
    const rules = IgnoreRuleSet.create([`**/tmp/**`])
    expect(rules.isIgnored(`a/tmp/b.txt`)).toBe(true)
    expect(rules.isIgnored(`tmp/b.txt`)).toBe(true)
    expect(rules.isIgnored(`a/temp/b.txt`)).toBe(false)
  })

  it(`should match the contents of dir/** but not the directory itself`, () => {
    const rules = IgnoreRuleSet.create([`assets/**`, `!assets/keep.txt`])
    expect(rules.isIgnored(`assets`, true)).toBe(false)
    expect(rules.isIgnored(`assets/keep.txt`)).toBe(false)
    expect(rules.isIgnored(`assets/logo.png`)).toBe(true)
    expect(rules.isIgnored(`assets/img`, true)).toBe(true)
    expect(rules.isIgnored(`assets/img/keep.txt`)).toBe(true)
  })

  it(`should scope rules from a nested ignore file to its directory`, () => {
    const rules = IgnoreRuleSet.create().extend(
      parseIgnoreFile(`*.tmp\n`, `sub`, `sub/.surgeignore`)
    )
    expect(rules.isIgnored(`sub/a.tmp`)).toBe(true)
    expect(rules.isIgnored(`sub/deep/b.tmp`)).toBe(true)
    expect(rules.isIgnored(`a.tmp`)).toBe(false)
    expect(rules.isIgnored(`other/a.tmp`)).toBe(false)
  })

  it(`should report which rule matched`, () => {
    const rules = IgnoreRuleSet.create([`*.log`])
    expect(rules.match(`x.log`)?.pattern).toBe(`*.log`)
    expect(rules.match(`x.log`)?.source).toBe(`option`)
    expect(rules.match(`.git`, true)?.source).toBe(`default`)
    expect(rules.match(`x.txt`)).toBeUndefined()
  })

  it(`should return the same set when extended with nothing`, () => {
    const rules = IgnoreRuleSet.create()
    expect(rules.extend([])).toBe(rules)
  })
})

describe(`matchSegment`, () => {
  it.each([
    [`*.js`, `app.js`, true],
    [`*.js`, `app.jsx`, false],
    [`*`, ``, true],
    [`a*b*c`, `axxbyyc`, true],
    [`a*b*c`, `axxbyy`, false],
    [`?.txt`, `a.txt`, true],
    [`?.txt`, `ab.txt`, false],
    [`[abc].txt`, `b.txt`, true],
    [`[!abc].txt`, `b.txt`, false],
    [`[!abc].txt`, `d.txt`, true],
    [`[a-c]x`, `cx`, true],
    [`[a-c]x`, `dx`, false],
    [`file[`, `file[`, true],
    [`\\*.txt`, `*.txt`, true],
    [`\\*.txt`, `a.txt`, false],
  ])(`should match %s against %s: %s`, (pattern, text, expected) => {
    expect(matchSegment(pattern, text)).toBe(expected)
  })
})
