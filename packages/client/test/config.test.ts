import { describe, expect, it } from "vitest"
import { authorizationHeader, basicAuth, tokenAuth } from "../src/auth"
import { createConfig, normalizeBaseUrl } from "../src/config"
import { ConfigError } from "../src/error"

describe(`createConfig`, () => {
  it(`should fill in defaults`, () => {
    const config = createConfig()

    expect(config).toEqual({
      endpoint: `https://surge.surge.sh`,
      version: `0.1.0`,
      timeout: 30,
      insecure: false,
    })
    expect(Object.isFrozen(config)).toBe(true)
  })

  it(`should strip trailing slashes from the endpoint`, () => {
    expect(createConfig({ endpoint: `http://localhost:3000/` }).endpoint).toBe(
      `http://localhost:3000`
    )
  })

  it(`should keep explicit values`, () => {
    expect(
      createConfig({
        endpoint: `https://api.example.test`,
        version: `2.0.0`,
        timeout: 5,
        insecure: true,
      })
    ).toEqual({
      endpoint: `https://api.example.test`,
      version: `2.0.0`,
      timeout: 5,
      insecure: true,
    })
  })

  it(`should reject a non-positive timeout`, () => {
    try {
      createConfig({ timeout: 0 })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(1)
        expect(err.issues[0]).toMatch(/^timeout /)
      }
    }
  })

  it(`should reject endpoints that are not http URLs`, () => {
    try {
      createConfig({ endpoint: `ftp://files.example.test` })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual([
          `endpoint must be an http:// or https:// URL`,
        ])
      }
    }

    expect(() => createConfig({ endpoint: `not a url` })).toThrow(ConfigError)
  })
})

describe(`normalizeBaseUrl`, () => {
  it(`should remove any number of trailing slashes`, () => {
    expect(normalizeBaseUrl(`https://a.test///`)).toBe(`https://a.test`)
    expect(normalizeBaseUrl(`https://a.test/api`)).toBe(`https://a.test/api`)
  })
})

describe(`auth`, () => {
  it(`should send tokens as bearer credentials`, () => {
    const auth = tokenAuth(`test-secret`)
    expect(auth).toEqual({ type: `token`, token: `test-secret` })
    expect(authorizationHeader(auth)).toBe(`Bearer test-secret`)
  })

  it(`should base64-encode basic credentials`, () => {
    const auth = basicAuth(`user@example.com`, `test-secret`)
    expect(auth).toEqual({
      type: `basic`,
      username: `user@example.com`,
      password: `test-secret`,
    })
    expect(authorizationHeader(auth)).toBe(
      `Basic dXNlckBleGFtcGxlLmNvbTp0ZXN0LXNlY3JldA==`
    )
  })
})
