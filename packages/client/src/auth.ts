import type { Auth, BasicAuth, TokenAuth } from "./types"

/**
 * Authenticate with an API token.
 */
export function tokenAuth(token: string): TokenAuth {
  return { type: `token`, token }
}

/**
 * Authenticate with an account email and password.
 */
export function basicAuth(username: string, password: string): BasicAuth {
  return { type: `basic`, username, password }
}

/**
 * Build the Authorization header value for a credential.
 */
export function authorizationHeader(auth: Auth): string {
  switch (auth.type) {
    case `token`:
      return `Bearer ${auth.token}`
    case `basic`:
      return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString(`base64`)}`
    default: {
      const exhaustive: never = auth
      throw new TypeError(`Unsupported auth: ${JSON.stringify(exhaustive)}`)
    }
  }
}
