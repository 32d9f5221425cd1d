/**
 * Client configuration: endpoint, version, timeout and TLS policy.
 */

import { z } from "zod"
import {
  DEFAULT_CLIENT_VERSION,
  DEFAULT_TIMEOUT_SECS,
  SURGE_API,
} from "./constants"
import { ConfigError } from "./error"

const ConfigSchema = z.object({
  endpoint: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), {
      message: `must be an http:// or https:// URL`,
    })
    .default(SURGE_API),
  version: z.string().min(1).default(DEFAULT_CLIENT_VERSION),
  timeout: z.number().positive().finite().default(DEFAULT_TIMEOUT_SECS),
  insecure: z.boolean().default(false),
})

export type ConfigInput = z.input<typeof ConfigSchema>

/**
 * Validated, immutable client configuration.
 */
export interface Config {
  /**
   * Base URL of the API, without a trailing slash.
   */
  readonly endpoint: string

  /**
   * Client version announced to the server.
   */
  readonly version: string

  /**
   * Seconds to wait for response headers.
   */
  readonly timeout: number

  /**
   * Disable TLS certificate validation. Test endpoints only.
   */
  readonly insecure: boolean
}

/**
 * Validate configuration input and fill in defaults.
 *
 * @throws {ConfigError} listing every invalid field
 */
export function createConfig(input: ConfigInput = {}): Config {
  const result = ConfigSchema.safeParse(input)

  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration`,
      result.error.issues.map(
        (issue) => `${issue.path.join(`.`) || `config`} ${issue.message}`
      )
    )
  }

  return Object.freeze({
    ...result.data,
    endpoint: normalizeBaseUrl(result.data.endpoint),
  })
}

/**
 * Remove trailing slashes so paths can be appended with a single `/`.
 */
export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, ``)
}
