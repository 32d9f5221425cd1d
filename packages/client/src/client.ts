/**
 * SurgeClient - entry point for publishing and account/domain management.
 */

import { readFile } from "node:fs/promises"
import { z } from "zod"
import { createConfig } from "./config"
import {
  ARGV_HEADER,
  NDJSON_CONTENT_TYPE,
  TIMESTAMP_HEADER,
  VERSION_HEADER,
} from "./constants"
import { FilesystemError, HttpError } from "./error"
import { chainAborter } from "./fetch"
import { noopLogger } from "./logger"
import { PublishResponse, publishProject } from "./publish"
import { Transport } from "./transport"
import { resolveHeaders, validateDomain } from "./utils"
import type { Config, ConfigInput } from "./config"
import type { FetchClient } from "./fetch"
import type {
  Auth,
  HeadersRecord,
  Logger,
  PublishOptions,
  PublishTarget,
} from "./types"

/**
 * Options for creating a SurgeClient.
 */
export interface ClientOptions extends ConfigInput {
  /**
   * Custom fetch implementation (for testing).
   */
  fetch?: FetchClient

  /**
   * Sink for diagnostic output. Silent by default.
   */
  logger?: Logger
}

export interface EncryptOptions {
  headers?: HeadersRecord
  argv?: Array<string>
  signal?: AbortSignal
}

const LoginResponseSchema = z.object({
  email: z.string(),
  token: z.string(),
})

export type LoginResponse = z.infer<typeof LoginResponseSchema>

const AccountSchema = z
  .object({
    email: z.string(),
    id: z.string().optional(),
    plan: z.unknown().optional(),
  })
  .passthrough()

export type AccountInfo = z.infer<typeof AccountSchema>

const ListEntrySchema = z
  .object({
    domain: z.string(),
    rev: z.number().optional(),
    email: z.string().optional(),
    timeAgoInWords: z.string().optional(),
  })
  .passthrough()

export type ListEntry = z.infer<typeof ListEntrySchema>

/**
 * Client for the publish API.
 *
 * Instances are immutable and can run concurrent publishes.
 *
 * @example
 * ```typescript
 * const client = new SurgeClient({ logger: createConsoleLogger() })
 * const res = await client.publish(`./dist`, {
 *   domain: `my-site.surge.sh`,
 *   auth: tokenAuth(`test-secret`),
 * })
 * for await (const event of res.events()) {
 *   console.log(formatEvent(event))
 * }
 * ```
 */
export class SurgeClient {
  readonly config: Config

  readonly #transport: Transport
  readonly #logger: Logger

  constructor(options: ClientOptions = {}) {
    const { fetch, logger, ...input } = options
    this.config = createConfig(input)
    this.#logger = logger ?? noopLogger
    this.#transport = new Transport({
      config: this.config,
      fetch,
      logger: this.#logger,
    })
  }

  // ==========================================================================
  // Publish
  // ==========================================================================

  /**
   * Archive `root` and upload it to `target.domain`.
   */
  async publish(
    root: string,
    target: PublishTarget,
    options: PublishOptions = {}
  ): Promise<PublishResponse> {
    return publishProject(this.#transport, root, target, options, this.#logger)
  }

  /**
   * Upload `root` to a throwaway preview domain derived from `target.domain`.
   */
  async publishWip(
    root: string,
    target: PublishTarget,
    options: PublishOptions = {}
  ): Promise<PublishResponse> {
    return this.publish(root, { ...target, isWip: true }, options)
  }

  /**
   * Request a certificate for a domain. Progress arrives as events.
   */
  async encrypt(
    domain: string,
    auth: Auth,
    options: EncryptOptions = {}
  ): Promise<PublishResponse> {
    const target = validateDomain(domain)
    const path = `${target}/encrypt`
    const endpoint = this.config.endpoint

    const aborter = new AbortController()
    const { signal } = chainAborter(aborter, options.signal)

    const response = await this.#transport.request(`PUT`, path, {
      auth,
      accept: NDJSON_CONTENT_TYPE,
      headers: {
        [VERSION_HEADER]: this.config.version,
        [TIMESTAMP_HEADER]: new Date().toISOString(),
        [ARGV_HEADER]: JSON.stringify({
          _: options.argv ?? [],
          e: endpoint,
          endpoint,
        }),
        ...(await resolveHeaders(options.headers)),
      },
      signal,
    })

    return new PublishResponse({
      response,
      url: this.#transport.url(path),
      domain: target,
      isWip: false,
      aborter,
      logger: this.#logger,
    })
  }

  // ==========================================================================
  // Account
  // ==========================================================================

  /**
   * Exchange credentials for an API token.
   */
  async login(auth: Auth): Promise<LoginResponse> {
    const body = await this.#transport.json(`POST`, `token`, { auth })
    return this.#parse(LoginResponseSchema, body, `token`)
  }

  async account(auth: Auth): Promise<AccountInfo> {
    const body = await this.#transport.json(`GET`, `account`, { auth })
    return this.#parse(AccountSchema, body, `account`)
  }

  /**
   * Delete the account and every domain it owns.
   */
  async nuke(auth: Auth): Promise<void> {
    await this.#transport.json(`DELETE`, `account`, { auth })
  }

  async stats(auth: Auth): Promise<unknown> {
    return this.#transport.json(`GET`, `stats`, { auth })
  }

  async plan(plan: unknown, auth: Auth): Promise<void> {
    await this.#transport.json(`PUT`, `plan`, { auth, json: plan })
  }

  async card(card: unknown, auth: Auth): Promise<void> {
    await this.#transport.json(`PUT`, `card`, { auth, json: card })
  }

  /**
   * Available plans, for the account or for one domain.
   */
  async plans(auth: Auth, domain?: string): Promise<unknown> {
    const path = domain ? `${validateDomain(domain)}/plans` : `plans`
    return this.#transport.json(`GET`, path, { auth })
  }

  // ==========================================================================
  // Domains
  // ==========================================================================

  /**
   * Projects owned by the account, or the revisions of one domain.
   */
  async list(auth: Auth, domain?: string): Promise<Array<ListEntry>> {
    const path = domain ? `${validateDomain(domain)}/list` : `list`
    const body = await this.#transport.json(`GET`, path, { auth })
    return this.#parse(z.array(ListEntrySchema), body, path)
  }

  /**
   * Remove a domain and all of its content.
   */
  async teardown(domain: string, auth: Auth): Promise<void> {
    await this.#transport.json(`DELETE`, validateDomain(domain), { auth })
  }

  async rollback(domain: string, auth: Auth): Promise<void> {
    await this.#transport.json(`POST`, `${validateDomain(domain)}/rollback`, {
      auth,
    })
  }

  async rollfore(domain: string, auth: Auth): Promise<void> {
    await this.#transport.json(`POST`, `${validateDomain(domain)}/rollfore`, {
      auth,
    })
  }

  /**
   * Make a revision (the latest when omitted) the live one.
   */
  async cutover(domain: string, auth: Auth, revision?: string): Promise<void> {
    await this.#transport.json(`PUT`, revisionPath(domain, revision), { auth })
  }

  /**
   * Delete a revision (the latest when omitted).
   */
  async discard(domain: string, auth: Auth, revision?: string): Promise<void> {
    await this.#transport.json(`DELETE`, revisionPath(domain, revision), {
      auth,
    })
  }

  async metadata(
    domain: string,
    auth: Auth,
    revision?: string
  ): Promise<unknown> {
    return this.#transport.json(
      `GET`,
      revisionFile(domain, `metadata.json`, revision),
      { auth }
    )
  }

  async manifest(
    domain: string,
    auth: Auth,
    revision?: string
  ): Promise<unknown> {
    return this.#transport.json(
      `GET`,
      revisionFile(domain, `manifest.json`, revision),
      { auth }
    )
  }

  /**
   * Files of the live revision.
   */
  async files(domain: string, auth: Auth): Promise<unknown> {
    return this.manifest(domain, auth)
  }

  async settings(domain: string, settings: unknown, auth: Auth): Promise<void> {
    await this.#transport.json(`PUT`, `${validateDomain(domain)}/settings`, {
      auth,
      json: settings,
    })
  }

  /**
   * Purge the CDN cache for a domain.
   */
  async bust(domain: string, auth: Auth): Promise<void> {
    await this.#transport.json(`DELETE`, `${validateDomain(domain)}/cache`, {
      auth,
    })
  }

  async analytics(domain: string, auth: Auth): Promise<unknown> {
    return this.#transport.json(`GET`, `${validateDomain(domain)}/analytics`, {
      auth,
    })
  }

  async usage(domain: string, auth: Auth): Promise<unknown> {
    return this.#transport.json(`GET`, `${validateDomain(domain)}/usage`, {
      auth,
    })
  }

  async audit(domain: string, auth: Auth): Promise<unknown> {
    return this.#transport.json(`GET`, `${validateDomain(domain)}/audit`, {
      auth,
    })
  }

  async invite(
    domain: string,
    emails: Array<string>,
    auth: Auth
  ): Promise<void> {
    await this.#transport.json(
      `POST`,
      `${validateDomain(domain)}/collaborators`,
      { auth, json: emails }
    )
  }

  async revoke(
    domain: string,
    emails: Array<string>,
    auth: Auth
  ): Promise<void> {
    await this.#transport.json(
      `DELETE`,
      `${validateDomain(domain)}/collaborators`,
      { auth, json: emails }
    )
  }

  // ==========================================================================
  // DNS & Certificates
  // ==========================================================================

  async dns(domain: string, auth: Auth): Promise<unknown> {
    return this.#transport.json(`GET`, `${validateDomain(domain)}/dns`, {
      auth,
    })
  }

  async dnsAdd(domain: string, record: unknown, auth: Auth): Promise<void> {
    await this.#transport.json(`POST`, `${validateDomain(domain)}/dns`, {
      auth,
      json: record,
    })
  }

  async dnsRemove(domain: string, id: string, auth: Auth): Promise<void> {
    await this.#transport.json(
      `DELETE`,
      `${validateDomain(domain)}/dns/${encodeURIComponent(id)}`,
      { auth }
    )
  }

  async zone(domain: string, auth: Auth): Promise<unknown> {
    return this.#transport.json(`GET`, `${validateDomain(domain)}/zone`, {
      auth,
    })
  }

  async zoneAdd(domain: string, record: unknown, auth: Auth): Promise<void> {
    await this.#transport.json(`POST`, `${validateDomain(domain)}/zone`, {
      auth,
      json: record,
    })
  }

  async zoneRemove(domain: string, id: string, auth: Auth): Promise<void> {
    await this.#transport.json(
      `DELETE`,
      `${validateDomain(domain)}/zone/${encodeURIComponent(id)}`,
      { auth }
    )
  }

  async certs(domain: string, auth: Auth): Promise<unknown> {
    return this.#transport.json(`GET`, `${validateDomain(domain)}/certs`, {
      auth,
    })
  }

  /**
   * Upload a PEM bundle (certificate chain and key) for a domain.
   */
  async ssl(domain: string, pemPath: string, auth: Auth): Promise<void> {
    const path = `${validateDomain(domain)}/certs`
    let pem: Buffer
    try {
      pem = await readFile(pemPath)
    } catch (err) {
      throw FilesystemError.fromCause(err, pemPath)
    }
    const response = await this.#transport.request(`POST`, path, {
      auth,
      body: pem,
      contentType: `application/x-pem-file`,
    })
    await response.text()
  }

  /**
   * Release connections held by the client.
   */
  async close(): Promise<void> {
    await this.#transport.close()
  }

  #parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, path: string): T {
    const result = schema.safeParse(body)
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(`.`) || `body`} ${issue.message}`)
        .join(`, `)
      throw new HttpError(
        `Unexpected response from ${this.#transport.url(path)}: ${issues}`,
        this.#transport.url(path)
      )
    }
    return result.data
  }
}

function revisionPath(domain: string, revision?: string): string {
  const base = `${validateDomain(domain)}/rev`
  return revision ? `${base}/${encodeURIComponent(revision)}` : base
}

function revisionFile(domain: string, file: string, revision?: string): string {
  const base = validateDomain(domain)
  return revision
    ? `${base}/${encodeURIComponent(revision)}/${file}`
    : `${base}/${file}`
}
