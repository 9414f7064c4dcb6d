/**
 * Sun Client - typed access to the versioned object store
 *
 * Every request carries the bearer token, retries transport failures and
 * 408/425/429/5xx responses up to four attempts (honoring Retry-After, capped
 * at 2s), and surfaces 409 as RevisionConflictError so callers can re-read.
 */

import { STATUS_CODES } from 'node:http'
import { z } from 'zod'
import type {
  AuditEvent,
  AuditFilter,
  IssuedToken,
  ObjectMeta,
  ObjectMetadata,
  ObjectRevision,
  PutResult,
  TokenRecord,
  WhoAmI
} from './types.js'
import {
  AccessDeniedByEdgeError,
  MalformedResponseError,
  ReadinessError,
  RemoteError,
  RevisionConflictError,
  SunError,
  TransportError
} from './lib/errors.js'
import { normalizeBaseUrl, validateToken, DEFAULT_TIMEOUT_SECONDS } from './lib/endpoint.js'
import { abortReason, sleep as defaultSleep } from './lib/timeout.js'
import {
  formatIssues,
  jsonValueSchema,
  looseNumber,
  looseString,
  looseStringList,
  optionalJsonObject,
  optionalNumber,
  optionalString,
  tryParseJson
} from './lib/schema-utils.js'

export const MAX_ATTEMPTS = 4
export const RETRY_BASE_DELAY_MS = 200
export const RETRY_MAX_DELAY_MS = 2000

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface RetryEvent {
  method: string
  path: string
  attempt: number
  delayMs: number
  reason: string
}

export interface SunClientOptions {
  baseUrl: string
  token: string
  /** Per-request timeout (default 15s) */
  timeoutMs?: number
  /** Allow plain http to non-loopback hosts */
  allowInsecureHttp?: boolean
  /** Transport, defaults to global fetch */
  fetch?: FetchLike
  /** Backoff sleeper, replaceable in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  onRetry?: (event: RetryEvent) => void
}

export interface RequestOptions {
  signal?: AbortSignal
}

export interface PutObjectInput {
  payload: Uint8Array | string
  contentType: string
  metadata?: ObjectMetadata
  /** Omit to create; pass the observed latest_revision to compare-and-swap */
  expectedRevision?: number
}

// =============================================================================
// Wire schemas
// =============================================================================

const orEmpty = (value: unknown): unknown => (value === null || value === undefined ? {} : value)
const orEmptyList = (value: unknown): unknown => (value === null || value === undefined ? [] : value)

const errorBodySchema = z.object({ error: z.string() })

const whoAmISchema = z.object({
  account_id: looseString,
  account_slug: looseString,
  token_id: looseString,
  scopes: looseStringList
})

const objectMetaSchema = z.object({
  kind: looseString,
  name: looseString,
  latest_revision: looseNumber,
  checksum: looseString,
  content_type: looseString,
  size_bytes: looseNumber,
  metadata: optionalJsonObject,
  created_at: looseString,
  updated_at: looseString
})

const objectRevisionSchema = z.object({
  revision: looseNumber,
  checksum: looseString,
  content_type: looseString,
  size_bytes: looseNumber,
  metadata: optionalJsonObject,
  created_at: looseString
})

const putResultSchema = z.object({
  result: z.preprocess(
    orEmpty,
    z.object({
      object: z.preprocess(orEmpty, z.object({ latest_revision: looseNumber })),
      revision: z.preprocess(orEmpty, z.object({ revision: looseNumber }))
    })
  )
})

const tokenRecordSchema = z.object({
  token_id: looseString,
  label: looseString,
  scopes: looseStringList,
  expires_at: optionalString,
  revoked_at: optionalString,
  created_at: looseString,
  last_used_at: optionalString
})

const issuedTokenSchema = z.object({
  account: z.preprocess(orEmpty, z.object({ id: looseString, slug: looseString })),
  token: looseString,
  token_id: looseString,
  label: looseString,
  scopes: looseStringList,
  expires_at: optionalString,
  issued_at: looseString
})

const auditEventSchema = z.object({
  id: looseNumber,
  token_id: optionalString,
  action: looseString,
  kind: looseString,
  name: looseString,
  revision: optionalNumber,
  details: optionalJsonObject,
  created_at: looseString
})

const itemsOf = <T extends z.ZodTypeAny>(item: T) =>
  z.object({ items: z.preprocess(orEmptyList, z.array(item)) })

const registryResponseSchema = z.object({ registry: looseString, index: jsonValueSchema.optional() })
const shardResponseSchema = z.object({ registry: looseString, shard: looseString, payload: jsonValueSchema.optional() })

// =============================================================================
// Helpers
// =============================================================================

/**
 * Delay before the retry that follows `attempt` (1-indexed)
 *
 * Retry-After as seconds or an HTTP date wins; otherwise 200ms doubling per
 * attempt. Always capped at 2s.
 */
export function retryDelayMs(attempt: number, retryAfter = '', now: number = Date.now()): number {
  const value = retryAfter.trim()
  if (value !== '') {
    if (/^\d+$/.test(value)) {
      return Math.min(Number(value) * 1000, RETRY_MAX_DELAY_MS)
    }
    const retryAt = Date.parse(value)
    if (!Number.isNaN(retryAt)) {
      return Math.min(Math.max(retryAt - now, 0), RETRY_MAX_DELAY_MS)
    }
  }
  const exponent = Math.max(attempt, 1) - 1
  return Math.min(RETRY_BASE_DELAY_MS * 2 ** exponent, RETRY_MAX_DELAY_MS)
}

export function shouldRetryStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || (status >= 500 && status <= 599)
}

/**
 * Map a non-2xx response body to a typed error
 */
export function decodeError(status: number, body: string): SunError {
  const trimmed = body.trim()
  const parsed = tryParseJson(trimmed)
  let message = ''
  if (parsed.ok) {
    const envelope = errorBodySchema.safeParse(parsed.value)
    if (envelope.success) message = envelope.data.error.trim()
  }
  if (message === '' && status === 403 && trimmed.toLowerCase().includes('error code: 1010')) {
    return new AccessDeniedByEdgeError()
  }
  if (message === '') {
    message = trimmed || STATUS_CODES[status] || 'request failed'
  }
  if (status === 409) {
    return new RevisionConflictError(message)
  }
  return new RemoteError(status, message)
}

/**
 * Revision assigned by a put: the object's latest revision, else the revision record
 */
export function revisionOf(result: PutResult): number {
  return result.result.object.latest_revision > 0
    ? result.result.object.latest_revision
    : result.result.revision.revision
}

function describeFailure(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function objectPath(kind: string, name: string): string {
  return `/v1/objects/${encodeURIComponent(kind)}/${encodeURIComponent(name)}`
}

function registryPath(registry: string): string {
  return `/v1/integrations/registries/${encodeURIComponent(registry.trim())}`
}

function withQuery(path: string, params: URLSearchParams): string {
  const encoded = params.toString()
  return encoded === '' ? path : `${path}?${encoded}`
}

// =============================================================================
// Client
// =============================================================================

/**
 * Sun Client
 *
 * Safe for concurrent callers: it holds no per-request state.
 */
export class SunClient {
  readonly baseUrl: string
  private readonly token: string
  private readonly timeoutMs: number
  private readonly fetchImpl: FetchLike
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly onRetry?: (event: RetryEvent) => void

  constructor(options: SunClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl, options.allowInsecureHttp ?? false)
    this.token = validateToken(options.token)
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : DEFAULT_TIMEOUT_SECONDS * 1000
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
    this.sleep = options.sleep ?? defaultSleep
    this.onRetry = options.onRetry
  }

  /**
   * Readiness check. Unauthenticated and not retried.
   */
  async ready(options: RequestOptions = {}): Promise<void> {
    let response: Response
    try {
      response = await this.fetchImpl(`${this.baseUrl}/v1/readyz`, {
        method: 'GET',
        signal: this.requestSignal(options.signal)
      })
    } catch (err) {
      throw new ReadinessError(describeFailure(err), err)
    }
    if (!response.ok) {
      const error = decodeError(response.status, await response.text())
      throw new ReadinessError(error.message, error)
    }
  }

  async whoAmI(options: RequestOptions = {}): Promise<WhoAmI> {
    const body = await this.request('GET', '/v1/auth/whoami', undefined, options)
    return this.decode(body, whoAmISchema, 'whoami')
  }

  async listObjects(
    kind: string,
    name = '',
    limit = 0,
    options: RequestOptions = {}
  ): Promise<ObjectMeta[]> {
    const params = new URLSearchParams()
    if (kind.trim() !== '') params.set('kind', kind.trim())
    if (name.trim() !== '') params.set('name', name.trim())
    if (limit > 0) params.set('limit', String(limit))
    const body = await this.request('GET', withQuery('/v1/objects', params), undefined, options)
    return this.decode(body, itemsOf(objectMetaSchema), 'list objects').items
  }

  /**
   * Metadata of one object, matched case-insensitively by name, or null
   */
  async lookupObjectMeta(kind: string, name: string, options: RequestOptions = {}): Promise<ObjectMeta | null> {
    const needle = name.trim().toLowerCase()
    const items = await this.listObjects(kind, name, 5, options)
    return items.find(item => item.name.trim().toLowerCase() === needle) ?? null
  }

  async listRevisions(kind: string, name: string, limit = 0, options: RequestOptions = {}): Promise<ObjectRevision[]> {
    const params = new URLSearchParams()
    if (limit > 0) params.set('limit', String(limit))
    const body = await this.request('GET', withQuery(`${objectPath(kind, name)}/revisions`, params), undefined, options)
    return this.decode(body, itemsOf(objectRevisionSchema), 'list revisions').items
  }

  /**
   * Raw bytes of the current revision
   */
  async getPayload(kind: string, name: string, options: RequestOptions = {}): Promise<Buffer> {
    return this.request('GET', `${objectPath(kind, name)}/payload`, undefined, options)
  }

  async putObject(kind: string, name: string, input: PutObjectInput, options: RequestOptions = {}): Promise<PutResult> {
    const request: Record<string, unknown> = {
      content_type: input.contentType.trim(),
      payload_base64: Buffer.from(input.payload).toString('base64')
    }
    if (input.metadata && Object.keys(input.metadata).length > 0) {
      request.metadata = input.metadata
    }
    if (input.expectedRevision !== undefined) {
      request.expected_revision = input.expectedRevision
    }
    const body = await this.request('PUT', objectPath(kind, name), request, options)
    return this.decode(body, putResultSchema, 'put object')
  }

  async listTokens(includeRevoked: boolean, limit = 0, options: RequestOptions = {}): Promise<TokenRecord[]> {
    const params = new URLSearchParams({ include_revoked: String(includeRevoked) })
    if (limit > 0) params.set('limit', String(limit))
    const body = await this.request('GET', withQuery('/v1/tokens', params), undefined, options)
    return this.decode(body, itemsOf(tokenRecordSchema), 'list tokens').items
  }

  async createToken(
    label: string,
    scopes: string[],
    expiresInHours = 0,
    options: RequestOptions = {}
  ): Promise<IssuedToken> {
    const request: Record<string, unknown> = { label: label.trim(), scopes }
    if (expiresInHours > 0) {
      request.expires_in_hours = expiresInHours
    }
    const body = await this.request('POST', '/v1/tokens', request, options)
    return this.decode(body, issuedTokenSchema, 'create token')
  }

  async revokeToken(tokenId: string, options: RequestOptions = {}): Promise<void> {
    await this.request('POST', `/v1/tokens/${encodeURIComponent(tokenId.trim())}/revoke`, {}, options)
  }

  async listAuditEvents(filter: AuditFilter = {}, limit = 0, options: RequestOptions = {}): Promise<AuditEvent[]> {
    const params = new URLSearchParams()
    for (const key of ['action', 'kind', 'name'] as const) {
      const value = filter[key]?.trim()
      if (value) params.set(key, value)
    }
    if (limit > 0) params.set('limit', String(limit))
    const body = await this.request('GET', withQuery('/v1/audit', params), undefined, options)
    return this.decode(body, itemsOf(auditEventSchema), 'audit events').items
  }

  /**
   * Gateway index document as stored. Null when the response carries none.
   */
  async getGatewayIndex(registry: string, options: RequestOptions = {}): Promise<unknown> {
    const body = await this.request('GET', registryPath(registry), undefined, options)
    const parsed = this.decode(body, registryResponseSchema, 'gateway index')
    return parsed.index ?? null
  }

  async putGatewayIndex(
    registry: string,
    payload: unknown,
    expectedRevision?: number,
    options: RequestOptions = {}
  ): Promise<PutResult> {
    const request: Record<string, unknown> = { payload }
    if (expectedRevision !== undefined) request.expected_revision = expectedRevision
    const body = await this.request('PUT', registryPath(registry), request, options)
    return this.decode(body, putResultSchema, 'put gateway index')
  }

  /**
   * Gateway shard document as stored. Null when the response carries none.
   */
  async getGatewayShard(registry: string, shard: string, options: RequestOptions = {}): Promise<unknown> {
    const path = `${registryPath(registry)}/shards/${encodeURIComponent(shard.trim())}`
    const body = await this.request('GET', path, undefined, options)
    const parsed = this.decode(body, shardResponseSchema, 'gateway shard')
    return parsed.payload ?? null
  }

  async putGatewayShard(
    registry: string,
    shard: string,
    payload: unknown,
    expectedRevision?: number,
    options: RequestOptions = {}
  ): Promise<PutResult> {
    const request: Record<string, unknown> = { payload }
    if (expectedRevision !== undefined) request.expected_revision = expectedRevision
    const path = `${registryPath(registry)}/shards/${encodeURIComponent(shard.trim())}`
    const body = await this.request('PUT', path, request, options)
    return this.decode(body, putResultSchema, 'put gateway shard')
  }

  // ===========================================================================
  // Transport
  // ===========================================================================

  private requestSignal(parent?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs)
    return parent ? AbortSignal.any([parent, timeout]) : timeout
  }

  private async backoff(
    method: string,
    path: string,
    attempt: number,
    retryAfter: string,
    reason: string,
    signal?: AbortSignal
  ): Promise<void> {
    const delayMs = retryDelayMs(attempt, retryAfter)
    this.onRetry?.({ method, path, attempt, delayMs, reason })
    await this.sleep(delayMs, signal)
  }

  /**
   * Authenticated request with retries; returns the 2xx body
   */
  private async request(
    method: string,
    path: string,
    payload: unknown,
    options: RequestOptions
  ): Promise<Buffer> {
    const url = `${this.baseUrl}${path}`
    const encoded = payload === undefined ? undefined : JSON.stringify(payload)
    const headers: Record<string, string> = { Authorization: `Bearer ${this.token}` }
    if (encoded !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    let lastError: unknown
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const hasMoreAttempts = attempt < MAX_ATTEMPTS

      let response: Response
      try {
        response = await this.fetchImpl(url, {
          method,
          headers,
          body: encoded,
          signal: this.requestSignal(options.signal)
        })
      } catch (err) {
        if (options.signal?.aborted) throw abortReason(options.signal)
        lastError = err
        if (!hasMoreAttempts) break
        await this.backoff(method, path, attempt, '', describeFailure(err), options.signal)
        continue
      }

      if (!response.ok) {
        const retryAfter = response.headers.get('retry-after') ?? ''
        if (hasMoreAttempts && shouldRetryStatus(response.status)) {
          // Drain so the connection can be reused
          await response.arrayBuffer().catch(() => undefined)
          await this.backoff(method, path, attempt, retryAfter, `status ${response.status}`, options.signal)
          continue
        }
        throw decodeError(response.status, await response.text().catch(() => ''))
      }

      try {
        return Buffer.from(await response.arrayBuffer())
      } catch (err) {
        if (options.signal?.aborted) throw abortReason(options.signal)
        lastError = err
        if (!hasMoreAttempts) break
        await this.backoff(method, path, attempt, '', describeFailure(err), options.signal)
      }
    }

    throw new TransportError(method, url, lastError ?? new Error('request failed'))
  }

  private decode<T extends z.ZodTypeAny>(body: Buffer, schema: T, what: string): z.output<T> {
    const parsed = tryParseJson(body.toString('utf8'))
    if (!parsed.ok) {
      throw new MalformedResponseError(what, parsed.error)
    }
    const result = schema.safeParse(parsed.value)
    if (!result.success) {
      throw new MalformedResponseError(what, new Error(formatIssues(result.error)))
    }
    return result.data
  }
}

export function createClient(options: SunClientOptions): SunClient {
  return new SunClient(options)
}

export default SunClient
