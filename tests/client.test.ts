/**
 * Tests for client.ts
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createHash } from 'node:crypto'
import { SunClient, decodeError, retryDelayMs, revisionOf, shouldRetryStatus } from '../src/client.js'
import type { RetryEvent } from '../src/client.js'
import {
  AccessDeniedByEdgeError,
  InsecureTransportError,
  MalformedResponseError,
  ReadinessError,
  RemoteError,
  RevisionConflictError,
  TransportError
} from '../src/lib/errors.js'
import { FakeStore, TEST_BASE_URL, TEST_TOKEN } from './helpers/fake-store.js'

describe('client', () => {
  describe('retryDelayMs', () => {
    it('should double from 200ms and cap at 2s', () => {
      expect(retryDelayMs(1)).toBe(200)
      expect(retryDelayMs(2)).toBe(400)
      expect(retryDelayMs(3)).toBe(800)
      expect(retryDelayMs(5)).toBe(2000)
    })

    it('should honor Retry-After seconds up to the cap', () => {
      expect(retryDelayMs(1, '1')).toBe(1000)
      expect(retryDelayMs(1, '120')).toBe(2000)
    })

    it('should honor Retry-After dates', () => {
      const now = Date.parse('2026-03-01T00:00:00Z')
      expect(retryDelayMs(1, 'Sun, 01 Mar 2026 00:00:01 GMT', now)).toBe(1000)
      expect(retryDelayMs(3, 'Sat, 28 Feb 2026 00:00:00 GMT', now)).toBe(0)
    })

    it('should fall back to backoff for unparseable values', () => {
      expect(retryDelayMs(2, 'soon')).toBe(400)
    })
  })

  describe('shouldRetryStatus', () => {
    it('should retry throttling and server errors only', () => {
      expect([408, 425, 429, 500, 503, 599].map(shouldRetryStatus)).toEqual([true, true, true, true, true, true])
      expect([400, 401, 403, 404, 409, 422].map(shouldRetryStatus)).toEqual([false, false, false, false, false, false])
    })
  })

  describe('decodeError', () => {
    it('should use the error envelope', () => {
      const err = decodeError(404, '{"error":" object not found "}')
      expect(err).toBeInstanceOf(RemoteError)
      expect(err.message).toBe('object not found (status 404)')
      expect(err.exitCode).toBe(5)
    })

    it('should map 409 to a revision conflict', () => {
      const err = decodeError(409, '{"error":"stale"}')
      expect(err).toBeInstanceOf(RevisionConflictError)
      expect(err.message).toBe('stale (status 409)')
      expect(err.exitCode).toBe(6)
    })

    it('should detect edge denials', () => {
      const err = decodeError(403, '<html>error code: 1010</html>')
      expect(err).toBeInstanceOf(AccessDeniedByEdgeError)
      expect(err.code).toBe('ACCESS_DENIED_BY_EDGE')
    })

    it('should fall back to the body text, then the status text', () => {
      expect(decodeError(418, 'plain text').message).toBe('plain text (status 418)')
      expect(decodeError(502, '').message).toBe('Bad Gateway (status 502)')
    })
  })

  describe('construction', () => {
    it('should refuse plain http to remote hosts', () => {
      expect(() => new SunClient({ baseUrl: 'http://store.example.test', token: TEST_TOKEN })).toThrow(
        InsecureTransportError
      )
    })

    it('should allow plain http when asked', () => {
      const client = new SunClient({ baseUrl: 'http://store.example.test', token: TEST_TOKEN, allowInsecureHttp: true })
      expect(client.baseUrl).toBe('http://store.example.test')
    })

    it('should trim trailing slashes from the base url', () => {
      expect(new SunClient({ baseUrl: 'https://store.example.test/', token: TEST_TOKEN }).baseUrl).toBe(
        'https://store.example.test'
      )
    })
  })

  describe('requests', () => {
    let store: FakeStore
    let retries: RetryEvent[]
    let client: SunClient

    beforeEach(() => {
      store = new FakeStore()
      retries = []
      client = store.client({ onRetry: event => retries.push(event) })
    })

    it('should send the bearer token', async () => {
      const who = await client.whoAmI()

      expect(who).toEqual({
        account_id: 'acct-1',
        account_slug: 'test-account',
        token_id: 'tok-test',
        scopes: ['objects:read', 'objects:write']
      })
      expect(store.requests[0].authorization).toBe('Bearer test-token')
    })

    it('should surface auth failures without retrying', async () => {
      const other = store.client({ token: 'wrong-token' })

      await expect(other.whoAmI()).rejects.toThrow('unauthorized (status 401)')
      expect(store.requests).toHaveLength(1)
    })

    it('should retry server errors with backoff', async () => {
      store.failNext({ status: 503 }, 3)

      await client.whoAmI()

      expect(store.requests).toHaveLength(4)
      expect(retries).toEqual([
        { method: 'GET', path: '/v1/auth/whoami', attempt: 1, delayMs: 200, reason: 'status 503' },
        { method: 'GET', path: '/v1/auth/whoami', attempt: 2, delayMs: 400, reason: 'status 503' },
        { method: 'GET', path: '/v1/auth/whoami', attempt: 3, delayMs: 800, reason: 'status 503' }
      ])
    })

    it('should honor Retry-After on 429', async () => {
      store.failNext({ status: 429, retryAfter: '1' })

      await client.whoAmI()

      expect(retries.map(event => event.delayMs)).toEqual([1000])
    })

    it('should give up after four attempts', async () => {
      store.failNext({ status: 500 }, 4)

      await expect(client.whoAmI()).rejects.toThrow('injected failure (status 500)')
      expect(store.requests).toHaveLength(4)
      expect(retries).toHaveLength(3)
    })

    it('should wrap repeated transport failures', async () => {
      const sleep = vi.fn(async () => {})
      const sleepy = store.client({ sleep })
      store.failNext({ transport: true }, 4)

      const err = await sleepy.whoAmI().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(TransportError)
      expect(err).toMatchObject({
        code: 'TRANSPORT_ERROR',
        message: `GET ${TEST_BASE_URL}/v1/auth/whoami failed: fetch failed`
      })
      expect(store.requests).toHaveLength(4)
      expect(sleep).toHaveBeenCalledTimes(3)
    })

    it('should not retry client errors', async () => {
      store.failNext({ status: 400, body: '{"error":"bad request body"}' })

      await expect(client.whoAmI()).rejects.toThrow('bad request body (status 400)')
      expect(store.requests).toHaveLength(1)
    })

    it('should report edge denials', async () => {
      store.failNext({ status: 403, body: 'error code: 1010' })

      await expect(client.whoAmI()).rejects.toBeInstanceOf(AccessDeniedByEdgeError)
    })

    it('should round-trip an object', async () => {
      const put = await client.putObject('doc', 'notes', {
        payload: 'hello',
        contentType: ' text/plain ',
        metadata: { path: 'notes.txt' }
      })

      expect(revisionOf(put)).toBe(1)
      const [request] = store.requestsTo('PUT', '/v1/objects/doc/notes')
      expect(JSON.parse(request.body ?? '')).toEqual({
        content_type: 'text/plain',
        payload_base64: 'aGVsbG8=',
        metadata: { path: 'notes.txt' }
      })

      expect((await client.getPayload('doc', 'notes')).toString('utf8')).toBe('hello')
      expect(await client.listRevisions('doc', 'notes')).toEqual([
        {
          revision: 1,
          checksum: createHash('sha256').update('hello').digest('hex'),
          content_type: 'text/plain',
          size_bytes: 5,
          metadata: { path: 'notes.txt' },
          created_at: '2026-03-01T00:00:01.000Z'
        }
      ])
    })

    it('should send expected_revision and surface conflicts without retrying', async () => {
      store.put('doc', 'notes', 'v1')

      const err = await client
        .putObject('doc', 'notes', { payload: 'v2', contentType: 'text/plain', expectedRevision: 0 })
        .catch((e: unknown) => e)

      expect(err).toBeInstanceOf(RevisionConflictError)
      expect(err).toMatchObject({ message: 'revision conflict: expected 0, latest 1 (status 409)' })
      expect(store.requestsTo('PUT', '/v1/objects/doc/notes')).toHaveLength(1)
      expect(retries).toEqual([])
    })

    it('should accept a matching expected_revision', async () => {
      store.put('doc', 'notes', 'v1')

      const put = await client.putObject('doc', 'notes', { payload: 'v2', contentType: 'text/plain', expectedRevision: 1 })

      expect(revisionOf(put)).toBe(2)
      expect(store.payload('doc', 'notes')?.toString('utf8')).toBe('v2')
    })

    it('should look up objects by name case-insensitively', async () => {
      store.put('doc', 'team-notes-old', 'y')
      store.put('doc', 'Team-Notes', 'x')

      const meta = await client.lookupObjectMeta('doc', 'TEAM-NOTES')

      expect(meta?.name).toBe('Team-Notes')
      expect(meta?.latest_revision).toBe(1)
      expect(store.requests.map(req => req.path)).toEqual(['/v1/objects?kind=doc&name=TEAM-NOTES&limit=5'])
      expect(await client.lookupObjectMeta('doc', 'missing')).toBeNull()
    })

    it('should filter listings by kind', async () => {
      store.put('doc', 'a', '1')
      store.put('other', 'b', '2')

      const items = await client.listObjects('doc')

      expect(items.map(item => `${item.kind}/${item.name}`)).toEqual(['doc/a'])
    })

    it('should issue, list and revoke tokens', async () => {
      const issued = await client.createToken(' ci ', ['objects:read'], 24)

      expect(issued).toEqual({
        account: { id: 'acct-1', slug: 'test-account' },
        token: 'test-issued-1',
        token_id: 'tok-1',
        label: 'ci',
        scopes: ['objects:read'],
        expires_at: '2026-03-02T00:00:01.000Z',
        issued_at: '2026-03-01T00:00:01.000Z'
      })
      expect((await client.listTokens(false)).map(token => token.token_id)).toEqual(['tok-1'])

      await client.revokeToken('tok-1')

      expect(await client.listTokens(false)).toEqual([])
      const all = await client.listTokens(true)
      expect(all[0].revoked_at).toBe('2026-03-01T00:00:02.000Z')
    })

    it('should list audit events with filters', async () => {
      await client.putObject('doc', 'notes', { payload: 'x', contentType: 'text/plain' })

      const events = await client.listAuditEvents({ action: 'object.put', kind: 'doc' }, 10)

      expect(events).toEqual([
        {
          id: 1,
          token_id: 'tok-test',
          action: 'object.put',
          kind: 'doc',
          name: 'notes',
          revision: 1,
          created_at: '2026-03-01T00:00:02.000Z'
        }
      ])
      expect(store.requests[1].path).toBe('/v1/audit?action=object.put&kind=doc&limit=10')
      expect(await client.listAuditEvents({ action: 'token.create' })).toEqual([])
    })

    it('should check readiness without retrying', async () => {
      await expect(client.ready()).resolves.toBeUndefined()

      store.failNext({ status: 503 })
      const err = await client.ready().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ReadinessError)
      expect(err).toMatchObject({ message: 'readiness check failed: injected failure (status 503)' })
      expect(store.requestsTo('GET', '/v1/readyz')).toHaveLength(2)
    })

    it('should reject bodies that are not JSON', async () => {
      const broken = new SunClient({
        baseUrl: TEST_BASE_URL,
        token: TEST_TOKEN,
        fetch: async () => new Response('not json', { status: 200 })
      })

      const err = await broken.whoAmI().catch((e: unknown) => e)
      expect(err).toBeInstanceOf(MalformedResponseError)
      expect(err).toMatchObject({ code: 'MALFORMED_RESPONSE' })
    })

    it('should reject bodies with the wrong shape', async () => {
      const broken = new SunClient({
        baseUrl: TEST_BASE_URL,
        token: TEST_TOKEN,
        fetch: async () => new Response('{"items":"nope"}', { status: 200 })
      })

      await expect(broken.listObjects('doc')).rejects.toThrow(
        'malformed response for list objects: items: Expected array, received string'
      )
    })
  })
})
