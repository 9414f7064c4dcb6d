/**
 * Tests for endpoint.ts
 */

import { describe, it, expect } from 'vitest'
import { normalizeBaseUrl, validateToken, resolveEndpoint } from '../../src/lib/endpoint.js'
import { InsecureTransportError, InvalidArgumentError, InvalidCredentialError, NotConfiguredError } from '../../src/lib/errors.js'

describe('endpoint', () => {
  describe('normalizeBaseUrl', () => {
    it('should trim whitespace and trailing slashes', () => {
      expect(normalizeBaseUrl('  https://store.example.test/// ')).toBe('https://store.example.test')
    })

    it('should allow http on loopback hosts', () => {
      expect(normalizeBaseUrl('http://localhost:8080')).toBe('http://localhost:8080')
      expect(normalizeBaseUrl('http://127.0.0.1:8080/')).toBe('http://127.0.0.1:8080')
      expect(normalizeBaseUrl('http://[::1]:8080')).toBe('http://[::1]:8080')
    })

    it('should refuse plain http to other hosts', () => {
      expect(() => normalizeBaseUrl('http://store.example.test')).toThrow(InsecureTransportError)
    })

    it('should accept plain http when explicitly allowed', () => {
      expect(normalizeBaseUrl('http://store.example.test', true)).toBe('http://store.example.test')
    })

    it('should refuse other schemes even when insecure http is allowed', () => {
      expect(() => normalizeBaseUrl('ftp://store.example.test', true)).toThrow(InsecureTransportError)
    })

    it('should require a value', () => {
      expect(() => normalizeBaseUrl('   ')).toThrow(NotConfiguredError)
    })

    it('should reject unparseable urls', () => {
      expect(() => normalizeBaseUrl('not a url')).toThrow(InvalidArgumentError)
    })
  })

  describe('validateToken', () => {
    it('should return the trimmed token', () => {
      expect(validateToken('  test-token ')).toBe('test-token')
    })

    it('should require a token', () => {
      expect(() => validateToken('')).toThrow(NotConfiguredError)
    })

    it('should accept 256 characters and reject 257', () => {
      expect(validateToken('a'.repeat(256))).toHaveLength(256)
      expect(() => validateToken('a'.repeat(257))).toThrow('invalid token: token is too long')
    })

    it('should reject inner whitespace and control characters', () => {
      expect(() => validateToken('test token')).toThrow(InvalidCredentialError)
      expect(() => validateToken('test\u0007token')).toThrow(InvalidCredentialError)
      expect(() => validateToken('test\u007ftoken')).toThrow(InvalidCredentialError)
    })
  })

  describe('resolveEndpoint', () => {
    it('should combine settings with the default timeout', () => {
      expect(resolveEndpoint({ base_url: 'https://store.example.test/', token: 'test-token' })).toEqual({
        baseUrl: 'https://store.example.test',
        token: 'test-token',
        timeoutMs: 15000,
        allowInsecureHttp: false
      })
    })

    it('should prefer overrides to settings', () => {
      const endpoint = resolveEndpoint(
        { base_url: 'https://a.example.test', token: 'test-token', timeout_seconds: 30 },
        { baseUrl: 'https://b.example.test', token: 'other-token', timeoutSeconds: 5 }
      )
      expect(endpoint.baseUrl).toBe('https://b.example.test')
      expect(endpoint.token).toBe('other-token')
      expect(endpoint.timeoutMs).toBe(5000)
    })

    it('should use the configured timeout when no override is given', () => {
      expect(resolveEndpoint({ base_url: 'https://a.example.test', token: 'test-token', timeout_seconds: 30 }).timeoutMs).toBe(30000)
    })

    it('should honor allow_insecure_http', () => {
      const endpoint = resolveEndpoint({ base_url: 'http://store.example.test', token: 'test-token', allow_insecure_http: true })
      expect(endpoint.baseUrl).toBe('http://store.example.test')
      expect(endpoint.allowInsecureHttp).toBe(true)
    })
  })
})
