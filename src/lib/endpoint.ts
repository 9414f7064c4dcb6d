/**
 * Endpoint resolution: base URL, bearer token and timeout from settings
 */

import type { SunSettings } from '../types.js'
import { InsecureTransportError, InvalidArgumentError, InvalidCredentialError, NotConfiguredError } from './errors.js'

export const DEFAULT_TIMEOUT_SECONDS = 15
export const MAX_TOKEN_CHARS = 256

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '::1'])

export interface Endpoint {
  baseUrl: string
  token: string
  timeoutMs: number
  allowInsecureHttp: boolean
}

export interface EndpointOverrides {
  baseUrl?: string
  token?: string
  timeoutSeconds?: number
}

/**
 * Trim, drop the trailing slash and enforce https for non-loopback hosts
 */
export function normalizeBaseUrl(raw: string, allowInsecureHttp = false): string {
  const baseUrl = raw.trim().replace(/\/+$/, '')
  if (baseUrl === '') {
    throw new NotConfiguredError(
      'base url is required (set sun.base_url or SUN_BASE_URL)',
      'Add sun.base_url to .sun/config.yaml'
    )
  }

  let parsed: URL
  try {
    parsed = new URL(baseUrl)
  } catch (err) {
    throw new InvalidArgumentError(`invalid base url "${baseUrl}"`, { cause: err })
  }
  if (parsed.host === '') {
    throw new InvalidArgumentError(`invalid base url "${baseUrl}"`)
  }

  if (!allowsTransport(parsed, allowInsecureHttp)) {
    throw new InsecureTransportError(
      'base url must use https for non-local hosts (set SUN_ALLOW_INSECURE_HTTP=1 to override)',
      baseUrl
    )
  }
  return baseUrl
}

function allowsTransport(url: URL, allowInsecureHttp: boolean): boolean {
  if (url.protocol === 'https:') return true
  if (url.protocol !== 'http:') return false
  if (allowInsecureHttp) return true
  // URL keeps IPv6 hosts bracketed
  const host = url.hostname.toLowerCase().replace(/^\[(.*)\]$/, '$1')
  return LOOPBACK_HOSTS.has(host)
}

/**
 * Opaque bearer token: non-empty, at most 256 chars, no whitespace or control chars
 */
export function validateToken(raw: string): string {
  const token = raw.trim()
  if (token === '') {
    throw new NotConfiguredError('token is required (set sun.token or SUN_TOKEN)', 'Create one with "sun token create"')
  }
  if (token.length > MAX_TOKEN_CHARS) {
    throw new InvalidCredentialError('token is too long')
  }
  for (const ch of token) {
    const code = ch.codePointAt(0) ?? 0
    if (code <= 0x20 || code === 0x7f) {
      throw new InvalidCredentialError('token must not contain whitespace or control characters')
    }
  }
  return token
}

export function resolveEndpoint(settings: SunSettings, overrides: EndpointOverrides = {}): Endpoint {
  const allowInsecureHttp = settings.allow_insecure_http === true
  const timeoutSeconds = [overrides.timeoutSeconds, settings.timeout_seconds].find(
    (value): value is number => value !== undefined && value > 0
  )
  return {
    baseUrl: normalizeBaseUrl(overrides.baseUrl || settings.base_url || '', allowInsecureHttp),
    token: validateToken(overrides.token || settings.token || ''),
    timeoutMs: (timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS) * 1000,
    allowInsecureHttp
  }
}
