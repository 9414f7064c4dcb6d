/**
 * Timestamps and generated ids
 */

import { randomInt } from 'node:crypto'

/** 36^3, the range of a three-character base36 suffix */
export const SUFFIX_SPACE = 46656

/**
 * RFC 3339 in UTC with second precision: 2026-01-01T00:00:00Z
 */
export function rfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/**
 * Compact UTC stamp used in ids: 20260101-000000
 */
export function compactUtc(date: Date): string {
  return rfc3339(date).slice(0, 19).replace(/[-:]/g, '').replace('T', '-')
}

const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/

/**
 * Epoch milliseconds of an RFC 3339 string, or null when unparseable
 */
export function parseTimestamp(raw: string | undefined): number | null {
  const value = (raw ?? '').trim()
  if (!RFC3339_PATTERN.test(value)) return null
  const parsed = Date.parse(value)
  return Number.isNaN(parsed) ? null : parsed
}

/**
 * Sort key for timestamps; unparseable values sort first
 */
export function timestampKey(raw: string | undefined): number {
  return parseTimestamp(raw) ?? Number.NEGATIVE_INFINITY
}

/**
 * Three lowercase base36 characters from a cryptographic source
 */
export function base36Suffix(n: number = randomInt(SUFFIX_SPACE)): string {
  return n.toString(36).padStart(3, '0')
}

/**
 * Byte-wise string order
 */
export function compareStrings(left: string, right: string): number {
  if (left < right) return -1
  if (left > right) return 1
  return 0
}
