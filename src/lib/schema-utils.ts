/**
 * Shared zod helpers for decoding payloads read from the store or disk
 */

import { z } from 'zod'
import type { JsonValue } from '../types.js'

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
)

export const jsonObjectSchema = z.record(jsonValueSchema)

/** Missing, null or non-string values decode as "" */
export const looseString = z.preprocess(value => (typeof value === 'string' ? value : ''), z.string())

/** Missing or non-numeric values decode as 0 */
export const looseNumber = z.preprocess(value => (typeof value === 'number' && Number.isFinite(value) ? value : 0), z.number())

/** Empty or non-string values decode as undefined */
export const optionalString = z.preprocess(
  value => (typeof value === 'string' && value.trim() !== '' ? value : undefined),
  z.string().optional()
)

/** Non-numeric values decode as undefined */
export const optionalNumber = z.preprocess(
  value => (typeof value === 'number' && Number.isFinite(value) ? value : undefined),
  z.number().optional()
)

/** Null decodes as undefined */
export const optionalJsonObject = z.preprocess(value => value ?? undefined, z.record(jsonValueSchema).optional())

export const looseBoolean = z.preprocess(value => value === true, z.boolean())

/** Null decodes as an empty list; non-string items are dropped */
export const looseStringList = z.preprocess(
  value => (Array.isArray(value) ? value.filter(item => typeof item === 'string') : []),
  z.array(z.string())
)

/**
 * One-line summary of schema issues
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * JSON.parse that reports failure instead of throwing
 */
export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false; error: Error } {
  try {
    const value: unknown = JSON.parse(text)
    return { ok: true, value }
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) }
  }
}
