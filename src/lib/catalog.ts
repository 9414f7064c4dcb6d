/**
 * Catalog builder
 *
 * Collects `sun.plugin.json` manifests from a file or directory tree into a
 * catalog. Bad manifests and duplicate ids become diagnostics; a missing or
 * empty source fails the build.
 */

import fs from 'node:fs'
import path from 'node:path'
import { glob } from 'tinyglobby'
import type { Catalog, CatalogEntry, Diagnostic, PluginManifest } from '../types.js'
import { InvalidArgumentError } from './errors.js'
import { MANIFEST_FILE_NAME, normalizeStringList, parseManifestText } from './plugin-manifest.js'
import { compareStrings } from './stamps.js'

export const CATALOG_SCHEMA_VERSION = 1
export const DEFAULT_CHANNEL = 'community'

export interface BuildCatalogOptions {
  channel?: string
  verified?: boolean
  /** YYYY-MM-DD, defaults to today (UTC) */
  addedAt?: string
  tags?: string[]
  now?: () => Date
}

export interface BuiltCatalog {
  catalog: Catalog
  diagnostics: Diagnostic[]
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

/**
 * True for a real calendar date written as YYYY-MM-DD
 */
export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value)
  if (!match) return false
  const date = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value
}

/**
 * Manifest files under `source`, sorted
 *
 * A file source must itself be named sun.plugin.json.
 */
export async function discoverManifestPaths(source: string): Promise<string[]> {
  const trimmed = source.trim()
  if (trimmed === '') {
    throw new InvalidArgumentError('--source is required')
  }
  const resolved = path.resolve(trimmed)

  let stat: fs.Stats
  try {
    stat = fs.statSync(resolved)
  } catch (err) {
    throw new InvalidArgumentError(`source not found: ${resolved}`, { cause: err })
  }

  if (stat.isDirectory()) {
    const matches = await glob(`**/${MANIFEST_FILE_NAME}`, {
      cwd: resolved,
      absolute: true,
      caseSensitiveMatch: false,
      ignore: ['**/node_modules/**', '**/.git/**']
    })
    if (matches.length === 0) {
      throw new InvalidArgumentError(`no ${MANIFEST_FILE_NAME} files found in ${resolved}`)
    }
    return matches.map(match => path.normalize(match)).sort(compareStrings)
  }

  if (!stat.isFile()) {
    throw new InvalidArgumentError(`unsupported source type: ${resolved}`)
  }
  if (path.basename(resolved).toLowerCase() !== MANIFEST_FILE_NAME) {
    throw new InvalidArgumentError(`source file must be ${MANIFEST_FILE_NAME}, got ${resolved}`)
  }
  return [resolved]
}

export async function buildCatalogFromSource(source: string, options: BuildCatalogOptions = {}): Promise<BuiltCatalog> {
  const paths = await discoverManifestPaths(source)

  const channel = options.channel?.trim() || DEFAULT_CHANNEL
  const now = options.now ?? (() => new Date())
  const addedAt = options.addedAt?.trim() || now().toISOString().slice(0, 10)
  if (!isCalendarDate(addedAt)) {
    throw new InvalidArgumentError(`invalid added_at date "${addedAt}" (expected YYYY-MM-DD)`)
  }
  const tags = normalizeStringList(options.tags)

  const diagnostics: Diagnostic[] = []
  const entries: CatalogEntry[] = []
  const seen = new Map<string, string>()

  for (const manifestPath of paths) {
    let manifest: PluginManifest
    try {
      manifest = parseManifestText(fs.readFileSync(manifestPath, 'utf8'))
    } catch (err) {
      diagnostics.push({
        level: 'error',
        message: err instanceof Error ? err.message : String(err),
        source: manifestPath
      })
      continue
    }

    const previous = seen.get(manifest.id)
    if (previous !== undefined) {
      diagnostics.push({
        level: 'warn',
        message: `duplicate plugin id "${manifest.id}" skipped (already loaded from ${previous})`,
        source: manifestPath
      })
      continue
    }
    seen.set(manifest.id, manifestPath)

    const entry: CatalogEntry = { manifest, channel }
    if (options.verified) entry.verified = true
    entry.added_at = addedAt
    if (tags.length > 0) entry.tags = tags
    entries.push(entry)
  }

  entries.sort((a, b) => compareStrings(a.manifest.id, b.manifest.id))
  return {
    catalog: { schema_version: CATALOG_SCHEMA_VERSION, entries },
    diagnostics
  }
}
