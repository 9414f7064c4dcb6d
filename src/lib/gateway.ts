/**
 * Gateway Catalog
 *
 * Splits a plugin catalog into per-namespace shards keyed by a stable hash of
 * each plugin id, publishes the index and shards to a registry, and
 * materializes filtered catalogs back from them.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import pLimit from 'p-limit'
import { z } from 'zod'
import type { SunClient } from '../client.js'
import { revisionOf } from '../client.js'
import type {
  Catalog,
  CatalogEntry,
  GatewayIndex,
  GatewayNamespaceIndex,
  GatewayShard,
  GatewayShardSummary,
  GatewaySelectFilter,
  PluginManifest,
  SunSettings
} from '../types.js'
import { writeFileAtomic } from './atomic-write.js'
import { CATALOG_SCHEMA_VERSION } from './catalog.js'
import { expandHome } from './config-loader.js'
import { InvalidArgumentError, MalformedIndexError, MalformedManifestError, MalformedShardError } from './errors.js'
import { firstNonEmpty } from './identity.js'
import { namespaceFromId, parseManifest, validatePluginId } from './plugin-manifest.js'
import { formatIssues, looseBoolean, looseNumber, looseString, looseStringList, optionalString } from './schema-utils.js'
import { compareStrings, rfc3339 } from './stamps.js'
import { sha256Hex } from './vault-sync.js'

export const GATEWAY_SCHEMA_VERSION = 1
export const DEFAULT_SLOTS_PER_NAMESPACE = 16
export const MAX_SLOTS_PER_NAMESPACE = 256
export const DEFAULT_REGISTRY = 'global'
export const PULL_CONCURRENCY = 4

const REGISTRY_PATTERN = /^[a-z0-9][a-z0-9._-]*$/
const FNV_OFFSET_BASIS = 0x811c9dc5
const FNV_PRIME = 0x01000193

export interface GatewayBuildOptions {
  registry: string
  slotsPerNamespace?: number
  generatedAt?: Date
}

export interface BuiltGateway {
  index: GatewayIndex
  shards: Map<string, GatewayShard>
}

export interface GatewayOptions {
  signal?: AbortSignal
  logger?: (message: string) => void
}

export interface PublishResult {
  registry: string
  total_entries: number
  shards_written: number
  index_revision: number
}

export interface PullResult {
  registry: string
  index: GatewayIndex
  catalog: Catalog
  shards_fetched: number
}

// =============================================================================
// Naming and hashing
// =============================================================================

export function normalizeRegistryName(raw: string): string {
  const normalized = raw.trim().toLowerCase()
  if (normalized === '') {
    throw new InvalidArgumentError('gateway registry name required')
  }
  if (!REGISTRY_PATTERN.test(normalized)) {
    throw new InvalidArgumentError(`invalid gateway registry name "${raw}"`)
  }
  return normalized
}

/**
 * Zero or less means the default of 16
 */
export function normalizeSlotsPerNamespace(slots = 0): number {
  if (!Number.isInteger(slots) || slots <= 0) return DEFAULT_SLOTS_PER_NAMESPACE
  if (slots > MAX_SLOTS_PER_NAMESPACE) {
    throw new InvalidArgumentError(`slots_per_namespace cannot exceed ${MAX_SLOTS_PER_NAMESPACE}`)
  }
  return slots
}

/**
 * 32-bit FNV-1a over the UTF-8 bytes of `text`
 */
export function fnv1a32(text: string): number {
  let hash = FNV_OFFSET_BASIS
  for (const byte of Buffer.from(text, 'utf8')) {
    hash ^= byte
    hash = Math.imul(hash, FNV_PRIME) >>> 0
  }
  return hash >>> 0
}

/**
 * `acme--07` for a plugin in namespace acme hashing to slot 7
 */
export function gatewayShardKey(pluginId: string, slotsPerNamespace: number): { key: string; namespace: string; slot: number } {
  validatePluginId(pluginId)
  const namespace = namespaceFromId(pluginId)
  const slots = normalizeSlotsPerNamespace(slotsPerNamespace)
  const slot = fnv1a32(pluginId) % slots
  return { key: `${namespace}--${String(slot).padStart(2, '0')}`, namespace, slot }
}

export function shardChecksum(entries: CatalogEntry[]): string {
  return sha256Hex(JSON.stringify(entries))
}

// =============================================================================
// Build
// =============================================================================

export function buildGateway(catalog: Catalog, options: GatewayBuildOptions): BuiltGateway {
  const registry = normalizeRegistryName(options.registry)
  const slotsPerNamespace = normalizeSlotsPerNamespace(options.slotsPerNamespace)
  const generatedAt = rfc3339(options.generatedAt ?? new Date())

  const shards = new Map<string, GatewayShard>()
  const shardCapabilities = new Map<string, Set<string>>()
  const namespaceShards = new Map<string, Set<string>>()
  const namespaceCounts = new Map<string, number>()

  for (const raw of catalog.entries) {
    let manifest: PluginManifest
    try {
      manifest = parseManifest(raw.manifest)
    } catch (err) {
      if (!(err instanceof MalformedManifestError)) throw err
      throw new MalformedManifestError(`invalid catalog entry "${raw.manifest.id}": ${err.message}`, undefined, err)
    }
    const entry: CatalogEntry = { ...raw, manifest }
    const { key, namespace, slot } = gatewayShardKey(manifest.id, slotsPerNamespace)

    let shard = shards.get(key)
    if (!shard) {
      shard = { schema_version: GATEWAY_SCHEMA_VERSION, registry, key, namespace, slot, entries: [] }
      shards.set(key, shard)
    }
    shard.entries.push(entry)

    const capabilities = shardCapabilities.get(key) ?? new Set<string>()
    for (const capability of manifest.integration.capabilities ?? []) {
      capabilities.add(capability)
    }
    shardCapabilities.set(key, capabilities)

    const keys = namespaceShards.get(namespace) ?? new Set<string>()
    keys.add(key)
    namespaceShards.set(namespace, keys)
    namespaceCounts.set(namespace, (namespaceCounts.get(namespace) ?? 0) + 1)
  }

  const sortedKeys = [...shards.keys()].sort(compareStrings)
  const summaries: GatewayShardSummary[] = []
  const orderedShards = new Map<string, GatewayShard>()
  let totalEntries = 0

  for (const key of sortedKeys) {
    const shard = shards.get(key)
    if (!shard) continue
    shard.entries.sort((a, b) => compareStrings(a.manifest.id, b.manifest.id))
    orderedShards.set(key, shard)
    totalEntries += shard.entries.length

    const summary: GatewayShardSummary = {
      key,
      namespace: shard.namespace,
      slot: shard.slot,
      count: shard.entries.length,
      checksum: shardChecksum(shard.entries)
    }
    const capabilities = [...(shardCapabilities.get(key) ?? [])].sort(compareStrings)
    if (capabilities.length > 0) summary.capabilities = capabilities
    summaries.push(summary)
  }

  const namespaces: GatewayNamespaceIndex[] = [...namespaceShards.keys()].sort(compareStrings).map(namespace => ({
    namespace,
    count: namespaceCounts.get(namespace) ?? 0,
    shards: [...(namespaceShards.get(namespace) ?? [])].sort(compareStrings)
  }))

  return {
    index: {
      schema_version: GATEWAY_SCHEMA_VERSION,
      registry,
      generated_at: generatedAt,
      slots_per_namespace: slotsPerNamespace,
      total_entries: totalEntries,
      shards: summaries,
      namespaces
    },
    shards: orderedShards
  }
}

// =============================================================================
// Select and materialize
// =============================================================================

/**
 * Shard keys that could hold entries matching the filter, sorted
 */
export function selectGatewayShards(index: GatewayIndex, filter: GatewaySelectFilter = {}): string[] {
  const namespace = filter.namespace?.trim() ?? ''
  const capability = filter.capability?.trim() ?? ''
  return index.shards
    .filter(shard => namespace === '' || shard.namespace === namespace)
    .filter(shard => capability === '' || (shard.capabilities ?? []).includes(capability))
    .map(shard => shard.key)
    .sort(compareStrings)
}

/**
 * Catalog of the matching entries, walking shards in key order
 *
 * Stops once `limit` entries are collected; the result is sorted by id.
 */
export function materializeGatewayCatalog(
  index: GatewayIndex,
  shards: ReadonlyMap<string, GatewayShard>,
  filter: GatewaySelectFilter = {}
): Catalog {
  const prefix = filter.prefix?.trim() ?? ''
  const capability = filter.capability?.trim() ?? ''
  const limit = filter.limit !== undefined && filter.limit > 0 ? filter.limit : 0

  const entries: CatalogEntry[] = []
  const seen = new Set<string>()

  collect: for (const key of selectGatewayShards(index, filter)) {
    const shard = shards.get(key)
    if (!shard) continue
    for (const entry of shard.entries) {
      const id = entry.manifest.id.trim()
      if (id === '' || seen.has(id)) continue
      if (prefix !== '' && !id.startsWith(prefix)) continue
      if (capability !== '' && !(entry.manifest.integration.capabilities ?? []).includes(capability)) continue
      seen.add(id)
      entries.push(entry)
      if (limit > 0 && entries.length >= limit) break collect
    }
  }

  entries.sort((a, b) => compareStrings(a.manifest.id, b.manifest.id))
  return { schema_version: CATALOG_SCHEMA_VERSION, entries }
}

// =============================================================================
// Wire decoding
// =============================================================================

const shardSummarySchema = z.object({
  key: z.string().trim().min(1),
  namespace: looseString,
  slot: looseNumber,
  count: looseNumber,
  capabilities: looseStringList,
  checksum: looseString
})

const namespaceIndexSchema = z.object({
  namespace: looseString,
  count: looseNumber,
  shards: looseStringList
})

const indexSchema = z.object({
  schema_version: looseNumber,
  registry: looseString,
  generated_at: looseString,
  slots_per_namespace: looseNumber,
  total_entries: looseNumber,
  shards: z.array(shardSummarySchema),
  namespaces: z.preprocess(value => value ?? [], z.array(namespaceIndexSchema))
})

const catalogEntrySchema = z.object({
  manifest: z.unknown(),
  channel: optionalString,
  verified: looseBoolean,
  added_at: optionalString,
  tags: looseStringList
})

const shardSchema = z.object({
  schema_version: looseNumber,
  registry: looseString,
  key: looseString,
  namespace: looseString,
  slot: looseNumber,
  entries: z.preprocess(value => value ?? [], z.array(catalogEntrySchema))
})

export function decodeGatewayIndex(raw: unknown, registry: string): GatewayIndex {
  if (raw === null || raw === undefined) {
    throw new MalformedIndexError(registry, 'index not found')
  }
  const parsed = indexSchema.safeParse(raw)
  if (!parsed.success) {
    throw new MalformedIndexError(registry, formatIssues(parsed.error), parsed.error)
  }
  const data = parsed.data
  return {
    schema_version: data.schema_version || GATEWAY_SCHEMA_VERSION,
    registry: data.registry.trim() || registry,
    generated_at: data.generated_at,
    slots_per_namespace: data.slots_per_namespace,
    total_entries: data.total_entries,
    shards: data.shards.map(shard => {
      const summary: GatewayShardSummary = {
        key: shard.key,
        namespace: shard.namespace,
        slot: shard.slot,
        count: shard.count,
        checksum: shard.checksum
      }
      if (shard.capabilities.length > 0) summary.capabilities = shard.capabilities
      return summary
    }),
    namespaces: data.namespaces
  }
}

export function decodeGatewayShard(raw: unknown, registry: string, key: string): GatewayShard {
  if (raw === null || raw === undefined) {
    throw new MalformedShardError(registry, key, 'shard not found')
  }
  const parsed = shardSchema.safeParse(raw)
  if (!parsed.success) {
    throw new MalformedShardError(registry, key, formatIssues(parsed.error), parsed.error)
  }
  const data = parsed.data
  if (data.key.trim() !== '' && data.key.trim() !== key) {
    throw new MalformedShardError(registry, key, `payload carries key "${data.key}"`)
  }

  const entries = data.entries.map((item, position) => {
    let manifest: PluginManifest
    try {
      manifest = parseManifest(item.manifest)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new MalformedShardError(registry, key, `entry ${position}: ${reason}`, err)
    }
    const entry: CatalogEntry = { manifest }
    if (item.channel !== undefined) entry.channel = item.channel
    if (item.verified) entry.verified = true
    if (item.added_at !== undefined) entry.added_at = item.added_at
    if (item.tags.length > 0) entry.tags = item.tags
    return entry
  })

  return {
    schema_version: data.schema_version || GATEWAY_SCHEMA_VERSION,
    registry: data.registry.trim() || registry,
    key,
    namespace: data.namespace,
    slot: data.slot,
    entries
  }
}

// =============================================================================
// Publish and pull
// =============================================================================

/**
 * Put the index, then every shard in key order
 *
 * Writes are unconditional; concurrent publishers race and the last one wins.
 */
export async function publishGateway(
  client: SunClient,
  built: BuiltGateway,
  options: GatewayOptions = {}
): Promise<PublishResult> {
  const registry = built.index.registry
  const indexPut = await client.putGatewayIndex(registry, built.index, undefined, { signal: options.signal })

  const keys = [...built.shards.keys()].sort(compareStrings)
  for (const key of keys) {
    const shard = built.shards.get(key)
    if (!shard) continue
    await client.putGatewayShard(registry, key, shard, undefined, { signal: options.signal })
    options.logger?.(`gateway ${registry}: wrote shard ${key} (${shard.entries.length} entries)`)
  }

  return {
    registry,
    total_entries: built.index.total_entries,
    shards_written: keys.length,
    index_revision: revisionOf(indexPut)
  }
}

export async function fetchGatewayIndex(
  client: SunClient,
  registryName: string,
  options: GatewayOptions = {}
): Promise<GatewayIndex> {
  const registry = normalizeRegistryName(registryName)
  const raw = await client.getGatewayIndex(registry, { signal: options.signal })
  return decodeGatewayIndex(raw, registry)
}

/**
 * Fetch the index and the shards the filter selects, then materialize
 */
export async function pullGateway(
  client: SunClient,
  registryName: string,
  filter: GatewaySelectFilter = {},
  options: GatewayOptions = {}
): Promise<PullResult> {
  const registry = normalizeRegistryName(registryName)
  const index = await fetchGatewayIndex(client, registry, options)
  const keys = selectGatewayShards(index, filter)

  const limit = pLimit(PULL_CONCURRENCY)
  const fetched = await Promise.all(
    keys.map(key =>
      limit(async () => {
        const raw = await client.getGatewayShard(registry, key, { signal: options.signal })
        options.logger?.(`gateway ${registry}: fetched shard ${key}`)
        return decodeGatewayShard(raw, registry, key)
      })
    )
  )

  const shards = new Map<string, GatewayShard>()
  for (const shard of fetched) {
    shards.set(shard.key, shard)
  }

  return {
    registry,
    index,
    catalog: materializeGatewayCatalog(index, shards, filter),
    shards_fetched: shards.size
  }
}

// =============================================================================
// Local files
// =============================================================================

/**
 * File name for a shard inside a bundle: `acme--07` becomes `acme_07.json`
 */
export function shardFileName(key: string): string {
  return `${key.replaceAll('/', '_').replaceAll('--', '_')}.json`
}

/**
 * Write `index.json` and `shards/*.json` under `dir`
 */
export function writeGatewayBundle(dir: string, built: BuiltGateway): string[] {
  const target = dir.trim()
  if (target === '') {
    throw new InvalidArgumentError('output directory required')
  }
  const shardsDir = path.join(target, 'shards')
  fs.mkdirSync(shardsDir, { recursive: true })

  const indexFile = path.join(target, 'index.json')
  fs.writeFileSync(indexFile, `${JSON.stringify(built.index, null, 2)}\n`)
  const written = [indexFile]
  for (const key of [...built.shards.keys()].sort(compareStrings)) {
    const shard = built.shards.get(key)
    if (!shard) continue
    const file = path.join(shardsDir, shardFileName(key))
    fs.writeFileSync(file, `${JSON.stringify(shard, null, 2)}\n`)
    written.push(file)
  }
  return written
}

export function writeCatalogFile(filePath: string, catalog: Catalog): void {
  writeFileAtomic(filePath, `${JSON.stringify(catalog, null, 2)}\n`)
}

// =============================================================================
// Settings resolution
// =============================================================================

export function resolveRegistryName(settings: SunSettings, explicit = ''): string {
  return normalizeRegistryName(firstNonEmpty(explicit, settings.gateway_registry) || DEFAULT_REGISTRY)
}

export function resolveSlots(settings: SunSettings, explicit = 0): number {
  if (explicit > 0) return normalizeSlotsPerNamespace(explicit)
  return normalizeSlotsPerNamespace(settings.gateway_slots ?? 0)
}

/**
 * Where `gateway pull` writes when no --out is given
 */
export function defaultCatalogPath(registry: string, explicit = '', homeDir: string = os.homedir()): string {
  const trimmed = explicit.trim()
  if (trimmed !== '') {
    return path.resolve(expandHome(trimmed, homeDir))
  }
  return path.join(homeDir, '.sun', 'plugins', 'catalog.d', `gateway-${registry}.json`)
}
