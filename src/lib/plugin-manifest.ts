/**
 * Plugin manifests (`sun.plugin.json`)
 *
 * Decoding is lenient about shapes and strict about meaning: wrong-typed
 * fields fall back to empty, then `validateManifest` enforces the rules.
 */

import { z } from 'zod'
import type { McpServer, PluginManifest } from '../types.js'
import { MalformedManifestError } from './errors.js'
import {
  formatIssues,
  looseNumber,
  looseString,
  looseStringList,
  optionalJsonObject,
  tryParseJson
} from './schema-utils.js'

export const MANIFEST_FILE_NAME = 'sun.plugin.json'
export const MANIFEST_SCHEMA_VERSION = 1

export const INSTALL_TYPES = ['none', 'local_path', 'mcp_http', 'oci_image', 'git'] as const
export const MATURITY_VALUES = ['experimental', 'beta', 'ga'] as const

const ID_SEGMENT = /^[a-z0-9][a-z0-9._-]*$/

const stringMap = z.preprocess(value => {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return {}
  return Object.fromEntries(Object.entries(value).filter(([, v]) => typeof v === 'string'))
}, z.record(z.string()))

const objectOrEmpty = (value: unknown): unknown =>
  value !== null && typeof value === 'object' && !Array.isArray(value) ? value : {}

const mcpServerSchema = z.preprocess(
  objectOrEmpty,
  z.object({
    name: looseString,
    transport: looseString,
    endpoint: looseString,
    command: looseStringList
  })
)

const manifestSchema = z.object({
  schema_version: looseNumber,
  id: looseString,
  namespace: looseString,
  name: looseString,
  version: looseString,
  summary: looseString,
  description: looseString,
  homepage: looseString,
  terms_url: looseString,
  privacy_url: looseString,
  license: looseString,
  maturity: looseString,
  kind: looseString,
  install: z.preprocess(
    objectOrEmpty,
    z.object({
      type: looseString,
      source: looseString,
      entry_command: looseStringList,
      env: looseStringList,
      params: stringMap
    })
  ),
  integration: z.preprocess(
    objectOrEmpty,
    z.object({
      provider_ids: looseStringList,
      commands: looseStringList,
      mcp_servers: z.preprocess(value => (Array.isArray(value) ? value : []), z.array(mcpServerSchema)),
      capabilities: looseStringList
    })
  ),
  metadata: optionalJsonObject
})

type DecodedManifest = z.infer<typeof manifestSchema>

/**
 * Trimmed, de-duplicated, empties dropped; order preserved
 */
export function normalizeStringList(values: readonly string[] | undefined): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const value of values ?? []) {
    const trimmed = value.trim()
    if (trimmed === '' || seen.has(trimmed)) continue
    seen.add(trimmed)
    out.push(trimmed)
  }
  return out
}

/**
 * `acme` for `acme/widgets`; empty when the id has no namespace
 */
export function namespaceFromId(id: string): string {
  const parts = id.trim().split('/')
  return parts.length < 2 ? '' : (parts[0] ?? '')
}

export function validatePluginId(id: string): void {
  const trimmed = id.trim()
  if (trimmed === '') {
    throw new MalformedManifestError('plugin id required')
  }
  const parts = trimmed.split('/')
  if (parts.length !== 2) {
    throw new MalformedManifestError('plugin id must be namespaced as <namespace>/<name>')
  }
  for (const part of parts) {
    if (!ID_SEGMENT.test(part) || part === '.' || part === '..') {
      throw new MalformedManifestError(`invalid plugin id segment "${part}"`)
    }
  }
}

type OptionalTextField =
  | 'namespace'
  | 'name'
  | 'version'
  | 'summary'
  | 'description'
  | 'homepage'
  | 'terms_url'
  | 'privacy_url'
  | 'license'
  | 'maturity'
  | 'kind'

function textFields(decoded: DecodedManifest, id: string): Partial<Pick<PluginManifest, OptionalTextField>> {
  const values: Record<OptionalTextField, string> = {
    namespace: decoded.namespace.trim() || namespaceFromId(id),
    name: decoded.name.trim(),
    version: decoded.version.trim(),
    summary: decoded.summary.trim(),
    description: decoded.description.trim(),
    homepage: decoded.homepage.trim(),
    terms_url: decoded.terms_url.trim(),
    privacy_url: decoded.privacy_url.trim(),
    license: decoded.license.trim(),
    maturity: decoded.maturity.trim().toLowerCase(),
    kind: decoded.kind.trim().toLowerCase()
  }
  const out: Partial<Pick<PluginManifest, OptionalTextField>> = {}
  for (const [key, value] of Object.entries(values)) {
    if (value !== '') Object.assign(out, { [key]: value })
  }
  return out
}

function normalizeServer(server: DecodedManifest['integration']['mcp_servers'][number]): McpServer {
  const out: McpServer = {
    name: server.name.trim(),
    transport: server.transport.trim().toLowerCase()
  }
  const endpoint = server.endpoint.trim()
  if (endpoint !== '') out.endpoint = endpoint
  const command = normalizeStringList(server.command)
  if (command.length > 0) out.command = command
  return out
}

/**
 * Canonical manifest: trimmed strings, lowercased enums, defaults applied
 *
 * Keys come out in a fixed order with empty values omitted, so two equal
 * manifests always serialize to the same bytes.
 */
export function normalizeManifest(decoded: DecodedManifest): PluginManifest {
  const id = decoded.id.trim()

  const install: PluginManifest['install'] = { type: decoded.install.type.trim().toLowerCase() || 'none' }
  const source = decoded.install.source.trim()
  if (source !== '') install.source = source
  if (decoded.install.entry_command.length > 0) install.entry_command = decoded.install.entry_command
  if (decoded.install.env.length > 0) install.env = decoded.install.env
  if (Object.keys(decoded.install.params).length > 0) install.params = decoded.install.params

  const integration: PluginManifest['integration'] = {}
  const providerIds = normalizeStringList(decoded.integration.provider_ids)
  if (providerIds.length > 0) integration.provider_ids = providerIds
  const commands = normalizeStringList(decoded.integration.commands)
  if (commands.length > 0) integration.commands = commands
  if (decoded.integration.mcp_servers.length > 0) {
    integration.mcp_servers = decoded.integration.mcp_servers.map(normalizeServer)
  }
  const capabilities = normalizeStringList(decoded.integration.capabilities)
  if (capabilities.length > 0) integration.capabilities = capabilities

  const manifest: PluginManifest = {
    schema_version: decoded.schema_version === 0 ? MANIFEST_SCHEMA_VERSION : decoded.schema_version,
    id,
    ...textFields(decoded, id),
    install,
    integration
  }
  if (decoded.metadata && Object.keys(decoded.metadata).length > 0) {
    manifest.metadata = decoded.metadata
  }
  return manifest
}

function validateOptionalUrl(raw: string | undefined, field: string): void {
  const value = (raw ?? '').trim()
  if (value === '') return
  let parsed: URL
  try {
    parsed = new URL(value)
  } catch {
    throw new MalformedManifestError(`invalid ${field}: absolute URL required`)
  }
  if (parsed.host === '') {
    throw new MalformedManifestError(`invalid ${field}: absolute URL required`)
  }
}

function isOneOf<T extends string>(values: readonly T[], candidate: string): candidate is T {
  return values.some(value => value === candidate)
}

/**
 * Throws MalformedManifestError describing the first rule the manifest breaks
 */
export function validateManifest(manifest: PluginManifest): void {
  validatePluginId(manifest.id)
  const ns = namespaceFromId(manifest.id)
  if (manifest.namespace !== undefined && manifest.namespace !== ns) {
    throw new MalformedManifestError(`namespace "${manifest.namespace}" does not match id namespace "${ns}"`)
  }
  if (manifest.schema_version < 1) {
    throw new MalformedManifestError('schema_version must be >= 1')
  }
  if (manifest.maturity !== undefined && !isOneOf(MATURITY_VALUES, manifest.maturity)) {
    throw new MalformedManifestError(`unsupported maturity "${manifest.maturity}"`)
  }
  const installType = manifest.install.type
  if (!isOneOf(INSTALL_TYPES, installType)) {
    throw new MalformedManifestError(`unsupported install.type "${installType}"`)
  }
  if (installType === 'local_path' && !manifest.install.source) {
    throw new MalformedManifestError('install.source required for install.type=local_path')
  }
  const servers = manifest.integration.mcp_servers ?? []
  if (installType === 'mcp_http' && !manifest.install.source && servers.length === 0) {
    throw new MalformedManifestError('install.source or integration.mcp_servers required for install.type=mcp_http')
  }
  validateOptionalUrl(manifest.homepage, 'homepage')
  validateOptionalUrl(manifest.terms_url, 'terms_url')
  validateOptionalUrl(manifest.privacy_url, 'privacy_url')

  for (const server of servers) {
    if (server.name === '') {
      throw new MalformedManifestError('integration.mcp_servers.name required')
    }
    switch (server.transport) {
      case 'stdio':
        if (!server.command || server.command.length === 0) {
          throw new MalformedManifestError(`integration.mcp_servers[${server.name}].command required for stdio transport`)
        }
        break
      case 'http':
      case 'sse':
        validateOptionalUrl(server.endpoint, 'integration.mcp_servers.endpoint')
        if (!server.endpoint) {
          throw new MalformedManifestError(
            `integration.mcp_servers[${server.name}].endpoint required for ${server.transport} transport`
          )
        }
        break
      default:
        throw new MalformedManifestError(
          `unsupported integration.mcp_servers[${server.name}].transport "${server.transport}"`
        )
    }
  }
}

/**
 * Decode, normalize and validate a manifest value
 */
export function parseManifest(raw: unknown, source?: string): PluginManifest {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new MalformedManifestError('manifest must be a JSON object', source)
  }
  const decoded = manifestSchema.safeParse(raw)
  if (!decoded.success) {
    throw new MalformedManifestError(formatIssues(decoded.error), source)
  }
  const manifest = normalizeManifest(decoded.data)
  try {
    validateManifest(manifest)
  } catch (err) {
    if (err instanceof MalformedManifestError && source !== undefined) {
      throw new MalformedManifestError(err.message, source, err)
    }
    throw err
  }
  return manifest
}

export function parseManifestText(text: string, source?: string): PluginManifest {
  const parsed = tryParseJson(text)
  if (!parsed.ok) {
    throw new MalformedManifestError(`parse manifest: ${parsed.error.message}`, source, parsed.error)
  }
  return parseManifest(parsed.value, source)
}
