/**
 * Vault Sync
 *
 * Backs up the local encrypted dotenv file as a `vault_backup` object and
 * restores it with checksum and size verification.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { createHash } from 'node:crypto'
import dotenv from 'dotenv'
import type { SunClient } from '../client.js'
import { revisionOf } from '../client.js'
import type { ObjectMeta, SunSettings } from '../types.js'
import { writeFileAtomic } from './atomic-write.js'
import { expandHome } from './config-loader.js'
import {
  ChecksumMismatchError,
  InvalidArgumentError,
  PlaintextRefusedError,
  SizeMismatchError
} from './errors.js'
import { firstNonEmpty } from './identity.js'

export const VAULT_BACKUP_KIND = 'vault_backup'
export const DEFAULT_BACKUP_NAME = 'default'
export const ENCRYPTED_PREFIX = 'encrypted:'
export const RECIPIENTS_KEY = 'SUN_VAULT_RECIPIENTS'

export interface VaultOptions {
  signal?: AbortSignal
  logger?: (message: string) => void
}

export interface PushVaultInput {
  file: string
  name: string
  allowPlaintext?: boolean
}

export interface PushVaultResult {
  file: string
  backup_name: string
  revision: number
  sha256: string
  size_bytes: number
}

export interface PullVaultInput {
  file: string
  name: string
}

export interface PullVaultResult {
  file: string
  backup_name: string
  revision?: number
  sha256: string
  size_bytes: number
}

export interface VaultStatusInput {
  file: string
  name: string
  baseUrl: string
}

export interface VaultStatusReport {
  file: string
  backup_name: string
  base_url: string
  configured: boolean
  backup_exists: boolean
  backup_revision?: number
  backup_checksum?: string
  backup_size_bytes?: number
  backup_updated_at?: string
  local_exists: boolean
  local_sha256?: string
  in_sync?: boolean
  error?: string
}

export function sha256Hex(bytes: Uint8Array | string): string {
  return createHash('sha256').update(bytes).digest('hex')
}

/**
 * Keys whose values are neither encrypted nor empty, sorted
 */
export function findPlaintextKeys(content: string | Buffer): string[] {
  const parsed = dotenv.parse(content)
  return Object.entries(parsed)
    .filter(([key, value]) => {
      if (key === RECIPIENTS_KEY) return false
      const trimmed = value.trim()
      return trimmed !== '' && !trimmed.startsWith(ENCRYPTED_PREFIX)
    })
    .map(([key]) => key)
    .sort()
}

export function resolveVaultFile(settings: SunSettings, explicit = '', homeDir: string = os.homedir()): string {
  const chosen = firstNonEmpty(explicit, settings.vault_file) || path.join('~', '.sun', 'vault', '.env')
  return path.resolve(expandHome(chosen, homeDir))
}

export function resolveBackupName(settings: SunSettings, explicit = ''): string {
  return firstNonEmpty(explicit, settings.vault_backup) || DEFAULT_BACKUP_NAME
}

function requireBackupName(name: string): string {
  const trimmed = name.trim()
  if (trimmed === '') {
    throw new InvalidArgumentError('backup name required (--name or sun.vault_backup)')
  }
  return trimmed
}

/**
 * Upload the local vault file
 *
 * Refuses files holding plaintext values unless `allowPlaintext` is set.
 */
export async function pushVaultBackup(
  client: SunClient,
  input: PushVaultInput,
  options: VaultOptions = {}
): Promise<PushVaultResult> {
  const name = requireBackupName(input.name)
  const bytes = fs.readFileSync(input.file)

  if (!input.allowPlaintext) {
    const plaintext = findPlaintextKeys(bytes)
    if (plaintext.length > 0) {
      throw new PlaintextRefusedError(input.file, plaintext)
    }
  }

  const digest = sha256Hex(bytes)
  const result = await client.putObject(
    VAULT_BACKUP_KIND,
    name,
    {
      payload: bytes,
      contentType: 'text/plain',
      metadata: { path: path.basename(input.file), sha256: digest }
    },
    { signal: options.signal }
  )

  return {
    file: input.file,
    backup_name: name,
    revision: revisionOf(result),
    sha256: digest,
    size_bytes: bytes.length
  }
}

/**
 * Throws when the payload disagrees with the object's recorded checksum,
 * metadata sha256 or size
 */
export function verifyBackupPayload(name: string, meta: ObjectMeta, payload: Buffer): string {
  const digest = sha256Hex(payload)
  const checksum = meta.checksum.trim()
  if (checksum !== '' && checksum.toLowerCase() !== digest) {
    throw new ChecksumMismatchError(name, checksum, digest)
  }
  const recorded = meta.metadata?.sha256
  if (typeof recorded === 'string' && recorded.trim() !== '' && recorded.trim().toLowerCase() !== digest) {
    throw new ChecksumMismatchError(name, recorded.trim(), digest)
  }
  if (meta.size_bytes > 0 && meta.size_bytes !== payload.length) {
    throw new SizeMismatchError(name, meta.size_bytes, payload.length)
  }
  return digest
}

/**
 * Download the backup and replace the local file
 *
 * Metadata lookup is best effort; when it succeeds the payload must match it
 * and nothing is written on a mismatch.
 */
export async function pullVaultBackup(
  client: SunClient,
  input: PullVaultInput,
  options: VaultOptions = {}
): Promise<PullVaultResult> {
  const name = requireBackupName(input.name)

  let meta: ObjectMeta | null = null
  try {
    meta = await client.lookupObjectMeta(VAULT_BACKUP_KIND, name, { signal: options.signal })
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    options.logger?.(`vault backup checksum verification preflight skipped: ${reason}`)
  }

  const payload = await client.getPayload(VAULT_BACKUP_KIND, name, { signal: options.signal })
  const digest = meta ? verifyBackupPayload(name, meta, payload) : sha256Hex(payload)

  writeFileAtomic(input.file, payload)

  return {
    file: input.file,
    backup_name: name,
    revision: meta?.latest_revision,
    sha256: digest,
    size_bytes: payload.length
  }
}

/**
 * Compare the local file with the remote backup
 *
 * Never throws for remote failures; they land in `error`. Pass a null client
 * when the endpoint is not configured.
 */
export async function vaultStatus(
  client: SunClient | null,
  input: VaultStatusInput,
  options: VaultOptions = {}
): Promise<VaultStatusReport> {
  const report: VaultStatusReport = {
    file: input.file,
    backup_name: input.name.trim(),
    base_url: input.baseUrl,
    configured: client !== null,
    backup_exists: false,
    local_exists: false
  }

  try {
    const bytes = fs.readFileSync(input.file)
    report.local_exists = true
    report.local_sha256 = sha256Hex(bytes)
  } catch (err) {
    if (!isMissingFile(err)) throw err
  }

  if (!client) return report

  try {
    const meta = await client.lookupObjectMeta(VAULT_BACKUP_KIND, report.backup_name, { signal: options.signal })
    if (meta) {
      report.backup_exists = true
      report.backup_revision = meta.latest_revision
      report.backup_checksum = meta.checksum
      report.backup_size_bytes = meta.size_bytes
      report.backup_updated_at = meta.updated_at
      if (report.local_sha256 !== undefined && meta.checksum.trim() !== '') {
        report.in_sync = meta.checksum.trim().toLowerCase() === report.local_sha256
      }
    }
  } catch (err) {
    report.error = err instanceof Error ? err.message : String(err)
  }

  return report
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
