/**
 * Tests for vault-sync.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  VAULT_BACKUP_KIND,
  findPlaintextKeys,
  pullVaultBackup,
  pushVaultBackup,
  resolveBackupName,
  resolveVaultFile,
  sha256Hex,
  vaultStatus
} from '../../src/lib/vault-sync.js'
import { ChecksumMismatchError, PlaintextRefusedError, SizeMismatchError } from '../../src/lib/errors.js'
import { FakeStore, TEST_BASE_URL } from '../helpers/fake-store.js'

const ENCRYPTED = 'SUN_VAULT_RECIPIENTS=age1testrecipient\nAPI_KEY=encrypted:abc123\nEMPTY=\n'

describe('vault-sync', () => {
  let tempDir: string
  let store: FakeStore

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sun-vault-test-'))
    store = new FakeStore()
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  function writeVault(content: string, name = 'vault.env'): string {
    const file = path.join(tempDir, name)
    fs.writeFileSync(file, content)
    return file
  }

  describe('findPlaintextKeys', () => {
    it('should list keys that are neither encrypted nor empty', () => {
      expect(findPlaintextKeys('B=plain\nA=also plain\nC=encrypted:x\nD=\n')).toEqual(['A', 'B'])
    })

    it('should ignore the recipients key', () => {
      expect(findPlaintextKeys(ENCRYPTED)).toEqual([])
    })
  })

  describe('resolution', () => {
    it('should default the vault file under the home directory', () => {
      expect(resolveVaultFile({}, '', '/home/tester')).toBe(path.resolve('/home/tester/.sun/vault/.env'))
      expect(resolveVaultFile({ vault_file: '~/custom.env' }, '', '/home/tester')).toBe(path.resolve('/home/tester/custom.env'))
    })

    it('should default the backup name', () => {
      expect(resolveBackupName({})).toBe('default')
      expect(resolveBackupName({ vault_backup: 'team' }, ' mine ')).toBe('mine')
    })
  })

  describe('pushVaultBackup', () => {
    it('should upload the file with its checksum', async () => {
      const file = writeVault(ENCRYPTED)
      const result = await pushVaultBackup(store.client(), { file, name: 'team' })
      const digest = sha256Hex(ENCRYPTED)
      expect(result).toEqual({ file, backup_name: 'team', revision: 1, sha256: digest, size_bytes: Buffer.byteLength(ENCRYPTED) })
      expect(store.payload(VAULT_BACKUP_KIND, 'team')?.toString('utf8')).toBe(ENCRYPTED)
      expect(store.latestMetadata(VAULT_BACKUP_KIND, 'team')).toEqual({ path: 'vault.env', sha256: digest })
    })

    it('should refuse plaintext values without uploading', async () => {
      const file = writeVault('API_KEY=plain-value\nOTHER=encrypted:x\n')
      const push = pushVaultBackup(store.client(), { file, name: 'team' })
      await expect(push).rejects.toThrow(PlaintextRefusedError)
      await expect(push).rejects.toMatchObject({ keys: ['API_KEY'] })
      expect(store.requests).toHaveLength(0)
    })

    it('should upload plaintext when allowed', async () => {
      const file = writeVault('API_KEY=plain-value\n')
      const result = await pushVaultBackup(store.client(), { file, name: 'team', allowPlaintext: true })
      expect(result.revision).toBe(1)
    })

    it('should require a backup name', async () => {
      const file = writeVault(ENCRYPTED)
      await expect(pushVaultBackup(store.client(), { file, name: ' ' })).rejects.toThrow('backup name required')
    })
  })

  describe('pullVaultBackup', () => {
    it('should restore identical bytes to another path', async () => {
      const source = writeVault(ENCRYPTED)
      const client = store.client()
      await pushVaultBackup(client, { file: source, name: 'team' })

      const target = path.join(tempDir, 'restored', '.env')
      const result = await pullVaultBackup(client, { file: target, name: 'team' })
      expect(fs.readFileSync(target)).toEqual(fs.readFileSync(source))
      expect(result).toEqual({
        file: target,
        backup_name: 'team',
        revision: 1,
        sha256: sha256Hex(ENCRYPTED),
        size_bytes: Buffer.byteLength(ENCRYPTED)
      })
    })

    it('should refuse a payload whose recorded sha256 no longer matches', async () => {
      const client = store.client()
      await pushVaultBackup(client, { file: writeVault(ENCRYPTED), name: 'team' })
      const recorded = '0'.repeat(64)
      store.tamper(VAULT_BACKUP_KIND, 'team', { metadata: { path: 'vault.env', sha256: recorded } })

      const target = path.join(tempDir, 'restored.env')
      const pull = pullVaultBackup(client, { file: target, name: 'team' })
      await expect(pull).rejects.toThrow(ChecksumMismatchError)
      await expect(pull).rejects.toThrow(
        `vault backup checksum mismatch for team: expected ${recorded} got ${sha256Hex(ENCRYPTED)}`
      )
      expect(fs.existsSync(target)).toBe(false)
    })

    it('should refuse a payload whose object checksum no longer matches', async () => {
      const client = store.client()
      await pushVaultBackup(client, { file: writeVault(ENCRYPTED), name: 'team' })
      store.tamper(VAULT_BACKUP_KIND, 'team', { checksum: 'F'.repeat(64) })
      await expect(pullVaultBackup(client, { file: path.join(tempDir, 'x.env'), name: 'team' })).rejects.toThrow(
        ChecksumMismatchError
      )
    })

    it('should accept checksums in upper case', async () => {
      const client = store.client()
      await pushVaultBackup(client, { file: writeVault(ENCRYPTED), name: 'team' })
      store.tamper(VAULT_BACKUP_KIND, 'team', { checksum: sha256Hex(ENCRYPTED).toUpperCase() })
      const result = await pullVaultBackup(client, { file: path.join(tempDir, 'x.env'), name: 'team' })
      expect(result.sha256).toBe(sha256Hex(ENCRYPTED))
    })

    it('should refuse a payload of the wrong size', async () => {
      const client = store.client()
      await pushVaultBackup(client, { file: writeVault(ENCRYPTED), name: 'team' })
      store.tamper(VAULT_BACKUP_KIND, 'team', { size_bytes: 1 })
      const target = path.join(tempDir, 'x.env')
      await expect(pullVaultBackup(client, { file: target, name: 'team' })).rejects.toThrow(SizeMismatchError)
      expect(fs.existsSync(target)).toBe(false)
    })

    it('should still pull when the metadata lookup fails', async () => {
      const client = store.client()
      await pushVaultBackup(client, { file: writeVault(ENCRYPTED), name: 'team' })
      store.failNext({ status: 500, match: (method, urlPath) => method === 'GET' && urlPath === '/v1/objects' }, 4)
      const logged: string[] = []

      const target = path.join(tempDir, 'x.env')
      const result = await pullVaultBackup(client, { file: target, name: 'team' }, { logger: message => logged.push(message) })
      expect(result.revision).toBeUndefined()
      expect(fs.readFileSync(target, 'utf8')).toBe(ENCRYPTED)
      expect(logged).toEqual(['vault backup checksum verification preflight skipped: injected failure (status 500)'])
    })

    it.skipIf(process.platform === 'win32')('should write the file with owner-only permissions', async () => {
      const client = store.client()
      await pushVaultBackup(client, { file: writeVault(ENCRYPTED), name: 'team' })
      const target = path.join(tempDir, 'x.env')
      await pullVaultBackup(client, { file: target, name: 'team' })
      expect(fs.statSync(target).mode & 0o777).toBe(0o600)
    })
  })

  describe('vaultStatus', () => {
    it('should report local state without a client', async () => {
      const file = writeVault(ENCRYPTED)
      const report = await vaultStatus(null, { file, name: 'team', baseUrl: '' })
      expect(report).toEqual({
        file,
        backup_name: 'team',
        base_url: '',
        configured: false,
        backup_exists: false,
        local_exists: true,
        local_sha256: sha256Hex(ENCRYPTED)
      })
    })

    it('should compare the local file with the backup', async () => {
      const file = writeVault(ENCRYPTED)
      const client = store.client()
      await pushVaultBackup(client, { file, name: 'team' })
      const report = await vaultStatus(client, { file, name: 'team', baseUrl: TEST_BASE_URL })
      expect(report).toMatchObject({ configured: true, backup_exists: true, backup_revision: 1, in_sync: true })

      fs.writeFileSync(file, `${ENCRYPTED}NEW=encrypted:y\n`)
      expect((await vaultStatus(client, { file, name: 'team', baseUrl: TEST_BASE_URL })).in_sync).toBe(false)
    })

    it('should record remote failures instead of throwing', async () => {
      store.failNext({ status: 403, body: '{"error":"forbidden"}' })
      const report = await vaultStatus(store.client(), { file: path.join(tempDir, 'missing.env'), name: 'team', baseUrl: TEST_BASE_URL })
      expect(report.local_exists).toBe(false)
      expect(report.error).toBe('forbidden (status 403)')
    })
  })
})
