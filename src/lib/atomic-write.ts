/**
 * Atomic file replacement with owner-only permissions
 */

import fs from 'node:fs'
import path from 'node:path'
import { randomBytes } from 'node:crypto'

const FILE_MODE = 0o600
const DIR_MODE = 0o700

/**
 * Write `data` to `filePath` so readers see either the old or the new file
 *
 * Writes a sibling temp file (0600), then renames it over the target. If the
 * rename fails and the target is a regular file, the target is rewritten in
 * place instead.
 */
export function writeFileAtomic(filePath: string, data: Uint8Array | string): void {
  const dir = path.dirname(filePath)
  fs.mkdirSync(dir, { recursive: true, mode: DIR_MODE })

  const tempPath = path.join(dir, `.sun-${randomBytes(6).toString('hex')}.tmp`)
  try {
    fs.writeFileSync(tempPath, data, { mode: FILE_MODE })
    fs.chmodSync(tempPath, FILE_MODE)
    try {
      fs.renameSync(tempPath, filePath)
    } catch (err) {
      if (!isRegularFile(filePath)) throw err
      fs.writeFileSync(filePath, data, { mode: FILE_MODE })
    }
    fs.chmodSync(filePath, FILE_MODE)
  } finally {
    fs.rmSync(tempPath, { force: true })
  }
}

function isRegularFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile()
  } catch {
    return false
  }
}
