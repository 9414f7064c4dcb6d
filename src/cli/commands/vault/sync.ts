/**
 * Sun CLI - Vault sync push/pull/status
 */

import os from 'node:os'
import type { SunClient } from '../../../client.js'
import { ConfigError } from '../../../lib/errors.js'
import {
  pullVaultBackup,
  pushVaultBackup,
  resolveBackupName,
  resolveVaultFile,
  vaultStatus
} from '../../../lib/vault-sync.js'
import { contextLogger, createClientFromContext, type CommandContext } from '../../lib/create-client.js'
import { c } from '../../lib/colors.js'
import { failUnknownSubcommand } from '../../lib/usage.js'
import * as ui from '../../ui.js'

function targets(context: CommandContext): { file: string; name: string } {
  return {
    file: resolveVaultFile(context.settings, context.args.file, os.homedir()),
    name: resolveBackupName(context.settings, context.args.name)
  }
}

/**
 * Client, or null when the endpoint is not configured
 */
function optionalClient(context: CommandContext): SunClient | null {
  try {
    return createClientFromContext(context)
  } catch (err) {
    if (err instanceof ConfigError) {
      ui.verbose(`endpoint not configured: ${err.message}`, context.verbose)
      return null
    }
    throw err
  }
}

export async function runVaultSync(context: CommandContext): Promise<void> {
  const action = context.args._[2]
  const logger = contextLogger(context)

  switch (action) {
    case 'push': {
      const { file, name } = targets(context)
      const client = createClientFromContext(context)
      const result = await pushVaultBackup(
        client,
        { file, name, allowPlaintext: context.args['allow-plaintext'] },
        { signal: context.signal, logger }
      )
      if (context.jsonOutput) {
        ui.outputJson(result)
        return
      }
      ui.success(`Pushed ${c.highlight(file)} to backup ${name} (rev ${result.revision})`)
      ui.output(
        ui.formatKeyValue([
          ['sha256', result.sha256],
          ['size_bytes', result.size_bytes]
        ])
      )
      return
    }

    case 'pull': {
      const { file, name } = targets(context)
      const client = createClientFromContext(context)
      const result = await pullVaultBackup(client, { file, name }, { signal: context.signal, logger })
      if (context.jsonOutput) {
        ui.outputJson(result)
        return
      }
      ui.success(`Pulled backup ${name} into ${c.highlight(file)}`)
      ui.output(
        ui.formatKeyValue([
          ['revision', result.revision],
          ['sha256', result.sha256],
          ['size_bytes', result.size_bytes]
        ])
      )
      return
    }

    case 'status': {
      const { file, name } = targets(context)
      const client = optionalClient(context)
      const report = await vaultStatus(
        client,
        { file, name, baseUrl: client?.baseUrl ?? (context.args['base-url'] || context.settings.base_url || '') },
        { signal: context.signal, logger }
      )
      if (context.jsonOutput) {
        ui.outputJson(report)
        return
      }
      ui.output(
        ui.formatKeyValue([
          ['file', report.file],
          ['backup_name', report.backup_name],
          ['base_url', report.base_url || '-'],
          ['configured', String(report.configured)],
          ['backup_exists', String(report.backup_exists)],
          ['backup_revision', report.backup_revision],
          ['backup_updated_at', report.backup_updated_at],
          ['local_exists', String(report.local_exists)],
          ['local_sha256', report.local_sha256],
          ['in_sync', report.in_sync === undefined ? undefined : String(report.in_sync)]
        ])
      )
      if (report.error) {
        ui.warn(report.error)
      }
      return
    }

    default:
      failUnknownSubcommand('vault sync', action, [
        ['push', 'Upload the local vault file'],
        ['pull', 'Replace the local vault file with the backup'],
        ['status', 'Compare the local file with the backup']
      ])
  }
}
