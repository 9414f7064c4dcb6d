/**
 * Sun CLI - Vault Command Group
 */

import type { CommandContext } from '../../lib/create-client.js'
import { failUnknownSubcommand } from '../../lib/usage.js'

export async function runVaultGroup(context: CommandContext): Promise<void> {
  const subcommand = context.args._[1]

  switch (subcommand) {
    case 'sync': {
      const { runVaultSync } = await import('./sync.js')
      await runVaultSync(context)
      break
    }

    default:
      failUnknownSubcommand('vault', subcommand, [['sync', 'push, pull or status of the vault backup']])
  }
}
