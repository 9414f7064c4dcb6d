/**
 * Sun CLI - Auth Command
 */

import { createClientFromContext, type CommandContext } from '../lib/create-client.js'
import { failUnknownSubcommand } from '../lib/usage.js'
import * as ui from '../ui.js'

export async function runAuthGroup(context: CommandContext): Promise<void> {
  const subcommand = context.args._[1]
  switch (subcommand) {
    case 'status': {
      const client = createClientFromContext(context)
      const whoami = await client.whoAmI({ signal: context.signal })
      if (context.jsonOutput) {
        ui.outputJson({ base_url: client.baseUrl, whoami })
        return
      }
      ui.output(
        ui.formatKeyValue([
          ['base_url', client.baseUrl],
          ['account', whoami.account_slug || whoami.account_id],
          ['account_id', whoami.account_id],
          ['token_id', whoami.token_id],
          ['scopes', whoami.scopes.join(',')]
        ])
      )
      return
    }

    default:
      failUnknownSubcommand('auth', subcommand, [['status', 'Show the account behind the configured token']])
  }
}
