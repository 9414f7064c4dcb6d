/**
 * Sun CLI - Audit Command
 */

import { createClientFromContext, type CommandContext } from '../lib/create-client.js'
import { c } from '../lib/colors.js'
import { failUnknownSubcommand } from '../lib/usage.js'
import * as ui from '../ui.js'

const DEFAULT_AUDIT_LIMIT = 200

export async function runAuditGroup(context: CommandContext): Promise<void> {
  const { args } = context
  const subcommand = args._[1]

  switch (subcommand) {
    case 'list':
    case 'ls': {
      const client = createClientFromContext(context)
      const events = await client.listAuditEvents(
        { action: args.action, kind: args.kind, name: args.name },
        args.limit ?? DEFAULT_AUDIT_LIMIT,
        { signal: context.signal }
      )
      if (context.jsonOutput) {
        ui.outputJson({ items: events })
        return
      }
      if (events.length === 0) {
        ui.log(c.muted('No audit events'))
        return
      }
      ui.output(
        ui.formatTable(
          [
            { key: 'id', header: 'ID', align: 'right' },
            { key: 'at', header: 'AT' },
            { key: 'action', header: 'ACTION' },
            { key: 'kind', header: 'KIND' },
            { key: 'name', header: 'NAME' },
            { key: 'token', header: 'TOKEN_ID' }
          ],
          events.map(event => ({
            id: event.id,
            at: event.created_at,
            action: event.action,
            kind: event.kind,
            name: event.name,
            token: event.token_id || '-'
          }))
        )
      )
      return
    }

    default:
      failUnknownSubcommand('audit', subcommand, [['list', 'List audit events']])
  }
}
