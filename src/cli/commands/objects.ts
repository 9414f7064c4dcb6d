/**
 * Sun CLI - Objects Commands
 *
 * Raw listing of stored objects and their revisions.
 */

import { InvalidArgumentError } from '../../lib/errors.js'
import { createClientFromContext, type CommandContext } from '../lib/create-client.js'
import { c } from '../lib/colors.js'
import { failUnknownSubcommand } from '../lib/usage.js'
import * as ui from '../ui.js'

function required(value: string | undefined, flag: string): string {
  const trimmed = value?.trim() ?? ''
  if (trimmed === '') {
    throw new InvalidArgumentError(`${flag} is required`)
  }
  return trimmed
}

export async function runObjectsGroup(context: CommandContext): Promise<void> {
  const { args } = context
  const subcommand = args._[1]

  switch (subcommand) {
    case 'list':
    case 'ls': {
      const client = createClientFromContext(context)
      const items = await client.listObjects(args.kind ?? '', args.name ?? '', args.limit ?? 0, { signal: context.signal })
      if (context.jsonOutput) {
        ui.outputJson({ items })
        return
      }
      if (items.length === 0) {
        ui.log(c.muted('No objects'))
        return
      }
      ui.output(
        ui.formatTable(
          [
            { key: 'kind', header: 'KIND' },
            { key: 'name', header: 'NAME' },
            { key: 'revision', header: 'REV', align: 'right' },
            { key: 'size', header: 'SIZE', align: 'right' },
            { key: 'updated', header: 'UPDATED' }
          ],
          items.map(item => ({
            kind: item.kind,
            name: item.name,
            revision: item.latest_revision,
            size: item.size_bytes,
            updated: item.updated_at
          }))
        )
      )
      return
    }

    case 'revisions': {
      const kind = required(args.kind, '--kind')
      const name = required(args.name, '--name')
      const client = createClientFromContext(context)
      const revisions = await client.listRevisions(kind, name, args.limit ?? 0, { signal: context.signal })
      if (context.jsonOutput) {
        ui.outputJson({ kind, name, items: revisions })
        return
      }
      ui.output(
        ui.formatTable(
          [
            { key: 'revision', header: 'REV', align: 'right' },
            { key: 'checksum', header: 'CHECKSUM' },
            { key: 'size', header: 'SIZE', align: 'right' },
            { key: 'created', header: 'CREATED' }
          ],
          revisions.map(rev => ({
            revision: rev.revision,
            checksum: rev.checksum,
            size: rev.size_bytes,
            created: rev.created_at
          }))
        )
      )
      return
    }

    default:
      failUnknownSubcommand('objects', subcommand, [
        ['list', 'List objects'],
        ['revisions', 'List revisions of one object']
      ])
  }
}
