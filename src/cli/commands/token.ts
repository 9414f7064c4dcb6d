/**
 * Sun CLI - Token Commands
 *
 * List, issue and revoke API tokens.
 */

import { InvalidArgumentError } from '../../lib/errors.js'
import { createClientFromContext, splitCsv, type CommandContext } from '../lib/create-client.js'
import { c } from '../lib/colors.js'
import { failUnknownSubcommand } from '../lib/usage.js'
import * as ui from '../ui.js'

const DEFAULT_TOKEN_LIMIT = 100
const DEFAULT_TOKEN_LABEL = 'sun-cli'
const DEFAULT_TOKEN_SCOPES = ['objects:read', 'objects:write']

export async function runTokenGroup(context: CommandContext): Promise<void> {
  const { args } = context
  const subcommand = args._[1]

  switch (subcommand) {
    case 'list':
    case 'ls': {
      const client = createClientFromContext(context)
      const tokens = await client.listTokens(args['include-revoked'] ?? false, args.limit ?? DEFAULT_TOKEN_LIMIT, {
        signal: context.signal
      })
      if (context.jsonOutput) {
        ui.outputJson({ items: tokens })
        return
      }
      if (tokens.length === 0) {
        ui.log(c.muted('No tokens'))
        return
      }
      ui.output(
        ui.formatTable(
          [
            { key: 'id', header: 'TOKEN_ID' },
            { key: 'label', header: 'LABEL' },
            { key: 'scopes', header: 'SCOPES' },
            { key: 'expires', header: 'EXPIRES' },
            { key: 'revoked', header: 'REVOKED' },
            { key: 'used', header: 'LAST_USED' }
          ],
          tokens.map(token => ({
            id: token.token_id,
            label: token.label,
            scopes: token.scopes.join(','),
            expires: token.expires_at || '-',
            revoked: token.revoked_at || '-',
            used: token.last_used_at || '-'
          }))
        )
      )
      return
    }

    case 'create': {
      const client = createClientFromContext(context)
      const scopes = splitCsv(args.scopes)
      const issued = await client.createToken(
        args.label?.trim() || DEFAULT_TOKEN_LABEL,
        scopes.length > 0 ? scopes : DEFAULT_TOKEN_SCOPES,
        args['expires-hours'] ?? 0,
        { signal: context.signal }
      )
      if (context.jsonOutput) {
        ui.outputJson(issued)
        return
      }
      ui.success(`Issued token ${issued.token_id}`)
      ui.output(
        ui.formatKeyValue([
          ['token_id', issued.token_id],
          ['label', issued.label],
          ['scopes', issued.scopes.join(',')],
          ['expires_at', issued.expires_at],
          ['token', issued.token]
        ])
      )
      ui.warn('The token is shown only once')
      return
    }

    case 'revoke': {
      const tokenId = args.id?.trim() ?? ''
      if (tokenId === '') {
        throw new InvalidArgumentError('--id is required')
      }
      const client = createClientFromContext(context)
      await client.revokeToken(tokenId, { signal: context.signal })
      if (context.jsonOutput) {
        ui.outputJson({ token_id: tokenId, revoked: true })
        return
      }
      ui.success(`Revoked token ${tokenId}`)
      return
    }

    default:
      failUnknownSubcommand('token', subcommand, [
        ['list', 'List tokens'],
        ['create', 'Issue a new token'],
        ['revoke', 'Revoke a token']
      ])
  }
}
