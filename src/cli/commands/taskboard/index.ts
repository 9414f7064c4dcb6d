/**
 * Sun CLI - Taskboard Command Group
 *
 * Shared task board with leased claims.
 */

import type { CommandContext } from '../../lib/create-client.js'
import { failUnknownSubcommand } from '../../lib/usage.js'

/**
 * Router for taskboard subcommands
 */
export async function runTaskboardGroup(context: CommandContext): Promise<void> {
  const subcommand = context.args._[1]

  switch (subcommand) {
    case 'show': {
      const { runTaskboardShow } = await import('./read.js')
      await runTaskboardShow(context)
      break
    }

    case 'list':
    case 'ls': {
      const { runTaskboardList } = await import('./read.js')
      await runTaskboardList(context)
      break
    }

    case 'add': {
      const { runTaskboardAdd } = await import('./write.js')
      await runTaskboardAdd(context)
      break
    }

    case 'claim': {
      const { runTaskboardClaim } = await import('./write.js')
      await runTaskboardClaim(context)
      break
    }

    case 'release': {
      const { runTaskboardRelease } = await import('./write.js')
      await runTaskboardRelease(context)
      break
    }

    case 'done': {
      const { runTaskboardDone } = await import('./write.js')
      await runTaskboardDone(context)
      break
    }

    default:
      failUnknownSubcommand('taskboard', subcommand, [
        ['show', 'Show board counts and tasks'],
        ['list', 'List tasks'],
        ['add', 'Add a task'],
        ['claim', 'Claim a task, or the next claimable one'],
        ['release', 'Release a claimed task'],
        ['done', 'Mark a task done']
      ])
  }
}
