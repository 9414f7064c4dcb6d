/**
 * Sun CLI - Gateway Command Group
 *
 * Build, publish and pull the sharded plugin catalog.
 */

import type { CommandContext } from '../../lib/create-client.js'
import { failUnknownSubcommand } from '../../lib/usage.js'

export async function runGatewayGroup(context: CommandContext): Promise<void> {
  const subcommand = context.args._[1]

  switch (subcommand) {
    case 'build': {
      const { runGatewayBuild } = await import('./build.js')
      await runGatewayBuild(context)
      break
    }

    case 'push': {
      const { runGatewayPush } = await import('./build.js')
      await runGatewayPush(context)
      break
    }

    case 'pull': {
      const { runGatewayPull } = await import('./pull.js')
      await runGatewayPull(context)
      break
    }

    case 'status': {
      const { runGatewayStatus } = await import('./pull.js')
      await runGatewayStatus(context)
      break
    }

    default:
      failUnknownSubcommand('gateway', subcommand, [
        ['build', 'Build the index and shards from manifests'],
        ['push', 'Build and publish'],
        ['pull', 'Fetch shards and write a merged catalog'],
        ['status', 'Summarize the published index']
      ])
  }
}
