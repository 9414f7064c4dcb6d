/**
 * Sun CLI - Machine Command Group
 *
 * Machine registry, ACLs and remote jobs.
 */

import type { CommandContext } from '../../lib/create-client.js'
import { failUnknownSubcommand } from '../../lib/usage.js'

export async function runMachineGroup(context: CommandContext): Promise<void> {
  const subcommand = context.args._[1]

  switch (subcommand) {
    case 'register': {
      const { runMachineRegister } = await import('./registry.js')
      await runMachineRegister(context)
      break
    }

    case 'status': {
      const { runMachineStatus } = await import('./registry.js')
      await runMachineStatus(context)
      break
    }

    case 'list':
    case 'ls': {
      const { runMachineList } = await import('./registry.js')
      await runMachineList(context)
      break
    }

    case 'allow': {
      const { runMachineAllow } = await import('./registry.js')
      await runMachineAllow(context)
      break
    }

    case 'deny': {
      const { runMachineDeny } = await import('./registry.js')
      await runMachineDeny(context)
      break
    }

    case 'run': {
      const { runMachineRun } = await import('./jobs.js')
      await runMachineRun(context)
      break
    }

    case 'jobs': {
      const { runMachineJobs } = await import('./jobs.js')
      await runMachineJobs(context)
      break
    }

    case 'serve': {
      const { runMachineServe } = await import('./jobs.js')
      await runMachineServe(context)
      break
    }

    default:
      failUnknownSubcommand('machine', subcommand, [
        ['register', 'Register or update this machine'],
        ['status', 'Show a machine record'],
        ['list', 'List registered machines'],
        ['allow', 'Grant an operator access'],
        ['deny', 'Revoke an operator'],
        ['run', 'Queue a command on another machine'],
        ['jobs', 'List jobs'],
        ['serve', 'Execute queued jobs for this machine']
      ])
  }
}
