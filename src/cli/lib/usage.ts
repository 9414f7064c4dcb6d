/**
 * Usage output for command groups
 */

import { InvalidArgumentError } from '../../lib/errors.js'
import { c } from './colors.js'
import * as ui from '../ui.js'

export type SubcommandHelp = Array<[name: string, description: string]>

/**
 * Print the group's usage and fail with InvalidArgument
 */
export function failUnknownSubcommand(group: string, subcommand: string | undefined, commands: SubcommandHelp): never {
  const width = Math.max(...commands.map(([name]) => name.length)) + 2
  ui.log(`${c.label('Usage:')} ${c.command(`sun ${group}`)} ${c.subcommand('<command>')} [options]`)
  ui.log('')
  ui.log(c.header('Commands:'))
  for (const [name, description] of commands) {
    ui.log(`  ${c.subcommand(name.padEnd(width))}${description}`)
  }

  if (!subcommand || subcommand.startsWith('-')) {
    throw new InvalidArgumentError(`sun ${group} requires a subcommand`, {
      suggestion: `Run "sun ${group} --help" for usage`
    })
  }
  throw new InvalidArgumentError(`Unknown subcommand: ${group} ${subcommand}`, {
    suggestion: `Run "sun ${group} --help" for usage`
  })
}
