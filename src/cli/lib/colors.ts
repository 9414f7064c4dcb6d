/**
 * Sun CLI - Colors
 *
 * Warm palette on ANSI 256, rendered through tuiuiu.js text utils.
 * Honors NO_COLOR and FORCE_COLOR.
 */

import { colorize, style, stripAnsi } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'

export function isColorEnabled(env: NodeJS.ProcessEnv = process.env, tty = process.stdout.isTTY ?? false): boolean {
  if (env.NO_COLOR !== undefined) return false
  if (env.FORCE_COLOR !== undefined) return true
  return tty
}

const enabled = isColorEnabled()

const paint = (code: number) => (s: string): string => (enabled ? `\x1b[38;5;${code}m${s}\x1b[39m` : s)

/**
 * Sun palette (ANSI 256)
 * - 214: Amber   (#FFAF00) primary, commands
 * - 220: Gold    (#FFD700) highlights
 * - 208: Orange  (#FF8700) options
 * - 180: Sand    (#D7AF87) muted descriptions
 * - 252: Light gray text
 * - 245: Medium gray muted text
 */
const ansi = {
  bold: (s: string) => (enabled ? style(s, 'bold') : s),
  dim: (s: string) => (enabled ? style(s, 'dim') : s),

  amber: paint(214),
  gold: paint(220),
  orange: paint(208),
  sand: paint(180),

  white: paint(15),
  gray: paint(245),
  lightGray: paint(252),

  red: (s: string) => (enabled ? colorize(s, 'redBright') : s),
  green: (s: string) => (enabled ? colorize(s, 'greenBright') : s),
  yellow: (s: string) => (enabled ? colorize(s, 'yellowBright') : s),
  cyan: (s: string) => (enabled ? colorize(s, 'cyan') : s)
}

export { ansi, stripAnsi }

/**
 * Help and version theme for cli-args-parser
 */
export const sunFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.amber(s)),
  'version': s => ansi.gold(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.amber(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.gold(s),
  'option-type': s => ansi.orange(s),
  'option-default': s => ansi.dim(ansi.sand(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.orange(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.amber(s)
}

export const c = {
  command: (text: string) => ansi.bold(ansi.amber(text)),
  subcommand: (text: string) => ansi.gold(text),
  key: (text: string) => ansi.gold(text),
  value: (text: string) => ansi.lightGray(text),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),
  info: (text: string) => ansi.amber(text),

  header: (text: string) => ansi.bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  highlight: (text: string) => ansi.bold(ansi.gold(text)),
  muted: (text: string) => ansi.dim(text)
}

/**
 * Task and job statuses: green when finished well, red when not,
 * yellow while in flight
 */
export function colorStatus(status: string): string {
  switch (status) {
    case 'done':
    case 'succeeded':
      return c.success(status)
    case 'failed':
    case 'denied':
      return c.error(status)
    case 'doing':
    case 'running':
      return c.warning(status)
    case 'queued':
      return ansi.cyan(status)
    default:
      return status
  }
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  info: enabled ? ansi.amber('ℹ') : '[INFO]',
  bullet: enabled ? ansi.sand('•') : '*'
}

export function labeled(label: string, value: string): string {
  return `${c.label(label + ':')} ${value}`
}
