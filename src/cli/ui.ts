/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): tables, colors, spinners on stderr
 * - Pipe: data only on stdout, tab-separated tables, no decoration
 */

import { Table, renderToString, getSpinnerConfig } from 'tuiuiu.js'
import { c, symbols } from './lib/colors.js'

export const isTTY = process.stdout.isTTY ?? false
export const isStderrTTY = process.stderr.isTTY ?? false

let quiet = false

/**
 * Silence `log` and `success`; warnings and errors still print
 */
export function setQuiet(value: boolean): void {
  quiet = value
}

/**
 * Output data to stdout
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

export function outputJson(value: unknown): void {
  output(JSON.stringify(value, null, 2))
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (isTTY && !quiet) {
    console.error(message)
  }
}

export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(`[sun] ${message}`)
  }
}

/**
 * Log error to stderr (always shown)
 */
export function error(message: string): void {
  console.error(`${symbols.error} ${c.error(message)}`)
}

export function success(message: string): void {
  if (isTTY && !quiet) {
    console.error(`${symbols.success} ${message}`)
  }
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string): void {
  console.error(`${symbols.warning} ${c.warning(message)}`)
}

export interface Spinner {
  start(): void
  stop(): void
  succeed(message?: string): void
  fail(message?: string): void
}

const silentSpinner: Spinner = {
  start: () => {},
  stop: () => {},
  succeed: () => {},
  fail: () => {}
}

/**
 * Spinner on stderr; does nothing when stderr is not a TTY or `enabled` is false
 */
export function createSpinner(text: string, enabled = true): Spinner {
  if (!isStderrTTY || !enabled) {
    return silentSpinner
  }

  const config = getSpinnerConfig('dots')
  let frameIndex = 0
  let interval: ReturnType<typeof setInterval> | null = null

  const clear = (): void => {
    if (interval) clearInterval(interval)
    interval = null
    process.stderr.write('\r\x1b[K')
  }

  return {
    start: () => {
      const render = (): void => {
        const frame = config.frames[frameIndex % config.frames.length] ?? ''
        process.stderr.write(`\r\x1b[K${frame} ${text}`)
        frameIndex++
      }
      render()
      interval = setInterval(render, config.interval)
    },
    stop: clear,
    succeed: message => {
      clear()
      if (!quiet) console.error(`${symbols.success} ${message ?? text}`)
    },
    fail: message => {
      clear()
      console.error(`${symbols.error} ${message ?? text}`)
    }
  }
}

export async function withSpinner<T>(text: string, operation: () => Promise<T>, enabled = true): Promise<T> {
  const spinner = createSpinner(text, enabled)
  spinner.start()
  try {
    const result = await operation()
    spinner.stop()
    return result
  } catch (err) {
    spinner.stop()
    throw err
  }
}

export type Cell = string | number | boolean | undefined

export interface Column<K extends string> {
  key: K
  header: string
  align?: 'left' | 'center' | 'right'
}

/**
 * Table via tuiuiu.js on a TTY; tab-separated with a header row when piped
 */
export function formatTable<K extends string>(columns: Array<Column<K>>, rows: Array<Record<K, Cell>>): string {
  const text = (cell: Cell): string => (cell === undefined ? '' : String(cell))

  if (!isTTY) {
    const headers = columns.map(col => col.header).join('\t')
    const lines = rows.map(row => columns.map(col => text(row[col.key])).join('\t'))
    return [headers, ...lines].join('\n')
  }

  const table = Table({
    columns: columns.map(col => ({ key: col.key, header: col.header, align: col.align ?? 'left' })),
    data: rows.map(row => Object.fromEntries(columns.map(col => [col.key, text(row[col.key])]))),
    borderStyle: 'round',
    showHeader: true
  })
  return renderToString(table)
}

/**
 * Aligned `key: value` lines on a TTY; `key=value` when piped
 */
export function formatKeyValue(pairs: Array<[string, Cell]>): string {
  const shown = pairs.filter((pair): pair is [string, string | number | boolean] => pair[1] !== undefined)
  if (!isTTY) {
    return shown.map(([k, v]) => `${k}=${v}`).join('\n')
  }
  const width = Math.max(0, ...shown.map(([k]) => k.length))
  return shown.map(([k, v]) => `${c.label(`${k.padEnd(width)}:`)} ${v}`).join('\n')
}
