/**
 * Local subprocess runner for remote machine jobs
 *
 * Re-invokes this CLI with the job's argument vector. The child inherits the
 * environment plus NO_COLOR=1, is killed when the timeout passes, and its
 * output is captured and truncated to 64 KiB per stream.
 */

import { spawn } from 'node:child_process'
import { timerDelay } from './timeout.js'

export const OUTPUT_MAX_BYTES = 64 * 1024
export const TRUNCATED_SENTINEL = '\n[truncated]'

export interface CommandResult {
  stdout: string
  stderr: string
  exitCode: number
  /** Set when the command could not run or did not exit cleanly */
  error?: string
}

export interface RunOptions {
  timeoutMs: number
  signal?: AbortSignal
}

export type CommandRunner = (args: string[], options: RunOptions) => Promise<CommandResult>

/**
 * Cut output at 64 KiB and mark it
 */
export function truncateOutput(raw: Buffer | string): string {
  const bytes = typeof raw === 'string' ? Buffer.from(raw, 'utf8') : raw
  if (bytes.length <= OUTPUT_MAX_BYTES) {
    return bytes.toString('utf8')
  }
  return bytes.subarray(0, OUTPUT_MAX_BYTES).toString('utf8') + TRUNCATED_SENTINEL
}

/**
 * Trimmed, non-empty arguments
 */
export function cleanArgs(args: string[]): string[] {
  return args.map(arg => arg.trim()).filter(arg => arg !== '')
}

/**
 * Arguments that re-invoke the running CLI script
 */
function selfInvocation(): string[] {
  const script = process.argv[1]
  return script ? [script] : []
}

/**
 * Runner that executes `executable [...prefixArgs, ...args]`
 *
 * Defaults to the current Node binary and CLI script, so a job's argv is
 * dispatched the same way a local invocation would be.
 */
export function createProcessRunner(
  executable: string = process.execPath,
  prefixArgs: string[] = selfInvocation()
): CommandRunner {
  return (args, options) => runCommand(executable, [...prefixArgs, ...args], options)
}

export function runCommand(executable: string, args: string[], options: RunOptions): Promise<CommandResult> {
  const argv = cleanArgs(args)
  if (argv.length === 0) {
    return Promise.resolve({ stdout: '', stderr: '', exitCode: 1, error: 'empty command' })
  }

  return new Promise<CommandResult>(resolve => {
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    let timedOut = false
    let settled = false

    const child = spawn(executable, argv, {
      env: { ...process.env, NO_COLOR: '1' },
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal
    })

    const timeoutHandle = setTimeout(() => {
      timedOut = true
      child.kill('SIGKILL')
    }, timerDelay(options.timeoutMs))

    const finish = (result: CommandResult): void => {
      if (settled) return
      settled = true
      clearTimeout(timeoutHandle)
      resolve(result)
    }

    child.stdout.on('data', (chunk: Buffer) => {
      stdout.push(chunk)
    })
    child.stderr.on('data', (chunk: Buffer) => {
      stderr.push(chunk)
    })

    child.on('error', err => {
      finish({
        stdout: truncateOutput(Buffer.concat(stdout)),
        stderr: truncateOutput(Buffer.concat(stderr)),
        exitCode: 1,
        error: err.message
      })
    })

    child.on('close', (code, signal) => {
      const result: CommandResult = {
        stdout: truncateOutput(Buffer.concat(stdout)),
        stderr: truncateOutput(Buffer.concat(stderr)),
        exitCode: code ?? 1
      }
      if (timedOut) {
        result.error = `command timed out after ${Math.round(options.timeoutMs / 1000)}s`
      } else if (signal) {
        result.error = `command terminated by ${signal}`
      } else if (result.exitCode !== 0) {
        result.error = `command exited with code ${result.exitCode}`
      }
      finish(result)
    })
  })
}
