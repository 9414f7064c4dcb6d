/**
 * Failure reporting for the CLI
 *
 * Human mode prints `✗ <message>` and a suggestion on stderr. JSON mode prints
 * a structured payload on stdout. Both return the exit code for the error kind.
 */

import { exitCodeFor, isSunError, wrapError } from '../../lib/errors.js'
import { c } from './colors.js'
import * as ui from '../ui.js'

export interface FailurePayload {
  ok: false
  error: {
    code: string
    message: string
    suggestion?: string
    context?: Record<string, unknown>
  }
}

export function failurePayload(err: unknown): FailurePayload {
  const error = wrapError(err)
  const payload: FailurePayload = {
    ok: false,
    error: { code: error.code, message: error.message }
  }
  if (error.suggestion) payload.error.suggestion = error.suggestion
  if (error.context) payload.error.context = error.context
  return payload
}

export function reportFailure(err: unknown, options: { json: boolean; verbose: boolean }): number {
  if (options.json) {
    ui.outputJson(failurePayload(err))
    return exitCodeFor(err)
  }

  if (isSunError(err)) {
    ui.error(err.message)
    if (err.suggestion) {
      console.error(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
    }
    if (options.verbose && err.context) {
      console.error(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
    }
  } else if (err instanceof Error) {
    ui.error(err.message)
    if (options.verbose && err.stack) {
      console.error(c.muted(err.stack))
    }
  } else {
    ui.error(String(err))
  }
  return exitCodeFor(err)
}
