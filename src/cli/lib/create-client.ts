/**
 * Command context and client construction for CLI commands
 */

import type { CLIArgs, SunSettings } from '../../types.js'
import { SunClient } from '../../client.js'
import type { EnvMap } from '../../lib/config-loader.js'
import { resolveEndpoint, type Endpoint } from '../../lib/endpoint.js'
import * as ui from '../ui.js'

export interface CommandContext {
  args: CLIArgs
  /** Settings after config files and SUN_* environment overrides */
  settings: SunSettings
  configPath: string | null
  env: EnvMap
  verbose: boolean
  quiet: boolean
  jsonOutput: boolean
  /** Aborted on SIGINT/SIGTERM */
  signal: AbortSignal
}

/**
 * Progress callback for core operations, printed only with --verbose
 */
export function contextLogger(context: CommandContext): (message: string) => void {
  return message => ui.verbose(message, context.verbose)
}

export function resolveContextEndpoint(context: CommandContext): Endpoint {
  return resolveEndpoint(context.settings, { baseUrl: context.args['base-url'] })
}

/**
 * Client for the configured endpoint
 *
 * Throws NotConfigured, InvalidCredential or InsecureTransport before any
 * request is made.
 */
export function createClientFromContext(context: CommandContext): SunClient {
  const endpoint = resolveContextEndpoint(context)
  ui.verbose(`endpoint ${endpoint.baseUrl} (timeout ${endpoint.timeoutMs / 1000}s)`, context.verbose)
  return new SunClient({
    baseUrl: endpoint.baseUrl,
    token: endpoint.token,
    timeoutMs: endpoint.timeoutMs,
    allowInsecureHttp: endpoint.allowInsecureHttp,
    onRetry: event => {
      ui.verbose(
        `${event.method} ${event.path}: ${event.reason}; retry ${event.attempt} in ${event.delayMs}ms`,
        context.verbose
      )
    }
  })
}

/**
 * Comma-separated flag value as a trimmed list
 */
export function splitCsv(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item !== '')
}
