/**
 * Agent, machine and operator identities
 *
 * Sanitization happens here, at the boundary. Everything downstream works on
 * already-clean ids and renders them unchanged into storage keys.
 */

import os from 'node:os'
import type { AgentIdentity, SunSettings } from '../types.js'
import type { EnvMap } from './config-loader.js'

const FALLBACK_MACHINE = 'machine-unknown'

function collapse(raw: string, keep: (ch: string) => boolean): string {
  let out = ''
  for (const ch of raw) {
    out += keep(ch) ? ch : '-'
  }
  return out.replace(/^-+|-+$/g, '')
}

/**
 * Lowercase `[a-z0-9._-]`; anything else becomes `-`, edges trimmed
 *
 * @example
 * sanitizeSlug('  Build Box #2 ') // 'build-box--2'
 */
export function sanitizeSlug(raw: string): string {
  const value = raw.trim().toLowerCase()
  if (value === '') return ''
  return collapse(value, ch => /[a-z0-9._-]/.test(ch))
}

/**
 * Case-preserving `[A-Za-z0-9._:@-]`
 */
export function sanitizeOperatorId(raw: string): string {
  const value = raw.trim()
  if (value === '') return ''
  return collapse(value, ch => /[A-Za-z0-9._:@-]/.test(ch)).trim()
}

export function firstNonEmpty(...values: Array<string | undefined>): string {
  for (const value of values) {
    const trimmed = (value ?? '').trim()
    if (trimmed !== '') return trimmed
  }
  return ''
}

/**
 * Local login name from USER or USERNAME, "user" when neither is set
 */
export function localUserName(env: EnvMap = process.env): string {
  return firstNonEmpty(env.USER, env.USERNAME) || 'user'
}

function hostName(): string {
  try {
    return os.hostname()
  } catch {
    return ''
  }
}

export interface AgentIdentityInput {
  settings: SunSettings
  agent?: string
  dyad?: string
  machine?: string
  env?: EnvMap
  hostname?: string
}

/**
 * Resolve who is acting on a taskboard
 *
 * The agent id is the explicit flag, then the configured agent, then
 * `dyad:<dyad or user>@<machine>`. The machine comes from the flag, the
 * configured machine id, or the host name.
 */
export function resolveAgentIdentity(input: AgentIdentityInput): AgentIdentity {
  const host = firstNonEmpty(input.machine, input.settings.machine_id, input.hostname ?? hostName())
  const machine = sanitizeSlug(host) || 'machine'
  const user = sanitizeSlug(localUserName(input.env)) || 'user'
  const dyad = sanitizeSlug(input.dyad ?? '')

  let agentId = firstNonEmpty(input.agent, input.settings.taskboard_agent)
  if (agentId === '') {
    agentId = `dyad:${dyad || user}@${machine}`
  }
  return {
    agentId: agentId.toLowerCase(),
    dyad,
    machine,
    user
  }
}

/**
 * Machine id: explicit, configured, host name, then "machine-unknown"
 */
export function resolveMachineId(settings: SunSettings, explicit = '', hostname: string = hostName()): string {
  for (const candidate of [explicit, settings.machine_id ?? '', hostname]) {
    const id = sanitizeSlug(candidate)
    if (id !== '') return id
  }
  return FALLBACK_MACHINE
}

/**
 * Operator id: explicit, configured, then `op:<user>@<machine>`
 */
export function resolveOperatorId(
  settings: SunSettings,
  explicit: string,
  machineId: string,
  env: EnvMap = process.env
): string {
  for (const candidate of [explicit, settings.operator_id ?? '']) {
    const id = sanitizeOperatorId(candidate)
    if (id !== '') return id
  }
  const user = sanitizeSlug(localUserName(env))
  return sanitizeOperatorId(`op:${user}@${sanitizeSlug(machineId)}`)
}
