/**
 * Sun CLI - Doctor Command
 *
 * Readiness and credential checks against the configured endpoint.
 */

import type { SunClient } from '../../client.js'
import { EXIT_CODES } from '../../lib/errors.js'
import type { WhoAmI } from '../../types.js'
import { createClientFromContext, type CommandContext } from '../lib/create-client.js'
import { c, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface DoctorReport {
  base_url: string
  readiness_ok: boolean
  whoami_ok: boolean
  whoami?: WhoAmI
  readiness_error?: string
  whoami_error?: string
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Run both checks; failures are recorded, not thrown
 */
export async function collectDoctorReport(client: SunClient, signal?: AbortSignal): Promise<DoctorReport> {
  const report: DoctorReport = { base_url: client.baseUrl, readiness_ok: false, whoami_ok: false }

  try {
    await client.ready({ signal })
    report.readiness_ok = true
  } catch (err) {
    report.readiness_error = messageOf(err)
  }

  try {
    report.whoami = await client.whoAmI({ signal })
    report.whoami_ok = true
  } catch (err) {
    report.whoami_error = messageOf(err)
  }

  return report
}

export async function runDoctor(context: CommandContext): Promise<void> {
  const client = createClientFromContext(context)
  const report = await ui.withSpinner(
    `Checking ${client.baseUrl}`,
    () => collectDoctorReport(client, context.signal),
    !context.jsonOutput
  )
  const healthy = report.readiness_ok && report.whoami_ok

  if (context.jsonOutput) {
    ui.outputJson(report)
  } else {
    const mark = (ok: boolean): string => (ok ? symbols.success : symbols.error)
    ui.output(`${c.header('Sun doctor')} ${c.muted(report.base_url)}`)
    ui.output(`  ${mark(report.readiness_ok)} readiness ${report.readiness_error ? c.error(report.readiness_error) : c.success('ok')}`)
    const who = report.whoami
      ? c.success(`${report.whoami.account_slug || report.whoami.account_id} (token ${report.whoami.token_id})`)
      : c.error(report.whoami_error ?? 'unknown')
    ui.output(`  ${mark(report.whoami_ok)} whoami    ${who}`)
  }

  if (!healthy) {
    process.exitCode = EXIT_CODES.READINESS_FAILED
  }
}
