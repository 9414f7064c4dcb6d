/**
 * Sun CLI - Machine job commands
 *
 * `run` queues a job on another machine, `jobs` lists them, `serve` executes
 * them on this one.
 */

import { InvalidArgumentError } from '../../../lib/errors.js'
import { resolveMachineId, resolveOperatorId } from '../../../lib/identity.js'
import {
  enqueueJob,
  jobFailure,
  listJobs,
  normalizeCommand,
  parseJobStatusFilter,
  serveMachine,
  waitForJob,
  waitTiming,
  DEFAULT_POLL_SECONDS
} from '../../../lib/machine.js'
import type { MachineJob } from '../../../types.js'
import { contextLogger, createClientFromContext, type CommandContext } from '../../lib/create-client.js'
import { c, colorStatus } from '../../lib/colors.js'
import * as ui from '../../ui.js'

function formatJob(job: MachineJob): string {
  const lines = [
    ui.formatKeyValue([
      ['job_id', job.job_id],
      ['machine', job.machine_id],
      ['status', ui.isTTY ? colorStatus(job.status) : job.status],
      ['requested_by', job.requested_by],
      ['command', job.command.join(' ')],
      ['claimed_by', job.claimed_by],
      ['exit_code', job.exit_code],
      ['error', job.error]
    ])
  ]
  if (job.stdout) lines.push(c.label('stdout:'), job.stdout.trimEnd())
  if (job.stderr) lines.push(c.label('stderr:'), job.stderr.trimEnd())
  return lines.join('\n')
}

export async function runMachineRun(context: CommandContext): Promise<void> {
  const { args } = context
  const target = args.machine?.trim() ?? ''
  if (target === '') {
    throw new InvalidArgumentError('--machine is required (target machine id)')
  }
  const command = normalizeCommand(args._.slice(2))
  const source = resolveMachineId(context.settings, args['source-machine'])
  const operator = resolveOperatorId(context.settings, args.operator ?? '', source, context.env)
  const logger = contextLogger(context)

  const client = createClientFromContext(context)
  const queued = await enqueueJob(
    client,
    { target, source, operator, command, timeoutSeconds: args['timeout-seconds'] },
    { signal: context.signal, logger }
  )

  if (!args.wait) {
    if (context.jsonOutput) {
      ui.outputJson({ object_name: queued.objectName, job: queued.job })
      return
    }
    ui.success(`Queued ${c.highlight(queued.job.job_id)} on ${queued.job.machine_id}`)
    ui.output(formatJob(queued.job))
    return
  }

  const timing = waitTiming(args['wait-timeout-seconds'], args['poll-seconds'])
  const job = await ui.withSpinner(
    `Waiting for ${queued.job.job_id} on ${queued.job.machine_id}`,
    () => waitForJob(client, queued.objectName, { ...timing, signal: context.signal, logger }),
    !context.jsonOutput
  )

  const failure = jobFailure(job)
  if (!context.jsonOutput) {
    ui.output(formatJob(job))
  }
  if (failure) {
    throw failure
  }
  if (context.jsonOutput) {
    ui.outputJson({ object_name: queued.objectName, job })
  }
}

export async function runMachineJobs(context: CommandContext): Promise<void> {
  const { args } = context
  const status = parseJobStatusFilter(args.status)
  const client = createClientFromContext(context)
  const jobs = await listJobs(
    client,
    { machineId: args.machine, requestedBy: args['requested-by'], status, limit: args.limit },
    { signal: context.signal, logger: contextLogger(context) }
  )

  if (context.jsonOutput) {
    ui.outputJson({ items: jobs })
    return
  }
  if (jobs.length === 0) {
    ui.log(c.muted('No jobs'))
    return
  }
  ui.output(
    ui.formatTable(
      [
        { key: 'job', header: 'JOB' },
        { key: 'machine', header: 'MACHINE' },
        { key: 'status', header: 'STATUS' },
        { key: 'requestedBy', header: 'REQUESTED_BY' },
        { key: 'at', header: 'AT' },
        { key: 'command', header: 'COMMAND' }
      ],
      jobs.map(job => ({
        job: job.job_id,
        machine: job.machine_id,
        status: ui.isTTY ? colorStatus(job.status) : job.status,
        requestedBy: job.requested_by,
        at: job.requested_at ?? '-',
        command: job.command.join(' ')
      }))
    )
  )
}

export async function runMachineServe(context: CommandContext): Promise<void> {
  const { args } = context
  const machineId = resolveMachineId(context.settings, args.machine)
  const client = createClientFromContext(context)
  const pollSeconds = Math.max(1, args['poll-seconds'] ?? DEFAULT_POLL_SECONDS)

  ui.log(`${c.info('Serving')} ${c.highlight(machineId)} ${c.muted(`(poll ${pollSeconds}s, Ctrl+C to stop)`)}`)
  const summary = await serveMachine(client, {
    machineId,
    once: args.once,
    maxJobs: args['max-jobs'],
    pollMs: pollSeconds * 1000,
    signal: context.signal,
    logger: message => {
      if (context.verbose) {
        ui.verbose(message, true)
      } else if (!context.jsonOutput) {
        ui.log(message)
      }
    }
  })

  if (context.jsonOutput) {
    ui.outputJson(summary)
    return
  }
  ui.output(
    ui.formatKeyValue([
      ['machine_id', summary.machine_id],
      ['processed', summary.processed],
      ['job_ids', summary.job_ids.join(',')]
    ])
  )
}
