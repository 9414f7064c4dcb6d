/**
 * Machine Control
 *
 * Machines register a record (`si_machine`) with capabilities and an operator
 * ACL. A controlling machine enqueues job objects (`si_machine_job`) named
 * `<target>--<job_id>`; the target's serve loop claims queued jobs with
 * compare-and-swap, runs them locally and writes back a terminal state.
 */

import { z } from 'zod'
import type { SunClient } from '../client.js'
import { revisionOf } from '../client.js'
import type { JobStatus, MachineJob, MachineRecord, ServeSummary } from '../types.js'
import {
  InvalidArgumentError,
  JobNotFoundError,
  MachineUnregisteredError,
  MalformedResponseError,
  NotPermittedError,
  SourceCannotControlError,
  SourceNotAuthorizedError,
  TargetRefusesControlError,
  RemoteJobFailedError,
  WaitTimeoutError,
  isRevisionConflict
} from './errors.js'
import { sanitizeOperatorId, sanitizeSlug } from './identity.js'
import { createProcessRunner, cleanArgs, type CommandRunner } from './job-runner.js'
import {
  formatIssues,
  looseBoolean,
  looseNumber,
  looseString,
  looseStringList,
  optionalNumber,
  optionalString,
  tryParseJson
} from './schema-utils.js'
import { base36Suffix, compactUtc, compareStrings, rfc3339, timestampKey } from './stamps.js'
import { OperationTimeoutError, sleep as defaultSleep, withTimeout } from './timeout.js'

export const MACHINE_KIND = 'si_machine'
export const MACHINE_JOB_KIND = 'si_machine_job'

export const MIN_JOB_TIMEOUT_SECONDS = 10
export const DEFAULT_JOB_TIMEOUT_SECONDS = 900
export const DEFAULT_WAIT_TIMEOUT_SECONDS = 1200
export const DEFAULT_POLL_SECONDS = 2
export const DEFAULT_LIST_LIMIT = 200
export const CLI_EXECUTABLE = 'sun'

const CLAIM_SCAN_LIMIT = 200
const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(['succeeded', 'failed', 'denied'])

export interface MachineOptions {
  signal?: AbortSignal
  now?: () => Date
  logger?: (message: string) => void
}

export interface LoadedMachine {
  record: MachineRecord
  revision: number
  exists: boolean
}

export interface LoadedJob {
  job: MachineJob
  revision: number
  exists: boolean
}

export interface RegisterInput {
  machineId: string
  operatorId: string
  displayName?: string
  allowOperators?: string[]
  /** Undefined keeps the stored value (false on first registration) */
  canControlOthers?: boolean
  /** Undefined keeps the stored value (true on first registration) */
  canBeControlled?: boolean
}

export interface MachineWriteResult {
  machine: MachineRecord
  revision: number
}

export interface EnqueueInput {
  target: string
  source: string
  operator: string
  command: string[]
  timeoutSeconds?: number
}

export interface EnqueuedJob {
  job: MachineJob
  objectName: string
}

export interface WaitOptions extends MachineOptions {
  timeoutMs: number
  pollMs: number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export interface JobFilter {
  machineId?: string
  requestedBy?: string
  status?: JobStatus
  limit?: number
}

export interface ClaimedJob {
  objectName: string
  job: MachineJob
  revision: number
}

export interface ServeOptions extends MachineOptions {
  machineId: string
  once?: boolean
  maxJobs?: number
  pollMs?: number
  runner?: CommandRunner
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

// =============================================================================
// Normalization
// =============================================================================

const JOB_STATUS_SYNONYMS: Record<string, JobStatus> = {
  '': 'queued',
  queued: 'queued',
  pending: 'queued',
  running: 'running',
  claimed: 'running',
  succeeded: 'succeeded',
  success: 'succeeded',
  ok: 'succeeded',
  failed: 'failed',
  error: 'failed',
  denied: 'denied',
  forbidden: 'denied'
}

/**
 * Canonical job status, or null for unknown input
 */
export function normalizeJobStatus(raw: string | undefined): JobStatus | null {
  return JOB_STATUS_SYNONYMS[(raw ?? '').trim().toLowerCase()] ?? null
}

export function parseJobStatusFilter(raw: string | undefined): JobStatus | undefined {
  const value = (raw ?? '').trim()
  if (value === '') return undefined
  const status = normalizeJobStatus(value)
  if (!status) {
    throw new InvalidArgumentError(`invalid --status "${value}"`)
  }
  return status
}

export function isTerminalStatus(status: string): boolean {
  const normalized = normalizeJobStatus(status)
  return normalized !== null && TERMINAL_STATUSES.has(normalized)
}

/**
 * Sanitized, deduplicated (case-insensitive) and sorted operator ids
 */
export function normalizeOperatorIds(values: string[]): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const value of values) {
    const id = sanitizeOperatorId(value)
    if (id === '' || seen.has(id.toLowerCase())) continue
    seen.add(id.toLowerCase())
    out.push(id)
  }
  return out.sort(compareStrings)
}

const recordSchema = z.object({
  version: looseNumber,
  machine_id: looseString,
  display_name: optionalString,
  owner_operator: looseString,
  updated_at: optionalString,
  registered_at: optionalString,
  capabilities: z.preprocess(
    value => value ?? {},
    z.object({ can_control_others: looseBoolean, can_be_controlled: looseBoolean })
  ),
  acl: z.preprocess(value => value ?? {}, z.object({ allowed_operators: looseStringList })),
  heartbeat: z.preprocess(
    value => value ?? {},
    z.object({ last_seen_at: optionalString, last_state: optionalString })
  )
})

const jobSchema = z.object({
  version: looseNumber,
  job_id: looseString,
  machine_id: looseString,
  requested_by: looseString,
  source_machine: optionalString,
  command: looseStringList,
  timeout_seconds: looseNumber,
  status: looseString,
  requested_at: optionalString,
  updated_at: optionalString,
  claimed_by: optionalString,
  claimed_at: optionalString,
  started_at: optionalString,
  completed_at: optionalString,
  exit_code: optionalNumber,
  stdout: optionalString,
  stderr: optionalString,
  error: optionalString
})

function decode<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new MalformedResponseError(what, new Error(formatIssues(parsed.error)))
  }
  return parsed.data
}

/**
 * Clean a machine record; the owner always appears in the ACL
 */
export function normalizeMachineRecord(raw: unknown, fallbackId: string): MachineRecord {
  const data = decode(recordSchema, raw ?? {}, 'machine payload')
  const owner = sanitizeOperatorId(data.owner_operator)
  const allowed = owner === '' ? data.acl.allowed_operators : [...data.acl.allowed_operators, owner]
  return {
    version: Math.max(1, data.version),
    machine_id: sanitizeSlug(data.machine_id.trim() || fallbackId),
    display_name: data.display_name?.trim() || undefined,
    owner_operator: owner,
    capabilities: data.capabilities,
    acl: { allowed_operators: normalizeOperatorIds(allowed) },
    heartbeat: data.heartbeat,
    registered_at: data.registered_at,
    updated_at: data.updated_at
  }
}

export function normalizeMachineJob(raw: unknown): MachineJob {
  const data = decode(jobSchema, raw ?? {}, 'machine job payload')
  return {
    ...data,
    version: Math.max(1, data.version),
    job_id: data.job_id.trim(),
    machine_id: sanitizeSlug(data.machine_id),
    requested_by: sanitizeOperatorId(data.requested_by),
    source_machine: sanitizeSlug(data.source_machine ?? '') || undefined,
    command: cleanArgs(data.command),
    timeout_seconds: Math.max(MIN_JOB_TIMEOUT_SECONDS, data.timeout_seconds),
    status: normalizeJobStatus(data.status) ?? ''
  }
}

export function operatorAllowed(record: MachineRecord, operatorId: string): boolean {
  const needle = operatorId.trim().toLowerCase()
  if (needle === '') return false
  if (record.owner_operator.trim().toLowerCase() === needle) return true
  return record.acl.allowed_operators.some(allowed => allowed.trim().toLowerCase() === needle)
}

// =============================================================================
// Ids
// =============================================================================

export function generateJobId(now: Date, suffix: () => string = base36Suffix): string {
  return `job-${compactUtc(now)}-${suffix()}`
}

export function jobNamePrefix(machineId: string): string {
  return `${sanitizeSlug(machineId)}--`
}

export function jobObjectName(machineId: string, jobId: string): string {
  return jobNamePrefix(machineId) + jobId.trim()
}

/**
 * Job argv: drop a leading `--` and the executable name, then empty strings
 */
export function normalizeCommand(args: string[], executable: string = CLI_EXECUTABLE): string[] {
  let rest = [...args]
  if (rest.length > 0 && rest[0].trim() === '--') rest = rest.slice(1)
  if (rest.length > 0 && rest[0].trim().toLowerCase() === executable.toLowerCase()) rest = rest.slice(1)
  return cleanArgs(rest)
}

// =============================================================================
// Store access
// =============================================================================

function clockOf(options: MachineOptions): () => Date {
  return options.now ?? (() => new Date())
}

async function loadObject(
  client: SunClient,
  kind: string,
  name: string,
  options: MachineOptions
): Promise<{ raw: unknown; revision: number } | null> {
  const meta = await client.lookupObjectMeta(kind, name, { signal: options.signal })
  if (!meta) return null
  const payload = await client.getPayload(kind, name, { signal: options.signal })
  const parsed = tryParseJson(payload.toString('utf8'))
  if (!parsed.ok) {
    throw new MalformedResponseError(`${kind} ${name} payload`, parsed.error)
  }
  return { raw: parsed.value, revision: meta.latest_revision }
}

export async function loadMachine(client: SunClient, machineId: string, options: MachineOptions = {}): Promise<LoadedMachine> {
  const id = sanitizeSlug(machineId)
  if (id === '') {
    throw new InvalidArgumentError('machine id is required')
  }
  const found = await loadObject(client, MACHINE_KIND, id, options)
  if (!found) {
    return { record: normalizeMachineRecord({ machine_id: id }, id), revision: 0, exists: false }
  }
  return { record: normalizeMachineRecord(found.raw, id), revision: found.revision, exists: true }
}

async function requireMachine(
  client: SunClient,
  machineId: string,
  options: MachineOptions
): Promise<LoadedMachine> {
  const loaded = await loadMachine(client, machineId, options)
  if (!loaded.exists) {
    throw new MachineUnregisteredError(loaded.record.machine_id)
  }
  return loaded
}

async function persistMachine(
  client: SunClient,
  record: MachineRecord,
  expectedRevision: number | undefined,
  options: MachineOptions
): Promise<number> {
  const normalized = normalizeMachineRecord(record, record.machine_id)
  const result = await client.putObject(
    MACHINE_KIND,
    normalized.machine_id,
    {
      payload: JSON.stringify(normalized, null, 2),
      contentType: 'application/json',
      metadata: {
        machine_id: normalized.machine_id,
        owner_operator: normalized.owner_operator,
        can_control_others: normalized.capabilities.can_control_others,
        can_be_controlled: normalized.capabilities.can_be_controlled,
        allowed_operators_n: normalized.acl.allowed_operators.length
      },
      expectedRevision
    },
    { signal: options.signal }
  )
  return revisionOf(result)
}

export async function loadJob(client: SunClient, objectName: string, options: MachineOptions = {}): Promise<LoadedJob | null> {
  const name = objectName.trim()
  if (name === '') {
    throw new InvalidArgumentError('job name is required')
  }
  const found = await loadObject(client, MACHINE_JOB_KIND, name, options)
  if (!found) return null
  return { job: normalizeMachineJob(found.raw), revision: found.revision, exists: true }
}

async function persistJob(
  client: SunClient,
  objectName: string,
  job: MachineJob,
  expectedRevision: number | undefined,
  options: MachineOptions
): Promise<number> {
  const normalized = normalizeMachineJob(job)
  const result = await client.putObject(
    MACHINE_JOB_KIND,
    objectName.trim(),
    {
      payload: JSON.stringify(normalized, null, 2),
      contentType: 'application/json',
      metadata: {
        machine_id: normalized.machine_id,
        job_id: normalized.job_id,
        status: normalized.status,
        requested_by: normalized.requested_by
      },
      expectedRevision
    },
    { signal: options.signal }
  )
  return revisionOf(result)
}

// =============================================================================
// Registry
// =============================================================================

/**
 * Create or update a machine record
 *
 * Capabilities are only overwritten when supplied. The ACL always gains the
 * acting operator and the owner.
 */
export async function registerMachine(
  client: SunClient,
  input: RegisterInput,
  options: MachineOptions = {}
): Promise<MachineWriteResult> {
  const machineId = sanitizeSlug(input.machineId)
  const operatorId = sanitizeOperatorId(input.operatorId)
  if (machineId === '') throw new InvalidArgumentError('machine id is required')
  if (operatorId === '') throw new InvalidArgumentError('operator id is required')

  const loaded = await loadMachine(client, machineId, options)
  const now = rfc3339(clockOf(options)())
  const record = loaded.record

  if (!loaded.exists) {
    record.owner_operator = operatorId
    record.registered_at = now
    record.capabilities = {
      can_control_others: input.canControlOthers ?? false,
      can_be_controlled: input.canBeControlled ?? true
    }
  } else {
    if (record.owner_operator === '') record.owner_operator = operatorId
    if (input.canControlOthers !== undefined) record.capabilities.can_control_others = input.canControlOthers
    if (input.canBeControlled !== undefined) record.capabilities.can_be_controlled = input.canBeControlled
  }
  record.machine_id = machineId
  const displayName = (input.displayName ?? '').trim()
  if (displayName !== '') record.display_name = displayName
  record.acl.allowed_operators = normalizeOperatorIds([
    ...record.acl.allowed_operators,
    operatorId,
    record.owner_operator,
    ...(input.allowOperators ?? [])
  ])
  record.updated_at = now
  record.heartbeat = { last_seen_at: now, last_state: 'registered' }

  const revision = await persistMachine(client, record, loaded.exists ? loaded.revision : undefined, options)
  return { machine: normalizeMachineRecord(record, machineId), revision }
}

export async function getMachine(client: SunClient, machineId: string, options: MachineOptions = {}): Promise<MachineRecord> {
  return (await requireMachine(client, machineId, options)).record
}

export async function listMachines(
  client: SunClient,
  limit: number = DEFAULT_LIST_LIMIT,
  options: MachineOptions = {}
): Promise<MachineRecord[]> {
  const items = await client.listObjects(MACHINE_KIND, '', limit, { signal: options.signal })
  const records: MachineRecord[] = []
  for (const item of items) {
    const loaded = await loadMachine(client, item.name, options)
    if (loaded.exists) records.push(loaded.record)
  }
  return records.sort((left, right) => compareStrings(left.machine_id, right.machine_id))
}

/**
 * Owner-only ACL change
 */
async function updateAcl(
  client: SunClient,
  machineId: string,
  actingOperator: string,
  verb: 'grant' | 'revoke',
  change: (record: MachineRecord) => string[],
  options: MachineOptions
): Promise<MachineWriteResult> {
  const loaded = await requireMachine(client, machineId, options)
  const record = loaded.record
  const owner = record.owner_operator.trim()
  if (owner.toLowerCase() !== sanitizeOperatorId(actingOperator).toLowerCase()) {
    throw new NotPermittedError(`only machine owner "${owner}" can ${verb} operators`, {
      machineId: record.machine_id,
      operator: actingOperator
    })
  }
  record.acl.allowed_operators = normalizeOperatorIds(change(record))
  record.updated_at = rfc3339(clockOf(options)())
  const revision = await persistMachine(client, record, loaded.revision, options)
  return { machine: normalizeMachineRecord(record, record.machine_id), revision }
}

export async function allowOperator(
  client: SunClient,
  machineId: string,
  grant: string,
  actingOperator: string,
  options: MachineOptions = {}
): Promise<MachineWriteResult> {
  const granted = grant.trim()
  if (granted === '') throw new InvalidArgumentError('--grant is required')
  return updateAcl(client, machineId, actingOperator, 'grant', record => [...record.acl.allowed_operators, granted], options)
}

export async function denyOperator(
  client: SunClient,
  machineId: string,
  revoke: string,
  actingOperator: string,
  options: MachineOptions = {}
): Promise<MachineWriteResult> {
  const revoked = revoke.trim()
  if (revoked === '') throw new InvalidArgumentError('--revoke is required')
  const loaded = await requireMachine(client, machineId, options)
  const owner = loaded.record.owner_operator.trim()
  if (revoked.toLowerCase() === owner.toLowerCase()) {
    throw new NotPermittedError(`cannot revoke owner operator "${owner}"`, {
      machineId: loaded.record.machine_id,
      operator: revoked
    })
  }
  return updateAcl(
    client,
    machineId,
    actingOperator,
    'revoke',
    record => record.acl.allowed_operators.filter(op => op.trim().toLowerCase() !== revoked.toLowerCase()),
    options
  )
}

// =============================================================================
// Jobs
// =============================================================================

/**
 * Check the target and source machines, then create a queued job
 */
export async function enqueueJob(
  client: SunClient,
  input: EnqueueInput,
  options: MachineOptions = {}
): Promise<EnqueuedJob> {
  const command = cleanArgs(input.command)
  if (command.length === 0) {
    throw new InvalidArgumentError('command is required (pass it after --)')
  }
  const targetId = sanitizeSlug(input.target)
  const sourceId = sanitizeSlug(input.source)
  const operator = sanitizeOperatorId(input.operator)

  const target = await loadMachine(client, targetId, options)
  if (!target.exists) {
    throw new MachineUnregisteredError(targetId, 'target')
  }
  if (!target.record.capabilities.can_be_controlled) {
    throw new TargetRefusesControlError(targetId)
  }
  if (!operatorAllowed(target.record, operator)) {
    throw NotPermittedError.control(targetId, operator)
  }

  const source = await loadMachine(client, sourceId, options)
  if (!source.exists) {
    throw new MachineUnregisteredError(
      sourceId,
      'source',
      `Run "sun machine register --machine ${sourceId} --can-control-others" first`
    )
  }
  if (!operatorAllowed(source.record, operator)) {
    throw new SourceNotAuthorizedError(sourceId, operator)
  }
  if (!source.record.capabilities.can_control_others) {
    throw new SourceCannotControlError(sourceId)
  }

  const now = clockOf(options)()
  const stamp = rfc3339(now)
  const job: MachineJob = {
    version: 1,
    job_id: generateJobId(now),
    machine_id: targetId,
    requested_by: operator,
    source_machine: sourceId,
    command,
    timeout_seconds: Math.max(MIN_JOB_TIMEOUT_SECONDS, input.timeoutSeconds ?? DEFAULT_JOB_TIMEOUT_SECONDS),
    status: 'queued',
    requested_at: stamp,
    updated_at: stamp
  }
  const objectName = jobObjectName(targetId, job.job_id)
  await persistJob(client, objectName, job, undefined, options)
  options.logger?.(`queued ${objectName}`)
  return { job, objectName }
}

/**
 * Poll a job until it reaches a terminal status
 */
export async function waitForJob(client: SunClient, objectName: string, options: WaitOptions): Promise<MachineJob> {
  const pause = options.sleep ?? defaultSleep
  let jobId = objectName.trim()
  try {
    return await withTimeout(
      async signal => {
        for (;;) {
          const loaded = await loadJob(client, objectName, { ...options, signal })
          if (!loaded) {
            throw new JobNotFoundError(objectName.trim())
          }
          jobId = loaded.job.job_id || jobId
          if (isTerminalStatus(loaded.job.status)) {
            return loaded.job
          }
          options.logger?.(`job ${loaded.job.job_id} is ${loaded.job.status}`)
          await pause(options.pollMs, signal)
        }
      },
      options.timeoutMs,
      `wait for ${objectName}`,
      options.signal
    )
  } catch (err) {
    if (err instanceof OperationTimeoutError) {
      throw new WaitTimeoutError(jobId, Math.round(options.timeoutMs / 1000))
    }
    throw err
  }
}

/**
 * Error for a terminal job that did not succeed, or null
 */
export function jobFailure(job: MachineJob): RemoteJobFailedError | null {
  if (job.status === 'succeeded') return null
  return new RemoteJobFailedError(job.job_id || 'unknown-job', job.status || 'unknown', job.exit_code ?? 0, (job.error ?? '').trim())
}

/**
 * Clamp wait settings: timeout at least 10s, poll at least 1s
 */
export function waitTiming(
  waitTimeoutSeconds: number = DEFAULT_WAIT_TIMEOUT_SECONDS,
  pollSeconds: number = DEFAULT_POLL_SECONDS
): { timeoutMs: number; pollMs: number } {
  return {
    timeoutMs: Math.max(10, waitTimeoutSeconds) * 1000,
    pollMs: Math.max(1, pollSeconds) * 1000
  }
}

export async function listJobs(client: SunClient, filter: JobFilter = {}, options: MachineOptions = {}): Promise<MachineJob[]> {
  const items = await client.listObjects(MACHINE_JOB_KIND, '', filter.limit && filter.limit > 0 ? filter.limit : DEFAULT_LIST_LIMIT, {
    signal: options.signal
  })
  const machineId = sanitizeSlug(filter.machineId ?? '')
  const requestedBy = (filter.requestedBy ?? '').trim().toLowerCase()
  const jobs: MachineJob[] = []
  for (const item of items) {
    const loaded = await loadJob(client, item.name, options)
    if (!loaded) continue
    const job = loaded.job
    if (machineId !== '' && job.machine_id !== machineId) continue
    if (requestedBy !== '' && job.requested_by.toLowerCase() !== requestedBy) continue
    if (filter.status && job.status !== filter.status) continue
    jobs.push(job)
  }
  return jobs.sort(compareJobs)
}

function compareJobs(left: MachineJob, right: MachineJob): number {
  const leftAt = timestampKey(left.requested_at)
  const rightAt = timestampKey(right.requested_at)
  if (leftAt !== rightAt) return leftAt < rightAt ? -1 : 1
  return compareStrings(left.job_id, right.job_id)
}

/**
 * Claim the oldest queued job for a machine, or null when none is claimable
 *
 * Each candidate is re-read and moved to `running` with compare-and-swap. A
 * conflict means another worker took it; the scan moves on.
 */
export async function claimNextJob(
  client: SunClient,
  machineId: string,
  options: MachineOptions = {}
): Promise<ClaimedJob | null> {
  const prefix = jobNamePrefix(machineId).toLowerCase()
  const items = await client.listObjects(MACHINE_JOB_KIND, '', CLAIM_SCAN_LIMIT, { signal: options.signal })

  const candidates: Array<{ name: string; job: MachineJob }> = []
  for (const item of items) {
    const name = item.name.trim()
    if (!name.toLowerCase().startsWith(prefix)) continue
    const loaded = await loadQueuedCandidate(client, name, options)
    if (loaded) candidates.push({ name, job: loaded.job })
  }
  candidates.sort((left, right) => compareJobs(left.job, right.job))

  for (const candidate of candidates) {
    const loaded = await loadQueuedCandidate(client, candidate.name, options)
    if (!loaded) continue
    const stamp = rfc3339(clockOf(options)())
    const job: MachineJob = {
      ...loaded.job,
      status: 'running',
      claimed_by: sanitizeSlug(machineId),
      claimed_at: stamp,
      started_at: stamp,
      updated_at: stamp
    }
    try {
      const revision = await persistJob(client, candidate.name, job, loaded.revision, options)
      return { objectName: candidate.name, job, revision }
    } catch (err) {
      if (!isRevisionConflict(err)) throw err
      options.logger?.(`job ${candidate.name} was claimed by another worker`)
    }
  }
  return null
}

async function loadQueuedCandidate(client: SunClient, name: string, options: MachineOptions): Promise<LoadedJob | null> {
  let loaded: LoadedJob | null
  try {
    loaded = await loadJob(client, name, options)
  } catch (err) {
    if (!(err instanceof MalformedResponseError)) throw err
    options.logger?.(`skipping ${name}: ${err.message}`)
    return null
  }
  return loaded && loaded.job.status === 'queued' ? loaded : null
}

/**
 * Run a claimed job under the machine's current policy
 *
 * A requester outside the ACL, or a machine that no longer accepts control,
 * yields `denied` without starting a process.
 */
export async function executeClaimedJob(
  job: MachineJob,
  machine: MachineRecord,
  runner: CommandRunner,
  options: MachineOptions = {}
): Promise<MachineJob> {
  const clock = clockOf(options)
  const started = rfc3339(clock())
  const running: MachineJob = { ...job, status: 'running', updated_at: started, started_at: job.started_at || started }

  const deny = (error: string): MachineJob => {
    const completed = rfc3339(clock())
    return { ...running, status: 'denied', completed_at: completed, updated_at: completed, exit_code: 1, error }
  }
  if (!operatorAllowed(machine, job.requested_by)) {
    return deny(`operator "${job.requested_by.trim()}" is not allowed by machine "${machine.machine_id}" ACL`)
  }
  if (!machine.capabilities.can_be_controlled) {
    return deny(`machine "${machine.machine_id}" refuses remote control`)
  }

  const result = await runner(job.command, {
    timeoutMs: Math.max(MIN_JOB_TIMEOUT_SECONDS, job.timeout_seconds) * 1000,
    signal: options.signal
  })
  const completed = rfc3339(clock())
  const finished: MachineJob = {
    ...running,
    stdout: result.stdout || undefined,
    stderr: result.stderr || undefined,
    exit_code: result.exitCode,
    completed_at: completed,
    updated_at: completed
  }
  if (result.error || result.exitCode !== 0) {
    return {
      ...finished,
      status: 'failed',
      error: (result.error ?? '').trim() || `command exited with code ${result.exitCode}`
    }
  }
  return {
    ...finished,
    status: 'succeeded',
    error: undefined,
    claimed_by: job.claimed_by || machine.machine_id,
    claimed_at: job.claimed_at || started
  }
}

/**
 * Serve loop: mark the machine as serving, then claim and run jobs
 *
 * Stops after one job with `once`, after `maxJobs` jobs, or when the signal
 * aborts while idle.
 */
export async function serveMachine(client: SunClient, options: ServeOptions): Promise<ServeSummary> {
  const machineId = sanitizeSlug(options.machineId)
  const runner = options.runner ?? createProcessRunner()
  const pause = options.sleep ?? defaultSleep
  const pollMs = options.pollMs ?? DEFAULT_POLL_SECONDS * 1000
  const maxJobs = options.maxJobs ?? 0

  const loaded = await requireMachine(client, machineId, options)
  if (!loaded.record.capabilities.can_be_controlled) {
    throw TargetRefusesControlError.serving(machineId)
  }
  const stamp = rfc3339(clockOf(options)())
  loaded.record.heartbeat = { last_seen_at: stamp, last_state: 'serving' }
  loaded.record.updated_at = stamp
  await persistMachine(client, loaded.record, loaded.revision, options)

  const summary: ServeSummary = { machine_id: machineId, processed: 0, job_ids: [] }
  const done = (): boolean => options.once === true || (maxJobs > 0 && summary.processed >= maxJobs)

  while (!options.signal?.aborted) {
    const claimed = await claimNextJob(client, machineId, options)
    if (!claimed) {
      if (done()) break
      try {
        await pause(pollMs, options.signal)
      } catch (err) {
        if (options.signal?.aborted) break
        throw err
      }
      continue
    }

    // Policy may have changed since the loop started
    const current = await requireMachine(client, machineId, options)
    const finished = await executeClaimedJob(claimed.job, current.record, runner, options)
    await persistJob(client, claimed.objectName, finished, claimed.revision, options)
    options.logger?.(`job ${finished.job_id} finished with status ${finished.status}`)
    summary.processed++
    summary.job_ids.push(finished.job_id)
    if (done()) break
  }
  return summary
}
