/**
 * Tests for machine.ts
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import {
  MACHINE_JOB_KIND,
  MACHINE_KIND,
  allowOperator,
  claimNextJob,
  denyOperator,
  enqueueJob,
  executeClaimedJob,
  getMachine,
  isTerminalStatus,
  jobFailure,
  jobObjectName,
  listJobs,
  listMachines,
  normalizeCommand,
  normalizeJobStatus,
  normalizeMachineJob,
  normalizeMachineRecord,
  normalizeOperatorIds,
  parseJobStatusFilter,
  registerMachine,
  serveMachine,
  waitForJob,
  waitTiming
} from '../../src/lib/machine.js'
import {
  InvalidArgumentError,
  JobNotFoundError,
  MachineUnregisteredError,
  NotPermittedError,
  RemoteJobFailedError,
  SourceCannotControlError,
  SourceNotAuthorizedError,
  TargetRefusesControlError,
  WaitTimeoutError
} from '../../src/lib/errors.js'
import type { CommandRunner } from '../../src/lib/job-runner.js'
import type { MachineJob } from '../../src/types.js'
import { FakeStore } from '../helpers/fake-store.js'

const OPERATOR = 'op:ctl@local'
const at = (iso: string) => () => new Date(iso)

function queuedJob(jobId: string, machineId: string, requestedAt: string): MachineJob {
  return {
    version: 1,
    job_id: jobId,
    machine_id: machineId,
    requested_by: OPERATOR,
    source_machine: 'ctl1',
    command: ['status'],
    timeout_seconds: 30,
    status: 'queued',
    requested_at: requestedAt,
    updated_at: requestedAt
  }
}

describe('machine', () => {
  let store: FakeStore

  beforeEach(() => {
    store = new FakeStore()
  })

  async function registerPair(): Promise<void> {
    const client = store.client()
    await registerMachine(client, { machineId: 'worker1', operatorId: OPERATOR, canBeControlled: true })
    await registerMachine(client, { machineId: 'ctl1', operatorId: OPERATOR, canControlOthers: true })
  }

  describe('normalization', () => {
    it('should map job status synonyms', () => {
      expect(normalizeJobStatus('')).toBe('queued')
      expect(normalizeJobStatus('Claimed')).toBe('running')
      expect(normalizeJobStatus('ok')).toBe('succeeded')
      expect(normalizeJobStatus('forbidden')).toBe('denied')
      expect(normalizeJobStatus('mystery')).toBeNull()
    })

    it('should validate status filters', () => {
      expect(parseJobStatusFilter(' ')).toBeUndefined()
      expect(parseJobStatusFilter('error')).toBe('failed')
      expect(() => parseJobStatusFilter('mystery')).toThrow('invalid --status "mystery"')
    })

    it('should treat only blank, queued or pending stored statuses as queued', () => {
      const base = queuedJob('job-a', 'worker1', '2026-01-01T00:00:00Z')
      expect(normalizeMachineJob({ ...base, status: '' }).status).toBe('queued')
      expect(normalizeMachineJob({ ...base, status: ' Pending ' }).status).toBe('queued')
      expect(normalizeMachineJob({ ...base, status: 'cancelled' }).status).toBe('')
    })

    it('should recognize terminal statuses', () => {
      expect(['succeeded', 'failed', 'denied'].every(isTerminalStatus)).toBe(true)
      expect(isTerminalStatus('running')).toBe(false)
      expect(isTerminalStatus('mystery')).toBe(false)
    })

    it('should dedupe operator ids case-insensitively and sort them', () => {
      expect(normalizeOperatorIds(['op:b', 'OP:B', ' ', 'op:a smith', 'op:a'])).toEqual(['op:a', 'op:a-smith', 'op:b'])
    })

    it('should always list the owner in the ACL', () => {
      const record = normalizeMachineRecord({ machine_id: 'Box 1', owner_operator: 'op:owner', acl: { allowed_operators: ['op:x'] } }, 'x')
      expect(record.machine_id).toBe('box-1')
      expect(record.version).toBe(1)
      expect(record.acl.allowed_operators).toEqual(['op:owner', 'op:x'])
      expect(record.capabilities).toEqual({ can_control_others: false, can_be_controlled: false })
    })

    it('should strip the separator and executable from commands', () => {
      expect(normalizeCommand(['--', 'sun', 'status', '', ' --json '])).toEqual(['status', '--json'])
      expect(normalizeCommand(['SUN', 'doctor'])).toEqual(['doctor'])
      expect(normalizeCommand(['taskboard', 'sun'])).toEqual(['taskboard', 'sun'])
    })

    it('should clamp wait timing', () => {
      expect(waitTiming(1, 0)).toEqual({ timeoutMs: 10_000, pollMs: 1_000 })
      expect(waitTiming()).toEqual({ timeoutMs: 1_200_000, pollMs: 2_000 })
    })

    it('should name job objects after the target', () => {
      expect(jobObjectName('Worker1', ' job-1 ')).toBe('worker1--job-1')
    })
  })

  describe('registerMachine', () => {
    it('should create a record owned by the operator', async () => {
      const { machine, revision } = await registerMachine(
        store.client(),
        { machineId: 'Worker1', operatorId: OPERATOR, displayName: 'Build box', allowOperators: ['op:extra'] },
        { now: at('2026-01-01T00:00:00Z') }
      )
      expect(revision).toBe(1)
      expect(machine).toMatchObject({
        machine_id: 'worker1',
        display_name: 'Build box',
        owner_operator: OPERATOR,
        capabilities: { can_control_others: false, can_be_controlled: true },
        acl: { allowed_operators: [OPERATOR, 'op:extra'] },
        registered_at: '2026-01-01T00:00:00Z',
        heartbeat: { last_seen_at: '2026-01-01T00:00:00Z', last_state: 'registered' }
      })
      expect(store.latestMetadata(MACHINE_KIND, 'worker1')).toEqual({
        machine_id: 'worker1',
        owner_operator: OPERATOR,
        can_control_others: false,
        can_be_controlled: true,
        allowed_operators_n: 2
      })
    })

    it('should keep unsupplied capabilities and the owner on update', async () => {
      const client = store.client()
      await registerMachine(client, { machineId: 'box', operatorId: 'op:a', canBeControlled: false }, { now: at('2026-01-01T00:00:00Z') })
      const { machine, revision } = await registerMachine(
        client,
        { machineId: 'box', operatorId: 'op:b', canControlOthers: true },
        { now: at('2026-01-02T00:00:00Z') }
      )
      expect(revision).toBe(2)
      expect(machine.owner_operator).toBe('op:a')
      expect(machine.capabilities).toEqual({ can_control_others: true, can_be_controlled: false })
      expect(machine.acl.allowed_operators).toEqual(['op:a', 'op:b'])
      expect(machine.registered_at).toBe('2026-01-01T00:00:00Z')

      const put = store.requestsTo('PUT', '/v1/objects/si_machine/box')
      expect(JSON.parse(put[1].body ?? '{}').expected_revision).toBe(1)
    })

    it('should require ids', async () => {
      await expect(registerMachine(store.client(), { machineId: '##', operatorId: OPERATOR })).rejects.toThrow('machine id is required')
      await expect(registerMachine(store.client(), { machineId: 'box', operatorId: '' })).rejects.toThrow('operator id is required')
    })
  })

  describe('registry reads', () => {
    it('should fail for unregistered machines', async () => {
      await expect(getMachine(store.client(), 'ghost')).rejects.toThrow(MachineUnregisteredError)
    })

    it('should list machines sorted by id', async () => {
      const client = store.client()
      await registerMachine(client, { machineId: 'zeta', operatorId: OPERATOR })
      await registerMachine(client, { machineId: 'alpha', operatorId: OPERATOR })
      const machines = await listMachines(client)
      expect(machines.map(m => m.machine_id)).toEqual(['alpha', 'zeta'])
    })
  })

  describe('ACL changes', () => {
    beforeEach(async () => {
      await registerMachine(store.client(), { machineId: 'box', operatorId: 'op:owner' })
    })

    it('should let the owner grant and revoke', async () => {
      const client = store.client()
      const granted = await allowOperator(client, 'box', 'op:guest', 'op:owner')
      expect(granted.machine.acl.allowed_operators).toEqual(['op:guest', 'op:owner'])
      const revoked = await denyOperator(client, 'box', 'OP:GUEST', 'op:owner')
      expect(revoked.machine.acl.allowed_operators).toEqual(['op:owner'])
    })

    it('should refuse changes by other operators', async () => {
      await expect(allowOperator(store.client(), 'box', 'op:guest', 'op:guest')).rejects.toThrow(
        'only machine owner "op:owner" can grant operators'
      )
    })

    it('should never revoke the owner', async () => {
      const denial = denyOperator(store.client(), 'box', 'op:owner', 'op:owner')
      await expect(denial).rejects.toThrow(NotPermittedError)
      await expect(denial).rejects.toThrow('cannot revoke owner operator "op:owner"')
    })

    it('should require the operator to change', async () => {
      await expect(allowOperator(store.client(), 'box', ' ', 'op:owner')).rejects.toThrow('--grant is required')
      await expect(denyOperator(store.client(), 'box', '', 'op:owner')).rejects.toThrow('--revoke is required')
    })
  })

  describe('enqueueJob', () => {
    const input = { target: 'worker1', source: 'ctl1', operator: OPERATOR, command: ['status', '--json'] }

    it('should create a queued job under the target prefix', async () => {
      await registerPair()
      const { job, objectName } = await enqueueJob(store.client(), { ...input, timeoutSeconds: 3 }, { now: at('2026-01-01T00:00:00Z') })
      expect(job.job_id).toMatch(/^job-20260101-000000-[0-9a-z]{3}$/)
      expect(objectName).toBe(`worker1--${job.job_id}`)
      expect(job).toMatchObject({
        machine_id: 'worker1',
        requested_by: OPERATOR,
        source_machine: 'ctl1',
        command: ['status', '--json'],
        timeout_seconds: 10,
        status: 'queued',
        requested_at: '2026-01-01T00:00:00Z'
      })
      const put = store.requestsTo('PUT', `/v1/objects/si_machine_job/`)
      expect(put).toHaveLength(1)
      expect(JSON.parse(put[0].body ?? '{}').expected_revision).toBeUndefined()
    })

    it('should reject an empty command', async () => {
      await expect(enqueueJob(store.client(), { ...input, command: [' ', ''] })).rejects.toThrow(InvalidArgumentError)
    })

    it('should require a registered target', async () => {
      await expect(enqueueJob(store.client(), input)).rejects.toThrow('target machine "worker1" is not registered')
    })

    it('should refuse a target that does not accept control', async () => {
      await registerMachine(store.client(), { machineId: 'worker1', operatorId: OPERATOR, canBeControlled: false })
      await expect(enqueueJob(store.client(), input)).rejects.toThrow(TargetRefusesControlError)
    })

    it('should refuse operators outside the target ACL', async () => {
      await registerPair()
      await expect(enqueueJob(store.client(), { ...input, operator: 'op:intruder' })).rejects.toThrow(
        'operator "op:intruder" is not allowed to control machine "worker1"'
      )
    })

    it('should require a registered source', async () => {
      await registerMachine(store.client(), { machineId: 'worker1', operatorId: OPERATOR })
      await expect(enqueueJob(store.client(), input)).rejects.toThrow('source machine "ctl1" is not registered')
    })

    it('should require the operator on the source ACL', async () => {
      const client = store.client()
      await registerMachine(client, { machineId: 'worker1', operatorId: OPERATOR })
      await registerMachine(client, { machineId: 'ctl1', operatorId: 'op:someone-else', canControlOthers: true })
      await expect(enqueueJob(client, input)).rejects.toThrow(SourceNotAuthorizedError)
    })

    it('should require a source that can control others', async () => {
      const client = store.client()
      await registerMachine(client, { machineId: 'worker1', operatorId: OPERATOR })
      await registerMachine(client, { machineId: 'ctl1', operatorId: OPERATOR })
      await expect(enqueueJob(client, input)).rejects.toThrow(SourceCannotControlError)
    })
  })

  describe('claimNextJob', () => {
    it('should claim the oldest queued job for the machine only', async () => {
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-b', queuedJob('job-b', 'worker1', '2026-01-01T00:00:02Z'))
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-a', queuedJob('job-a', 'worker1', '2026-01-01T00:00:03Z'))
      store.putJson(MACHINE_JOB_KIND, 'worker10--job-c', queuedJob('job-c', 'worker10', '2026-01-01T00:00:01Z'))
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-d', { ...queuedJob('job-d', 'worker1', '2026-01-01T00:00:00Z'), status: 'succeeded' })

      const claimed = await claimNextJob(store.client(), 'worker1', { now: at('2026-01-01T00:01:00Z') })
      expect(claimed?.objectName).toBe('worker1--job-b')
      expect(claimed?.revision).toBe(2)
      expect(claimed?.job).toMatchObject({
        status: 'running',
        claimed_by: 'worker1',
        claimed_at: '2026-01-01T00:01:00Z',
        started_at: '2026-01-01T00:01:00Z'
      })
      expect(store.json(MACHINE_JOB_KIND, 'worker1--job-b')).toMatchObject({ status: 'running', claimed_by: 'worker1' })
    })

    it('should skip a job another worker claimed first', async () => {
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-a', queuedJob('job-a', 'worker1', '2026-01-01T00:00:00Z'))
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-b', queuedJob('job-b', 'worker1', '2026-01-01T00:00:01Z'))
      store.failNext({ status: 409, body: '{"error":"revision conflict"}', match: method => method === 'PUT' })
      const logger = vi.fn()

      const claimed = await claimNextJob(store.client(), 'worker1', { logger })
      expect(claimed?.objectName).toBe('worker1--job-b')
      expect(logger).toHaveBeenCalledWith('job worker1--job-a was claimed by another worker')
    })

    it('should leave jobs with an unrecognized status alone', async () => {
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-x', { ...queuedJob('job-x', 'worker1', '2026-01-01T00:00:00Z'), status: 'cancelled' })

      expect(await claimNextJob(store.client(), 'worker1')).toBeNull()
      expect(store.revision(MACHINE_JOB_KIND, 'worker1--job-x')).toBe(1)
      expect(store.requestsTo('PUT', '/v1/objects')).toEqual([])
    })

    it('should return null when nothing is queued', async () => {
      expect(await claimNextJob(store.client(), 'worker1')).toBeNull()
    })
  })

  describe('executeClaimedJob', () => {
    const machine = normalizeMachineRecord(
      { machine_id: 'worker1', owner_operator: OPERATOR, capabilities: { can_be_controlled: true } },
      'worker1'
    )
    const job = { ...queuedJob('job-1', 'worker1', '2026-01-01T00:00:00Z'), status: 'running' as const, claimed_by: 'worker1' }

    it('should succeed on exit code 0', async () => {
      const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: 'ok\n', stderr: '', exitCode: 0 })
      const result = await executeClaimedJob(job, machine, runner, { now: at('2026-01-01T00:05:00Z') })
      expect(runner).toHaveBeenCalledWith(['status'], { timeoutMs: 30_000, signal: undefined })
      expect(result).toMatchObject({ status: 'succeeded', exit_code: 0, stdout: 'ok\n', completed_at: '2026-01-01T00:05:00Z' })
      expect(result.error).toBeUndefined()
      expect(result.stderr).toBeUndefined()
    })

    it('should fail on a non-zero exit', async () => {
      const runner: CommandRunner = async () => ({ stdout: '', stderr: 'boom', exitCode: 3, error: 'command exited with code 3' })
      const result = await executeClaimedJob(job, machine, runner)
      expect(result).toMatchObject({ status: 'failed', exit_code: 3, stderr: 'boom', error: 'command exited with code 3' })
    })

    it('should fail when the runner reports an error with exit code 0', async () => {
      const runner: CommandRunner = async () => ({ stdout: '', stderr: '', exitCode: 0, error: 'spawn failed' })
      const result = await executeClaimedJob(job, machine, runner)
      expect(result).toMatchObject({ status: 'failed', exit_code: 0, error: 'spawn failed' })
    })

    it('should deny requesters outside the ACL without running anything', async () => {
      const runner = vi.fn<CommandRunner>()
      const result = await executeClaimedJob({ ...job, requested_by: 'op:stranger' }, machine, runner)
      expect(runner).not.toHaveBeenCalled()
      expect(result).toMatchObject({
        status: 'denied',
        exit_code: 1,
        error: 'operator "op:stranger" is not allowed by machine "worker1" ACL'
      })
      expect(result.completed_at).toBeDefined()
    })
  })

  describe('waitForJob', () => {
    it('should fail when the job does not exist', async () => {
      await expect(waitForJob(store.client(), 'worker1--job-x', { timeoutMs: 1000, pollMs: 1 })).rejects.toThrow(JobNotFoundError)
    })

    it('should time out while the job stays queued', async () => {
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-q', queuedJob('job-q', 'worker1', '2026-01-01T00:00:00Z'))
      const wait = waitForJob(store.client(), 'worker1--job-q', { timeoutMs: 50, pollMs: 5 })
      await expect(wait).rejects.toThrow(WaitTimeoutError)
      await expect(wait).rejects.toThrow('timed out waiting for remote job "job-q"')
    })
  })

  describe('jobFailure', () => {
    it('should be null for succeeded jobs', () => {
      expect(jobFailure({ ...queuedJob('j', 'm', ''), status: 'succeeded', exit_code: 0 })).toBeNull()
    })

    it('should carry status and exit code', () => {
      const failure = jobFailure({ ...queuedJob('j', 'm', ''), status: 'failed', exit_code: 2 })
      expect(failure).toBeInstanceOf(RemoteJobFailedError)
      expect(failure?.message).toBe('remote job j finished with status failed (exit code 2)')
      expect(failure?.exitCode).toBe(9)
    })
  })

  describe('listJobs', () => {
    it('should filter by machine and status, oldest first', async () => {
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-b', queuedJob('job-b', 'worker1', '2026-01-01T00:00:02Z'))
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-a', queuedJob('job-a', 'worker1', '2026-01-01T00:00:01Z'))
      store.putJson(MACHINE_JOB_KIND, 'worker2--job-c', queuedJob('job-c', 'worker2', '2026-01-01T00:00:00Z'))
      store.putJson(MACHINE_JOB_KIND, 'worker1--job-d', { ...queuedJob('job-d', 'worker1', '2026-01-01T00:00:00Z'), status: 'failed' })

      const client = store.client()
      expect((await listJobs(client, { machineId: 'worker1' })).map(j => j.job_id)).toEqual(['job-d', 'job-a', 'job-b'])
      expect((await listJobs(client, { status: 'queued' })).map(j => j.job_id)).toEqual(['job-c', 'job-a', 'job-b'])
    })
  })

  describe('remote job flow', () => {
    it('should run a job end to end and report its output', async () => {
      await registerPair()
      const client = store.client()
      const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: 'hello from worker1\n', stderr: '', exitCode: 0 })

      const { job, objectName } = await enqueueJob(client, {
        target: 'worker1',
        source: 'ctl1',
        operator: OPERATOR,
        command: normalizeCommand(['--', 'sun', 'subcmd', 'arg1']),
        timeoutSeconds: 30
      })
      const [finished, summary] = await Promise.all([
        waitForJob(client, objectName, { timeoutMs: 5000, pollMs: 5 }),
        serveMachine(client, { machineId: 'worker1', once: true, runner })
      ])

      expect(runner).toHaveBeenCalledWith(['subcmd', 'arg1'], { timeoutMs: 30_000, signal: undefined })
      expect(summary).toEqual({ machine_id: 'worker1', processed: 1, job_ids: [job.job_id] })
      expect(finished.status).toBe('succeeded')
      expect(finished.exit_code).toBe(0)
      expect(finished.stdout).toContain('hello from worker1')
      expect(finished.claimed_by).toBe('worker1')
      expect(finished.error).toBeUndefined()
      expect(finished.completed_at).toBeDefined()
      expect(jobFailure(finished)).toBeNull()

      const heartbeat = await getMachine(client, 'worker1')
      expect(heartbeat.heartbeat?.last_state).toBe('serving')
    })

    it('should deny a job when the target stops accepting control after enqueue', async () => {
      await registerPair()
      const client = store.client()
      const runner = vi.fn<CommandRunner>()
      const { objectName } = await enqueueJob(client, {
        target: 'worker1',
        source: 'ctl1',
        operator: OPERATOR,
        command: ['subcmd', 'arg1'],
        timeoutSeconds: 30
      })

      let flipped = false
      store.onRequest = request => {
        if (flipped || request.method !== 'PUT' || !request.path.startsWith('/v1/objects/si_machine_job/')) return
        flipped = true
        store.putJson(MACHINE_KIND, 'worker1', {
          version: 1,
          machine_id: 'worker1',
          owner_operator: OPERATOR,
          capabilities: { can_control_others: false, can_be_controlled: false },
          acl: { allowed_operators: [OPERATOR] }
        })
      }

      await serveMachine(client, { machineId: 'worker1', once: true, runner })
      const finished = await waitForJob(client, objectName, { timeoutMs: 1000, pollMs: 1 })

      expect(runner).not.toHaveBeenCalled()
      expect(finished.status).toBe('denied')
      expect(finished.exit_code).toBe(1)
      expect(finished.error).toContain('refuses remote control')
      expect(jobFailure(finished)?.message).toBe(
        `remote job ${finished.job_id} finished with status denied: machine "worker1" refuses remote control`
      )
    })

    it('should refuse to serve a machine that does not accept control', async () => {
      await registerMachine(store.client(), { machineId: 'locked', operatorId: OPERATOR, canBeControlled: false })
      await expect(serveMachine(store.client(), { machineId: 'locked', once: true })).rejects.toThrow(
        'machine "locked" is not accepting remote jobs (can_be_controlled=false)'
      )
    })

    it('should require a registered machine to serve', async () => {
      await expect(serveMachine(store.client(), { machineId: 'ghost', once: true })).rejects.toThrow(MachineUnregisteredError)
    })

    it('should stop after max jobs', async () => {
      await registerPair()
      const client = store.client()
      for (const [i, id] of ['job-a', 'job-b', 'job-c'].entries()) {
        store.putJson(MACHINE_JOB_KIND, `worker1--${id}`, queuedJob(id, 'worker1', `2026-01-01T00:00:0${i + 1}Z`))
      }
      const runner: CommandRunner = async () => ({ stdout: '', stderr: '', exitCode: 0 })
      const summary = await serveMachine(client, { machineId: 'worker1', maxJobs: 2, runner })
      expect(summary.job_ids).toEqual(['job-a', 'job-b'])
      expect(store.json(MACHINE_JOB_KIND, 'worker1--job-c')).toMatchObject({ status: 'queued' })
    })

    it('should stop idling when the signal aborts', async () => {
      await registerPair()
      const controller = new AbortController()
      const sleep = vi.fn(async () => {
        controller.abort()
        throw new Error('aborted')
      })
      const summary = await serveMachine(store.client(), { machineId: 'worker1', signal: controller.signal, sleep })
      expect(summary.processed).toBe(0)
      expect(sleep).toHaveBeenCalledTimes(1)
    })
  })
})
