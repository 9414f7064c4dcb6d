/**
 * Taskboard
 *
 * A cooperative work queue stored as one `dyad_taskboard` object per board.
 * Agents claim tasks under leases; every mutation re-reads the board and
 * writes it back with compare-and-swap, retrying on revision conflicts.
 */

import { randomInt } from 'node:crypto'
import { z } from 'zod'
import type { SunClient } from '../client.js'
import { revisionOf } from '../client.js'
import type {
  AgentIdentity,
  AssignmentState,
  SunSettings,
  Task,
  TaskboardAgent,
  TaskLock,
  TaskPriority,
  Taskboard,
  TaskStatus
} from '../types.js'
import {
  AlreadyDoneError,
  InvalidArgumentError,
  MalformedResponseError,
  NoClaimableTaskError,
  NotAssignedError,
  TaskboardConflictExceededError,
  TaskLockedError,
  TaskNotFoundError,
  isRevisionConflict
} from './errors.js'
import { firstNonEmpty } from './identity.js'
import {
  formatIssues,
  looseNumber,
  looseString,
  looseStringList,
  optionalNumber,
  optionalString,
  tryParseJson
} from './schema-utils.js'
import { base36Suffix, compactUtc, compareStrings, parseTimestamp, rfc3339, timestampKey } from './stamps.js'

export const TASKBOARD_KIND = 'dyad_taskboard'
export const DEFAULT_BOARD = 'default'
export const DEFAULT_LEASE_SECONDS = 1800
export const MAX_MUTATE_ATTEMPTS = 8
export const DEFAULT_LIST_LIMIT = 50

const ID_ATTEMPTS = 128

export interface TaskboardOptions {
  signal?: AbortSignal
  /** Clock, replaceable in tests */
  now?: () => Date
  logger?: (message: string) => void
}

export interface LoadedTaskboard {
  board: Taskboard
  revision: number
  exists: boolean
}

export interface MutationResult<T> {
  board: Taskboard
  revision: number
  value: T
}

export interface AddTaskInput {
  title: string
  prompt?: string
  priority?: string
  tags?: string[]
}

export interface ClaimRequest {
  taskId?: string
  agent: AgentIdentity
  leaseSeconds?: number
}

export interface ClaimResult {
  board_name: string
  task: Task
}

export interface ListFilter {
  status?: TaskStatus
  owner?: string
  limit?: number
}

export interface StatusCounts {
  todo: number
  doing: number
  done: number
}

// =============================================================================
// Normalization
// =============================================================================

const STATUS_SYNONYMS: Record<string, TaskStatus> = {
  todo: 'todo',
  open: 'todo',
  queued: 'todo',
  backlog: 'todo',
  doing: 'doing',
  'in-progress': 'doing',
  in_progress: 'doing',
  claimed: 'doing',
  active: 'doing',
  done: 'done',
  closed: 'done',
  complete: 'done',
  completed: 'done'
}

/**
 * Canonical status; unknown values become `todo`
 */
export function normalizeTaskStatus(raw: string | undefined): TaskStatus {
  return STATUS_SYNONYMS[(raw ?? '').trim().toLowerCase()] ?? 'todo'
}

/**
 * Status filter from user input; empty means no filter
 */
export function parseStatusFilter(raw: string | undefined): TaskStatus | undefined {
  const value = (raw ?? '').trim()
  if (value === '') return undefined
  const status = STATUS_SYNONYMS[value.toLowerCase()]
  if (!status) {
    throw new InvalidArgumentError(`invalid --status "${value}" (expected todo|doing|done)`)
  }
  return status
}

export function normalizeTaskPriority(raw: string | undefined): TaskPriority {
  switch ((raw ?? '').trim().toUpperCase()) {
    case 'P1':
      return 'P1'
    case 'P3':
      return 'P3'
    default:
      return 'P2'
  }
}

export function priorityRank(priority: string): number {
  switch (normalizeTaskPriority(priority)) {
    case 'P1':
      return 1
    case 'P2':
      return 2
    default:
      return 3
  }
}

function statusRank(status: string): number {
  switch (normalizeTaskStatus(status)) {
    case 'doing':
      return 1
    case 'todo':
      return 2
    default:
      return 3
  }
}

const lockSchema = z.object({
  agent_id: looseString,
  dyad: optionalString,
  machine: optionalString,
  user: optionalString,
  lock_token: optionalString,
  claimed_at: optionalString,
  lease_seconds: optionalNumber,
  lease_expires_at: optionalString
})

const taskSchema = z.object({
  id: looseString,
  title: looseString,
  prompt: looseString,
  status: looseString,
  priority: looseString,
  tags: looseStringList,
  created_at: optionalString,
  updated_at: optionalString,
  completed_at: optionalString,
  result: optionalString,
  assignment: z.preprocess(value => value ?? undefined, lockSchema.optional())
})

const agentSchema = z.object({
  id: looseString,
  dyad: optionalString,
  machine: optionalString,
  user: optionalString,
  status: optionalString,
  current_task_id: optionalString,
  last_seen_at: optionalString
})

const boardSchema = z.object({
  version: looseNumber,
  name: looseString,
  updated_at: optionalString,
  tasks: z.preprocess(value => value ?? [], z.array(taskSchema)),
  agents: z.preprocess(value => value ?? {}, z.record(agentSchema))
})

type DecodedTask = z.output<typeof taskSchema>

function normalizeTask(task: DecodedTask): Task {
  const title = task.title.trim()
  const normalized: Task = {
    id: task.id.trim(),
    title,
    prompt: task.prompt.trim() || title,
    status: normalizeTaskStatus(task.status),
    priority: normalizeTaskPriority(task.priority),
    tags: task.tags,
    created_at: task.created_at,
    updated_at: task.updated_at,
    completed_at: task.completed_at,
    result: task.result
  }
  const agentId = task.assignment?.agent_id.trim().toLowerCase() ?? ''
  if (task.assignment && agentId !== '') {
    normalized.assignment = { ...task.assignment, agent_id: agentId }
  }
  return normalized
}

/**
 * Agents keyed by lowercase id; of two entries for one agent the most
 * recently seen is kept
 */
function normalizeAgents(agents: Record<string, TaskboardAgent>): Record<string, TaskboardAgent> {
  const out: Record<string, TaskboardAgent> = {}
  for (const [key, agent] of Object.entries(agents)) {
    const id = (agent.id.trim() || key.trim()).toLowerCase()
    if (id === '') continue
    const previous: TaskboardAgent | undefined = out[id]
    if (previous && timestampKey(previous.last_seen_at) > timestampKey(agent.last_seen_at)) continue
    out[id] = { ...agent, id }
  }
  return out
}

export function newTaskboard(name: string): Taskboard {
  return { version: 1, name: name.trim(), tasks: [], agents: {} }
}

/**
 * Decode and normalize a stored board payload
 *
 * Clamps the version to at least 1, fills missing collections, trims ids,
 * canonicalizes statuses and priorities and drops empty assignments.
 */
export function normalizeTaskboard(raw: unknown, fallbackName: string): Taskboard {
  const parsed = boardSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    throw new MalformedResponseError(`taskboard ${fallbackName} payload`, new Error(formatIssues(parsed.error)))
  }
  const data = parsed.data
  return {
    version: data.version > 0 ? data.version : 1,
    name: data.name.trim() || fallbackName.trim(),
    updated_at: data.updated_at,
    tasks: data.tasks.map(normalizeTask),
    agents: normalizeAgents(data.agents)
  }
}

// =============================================================================
// Locks and selection
// =============================================================================

/**
 * Whether a lock's lease has run out at `now`
 *
 * `lease_expires_at` wins; otherwise `claimed_at + lease_seconds`. A lock
 * with neither never expires.
 */
export function isLockExpired(lock: TaskLock, now: Date): boolean {
  const expiresAt = parseTimestamp(lock.lease_expires_at)
  if (expiresAt !== null) {
    return now.getTime() >= expiresAt
  }
  const claimedAt = parseTimestamp(lock.claimed_at)
  if (lock.lease_seconds && lock.lease_seconds > 0 && claimedAt !== null) {
    return now.getTime() >= claimedAt + lock.lease_seconds * 1000
  }
  return false
}

export function assignmentState(task: Task, now: Date): AssignmentState {
  const lock = task.assignment
  if (!lock || lock.agent_id.trim() === '') return { kind: 'idle' }
  return isLockExpired(lock, now) ? { kind: 'expired', lock } : { kind: 'live', lock }
}

function sameId(left: string, right: string): boolean {
  return left.trim().toLowerCase() === right.trim().toLowerCase()
}

/**
 * Holder of a live lock when it is someone other than `agentId`
 */
function foreignHolder(task: Task, agentId: string, now: Date): string | null {
  const state = assignmentState(task, now)
  if (state.kind === 'live' && !sameId(state.lock.agent_id, agentId)) {
    return state.lock.agent_id.trim()
  }
  return null
}

export function findTaskIndex(tasks: Task[], id: string): number {
  return tasks.findIndex(task => sameId(task.id, id))
}

function compareByPriority(left: Task, right: Task): number {
  const byPriority = priorityRank(left.priority) - priorityRank(right.priority)
  if (byPriority !== 0) return byPriority
  const leftCreated = timestampKey(left.created_at)
  const rightCreated = timestampKey(right.created_at)
  if (leftCreated !== rightCreated) return leftCreated < rightCreated ? -1 : 1
  return compareStrings(left.id, right.id)
}

/**
 * Index of the next claimable task, or -1
 *
 * Claimable: not done, and unassigned or holding an expired lock. Ordered by
 * priority, then creation time, then id.
 */
export function selectNextClaimable(tasks: Task[], now: Date): number {
  const candidates = tasks
    .map((task, index) => ({ task, index }))
    .filter(({ task }) => normalizeTaskStatus(task.status) !== 'done' && assignmentState(task, now).kind !== 'live')
  candidates.sort((left, right) => compareByPriority(left.task, right.task))
  return candidates.length > 0 ? candidates[0].index : -1
}

/**
 * Display order: doing, todo, done; then priority, creation time and id
 */
export function sortTasksForDisplay(tasks: Task[]): Task[] {
  return [...tasks].sort((left, right) => statusRank(left.status) - statusRank(right.status) || compareByPriority(left, right))
}

export function statusCounts(tasks: Task[]): StatusCounts {
  const counts: StatusCounts = { todo: 0, doing: 0, done: 0 }
  for (const task of tasks) {
    counts[normalizeTaskStatus(task.status)]++
  }
  return counts
}

/**
 * Filter by status and owner (case-insensitive), sort for display, cap to limit
 */
export function filterTasks(tasks: Task[], filter: ListFilter = {}): Task[] {
  const owner = (filter.owner ?? '').trim()
  const matching = tasks.filter(task => {
    if (filter.status && task.status !== filter.status) return false
    if (owner !== '' && !sameId(task.assignment?.agent_id ?? '', owner)) return false
    return true
  })
  const limit = filter.limit && filter.limit > 0 ? filter.limit : DEFAULT_LIST_LIMIT
  return sortTasksForDisplay(matching).slice(0, limit)
}

// =============================================================================
// Ids
// =============================================================================

/**
 * `tsk-<YYYYmmdd-HHMMSS>-<base36 x3>`, unique on the board
 */
export function generateTaskId(now: Date, existing: Task[], suffix: () => string = base36Suffix): string {
  const prefix = `tsk-${compactUtc(now)}`
  const used = new Set(existing.map(task => task.id.trim()))
  for (let i = 0; i < ID_ATTEMPTS; i++) {
    const id = `${prefix}-${suffix()}`.toLowerCase()
    if (!used.has(id)) return id
  }
  return `${prefix}-${now.getTime()}000000`.toLowerCase()
}

export function generateLockToken(now: Date): string {
  const n = randomInt(1_000_000)
  return `lock-${Math.floor(now.getTime() / 1000)}-${String(n).padStart(6, '0')}`
}

// =============================================================================
// Agents
// =============================================================================

function touchAgent(board: Taskboard, identity: AgentIdentity, now: Date, status: string, currentTaskId: string): void {
  const id = identity.agentId.trim()
  if (id === '') return
  const previous: TaskboardAgent | undefined = board.agents[id]
  board.agents[id] = {
    id,
    dyad: firstNonEmpty(identity.dyad, previous?.dyad) || undefined,
    machine: firstNonEmpty(identity.machine, previous?.machine) || undefined,
    user: firstNonEmpty(identity.user, previous?.user) || undefined,
    status,
    current_task_id: currentTaskId || undefined,
    last_seen_at: rfc3339(now)
  }
}

function setAgentState(board: Taskboard, agentId: string, now: Date, status: string): void {
  const id = agentId.trim()
  if (id === '') return
  const previous: TaskboardAgent | undefined = board.agents[id]
  board.agents[id] = {
    ...previous,
    id,
    status,
    current_task_id: undefined,
    last_seen_at: rfc3339(now)
  }
}

function clearOtherAgentsForTask(board: Taskboard, keepAgent: string, taskId: string, now: Date): void {
  for (const [id, agent] of Object.entries(board.agents)) {
    if (sameId(id, keepAgent)) continue
    if (!sameId(agent.current_task_id ?? '', taskId)) continue
    board.agents[id] = { ...agent, status: 'idle', current_task_id: undefined, last_seen_at: rfc3339(now) }
  }
}

// =============================================================================
// Store access
// =============================================================================

function objectMetadata(board: Taskboard): Record<string, number> {
  const counts = statusCounts(board.tasks)
  return {
    tasks_total: board.tasks.length,
    tasks_todo: counts.todo,
    tasks_doing: counts.doing,
    tasks_done: counts.done
  }
}

function requireBoardName(boardName: string): string {
  const name = boardName.trim()
  if (name === '') {
    throw new InvalidArgumentError('taskboard name required')
  }
  return name
}

/**
 * Read a board with the revision it was observed at
 *
 * A missing object reads as an empty board with `exists: false`.
 */
export async function loadTaskboard(
  client: SunClient,
  boardName: string,
  options: TaskboardOptions = {}
): Promise<LoadedTaskboard> {
  const name = requireBoardName(boardName)
  const meta = await client.lookupObjectMeta(TASKBOARD_KIND, name, { signal: options.signal })
  if (!meta) {
    return { board: newTaskboard(name), revision: 0, exists: false }
  }
  const payload = await client.getPayload(TASKBOARD_KIND, name, { signal: options.signal })
  let raw: unknown = {}
  if (payload.length > 0) {
    const parsed = tryParseJson(payload.toString('utf8'))
    if (!parsed.ok) {
      throw new MalformedResponseError(`taskboard ${name} payload`, parsed.error)
    }
    raw = parsed.value
  }
  return { board: normalizeTaskboard(raw, name), revision: meta.latest_revision, exists: true }
}

async function persistTaskboard(
  client: SunClient,
  board: Taskboard,
  loaded: LoadedTaskboard,
  options: TaskboardOptions
): Promise<number> {
  const normalized = normalizeTaskboard(board, board.name)
  const result = await client.putObject(
    TASKBOARD_KIND,
    normalized.name,
    {
      payload: JSON.stringify(normalized, null, 2),
      contentType: 'application/json',
      metadata: objectMetadata(normalized),
      expectedRevision: loaded.exists ? loaded.revision : undefined
    },
    { signal: options.signal }
  )
  return revisionOf(result)
}

/**
 * Read-modify-CAS loop
 *
 * `mutate` runs against a freshly read board and a single `now`. It throws to
 * abort without writing. Revision conflicts re-read and retry up to 8 times.
 */
export async function mutateTaskboard<T>(
  client: SunClient,
  boardName: string,
  mutate: (board: Taskboard, now: Date) => T,
  options: TaskboardOptions = {}
): Promise<MutationResult<T>> {
  const name = requireBoardName(boardName)
  const clock = options.now ?? (() => new Date())
  let lastConflict: unknown

  for (let attempt = 1; attempt <= MAX_MUTATE_ATTEMPTS; attempt++) {
    const loaded = await loadTaskboard(client, name, options)
    const board = loaded.board
    const now = clock()
    const value = mutate(board, now)
    board.updated_at = rfc3339(now)
    try {
      const revision = await persistTaskboard(client, board, loaded, options)
      return { board, revision, value }
    } catch (err) {
      if (!isRevisionConflict(err)) throw err
      lastConflict = err
      options.logger?.(`taskboard ${name}: revision conflict on attempt ${attempt}, retrying`)
    }
  }
  throw new TaskboardConflictExceededError(name, MAX_MUTATE_ATTEMPTS, lastConflict)
}

// =============================================================================
// Operations
// =============================================================================

export async function addTask(
  client: SunClient,
  boardName: string,
  input: AddTaskInput,
  options: TaskboardOptions = {}
): Promise<Task> {
  const title = input.title.trim()
  if (title === '') {
    throw new InvalidArgumentError('--title is required')
  }
  const { value } = await mutateTaskboard(
    client,
    boardName,
    (board, now) => {
      const stamp = rfc3339(now)
      const task: Task = {
        id: generateTaskId(now, board.tasks),
        title,
        prompt: (input.prompt ?? '').trim() || title,
        status: 'todo',
        priority: normalizeTaskPriority(input.priority),
        tags: (input.tags ?? []).map(tag => tag.trim()).filter(tag => tag !== ''),
        created_at: stamp,
        updated_at: stamp
      }
      board.tasks.push(task)
      return task
    },
    options
  )
  return value
}

/**
 * Claim a task, or the next claimable one when no id is given
 */
export async function claimTask(
  client: SunClient,
  boardName: string,
  request: ClaimRequest,
  options: TaskboardOptions = {}
): Promise<ClaimResult> {
  const agentId = request.agent.agentId.trim()
  if (agentId === '') {
    throw new InvalidArgumentError('agent id required')
  }
  const leaseSeconds = request.leaseSeconds && request.leaseSeconds > 0 ? request.leaseSeconds : DEFAULT_LEASE_SECONDS
  const wanted = (request.taskId ?? '').trim()

  const { board, value } = await mutateTaskboard(
    client,
    boardName,
    (board, now) => {
      let index: number
      if (wanted !== '') {
        index = findTaskIndex(board.tasks, wanted)
        if (index < 0) throw new TaskNotFoundError(wanted)
      } else {
        index = selectNextClaimable(board.tasks, now)
        if (index < 0) throw new NoClaimableTaskError(board.name)
      }

      const task = board.tasks[index]
      if (task.status === 'done') {
        throw new AlreadyDoneError(task.id)
      }
      const holder = foreignHolder(task, agentId, now)
      if (holder) {
        throw new TaskLockedError(task.id, holder)
      }

      const claimedAt = rfc3339(now)
      const claimed: Task = {
        ...task,
        status: 'doing',
        updated_at: claimedAt,
        assignment: {
          agent_id: agentId,
          dyad: request.agent.dyad || undefined,
          machine: request.agent.machine || undefined,
          user: request.agent.user || undefined,
          lock_token: generateLockToken(now),
          claimed_at: claimedAt,
          lease_seconds: leaseSeconds,
          lease_expires_at: rfc3339(new Date(now.getTime() + leaseSeconds * 1000))
        }
      }
      board.tasks[index] = claimed
      touchAgent(board, request.agent, now, 'working', claimed.id)
      clearOtherAgentsForTask(board, agentId, claimed.id, now)
      return claimed
    },
    options
  )
  return { board_name: board.name, task: value }
}

export async function releaseTask(
  client: SunClient,
  boardName: string,
  taskId: string,
  agent: AgentIdentity,
  options: TaskboardOptions = {}
): Promise<Task> {
  const { value } = await mutateTaskboard(
    client,
    boardName,
    (board, now) => {
      const index = findTaskIndex(board.tasks, taskId)
      if (index < 0) throw new TaskNotFoundError(taskId.trim())
      const task = board.tasks[index]
      if (!task.assignment) {
        throw new NotAssignedError(task.id)
      }
      const holder = foreignHolder(task, agent.agentId, now)
      if (holder) {
        throw new TaskLockedError(task.id, holder)
      }
      const previousHolder = task.assignment.agent_id.trim()
      const released: Task = {
        ...task,
        status: task.status === 'done' ? 'done' : 'todo',
        updated_at: rfc3339(now),
        assignment: undefined
      }
      board.tasks[index] = released
      touchAgent(board, agent, now, 'idle', '')
      if (previousHolder !== '' && !sameId(previousHolder, agent.agentId)) {
        setAgentState(board, previousHolder, now, 'idle')
      }
      return released
    },
    options
  )
  return value
}

export async function completeTask(
  client: SunClient,
  boardName: string,
  taskId: string,
  agent: AgentIdentity,
  resultText = '',
  options: TaskboardOptions = {}
): Promise<Task> {
  const { value } = await mutateTaskboard(
    client,
    boardName,
    (board, now) => {
      const index = findTaskIndex(board.tasks, taskId)
      if (index < 0) throw new TaskNotFoundError(taskId.trim())
      const task = board.tasks[index]
      const holder = foreignHolder(task, agent.agentId, now)
      if (holder) {
        throw new TaskLockedError(task.id, holder)
      }
      const previousHolder = task.assignment?.agent_id.trim() ?? ''
      if (previousHolder !== '' && !sameId(previousHolder, agent.agentId)) {
        setAgentState(board, previousHolder, now, 'idle')
      }
      const stamp = rfc3339(now)
      const done: Task = {
        ...task,
        status: 'done',
        assignment: undefined,
        updated_at: stamp,
        completed_at: stamp,
        result: resultText.trim() || task.result
      }
      board.tasks[index] = done
      touchAgent(board, agent, now, 'idle', '')
      return done
    },
    options
  )
  return value
}

// =============================================================================
// Settings resolution
// =============================================================================

export function resolveBoardName(settings: SunSettings, explicit = ''): string {
  return firstNonEmpty(explicit, settings.taskboard) || DEFAULT_BOARD
}

export function resolveLeaseSeconds(settings: SunSettings, explicit = 0): number {
  if (explicit > 0) return explicit
  if (settings.taskboard_lease_seconds && settings.taskboard_lease_seconds > 0) {
    return settings.taskboard_lease_seconds
  }
  return DEFAULT_LEASE_SECONDS
}
