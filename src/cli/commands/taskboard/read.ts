/**
 * Sun CLI - Taskboard show/list
 */

import {
  assignmentState,
  filterTasks,
  loadTaskboard,
  parseStatusFilter,
  resolveBoardName,
  sortTasksForDisplay,
  statusCounts
} from '../../../lib/taskboard.js'
import type { Task } from '../../../types.js'
import { contextLogger, createClientFromContext, type CommandContext } from '../../lib/create-client.js'
import { c, colorStatus } from '../../lib/colors.js'
import * as ui from '../../ui.js'

/**
 * Task table: ID, STATUS, PRI, TITLE, AGENT, LOCK_UNTIL
 *
 * Expired leases show the holder with "(expired)".
 */
export function formatTaskTable(tasks: Task[], now: Date = new Date()): string {
  return ui.formatTable(
    [
      { key: 'id', header: 'ID' },
      { key: 'status', header: 'STATUS' },
      { key: 'priority', header: 'PRI' },
      { key: 'title', header: 'TITLE' },
      { key: 'agent', header: 'AGENT' },
      { key: 'lock', header: 'LOCK_UNTIL' }
    ],
    tasks.map(task => {
      const state = assignmentState(task, now)
      const agent = state.kind === 'idle' ? '-' : state.lock.agent_id
      return {
        id: task.id,
        status: ui.isTTY ? colorStatus(task.status) : task.status,
        priority: task.priority,
        title: task.title,
        agent: state.kind === 'expired' ? `${agent} (expired)` : agent,
        lock: state.kind === 'idle' ? '-' : (state.lock.lease_expires_at ?? '-')
      }
    })
  )
}

export async function runTaskboardShow(context: CommandContext): Promise<void> {
  const client = createClientFromContext(context)
  const boardName = resolveBoardName(context.settings, context.args.name)
  const loaded = await loadTaskboard(client, boardName, { signal: context.signal, logger: contextLogger(context) })
  const counts = statusCounts(loaded.board.tasks)

  if (context.jsonOutput) {
    ui.outputJson({
      board_name: loaded.board.name,
      revision: loaded.revision,
      exists: loaded.exists,
      counts,
      board: loaded.board
    })
    return
  }

  ui.output(`${c.header('taskboard')} ${c.highlight(loaded.board.name)} ${c.muted(`rev ${loaded.revision}`)}`)
  ui.output(`tasks: ${loaded.board.tasks.length} (todo=${counts.todo} doing=${counts.doing} done=${counts.done})`)
  if (loaded.board.tasks.length === 0) {
    ui.log(c.muted('No tasks'))
    return
  }
  ui.output(formatTaskTable(sortTasksForDisplay(loaded.board.tasks)))
}

export async function runTaskboardList(context: CommandContext): Promise<void> {
  const { args } = context
  const status = parseStatusFilter(args.status)
  const client = createClientFromContext(context)
  const boardName = resolveBoardName(context.settings, args.name)
  const loaded = await loadTaskboard(client, boardName, { signal: context.signal, logger: contextLogger(context) })
  const tasks = filterTasks(loaded.board.tasks, { status, owner: args.owner, limit: args.limit })

  if (context.jsonOutput) {
    ui.outputJson({ board_name: loaded.board.name, items: tasks })
    return
  }
  if (tasks.length === 0) {
    ui.log(c.muted('No matching tasks'))
    return
  }
  ui.output(formatTaskTable(tasks))
}
