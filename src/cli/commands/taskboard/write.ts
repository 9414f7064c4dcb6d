/**
 * Sun CLI - Taskboard add/claim/release/done
 */

import { InvalidArgumentError } from '../../../lib/errors.js'
import { resolveAgentIdentity } from '../../../lib/identity.js'
import {
  addTask,
  claimTask,
  completeTask,
  releaseTask,
  resolveBoardName,
  resolveLeaseSeconds,
  type TaskboardOptions
} from '../../../lib/taskboard.js'
import type { AgentIdentity, Task } from '../../../types.js'
import { contextLogger, createClientFromContext, splitCsv, type CommandContext } from '../../lib/create-client.js'
import { c } from '../../lib/colors.js'
import * as ui from '../../ui.js'

function agentOf(context: CommandContext): AgentIdentity {
  const { args } = context
  return resolveAgentIdentity({
    settings: context.settings,
    agent: args.agent,
    dyad: args.dyad,
    machine: args.machine,
    env: context.env
  })
}

function requireTaskId(context: CommandContext): string {
  const id = context.args.id?.trim() ?? ''
  if (id === '') {
    throw new InvalidArgumentError('--id is required')
  }
  return id
}

function optionsOf(context: CommandContext): TaskboardOptions {
  return { signal: context.signal, logger: contextLogger(context) }
}

function printTask(context: CommandContext, boardName: string, task: Task, headline: string): void {
  if (context.jsonOutput) {
    ui.outputJson({ board_name: boardName, task })
    return
  }
  ui.success(headline)
  ui.output(
    ui.formatKeyValue([
      ['id', task.id],
      ['status', task.status],
      ['priority', task.priority],
      ['title', task.title],
      ['agent', task.assignment?.agent_id],
      ['lease_expires_at', task.assignment?.lease_expires_at],
      ['result', task.result]
    ])
  )
}

export async function runTaskboardAdd(context: CommandContext): Promise<void> {
  const { args } = context
  const client = createClientFromContext(context)
  const boardName = resolveBoardName(context.settings, args.name)
  const task = await addTask(
    client,
    boardName,
    { title: args.title ?? '', prompt: args.prompt, priority: args.priority, tags: splitCsv(args.tags) },
    optionsOf(context)
  )
  printTask(context, boardName, task, `Added ${c.highlight(task.id)} to ${boardName}`)
}

export async function runTaskboardClaim(context: CommandContext): Promise<void> {
  const { args } = context
  const client = createClientFromContext(context)
  const boardName = resolveBoardName(context.settings, args.name)
  const agent = agentOf(context)
  const claimed = await claimTask(
    client,
    boardName,
    {
      taskId: args.id,
      agent,
      leaseSeconds: resolveLeaseSeconds(context.settings, args['lease-seconds'])
    },
    optionsOf(context)
  )
  printTask(context, claimed.board_name, claimed.task, `Claimed ${c.highlight(claimed.task.id)} as ${agent.agentId}`)
}

export async function runTaskboardRelease(context: CommandContext): Promise<void> {
  const taskId = requireTaskId(context)
  const client = createClientFromContext(context)
  const boardName = resolveBoardName(context.settings, context.args.name)
  const agent = agentOf(context)
  const task = await releaseTask(client, boardName, taskId, agent, optionsOf(context))
  printTask(context, boardName, task, `Released ${c.highlight(task.id)}`)
}

export async function runTaskboardDone(context: CommandContext): Promise<void> {
  const taskId = requireTaskId(context)
  const client = createClientFromContext(context)
  const boardName = resolveBoardName(context.settings, context.args.name)
  const agent = agentOf(context)
  const task = await completeTask(client, boardName, taskId, agent, context.args.result ?? '', optionsOf(context))
  printTask(context, boardName, task, `Completed ${c.highlight(task.id)}`)
}
