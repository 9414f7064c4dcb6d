/**
 * Sun CLI - Machine registry commands
 */

import { resolveMachineId, resolveOperatorId } from '../../../lib/identity.js'
import {
  allowOperator,
  denyOperator,
  getMachine,
  listMachines,
  registerMachine,
  type MachineOptions,
  type MachineWriteResult
} from '../../../lib/machine.js'
import type { MachineRecord } from '../../../types.js'
import { contextLogger, createClientFromContext, splitCsv, type CommandContext } from '../../lib/create-client.js'
import { c } from '../../lib/colors.js'
import * as ui from '../../ui.js'

function optionsOf(context: CommandContext): MachineOptions {
  return { signal: context.signal, logger: contextLogger(context) }
}

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no'
}

export function formatMachine(record: MachineRecord): string {
  return ui.formatKeyValue([
    ['machine_id', record.machine_id],
    ['display_name', record.display_name],
    ['owner', record.owner_operator],
    ['can_control_others', yesNo(record.capabilities.can_control_others)],
    ['can_be_controlled', yesNo(record.capabilities.can_be_controlled)],
    ['allowed_operators', record.acl.allowed_operators.join(',')],
    ['last_seen_at', record.heartbeat?.last_seen_at],
    ['last_state', record.heartbeat?.last_state],
    ['registered_at', record.registered_at]
  ])
}

function printWrite(context: CommandContext, result: MachineWriteResult, headline: string): void {
  if (context.jsonOutput) {
    ui.outputJson({ machine: result.machine, revision: result.revision })
    return
  }
  ui.success(headline)
  ui.output(formatMachine(result.machine))
}

export async function runMachineRegister(context: CommandContext): Promise<void> {
  const { args } = context
  const machineId = resolveMachineId(context.settings, args.machine)
  const operatorId = resolveOperatorId(context.settings, args.operator ?? '', machineId, context.env)
  const client = createClientFromContext(context)
  const result = await registerMachine(
    client,
    {
      machineId,
      operatorId,
      displayName: args['display-name'],
      allowOperators: splitCsv(args.allow),
      canControlOthers: args['can-control-others'],
      canBeControlled: args['can-be-controlled']
    },
    optionsOf(context)
  )
  printWrite(context, result, `Registered ${c.highlight(result.machine.machine_id)} (rev ${result.revision})`)
}

export async function runMachineStatus(context: CommandContext): Promise<void> {
  const machineId = resolveMachineId(context.settings, context.args.machine)
  const client = createClientFromContext(context)
  const record = await getMachine(client, machineId, optionsOf(context))
  if (context.jsonOutput) {
    ui.outputJson(record)
    return
  }
  ui.output(formatMachine(record))
}

export async function runMachineList(context: CommandContext): Promise<void> {
  const client = createClientFromContext(context)
  const records = await listMachines(client, context.args.limit, optionsOf(context))
  if (context.jsonOutput) {
    ui.outputJson({ items: records })
    return
  }
  if (records.length === 0) {
    ui.log(c.muted('No machines registered'))
    return
  }
  ui.output(
    ui.formatTable(
      [
        { key: 'machine', header: 'MACHINE' },
        { key: 'control', header: 'CAN_CONTROL' },
        { key: 'execute', header: 'CAN_EXECUTE' },
        { key: 'owner', header: 'OWNER' },
        { key: 'seen', header: 'LAST_SEEN' }
      ],
      records.map(record => ({
        machine: record.machine_id,
        control: yesNo(record.capabilities.can_control_others),
        execute: yesNo(record.capabilities.can_be_controlled),
        owner: record.owner_operator,
        seen: record.heartbeat?.last_seen_at ?? '-'
      }))
    )
  )
}

function actingOperator(context: CommandContext): string {
  const localMachine = resolveMachineId(context.settings)
  return resolveOperatorId(context.settings, context.args.as ?? '', localMachine, context.env)
}

export async function runMachineAllow(context: CommandContext): Promise<void> {
  const { args } = context
  const machineId = resolveMachineId(context.settings, args.machine)
  const client = createClientFromContext(context)
  const result = await allowOperator(client, machineId, args.grant ?? '', actingOperator(context), optionsOf(context))
  printWrite(context, result, `Allowed ${c.highlight(args.grant ?? '')} on ${result.machine.machine_id}`)
}

export async function runMachineDeny(context: CommandContext): Promise<void> {
  const { args } = context
  const machineId = resolveMachineId(context.settings, args.machine)
  const client = createClientFromContext(context)
  const result = await denyOperator(client, machineId, args.revoke ?? '', actingOperator(context), optionsOf(context))
  printWrite(context, result, `Revoked ${c.highlight(args.revoke ?? '')} on ${result.machine.machine_id}`)
}
