/**
 * Sun CLI - Gateway pull/status
 */

import os from 'node:os'
import {
  defaultCatalogPath,
  fetchGatewayIndex,
  pullGateway,
  resolveRegistryName,
  writeCatalogFile
} from '../../../lib/gateway.js'
import { contextLogger, createClientFromContext, type CommandContext } from '../../lib/create-client.js'
import { c } from '../../lib/colors.js'
import * as ui from '../../ui.js'

export async function runGatewayPull(context: CommandContext): Promise<void> {
  const { args } = context
  const registry = resolveRegistryName(context.settings, args.registry)
  const out = defaultCatalogPath(registry, args.out, os.homedir())
  const client = createClientFromContext(context)

  const result = await ui.withSpinner(
    `Pulling ${registry}`,
    () =>
      pullGateway(
        client,
        registry,
        { namespace: args.namespace, capability: args.capability, prefix: args.prefix, limit: args.limit },
        { signal: context.signal, logger: contextLogger(context) }
      ),
    !context.jsonOutput
  )
  writeCatalogFile(out, result.catalog)

  const summary = {
    registry: result.registry,
    out,
    entries: result.catalog.entries.length,
    shards_fetched: result.shards_fetched
  }
  if (context.jsonOutput) {
    ui.outputJson(summary)
    return
  }
  ui.success(`Wrote ${summary.entries} entries from ${summary.shards_fetched} shards to ${c.highlight(out)}`)
}

export async function runGatewayStatus(context: CommandContext): Promise<void> {
  const registry = resolveRegistryName(context.settings, context.args.registry)
  const client = createClientFromContext(context)
  const index = await fetchGatewayIndex(client, registry, { signal: context.signal })

  if (context.jsonOutput) {
    ui.outputJson({
      registry: index.registry,
      generated_at: index.generated_at,
      slots_per_namespace: index.slots_per_namespace,
      total_entries: index.total_entries,
      shards: index.shards.length,
      namespaces: index.namespaces
    })
    return
  }

  ui.output(
    ui.formatKeyValue([
      ['registry', index.registry],
      ['generated_at', index.generated_at],
      ['slots_per_namespace', index.slots_per_namespace],
      ['total_entries', index.total_entries],
      ['shards', index.shards.length]
    ])
  )
  if (index.namespaces.length > 0) {
    ui.output(
      ui.formatTable(
        [
          { key: 'namespace', header: 'NAMESPACE' },
          { key: 'count', header: 'ENTRIES', align: 'right' },
          { key: 'shards', header: 'SHARDS', align: 'right' }
        ],
        index.namespaces.map(ns => ({ namespace: ns.namespace, count: ns.count, shards: ns.shards.length }))
      )
    )
  }
}
