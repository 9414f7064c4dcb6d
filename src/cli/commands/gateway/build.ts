/**
 * Sun CLI - Gateway build/push
 */

import { buildCatalogFromSource } from '../../../lib/catalog.js'
import { InvalidArgumentError } from '../../../lib/errors.js'
import {
  buildGateway,
  publishGateway,
  resolveRegistryName,
  resolveSlots,
  writeGatewayBundle,
  type BuiltGateway
} from '../../../lib/gateway.js'
import type { Diagnostic } from '../../../types.js'
import { contextLogger, createClientFromContext, splitCsv, type CommandContext } from '../../lib/create-client.js'
import { c } from '../../lib/colors.js'
import * as ui from '../../ui.js'

interface GatewayBuild {
  built: BuiltGateway
  diagnostics: Diagnostic[]
}

async function buildFromArgs(context: CommandContext): Promise<GatewayBuild> {
  const { args } = context
  const source = args.source?.trim() ?? ''
  if (source === '') {
    throw new InvalidArgumentError('--source is required')
  }
  const registry = resolveRegistryName(context.settings, args.registry)
  const slotsPerNamespace = resolveSlots(context.settings, args.slots)

  const { catalog, diagnostics } = await buildCatalogFromSource(source, {
    channel: args.channel,
    verified: args.verified,
    addedAt: args['added-at'],
    tags: splitCsv(args.tags)
  })
  const built = buildGateway(catalog, { registry, slotsPerNamespace })
  return { built, diagnostics }
}

function reportDiagnostics(context: CommandContext, diagnostics: Diagnostic[]): void {
  if (context.jsonOutput) return
  for (const diagnostic of diagnostics) {
    const where = diagnostic.source ? `${diagnostic.source}: ` : ''
    if (diagnostic.level === 'error') {
      ui.error(`${where}${diagnostic.message}`)
    } else {
      ui.warn(`${where}${diagnostic.message}`)
    }
  }
}

export async function runGatewayBuild(context: CommandContext): Promise<void> {
  const { built, diagnostics } = await buildFromArgs(context)
  const outputDir = context.args['output-dir']?.trim() ?? ''
  const written = outputDir !== '' ? writeGatewayBundle(outputDir, built) : []

  reportDiagnostics(context, diagnostics)
  if (context.jsonOutput) {
    ui.outputJson({ index: built.index, diagnostics, written })
    return
  }
  ui.success(
    `Built ${c.highlight(built.index.registry)}: ${built.index.total_entries} entries in ${built.index.shards.length} shards`
  )
  if (written.length > 0) {
    ui.log(`Wrote ${written.length} files under ${c.highlight(outputDir)}`)
  } else {
    ui.output(JSON.stringify(built.index, null, 2))
  }
}

export async function runGatewayPush(context: CommandContext): Promise<void> {
  const { built, diagnostics } = await buildFromArgs(context)
  reportDiagnostics(context, diagnostics)

  const client = createClientFromContext(context)
  const result = await ui.withSpinner(
    `Publishing ${built.index.registry}`,
    () => publishGateway(client, built, { signal: context.signal, logger: contextLogger(context) }),
    !context.jsonOutput
  )
  if (context.jsonOutput) {
    ui.outputJson({ ...result, diagnostics })
    return
  }
  ui.success(
    `Published ${c.highlight(result.registry)}: ${result.total_entries} entries, ${result.shards_written} shards (index rev ${result.index_revision})`
  )
}
