#!/usr/bin/env node
/**
 * Sun CLI
 *
 * Control plane for the Sun object store: taskboards, remote machine jobs,
 * vault backups and gateway catalogs
 */

import { createCLI, type CommandParseResult, type CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { CLIArgs } from '../types.js'
import { loadConfig } from '../lib/config-loader.js'
import { c, sunFormatter } from './lib/colors.js'
import type { CommandContext } from './lib/create-client.js'
import { reportFailure } from './lib/report.js'
import * as ui from './ui.js'

import { runDoctor } from './commands/doctor.js'
import { runAuthGroup } from './commands/auth.js'
import { runTokenGroup } from './commands/token.js'
import { runAuditGroup } from './commands/audit.js'
import { runObjectsGroup } from './commands/objects.js'
import { runTaskboardGroup } from './commands/taskboard/index.js'
import { runMachineGroup } from './commands/machine/index.js'
import { runVaultGroup } from './commands/vault/index.js'
import { runGatewayGroup } from './commands/gateway/index.js'

const VERSION = process.env.SUN_CLI_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  try {
    // Walk up from this file to the nearest package.json
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
          return pkg.version
        }
        return undefined
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch {
    return undefined
  }
}

const agentOptions = {
  agent: {
    type: 'string',
    description: 'Agent id (default: sun.taskboard_agent or dyad:<dyad|user>@<machine>)'
  },
  dyad: {
    type: 'string',
    description: 'Dyad slug used when synthesizing the agent id'
  },
  machine: {
    type: 'string',
    description: 'Machine used when synthesizing the agent id'
  }
} as const

const catalogOptions = {
  source: {
    type: 'string',
    description: 'Directory tree or sun.plugin.json file to collect'
  },
  registry: {
    type: 'string',
    description: 'Gateway registry name (default: sun.gateway_registry or global)'
  },
  slots: {
    type: 'number',
    description: 'Shards per namespace (default: 16, max 256)'
  },
  channel: {
    type: 'string',
    description: 'Catalog channel for every entry (default: community)'
  },
  verified: {
    type: 'boolean',
    description: 'Mark every entry as verified'
  },
  tags: {
    type: 'string',
    description: 'Comma-separated tags added to every entry'
  },
  'added-at': {
    type: 'string',
    description: 'Entry date as YYYY-MM-DD (default: today, UTC)'
  }
} as const

const cliSchema: CLISchema = {
  name: 'sun',
  version: VERSION,
  description: 'Control plane for the Sun object store',
  autoShort: false,
  strict: true,
  formatter: sunFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Print progress and retry details on stderr'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress non-essential output (errors still shown)'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output in JSON format'
    },
    'base-url': {
      type: 'string',
      description: 'Sun endpoint override (default: SUN_BASE_URL or sun.base_url)'
    }
  },

  commands: {
    doctor: {
      description: 'Check readiness and credentials against the endpoint'
    },

    auth: {
      description: 'Credential inspection',
      commands: {
        status: {
          description: 'Show the account behind the configured token'
        }
      }
    },

    token: {
      description: 'API token management',
      commands: {
        list: {
          description: 'List tokens',
          options: {
            'include-revoked': {
              type: 'boolean',
              default: false,
              description: 'Include revoked tokens'
            },
            limit: {
              type: 'number',
              description: 'Maximum tokens (default: 100)'
            }
          }
        },
        create: {
          description: 'Issue a new token',
          options: {
            label: {
              type: 'string',
              description: 'Token label (default: sun-cli)'
            },
            scopes: {
              type: 'string',
              description: 'Comma-separated scopes (default: objects:read,objects:write)'
            },
            'expires-hours': {
              type: 'number',
              description: 'Lifetime in hours (default: no expiry)'
            }
          }
        },
        revoke: {
          description: 'Revoke a token',
          options: {
            id: {
              type: 'string',
              description: 'Token id'
            }
          }
        }
      }
    },

    audit: {
      description: 'Audit trail',
      commands: {
        list: {
          description: 'List audit events',
          options: {
            action: { type: 'string', description: 'Filter by action' },
            kind: { type: 'string', description: 'Filter by object kind' },
            name: { type: 'string', description: 'Filter by object name' },
            limit: { type: 'number', description: 'Maximum events (default: 200)' }
          }
        }
      }
    },

    objects: {
      description: 'Raw object inspection',
      commands: {
        list: {
          description: 'List objects',
          options: {
            kind: { type: 'string', description: 'Object kind' },
            name: { type: 'string', description: 'Object name filter' },
            limit: { type: 'number', description: 'Maximum objects' }
          }
        },
        revisions: {
          description: 'List revisions of one object',
          options: {
            kind: { type: 'string', description: 'Object kind' },
            name: { type: 'string', description: 'Object name' },
            limit: { type: 'number', description: 'Maximum revisions' }
          }
        }
      }
    },

    taskboard: {
      description: 'Shared task board with leased claims',
      aliases: ['tb'],
      options: {
        name: {
          type: 'string',
          description: 'Board name (default: SUN_TASKBOARD, sun.taskboard or default)'
        }
      },
      commands: {
        show: {
          description: 'Show board counts and tasks'
        },
        list: {
          description: 'List tasks',
          options: {
            status: { type: 'string', description: 'todo, doing or done' },
            owner: { type: 'string', description: 'Assigned agent id' },
            limit: { type: 'number', description: 'Maximum tasks (default: 50)' }
          }
        },
        add: {
          description: 'Add a task',
          options: {
            title: { type: 'string', description: 'Task title' },
            prompt: { type: 'string', description: 'Task prompt (default: the title)' },
            priority: { type: 'string', description: 'P1, P2 or P3 (default: P2)' },
            tags: { type: 'string', description: 'Comma-separated tags' }
          }
        },
        claim: {
          description: 'Claim a task, or the next claimable one',
          options: {
            id: { type: 'string', description: 'Task id (default: next by priority and age)' },
            'lease-seconds': { type: 'number', description: 'Lease length (default: 1800)' },
            ...agentOptions
          }
        },
        release: {
          description: 'Release a claimed task',
          options: {
            id: { type: 'string', description: 'Task id' },
            ...agentOptions
          }
        },
        done: {
          description: 'Mark a task done',
          options: {
            id: { type: 'string', description: 'Task id' },
            result: { type: 'string', description: 'Result summary' },
            ...agentOptions
          }
        }
      }
    },

    machine: {
      description: 'Machine registry and remote jobs',
      commands: {
        register: {
          description: 'Register or update this machine',
          options: {
            machine: { type: 'string', description: 'Machine id (default: SUN_MACHINE_ID, sun.machine_id or host name)' },
            operator: { type: 'string', description: 'Operator id (default: SUN_OPERATOR_ID, sun.operator_id or op:<user>@<machine>)' },
            'display-name': { type: 'string', description: 'Human-friendly name' },
            allow: { type: 'string', description: 'Comma-separated operators to add to the ACL' },
            'can-control-others': { type: 'boolean', description: 'Allow this machine to dispatch jobs' },
            'can-be-controlled': { type: 'boolean', description: 'Allow this machine to execute jobs' }
          }
        },
        status: {
          description: 'Show a machine record',
          options: {
            machine: { type: 'string', description: 'Machine id' }
          }
        },
        list: {
          description: 'List registered machines',
          options: {
            limit: { type: 'number', description: 'Maximum machines (default: 200)' }
          }
        },
        allow: {
          description: 'Grant an operator access (owner only)',
          options: {
            machine: { type: 'string', description: 'Machine id' },
            grant: { type: 'string', description: 'Operator id to allow' },
            as: { type: 'string', description: 'Acting operator id' }
          }
        },
        deny: {
          description: 'Revoke an operator (owner only)',
          options: {
            machine: { type: 'string', description: 'Machine id' },
            revoke: { type: 'string', description: 'Operator id to remove' },
            as: { type: 'string', description: 'Acting operator id' }
          }
        },
        run: {
          description: 'Queue a sun command on another machine (pass it after --)',
          options: {
            machine: { type: 'string', description: 'Target machine id' },
            'source-machine': { type: 'string', description: 'Dispatching machine id (default: this machine)' },
            operator: { type: 'string', description: 'Requesting operator id' },
            'timeout-seconds': { type: 'number', description: 'Job timeout (default: 900, min 10)' },
            wait: { type: 'boolean', default: false, description: 'Wait for the job to finish' },
            'wait-timeout-seconds': { type: 'number', description: 'Wait limit (default: 1200)' },
            'poll-seconds': { type: 'number', description: 'Poll interval (default: 2)' }
          }
        },
        jobs: {
          description: 'List jobs',
          options: {
            machine: { type: 'string', description: 'Target machine id' },
            'requested-by': { type: 'string', description: 'Requesting operator id' },
            status: { type: 'string', description: 'queued, running, succeeded, failed or denied' },
            limit: { type: 'number', description: 'Maximum jobs (default: 200)' }
          }
        },
        serve: {
          description: 'Claim and execute queued jobs for this machine',
          options: {
            machine: { type: 'string', description: 'Machine id (default: this machine)' },
            once: { type: 'boolean', default: false, description: 'Stop after the first job or an empty queue' },
            'max-jobs': { type: 'number', description: 'Stop after this many jobs' },
            'poll-seconds': { type: 'number', description: 'Idle poll interval (default: 2)' }
          }
        }
      }
    },

    vault: {
      description: 'Encrypted dotenv backups',
      commands: {
        sync: {
          description: 'Push, pull or compare the vault backup',
          positional: [{ name: 'action', required: true, description: 'push, pull or status' }],
          options: {
            file: { short: 'f', type: 'string', description: 'Vault file (default: SUN_VAULT_FILE, sun.vault_file or ~/.sun/vault/.env)' },
            name: { type: 'string', description: 'Backup name (default: SUN_VAULT_BACKUP, sun.vault_backup or default)' },
            'allow-plaintext': { type: 'boolean', default: false, description: 'Push even with unencrypted values' }
          }
        }
      }
    },

    gateway: {
      description: 'Sharded plugin catalog',
      commands: {
        build: {
          description: 'Build the gateway index and shards from manifests',
          options: {
            ...catalogOptions,
            'output-dir': { type: 'string', description: 'Write index.json and shards/*.json here' }
          }
        },
        push: {
          description: 'Build and publish the gateway',
          options: { ...catalogOptions }
        },
        pull: {
          description: 'Fetch shards and write a merged catalog',
          options: {
            registry: { type: 'string', description: 'Gateway registry name' },
            namespace: { type: 'string', description: 'Only this namespace' },
            capability: { type: 'string', description: 'Only entries with this capability' },
            prefix: { type: 'string', description: 'Only ids starting with this prefix' },
            limit: { type: 'number', description: 'Maximum entries' },
            out: { short: 'o', type: 'string', description: 'Catalog file (default: ~/.sun/plugins/catalog.d/gateway-<registry>.json)' }
          }
        },
        status: {
          description: 'Summarize the published index',
          options: {
            registry: { type: 'string', description: 'Gateway registry name' }
          }
        }
      }
    }
  }
}

function toRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {}
}

function str(opts: Record<string, unknown>, key: string): string | undefined {
  const value = opts[key]
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

function num(opts: Record<string, unknown>, key: string): number | undefined {
  const value = opts[key]
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value)
  return undefined
}

function bool(opts: Record<string, unknown>, key: string): boolean | undefined {
  const value = opts[key]
  return typeof value === 'boolean' ? value : undefined
}

/**
 * Convert cli-args-parser result to CLIArgs format
 */
export function toCliArgs(result: CommandParseResult): CLIArgs {
  const opts = toRecord(result.options)
  const pos = toRecord(result.positional)

  // command + positional args + everything after --
  const args: string[] = [...result.command]
  for (const value of Object.values(pos)) {
    if (typeof value === 'string') args.push(value)
  }
  const rest: unknown = result.rest
  if (Array.isArray(rest)) {
    for (const value of rest) {
      if (typeof value === 'string') args.push(value)
    }
  }

  return {
    _: args,
    verbose: bool(opts, 'verbose'),
    quiet: bool(opts, 'quiet'),
    json: bool(opts, 'json'),
    help: bool(opts, 'help'),
    version: bool(opts, 'version'),
    'base-url': str(opts, 'base-url'),
    name: str(opts, 'name'),
    id: str(opts, 'id'),
    limit: num(opts, 'limit'),
    file: str(opts, 'file'),
    title: str(opts, 'title'),
    prompt: str(opts, 'prompt'),
    priority: str(opts, 'priority'),
    tags: str(opts, 'tags'),
    status: str(opts, 'status'),
    owner: str(opts, 'owner'),
    agent: str(opts, 'agent'),
    dyad: str(opts, 'dyad'),
    machine: str(opts, 'machine'),
    'lease-seconds': num(opts, 'lease-seconds'),
    result: str(opts, 'result'),
    operator: str(opts, 'operator'),
    'display-name': str(opts, 'display-name'),
    allow: str(opts, 'allow'),
    'can-control-others': bool(opts, 'can-control-others'),
    'can-be-controlled': bool(opts, 'can-be-controlled'),
    grant: str(opts, 'grant'),
    revoke: str(opts, 'revoke'),
    as: str(opts, 'as'),
    'source-machine': str(opts, 'source-machine'),
    'timeout-seconds': num(opts, 'timeout-seconds'),
    wait: bool(opts, 'wait'),
    'wait-timeout-seconds': num(opts, 'wait-timeout-seconds'),
    'poll-seconds': num(opts, 'poll-seconds'),
    'requested-by': str(opts, 'requested-by'),
    once: bool(opts, 'once'),
    'max-jobs': num(opts, 'max-jobs'),
    'allow-plaintext': bool(opts, 'allow-plaintext'),
    source: str(opts, 'source'),
    registry: str(opts, 'registry'),
    slots: num(opts, 'slots'),
    channel: str(opts, 'channel'),
    verified: bool(opts, 'verified'),
    'added-at': str(opts, 'added-at'),
    'output-dir': str(opts, 'output-dir'),
    namespace: str(opts, 'namespace'),
    capability: str(opts, 'capability'),
    prefix: str(opts, 'prefix'),
    out: str(opts, 'out'),
    label: str(opts, 'label'),
    scopes: str(opts, 'scopes'),
    'expires-hours': num(opts, 'expires-hours'),
    'include-revoked': bool(opts, 'include-revoked'),
    action: str(opts, 'action'),
    kind: str(opts, 'kind')
  }
}

/**
 * Abort signal tied to SIGINT/SIGTERM
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController()
  const stop = (): void => controller.abort(new Error('interrupted'))
  process.once('SIGINT', stop)
  process.once('SIGTERM', stop)
  return controller.signal
}

const cli = createCLI(cliSchema)

async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs(result)

  if (args.help || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (args.version) {
    ui.output(`sun v${VERSION}`)
    return
  }

  if (result.errors.length > 0) {
    for (const message of result.errors) {
      ui.error(message)
    }
    process.exit(2)
  }

  const verbose = args.verbose ?? false
  const quiet = args.quiet ?? false
  const jsonOutput = args.json ?? false
  ui.setQuiet(quiet || jsonOutput)

  const command = result.command[0]

  try {
    const loaded = loadConfig({ env: process.env })
    if (loaded.configPath) {
      ui.verbose(`config ${loaded.configPath}`, verbose)
    }

    const context: CommandContext = {
      args,
      settings: loaded.settings,
      configPath: loaded.configPath,
      env: process.env,
      verbose,
      quiet,
      jsonOutput,
      signal: interruptSignal()
    }

    switch (command) {
      case 'doctor':
        await runDoctor(context)
        break

      case 'auth':
        await runAuthGroup(context)
        break

      case 'token':
        await runTokenGroup(context)
        break

      case 'audit':
        await runAuditGroup(context)
        break

      case 'objects':
        await runObjectsGroup(context)
        break

      case 'taskboard':
      case 'tb':
        await runTaskboardGroup(context)
        break

      case 'machine':
        await runMachineGroup(context)
        break

      case 'vault':
        await runVaultGroup(context)
        break

      case 'gateway':
        await runGatewayGroup(context)
        break

      default:
        ui.error(`Unknown command: ${c.command(command)}`)
        ui.log(`Run "${c.command('sun --help')}" for usage information`)
        process.exit(2)
    }
  } catch (err) {
    process.exit(reportFailure(err, { json: jsonOutput, verbose }))
  }
}

main().catch((err: unknown) => {
  process.exit(reportFailure(err, { json: false, verbose: true }))
})
