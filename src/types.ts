/**
 * Sun - Type Definitions
 */

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * The `sun:` section of .sun/config.yaml, after environment overrides.
 */
export interface SunSettings {
  base_url?: string
  token?: string
  allow_insecure_http?: boolean
  timeout_seconds?: number
  taskboard?: string
  taskboard_agent?: string
  taskboard_lease_seconds?: number
  machine_id?: string
  operator_id?: string
  vault_file?: string
  vault_backup?: string
  gateway_registry?: string
  gateway_slots?: number
}

export interface SunConfig {
  sun: SunSettings
}

/**
 * Where each effective setting came from
 */
export type SettingSource = 'default' | 'settings' | 'env' | 'flag'

// ============================================================================
// Object Store Wire Types
// ============================================================================

/** JSON value stored in object metadata */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

export type ObjectMetadata = Record<string, JsonValue>

export interface WhoAmI {
  account_id: string
  account_slug: string
  token_id: string
  scopes: string[]
}

export interface ObjectMeta {
  kind: string
  name: string
  latest_revision: number
  checksum: string
  content_type: string
  size_bytes: number
  metadata?: ObjectMetadata
  created_at: string
  updated_at: string
}

export interface ObjectRevision {
  revision: number
  checksum: string
  content_type: string
  size_bytes: number
  metadata?: ObjectMetadata
  created_at: string
}

export interface PutResult {
  result: {
    object: { latest_revision: number }
    revision: { revision: number }
  }
}

export interface TokenRecord {
  token_id: string
  label: string
  scopes: string[]
  expires_at?: string
  revoked_at?: string
  created_at: string
  last_used_at?: string
}

export interface IssuedToken {
  account: { id: string; slug: string }
  token: string
  token_id: string
  label: string
  scopes: string[]
  expires_at?: string
  issued_at: string
}

export interface AuditEvent {
  id: number
  token_id?: string
  action: string
  kind: string
  name: string
  revision?: number
  details?: Record<string, JsonValue>
  created_at: string
}

export interface AuditFilter {
  action?: string
  kind?: string
  name?: string
}

// ============================================================================
// Taskboard Types
// ============================================================================

export type TaskStatus = 'todo' | 'doing' | 'done'
export type TaskPriority = 'P1' | 'P2' | 'P3'

export interface TaskLock {
  agent_id: string
  dyad?: string
  machine?: string
  user?: string
  lock_token?: string
  claimed_at?: string
  lease_seconds?: number
  lease_expires_at?: string
}

export interface Task {
  id: string
  title: string
  prompt: string
  status: TaskStatus
  priority: TaskPriority
  tags: string[]
  created_at?: string
  updated_at?: string
  completed_at?: string
  result?: string
  assignment?: TaskLock
}

export interface TaskboardAgent {
  id: string
  dyad?: string
  machine?: string
  user?: string
  status?: string
  current_task_id?: string
  last_seen_at?: string
}

export interface Taskboard {
  version: number
  name: string
  updated_at?: string
  tasks: Task[]
  agents: Record<string, TaskboardAgent>
}

/**
 * Who is acting on a board. Rendered to `agentId` only for storage.
 */
export interface AgentIdentity {
  agentId: string
  dyad: string
  machine: string
  user: string
}

/**
 * State of a task's assignment at a given instant
 */
export type AssignmentState =
  | { kind: 'idle' }
  | { kind: 'expired'; lock: TaskLock }
  | { kind: 'live'; lock: TaskLock }

// ============================================================================
// Machine Control Types
// ============================================================================

export interface MachineCapabilities {
  can_control_others: boolean
  can_be_controlled: boolean
}

export interface MachineRecord {
  version: number
  machine_id: string
  display_name?: string
  owner_operator: string
  capabilities: MachineCapabilities
  acl: { allowed_operators: string[] }
  heartbeat?: { last_seen_at?: string; last_state?: string }
  registered_at?: string
  updated_at?: string
}

export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'denied'

export interface MachineJob {
  version: number
  job_id: string
  machine_id: string
  requested_by: string
  source_machine?: string
  command: string[]
  timeout_seconds: number
  /** Empty when the stored status is not one we recognize; such jobs are never claimed */
  status: JobStatus | ''
  requested_at?: string
  updated_at?: string
  claimed_by?: string
  claimed_at?: string
  started_at?: string
  completed_at?: string
  exit_code?: number
  stdout?: string
  stderr?: string
  error?: string
}

export interface ServeSummary {
  machine_id: string
  processed: number
  job_ids: string[]
}

// ============================================================================
// Gateway Catalog Types
// ============================================================================

export type InstallType = 'none' | 'local_path' | 'mcp_http' | 'oci_image' | 'git'

export interface McpServer {
  name: string
  transport: string
  endpoint?: string
  command?: string[]
}

export interface PluginManifest {
  schema_version: number
  id: string
  namespace?: string
  name?: string
  version?: string
  summary?: string
  description?: string
  homepage?: string
  terms_url?: string
  privacy_url?: string
  license?: string
  maturity?: string
  kind?: string
  install: {
    type: string
    source?: string
    entry_command?: string[]
    env?: string[]
    params?: Record<string, string>
  }
  integration: {
    provider_ids?: string[]
    commands?: string[]
    mcp_servers?: McpServer[]
    capabilities?: string[]
  }
  metadata?: Record<string, JsonValue>
}

export interface CatalogEntry {
  manifest: PluginManifest
  channel?: string
  verified?: boolean
  added_at?: string
  tags?: string[]
}

export interface Catalog {
  schema_version: number
  entries: CatalogEntry[]
}

export interface Diagnostic {
  level: 'warn' | 'error'
  message: string
  source?: string
}

export interface GatewayShardSummary {
  key: string
  namespace: string
  slot: number
  count: number
  capabilities?: string[]
  checksum: string
}

export interface GatewayNamespaceIndex {
  namespace: string
  count: number
  shards: string[]
}

export interface GatewayIndex {
  schema_version: number
  registry: string
  generated_at: string
  slots_per_namespace: number
  total_entries: number
  shards: GatewayShardSummary[]
  namespaces: GatewayNamespaceIndex[]
}

export interface GatewayShard {
  schema_version: number
  registry: string
  key: string
  namespace: string
  slot: number
  entries: CatalogEntry[]
}

export interface GatewaySelectFilter {
  namespace?: string
  capability?: string
  prefix?: string
  limit?: number
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  _: string[]
  // Global flags
  verbose?: boolean
  quiet?: boolean
  json?: boolean
  help?: boolean
  version?: boolean
  'base-url'?: string
  // Shared command flags
  name?: string
  id?: string
  limit?: number
  file?: string
  // Taskboard flags
  title?: string
  prompt?: string
  priority?: string
  tags?: string
  status?: string
  owner?: string
  agent?: string
  dyad?: string
  machine?: string
  'lease-seconds'?: number
  result?: string
  // Machine flags
  operator?: string
  'display-name'?: string
  allow?: string
  'can-control-others'?: boolean
  'can-be-controlled'?: boolean
  grant?: string
  revoke?: string
  as?: string
  'source-machine'?: string
  'timeout-seconds'?: number
  wait?: boolean
  'wait-timeout-seconds'?: number
  'poll-seconds'?: number
  'requested-by'?: string
  once?: boolean
  'max-jobs'?: number
  // Vault flags
  'allow-plaintext'?: boolean
  // Gateway flags
  source?: string
  registry?: string
  slots?: number
  channel?: string
  verified?: boolean
  'added-at'?: string
  'output-dir'?: string
  namespace?: string
  capability?: string
  prefix?: string
  out?: string
  // Token / audit flags
  label?: string
  scopes?: string
  'expires-hours'?: number
  'include-revoked'?: boolean
  action?: string
  kind?: string
}
