/**
 * Sun - control plane for a versioned object store
 *
 * Main library exports for programmatic usage
 */

// Client
export { SunClient, createClient, revisionOf, retryDelayMs, shouldRetryStatus, decodeError } from './client.js'
export type { SunClientOptions, RequestOptions, PutObjectInput, RetryEvent, FetchLike } from './client.js'

// Types
export type * from './types.js'

// Configuration and endpoint
export { loadConfig, settingsFromEnv, findConfigDir, expandHome, isTruthy } from './lib/config-loader.js'
export type { LoadedConfig, LoadConfigOptions, EnvMap } from './lib/config-loader.js'
export { resolveEndpoint, normalizeBaseUrl, validateToken, DEFAULT_TIMEOUT_SECONDS } from './lib/endpoint.js'
export type { Endpoint, EndpointOverrides } from './lib/endpoint.js'

// Identity
export { resolveAgentIdentity, resolveMachineId, resolveOperatorId, sanitizeSlug, sanitizeOperatorId } from './lib/identity.js'

// Taskboard
export {
  loadTaskboard,
  mutateTaskboard,
  addTask,
  claimTask,
  releaseTask,
  completeTask,
  filterTasks,
  statusCounts,
  parseStatusFilter,
  normalizeTaskStatus,
  normalizeTaskPriority,
  resolveBoardName,
  resolveLeaseSeconds,
  TASKBOARD_KIND
} from './lib/taskboard.js'

// Machine control
export {
  registerMachine,
  getMachine,
  listMachines,
  allowOperator,
  denyOperator,
  enqueueJob,
  waitForJob,
  jobFailure,
  listJobs,
  claimNextJob,
  executeClaimedJob,
  serveMachine,
  MACHINE_KIND,
  MACHINE_JOB_KIND
} from './lib/machine.js'
export { createProcessRunner, runCommand } from './lib/job-runner.js'
export type { CommandRunner, CommandResult } from './lib/job-runner.js'

// Vault sync
export { pushVaultBackup, pullVaultBackup, vaultStatus, findPlaintextKeys, VAULT_BACKUP_KIND } from './lib/vault-sync.js'

// Gateway catalog
export { parseManifest, parseManifestText, validateManifest } from './lib/plugin-manifest.js'
export { buildCatalogFromSource, discoverManifestPaths } from './lib/catalog.js'
export {
  buildGateway,
  publishGateway,
  pullGateway,
  fetchGatewayIndex,
  materializeGatewayCatalog,
  selectGatewayShards,
  gatewayShardKey
} from './lib/gateway.js'

// Errors
export * from './lib/errors.js'
