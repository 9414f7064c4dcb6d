/**
 * Sun Error Hierarchy
 *
 * Typed error classes shared by the library and the CLI. Every kind carries a
 * stable string code and maps to a stable process exit code.
 *
 * Hierarchy:
 *   SunError (base)
 *   ├── ConfigError (client misconfiguration)
 *   │   ├── NotConfiguredError
 *   │   ├── InvalidConfigError
 *   │   ├── InvalidCredentialError
 *   │   └── InsecureTransportError
 *   ├── ValidationError (bad user input)
 *   │   ├── InvalidArgumentError
 *   │   └── MalformedManifestError
 *   ├── StoreError (object store transport and responses)
 *   │   ├── TransportError
 *   │   ├── ReadinessError
 *   │   ├── RemoteError
 *   │   │   ├── AccessDeniedByEdgeError
 *   │   │   └── RevisionConflictError
 *   │   └── MalformedResponseError
 *   ├── TaskboardError
 *   │   ├── TaskNotFoundError
 *   │   ├── AlreadyDoneError
 *   │   ├── TaskLockedError
 *   │   ├── NotAssignedError
 *   │   ├── NoClaimableTaskError
 *   │   └── TaskboardConflictExceededError
 *   ├── MachineError
 *   │   ├── MachineUnregisteredError
 *   │   ├── TargetRefusesControlError
 *   │   ├── NotPermittedError
 *   │   ├── SourceNotAuthorizedError
 *   │   ├── SourceCannotControlError
 *   │   ├── JobNotFoundError
 *   │   ├── RemoteJobFailedError
 *   │   └── WaitTimeoutError
 *   ├── VaultError
 *   │   ├── PlaintextRefusedError
 *   │   ├── ChecksumMismatchError
 *   │   └── SizeMismatchError
 *   └── GatewayError
 *       ├── MalformedIndexError
 *       └── MalformedShardError
 */

export type SunErrorCode =
  | 'UNKNOWN_ERROR'
  | 'INVALID_ARGUMENT'
  | 'MALFORMED_MANIFEST'
  | 'NOT_CONFIGURED'
  | 'INVALID_CONFIG'
  | 'INVALID_CREDENTIAL'
  | 'INSECURE_TRANSPORT'
  | 'TRANSPORT_ERROR'
  | 'READINESS_FAILED'
  | 'REMOTE_ERROR'
  | 'ACCESS_DENIED_BY_EDGE'
  | 'REVISION_CONFLICT'
  | 'MALFORMED_RESPONSE'
  | 'TASK_NOT_FOUND'
  | 'ALREADY_DONE'
  | 'TASK_LOCKED'
  | 'NOT_ASSIGNED'
  | 'NO_CLAIMABLE_TASK'
  | 'TASKBOARD_CONFLICT_EXCEEDED'
  | 'MACHINE_UNREGISTERED'
  | 'TARGET_REFUSES_CONTROL'
  | 'NOT_PERMITTED'
  | 'SOURCE_NOT_AUTHORIZED'
  | 'SOURCE_CANNOT_CONTROL'
  | 'JOB_NOT_FOUND'
  | 'REMOTE_JOB_FAILED'
  | 'WAIT_TIMEOUT'
  | 'PLAINTEXT_REFUSED'
  | 'CHECKSUM_MISMATCH'
  | 'SIZE_MISMATCH'
  | 'MALFORMED_INDEX'
  | 'MALFORMED_SHARD'

/**
 * Process exit code per error kind. Stable within a release.
 */
export const EXIT_CODES = {
  UNKNOWN_ERROR: 1,
  INVALID_ARGUMENT: 2,
  MALFORMED_MANIFEST: 2,
  NOT_CONFIGURED: 3,
  INVALID_CONFIG: 3,
  INVALID_CREDENTIAL: 3,
  INSECURE_TRANSPORT: 3,
  TRANSPORT_ERROR: 4,
  READINESS_FAILED: 4,
  REMOTE_ERROR: 5,
  ACCESS_DENIED_BY_EDGE: 5,
  MALFORMED_RESPONSE: 5,
  REVISION_CONFLICT: 6,
  TASKBOARD_CONFLICT_EXCEEDED: 6,
  TASK_NOT_FOUND: 7,
  ALREADY_DONE: 7,
  TASK_LOCKED: 7,
  NOT_ASSIGNED: 7,
  NO_CLAIMABLE_TASK: 7,
  MACHINE_UNREGISTERED: 8,
  TARGET_REFUSES_CONTROL: 8,
  NOT_PERMITTED: 8,
  SOURCE_NOT_AUTHORIZED: 8,
  SOURCE_CANNOT_CONTROL: 8,
  JOB_NOT_FOUND: 8,
  REMOTE_JOB_FAILED: 9,
  WAIT_TIMEOUT: 10,
  PLAINTEXT_REFUSED: 11,
  CHECKSUM_MISMATCH: 11,
  SIZE_MISMATCH: 11,
  MALFORMED_INDEX: 12,
  MALFORMED_SHARD: 12
} as const satisfies Record<SunErrorCode, number>

export interface SunErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all Sun errors
 */
export class SunError extends Error {
  /** Error code for programmatic handling */
  readonly code: SunErrorCode

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: SunErrorCode, options: SunErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'SunError'
    this.code = code
    this.suggestion = options.suggestion
    this.context = options.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  get exitCode(): number {
    return EXIT_CODES[this.code]
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Structured failure payload for --json output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends SunError {
  constructor(message: string, code: SunErrorCode, options?: SunErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when a required endpoint setting is missing
 */
export class NotConfiguredError extends ConfigError {
  constructor(message: string, suggestion?: string) {
    super(message, 'NOT_CONFIGURED', { suggestion })
    this.name = 'NotConfiguredError'
  }
}

/**
 * Thrown when .sun/config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath: string, cause?: unknown) {
    super(`Invalid config in ${configPath}: ${message}`, 'INVALID_CONFIG', {
      suggestion: 'Check your .sun/config.yaml syntax',
      context: { configPath },
      cause
    })
    this.name = 'InvalidConfigError'
  }
}

export class InvalidCredentialError extends ConfigError {
  constructor(reason: string) {
    super(`invalid token: ${reason}`, 'INVALID_CREDENTIAL', {
      suggestion: 'Check sun.token or SUN_TOKEN'
    })
    this.name = 'InvalidCredentialError'
  }
}

export class InsecureTransportError extends ConfigError {
  constructor(message: string, baseUrl: string) {
    super(message, 'INSECURE_TRANSPORT', { context: { baseUrl } })
    this.name = 'InsecureTransportError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends SunError {
  constructor(message: string, code: SunErrorCode, options?: SunErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown for bad user input. Never retried.
 */
export class InvalidArgumentError extends ValidationError {
  constructor(message: string, options?: SunErrorOptions) {
    super(message, 'INVALID_ARGUMENT', options)
    this.name = 'InvalidArgumentError'
  }
}

export class MalformedManifestError extends ValidationError {
  constructor(message: string, source?: string, cause?: unknown) {
    super(source ? `${source}: ${message}` : message, 'MALFORMED_MANIFEST', {
      context: source ? { source } : undefined,
      cause
    })
    this.name = 'MalformedManifestError'
  }
}

// =============================================================================
// Object Store Errors
// =============================================================================

export class StoreError extends SunError {
  constructor(message: string, code: SunErrorCode, options?: SunErrorOptions) {
    super(message, code, options)
    this.name = 'StoreError'
  }
}

/**
 * Network failure after retries were exhausted
 */
export class TransportError extends StoreError {
  constructor(method: string, url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`${method} ${url} failed: ${reason}`, 'TRANSPORT_ERROR', {
      suggestion: 'Check network connectivity and sun.base_url',
      context: { method, url },
      cause
    })
    this.name = 'TransportError'
  }
}

export class ReadinessError extends StoreError {
  constructor(message: string, cause?: unknown) {
    super(`readiness check failed: ${message}`, 'READINESS_FAILED', { cause })
    this.name = 'ReadinessError'
  }
}

/**
 * Non-2xx response from the object store
 */
export class RemoteError extends StoreError {
  readonly status: number
  readonly remoteMessage: string

  constructor(
    status: number,
    message: string,
    code: SunErrorCode = 'REMOTE_ERROR',
    options?: SunErrorOptions,
    display = `${message} (status ${status})`
  ) {
    super(display, code, {
      ...options,
      context: { status, ...options?.context }
    })
    this.name = 'RemoteError'
    this.status = status
    this.remoteMessage = message
  }
}

export class AccessDeniedByEdgeError extends RemoteError {
  constructor() {
    super(
      403,
      'access denied by edge (error 1010); check firewall/bot rules for this client IP and user-agent',
      'ACCESS_DENIED_BY_EDGE',
      { suggestion: 'Ask the edge operator to allow this client' },
      'access denied by edge (error 1010); check firewall/bot rules for this client IP and user-agent'
    )
    this.name = 'AccessDeniedByEdgeError'
  }
}

/**
 * expected_revision did not match the object's latest revision
 */
export class RevisionConflictError extends RemoteError {
  constructor(message: string) {
    super(409, message, 'REVISION_CONFLICT', {
      suggestion: 'Re-read the object and retry the update'
    })
    this.name = 'RevisionConflictError'
  }
}

export class MalformedResponseError extends StoreError {
  constructor(what: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    super(`malformed response for ${what}${reason}`, 'MALFORMED_RESPONSE', { cause })
    this.name = 'MalformedResponseError'
  }
}

// =============================================================================
// Taskboard Errors
// =============================================================================

export class TaskboardError extends SunError {
  constructor(message: string, code: SunErrorCode, options?: SunErrorOptions) {
    super(message, code, options)
    this.name = 'TaskboardError'
  }
}

export class TaskNotFoundError extends TaskboardError {
  constructor(taskId: string) {
    super(`task "${taskId}" not found`, 'TASK_NOT_FOUND', { context: { taskId } })
    this.name = 'TaskNotFoundError'
  }
}

export class AlreadyDoneError extends TaskboardError {
  constructor(taskId: string) {
    super(`task ${taskId} is already done`, 'ALREADY_DONE', { context: { taskId } })
    this.name = 'AlreadyDoneError'
  }
}

export class TaskLockedError extends TaskboardError {
  readonly holder: string

  constructor(taskId: string, holder: string) {
    super(`task ${taskId} is locked by ${holder}`, 'TASK_LOCKED', {
      suggestion: 'Wait for the lease to expire or ask the holder to release it',
      context: { taskId, holder }
    })
    this.name = 'TaskLockedError'
    this.holder = holder
  }
}

export class NotAssignedError extends TaskboardError {
  constructor(taskId: string) {
    super(`task ${taskId} is not currently assigned`, 'NOT_ASSIGNED', { context: { taskId } })
    this.name = 'NotAssignedError'
  }
}

export class NoClaimableTaskError extends TaskboardError {
  constructor(board: string) {
    super('no claimable tasks available', 'NO_CLAIMABLE_TASK', { context: { board } })
    this.name = 'NoClaimableTaskError'
  }
}

export class TaskboardConflictExceededError extends TaskboardError {
  constructor(board: string, attempts: number, cause?: unknown) {
    super(`taskboard update failed after ${attempts} attempts: revision conflict`, 'TASKBOARD_CONFLICT_EXCEEDED', {
      context: { board, attempts },
      cause
    })
    this.name = 'TaskboardConflictExceededError'
  }
}

// =============================================================================
// Machine Control Errors
// =============================================================================

export class MachineError extends SunError {
  constructor(message: string, code: SunErrorCode, options?: SunErrorOptions) {
    super(message, code, options)
    this.name = 'MachineError'
  }
}

export type MachineRole = 'machine' | 'target' | 'source'

export class MachineUnregisteredError extends MachineError {
  readonly machineId: string
  readonly role: MachineRole

  constructor(machineId: string, role: MachineRole = 'machine', suggestion?: string) {
    const label = role === 'machine' ? 'machine' : `${role} machine`
    super(`${label} "${machineId}" is not registered`, 'MACHINE_UNREGISTERED', {
      suggestion: suggestion ?? `Run "sun machine register --machine ${machineId}" first`,
      context: { machineId, role }
    })
    this.name = 'MachineUnregisteredError'
    this.machineId = machineId
    this.role = role
  }
}

export class TargetRefusesControlError extends MachineError {
  constructor(
    machineId: string,
    message = `target machine "${machineId}" does not accept remote control (can_be_controlled=false)`
  ) {
    super(message, 'TARGET_REFUSES_CONTROL', { context: { machineId } })
    this.name = 'TargetRefusesControlError'
  }

  /** Raised by a serve loop on a machine that does not take jobs */
  static serving(machineId: string): TargetRefusesControlError {
    return new TargetRefusesControlError(
      machineId,
      `machine "${machineId}" is not accepting remote jobs (can_be_controlled=false)`
    )
  }
}

export class NotPermittedError extends MachineError {
  constructor(message: string, context: Record<string, unknown>) {
    super(message, 'NOT_PERMITTED', { context })
    this.name = 'NotPermittedError'
  }

  static control(machineId: string, operator: string): NotPermittedError {
    return new NotPermittedError(
      `operator "${operator}" is not allowed to control machine "${machineId}"`,
      { machineId, operator }
    )
  }
}

export class SourceNotAuthorizedError extends MachineError {
  constructor(machineId: string, operator: string) {
    super(`operator "${operator}" is not allowed on source machine "${machineId}"`, 'SOURCE_NOT_AUTHORIZED', {
      context: { machineId, operator }
    })
    this.name = 'SourceNotAuthorizedError'
  }
}

export class SourceCannotControlError extends MachineError {
  constructor(machineId: string) {
    super(
      `source machine "${machineId}" cannot control other machines (can_control_others=false)`,
      'SOURCE_CANNOT_CONTROL',
      {
        suggestion: `Run "sun machine register --machine ${machineId} --can-control-others"`,
        context: { machineId }
      }
    )
    this.name = 'SourceCannotControlError'
  }
}

export class JobNotFoundError extends MachineError {
  constructor(objectName: string) {
    super(`remote job "${objectName}" not found`, 'JOB_NOT_FOUND', { context: { objectName } })
    this.name = 'JobNotFoundError'
  }
}

export class RemoteJobFailedError extends MachineError {
  readonly jobId: string
  readonly status: string
  readonly jobExitCode: number

  constructor(jobId: string, status: string, exitCode: number, details: string) {
    let message = `remote job ${jobId} finished with status ${status}`
    if (details) {
      message += `: ${details}`
    } else if (exitCode !== 0) {
      message += ` (exit code ${exitCode})`
    }
    super(message, 'REMOTE_JOB_FAILED', { context: { jobId, status, exitCode } })
    this.name = 'RemoteJobFailedError'
    this.jobId = jobId
    this.status = status
    this.jobExitCode = exitCode
  }
}

export class WaitTimeoutError extends MachineError {
  constructor(jobId: string, timeoutSeconds: number) {
    super(`timed out waiting for remote job "${jobId}"`, 'WAIT_TIMEOUT', {
      suggestion: `The job keeps running remotely; check it with "sun machine jobs"`,
      context: { jobId, timeoutSeconds }
    })
    this.name = 'WaitTimeoutError'
  }
}

// =============================================================================
// Vault Sync Errors
// =============================================================================

export class VaultError extends SunError {
  constructor(message: string, code: SunErrorCode, options?: SunErrorOptions) {
    super(message, code, options)
    this.name = 'VaultError'
  }
}

export class PlaintextRefusedError extends VaultError {
  readonly keys: string[]

  constructor(filePath: string, keys: string[]) {
    super('vault file contains plaintext keys; run encrypt first or re-run with --allow-plaintext', 'PLAINTEXT_REFUSED', {
      suggestion: 'Encrypt the listed keys before pushing',
      context: { filePath, keys }
    })
    this.name = 'PlaintextRefusedError'
    this.keys = keys
  }
}

export class ChecksumMismatchError extends VaultError {
  constructor(name: string, expected: string, actual: string) {
    super(`vault backup checksum mismatch for ${name}: expected ${expected} got ${actual}`, 'CHECKSUM_MISMATCH', {
      context: { name, expected, actual }
    })
    this.name = 'ChecksumMismatchError'
  }
}

export class SizeMismatchError extends VaultError {
  constructor(name: string, expected: number, actual: number) {
    super(`vault backup size mismatch for ${name}: expected ${expected} bytes got ${actual}`, 'SIZE_MISMATCH', {
      context: { name, expected, actual }
    })
    this.name = 'SizeMismatchError'
  }
}

// =============================================================================
// Gateway Errors
// =============================================================================

export class GatewayError extends SunError {
  constructor(message: string, code: SunErrorCode, options?: SunErrorOptions) {
    super(message, code, options)
    this.name = 'GatewayError'
  }
}

export class MalformedIndexError extends GatewayError {
  constructor(registry: string, reason: string, cause?: unknown) {
    super(`gateway index for registry "${registry}" is malformed: ${reason}`, 'MALFORMED_INDEX', {
      context: { registry },
      cause
    })
    this.name = 'MalformedIndexError'
  }
}

export class MalformedShardError extends GatewayError {
  constructor(registry: string, shard: string, reason: string, cause?: unknown) {
    super(`gateway shard "${shard}" in registry "${registry}" is malformed: ${reason}`, 'MALFORMED_SHARD', {
      context: { registry, shard },
      cause
    })
    this.name = 'MalformedShardError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSunError(error: unknown): error is SunError {
  return error instanceof SunError
}

export function isRemoteError(error: unknown): error is RemoteError {
  return error instanceof RemoteError
}

export function isRevisionConflict(error: unknown): error is RevisionConflictError {
  return error instanceof RevisionConflictError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isSunError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a SunError if needed
 */
export function wrapError(error: unknown, defaultCode: SunErrorCode = 'UNKNOWN_ERROR'): SunError {
  if (isSunError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new SunError(error.message, defaultCode, { cause: error })
  }
  return new SunError(String(error), defaultCode)
}

export function exitCodeFor(error: unknown): number {
  return isSunError(error) ? error.exitCode : EXIT_CODES.UNKNOWN_ERROR
}
