/**
 * Timeout utilities for async operations
 *
 * Keeps polling loops and backoff waits cancellable so a stuck store or a
 * caller's abort never leaves a pending timer behind.
 */

export class OperationTimeoutError extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number, operation: string) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`)
    this.name = 'OperationTimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/** Longest delay setTimeout honors; larger values fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647

/**
 * `ms` clamped to what setTimeout can wait
 */
export function timerDelay(ms: number): number {
  if (!Number.isFinite(ms)) return ms > 0 ? MAX_TIMER_DELAY_MS : 0
  return Math.min(Math.max(0, ms), MAX_TIMER_DELAY_MS)
}

/**
 * Reason carried by an aborted signal, as an Error
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason
  if (reason instanceof Error) {
    return reason
  }
  return new Error(reason === undefined ? 'operation aborted' : String(reason))
}

/**
 * Resolve after `ms`, or reject early with the signal's reason
 *
 * @example
 * ```ts
 * await sleep(200, controller.signal)
 * ```
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, timerDelay(ms))
      return
    }
    if (signal.aborted) {
      reject(abortReason(signal))
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(abortReason(signal))
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort)
      resolve()
    }, timerDelay(ms))
    signal.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Run an operation with a deadline
 *
 * The operation receives a signal that aborts when the deadline passes or
 * when `parent` aborts. On deadline the returned promise rejects with
 * OperationTimeoutError.
 *
 * @example
 * ```ts
 * const job = await withTimeout(
 *   signal => pollUntilTerminal(signal),
 *   1_200_000,
 *   'wait for job'
 * )
 * ```
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController()
  const onParentAbort = (): void => {
    if (parent) controller.abort(abortReason(parent))
  }
  if (parent?.aborted) {
    throw abortReason(parent)
  }
  parent?.addEventListener('abort', onParentAbort, { once: true })

  let timeoutHandle: NodeJS.Timeout | undefined
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new OperationTimeoutError(timeoutMs, label)
      controller.abort(error)
      reject(error)
    }, timerDelay(timeoutMs))
  })

  try {
    return await Promise.race([operation(controller.signal), timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
    parent?.removeEventListener('abort', onParentAbort)
  }
}
