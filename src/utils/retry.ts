import type { RetryPolicy } from '../types/settings'
import { CancelledError, isSyncError } from '../errors'

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitter: true
}

/**
 * Delay before the given retry (1 = first retry).
 * initialDelay * (multiplier ^ (retry - 1)), capped at maxDelay, with optional ±20% jitter.
 */
export function getBackoffDelay(policy: RetryPolicy, retry: number): number {
  if (retry <= 0) return 0

  const baseDelay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, retry - 1)
  const capped = Math.min(baseDelay, policy.maxDelayMs)

  if (policy.jitter) {
    const jitterRange = capped * 0.2
    return Math.max(0, capped + (Math.random() * jitterRange * 2 - jitterRange))
  }
  return capped
}

/** Resolve after `ms`, or reject with CancelledError when the signal fires first */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError())
      return
    }

    const onAbort = () => {
      clearTimeout(timer)
      reject(new CancelledError())
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export interface RetryOptions {
  signal?: AbortSignal
  /** Called before each retry with the attempt about to run and the error that caused it */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void
  /** Defaults to the `retryable` flag of SyncError */
  shouldRetry?: (error: unknown) => boolean
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the policy is exhausted.
 * `fn` receives the 1-based attempt number.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? ((err: unknown) => isSyncError(err) && err.retryable)
  const maxAttempts = Math.max(1, policy.maxAttempts)

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) throw new CancelledError()

    try {
      return await fn(attempt)
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err) || options.signal?.aborted) throw err

      const delayMs = getBackoffDelay(policy, attempt)
      options.onRetry?.(attempt + 1, err, delayMs)
      await sleep(delayMs, options.signal)
    }
  }
}
