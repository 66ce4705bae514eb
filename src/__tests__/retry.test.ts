import { describe, it, expect, vi } from 'vitest'
import { getBackoffDelay, sleep, withRetry } from '../utils/retry'
import { CancelledError, InvalidInputError, TransientError } from '../errors'
import type { RetryPolicy } from '../types/settings'
import { FAST_RETRY } from './helpers/fakeApi'

const POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitter: false
}

describe('getBackoffDelay', () => {
  it('grows exponentially up to the cap', () => {
    expect(getBackoffDelay(POLICY, 0)).toBe(0)
    expect(getBackoffDelay(POLICY, 1)).toBe(1000)
    expect(getBackoffDelay(POLICY, 3)).toBe(4000)
    expect(getBackoffDelay(POLICY, 10)).toBe(30_000)
  })

  it('keeps jitter within 20% of the base delay', () => {
    for (let i = 0; i < 50; i++) {
      const delay = getBackoffDelay({ ...POLICY, jitter: true }, 1)
      expect(delay).toBeGreaterThanOrEqual(800)
      expect(delay).toBeLessThanOrEqual(1200)
    }
  })
})

describe('withRetry', () => {
  it('retries retryable errors and reports each retry', async () => {
    const onRetry = vi.fn()
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new TransientError(`HTTP 503 (attempt ${attempt})`, 503)
      return 'done'
    })

    expect(await withRetry(FAST_RETRY, fn, { onRetry })).toBe('done')
    expect(fn).toHaveBeenCalledTimes(3)
    expect(onRetry.mock.calls.map((c) => c[0])).toEqual([2, 3])
  })

  it('does not retry errors that are not retryable', async () => {
    const fn = vi.fn(async () => {
      throw new InvalidInputError('bad date')
    })

    await expect(withRetry(FAST_RETRY, fn)).rejects.toThrow('bad date')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn(async (attempt: number) => {
      throw new TransientError(`failure ${attempt}`)
    })

    await expect(withRetry(FAST_RETRY, fn)).rejects.toThrow('failure 3')
  })

  it('honours a custom shouldRetry', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt === 1) throw new Error('flaky')
      return attempt
    })

    expect(await withRetry(FAST_RETRY, fn, { shouldRetry: () => true })).toBe(2)
  })

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const fn = vi.fn(async () => 'never')

    await expect(withRetry(FAST_RETRY, fn, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError)
    expect(fn).not.toHaveBeenCalled()
  })
})

describe('sleep', () => {
  it('rejects with CancelledError when aborted while waiting', async () => {
    const controller = new AbortController()
    const pending = sleep(60_000, controller.signal)
    controller.abort()
    await expect(pending).rejects.toBeInstanceOf(CancelledError)
  })
})
