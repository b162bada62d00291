/**
 * Hostfleet — Backoff
 *
 * Exponential backoff and the clock it sleeps on. Tests pass a manual
 * clock so retries and readiness timeouts run instantly.
 */

import { setTimeout as sleep } from 'node:timers/promises'
import { CancelledError } from '../errors.js'

export interface Clock {
  now(): number
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    try {
      await sleep(ms, undefined, { signal })
    } catch (err) {
      if (signal?.aborted) throw new CancelledError('cancelled while waiting', { cause: err })
      throw err
    }
  },
}

export type BackoffPolicy = {
  initialDelayMs: number
  maxDelayMs: number
}

/** Delay before retry number `attempt` (0-based): initial · 2^attempt, capped */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.initialDelayMs * 2 ** attempt)
}
