/**
 * Hostfleet — Readiness Wait
 *
 * Poll a host until a check passes: exponential backoff between polls,
 * a timeout on each poll, and a fixed bound on the whole wait. A host
 * that cannot be reached at all counts as not ready yet; it is usually
 * rebooting.
 */

import type { Role } from '../cluster/types.js'
import type { ReadinessSettings } from '../config/types.js'
import { ReadinessTimeoutError, RemoteError } from '../errors.js'
import type { Logger } from '../logging/logger.js'
import { backoffDelay } from '../remote/backoff.js'
import type { BackoffPolicy, Clock } from '../remote/backoff.js'
import type { HostAgent, ReadinessReport } from '../remote/host-agent.js'

export type ReadinessPolicy = BackoffPolicy & {
  pollTimeoutMs: number
  overallTimeoutMs: number
}

export function readinessPolicy(settings: ReadinessSettings): ReadinessPolicy {
  return {
    initialDelayMs: settings.initial_delay_ms,
    maxDelayMs: settings.max_delay_ms,
    pollTimeoutMs: settings.poll_timeout_sec * 1000,
    overallTimeoutMs: settings.overall_timeout_sec * 1000,
  }
}

export type Poll = (timeoutMs: number) => Promise<ReadinessReport>

export type WaitOptions = {
  host: string
  policy: ReadinessPolicy
  clock: Clock
  logger: Logger
  signal?: AbortSignal
}

/** Resolves with the time waited, in milliseconds */
export async function waitUntil(what: string, poll: Poll, options: WaitOptions): Promise<number> {
  const { policy, clock, logger } = options
  const started = clock.now()
  let last = 'no answer yet'

  for (let attempt = 0; ; attempt++) {
    try {
      const report = await poll(policy.pollTimeoutMs)
      if (report.ready) return clock.now() - started
      last = report.detail
    } catch (err) {
      if (!(err instanceof RemoteError)) throw err
      last = err.message
    }

    const remaining = policy.overallTimeoutMs - (clock.now() - started)
    if (remaining <= 0) {
      throw new ReadinessTimeoutError(
        `${what} not ready after ${Math.round(policy.overallTimeoutMs / 1000)}s: ${last}`,
        { host: options.host },
      )
    }
    const delay = Math.min(backoffDelay(policy, attempt), remaining)
    logger.debug(`${what}: ${last}; next check in ${delay}ms`)
    await clock.sleep(delay, options.signal)
  }
}

// ── Polls ───────────────────────────────────────────────────────────────────

export function rolePoll(agent: HostAgent, role: Role): Poll {
  return timeoutMs => agent.readiness(role, timeoutMs)
}

/**
 * The host is up on its installed system. A host still in its initrd
 * waiting for the disk passphrase is unlocked along the way; with
 * `previousBootId`, the host must also have booted since, and
 * `onPreviousBoot` runs each time the old boot still answers.
 */
export function bootPoll(
  agent: HostAgent,
  diskKey: string,
  previousBootId?: string,
  onPreviousBoot?: () => Promise<void>,
): Poll {
  return async timeoutMs => {
    if (!(await agent.reachable(timeoutMs))) {
      const unlock = await agent.unlock(diskKey)
      return { ready: false, detail: unlock === 'unlocked' ? 'disk unlocked, waiting for boot' : 'no ssh answer' }
    }
    if (previousBootId === undefined) return { ready: true, detail: 'up' }
    const bootId = await agent.bootId()
    if (bootId !== previousBootId) return { ready: true, detail: 'up' }
    await onPreviousBoot?.()
    return { ready: false, detail: 'still running the previous kernel' }
  }
}
