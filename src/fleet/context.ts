/**
 * Hostfleet — Fleet Context
 *
 * What every orchestrator run shares: the resolved cluster, settings,
 * collaborators, and the per-host outcome record it reports at the end.
 */

import { readFileSync } from 'node:fs'
import pLimit from 'p-limit'
import type { HostSpec, ResolvedCluster } from '../cluster/types.js'
import type { FleetSettings } from '../config/types.js'
import { toFleetError } from '../errors.js'
import type { FleetError } from '../errors.js'
import type { ImageCompiler } from '../image/compiler.js'
import { readinessPolicy } from '../install/readiness.js'
import type { WaitOptions } from '../install/readiness.js'
import type { Logger } from '../logging/logger.js'
import type { Clock } from '../remote/backoff.js'
import type { HostAgent } from '../remote/host-agent.js'
import type { SecretProvisioner } from '../secrets/provisioner.js'

export type FleetContext = {
  cluster: ResolvedCluster
  settings: FleetSettings
  logger: Logger
  clock: Clock
  signal?: AbortSignal
  provisioner: SecretProvisioner
  compiler: ImageCompiler
  agentFor(spec: HostSpec): HostAgent
}

export type HostOutcome = {
  host: string
  ok: boolean
  /** Last stage entered; the failing one when !ok */
  stage: string
  error?: FleetError
  /** Human summary: generation change, handoff kind */
  detail?: string
  /** Succeeded, but something the operator should look at */
  warning?: string
  /** dry-update only: recorded descriptor against the fresh one */
  diff?: string
  elapsedMs: number
}

/** First host of the description; it creates the fleet CA */
export function primaryHost(cluster: ResolvedCluster): string {
  return cluster.hosts[0]?.name ?? ''
}

/**
 * Track the stage a host is in so a failure can be attributed to it.
 * `run` receives `enter(stage)`; whatever it throws becomes a failed
 * outcome, never an exception.
 */
export async function runHost(
  ctx: FleetContext,
  host: string,
  run: (enter: (stage: string) => void) => Promise<string | undefined>,
): Promise<HostOutcome> {
  const log = ctx.logger.child(host)
  const started = ctx.clock.now()
  let stage = 'Validate'
  const enter = (next: string) => {
    stage = next
    log.info(next)
  }
  try {
    const detail = await run(enter)
    log.info('Done')
    return { host, ok: true, stage: 'Done', ...(detail !== undefined && { detail }), elapsedMs: ctx.clock.now() - started }
  } catch (err) {
    const error = toFleetError(err, { host, stage })
    log.error(`Failed in ${stage}: ${error.message}`)
    return { host, ok: false, stage, error, elapsedMs: ctx.clock.now() - started }
  }
}

/** Run `task` for every item with at most `parallelism` in flight, keeping input order in the result */
export function runBounded<I, T>(parallelism: number, items: readonly I[], task: (item: I) => Promise<T>): Promise<T[]> {
  const limit = pLimit(parallelism)
  return Promise.all(items.map(item => limit(() => task(item))))
}

/** A host the run never started because of another host's failure */
export function notStarted(host: string, error: FleetError): HostOutcome {
  return { host, ok: false, stage: error.stage ?? 'Validate', error: error.bind({ host }), elapsedMs: 0 }
}

export function waitOptions(ctx: FleetContext, host: string): WaitOptions {
  return {
    host,
    policy: readinessPolicy(ctx.settings.readiness),
    clock: ctx.clock,
    logger: ctx.logger.child(host),
    ...(ctx.signal && { signal: ctx.signal }),
  }
}

/** The disk encryption key from the secrets tree, for unlocking over the initrd */
export function readDiskKey(ctx: FleetContext, host: string): string {
  return readFileSync(ctx.provisioner.layout.diskKey(host), 'utf-8').trim()
}
