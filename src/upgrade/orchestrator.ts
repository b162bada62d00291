/**
 * Hostfleet — Upgrade Orchestrator
 *
 * dry-update: compare each host's recorded descriptor with a fresh one,
 * touching nothing. update: stage a new generation and hand over to it
 * without a firmware reboot. rollback: hand back to the generation
 * before the current one.
 */

import type { HostSpec } from '../cluster/types.js'
import { ProvisionError, RollbackUnavailableError } from '../errors.js'
import { readDiskKey, runBounded, runHost, waitOptions } from '../fleet/context.js'
import type { FleetContext, HostOutcome } from '../fleet/context.js'
import { inOrder, runLanes } from '../fleet/lanes.js'
import { prepareHosts } from '../fleet/prepare.js'
import type { PreparedHost } from '../fleet/prepare.js'
import type { Handoff } from '../image/activation.js'
import { bootPoll, rolePoll, waitUntil } from '../install/readiness.js'
import type { HostAgent } from '../remote/host-agent.js'
import { unifiedDiff } from './diff.js'
import { windowOverrun } from './schedule.js'

/** The handoff has happened once the host is back with a new boot id and its role is serving */
async function activateAndWait(ctx: FleetContext, spec: HostSpec, agent: HostAgent, enter: (stage: string) => void): Promise<Handoff> {
  const wait = waitOptions(ctx, spec.name)
  const key = readDiskKey(ctx, spec.name)

  enter('Activate')
  const previousBoot = await agent.bootId()
  const handoff = await agent.activate()

  enter('Handoff')
  await waitUntil('system', bootPoll(agent, key, previousBoot), wait)

  enter('ReadinessWait')
  await waitUntil(`${spec.role} role`, rolePoll(agent, spec.role), wait)
  return handoff
}

// ── dry-update ──────────────────────────────────────────────────────────────

export async function dryUpdate(ctx: FleetContext, targets: readonly HostSpec[]): Promise<HostOutcome[]> {
  const { prepared, failed } = await prepareHosts(ctx, targets, { ensureSecrets: false })
  const diffs = new Map<string, string>()

  const results = await runBounded(ctx.settings.parallelism, prepared, ({ spec, descriptor }) =>
    runHost(ctx, spec.name, async enter => {
      const agent = ctx.agentFor(spec)
      enter('Diff')
      const before = await agent.currentGeneration()
      const recorded = await agent.readDescriptor(before)
      if (recorded === undefined) ctx.logger.child(spec.name).warn(`generation ${before} records no descriptor, showing everything as new`)

      diffs.set(spec.name, unifiedDiff(recorded ?? '', descriptor, {
        fromLabel: `${spec.name} generation ${before}`,
        toLabel: `${spec.name} source`,
      }))

      const after = await agent.currentGeneration()
      if (after !== before) {
        throw new ProvisionError(`generation changed from ${before} to ${after} while comparing; someone else is upgrading this host`)
      }
      return `generation ${before}`
    }))

  return inOrder(targets, [
    ...failed,
    ...results.map(o => {
      const diff = diffs.get(o.host)
      return o.ok && diff !== undefined ? { ...o, diff } : o
    }),
  ])
}

// ── update ──────────────────────────────────────────────────────────────────

export async function update(ctx: FleetContext, targets: readonly HostSpec[]): Promise<HostOutcome[]> {
  const { prepared, failed } = await prepareHosts(ctx, targets, { ensureSecrets: true })
  const outcomes = await runLanes(ctx, prepared, host => updateHost(ctx, host))
  return inOrder(targets, [...failed, ...outcomes])
}

async function updateHost(ctx: FleetContext, host: PreparedHost): Promise<HostOutcome> {
  const { spec, bundle, descriptor } = host
  const agent = ctx.agentFor(spec)

  const outcome = await runHost(ctx, spec.name, async enter => {
    enter('Compile')
    const image = await ctx.compiler.compile(spec.name, descriptor, ctx.signal)

    enter('SecretPush')
    await agent.pushSecrets(bundle, 'system')

    enter('Stage')
    const before = await agent.currentGeneration()
    const staged = await agent.stageImage(image)

    const handoff = await activateAndWait(ctx, spec, agent, enter)
    return `generation ${before} → ${staged} (${handoff})`
  })

  const warning = outcome.ok ? windowOverrun(spec, outcome.elapsedMs) : undefined
  if (warning === undefined) return outcome
  ctx.logger.child(spec.name).warn(warning)
  return { ...outcome, warning }
}

// ── rollback ────────────────────────────────────────────────────────────────

/** Newest retained generation older than `current` */
export function priorGeneration(generations: readonly number[], current: number): number | undefined {
  const older = generations.filter(g => g < current)
  return older.length === 0 ? undefined : Math.max(...older)
}

export async function rollback(ctx: FleetContext, targets: readonly HostSpec[]): Promise<HostOutcome[]> {
  const outcomes = await runLanes(ctx, targets.map(spec => ({ spec })), ({ spec }) => rollbackHost(ctx, spec))
  return inOrder(targets, outcomes)
}

function rollbackHost(ctx: FleetContext, spec: HostSpec): Promise<HostOutcome> {
  const agent = ctx.agentFor(spec)

  return runHost(ctx, spec.name, async enter => {
    enter('Validate')
    const current = await agent.currentGeneration()
    const prior = priorGeneration(await agent.generations(), current)
    if (prior === undefined) {
      throw new RollbackUnavailableError(`no generation before ${current} is retained`)
    }

    enter('Stage')
    await agent.switchGeneration(prior)

    const handoff = await activateAndWait(ctx, spec, agent, enter)

    const now = await agent.currentGeneration()
    if (now !== prior) throw new ProvisionError(`expected generation ${prior} after rollback, host reports ${now}`)
    return `generation ${current} → ${prior} (${handoff})`
  })
}
