/**
 * Hostfleet — Install Orchestrator
 *
 * Wipe-and-provision, one state machine per host:
 *
 *   Validate → Compile → Provision → SecretPush → FirstBoot → ReadinessWait → Done
 *
 * Any stage can end in Failed. Hosts are independent except for one
 * ordering rule: the cluster's first database host forms the quorum, so
 * when it is part of the run it is installed alone first, and if it fails
 * nothing that would join it is started.
 */

import type { HostSpec } from '../cluster/types.js'
import { ProvisionError } from '../errors.js'
import { notStarted, readDiskKey, runBounded, runHost, waitOptions } from '../fleet/context.js'
import type { FleetContext, HostOutcome } from '../fleet/context.js'
import { prepareHosts } from '../fleet/prepare.js'
import type { PreparedHost } from '../fleet/prepare.js'
import { bootPoll, rolePoll, waitUntil } from './readiness.js'

export const INSTALL_STAGES = [
  'Validate',
  'Compile',
  'Provision',
  'SecretPush',
  'FirstBoot',
  'ReadinessWait',
] as const

export type InstallStage = (typeof INSTALL_STAGES)[number]

export type InstallOptions = {
  /** Stop once the image and secrets are written; the host stays in the installer */
  noReboot?: boolean
  /** Leave the wallet seed to the host; nothing seed-related crosses the network */
  seedOnHost?: boolean
}

/** The database host with no one to join: first database host of the description */
export function bootstrapHost(hosts: readonly HostSpec[]): HostSpec | undefined {
  return hosts.find(h => h.role === 'database')
}

/** Database peers join the bootstrap host; application hosts need its quorum to become ready */
export function dependsOn(spec: HostSpec, bootstrap: HostSpec): boolean {
  if (spec.name === bootstrap.name) return false
  return spec.role === 'application' || spec.database.join.includes(bootstrap.name)
}

export async function install(ctx: FleetContext, targets: readonly HostSpec[], options: InstallOptions = {}): Promise<HostOutcome[]> {
  const { prepared, failed } = await prepareHosts(ctx, targets, { ensureSecrets: true, seed: !options.seedOnHost })
  const outcomes = new Map<string, HostOutcome>(failed.map(o => [o.host, o]))

  const bootstrap = bootstrapHost(ctx.cluster.hosts)
  const first = bootstrap && prepared.find(p => p.spec.name === bootstrap.name)
  let rest = prepared
  let bootstrapFailed = bootstrap !== undefined && outcomes.get(bootstrap.name)?.ok === false

  if (bootstrap && first) {
    ctx.logger.info(`installing ${bootstrap.name} first, it bootstraps the database quorum`)
    const outcome = await installHost(ctx, first, options)
    outcomes.set(outcome.host, outcome)
    rest = prepared.filter(p => p !== first)
    bootstrapFailed = !outcome.ok
  }

  if (bootstrap && bootstrapFailed) {
    for (const p of rest.filter(p => dependsOn(p.spec, bootstrap))) {
      outcomes.set(p.spec.name, notStarted(p.spec.name, new ProvisionError(
        `not started: ${bootstrap.name} bootstraps the database quorum and failed`,
        { stage: 'Validate' },
      )))
    }
    rest = rest.filter(p => !dependsOn(p.spec, bootstrap))
  }

  const results = await runBounded(ctx.settings.parallelism, rest, host => installHost(ctx, host, options))
  for (const outcome of results) outcomes.set(outcome.host, outcome)

  // report in description order
  return targets.flatMap(spec => outcomes.get(spec.name) ?? [])
}

function installHost(ctx: FleetContext, host: PreparedHost, options: InstallOptions): Promise<HostOutcome> {
  const { spec, bundle, descriptor } = host
  const agent = ctx.agentFor(spec)
  const wait = waitOptions(ctx, spec.name)

  return runHost(ctx, spec.name, async enter => {
    enter('Compile')
    const image = await ctx.compiler.compile(spec.name, descriptor, ctx.signal)

    enter('Provision')
    const previousBootId = await agent.bootInstaller(ctx.cluster.global.installer_url)
    await waitUntil('installer', async timeoutMs => ({
      ready: await agent.installerReachable(previousBootId, timeoutMs),
      detail: 'no ssh answer from the installer',
    }), wait)
    await agent.wipeDisks([...spec.disks, ...spec.chainDisks])
    await agent.writeImage(image)

    // services start on first boot and read these
    enter('SecretPush')
    await agent.pushSecrets(bundle, 'installer')

    if (options.noReboot) return 'image written, left in the installer'

    enter('FirstBoot')
    const installerBootId = await agent.rebootInstaller()
    await agent.forgetHostKey()
    // an installer that answers before it goes down leaves its host key behind
    const forget = () => agent.forgetHostKey()
    await waitUntil('system', bootPoll(agent, readDiskKey(ctx, spec.name), installerBootId, forget), wait)

    enter('ReadinessWait')
    const waited = await waitUntil(`${spec.role} role`, rolePoll(agent, spec.role), wait)
    return `ready after ${Math.round(waited / 1000)}s`
  })
}
