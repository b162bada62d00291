/**
 * Hostfleet — System Info
 *
 * Read-only view of what a host runs: its recorded source fingerprint,
 * component versions, and whether it matches the local fingerprint.
 */

import type { HostSpec } from '../cluster/types.js'
import { runBounded, runHost } from '../fleet/context.js'
import type { FleetContext, HostOutcome } from '../fleet/context.js'
import type { HostInfo } from '../remote/host-agent.js'
import { toFingerprint } from './fingerprint.js'
import type { Fingerprint } from './fingerprint.js'

export const COMPONENTS = ['application', 'database', 'orchestrator'] as const

export type InfoField = [label: string, value: string]

export function driftStatus(recorded: Fingerprint | undefined, local: Fingerprint | undefined): string {
  if (!recorded) return 'unknown, the host records no fingerprint'
  if (!local) return 'unknown, no local fingerprint.yaml'
  return recorded.digest === local.digest ? 'none' : `host differs from local revision ${local.revision}`
}

export function infoFields(info: HostInfo, local: Fingerprint | undefined, cliVersion: string): InfoField[] {
  const recorded = toFingerprint(info.fingerprint)
  return [
    ['revision', recorded?.revision ?? 'unknown'],
    ['revision date', recorded?.revisionDate ?? 'unknown'],
    ['digest', recorded?.digest ?? 'unknown'],
    ...COMPONENTS.map((c): InfoField => [`${c} version`, info.versions[c] ?? 'unknown']),
    ['cli version', cliVersion],
    ['drift', driftStatus(recorded, local)],
  ]
}

export function renderFields(fields: readonly InfoField[]): string {
  return fields.map(([label, value]) => `${label}: ${value}`).join('\n')
}

/** One outcome per host, `detail` holding the rendered fields */
export function collectSystemInfo(
  ctx: FleetContext,
  targets: readonly HostSpec[],
  local: Fingerprint | undefined,
  cliVersion: string,
): Promise<HostOutcome[]> {
  return runBounded(ctx.settings.parallelism, targets, spec =>
    runHost(ctx, spec.name, async enter => {
      enter('Query')
      const info = await ctx.agentFor(spec).systemInfo()
      return renderFields(infoFields(info, local, cliVersion))
    }))
}
