/**
 * Hostfleet — Upgrade Lanes
 *
 * Anything that takes hosts down runs in two lanes: quorum-role hosts
 * strictly one after the other in stagger order, the rest with bounded
 * parallelism alongside. A failed quorum host stops its lane, since
 * taking a second member down could cost the majority.
 */

import type { HostSpec } from '../cluster/types.js'
import { ProvisionError } from '../errors.js'
import { planLanes } from '../upgrade/schedule.js'
import { notStarted, runBounded } from './context.js'
import type { FleetContext, HostOutcome } from './context.js'

export async function runLanes<T extends { spec: HostSpec }>(
  ctx: FleetContext,
  items: readonly T[],
  task: (item: T) => Promise<HostOutcome>,
): Promise<HostOutcome[]> {
  const lanes = planLanes(items.map(i => i.spec))
  const itemFor = new Map(items.map(i => [i.spec.name, i]))
  const lookup = (spec: HostSpec): T => {
    const item = itemFor.get(spec.name)
    if (!item) throw new Error(`no work item for ${spec.name}`)
    return item
  }

  const sequential = async (): Promise<HostOutcome[]> => {
    const outcomes: HostOutcome[] = []
    let failed: string | undefined
    for (const spec of lanes.sequential) {
      if (failed !== undefined) {
        outcomes.push(notStarted(spec.name, new ProvisionError(
          `not started: ${failed} failed and another ${spec.role} host going down could cost the quorum`,
          { stage: 'Validate' },
        )))
        continue
      }
      const outcome = await task(lookup(spec))
      if (!outcome.ok) failed = spec.name
      outcomes.push(outcome)
    }
    return outcomes
  }

  const [first, second] = await Promise.all([
    sequential(),
    runBounded(ctx.settings.parallelism, lanes.parallel, spec => task(lookup(spec))),
  ])
  return [...first, ...second]
}

/** Outcomes back in the order the hosts were given */
export function inOrder(targets: readonly HostSpec[], outcomes: readonly HostOutcome[]): HostOutcome[] {
  const byHost = new Map(outcomes.map(o => [o.host, o]))
  return targets.flatMap(spec => byHost.get(spec.name) ?? [])
}
