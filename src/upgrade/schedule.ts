/**
 * Hostfleet — Upgrade Schedule
 *
 * Hosts of a quorum role are upgraded one at a time, in stagger order;
 * everyone else may go in parallel. The activation windows in the
 * descriptors keep the host-local timers apart, but nothing stops an
 * upgrade from running past its window, so overruns are reported.
 */

import { QUORUM_ROLES } from '../cluster/types.js'
import type { HostSpec } from '../cluster/types.js'

export type UpgradeLanes = {
  /** One after the other, in this order */
  sequential: HostSpec[]
  /** Bounded parallelism */
  parallel: HostSpec[]
}

export function byStagger(hosts: readonly HostSpec[]): HostSpec[] {
  // Array.prototype.sort is stable: equal offsets keep description order
  return [...hosts].sort((a, b) => a.upgrade.staggerOffset - b.upgrade.staggerOffset)
}

export function planLanes(hosts: readonly HostSpec[]): UpgradeLanes {
  const ordered = byStagger(hosts)
  return {
    sequential: ordered.filter(h => QUORUM_ROLES.has(h.role)),
    parallel: ordered.filter(h => !QUORUM_ROLES.has(h.role)),
  }
}

export function clockTime(minuteOfDay: number): string {
  const hh = String(Math.floor(minuteOfDay / 60)).padStart(2, '0')
  const mm = String(minuteOfDay % 60).padStart(2, '0')
  return `${hh}:${mm}`
}

/** `02:10-02:20` */
export function windowLabel(spec: HostSpec): string {
  const { startMinute, durationMinutes } = spec.upgrade.window
  return `${clockTime(startMinute)}-${clockTime(startMinute + durationMinutes)}`
}

function duration(ms: number): string {
  const seconds = Math.round(ms / 1000)
  return `${Math.floor(seconds / 60)}m${String(seconds % 60).padStart(2, '0')}s`
}

/** Warning text when an upgrade took longer than the host's window, else undefined */
export function windowOverrun(spec: HostSpec, elapsedMs: number): string | undefined {
  const { durationMinutes } = spec.upgrade.window
  if (elapsedMs <= durationMinutes * 60_000) return undefined
  return `took ${duration(elapsedMs)}, longer than its ${durationMinutes} minute window ${windowLabel(spec)}; `
    + 'the next window of its role may overlap'
}
