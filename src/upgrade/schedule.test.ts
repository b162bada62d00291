import { describe, it, expect } from 'vitest'
import type { HostSpec } from '../cluster/types.js'
import { exampleCluster, hostNamed } from '../testing/cluster.js'
import { clockTime, planLanes, windowLabel, windowOverrun } from './schedule.js'

const cluster = exampleCluster()
const db0 = hostNamed(cluster, 'db-00')
const db1 = hostNamed(cluster, 'db-01')
const app0 = hostNamed(cluster, 'app-00')

function withOffset(spec: HostSpec, staggerOffset: number): HostSpec {
  return { ...spec, upgrade: { ...spec.upgrade, staggerOffset } }
}

describe('planLanes', () => {
  it('puts quorum hosts in one sequential lane', () => {
    const lanes = planLanes(cluster.hosts)
    expect(lanes.sequential.map(h => h.name)).toEqual(['db-00', 'db-01'])
    expect(lanes.parallel.map(h => h.name)).toEqual(['app-00'])
  })

  it('orders by stagger offset, then description order', () => {
    const lanes = planLanes([withOffset(db0, 3), withOffset(db1, 1), app0])
    expect(lanes.sequential.map(h => h.name)).toEqual(['db-01', 'db-00'])
  })
})

describe('activation windows', () => {
  it('formats times of day', () => {
    expect(clockTime(0)).toBe('00:00')
    expect(clockTime(130)).toBe('02:10')
  })

  it('labels each host window from its stagger offset', () => {
    expect(windowLabel(db0)).toBe('02:00-02:10')
    expect(windowLabel(db1)).toBe('02:10-02:20')
  })

  it('warns only when an upgrade outlasts its window', () => {
    expect(windowOverrun(db0, 600_000)).toBeUndefined()
    expect(windowOverrun(db1, 754_000)).toBe('took 12m34s, longer than its 10 minute window 02:10-02:20; the next window of its role may overlap')
  })
})
