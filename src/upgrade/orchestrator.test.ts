import { describe, it, expect } from 'vitest'
import { ProvisionError, RollbackUnavailableError } from '../errors.js'
import { renderDescriptor } from '../image/descriptor.js'
import { bundleFor } from '../secrets/layout.js'
import { exampleCluster, hostNamed } from '../testing/cluster.js'
import { testContext } from '../testing/context.js'
import type { TestContext } from '../testing/context.js'
import { dryUpdate, priorGeneration, rollback, update } from './orchestrator.js'

const cluster = exampleCluster()
const db0 = hostNamed(cluster, 'db-00')

function freshDescriptor({ ctx }: TestContext, host = db0): string {
  return renderDescriptor(host, cluster.global, bundleFor(host, ctx.provisioner.layout, cluster.global))
}

describe('dryUpdate', () => {
  it('diffs the recorded descriptor against the fresh one without touching the host', async () => {
    const t = testContext({ cluster })
    const fresh = freshDescriptor(t)
    const agent = t.fleet.agent('db-00')
    agent.state.descriptors.set(1, fresh.replace('log_level: info', 'log_level: debug'))

    const [outcome] = await dryUpdate(t.ctx, [db0])

    expect(outcome).toMatchObject({ host: 'db-00', ok: true, detail: 'generation 1' })
    const lines = outcome.diff?.split('\n') ?? []
    expect(lines.slice(0, 2)).toEqual(['--- db-00 generation 1', '+++ db-00 source'])
    expect(lines).toContain('-log_level: debug')
    expect(lines).toContain('+log_level: info')
    expect(agent.calls).toEqual(['currentGeneration', 'readDescriptor', 'currentGeneration'])
    expect(agent.state.current).toBe(1)
    expect(agent.state.generations).toEqual([1])
  })

  it('reports no diff for a host already on the source state', async () => {
    const t = testContext({ cluster })
    t.fleet.agent('db-00').state.descriptors.set(1, freshDescriptor(t))

    const [outcome] = await dryUpdate(t.ctx, [db0])

    expect(outcome.diff).toBe('')
  })

  it('fails when the generation moves underneath it', async () => {
    const t = testContext({ cluster })
    const agent = t.fleet.agent('db-00')
    let reads = 0
    agent.currentGeneration = async () => (++reads === 1 ? 1 : 2)

    const [outcome] = await dryUpdate(t.ctx, [db0])

    expect(outcome.ok).toBe(false)
    expect(outcome.error).toBeInstanceOf(ProvisionError)
    expect(outcome.error?.message).toBe('generation changed from 1 to 2 while comparing; someone else is upgrading this host')
  })
})

describe('update', () => {
  it('stages and hands over to a new generation on every host', async () => {
    const { ctx, fleet } = testContext({ cluster })

    const outcomes = await update(ctx, cluster.hosts)

    expect(outcomes.map(o => [o.host, o.ok, o.detail])).toEqual([
      ['db-00', true, 'generation 1 → 2 (kexec)'],
      ['db-01', true, 'generation 1 → 2 (kexec)'],
      ['app-00', true, 'generation 1 → 2 (kexec)'],
    ])
    const agent = fleet.agent('db-00')
    expect(agent.calls).toEqual([
      'pushSecrets',
      'currentGeneration',
      'stageImage',
      'bootId',
      'activate',
      'reachable',
      'bootId',
      'readiness',
    ])
    expect(agent.pushed.map(p => p.target)).toEqual(['system'])
  })

  it('stops the quorum lane at the first failure but not the other hosts', async () => {
    const { ctx, fleet } = testContext({ cluster })
    fleet.agent('db-00').failOn('activate')

    const outcomes = await update(ctx, cluster.hosts)

    expect(outcomes.map(o => [o.host, o.ok, o.stage])).toEqual([
      ['db-00', false, 'Activate'],
      ['db-01', false, 'Validate'],
      ['app-00', true, 'Done'],
    ])
    expect(outcomes[1].error?.message).toBe('not started: db-00 failed and another database host going down could cost the quorum')
    expect(fleet.touched).not.toContain('db-01')
  })

  it('warns when an upgrade outlasts its activation window', async () => {
    const { ctx, fleet, clock } = testContext({ cluster })
    const agent = fleet.agent('db-00')
    agent.activate = async () => {
      clock.advance(11 * 60_000)
      agent.state.boots++
      return 'kexec'
    }

    const [outcome] = await update(ctx, [db0])

    expect(outcome.ok).toBe(true)
    expect(outcome.warning).toBe('took 11m00s, longer than its 10 minute window 02:00-02:10; the next window of its role may overlap')
  })
})

describe('rollback', () => {
  it('picks the newest generation older than the current one', () => {
    expect(priorGeneration([3, 5, 7], 7)).toBe(5)
    expect(priorGeneration([3, 5, 7, 9], 7)).toBe(5)
    expect(priorGeneration([7], 7)).toBeUndefined()
  })

  it('restores the pre-update generation exactly', async () => {
    const { ctx, fleet } = testContext({ cluster })
    const before = fleet.agent('db-00').state.current

    await update(ctx, [db0])
    const [outcome] = await rollback(ctx, [db0])

    expect(outcome).toMatchObject({ ok: true, detail: 'generation 2 → 1 (kexec)' })
    expect(fleet.agent('db-00').state.current).toBe(before)
    expect(fleet.agent('db-00').state.generations).toEqual([1, 2])
  })

  it('fails when no earlier generation is retained', async () => {
    const { ctx } = testContext({ cluster })

    const [outcome] = await rollback(ctx, [db0])

    expect(outcome).toMatchObject({ host: 'db-00', ok: false, stage: 'Validate' })
    expect(outcome.error).toBeInstanceOf(RollbackUnavailableError)
    expect(outcome.error?.message).toBe('no generation before 1 is retained')
  })
})
