import { describe, it, expect } from 'vitest'
import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { RemoteError } from '../errors.js'
import { exampleCluster, hostNamed } from '../testing/cluster.js'
import { testContext } from '../testing/context.js'
import { lineStream, rebootHosts, runCommand, unlockHosts } from './maintenance.js'

const cluster = exampleCluster()
const db0 = hostNamed(cluster, 'db-00')
const app0 = hostNamed(cluster, 'app-00')

describe('runCommand', () => {
  it('hands every host its output and fails on a non-zero exit', async () => {
    const { ctx, fleet } = testContext({ cluster })
    fleet.agent('app-00').run = async () => 3
    const output: string[] = []

    const outcomes = await runCommand(ctx, [db0, app0], 'uptime', (host, line) => output.push(`${host}> ${line}`))

    expect(output).toEqual(['db-00> db-00: uptime'])
    expect(outcomes.map(o => [o.host, o.ok, o.stage])).toEqual([
      ['db-00', true, 'Done'],
      ['app-00', false, 'Run'],
    ])
    expect(outcomes[1].error?.message).toBe('command exited with 3')
  })
})

describe('lineStream', () => {
  it('joins lines split across chunks and flushes the last one', () => {
    const lines: string[] = []
    const stream = lineStream(line => lines.push(line))

    stream.push('load: 0.')
    stream.push('4\nusers: 2\n\ntail')
    expect(lines).toEqual(['load: 0.4', 'users: 2', ''])

    stream.end()
    expect(lines).toEqual(['load: 0.4', 'users: 2', '', 'tail'])
  })
})

describe('rebootHosts', () => {
  it('waits for a new boot and the role after rebooting', async () => {
    const { ctx, fleet } = testContext({ cluster })
    await ctx.provisioner.ensure(db0, 'db-00')

    const [outcome] = await rebootHosts(ctx, [db0])

    expect(outcome).toMatchObject({ host: 'db-00', ok: true, detail: 'ready after 0s' })
    expect(fleet.agent('db-00').calls).toEqual(['bootId', 'reboot', 'reachable', 'bootId', 'readiness'])
  })

  it('does not reboot the second database host after the first failed', async () => {
    const { ctx, fleet } = testContext({ cluster })
    fleet.agent('db-00').failOn('reboot')

    const outcomes = await rebootHosts(ctx, [db0, hostNamed(cluster, 'db-01')])

    expect(outcomes.map(o => [o.host, o.ok, o.stage])).toEqual([
      ['db-00', false, 'Reboot'],
      ['db-01', false, 'Validate'],
    ])
    expect(fleet.touched).toEqual(['db-00'])
  })
})

describe('unlockHosts', () => {
  it('uses the key file when one is given', async () => {
    const { ctx, fleet } = testContext({ cluster })
    const keyFile = join(mkdtempSync(join(tmpdir(), 'hostfleet-key-')), 'disk.key')
    writeFileSync(keyFile, 'test-secret\n')
    const keys: string[] = []
    fleet.agent('db-00').unlock = async key => {
      keys.push(key)
      return 'unlocked'
    }

    const [outcome] = await unlockHosts(ctx, [db0], { keyFile })

    expect(outcome).toMatchObject({ ok: true, detail: 'disk unlocked' })
    expect(keys).toEqual(['test-secret'])
  })

  it('reports a host that answers on neither port', async () => {
    const { ctx, fleet } = testContext({ cluster })
    await ctx.provisioner.ensure(db0, 'db-00')
    fleet.agent('db-00').unlock = async () => 'unreachable'

    const [outcome] = await unlockHosts(ctx, [db0])

    expect(outcome.ok).toBe(false)
    expect(outcome.error).toBeInstanceOf(RemoteError)
    expect(outcome.error?.message).toBe('neither the system nor the initrd (port 2222) answers')
  })
})
