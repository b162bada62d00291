import { describe, it, expect } from 'vitest'
import { existsSync } from 'node:fs'
import { ProvisionError, ReadinessTimeoutError, SecretError } from '../errors.js'
import { exampleCluster, hostNamed } from '../testing/cluster.js'
import { testContext } from '../testing/context.js'
import { FakeHostAgent } from '../testing/fake-agent.js'
import { FakeRunner, exit, keyTools } from '../testing/fakes.js'
import { bootstrapHost, dependsOn, install } from './orchestrator.js'

const cluster = exampleCluster()

const FULL_INSTALL = [
  'bootInstaller',
  'installerReachable',
  'wipeDisks',
  'writeImage',
  'pushSecrets',
  'rebootInstaller',
  'forgetHostKey',
  'reachable',
  'bootId',
  'readiness',
]

/** The installer keeps answering for one check after it was told to reboot */
class LateRebootAgent extends FakeHostAgent {
  private pending = false

  override async rebootInstaller(): Promise<string> {
    this.calls.push('rebootInstaller')
    this.pending = true
    return `boot-${this.state.boots}`
  }

  override async bootId(): Promise<string> {
    const id = await super.bootId()
    if (this.pending) {
      this.pending = false
      this.state.boots++
    }
    return id
  }
}

describe('install ordering', () => {
  it('bootstraps on the first database host', () => {
    expect(bootstrapHost(cluster.hosts)?.name).toBe('db-00')
  })

  it('holds back joining peers and application hosts', () => {
    const db0 = hostNamed(cluster, 'db-00')
    expect(dependsOn(hostNamed(cluster, 'db-01'), db0)).toBe(true)
    expect(dependsOn(hostNamed(cluster, 'app-00'), db0)).toBe(true)
    expect(dependsOn(db0, db0)).toBe(false)
  })
})

describe('install', () => {
  it('installs the bootstrap host first and every host fully', async () => {
    const { ctx, fleet, compiler } = testContext({ cluster })

    const outcomes = await install(ctx, cluster.hosts)

    expect(outcomes.map(o => [o.host, o.ok, o.stage])).toEqual([
      ['db-00', true, 'Done'],
      ['db-01', true, 'Done'],
      ['app-00', true, 'Done'],
    ])
    expect(fleet.touched[0]).toBe('db-00')
    expect(compiler.compiled[0].host).toBe('db-00')
    expect(fleet.agent('db-01').calls).toEqual(FULL_INSTALL)
    expect(fleet.agent('app-00').pushed.map(p => p.target)).toEqual(['installer'])
  })

  it('does not start dependents when the bootstrap host fails', async () => {
    const { ctx, fleet, compiler } = testContext({ cluster })
    fleet.agent('db-00').failOn('writeImage')

    const outcomes = await install(ctx, cluster.hosts)

    expect(outcomes[0]).toMatchObject({ host: 'db-00', ok: false, stage: 'Provision' })
    for (const outcome of outcomes.slice(1)) {
      expect(outcome.ok).toBe(false)
      expect(outcome.stage).toBe('Validate')
      expect(outcome.error).toBeInstanceOf(ProvisionError)
      expect(outcome.error?.message).toBe('not started: db-00 bootstraps the database quorum and failed')
    }
    expect(fleet.touched).toEqual(['db-00'])
    expect(compiler.compiled.map(c => c.host)).toEqual(['db-00'])
  })

  it('holds back dependents when the bootstrap host fails before installing', async () => {
    const runner = new FakeRunner((argv, options) =>
      argv.includes('db-00-initrd') ? exit(1, 'disk full') : keyTools(argv, options))
    const { ctx, fleet, compiler } = testContext({ cluster, runner })

    const outcomes = await install(ctx, cluster.hosts)

    expect(outcomes.map(o => [o.host, o.ok, o.stage])).toEqual([
      ['db-00', false, 'Validate'],
      ['db-01', false, 'Validate'],
      ['app-00', false, 'Validate'],
    ])
    expect(outcomes[0].error?.message).toBe('ssh host key for db-00-initrd failed: disk full')
    expect(outcomes[1].error?.message).toBe('not started: db-00 bootstraps the database quorum and failed')
    expect(outcomes[2].error?.message).toBe('not started: db-00 bootstraps the database quorum and failed')
    expect(fleet.touched).toEqual([])
    expect(compiler.compiled).toEqual([])
  })

  it('waits for the installed system, not the installer that is still shutting down', async () => {
    const { ctx, fleet, clock } = testContext({ cluster })
    const agent = new LateRebootAgent('db-00')
    fleet.agents.set('db-00', agent)

    const [outcome] = await install(ctx, [hostNamed(cluster, 'db-00')])

    expect(outcome).toMatchObject({ host: 'db-00', ok: true, stage: 'Done' })
    expect(agent.calls.slice(5)).toEqual([
      'rebootInstaller',
      'forgetHostKey',
      'reachable',
      'bootId',
      'forgetHostKey',
      'reachable',
      'bootId',
      'readiness',
    ])
    expect(clock.sleeps).toEqual([1_000])
  })

  it('keeps finished hosts done when another host times out', async () => {
    const { ctx, fleet } = testContext({ cluster })
    fleet.agent('app-00').state.ready = false

    const outcomes = await install(ctx, cluster.hosts)

    expect(outcomes.map(o => [o.host, o.ok, o.stage])).toEqual([
      ['db-00', true, 'Done'],
      ['db-01', true, 'Done'],
      ['app-00', false, 'ReadinessWait'],
    ])
    expect(outcomes[2].error).toBeInstanceOf(ReadinessTimeoutError)
    expect(outcomes[2].error?.message).toBe('application role not ready after 10s: waiting for quorum')
  })

  it('sends a fresh application seed along, unless the host makes its own', async () => {
    const { ctx, fleet } = testContext({ cluster })
    const seedPaths = () => fleet.agent('app-00').pushed
      .flatMap(p => p.bundle.entries.map(e => e.remotePath))
      .filter(path => path === '/var/lib/secrets/mnemonic')

    await install(ctx, cluster.hosts, { seedOnHost: true })
    expect(seedPaths()).toEqual([])
    expect(existsSync(ctx.provisioner.layout.mnemonic('app-00'))).toBe(false)

    await install(ctx, cluster.hosts)
    expect(seedPaths()).toEqual(['/var/lib/secrets/mnemonic'])
    expect(fleet.agent('db-00').pushed.flatMap(p => p.bundle.entries).some(e => e.remotePath.endsWith('mnemonic'))).toBe(false)
  })

  it('stops after writing the image with --no-reboot', async () => {
    const { ctx, fleet } = testContext({ cluster })

    const [outcome] = await install(ctx, [hostNamed(cluster, 'db-00')], { noReboot: true })

    expect(outcome).toMatchObject({ host: 'db-00', ok: true, detail: 'image written, left in the installer' })
    expect(fleet.agent('db-00').calls).toEqual(FULL_INSTALL.slice(0, 5))
  })

  it('refuses a non-primary host while the fleet CA is missing, before any remote call', async () => {
    const { ctx, fleet, compiler } = testContext({ cluster })

    const [outcome] = await install(ctx, [hostNamed(cluster, 'db-01')])

    expect(outcome).toMatchObject({ host: 'db-01', ok: false, stage: 'Validate' })
    expect(outcome.error).toBeInstanceOf(SecretError)
    expect(fleet.touched).toEqual([])
    expect(compiler.compiled).toEqual([])
  })
})
