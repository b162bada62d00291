/**
 * Hostfleet — Test Fleet Context
 *
 * A FleetContext over fake hosts, a fake compiler and a real secrets
 * tree in a temporary directory (key tools are faked).
 */

import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { ResolvedCluster } from '../cluster/types.js'
import { DEFAULT_SETTINGS } from '../config/defaults.js'
import type { FleetSettings } from '../config/types.js'
import type { FleetContext } from '../fleet/context.js'
import { SecretLayout } from '../secrets/layout.js'
import { KeyMaterial } from '../secrets/openssl.js'
import { SecretProvisioner } from '../secrets/provisioner.js'
import { exampleCluster } from './cluster.js'
import { FakeFleet } from './fake-agent.js'
import { FakeCompiler, FakeRunner, ManualClock, keyTools, testLogger } from './fakes.js'
import type { MemorySink } from '../logging/logger.js'

/** 1s, 2s, 4s between polls, 10s overall */
export const TEST_SETTINGS: FleetSettings = {
  ...DEFAULT_SETTINGS,
  parallelism: 2,
  readiness: { initial_delay_ms: 1_000, max_delay_ms: 4_000, poll_timeout_sec: 5, overall_timeout_sec: 10 },
}

export type TestContext = {
  ctx: FleetContext
  fleet: FakeFleet
  compiler: FakeCompiler
  clock: ManualClock
  sink: MemorySink
}

export type TestContextOptions = {
  cluster?: ResolvedCluster
  fleet?: FakeFleet
  compiler?: FakeCompiler
  /** Local key tools; `keyTools` by default */
  runner?: FakeRunner
}

export function testContext(options: TestContextOptions = {}): TestContext {
  const cluster = options.cluster ?? exampleCluster()
  const fleet = options.fleet ?? new FakeFleet()
  const compiler = options.compiler ?? new FakeCompiler()
  const clock = new ManualClock()
  const { logger, sink } = testLogger()
  const layout = new SecretLayout(join(mkdtempSync(join(tmpdir(), 'hostfleet-fleet-')), 'secrets'))

  const ctx: FleetContext = {
    cluster,
    settings: TEST_SETTINGS,
    logger,
    clock,
    provisioner: new SecretProvisioner(layout, new KeyMaterial(options.runner ?? new FakeRunner(keyTools)), logger),
    compiler,
    agentFor: spec => fleet.agent(spec.name),
  }
  return { ctx, fleet, compiler, clock, sink }
}
