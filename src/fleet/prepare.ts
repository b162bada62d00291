/**
 * Hostfleet — Local Preparation
 *
 * Everything a run can do before touching a host: make sure key material
 * exists, collect the host's secret bundle and render its descriptor.
 * Runs sequentially in description order so the primary host, which
 * creates the fleet CA, goes first.
 */

import type { HostSpec } from '../cluster/types.js'
import { toFleetError } from '../errors.js'
import { renderDescriptor } from '../image/descriptor.js'
import { bundleFor } from '../secrets/layout.js'
import type { SecretBundle } from '../secrets/layout.js'
import { primaryHost } from './context.js'
import type { FleetContext, HostOutcome } from './context.js'

export type PreparedHost = {
  spec: HostSpec
  bundle: SecretBundle
  descriptor: string
}

export type Preparation = {
  prepared: PreparedHost[]
  failed: HostOutcome[]
}

export type PrepareOptions = {
  /** Create missing key material; read-only commands leave the secrets tree alone */
  ensureSecrets: boolean
  /** Also create application hosts' wallet seeds; only a fresh install does */
  seed?: boolean
}

export async function prepareHosts(ctx: FleetContext, targets: readonly HostSpec[], options: PrepareOptions): Promise<Preparation> {
  const { cluster, provisioner } = ctx
  const primary = primaryHost(cluster)
  const prepared: PreparedHost[] = []
  const failed: HostOutcome[] = []

  for (const spec of targets) {
    try {
      if (options.ensureSecrets) await provisioner.ensure(spec, primary, { seed: options.seed ?? false })
      const bundle = bundleFor(spec, provisioner.layout, cluster.global)
      prepared.push({ spec, bundle, descriptor: renderDescriptor(spec, cluster.global, bundle) })
    } catch (err) {
      const error = toFleetError(err, { host: spec.name, stage: 'Validate' })
      ctx.logger.child(spec.name).error(`Failed in Validate: ${error.message}`)
      failed.push({ host: spec.name, ok: false, stage: 'Validate', error, elapsedMs: 0 })
    }
  }
  return { prepared, failed }
}
