/**
 * Hostfleet — Host Descriptor
 *
 * The per-host document handed to the image compiler, and the copy each
 * generation keeps at /etc/hostfleet/descriptor.yaml so dry-update can
 * diff against it. Secret values never appear here, only their paths.
 */

import { stringify as stringifyYaml } from 'yaml'
import type { GlobalConfig, HostSpec } from '../cluster/types.js'
import { SERVICE_USERS } from '../secrets/layout.js'
import type { SecretBundle } from '../secrets/layout.js'
import { sandboxFor } from './sandbox.js'

export const REMOTE_DESCRIPTOR_PATH = '/etc/hostfleet/descriptor.yaml'
export const DESCRIPTOR_VERSION = 1

export function buildDescriptor(spec: HostSpec, global: GlobalConfig, bundle: SecretBundle): Record<string, unknown> {
  const { network } = spec
  return {
    version: DESCRIPTOR_VERSION,
    host: spec.name,
    role: spec.role,
    source_repository: global.source_repository,
    network: {
      interface: network.interface,
      ...(network.macAddress !== undefined && { mac_address: network.macAddress }),
      ...(network.ipv4 && { ipv4: { ...network.ipv4 } }),
      ...(network.ipv6 && { ipv6: { ...network.ipv6 } }),
      extra_hosts: spec.database.staticHosts.map(e => `${e.address} ${e.name}`),
    },
    authorized_keys: [...spec.publicSshKeys],
    disks: [...spec.disks],
    ...(spec.chainDisks.length > 0 && { chain_disks: [...spec.chainDisks] }),
    extra_modules: [...spec.extraModules],
    log_level: spec.logLevel,
    database: {
      peers: spec.database.peers.map(p => p.name),
      join: [...spec.database.join],
    },
    ...(spec.application && {
      application: {
        advertised_addresses: [...spec.application.advertisedAddresses],
        api_access_list: [...spec.application.apiAccessList],
        rest_api_port: spec.application.restApiPort,
        ...(spec.application.nodeAlias !== undefined && { node_alias: spec.application.nodeAlias }),
      },
    }),
    monitoring: {
      metrics: spec.monitoring?.metrics !== undefined,
      log_collector: spec.monitoring?.logCollector !== undefined,
    },
    users: { ...SERVICE_USERS },
    services: sandboxFor(spec.role).map(policy => ({
      name: policy.service,
      user: policy.user,
      after: [...policy.after],
      restrictions: [...policy.restrictions],
      read_only_paths: [...policy.readOnlyPaths],
      state_directory: policy.stateDirectory,
      address_families: [...policy.addressFamilies],
    })),
    secrets: bundle.entries.map(e => e.remotePath),
    upgrade: {
      stagger_offset: spec.upgrade.staggerOffset,
      calendar: spec.upgrade.window.calendar,
      window_minutes: spec.upgrade.window.durationMinutes,
    },
  }
}

export function renderDescriptor(spec: HostSpec, global: GlobalConfig, bundle: SecretBundle): string {
  return stringifyYaml(buildDescriptor(spec, global, bundle), { lineWidth: 0 })
}
