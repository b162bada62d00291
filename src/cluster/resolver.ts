/**
 * Hostfleet — Config Resolver
 *
 * Cluster description → ordered, frozen HostSpec list. Pure: the same
 * description always resolves to the same specs in the same order, and
 * any invalid host aborts the whole resolution with a ConfigError.
 */

import { isIP, isIPv4, isIPv6 } from 'node:net'
import { ConfigError } from '../errors.js'
import type { UpgradeSettings } from '../config/types.js'
import { DEFAULT_SETTINGS } from '../config/defaults.js'
import { mergeLayers } from './merge.js'
import { checkHostOverride } from './schema.js'
import { ROLES, QUORUM_ROLES } from './types.js'
import type {
  AddressConfig,
  ApplicationConfig,
  ClusterDescription,
  DatabaseMembership,
  HostOverride,
  HostSpec,
  MonitoringSpec,
  NetworkConfig,
  ResolvedCluster,
  Role,
  UpgradeSpec,
} from './types.js'

const HOST_NAME = /^(?![0-9]+$)[a-z0-9][a-z0-9-]{0,62}$/
const MAC_ADDRESS = /^([0-9A-Fa-f]{2}[:-]){5}([0-9A-Fa-f]{2})$/
const PRINTABLE_ASCII = /^[\x20-\x7e]*$/

const ADDITIVE_FIELDS: ReadonlySet<string> = new Set(['public_ssh_keys'])
const APPLICATION_ONLY_FIELDS = ['chain_disks', 'node_alias', 'advertised_addresses', 'api_access_list', 'rest_api_port'] as const

export const PEER_PORT = 9234
export const DEFAULT_REST_API_PORT = 2244
export const DEFAULT_INTERFACE = 'eth0'
const MAX_ALIAS_BYTES = 32
const MINUTES_PER_DAY = 24 * 60

export type ResolveOptions = {
  upgrade: UpgradeSettings
}

export function isRole(value: string): value is Role {
  return ROLES.some(role => role === value)
}

function fail(host: string, message: string): never {
  throw new ConfigError(message, { host, stage: 'Validate' })
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const inner of Object.values(value)) deepFreeze(inner)
    Object.freeze(value)
  }
  return value
}

// ── Network ─────────────────────────────────────────────────────────────────

function checkPrefix(host: string, field: string, prefix: number, max: number): number {
  if (prefix < 0 || prefix > max) fail(host, `hosts.${host}.${field}: prefix ${prefix} is out of range 0-${max}`)
  return prefix
}

function resolveIpv4(host: string, o: HostOverride): AddressConfig | undefined {
  if (o.ipv4_address === undefined) return undefined
  if (!isIPv4(o.ipv4_address)) fail(host, `hosts.${host}.ipv4_address: '${o.ipv4_address}' is not an IPv4 address`)
  if (o.ipv4_gateway === undefined) fail(host, `hosts.${host}: ipv4_address is set but ipv4_gateway is missing`)
  if (!isIPv4(o.ipv4_gateway)) fail(host, `hosts.${host}.ipv4_gateway: '${o.ipv4_gateway}' is not an IPv4 address`)
  return {
    address: o.ipv4_address,
    gateway: o.ipv4_gateway,
    prefix: checkPrefix(host, 'ipv4_cidr', o.ipv4_cidr ?? 32, 32),
  }
}

/** Accepts `addr/prefix` as some providers print it, with a warning */
function resolveIpv6(host: string, o: HostOverride, warnings: string[]): AddressConfig | undefined {
  if (o.ipv6_address === undefined) return undefined

  let address = o.ipv6_address
  let prefix = o.ipv6_cidr
  const slash = address.indexOf('/')
  if (slash !== -1) {
    const suffix = address.slice(slash + 1)
    const inline = Number(suffix)
    address = address.slice(0, slash)
    if (!/^\d+$/.test(suffix) || address === '') {
      fail(host, `hosts.${host}.ipv6_address: '${o.ipv6_address}' has an invalid subnet identifier`)
    }
    if (prefix !== undefined && prefix !== inline) {
      fail(host, `hosts.${host}: ipv6_address carries /${inline} but ipv6_cidr is ${prefix}`)
    }
    prefix = inline
    warnings.push(`hosts.${host}.ipv6_address: '${o.ipv6_address}' contains a subnet identifier, using ${address} with ipv6_cidr ${inline}`)
  }

  if (!isIPv6(address)) fail(host, `hosts.${host}.ipv6_address: '${address}' is not an IPv6 address`)
  if (o.ipv6_gateway === undefined) fail(host, `hosts.${host}: ipv6_address is set but ipv6_gateway is missing`)
  if (!isIPv6(o.ipv6_gateway)) fail(host, `hosts.${host}.ipv6_gateway: '${o.ipv6_gateway}' is not an IPv6 address`)
  if (prefix === undefined) fail(host, `hosts.${host}: ipv6_address is set but ipv6_cidr is missing`)

  return { address, gateway: o.ipv6_gateway, prefix: checkPrefix(host, 'ipv6_cidr', prefix, 128) }
}

function resolveNetwork(host: string, o: HostOverride, warnings: string[]): NetworkConfig {
  const ipv4 = resolveIpv4(host, o)
  const ipv6 = resolveIpv6(host, o, warnings)
  if (!ipv4 && !ipv6) fail(host, `no network configured for hosts.${host}: set ipv4_address or ipv6_address`)

  if (o.mac_address !== undefined && !MAC_ADDRESS.test(o.mac_address)) {
    fail(host, `hosts.${host}.mac_address: '${o.mac_address}' is not a MAC address`)
  }

  return {
    ...(ipv4 && { ipv4 }),
    ...(ipv6 && { ipv6 }),
    ...(o.mac_address !== undefined && { macAddress: o.mac_address.toLowerCase().replaceAll('-', ':') }),
    interface: o.network_interface ?? DEFAULT_INTERFACE,
  }
}

// ── Role settings ───────────────────────────────────────────────────────────

function resolveMonitoring(host: string, o: HostOverride, warnings: string[]): MonitoringSpec | undefined {
  const m = o.monitoring
  let metrics: MonitoringSpec['metrics']
  if (m?.url !== undefined && m.username !== undefined && m.password !== undefined) {
    metrics = { url: m.url, username: m.username, password: m.password }
  } else if (m && (m.url ?? m.username ?? m.password) !== undefined) {
    warnings.push(`hosts.${host}.monitoring: url, username and password are all needed, metrics export disabled`)
  }
  if (!metrics && o.log_collector === undefined) return undefined
  return {
    ...(metrics && { metrics }),
    ...(o.log_collector !== undefined && { logCollector: o.log_collector }),
  }
}

function resolveApplication(host: string, o: HostOverride, network: NetworkConfig): ApplicationConfig {
  const alias = o.node_alias
  if (alias !== undefined) {
    if (!PRINTABLE_ASCII.test(alias)) fail(host, `hosts.${host}.node_alias: only printable ASCII is allowed`)
    if (alias.length > MAX_ALIAS_BYTES) fail(host, `hosts.${host}.node_alias: longer than ${MAX_ALIAS_BYTES} bytes`)
  }

  for (const entry of o.api_access_list ?? []) {
    if (isIP(entry) === 0) fail(host, `hosts.${host}.api_access_list: '${entry}' is not an IP address`)
  }

  const advertised = o.advertised_addresses ?? [
    ...(network.ipv4 ? [`${network.ipv4.address}:${PEER_PORT}`] : []),
    ...(network.ipv6 ? [`[${network.ipv6.address}]:${PEER_PORT}`] : []),
  ]

  return {
    advertisedAddresses: advertised,
    apiAccessList: o.api_access_list ?? [],
    restApiPort: o.rest_api_port ?? DEFAULT_REST_API_PORT,
    ...(alias !== undefined && { nodeAlias: alias }),
  }
}

/** Quorum windows must fit in one day; other roles wrap around midnight */
function resolveUpgrade(host: string, role: Role, offset: number, settings: UpgradeSettings): UpgradeSpec {
  let startMinute = settings.window_base_minute + offset * settings.window_minutes
  if (!QUORUM_ROLES.has(role)) {
    startMinute %= MINUTES_PER_DAY
  } else if (startMinute + settings.window_minutes > MINUTES_PER_DAY) {
    fail(host, `hosts.${host}: upgrade window for stagger offset ${offset} ends after midnight`)
  }
  const hh = String(Math.floor(startMinute / 60)).padStart(2, '0')
  const mm = String(startMinute % 60).padStart(2, '0')
  return {
    staggerOffset: offset,
    window: {
      startMinute,
      durationMinutes: settings.window_minutes,
      calendar: `*-*-* ${hh}:${mm}:00`,
    },
  }
}

export function windowsOverlap(a: UpgradeSpec, b: UpgradeSpec): boolean {
  const aEnd = a.window.startMinute + a.window.durationMinutes
  const bEnd = b.window.startMinute + b.window.durationMinutes
  return a.window.startMinute < bEnd && b.window.startMinute < aEnd
}

// ── Cluster-wide ────────────────────────────────────────────────────────────

type PartialSpec = Omit<HostSpec, 'database'>

function resolveMembership(specs: PartialSpec[]): DatabaseMembership {
  const peers = specs
    .filter(s => s.role === 'database')
    .map(s => ({
      name: s.name,
      ...(s.network.ipv4 && { ipv4: s.network.ipv4.address }),
      ...(s.network.ipv6 && { ipv6: s.network.ipv6.address }),
    }))

  const staticHosts = peers.flatMap(peer =>
    [peer.ipv4, peer.ipv6]
      .filter((address): address is string => address !== undefined)
      .map(address => ({ address, name: peer.name })),
  )

  if (peers.length > 1) {
    const owner = new Map<string, string>()
    for (const entry of staticHosts) {
      const existing = owner.get(entry.address)
      if (existing !== undefined && existing !== entry.name) {
        fail(entry.name, `database peers ${existing} and ${entry.name} share address ${entry.address}, peer names would not resolve`)
      }
      owner.set(entry.address, entry.name)
    }
    for (const peer of peers) {
      if (!staticHosts.some(e => e.name === peer.name)) {
        fail(peer.name, `database peer ${peer.name} has no address in the static host mapping`)
      }
    }
  }

  return {
    peers,
    join: peers.length > 1 ? peers.map(p => p.name) : [],
    staticHosts,
  }
}

function checkQuorumWindows(specs: PartialSpec[]): void {
  const quorum = specs.filter(s => QUORUM_ROLES.has(s.role))
  for (let i = 0; i < quorum.length; i++) {
    for (let j = i + 1; j < quorum.length; j++) {
      const a = quorum[i]
      const b = quorum[j]
      if (windowsOverlap(a.upgrade, b.upgrade)) {
        fail(b.name, `hosts.${b.name}: upgrade window overlaps ${a.name} (both ${b.role} role, stagger offset ${b.upgrade.staggerOffset})`)
      }
    }
  }
}

function resolveHost(
  description: ClusterDescription,
  index: number,
  options: ResolveOptions,
  warnings: string[],
): PartialSpec {
  const { name, override } = description.hosts[index]
  if (!HOST_NAME.test(name)) {
    fail(name, `host name '${name}' must match ${HOST_NAME.source}`)
  }

  const merged = checkHostOverride(
    mergeLayers([description.host_defaults, override], { additive: ADDITIVE_FIELDS }),
  )
  if (!merged.ok) fail(name, `hosts.${name}: ${merged.issues.join('; ')}`)
  const o = merged.value

  if (o.role === undefined) fail(name, `hosts.${name}: role is required`)
  if (!isRole(o.role)) fail(name, `hosts.${name}: unknown role '${o.role}', expected one of ${ROLES.join(', ')}`)
  const role = o.role

  const network = resolveNetwork(name, o, warnings)

  const keys = o.public_ssh_keys ?? []
  if (keys.length === 0) fail(name, `hosts.${name}: public_ssh_keys needs at least one key`)

  const disks = o.disks ?? []
  if (disks.length === 0) fail(name, `hosts.${name}: disks is empty, the ${role} role installs onto local disks`)

  // host_defaults may carry application settings for the whole fleet
  if (role !== 'application') {
    const misplaced = APPLICATION_ONLY_FIELDS.filter(field => override[field] !== undefined)
    if (misplaced.length > 0) fail(name, `hosts.${name}: ${misplaced.join(', ')} only apply to the application role`)
  }

  const monitoring = resolveMonitoring(name, o, warnings)

  return {
    name,
    role,
    network,
    sshHostname: o.ssh_hostname ?? network.ipv4?.address ?? network.ipv6?.address ?? name,
    installSshUser: o.install_ssh_user ?? 'root',
    publicSshKeys: keys,
    extraModules: o.extra_modules ?? [],
    disks,
    chainDisks: o.chain_disks ?? [],
    ...(monitoring && { monitoring }),
    logLevel: o.log_level ?? 'info',
    ...(role === 'application' && { application: resolveApplication(name, o, network) }),
    upgrade: resolveUpgrade(name, role, o.upgrade_order ?? index, options.upgrade),
  }
}

/** Resolve every host, in description order */
export function resolveCluster(
  description: ClusterDescription,
  options: ResolveOptions = { upgrade: DEFAULT_SETTINGS.upgrade },
): ResolvedCluster {
  const warnings: string[] = []
  const partial = description.hosts.map((_, index) => resolveHost(description, index, options, warnings))

  checkQuorumWindows(partial)
  const database = resolveMembership(partial)

  return deepFreeze({
    global: { ...description.global },
    hosts: partial.map(spec => ({ ...spec, database })),
    warnings,
  })
}
