/**
 * Hostfleet — Cluster Types
 *
 * The cluster description as the operator writes it, and the per-host
 * spec the resolver derives from it.
 */

export const ROLES = ['application', 'database'] as const
export type Role = (typeof ROLES)[number]

/** Roles whose members must keep a majority online */
export const QUORUM_ROLES: ReadonlySet<Role> = new Set<Role>(['database'])

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

// ── Description (input) ─────────────────────────────────────────────────────

export type GlobalConfig = {
  /** Deployment repository the image compiler builds from */
  source_repository: string
  /** Credentials for the deployment repository, written to every host */
  access_tokens: string
  /** Secrets tree, relative paths resolve against the description file */
  secret_directory: string
  /** Image compiler command template, see image/compiler.ts for placeholders */
  image_builder: string
  /** Command template that copies a compiled image to a host */
  image_copier: string
  /** Transient installer booted before the disks are wiped */
  installer_url: string
}

export type MonitoringConfig = {
  url?: string
  username?: string
  password?: string
}

export type HostOverride = {
  role?: string
  ipv4_address?: string
  ipv4_gateway?: string
  ipv4_cidr?: number
  ipv6_address?: string
  ipv6_gateway?: string
  ipv6_cidr?: number
  mac_address?: string
  network_interface?: string
  ssh_hostname?: string
  install_ssh_user?: string
  public_ssh_keys?: string[]
  extra_modules?: string[]
  disks?: string[]
  chain_disks?: string[]
  monitoring?: MonitoringConfig
  log_collector?: string
  log_level?: LogLevel
  node_alias?: string
  advertised_addresses?: string[]
  api_access_list?: string[]
  rest_api_port?: number
  upgrade_order?: number
}

export type HostEntry = {
  name: string
  override: HostOverride
}

export type ClusterDescription = {
  global: GlobalConfig
  host_defaults: HostOverride
  /** In description order */
  hosts: HostEntry[]
  /** Directory the description was loaded from */
  baseDir: string
}

// ── Resolved ────────────────────────────────────────────────────────────────

export type AddressConfig = {
  readonly address: string
  readonly gateway: string
  readonly prefix: number
}

export type NetworkConfig = {
  readonly ipv4?: AddressConfig
  readonly ipv6?: AddressConfig
  readonly macAddress?: string
  readonly interface: string
}

export type DatabasePeer = {
  readonly name: string
  readonly ipv4?: string
  readonly ipv6?: string
}

export type StaticHostEntry = {
  readonly address: string
  readonly name: string
}

export type DatabaseMembership = {
  /** All database-role hosts, in description order */
  readonly peers: readonly DatabasePeer[]
  /** Names passed to the database's join flag; empty for a single node */
  readonly join: readonly string[]
  /** Host-name mapping written to every host so peers resolve by name */
  readonly staticHosts: readonly StaticHostEntry[]
}

export type ApplicationConfig = {
  readonly advertisedAddresses: readonly string[]
  readonly apiAccessList: readonly string[]
  readonly restApiPort: number
  readonly nodeAlias?: string
}

export type MonitoringSpec = {
  readonly metrics?: { readonly url: string; readonly username: string; readonly password: string }
  readonly logCollector?: string
}

export type ActivationWindow = {
  /** Minute of day the window opens */
  readonly startMinute: number
  readonly durationMinutes: number
  /** systemd calendar expression for the host-local upgrade timer */
  readonly calendar: string
}

export type UpgradeSpec = {
  readonly staggerOffset: number
  readonly window: ActivationWindow
}

export type HostSpec = {
  readonly name: string
  readonly role: Role
  readonly network: NetworkConfig
  readonly sshHostname: string
  readonly installSshUser: string
  readonly publicSshKeys: readonly string[]
  readonly extraModules: readonly string[]
  readonly disks: readonly string[]
  readonly chainDisks: readonly string[]
  readonly monitoring?: MonitoringSpec
  readonly logLevel: LogLevel
  readonly database: DatabaseMembership
  readonly application?: ApplicationConfig
  readonly upgrade: UpgradeSpec
}

export type ResolvedCluster = {
  readonly global: GlobalConfig
  readonly hosts: readonly HostSpec[]
  /** Non-fatal notes produced while resolving (normalized input, dropped settings) */
  readonly warnings: readonly string[]
}
