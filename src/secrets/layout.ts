/**
 * Hostfleet — Secret Layout
 *
 * Where secret material lives on the operator machine and where each
 * piece lands on a host. Local tree:
 *
 *   <secrets>/ca/ca.{key,crt}                fleet CA, created by the primary host
 *   <secrets>/clients/client.<user>.{key,crt} database client certificates
 *   <secrets>/<host>/...                       per-host material
 *   <secrets>/<host>/mnemonic                  wallet seed (application role)
 *   <secrets>/<host>/macaroons/*.macaroon      API credentials, never sent
 */

import { existsSync } from 'node:fs'
import { isAbsolute, join, resolve } from 'node:path'
import type { ClusterDescription, GlobalConfig, HostSpec, Role } from '../cluster/types.js'

export const REMOTE_SECRETS_ROOT = '/var/lib/secrets'

/** Static ids, declared in the image descriptor so files can be chowned before first boot */
export const SERVICE_USERS = {
  root: 0,
  database: 2201,
  application: 2202,
} as const

export type ServiceUser = keyof typeof SERVICE_USERS

/** Database client user per role */
export const DATABASE_CLIENT_USER: Record<Role, string> = {
  application: 'app',
  database: 'root',
}

export type SecretSource =
  | { kind: 'file'; path: string }
  | { kind: 'inline'; content: string }

export type SecretEntry = {
  source: SecretSource
  remotePath: string
  /** Octal file mode, always read-only for a single owner */
  mode: number
  owner: ServiceUser
  /** Left alone when the host already has the file */
  keepExisting?: boolean
}

export type SecretBundle = {
  host: string
  entries: SecretEntry[]
}

export function secretDirectory(description: Pick<ClusterDescription, 'global' | 'baseDir'>): string {
  const dir = description.global.secret_directory
  return isAbsolute(dir) ? dir : resolve(description.baseDir, dir)
}

export class SecretLayout {
  constructor(readonly root: string) {}

  get caDir(): string {
    return join(this.root, 'ca')
  }

  get caKey(): string {
    return join(this.caDir, 'ca.key')
  }

  get caCert(): string {
    return join(this.caDir, 'ca.crt')
  }

  clientKey(user: string): string {
    return join(this.root, 'clients', `client.${user}.key`)
  }

  clientCert(user: string): string {
    return join(this.root, 'clients', `client.${user}.crt`)
  }

  hostDir(host: string): string {
    return join(this.root, host)
  }

  /** Database node certificate (database role) */
  nodeKey(host: string): string {
    return join(this.hostDir(host), 'node.key')
  }

  nodeCert(host: string): string {
    return join(this.hostDir(host), 'node.crt')
  }

  /** Application API TLS certificate (application role) */
  apiKey(host: string): string {
    return join(this.hostDir(host), 'api.key')
  }

  apiCert(host: string): string {
    return join(this.hostDir(host), 'api.crt')
  }

  /** Host key of the initrd SSH server used to unlock the disks */
  sshHostKey(host: string): string {
    return join(this.hostDir(host), 'ssh_host_ed25519_key')
  }

  diskKey(host: string): string {
    return join(this.hostDir(host), 'disk_encryption_key')
  }

  mnemonic(host: string): string {
    return join(this.hostDir(host), 'mnemonic')
  }

  macaroon(host: string, name: 'access' | 'admin' | 'readonly'): string {
    return join(this.hostDir(host), 'macaroons', `${name}.macaroon`)
  }
}

const file = (path: string): SecretSource => ({ kind: 'file', path })
const inline = (content: string): SecretSource => ({ kind: 'inline', content })

function entry(source: SecretSource, remotePath: string, owner: ServiceUser): SecretEntry {
  return { source, remotePath: `${REMOTE_SECRETS_ROOT}/${remotePath}`, mode: 0o400, owner }
}

/**
 * Everything one host needs, in push order. The seed goes along only when
 * it was generated locally, and never replaces the one a host has.
 */
export function bundleFor(spec: HostSpec, layout: SecretLayout, global: GlobalConfig): SecretBundle {
  const { name, role } = spec
  const service: ServiceUser = role
  const client = DATABASE_CLIENT_USER[role]

  const entries: SecretEntry[] = [
    entry(file(layout.caCert), `${role}/ca.crt`, service),
    entry(file(layout.clientCert(client)), `${role}/client.${client}.crt`, service),
    entry(file(layout.clientKey(client)), `${role}/client.${client}.key`, service),
  ]

  if (role === 'database') {
    entries.push(
      entry(file(layout.nodeCert(name)), 'database/node.crt', service),
      entry(file(layout.nodeKey(name)), 'database/node.key', service),
    )
  } else {
    entries.push(
      entry(file(layout.apiCert(name)), 'application/api.crt', service),
      entry(file(layout.apiKey(name)), 'application/api.key', service),
    )
    if (existsSync(layout.mnemonic(name))) {
      entries.push({ ...entry(file(layout.mnemonic(name)), 'mnemonic', service), keepExisting: true })
    }
  }

  entries.push(
    entry(file(layout.sshHostKey(name)), 'sshd_key', 'root'),
    entry(file(layout.diskKey(name)), 'disk_encryption_key', 'root'),
    entry(inline(`ACCESS_TOKENS=${global.access_tokens}\n`), 'access-tokens', 'root'),
  )

  const metrics = spec.monitoring?.metrics
  if (metrics) {
    entries.push(entry(
      inline(`METRICS_URL=${metrics.url}\nMETRICS_USERNAME=${metrics.username}\nMETRICS_PASSWORD=${metrics.password}\n`),
      'metrics',
      'root',
    ))
  }
  const collector = spec.monitoring?.logCollector
  if (collector) {
    entries.push(entry(inline(`CLIENT_URL=${collector}\n`), 'log-collector', 'root'))
  }

  return { host: name, entries }
}
