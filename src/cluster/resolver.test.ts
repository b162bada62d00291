import { describe, it, expect } from 'vitest'
import { parseDescription } from './description.js'
import { resolveCluster, windowsOverlap } from './resolver.js'
import { ConfigError } from '../errors.js'

const BASE = `global:
  source_repository: github:example/fleet
  access_tokens: test-token
host_defaults:
  ipv4_gateway: 10.0.0.1
  ipv4_cidr: 24
  public_ssh_keys:
    - ssh-ed25519 AAAAdefault operator@test
  disks:
    - /dev/vda
`

function resolve(hosts: string) {
  return resolveCluster(parseDescription(`${BASE}hosts:\n${hosts}`, '/srv/fleet', 'yaml'))
}

const THREE_HOSTS = `  app-0:
    role: application
    ipv4_address: 10.0.0.20
  db-0:
    role: database
    ipv4_address: 10.0.0.10
  db-1:
    role: database
    ipv4_address: 10.0.0.11
`

describe('resolveCluster', () => {
  it('is idempotent and keeps description order', () => {
    const first = resolve(THREE_HOSTS)
    const second = resolve(THREE_HOSTS)
    expect(second).toEqual(first)
    expect(first.hosts.map(h => h.name)).toEqual(['app-0', 'db-0', 'db-1'])
  })

  it('gives the application host every database host as a join peer, in order', () => {
    const app = resolve(THREE_HOSTS).hosts[0]
    expect(app.database.join).toEqual(['db-0', 'db-1'])
    expect(app.database.staticHosts).toEqual([
      { address: '10.0.0.10', name: 'db-0' },
      { address: '10.0.0.11', name: 'db-1' },
    ])
  })

  it('leaves the join list empty for a single database host', () => {
    const cluster = resolve(`  db-0:
    role: database
    ipv4_address: 10.0.0.10
`)
    expect(cluster.hosts[0].database.peers).toEqual([{ name: 'db-0', ipv4: '10.0.0.10' }])
    expect(cluster.hosts[0].database.join).toEqual([])
  })

  it('rejects a host without any address', () => {
    expect(() => resolve(`  app-0:
    role: application
`)).toThrow(/no network configured/)
  })

  it('rejects an address without its gateway', () => {
    expect(() => resolve(`  app-0:
    role: application
    ipv6_address: 2001:db8::20
    ipv6_cidr: 64
`)).toThrow('hosts.app-0: ipv6_address is set but ipv6_gateway is missing')
  })

  it('rejects an empty disk list before anything else happens', () => {
    let caught: unknown
    try {
      resolve(`  app-0:
    role: application
    ipv4_address: 10.0.0.20
    disks: []
`)
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ConfigError)
    expect(caught).toMatchObject({ host: 'app-0', stage: 'Validate' })
    expect(String(caught)).toContain('disks is empty')
  })

  it('rejects an unknown role', () => {
    expect(() => resolve(`  web-0:
    role: web
    ipv4_address: 10.0.0.30
`)).toThrow("hosts.web-0: unknown role 'web', expected one of application, database")
  })

  it('rejects host names that are not DNS labels', () => {
    expect(() => resolve(`  Web_0:
    role: application
    ipv4_address: 10.0.0.30
`)).toThrow(/host name 'Web_0' must match/)
  })

  it('rejects host names made of digits only', () => {
    expect(() => resolve(`  "10":
    role: database
    ipv4_address: 10.0.0.10
`)).toThrow(/host name '10' must match/)
  })

  it('moves an inline IPv6 prefix into the prefix length with a warning', () => {
    const cluster = resolve(`  app-0:
    role: application
    ipv6_address: 2001:db8::20/64
    ipv6_gateway: 2001:db8::1
`)
    expect(cluster.hosts[0].network.ipv6).toEqual({ address: '2001:db8::20', gateway: '2001:db8::1', prefix: 64 })
    expect(cluster.hosts[0].network.ipv4).toBeUndefined()
    expect(cluster.warnings).toEqual([
      "hosts.app-0.ipv6_address: '2001:db8::20/64' contains a subnet identifier, using 2001:db8::20 with ipv6_cidr 64",
    ])
  })

  it('rejects an inline IPv6 prefix with nothing after the slash', () => {
    expect(() => resolve(`  app-0:
    role: application
    ipv6_address: 2001:db8::20/
    ipv6_gateway: 2001:db8::1
`)).toThrow("hosts.app-0.ipv6_address: '2001:db8::20/' has an invalid subnet identifier")
  })

  it('defaults the ssh hostname to the address and advertises the peer port', () => {
    const app = resolve(THREE_HOSTS).hosts[0]
    expect(app.sshHostname).toBe('10.0.0.20')
    expect(app.installSshUser).toBe('root')
    expect(app.application).toEqual({
      advertisedAddresses: ['10.0.0.20:9234'],
      apiAccessList: [],
      restApiPort: 2244,
    })
  })

  it('adds host keys in front of default keys but replaces other lists', () => {
    const app = resolve(`  app-0:
    role: application
    ipv4_address: 10.0.0.20
    public_ssh_keys:
      - ssh-ed25519 AAAAhost admin@test
    disks:
      - /dev/nvme0n1
`).hosts[0]
    expect(app.publicSshKeys).toEqual(['ssh-ed25519 AAAAhost admin@test', 'ssh-ed25519 AAAAdefault operator@test'])
    expect(app.disks).toEqual(['/dev/nvme0n1'])
  })

  it('rejects application settings on a database host', () => {
    expect(() => resolve(`  db-0:
    role: database
    ipv4_address: 10.0.0.10
    node_alias: primary
`)).toThrow('hosts.db-0: node_alias only apply to the application role')
  })

  it('rejects a node alias longer than 32 bytes', () => {
    expect(() => resolve(`  app-0:
    role: application
    ipv4_address: 10.0.0.20
    node_alias: ${'x'.repeat(33)}
`)).toThrow('hosts.app-0.node_alias: longer than 32 bytes')
  })

  it('returns frozen specs', () => {
    const cluster = resolve(THREE_HOSTS)
    expect(Object.isFrozen(cluster.hosts[0])).toBe(true)
    expect(Object.isFrozen(cluster.hosts[0].publicSshKeys)).toBe(true)
  })
})

describe('activation windows', () => {
  const DATABASES = ['db-0', 'db-1', 'db-2', 'db-3']
    .map((name, i) => `  ${name}:\n    role: database\n    ipv4_address: 10.0.0.${10 + i}\n`)
    .join('')

  it('never overlaps for database hosts with offsets 0..N-1', () => {
    const hosts = resolve(DATABASES).hosts
    expect(hosts.map(h => h.upgrade.staggerOffset)).toEqual([0, 1, 2, 3])
    for (let i = 0; i < hosts.length; i++) {
      for (let j = i + 1; j < hosts.length; j++) {
        expect(windowsOverlap(hosts[i].upgrade, hosts[j].upgrade)).toBe(false)
      }
    }
  })

  it('derives the host-local timer from the offset', () => {
    const hosts = resolve(DATABASES).hosts
    expect(hosts[0].upgrade.window).toEqual({ startMinute: 120, durationMinutes: 10, calendar: '*-*-* 02:00:00' })
    expect(hosts[3].upgrade.window.calendar).toBe('*-*-* 02:30:00')
  })

  it('rejects two database hosts sharing an upgrade order', () => {
    expect(() => resolve(`  db-0:
    role: database
    ipv4_address: 10.0.0.10
    upgrade_order: 3
  db-1:
    role: database
    ipv4_address: 10.0.0.11
    upgrade_order: 3
`)).toThrow('hosts.db-1: upgrade window overlaps db-0 (both database role, stagger offset 3)')
  })

  it('lets application hosts share a window', () => {
    const hosts = resolve(`  app-0:
    role: application
    ipv4_address: 10.0.0.20
    upgrade_order: 1
  app-1:
    role: application
    ipv4_address: 10.0.0.21
    upgrade_order: 1
`).hosts
    expect(hosts[0].upgrade.window.startMinute).toBe(130)
    expect(hosts[1].upgrade.window.startMinute).toBe(130)
  })

  it('rejects a database window that ends after midnight', () => {
    expect(() => resolve(`  db-0:
    role: database
    ipv4_address: 10.0.0.10
    upgrade_order: 200
`)).toThrow('hosts.db-0: upgrade window for stagger offset 200 ends after midnight')
  })

  it('wraps application windows around midnight', () => {
    const [app] = resolve(`  app-0:
    role: application
    ipv4_address: 10.0.0.20
    upgrade_order: 200
`).hosts
    expect(app.upgrade.window).toEqual({ startMinute: 680, durationMinutes: 10, calendar: '*-*-* 11:20:00' })
  })
})
