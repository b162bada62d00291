/**
 * Hostfleet — Sandbox Policy
 *
 * Restrictions each managed service asks of the host's process
 * supervisor. Data only: the image compiler turns them into unit
 * settings, nothing here enforces them.
 */

import type { Role } from '../cluster/types.js'
import { REMOTE_SECRETS_ROOT } from '../secrets/layout.js'
import type { ServiceUser } from '../secrets/layout.js'

export const SANDBOX_RESTRICTIONS = [
  'no-new-privileges',
  'private-tmp',
  'private-devices',
  'protect-system-strict',
  'protect-home',
  'protect-kernel-tunables',
  'protect-kernel-modules',
  'protect-control-groups',
  'restrict-namespaces',
  'restrict-realtime',
  'restrict-suid-sgid',
  'lock-personality',
  'memory-deny-write-execute',
  'system-call-filter-service',
] as const

export type SandboxRestriction = (typeof SANDBOX_RESTRICTIONS)[number]

export type ServicePolicy = {
  service: string
  user: ServiceUser
  /** Services that must be running first */
  after: readonly string[]
  restrictions: readonly SandboxRestriction[]
  readOnlyPaths: readonly string[]
  stateDirectory: string
  addressFamilies: readonly string[]
}

const ALL: readonly SandboxRestriction[] = SANDBOX_RESTRICTIONS

/** JIT runtimes need writable executable memory */
const WITHOUT_MDWE = ALL.filter(r => r !== 'memory-deny-write-execute')

const POLICIES: Record<Role, readonly ServicePolicy[]> = {
  database: [
    {
      service: 'database',
      user: 'database',
      after: ['network-online.target'],
      restrictions: WITHOUT_MDWE,
      readOnlyPaths: [`${REMOTE_SECRETS_ROOT}/database`],
      stateDirectory: '/var/lib/database',
      addressFamilies: ['AF_UNIX', 'AF_INET', 'AF_INET6'],
    },
  ],
  application: [
    {
      service: 'chain-indexer',
      user: 'application',
      after: ['network-online.target'],
      restrictions: ALL,
      readOnlyPaths: [],
      stateDirectory: '/var/lib/chain-indexer',
      addressFamilies: ['AF_UNIX', 'AF_INET', 'AF_INET6'],
    },
    {
      service: 'router',
      user: 'application',
      after: ['network-online.target', 'chain-indexer.service'],
      restrictions: ALL,
      readOnlyPaths: [`${REMOTE_SECRETS_ROOT}/application`],
      stateDirectory: '/var/lib/router',
      addressFamilies: ['AF_UNIX', 'AF_INET', 'AF_INET6', 'AF_NETLINK'],
    },
  ],
}

export function sandboxFor(role: Role): readonly ServicePolicy[] {
  return POLICIES[role]
}
