/**
 * Hostfleet — Host Filter
 *
 * `--hosts a,b` selection. Result keeps description order.
 */

import { ConfigError } from '../errors.js'
import type { HostSpec } from './types.js'

export function parseHostFilter(filter: string | undefined): string[] {
  if (!filter) return []
  return filter.split(',').map(name => name.trim()).filter(Boolean)
}

/** Empty filter selects every host */
export function selectHosts(hosts: readonly HostSpec[], filter: string | undefined): HostSpec[] {
  const names = parseHostFilter(filter)
  if (names.length === 0) return [...hosts]

  const known = new Set(hosts.map(h => h.name))
  const unknown = names.filter(name => !known.has(name))
  if (unknown.length > 0) {
    throw new ConfigError(`unknown host${unknown.length === 1 ? '' : 's'} in --hosts: ${unknown.join(', ')} (known: ${[...known].join(', ')})`)
  }

  const wanted = new Set(names)
  return hosts.filter(h => wanted.has(h.name))
}
