import { describe, it, expect } from 'vitest'
import { parseDescription } from './description.js'
import { resolveCluster } from './resolver.js'
import { selectHosts } from './hosts-filter.js'
import { renderExample } from './example.js'

const hosts = resolveCluster(parseDescription(renderExample(), '/srv')).hosts

describe('selectHosts', () => {
  it('selects every host for an empty filter', () => {
    expect(selectHosts(hosts, undefined).map(h => h.name)).toEqual(['db-00', 'db-01', 'app-00'])
    expect(selectHosts(hosts, '').map(h => h.name)).toEqual(['db-00', 'db-01', 'app-00'])
  })

  it('keeps description order whatever the filter order', () => {
    expect(selectHosts(hosts, 'app-00, db-00').map(h => h.name)).toEqual(['db-00', 'app-00'])
  })

  it('rejects unknown names', () => {
    expect(() => selectHosts(hosts, 'db-00,db-09')).toThrow('unknown host in --hosts: db-09 (known: db-00, db-01, app-00)')
  })
})
