/**
 * Hostfleet — Description Loader
 *
 * Reads the operator's cluster description: TOML by default, YAML when
 * the file ends in .yaml or .yml. Host order is taken from the document
 * itself: it drives install and upgrade sequencing.
 */

import { readFileSync, existsSync } from 'node:fs'
import { dirname, extname, resolve } from 'node:path'
import { TomlError, parse as parseToml } from 'smol-toml'
import { parseDocument, isMap, isScalar, isNode } from 'yaml'
import type { Document } from 'yaml'
import { ConfigError } from '../errors.js'
import { checkGlobal, checkHostDefaults, checkHostOverride } from './schema.js'
import type { ClusterDescription, HostEntry } from './types.js'

export type DescriptionFormat = 'toml' | 'yaml'

const TOP_LEVEL_KEYS = new Set(['global', 'host_defaults', 'hosts'])

type RawDescription = {
  root: Record<string, unknown>
  hosts: Array<{ name: string; raw: unknown }>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function descriptionFormat(path: string): DescriptionFormat {
  const ext = extname(path).toLowerCase()
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'toml'
}

// ── TOML ────────────────────────────────────────────────────────────────────

/** TOML rejects a table defined twice, so duplicate hosts surface as parse errors */
function readToml(content: string): RawDescription {
  let root: unknown
  try {
    root = parseToml(content)
  } catch (err) {
    if (!(err instanceof TomlError)) throw err
    throw new ConfigError(`cannot parse cluster description: ${err.message}`, { cause: err })
  }
  if (!isRecord(root)) throw new ConfigError('cluster description must be a table with global, host_defaults and hosts')

  const hosts = root.hosts
  if (hosts === undefined) return { root, hosts: [] }
  if (!isRecord(hosts)) throw new ConfigError('hosts must be a table of host name to host settings')
  // host names are never all digits, so key order is document order
  return { root, hosts: Object.entries(hosts).map(([name, raw]) => ({ name, raw })) }
}

// ── YAML ────────────────────────────────────────────────────────────────────

function nodeToJs(doc: Document, value: unknown): unknown {
  return isNode(value) ? value.toJS(doc) : value
}

function keyName(key: unknown): string {
  if (isScalar(key)) return String(key.value)
  return String(key)
}

/** Host entries in document order, duplicates reported */
function readHostEntries(doc: Document): Array<{ name: string; raw: unknown }> {
  const hostsNode = doc.get('hosts', true)
  if (hostsNode === undefined || hostsNode === null) return []
  if (!isMap(hostsNode)) throw new ConfigError('hosts must be a mapping of host name to host settings')

  const seen = new Set<string>()
  const entries: Array<{ name: string; raw: unknown }> = []
  for (const pair of hostsNode.items) {
    const name = keyName(pair.key)
    if (seen.has(name)) {
      throw new ConfigError(`duplicate host name '${name}' in hosts`, { host: name, stage: 'Validate' })
    }
    seen.add(name)
    entries.push({ name, raw: nodeToJs(doc, pair.value) })
  }
  return entries
}

function readYaml(content: string): RawDescription {
  const doc = parseDocument(content, { uniqueKeys: false })
  if (doc.errors.length > 0) {
    throw new ConfigError(`cannot parse cluster description: ${doc.errors.map(e => e.message).join('; ')}`)
  }

  const root: unknown = doc.toJS()
  if (!isRecord(root)) {
    throw new ConfigError('cluster description must be a mapping with global, host_defaults and hosts')
  }
  return { root, hosts: readHostEntries(doc) }
}

// ── Validation ──────────────────────────────────────────────────────────────

/** Parse a description document. `baseDir` anchors relative paths. */
export function parseDescription(content: string, baseDir: string, format: DescriptionFormat = 'toml'): ClusterDescription {
  const { root, hosts: entries } = format === 'yaml' ? readYaml(content) : readToml(content)

  const unknownKeys = Object.keys(root).filter(k => !TOP_LEVEL_KEYS.has(k))
  if (unknownKeys.length > 0) {
    throw new ConfigError(`${unknownKeys.join(', ')} are not allowed fields`)
  }

  const global = checkGlobal(root.global ?? {})
  if (!global.ok) throw new ConfigError(`global: ${global.issues.join('; ')}`)

  const defaults = checkHostDefaults(root.host_defaults)
  if (!defaults.ok) throw new ConfigError(`host_defaults: ${defaults.issues.join('; ')}`)

  const hosts: HostEntry[] = entries.map(({ name, raw }) => {
    const override = checkHostOverride(raw)
    if (!override.ok) {
      throw new ConfigError(`hosts.${name}: ${override.issues.join('; ')}`, { host: name, stage: 'Validate' })
    }
    return { name, override: override.value }
  })

  return {
    global: global.value,
    host_defaults: defaults.value,
    hosts,
    baseDir,
  }
}

/** Load and parse a description file */
export function loadDescription(path: string): ClusterDescription {
  const fullPath = resolve(path)
  if (!existsSync(fullPath)) {
    throw new ConfigError(`cluster description not found: ${fullPath} (run 'hostfleet generate-example > ${path}' to start one)`)
  }
  return parseDescription(readFileSync(fullPath, 'utf-8'), dirname(fullPath), descriptionFormat(fullPath))
}
