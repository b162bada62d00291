/**
 * Hostfleet — Settings Loader
 *
 * Loads ~/.hostfleet/config.yaml, merges with defaults, then applies
 * HOSTFLEET_* environment overrides (a local .env file is honoured).
 */

import { readFileSync, existsSync } from 'node:fs'
import * as dotenv from 'dotenv'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { DEFAULT_SETTINGS } from './defaults.js'
import type { FleetSettings } from './types.js'
import { fleetHome } from './paths.js'
import { ConfigError } from '../errors.js'

const SETTINGS_PATH = fleetHome('config.yaml')

type PlainObject = Record<string, unknown>

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Deep merge b into a (b wins) */
export function deepMerge(a: PlainObject, b: PlainObject): PlainObject {
  const result: PlainObject = { ...a }
  for (const key of Object.keys(b)) {
    const val = b[key]
    const base = a[key]
    if (isPlainObject(val) && isPlainObject(base)) {
      result[key] = deepMerge(base, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

const positiveInt = z.coerce.number().int().positive()
const nonNegativeInt = z.coerce.number().int().nonnegative()

export const settingsSchema = z.object({
  config_path: z.string().min(1),
  parallelism: positiveInt,
  debug: z.boolean(),
  log_dir: z.string().min(1),
  remote: z.object({
    connect_timeout_sec: positiveInt,
    retry_attempts: positiveInt,
    retry_initial_delay_ms: nonNegativeInt,
    retry_max_delay_ms: nonNegativeInt,
  }),
  readiness: z.object({
    initial_delay_ms: nonNegativeInt,
    max_delay_ms: nonNegativeInt,
    poll_timeout_sec: positiveInt,
    overall_timeout_sec: positiveInt,
  }),
  upgrade: z.object({
    window_base_minute: z.coerce.number().int().min(0).max(1439),
    window_minutes: positiveInt,
  }),
})

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase())
}

/** Environment overrides, shaped like the settings file */
function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const overrides: PlainObject = {
    config_path: env.HOSTFLEET_CONFIG || undefined,
    parallelism: env.HOSTFLEET_PARALLELISM || undefined,
    debug: envFlag(env.HOSTFLEET_DEBUG),
    log_dir: env.HOSTFLEET_LOG_DIR || undefined,
  }
  if (env.HOSTFLEET_READINESS_TIMEOUT_SEC) {
    overrides.readiness = { overall_timeout_sec: env.HOSTFLEET_READINESS_TIMEOUT_SEC }
  }
  return overrides
}

function readSettingsFile(path: string): PlainObject {
  if (!existsSync(path)) return {}
  let parsed: unknown
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`cannot parse settings file ${path}: ${err instanceof Error ? err.message : String(err)}`)
  }
  if (parsed === null || parsed === undefined) return {}
  if (!isPlainObject(parsed)) throw new ConfigError(`settings file ${path} must contain a mapping`)
  return parsed
}

export type LoadSettingsOptions = {
  path?: string
  env?: NodeJS.ProcessEnv
  /** Skip reading .env (tests) */
  skipDotenv?: boolean
}

/** Load settings: defaults ← settings file ← environment */
export function loadSettings(options: LoadSettingsOptions = {}): FleetSettings {
  if (!options.skipDotenv) dotenv.config()
  const env = options.env ?? process.env

  const merged = deepMerge(
    deepMerge(DEFAULT_SETTINGS, readSettingsFile(options.path ?? SETTINGS_PATH)),
    envOverrides(env),
  )

  const result = settingsSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new ConfigError(`invalid settings: ${issues}`)
  }
  return result.data
}
