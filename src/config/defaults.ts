/**
 * Hostfleet — Settings Defaults
 */

import type { FleetSettings } from './types.js'
import { fleetHome } from './paths.js'

export const DEFAULT_SETTINGS: FleetSettings = {
  config_path: 'cluster.toml',
  parallelism: 4,
  debug: false,
  log_dir: fleetHome('logs'),
  remote: {
    connect_timeout_sec: 10,
    retry_attempts: 3,
    retry_initial_delay_ms: 1_000,
    retry_max_delay_ms: 8_000,
  },
  readiness: {
    initial_delay_ms: 2_000,
    max_delay_ms: 30_000,
    poll_timeout_sec: 20,
    overall_timeout_sec: 900,
  },
  upgrade: {
    // 02:00, ten minutes per host
    window_base_minute: 120,
    window_minutes: 10,
  },
}
