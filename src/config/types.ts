/**
 * Hostfleet — Settings Types
 *
 * Tool settings, not the cluster description. These tune how the
 * orchestrator talks to hosts and how long it waits for them.
 */

export type RemoteSettings = {
  connect_timeout_sec: number
  retry_attempts: number
  retry_initial_delay_ms: number
  retry_max_delay_ms: number
}

export type ReadinessSettings = {
  initial_delay_ms: number
  max_delay_ms: number
  poll_timeout_sec: number
  overall_timeout_sec: number
}

export type UpgradeSettings = {
  /** Minute of day at which stagger offset 0 activates */
  window_base_minute: number
  window_minutes: number
}

export type FleetSettings = {
  config_path: string
  parallelism: number
  debug: boolean
  log_dir: string
  remote: RemoteSettings
  readiness: ReadinessSettings
  upgrade: UpgradeSettings
}
