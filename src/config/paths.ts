/**
 * Hostfleet — Platform-Aware Paths
 *
 * Returns the base Hostfleet directory for the current platform:
 *   - Windows: %APPDATA%\hostfleet
 *   - Linux/macOS: ~/.hostfleet
 *
 * Usage:
 *   fleetHome()                   → base dir
 *   fleetHome('logs')             → debug log dir
 *   fleetHome('config.yaml')      → tool settings
 */

import { join } from 'node:path'
import { homedir } from 'node:os'

export function fleetHome(...segments: string[]): string {
  const base = process.platform === 'win32'
    ? join(process.env.APPDATA || join(homedir(), 'AppData', 'Roaming'), 'hostfleet')
    : join(homedir(), '.hostfleet')
  return segments.length ? join(base, ...segments) : base
}
