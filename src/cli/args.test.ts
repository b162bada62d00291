import { describe, it, expect } from 'vitest'
import { ConfigError } from '../errors.js'
import { parseCliArgs } from './args.js'

describe('parseCliArgs', () => {
  it('takes global flags on either side of the command', () => {
    const args = parseCliArgs(['--config', 'fleet.toml', 'install', '--hosts', 'db-00,app-00', '--no-reboot', '--seed-on-host', '-y'])
    expect(args.command).toBe('install')
    expect(args.options).toEqual({
      config: 'fleet.toml',
      yes: true,
      debug: false,
      hosts: 'db-00,app-00',
      noReboot: true,
      seedOnHost: true,
      help: false,
      version: false,
    })
    expect(args.passthrough).toBeUndefined()
  })

  it('passes everything after -- through untouched', () => {
    const args = parseCliArgs(['ssh', '--hosts', 'db-00', '--', 'journalctl', '-u', 'database', '--since', 'today'])
    expect(args.command).toBe('ssh')
    expect(args.passthrough).toEqual(['journalctl', '-u', 'database', '--since', 'today'])
  })

  it('keeps positionals after the command', () => {
    expect(parseCliArgs(['fingerprint', 'check', '--root', 'deploy'])).toMatchObject({
      command: 'fingerprint',
      positionals: ['check'],
      options: { root: 'deploy' },
    })
  })

  it('turns unknown flags into ConfigError', () => {
    expect(() => parseCliArgs(['install', '--force'])).toThrow(ConfigError)
  })
})
