/**
 * Hostfleet — Argument Parsing
 *
 *   hostfleet [--config <path>] [--yes] [--debug] <command> [options] [-- <remote command>]
 *
 * Everything after `--` is passed through untouched (the `ssh` command).
 */

import { parseArgs } from 'node:util'
import { ConfigError } from '../errors.js'

export type CliOptions = {
  config?: string
  yes: boolean
  debug: boolean
  hosts?: string
  noReboot: boolean
  seedOnHost: boolean
  keyFile?: string
  root?: string
  help: boolean
  version: boolean
}

export type CliArgs = {
  command?: string
  positionals: string[]
  options: CliOptions
  /** Words after `--`; undefined when there was no `--` */
  passthrough?: string[]
}

function parseOwn(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: 'string', short: 'c' },
      yes: { type: 'boolean', short: 'y', default: false },
      debug: { type: 'boolean', default: false },
      hosts: { type: 'string' },
      'no-reboot': { type: 'boolean', default: false },
      'seed-on-host': { type: 'boolean', default: false },
      'key-file': { type: 'string' },
      root: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
  })
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const split = argv.indexOf('--')
  const own = split === -1 ? [...argv] : argv.slice(0, split)
  const passthrough = split === -1 ? undefined : argv.slice(split + 1)

  let parsed: ReturnType<typeof parseOwn>
  try {
    parsed = parseOwn(own)
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err))
  }

  const { values, positionals } = parsed
  const [command, ...rest] = positionals
  return {
    ...(command !== undefined && { command }),
    positionals: rest,
    options: {
      ...(values.config !== undefined && { config: values.config }),
      yes: values.yes ?? false,
      debug: values.debug ?? false,
      ...(values.hosts !== undefined && { hosts: values.hosts }),
      noReboot: values['no-reboot'] ?? false,
      seedOnHost: values['seed-on-host'] ?? false,
      ...(values['key-file'] !== undefined && { keyFile: values['key-file'] }),
      ...(values.root !== undefined && { root: values.root }),
      help: values.help ?? false,
      version: values.version ?? false,
    },
    ...(passthrough !== undefined && { passthrough }),
  }
}
