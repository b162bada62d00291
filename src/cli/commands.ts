/**
 * Hostfleet — Command Registry
 *
 * One entry per subcommand. Commands that change hosts ask before they
 * start unless --yes is given.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { renderExample } from '../cluster/example.js'
import type { HostSpec } from '../cluster/types.js'
import { FINGERPRINT_FILE, checkFingerprint, generateFingerprint, readFingerprint, renderFingerprint } from '../drift/fingerprint.js'
import { collectSystemInfo } from '../drift/system-info.js'
import { ConfigError, describeError } from '../errors.js'
import type { HostOutcome } from '../fleet/context.js'
import { rebootHosts, runCommand, unlockHosts } from '../fleet/maintenance.js'
import { renderDescriptor } from '../image/descriptor.js'
import { install } from '../install/orchestrator.js'
import { bundleFor, secretDirectory, SecretLayout } from '../secrets/layout.js'
import { printReport } from '../ui/report.js'
import { dryUpdate, rollback, update } from '../upgrade/orchestrator.js'
import { VERSION } from '../version.js'
import type { CliArgs } from './args.js'
import { createLogger, fleetContext, loadToolSettings, openSession, targetHosts } from './session.js'
import type { CliIO, Session } from './session.js'

export type CommandInput = {
  io: CliIO
  args: CliArgs
}

export type Command = {
  name: string
  usage: string
  summary: string
  /** Exit code */
  run(input: CommandInput): Promise<number>
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function names(hosts: readonly HostSpec[]): string {
  return hosts.map(h => h.name).join(', ')
}

async function confirmed(input: CommandInput, session: Session, question: string): Promise<boolean> {
  if (input.args.options.yes) return true
  if (await input.io.confirm(question)) return true
  session.logger.error('aborted, nothing was changed')
  return false
}

/** `<host> [<stage>] <message>` per failure on stderr; exit 1 if any host failed */
function listFailures(io: CliIO, outcomes: readonly HostOutcome[]): number {
  const failures = outcomes.flatMap(o => (o.error ? [o.error] : []))
  for (const error of failures) io.stderr.write(describeError(error) + '\n')
  return failures.length === 0 ? 0 : 1
}

function finish(input: CommandInput, command: string, outcomes: readonly HostOutcome[]): number {
  printReport(input.io.stdout, command, outcomes)
  return listFailures(input.io, outcomes)
}

/** A host-changing command: resolve, select, confirm, run, report */
function fleetCommand(
  name: string,
  usage: string,
  summary: string,
  question: (hosts: string) => string,
  operate: (input: CommandInput, session: Session, targets: HostSpec[]) => Promise<HostOutcome[]>,
): Command {
  return {
    name,
    usage,
    summary,
    async run(input) {
      const session = openSession(input.io, input.args.options)
      const targets = targetHosts(session, input.args.options)
      if (!(await confirmed(input, session, question(names(targets))))) return 1
      return finish(input, name, await operate(input, session, targets))
    },
  }
}

// ── Commands ────────────────────────────────────────────────────────────────

const generateExample: Command = {
  name: 'generate-example',
  usage: 'generate-example',
  summary: 'print a template cluster description',
  async run({ io }) {
    io.stdout.write(renderExample())
    return 0
  },
}

const generateConfig: Command = {
  name: 'generate-config',
  usage: 'generate-config <directory>',
  summary: 'write every host\'s system descriptor, without contacting any host',
  async run({ io, args }) {
    const [directory] = args.positionals
    if (directory === undefined) throw new ConfigError('generate-config needs an output directory')

    const session = openSession(io, args.options)
    const { cluster, description, logger } = session
    const layout = new SecretLayout(secretDirectory(description))
    const out = resolve(io.cwd, directory)
    mkdirSync(out, { recursive: true })

    for (const spec of targetHosts(session, args.options)) {
      const path = join(out, `${spec.name}.yaml`)
      writeFileSync(path, renderDescriptor(spec, cluster.global, bundleFor(spec, layout, cluster.global)), 'utf-8')
      logger.info(`wrote ${path}`)
    }
    return 0
  },
}

const installCommand = fleetCommand(
  'install',
  'install --hosts <filter> [--no-reboot] [--seed-on-host]',
  'wipe and install hosts from scratch',
  hosts => `install wipes every disk of ${hosts}. Continue?`,
  ({ io, args }, session, targets) =>
    install(fleetContext(io, session), targets, {
      noReboot: args.options.noReboot,
      seedOnHost: args.options.seedOnHost,
    }),
)

const dryUpdateCommand: Command = {
  name: 'dry-update',
  usage: 'dry-update --hosts <filter>',
  summary: 'show what update would change, touching nothing',
  async run(input) {
    const session = openSession(input.io, input.args.options)
    const targets = targetHosts(session, input.args.options)
    return finish(input, 'dry-update', await dryUpdate(fleetContext(input.io, session), targets))
  },
}

const updateCommand = fleetCommand(
  'update',
  'update --hosts <filter>',
  'stage and activate a new system generation, without a firmware reboot',
  hosts => `update ${hosts} in stagger order. Continue?`,
  ({ io }, session, targets) => update(fleetContext(io, session), targets),
)

const rollbackCommand = fleetCommand(
  'rollback',
  'rollback --hosts <filter>',
  'return to the generation before the current one',
  hosts => `roll back ${hosts} by one generation. Continue?`,
  ({ io }, session, targets) => rollback(fleetContext(io, session), targets),
)

const sshCommand: Command = {
  name: 'ssh',
  usage: 'ssh --hosts <filter> -- <remote command...>',
  summary: 'run a command on hosts as root',
  async run(input) {
    const { io, args } = input
    const command = (args.passthrough ?? []).join(' ').trim()
    if (command === '') throw new ConfigError('ssh needs a command after --')

    const session = openSession(io, args.options)
    const targets = targetHosts(session, args.options)
    const outcomes = await runCommand(fleetContext(io, session), targets, command, (host, line) => {
      io.stdout.write(`${host}: ${line}\n`)
    })
    return listFailures(io, outcomes)
  },
}

const rebootCommand = fleetCommand(
  'reboot',
  'reboot --hosts <filter>',
  'reboot hosts one quorum member at a time and wait for them',
  hosts => `reboot ${hosts}. Continue?`,
  ({ io }, session, targets) => rebootHosts(fleetContext(io, session), targets),
)

const unlockCommand: Command = {
  name: 'unlock',
  usage: 'unlock --hosts <filter> [--key-file <path>]',
  summary: 'send the disk key to hosts waiting in their initrd',
  async run(input) {
    const { io, args } = input
    const session = openSession(io, args.options)
    const targets = targetHosts(session, args.options)
    const keyFile = args.options.keyFile === undefined ? undefined : resolve(io.cwd, args.options.keyFile)
    const outcomes = await unlockHosts(fleetContext(io, session), targets, { ...(keyFile !== undefined && { keyFile }) })
    return finish(input, 'unlock', outcomes)
  },
}

const systemInfoCommand: Command = {
  name: 'system-info',
  usage: 'system-info --hosts <filter> [--root <dir>]',
  summary: 'show each host\'s recorded source state and versions',
  async run({ io, args }) {
    const session = openSession(io, args.options)
    const targets = targetHosts(session, args.options)
    const local = readFingerprint(resolve(io.cwd, args.options.root ?? '.'))
    const outcomes = await collectSystemInfo(fleetContext(io, session), targets, local, VERSION)

    for (const outcome of outcomes.filter(o => o.ok)) {
      const fields = (outcome.detail ?? '').split('\n').map(line => `  ${line}`)
      io.stdout.write([outcome.host, ...fields].join('\n') + '\n')
    }
    return listFailures(io, outcomes)
  },
}

const fingerprintCommand: Command = {
  name: 'fingerprint',
  usage: 'fingerprint generate|check [--root <dir>]',
  summary: `record or verify ${FINGERPRINT_FILE} for a deployment repository`,
  async run({ io, args }) {
    const [action] = args.positionals
    const root = resolve(io.cwd, args.options.root ?? '.')
    const logger = createLogger(io, loadToolSettings(io), args.options)

    switch (action) {
      case 'generate': {
        const fingerprint = await generateFingerprint(root, io.runner)
        logger.info(`wrote ${join(root, FINGERPRINT_FILE)}`)
        io.stdout.write(renderFingerprint(fingerprint))
        return 0
      }
      case 'check': {
        const fingerprint = await checkFingerprint(root, io.runner)
        io.stdout.write(`fingerprint matches: ${fingerprint.digest} (revision ${fingerprint.revision})\n`)
        return 0
      }
      default:
        throw new ConfigError(`fingerprint needs 'generate' or 'check', got '${action ?? ''}'`)
    }
  },
}

export const COMMANDS: readonly Command[] = [
  generateExample,
  generateConfig,
  installCommand,
  dryUpdateCommand,
  updateCommand,
  rollbackCommand,
  sshCommand,
  rebootCommand,
  unlockCommand,
  systemInfoCommand,
  fingerprintCommand,
]

export function findCommand(name: string): Command | undefined {
  return COMMANDS.find(c => c.name === name)
}

export function usage(): string {
  const width = Math.max(...COMMANDS.map(c => c.usage.length))
  return [
    `hostfleet ${VERSION}`,
    '',
    'Usage: hostfleet [--config <path>] [--yes] [--debug] <command>',
    '',
    ...COMMANDS.map(c => `  ${c.usage.padEnd(width)}  ${c.summary}`),
    '',
  ].join('\n')
}
