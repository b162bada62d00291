/**
 * Hostfleet — CLI Session
 *
 * Everything a command needs before it can touch the fleet: settings,
 * the resolved cluster and a FleetContext wired to the real ssh
 * transport, image compiler and key tools. Resolution happens here, so a
 * bad description fails before any remote call.
 */

import { resolve } from 'node:path'
import { loadDescription } from '../cluster/description.js'
import { selectHosts } from '../cluster/hosts-filter.js'
import { resolveCluster } from '../cluster/resolver.js'
import type { ClusterDescription, HostSpec, ResolvedCluster } from '../cluster/types.js'
import { loadSettings } from '../config/loader.js'
import { fleetHome } from '../config/paths.js'
import type { FleetSettings } from '../config/types.js'
import type { FleetContext } from '../fleet/context.js'
import { CommandImageCompiler } from '../image/compiler.js'
import { Logger } from '../logging/logger.js'
import type { LogSink } from '../logging/logger.js'
import type { Clock } from '../remote/backoff.js'
import { RemoteChannel } from '../remote/channel.js'
import type { RetryPolicy } from '../remote/channel.js'
import { ShellHostAgent } from '../remote/host-agent.js'
import type { HostAgent } from '../remote/host-agent.js'
import { SshTransport } from '../remote/transport.js'
import type { Transport } from '../remote/transport.js'
import { SecretLayout, secretDirectory } from '../secrets/layout.js'
import { KeyMaterial } from '../secrets/openssl.js'
import { SecretProvisioner } from '../secrets/provisioner.js'
import type { CommandRunner } from '../tools/exec-command.js'
import type { ReportSink } from '../ui/report.js'
import type { CliOptions } from './args.js'
import type { Confirm } from './prompt.js'

/** The process surroundings; tests pass in-memory sinks and fakes */
export type CliIO = {
  stdout: ReportSink
  stderr: LogSink
  env: NodeJS.ProcessEnv
  cwd: string
  runner: CommandRunner
  /** ssh over `runner` when unset */
  transport?: Transport
  clock: Clock
  confirm: Confirm
  signal?: AbortSignal
  /** Tool settings file, ~/.hostfleet/config.yaml when unset */
  settingsPath?: string
  skipDotenv?: boolean
}

export type Session = {
  settings: FleetSettings
  logger: Logger
  description: ClusterDescription
  cluster: ResolvedCluster
}

export function loadToolSettings(io: CliIO): FleetSettings {
  return loadSettings({
    env: io.env,
    ...(io.settingsPath !== undefined && { path: io.settingsPath }),
    ...(io.skipDotenv !== undefined && { skipDotenv: io.skipDotenv }),
  })
}

export function createLogger(io: CliIO, settings: FleetSettings, options: CliOptions): Logger {
  return new Logger({ debug: options.debug || settings.debug, logDir: settings.log_dir, sink: io.stderr })
}

export function openSession(io: CliIO, options: CliOptions): Session {
  const settings = loadToolSettings(io)
  const logger = createLogger(io, settings, options)

  const configPath = resolve(io.cwd, options.config ?? settings.config_path)
  logger.debug(`cluster description ${configPath}`)
  const description = loadDescription(configPath)
  const cluster = resolveCluster(description, { upgrade: settings.upgrade })
  for (const warning of cluster.warnings) logger.warn(warning)

  return { settings, logger, description, cluster }
}

/** `--hosts` applied; every host when absent */
export function targetHosts(session: Session, options: CliOptions): HostSpec[] {
  return selectHosts(session.cluster.hosts, options.hosts)
}

export function fleetContext(io: CliIO, session: Session): FleetContext {
  const { settings, logger, description, cluster } = session
  const { runner, clock, signal } = io
  const transport = io.transport ?? new SshTransport(runner, { connectTimeoutSec: settings.remote.connect_timeout_sec })
  const retry: RetryPolicy = {
    attempts: settings.remote.retry_attempts,
    initialDelayMs: settings.remote.retry_initial_delay_ms,
    maxDelayMs: settings.remote.retry_max_delay_ms,
  }

  const provisioner = new SecretProvisioner(
    new SecretLayout(secretDirectory(description)),
    new KeyMaterial(runner),
    logger,
  )
  const compiler = new CommandImageCompiler(runner, {
    builder: cluster.global.image_builder,
    copier: cluster.global.image_copier,
    source: cluster.global.source_repository,
    descriptorDir: fleetHome('descriptors'),
    logger,
  })

  const agents = new Map<string, HostAgent>()
  const agentFor = (spec: HostSpec): HostAgent => {
    let agent = agents.get(spec.name)
    if (!agent) {
      const channel = new RemoteChannel(
        { host: spec.name, address: spec.sshHostname, user: 'root' },
        transport,
        { retry, clock, logger: logger.child(spec.name), ...(signal && { signal }) },
      )
      agent = new ShellHostAgent({ spec, channel, compiler, provisioner, runner })
      agents.set(spec.name, agent)
    }
    return agent
  }

  return {
    cluster,
    settings,
    logger,
    clock,
    ...(signal && { signal }),
    provisioner,
    compiler,
    agentFor,
  }
}
