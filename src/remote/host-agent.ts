/**
 * Hostfleet — Host Agent
 *
 * Everything the orchestrators ask of one host, as named operations.
 * The shell implementation speaks to three sshd instances over the same
 * address: the transient installer, the initrd (port 2222, disk still
 * locked) and the installed system.
 *
 * Host-side facts come from `hostfleet-ctl`, the control tool every
 * image ships:
 *   hostfleet-ctl readiness --role <role>   exit 0 when the role is serving
 *   hostfleet-ctl versions                  `component=version` lines
 */

import { parse as parseYaml } from 'yaml'
import type { HostSpec, Role } from '../cluster/types.js'
import { ProvisionError, RemoteError } from '../errors.js'
import { SYSTEM_PROFILE, parseHandoff, renderActivationScript } from '../image/activation.js'
import type { Handoff } from '../image/activation.js'
import type { ImageCompiler, SystemImage } from '../image/compiler.js'
import type { SecretBundle } from '../secrets/layout.js'
import type { SecretProvisioner } from '../secrets/provisioner.js'
import { failureOutput, shellQuote } from '../tools/exec-command.js'
import type { CommandRunner } from '../tools/exec-command.js'
import type { RemoteChannel } from './channel.js'
import { SSH_CONNECTION_FAILURE } from './transport.js'

export const INITRD_SSH_PORT = 2222
export const REMOTE_FINGERPRINT_PATH = '/etc/hostfleet/fingerprint.yaml'
export const CONTROL_TOOL = 'hostfleet-ctl'
const BOOT_ID_PATH = '/proc/sys/kernel/random/boot_id'

/** Generation profile links look like `system-42-link` */
const GENERATION_LINK = /system-(\d+)-link$/

export type ReadinessReport = {
  ready: boolean
  detail: string
}

export type UnlockOutcome = 'unlocked' | 'already-unlocked' | 'unreachable'

export type HostInfo = {
  /** Raw fingerprint document, absent on hosts installed without one */
  fingerprint?: Record<string, unknown>
  versions: Record<string, string>
}

export type InstallTarget = 'installer' | 'system'

export interface HostAgent {
  readonly host: string

  // ── Installation ──
  /** Start the installer; returns the boot id of the system it replaces */
  bootInstaller(installerUrl: string): Promise<string>
  /** The installer answers, not the system it replaced */
  installerReachable(previousBootId: string, timeoutMs?: number): Promise<boolean>
  wipeDisks(disks: readonly string[]): Promise<void>
  writeImage(image: SystemImage): Promise<void>
  pushSecrets(bundle: SecretBundle, target: InstallTarget): Promise<void>
  /** Reboot into the written system; returns the installer's boot id */
  rebootInstaller(): Promise<string>
  forgetHostKey(): Promise<void>

  // ── Running system ──
  reachable(timeoutMs?: number): Promise<boolean>
  unlock(diskKey: string): Promise<UnlockOutcome>
  readiness(role: Role, timeoutMs?: number): Promise<ReadinessReport>
  currentGeneration(): Promise<number>
  generations(): Promise<number[]>
  /** Descriptor recorded in a generation; undefined when it has none */
  readDescriptor(generation: number): Promise<string | undefined>
  /** Copy the image and make it the newest generation; returns its number */
  stageImage(image: SystemImage): Promise<number>
  switchGeneration(generation: number): Promise<void>
  activate(): Promise<Handoff>
  bootId(): Promise<string>
  systemInfo(): Promise<HostInfo>
  reboot(): Promise<void>
  /** Operator command; output streams through `onOutput`, exit code returned */
  run(command: string, onOutput: (chunk: string) => void): Promise<number | null>
}

export function parseGeneration(link: string): number | undefined {
  const match = GENERATION_LINK.exec(link.trim())
  return match ? Number(match[1]) : undefined
}

export function generationPath(generation: number): string {
  return `${SYSTEM_PROFILE}-${generation}-link`
}

export function parseVersions(stdout: string): Record<string, string> {
  const versions: Record<string, string> = {}
  for (const line of stdout.split('\n')) {
    const eq = line.indexOf('=')
    if (eq <= 0) continue
    versions[line.slice(0, eq).trim()] = line.slice(eq + 1).trim()
  }
  return versions
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export type ShellHostAgentOptions = {
  spec: HostSpec
  /** Logged in as root on the installed system */
  channel: RemoteChannel
  compiler: ImageCompiler
  provisioner: SecretProvisioner
  /** Runs local commands (known-hosts cleanup) */
  runner: CommandRunner
}

export class ShellHostAgent implements HostAgent {
  private readonly spec: HostSpec
  private readonly system: RemoteChannel
  /** Whatever the machine runs before installation, as the install user */
  private readonly preinstall: RemoteChannel
  private readonly installer: RemoteChannel
  private readonly initrd: RemoteChannel

  constructor(private readonly options: ShellHostAgentOptions) {
    this.spec = options.spec
    this.system = options.channel
    this.preinstall = options.channel.retarget({ user: options.spec.installSshUser, knownHosts: 'ignore' })
    this.installer = options.channel.retarget({ user: 'root', knownHosts: 'ignore' })
    this.initrd = options.channel.retarget({ user: 'root', port: INITRD_SSH_PORT, knownHosts: 'ignore' })
  }

  get host(): string {
    return this.spec.name
  }

  // ── Installation ──────────────────────────────────────────────────────────

  async bootInstaller(installerUrl: string): Promise<string> {
    const sudo = this.spec.installSshUser === 'root' ? '' : 'sudo '
    const script = [
      'set -eu',
      `cat ${BOOT_ID_PATH}`,
      `${sudo}mkdir -p /root/kexec`,
      `curl -fsSL ${shellQuote(installerUrl)} | ${sudo}tar -xzf - -C /root/kexec`,
      `${sudo}nohup /root/kexec/kexec/run >/dev/null 2>&1 &`,
      '',
    ].join('\n')
    const stdout = await this.preinstall.check('sh -s', 'installer boot', { input: script })
    return stdout.trim()
  }

  async installerReachable(previousBootId: string, timeoutMs?: number): Promise<boolean> {
    const result = await this.installer.exec(`cat ${BOOT_ID_PATH}`, {
      once: true,
      ...(timeoutMs !== undefined && { timeoutMs }),
    })
    return result.exitCode === 0 && result.stdout.trim() !== previousBootId
  }

  async wipeDisks(disks: readonly string[]): Promise<void> {
    await this.installer.check(`wipefs --all --force ${disks.map(shellQuote).join(' ')}`, 'disk wipe')
  }

  /** Partition and mount with the disk script, then install the system under /mnt */
  async writeImage(image: SystemImage): Promise<void> {
    const { compiler } = this.options
    const signal = this.installer.signal
    if (image.diskScript === undefined) {
      throw new ProvisionError('image has no disk script, cannot partition', { host: this.host })
    }
    await compiler.deliver(this.host, image.diskScript, this.installer.target, { ...(signal && { signal }) })
    await this.installer.check(shellQuote(image.diskScript), 'disk partitioning')
    await compiler.deliver(this.host, image.reference, this.installer.target, { root: '/mnt', ...(signal && { signal }) })
    await this.installer.check(
      `nixos-install --no-root-passwd --no-channel-copy --root /mnt --system ${shellQuote(image.reference)}`,
      'system install',
    )
  }

  pushSecrets(bundle: SecretBundle, target: InstallTarget): Promise<void> {
    return target === 'installer'
      ? this.options.provisioner.push(this.installer, bundle, { root: '/mnt' })
      : this.options.provisioner.push(this.system, bundle)
  }

  async rebootInstaller(): Promise<string> {
    const id = await this.installer.check(`cat ${BOOT_ID_PATH}`, 'reading the installer boot id')
    await this.detachedReboot(this.installer)
    return id.trim()
  }

  async forgetHostKey(): Promise<void> {
    const address = this.system.target.address
    const result = await this.options.runner.run(['ssh-keygen', '-R', address])
    if (result.exitCode !== 0) {
      // known_hosts may not exist yet
      this.system.logger.warn(`could not forget host key of ${address}: ${failureOutput(result)}`)
    }
  }

  // ── Running system ────────────────────────────────────────────────────────

  reachable(timeoutMs?: number): Promise<boolean> {
    return this.system.ping(timeoutMs)
  }

  async unlock(diskKey: string): Promise<UnlockOutcome> {
    if (await this.system.ping()) return 'already-unlocked'
    if (!(await this.initrd.ping())) return 'unreachable'

    const result = await this.initrd.exec('cryptsetup-askpass', { input: `${diskKey}\n`, quiet: true, once: true })
    // askpass exits once the last prompt is answered; the initrd may drop the session first
    if (result.exitCode !== 0 && result.exitCode !== SSH_CONNECTION_FAILURE) {
      throw new ProvisionError(`disk unlock failed: ${failureOutput(result)}`, { host: this.host })
    }
    return 'unlocked'
  }

  async readiness(role: Role, timeoutMs?: number): Promise<ReadinessReport> {
    const result = await this.system.exec(`${CONTROL_TOOL} readiness --role ${role}`, {
      ...(timeoutMs !== undefined && { timeoutMs }),
    })
    const detail = (result.stdout.trim() || result.stderr.trim() || `exit ${result.exitCode}`).split('\n').slice(-1)[0]
    return { ready: result.exitCode === 0, detail }
  }

  async currentGeneration(): Promise<number> {
    const link = await this.system.check(`readlink ${SYSTEM_PROFILE}`, 'reading the current generation')
    const generation = parseGeneration(link)
    if (generation === undefined) {
      throw new ProvisionError(`unexpected system profile link '${link.trim()}'`, { host: this.host })
    }
    return generation
  }

  async generations(): Promise<number[]> {
    const listing = await this.system.check(`ls -1 ${SYSTEM_PROFILE.replace(/\/system$/, '')}`, 'listing generations')
    return listing
      .split('\n')
      .map(parseGeneration)
      .filter((g): g is number => g !== undefined)
      .sort((a, b) => a - b)
  }

  async readDescriptor(generation: number): Promise<string | undefined> {
    const result = await this.system.exec(`cat ${generationPath(generation)}/etc/hostfleet/descriptor.yaml`)
    return result.exitCode === 0 ? result.stdout : undefined
  }

  async stageImage(image: SystemImage): Promise<number> {
    const signal = this.system.signal
    await this.options.compiler.deliver(this.host, image.reference, this.system.target, { ...(signal && { signal }) })
    await this.system.check(`nix-env -p ${SYSTEM_PROFILE} --set ${shellQuote(image.reference)}`, 'staging the image')
    return this.currentGeneration()
  }

  async switchGeneration(generation: number): Promise<void> {
    await this.system.check(`nix-env -p ${SYSTEM_PROFILE} --switch-generation ${generation}`, `switching to generation ${generation}`)
  }

  async activate(): Promise<Handoff> {
    const stdout = await this.system.check('sh -s', 'activation', { input: renderActivationScript() })
    const handoff = parseHandoff(stdout)
    if (!handoff) throw new ProvisionError('activation script did not hand over', { host: this.host })
    return handoff
  }

  async bootId(): Promise<string> {
    const id = await this.system.check(`cat ${BOOT_ID_PATH}`, 'reading the boot id')
    return id.trim()
  }

  async systemInfo(): Promise<HostInfo> {
    const fingerprint = await this.system.exec(`cat ${REMOTE_FINGERPRINT_PATH}`)
    const versions = await this.system.check(`${CONTROL_TOOL} versions`, 'reading versions')

    let recorded: Record<string, unknown> | undefined
    if (fingerprint.exitCode === 0) {
      let parsed: unknown
      try {
        parsed = parseYaml(fingerprint.stdout)
      } catch (err) {
        throw new RemoteError(`${REMOTE_FINGERPRINT_PATH} is not valid YAML`, { host: this.host, cause: err })
      }
      if (isRecord(parsed)) recorded = parsed
    }
    return { ...(recorded && { fingerprint: recorded }), versions: parseVersions(versions) }
  }

  async reboot(): Promise<void> {
    await this.detachedReboot(this.system)
  }

  /** Runs once: an operator command is not assumed safe to repeat */
  async run(command: string, onOutput: (chunk: string) => void): Promise<number | null> {
    const result = await this.system.exec(command, { once: true, onOutput })
    if (result.exitCode === SSH_CONNECTION_FAILURE) {
      throw new RemoteError(
        `ssh exited with ${SSH_CONNECTION_FAILURE}: unreachable, or the command ended the session`,
        { host: this.host },
      )
    }
    return result.exitCode
  }

  /** The session may be cut by the shutdown; 255 counts as success here */
  private async detachedReboot(channel: RemoteChannel): Promise<void> {
    const result = await channel.exec('nohup sh -c "sleep 1; reboot" >/dev/null 2>&1 &', { once: true })
    if (result.exitCode !== 0 && result.exitCode !== SSH_CONNECTION_FAILURE) {
      throw new ProvisionError(`reboot failed: ${failureOutput(result)}`, { host: this.host })
    }
  }
}
