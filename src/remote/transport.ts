/**
 * Hostfleet — SSH Transport
 *
 * The remote-shell primitive: one `ssh` or `scp` process per call.
 * Exit code 255 is ssh's own failure (connection, authentication); every
 * other code belongs to the remote command.
 */

import type { CommandResult, CommandRunner } from '../tools/exec-command.js'

export const SSH_CONNECTION_FAILURE = 255

export type KnownHostsPolicy =
  /** Record unseen keys, refuse changed ones */
  | 'accept-new'
  /** Installer and initrd keys change on every boot */
  | 'ignore'

export type RemoteTarget = {
  /** Host name from the description, used in messages */
  host: string
  address: string
  user: string
  port?: number
  knownHosts?: KnownHostsPolicy
}

export type TransportCallOptions = {
  input?: string
  timeoutMs?: number
  signal?: AbortSignal
  onOutput?: (chunk: string) => void
}

export interface Transport {
  exec(target: RemoteTarget, command: string, options?: TransportCallOptions): Promise<CommandResult>
  upload(target: RemoteTarget, localPath: string, remotePath: string, options?: TransportCallOptions): Promise<CommandResult>
}

export type SshTransportOptions = {
  connectTimeoutSec: number
}

/** `[addr]` for IPv6 where a host:path pair is parsed */
export function bracketAddress(address: string): string {
  return address.includes(':') ? `[${address}]` : address
}

export class SshTransport implements Transport {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: SshTransportOptions,
  ) {}

  sshArgs(target: RemoteTarget): string[] {
    const args = [
      '-o', `ConnectTimeout=${this.options.connectTimeoutSec}`,
      '-o', 'BatchMode=yes',
    ]
    if (target.knownHosts === 'ignore') {
      args.push('-o', 'StrictHostKeyChecking=no', '-o', 'UserKnownHostsFile=/dev/null', '-o', 'LogLevel=ERROR')
    } else {
      args.push('-o', 'StrictHostKeyChecking=accept-new')
    }
    return args
  }

  exec(target: RemoteTarget, command: string, options: TransportCallOptions = {}): Promise<CommandResult> {
    const port = target.port === undefined ? [] : ['-p', String(target.port)]
    return this.runner.run(
      ['ssh', ...this.sshArgs(target), ...port, `${target.user}@${target.address}`, '--', command],
      options,
    )
  }

  upload(target: RemoteTarget, localPath: string, remotePath: string, options: TransportCallOptions = {}): Promise<CommandResult> {
    const port = target.port === undefined ? [] : ['-P', String(target.port)]
    return this.runner.run(
      ['scp', '-r', ...this.sshArgs(target), ...port, localPath, `${target.user}@${bracketAddress(target.address)}:${remotePath}`],
      options,
    )
  }
}
