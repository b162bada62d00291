/**
 * Hostfleet — Remote Channel
 *
 * One host's command session. Connection and authentication failures
 * are retried with exponential backoff; once the attempts are used up
 * the call fails with a RemoteError naming the host. Remote output is
 * streamed to the logger (visible with --debug).
 */

import { ProvisionError, RemoteError } from '../errors.js'
import type { Logger } from '../logging/logger.js'
import { failureOutput } from '../tools/exec-command.js'
import type { CommandResult } from '../tools/exec-command.js'
import { backoffDelay } from './backoff.js'
import type { BackoffPolicy, Clock } from './backoff.js'
import { SSH_CONNECTION_FAILURE } from './transport.js'
import type { RemoteTarget, Transport } from './transport.js'

export type RetryPolicy = BackoffPolicy & {
  attempts: number
}

export type ChannelOptions = {
  retry: RetryPolicy
  clock: Clock
  logger: Logger
  signal?: AbortSignal
}

export type ExecOptions = {
  input?: string
  timeoutMs?: number
  /** Keep output out of the log (secret material on stdin or stdout) */
  quiet?: boolean
  /** Single attempt: the command must not run twice, or the host is expected to drop the session */
  once?: boolean
  /** Receives stdout and stderr as they arrive, in place of the log */
  onOutput?: (chunk: string) => void
}

export class RemoteChannel {
  constructor(
    readonly target: RemoteTarget,
    private readonly transport: Transport,
    private readonly options: ChannelOptions,
  ) {}

  get host(): string {
    return this.target.host
  }

  get logger(): Logger {
    return this.options.logger
  }

  get clock(): Clock {
    return this.options.clock
  }

  get signal(): AbortSignal | undefined {
    return this.options.signal
  }

  /** Same host, different login (installer user, initrd port) */
  retarget(patch: Partial<Omit<RemoteTarget, 'host'>>): RemoteChannel {
    return new RemoteChannel({ ...this.target, ...patch }, this.transport, this.options)
  }

  /** Run a command; the remote exit code is returned, not thrown */
  exec(command: string, options: ExecOptions = {}): Promise<CommandResult> {
    this.logger.debug(`$ ${options.quiet ? command.split('\n')[0] : command}`)
    const call = () => this.transport.exec(this.target, command, this.callOptions(options))
    return options.once ? call() : this.withRetry(command, call)
  }

  /** Run a command that must succeed; returns its stdout */
  async check(command: string, what: string, options: ExecOptions = {}): Promise<string> {
    const result = await this.exec(command, options)
    if (result.exitCode !== 0) {
      throw new ProvisionError(`${what} failed: ${failureOutput(result)}`, { host: this.host })
    }
    return result.stdout
  }

  async upload(localPath: string, remotePath: string): Promise<void> {
    this.logger.debug(`upload ${localPath} → ${remotePath}`)
    const result = await this.withRetry(`upload ${localPath}`, () =>
      this.transport.upload(this.target, localPath, remotePath, this.callOptions({})))
    if (result.exitCode !== 0) {
      throw new ProvisionError(`upload of ${localPath} failed: ${failureOutput(result)}`, { host: this.host })
    }
  }

  /** Single connection attempt, no retry: does the host answer at all? */
  async ping(timeoutMs?: number): Promise<boolean> {
    const result = await this.transport.exec(this.target, 'true', {
      ...(timeoutMs !== undefined && { timeoutMs }),
      ...(this.signal && { signal: this.signal }),
    })
    return result.exitCode === 0
  }

  private callOptions(options: ExecOptions) {
    const onOutput = options.onOutput ?? (options.quiet ? undefined : (chunk: string) => this.logger.output(chunk))
    return {
      ...(options.input !== undefined && { input: options.input }),
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
      ...(this.signal && { signal: this.signal }),
      ...(onOutput && { onOutput }),
    }
  }

  private async withRetry(what: string, call: () => Promise<CommandResult>): Promise<CommandResult> {
    const { attempts } = this.options.retry
    let last: CommandResult | undefined
    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        const delay = backoffDelay(this.options.retry, attempt - 1)
        this.logger.debug(`connection failed, retry ${attempt}/${attempts - 1} in ${delay}ms`)
        await this.clock.sleep(delay, this.signal)
      }
      const result = await call()
      if (result.exitCode !== SSH_CONNECTION_FAILURE) return result
      last = result
    }
    const detail = last ? failureOutput(last) : 'no attempt made'
    throw new RemoteError(
      `cannot reach ${this.target.user}@${this.target.address} (${what.split('\n')[0]}) after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${detail}`,
      { host: this.host },
    )
  }
}
