/**
 * Hostfleet — Image Compiler
 *
 * The system-image build system is an external collaborator; this is
 * the seam the orchestrators call, plus an adapter that drives it through
 * the command templates in the description's `global` section.
 *
 * Templates are split on whitespace, then `{name}` placeholders are
 * substituted per argument:
 *   image_builder: {host} {source} {descriptor} {descriptors}
 *                  stdout: system image reference, then optionally the
 *                  disk script reference, one per line
 *   image_copier:  {store} {image}
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { ConfigError, ProvisionError } from '../errors.js'
import type { Logger } from '../logging/logger.js'
import { bracketAddress } from '../remote/transport.js'
import type { RemoteTarget } from '../remote/transport.js'
import { failureOutput } from '../tools/exec-command.js'
import type { CommandRunner } from '../tools/exec-command.js'

export type SystemImage = {
  host: string
  /** Compiler-specific reference, a store path for nix */
  reference: string
  /** Partitions, formats and mounts the target disks under /mnt (install only) */
  diskScript?: string
  descriptor: string
}

export type DeliverOptions = {
  /** Install into a mounted root instead of the running system */
  root?: string
  signal?: AbortSignal
}

export interface ImageCompiler {
  compile(host: string, descriptor: string, signal?: AbortSignal): Promise<SystemImage>
  /** Copy one reference (system image or disk script) to a host's store */
  deliver(host: string, reference: string, target: RemoteTarget, options?: DeliverOptions): Promise<void>
}

export function expandTemplate(template: string, values: Record<string, string>): string[] {
  return template.trim().split(/\s+/).map(arg =>
    arg.replace(/\{(\w+)\}/g, (_, key: string) => {
      const value = values[key]
      if (value === undefined) throw new ConfigError(`unknown placeholder {${key}} in '${template}'`)
      return value
    }),
  )
}

export type CommandImageCompilerOptions = {
  builder: string
  copier: string
  source: string
  /** Where descriptors are written for the builder to read */
  descriptorDir: string
  logger: Logger
}

export class CommandImageCompiler implements ImageCompiler {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: CommandImageCompilerOptions,
  ) {}

  async compile(host: string, descriptor: string, signal?: AbortSignal): Promise<SystemImage> {
    const { descriptorDir, logger } = this.options
    mkdirSync(descriptorDir, { recursive: true })
    const descriptorPath = join(descriptorDir, `${host}.yaml`)
    writeFileSync(descriptorPath, descriptor, 'utf-8')

    const argv = expandTemplate(this.options.builder, {
      host,
      source: this.options.source,
      descriptor: descriptorPath,
      descriptors: descriptorDir,
    })
    logger.debug(`$ ${argv.join(' ')}`)
    const result = await this.runner.run(argv, {
      ...(signal && { signal }),
      onOutput: chunk => logger.output(chunk),
    })
    if (result.exitCode !== 0) {
      throw new ProvisionError(`image compiler failed: ${failureOutput(result)}`, { host, stage: 'Compile' })
    }

    const [reference, diskScript] = result.stdout.split('\n').map(l => l.trim()).filter(Boolean)
    if (reference === undefined) {
      throw new ProvisionError('image compiler printed no image reference', { host, stage: 'Compile' })
    }
    return { host, reference, ...(diskScript !== undefined && { diskScript }), descriptor }
  }

  async deliver(host: string, reference: string, target: RemoteTarget, options: DeliverOptions = {}): Promise<void> {
    const login = `${target.user}@${bracketAddress(target.address)}`
    const store = options.root ? `ssh-ng://${login}?remote-store=local?root=${options.root}` : `ssh-ng://${login}`
    const sshOpts = [
      ...(target.port === undefined ? [] : ['-p', String(target.port)]),
      ...(target.knownHosts === 'ignore' ? ['-o', 'StrictHostKeyChecking=no', '-o', 'UserKnownHostsFile=/dev/null'] : []),
    ]

    const argv = expandTemplate(this.options.copier, { store, image: reference })
    this.options.logger.debug(`$ ${argv.join(' ')}`)
    const result = await this.runner.run(argv, {
      env: { ...process.env, NIX_SSHOPTS: sshOpts.join(' ') },
      ...(options.signal && { signal: options.signal }),
      onOutput: chunk => this.options.logger.output(chunk),
    })
    if (result.exitCode !== 0) {
      throw new ProvisionError(`copying ${reference} failed: ${failureOutput(result)}`, { host })
    }
  }
}
