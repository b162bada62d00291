/**
 * Hostfleet — Secret Provisioner
 *
 * Create-once key material and its delivery. `ensure` only ever adds
 * missing files: everything is generated in a scratch directory inside
 * the secrets tree and renamed into place, keys before certificates, so
 * an interrupted run can simply be repeated.
 */

import { chmodSync, existsSync, mkdirSync, mkdtempSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import { SecretError, toFleetError } from '../errors.js'
import type { HostSpec } from '../cluster/types.js'
import type { Logger } from '../logging/logger.js'
import type { RemoteChannel } from '../remote/channel.js'
import { DATABASE_CLIENT_USER, SERVICE_USERS } from './layout.js'
import type { SecretBundle, SecretEntry, SecretLayout } from './layout.js'
import { generateDiskKey } from './openssl.js'
import type { KeyMaterial, LeafRequest } from './openssl.js'
import { renderPushScript } from './push-script.js'
import { bakeMacaroons, newMnemonic, readMnemonic } from './wallet.js'
import type { StagedFile } from './push-script.js'

const CA_NAME = 'hostfleet'

export type EnsureOptions = {
  /** Create an application host's wallet seed and API macaroons */
  seed?: boolean
}

export type PushOptions = {
  /** Prefix for every remote path (`/mnt` while the installer runs) */
  root?: string
}

export class SecretProvisioner {
  constructor(
    readonly layout: SecretLayout,
    private readonly keys: KeyMaterial,
    private readonly logger: Logger,
  ) {}

  /**
   * Create whatever `spec` still lacks. The fleet CA is created only when
   * `spec` is the primary host; anyone else finding it missing is an error.
   * Returns the files created.
   */
  async ensure(spec: HostSpec, primary: string, options: EnsureOptions = {}): Promise<string[]> {
    const created: string[] = []
    try {
      await this.ensureCa(spec.name === primary, primary, created)

      const client = DATABASE_CLIENT_USER[spec.role]
      await this.ensureLeaf(
        { key: this.layout.clientKey(client), cert: this.layout.clientCert(client) },
        { commonName: client, dnsNames: [], ipAddresses: [], usage: 'client' },
        created,
      )

      if (spec.role === 'database') {
        await this.ensureLeaf(
          { key: this.layout.nodeKey(spec.name), cert: this.layout.nodeCert(spec.name) },
          { commonName: 'node', dnsNames: [spec.name, 'localhost'], ipAddresses: ['127.0.0.1', ...hostAddresses(spec)], usage: 'server' },
          created,
        )
      } else {
        await this.ensureLeaf(
          { key: this.layout.apiKey(spec.name), cert: this.layout.apiCert(spec.name) },
          { commonName: spec.name, dnsNames: [spec.name, 'localhost'], ipAddresses: ['127.0.0.1', '::1', ...hostAddresses(spec)], usage: 'server' },
          created,
        )
      }

      const sshKey = this.layout.sshHostKey(spec.name)
      if (!existsSync(sshKey)) {
        await this.stage([sshKey, `${sshKey}.pub`], created, async ([key]) => {
          await this.keys.createSshHostKey(key, `${spec.name}-initrd`)
        })
      }

      const diskKey = this.layout.diskKey(spec.name)
      if (!existsSync(diskKey)) {
        await this.stage([diskKey], created, async ([out]) => {
          writeFileSync(out, generateDiskKey(), { mode: 0o600 })
        })
      }

      if (spec.role === 'application' && options.seed) await this.ensureSeed(spec.name, created)
    } catch (err) {
      throw toFleetError(err, { host: spec.name })
    }

    for (const path of created) this.logger.info(`created ${path}`)
    return created
  }

  /** Send a bundle in one remote script; see renderPushScript */
  async push(channel: RemoteChannel, bundle: SecretBundle, options: PushOptions = {}): Promise<void> {
    const files = bundle.entries.map(entry => this.readEntry(bundle.host, entry))
    const script = renderPushScript(files, options.root ?? '')
    await channel.check('sh -s', 'secret push', { input: script, quiet: true })
    channel.logger.info(`pushed ${files.length} secret files`)
  }

  private readEntry(host: string, entry: SecretEntry): StagedFile {
    let content: Buffer
    if (entry.source.kind === 'inline') {
      content = Buffer.from(entry.source.content, 'utf-8')
    } else if (existsSync(entry.source.path)) {
      content = readFileSync(entry.source.path)
    } else {
      throw new SecretError(`missing ${entry.source.path} for ${entry.remotePath}`, { host })
    }
    return {
      remotePath: entry.remotePath,
      content,
      mode: entry.mode,
      uid: SERVICE_USERS[entry.owner],
      ...(entry.keepExisting && { keepExisting: true }),
    }
  }

  /** The seed is written once; missing macaroons are baked again from it */
  private async ensureSeed(host: string, created: string[]): Promise<void> {
    const mnemonicPath = this.layout.mnemonic(host)
    if (!existsSync(mnemonicPath)) {
      await this.stage([mnemonicPath], created, async ([out]) => {
        writeFileSync(out, `${newMnemonic()}\n`, { mode: 0o600 })
      })
    }

    const names = (['access', 'admin', 'readonly'] as const).filter(name => !existsSync(this.layout.macaroon(host, name)))
    if (names.length === 0) return
    const baked = bakeMacaroons(readMnemonic(mnemonicPath))
    await this.stage(names.map(name => this.layout.macaroon(host, name)), created, async staged => {
      names.forEach((name, i) => writeFileSync(staged[i], name === 'access' ? baked.access : `${baked[name]}\n`))
    })
  }

  private async ensureCa(isPrimary: boolean, primary: string, created: string[]): Promise<void> {
    const { caKey, caCert } = this.layout
    const hasKey = existsSync(caKey)
    const hasCert = existsSync(caCert)
    if (hasKey && hasCert) return

    if (hasCert) throw new SecretError(`${caCert} exists without its key ${caKey}`)
    if (!isPrimary) {
      throw new SecretError(`fleet CA ${caCert} is missing; it is created together with the primary host ${primary}`)
    }

    if (!hasKey) {
      await this.stage([caKey], created, ([key]) => this.keys.createKey(key, 'secp384r1'))
    }
    await this.stage([caCert], created, ([cert]) => this.keys.selfSignCa(caKey, cert, CA_NAME))
  }

  private async ensureLeaf(files: { key: string; cert: string }, request: LeafRequest, created: string[]): Promise<void> {
    const hasKey = existsSync(files.key)
    const hasCert = existsSync(files.cert)
    if (hasKey && hasCert) return
    if (hasCert) throw new SecretError(`${files.cert} exists without its key ${files.key}`)

    const ca = { key: this.layout.caKey, cert: this.layout.caCert }
    if (!hasKey) {
      await this.stage([files.key, files.cert], created, async ([key, cert], scratch) => {
        await this.keys.createKey(key)
        await this.keys.signLeaf(scratch, ca, request, key, cert)
      })
    } else {
      // key survived an interrupted run: certify it
      await this.stage([files.cert], created, ([cert], scratch) => this.keys.signLeaf(scratch, ca, request, files.key, cert))
    }
  }

  /**
   * Run `produce` against scratch paths (same basenames as `finals`), then
   * move each result into place. Never replaces an existing file.
   */
  private async stage(
    finals: string[],
    created: string[],
    produce: (staged: string[], scratch: string) => Promise<void>,
  ): Promise<void> {
    mkdirSync(this.layout.root, { recursive: true, mode: 0o700 })
    const scratch = mkdtempSync(join(this.layout.root, '.staging-'))
    try {
      const staged = finals.map(final => join(scratch, basename(final)))
      await produce(staged, scratch)
      finals.forEach((final, i) => {
        if (existsSync(final)) throw new SecretError(`refusing to overwrite ${final}`)
        if (!existsSync(staged[i])) throw new SecretError(`${basename(final)} was not produced`)
        mkdirSync(dirname(final), { recursive: true, mode: 0o700 })
        chmodSync(staged[i], 0o600)
        renameSync(staged[i], final)
        created.push(final)
      })
    } finally {
      rmSync(scratch, { recursive: true, force: true })
    }
  }
}

function hostAddresses(spec: HostSpec): string[] {
  return [spec.network.ipv4?.address, spec.network.ipv6?.address].filter((a): a is string => a !== undefined)
}
