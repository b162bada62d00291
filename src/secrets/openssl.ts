/**
 * Hostfleet — Key Material Generation
 *
 * Thin wrappers over openssl and ssh-keygen. Outputs go wherever the
 * caller points them (a scratch directory); moving results into the
 * secrets tree is the provisioner's job.
 */

import { writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { randomBytes } from 'node:crypto'
import { SecretError } from '../errors.js'
import { failureOutput } from '../tools/exec-command.js'
import type { CommandRunner } from '../tools/exec-command.js'

const CA_DAYS = 10950
const LEAF_DAYS = 10949

export type LeafRequest = {
  commonName: string
  dnsNames: readonly string[]
  ipAddresses: readonly string[]
  usage: 'server' | 'client'
}

export type CaFiles = { key: string; cert: string }

export class KeyMaterial {
  constructor(private readonly runner: CommandRunner) {}

  private async tool(argv: string[], what: string): Promise<void> {
    const result = await this.runner.run(argv)
    if (result.exitCode !== 0) {
      throw new SecretError(`${what} failed: ${failureOutput(result)}`)
    }
  }

  /** EC P-384 for the CA, P-256 for leaves */
  async createKey(out: string, curve: 'secp384r1' | 'prime256v1' = 'prime256v1'): Promise<void> {
    await this.tool(['openssl', 'ecparam', '-genkey', '-name', curve, '-noout', '-out', out], `key generation (${curve})`)
  }

  async selfSignCa(key: string, certOut: string, name: string): Promise<void> {
    await this.tool([
      'openssl', 'req', '-new', '-x509',
      '-key', key,
      '-days', String(CA_DAYS),
      '-subj', `/CN=${name} CA`,
      '-out', certOut,
    ], 'CA certificate')
  }

  /** CSR, extension file and signature all happen inside `scratch` */
  async signLeaf(scratch: string, ca: CaFiles, request: LeafRequest, key: string, certOut: string): Promise<void> {
    const csr = join(scratch, `${request.commonName}.csr`)
    await this.tool(['openssl', 'req', '-new', '-key', key, '-subj', `/CN=${request.commonName}`, '-out', csr], `request for ${request.commonName}`)

    const ext = join(scratch, `${request.commonName}.ext`)
    writeFileSync(ext, extensions(request), { mode: 0o600 })

    await this.tool([
      'openssl', 'x509', '-req',
      '-in', csr,
      '-CA', ca.cert,
      '-CAkey', ca.key,
      '-set_serial', `0x${randomBytes(16).toString('hex')}`,
      '-days', String(LEAF_DAYS),
      '-extfile', ext,
      '-out', certOut,
    ], `certificate for ${request.commonName}`)
  }

  /** ed25519; ssh-keygen writes `<out>` and `<out>.pub` */
  async createSshHostKey(out: string, comment: string): Promise<void> {
    await this.tool(['ssh-keygen', '-q', '-t', 'ed25519', '-N', '', '-C', comment, '-f', out], `ssh host key for ${comment}`)
  }
}

export function extensions(request: LeafRequest): string {
  const names = [
    ...request.dnsNames.map(name => `DNS:${name}`),
    ...request.ipAddresses.map(ip => `IP:${ip}`),
  ]
  const lines = [
    'basicConstraints=critical,CA:FALSE',
    'keyUsage=critical,digitalSignature,keyEncipherment',
    `extendedKeyUsage=${request.usage === 'server' ? 'serverAuth,clientAuth' : 'clientAuth'}`,
  ]
  if (names.length > 0) lines.push(`subjectAltName=${names.join(',')}`)
  return lines.join('\n') + '\n'
}

export function generateDiskKey(): string {
  return randomBytes(32).toString('hex')
}
