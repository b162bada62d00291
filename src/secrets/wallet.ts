/**
 * Hostfleet — Wallet Seed and API Macaroons
 *
 * An application node's 24-word seed, and the admin and readonly API
 * macaroons the node derives from it. The root key is
 * sha256(bip39 seed ‖ "macaroon/0"), so the node bakes identical
 * macaroons on its own and only the seed needs to reach the host.
 */

import { createHash } from 'node:crypto'
import { readFileSync } from 'node:fs'
import { generateMnemonic, mnemonicToSeedSync, validateMnemonic } from '@scure/bip39'
import { wordlist } from '@scure/bip39/wordlists/english'
import macaroon from 'macaroon'
import { SecretError } from '../errors.js'

const SEED_STRENGTH_BITS = 256
const MACAROON_KEY_PATH = 'macaroon/0'

export type ApiMacaroons = {
  /** Binary V2 encoding, what API clients send */
  access: Buffer
  /** URL-safe base64 of the V2 encoding */
  admin: string
  readonly: string
}

export function newMnemonic(): string {
  return generateMnemonic(wordlist, SEED_STRENGTH_BITS)
}

export function readMnemonic(path: string): string {
  const words = readFileSync(path, 'utf-8').trim()
  if (!validateMnemonic(words, wordlist)) throw new SecretError(`${path} is not a valid mnemonic`)
  return words
}

export function macaroonRootKey(mnemonic: string): Buffer {
  return createHash('sha256')
    .update(mnemonicToSeedSync(mnemonic, ''))
    .update(MACAROON_KEY_PATH)
    .digest()
}

/** URL-safe alphabet, padding kept */
function urlSafeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64').replaceAll('+', '-').replaceAll('/', '_')
}

export function bakeMacaroons(mnemonic: string): ApiMacaroons {
  const rootKey = macaroonRootKey(mnemonic)
  const bake = (identifier: string, roles: string) => {
    const m = macaroon.newMacaroon({ rootKey, identifier, version: 2 })
    m.addFirstPartyCaveat(`roles = ${roles}`)
    return m.exportBinary()
  }

  const admin = bake('admin', 'admin|readonly')
  return {
    access: Buffer.from(admin),
    admin: urlSafeBase64(admin),
    readonly: urlSafeBase64(bake('readonly', 'readonly')),
  }
}
