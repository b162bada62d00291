import { describe, it, expect } from 'vitest'
import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { SecretError } from '../errors.js'
import { bakeMacaroons, macaroonRootKey, newMnemonic, readMnemonic } from './wallet.js'

function fromUrlSafe(text: string): Buffer {
  return Buffer.from(text.replaceAll('-', '+').replaceAll('_', '/'), 'base64')
}

describe('wallet seed', () => {
  it('generates a fresh 24-word mnemonic each time', () => {
    const first = newMnemonic()
    expect(first.split(' ')).toHaveLength(24)
    expect(newMnemonic()).not.toBe(first)
  })

  it('reads back what it wrote', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'hostfleet-seed-')), 'mnemonic')
    const words = newMnemonic()
    writeFileSync(path, `${words}\n`)
    expect(readMnemonic(path)).toBe(words)
  })

  it('rejects a file that is not a mnemonic', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'hostfleet-seed-')), 'mnemonic')
    writeFileSync(path, 'not a seed phrase\n')
    expect(() => readMnemonic(path)).toThrow(SecretError)
    expect(() => readMnemonic(path)).toThrow(`${path} is not a valid mnemonic`)
  })
})

describe('bakeMacaroons', () => {
  it('derives the same credentials from the same seed', () => {
    const words = newMnemonic()
    const first = bakeMacaroons(words)
    const again = bakeMacaroons(words)

    expect(again.admin).toBe(first.admin)
    expect(again.readonly).toBe(first.readonly)
    expect(macaroonRootKey(words)).toHaveLength(32)
    expect(bakeMacaroons(newMnemonic()).admin).not.toBe(first.admin)
  })

  it('writes the admin macaroon both binary and as URL-safe base64', () => {
    const baked = bakeMacaroons(newMnemonic())

    expect(baked.access[0]).toBe(2)
    expect(fromUrlSafe(baked.admin).equals(baked.access)).toBe(true)
    expect(baked.admin).toMatch(/^[A-Za-z0-9_-]+=*$/)
    expect(baked.readonly).not.toBe(baked.admin)
  })

  it('limits each macaroon to its roles', () => {
    const baked = bakeMacaroons(newMnemonic())
    expect(baked.access.includes(Buffer.from('roles = admin|readonly'))).toBe(true)
    expect(fromUrlSafe(baked.readonly).includes(Buffer.from('roles = readonly'))).toBe(true)
    expect(fromUrlSafe(baked.readonly).includes(Buffer.from('admin'))).toBe(false)
  })
})
