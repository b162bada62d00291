import { describe, it, expect } from 'vitest'
import { mkdtempSync, readFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ConfigError, ProvisionError } from '../errors.js'
import { FakeRunner, exit, ok, testLogger } from '../testing/fakes.js'
import { CommandImageCompiler, expandTemplate } from './compiler.js'

function compilerWith(runner: FakeRunner) {
  const descriptorDir = join(mkdtempSync(join(tmpdir(), 'hostfleet-image-')), 'descriptors')
  const compiler = new CommandImageCompiler(runner, {
    builder: 'build --out-link none {source}#{host} {descriptor}',
    copier: 'copy --to {store} {image}',
    source: 'github:example/fleet',
    descriptorDir,
    logger: testLogger().logger,
  })
  return { compiler, descriptorDir }
}

describe('expandTemplate', () => {
  it('substitutes inside each argument', () => {
    expect(expandTemplate('nix build  {source}#hosts.{host}', { source: '.', host: 'db-0' })).toEqual(['nix', 'build', '.#hosts.db-0'])
  })

  it('rejects unknown placeholders', () => {
    expect(() => expandTemplate('build {flake}', {})).toThrow(ConfigError)
  })
})

describe('CommandImageCompiler', () => {
  it('writes the descriptor, runs the builder and reads the references', async () => {
    const runner = new FakeRunner(() => ok('/store/system-db-0\n/store/disks-db-0\n'))
    const { compiler, descriptorDir } = compilerWith(runner)

    const image = await compiler.compile('db-0', 'host: db-0\n')

    const descriptorPath = join(descriptorDir, 'db-0.yaml')
    expect(runner.calls).toEqual([['build', '--out-link', 'none', 'github:example/fleet#db-0', descriptorPath]])
    expect(readFileSync(descriptorPath, 'utf-8')).toBe('host: db-0\n')
    expect(image).toEqual({ host: 'db-0', reference: '/store/system-db-0', diskScript: '/store/disks-db-0', descriptor: 'host: db-0\n' })
  })

  it('fails the Compile stage when the builder fails', async () => {
    const { compiler } = compilerWith(new FakeRunner(() => exit(1, 'evaluation error')))
    const failure = compiler.compile('db-0', '')
    await expect(failure).rejects.toBeInstanceOf(ProvisionError)
    await expect(failure).rejects.toMatchObject({ host: 'db-0', stage: 'Compile', message: 'image compiler failed: evaluation error' })
  })

  it('copies into a mounted root over the installer login', async () => {
    const runner = new FakeRunner()
    const { compiler } = compilerWith(runner)
    await compiler.deliver('db-0', '/store/system', { host: 'db-0', address: '2001:db8::10', user: 'root', knownHosts: 'ignore' }, { root: '/mnt' })
    expect(runner.calls).toEqual([
      ['copy', '--to', 'ssh-ng://root@[2001:db8::10]?remote-store=local?root=/mnt', '/store/system'],
    ])
  })

  it('names the host when copying fails', async () => {
    const { compiler } = compilerWith(new FakeRunner(() => exit(1, 'connection reset')))
    await expect(compiler.deliver('db-0', '/store/system', { host: 'db-0', address: '192.0.2.10', user: 'root' }))
      .rejects.toMatchObject({ host: 'db-0', message: 'copying /store/system failed: connection reset' })
  })
})
