import { describe, it, expect } from 'vitest'
import { renderPushScript } from './push-script.js'

describe('renderPushScript', () => {
  it('stages, locks down and then renames every file', () => {
    const script = renderPushScript([
      { remotePath: '/var/lib/secrets/sshd_key', content: Buffer.from('abc'), mode: 0o400, uid: 0 },
    ], '/mnt')

    expect(script).toBe([
      'set -eu',
      'umask 077',
      'mkdir -p /mnt/var/lib/secrets',
      'staging=$(mktemp -d /mnt/var/lib/secrets/.staging.XXXXXX)',
      `trap 'rm -rf "$staging"' EXIT`,
      `base64 -d > "$staging/0" <<'HOSTFLEET_SECRET_0'`,
      'YWJj',
      'HOSTFLEET_SECRET_0',
      'chmod 0400 "$staging/0"',
      'chown 0:0 "$staging/0"',
      'mkdir -p /mnt/var/lib/secrets',
      'mv -f "$staging/0" /mnt/var/lib/secrets/sshd_key',
      '',
    ].join('\n'))
  })

  it('decodes everything before the first rename', () => {
    const script = renderPushScript([
      { remotePath: '/var/lib/secrets/database/node.key', content: Buffer.from('k'), mode: 0o400, uid: 2201 },
      { remotePath: '/var/lib/secrets/access-tokens', content: Buffer.from('ACCESS_TOKENS=x\n'), mode: 0o400, uid: 0 },
    ])
    const lines = script.split('\n')
    const lastDecode = lines.lastIndexOf('HOSTFLEET_SECRET_1')
    const firstMove = lines.findIndex(l => l.startsWith('mv -f'))
    expect(lastDecode).toBeLessThan(firstMove)
    expect(lines).toContain('chown 2201:2201 "$staging/0"')
    expect(lines).toContain('mv -f "$staging/0" /var/lib/secrets/database/node.key')
  })

  it('leaves a file the host already has in place when asked to', () => {
    const script = renderPushScript([
      { remotePath: '/var/lib/secrets/mnemonic', content: Buffer.from('seed'), mode: 0o400, uid: 2202, keepExisting: true },
    ])
    expect(script.split('\n')).toContain('[ -e /var/lib/secrets/mnemonic ] || mv -f "$staging/0" /var/lib/secrets/mnemonic')
  })
})
