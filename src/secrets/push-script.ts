/**
 * Hostfleet — Secret Push Script
 *
 * Builds the shell script a host runs (over `ssh … sh -s`) to receive
 * its bundle. Files are decoded into a staging directory on the same
 * filesystem, chmod/chown'd there, then renamed into place. The trap
 * removes the staging directory on any exit, so an interrupted push
 * never leaves a half-written secret behind.
 */

import { posix } from 'node:path'
import { shellQuote } from '../tools/exec-command.js'
import { REMOTE_SECRETS_ROOT } from './layout.js'

export type StagedFile = {
  remotePath: string
  content: Buffer
  mode: number
  uid: number
  keepExisting?: boolean
}

/** `root` prefixes every path, e.g. `/mnt` while the installer runs */
export function renderPushScript(files: readonly StagedFile[], root = ''): string {
  const base = `${root}${REMOTE_SECRETS_ROOT}`
  const lines = [
    'set -eu',
    'umask 077',
    `mkdir -p ${shellQuote(base)}`,
    `staging=$(mktemp -d ${shellQuote(`${base}/.staging.XXXXXX`)})`,
    `trap 'rm -rf "$staging"' EXIT`,
  ]

  files.forEach((file, i) => {
    const marker = `HOSTFLEET_SECRET_${i}`
    lines.push(
      `base64 -d > "$staging/${i}" <<'${marker}'`,
      ...wrap(file.content.toString('base64')),
      marker,
      `chmod ${file.mode.toString(8).padStart(4, '0')} "$staging/${i}"`,
      `chown ${file.uid}:${file.uid} "$staging/${i}"`,
    )
  })

  files.forEach((file, i) => {
    const target = shellQuote(`${root}${file.remotePath}`)
    lines.push(
      `mkdir -p ${shellQuote(posix.dirname(`${root}${file.remotePath}`))}`,
      file.keepExisting ? `[ -e ${target} ] || mv -f "$staging/${i}" ${target}` : `mv -f "$staging/${i}" ${target}`,
    )
  })

  return lines.join('\n') + '\n'
}

function wrap(text: string, width = 76): string[] {
  const out: string[] = []
  for (let i = 0; i < text.length; i += width) out.push(text.slice(i, i + width))
  return out.length > 0 ? out : ['']
}
