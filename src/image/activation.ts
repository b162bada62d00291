/**
 * Hostfleet — Activation Script
 *
 * Runs on the host after a new generation is staged. The bootloader is
 * pointed at the new generation first, so whatever happens next the
 * host comes back on it. Then, when the host has kexec, the new kernel
 * and initrd are loaded and the machine hands over without going
 * through firmware; without kexec it reboots conventionally.
 *
 * The disk encryption key rides along on the new kernel command line
 * (`disk-key=`) unless the running command line already carries one,
 * in which case the command line is reused.
 */

import { REMOTE_SECRETS_ROOT } from '../secrets/layout.js'

export const SYSTEM_PROFILE = '/nix/var/nix/profiles/system'
export const DISK_KEY_PATH = `${REMOTE_SECRETS_ROOT}/disk_encryption_key`

/** Printed by the script before the host goes away */
export const HANDOFF_MARKER = 'hostfleet-handoff='

export type Handoff = 'kexec' | 'reboot'

export function renderActivationScript(profile = SYSTEM_PROFILE): string {
  return [
    'set -eu',
    `p=$(readlink -f ${profile})`,
    '"$p/bin/switch-to-configuration" boot',
    'if command -v kexec >/dev/null 2>&1; then',
    '  params="init=$p/init $(cat "$p/kernel-params")"',
    '  if grep -q "disk-key=" /proc/cmdline; then',
    '    kexec --load "$p/kernel" --initrd="$p/initrd" --reuse-cmdline --append="$params"',
    '  else',
    `    kexec --load "$p/kernel" --initrd="$p/initrd" --append="$params loglevel=4 net.ifnames=0 disk-key=$(cat ${DISK_KEY_PATH})"`,
    '  fi',
    `  echo ${HANDOFF_MARKER}kexec`,
    '  nohup sh -c "sleep 1; systemctl kexec" >/dev/null 2>&1 &',
    'else',
    `  echo ${HANDOFF_MARKER}reboot`,
    '  nohup sh -c "sleep 1; systemctl reboot" >/dev/null 2>&1 &',
    'fi',
    '',
  ].join('\n')
}

export function parseHandoff(stdout: string): Handoff | undefined {
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim()
    if (trimmed === `${HANDOFF_MARKER}kexec`) return 'kexec'
    if (trimmed === `${HANDOFF_MARKER}reboot`) return 'reboot'
  }
  return undefined
}
