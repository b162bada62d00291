/**
 * Hostfleet — Version
 */

import { readFileSync } from 'node:fs'

function readVersion(): string {
  // package.json sits one level above both src/ and dist/
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version
  }
  return 'unknown'
}

export const VERSION = readVersion()
