/**
 * Hostfleet — Source Fingerprint
 *
 * A digest over the deployment repository's tracked files, so a host can
 * prove which source state it was built from.
 *
 *   <sha256 of file>  <path>        one line per file, paths sorted
 *   revision <commit>
 *   revision-date <commit date>
 *
 * digest = sha256 of those lines joined with newlines. Build output, VCS
 * metadata and the fingerprint file itself are left out.
 */

import { createHash } from 'node:crypto'
import { existsSync, readFileSync, readdirSync, statSync, writeFileSync } from 'node:fs'
import { join, relative, sep } from 'node:path'
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import { z } from 'zod'
import { DriftMismatchError } from '../errors.js'
import type { CommandRunner } from '../tools/exec-command.js'

export const FINGERPRINT_FILE = 'fingerprint.yaml'

const EXCLUDED_DIRS = ['.git', 'dist', 'node_modules', 'coverage', 'result']

export type Fingerprint = {
  revision: string
  revisionDate: string
  digest: string
}

const fingerprintSchema = z.object({
  revision: z.string(),
  revision_date: z.string(),
  digest: z.string().regex(/^[0-9a-f]{64}$/, 'expected a sha256 hex digest'),
})

export function isExcluded(path: string): boolean {
  if (path === FINGERPRINT_FILE) return true
  const top = path.split('/')[0]
  return EXCLUDED_DIRS.includes(top)
}

function walk(root: string, dir: string, out: string[]): void {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const full = join(dir, entry.name)
    const path = relative(root, full).split(sep).join('/')
    if (isExcluded(path)) continue
    if (entry.isDirectory()) walk(root, full, out)
    else if (entry.isFile()) out.push(path)
  }
}

/** Gitlinks (submodules) are listed as paths but are directories */
function isTrackedFile(root: string, path: string): boolean {
  const full = join(root, path)
  return existsSync(full) && statSync(full).isFile()
}

/** Tracked files per git, or every file when `root` is not a repository; sorted, exclusions applied */
export async function sourceFiles(root: string, runner: CommandRunner): Promise<string[]> {
  const listed = await runner.run(['git', '-C', root, 'ls-files', '-z'])
  let files: string[]
  if (listed.exitCode === 0) {
    // deleted-but-unstaged files are still listed
    files = listed.stdout.split('\0').filter(p => p !== '' && isTrackedFile(root, p))
  } else {
    files = []
    walk(root, root, files)
  }
  return files.filter(p => !isExcluded(p)).sort()
}

export async function sourceRevision(root: string, runner: CommandRunner): Promise<{ revision: string; revisionDate: string }> {
  const result = await runner.run(['git', '-C', root, 'log', '-1', '--format=%H%n%cI'])
  if (result.exitCode !== 0) return { revision: 'unversioned', revisionDate: 'unknown' }
  const [revision = 'unversioned', revisionDate = 'unknown'] = result.stdout.trim().split('\n')
  return { revision, revisionDate }
}

function sha256(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex')
}

export function fingerprintLines(root: string, files: readonly string[], revision: string, revisionDate: string): string[] {
  return [
    ...files.map(path => `${sha256(readFileSync(join(root, path)))}  ${path}`),
    `revision ${revision}`,
    `revision-date ${revisionDate}`,
  ]
}

export async function computeFingerprint(root: string, runner: CommandRunner): Promise<Fingerprint> {
  const files = await sourceFiles(root, runner)
  const { revision, revisionDate } = await sourceRevision(root, runner)
  const digest = sha256(fingerprintLines(root, files, revision, revisionDate).join('\n'))
  return { revision, revisionDate, digest }
}

export function renderFingerprint(fingerprint: Fingerprint): string {
  return stringifyYaml({
    revision: fingerprint.revision,
    revision_date: fingerprint.revisionDate,
    digest: fingerprint.digest,
  })
}

/** undefined when `value` is not a fingerprint document */
export function toFingerprint(value: unknown): Fingerprint | undefined {
  const result = fingerprintSchema.safeParse(value)
  if (!result.success) return undefined
  return { revision: result.data.revision, revisionDate: result.data.revision_date, digest: result.data.digest }
}

export function readFingerprint(root: string): Fingerprint | undefined {
  const path = join(root, FINGERPRINT_FILE)
  if (!existsSync(path)) return undefined
  return toFingerprint(parseYaml(readFileSync(path, 'utf-8')))
}

export async function generateFingerprint(root: string, runner: CommandRunner): Promise<Fingerprint> {
  const fingerprint = await computeFingerprint(root, runner)
  writeFileSync(join(root, FINGERPRINT_FILE), renderFingerprint(fingerprint), 'utf-8')
  return fingerprint
}

/** Recompute and compare with the recorded fingerprint */
export async function checkFingerprint(root: string, runner: CommandRunner): Promise<Fingerprint> {
  const recorded = readFingerprint(root)
  if (!recorded) {
    throw new DriftMismatchError(`no valid ${FINGERPRINT_FILE} in ${root}; run \`hostfleet fingerprint generate\``)
  }
  const computed = await computeFingerprint(root, runner)
  if (computed.digest !== recorded.digest) {
    throw new DriftMismatchError(
      `source drift: ${FINGERPRINT_FILE} records ${recorded.digest} (revision ${recorded.revision}), tree hashes to ${computed.digest} (revision ${computed.revision})`,
    )
  }
  return computed
}
