/**
 * Hostfleet — Line Diff
 *
 * Unified diff of two small documents (host descriptors), from a plain
 * longest-common-subsequence table.
 */

type Op = { kind: ' ' | '-' | '+'; line: string }

export type DiffOptions = {
  fromLabel: string
  toLabel: string
  /** Unchanged lines shown around each change */
  context?: number
}

function lines(text: string): string[] {
  if (text === '') return []
  const split = text.split('\n')
  if (split[split.length - 1] === '') split.pop()
  return split
}

function editScript(a: string[], b: string[]): Op[] {
  const n = a.length
  const m = b.length
  // lcs[i][j]: common subsequence length of a[i..] and b[j..]
  const lcs: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0))
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i][j] = a[i] === b[j] ? lcs[i + 1][j + 1] + 1 : Math.max(lcs[i + 1][j], lcs[i][j + 1])
    }
  }

  const ops: Op[] = []
  let i = 0
  let j = 0
  while (i < n && j < m) {
    if (a[i] === b[j]) {
      ops.push({ kind: ' ', line: a[i] })
      i++
      j++
    } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
      ops.push({ kind: '-', line: a[i++] })
    } else {
      ops.push({ kind: '+', line: b[j++] })
    }
  }
  while (i < n) ops.push({ kind: '-', line: a[i++] })
  while (j < m) ops.push({ kind: '+', line: b[j++] })
  return ops
}

function range(start: number, count: number): string {
  if (count === 1) return String(start)
  return `${count === 0 ? start - 1 : start},${count}`
}

/** Empty string when the documents are equal */
export function unifiedDiff(from: string, to: string, options: DiffOptions): string {
  const context = options.context ?? 3
  const ops = editScript(lines(from), lines(to))
  const changes = ops.flatMap((op, index) => (op.kind === ' ' ? [] : [index]))
  if (changes.length === 0) return ''

  const hunks: Array<[number, number]> = []
  let start = Math.max(0, changes[0] - context)
  let end = Math.min(ops.length, changes[0] + context + 1)
  for (const change of changes.slice(1)) {
    if (change - context <= end) {
      end = Math.min(ops.length, change + context + 1)
    } else {
      hunks.push([start, end])
      start = change - context
      end = Math.min(ops.length, change + context + 1)
    }
  }
  hunks.push([start, end])

  const out = [`--- ${options.fromLabel}`, `+++ ${options.toLabel}`]
  for (const [s, e] of hunks) {
    const before = ops.slice(0, s)
    const body = ops.slice(s, e)
    const fromStart = before.filter(op => op.kind !== '+').length + 1
    const toStart = before.filter(op => op.kind !== '-').length + 1
    const fromCount = body.filter(op => op.kind !== '+').length
    const toCount = body.filter(op => op.kind !== '-').length
    out.push(`@@ -${range(fromStart, fromCount)} +${range(toStart, toCount)} @@`)
    for (const op of body) out.push(`${op.kind}${op.line}`)
  }
  return out.join('\n') + '\n'
}

/** `+added -removed` line counts of a unified diff */
export function diffStat(diff: string): { added: number; removed: number } {
  let added = 0
  let removed = 0
  let inHunk = false
  // the file headers come before the first hunk
  for (const line of diff.split('\n')) {
    if (line.startsWith('@@')) inHunk = true
    if (!inHunk) continue
    if (line.startsWith('+')) added++
    else if (line.startsWith('-')) removed++
  }
  return { added, removed }
}
