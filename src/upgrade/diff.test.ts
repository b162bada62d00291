import { describe, it, expect } from 'vitest'
import { diffStat, unifiedDiff } from './diff.js'

const labels = { fromLabel: 'db-00 generation 41', toLabel: 'db-00 source' }

describe('unifiedDiff', () => {
  it('is empty for equal documents', () => {
    expect(unifiedDiff('a\nb\n', 'a\nb\n', labels)).toBe('')
  })

  it('shows a changed line with its context', () => {
    expect(unifiedDiff('a\nb\nc\n', 'a\nB\nc\n', labels)).toBe([
      '--- db-00 generation 41',
      '+++ db-00 source',
      '@@ -1,3 +1,3 @@',
      ' a',
      '-b',
      '+B',
      ' c',
      '',
    ].join('\n'))
  })

  it('splits distant changes into separate hunks', () => {
    const from = ['1', '2', '3', '4', '5', '6', '7', '8', '9', '10'].join('\n') + '\n'
    const to = ['1', 'two', '3', '4', '5', '6', '7', '8', 'nine', '10'].join('\n') + '\n'
    expect(unifiedDiff(from, to, { ...labels, context: 1 }).split('\n')).toEqual([
      '--- db-00 generation 41',
      '+++ db-00 source',
      '@@ -1,3 +1,3 @@',
      ' 1',
      '-2',
      '+two',
      ' 3',
      '@@ -8,3 +8,3 @@',
      ' 8',
      '-9',
      '+nine',
      ' 10',
      '',
    ])
  })

  it('treats a missing document as empty', () => {
    expect(unifiedDiff('', 'x\ny\n', labels)).toBe('--- db-00 generation 41\n+++ db-00 source\n@@ -0,0 +1,2 @@\n+x\n+y\n')
  })
})

describe('diffStat', () => {
  it('counts added and removed lines, not the headers', () => {
    expect(diffStat(unifiedDiff('a\nb\nc\n', 'a\nB\nc\nd\n', labels))).toEqual({ added: 2, removed: 1 })
  })

  it('counts content lines that look like headers', () => {
    expect(diffStat(unifiedDiff('--- a\nkeep\n', '++ b\nkeep\n', labels))).toEqual({ added: 1, removed: 1 })
  })
})
