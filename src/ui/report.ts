/**
 * Hostfleet — Run Report
 *
 * The summary printed after every multi-host command, as Markdown:
 * rendered for a terminal, left as-is when stdout is a pipe.
 */

import type { HostOutcome } from '../fleet/context.js'
import { diffStat } from '../upgrade/diff.js'
import { renderMarkdown } from './markdown.js'

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ')
}

function result(outcome: HostOutcome): string {
  if (!outcome.ok) return '**failed**'
  return outcome.warning === undefined ? 'done' : 'done, with warning'
}

function summary(outcome: HostOutcome): string {
  if (outcome.error) return `${outcome.error.name}: ${outcome.error.message}`
  if (outcome.diff !== undefined) {
    if (outcome.diff === '') return `${outcome.detail ?? ''}, no changes`
    const { added, removed } = diffStat(outcome.diff)
    return `${outcome.detail ?? ''}, +${added} -${removed}`
  }
  return outcome.detail ?? ''
}

export function renderReport(command: string, outcomes: readonly HostOutcome[]): string {
  const done = outcomes.filter(o => o.ok).length
  const lines = [
    `## ${command}: ${done} of ${outcomes.length} host${outcomes.length === 1 ? '' : 's'} done`,
    '',
    '| host | result | stage | detail |',
    '| --- | --- | --- | --- |',
    ...outcomes.map(o => `| ${o.host} | ${result(o)} | ${o.stage} | ${cell(summary(o))} |`),
  ]

  const warnings = outcomes.filter(o => o.warning !== undefined)
  if (warnings.length > 0) {
    lines.push('', '### Warnings', '', ...warnings.map(o => `- ${o.host}: ${o.warning ?? ''}`))
  }

  for (const o of outcomes) {
    if (!o.diff) continue
    lines.push('', `### ${o.host}`, '', '```diff', o.diff.trimEnd(), '```')
  }
  return lines.join('\n') + '\n'
}

export type ReportSink = {
  write(text: string): void
  isTTY?: boolean
}

export function printReport(sink: ReportSink, command: string, outcomes: readonly HostOutcome[]): void {
  const markdown = renderReport(command, outcomes)
  sink.write(sink.isTTY ? renderMarkdown(markdown) + '\n' : markdown)
}
