/**
 * Hostfleet — Markdown Renderer
 *
 * Renders run reports to ANSI-styled terminal output
 * using marked + marked-terminal.
 */

import { Marked } from 'marked'
import { markedTerminal } from 'marked-terminal'

const ESC = '\x1b['
const RESET = `${ESC}0m`

const paint = (...codes: string[]) => (text: string) => `${codes.join('')}${text}${RESET}`
const fg = (code: number) => `${ESC}38;5;${code}m`
const BOLD = `${ESC}1m`

const marked = new Marked(
  markedTerminal({
    // Palette shared with the logger
    firstHeading:    paint(BOLD, fg(117)),   // bold + sky blue
    heading:         paint(BOLD, fg(117)),
    strong:          paint(BOLD),
    em:              paint(`${ESC}3m`),      // italic
    codespan:        paint(fg(214)),         // amber for inline code
    blockquote:      paint(fg(244)),         // dim gray
    code:            paint(fg(252)),         // diffs: keep them readable
    listitem:        paint(fg(252)),         // light gray
    hr:              paint(fg(240)),         // dark gray
    table:           paint(fg(252)),
    link:            paint(fg(117)),
    showSectionPrefix: false,
    reflowText:      false,
    width:           (process.stdout.columns || 80) - 4,
    tab:             2,
  }),
)

/**
 * Render markdown text to ANSI-styled terminal string.
 * Returns the original text if parsing fails.
 */
export function renderMarkdown(text: string): string {
  try {
    const rendered = marked.parse(text)
    if (typeof rendered !== 'string') return text
    // marked-terminal may add trailing newlines; trim to one
    return rendered.replace(/\n{3,}/g, '\n\n').trimEnd()
  } catch {
    return text
  }
}
