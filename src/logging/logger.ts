/**
 * Hostfleet — Logger
 *
 * Leveled console logger for the operator's terminal (stderr, so command
 * output on stdout stays pipeable). With --debug, every line, including
 * streamed remote output, is also appended to a dated log file.
 */

import { mkdirSync, appendFileSync } from 'node:fs'
import { join } from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

// ── ANSI Helpers ────────────────────────────────────────────────────────────

const ESC = '\x1b['
const RESET = `${ESC}0m`
const fg = (code: number) => `${ESC}38;5;${code}m`

const C: Record<LogLevel, string> = {
  debug: fg(244),  // medium gray
  info:  fg(117),  // sky blue
  warn:  fg(214),  // amber
  error: fg(196),  // red
}

export type LogSink = {
  write(line: string): void
  isTTY?: boolean
}

export type LoggerOptions = {
  debug?: boolean
  /** Directory for the debug log file; no file is written when unset */
  logDir?: string
  sink?: LogSink
  scope?: string
}

export class Logger {
  private readonly minLevel: LogLevel
  private readonly sink: LogSink
  private readonly logDir?: string
  private readonly scope?: string
  private readonly debugEnabled: boolean

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false
    this.minLevel = this.debugEnabled ? 'debug' : 'info'
    this.sink = options.sink ?? process.stderr
    this.logDir = this.debugEnabled ? options.logDir : undefined
    this.scope = options.scope
  }

  get isDebug(): boolean {
    return this.debugEnabled
  }

  /** Logger whose lines are prefixed with a host name */
  child(scope: string): Logger {
    return new Logger({
      debug: this.debugEnabled,
      logDir: this.logDir,
      sink: this.sink,
      scope: this.scope ? `${this.scope}/${scope}` : scope,
    })
  }

  debug(message: string): void {
    this.log('debug', message)
  }

  info(message: string): void {
    this.log('info', message)
  }

  warn(message: string): void {
    this.log('warn', message)
  }

  error(message: string): void {
    this.log('error', message)
  }

  /** Streamed remote output, shown only with --debug */
  output(chunk: string): void {
    for (const line of chunk.split('\n')) {
      if (line.trim()) this.log('debug', `  │ ${line}`)
    }
  }

  private log(level: LogLevel, message: string): void {
    const scoped = this.scope ? `${this.scope}: ${message}` : message
    this.writeFile(level, scoped)
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return

    const line = this.sink.isTTY
      ? `${C[level]}[${level}]${RESET} ${scoped}`
      : `[${level}] ${scoped}`
    this.sink.write(line + '\n')
  }

  private writeFile(level: LogLevel, message: string): void {
    if (!this.logDir) return
    mkdirSync(this.logDir, { recursive: true })
    const timestamp = new Date().toISOString()
    const date = timestamp.slice(0, 10) // YYYY-MM-DD
    appendFileSync(join(this.logDir, `debug-${date}.log`), `[${timestamp}] ${level.toUpperCase()} ${message}\n`, 'utf-8')
  }
}

/** Collects lines in memory; used by tests and by report rendering */
export class MemorySink implements LogSink {
  readonly lines: string[] = []

  write(line: string): void {
    this.lines.push(line.replace(/\n$/, ''))
  }
}
