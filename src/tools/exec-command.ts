/**
 * Hostfleet — Command Runner
 *
 * Runs the external tools the orchestrator drives (ssh, scp, openssl,
 * ssh-keygen, git, the image compiler). Output is captured, optionally
 * streamed, and the child is killed on timeout or abort.
 */

import { spawn } from 'node:child_process'
import { CancelledError } from '../errors.js'

export type CommandResult = {
  /** null when the process was killed */
  exitCode: number | null
  stdout: string
  stderr: string
  timedOut: boolean
}

export type RunOptions = {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Written to stdin, which is then closed */
  input?: string | Buffer
  timeoutMs?: number
  signal?: AbortSignal
  /** Called with every chunk of stdout and stderr as it arrives */
  onOutput?: (chunk: string) => void
}

export interface CommandRunner {
  run(argv: readonly string[], options?: RunOptions): Promise<CommandResult>
}

/** Grace period to drain partial output after a kill */
const KILL_GRACE_MS = 500

export class ProcessRunner implements CommandRunner {
  run(argv: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const [command, ...args] = argv
    if (command === undefined) return Promise.reject(new Error('empty command'))
    if (options.signal?.aborted) return Promise.reject(new CancelledError(`cancelled before running ${command}`))

    return new Promise<CommandResult>((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['pipe', 'pipe', 'pipe'],
      })

      const stdout: string[] = []
      const stderr: string[] = []
      let timedOut = false
      let cancelled = false
      let settled = false

      const kill = () => {
        proc.kill('SIGTERM')
        setTimeout(() => {
          if (proc.exitCode === null && proc.signalCode === null) proc.kill('SIGKILL')
        }, KILL_GRACE_MS).unref()
      }

      const timer = options.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
          timedOut = true
          kill()
        }, options.timeoutMs)

      const onAbort = () => {
        cancelled = true
        kill()
      }
      options.signal?.addEventListener('abort', onAbort, { once: true })

      const collect = (sink: string[]) => (data: Buffer) => {
        const chunk = data.toString('utf-8')
        sink.push(chunk)
        options.onOutput?.(chunk)
      }
      proc.stdout.on('data', collect(stdout))
      proc.stderr.on('data', collect(stderr))

      const finish = (error: Error | undefined, exitCode: number | null) => {
        if (settled) return
        settled = true
        if (timer) clearTimeout(timer)
        options.signal?.removeEventListener('abort', onAbort)
        if (error) return reject(error)
        if (cancelled) return reject(new CancelledError(`${command} cancelled`))
        resolve({
          exitCode: timedOut ? null : exitCode,
          stdout: stdout.join(''),
          stderr: stderr.join(''),
          timedOut,
        })
      }

      proc.on('error', err => finish(new Error(`failed to run ${command}: ${err.message}`, { cause: err }), null))
      proc.on('close', code => finish(undefined, code))

      // A child that exits without reading stdin raises EPIPE here; the exit code tells the story
      proc.stdin.on('error', () => undefined)
      if (options.input !== undefined) proc.stdin.end(options.input)
      else proc.stdin.end()
    })
  }
}

/** Shell-quote one argument for a remote `sh -c` */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_\-./:=@%+,]+$/.test(value)) return value
  return `'${value.replaceAll("'", `'\\''`)}'`
}

/** Trimmed stderr, falling back to stdout, for error messages */
export function failureOutput(result: CommandResult): string {
  const text = result.stderr.trim() || result.stdout.trim()
  if (result.timedOut) return text ? `timed out: ${text}` : 'timed out'
  return text || `exit code ${result.exitCode ?? 'unknown'}`
}
