#!/usr/bin/env node

/**
 * Hostfleet — Entry Point
 *
 * Wires the process (stdio, environment, signals) into the CLI.
 * The first Ctrl-C cancels in-flight work; the second exits at once.
 */

import { main } from './cli/main.js'
import { terminalConfirm } from './cli/prompt.js'
import { systemClock } from './remote/backoff.js'
import { ProcessRunner } from './tools/exec-command.js'

const controller = new AbortController()

process.on('SIGINT', () => {
  if (controller.signal.aborted) process.exit(130)
  process.stderr.write('\ncancelling, press Ctrl-C again to exit now\n')
  controller.abort()
})

process.exitCode = await main(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  cwd: process.cwd(),
  runner: new ProcessRunner(),
  clock: systemClock,
  confirm: terminalConfirm,
  signal: controller.signal,
})
