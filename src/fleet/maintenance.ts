/**
 * Hostfleet — Maintenance Commands
 *
 * The operator's day-to-day reach into running hosts: run a command,
 * reboot, unlock an encrypted disk that waits in the initrd.
 */

import { readFileSync } from 'node:fs'
import type { HostSpec } from '../cluster/types.js'
import { ProvisionError, RemoteError } from '../errors.js'
import { bootPoll, rolePoll, waitUntil } from '../install/readiness.js'
import { INITRD_SSH_PORT } from '../remote/host-agent.js'
import { readDiskKey, runBounded, runHost, waitOptions } from './context.js'
import type { FleetContext, HostOutcome } from './context.js'
import { inOrder, runLanes } from './lanes.js'

/** Output streams line by line as it arrives, stdout and stderr alike */
export function runCommand(
  ctx: FleetContext,
  targets: readonly HostSpec[],
  command: string,
  onLine: (host: string, line: string) => void,
): Promise<HostOutcome[]> {
  return runBounded(ctx.settings.parallelism, targets, spec =>
    runHost(ctx, spec.name, async enter => {
      enter('Run')
      const lines = lineStream(line => onLine(spec.name, line))
      let exitCode: number | null
      try {
        exitCode = await ctx.agentFor(spec).run(command, lines.push)
      } finally {
        lines.end()
      }
      if (exitCode !== 0) throw new ProvisionError(`command exited with ${exitCode ?? 'a signal'}`)
      return 'exit 0'
    }))
}

/** Reassembles lines split across chunks; a trailing partial line is emitted at the end */
export function lineStream(emit: (line: string) => void): { push: (chunk: string) => void; end: () => void } {
  let pending = ''
  return {
    push(chunk) {
      const parts = (pending + chunk).split('\n')
      pending = parts.pop() ?? ''
      for (const line of parts) emit(line)
    },
    end() {
      if (pending !== '') emit(pending)
      pending = ''
    },
  }
}

/** Conventional reboot, then unlock and wait for the role like a first boot */
export async function rebootHosts(ctx: FleetContext, targets: readonly HostSpec[]): Promise<HostOutcome[]> {
  const outcomes = await runLanes(ctx, targets.map(spec => ({ spec })), ({ spec }) =>
    runHost(ctx, spec.name, async enter => {
      const agent = ctx.agentFor(spec)
      const wait = waitOptions(ctx, spec.name)

      enter('Reboot')
      const previousBoot = await agent.bootId()
      await agent.reboot()

      enter('Boot')
      await waitUntil('system', bootPoll(agent, readDiskKey(ctx, spec.name), previousBoot), wait)

      enter('ReadinessWait')
      const waited = await waitUntil(`${spec.role} role`, rolePoll(agent, spec.role), wait)
      return `ready after ${Math.round(waited / 1000)}s`
    }))
  return inOrder(targets, outcomes)
}

export type UnlockOptions = {
  /** Key file to use instead of the host's key in the secrets tree */
  keyFile?: string
}

export function unlockHosts(ctx: FleetContext, targets: readonly HostSpec[], options: UnlockOptions = {}): Promise<HostOutcome[]> {
  return runBounded(ctx.settings.parallelism, targets, spec =>
    runHost(ctx, spec.name, async enter => {
      enter('Unlock')
      const key = options.keyFile === undefined
        ? readDiskKey(ctx, spec.name)
        : readFileSync(options.keyFile, 'utf-8').trim()

      const outcome = await ctx.agentFor(spec).unlock(key)
      switch (outcome) {
        case 'unlocked':
          return 'disk unlocked'
        case 'already-unlocked':
          return 'already unlocked, the system answers on port 22'
        case 'unreachable':
          throw new RemoteError(`neither the system nor the initrd (port ${INITRD_SSH_PORT}) answers`)
      }
    }))
}
