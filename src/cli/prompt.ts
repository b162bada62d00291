/**
 * Hostfleet — Confirmation Prompt
 */

import { createInterface } from 'node:readline/promises'

export type Confirm = (question: string) => Promise<boolean>

/** y/yes on the terminal; anything else, or no terminal at all, declines */
export const terminalConfirm: Confirm = async question => {
  if (!process.stdin.isTTY) return false
  const rl = createInterface({ input: process.stdin, output: process.stderr })
  try {
    const answer = await rl.question(`${question} [y/N] `)
    return /^y(es)?$/i.test(answer.trim())
  } finally {
    rl.close()
  }
}
