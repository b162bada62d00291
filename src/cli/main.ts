/**
 * Hostfleet — CLI Main
 *
 * Parses arguments, dispatches to a command and turns whatever escapes
 * it into a one-line error and exit code 1.
 */

import { ConfigError, describeError, toFleetError } from '../errors.js'
import { VERSION } from '../version.js'
import { parseCliArgs } from './args.js'
import { findCommand, usage } from './commands.js'
import type { CliIO } from './session.js'

export async function main(argv: readonly string[], io: CliIO): Promise<number> {
  let debug = false
  try {
    const args = parseCliArgs(argv)
    debug = args.options.debug

    if (args.options.version) {
      io.stdout.write(`hostfleet ${VERSION}\n`)
      return 0
    }
    if (args.options.help) {
      io.stdout.write(usage())
      return 0
    }
    if (args.command === undefined) {
      io.stderr.write(usage())
      return 1
    }

    const command = findCommand(args.command)
    if (!command) throw new ConfigError(`unknown command '${args.command}', see hostfleet --help`)
    return await command.run({ io, args })
  } catch (err) {
    const error = toFleetError(err)
    io.stderr.write(describeError(error) + '\n')
    if (debug && error.stack) io.stderr.write(error.stack + '\n')
    return 1
  }
}
