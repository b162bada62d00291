/**
 * Hostfleet — Error Kinds
 *
 * Every failure the orchestrator reports is one of these. Per-host errors
 * carry the host name and the stage they happened in so the final report
 * can name both.
 */

export type ErrorContext = {
  host?: string
  stage?: string
  cause?: unknown
}

export class FleetError extends Error {
  host?: string
  stage?: string

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause })
    this.name = new.target.name
    this.host = context.host
    this.stage = context.stage
  }

  /** Fill in host/stage where the thrower did not know them */
  bind(context: Omit<ErrorContext, 'cause'>): this {
    this.host ??= context.host
    this.stage ??= context.stage
    return this
  }
}

/** Resolution/validation failure. Always local, raised before any remote call. */
export class ConfigError extends FleetError {}

/** Missing or invalid certificate/key material */
export class SecretError extends FleetError {}

/** Connection or authentication failure after retries */
export class RemoteError extends FleetError {}

/** A remote install/activation step failed */
export class ProvisionError extends FleetError {}

/** Host never reported ready within the overall bound */
export class ReadinessTimeoutError extends FleetError {}

/** Recomputed fingerprint disagrees with the recorded one */
export class DriftMismatchError extends FleetError {}

/** Host keeps no generation before the current one */
export class RollbackUnavailableError extends FleetError {}

/** Operator interrupt */
export class CancelledError extends FleetError {}

/** Wrap anything thrown into a FleetError carrying host/stage */
export function toFleetError(err: unknown, context: Omit<ErrorContext, 'cause'> = {}): FleetError {
  if (err instanceof FleetError) return err.bind(context)
  const message = err instanceof Error ? err.message : String(err)
  return new FleetError(message, { ...context, cause: err })
}

/** One-line description used on stderr: `<host> [<stage>] <message>` */
export function describeError(err: FleetError): string {
  const parts: string[] = []
  if (err.host) parts.push(err.host)
  if (err.stage) parts.push(`[${err.stage}]`)
  parts.push(`${err.name}: ${err.message}`)
  return parts.join(' ')
}
