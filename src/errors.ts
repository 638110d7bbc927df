// src/errors.ts — Metering error taxonomy

/** Error codes for every failure the collection and export paths classify */
export type MeteringErrorCode =
  | "AUTH_EXHAUSTED"
  | "TRANSIENT"
  | "PERMANENT"
  | "RECORD_MALFORMED"
  | "CYCLE_ABORTED"

/** Typed error for Prism calls, adapters and the session manager */
export class MeteringError extends Error {
  readonly name = "MeteringError"
  readonly code: MeteringErrorCode
  readonly retryable: boolean
  readonly status?: number
  readonly endpoint?: string
  /** Server-provided retry hint (Retry-After), when any */
  readonly retryAfterMs?: number

  constructor(opts: {
    code: MeteringErrorCode
    message: string
    status?: number
    endpoint?: string
    retryAfterMs?: number
    cause?: unknown
  }) {
    super(`${opts.code}: ${opts.message}`, opts.cause !== undefined ? { cause: opts.cause } : undefined)
    this.code = opts.code
    this.retryable = opts.code === "TRANSIENT"
    this.status = opts.status
    this.endpoint = opts.endpoint
    this.retryAfterMs = opts.retryAfterMs
  }
}

export function isMeteringError(err: unknown): err is MeteringError {
  return err instanceof MeteringError
}

/**
 * Classify a foreign error. Anything that is not already a MeteringError is a
 * network-level failure from the caller's point of view and therefore TRANSIENT.
 */
export function toMeteringError(err: unknown, endpoint?: string): MeteringError {
  if (err instanceof MeteringError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new MeteringError({ code: "TRANSIENT", message, endpoint, cause: err })
}

/** Error that an aborted signal carries, normalized to CYCLE_ABORTED unless it already is a MeteringError. */
export function abortReason(signal: AbortSignal): MeteringError {
  const reason: unknown = signal.reason
  if (reason instanceof MeteringError) return reason
  return new MeteringError({
    code: "CYCLE_ABORTED",
    message: reason instanceof Error ? reason.message : "operation aborted",
  })
}
