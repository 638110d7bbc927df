// src/session/session-manager.ts — Credential state and reauthentication policy
//
// One credential per process. Concurrent acquire() calls share a single
// in-flight login. After maxAuthFailures consecutive failed logins the manager
// refuses further attempts until the next collection cycle (beginCycle()).

import { MeteringError, abortReason } from "../errors.js"
import type { PrismTransport } from "../prism/transport.js"
import { getBackoffMs, type BackoffPolicy } from "../prism/rate-limiter.js"
import { sleep as defaultSleep, type Sleep } from "../shared/sleep.js"
import { TELEMETRY, type TelemetryRegistry } from "../gateway/telemetry.js"

export const SESSION_COOKIE = "NTNX_IGW_SESSION"
const LOGIN_PATH = "/api/nutanix/v3/users/me"

export interface Credential {
  readonly host: string
  readonly principal: string
  /** Basic authorization header value, valid for every generation */
  readonly authorization: string
  /** Issued session token, sent as a cookie by session-auth generations */
  readonly sessionCookie?: string
  readonly issuedAt: number
  readonly expiresAt: number
}

export interface SessionManagerConfig {
  username: string
  password: string
  maxAuthFailures: number
  sessionTtlMs: number
  backoff: BackoffPolicy
}

export interface SessionStats {
  authAttempts: number
  reauthentications: number
  consecutiveFailures: number
  exhausted: boolean
  lastInvalidation?: string
}

export class SessionManager {
  private credential: Credential | undefined
  private inFlight: Promise<Credential> | undefined
  private exhausted = false
  private authAttempts = 0
  private reauthentications = 0
  private consecutiveFailures = 0
  private lastInvalidation: string | undefined
  private readonly clock: () => number
  private readonly sleep: Sleep
  private readonly telemetry: TelemetryRegistry | undefined

  constructor(
    private readonly transport: PrismTransport,
    private readonly config: SessionManagerConfig,
    deps: { clock?: () => number; sleep?: Sleep; telemetry?: TelemetryRegistry } = {},
  ) {
    if (config.maxAuthFailures < 1) {
      throw new Error(`maxAuthFailures must be >= 1 (got ${config.maxAuthFailures})`)
    }
    this.clock = deps.clock ?? Date.now
    this.sleep = deps.sleep ?? defaultSleep
    this.telemetry = deps.telemetry
  }

  /** Return a usable credential, authenticating first when needed. */
  async acquire(signal?: AbortSignal): Promise<Credential> {
    if (this.exhausted) {
      throw new MeteringError({
        code: "AUTH_EXHAUSTED",
        message: `authentication failed ${this.consecutiveFailures} times in a row; waiting for the next cycle`,
        endpoint: "auth",
      })
    }
    const current = this.credential
    if (current && current.expiresAt > this.clock()) return current

    if (!this.inFlight) {
      this.inFlight = this.authenticate(signal).finally(() => {
        this.inFlight = undefined
      })
    }
    return this.inFlight
  }

  /** Drop the credential; the next acquire() reauthenticates. */
  invalidate(reason: string): void {
    if (this.credential) {
      console.warn(`[session] credential invalidated: ${reason}`)
    }
    this.credential = undefined
    this.lastInvalidation = reason
  }

  /** Start of a collection cycle: allow authentication again after exhaustion. */
  beginCycle(): void {
    if (this.exhausted) {
      console.log("[session] new cycle, authentication re-enabled")
    }
    this.exhausted = false
    this.consecutiveFailures = 0
  }

  /** Shutdown: forget the credential. */
  destroy(): void {
    this.credential = undefined
    this.inFlight = undefined
  }

  stats(): SessionStats {
    return {
      authAttempts: this.authAttempts,
      reauthentications: this.reauthentications,
      consecutiveFailures: this.consecutiveFailures,
      exhausted: this.exhausted,
      lastInvalidation: this.lastInvalidation,
    }
  }

  private async authenticate(signal?: AbortSignal): Promise<Credential> {
    let lastError: MeteringError | undefined

    while (this.consecutiveFailures < this.config.maxAuthFailures) {
      if (signal?.aborted) throw abortReason(signal)
      if (this.consecutiveFailures > 0) {
        await this.sleep(getBackoffMs(this.consecutiveFailures, this.config.backoff), signal)
      }
      if (this.authAttempts > 0) this.reauthentications++
      this.authAttempts++

      try {
        const credential = await this.login(signal)
        this.credential = credential
        this.consecutiveFailures = 0
        this.telemetry?.incrementCounter(TELEMETRY.authAttempts, { result: "success" })
        return credential
      } catch (err) {
        if (err instanceof MeteringError && err.code === "CYCLE_ABORTED") throw err
        this.consecutiveFailures++
        this.telemetry?.incrementCounter(TELEMETRY.authAttempts, { result: "failure" })
        lastError = err instanceof MeteringError
          ? err
          : new MeteringError({ code: "TRANSIENT", message: String(err), endpoint: "auth", cause: err })
        console.warn(
          `[session] authentication attempt failed (${this.consecutiveFailures}/${this.config.maxAuthFailures}): ${lastError.message}`,
        )
      }
    }

    this.exhausted = true
    this.credential = undefined
    console.error(`[session] authentication exhausted after ${this.consecutiveFailures} consecutive failures`)
    throw new MeteringError({
      code: "AUTH_EXHAUSTED",
      message: `authentication failed ${this.consecutiveFailures} times in a row${lastError ? ` (last: ${lastError.message})` : ""}`,
      endpoint: "auth",
      cause: lastError,
    })
  }

  private async login(signal?: AbortSignal): Promise<Credential> {
    const authorization = basicAuthorization(this.config.username, this.config.password)
    const resp = await this.transport.send({
      method: "GET",
      path: LOGIN_PATH,
      headers: { Authorization: authorization },
      endpoint: "auth",
      signal,
    })

    if (resp.status < 200 || resp.status >= 300) {
      throw new MeteringError({
        code: resp.status >= 500 ? "TRANSIENT" : "PERMANENT",
        message: `login returned HTTP ${resp.status}`,
        status: resp.status,
        endpoint: "auth",
      })
    }

    const issuedAt = this.clock()
    return {
      host: this.transport.baseUrl,
      principal: this.config.username,
      authorization,
      sessionCookie: parseSessionCookie(resp.headers["set-cookie"]),
      issuedAt,
      expiresAt: issuedAt + this.config.sessionTtlMs,
    }
  }
}

export function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`
}

/** Extract the session token from a (possibly comma-joined) Set-Cookie header. */
export function parseSessionCookie(setCookie: string | undefined): string | undefined {
  if (!setCookie) return undefined
  const match = new RegExp(`(?:^|[,;]\\s*)${SESSION_COOKIE}=([^;,\\s]+)`).exec(setCookie)
  return match ? match[1] : undefined
}
