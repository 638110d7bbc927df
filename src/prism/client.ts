// src/prism/client.ts
// PrismClient: JSON calls against the three API generations with exponential
// backoff retry for transient failures and one transparent reauthentication
// when the endpoint rejects the current credential.

import { MeteringError, toMeteringError } from "../errors.js"
import type { SessionManager, Credential } from "../session/session-manager.js"
import type { PrismTransport, TransportResponse } from "./transport.js"
import { classifyRateLimit, getBackoffMs, parseRetryAfterMs, type BackoffPolicy } from "./rate-limiter.js"
import { sleep as defaultSleep, type Sleep } from "../shared/sleep.js"

/** How a generation authenticates each request */
export type AuthMode = "basic" | "session"

export interface RetryPolicy extends BackoffPolicy {
  /** Retries after the first attempt for TRANSIENT failures */
  maxRetries: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
}

export interface PrismCallOptions {
  auth: AuthMode
  endpoint: string
  query?: Record<string, string | number>
  signal?: AbortSignal
}

export class PrismClient {
  constructor(
    private readonly transport: PrismTransport,
    private readonly session: SessionManager,
    private readonly retry: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  getJson(path: string, opts: PrismCallOptions): Promise<unknown> {
    return this.request("GET", path, undefined, opts)
  }

  postJson(path: string, body: unknown, opts: PrismCallOptions): Promise<unknown> {
    return this.request("POST", path, body, opts)
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    body: unknown,
    opts: PrismCallOptions,
  ): Promise<unknown> {
    let lastError: MeteringError | undefined
    let reauthenticated = false

    for (let attempt = 0; attempt <= this.retry.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = lastError?.retryAfterMs ?? getBackoffMs(attempt, this.retry)
        await this.sleep(delay, opts.signal)
      }

      try {
        const credential = await this.session.acquire(opts.signal)
        let resp = await this.send(method, path, body, opts, credential)

        if (resp.status === 401 && !reauthenticated) {
          // Stale or revoked token: reauthenticate once, outside the retry budget
          reauthenticated = true
          this.session.invalidate(`${opts.endpoint} returned 401`)
          const fresh = await this.session.acquire(opts.signal)
          resp = await this.send(method, path, body, opts, fresh)
        }

        return parseBody(resp, opts.endpoint)
      } catch (err) {
        lastError = toMeteringError(err, opts.endpoint)
        if (!lastError.retryable) throw lastError
        if (attempt < this.retry.maxRetries) {
          console.warn(`[prism] ${opts.endpoint} transient failure (attempt ${attempt + 1}): ${lastError.message}`)
        }
      }
    }

    throw lastError ?? new MeteringError({
      code: "TRANSIENT",
      message: `${opts.endpoint} failed after retries`,
      endpoint: opts.endpoint,
    })
  }

  private send(
    method: "GET" | "POST",
    path: string,
    body: unknown,
    opts: PrismCallOptions,
    credential: Credential,
  ): Promise<TransportResponse> {
    return this.transport.send({
      method,
      path,
      query: opts.query,
      body,
      headers: authHeaders(opts.auth, credential),
      endpoint: opts.endpoint,
      signal: opts.signal,
    })
  }
}

function authHeaders(mode: AuthMode, credential: Credential): Record<string, string> {
  if (mode === "session" && credential.sessionCookie) {
    return { Cookie: `NTNX_IGW_SESSION=${credential.sessionCookie}` }
  }
  return { Authorization: credential.authorization }
}

/** Map an HTTP response to parsed JSON or a classified error. */
export function parseBody(resp: TransportResponse, endpoint: string): unknown {
  const { status } = resp

  if (status >= 200 && status < 300) {
    try {
      return resp.body === "" ? {} : JSON.parse(resp.body)
    } catch {
      throw new MeteringError({
        code: "PERMANENT",
        message: `${endpoint} returned malformed JSON`,
        status,
        endpoint,
      })
    }
  }

  const snippet = resp.body.slice(0, 200)
  if (classifyRateLimit(status, resp.headers) !== "none" || status === 408 || status >= 500) {
    throw new MeteringError({
      code: "TRANSIENT",
      message: `${endpoint} HTTP ${status}: ${snippet}`,
      status,
      endpoint,
      retryAfterMs: parseRetryAfterMs(resp.headers),
    })
  }

  throw new MeteringError({
    code: "PERMANENT",
    message: status === 401
      ? `${endpoint} rejected a freshly issued credential (HTTP 401)`
      : `${endpoint} HTTP ${status}: ${snippet}`,
    status,
    endpoint,
  })
}
