// src/prism/transport.ts — Single HTTP exchange with the Prism host
// Takes a limiter token, applies the per-request timeout, records telemetry.
// Retries and authentication live one layer up (client.ts, session-manager.ts).

import { Agent, fetch as undiciFetch } from "undici"
import { MeteringError, abortReason } from "../errors.js"
import { linkSignal } from "../shared/sleep.js"
import type { RequestRateLimiter } from "./rate-limiter.js"
import { TELEMETRY, type TelemetryRegistry } from "../gateway/telemetry.js"

// --- Fetch seam (tests inject their own) ---

export interface FetchInit {
  method: "GET" | "POST"
  headers: Record<string, string>
  body?: string
  signal?: AbortSignal
}

export interface FetchResponseLike {
  status: number
  headers: {
    forEach(cb: (value: string, key: string) => void): void
  }
  text(): Promise<string>
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>

/**
 * Build the production fetch. Dark sites run Prism with self-signed
 * certificates, so verification is opt-in (PRISM_TLS_VERIFY).
 */
export function createPrismFetch(tlsVerify: boolean): { fetch: FetchLike; close: () => Promise<void> } {
  const agent = new Agent({ connect: { rejectUnauthorized: tlsVerify } })
  return {
    fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: agent }),
    close: () => agent.close(),
  }
}

// --- Transport ---

export interface TransportRequest {
  method: "GET" | "POST"
  /** Path below the base URL, starting with "/" */
  path: string
  query?: Record<string, string | number>
  body?: unknown
  headers?: Record<string, string>
  /** Low-cardinality endpoint label for telemetry and errors */
  endpoint: string
  signal?: AbortSignal
}

export interface TransportResponse {
  status: number
  /** Lower-cased header names */
  headers: Record<string, string>
  body: string
}

export interface PrismTransportConfig {
  /** e.g. https://prism.example.internal:9440 */
  baseUrl: string
  timeoutMs: number
}

export interface PrismTransportDeps {
  fetch: FetchLike
  limiter: RequestRateLimiter
  telemetry?: TelemetryRegistry
  clock?: () => number
}

export class PrismTransport {
  private readonly clock: () => number

  constructor(
    private readonly config: PrismTransportConfig,
    private readonly deps: PrismTransportDeps,
  ) {
    this.clock = deps.clock ?? Date.now
  }

  get baseUrl(): string {
    return this.config.baseUrl
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    await this.deps.limiter.acquire(req.signal)

    const controller = new AbortController()
    const unlink = linkSignal(req.signal, controller)
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.config.timeoutMs)

    const start = this.clock()
    const headers: Record<string, string> = { Accept: "application/json", ...req.headers }
    let body: string | undefined
    if (req.body !== undefined) {
      headers["Content-Type"] = "application/json"
      body = JSON.stringify(req.body)
    }

    try {
      const resp = await this.deps.fetch(this.url(req), {
        method: req.method,
        headers,
        body,
        signal: controller.signal,
      })
      const text = await resp.text()
      const respHeaders: Record<string, string> = {}
      resp.headers.forEach((v, k) => {
        // set-cookie arrives once per cookie
        const key = k.toLowerCase()
        respHeaders[key] = key in respHeaders ? `${respHeaders[key]}, ${v}` : v
      })

      this.record(req.endpoint, resp.status >= 200 && resp.status < 300 ? "success" : "error", start)
      return { status: resp.status, headers: respHeaders, body: text }
    } catch (err) {
      this.record(req.endpoint, "error", start)
      this.deps.telemetry?.incrementCounter(TELEMETRY.scrapeErrors, { endpoint: req.endpoint })
      if (req.signal?.aborted) throw abortReason(req.signal)
      if (timedOut) {
        throw new MeteringError({
          code: "TRANSIENT",
          message: `${req.endpoint} timed out after ${this.config.timeoutMs}ms`,
          endpoint: req.endpoint,
          cause: err,
        })
      }
      throw new MeteringError({
        code: "TRANSIENT",
        message: `${req.endpoint} request failed: ${err instanceof Error ? err.message : String(err)}`,
        endpoint: req.endpoint,
        cause: err,
      })
    } finally {
      clearTimeout(timer)
      unlink()
    }
  }

  private url(req: TransportRequest): string {
    const url = new URL(req.path, this.config.baseUrl)
    for (const [k, v] of Object.entries(req.query ?? {})) {
      url.searchParams.set(k, String(v))
    }
    return url.toString()
  }

  private record(endpoint: string, status: "success" | "error", start: number): void {
    const t = this.deps.telemetry
    if (!t) return
    t.incrementCounter(TELEMETRY.apiRequests, { endpoint, status })
    t.observeHistogram(TELEMETRY.apiRequestDuration, { endpoint }, (this.clock() - start) / 1000)
  }
}
