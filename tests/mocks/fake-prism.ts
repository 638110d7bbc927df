// tests/mocks/fake-prism.ts — In-process Prism stand-in and client stack builder
//
// Routes are matched on method + path; unmatched requests get a 404. Every
// request is recorded with its parsed URL and JSON body.

import type { FetchInit, FetchLike } from "../../src/prism/transport.js"
import { PrismTransport } from "../../src/prism/transport.js"
import { RequestRateLimiter } from "../../src/prism/rate-limiter.js"
import { PrismClient } from "../../src/prism/client.js"
import { SessionManager } from "../../src/session/session-manager.js"
import { createTelemetry, type TelemetryRegistry } from "../../src/gateway/telemetry.js"
import type { Sleep } from "../../src/shared/sleep.js"

export const LOGIN_PATH = "/api/nutanix/v3/users/me"
export const BASE_URL = "https://prism.test:9440"

export interface FakeResponse {
  status: number
  body?: unknown
  headers?: Record<string, string>
}

export interface RecordedCall {
  method: "GET" | "POST"
  url: URL
  path: string
  init: FetchInit
  body: unknown
}

export type Route = (call: RecordedCall) => FakeResponse | Promise<FakeResponse>

export const noSleep: Sleep = async () => {}

export class FakePrism {
  readonly calls: RecordedCall[] = []
  private readonly routes: Array<{ method: string; path: string; route: Route }> = []

  constructor(options: { login?: boolean } = {}) {
    if (options.login !== false) {
      this.on("GET", LOGIN_PATH, { status: 200, headers: { "Set-Cookie": "NTNX_IGW_SESSION=tok-1; Path=/; HttpOnly" } })
    }
  }

  /** Add or replace the route for method + path. */
  on(method: "GET" | "POST", path: string, response: Route | FakeResponse): this {
    const route: Route = typeof response === "function" ? response : () => response
    const existing = this.routes.findIndex((r) => r.method === method && r.path === path)
    if (existing >= 0) this.routes.splice(existing, 1)
    this.routes.push({ method, path, route })
    return this
  }

  /** Serve `responses` in order; the last one repeats. */
  sequence(method: "GET" | "POST", path: string, responses: FakeResponse[]): this {
    let i = 0
    return this.on(method, path, () => responses[Math.min(i++, responses.length - 1)])
  }

  callsTo(path: string): RecordedCall[] {
    return this.calls.filter((c) => c.path === path)
  }

  readonly fetch: FetchLike = async (url, init) => {
    const parsed = new URL(url)
    const call: RecordedCall = {
      method: init.method,
      url: parsed,
      path: parsed.pathname,
      init,
      body: init.body === undefined ? undefined : JSON.parse(init.body),
    }
    this.calls.push(call)

    const match = this.routes.find((r) => r.method === init.method && r.path === parsed.pathname)
    const resp = match ? await match.route(call) : { status: 404, body: { message: `no route for ${parsed.pathname}` } }
    const text = resp.body === undefined ? "" : typeof resp.body === "string" ? resp.body : JSON.stringify(resp.body)
    const headers = resp.headers ?? {}
    return {
      status: resp.status,
      headers: {
        forEach: (cb: (value: string, key: string) => void) => {
          for (const [k, v] of Object.entries(headers)) cb(v, k)
        },
      },
      text: async () => text,
    }
  }
}

export interface StackOptions {
  maxAuthFailures?: number
  maxRetries?: number
  sessionTtlMs?: number
  clock?: () => number
  sleep?: Sleep
  telemetry?: TelemetryRegistry
}

/** Limiter → transport → session → client over a FakePrism. */
export function buildStack(prism: FakePrism, options: StackOptions = {}) {
  const telemetry = options.telemetry ?? createTelemetry()
  const sleep = options.sleep ?? noSleep
  const limiter = new RequestRateLimiter({ requestsPerSecond: 10_000 })
  const transport = new PrismTransport(
    { baseUrl: BASE_URL, timeoutMs: 5_000 },
    { fetch: prism.fetch, limiter, telemetry, clock: options.clock },
  )
  const session = new SessionManager(
    transport,
    {
      username: "admin",
      password: "test-secret",
      maxAuthFailures: options.maxAuthFailures ?? 3,
      sessionTtlMs: options.sessionTtlMs ?? 900_000,
      backoff: { baseDelayMs: 1, maxDelayMs: 1 },
    },
    { sleep, telemetry, clock: options.clock },
  )
  const client = new PrismClient(
    transport,
    session,
    { maxRetries: options.maxRetries ?? 2, baseDelayMs: 1, maxDelayMs: 1 },
    sleep,
  )
  return { telemetry, limiter, transport, session, client }
}
