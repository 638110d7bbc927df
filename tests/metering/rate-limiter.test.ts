// tests/metering/rate-limiter.test.ts — Token bucket, backoff and the global request limiter

import { describe, it, expect } from "vitest"
import fc from "fast-check"
import {
  TokenBucket,
  RequestRateLimiter,
  classifyRateLimit,
  getBackoffMs,
  parseRetryAfterMs,
} from "../../src/prism/rate-limiter.js"
import type { Sleep } from "../../src/shared/sleep.js"

function manualClock(start = 0) {
  let now = start
  const sleeps: number[] = []
  const sleep: Sleep = async (ms) => {
    sleeps.push(ms)
    now += ms
  }
  return {
    clock: () => now,
    advance: (ms: number) => {
      now += ms
    },
    sleep,
    sleeps,
  }
}

describe("TokenBucket", () => {
  it("starts full and refuses once empty", () => {
    const t = manualClock()
    const bucket = new TokenBucket(2, 1, t.clock)
    expect(bucket.tryConsume()).toBe(true)
    expect(bucket.tryConsume()).toBe(true)
    expect(bucket.tryConsume()).toBe(false)
    expect(bucket.msUntilNextToken()).toBe(1000)
  })

  it("refills linearly with elapsed time, capped at capacity", () => {
    const t = manualClock()
    const bucket = new TokenBucket(2, 1, t.clock)
    bucket.tryConsume()
    bucket.tryConsume()
    t.advance(500)
    expect(bucket.msUntilNextToken()).toBe(500)
    t.advance(500)
    expect(bucket.tryConsume()).toBe(true)
    t.advance(60_000)
    expect(bucket.remaining()).toBe(2)
  })

  it("rejects a zero capacity", () => {
    expect(() => new TokenBucket(0, 1)).toThrow(/capacity >= 1/)
  })
})

describe("classifyRateLimit / parseRetryAfterMs", () => {
  it("classifies 429 and throttling 403", () => {
    expect(classifyRateLimit(429, {})).toBe("primary")
    expect(classifyRateLimit(403, { "retry-after": "5" })).toBe("secondary")
    expect(classifyRateLimit(403, {})).toBe("none")
    expect(classifyRateLimit(500, {})).toBe("none")
  })

  it("parses Retry-After seconds", () => {
    expect(parseRetryAfterMs({ "retry-after": "3" })).toBe(3000)
    expect(parseRetryAfterMs({ "retry-after": "0" })).toBeUndefined()
    expect(parseRetryAfterMs({ "retry-after": "soon" })).toBeUndefined()
    expect(parseRetryAfterMs({})).toBeUndefined()
  })
})

describe("getBackoffMs", () => {
  const policy = { baseDelayMs: 500, maxDelayMs: 10_000 }

  it("doubles per attempt and caps at the maximum", () => {
    expect(getBackoffMs(1, policy, () => 0.5)).toBe(500)
    expect(getBackoffMs(3, policy, () => 0.5)).toBe(2000)
    expect(getBackoffMs(10, policy, () => 0.5)).toBe(10_000)
    expect(getBackoffMs(1, policy, () => 0)).toBe(375)
  })

  it("stays within ±25% of the capped exponential delay", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 30 }), fc.integer({ min: 0, max: 999 }), (attempt, r) => {
        const raw = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1))
        const delay = getBackoffMs(attempt, policy, () => r / 1000)
        return delay >= Math.floor(raw * 0.75) && delay <= raw * 1.25
      }),
    )
  })
})

describe("RequestRateLimiter", () => {
  it("suspends callers until a token refills, in arrival order", async () => {
    const t = manualClock()
    const limiter = new RequestRateLimiter({ requestsPerSecond: 2, burst: 1 }, t.clock, t.sleep)

    const order: number[] = []
    await Promise.all([1, 2, 3].map((n) => limiter.acquire().then(() => order.push(n))))

    expect(order).toEqual([1, 2, 3])
    expect(t.sleeps).toEqual([500, 500])
    expect(limiter.stats()).toEqual({ remaining: 0, waiting: 0, granted: 3 })
  })

  it("rejects an aborted waiter without stalling the queue", async () => {
    const t = manualClock()
    const limiter = new RequestRateLimiter({ requestsPerSecond: 5 }, t.clock, t.sleep)
    const controller = new AbortController()
    controller.abort()

    await expect(limiter.acquire(controller.signal)).rejects.toMatchObject({ code: "CYCLE_ABORTED" })
    await expect(limiter.acquire()).resolves.toBeUndefined()
    expect(limiter.stats().granted).toBe(1)
  })
})
