// src/prism/rate-limiter.ts — Global token bucket for outbound Prism calls
// Every adapter request and every authentication call takes one token.
// A caller that finds the bucket empty suspends until a token refills.

import { sleep as defaultSleep, type Sleep } from "../shared/sleep.js"
import { abortReason } from "../errors.js"

// ── TokenBucket ──────────────────────────────────────────────
// Fixed-capacity bucket with time-based refill.
// Tokens refill linearly based on elapsed time since last refill,
// capped at capacity. tryConsume() atomically checks and deducts.

export class TokenBucket {
  public readonly capacity: number
  public readonly refillPerSecond: number

  private tokens: number
  private lastRefillTime: number
  private readonly clock: () => number

  constructor(
    capacity: number,
    refillPerSecond: number,
    clock: () => number = Date.now,
  ) {
    if (capacity < 1 || refillPerSecond <= 0) {
      throw new Error(`TokenBucket needs capacity >= 1 and a positive refill rate (got ${capacity}, ${refillPerSecond})`)
    }
    this.capacity = capacity
    this.refillPerSecond = refillPerSecond
    this.tokens = capacity // Start full
    this.lastRefillTime = clock()
    this.clock = clock
  }

  // Attempt to consume one token. Returns true if consumed, false if exhausted.
  tryConsume(): boolean {
    this.refill()
    if (this.tokens < 1) return false
    this.tokens -= 1
    return true
  }

  // Current token count (after refill).
  remaining(): number {
    this.refill()
    return Math.floor(this.tokens)
  }

  // Milliseconds until at least one whole token is available.
  msUntilNextToken(): number {
    this.refill()
    if (this.tokens >= 1) return 0
    return Math.ceil(((1 - this.tokens) / this.refillPerSecond) * 1000)
  }

  private refill(): void {
    const now = this.clock()
    const elapsedMs = now - this.lastRefillTime
    if (elapsedMs <= 0) return

    const tokensToAdd = (elapsedMs / 1000) * this.refillPerSecond
    this.tokens = Math.min(this.capacity, this.tokens + tokensToAdd)
    this.lastRefillTime = now
  }
}

// ── Rate limit classification ────────────────────────────────
// 429 is a plain rate-limit rejection; 403 with Retry-After is the gateway's
// throttling variant. Both are transient.

export type RateLimitClassification = "primary" | "secondary" | "none"

export function classifyRateLimit(
  status: number,
  headers: Record<string, string>,
): RateLimitClassification {
  if (status === 429) return "primary"
  if (status === 403 && headers["retry-after"] !== undefined) return "secondary"
  return "none"
}

/** Parse a Retry-After header given in seconds. */
export function parseRetryAfterMs(headers: Record<string, string>): number | undefined {
  const raw = headers["retry-after"]
  if (raw === undefined) return undefined
  const seconds = parseInt(raw, 10)
  if (isNaN(seconds) || seconds <= 0) return undefined
  return seconds * 1000
}

// ── Backoff ──────────────────────────────────────────────────
// Exponential backoff with jitter: base * 2^(attempt-1), capped, ±25%.

export interface BackoffPolicy {
  baseDelayMs: number
  maxDelayMs: number
}

export function getBackoffMs(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const rawMs = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1)))
  const jitter = 0.75 + random() * 0.5
  return Math.floor(rawMs * jitter)
}

// ── RequestRateLimiter ───────────────────────────────────────
// One bucket for the whole process. Waiters are served in arrival order.

export interface RequestRateLimiterConfig {
  requestsPerSecond: number
  /** Burst size; defaults to requestsPerSecond */
  burst?: number
}

export class RequestRateLimiter {
  private readonly bucket: TokenBucket
  private readonly sleep: Sleep
  private queue: Promise<void> = Promise.resolve()
  private waiting = 0
  private granted = 0

  constructor(
    config: RequestRateLimiterConfig,
    clock: () => number = Date.now,
    sleep: Sleep = defaultSleep,
  ) {
    this.bucket = new TokenBucket(
      Math.max(1, Math.floor(config.burst ?? config.requestsPerSecond)),
      config.requestsPerSecond,
      clock,
    )
    this.sleep = sleep
  }

  /** Wait for one token. Rejects with the signal's reason if aborted while queued. */
  acquire(signal?: AbortSignal): Promise<void> {
    this.waiting++
    const turn = this.queue.then(() => this.takeToken(signal))
    // The queue must keep moving even when one waiter is aborted
    this.queue = turn.then(
      () => undefined,
      () => undefined,
    )
    return turn.finally(() => {
      this.waiting--
    })
  }

  stats(): { remaining: number; waiting: number; granted: number } {
    return { remaining: this.bucket.remaining(), waiting: this.waiting, granted: this.granted }
  }

  private async takeToken(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) throw abortReason(signal)
      if (this.bucket.tryConsume()) {
        this.granted++
        return
      }
      await this.sleep(this.bucket.msUntilNextToken(), signal)
    }
  }
}
