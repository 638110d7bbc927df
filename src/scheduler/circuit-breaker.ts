// src/scheduler/circuit-breaker.ts — Three-state circuit breaker around a task handler
//
// closed: handler runs; `failureThreshold` consecutive failures open the circuit.
// open: runs are refused until `cooldownMs` has passed since the last failure.
// half-open: one probe run; success closes, failure reopens.

export type CircuitState = "closed" | "open" | "half-open"

export interface CircuitBreakerConfig {
  failureThreshold: number
  cooldownMs: number
}

export const DEFAULT_CIRCUIT_CONFIG: CircuitBreakerConfig = { failureThreshold: 3, cooldownMs: 300_000 }

export interface CircuitBreakerStats {
  state: CircuitState
  consecutiveFailures: number
  successCount: number
  lastFailure?: number
  lastSuccess?: number
  probes: number
}

export class CircuitBreakerOpenError extends Error {
  constructor(taskId: string, retryAfterMs: number) {
    super(`Circuit breaker open for ${taskId}, retry after ${retryAfterMs}ms`)
    this.name = "CircuitBreakerOpenError"
  }
}

export class CircuitBreaker {
  private state: CircuitState = "closed"
  private consecutiveFailures = 0
  private successCount = 0
  private lastFailure: number | undefined
  private lastSuccess: number | undefined
  private probes = 0
  private onStateChange?: (taskId: string, from: CircuitState, to: CircuitState) => void

  constructor(
    private readonly taskId: string,
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_CONFIG,
    private readonly clock: () => number = Date.now,
  ) {
    if (config.failureThreshold < 1) {
      throw new Error(`failureThreshold must be >= 1 (got ${config.failureThreshold})`)
    }
  }

  onTransition(cb: (taskId: string, from: CircuitState, to: CircuitState) => void): void {
    this.onStateChange = cb
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const state = this.getState()
    if (state === "open") {
      const elapsed = this.lastFailure === undefined ? 0 : this.clock() - this.lastFailure
      throw new CircuitBreakerOpenError(this.taskId, Math.max(0, this.config.cooldownMs - elapsed))
    }
    if (state === "half-open") this.probes++

    try {
      const result = await fn()
      this.consecutiveFailures = 0
      this.successCount++
      this.lastSuccess = this.clock()
      this.transition("closed")
      return result
    } catch (err) {
      this.consecutiveFailures++
      this.lastFailure = this.clock()
      if (state === "half-open" || this.consecutiveFailures >= this.config.failureThreshold) {
        this.transition("open")
      }
      throw err
    }
  }

  /** Current state; an open circuit past its cooldown reports half-open. */
  getState(): CircuitState {
    if (
      this.state === "open" &&
      this.lastFailure !== undefined &&
      this.clock() - this.lastFailure >= this.config.cooldownMs
    ) {
      this.transition("half-open")
    }
    return this.state
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.getState(),
      consecutiveFailures: this.consecutiveFailures,
      successCount: this.successCount,
      lastFailure: this.lastFailure,
      lastSuccess: this.lastSuccess,
      probes: this.probes,
    }
  }

  reset(): void {
    this.transition("closed")
    this.consecutiveFailures = 0
  }

  private transition(to: CircuitState): void {
    const from = this.state
    if (from === to) return
    this.state = to
    this.onStateChange?.(this.taskId, from, to)
  }
}
