// src/scheduler/index.ts — Scheduler module barrel export

export { Scheduler, dailyPattern } from "./scheduler.js"
export type { ScheduledTaskDef, TaskCadence, TaskStatus } from "./scheduler.js"
export { CircuitBreaker, CircuitBreakerOpenError } from "./circuit-breaker.js"
export type { CircuitBreakerConfig, CircuitBreakerStats, CircuitState } from "./circuit-breaker.js"
export { HealthAggregator } from "./health.js"
export type { HealthStatus, HealthDeps } from "./health.js"
