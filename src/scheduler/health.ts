// src/scheduler/health.ts — Health summary over the served snapshot, tasks and exports

import type { Scheduler, TaskStatus } from "./scheduler.js"
import type { MetricRegistry } from "../snapshot/registry.js"
import type { SessionStats } from "../session/session-manager.js"
import type { ExportResult } from "../billing/daily-export.js"
import { RESOURCE_KINDS, type KindStatus, type ResourceKind } from "../snapshot/types.js"

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy"
  uptime: number
  timestamp: number
  checks: {
    snapshot: {
      status: "ok" | "partial" | "degraded" | "pending"
      id: string
      version: number
      ageMs?: number
      kinds: Record<ResourceKind, KindStatus>
    }
    session: {
      status: "ok" | "auth_exhausted"
      authAttempts: number
      reauthentications: number
    }
    scheduler: {
      status: "ok" | "partial"
      tasks: TaskStatus[]
    }
    export: {
      status: "ok" | "failed" | "none"
      last?: ExportResult
    }
  }
}

export interface HealthDeps {
  registry: MetricRegistry
  scheduler: Scheduler
  getSessionStats: () => SessionStats
  getLastExport: () => ExportResult | undefined
  clock?: () => number
}

export class HealthAggregator {
  private readonly clock: () => number
  private readonly bootTime: number

  constructor(private readonly deps: HealthDeps) {
    this.clock = deps.clock ?? Date.now
    this.bootTime = this.clock()
  }

  check(): HealthStatus {
    const now = this.clock()
    const snapshot = this.deps.registry.current()
    const collected = this.deps.registry.hasCollected()
    const kindStatuses = RESOURCE_KINDS.map((kind) => snapshot.status[kind].status)
    const session = this.deps.getSessionStats()
    const tasks = this.deps.scheduler.getStatus()
    const lastExport = this.deps.getLastExport()

    const checks: HealthStatus["checks"] = {
      snapshot: {
        status: !collected
          ? "pending"
          : kindStatuses.includes("Failed")
            ? "degraded"
            : kindStatuses.includes("Partial")
              ? "partial"
              : "ok",
        id: snapshot.id,
        version: snapshot.version,
        ageMs: collected ? now - snapshot.completedAt : undefined,
        kinds: { ...snapshot.status },
      },
      session: {
        status: session.exhausted ? "auth_exhausted" : "ok",
        authAttempts: session.authAttempts,
        reauthentications: session.reauthentications,
      },
      scheduler: {
        status: tasks.some((t) => t.circuitBreakerState === "open") ? "partial" : "ok",
        tasks,
      },
      export: {
        status: !lastExport ? "none" : lastExport.ok ? "ok" : "failed",
        last: lastExport,
      },
    }

    let overall: HealthStatus["status"] = "healthy"
    if (checks.session.status === "auth_exhausted" || (collected && kindStatuses.every((s) => s === "Failed"))) {
      overall = "unhealthy"
    } else if (
      checks.snapshot.status !== "ok" ||
      checks.scheduler.status !== "ok" ||
      checks.export.status === "failed"
    ) {
      overall = "degraded"
    }

    return {
      status: overall,
      uptime: now - this.bootTime,
      timestamp: now,
      checks,
    }
  }
}
