// tests/metering/health.test.ts — Health summary over snapshot, session, scheduler and export

import { describe, it, expect, vi, afterEach } from "vitest"
import { HealthAggregator } from "../../src/scheduler/health.js"
import { Scheduler } from "../../src/scheduler/scheduler.js"
import { MetricRegistry } from "../../src/snapshot/registry.js"
import type { SessionStats } from "../../src/session/session-manager.js"
import type { ExportResult } from "../../src/billing/daily-export.js"
import { snapshotOf } from "../mocks/snapshots.js"

const OK_SESSION: SessionStats = { authAttempts: 1, reauthentications: 0, consecutiveFailures: 0, exhausted: false }

function setup(opts: { session?: SessionStats; lastExport?: ExportResult } = {}) {
  let now = 1_000
  const registry = new MetricRegistry()
  const scheduler = new Scheduler({ clock: () => now })
  const health = new HealthAggregator({
    registry,
    scheduler,
    getSessionStats: () => opts.session ?? OK_SESSION,
    getLastExport: () => opts.lastExport,
    clock: () => now,
  })
  return {
    registry,
    scheduler,
    health,
    advance: (ms: number) => {
      now += ms
    },
  }
}

describe("HealthAggregator", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("reports a pending snapshot as degraded before the first cycle", () => {
    const { health } = setup()

    const result = health.check()

    expect(result.status).toBe("degraded")
    expect(result.checks.snapshot).toMatchObject({ status: "pending", id: "never-collected", version: 0 })
    expect(result.checks.snapshot.ageMs).toBeUndefined()
    expect(result.checks.export.status).toBe("none")
  })

  it("is healthy once a complete snapshot is served", () => {
    const { registry, health, advance } = setup()
    registry.publish(snapshotOf([]))
    advance(500)

    const result = health.check()

    expect(result).toMatchObject({ status: "healthy", uptime: 500, timestamp: 1_500 })
    expect(result.checks.snapshot).toMatchObject({ status: "ok", id: "snap-1", version: 1, ageMs: 1_498 })
  })

  it("degrades on a partial kind and on a failed kind", () => {
    const partial = setup()
    partial.registry.publish(snapshotOf([], { Host: { status: "Partial", error: "TRANSIENT: page 2" } }))
    expect(partial.health.check()).toMatchObject({ status: "degraded", checks: { snapshot: { status: "partial" } } })

    const failed = setup()
    failed.registry.publish(snapshotOf([], { FileServer: { status: "Failed", error: "PERMANENT: 500" } }))
    expect(failed.health.check()).toMatchObject({ status: "degraded", checks: { snapshot: { status: "degraded" } } })
  })

  it("is unhealthy when authentication is exhausted", () => {
    const { registry, health } = setup({
      session: { authAttempts: 3, reauthentications: 0, consecutiveFailures: 3, exhausted: true },
    })
    registry.publish(snapshotOf([]))

    expect(health.check()).toMatchObject({
      status: "unhealthy",
      checks: { session: { status: "auth_exhausted", authAttempts: 3 } },
    })
  })

  it("is unhealthy when every kind failed", () => {
    const { registry, health } = setup()
    const failed = { status: "Failed" as const, error: "TRANSIENT: down" }
    registry.publish(
      snapshotOf([], { Cluster: failed, Host: failed, VM: failed, StorageContainer: failed, FileServer: failed }),
    )

    expect(health.check().status).toBe("unhealthy")
  })

  it("degrades after a failed export", () => {
    const lastExport: ExportResult = {
      ok: false,
      triggeredAt: 1,
      period: { start: "2024-05-01", end: "2024-05-02" },
      snapshotId: "snap-1",
      snapshotVersion: 1,
      rows: 0,
      error: "disk full",
    }
    const { registry, health } = setup({ lastExport })
    registry.publish(snapshotOf([]))

    expect(health.check()).toMatchObject({ status: "degraded", checks: { export: { status: "failed", last: lastExport } } })
  })

  it("degrades while a task's circuit is open", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {})
    vi.spyOn(console, "error").mockImplementation(() => {})
    const { registry, scheduler, health } = setup()
    registry.publish(snapshotOf([]))
    scheduler.register({
      id: "collect",
      name: "Collect",
      cadence: { kind: "every", intervalMs: 60_000 },
      handler: async () => {
        throw new Error("boom")
      },
      circuitBreakerConfig: { failureThreshold: 1 },
    })

    await scheduler.triggerNow("collect")

    const result = health.check()
    expect(result.status).toBe("degraded")
    expect(result.checks.scheduler.status).toBe("partial")
    expect(result.checks.scheduler.tasks[0]).toMatchObject({ id: "collect", state: "error", lastError: "boom" })
  })
})
