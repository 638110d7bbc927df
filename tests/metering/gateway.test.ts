// tests/metering/gateway.test.ts — HTTP routes over the served snapshot

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { createApp } from "../../src/gateway/server.js"
import { createTelemetry, TELEMETRY } from "../../src/gateway/telemetry.js"
import { PricingCatalog } from "../../src/billing/pricing.js"
import { HealthAggregator } from "../../src/scheduler/health.js"
import { Scheduler } from "../../src/scheduler/scheduler.js"
import { MetricRegistry } from "../../src/snapshot/registry.js"
import { EXPOSITION_CONTENT_TYPE } from "../../src/snapshot/exposition.js"
import { deepFreeze, type Snapshot } from "../../src/snapshot/types.js"
import { snapshotOf } from "../mocks/snapshots.js"

const TOKEN = "test-secret"

function servedSnapshot(): Snapshot {
  return deepFreeze<Snapshot>({
    ...snapshotOf([]),
    records: [
      {
        resource: { kind: "Cluster", uuid: "c-1", displayName: "alpha" },
        metric: "nutanix_cluster_node_count",
        value: 3,
        unit: "count",
        labels: [["cluster", "alpha"]],
        observedAt: 1,
      },
    ],
  })
}

describe("gateway", () => {
  let registry: MetricRegistry

  beforeEach(() => {
    registry = new MetricRegistry()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("serves an empty exposition before the first cycle", async () => {
    const app = createApp({ registry, telemetry: createTelemetry() })

    const res = await app.request("/metrics")

    expect(res.status).toBe(200)
    expect(res.headers.get("content-type")).toBe(EXPOSITION_CONTENT_TYPE)
    expect(await res.text()).toBe("")
  })

  it("serves the published snapshot", async () => {
    registry.publish(servedSnapshot())
    const app = createApp({ registry, telemetry: createTelemetry() })

    const res = await app.request("/metrics")

    expect(await res.text()).toBe('nutanix_cluster_node_count{cluster="alpha"} 3\n')
  })

  it("requires the bearer token on metrics and api routes", async () => {
    const app = createApp({ registry, telemetry: createTelemetry(), bearerToken: TOKEN })

    const missing = await app.request("/metrics")
    expect(missing.status).toBe(401)
    expect(await missing.json()).toEqual({ error: "Unauthorized", code: "AUTH_REQUIRED" })

    const wrong = await app.request("/metrics/exporter", { headers: { Authorization: "Bearer nope" } })
    expect(wrong.status).toBe(401)
    expect(await wrong.json()).toEqual({ error: "Unauthorized", code: "AUTH_INVALID" })

    const basic = await app.request("/api/pricing", { headers: { Authorization: `Basic ${TOKEN}` } })
    expect(basic.status).toBe(401)

    const ok = await app.request("/metrics", { headers: { Authorization: `Bearer ${TOKEN}` } })
    expect(ok.status).toBe(200)
  })

  it("leaves /health open and maps unhealthy to 503", async () => {
    const health = new HealthAggregator({
      registry,
      scheduler: new Scheduler(),
      getSessionStats: () => ({ authAttempts: 3, reauthentications: 0, consecutiveFailures: 3, exhausted: true }),
      getLastExport: () => undefined,
    })
    const app = createApp({ registry, telemetry: createTelemetry(), healthAggregator: health, bearerToken: TOKEN })

    const res = await app.request("/health")

    expect(res.status).toBe(503)
    expect(await res.json()).toMatchObject({ status: "unhealthy", checks: { session: { status: "auth_exhausted" } } })
  })

  it("reports a bare healthy status without an aggregator", async () => {
    const app = createApp({ registry, telemetry: createTelemetry() })

    const res = await app.request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ status: "healthy" })
  })

  it("serves the exporter's own metrics", async () => {
    const telemetry = createTelemetry()
    telemetry.incrementCounter(TELEMETRY.cycles, { result: "success" })
    const app = createApp({ registry, telemetry })

    const body = await (await app.request("/metrics/exporter")).text()

    expect(body).toContain("# TYPE metering_cycles_total counter\n")
    expect(body).toContain('metering_cycles_total{result="success"} 1\n')
  })

  describe("pricing routes", () => {
    let dir: string

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "metering-gateway-"))
    })

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    it("answers 404 when pricing is not configured", async () => {
      const app = createApp({ registry, telemetry: createTelemetry() })

      const res = await app.request("/api/active-rates")

      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({ error: "Pricing not configured" })
    })

    it("serves the catalog and the active rates", async () => {
      const path = join(dir, "pricing.json")
      const entry = { name: "NCI Pro", hourly_rate: 0.12, annual_rate: 1051.2, unit: "core" }
      await writeFile(path, JSON.stringify({ nci: { "NCI-PRO": entry }, nus: {}, active: { nci: "NCI-PRO", nus: "" } }))
      const telemetry = createTelemetry()
      const app = createApp({ registry, telemetry, pricing: new PricingCatalog(path, telemetry) })

      const rates = await app.request("/api/active-rates")
      expect(await rates.json()).toEqual({
        nci: entry,
        nus: { name: "Not Set", hourly_rate: 0, annual_rate: 0, unit: "N/A" },
      })

      const exporter = await (await app.request("/metrics/exporter")).text()
      expect(exporter).toContain("nutanix_pricing_active_nci_rate 0.12\n")
    })

    it("reports a broken pricing file as a 500 without breaking self-metrics", async () => {
      const path = join(dir, "pricing.json")
      await writeFile(path, "not json")
      const telemetry = createTelemetry()
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
      const app = createApp({ registry, telemetry, pricing: new PricingCatalog(path, telemetry) })

      const res = await app.request("/api/pricing")
      expect(res.status).toBe(500)
      expect(await res.json()).toEqual({ error: `Pricing file ${path} is not valid JSON` })

      const exporter = await app.request("/metrics/exporter")
      expect(exporter.status).toBe(200)
      expect(warn).toHaveBeenCalledWith(`[pricing] Pricing file ${path} is not valid JSON`)
    })
  })
})
