// src/gateway/server.ts — Hono app over the served snapshot, self-metrics and pricing

import { Hono } from "hono"
import type { MetricRegistry } from "../snapshot/registry.js"
import { EXPOSITION_CONTENT_TYPE, renderExposition } from "../snapshot/exposition.js"
import type { HealthAggregator } from "../scheduler/health.js"
import type { PricingCatalog } from "../billing/pricing.js"
import type { TelemetryRegistry } from "./telemetry.js"
import { bearerAuth } from "./auth.js"

export interface AppOptions {
  registry: MetricRegistry
  telemetry: TelemetryRegistry
  healthAggregator?: HealthAggregator
  pricing?: PricingCatalog
  /** Protects every route except /health when set */
  bearerToken?: string
}

export function createApp(options: AppOptions) {
  const app = new Hono()
  const auth = bearerAuth(options.bearerToken)

  // Health endpoint (no auth required)
  app.get("/health", (c) => {
    if (!options.healthAggregator) {
      return c.json({ status: "healthy", uptime: process.uptime() })
    }
    const health = options.healthAggregator.check()
    return c.json(health, health.status === "unhealthy" ? 503 : 200)
  })

  app.use("/metrics", auth)
  app.use("/metrics/*", auth)
  app.use("/api/*", auth)

  app.get("/metrics", (c) => {
    c.header("Content-Type", EXPOSITION_CONTENT_TYPE)
    return c.body(renderExposition(options.registry.current()))
  })

  app.get("/metrics/exporter", async (c) => {
    if (options.pricing) {
      // Refreshes the pricing gauges; a broken pricing file must not hide the rest
      await options.pricing.read().catch((err: unknown) => {
        console.warn(`[pricing] ${err instanceof Error ? err.message : String(err)}`)
      })
    }
    c.header("Content-Type", EXPOSITION_CONTENT_TYPE)
    return c.body(options.telemetry.serialize())
  })

  app.get("/api/pricing", async (c) => {
    if (!options.pricing) return c.json({ error: "Pricing not configured" }, 404)
    try {
      return c.json(await options.pricing.read())
    } catch (err) {
      return c.json({ error: err instanceof Error ? err.message : String(err) }, 500)
    }
  })

  app.get("/api/active-rates", async (c) => {
    if (!options.pricing) return c.json({ error: "Pricing not configured" }, 404)
    try {
      return c.json(await options.pricing.activeRates())
    } catch (err) {
      return c.json({ error: err instanceof Error ? err.message : String(err) }, 500)
    }
  })

  app.onError((err, c) => {
    console.error("[gateway] unhandled route error:", err)
    return c.json({ error: "Internal server error" }, 500)
  })

  return app
}
