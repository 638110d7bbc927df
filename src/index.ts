// src/index.ts — Metering service entry point: boot, wiring, graceful shutdown

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { createTelemetry } from "./gateway/telemetry.js"
import { createApp } from "./gateway/server.js"
import { RequestRateLimiter } from "./prism/rate-limiter.js"
import { PrismTransport, createPrismFetch } from "./prism/transport.js"
import { PrismClient, type RetryPolicy } from "./prism/client.js"
import { SessionManager } from "./session/session-manager.js"
import { LegacyStatsAdapter } from "./adapters/legacy-stats.js"
import { ResourceListAdapter } from "./adapters/resource-list.js"
import { FileServiceAdapter } from "./adapters/file-service.js"
import { MetricRegistry } from "./snapshot/registry.js"
import { SnapshotAggregator, buildPlan } from "./snapshot/aggregator.js"
import { DailyExportJob } from "./billing/daily-export.js"
import { PricingCatalog } from "./billing/pricing.js"
import { HealthAggregator, Scheduler } from "./scheduler/index.js"

const FORCE_EXIT_MS = 30_000

async function main() {
  const bootStart = Date.now()
  console.log("[metering] booting...")

  // 1. Config (fail fast)
  const config = loadConfig()
  const baseUrl = `https://${config.prism.host}:${config.prism.port}`
  console.log(`[metering] prism=${baseUrl} interval=${config.collectionIntervalS}s budget=${config.cycleBudgetMs}ms export=${config.exportTime}`)
  if (!config.prism.tlsVerify) {
    console.warn("[metering] TLS certificate verification is disabled for the Prism API")
  }

  // 2. Outbound stack: limiter -> transport -> session -> client
  const telemetry = createTelemetry()
  const limiter = new RequestRateLimiter({ requestsPerSecond: config.rateLimitPerSecond })
  const http = createPrismFetch(config.prism.tlsVerify)
  const transport = new PrismTransport(
    { baseUrl, timeoutMs: config.prism.requestTimeoutMs },
    { fetch: http.fetch, limiter, telemetry },
  )
  const retry: RetryPolicy = {
    maxRetries: config.transientMaxRetries,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: 10_000,
  }
  const session = new SessionManager(
    transport,
    {
      username: config.prism.username,
      password: config.prism.password,
      maxAuthFailures: config.maxAuthFailures,
      sessionTtlMs: config.sessionTtlS * 1000,
      backoff: retry,
    },
    { telemetry },
  )
  const client = new PrismClient(transport, session, retry)

  // 3. Collection
  const adapterOptions = { pageSize: config.pageSize }
  const registry = new MetricRegistry()
  const aggregator = new SnapshotAggregator(
    { cycleBudgetMs: config.cycleBudgetMs, precedence: config.precedence },
    {
      plan: buildPlan({
        legacyStats: new LegacyStatsAdapter(client, adapterOptions),
        resourceList: new ResourceListAdapter(client, adapterOptions),
        fileService: new FileServiceAdapter(client, adapterOptions),
      }),
      session,
      registry,
      telemetry,
    },
  )

  // 4. Billing
  const exportJob = new DailyExportJob(
    {
      exportDir: config.exportDir,
      extension: config.exportExtension,
      accountId: config.accountId,
      appId: config.appId,
      billHostCores: config.billHostCores,
    },
    { collect: (signal) => aggregator.collect(signal), telemetry },
  )
  const pricing = new PricingCatalog(config.pricingFile, telemetry)

  // 5. Scheduler
  const scheduler = new Scheduler({ telemetry })
  scheduler.register({
    id: "collect",
    name: "Metrics collection",
    cadence: { kind: "every", intervalMs: config.collectionIntervalS * 1000 },
    handler: async (signal) => {
      await aggregator.collect(signal)
    },
  })
  scheduler.register({
    id: "daily_export",
    name: "Daily billing export",
    cadence: { kind: "daily", at: config.exportTime },
    handler: async (signal) => {
      await exportJob.run(signal)
    },
  })

  // 6. HTTP server
  const healthAggregator = new HealthAggregator({
    registry,
    scheduler,
    getSessionStats: () => session.stats(),
    getLastExport: () => exportJob.lastResult(),
  })
  const app = createApp({
    registry,
    telemetry,
    healthAggregator,
    pricing,
    bearerToken: config.metricsBearerToken,
  })
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[metering] ready on :${info.port} (boot: ${Date.now() - bootStart}ms)`)
  })

  // 7. Start tasks; first collection right away
  scheduler.start()
  scheduler.triggerNow("collect").catch((err: unknown) => {
    console.error("[metering] initial collection failed:", err)
  })
  if (config.runNow) {
    console.log("[metering] RUN_NOW set, running the daily export now")
    scheduler.triggerNow("daily_export").catch((err: unknown) => {
      console.error("[metering] immediate export failed:", err)
    })
  }

  // 8. Graceful shutdown
  // Order: stop timers and abort cycles, stop accepting requests, wait for
  // handlers (an export finishes its file or leaves none), release the session.
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    console.log(`[metering] ${signal} received, shutting down gracefully...`)

    scheduler.stop()
    server.close()
    await scheduler.drain()
    session.destroy()
    await http.close()

    console.log(`[metering] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    setTimeout(() => {
      console.error(`[metering] forced shutdown after ${FORCE_EXIT_MS / 1000}s timeout`)
      process.exit(1)
    }, FORCE_EXIT_MS).unref()

    gracefulShutdown(signal).catch((err: unknown) => {
      console.error("[metering] shutdown error:", err)
      process.exit(1)
    })
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err: unknown) => {
  console.error("[metering] fatal:", err)
  process.exit(1)
})
