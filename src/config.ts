// src/config.ts — Configuration loader from environment variables, read once at startup

import { DEFAULT_PRECEDENCE, parseFieldPrecedence, type PrecedenceTable } from "./normalizer/precedence.js"
import { DEFAULT_ACCOUNT_ID } from "./billing/projector.js"
import { dailyPattern } from "./scheduler/scheduler.js"

export interface MeteringConfig {
  // Prism
  prism: {
    host: string
    port: number
    username: string
    password: string
    tlsVerify: boolean
    requestTimeoutMs: number
  }

  // Collection
  collectionIntervalS: number
  cycleBudgetMs: number
  pageSize: number
  precedence: PrecedenceTable

  // Outbound call policy
  rateLimitPerSecond: number
  maxAuthFailures: number
  sessionTtlS: number
  transientMaxRetries: number
  retryBaseDelayMs: number

  // Export
  exportTime: string
  exportDir: string
  exportExtension: string
  accountId: string
  appId: string
  billHostCores: boolean
  runNow: boolean

  // Pricing
  pricingFile: string | undefined

  // Gateway
  port: number
  host: string
  metricsBearerToken: string | undefined
}

type Env = Record<string, string | undefined>

function parseIntEnv(env: Env, envKey: string, fallback: string, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value) || String(value) !== raw.trim()) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  if (value < min || value > max) {
    throw new Error(`${envKey} must be between ${min} and ${max} (got ${value})`)
  }
  return value
}

function parseBoolEnv(env: Env, envKey: string, fallback: boolean): boolean {
  const raw = env[envKey]
  if (raw === undefined || raw === "") return fallback
  switch (raw.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true
    case "0":
    case "false":
    case "no":
      return false
    default:
      throw new Error(`${envKey} must be a boolean (got "${raw}")`)
  }
}

function requireEnv(env: Env, envKey: string): string {
  const value = env[envKey]
  if (!value) throw new Error(`${envKey} is required`)
  return value
}

export function loadConfig(env: Env = process.env): MeteringConfig {
  const collectionIntervalS = parseIntEnv(env, "COLLECTION_INTERVAL_S", "60", 1)
  const intervalMs = collectionIntervalS * 1000
  const cycleBudgetMs = parseIntEnv(env, "CYCLE_BUDGET_MS", String(Math.floor(intervalMs * 0.75)), 1)
  if (cycleBudgetMs >= intervalMs) {
    throw new Error(`CYCLE_BUDGET_MS (${cycleBudgetMs}) must be below the collection interval (${intervalMs}ms)`)
  }

  const exportTime = env.EXPORT_TIME ?? "01:00"
  try {
    dailyPattern(exportTime)
  } catch (err) {
    throw new Error(`EXPORT_TIME: ${err instanceof Error ? err.message : String(err)}`)
  }

  const exportExtension = env.EXPORT_EXTENSION ?? "csv"
  if (!/^[A-Za-z0-9]+$/.test(exportExtension)) {
    throw new Error(`EXPORT_EXTENSION must be alphanumeric (got "${exportExtension}")`)
  }

  const precedenceSpec = env.FIELD_PRECEDENCE
  let precedence = DEFAULT_PRECEDENCE
  if (precedenceSpec) {
    try {
      precedence = parseFieldPrecedence(precedenceSpec)
    } catch (err) {
      throw new Error(`FIELD_PRECEDENCE: ${err instanceof Error ? err.message : String(err)}`)
    }
  }

  return {
    prism: {
      host: requireEnv(env, "PRISM_HOST"),
      port: parseIntEnv(env, "PRISM_PORT", "9440", 1, 65535),
      username: env.PRISM_USERNAME ?? "admin",
      password: requireEnv(env, "PRISM_PASSWORD"),
      tlsVerify: parseBoolEnv(env, "PRISM_TLS_VERIFY", false),
      requestTimeoutMs: parseIntEnv(env, "REQUEST_TIMEOUT_MS", "30000", 1),
    },

    collectionIntervalS,
    cycleBudgetMs,
    pageSize: parseIntEnv(env, "PAGE_SIZE", "500", 1),
    precedence,

    rateLimitPerSecond: parseIntEnv(env, "RATE_LIMIT_PER_SECOND", "10", 1),
    maxAuthFailures: parseIntEnv(env, "MAX_AUTH_FAILURES", "3", 1),
    sessionTtlS: parseIntEnv(env, "SESSION_TTL_S", "900", 1),
    transientMaxRetries: parseIntEnv(env, "TRANSIENT_MAX_RETRIES", "2"),
    retryBaseDelayMs: parseIntEnv(env, "RETRY_BASE_DELAY_MS", "500", 1),

    exportTime,
    exportDir: env.EXPORT_DIR ?? "./data/exports",
    exportExtension,
    accountId: env.ACCOUNT_ID ?? DEFAULT_ACCOUNT_ID,
    appId: env.APP_ID ?? "",
    billHostCores: parseBoolEnv(env, "BILL_HOST_CORES", false),
    runNow: parseBoolEnv(env, "RUN_NOW", false),

    pricingFile: env.PRICING_FILE || undefined,

    port: parseIntEnv(env, "PORT", "9090", 1, 65535),
    host: env.HOST ?? "0.0.0.0",
    metricsBearerToken: env.METRICS_BEARER_TOKEN || undefined,
  }
}
