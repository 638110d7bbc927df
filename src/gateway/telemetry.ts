// src/gateway/telemetry.ts — Exporter self-metrics (counters, gauges, histograms)
//
// Served on /metrics/exporter, separate from the snapshot exposition so that
// /metrics stays empty until the first collection cycle.

// ---------------------------------------------------------------------------
// Histogram Buckets
// ---------------------------------------------------------------------------

/** Latency buckets in seconds, sized for Prism API calls and whole cycles */
const DEFAULT_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60]

// ---------------------------------------------------------------------------
// Metric Types
// ---------------------------------------------------------------------------

interface CounterMetric {
  name: string
  help: string
  labels: Map<string, number>
}

interface GaugeMetric {
  name: string
  help: string
  labels: Map<string, number>
}

interface HistogramMetric {
  name: string
  help: string
  buckets: number[]
  /** Map<serializedLabels, { bucketCounts, sum, count }> */
  observations: Map<string, HistogramObservation>
}

interface HistogramObservation {
  bucketCounts: number[] // same length as buckets
  sum: number
  count: number
}

// ---------------------------------------------------------------------------
// TelemetryRegistry
// ---------------------------------------------------------------------------

export class TelemetryRegistry {
  private readonly counters = new Map<string, CounterMetric>()
  private readonly gauges = new Map<string, GaugeMetric>()
  private readonly histograms = new Map<string, HistogramMetric>()

  registerCounter(name: string, help: string): void {
    if (!this.counters.has(name)) {
      this.counters.set(name, { name, help, labels: new Map() })
    }
  }

  registerGauge(name: string, help: string): void {
    if (!this.gauges.has(name)) {
      this.gauges.set(name, { name, help, labels: new Map() })
    }
  }

  registerHistogram(name: string, help: string, buckets?: number[]): void {
    if (!this.histograms.has(name)) {
      const sorted = [...(buckets ?? DEFAULT_BUCKETS)].sort((a, b) => a - b)
      this.histograms.set(name, { name, help, buckets: sorted, observations: new Map() })
    }
  }

  incrementCounter(name: string, labels: Record<string, string> = {}, value = 1): void {
    const counter = this.counters.get(name)
    if (!counter) return
    const key = serializeLabels(labels)
    counter.labels.set(key, (counter.labels.get(key) ?? 0) + value)
  }

  setGauge(name: string, labels: Record<string, string> = {}, value: number): void {
    const gauge = this.gauges.get(name)
    if (!gauge) return
    gauge.labels.set(serializeLabels(labels), value)
  }

  /** Drop every series of a gauge (for gauges rebuilt from a table). */
  resetGauge(name: string): void {
    this.gauges.get(name)?.labels.clear()
  }

  observeHistogram(name: string, labels: Record<string, string> = {}, value: number): void {
    const histogram = this.histograms.get(name)
    if (!histogram) return
    const key = serializeLabels(labels)

    let obs = histogram.observations.get(key)
    if (!obs) {
      obs = { bucketCounts: new Array<number>(histogram.buckets.length).fill(0), sum: 0, count: 0 }
      histogram.observations.set(key, obs)
    }

    obs.sum += value
    obs.count++
    for (let i = 0; i < histogram.buckets.length; i++) {
      if (value <= histogram.buckets[i]) {
        obs.bucketCounts[i]++
        break // only count in smallest applicable bucket; serialize() accumulates
      }
    }
  }

  /** Current value of a counter series, 0 when never incremented. */
  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(name)?.labels.get(serializeLabels(labels)) ?? 0
  }

  getGauge(name: string, labels: Record<string, string> = {}): number | undefined {
    return this.gauges.get(name)?.labels.get(serializeLabels(labels))
  }

  serialize(): string {
    const lines: string[] = []

    for (const [, counter] of this.counters) {
      lines.push(`# HELP ${counter.name} ${counter.help}`)
      lines.push(`# TYPE ${counter.name} counter`)
      for (const [labels, value] of counter.labels) {
        lines.push(`${counter.name}${wrap(labels)} ${value}`)
      }
    }

    for (const [, gauge] of this.gauges) {
      lines.push(`# HELP ${gauge.name} ${gauge.help}`)
      lines.push(`# TYPE ${gauge.name} gauge`)
      for (const [labels, value] of gauge.labels) {
        lines.push(`${gauge.name}${wrap(labels)} ${value}`)
      }
    }

    for (const [, histogram] of this.histograms) {
      lines.push(`# HELP ${histogram.name} ${histogram.help}`)
      lines.push(`# TYPE ${histogram.name} histogram`)
      for (const [labels, obs] of histogram.observations) {
        const baseLabels = labels ? `${labels},` : ""
        let cumulative = 0
        for (let i = 0; i < histogram.buckets.length; i++) {
          cumulative += obs.bucketCounts[i]
          lines.push(`${histogram.name}_bucket{${baseLabels}le="${histogram.buckets[i]}"} ${cumulative}`)
        }
        lines.push(`${histogram.name}_bucket{${baseLabels}le="+Inf"} ${obs.count}`)
        lines.push(`${histogram.name}_sum${wrap(labels)} ${obs.sum}`)
        lines.push(`${histogram.name}_count${wrap(labels)} ${obs.count}`)
      }
    }

    return lines.join("\n") + "\n"
  }
}

function wrap(labels: string): string {
  return labels ? `{${labels}}` : ""
}

/** Escape one label value for the text exposition format. */
export function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
}

export function serializeLabels(labels: Record<string, string>): string {
  return serializeLabelPairs(Object.entries(labels))
}

/** Serialize labels in the given order (metric records carry ordered label pairs). */
export function serializeLabelPairs(pairs: ReadonlyArray<readonly [string, string]>): string {
  if (pairs.length === 0) return ""
  return pairs.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`).join(",")
}

// ---------------------------------------------------------------------------
// Exporter metric set
// ---------------------------------------------------------------------------

export const TELEMETRY = {
  apiRequests: "nutanix_exporter_api_requests_total",
  apiRequestDuration: "nutanix_exporter_api_request_duration_seconds",
  scrapeErrors: "nutanix_exporter_scrape_errors_total",
  authAttempts: "metering_auth_attempts_total",
  recordsDropped: "metering_records_dropped_total",
  duplicateSeries: "metering_duplicate_series_total",
  cycles: "metering_cycles_total",
  cycleDuration: "metering_cycle_duration_seconds",
  kindStatus: "metering_kind_status",
  snapshotVersion: "metering_snapshot_version",
  exports: "metering_exports_total",
  exportRows: "metering_export_rows",
  schedulerSkips: "metering_scheduler_skipped_ticks_total",
} as const

/** Create a registry with every exporter metric registered. */
export function createTelemetry(): TelemetryRegistry {
  const t = new TelemetryRegistry()
  t.registerCounter(TELEMETRY.apiRequests, "Total Prism API requests by endpoint and outcome")
  t.registerHistogram(TELEMETRY.apiRequestDuration, "Prism API request duration in seconds")
  t.registerCounter(TELEMETRY.scrapeErrors, "Prism API calls that failed at the network level")
  t.registerCounter(TELEMETRY.authAttempts, "Authentication attempts by result")
  t.registerCounter(TELEMETRY.recordsDropped, "Adapter records dropped by the normalizer")
  t.registerCounter(TELEMETRY.duplicateSeries, "Metric records rejected as duplicate series")
  t.registerCounter(TELEMETRY.cycles, "Collection cycles by outcome")
  t.registerHistogram(TELEMETRY.cycleDuration, "Collection cycle duration in seconds")
  t.registerGauge(TELEMETRY.kindStatus, "Per resource kind status of the served snapshot (1=current)")
  t.registerGauge(TELEMETRY.snapshotVersion, "Version of the served snapshot")
  t.registerCounter(TELEMETRY.exports, "Daily export runs by result")
  t.registerGauge(TELEMETRY.exportRows, "Rows written by the last export")
  t.registerCounter(TELEMETRY.schedulerSkips, "Scheduler ticks skipped because the task was still running")
  return t
}
