// src/snapshot/exposition.ts — Snapshot → Prometheus text lines

import { serializeLabelPairs } from "../gateway/telemetry.js"
import type { MetricRecord, Snapshot } from "./types.js"

export const EXPOSITION_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8"

export function formatRecord(record: MetricRecord): string {
  const labels = serializeLabelPairs(record.labels)
  return `${record.metric}${labels ? `{${labels}}` : ""} ${formatValue(record.value)}`
}

function formatValue(value: number): string {
  if (Number.isNaN(value)) return "NaN"
  if (value === Infinity) return "+Inf"
  if (value === -Infinity) return "-Inf"
  return String(value)
}

/** One line per record in snapshot order; empty string when there are no records. */
export function renderExposition(snapshot: Snapshot): string {
  if (snapshot.records.length === 0) return ""
  return snapshot.records.map(formatRecord).join("\n") + "\n"
}
