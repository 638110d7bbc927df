// src/billing/daily-export.ts — Fresh collection cycle → billing rows → export file

import type { Snapshot } from "../snapshot/types.js"
import { RESOURCE_KINDS } from "../snapshot/types.js"
import { TELEMETRY, type TelemetryRegistry } from "../gateway/telemetry.js"
import { previousDayPeriod, projectBillingRows, formatLocalDate, type ReportingPeriod } from "./projector.js"
import { exportFileName, formatTsv, writeExportFile } from "./export-file.js"

export interface DailyExportConfig {
  exportDir: string
  extension: string
  accountId: string
  appId: string
  billHostCores: boolean
}

export interface ExportResult {
  ok: boolean
  triggeredAt: number
  period: { start: string; end: string }
  /** Snapshot the rows were projected from */
  snapshotId: string
  snapshotVersion: number
  rows: number
  path?: string
  error?: string
}

export class DailyExportJob {
  private last: ExportResult | undefined
  private readonly now: () => Date
  private readonly telemetry: TelemetryRegistry | undefined

  constructor(
    private readonly config: DailyExportConfig,
    private readonly deps: {
      collect: (signal?: AbortSignal) => Promise<Snapshot>
      telemetry?: TelemetryRegistry
      now?: () => Date
    },
  ) {
    this.now = deps.now ?? (() => new Date())
    this.telemetry = deps.telemetry
  }

  lastResult(): ExportResult | undefined {
    return this.last
  }

  /**
   * Bill the previous local day from a snapshot collected right now. Collection
   * problems only shrink the file; a file is always written unless the
   * filesystem itself fails.
   */
  async run(signal?: AbortSignal): Promise<ExportResult> {
    const triggeredAt = this.now()
    const period = previousDayPeriod(triggeredAt)
    console.log(`[export] starting export for ${formatLocalDate(period.start)}..${formatLocalDate(period.end)}`)

    const snapshot = await this.deps.collect(signal)
    for (const kind of RESOURCE_KINDS) {
      const { status, error } = snapshot.status[kind]
      if (status !== "Complete") {
        console.warn(`[export] ${kind} is ${status} in snapshot ${snapshot.id}${error ? `: ${error}` : ""}`)
      }
    }

    const rows = projectBillingRows(snapshot, period, this.config.accountId, this.config.appId, {
      billHostCores: this.config.billHostCores,
    })
    const fileName = exportFileName(triggeredAt, this.config.extension)

    try {
      const path = await writeExportFile(this.config.exportDir, fileName, formatTsv(rows))
      console.log(`[export] wrote ${rows.length} rows from snapshot ${snapshot.id} (v${snapshot.version}) to ${path}`)
      this.telemetry?.incrementCounter(TELEMETRY.exports, { result: "success" })
      this.telemetry?.setGauge(TELEMETRY.exportRows, {}, rows.length)
      return this.record(triggeredAt, period, snapshot, rows.length, { ok: true, path })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      console.error(`[export] failed to write ${fileName}: ${message}`)
      this.telemetry?.incrementCounter(TELEMETRY.exports, { result: "failure" })
      this.record(triggeredAt, period, snapshot, rows.length, { ok: false, error: message })
      throw err
    }
  }

  private record(
    triggeredAt: Date,
    period: ReportingPeriod,
    snapshot: Snapshot,
    rows: number,
    outcome: { ok: boolean; path?: string; error?: string },
  ): ExportResult {
    this.last = {
      ...outcome,
      triggeredAt: triggeredAt.getTime(),
      period: { start: formatLocalDate(period.start), end: formatLocalDate(period.end) },
      snapshotId: snapshot.id,
      snapshotVersion: snapshot.version,
      rows,
    }
    return this.last
  }
}
