// src/billing/pricing.ts — Read-only pricing catalog and rate gauges
//
// The pricing file is maintained by a separate tool, so it is re-read on every
// request. A missing file is an empty catalog; a file that fails validation is
// an error for that request only.

import { readFile } from "node:fs/promises"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { TelemetryRegistry } from "../gateway/telemetry.js"

export const PricingEntrySchema = Type.Object({
  name: Type.String(),
  hourly_rate: Type.Number({ minimum: 0 }),
  annual_rate: Type.Number({ minimum: 0 }),
  unit: Type.String(),
})

export const PricingDocumentSchema = Type.Object({
  nci: Type.Record(Type.String(), PricingEntrySchema),
  nus: Type.Record(Type.String(), PricingEntrySchema),
  active: Type.Object({
    nci: Type.String(),
    nus: Type.String(),
  }),
})

export type PricingEntry = Static<typeof PricingEntrySchema>
export type PricingDocument = Static<typeof PricingDocumentSchema>
export type PricingType = "nci" | "nus"

export const NOT_SET: PricingEntry = { name: "Not Set", hourly_rate: 0, annual_rate: 0, unit: "N/A" }

export const PRICING_GAUGES = {
  nciHourly: "nutanix_pricing_nci_hourly_rate",
  nusHourly: "nutanix_pricing_nus_hourly_rate",
  activeNci: "nutanix_pricing_active_nci_rate",
  activeNus: "nutanix_pricing_active_nus_rate",
} as const

export function emptyPricing(): PricingDocument {
  return { nci: {}, nus: {}, active: { nci: "", nus: "" } }
}

/** Entry of the active product code, or NOT_SET when none is active. */
export function activeEntry(doc: PricingDocument, type: PricingType): PricingEntry {
  const code = doc.active[type]
  return (code && doc[type][code]) || NOT_SET
}

export class PricingCatalog {
  constructor(
    private readonly path: string | undefined,
    private readonly telemetry?: TelemetryRegistry,
  ) {
    if (telemetry) {
      telemetry.registerGauge(PRICING_GAUGES.nciHourly, "NCI hourly rate per core")
      telemetry.registerGauge(PRICING_GAUGES.nusHourly, "NUS hourly rate per TiB")
      telemetry.registerGauge(PRICING_GAUGES.activeNci, "Active NCI hourly rate per core")
      telemetry.registerGauge(PRICING_GAUGES.activeNus, "Active NUS hourly rate per TiB")
    }
  }

  /** Read and validate the pricing file, refreshing the rate gauges. */
  async read(): Promise<PricingDocument> {
    const doc = await this.load()
    this.updateGauges(doc)
    return doc
  }

  async activeRates(): Promise<Record<PricingType, PricingEntry>> {
    const doc = await this.read()
    return { nci: activeEntry(doc, "nci"), nus: activeEntry(doc, "nus") }
  }

  private async load(): Promise<PricingDocument> {
    if (!this.path) return emptyPricing()

    let raw: string
    try {
      raw = await readFile(this.path, "utf8")
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return emptyPricing()
      throw err
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (err) {
      throw new Error(`Pricing file ${this.path} is not valid JSON`, { cause: err })
    }
    if (!Value.Check(PricingDocumentSchema, parsed)) {
      const first = Value.Errors(PricingDocumentSchema, parsed).First()
      throw new Error(`Pricing file ${this.path} is invalid${first ? ` at ${first.path || "/"}: ${first.message}` : ""}`)
    }
    return parsed
  }

  private updateGauges(doc: PricingDocument): void {
    const t = this.telemetry
    if (!t) return
    t.resetGauge(PRICING_GAUGES.nciHourly)
    t.resetGauge(PRICING_GAUGES.nusHourly)
    for (const [code, entry] of Object.entries(doc.nci)) {
      t.setGauge(PRICING_GAUGES.nciHourly, { product_code: code, name: entry.name }, entry.hourly_rate)
    }
    for (const [code, entry] of Object.entries(doc.nus)) {
      t.setGauge(PRICING_GAUGES.nusHourly, { product_code: code, name: entry.name }, entry.hourly_rate)
    }
    t.setGauge(PRICING_GAUGES.activeNci, {}, activeEntry(doc, "nci").hourly_rate)
    t.setGauge(PRICING_GAUGES.activeNus, {}, activeEntry(doc, "nus").hourly_rate)
  }
}
