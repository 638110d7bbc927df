// src/billing/projector.ts — Snapshot + reporting period → ordered billing rows
//
// The only place bytes become GB/TiB. Rounding is one decimal, half up, applied
// once per row.

import { METRICS } from "../normalizer/catalog.js"
import type { ResourceKind, Snapshot, SnapshotResource } from "../snapshot/types.js"

export const DEFAULT_ACCOUNT_ID = "123456"
export const BYTES_PER_GB = 1_073_741_824
export const BYTES_PER_TIB = 1_099_511_627_776

export const BILLING_COLUMNS = [
  "accountId",
  "qty",
  "startDate",
  "endDate",
  "meteredItem",
  "appid",
  "sno",
  "fqdn",
  "type",
  "description",
  "guid",
] as const

export const METERED_ITEMS = ["vCPU", "Memory_GB", "Storage_GB", "Files_TiB", "Cores"] as const
export type MeteredItem = (typeof METERED_ITEMS)[number]

export type BilledKind = Extract<ResourceKind, "VM" | "FileServer" | "Host">

export interface BillingRow {
  accountId: string
  qty: number
  /** YYYY-MM-DD, local */
  startDate: string
  endDate: string
  meteredItem: MeteredItem
  appid: string
  /** 1-based emission index */
  sno: number
  fqdn: string
  type: BilledKind
  description: string
  guid: string
}

export interface ReportingPeriod {
  start: Date
  end: Date
}

export interface ProjectionOptions {
  /** Emit one Cores row per host after the file server rows */
  billHostCores?: boolean
}

/** The previous local calendar day: [yesterday 00:00, today 00:00). */
export function previousDayPeriod(now: Date): ReportingPeriod {
  const end = new Date(now.getFullYear(), now.getMonth(), now.getDate())
  const start = new Date(end.getFullYear(), end.getMonth(), end.getDate() - 1)
  return { start, end }
}

/** Local date as YYYY-MM-DD. */
export function formatLocalDate(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, "0")
  const m = String(date.getMonth() + 1).padStart(2, "0")
  const d = String(date.getDate()).padStart(2, "0")
  return `${y}-${m}-${d}`
}

/** One decimal place, half up. toPrecision strips the binary noise of the x10 step. */
export function roundHalfUp1(value: number): number {
  return Math.round(Number((value * 10).toPrecision(12))) / 10
}

/** Quantity as written to the export: fractional items keep one decimal. */
export function formatQty(item: MeteredItem, qty: number): string {
  return item === "Memory_GB" || item === "Storage_GB" || item === "Files_TiB" ? qty.toFixed(1) : String(qty)
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function compareBy(...keys: Array<(r: SnapshotResource) => string>) {
  return (a: SnapshotResource, b: SnapshotResource): number => {
    for (const key of keys) {
      const c = compareText(key(a), key(b))
      if (c !== 0) return c
    }
    return 0
  }
}

const clusterOf = (r: SnapshotResource) => r.clusterName ?? ""
const nameOf = (r: SnapshotResource) => r.identity.displayName
const uuidOf = (r: SnapshotResource) => r.identity.uuid

interface RowDraft {
  resource: SnapshotResource
  item: MeteredItem
  qty: number | undefined
  description: string
}

export function projectBillingRows(
  snapshot: Snapshot,
  period: ReportingPeriod,
  accountId: string,
  appId: string,
  options: ProjectionOptions = {},
): BillingRow[] {
  const startDate = formatLocalDate(period.start)
  const endDate = formatLocalDate(period.end)
  const configured = accountId !== DEFAULT_ACCOUNT_ID

  const billable = (kind: ResourceKind): SnapshotResource[] =>
    snapshot.status[kind].status === "Failed"
      ? []
      : snapshot.resources.filter((r) => r.identity.kind === kind)

  const drafts: RowDraft[] = []

  for (const vm of billable("VM").sort(compareBy(clusterOf, nameOf, uuidOf))) {
    const name = vm.identity.displayName
    const memory = vm.values[METRICS.vmMemoryBytes.name]
    const disk = vm.values[METRICS.vmDiskSizeBytes.name]
    drafts.push(
      { resource: vm, item: "vCPU", qty: vm.values[METRICS.vmCpuCount.name], description: `vCPUs allocated to VM ${name}` },
      {
        resource: vm,
        item: "Memory_GB",
        qty: memory === undefined ? undefined : roundHalfUp1(memory / BYTES_PER_GB),
        description: `Memory (GB) allocated to VM ${name}`,
      },
      {
        resource: vm,
        item: "Storage_GB",
        qty: disk === undefined ? undefined : roundHalfUp1(disk / BYTES_PER_GB),
        description: `Storage (GB) provisioned for VM ${name}`,
      },
    )
  }

  for (const fs of billable("FileServer").sort(compareBy(nameOf, uuidOf))) {
    const used = fs.values[METRICS.fileServerUsed.name]
    drafts.push({
      resource: fs,
      item: "Files_TiB",
      qty: used === undefined ? undefined : roundHalfUp1(used / BYTES_PER_TIB),
      description: `Files consumed storage for ${fs.identity.displayName}`,
    })
  }

  if (options.billHostCores) {
    for (const host of billable("Host").sort(compareBy(nameOf, uuidOf))) {
      const cores = host.values[METRICS.hostPhysicalCores.name]
      if (cores === undefined || cores <= 0) continue
      drafts.push({
        resource: host,
        item: "Cores",
        qty: cores,
        description: `Physical CPU cores for host ${host.identity.displayName}`,
      })
    }
  }

  const rows: BillingRow[] = []
  for (const draft of drafts) {
    if (draft.qty === undefined) continue
    const { identity } = draft.resource
    const type: BilledKind = identity.kind === "VM" ? "VM" : identity.kind === "Host" ? "Host" : "FileServer"
    rows.push({
      accountId: configured
        ? accountId
        : type === "FileServer"
          ? DEFAULT_ACCOUNT_ID
          : draft.resource.clusterName ?? DEFAULT_ACCOUNT_ID,
      qty: draft.qty,
      startDate,
      endDate,
      meteredItem: draft.item,
      appid: appId,
      sno: rows.length + 1,
      fqdn: identity.displayName,
      type,
      description: draft.description,
      guid: identity.uuid,
    })
  }
  return rows
}
