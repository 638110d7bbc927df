// src/snapshot/types.ts — Canonical metric and snapshot model

// ---------------------------------------------------------------------------
// Resource identity
// ---------------------------------------------------------------------------

export const RESOURCE_KINDS = ["Cluster", "Host", "VM", "StorageContainer", "FileServer"] as const
export type ResourceKind = (typeof RESOURCE_KINDS)[number]

export interface ResourceIdentity {
  readonly kind: ResourceKind
  /** Stable join key across API generations */
  readonly uuid: string
  /** Not assumed unique */
  readonly displayName: string
}

// ---------------------------------------------------------------------------
// Metric records
// ---------------------------------------------------------------------------

export type MetricUnit = "bytes" | "percent" | "count" | "state"

export type LabelPair = readonly [key: string, value: string]

export interface MetricRecord {
  readonly resource: ResourceIdentity
  readonly metric: string
  readonly value: number
  readonly unit: MetricUnit
  /** Ordered; metric + labels is unique within a snapshot */
  readonly labels: readonly LabelPair[]
  readonly observedAt: number
}

/** A canonical resource after normalization, merge and cross-reference. */
export interface SnapshotResource {
  readonly identity: ResourceIdentity
  /** Owning cluster uuid, for Host and VM */
  readonly clusterUuid?: string
  /** Resolved owning cluster name used in labels and billing */
  readonly clusterName?: string
  /** Metric name → value; absent keys were not reported */
  readonly values: Readonly<Record<string, number>>
  readonly observedAt: number
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export type KindStatusValue = "Complete" | "Partial" | "Failed"

export interface KindStatus {
  readonly status: KindStatusValue
  readonly error?: string
}

export interface SnapshotDiagnostics {
  /** Records dropped by the normalizer, keyed "<kind>:<reason>" */
  readonly dropped: Readonly<Record<string, number>>
  readonly duplicateSeries: number
  readonly warnings: number
  /** True when the cycle budget or shutdown cut the cycle short */
  readonly aborted: boolean
  readonly authExhausted: boolean
  readonly durationMs: number
}

export interface Snapshot {
  readonly id: string
  readonly version: number
  readonly startedAt: number
  readonly completedAt: number
  readonly records: readonly MetricRecord[]
  readonly resources: readonly SnapshotResource[]
  readonly status: Readonly<Record<ResourceKind, KindStatus>>
  readonly diagnostics: SnapshotDiagnostics
}

/** Build a per-kind table from a factory. */
export function byKind<T>(make: (kind: ResourceKind) => T): Record<ResourceKind, T> {
  return {
    Cluster: make("Cluster"),
    Host: make("Host"),
    VM: make("VM"),
    StorageContainer: make("StorageContainer"),
    FileServer: make("FileServer"),
  }
}

function neverCollected(): Record<ResourceKind, KindStatus> {
  return byKind(() => ({ status: "Failed", error: "never collected" }))
}

/** Served before the first cycle completes. */
export const EMPTY_SNAPSHOT: Snapshot = deepFreeze({
  id: "never-collected",
  version: 0,
  startedAt: 0,
  completedAt: 0,
  records: [],
  resources: [],
  status: neverCollected(),
  diagnostics: {
    dropped: {},
    duplicateSeries: 0,
    warnings: 0,
    aborted: false,
    authExhausted: false,
    durationMs: 0,
  },
})

/** Recursively freeze plain objects and arrays. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}
