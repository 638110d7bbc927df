// src/snapshot/aggregator.ts — One collection cycle end to end
//
// Cycles are serialized: collect() called while a cycle runs waits for it and
// then runs a fresh one. Each cycle gets its own abort controller, driven by the
// wall-clock budget, the caller's (shutdown) signal and AUTH_EXHAUSTED.

import { ulid } from "ulid"
import { MeteringError } from "../errors.js"
import { drainPages, type AdapterRecord, type DrainResult, type EndpointAdapter } from "../adapters/types.js"
import { normalizeRecord, type CanonicalResource } from "../normalizer/normalize.js"
import { DEFAULT_PRECEDENCE, mergeResources, type MergedResource, type PrecedenceTable } from "../normalizer/precedence.js"
import { METRICS, RESOURCE_LABELS, metricDef } from "../normalizer/catalog.js"
import { linkSignal } from "../shared/sleep.js"
import { TELEMETRY, serializeLabelPairs, type TelemetryRegistry } from "../gateway/telemetry.js"
import type { MetricRegistry } from "./registry.js"
import {
  RESOURCE_KINDS,
  byKind,
  deepFreeze,
  type KindStatus,
  type LabelPair,
  type MetricRecord,
  type ResourceIdentity,
  type ResourceKind,
  type Snapshot,
  type SnapshotResource,
} from "./types.js"

/** Adapters invoked per kind */
export type AdapterPlan = Readonly<Record<ResourceKind, readonly EndpointAdapter[]>>

export function buildPlan(adapters: {
  legacyStats: EndpointAdapter
  resourceList: EndpointAdapter
  fileService: EndpointAdapter
}): AdapterPlan {
  return {
    Cluster: [adapters.legacyStats, adapters.resourceList],
    Host: [adapters.resourceList],
    VM: [adapters.resourceList],
    StorageContainer: [adapters.legacyStats],
    FileServer: [adapters.fileService],
  }
}

export interface AggregatorConfig {
  cycleBudgetMs: number
  precedence?: PrecedenceTable
}

export interface AggregatorDeps {
  plan: AdapterPlan
  session: { beginCycle(): void }
  registry: MetricRegistry
  telemetry?: TelemetryRegistry
  clock?: () => number
  newId?: () => string
}

interface KindOutcome {
  status: KindStatus
  records: AdapterRecord[]
}

const UNKNOWN_CLUSTER = "unknown"
const MAX_LOGGED_WARNINGS = 5

export class SnapshotAggregator {
  private tail: Promise<void> = Promise.resolve()
  private version = 0
  /** Cluster uuid → name from earlier cycles */
  private readonly knownClusterNames = new Map<string, string>()
  private readonly clock: () => number
  private readonly newId: () => string
  private readonly precedence: PrecedenceTable

  constructor(
    private readonly config: AggregatorConfig,
    private readonly deps: AggregatorDeps,
  ) {
    if (config.cycleBudgetMs <= 0) {
      throw new Error(`cycleBudgetMs must be > 0 (got ${config.cycleBudgetMs})`)
    }
    this.clock = deps.clock ?? Date.now
    this.newId = deps.newId ?? ulid
    this.precedence = config.precedence ?? DEFAULT_PRECEDENCE
  }

  /** Run one full cycle and publish it. Never rejects. */
  collect(signal?: AbortSignal): Promise<Snapshot> {
    const run = this.tail.then(() => this.runCycle(signal))
    this.tail = run.then(
      () => undefined,
      (err: unknown) => {
        console.error("[collector] cycle chain error:", err)
      },
    )
    return run
  }

  private async runCycle(signal?: AbortSignal): Promise<Snapshot> {
    try {
      return await this.cycle(signal)
    } catch (err) {
      console.error("[collector] cycle failed unexpectedly, keeping the served snapshot:", err)
      this.deps.telemetry?.incrementCounter(TELEMETRY.cycles, { outcome: "error" })
      return this.deps.registry.current()
    }
  }

  private async cycle(signal?: AbortSignal): Promise<Snapshot> {
    const startedAt = this.clock()
    const { telemetry } = this.deps
    this.deps.session.beginCycle()

    const controller = new AbortController()
    const unlink = linkSignal(signal, controller)
    const budget = setTimeout(() => {
      controller.abort(new MeteringError({
        code: "CYCLE_ABORTED",
        message: `cycle budget of ${this.config.cycleBudgetMs}ms exceeded`,
      }))
    }, this.config.cycleBudgetMs)
    budget.unref()

    const { outcomes, authError } = await this.drainAll(controller).finally(() => {
      clearTimeout(budget)
      unlink()
    })

    const aborted = authError === undefined && controller.signal.aborted

    // Normalize
    const dropped: Record<string, number> = {}
    const canonical: CanonicalResource[] = []
    const warnings: string[] = []
    for (const kind of RESOURCE_KINDS) {
      for (const record of outcomes[kind].records) {
        const outcome = normalizeRecord(record)
        if (!outcome.ok) {
          const key = `${outcome.kind}:${outcome.reason}`
          dropped[key] = (dropped[key] ?? 0) + 1
          telemetry?.incrementCounter(TELEMETRY.recordsDropped, { kind: outcome.kind, reason: outcome.reason })
          continue
        }
        canonical.push(outcome.resource)
        warnings.push(...outcome.warnings)
      }
    }
    for (const warning of warnings.slice(0, MAX_LOGGED_WARNINGS)) console.warn(`[collector] ${warning}`)
    if (warnings.length > MAX_LOGGED_WARNINGS) {
      console.warn(`[collector] ... and ${warnings.length - MAX_LOGGED_WARNINGS} more normalization warnings`)
    }

    const resources = this.crossReference(mergeResources(canonical, this.precedence))
    const { records, duplicateSeries } = buildRecords(resources, outcomes)
    if (duplicateSeries > 0) telemetry?.incrementCounter(TELEMETRY.duplicateSeries, {}, duplicateSeries)

    const completedAt = this.clock()
    this.version = Math.max(this.version, this.deps.registry.current().version) + 1
    const snapshot = deepFreeze<Snapshot>({
      id: this.newId(),
      version: this.version,
      startedAt,
      completedAt,
      records,
      resources,
      status: byKind((kind) => outcomes[kind].status),
      diagnostics: {
        dropped,
        duplicateSeries,
        warnings: warnings.length,
        aborted,
        authExhausted: authError !== undefined,
        durationMs: completedAt - startedAt,
      },
    })

    this.deps.registry.publish(snapshot)
    this.report(snapshot)
    return snapshot
  }

  /** Drain every planned adapter call, concurrently across kinds. */
  private async drainAll(
    controller: AbortController,
  ): Promise<{ outcomes: Record<ResourceKind, KindOutcome>; authError?: MeteringError }> {
    const state: { authError?: MeteringError } = {}

    const drainKind = (kind: ResourceKind) =>
      Promise.all(
        this.deps.plan[kind].map(async (adapter) => {
          const result = await drainPages(adapter.fetch(kind, controller.signal), controller.signal)
          if (result.error?.code === "AUTH_EXHAUSTED" && !state.authError) {
            state.authError = result.error
            controller.abort(result.error)
          }
          if (result.error) {
            console.warn(`[adapter:${adapter.id}] ${kind} drain incomplete after ${result.pages} page(s): ${result.error.message}`)
          }
          return result
        }),
      )

    const settled = await Promise.all(RESOURCE_KINDS.map(drainKind))
    const outcomes = byKind((kind) => kindOutcome(settled[RESOURCE_KINDS.indexOf(kind)], state.authError))
    return { outcomes, authError: state.authError }
  }

  /** Resolve owning cluster names for VMs and hosts and remember cluster names. */
  private crossReference(merged: MergedResource[]): SnapshotResource[] {
    const thisCycle = new Map<string, string>()
    for (const r of merged) {
      if (r.kind === "Cluster" && r.displayName) thisCycle.set(r.uuid, r.displayName)
    }

    const resolve = (clusterUuid: string | undefined, refName: string | undefined): string => {
      if (!clusterUuid) return refName ?? UNKNOWN_CLUSTER
      return thisCycle.get(clusterUuid) ?? refName ?? this.knownClusterNames.get(clusterUuid) ?? clusterUuid
    }

    const resources = merged.map((r): SnapshotResource => {
      const identity: ResourceIdentity = { kind: r.kind, uuid: r.uuid, displayName: r.displayName ?? r.uuid }
      const owned = r.kind === "VM" || r.kind === "Host"
      return {
        identity,
        clusterUuid: owned ? r.clusterUuid : undefined,
        clusterName: owned ? resolve(r.clusterUuid, r.clusterRefName) : undefined,
        values: r.values,
        observedAt: r.observedAt,
      }
    })

    for (const [uuid, name] of thisCycle) this.knownClusterNames.set(uuid, name)
    return resources.sort(compareResources)
  }

  private report(snapshot: Snapshot): void {
    const { telemetry } = this.deps
    const summary = RESOURCE_KINDS.map((kind) => `${kind}=${snapshot.status[kind].status}`).join(" ")
    console.log(
      `[collector] snapshot v${snapshot.version} in ${snapshot.diagnostics.durationMs}ms: ${summary}, ${snapshot.records.length} records`,
    )
    if (!telemetry) return

    const outcome = snapshot.diagnostics.authExhausted
      ? "auth_exhausted"
      : snapshot.diagnostics.aborted
        ? "aborted"
        : RESOURCE_KINDS.every((kind) => snapshot.status[kind].status === "Complete")
          ? "complete"
          : "partial"
    telemetry.incrementCounter(TELEMETRY.cycles, { outcome })
    telemetry.observeHistogram(TELEMETRY.cycleDuration, {}, snapshot.diagnostics.durationMs / 1000)
    telemetry.setGauge(TELEMETRY.snapshotVersion, {}, snapshot.version)
    for (const kind of RESOURCE_KINDS) {
      for (const status of ["Complete", "Partial", "Failed"] as const) {
        telemetry.setGauge(TELEMETRY.kindStatus, { kind, status }, snapshot.status[kind].status === status ? 1 : 0)
      }
    }
  }
}

function kindOutcome(results: DrainResult[], authError: MeteringError | undefined): KindOutcome {
  const records = results.flatMap((r) => r.records)
  const firstError = results.find((r) => r.error)?.error
  const complete = results.every((r) => r.complete)

  if (complete) return { status: { status: "Complete" }, records }
  if (authError) return { status: { status: "Failed", error: authError.message }, records: [] }
  if (records.length > 0) return { status: { status: "Partial", error: firstError?.message }, records }
  return { status: { status: "Failed", error: firstError?.message ?? "no records" }, records: [] }
}

function compareResources(a: SnapshotResource, b: SnapshotResource): number {
  const byKindIndex = RESOURCE_KINDS.indexOf(a.identity.kind) - RESOURCE_KINDS.indexOf(b.identity.kind)
  if (byKindIndex !== 0) return byKindIndex
  return a.identity.uuid < b.identity.uuid ? -1 : a.identity.uuid > b.identity.uuid ? 1 : 0
}

function ownLabels(resource: SnapshotResource): LabelPair[] {
  const schema = RESOURCE_LABELS[resource.identity.kind]
  const labels: LabelPair[] = [
    [schema.name, resource.identity.displayName],
    [schema.uuid, resource.identity.uuid],
  ]
  if (schema.cluster) labels.push(["cluster_name", resource.clusterName ?? UNKNOWN_CLUSTER])
  return labels
}

/** Metric records for every resource plus per-cluster VM and host counts. */
function buildRecords(
  resources: readonly SnapshotResource[],
  outcomes: Record<ResourceKind, KindOutcome>,
): { records: MetricRecord[]; duplicateSeries: number } {
  const records: MetricRecord[] = []
  const seen = new Set<string>()
  let duplicateSeries = 0

  const emit = (resource: ResourceIdentity, metric: string, value: number, labels: LabelPair[], observedAt: number) => {
    const key = `${metric}{${serializeLabelPairs(labels)}}`
    if (seen.has(key)) {
      duplicateSeries++
      console.warn(`[collector] duplicate series rejected: ${key}`)
      return
    }
    seen.add(key)
    records.push({ resource, metric, value, unit: metricDef(metric)?.unit ?? "count", labels, observedAt })
  }

  for (const resource of resources) {
    const labels = ownLabels(resource)
    for (const [metric, value] of Object.entries(resource.values)) {
      emit(resource.identity, metric, value, labels, resource.observedAt)
    }
  }

  const clusters = resources.filter((r) => r.identity.kind === "Cluster")
  for (const [kind, metric] of [["VM", METRICS.vmCount.name], ["Host", METRICS.hostCount.name]] as const) {
    const groups = new Map<string, { name: string; count: number; observedAt: number }>()
    for (const r of resources) {
      if (r.identity.kind !== kind) continue
      const key = r.clusterUuid ?? ""
      const group = groups.get(key)
      if (group) {
        group.count++
        group.observedAt = Math.max(group.observedAt, r.observedAt)
      } else {
        groups.set(key, { name: r.clusterName ?? UNKNOWN_CLUSTER, count: 1, observedAt: r.observedAt })
      }
    }
    // A cluster with no members reports 0 only when the member kind was fully collected
    if (outcomes[kind].status.status === "Complete") {
      for (const c of clusters) {
        if (!groups.has(c.identity.uuid)) {
          groups.set(c.identity.uuid, { name: c.identity.displayName, count: 0, observedAt: c.observedAt })
        }
      }
    }

    for (const [clusterUuid, group] of [...groups].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      const cluster = clusters.find((c) => c.identity.uuid === clusterUuid)
      const identity: ResourceIdentity = cluster?.identity ?? { kind: "Cluster", uuid: clusterUuid, displayName: group.name }
      emit(identity, metric, group.count, [["cluster_name", group.name], ["cluster_uuid", clusterUuid]], group.observedAt)
    }
  }

  return { records, duplicateSeries }
}
