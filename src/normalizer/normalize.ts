// src/normalizer/normalize.ts — Adapter record → canonical resource
//
// Pure and deterministic. Units leave this module canonical: percent for ppm
// ratios, raw bytes for sizes (MiB multiplied out), 1/0 for power state.
// A field the API did not report stays absent; nothing defaults to zero.

import type { ResourceKind } from "../snapshot/types.js"
import {
  SHAPE_SOURCE,
  type AdapterId,
  type AdapterRecord,
  type ListedDisk,
  type ListedVmRecord,
} from "../adapters/types.js"
import { METRICS, MIB, PPM_PER_PERCENT, type MetricDef } from "./catalog.js"

/** One adapter's view of a resource, before merging across generations. */
export interface CanonicalResource {
  readonly kind: ResourceKind
  readonly uuid: string
  readonly displayName?: string
  readonly source: AdapterId
  readonly clusterUuid?: string
  /** Cluster name carried by the record's own reference */
  readonly clusterRefName?: string
  readonly values: Readonly<Record<string, number>>
  readonly observedAt: number
}

export type DropReason = "missing_uuid" | "schema_mismatch"

export type NormalizeOutcome =
  | { ok: true; resource: CanonicalResource; warnings: string[] }
  | { ok: false; kind: ResourceKind; reason: DropReason }

class ValueSink {
  readonly values: Record<string, number> = {}
  readonly warnings: string[] = []

  constructor(private readonly label: string) {}

  count(metric: MetricDef, value: number | undefined): void {
    if (value === undefined) return
    if (value < 0) {
      this.warnings.push(`${this.label}: negative ${metric.name} (${value}) dropped`)
      return
    }
    this.values[metric.name] = value
  }

  bytes(metric: MetricDef, value: number | undefined): void {
    this.count(metric, value)
  }

  percentFromPpm(metric: MetricDef, ppm: number | undefined): void {
    if (ppm === undefined) return
    const percent = ppm / PPM_PER_PERCENT
    const clamped = Math.min(100, Math.max(0, percent))
    if (clamped !== percent) {
      this.warnings.push(`${this.label}: ${metric.name} ${percent} clamped to ${clamped}`)
    }
    this.values[metric.name] = clamped
  }

  powerState(metric: MetricDef, state: string | undefined): void {
    if (state === undefined) return
    if (state === "ON") this.values[metric.name] = 1
    else if (state === "OFF") this.values[metric.name] = 0
    else this.warnings.push(`${this.label}: unrecognized power state "${state}" dropped`)
  }
}

export function normalizeRecord(record: AdapterRecord): NormalizeOutcome {
  if (record.malformed) return { ok: false, kind: record.kind, reason: "schema_mismatch" }
  const { uuid } = record
  if (!uuid) return { ok: false, kind: record.kind, reason: "missing_uuid" }

  const sink = new ValueSink(`${record.kind} ${uuid}`)
  let clusterUuid: string | undefined
  let clusterRefName: string | undefined

  switch (record.shape) {
    case "legacy-cluster":
      sink.count(METRICS.clusterNodeCount, record.numNodes)
      sink.count(METRICS.clusterPhysicalCores, record.cpuCores)
      sink.percentFromPpm(METRICS.clusterCpuUsage, record.cpuUsagePpm)
      sink.percentFromPpm(METRICS.clusterMemoryUsage, record.memoryUsagePpm)
      sink.bytes(METRICS.clusterStorageUsage, record.storageUsageBytes)
      sink.bytes(METRICS.clusterStorageCapacity, record.storageCapacityBytes)
      sink.bytes(METRICS.clusterStorageFree, record.storageFreeBytes)
      break
    case "listed-cluster":
      sink.count(METRICS.clusterNodeCount, record.numNodes)
      break
    case "legacy-container":
      sink.bytes(METRICS.containerUsage, record.usageBytes)
      sink.bytes(METRICS.containerCapacity, record.capacityBytes)
      break
    case "listed-vm":
      normalizeVm(record, sink)
      clusterUuid = record.clusterUuid
      clusterRefName = record.clusterName
      break
    case "listed-host":
      sink.percentFromPpm(METRICS.hostCpuUsage, record.cpuUsagePpm)
      sink.percentFromPpm(METRICS.hostMemoryUsage, record.memoryUsagePpm)
      sink.count(METRICS.hostNumVms, record.numVms)
      sink.count(METRICS.hostPhysicalCores, record.cpuCores)
      sink.count(METRICS.hostCpuSockets, record.cpuSockets)
      clusterUuid = record.clusterUuid
      clusterRefName = record.clusterName
      break
    case "file-server":
      sink.bytes(METRICS.fileServerCapacity, record.capacityBytes)
      sink.bytes(METRICS.fileServerUsed, record.usedBytes)
      sink.bytes(METRICS.fileServerAvailable, record.availableBytes)
      sink.count(METRICS.fileServerFiles, record.fileCount)
      sink.count(METRICS.fileServerConnections, record.connectionCount)
      break
  }

  return {
    ok: true,
    resource: {
      kind: record.kind,
      uuid,
      displayName: record.name,
      source: SHAPE_SOURCE[record.shape],
      clusterUuid: clusterUuid || undefined,
      clusterRefName: clusterRefName || undefined,
      values: sink.values,
      observedAt: record.observedAt,
    },
    warnings: sink.warnings,
  }
}

function normalizeVm(record: ListedVmRecord, sink: ValueSink): void {
  sink.powerState(METRICS.vmPowerState, record.powerState)
  if (record.numSockets !== undefined && record.vcpusPerSocket !== undefined) {
    sink.count(METRICS.vmCpuCount, record.numSockets * record.vcpusPerSocket)
  }
  if (record.memoryMib !== undefined) {
    sink.bytes(METRICS.vmMemoryBytes, record.memoryMib * MIB)
  }
  const total = totalDiskBytes(record.disks)
  if (record.disks && total === undefined) {
    sink.warnings.push(`VM ${record.uuid}: disk without a size, ${METRICS.vmDiskSizeBytes.name} unknown`)
  }
  sink.bytes(METRICS.vmDiskSizeBytes, total)
}

/**
 * Sum of disk sizes. CD-ROM devices are not storage and are left out; undefined
 * when the list is absent or a disk device has no size.
 */
export function totalDiskBytes(disks: readonly ListedDisk[] | undefined): number | undefined {
  if (!disks) return undefined
  let total = 0
  for (const disk of disks) {
    if (disk.deviceType === "CDROM") continue
    if (disk.sizeBytes !== undefined) total += disk.sizeBytes
    else if (disk.sizeMib !== undefined) total += disk.sizeMib * MIB
    else return undefined
  }
  return total
}
