// src/adapters/types.ts — Endpoint adapter contract and adapter-local records
//
// Records keep each generation's own units (ppm, MiB, strings for power state);
// the normalizer turns them into canonical metrics. Every field except the
// discriminators may be missing: absence is data, not zero.

import type { ResourceKind } from "../snapshot/types.js"
import type { AuthMode } from "../prism/client.js"
import { MeteringError, abortReason, toMeteringError } from "../errors.js"
import { raceAbort } from "../shared/sleep.js"

export const ADAPTER_IDS = ["legacy-stats", "resource-list", "file-service"] as const
export type AdapterId = (typeof ADAPTER_IDS)[number]

export function isAdapterId(value: string): value is AdapterId {
  return ADAPTER_IDS.some((id) => id === value)
}

// ---------------------------------------------------------------------------
// Adapter-local records
// ---------------------------------------------------------------------------

interface RecordBase {
  /** Set when the entity failed its schema check; every other field is then absent */
  malformed?: true
  uuid?: string
  name?: string
  /** Epoch ms at which the page carrying this record was received */
  observedAt: number
}

/** v2 cluster entity: detailed hypervisor and storage stats */
export interface LegacyClusterRecord extends RecordBase {
  shape: "legacy-cluster"
  kind: "Cluster"
  numNodes?: number
  cpuCores?: number
  cpuUsagePpm?: number
  memoryUsagePpm?: number
  storageUsageBytes?: number
  storageCapacityBytes?: number
  storageFreeBytes?: number
}

/** v2 storage container entity */
export interface LegacyContainerRecord extends RecordBase {
  shape: "legacy-container"
  kind: "StorageContainer"
  usageBytes?: number
  capacityBytes?: number
}

/** v3 cluster entity: identity and node list */
export interface ListedClusterRecord extends RecordBase {
  shape: "listed-cluster"
  kind: "Cluster"
  numNodes?: number
}

export interface ListedDisk {
  sizeBytes?: number
  sizeMib?: number
  /** "DISK", "CDROM", ... as reported by device_properties */
  deviceType?: string
}

/** v3 VM entity */
export interface ListedVmRecord extends RecordBase {
  shape: "listed-vm"
  kind: "VM"
  clusterUuid?: string
  clusterName?: string
  powerState?: string
  numSockets?: number
  vcpusPerSocket?: number
  memoryMib?: number
  /** Undefined when the API did not return a disk list at all */
  disks?: ListedDisk[]
}

/** v3 host entity */
export interface ListedHostRecord extends RecordBase {
  shape: "listed-host"
  kind: "Host"
  clusterUuid?: string
  clusterName?: string
  cpuUsagePpm?: number
  memoryUsagePpm?: number
  numVms?: number
  cpuCores?: number
  cpuSockets?: number
}

/** Files v4 file server with its stats (stats fields absent when the stats call failed) */
export interface FileServerRecord extends RecordBase {
  shape: "file-server"
  kind: "FileServer"
  capacityBytes?: number
  usedBytes?: number
  availableBytes?: number
  fileCount?: number
  connectionCount?: number
}

export type AdapterRecord =
  | LegacyClusterRecord
  | LegacyContainerRecord
  | ListedClusterRecord
  | ListedVmRecord
  | ListedHostRecord
  | FileServerRecord

/** Adapter that produced a record shape */
export const SHAPE_SOURCE: Record<AdapterRecord["shape"], AdapterId> = {
  "legacy-cluster": "legacy-stats",
  "legacy-container": "legacy-stats",
  "listed-cluster": "resource-list",
  "listed-vm": "resource-list",
  "listed-host": "resource-list",
  "file-server": "file-service",
}

// ---------------------------------------------------------------------------
// Adapter contract
// ---------------------------------------------------------------------------

export interface AdapterPage {
  records: AdapterRecord[]
  /** Failures that made this page incomplete without ending the drain */
  issues?: MeteringError[]
}

export interface EndpointAdapter {
  readonly id: AdapterId
  readonly generation: "v2.0" | "v3" | "v4.0"
  readonly auth: AuthMode
  readonly kinds: readonly ResourceKind[]
  /**
   * Lazy, restartable page sequence for one kind. Each call starts a fresh
   * drain; page N+1 is requested only after page N arrived.
   */
  fetch(kind: ResourceKind, signal: AbortSignal): AsyncIterable<AdapterPage>
}

// ---------------------------------------------------------------------------
// Pagination draining
// ---------------------------------------------------------------------------

export interface DrainResult {
  records: AdapterRecord[]
  /** True only when the sequence ended normally and no page carried issues */
  complete: boolean
  pages: number
  error?: MeteringError
}

/**
 * Consume a page sequence. Never throws: an error mid-sequence keeps what was
 * already yielded and marks the drain incomplete.
 */
export async function drainPages(pages: AsyncIterable<AdapterPage>, signal?: AbortSignal): Promise<DrainResult> {
  const records: AdapterRecord[] = []
  let count = 0
  let firstIssue: MeteringError | undefined
  const iterator = pages[Symbol.asyncIterator]()

  try {
    for (;;) {
      if (signal?.aborted) throw abortReason(signal)
      const next = await raceAbort(iterator.next(), signal)
      if (next.done) break
      count++
      records.push(...next.value.records)
      if (!firstIssue && next.value.issues && next.value.issues.length > 0) {
        firstIssue = next.value.issues[0]
      }
    }
  } catch (err) {
    // Let the generator run its finally blocks; its own failure is already in hand
    iterator.return?.().catch((cleanupErr: unknown) => {
      console.warn(`[adapter] page sequence cleanup failed: ${String(cleanupErr)}`)
    })
    return { records, complete: false, pages: count, error: toMeteringError(err) }
  }

  return { records, complete: firstIssue === undefined, pages: count, error: firstIssue }
}
