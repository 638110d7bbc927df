// src/adapters/legacy-stats.ts — v2.0 adapter: cluster and storage container stats

import { MeteringError } from "../errors.js"
import type { PrismClient } from "../prism/client.js"
import type { ResourceKind } from "../snapshot/types.js"
import type { AdapterPage, EndpointAdapter, LegacyClusterRecord, LegacyContainerRecord } from "./types.js"
import { V2ClusterEntity, V2ContainerEntity, V2Page, checkEntity, checkEnvelope, toNumber } from "./wire.js"

const BASE = "/api/nutanix/v2.0"

export interface AdapterOptions {
  pageSize: number
  clock?: () => number
}

export class LegacyStatsAdapter implements EndpointAdapter {
  readonly id = "legacy-stats"
  readonly generation = "v2.0"
  readonly auth = "basic"
  readonly kinds: readonly ResourceKind[] = ["Cluster", "StorageContainer"]
  private readonly clock: () => number

  constructor(
    private readonly client: PrismClient,
    private readonly options: AdapterOptions,
  ) {
    this.clock = options.clock ?? Date.now
  }

  async *fetch(kind: ResourceKind, signal: AbortSignal): AsyncGenerator<AdapterPage> {
    const collection = kind === "Cluster" ? "clusters" : kind === "StorageContainer" ? "storage_containers" : undefined
    if (!collection) {
      throw new MeteringError({ code: "PERMANENT", message: `${this.id} does not serve ${kind}` })
    }
    const endpoint = `v2.0/${collection}`
    let seen = 0

    for (let page = 1; ; page++) {
      const body = await this.client.getJson(`${BASE}/${collection}`, {
        auth: this.auth,
        endpoint,
        query: { page, count: this.options.pageSize },
        signal,
      })
      const envelope = checkEnvelope(V2Page, body, endpoint)
      const observedAt = this.clock()
      const records = envelope.entities.map((entity) =>
        kind === "Cluster" ? toLegacyCluster(entity, observedAt) : toLegacyContainer(entity, observedAt),
      )
      seen += records.length
      yield { records }

      const total = envelope.metadata?.total_entities
      if (records.length === 0 || total === undefined || seen >= total) return
    }
  }
}

function toLegacyCluster(entity: unknown, observedAt: number): LegacyClusterRecord {
  const e = checkEntity(V2ClusterEntity, entity)
  if (!e) return { shape: "legacy-cluster", kind: "Cluster", observedAt, malformed: true }
  const stats = e.stats ?? {}
  const usage = e.usage_stats ?? {}
  return {
    shape: "legacy-cluster",
    kind: "Cluster",
    uuid: e.uuid ?? e.cluster_uuid,
    name: e.name,
    observedAt,
    numNodes: toNumber(e.num_nodes),
    cpuCores: toNumber(e.num_cpu_cores) ?? toNumber(e.total_cpu_cores),
    cpuUsagePpm: toNumber(stats["hypervisor_cpu_usage_ppm"]),
    memoryUsagePpm: toNumber(stats["hypervisor_memory_usage_ppm"]),
    storageUsageBytes: toNumber(usage["storage.usage_bytes"]),
    storageCapacityBytes: toNumber(usage["storage.capacity_bytes"]),
    storageFreeBytes: toNumber(usage["storage.free_bytes"]),
  }
}

function toLegacyContainer(entity: unknown, observedAt: number): LegacyContainerRecord {
  const e = checkEntity(V2ContainerEntity, entity)
  if (!e) return { shape: "legacy-container", kind: "StorageContainer", observedAt, malformed: true }
  const usage = e.usage_stats ?? {}
  return {
    shape: "legacy-container",
    kind: "StorageContainer",
    uuid: e.storage_container_uuid,
    name: e.name,
    observedAt,
    usageBytes: toNumber(usage["storage.user_unreserved_usage_bytes"]),
    capacityBytes: toNumber(usage["storage.user_capacity_bytes"]),
  }
}
