// src/adapters/resource-list.ts — v3 adapter: POST list calls for clusters, hosts and VMs
//
// offset/length pagination; the drain ends once total_matches entities were
// seen or a page comes back empty.

import { MeteringError } from "../errors.js"
import type { PrismClient } from "../prism/client.js"
import type { ResourceKind } from "../snapshot/types.js"
import type { AdapterOptions } from "./legacy-stats.js"
import type {
  AdapterPage,
  AdapterRecord,
  EndpointAdapter,
  ListedClusterRecord,
  ListedHostRecord,
  ListedVmRecord,
} from "./types.js"
import { V3ClusterEntity, V3HostEntity, V3Page, V3VmEntity, checkEntity, checkEnvelope } from "./wire.js"

const BASE = "/api/nutanix/v3"

const COLLECTIONS: Partial<Record<ResourceKind, { path: string; kind: string }>> = {
  Cluster: { path: "clusters", kind: "cluster" },
  Host: { path: "hosts", kind: "host" },
  VM: { path: "vms", kind: "vm" },
}

export class ResourceListAdapter implements EndpointAdapter {
  readonly id = "resource-list"
  readonly generation = "v3"
  readonly auth = "basic"
  readonly kinds: readonly ResourceKind[] = ["Cluster", "Host", "VM"]
  private readonly clock: () => number

  constructor(
    private readonly client: PrismClient,
    private readonly options: AdapterOptions,
  ) {
    this.clock = options.clock ?? Date.now
  }

  async *fetch(kind: ResourceKind, signal: AbortSignal): AsyncGenerator<AdapterPage> {
    const collection = COLLECTIONS[kind]
    if (!collection) {
      throw new MeteringError({ code: "PERMANENT", message: `${this.id} does not serve ${kind}` })
    }
    const endpoint = `v3/${collection.path}/list`
    const length = this.options.pageSize
    let offset = 0

    for (;;) {
      const body = await this.client.postJson(
        `${BASE}/${collection.path}/list`,
        { kind: collection.kind, length, offset },
        { auth: this.auth, endpoint, signal },
      )
      const envelope = checkEnvelope(V3Page, body, endpoint)
      const entities = envelope.entities ?? []
      const observedAt = this.clock()
      const records = entities.map((entity) => toRecord(kind, entity, observedAt))
      yield { records }

      offset += entities.length
      const total = envelope.metadata.total_matches
      if (entities.length === 0 || total === undefined || offset >= total) return
    }
  }
}

function toRecord(kind: ResourceKind, entity: unknown, observedAt: number): AdapterRecord {
  switch (kind) {
    case "VM":
      return toListedVm(entity, observedAt)
    case "Host":
      return toListedHost(entity, observedAt)
    default:
      return toListedCluster(entity, observedAt)
  }
}

function toListedVm(entity: unknown, observedAt: number): ListedVmRecord {
  const e = checkEntity(V3VmEntity, entity)
  if (!e) return { shape: "listed-vm", kind: "VM", observedAt, malformed: true }
  const spec = e.spec?.resources
  const ref = e.spec?.cluster_reference ?? e.status?.cluster_reference
  return {
    shape: "listed-vm",
    kind: "VM",
    uuid: e.metadata.uuid,
    name: e.spec?.name ?? e.status?.name,
    observedAt,
    clusterUuid: ref?.uuid,
    clusterName: ref?.name,
    powerState: e.status?.resources?.power_state ?? spec?.power_state,
    numSockets: spec?.num_sockets,
    vcpusPerSocket: spec?.num_vcpus_per_socket,
    memoryMib: spec?.memory_size_mib,
    disks: spec?.disk_list?.map((d) => ({
      sizeBytes: d.disk_size_bytes,
      sizeMib: d.disk_size_mib,
      deviceType: d.device_properties?.device_type,
    })),
  }
}

function toListedHost(entity: unknown, observedAt: number): ListedHostRecord {
  const e = checkEntity(V3HostEntity, entity)
  if (!e) return { shape: "listed-host", kind: "Host", observedAt, malformed: true }
  const resources = e.status?.resources ?? e.spec?.resources
  const ref = e.status?.cluster_reference ?? e.spec?.cluster_reference
  return {
    shape: "listed-host",
    kind: "Host",
    uuid: e.metadata.uuid,
    name: e.spec?.name ?? e.status?.name,
    observedAt,
    clusterUuid: ref?.uuid,
    clusterName: ref?.name,
    cpuUsagePpm: resources?.hypervisor?.cpu_usage_ppm,
    memoryUsagePpm: resources?.hypervisor?.memory_usage_ppm,
    numVms: resources?.hypervisor?.num_vms,
    cpuCores: resources?.num_cpu_cores,
    cpuSockets: resources?.num_cpu_sockets,
  }
}

function toListedCluster(entity: unknown, observedAt: number): ListedClusterRecord {
  const e = checkEntity(V3ClusterEntity, entity)
  if (!e) return { shape: "listed-cluster", kind: "Cluster", observedAt, malformed: true }
  const servers = e.status?.resources?.nodes?.hypervisor_server_list
  return {
    shape: "listed-cluster",
    kind: "Cluster",
    uuid: e.metadata.uuid,
    name: e.spec?.name ?? e.status?.name,
    observedAt,
    numNodes: servers?.length,
  }
}
