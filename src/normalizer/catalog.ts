// src/normalizer/catalog.ts — Canonical metric names, units and label schemas

import type { MetricUnit, ResourceKind } from "../snapshot/types.js"

export interface MetricDef {
  readonly name: string
  readonly kind: ResourceKind
  readonly unit: MetricUnit
}

function def(name: string, kind: ResourceKind, unit: MetricUnit): MetricDef {
  return { name, kind, unit }
}

export const METRICS = {
  // Cluster
  clusterCpuUsage: def("nutanix_cluster_cpu_usage_percent", "Cluster", "percent"),
  clusterMemoryUsage: def("nutanix_cluster_memory_usage_percent", "Cluster", "percent"),
  clusterStorageUsage: def("nutanix_cluster_storage_usage_bytes", "Cluster", "bytes"),
  clusterStorageCapacity: def("nutanix_cluster_storage_capacity_bytes", "Cluster", "bytes"),
  clusterStorageFree: def("nutanix_cluster_storage_free_bytes", "Cluster", "bytes"),
  clusterNodeCount: def("nutanix_cluster_node_count", "Cluster", "count"),
  clusterPhysicalCores: def("nutanix_cluster_physical_cpu_cores", "Cluster", "count"),
  // Derived per cluster at aggregation time
  vmCount: def("nutanix_vm_count", "Cluster", "count"),
  hostCount: def("nutanix_host_count", "Cluster", "count"),
  // VM
  vmPowerState: def("nutanix_vm_power_state", "VM", "state"),
  vmCpuCount: def("nutanix_vm_cpu_count", "VM", "count"),
  vmMemoryBytes: def("nutanix_vm_memory_bytes", "VM", "bytes"),
  vmDiskSizeBytes: def("nutanix_vm_disk_size_bytes", "VM", "bytes"),
  // Host
  hostCpuUsage: def("nutanix_host_cpu_usage_percent", "Host", "percent"),
  hostMemoryUsage: def("nutanix_host_memory_usage_percent", "Host", "percent"),
  hostNumVms: def("nutanix_host_num_vms", "Host", "count"),
  hostPhysicalCores: def("nutanix_host_physical_cpu_cores", "Host", "count"),
  hostCpuSockets: def("nutanix_host_cpu_sockets", "Host", "count"),
  // Storage container
  containerUsage: def("nutanix_storage_container_usage_bytes", "StorageContainer", "bytes"),
  containerCapacity: def("nutanix_storage_container_capacity_bytes", "StorageContainer", "bytes"),
  // File server
  fileServerCapacity: def("nutanix_file_server_capacity_bytes", "FileServer", "bytes"),
  fileServerUsed: def("nutanix_file_server_used_bytes", "FileServer", "bytes"),
  fileServerAvailable: def("nutanix_file_server_available_bytes", "FileServer", "bytes"),
  fileServerFiles: def("nutanix_file_server_files_count", "FileServer", "count"),
  fileServerConnections: def("nutanix_file_server_connections", "FileServer", "count"),
} satisfies Record<string, MetricDef>

const BY_NAME: ReadonlyMap<string, MetricDef> = new Map(
  Object.values(METRICS).map((m): [string, MetricDef] => [m.name, m]),
)

export function metricDef(name: string): MetricDef | undefined {
  return BY_NAME.get(name)
}

/** Every canonical metric name, for validating precedence overrides. */
export function metricNames(): string[] {
  return [...BY_NAME.keys()]
}

export interface LabelSchema {
  readonly name: string
  readonly uuid: string
  /** Append the owning cluster's name */
  readonly cluster: boolean
}

/** Label keys for a resource's own series, emitted as name, uuid, then cluster_name. */
export const RESOURCE_LABELS: Record<ResourceKind, LabelSchema> = {
  Cluster: { name: "cluster_name", uuid: "cluster_uuid", cluster: false },
  Host: { name: "host_name", uuid: "host_uuid", cluster: true },
  VM: { name: "vm_name", uuid: "vm_uuid", cluster: true },
  StorageContainer: { name: "container_name", uuid: "container_uuid", cluster: false },
  FileServer: { name: "file_server_name", uuid: "file_server_uuid", cluster: false },
}

export const MIB = 1_048_576
export const PPM_PER_PERCENT = 10_000
