// src/adapters/wire.ts — TypeBox schemas for the three Prism API generations
//
// Envelopes are strict enough to tell a page from an error document; entity
// schemas only pin field types, every field is optional. v2 reports most stats
// as decimal strings, hence NumLike.

import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { MeteringError } from "../errors.js"

const NumLike = Type.Union([Type.Number(), Type.String()])
const Str = Type.Optional(Type.String())

// ── v2.0 (legacy stats) ─────────────────────────────────────

export const V2Page = Type.Object({
  metadata: Type.Optional(
    Type.Object({
      total_entities: Type.Optional(Type.Number()),
      count: Type.Optional(Type.Number()),
      page: Type.Optional(Type.Number()),
    }),
  ),
  entities: Type.Array(Type.Unknown()),
})

export const V2ClusterEntity = Type.Object({
  uuid: Str,
  cluster_uuid: Str,
  name: Str,
  num_nodes: Type.Optional(NumLike),
  num_cpu_cores: Type.Optional(NumLike),
  total_cpu_cores: Type.Optional(NumLike),
  stats: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  usage_stats: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
})

export const V2ContainerEntity = Type.Object({
  storage_container_uuid: Str,
  name: Str,
  usage_stats: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
})

// ── v3 (resource list) ──────────────────────────────────────

export const V3Page = Type.Object({
  metadata: Type.Object({
    total_matches: Type.Optional(Type.Number()),
    length: Type.Optional(Type.Number()),
    offset: Type.Optional(Type.Number()),
  }),
  entities: Type.Optional(Type.Array(Type.Unknown())),
})

const V3Reference = Type.Object({
  uuid: Str,
  name: Str,
  kind: Str,
})

function v3Entity<R extends TSchema>(resources: R) {
  return Type.Object({
    metadata: Type.Object({ uuid: Str }),
    spec: Type.Optional(
      Type.Object({
        name: Str,
        cluster_reference: Type.Optional(V3Reference),
        resources: Type.Optional(resources),
      }),
    ),
    status: Type.Optional(
      Type.Object({
        name: Str,
        cluster_reference: Type.Optional(V3Reference),
        resources: Type.Optional(resources),
      }),
    ),
  })
}

const V3Disk = Type.Object({
  disk_size_bytes: Type.Optional(Type.Number()),
  disk_size_mib: Type.Optional(Type.Number()),
  device_properties: Type.Optional(
    Type.Object({
      device_type: Str,
    }),
  ),
})

export const V3VmEntity = v3Entity(
  Type.Object({
    power_state: Str,
    num_sockets: Type.Optional(Type.Number()),
    num_vcpus_per_socket: Type.Optional(Type.Number()),
    memory_size_mib: Type.Optional(Type.Number()),
    disk_list: Type.Optional(Type.Array(V3Disk)),
  }),
)

export const V3HostEntity = v3Entity(
  Type.Object({
    num_cpu_cores: Type.Optional(Type.Number()),
    num_cpu_sockets: Type.Optional(Type.Number()),
    hypervisor: Type.Optional(
      Type.Object({
        cpu_usage_ppm: Type.Optional(Type.Number()),
        memory_usage_ppm: Type.Optional(Type.Number()),
        num_vms: Type.Optional(Type.Number()),
      }),
    ),
  }),
)

export const V3ClusterEntity = v3Entity(
  Type.Object({
    nodes: Type.Optional(
      Type.Object({
        hypervisor_server_list: Type.Optional(Type.Array(Type.Unknown())),
      }),
    ),
  }),
)

// ── Files v4.0 ──────────────────────────────────────────────

export const V4ListPage = Type.Object({
  data: Type.Optional(Type.Array(Type.Unknown())),
  metadata: Type.Optional(
    Type.Object({
      totalAvailableResults: Type.Optional(Type.Number()),
    }),
  ),
})

export const V4FileServerEntity = Type.Object({
  extId: Str,
  name: Str,
})

const TimeSeries = Type.Array(Type.Object({ value: Type.Optional(Type.Number()) }))

export const V4FileServerStats = Type.Object({
  data: Type.Object({
    storageCapacityBytes: Type.Optional(Type.Number()),
    usedCapacityBytes: Type.Optional(Type.Number()),
    availableCapacityBytes: Type.Optional(Type.Number()),
    numberOfFiles: Type.Optional(TimeSeries),
    numberOfConnections: Type.Optional(TimeSeries),
  }),
})

// ── Helpers ─────────────────────────────────────────────────

/** Validate a response envelope; a mismatch is a malformed response (PERMANENT). */
export function checkEnvelope<T extends TSchema>(schema: T, body: unknown, endpoint: string): Static<T> {
  if (Value.Check(schema, body)) return body
  const first = Value.Errors(schema, body).First()
  throw new MeteringError({
    code: "PERMANENT",
    message: `${endpoint} response does not match the expected schema${first ? ` (${first.path || "/"}: ${first.message})` : ""}`,
    endpoint,
  })
}

/**
 * Validate one entity; undefined when it does not match (dropped downstream as
 * malformed). Properties sent as JSON null count as absent.
 */
export function checkEntity<T extends TSchema>(schema: T, entity: unknown): Static<T> | undefined {
  const cleaned = withoutNulls(entity)
  return Value.Check(schema, cleaned) ? cleaned : undefined
}

function withoutNulls(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(withoutNulls)
  if (typeof value !== "object" || value === null) return value
  const out: Record<string, unknown> = {}
  for (const [key, v] of Object.entries(value)) {
    if (v !== null) out[key] = withoutNulls(v)
  }
  return out
}

/** Number from a JSON number or decimal string; undefined for anything else. */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value)
    return Number.isFinite(n) ? n : undefined
  }
  return undefined
}

/** Latest value of a v4 time series. */
export function lastValue(series: ReadonlyArray<{ value?: number }> | undefined): number | undefined {
  if (!series || series.length === 0) return undefined
  return series[series.length - 1].value
}
