// src/normalizer/precedence.ts — Field precedence across API generations
//
// Several adapters can report the same resource (clusters come from v2 and v3).
// Each field takes its value from the first adapter in that field's list that
// reported it. Adapters missing from a list rank after the listed ones.

import type { ResourceKind } from "../snapshot/types.js"
import { ADAPTER_IDS, isAdapterId, type AdapterId } from "../adapters/types.js"
import { metricNames } from "./catalog.js"
import type { CanonicalResource } from "./normalize.js"

/** Field key for a kind's display name, e.g. "Cluster:display_name" */
export function displayNameField(kind: ResourceKind): string {
  return `${kind}:display_name`
}

export interface PrecedenceTable {
  readonly fallback: readonly AdapterId[]
  /** Field key (metric name or "<Kind>:display_name") → adapter order */
  readonly fields: Readonly<Record<string, readonly AdapterId[]>>
}

export const DEFAULT_PRECEDENCE: PrecedenceTable = {
  fallback: ["legacy-stats", "resource-list", "file-service"],
  fields: {
    "Cluster:display_name": ["resource-list", "legacy-stats"],
    nutanix_cluster_node_count: ["legacy-stats", "resource-list"],
  },
}

/**
 * Parse "field=a>b;field2=c>d" overrides on top of a base table.
 * Throws on unknown fields or adapter ids so a typo fails at startup.
 */
export function parseFieldPrecedence(spec: string, base: PrecedenceTable = DEFAULT_PRECEDENCE): PrecedenceTable {
  const fields: Record<string, readonly AdapterId[]> = { ...base.fields }
  const known = new Set(metricNames())

  for (const clause of spec.split(";")) {
    const trimmed = clause.trim()
    if (trimmed === "") continue
    const eq = trimmed.indexOf("=")
    if (eq <= 0) throw new Error(`Invalid precedence clause "${trimmed}": expected field=adapter>adapter`)

    const field = trimmed.slice(0, eq).trim()
    if (!known.has(field) && !/^(Cluster|Host|VM|StorageContainer|FileServer):display_name$/.test(field)) {
      throw new Error(`Invalid precedence clause "${trimmed}": unknown field "${field}"`)
    }

    const order: AdapterId[] = []
    for (const raw of trimmed.slice(eq + 1).split(">")) {
      const id = raw.trim()
      if (!isAdapterId(id)) {
        throw new Error(`Invalid precedence clause "${trimmed}": unknown adapter "${id}" (expected one of ${ADAPTER_IDS.join(", ")})`)
      }
      if (!order.includes(id)) order.push(id)
    }
    fields[field] = order
  }

  return { fallback: base.fallback, fields }
}

export interface MergedResource {
  readonly kind: ResourceKind
  readonly uuid: string
  readonly displayName?: string
  readonly clusterUuid?: string
  readonly clusterRefName?: string
  readonly values: Readonly<Record<string, number>>
  readonly observedAt: number
  readonly sources: readonly AdapterId[]
}

function rank(order: readonly AdapterId[], fallback: readonly AdapterId[], id: AdapterId): number {
  const i = order.indexOf(id)
  if (i >= 0) return i
  const j = fallback.indexOf(id)
  return order.length + (j >= 0 ? j : fallback.length)
}

function pick<T>(
  candidates: readonly CanonicalResource[],
  order: readonly AdapterId[],
  fallback: readonly AdapterId[],
  read: (r: CanonicalResource) => T | undefined,
): T | undefined {
  let best: { value: T; rank: number } | undefined
  for (const candidate of candidates) {
    const value = read(candidate)
    if (value === undefined) continue
    const r = rank(order, fallback, candidate.source)
    if (!best || r < best.rank) best = { value, rank: r }
  }
  return best?.value
}

/** Merge same kind+uuid resources. Output order follows first appearance. */
export function mergeResources(
  resources: readonly CanonicalResource[],
  table: PrecedenceTable = DEFAULT_PRECEDENCE,
): MergedResource[] {
  const groups = new Map<string, CanonicalResource[]>()
  for (const resource of resources) {
    const key = `${resource.kind}/${resource.uuid}`
    const group = groups.get(key)
    if (group) group.push(resource)
    else groups.set(key, [resource])
  }

  const merged: MergedResource[] = []
  for (const group of groups.values()) {
    const { kind, uuid } = group[0]
    const fieldOrder = (field: string) => table.fields[field] ?? table.fallback

    const metricKeys = new Set<string>()
    for (const r of group) for (const key of Object.keys(r.values)) metricKeys.add(key)

    const values: Record<string, number> = {}
    for (const key of [...metricKeys].sort()) {
      const value = pick(group, fieldOrder(key), table.fallback, (r) => r.values[key])
      if (value !== undefined) values[key] = value
    }

    merged.push({
      kind,
      uuid,
      displayName: pick(group, fieldOrder(displayNameField(kind)), table.fallback, (r) => r.displayName),
      clusterUuid: pick(group, table.fallback, table.fallback, (r) => r.clusterUuid),
      clusterRefName: pick(group, table.fallback, table.fallback, (r) => r.clusterRefName),
      values,
      observedAt: Math.max(...group.map((r) => r.observedAt)),
      sources: [...new Set(group.map((r) => r.source))],
    })
  }
  return merged
}
