// src/adapters/file-service.ts — Files v4.0 adapter: file servers plus one stats call each
//
// A 404 on the list endpoint means Files is not deployed on this site: no pages,
// and the kind counts as Complete. A failed stats call keeps the file server
// (identity only) and marks the page with an issue.

import { MeteringError, isMeteringError, toMeteringError } from "../errors.js"
import type { PrismClient } from "../prism/client.js"
import type { ResourceKind } from "../snapshot/types.js"
import type { AdapterOptions } from "./legacy-stats.js"
import type { AdapterPage, EndpointAdapter, FileServerRecord } from "./types.js"
import { V4FileServerEntity, V4FileServerStats, V4ListPage, checkEntity, checkEnvelope, lastValue } from "./wire.js"

const BASE = "/api/files/v4.0"
const LIST_ENDPOINT = "v4.0/file-servers"
const STATS_ENDPOINT = "v4.0/file-server-stats"

export class FileServiceAdapter implements EndpointAdapter {
  readonly id = "file-service"
  readonly generation = "v4.0"
  readonly auth = "session"
  readonly kinds: readonly ResourceKind[] = ["FileServer"]
  private readonly clock: () => number

  constructor(
    private readonly client: PrismClient,
    private readonly options: AdapterOptions,
  ) {
    this.clock = options.clock ?? Date.now
  }

  async *fetch(kind: ResourceKind, signal: AbortSignal): AsyncGenerator<AdapterPage> {
    if (kind !== "FileServer") {
      throw new MeteringError({ code: "PERMANENT", message: `${this.id} does not serve ${kind}` })
    }
    let seen = 0

    for (let page = 0; ; page++) {
      let body: unknown
      try {
        body = await this.client.getJson(`${BASE}/config/file-servers`, {
          auth: this.auth,
          endpoint: LIST_ENDPOINT,
          query: { $page: page, $limit: this.options.pageSize },
          signal,
        })
      } catch (err) {
        if (page === 0 && isMeteringError(err) && err.status === 404) {
          console.log("[adapter:file-service] Files service not deployed (404), no file servers")
          return
        }
        throw err
      }

      const envelope = checkEnvelope(V4ListPage, body, LIST_ENDPOINT)
      const servers = envelope.data ?? []
      const records: FileServerRecord[] = []
      const issues: MeteringError[] = []

      for (const entity of servers) {
        const record = await this.withStats(entity, signal, issues)
        records.push(record)
      }
      seen += servers.length
      yield issues.length > 0 ? { records, issues } : { records }

      const total = envelope.metadata?.totalAvailableResults
      if (servers.length === 0 || total === undefined || seen >= total) return
    }
  }

  private async withStats(entity: unknown, signal: AbortSignal, issues: MeteringError[]): Promise<FileServerRecord> {
    const e = checkEntity(V4FileServerEntity, entity)
    if (!e) return { shape: "file-server", kind: "FileServer", observedAt: this.clock(), malformed: true }
    const base: FileServerRecord = {
      shape: "file-server",
      kind: "FileServer",
      uuid: e.extId,
      name: e.name,
      observedAt: this.clock(),
    }
    if (!base.uuid) return base

    try {
      const body = await this.client.getJson(`${BASE}/stats/file-servers/${encodeURIComponent(base.uuid)}`, {
        auth: this.auth,
        endpoint: STATS_ENDPOINT,
        signal,
      })
      const stats = checkEnvelope(V4FileServerStats, body, STATS_ENDPOINT).data
      return {
        ...base,
        observedAt: this.clock(),
        capacityBytes: stats.storageCapacityBytes,
        usedBytes: stats.usedCapacityBytes,
        availableBytes: stats.availableCapacityBytes,
        fileCount: lastValue(stats.numberOfFiles),
        connectionCount: lastValue(stats.numberOfConnections),
      }
    } catch (err) {
      const error = toMeteringError(err, STATS_ENDPOINT)
      if (error.code === "AUTH_EXHAUSTED" || error.code === "CYCLE_ABORTED") throw error
      console.warn(`[adapter:file-service] stats unavailable for file server ${base.name ?? base.uuid}: ${error.message}`)
      issues.push(error)
      return base
    }
  }
}
