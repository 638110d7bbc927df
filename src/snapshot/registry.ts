// src/snapshot/registry.ts — Served snapshot, swapped atomically on publish

import { EMPTY_SNAPSHOT, type Snapshot } from "./types.js"

export class MetricRegistry {
  private served: Snapshot = EMPTY_SNAPSHOT

  /**
   * Replace the served snapshot. A snapshot that is not newer than the served
   * one is ignored; returns whether the swap happened.
   */
  publish(snapshot: Snapshot): boolean {
    if (snapshot.version <= this.served.version) {
      console.warn(`[registry] ignoring snapshot v${snapshot.version}, serving v${this.served.version}`)
      return false
    }
    if (!Object.isFrozen(snapshot)) {
      throw new Error(`snapshot ${snapshot.id} must be frozen before publication`)
    }
    this.served = snapshot
    return true
  }

  current(): Snapshot {
    return this.served
  }

  hasCollected(): boolean {
    return this.served !== EMPTY_SNAPSHOT
  }
}
