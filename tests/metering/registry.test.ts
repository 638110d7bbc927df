// tests/metering/registry.test.ts — Snapshot publication and text exposition

import { describe, it, expect } from "vitest"
import { MetricRegistry } from "../../src/snapshot/registry.js"
import { formatRecord, renderExposition } from "../../src/snapshot/exposition.js"
import { EMPTY_SNAPSHOT, deepFreeze, type MetricRecord, type Snapshot } from "../../src/snapshot/types.js"

function frozen(id: string, version: number): Snapshot {
  return deepFreeze<Snapshot>({ ...EMPTY_SNAPSHOT, id, version })
}

describe("MetricRegistry", () => {
  it("serves the empty snapshot until the first publish", () => {
    const registry = new MetricRegistry()
    expect(registry.current()).toBe(EMPTY_SNAPSHOT)
    expect(registry.hasCollected()).toBe(false)
    expect(renderExposition(registry.current())).toBe("")
  })

  it("swaps to newer snapshots only", () => {
    const registry = new MetricRegistry()
    const v1 = frozen("a", 1)
    const v2 = frozen("b", 2)

    expect(registry.publish(v1)).toBe(true)
    expect(registry.publish(v2)).toBe(true)
    expect(registry.publish(frozen("stale", 1))).toBe(false)
    expect(registry.current()).toBe(v2)
    expect(registry.hasCollected()).toBe(true)
  })

  it("refuses a mutable snapshot", () => {
    const registry = new MetricRegistry()
    expect(() => registry.publish({ ...EMPTY_SNAPSHOT, id: "loose", version: 1 })).toThrow(
      "snapshot loose must be frozen before publication",
    )
    expect(registry.current()).toBe(EMPTY_SNAPSHOT)
  })
})

describe("exposition", () => {
  const record = (value: number, name = "web"): MetricRecord => ({
    resource: { kind: "VM", uuid: "vm-1", displayName: name },
    metric: "nutanix_vm_cpu_count",
    value,
    unit: "count",
    labels: [
      ["vm_name", name],
      ["vm_uuid", "vm-1"],
      ["cluster_name", "alpha"],
    ],
    observedAt: 1,
  })

  it("formats labels in record order and escapes values", () => {
    expect(formatRecord(record(4))).toBe('nutanix_vm_cpu_count{vm_name="web",vm_uuid="vm-1",cluster_name="alpha"} 4')
    expect(formatRecord(record(1, 'we"b\\\n'))).toBe(
      'nutanix_vm_cpu_count{vm_name="we\\"b\\\\\\n",vm_uuid="vm-1",cluster_name="alpha"} 1',
    )
  })

  it("writes special float values the way Prometheus reads them", () => {
    expect(formatRecord(record(Number.NaN)).endsWith(" NaN")).toBe(true)
    expect(formatRecord(record(Infinity)).endsWith(" +Inf")).toBe(true)
    expect(formatRecord(record(0.5)).endsWith(" 0.5")).toBe(true)
  })

  it("renders one line per record with a trailing newline", () => {
    const snapshot = deepFreeze<Snapshot>({ ...EMPTY_SNAPSHOT, version: 1, records: [record(1), { ...record(2), metric: "nutanix_vm_power_state" }] })
    expect(renderExposition(snapshot)).toBe(
      'nutanix_vm_cpu_count{vm_name="web",vm_uuid="vm-1",cluster_name="alpha"} 1\n' +
        'nutanix_vm_power_state{vm_name="web",vm_uuid="vm-1",cluster_name="alpha"} 2\n',
    )
  })
})
