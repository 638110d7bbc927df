// tests/metering/projector.test.ts — Billing rows from a snapshot

import { describe, it, expect } from "vitest"
import fc from "fast-check"
import {
  DEFAULT_ACCOUNT_ID,
  formatLocalDate,
  formatQty,
  previousDayPeriod,
  projectBillingRows,
  roundHalfUp1,
} from "../../src/billing/projector.js"
import { normalizeRecord } from "../../src/normalizer/normalize.js"
import { resource, snapshotOf, vm } from "../mocks/snapshots.js"

const GIB = 1_073_741_824
const period = previousDayPeriod(new Date(2024, 4, 2, 1, 0, 0))

const fleet = [
  vm("vm-b", "web", "alpha", {
    nutanix_vm_cpu_count: 4,
    nutanix_vm_memory_bytes: 8_589_934_592,
    nutanix_vm_disk_size_bytes: 53_687_091_200,
  }),
  vm("vm-a", "app", "beta", { nutanix_vm_cpu_count: 2, nutanix_vm_memory_bytes: 3 * GIB, nutanix_vm_disk_size_bytes: 0 }),
  vm("vm-c", "db", "alpha", { nutanix_vm_cpu_count: 8, nutanix_vm_memory_bytes: 16 * GIB }),
  resource("FileServer", "fs-1", "files-a", { nutanix_file_server_used_bytes: 6_047_313_952_768 }),
  resource("Host", "h-1", "node-1", { nutanix_host_physical_cpu_cores: 16 }, "alpha"),
  resource("Host", "h-2", "node-2", { nutanix_host_physical_cpu_cores: 0 }, "alpha"),
]

describe("previousDayPeriod", () => {
  it("covers the previous local calendar day", () => {
    expect(formatLocalDate(period.start)).toBe("2024-05-01")
    expect(formatLocalDate(period.end)).toBe("2024-05-02")
  })

  it("crosses month and leap-day boundaries", () => {
    const p = previousDayPeriod(new Date(2024, 2, 1, 0, 30))
    expect([formatLocalDate(p.start), formatLocalDate(p.end)]).toEqual(["2024-02-29", "2024-03-01"])
  })
})

describe("roundHalfUp1 / formatQty", () => {
  it("rounds half up to one decimal", () => {
    expect(roundHalfUp1(0.05)).toBe(0.1)
    expect(roundHalfUp1(0.25)).toBe(0.3)
    expect(roundHalfUp1(1.15)).toBe(1.2)
    expect(roundHalfUp1(2.449)).toBe(2.4)
    expect(roundHalfUp1(8)).toBe(8)
  })

  it("keeps one decimal for GB and TiB items only", () => {
    expect(formatQty("Memory_GB", 8)).toBe("8.0")
    expect(formatQty("Files_TiB", 5.5)).toBe("5.5")
    expect(formatQty("vCPU", 4)).toBe("4")
    expect(formatQty("Cores", 16)).toBe("16")
  })
})

describe("projectBillingRows", () => {
  it("orders VM rows by cluster, name and uuid, then file servers, then host cores", () => {
    const rows = projectBillingRows(snapshotOf(fleet), period, DEFAULT_ACCOUNT_ID, "app-7", { billHostCores: true })

    expect(rows.map((r) => [r.sno, r.accountId, r.fqdn, r.meteredItem, r.qty])).toEqual([
      [1, "alpha", "db", "vCPU", 8],
      [2, "alpha", "db", "Memory_GB", 16],
      [3, "alpha", "web", "vCPU", 4],
      [4, "alpha", "web", "Memory_GB", 8],
      [5, "alpha", "web", "Storage_GB", 50],
      [6, "beta", "app", "vCPU", 2],
      [7, "beta", "app", "Memory_GB", 3],
      [8, "beta", "app", "Storage_GB", 0],
      [9, DEFAULT_ACCOUNT_ID, "files-a", "Files_TiB", 5.5],
      [10, "alpha", "node-1", "Cores", 16],
    ])
    expect(rows[0]).toEqual({
      accountId: "alpha",
      qty: 8,
      startDate: "2024-05-01",
      endDate: "2024-05-02",
      meteredItem: "vCPU",
      appid: "app-7",
      sno: 1,
      fqdn: "db",
      type: "VM",
      description: "vCPUs allocated to VM db",
      guid: "vm-c",
    })
    expect(rows[8]).toMatchObject({ type: "FileServer", guid: "fs-1", description: "Files consumed storage for files-a" })
  })

  it("bills storage for a VM with an empty CD-ROM drive", () => {
    const outcome = normalizeRecord({
      shape: "listed-vm",
      kind: "VM",
      uuid: "vm-d",
      name: "dvd",
      observedAt: 1,
      numSockets: 1,
      vcpusPerSocket: 2,
      disks: [{ sizeBytes: 10 * GIB, deviceType: "DISK" }, { deviceType: "CDROM" }],
    })
    const values = outcome.ok ? { ...outcome.resource.values } : {}

    const rows = projectBillingRows(snapshotOf([vm("vm-d", "dvd", "alpha", values)]), period, DEFAULT_ACCOUNT_ID, "")

    expect(rows.map((r) => [r.meteredItem, r.qty])).toEqual([
      ["vCPU", 2],
      ["Storage_GB", 10],
    ])
  })

  it("uses a configured account id for every row", () => {
    const rows = projectBillingRows(snapshotOf(fleet), period, "acct-9", "", { billHostCores: true })
    expect(new Set(rows.map((r) => r.accountId))).toEqual(new Set(["acct-9"]))
  })

  it("leaves host cores out unless asked", () => {
    const rows = projectBillingRows(snapshotOf(fleet), period, DEFAULT_ACCOUNT_ID, "")
    expect(rows.map((r) => r.meteredItem)).not.toContain("Cores")
    expect(rows).toHaveLength(9)
  })

  it("skips kinds whose collection failed, without gaps in sno", () => {
    const snapshot = snapshotOf(fleet, { VM: { status: "Failed", error: "TRANSIENT: down" } })
    const rows = projectBillingRows(snapshot, period, DEFAULT_ACCOUNT_ID, "")

    expect(rows.map((r) => [r.sno, r.meteredItem])).toEqual([[1, "Files_TiB"]])
  })

  it("bills resources of a Partial kind", () => {
    const snapshot = snapshotOf(fleet, { VM: { status: "Partial", error: "TRANSIENT: page 3" } })
    expect(projectBillingRows(snapshot, period, DEFAULT_ACCOUNT_ID, "").filter((r) => r.type === "VM")).toHaveLength(8)
  })

  it("is deterministic whatever the resource order", () => {
    const vmArb = fc.record({
      n: fc.integer({ min: 0, max: 500 }),
      name: fc.constantFrom("web", "db", "cache"),
      cluster: fc.constantFrom("alpha", "beta"),
      cpu: fc.integer({ min: 1, max: 64 }),
      memoryGib: fc.integer({ min: 0, max: 512 }),
    })
    fc.assert(
      fc.property(fc.uniqueArray(vmArb, { selector: (v) => v.n, maxLength: 20 }), (specs) => {
        const resources = specs.map((s) =>
          vm(`vm-${s.n}`, s.name, s.cluster, { nutanix_vm_cpu_count: s.cpu, nutanix_vm_memory_bytes: s.memoryGib * GIB }),
        )
        const forward = projectBillingRows(snapshotOf(resources), period, DEFAULT_ACCOUNT_ID, "")
        const backward = projectBillingRows(snapshotOf([...resources].reverse()), period, DEFAULT_ACCOUNT_ID, "")
        expect(backward).toEqual(forward)
        expect(forward.map((r) => r.sno)).toEqual(forward.map((_, i) => i + 1))
      }),
    )
  })
})
