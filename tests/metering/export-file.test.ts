// tests/metering/export-file.test.ts — TSV format, parse-back and no-overwrite persistence

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { mkdtemp, open, readFile, readdir, rm, type FileHandle } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import {
  ExportExistsError,
  ExportParseError,
  exportFileName,
  formatTsv,
  parseTsv,
  quoteField,
  splitTsv,
  writeExportFile,
} from "../../src/billing/export-file.js"
import type { BillingRow } from "../../src/billing/projector.js"

const HEADER = "accountId\tqty\tstartDate\tendDate\tmeteredItem\tappid\tsno\tfqdn\ttype\tdescription\tguid"

function row(overrides: Partial<BillingRow> = {}): BillingRow {
  return {
    accountId: "alpha",
    qty: 8,
    startDate: "2024-05-01",
    endDate: "2024-05-02",
    meteredItem: "Memory_GB",
    appid: "app-7",
    sno: 1,
    fqdn: "web",
    type: "VM",
    description: "Memory (GB) allocated to VM web",
    guid: "vm-1",
    ...overrides,
  }
}

describe("formatTsv", () => {
  it("writes the header and rows with CRLF line ends", () => {
    expect(formatTsv([row()])).toBe(
      `${HEADER}\r\n` + "alpha\t8.0\t2024-05-01\t2024-05-02\tMemory_GB\tapp-7\t1\tweb\tVM\tMemory (GB) allocated to VM web\tvm-1\r\n",
    )
  })

  it("writes only the header for an empty export", () => {
    expect(formatTsv([])).toBe(`${HEADER}\r\n`)
  })

  it("quotes only fields that need it", () => {
    expect(quoteField("plain name")).toBe("plain name")
    expect(quoteField("a\tb")).toBe('"a\tb"')
    expect(quoteField('say "hi"')).toBe('"say ""hi"""')
    expect(quoteField("two\nlines")).toBe('"two\nlines"')
  })
})

describe("parseTsv", () => {
  it("reads back rows with quoted fields intact", () => {
    const rows = [
      row(),
      row({ sno: 2, meteredItem: "vCPU", qty: 4, fqdn: 'odd\t"name"\r\nhere', description: "vCPUs allocated to VM odd" }),
      row({ sno: 3, meteredItem: "Files_TiB", qty: 5.5, type: "FileServer", accountId: "123456" }),
    ]
    expect(parseTsv(formatTsv(rows))).toEqual(rows)
  })

  it("splits quoted separators as data", () => {
    expect(splitTsv('a\t"b\tc"\r\n"d""e"\tf\r\n')).toEqual([
      ["a", "b\tc"],
      ['d"e', "f"],
    ])
  })

  it("rejects a foreign header or a short line", () => {
    expect(() => parseTsv("id\tqty\r\n")).toThrow(ExportParseError)
    expect(() => parseTsv(`${HEADER}\r\nalpha\t1\r\n`)).toThrow("Export parse error at line 2: expected 11 fields, got 2")
  })

  it("rejects unknown metered items", () => {
    const bad = formatTsv([row()]).replace("Memory_GB", "Bandwidth")
    expect(() => parseTsv(bad)).toThrow('unknown metered item "Bandwidth"')
  })
})

describe("exportFileName", () => {
  it("stamps the local trigger time", () => {
    expect(exportFileName(new Date(2024, 4, 2, 1, 0, 5), "csv")).toBe("metering_export_20240502_010005.csv")
    expect(exportFileName(new Date(2024, 11, 31, 23, 59, 59), "tsv")).toBe("metering_export_20241231_235959.tsv")
  })
})

describe("writeExportFile", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "metering-export-"))
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  it("writes the file and leaves no temporary behind", async () => {
    const target = await writeExportFile(join(dir, "nested"), "export.csv", "content\r\n")

    expect(target).toBe(join(dir, "nested", "export.csv"))
    expect(await readFile(target, "utf8")).toBe("content\r\n")
    expect(await readdir(join(dir, "nested"))).toEqual(["export.csv"])
  })

  it("never overwrites an existing export", async () => {
    await writeExportFile(dir, "export.csv", "first")

    await expect(writeExportFile(dir, "export.csv", "second")).rejects.toBeInstanceOf(ExportExistsError)
    expect(await readFile(join(dir, "export.csv"), "utf8")).toBe("first")
    expect(await readdir(dir)).toEqual(["export.csv"])
  })

  it("removes the temporary when the write fails", async () => {
    const handle = await open(join(dir, "scratch"), "w")
    const handleProto: FileHandle = Object.getPrototypeOf(handle)
    await handle.close()
    await rm(join(dir, "scratch"))
    vi.spyOn(handleProto, "sync").mockRejectedValueOnce(new Error("EIO: sync failed"))

    await expect(writeExportFile(dir, "export.csv", "content")).rejects.toThrow("EIO: sync failed")
    expect(await readdir(dir)).toEqual([])
  })
})
