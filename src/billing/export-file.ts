// src/billing/export-file.ts — Tab-separated billing export: format, parse, persist
//
// Write path: write .tmp (exclusive create) -> fsync -> link to the final name
// (fails if it exists, so an export is never overwritten) -> unlink .tmp.
// Readers never see a half-written export.

import { link, mkdir, open, unlink } from "node:fs/promises"
import { join } from "node:path"
import {
  BILLING_COLUMNS,
  METERED_ITEMS,
  formatQty,
  type BilledKind,
  type BillingRow,
  type MeteredItem,
} from "./projector.js"

const EOL = "\r\n"

/** Thrown when the target export file already exists. */
export class ExportExistsError extends Error {
  constructor(path: string) {
    super(`Export file already exists: ${path}`)
    this.name = "ExportExistsError"
  }
}

/** Thrown when an export file does not parse back into billing rows. */
export class ExportParseError extends Error {
  constructor(line: number, reason: string) {
    super(`Export parse error at line ${line}: ${reason}`)
    this.name = "ExportParseError"
  }
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/** Minimal quoting: only fields containing tab, quote, CR or LF are quoted. */
export function quoteField(value: string): string {
  return /[\t"\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

function rowFields(row: BillingRow): string[] {
  return [
    row.accountId,
    formatQty(row.meteredItem, row.qty),
    row.startDate,
    row.endDate,
    row.meteredItem,
    row.appid,
    String(row.sno),
    row.fqdn,
    row.type,
    row.description,
    row.guid,
  ]
}

/** Header plus one line per row, CRLF line ends. */
export function formatTsv(rows: readonly BillingRow[]): string {
  const lines = [BILLING_COLUMNS.join("\t"), ...rows.map((row) => rowFields(row).map(quoteField).join("\t"))]
  return lines.join(EOL) + EOL
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** Split TSV text into records of fields, honouring quoted fields. */
export function splitTsv(text: string): string[][] {
  const records: string[][] = []
  let fields: string[] = []
  let field = ""
  let quoted = false
  let i = 0

  const endRecord = () => {
    fields.push(field)
    records.push(fields)
    fields = []
    field = ""
  }

  while (i < text.length) {
    const ch = text[i]
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"'
          i += 2
          continue
        }
        quoted = false
      } else {
        field += ch
      }
      i++
      continue
    }

    if (ch === '"' && field === "") {
      quoted = true
    } else if (ch === "\t") {
      fields.push(field)
      field = ""
    } else if (ch === "\r" && text[i + 1] === "\n") {
      endRecord()
      i++
    } else if (ch === "\n") {
      endRecord()
    } else {
      field += ch
    }
    i++
  }
  if (field !== "" || fields.length > 0) endRecord()
  return records
}

function isMeteredItem(value: string): value is MeteredItem {
  return METERED_ITEMS.some((item) => item === value)
}

function isBilledKind(value: string): value is BilledKind {
  return value === "VM" || value === "FileServer" || value === "Host"
}

/** Parse an export back into billing rows; the header must match exactly. */
export function parseTsv(text: string): BillingRow[] {
  const [header, ...body] = splitTsv(text)
  if (!header || header.join("\t") !== BILLING_COLUMNS.join("\t")) {
    throw new ExportParseError(1, "header does not match the billing columns")
  }

  return body.map((fields, index) => {
    const line = index + 2
    if (fields.length !== BILLING_COLUMNS.length) {
      throw new ExportParseError(line, `expected ${BILLING_COLUMNS.length} fields, got ${fields.length}`)
    }
    const [accountId, qty, startDate, endDate, meteredItem, appid, sno, fqdn, type, description, guid] = fields
    const qtyValue = Number(qty)
    const snoValue = Number(sno)
    if (qty === "" || !Number.isFinite(qtyValue)) throw new ExportParseError(line, `invalid qty "${qty}"`)
    if (!Number.isInteger(snoValue) || snoValue < 1) throw new ExportParseError(line, `invalid sno "${sno}"`)
    if (!isMeteredItem(meteredItem)) throw new ExportParseError(line, `unknown metered item "${meteredItem}"`)
    if (!isBilledKind(type)) throw new ExportParseError(line, `unknown type "${type}"`)
    return {
      accountId,
      qty: qtyValue,
      startDate,
      endDate,
      meteredItem,
      appid,
      sno: snoValue,
      fqdn,
      type,
      description,
      guid,
    }
  })
}

// ---------------------------------------------------------------------------
// Persistence
// ---------------------------------------------------------------------------

/** metering_export_<YYYYMMDD>_<HHMMSS>.<ext>, local time of the trigger. */
export function exportFileName(at: Date, extension: string): string {
  const p = (n: number, w = 2) => String(n).padStart(w, "0")
  const date = `${p(at.getFullYear(), 4)}${p(at.getMonth() + 1)}${p(at.getDate())}`
  const time = `${p(at.getHours())}${p(at.getMinutes())}${p(at.getSeconds())}`
  return `metering_export_${date}_${time}.${extension}`
}

/** Persist content under dir/fileName without ever replacing an existing file. */
export async function writeExportFile(dir: string, fileName: string, content: string): Promise<string> {
  await mkdir(dir, { recursive: true })
  const target = join(dir, fileName)
  const tmp = join(dir, `.${fileName}.${process.pid}.tmp`)

  const fh = await open(tmp, "wx")
  try {
    await fh.writeFile(content, "utf8")
    await fh.sync()
  } catch (err) {
    await fh.close()
    await unlink(tmp)
    throw err
  }
  await fh.close()

  try {
    await link(tmp, target)
  } catch (err) {
    await unlink(tmp)
    if (isErrnoCode(err, "EEXIST")) throw new ExportExistsError(target)
    throw err
  }
  await unlink(tmp)
  return target
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code
}
