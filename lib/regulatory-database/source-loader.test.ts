import { afterEach, beforeEach, describe, it, expect } from "vitest"
import ExcelJS from "exceljs"
import { mkdtemp, rm, writeFile } from "fs/promises"
import os from "os"
import path from "path"
import { DEFAULT_SKIP_FILE_PATTERNS } from "@/lib/config/defaults"
import {
  cleanHeader,
  isSourceFile,
  loadSourceTables,
  mapHeaders,
  tableFromRows,
} from "./source-loader"

describe("cleanHeader", () => {
  it("removes line breaks, asterisks and repeated whitespace", () => {
    expect(cleanHeader("Clause\nNumber  *")).toBe("clause number")
  })
})

describe("mapHeaders", () => {
  it("maps aliases to columns, first match wins", () => {
    expect(mapHeaders(["Clause No.", "Title", "Status", "Agency", "Clause"])).toEqual({
      code: 0,
      description: 1,
      classification: 2,
      sourceTag: 3,
    })
  })
})

describe("isSourceFile", () => {
  it("accepts spreadsheet and CSV tables", () => {
    expect(isSourceFile("FAR.XLSX", [])).toBe(true)
    expect(isSourceFile("NASA.csv", [])).toBe(true)
    expect(isSourceFile("Agency.xlsm", [])).toBe(true)
  })

  it("skips hidden, lock, unsupported and excluded files", () => {
    expect(isSourceFile(".hidden.csv", [])).toBe(false)
    expect(isSourceFile("~$FAR.xlsx", [])).toBe(false)
    expect(isSourceFile("notes.txt", [])).toBe(false)
    expect(isSourceFile("Definitions.xlsx", DEFAULT_SKIP_FILE_PATTERNS)).toBe(false)
    expect(isSourceFile("DFARS Contract Ts&Cs Matrix.xlsx", DEFAULT_SKIP_FILE_PATTERNS)).toBe(false)
  })
})

describe("tableFromRows", () => {
  it("keeps rows whose code has a digit and is short", () => {
    const { table, diagnostics } = tableFromRows("FAR.xlsx", [
      { rowNumber: 1, cells: ["Clause", "Title", "Status"] },
      { rowNumber: 2, cells: [" 52.212-4 ", "Contract Terms", "OK"] },
      { rowNumber: 3, cells: ["Notes: see above", "", ""] },
      { rowNumber: 4, cells: ["52.204-21 and everything after that", "", ""] },
      { rowNumber: 5, cells: ["", "", ""] },
    ])

    expect(diagnostics).toEqual([])
    expect(table).toEqual({
      name: "FAR.xlsx",
      sourceTag: "FAR",
      rows: [
        {
          code: "52.212-4",
          description: "Contract Terms",
          classification: "OK",
          sourceTag: "FAR",
          rowNumber: 2,
        },
      ],
    })
  })

  it("uses the row's own source tag when present", () => {
    const { table } = tableFromRows("Combined.csv", [
      { rowNumber: 1, cells: ["Code", "Source"] },
      { rowNumber: 2, cells: ["252.204-7012", "DFARS"] },
      { rowNumber: 3, cells: ["52.219-8", ""] },
    ])

    expect(table?.rows.map((row) => row.sourceTag)).toEqual(["DFARS", "Combined"])
  })

  it("reports a table without a code column", () => {
    const { table, diagnostics } = tableFromRows("Glossary.xlsx", [
      { rowNumber: 1, cells: ["Title", "Status"] },
      { rowNumber: 2, cells: ["Terms", "OK"] },
    ])

    expect(table).toBeUndefined()
    expect(diagnostics).toEqual([
      { source: "Glossary.xlsx", rowNumber: 1, message: "No code column found in headers: title, status" },
    ])
  })
})

describe("loadSourceTables", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "sources-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("reads workbooks and CSV files in name order", async () => {
    const workbook = new ExcelJS.Workbook()
    const sheet = workbook.addWorksheet("Clauses")
    sheet.addRow(["Clause Number", "Title", "Rubric*"])
    sheet.addRow(["252.204-7012", "Safeguarding", "Conditional"])
    await workbook.xlsx.writeFile(path.join(dir, "DFARS.xlsx"))

    await writeFile(
      path.join(dir, "NASA.csv"),
      "Clause,Title,Status\n1852.215-84,Ombudsman,c\n52.212-4,0012,OK\n"
    )
    await writeFile(path.join(dir, "~$DFARS.xlsx"), "lock")
    await writeFile(path.join(dir, "Definitions.csv"), "Term,Meaning\n")

    const { tables, diagnostics } = await loadSourceTables(dir, {
      skipFilePatterns: DEFAULT_SKIP_FILE_PATTERNS,
    })

    expect(diagnostics).toEqual([])
    expect(tables.map((table) => table.name)).toEqual(["DFARS.xlsx", "NASA.csv"])
    expect(tables[0]?.rows).toEqual([
      {
        code: "252.204-7012",
        description: "Safeguarding",
        classification: "Conditional",
        sourceTag: "DFARS",
        rowNumber: 2,
      },
    ])
    // CSV values stay text
    expect(tables[1]?.rows.map((row) => [row.code, row.description, row.classification])).toEqual([
      ["1852.215-84", "Ombudsman", "c"],
      ["52.212-4", "0012", "OK"],
    ])
  })

  it("reports legacy workbooks and unreadable directories", async () => {
    await writeFile(path.join(dir, "Old.xls"), "legacy")

    const legacy = await loadSourceTables(dir, { skipFilePatterns: [] })
    expect(legacy.diagnostics).toEqual([
      { source: "Old.xls", message: "Legacy .xls workbooks are not supported; save as .xlsx" },
    ])

    const missing = await loadSourceTables(path.join(dir, "missing"), { skipFilePatterns: [] })
    expect(missing.tables).toEqual([])
    expect(missing.diagnostics[0]?.message).toMatch(/^Database directory could not be read/)
  })

  it("reports a corrupt workbook and keeps going", async () => {
    await writeFile(path.join(dir, "Broken.xlsx"), "not a zip")
    await writeFile(path.join(dir, "FAR.csv"), "Clause,Status\n52.212-4,OK\n")

    const { tables, diagnostics } = await loadSourceTables(dir, { skipFilePatterns: [] })

    expect(tables.map((table) => table.name)).toEqual(["FAR.csv"])
    expect(diagnostics).toHaveLength(1)
    expect(diagnostics[0]?.source).toBe("Broken.xlsx")
    expect(diagnostics[0]?.message).toMatch(/^Could not read table/)
  })
})
