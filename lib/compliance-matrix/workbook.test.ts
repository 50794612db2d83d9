import { afterEach, beforeEach, describe, it, expect } from "vitest"
import ExcelJS from "exceljs"
import { mkdtemp, readdir, rm } from "fs/promises"
import os from "os"
import path from "path"
import { DEFAULT_COLOR_MAP } from "@/lib/config/defaults"
import type { Classification } from "@/lib/config/types"
import type { ComplianceRow } from "./types"
import { buildMatrixWorkbook, MATRIX_COLUMNS, MATRIX_SHEET_NAME, writeComplianceMatrices } from "./workbook"

function row(document: string, code: string, classification: Classification, index = 0): ComplianceRow {
  return {
    document,
    documentId: `id-${document}`,
    code,
    description: `Description of ${code}`,
    classification,
    location: "p. 1",
    confidence: 1,
    source: classification === "Unknown" ? "" : "FAR",
    notes: "",
    documentIndex: index,
    pageIndex: 0,
    order: 0,
    offset: 0,
  }
}

const rows = [
  row("rfp.pdf", "52.212-4", "OK"),
  row("rfp.pdf", "52.204-21", "Conditional"),
  row("rfp.pdf", "52.222-50", "Remove"),
  row("sow.docx", "52.999-1", "Unknown", 1),
]

describe("buildMatrixWorkbook", () => {
  const workbook = buildMatrixWorkbook(rows, DEFAULT_COLOR_MAP)
  const sheet = workbook.getWorksheet(MATRIX_SHEET_NAME)

  it("writes the header row", () => {
    const header = sheet?.getRow(1)
    expect(MATRIX_COLUMNS.map((_, i) => header?.getCell(i + 1).value)).toEqual([
      "Document",
      "Code",
      "Description",
      "Classification",
      "Location",
      "Confidence",
      "Source",
      "Notes",
    ])
    expect(header?.font).toEqual({ bold: true })
  })

  it("fills every cell with the classification color", () => {
    const expected = ["FFC6EFCE", "FFFFEB9C", "FFFFC7CE", "FFD9D9D9"]
    expected.forEach((argb, i) => {
      const cells = MATRIX_COLUMNS.map((_, column) => sheet?.getRow(i + 2).getCell(column + 1))
      for (const cell of cells) {
        expect(cell?.fill).toEqual({ type: "pattern", pattern: "solid", fgColor: { argb } })
      }
    })
  })

  it("freezes and filters the header", () => {
    expect(sheet?.views).toEqual([{ state: "frozen", ySplit: 1 }])
    expect(sheet?.autoFilter).toEqual({ from: "A1", to: "H5" })
  })

  it("writes one row per match in order", () => {
    expect(sheet?.rowCount).toBe(5)
    expect(sheet?.getRow(5).getCell(2).value).toBe("52.999-1")
    expect(sheet?.getRow(2).getCell(6).numFmt).toBe("0%")
  })
})

describe("writeComplianceMatrices", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "matrix-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("writes one workbook per run", async () => {
    const written = await writeComplianceMatrices(rows, {
      outputDir: path.join(dir, "Output"),
      runLabel: "20240105_090307",
      mode: "per-run",
      colorMap: DEFAULT_COLOR_MAP,
    })

    expect(written).toEqual([
      { path: path.join(dir, "Output", "Compliance_Matrix_20240105_090307.xlsx"), rowCount: 4 },
    ])

    const workbook = new ExcelJS.Workbook()
    await workbook.xlsx.readFile(written[0]?.path ?? "")
    const sheet = workbook.getWorksheet(MATRIX_SHEET_NAME)
    expect(sheet?.getRow(2).getCell(2).text).toBe("52.212-4")
    expect(sheet?.getRow(4).getCell(1).fill).toMatchObject({ fgColor: { argb: "FFFFC7CE" } })
  })

  it("writes one workbook per document with rows", async () => {
    const written = await writeComplianceMatrices(rows, {
      outputDir: dir,
      runLabel: "run1",
      mode: "per-document",
      colorMap: DEFAULT_COLOR_MAP,
    })

    expect(written.map((w) => [w.document, w.rowCount])).toEqual([
      ["rfp.pdf", 3],
      ["sow.docx", 1],
    ])
    expect((await readdir(dir)).sort()).toEqual([
      "Compliance_Matrix_rfp_run1.xlsx",
      "Compliance_Matrix_sow_run1.xlsx",
    ])
  })

  it("writes an empty per-run matrix", async () => {
    const written = await writeComplianceMatrices([], {
      outputDir: dir,
      runLabel: "empty",
      mode: "per-run",
      colorMap: DEFAULT_COLOR_MAP,
    })

    expect(written[0]?.rowCount).toBe(0)
    expect(await readdir(dir)).toEqual(["Compliance_Matrix_empty.xlsx"])
  })
})
