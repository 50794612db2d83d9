/**
 * @fileoverview Compliance matrix workbooks
 *
 * Every row is filled with its classification's color so reviewers can scan
 * the matrix by rubric outcome. The header row is bold, frozen and filtered.
 *
 * @module lib/compliance-matrix/workbook
 */

import ExcelJS from "exceljs"
import { mkdir } from "fs/promises"
import path from "path"
import type { ColorMap } from "@/lib/config/types"
import { documentStems } from "@/lib/file-names"
import { logger } from "@/lib/logger"
import type { ComplianceRow, WriteMatrixOptions, WrittenMatrix } from "./types"

export const MATRIX_SHEET_NAME = "Compliance Matrix"

type MatrixKey =
  | "document"
  | "code"
  | "description"
  | "classification"
  | "location"
  | "confidence"
  | "source"
  | "notes"

export const MATRIX_COLUMNS: ReadonlyArray<{ header: string; key: MatrixKey; width: number }> = [
  { header: "Document", key: "document", width: 30 },
  { header: "Code", key: "code", width: 16 },
  { header: "Description", key: "description", width: 60 },
  { header: "Classification", key: "classification", width: 15 },
  { header: "Location", key: "location", width: 12 },
  { header: "Confidence", key: "confidence", width: 12 },
  { header: "Source", key: "source", width: 12 },
  { header: "Notes", key: "notes", width: 45 },
]

const HEADER_FILL = "FFD9E1F2"
const LAST_COLUMN = String.fromCharCode(64 + MATRIX_COLUMNS.length)

function solidFill(argb: string): ExcelJS.Fill {
  return { type: "pattern", pattern: "solid", fgColor: { argb } }
}

/**
 * Builds the matrix workbook in memory.
 */
export function buildMatrixWorkbook(
  rows: readonly ComplianceRow[],
  colorMap: ColorMap
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook()
  workbook.creator = "clause-compliance"
  const sheet = workbook.addWorksheet(MATRIX_SHEET_NAME)

  sheet.columns = MATRIX_COLUMNS.map(({ header, key, width }) => ({ header, key, width }))

  const headerRow = sheet.getRow(1)
  headerRow.font = { bold: true }
  headerRow.fill = solidFill(HEADER_FILL)
  headerRow.alignment = { vertical: "middle" }

  for (const row of rows) {
    const added = sheet.addRow({
      document: row.document,
      code: row.code,
      description: row.description,
      classification: row.classification,
      location: row.location,
      confidence: row.confidence,
      source: row.source,
      notes: row.notes,
    })
    added.getCell("confidence").numFmt = "0%"

    const fill = solidFill(colorMap[row.classification].fill)
    for (let column = 1; column <= MATRIX_COLUMNS.length; column++) {
      added.getCell(column).fill = fill
    }
  }

  sheet.views = [{ state: "frozen", ySplit: 1 }]
  sheet.autoFilter = { from: "A1", to: `${LAST_COLUMN}${rows.length + 1}` }

  return workbook
}

function matrixPath(outputDir: string, runLabel: string, documentStem?: string): string {
  const name = documentStem
    ? `Compliance_Matrix_${documentStem}_${runLabel}.xlsx`
    : `Compliance_Matrix_${runLabel}.xlsx`
  return path.join(outputDir, name)
}

/**
 * Writes the matrix for a run once every row has been collected.
 *
 * `per-run` writes one workbook, even when there are no rows. `per-document`
 * writes one workbook per document that has at least one row.
 */
export async function writeComplianceMatrices(
  rows: readonly ComplianceRow[],
  options: WriteMatrixOptions
): Promise<WrittenMatrix[]> {
  await mkdir(options.outputDir, { recursive: true })

  if (options.mode === "per-run") {
    const target = matrixPath(options.outputDir, options.runLabel)
    await buildMatrixWorkbook(rows, options.colorMap).xlsx.writeFile(target)
    logger.info("Compliance matrix written", { path: target, rows: rows.length })
    return [{ path: target, rowCount: rows.length }]
  }

  const byDocument = new Map<string, ComplianceRow[]>()
  for (const row of rows) {
    const group = byDocument.get(row.document)
    if (group) group.push(row)
    else byDocument.set(row.document, [row])
  }

  const stems = documentStems([...byDocument.keys()])
  const written: WrittenMatrix[] = []
  for (const [document, documentRows] of byDocument) {
    const target = matrixPath(options.outputDir, options.runLabel, stems.get(document))
    await buildMatrixWorkbook(documentRows, options.colorMap).xlsx.writeFile(target)
    logger.info("Compliance matrix written", { path: target, document, rows: documentRows.length })
    written.push({ path: target, document, rowCount: documentRows.length })
  }
  return written
}
