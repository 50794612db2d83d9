/**
 * @fileoverview Regulatory source table loading
 *
 * Reads every clause table in the database directory with exceljs. Column
 * headers vary between sponsors, so they are cleaned and matched against
 * known aliases. Values are kept as written; classification spelling is
 * resolved later by the merger.
 *
 * @module lib/regulatory-database/source-loader
 */

import ExcelJS from "exceljs"
import { readdir } from "fs/promises"
import path from "path"
import { logger } from "@/lib/logger"
import type { RawCodeEntry, RegulatorySourceTable, SourceDiagnostic } from "./types"

// ============================================================================
// Constants
// ============================================================================

export const SOURCE_EXTENSIONS: readonly string[] = [".xlsx", ".xlsm", ".csv"]

/** Codes this long are prose that landed in the code column */
export const MAX_CODE_LENGTH = 30

type SourceField = "code" | "description" | "classification" | "sourceTag"

const FIELDS: readonly SourceField[] = ["code", "description", "classification", "sourceTag"]

const HEADER_ALIASES: Record<SourceField, readonly string[]> = {
  code: ["code", "clause", "clause number", "clause no", "clause no.", "clause #", "number"],
  description: ["description", "title", "clause title", "name"],
  classification: ["classification", "status", "rubric", "disposition"],
  sourceTag: ["source-tag", "source tag", "source", "agency", "regulation"],
}

// ============================================================================
// Types
// ============================================================================

export interface LoadSourcesOptions {
  /** File name fragments (case-insensitive) that are never source tables */
  skipFilePatterns: readonly string[]
}

export interface LoadedSources {
  /** In file name order */
  tables: RegulatorySourceTable[]
  diagnostics: SourceDiagnostic[]
}

export interface SheetRow {
  /** 1-based */
  rowNumber: number
  cells: string[]
}

// ============================================================================
// Directory scan
// ============================================================================

/**
 * Whether a directory entry should be read as a source table.
 */
export function isSourceFile(name: string, skipFilePatterns: readonly string[]): boolean {
  if (name.startsWith(".") || name.startsWith("~")) return false
  if (!SOURCE_EXTENSIONS.includes(path.extname(name).toLowerCase())) return false
  const lower = name.toLowerCase()
  return !skipFilePatterns.some((pattern) => lower.includes(pattern.toLowerCase()))
}

/**
 * Loads every source table in `dir`, sorted by file name. Unreadable files
 * and files without a code column become diagnostics, not errors.
 */
export async function loadSourceTables(
  dir: string,
  options: LoadSourcesOptions
): Promise<LoadedSources> {
  const diagnostics: SourceDiagnostic[] = []

  let names: string[]
  try {
    names = (await readdir(dir, { withFileTypes: true }))
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
  } catch (error) {
    diagnostics.push({
      source: dir,
      message: `Database directory could not be read: ${error instanceof Error ? error.message : String(error)}`,
    })
    return { tables: [], diagnostics }
  }

  for (const name of names) {
    if (path.extname(name).toLowerCase() === ".xls" && !name.startsWith("~")) {
      diagnostics.push({ source: name, message: "Legacy .xls workbooks are not supported; save as .xlsx" })
    }
  }

  const tables: RegulatorySourceTable[] = []
  for (const name of names.filter((n) => isSourceFile(n, options.skipFilePatterns)).sort()) {
    const result = await readSourceTable(path.join(dir, name))
    diagnostics.push(...result.diagnostics)
    if (result.table) tables.push(result.table)
  }

  logger.info("Source tables loaded", {
    dir,
    tables: tables.length,
    rows: tables.reduce((total, table) => total + table.rows.length, 0),
    diagnostics: diagnostics.length,
  })
  return { tables, diagnostics }
}

// ============================================================================
// File reading
// ============================================================================

/**
 * Reads the first worksheet of a workbook, or a CSV file with every value
 * kept as text.
 */
export async function readSourceTable(
  filePath: string
): Promise<{ table?: RegulatorySourceTable; diagnostics: SourceDiagnostic[] }> {
  const name = path.basename(filePath)
  const workbook = new ExcelJS.Workbook()

  let sheet: ExcelJS.Worksheet | undefined
  try {
    if (path.extname(name).toLowerCase() === ".csv") {
      sheet = await workbook.csv.readFile(filePath, { map: (value: unknown) => value })
    } else {
      await workbook.xlsx.readFile(filePath)
      sheet = workbook.worksheets[0]
    }
  } catch (error) {
    return {
      diagnostics: [
        {
          source: name,
          message: `Could not read table: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    }
  }

  if (!sheet) {
    return { diagnostics: [{ source: name, message: "Workbook has no worksheets" }] }
  }
  return tableFromRows(name, worksheetRows(sheet))
}

function worksheetRows(sheet: ExcelJS.Worksheet): SheetRow[] {
  const rows: SheetRow[] = []
  const columnCount = sheet.columnCount
  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    const cells: string[] = []
    for (let column = 1; column <= columnCount; column++) {
      cells.push(row.getCell(column).text)
    }
    rows.push({ rowNumber, cells })
  })
  return rows
}

// ============================================================================
// Header mapping
// ============================================================================

/**
 * Normalizes a header cell: line breaks, asterisks and repeated whitespace
 * removed, lowercased.
 */
export function cleanHeader(header: string): string {
  return header
    .replace(/[\r\n]+/g, " ")
    .replace(/\*/g, "")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase()
}

/**
 * Column index per field; the first matching column wins.
 */
export function mapHeaders(headers: readonly string[]): Partial<Record<SourceField, number>> {
  const columns: Partial<Record<SourceField, number>> = {}
  headers.forEach((header, index) => {
    const cleaned = cleanHeader(header)
    for (const field of FIELDS) {
      if (columns[field] === undefined && HEADER_ALIASES[field].includes(cleaned)) {
        columns[field] = index
      }
    }
  })
  return columns
}

/**
 * Builds a source table from sheet rows. The first row is the header.
 */
export function tableFromRows(
  name: string,
  rows: readonly SheetRow[]
): { table?: RegulatorySourceTable; diagnostics: SourceDiagnostic[] } {
  const [header, ...body] = rows
  if (!header) {
    return { diagnostics: [{ source: name, message: "Table is empty" }] }
  }

  const columns = mapHeaders(header.cells)
  const codeColumn = columns.code
  if (codeColumn === undefined) {
    return {
      diagnostics: [
        {
          source: name,
          rowNumber: header.rowNumber,
          message: `No code column found in headers: ${header.cells.map(cleanHeader).filter(Boolean).join(", ")}`,
        },
      ],
    }
  }

  const sourceTag = path.parse(name).name
  const cell = (row: SheetRow, column: number | undefined) =>
    column === undefined ? "" : (row.cells[column] ?? "").trim()

  const entries: RawCodeEntry[] = []
  let skipped = 0
  for (const row of body) {
    const code = cell(row, codeColumn)
    if (!/\d/.test(code) || code.length >= MAX_CODE_LENGTH) {
      skipped++
      continue
    }
    entries.push({
      code,
      description: cell(row, columns.description),
      classification: cell(row, columns.classification),
      sourceTag: cell(row, columns.sourceTag) || sourceTag,
      rowNumber: row.rowNumber,
    })
  }

  if (skipped > 0) {
    logger.debug("Rows without a clause code skipped", { source: name, skipped })
  }

  return { table: { name, sourceTag, rows: entries }, diagnostics: [] }
}
