/**
 * @fileoverview Compliance matrix
 * @module lib/compliance-matrix
 */

export * from "./types"
export { buildComplianceRows, compareRows, formatLocation, NOTE_LOW_CONFIDENCE, NOTE_UNKNOWN } from "./rows"
export { buildMatrixWorkbook, MATRIX_COLUMNS, MATRIX_SHEET_NAME, writeComplianceMatrices } from "./workbook"
