/**
 * @fileoverview Run configuration types
 * @module lib/config/types
 */

/** Rubric outcome stored in a source table */
export type CodeClassification = "OK" | "Conditional" | "Remove"

/** Rubric outcome of a match; `Unknown` when the code is not in the database */
export type Classification = CodeClassification | "Unknown"

/** Highlight names accepted by WordprocessingML `w:highlight` */
export type DocxHighlightColor =
  | "yellow"
  | "green"
  | "red"
  | "cyan"
  | "magenta"
  | "blue"
  | "lightGray"
  | "darkGray"
  | "darkYellow"

export interface ClassificationColor {
  /** ARGB hex used for spreadsheet fills and PDF overlays, e.g. FFC6EFCE */
  fill: string
  /** Named highlight used in DOCX output */
  highlight: DocxHighlightColor
}

export type ColorMap = Record<Classification, ClassificationColor>

export type MatrixAggregationMode = "per-run" | "per-document"

export interface CodeFamilyGrammar {
  family: string
  /** Pattern source as configured, without boundary assertions */
  source: string
}

export interface WrapJoinTolerance {
  /** Lines a wrapped code may advance between its fragments (1 = next line) */
  maxLineGap: number
  /** Same-line gap, as a fraction of span height, below which spans touch */
  sameLineGapRatio: number
}

export interface OcrSettings {
  /** Non-whitespace characters per page below which a page is OCR'd */
  textDensityThreshold: number
  dpi: number
  /** Words below this confidence (0-1) are kept but flagged */
  confidenceFloor: number
  language: string
  langPath?: string
  poolSize: number
  maxPages: number
}

export interface ComplianceConfig {
  databaseDir: string
  solicitationsDir: string
  outputDir: string
  ocr: OcrSettings
  sourcePrecedenceOrder: readonly string[]
  classificationAliases: Readonly<Record<string, CodeClassification>>
  codeGrammar: readonly CodeFamilyGrammar[]
  wrapJoinTolerance: WrapJoinTolerance
  colorMap: ColorMap
  matrixAggregationMode: MatrixAggregationMode
  documentConcurrency: number
  annotationOcrMarginFactor: number
  skipFilePatterns: readonly string[]
}
