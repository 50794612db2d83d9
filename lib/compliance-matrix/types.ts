/**
 * @fileoverview Compliance matrix types
 * @module lib/compliance-matrix/types
 */

import type { Classification, ColorMap, MatrixAggregationMode } from "@/lib/config/types"

/** One matrix line per code match */
export interface ComplianceRow {
  /** Document file name */
  document: string
  documentId: string
  code: string
  description: string
  classification: Classification
  /** `p. N`, or `p. N–M` when the match spans pages */
  location: string
  /** 0-1 */
  confidence: number
  /** Source tag of the database entry */
  source: string
  notes: string

  // Ordering keys
  documentIndex: number
  pageIndex: number
  order: number
  offset: number
}

export interface WriteMatrixOptions {
  outputDir: string
  runLabel: string
  mode: MatrixAggregationMode
  colorMap: ColorMap
}

export interface WrittenMatrix {
  path: string
  /** Set in `per-document` mode */
  document?: string
  rowCount: number
}
