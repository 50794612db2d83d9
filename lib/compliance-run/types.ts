/**
 * @fileoverview Run orchestration types
 * @module lib/compliance-run/types
 */

import type { CodeMatch } from "@/lib/code-matching/types"
import type { WrittenMatrix } from "@/lib/compliance-matrix/types"
import type { Document, DocumentFormat, ExtractionMethod } from "@/lib/document-extraction/types"
import type { SerializedError } from "@/lib/errors"
import type { OcrEngineFactory, PageRasterizer } from "@/lib/ocr/types"
import type { MergeConflict, SourceDiagnostic } from "@/lib/regulatory-database/types"

export type DocumentStatus = "success" | "partial" | "failed"

// ============================================================================
// Semantic review hook
// ============================================================================

export interface SemanticFinding {
  message: string
  code?: string
  pageIndex?: number
}

/**
 * A reviewer that reads a document after matching. Findings are counted in
 * the report; a reviewer that throws only adds a warning.
 */
export interface SemanticReviewer {
  readonly name: string
  review(document: Document, matches: readonly CodeMatch[]): Promise<SemanticFinding[]>
}

// ============================================================================
// Inputs
// ============================================================================

export interface RunDependencies {
  /** Output name suffix; defaults to the start time */
  runLabel?: string
  /** OCR engines; defaults to Tesseract */
  ocrEngineFactory?: OcrEngineFactory
  rasterize?: PageRasterizer
  reviewers?: readonly SemanticReviewer[]
  now?: () => Date
}

// ============================================================================
// Report
// ============================================================================

export interface DocumentOutcome {
  file: string
  status: DocumentStatus
  documentId?: string
  /** SHA-256 of the file contents; repeated files share it */
  contentHash?: string
  format?: DocumentFormat
  extractionMethod?: ExtractionMethod
  pages: number
  matches: number
  unknownCodes: number
  needsReview: number
  highlights: number
  semanticFindings: number
  executedCopy?: string
  errors: SerializedError[]
  warnings: string[]
  durationMs: number
}

export interface ReportedUnknownCode {
  document: string
  code: string
  rawText: string
  pages: number[]
  occurrences: number
}

export interface RunReport {
  runLabel: string
  startedAt: string
  durationMs: number
  database: {
    fingerprint: string
    sources: string[]
    entries: number
    conflicts: MergeConflict[]
    diagnostics: SourceDiagnostic[]
  }
  documents: DocumentOutcome[]
  unknownCodes: ReportedUnknownCode[]
  outputs: {
    matrices: WrittenMatrix[]
    executedCopies: string[]
    report: string
  }
  totals: Record<DocumentStatus, number> & { documents: number; matches: number }
}
