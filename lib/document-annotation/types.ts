/**
 * @fileoverview Annotation types
 * @module lib/document-annotation/types
 */

import type { ColorMap } from "@/lib/config/types"
import type { AnnotationError } from "@/lib/errors"

export interface AnnotateOptions {
  colorMap: ColorMap
  /** OCR boxes grow by factor × (1 − confidence) × box height on every side */
  ocrMarginFactor: number
}

export interface AnnotationSummary {
  /** Highlights written (PDF annotations or highlighted DOCX run pieces) */
  highlights: number
  /** Fragments with nothing to draw */
  skipped: number
  /** Pages that could not be annotated */
  errors: AnnotationError[]
  warnings: string[]
}

export interface AnnotatedDocument {
  bytes: Buffer
  summary: AnnotationSummary
}
