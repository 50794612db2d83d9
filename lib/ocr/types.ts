/**
 * @fileoverview OCR type definitions
 * @module lib/ocr/types
 */

import type { BoundingBox, PageRaster, TextSpan } from "@/lib/document-extraction/types"

/** Average confidence (0-1) at or above which OCR output needs no warning */
export const CONFIDENCE_THRESHOLD = 0.85

/** A recognized word in image pixels */
export interface OcrWord {
  text: string
  bbox: BoundingBox
  /** Normalized 0-1 */
  confidence: number
}

/**
 * The narrow surface the pipeline needs from an OCR engine. Engines hold
 * native memory; always terminate them.
 */
export interface OcrEngine {
  recognize(image: Uint8Array): Promise<OcrWord[]>
  terminate(): Promise<void>
}

export type OcrEngineFactory = () => Promise<OcrEngine>

/** A rendered PDF page as image buffer */
export interface RenderedPage {
  /** Zero-based page index */
  pageIndex: number
  /** Image data as Uint8Array (PNG format) */
  image: Uint8Array
}

/**
 * Renders the requested pages of a PDF. Requested pages that are never
 * yielded count as OCR failures.
 */
export type PageRasterizer = (
  buffer: Buffer,
  pageIndices: readonly number[],
  scale: number
) => AsyncIterable<RenderedPage>

/** OCR output for one page, in page points */
export interface OcrPageResult {
  pageIndex: number
  spans: TextSpan[]
  raster: PageRaster
  /** Mean word confidence 0-1; 0 for a page without words */
  averageConfidence: number
}

/** Quality assessment of OCR output */
export interface OcrQuality {
  /** Average confidence 0-1 */
  confidence: number
  /** True if a warning should be recorded */
  isLowQuality: boolean
  warningMessage?: string
  /** Pages with confidence below the warning threshold */
  affectedPages: number[]
}
