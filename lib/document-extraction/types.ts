/**
 * @fileoverview Normalized document model
 *
 * Every supported format is extracted into the same shape: pages of
 * positioned text spans. Downstream stages (matching, annotation, and any
 * future semantic reviewer) only ever see this model.
 *
 * @module lib/document-extraction/types
 */

export type DocumentFormat = "pdf" | "docx"

export type ExtractionMethod = "native" | "ocr" | "mixed"

/**
 * Axis-aligned box in PDF points (1/72 inch) with the origin at the top-left
 * corner of the page's visible area.
 */
export interface BoundingBox {
  x0: number
  y0: number
  x1: number
  y1: number
}

export interface SpanStyle {
  fontName?: string
  /** Font size in points */
  fontSize?: number
  bold?: boolean
  italic?: boolean
}

export type SpanOrigin = "pdf-text" | "ocr" | "docx-run"

export interface TextSpan {
  /** Stable id within the document, `p<page>-s<order>` */
  id: string
  text: string
  bbox: BoundingBox
  style: SpanStyle
  /** 1.0 for native extraction, engine confidence (0-1) for OCR */
  confidence: number
  /** OCR confidence fell below the configured floor */
  lowConfidence: boolean
  origin: SpanOrigin
  /** Owning page */
  pageIndex: number
  /** Visual line within the page, used for wrap detection */
  lineIndex: number
  /** Reading-order position within the page */
  order: number
  /** Index of the source `w:r` element (DOCX only) */
  runIndex?: number
  /** Offset of `text` within the source run's text (DOCX only) */
  runOffset?: number
}

export type PageStatus = "native" | "needs-ocr" | "ocr" | "ocr-incomplete"

/** Backing image for OCR'd pages */
export interface PageRaster {
  dpi: number
  /** Pixels per point */
  scale: number
  /** PNG bytes */
  image: Uint8Array
}

export interface Page {
  index: number
  /** Width in points */
  width: number
  /** Height in points */
  height: number
  spans: TextSpan[]
  status: PageStatus
  raster?: PageRaster
}

export interface ExtractionWarning {
  type:
    | "ocr_required"
    | "ocr_failed"
    | "low_confidence"
    | "docx_warning"
    | "embedded_content"
  message: string
  pageIndex?: number
}

export interface DocumentMetadata {
  title?: string
  author?: string
  creationDate?: string
  modificationDate?: string
}

export interface Document {
  /** Absolute path of the input file; one per input even when contents repeat */
  id: string
  /** SHA-256 of the file contents */
  contentHash: string
  /** File name including extension */
  name: string
  path: string
  format: DocumentFormat
  extractionMethod: ExtractionMethod
  pages: Page[]
  metadata: DocumentMetadata
  warnings: ExtractionWarning[]
}

/**
 * Output of a format handler before OCR fallback runs.
 */
export interface ExtractedPages {
  pages: Page[]
  metadata: DocumentMetadata
  warnings: ExtractionWarning[]
}

/**
 * One supported format. Handlers share a single capability so new formats
 * are added by registering another handler, not by subclassing.
 */
export interface FormatHandler {
  format: DocumentFormat
  extensions: readonly string[]
  extract(buffer: Buffer, options: ExtractOptions): Promise<ExtractedPages>
}

export interface ExtractOptions {
  /** Pages with fewer non-whitespace characters are marked `needs-ocr` */
  textDensityThreshold: number
}
