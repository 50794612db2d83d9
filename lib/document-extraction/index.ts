/**
 * @fileoverview Document extraction module
 *
 * unpdf is loaded through a dynamic import inside the PDF extractor, so
 * importing this barrel does not pull in PDF.js.
 *
 * @module lib/document-extraction
 */

// Types
export type {
  BoundingBox,
  Document,
  DocumentFormat,
  DocumentMetadata,
  ExtractedPages,
  ExtractionMethod,
  ExtractionWarning,
  ExtractOptions,
  FormatHandler,
  Page,
  PageRaster,
  PageStatus,
  SpanOrigin,
  SpanStyle,
  TextSpan,
} from "./types"

// Format detection and handlers
export { detectFormat, isSupportedExtension, readSignature } from "./detect-format"
export { FORMAT_HANDLERS, formatForExtension } from "./handlers"
export { extractPdf } from "./pdf-extractor"
export { extractDocx, openDocx, readPageGeometry, type PageGeometry } from "./docx-extractor"

// Layout and validators
export { arrangeSpans, type PositionedText } from "./layout"
export { measureCoverage, measurePageDensity, requiresOcr } from "./validators"

// Unified extraction
export {
  extractDocument,
  extractionMethodOf,
  loadDocument,
  readDocumentBytes,
  type LoadDocumentOptions,
} from "./extract-document"
