/**
 * @fileoverview OCR module exports
 * @module lib/ocr
 *
 * tesseract.js and pdf-to-img are loaded through dynamic imports inside
 * their modules, so importing this barrel stays cheap.
 */

export * from "./types"
export { renderPdfPages, scaleForDpi } from "./pdf-to-image"
export { createTesseractEngine, tesseractEngineFactory, type TesseractEngineOptions } from "./tesseract-worker"
export { OcrWorkerPool } from "./worker-pool"
export { ocrPages, wordsToSpans, type OcrPagesOptions } from "./ocr-processor"
export { assessOcrQuality } from "./quality"
