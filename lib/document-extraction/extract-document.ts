/**
 * @fileoverview Unified document extraction entry point
 *
 * Detects the format, dispatches to the format's handler, then hands any
 * page without enough native text to the OCR fallback.
 *
 * @module lib/document-extraction/extract-document
 */

import { createHash } from "crypto"
import { readFile } from "fs/promises"
import path from "path"
import type { OcrSettings } from "@/lib/config/types"
import { CorruptDocumentError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import {
  assessOcrQuality,
  ocrPages,
  type OcrPageResult,
  type OcrWorkerPool,
  type PageRasterizer,
} from "@/lib/ocr"
import { detectFormat } from "./detect-format"
import { FORMAT_HANDLERS } from "./handlers"
import type { Document, ExtractionMethod, ExtractionWarning, Page } from "./types"
import { measurePageDensity } from "./validators"

// ============================================================================
// Types
// ============================================================================

export interface LoadDocumentOptions {
  /** Pages with fewer non-whitespace characters are OCR'd */
  textDensityThreshold: number
  /** OCR fallback; without it, sparse pages stay as extracted */
  ocr?: {
    pool: OcrWorkerPool
    settings: Pick<OcrSettings, "dpi" | "confidenceFloor" | "maxPages">
    rasterize?: PageRasterizer
  }
}

// ============================================================================
// Main Extraction Function
// ============================================================================

/**
 * Reads and extracts one document from disk.
 *
 * @throws UnsupportedFormatError - Unknown extension and signature
 * @throws CorruptDocumentError - Unreadable, invalid or mislabeled file
 */
export async function loadDocument(
  filePath: string,
  options: LoadDocumentOptions
): Promise<Document> {
  return extractDocument(await readDocumentBytes(filePath), filePath, options)
}

/**
 * @throws CorruptDocumentError - The file cannot be read
 */
export async function readDocumentBytes(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath)
  } catch (error) {
    throw new CorruptDocumentError(`Could not read ${path.basename(filePath)}`, [
      { message: error instanceof Error ? error.message : String(error) },
    ])
  }
}

/**
 * Extracts a document already in memory.
 *
 * Flow:
 * 1. Format detection (signature wins over extension)
 * 2. Native extraction through the format's handler
 * 3. OCR of `needs-ocr` pages; a page that fails keeps its native spans
 *    and becomes `ocr-incomplete`
 * 4. Quality metrics logged for every extraction
 */
export async function extractDocument(
  buffer: Buffer,
  filePath: string,
  options: LoadDocumentOptions
): Promise<Document> {
  const format = detectFormat(filePath, buffer)
  const handler = FORMAT_HANDLERS[format]
  const extracted = await handler.extract(buffer, {
    textDensityThreshold: options.textDensityThreshold,
  })

  const warnings: ExtractionWarning[] = [...extracted.warnings]
  const pages = await applyOcr(buffer, extracted.pages, warnings, options)

  const document: Document = {
    id: path.resolve(filePath),
    contentHash: createHash("sha256").update(buffer).digest("hex"),
    name: path.basename(filePath),
    path: filePath,
    format,
    extractionMethod: extractionMethodOf(pages),
    pages,
    metadata: extracted.metadata,
    warnings,
  }

  logExtractionMetrics(document)
  return document
}

// ============================================================================
// OCR Fallback
// ============================================================================

async function applyOcr(
  buffer: Buffer,
  pages: Page[],
  warnings: ExtractionWarning[],
  options: LoadDocumentOptions
): Promise<Page[]> {
  const sparse = pages.filter((page) => page.status === "needs-ocr").map((page) => page.index)
  if (sparse.length === 0) return pages

  const { ocr } = options
  if (!ocr) {
    for (const pageIndex of sparse) {
      warnings.push({
        type: "ocr_failed",
        message: "OCR is not available for this run",
        pageIndex,
      })
    }
    return pages.map((page): Page =>
      page.status === "needs-ocr" ? { ...page, status: "ocr-incomplete" } : page
    )
  }

  const results = await ocrPages(buffer, sparse, ocr.pool, {
    ...ocr.settings,
    rasterize: ocr.rasterize,
  })

  const recognized: OcrPageResult[] = []
  const updated = pages.map((page): Page => {
    const result = results.get(page.index)
    if (!result) return page

    if (!result.ok) {
      warnings.push({ type: "ocr_failed", message: result.error.message, pageIndex: page.index })
      return { ...page, status: "ocr-incomplete" }
    }

    recognized.push(result.value)
    const lowConfidence = result.value.spans.filter((span) => span.lowConfidence).length
    if (lowConfidence > 0) {
      warnings.push({
        type: "low_confidence",
        message: `${lowConfidence} OCR word(s) fell below the confidence floor`,
        pageIndex: page.index,
      })
    }
    return { ...page, spans: result.value.spans, status: "ocr", raster: result.value.raster }
  })

  const quality = assessOcrQuality(recognized, ocr.settings.confidenceFloor)
  if (quality.isLowQuality && quality.warningMessage) {
    warnings.push({ type: "low_confidence", message: quality.warningMessage })
  }

  return updated
}

/**
 * `native` when no page was OCR'd, `ocr` when every page was, else `mixed`.
 */
export function extractionMethodOf(pages: readonly Page[]): ExtractionMethod {
  const ocrCount = pages.filter((page) => page.status === "ocr").length
  if (ocrCount === 0) return "native"
  return ocrCount === pages.length ? "ocr" : "mixed"
}

// ============================================================================
// Logging
// ============================================================================

function logExtractionMetrics(document: Document): void {
  logger.info("Document extracted", {
    document: document.name,
    format: document.format,
    extractionMethod: document.extractionMethod,
    pageCount: document.pages.length,
    spanCount: document.pages.reduce((total, page) => total + page.spans.length, 0),
    charCount: document.pages.reduce((total, page) => total + measurePageDensity(page.spans), 0),
    ocrPages: document.pages.filter((page) => page.status === "ocr").length,
    incompletePages: document.pages.filter((page) => page.status === "ocr-incomplete").length,
    warningCount: document.warnings.length,
    warnings: document.warnings.map((w) => w.type).join(","),
    hasTitle: !!document.metadata.title,
  })
}
