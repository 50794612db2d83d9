/**
 * @fileoverview Main OCR processor
 * @module lib/ocr/ocr-processor
 *
 * Rasterizes the pages a native extraction could not read and turns the
 * engine's words into spans in page points.
 */

import { arrangeSpans, type PositionedText } from "@/lib/document-extraction/layout"
import type { TextSpan } from "@/lib/document-extraction/types"
import { OcrFailureError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { Err, Ok, type Result } from "@/lib/result"
import { renderPdfPages, scaleForDpi } from "./pdf-to-image"
import type { OcrPageResult, OcrWord, PageRasterizer } from "./types"
import type { OcrWorkerPool } from "./worker-pool"

export interface OcrPagesOptions {
  dpi: number
  /** Words below this confidence are kept and flagged */
  confidenceFloor: number
  /** Pages beyond this many are not rasterized */
  maxPages: number
  rasterize?: PageRasterizer
}

/**
 * Converts engine words (pixels) into spans (points) in reading order.
 * Empty words are the only ones dropped.
 */
export function wordsToSpans(
  words: readonly OcrWord[],
  pageIndex: number,
  scale: number,
  confidenceFloor: number
): TextSpan[] {
  const items = words
    .filter((word) => word.text.trim().length > 0)
    .map((word): PositionedText => {
      const confidence = Math.min(1, Math.max(0, word.confidence))
      return {
        text: word.text.trim(),
        bbox: {
          x0: word.bbox.x0 / scale,
          y0: word.bbox.y0 / scale,
          x1: word.bbox.x1 / scale,
          y1: word.bbox.y1 / scale,
        },
        style: { fontSize: (word.bbox.y1 - word.bbox.y0) / scale },
        confidence,
        lowConfidence: confidence < confidenceFloor,
        origin: "ocr",
      }
    })

  return arrangeSpans(items, pageIndex)
}

/**
 * OCRs the given pages of a PDF through the shared pool.
 *
 * Every requested page gets an entry: the page's spans, or the
 * `OcrFailureError` explaining why it has none.
 *
 * @example
 * ```ts
 * const results = await ocrPages(buffer, [2, 5], pool, { dpi: 300, confidenceFloor: 0.6, maxPages: 100 })
 * for (const [pageIndex, result] of results) {
 *   if (!result.ok) logger.warn(result.error.message, { pageIndex })
 * }
 * ```
 */
export async function ocrPages(
  buffer: Buffer,
  pageIndices: readonly number[],
  pool: OcrWorkerPool,
  options: OcrPagesOptions
): Promise<Map<number, Result<OcrPageResult, OcrFailureError>>> {
  const { dpi, confidenceFloor, maxPages, rasterize = renderPdfPages } = options
  const scale = scaleForDpi(dpi)
  const results = new Map<number, Result<OcrPageResult, OcrFailureError>>()

  const requested = [...pageIndices].sort((a, b) => a - b)
  const allowed = requested.slice(0, maxPages)
  for (const pageIndex of requested.slice(maxPages)) {
    results.set(
      pageIndex,
      Err(new OcrFailureError(pageIndex, `OCR page limit of ${maxPages} reached`))
    )
  }

  const pending: Promise<void>[] = []
  try {
    for await (const rendered of rasterize(buffer, allowed, scale)) {
      const { pageIndex, image } = rendered
      pending.push(
        pool.recognize(image).then(
          (words) => {
            const spans = wordsToSpans(words, pageIndex, scale, confidenceFloor)
            results.set(
              pageIndex,
              Ok({
                pageIndex,
                spans,
                raster: { dpi, scale, image },
                averageConfidence: averageConfidence(spans),
              })
            )
          },
          (error: unknown) => {
            results.set(
              pageIndex,
              Err(
                new OcrFailureError(
                  pageIndex,
                  `OCR failed: ${error instanceof Error ? error.message : String(error)}`
                )
              )
            )
          }
        )
      )
    }
  } catch (error) {
    logger.warn("Page rasterization stopped", {
      error: error instanceof Error ? error.message : String(error),
    })
  }
  await Promise.all(pending)

  for (const pageIndex of allowed) {
    if (!results.has(pageIndex)) {
      results.set(pageIndex, Err(new OcrFailureError(pageIndex, "Page could not be rasterized")))
    }
  }

  return results
}

function averageConfidence(spans: readonly TextSpan[]): number {
  if (spans.length === 0) return 0
  return spans.reduce((sum, span) => sum + span.confidence, 0) / spans.length
}
