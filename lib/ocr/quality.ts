/**
 * @fileoverview OCR quality assessment
 * @module lib/ocr/quality
 */

import type { OcrPageResult, OcrQuality } from "./types"
import { CONFIDENCE_THRESHOLD } from "./types"

/**
 * Assess OCR quality across the pages of one document.
 *
 * Thresholds:
 * - >= 0.85: Good quality, no warning
 * - floor-0.85: Low quality, some words may be misread
 * - < floor: Critical quality, matches on these pages need review
 */
export function assessOcrQuality(
  pages: readonly Pick<OcrPageResult, "pageIndex" | "averageConfidence">[],
  confidenceFloor: number
): OcrQuality {
  if (pages.length === 0) {
    return { confidence: 1, isLowQuality: false, affectedPages: [] }
  }

  const confidence =
    pages.reduce((sum, page) => sum + page.averageConfidence, 0) / pages.length
  const affectedPages = pages
    .filter((page) => page.averageConfidence < CONFIDENCE_THRESHOLD)
    .map((page) => page.pageIndex + 1)

  // Critical threshold - results may be unusable
  if (confidence < confidenceFloor) {
    return {
      confidence,
      isLowQuality: true,
      warningMessage:
        `OCR quality is very low (${(confidence * 100).toFixed(0)}%). ` +
        "Clause references on scanned pages may be missing or misread.",
      affectedPages,
    }
  }

  if (confidence < CONFIDENCE_THRESHOLD) {
    const pagesText =
      affectedPages.length > 5
        ? `${affectedPages.slice(0, 5).join(", ")} and ${affectedPages.length - 5} more`
        : affectedPages.join(", ")

    return {
      confidence,
      isLowQuality: true,
      warningMessage: `Some scanned text was difficult to read on pages ${pagesText}.`,
      affectedPages,
    }
  }

  return { confidence, isLowQuality: false, affectedPages: [] }
}
