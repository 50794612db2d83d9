/**
 * @fileoverview Extraction quality validation utilities
 * @module lib/document-extraction/validators
 */

import type { TextSpan } from "./types"

/**
 * Counts characters that carry content (everything but whitespace).
 */
export function countContentChars(text: string): number {
  return text.replace(/\s+/g, "").length
}

/**
 * Text density of a page: content characters across all its spans.
 */
export function measurePageDensity(spans: readonly TextSpan[]): number {
  return spans.reduce((total, span) => total + countContentChars(span.text), 0)
}

/**
 * True if a page carries too little native text to trust and should be OCR'd.
 */
export function requiresOcr(spans: readonly TextSpan[], threshold: number): boolean {
  return measurePageDensity(spans) < threshold
}

/**
 * Share (0-1) of the reference text's content characters that also appear in
 * the extracted text, compared as character multisets.
 *
 * Used to check span extraction against an independent plain-text
 * extraction of the same file. Order is ignored; whitespace is ignored.
 */
export function measureCoverage(reference: string, extracted: string): number {
  const expected = reference.replace(/\s+/g, "")
  if (expected.length === 0) return 1

  const available = new Map<string, number>()
  for (const char of extracted.replace(/\s+/g, "")) {
    available.set(char, (available.get(char) ?? 0) + 1)
  }

  let covered = 0
  for (const char of expected) {
    const remaining = available.get(char) ?? 0
    if (remaining > 0) {
      covered++
      available.set(char, remaining - 1)
    }
  }

  return covered / expected.length
}
