/**
 * @fileoverview Match to matrix row projection
 * @module lib/compliance-matrix/rows
 */

import type { CodeMatch } from "@/lib/code-matching/types"
import type { Document } from "@/lib/document-extraction/types"
import type { ComplianceRow } from "./types"

export const NOTE_UNKNOWN = "Not in the clause database; review manually"
export const NOTE_LOW_CONFIDENCE = "Read from low-confidence OCR text"

/**
 * `p. 3` for a match on one page, `p. 3–4` when it continues onto later pages.
 */
export function formatLocation(match: Pick<CodeMatch, "fragments">): string {
  const pages = match.fragments.map((fragment) => fragment.pageIndex + 1)
  if (pages.length === 0) return ""
  const first = Math.min(...pages)
  const last = Math.max(...pages)
  return first === last ? `p. ${first}` : `p. ${first}–${last}`
}

function notesFor(match: CodeMatch): string {
  const notes: string[] = []
  if (match.classification === "Unknown") notes.push(NOTE_UNKNOWN)
  if (match.spans.some((span) => span.lowConfidence)) notes.push(NOTE_LOW_CONFIDENCE)
  return notes.join("; ")
}

export function compareRows(a: ComplianceRow, b: ComplianceRow): number {
  return (
    a.documentIndex - b.documentIndex ||
    a.pageIndex - b.pageIndex ||
    a.order - b.order ||
    a.offset - b.offset
  )
}

/**
 * One row per match, ordered by document (input order), page, reading
 * order and offset.
 */
export function buildComplianceRows(
  matches: readonly CodeMatch[],
  documents: readonly Pick<Document, "id" | "name">[]
): ComplianceRow[] {
  const documentIndex = new Map(documents.map((document, index) => [document.id, index]))
  const names = new Map(documents.map((document) => [document.id, document.name]))

  return matches
    .map(
      (match): ComplianceRow => ({
        document: names.get(match.documentId) ?? match.documentId,
        documentId: match.documentId,
        code: match.code,
        description: match.entry?.description ?? "",
        classification: match.classification,
        location: formatLocation(match),
        confidence: match.confidence,
        source: match.entry?.sourceTag ?? "",
        notes: notesFor(match),
        documentIndex: documentIndex.get(match.documentId) ?? documents.length,
        pageIndex: match.pageIndex,
        order: match.order,
        offset: match.offset,
      })
    )
    .sort(compareRows)
}
