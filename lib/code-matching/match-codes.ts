/**
 * @fileoverview Clause code matching
 *
 * Finds every clause code in a document, resolves it against the merged
 * database and maps it back onto the spans it was read from.
 *
 * @module lib/code-matching/match-codes
 */

import type { Document } from "@/lib/document-extraction/types"
import { logger } from "@/lib/logger"
import { canonicalizeCode } from "@/lib/regulatory-database/canonicalize"
import type { RegulatoryDatabase } from "@/lib/regulatory-database/types"
import { compileFamilies, findCandidates, resolveOverlaps, type CompiledFamily } from "./grammar"
import { linearizeDocument, segmentsInRange, type WrapCheck } from "./linearize"
import type { CodeMatch, MatchFragment, MatchOptions, UnknownCodeWarning } from "./types"

function wrapCheck(families: readonly CompiledFamily[]): WrapCheck {
  return (joined, boundary) =>
    findCandidates(joined, families).some(
      (candidate) => candidate.start < boundary && boundary < candidate.end
    )
}

/**
 * Matches clause codes in `document`.
 *
 * Output is ordered by page, then reading order, then character offset, and
 * is identical for identical inputs.
 */
export function matchCodes(
  document: Document,
  database: RegulatoryDatabase,
  options: MatchOptions
): CodeMatch[] {
  const families = compileFamilies(options.grammar)
  const linear = linearizeDocument(document, options.wrapJoinTolerance, wrapCheck(families))
  const candidates = resolveOverlaps(findCandidates(linear.text, families))

  const matches: CodeMatch[] = []
  for (const candidate of candidates) {
    const covered = segmentsInRange(linear.segments, candidate.start, candidate.end)
    const [first] = covered
    if (!first) continue

    const fragments: MatchFragment[] = covered.map(({ segment, start, end }) => ({
      spanId: segment.span.id,
      pageIndex: segment.span.pageIndex,
      start: segment.spanOffset + start - segment.start,
      end: segment.spanOffset + end - segment.start,
    }))
    const spans = covered.map(({ segment }) => segment.span)

    const rawText = linear.text.slice(candidate.start, candidate.end)
    const code = canonicalizeCode(rawText)
    const entry = database.entries.get(code)

    matches.push({
      code,
      rawText,
      family: candidate.family,
      spans,
      fragments,
      documentId: document.id,
      classification: entry?.classification ?? "Unknown",
      entry,
      confidence: Math.min(...spans.map((span) => span.confidence)),
      needsReview: !entry || spans.some((span) => span.lowConfidence),
      pageIndex: first.segment.span.pageIndex,
      order: first.segment.span.order,
      offset: fragments[0]?.start ?? 0,
    })
  }

  matches.sort(compareMatches)

  logger.info("Codes matched", {
    document: document.name,
    matches: matches.length,
    unknown: matches.filter((match) => match.classification === "Unknown").length,
    wrapped: matches.filter((match) => match.spans.length > 1).length,
    needsReview: matches.filter((match) => match.needsReview).length,
  })

  return matches
}

export function compareMatches(
  a: Pick<CodeMatch, "pageIndex" | "order" | "offset">,
  b: Pick<CodeMatch, "pageIndex" | "order" | "offset">
): number {
  return a.pageIndex - b.pageIndex || a.order - b.order || a.offset - b.offset
}

/**
 * One warning per document and unknown code, in order of first appearance.
 */
export function collectUnknownCodes(matches: readonly CodeMatch[]): UnknownCodeWarning[] {
  const warnings = new Map<string, UnknownCodeWarning>()
  for (const match of matches) {
    if (match.classification !== "Unknown") continue
    const page = match.pageIndex + 1
    const key = `${match.documentId}:${match.code}`
    const existing = warnings.get(key)
    if (existing) {
      existing.occurrences++
      if (!existing.pages.includes(page)) existing.pages.push(page)
      continue
    }
    warnings.set(key, {
      documentId: match.documentId,
      code: match.code,
      rawText: match.rawText,
      pages: [page],
      occurrences: 1,
    })
  }
  return [...warnings.values()]
}
