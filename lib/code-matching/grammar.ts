/**
 * @fileoverview Clause code grammar
 *
 * One pattern per agency family. Patterns are wrapped in token-boundary
 * assertions so a code embedded in a longer token ("X52.212-4", "52.212-4.1")
 * is not a match.
 *
 * @module lib/code-matching/grammar
 */

import type { CodeFamilyGrammar } from "@/lib/config/types"

/** Not after a letter or digit, nor after a separator that follows one */
const LEADING_BOUNDARY = String.raw`(?<![\p{L}\p{N}]|[\p{L}\p{N}][.\-])`
/** Not before a letter or digit, nor before a separator that precedes one */
const TRAILING_BOUNDARY = String.raw`(?![\p{L}\p{N}]|[.\-][\p{L}\p{N}])`

export interface CompiledFamily {
  family: string
  /** Position in the configured order; lower wins ties */
  rank: number
  pattern: RegExp
}

export interface CodeCandidate {
  family: string
  rank: number
  start: number
  end: number
}

export function compileFamilies(grammar: readonly CodeFamilyGrammar[]): CompiledFamily[] {
  return grammar.map(({ family, source }, rank) => ({
    family,
    rank,
    pattern: new RegExp(`${LEADING_BOUNDARY}(?:${source})${TRAILING_BOUNDARY}`, "gu"),
  }))
}

/**
 * Every match of every family in `text`, overlaps included.
 */
export function findCandidates(text: string, families: readonly CompiledFamily[]): CodeCandidate[] {
  const candidates: CodeCandidate[] = []
  for (const { family, rank, pattern } of families) {
    pattern.lastIndex = 0
    for (const match of text.matchAll(pattern)) {
      if (match[0].length === 0) continue
      const start = match.index ?? 0
      candidates.push({ family, rank, start, end: start + match[0].length })
    }
  }
  return candidates
}

/**
 * Resolves overlapping candidates: longest first, then the family listed
 * first, then the earliest. Returned in text order.
 */
export function resolveOverlaps(candidates: readonly CodeCandidate[]): CodeCandidate[] {
  const ranked = [...candidates].sort(
    (a, b) => b.end - b.start - (a.end - a.start) || a.rank - b.rank || a.start - b.start
  )

  const accepted: CodeCandidate[] = []
  for (const candidate of ranked) {
    const overlaps = accepted.some(
      (other) => candidate.start < other.end && other.start < candidate.end
    )
    if (!overlaps) accepted.push(candidate)
  }
  return accepted.sort((a, b) => a.start - b.start)
}
