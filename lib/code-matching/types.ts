/**
 * @fileoverview Code match types
 * @module lib/code-matching/types
 */

import type { Classification, CodeFamilyGrammar, WrapJoinTolerance } from "@/lib/config/types"
import type { TextSpan } from "@/lib/document-extraction/types"
import type { RegulatoryCode } from "@/lib/regulatory-database/types"

/** The part of one span a match covers */
export interface MatchFragment {
  spanId: string
  pageIndex: number
  /** Character range within the span's text, end exclusive */
  start: number
  end: number
}

export interface CodeMatch {
  /** Canonical key */
  code: string
  /** Matched text as it reads once wrapped pieces are joined */
  rawText: string
  family: string
  /** Contributing spans in reading order; more than one when the code wraps */
  spans: TextSpan[]
  /** One per contributing span */
  fragments: MatchFragment[]
  documentId: string
  classification: Classification
  entry?: RegulatoryCode
  /** Lowest confidence among contributing spans */
  confidence: number
  /** Not in the database, or read from low-confidence OCR text */
  needsReview: boolean
  /** Page of the first fragment */
  pageIndex: number
  /** Reading order of the first span */
  order: number
  /** Character offset of the match within the first span */
  offset: number
}

/** A code absent from the database, reported once per document */
export interface UnknownCodeWarning {
  documentId: string
  code: string
  rawText: string
  /** 1-based page numbers in ascending order */
  pages: number[]
  occurrences: number
}

export interface MatchOptions {
  grammar: readonly CodeFamilyGrammar[]
  wrapJoinTolerance: WrapJoinTolerance
}
