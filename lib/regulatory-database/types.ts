/**
 * @fileoverview Regulatory clause database types
 * @module lib/regulatory-database/types
 */

import type { CodeClassification } from "@/lib/config/types"

/** A row as read from a source table, before validation */
export interface RawCodeEntry {
  code: string
  description: string
  /** Classification as written in the source, mapped through aliases at merge time */
  classification: string
  sourceTag: string
  /** 1-based spreadsheet row */
  rowNumber: number
}

export interface RegulatorySourceTable {
  /** File name */
  name: string
  /** Tag used for rows that carry none, the file name stem */
  sourceTag: string
  rows: RawCodeEntry[]
}

export interface SourceDiagnostic {
  source: string
  rowNumber?: number
  message: string
}

export interface RegulatoryCode {
  /** Canonical key */
  key: string
  /** Code as written in the source */
  code: string
  description: string
  classification: CodeClassification
  sourceTag: string
  /** Position of the source tag in the effective precedence order (0 wins) */
  precedenceRank: number
  sourceName: string
  rowNumber: number
}

export interface ConflictCandidate {
  code: string
  classification: CodeClassification
  sourceTag: string
  sourceName: string
  rowNumber: number
}

/** Several rows shared one canonical key; `kept` won */
export interface MergeConflict {
  key: string
  kept: ConflictCandidate
  discarded: ConflictCandidate[]
  /** `precedence` when a higher-ranked source won, `earliest-row` on a rank tie */
  resolution: "precedence" | "earliest-row"
  /** Discarded rows disagree with the kept classification */
  classificationDiffers: boolean
}

/**
 * The merged lookup for one run. Built fresh each run and never persisted.
 */
export interface RegulatoryDatabase {
  /** Canonical key to entry, in key order */
  readonly entries: ReadonlyMap<string, RegulatoryCode>
  /** Source tags in effective precedence order */
  readonly sources: readonly string[]
  /** Sorted by key */
  readonly conflicts: readonly MergeConflict[]
  readonly diagnostics: readonly SourceDiagnostic[]
  /** SHA-256 of the canonical serialization */
  readonly fingerprint: string
}
