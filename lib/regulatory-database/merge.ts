/**
 * @fileoverview Merges source tables into one clause lookup
 *
 * Rows are canonicalized and grouped by key. When several sources define the
 * same key the highest-precedence source wins and the resolution is recorded
 * as a conflict. The result is frozen and fingerprinted so two runs over the
 * same tables can be compared.
 *
 * @module lib/regulatory-database/merge
 */

import { createHash } from "crypto"
import type { CodeClassification } from "@/lib/config/types"
import { EmptyDatabaseError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { canonicalizeCode } from "./canonicalize"
import type {
  ConflictCandidate,
  MergeConflict,
  RegulatoryCode,
  RegulatoryDatabase,
  RegulatorySourceTable,
  SourceDiagnostic,
} from "./types"

export interface BuildDatabaseOptions {
  /** Tags listed first win; unlisted tags follow alphabetically */
  sourcePrecedenceOrder: readonly string[]
  /** Lowercase spelling to classification */
  classificationAliases: Readonly<Record<string, CodeClassification>>
  /** Diagnostics from loading, carried into the database */
  diagnostics?: readonly SourceDiagnostic[]
}

const CODE_CLASSIFICATIONS: readonly CodeClassification[] = ["OK", "Conditional", "Remove"]

interface Candidate extends Omit<RegulatoryCode, "precedenceRank"> {
  /** Position in table/row order */
  sequence: number
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Resolves a classification as written in a source. Aliases are matched
 * case-insensitively; the canonical names always resolve.
 */
export function resolveClassification(
  value: string,
  aliases: Readonly<Record<string, CodeClassification>>
): CodeClassification | undefined {
  const normalized = value.trim().toLowerCase()
  if (!normalized) return undefined
  if (Object.hasOwn(aliases, normalized)) return aliases[normalized]
  return CODE_CLASSIFICATIONS.find((name) => name.toLowerCase() === normalized)
}

/**
 * Orders source tags for precedence: listed tags in list order (matched
 * case-insensitively), then the rest alphabetically.
 */
export function rankSources(tags: Iterable<string>, precedenceOrder: readonly string[]): string[] {
  const listed = precedenceOrder.map((tag) => tag.toUpperCase())
  const listedIndex = (tag: string) => {
    const index = listed.indexOf(tag.toUpperCase())
    return index >= 0 ? index : listed.length
  }
  return [...new Set(tags)].sort(
    (a, b) => listedIndex(a) - listedIndex(b) || compareStrings(a, b)
  )
}

/**
 * Builds the run's clause database.
 *
 * @throws EmptyDatabaseError - No row produced a usable entry
 */
export function buildDatabase(
  tables: readonly RegulatorySourceTable[],
  options: BuildDatabaseOptions
): RegulatoryDatabase {
  const diagnostics: SourceDiagnostic[] = [...(options.diagnostics ?? [])]
  const groups = new Map<string, Candidate[]>()
  let sequence = 0

  const ordered = [...tables].sort((a, b) => compareStrings(a.name, b.name))
  for (const table of ordered) {
    for (const row of table.rows) {
      const key = canonicalizeCode(row.code)
      if (!key) {
        diagnostics.push({ source: table.name, rowNumber: row.rowNumber, message: "Empty clause code" })
        continue
      }

      const classification = resolveClassification(row.classification, options.classificationAliases)
      if (!classification) {
        diagnostics.push({
          source: table.name,
          rowNumber: row.rowNumber,
          message: `Unrecognized classification "${row.classification}" for ${row.code}`,
        })
        continue
      }

      const candidate: Candidate = {
        key,
        code: row.code.trim(),
        description: row.description.trim(),
        classification,
        sourceTag: row.sourceTag.trim() || table.sourceTag,
        sourceName: table.name,
        rowNumber: row.rowNumber,
        sequence: sequence++,
      }
      const group = groups.get(key)
      if (group) group.push(candidate)
      else groups.set(key, [candidate])
    }
  }

  if (groups.size === 0) {
    throw new EmptyDatabaseError()
  }

  const sources = rankSources(
    [...groups.values()].flatMap((group) => group.map((candidate) => candidate.sourceTag)),
    options.sourcePrecedenceOrder
  )
  const rankOf = new Map(sources.map((tag, index) => [tag, index]))
  const rank = (candidate: Candidate) => rankOf.get(candidate.sourceTag) ?? sources.length

  const entries = new Map<string, RegulatoryCode>()
  const conflicts: MergeConflict[] = []

  for (const key of [...groups.keys()].sort(compareStrings)) {
    const group = (groups.get(key) ?? []).sort(
      (a, b) => rank(a) - rank(b) || a.sequence - b.sequence
    )
    const [kept, ...discarded] = group
    if (!kept) continue

    const { sequence: _sequence, ...entry } = kept
    entries.set(key, Object.freeze({ ...entry, precedenceRank: rank(kept) }))

    if (discarded.length > 0) {
      conflicts.push(
        Object.freeze({
          key,
          kept: toConflictCandidate(kept),
          discarded: discarded.map(toConflictCandidate),
          resolution: discarded.some((other) => rank(other) !== rank(kept))
            ? "precedence"
            : "earliest-row",
          classificationDiffers: discarded.some(
            (other) => other.classification !== kept.classification
          ),
        })
      )
    }
  }

  const fingerprint = createHash("sha256")
    .update(serializeDatabase({ entries, sources, conflicts }))
    .digest("hex")

  logConflicts(conflicts)
  logger.info("Regulatory database built", {
    entries: entries.size,
    sources: sources.join(","),
    conflicts: conflicts.length,
    diagnostics: diagnostics.length,
    fingerprint,
  })

  return Object.freeze({
    entries: new ReadonlyEntries(entries),
    sources: Object.freeze(sources),
    conflicts: Object.freeze(conflicts),
    diagnostics: Object.freeze(diagnostics),
    fingerprint,
  })
}

/**
 * Read-only view over a map. There is no `set`, `delete` or `clear` to
 * reach at runtime.
 */
class ReadonlyEntries<K, V> implements ReadonlyMap<K, V> {
  readonly #map: Map<K, V>

  constructor(map: Map<K, V>) {
    this.#map = map
  }

  get size() {
    return this.#map.size
  }

  get(key: K) {
    return this.#map.get(key)
  }

  has(key: K) {
    return this.#map.has(key)
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void): void {
    this.#map.forEach((value, key) => callback(value, key, this))
  }

  entries() {
    return this.#map.entries()
  }

  keys() {
    return this.#map.keys()
  }

  values() {
    return this.#map.values()
  }

  [Symbol.iterator]() {
    return this.#map[Symbol.iterator]()
  }
}

function toConflictCandidate(candidate: Candidate): ConflictCandidate {
  return {
    code: candidate.code,
    classification: candidate.classification,
    sourceTag: candidate.sourceTag,
    sourceName: candidate.sourceName,
    rowNumber: candidate.rowNumber,
  }
}

function logConflicts(conflicts: readonly MergeConflict[]): void {
  for (const conflict of conflicts) {
    const details = {
      key: conflict.key,
      kept: `${conflict.kept.sourceTag}:${conflict.kept.classification}`,
      discarded: conflict.discarded
        .map((other) => `${other.sourceTag}:${other.classification}`)
        .join(","),
      resolution: conflict.resolution,
    }
    if (conflict.classificationDiffers) {
      logger.warn("Conflicting classifications merged", details)
    } else {
      logger.debug("Duplicate clause merged", details)
    }
  }
}

/**
 * Canonical JSON form of the database content. Diagnostics are excluded.
 */
export function serializeDatabase(
  database: Pick<RegulatoryDatabase, "entries" | "sources" | "conflicts">
): string {
  return JSON.stringify({
    sources: database.sources,
    entries: [...database.entries.values()],
    conflicts: database.conflicts,
  })
}

/**
 * Looks up a code as written anywhere (source table or document).
 */
export function lookupCode(database: RegulatoryDatabase, code: string): RegulatoryCode | undefined {
  return database.entries.get(canonicalizeCode(code))
}
