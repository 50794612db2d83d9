import { describe, it, expect } from "vitest"
import { DEFAULT_CLASSIFICATION_ALIASES } from "@/lib/config/defaults"
import { EmptyDatabaseError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import {
  buildDatabase,
  lookupCode,
  rankSources,
  resolveClassification,
  serializeDatabase,
  type BuildDatabaseOptions,
} from "./merge"
import type { RegulatorySourceTable } from "./types"

type Row = [code: string, classification: string, description?: string, sourceTag?: string]

function table(name: string, rows: Row[]): RegulatorySourceTable {
  const sourceTag = name.replace(/\.[^.]+$/, "")
  return {
    name,
    sourceTag,
    rows: rows.map(([code, classification, description = "", tag = ""], i) => ({
      code,
      classification,
      description,
      sourceTag: tag || sourceTag,
      rowNumber: i + 2,
    })),
  }
}

const options: BuildDatabaseOptions = {
  sourcePrecedenceOrder: ["FAR", "DFARS", "NASA"],
  classificationAliases: DEFAULT_CLASSIFICATION_ALIASES,
}

describe("resolveClassification", () => {
  it("maps aliases case-insensitively", () => {
    expect(resolveClassification("  C ", DEFAULT_CLASSIFICATION_ALIASES)).toBe("Conditional")
    expect(resolveClassification("R", DEFAULT_CLASSIFICATION_ALIASES)).toBe("Remove")
  })

  it("always accepts the canonical names", () => {
    expect(resolveClassification("remove", {})).toBe("Remove")
  })

  it("rejects unknown spellings", () => {
    expect(resolveClassification("maybe", DEFAULT_CLASSIFICATION_ALIASES)).toBeUndefined()
    expect(resolveClassification("constructor", DEFAULT_CLASSIFICATION_ALIASES)).toBeUndefined()
    expect(resolveClassification("", DEFAULT_CLASSIFICATION_ALIASES)).toBeUndefined()
  })
})

describe("rankSources", () => {
  it("puts listed tags first, then the rest alphabetically", () => {
    expect(rankSources(["zeta", "NASA", "Alpha", "far", "NASA"], ["FAR", "DFARS", "NASA"])).toEqual([
      "far",
      "NASA",
      "Alpha",
      "zeta",
    ])
  })
})

describe("buildDatabase", () => {
  it("canonicalizes keys and keeps the source spelling", () => {
    const db = buildDatabase([table("FAR.xlsx", [["52.212 – 4", "ok", "Contract Terms"]])], options)

    expect(db.entries.get("52.212-4")).toEqual({
      key: "52.212-4",
      code: "52.212 – 4",
      description: "Contract Terms",
      classification: "OK",
      sourceTag: "FAR",
      precedenceRank: 0,
      sourceName: "FAR.xlsx",
      rowNumber: 2,
    })
    expect(lookupCode(db, "52.212-4 ")?.classification).toBe("OK")
  })

  it("resolves duplicates by source precedence and logs the conflict", () => {
    const db = buildDatabase(
      [
        table("Agency.xlsx", [["52.212-4", "Remove"]]),
        table("FAR.xlsx", [["52.212-4", "OK"]]),
      ],
      options
    )

    expect(db.entries.get("52.212-4")?.sourceTag).toBe("FAR")
    expect(db.sources).toEqual(["FAR", "Agency"])
    expect(db.conflicts).toEqual([
      {
        key: "52.212-4",
        kept: {
          code: "52.212-4",
          classification: "OK",
          sourceTag: "FAR",
          sourceName: "FAR.xlsx",
          rowNumber: 2,
        },
        discarded: [
          {
            code: "52.212-4",
            classification: "Remove",
            sourceTag: "Agency",
            sourceName: "Agency.xlsx",
            rowNumber: 2,
          },
        ],
        resolution: "precedence",
        classificationDiffers: true,
      },
    ])
    expect(logger.warn).toHaveBeenCalledWith(
      "Conflicting classifications merged",
      expect.objectContaining({ key: "52.212-4", kept: "FAR:OK", discarded: "Agency:Remove" })
    )
  })

  it("ranks unlisted sources alphabetically", () => {
    const db = buildDatabase(
      [table("Beta.csv", [["1852.215-84", "C"]]), table("Alpha.csv", [["1852.215-84", "OK"]])],
      options
    )

    expect(db.entries.get("1852.215-84")?.sourceTag).toBe("Alpha")
    expect(db.entries.get("1852.215-84")?.precedenceRank).toBe(0)
  })

  it("keeps the earliest row on equal rank", () => {
    const db = buildDatabase(
      [table("FAR.xlsx", [["52.219-8", "C", "first"], ["52.219 - 8", "C", "second"]])],
      options
    )

    expect(db.entries.get("52.219-8")?.description).toBe("first")
    expect(db.conflicts[0]?.resolution).toBe("earliest-row")
    expect(db.conflicts[0]?.classificationDiffers).toBe(false)
  })

  it("skips rows with an unrecognized classification", () => {
    const db = buildDatabase(
      [table("FAR.xlsx", [["52.212-4", "OK"], ["52.219-8", "maybe"]])],
      { ...options, diagnostics: [{ source: "Old.xls", message: "legacy" }] }
    )

    expect([...db.entries.keys()]).toEqual(["52.212-4"])
    expect(db.diagnostics).toEqual([
      { source: "Old.xls", message: "legacy" },
      { source: "FAR.xlsx", rowNumber: 3, message: 'Unrecognized classification "maybe" for 52.219-8' },
    ])
  })

  it("throws when no row is usable", () => {
    expect(() => buildDatabase([], options)).toThrow(EmptyDatabaseError)
    expect(() => buildDatabase([table("FAR.xlsx", [["52.212-4", "?"]])], options)).toThrow(
      EmptyDatabaseError
    )
  })

  it("is independent of table order and fingerprints identically", () => {
    const tables = [
      table("FAR.xlsx", [["52.212-4", "OK"], ["52.204-21", "C"]]),
      table("DFARS.xlsx", [["252.204-7012", "C"], ["52.212-4", "R"]]),
    ]
    const first = buildDatabase(tables, options)
    const second = buildDatabase([...tables].reverse(), options)

    expect(serializeDatabase(second)).toBe(serializeDatabase(first))
    expect(second.fingerprint).toBe(first.fingerprint)
    expect(first.fingerprint).toMatch(/^[0-9a-f]{64}$/)
    expect([...first.entries.keys()]).toEqual(["252.204-7012", "52.204-21", "52.212-4"])
  })

  it("returns a frozen value", () => {
    const db = buildDatabase([table("FAR.xlsx", [["52.212-4", "OK"]])], options)

    expect(Object.isFrozen(db)).toBe(true)
    expect(Object.isFrozen(db.conflicts)).toBe(true)
    expect(Object.isFrozen(db.entries.get("52.212-4"))).toBe(true)
  })

  it("exposes entries without a way to change them", () => {
    const db = buildDatabase([table("FAR.xlsx", [["52.212-4", "OK"]])], options)

    expect("set" in db.entries).toBe(false)
    expect("delete" in db.entries).toBe(false)
    expect("clear" in db.entries).toBe(false)
    expect(db.entries.size).toBe(1)
    expect([...db.entries.keys()]).toEqual(["52.212-4"])
    expect(new Map(db.entries).get("52.212-4")?.classification).toBe("OK")
  })
})
