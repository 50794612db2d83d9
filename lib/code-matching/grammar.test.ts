import { describe, it, expect } from "vitest"
import { TEST_GRAMMAR } from "@/test/factories"
import { compileFamilies, findCandidates, resolveOverlaps } from "./grammar"

const families = compileFamilies(TEST_GRAMMAR)

function codesIn(text: string): string[] {
  return resolveOverlaps(findCandidates(text, families)).map(
    (candidate) => `${candidate.family}:${text.slice(candidate.start, candidate.end)}`
  )
}

describe("code grammar", () => {
  it("finds each family's codes", () => {
    expect(codesIn("FAR 52.212-4, DFARS 252.204-7012 and NASA 1852.215-84")).toEqual([
      "FAR:52.212-4",
      "DFARS:252.204-7012",
      "NASA:1852.215-84",
    ])
  })

  it("requires token boundaries", () => {
    expect(codesIn("X52.212-4")).toEqual([])
    expect(codesIn("52.212-4.1")).toEqual([])
    expect(codesIn("v2.52.212-4")).toEqual([])
  })

  it("accepts punctuation around a code", () => {
    expect(codesIn("(52.212-4).")).toEqual(["FAR:52.212-4"])
    expect(codesIn("clause 52.212-4.")).toEqual(["FAR:52.212-4"])
  })

  it("breaks equal-length ties by family order", () => {
    // DFARS and the generic agency shape both match
    expect(codesIn("252.204-7012")).toEqual(["DFARS:252.204-7012"])
  })
})

describe("resolveOverlaps", () => {
  it("prefers the longest candidate", () => {
    const resolved = resolveOverlaps([
      { family: "A", rank: 0, start: 4, end: 12 },
      { family: "B", rank: 1, start: 0, end: 12 },
      { family: "A", rank: 0, start: 20, end: 28 },
    ])

    expect(resolved).toEqual([
      { family: "B", rank: 1, start: 0, end: 12 },
      { family: "A", rank: 0, start: 20, end: 28 },
    ])
  })
})
