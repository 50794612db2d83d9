import { describe, it, expect } from "vitest"
import {
  createTestDatabase,
  createTestDocument,
  createTestPage,
  createTestSpan,
  spansFromLines,
  TEST_MATCH_OPTIONS,
} from "@/test/factories"
import { collectUnknownCodes, matchCodes } from "./match-codes"

const database = createTestDatabase([
  ["52.212-4", "OK", "Contract Terms and Conditions-Commercial Products"],
  ["52.204-21", "Conditional", "Basic Safeguarding"],
  ["252.204-7012", "Remove", "Safeguarding Covered Defense Information"],
])

describe("matchCodes", () => {
  it("matches a code on one line", () => {
    const document = createTestDocument([[["FAR", "52.212-4", "applies"]]])
    const [match, ...rest] = matchCodes(document, database, TEST_MATCH_OPTIONS)

    expect(rest).toEqual([])
    expect(match).toMatchObject({
      code: "52.212-4",
      rawText: "52.212-4",
      family: "FAR",
      documentId: document.id,
      classification: "OK",
      confidence: 1,
      needsReview: false,
      pageIndex: 0,
      order: 1,
      offset: 0,
      fragments: [{ spanId: "p0-s1", pageIndex: 0, start: 0, end: 8 }],
    })
    expect(match?.entry?.description).toBe("Contract Terms and Conditions-Commercial Products")
  })

  it("joins a code wrapped across lines", () => {
    const document = createTestDocument([[["see", "52.212-"], ["4", "Commercial"]]])
    const matches = matchCodes(document, database, TEST_MATCH_OPTIONS)

    expect(matches).toHaveLength(1)
    expect(matches[0]?.code).toBe("52.212-4")
    expect(matches[0]?.spans.map((span) => span.id)).toEqual(["p0-s1", "p0-s2"])
    expect(matches[0]?.fragments).toEqual([
      { spanId: "p0-s1", pageIndex: 0, start: 0, end: 7 },
      { spanId: "p0-s2", pageIndex: 0, start: 0, end: 1 },
    ])
  })

  it("joins a code split by a page break", () => {
    const document = createTestDocument([[["clause 52.212-"]], [["4 applies"]]])
    const [match] = matchCodes(document, database, TEST_MATCH_OPTIONS)

    expect(match?.fragments).toEqual([
      { spanId: "p0-s0", pageIndex: 0, start: 7, end: 14 },
      { spanId: "p1-s0", pageIndex: 1, start: 0, end: 1 },
    ])
    expect(match?.classification).toBe("OK")
  })

  it("does not glue a sentence end to a code on the next line", () => {
    const document = createTestDocument([[["Section 3."], ["52.212-4", "applies"]]])
    const matches = matchCodes(document, database, TEST_MATCH_OPTIONS)

    expect(matches.map((match) => [match.code, match.fragments[0]?.spanId])).toEqual([
      ["52.212-4", "p0-s1"],
    ])
  })

  it("matches a code set close to the word before it", () => {
    const document = createTestDocument([], {
      pages: [
        createTestPage({
          spans: [
            createTestSpan({ text: "FAR", bbox: { x0: 72, y0: 100, x1: 92, y1: 111 } }),
            createTestSpan({ text: "52.212-4", order: 1, bbox: { x0: 94.75, y0: 100, x1: 140, y1: 111 } }),
          ],
        }),
      ],
    })
    const matches = matchCodes(document, database, TEST_MATCH_OPTIONS)

    expect(matches.map((match) => match.code)).toEqual(["52.212-4"])
    expect(matches[0]?.fragments).toEqual([{ spanId: "p0-s1", pageIndex: 0, start: 0, end: 8 }])
  })

  it("joins a code split into touching spans on one line", () => {
    const document = createTestDocument([], {
      pages: [
        createTestPage({
          spans: [
            createTestSpan({ text: "52.212", bbox: { x0: 72, y0: 72, x1: 108, y1: 86 } }),
            createTestSpan({ text: "-4", order: 1, bbox: { x0: 108, y0: 72, x1: 120, y1: 86 } }),
          ],
        }),
      ],
    })
    const [match] = matchCodes(document, database, TEST_MATCH_OPTIONS)

    expect(match?.code).toBe("52.212-4")
    expect(match?.fragments).toEqual([
      { spanId: "p0-s0", pageIndex: 0, start: 0, end: 6 },
      { spanId: "p0-s1", pageIndex: 0, start: 0, end: 2 },
    ])
  })

  it("flags codes missing from the database", () => {
    const document = createTestDocument([[["52.999-1"]]])
    const [match] = matchCodes(document, database, TEST_MATCH_OPTIONS)

    expect(match?.classification).toBe("Unknown")
    expect(match?.entry).toBeUndefined()
    expect(match?.needsReview).toBe(true)
  })

  it("flags codes read from low-confidence OCR text", () => {
    const document = createTestDocument([], {
      pages: [
        createTestPage({
          status: "ocr",
          spans: spansFromLines([["52.204-21"]], 0, {
            origin: "ocr",
            confidence: 0.5,
            lowConfidence: true,
          }),
        }),
      ],
    })
    const [match] = matchCodes(document, database, TEST_MATCH_OPTIONS)

    expect(match?.classification).toBe("Conditional")
    expect(match?.confidence).toBe(0.5)
    expect(match?.needsReview).toBe(true)
  })

  it("orders matches by page, reading order and offset", () => {
    const document = createTestDocument([
      [["52.204-21 and 52.212-4"], ["252.204-7012"]],
      [["52.212-4"]],
    ])
    const matches = matchCodes(document, database, TEST_MATCH_OPTIONS)

    expect(matches.map((m) => [m.code, m.pageIndex, m.order, m.offset])).toEqual([
      ["52.204-21", 0, 0, 0],
      ["52.212-4", 0, 0, 14],
      ["252.204-7012", 0, 1, 0],
      ["52.212-4", 1, 0, 0],
    ])
    expect(matchCodes(document, database, TEST_MATCH_OPTIONS)).toEqual(matches)
  })
})

describe("collectUnknownCodes", () => {
  it("reports each unknown code once with its pages", () => {
    const document = createTestDocument([[["52.999-1", "52.212-4"]], [["52.999-1"]], [["52.999-1"]]])
    const warnings = collectUnknownCodes(matchCodes(document, database, TEST_MATCH_OPTIONS))

    expect(warnings).toEqual([
      { documentId: document.id, code: "52.999-1", rawText: "52.999-1", pages: [1, 2, 3], occurrences: 3 },
    ])
  })
})
