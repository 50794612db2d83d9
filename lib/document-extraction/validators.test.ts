import { describe, it, expect } from "vitest"
import { createTestSpan } from "@/test/factories"
import { countContentChars, measureCoverage, measurePageDensity, requiresOcr } from "./validators"

describe("countContentChars", () => {
  it("ignores whitespace", () => {
    expect(countContentChars(" 52.212-4 \n\t x ")).toBe(9)
  })
})

describe("page density", () => {
  const spans = [createTestSpan({ text: "FAR 52.212-4" }), createTestSpan({ text: "  " })]

  it("sums content characters across spans", () => {
    expect(measurePageDensity(spans)).toBe(11)
  })

  it("requires OCR below the threshold", () => {
    expect(requiresOcr(spans, 12)).toBe(true)
    expect(requiresOcr(spans, 11)).toBe(false)
  })
})

describe("measureCoverage", () => {
  it("is 1 when every reference character was extracted", () => {
    expect(measureCoverage("52.212-4 Terms", "Terms52.212-4")).toBe(1)
  })

  it("reports the share of missing characters", () => {
    expect(measureCoverage("abcd", "ab")).toBe(0.5)
  })

  it("counts repeated characters once per occurrence", () => {
    expect(measureCoverage("aaaa", "a")).toBe(0.25)
  })

  it("treats an empty reference as fully covered", () => {
    expect(measureCoverage("  ", "")).toBe(1)
  })
})
