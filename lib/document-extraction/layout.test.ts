import { describe, it, expect } from "vitest"
import { arrangeSpans, type PositionedText } from "./layout"

function item(text: string, x0: number, y0: number, height = 12): PositionedText {
  return {
    text,
    bbox: { x0, y0, x1: x0 + text.length * 6, y1: y0 + height },
    style: {},
    confidence: 1,
    lowConfidence: false,
    origin: "pdf-text",
  }
}

describe("arrangeSpans", () => {
  it("orders top to bottom, then left to right", () => {
    const spans = arrangeSpans(
      [item("second", 72, 100), item("right", 200, 72), item("left", 72, 73)],
      2
    )

    expect(spans.map((s) => [s.id, s.text, s.lineIndex, s.order])).toEqual([
      ["p2-s0", "left", 0, 0],
      ["p2-s1", "right", 0, 1],
      ["p2-s2", "second", 1, 2],
    ])
    expect(spans.every((s) => s.pageIndex === 2)).toBe(true)
  })

  it("keeps items with a small baseline shift on one line", () => {
    const spans = arrangeSpans([item("52.212-", 72, 72), item("4", 120, 75)], 0)

    expect(spans.map((s) => s.lineIndex)).toEqual([0, 0])
  })

  it("is stable for identical positions", () => {
    const spans = arrangeSpans([item("a", 72, 72), item("b", 72, 72)], 0)

    expect(spans.map((s) => s.text)).toEqual(["a", "b"])
  })
})
