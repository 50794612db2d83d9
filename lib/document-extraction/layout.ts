/**
 * @fileoverview Reading-order layout of positioned text
 * @module lib/document-extraction/layout
 */

import type { BoundingBox, SpanOrigin, SpanStyle, TextSpan } from "./types"

/** A span before it is placed into reading order */
export interface PositionedText {
  text: string
  bbox: BoundingBox
  style: SpanStyle
  confidence: number
  lowConfidence: boolean
  origin: SpanOrigin
  runIndex?: number
  runOffset?: number
}

/** Fraction of line height two centers may differ by and still share a line */
const LINE_TOLERANCE = 0.5

/**
 * Orders positioned text top-to-bottom, then left-to-right, and assigns
 * line indices, reading order and span ids.
 *
 * Items whose vertical centers lie within half a line height of the line's
 * first item share a line. Ties keep input order, so the result is stable.
 */
export function arrangeSpans(items: PositionedText[], pageIndex: number): TextSpan[] {
  const indexed = items.map((item, inputIndex) => ({ item, inputIndex }))

  indexed.sort(
    (a, b) =>
      centerY(a.item.bbox) - centerY(b.item.bbox) ||
      a.item.bbox.x0 - b.item.bbox.x0 ||
      a.inputIndex - b.inputIndex
  )

  const lines: (typeof indexed)[] = []
  let lineCenter = Number.NEGATIVE_INFINITY
  let lineHeight = 0

  for (const entry of indexed) {
    const center = centerY(entry.item.bbox)
    const height = entry.item.bbox.y1 - entry.item.bbox.y0
    const current = lines.at(-1)
    if (current && center - lineCenter <= Math.max(lineHeight, height) * LINE_TOLERANCE) {
      current.push(entry)
    } else {
      lines.push([entry])
      lineCenter = center
      lineHeight = height
    }
  }

  const spans: TextSpan[] = []
  lines.forEach((line, lineIndex) => {
    line.sort((a, b) => a.item.bbox.x0 - b.item.bbox.x0 || a.inputIndex - b.inputIndex)
    for (const { item } of line) {
      const order = spans.length
      spans.push({
        id: `p${pageIndex}-s${order}`,
        text: item.text,
        bbox: item.bbox,
        style: item.style,
        confidence: item.confidence,
        lowConfidence: item.lowConfidence,
        origin: item.origin,
        pageIndex,
        lineIndex,
        order,
        ...(item.runIndex !== undefined && { runIndex: item.runIndex }),
        ...(item.runOffset !== undefined && { runOffset: item.runOffset }),
      })
    }
  })

  return spans
}

function centerY(bbox: BoundingBox): number {
  return (bbox.y0 + bbox.y1) / 2
}
