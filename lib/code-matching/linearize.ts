/**
 * @fileoverview Document text linearization
 *
 * Concatenates a document's spans in page and reading order into one
 * string, remembering where each span landed. Pieces of a code split
 * across spans, a line wrap or a page break are joined without a separator
 * so the grammar sees the whole code.
 *
 * @module lib/code-matching/linearize
 */

import type { WrapJoinTolerance } from "@/lib/config/types"
import type { Document, TextSpan } from "@/lib/document-extraction/types"

export interface LinearSegment {
  span: TextSpan
  /** Range in the linear text, end exclusive */
  start: number
  end: number
  /** Offset in `span.text` of the segment's first character */
  spanOffset: number
}

export interface LinearText {
  text: string
  segments: LinearSegment[]
}

type Join = "touch" | "wrap" | "space" | "line"

const SEPARATOR_END = /[.-]\s*$/
const SEPARATOR_START = /^\s*[.-]/

function height(span: TextSpan): number {
  return Math.max(span.bbox.y1 - span.bbox.y0, 1e-6)
}

/**
 * Number of lines `next` sits below `previous`, measured in the previous
 * span's height.
 */
export function lineAdvance(previous: TextSpan, next: TextSpan): number {
  return Math.round((next.bbox.y0 - previous.bbox.y0) / height(previous))
}

/**
 * How two spans adjacent in reading order are joined.
 *
 * - `touch`: same line, gap under `sameLineGapRatio` × height. Word gaps
 *   often fall under the ratio, so `linearizeDocument` keeps it only when
 *   the wrap check finds a code crossing the boundary
 * - `wrap`: a separator on either side of a line or page boundary, with the
 *   second span within `maxLineGap` lines or at the top of the next page
 * - `space` / `line`: ordinary word and line separation
 */
export function classifyJoin(
  previous: TextSpan,
  next: TextSpan,
  tolerance: WrapJoinTolerance
): Join {
  if (previous.pageIndex === next.pageIndex && previous.lineIndex === next.lineIndex) {
    const gap = next.bbox.x0 - previous.bbox.x1
    const lineHeight = Math.max(height(previous), height(next))
    return gap < tolerance.sameLineGapRatio * lineHeight ? "touch" : "space"
  }

  const onSeparator = SEPARATOR_END.test(previous.text) || SEPARATOR_START.test(next.text)
  if (!onSeparator) return "line"

  if (previous.pageIndex === next.pageIndex) {
    const advance = lineAdvance(previous, next)
    return advance >= 1 && advance <= tolerance.maxLineGap ? "wrap" : "line"
  }

  // Reading order already puts `previous` last on its page and `next` first on its own
  return next.pageIndex === previous.pageIndex + 1 ? "wrap" : "line"
}

/**
 * Decides whether the joined text has a code crossing `boundary`. Without
 * one a line ending in a period stays separated from the next line and
 * close words on one line keep their space.
 */
export type WrapCheck = (joined: string, boundary: number) => boolean

/** Characters on each side of a boundary handed to the wrap check */
const WRAP_CONTEXT = 40

/**
 * Linearizes every page of `document` in order.
 */
export function linearizeDocument(
  document: Document,
  tolerance: WrapJoinTolerance,
  spansCode: WrapCheck = () => true
): LinearText {
  const spans = [...document.pages]
    .sort((a, b) => a.index - b.index)
    .flatMap((page) => [...page.spans].sort((a, b) => a.order - b.order))

  const ranges = spans.map((span) => ({ span, from: 0, to: span.text.length }))
  const joins: Join[] = []

  for (let i = 1; i < ranges.length; i++) {
    const previous = ranges[i - 1]
    const next = ranges[i]
    if (!previous || !next) continue

    let join = classifyJoin(previous.span, next.span, tolerance)
    if (join === "touch") {
      const tail = previous.span.text.slice(previous.from, previous.to).slice(-WRAP_CONTEXT)
      const head = next.span.text.slice(next.from, next.to).slice(0, WRAP_CONTEXT)
      if (!spansCode(tail + head, tail.length)) join = "space"
    } else if (join === "wrap") {
      const to = Math.max(previous.from, previous.span.text.trimEnd().length)
      const from = Math.min(next.to, next.span.text.length - next.span.text.trimStart().length)
      const tail = previous.span.text.slice(previous.from, to).slice(-WRAP_CONTEXT)
      const head = next.span.text.slice(from, next.to).slice(0, WRAP_CONTEXT)
      if (spansCode(tail + head, tail.length)) {
        previous.to = to
        next.from = from
      } else {
        join = "line"
      }
    }
    joins.push(join)
  }

  let text = ""
  const segments: LinearSegment[] = []
  ranges.forEach(({ span, from, to }, i) => {
    if (i > 0) {
      const join = joins[i - 1]
      text += join === "space" ? " " : join === "line" ? "\n" : ""
    }
    const start = text.length
    text += span.text.slice(from, to)
    segments.push({ span, start, end: text.length, spanOffset: from })
  })

  return { text, segments }
}

/**
 * Segments overlapping `[start, end)` with the covered range of each.
 */
export function segmentsInRange(
  segments: readonly LinearSegment[],
  start: number,
  end: number
): Array<{ segment: LinearSegment; start: number; end: number }> {
  let low = 0
  let high = segments.length
  while (low < high) {
    const mid = (low + high) >> 1
    const segment = segments[mid]
    if (segment && segment.end <= start) low = mid + 1
    else high = mid
  }

  const covered: Array<{ segment: LinearSegment; start: number; end: number }> = []
  for (let i = low; i < segments.length; i++) {
    const segment = segments[i]
    if (!segment || segment.start >= end) break
    const from = Math.max(start, segment.start)
    const to = Math.min(end, segment.end)
    if (to > from) covered.push({ segment, start: from, end: to })
  }
  return covered
}
