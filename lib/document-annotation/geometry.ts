/**
 * @fileoverview Highlight box geometry
 *
 * Span boxes live in viewport space (points, top-left origin of the crop
 * box, page rotation applied). PDF annotations need unrotated user space.
 *
 * @module lib/document-annotation/geometry
 */

import type { MatchFragment } from "@/lib/code-matching/types"
import type { BoundingBox, TextSpan } from "@/lib/document-extraction/types"

export interface CropBox {
  x: number
  y: number
  width: number
  height: number
}

/**
 * The part of a span's box covering the fragment's characters, assuming
 * an even advance per character.
 */
export function fragmentBox(span: TextSpan, fragment: Pick<MatchFragment, "start" | "end">): BoundingBox {
  const length = span.text.length
  if (length === 0) return { ...span.bbox }
  const width = span.bbox.x1 - span.bbox.x0
  return {
    x0: span.bbox.x0 + (width * fragment.start) / length,
    y0: span.bbox.y0,
    x1: span.bbox.x0 + (width * fragment.end) / length,
    y1: span.bbox.y1,
  }
}

/**
 * Grows an OCR box in proportion to how unsure the engine was.
 */
export function inflateOcrBox(box: BoundingBox, confidence: number, factor: number): BoundingBox {
  const margin = factor * (1 - Math.min(1, Math.max(0, confidence))) * (box.y1 - box.y0)
  return { x0: box.x0 - margin, y0: box.y0 - margin, x1: box.x1 + margin, y1: box.y1 + margin }
}

/**
 * Clamps to the page. Undefined when nothing with area is left.
 */
export function clampBox(box: BoundingBox, width: number, height: number): BoundingBox | undefined {
  const clamped = {
    x0: Math.min(Math.max(box.x0, 0), width),
    y0: Math.min(Math.max(box.y0, 0), height),
    x1: Math.min(Math.max(box.x1, 0), width),
    y1: Math.min(Math.max(box.y1, 0), height),
  }
  return clamped.x1 > clamped.x0 && clamped.y1 > clamped.y0 ? clamped : undefined
}

/**
 * Maps a viewport box back to PDF user space for a page with the given
 * crop box and rotation (degrees clockwise).
 */
export function toUserSpace(box: BoundingBox, crop: CropBox, rotation: number): BoundingBox {
  const left = crop.x
  const bottom = crop.y
  const right = crop.x + crop.width
  const top = crop.y + crop.height

  const map = (vx: number, vy: number): [number, number] => {
    switch (((rotation % 360) + 360) % 360) {
      case 90:
        return [left + vy, bottom + vx]
      case 180:
        return [right - vx, bottom + vy]
      case 270:
        return [right - vy, top - vx]
      default:
        return [left + vx, top - vy]
    }
  }

  const [ax, ay] = map(box.x0, box.y0)
  const [bx, by] = map(box.x1, box.y1)
  return {
    x0: Math.min(ax, bx),
    y0: Math.min(ay, by),
    x1: Math.max(ax, bx),
    y1: Math.max(ay, by),
  }
}

/** ARGB hex to 0-1 RGB components; alpha is ignored */
export function argbToRgb(argb: string): [number, number, number] {
  const channel = (offset: number) => parseInt(argb.slice(offset, offset + 2), 16) / 255
  return [channel(2), channel(4), channel(6)]
}
