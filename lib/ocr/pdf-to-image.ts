/**
 * @fileoverview PDF to image conversion for OCR
 * @module lib/ocr/pdf-to-image
 */

import type { PageRasterizer, RenderedPage } from "./types"

/** pdf-to-img renders at 72 dpi for scale 1 */
export const POINTS_PER_INCH = 72

interface Destroyable {
  destroy(): Promise<void> | void
}

function isDestroyable(value: object): value is Destroyable {
  return "destroy" in value && typeof value.destroy === "function"
}

export function scaleForDpi(dpi: number): number {
  return dpi / POINTS_PER_INCH
}

/**
 * Render the requested PDF pages as PNG images.
 *
 * Uses dynamic import for pdf-to-img so pdfjs-dist only loads when a page
 * actually needs OCR. The loaded document is released when iteration ends,
 * fails or is stopped early.
 *
 * @example
 * ```ts
 * for await (const page of renderPdfPages(buffer, [0, 3], scaleForDpi(300))) {
 *   await engine.recognize(page.image)
 * }
 * ```
 */
export const renderPdfPages: PageRasterizer = async function* (
  buffer: Buffer,
  pageIndices: readonly number[],
  scale: number
): AsyncGenerator<RenderedPage> {
  const { pdf } = await import("pdf-to-img")

  const document = await pdf(buffer, { scale })

  try {
    for (const pageIndex of pageIndices) {
      if (pageIndex >= document.length) continue
      const image = await document.getPage(pageIndex + 1)
      yield { pageIndex, image: new Uint8Array(image) }
    }
  } finally {
    if (isDestroyable(document)) await document.destroy()
  }
}
