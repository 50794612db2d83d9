/**
 * @fileoverview PDF text extraction into positioned spans
 *
 * Uses unpdf (serverless-optimized PDF.js build) instead of pdf-parse
 * to avoid DOMMatrix/pdfjs-dist browser dependency issues.
 *
 * @module lib/document-extraction/pdf-extractor
 */

import { CorruptDocumentError } from "@/lib/errors"
import { arrangeSpans, type PositionedText } from "./layout"
import type {
  BoundingBox,
  DocumentMetadata,
  ExtractedPages,
  ExtractionWarning,
  ExtractOptions,
  FormatHandler,
  Page,
} from "./types"
import { measurePageDensity, requiresOcr } from "./validators"

/** Used when the font program does not report vertical metrics */
const DEFAULT_ASCENT = 0.8
const DEFAULT_DESCENT = -0.2

type Matrix = [number, number, number, number, number, number]

function toMatrix(values: readonly unknown[]): Matrix {
  const [a = 1, b = 0, c = 0, d = 1, e = 0, f = 0] = values.map(Number)
  return [a, b, c, d, e, f]
}

function apply(m: Matrix, x: number, y: number): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]]
}

/**
 * Maps a text item's box from PDF user space into viewport space (points,
 * top-left origin of the crop box, page rotation applied).
 */
export function textItemBox(
  itemTransform: readonly unknown[],
  width: number,
  ascent: number,
  descent: number,
  viewportTransform: readonly unknown[]
): BoundingBox {
  const item = toMatrix(itemTransform)
  const viewport = toMatrix(viewportTransform)
  const fontHeight = Math.hypot(item[2], item[3])
  const [x, y] = [item[4], item[5]]

  const corners = [
    apply(viewport, x, y + descent * fontHeight),
    apply(viewport, x + width, y + ascent * fontHeight),
  ]
  const xs = corners.map(([cx]) => cx)
  const ys = corners.map(([, cy]) => cy)
  return {
    x0: Math.min(...xs),
    y0: Math.min(...ys),
    x1: Math.max(...xs),
    y1: Math.max(...ys),
  }
}

function metaString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined
}

/**
 * Extracts positioned spans per page. Pages whose native text falls below
 * the density threshold are marked `needs-ocr`.
 *
 * @throws CorruptDocumentError - Password-protected, invalid or corrupt PDF
 */
export async function extractPdf(
  buffer: Buffer,
  options: ExtractOptions
): Promise<ExtractedPages> {
  const { getDocumentProxy, getMeta } = await import("unpdf")

  let pdf: Awaited<ReturnType<typeof getDocumentProxy>>
  try {
    pdf = await getDocumentProxy(new Uint8Array(buffer))
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error)
    const name = error instanceof Error ? error.name : ""

    if (name === "PasswordException" || /password|encrypted/i.test(errorMessage)) {
      throw new CorruptDocumentError("PDF is password-protected", [{ message: errorMessage }])
    }
    throw new CorruptDocumentError("Could not parse PDF", [{ message: errorMessage }])
  }

  try {
    const pages: Page[] = []
    const warnings: ExtractionWarning[] = []

    for (let pageIndex = 0; pageIndex < pdf.numPages; pageIndex++) {
      const page = await pdf.getPage(pageIndex + 1)
      const viewport = page.getViewport({ scale: 1 })
      const content = await page.getTextContent()

      const items: PositionedText[] = []
      for (const item of content.items) {
        if (!("str" in item) || item.str.trim().length === 0) continue

        const style = content.styles[item.fontName]
        const transform = toMatrix(item.transform)
        items.push({
          text: item.str,
          bbox: textItemBox(
            transform,
            item.width,
            style?.ascent || DEFAULT_ASCENT,
            style?.descent || DEFAULT_DESCENT,
            viewport.transform
          ),
          style: {
            fontName: style?.fontFamily ?? item.fontName,
            fontSize: Math.hypot(transform[2], transform[3]),
          },
          confidence: 1,
          lowConfidence: false,
          origin: "pdf-text",
        })
      }

      const spans = arrangeSpans(items, pageIndex)
      const needsOcr = requiresOcr(spans, options.textDensityThreshold)
      if (needsOcr) {
        warnings.push({
          type: "ocr_required",
          message: `Page ${pageIndex + 1} has ${measurePageDensity(spans)} native characters`,
          pageIndex,
        })
      }

      pages.push({
        index: pageIndex,
        width: viewport.width,
        height: viewport.height,
        spans,
        status: needsOcr ? "needs-ocr" : "native",
      })
      page.cleanup()
    }

    // Metadata extraction is optional; don't fail the whole extraction
    let metadata: DocumentMetadata = {}
    try {
      const { info } = await getMeta(pdf)
      metadata = {
        title: metaString(info?.Title),
        author: metaString(info?.Author),
        creationDate: metaString(info?.CreationDate),
        modificationDate: metaString(info?.ModDate),
      }
    } catch {
      metadata = {}
    }

    return { pages, metadata, warnings }
  } catch (error) {
    if (error instanceof CorruptDocumentError) throw error
    throw new CorruptDocumentError("Could not read PDF content", [
      { message: error instanceof Error ? error.message : String(error) },
    ])
  } finally {
    await pdf.destroy()
  }
}

export const pdfHandler: FormatHandler = {
  format: "pdf",
  extensions: [".pdf"],
  extract: extractPdf,
}
