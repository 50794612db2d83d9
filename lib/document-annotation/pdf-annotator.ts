/**
 * @fileoverview PDF highlight annotations
 *
 * Each match fragment becomes a `/Highlight` annotation with its own
 * appearance stream. Page content streams are never touched, so the text a
 * reader extracts from the Executed copy is the text of the original.
 *
 * @module lib/document-annotation/pdf-annotator
 */

import {
  fill,
  PDFDocument,
  PDFHexString,
  popGraphicsState,
  pushGraphicsState,
  rectangle,
  setFillingRgbColor,
  setGraphicsState,
  type PDFPage,
} from "pdf-lib"
import type { CodeMatch } from "@/lib/code-matching/types"
import type { BoundingBox, Document, TextSpan } from "@/lib/document-extraction/types"
import { AnnotationError, CorruptDocumentError } from "@/lib/errors"
import { argbToRgb, clampBox, fragmentBox, inflateOcrBox, toUserSpace } from "./geometry"
import type { AnnotateOptions, AnnotatedDocument, AnnotationSummary } from "./types"

const HIGHLIGHT_OPACITY = 0.4
/** Annotation flag: print */
const PRINT_FLAG = 4
export const ANNOTATION_AUTHOR = "Clause Compliance Review"

interface PlacedFragment {
  match: CodeMatch
  span: TextSpan
  start: number
  end: number
}

function contentsFor(match: CodeMatch): string {
  const description = match.entry?.description
  return description
    ? `${match.code} (${match.classification}): ${description}`
    : `${match.code} (${match.classification})`
}

/**
 * Adds one highlight annotation covering `box` (user space) to `page`.
 */
export function addHighlight(
  pdf: PDFDocument,
  page: PDFPage,
  box: BoundingBox,
  color: [number, number, number],
  contents: string
): void {
  const [red, green, blue] = color

  const appearance = pdf.context.formXObject(
    [
      pushGraphicsState(),
      setGraphicsState("GS0"),
      setFillingRgbColor(red, green, blue),
      rectangle(box.x0, box.y0, box.x1 - box.x0, box.y1 - box.y0),
      fill(),
      popGraphicsState(),
    ],
    {
      BBox: [box.x0, box.y0, box.x1, box.y1],
      Resources: {
        ExtGState: {
          GS0: { Type: "ExtGState", ca: HIGHLIGHT_OPACITY, CA: HIGHLIGHT_OPACITY, BM: "Multiply" },
        },
      },
    }
  )

  const annotation = pdf.context.obj({
    Type: "Annot",
    Subtype: "Highlight",
    Rect: [box.x0, box.y0, box.x1, box.y1],
    QuadPoints: [box.x0, box.y1, box.x1, box.y1, box.x0, box.y0, box.x1, box.y0],
    C: [red, green, blue],
    CA: HIGHLIGHT_OPACITY,
    F: PRINT_FLAG,
    T: PDFHexString.fromText(ANNOTATION_AUTHOR),
    Contents: PDFHexString.fromText(contents),
    P: page.ref,
    AP: { N: pdf.context.register(appearance) },
  })

  page.node.addAnnot(pdf.context.register(annotation))
}

/**
 * Writes highlight annotations for `matches` onto a copy of `bytes`.
 *
 * A page that fails is recorded as an `AnnotationError`; the other pages are
 * still annotated.
 *
 * @throws CorruptDocumentError - The PDF cannot be reopened for writing
 */
export async function annotatePdf(
  document: Document,
  bytes: Uint8Array,
  matches: readonly CodeMatch[],
  options: AnnotateOptions
): Promise<AnnotatedDocument> {
  let pdf: PDFDocument
  try {
    pdf = await PDFDocument.load(bytes, { updateMetadata: false })
  } catch (error) {
    throw new CorruptDocumentError("Could not open PDF for annotation", [
      { message: error instanceof Error ? error.message : String(error) },
    ])
  }

  const summary: AnnotationSummary = { highlights: 0, skipped: 0, errors: [], warnings: [] }
  const pdfPages = pdf.getPages()

  const byPage = new Map<number, PlacedFragment[]>()
  for (const match of matches) {
    match.fragments.forEach((fragment, i) => {
      const span = match.spans[i]
      if (!span) return
      const placed = { match, span, start: fragment.start, end: fragment.end }
      const group = byPage.get(fragment.pageIndex)
      if (group) group.push(placed)
      else byPage.set(fragment.pageIndex, [placed])
    })
  }

  for (const pageIndex of [...byPage.keys()].sort((a, b) => a - b)) {
    try {
      const pdfPage = pdfPages[pageIndex]
      const page = document.pages[pageIndex]
      if (!pdfPage || !page) {
        throw new AnnotationError(pageIndex, `Page ${pageIndex + 1} does not exist in the PDF`)
      }
      const crop = pdfPage.getCropBox()
      const rotation = pdfPage.getRotation().angle

      for (const placed of byPage.get(pageIndex) ?? []) {
        let box = fragmentBox(placed.span, placed)
        if (placed.span.origin === "ocr") {
          box = inflateOcrBox(box, placed.span.confidence, options.ocrMarginFactor)
        }

        const clamped = clampBox(box, page.width, page.height)
        if (!clamped) {
          summary.skipped++
          summary.warnings.push(
            `Highlight for ${placed.match.code} on page ${pageIndex + 1} lies outside the page`
          )
          continue
        }

        addHighlight(
          pdf,
          pdfPage,
          toUserSpace(clamped, crop, rotation),
          argbToRgb(options.colorMap[placed.match.classification].fill),
          contentsFor(placed.match)
        )
        summary.highlights++
      }
    } catch (error) {
      summary.errors.push(
        error instanceof AnnotationError
          ? error
          : new AnnotationError(pageIndex, error instanceof Error ? error.message : String(error))
      )
    }
  }

  return { bytes: Buffer.from(await pdf.save()), summary }
}
