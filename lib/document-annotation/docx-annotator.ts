/**
 * @fileoverview DOCX run highlighting
 *
 * Runs that carry part of a match are split at the match boundaries and the
 * matching pieces get `w:highlight`. The rest of `word/document.xml` is
 * copied byte for byte. Runs with drawings, text boxes or other non-text
 * content are highlighted whole instead of being split.
 *
 * @module lib/document-annotation/docx-annotator
 */

import type { CodeMatch } from "@/lib/code-matching/types"
import type { DocxHighlightColor } from "@/lib/config/types"
import { openDocx } from "@/lib/document-extraction/docx-extractor"
import {
  DOCUMENT_XML_PATH,
  encodeXmlText,
  scanDocumentXml,
  type DocxRun,
} from "@/lib/document-extraction/docx-xml"
import type { AnnotateOptions, AnnotatedDocument, AnnotationSummary } from "./types"

export interface RunHighlight {
  /** Character range within the run's text, end exclusive */
  start: number
  end: number
  color: DocxHighlightColor
}

/** `w:rPr` children that must follow `w:highlight` */
const AFTER_HIGHLIGHT = new Set([
  "u",
  "effect",
  "bdr",
  "shd",
  "fitText",
  "vertAlign",
  "rtl",
  "cs",
  "em",
  "lang",
  "eastAsianLayout",
  "specVanish",
  "oMath",
  "rPrChange",
])

/**
 * Returns run properties carrying `w:highlight` with `color`, replacing any
 * existing highlight.
 */
export function withHighlight(properties: string, color: DocxHighlightColor): string {
  const highlight = `<w:highlight w:val="${color}"/>`
  if (!properties || /^<w:rPr\s*\/>$/.test(properties)) {
    return `<w:rPr>${highlight}</w:rPr>`
  }
  // A highlight inside w:rPrChange is the tracked old formatting
  const current = properties.split(/<w:rPrChange\b/)[0] ?? properties
  if (/<w:highlight\b[^>]*\/>/.test(current)) {
    return properties.replace(/<w:highlight\b[^>]*\/>/, highlight)
  }

  const children = /<w:([A-Za-z]+)\b/g
  for (let match = children.exec(properties); match; match = children.exec(properties)) {
    const name = match[1] ?? ""
    if (match.index > 0 && AFTER_HIGHLIGHT.has(name)) {
      return properties.slice(0, match.index) + highlight + properties.slice(match.index)
    }
  }
  const close = properties.lastIndexOf("</w:rPr>")
  return properties.slice(0, close) + highlight + properties.slice(close)
}

function colorAt(highlights: readonly RunHighlight[], offset: number): DocxHighlightColor | undefined {
  return highlights.find((h) => h.start <= offset && offset < h.end)?.color
}

/**
 * Rewrites one run as a sequence of runs, splitting text at highlight
 * boundaries. The concatenated text is unchanged.
 */
export function splitRun(run: DocxRun, highlights: readonly RunHighlight[]): string {
  const boundaries = [...new Set(highlights.flatMap((h) => [h.start, h.end]))].sort((a, b) => a - b)
  const pieces: Array<{ color: DocxHighlightColor | undefined; xml: string }> = []

  const append = (color: DocxHighlightColor | undefined, xml: string) => {
    const last = pieces[pieces.length - 1]
    if (last && last.color === color) last.xml += xml
    else pieces.push({ color, xml })
  }

  let offset = 0
  for (const token of run.tokens) {
    if (token.kind !== "text") {
      // Zero-width tokens stay with the piece before them
      const last = pieces[pieces.length - 1]
      const color = token.text.length > 0 ? colorAt(highlights, offset) : last?.color
      append(color, token.xml)
      offset += token.text.length
      continue
    }

    let position = 0
    while (position < token.text.length) {
      const absolute = offset + position
      const next = boundaries.find((b) => b > absolute) ?? Infinity
      const length = Math.min(token.text.length - position, next - absolute)
      const text = token.text.slice(position, position + length)
      append(colorAt(highlights, absolute), `<w:t xml:space="preserve">${encodeXmlText(text)}</w:t>`)
      position += length
    }
    offset += token.text.length
  }

  return pieces
    .map(({ color, xml }) => {
      const properties = color ? withHighlight(run.properties, color) : run.properties
      return `${run.openTag}${properties}${xml}</w:r>`
    })
    .join("")
}

/**
 * Highlights a run that cannot be split, keeping its content as is.
 */
export function highlightWholeRun(runXml: string, run: DocxRun, color: DocxHighlightColor): string {
  const body = runXml.slice(run.openTag.length)
  const updated = run.properties
    ? body.replace(run.properties, withHighlight(run.properties, color))
    : withHighlight("", color) + body
  return run.openTag + updated
}

/**
 * Highlights every match in a DOCX copy.
 */
export async function annotateDocx(
  bytes: Buffer,
  matches: readonly CodeMatch[],
  options: AnnotateOptions
): Promise<AnnotatedDocument> {
  const { zip, documentXml } = openDocx(bytes)
  const summary: AnnotationSummary = { highlights: 0, skipped: 0, errors: [], warnings: [] }

  const byRun = new Map<number, RunHighlight[]>()
  for (const match of matches) {
    const color = options.colorMap[match.classification].highlight
    match.fragments.forEach((fragment, i) => {
      const span = match.spans[i]
      if (span?.runIndex === undefined) {
        summary.skipped++
        summary.warnings.push(`Highlight for ${match.code} has no source run`)
        return
      }
      const runOffset = span.runOffset ?? 0
      const highlight = { start: runOffset + fragment.start, end: runOffset + fragment.end, color }
      const group = byRun.get(span.runIndex)
      if (group) group.push(highlight)
      else byRun.set(span.runIndex, [highlight])
    })
  }

  const runs = scanDocumentXml(documentXml).flatMap((paragraph) => paragraph.runs)
  const replacements: Array<{ start: number; end: number; xml: string }> = []
  for (const run of runs) {
    const highlights = byRun.get(run.index)
    if (!highlights) continue

    const runXml = documentXml.slice(run.start, run.end)
    const [first] = highlights
    if (run.hasForeignContent && first) {
      replacements.push({ start: run.start, end: run.end, xml: highlightWholeRun(runXml, run, first.color) })
    } else {
      replacements.push({ start: run.start, end: run.end, xml: splitRun(run, highlights) })
    }
    summary.highlights += highlights.length
    byRun.delete(run.index)
  }

  for (const runIndex of byRun.keys()) {
    summary.skipped++
    summary.warnings.push(`Run ${runIndex} was not found in the document`)
  }

  let xml = documentXml
  for (const { start, end, xml: replacement } of replacements.sort((a, b) => b.start - a.start)) {
    xml = xml.slice(0, start) + replacement + xml.slice(end)
  }

  zip.updateFile(DOCUMENT_XML_PATH, Buffer.from(xml, "utf-8"))
  return { bytes: zip.toBuffer(), summary }
}
