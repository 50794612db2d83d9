/**
 * @fileoverview DOCX extraction into positioned spans
 *
 * Word files carry no layout, so pages and boxes are synthesized: a fixed
 * page from the body's section properties, one line per paragraph start,
 * runs advancing by an average character width and wrapping at the right
 * margin. Boxes are approximate; page indices follow explicit breaks.
 *
 * mammoth's raw text is used as an independent reading of the same file to
 * catch text the run scanner did not see (text boxes, fields, etc.).
 *
 * @module lib/document-extraction/docx-extractor
 */

import AdmZip from "adm-zip"
import mammoth from "mammoth"
import { parseStringPromise, processors } from "xml2js"
import { CorruptDocumentError } from "@/lib/errors"
import { CORE_PROPERTIES_PATH, DOCUMENT_XML_PATH, scanDocumentXml, type DocxRun } from "./docx-xml"
import { arrangeSpans, type PositionedText } from "./layout"
import type {
  DocumentMetadata,
  ExtractedPages,
  ExtractionWarning,
  FormatHandler,
  Page,
} from "./types"
import { measureCoverage } from "./validators"

// ============================================================================
// Page geometry
// ============================================================================

export interface PageGeometry {
  width: number
  height: number
  marginTop: number
  marginRight: number
  marginBottom: number
  marginLeft: number
}

/** US Letter with one-inch margins, used when the body has no section properties */
export const LETTER_PAGE: PageGeometry = {
  width: 612,
  height: 792,
  marginTop: 72,
  marginRight: 72,
  marginBottom: 72,
  marginLeft: 72,
}

const TWIPS_PER_POINT = 20
export const DEFAULT_FONT_SIZE = 11
/** Average glyph advance as a fraction of the font size */
export const CHAR_WIDTH_RATIO = 0.5
export const LINE_HEIGHT_RATIO = 1.25

/**
 * Reads page size and margins from the last `w:sectPr` of the body.
 */
export function readPageGeometry(xml: string): PageGeometry {
  const size = lastMatch(/<w:pgSz\b[^>]*\/?>/g, xml)
  const margins = lastMatch(/<w:pgMar\b[^>]*\/?>/g, xml)

  return {
    width: twipsAttr(size, "w") ?? LETTER_PAGE.width,
    height: twipsAttr(size, "h") ?? LETTER_PAGE.height,
    marginTop: twipsAttr(margins, "top") ?? LETTER_PAGE.marginTop,
    marginRight: twipsAttr(margins, "right") ?? LETTER_PAGE.marginRight,
    marginBottom: twipsAttr(margins, "bottom") ?? LETTER_PAGE.marginBottom,
    marginLeft: twipsAttr(margins, "left") ?? LETTER_PAGE.marginLeft,
  }
}

function lastMatch(pattern: RegExp, xml: string): string {
  let last = ""
  for (const match of xml.matchAll(pattern)) last = match[0]
  return last
}

function twipsAttr(tag: string, name: string): number | undefined {
  const value = new RegExp(`\\bw:${name}="(-?\\d+)"`).exec(tag)?.[1]
  return value === undefined ? undefined : Math.abs(Number(value)) / TWIPS_PER_POINT
}

// ============================================================================
// Synthetic layout
// ============================================================================

interface LaidOutText extends PositionedText {
  lineHeight: number
}

/**
 * Flows run text across lines and pages.
 */
class FlowLayout {
  private readonly pages: LaidOutText[][] = [[]]
  private line: LaidOutText[] = []
  private x: number
  private lineTop: number

  constructor(private readonly geometry: PageGeometry) {
    this.x = geometry.marginLeft
    this.lineTop = geometry.marginTop
  }

  /**
   * Places `text` (run characters starting at `offset`) at the cursor,
   * wrapping at spaces where it does not fit.
   */
  place(text: string, offset: number, run: DocxRun): void {
    const fontSize = run.style.fontSize ?? DEFAULT_FONT_SIZE
    const charWidth = fontSize * CHAR_WIDTH_RATIO
    const right = this.geometry.width - this.geometry.marginRight
    let rest = text
    let at = offset

    while (rest.length > 0) {
      const room = Math.floor((right - this.x) / charWidth + 1e-9)
      let take = rest.length
      if (rest.length > room) {
        const space = rest.lastIndexOf(" ", room)
        if (space >= 0) {
          take = space + 1
        } else if (this.x > this.geometry.marginLeft) {
          this.breakLine()
          continue
        } else {
          // A word wider than the line is cut
          take = Math.max(1, room)
        }
      }

      const piece = rest.slice(0, take)
      if (piece.trim().length > 0) {
        this.ensureRoom(fontSize * LINE_HEIGHT_RATIO)
        this.line.push({
          text: piece,
          bbox: { x0: this.x, y0: 0, x1: this.x + piece.length * charWidth, y1: 0 },
          style: { ...run.style, fontSize },
          confidence: 1,
          lowConfidence: false,
          origin: "docx-run",
          runIndex: run.index,
          runOffset: at,
          lineHeight: fontSize * LINE_HEIGHT_RATIO,
        })
      }

      this.x += take * charWidth
      at += take
      rest = rest.slice(take)
      if (rest.length > 0) this.breakLine()
    }
  }

  breakLine(): void {
    const height = Math.max(
      DEFAULT_FONT_SIZE * LINE_HEIGHT_RATIO,
      ...this.line.map((item) => item.lineHeight)
    )
    for (const item of this.line) {
      item.bbox = { ...item.bbox, y0: this.lineTop, y1: this.lineTop + height }
      this.currentPage().push(item)
    }
    this.line = []
    this.lineTop += height
    this.x = this.geometry.marginLeft
  }

  breakPage(): void {
    this.breakLine()
    this.pages.push([])
    this.lineTop = this.geometry.marginTop
  }

  /** True when nothing has been placed on the current page yet */
  atPageStart(): boolean {
    return this.line.length === 0 && this.lineTop === this.geometry.marginTop
  }

  finish(): LaidOutText[][] {
    if (this.line.length > 0) this.breakLine()
    return this.pages
  }

  private ensureRoom(lineHeight: number): void {
    const bottom = this.geometry.height - this.geometry.marginBottom
    const startsLine = this.line.length === 0
    if (startsLine && this.lineTop > this.geometry.marginTop && this.lineTop + lineHeight > bottom) {
      this.pages.push([])
      this.lineTop = this.geometry.marginTop
    }
  }

  private currentPage(): LaidOutText[] {
    return this.pages[this.pages.length - 1] ?? []
  }
}

/**
 * Lays out the body of `word/document.xml` and returns one page per
 * synthetic page, with spans in reading order.
 */
export function layoutDocumentXml(xml: string): { pages: Page[]; foreignRuns: DocxRun[] } {
  const geometry = readPageGeometry(xml)
  const layout = new FlowLayout(geometry)
  const foreignRuns: DocxRun[] = []

  for (const paragraph of scanDocumentXml(xml)) {
    if (paragraph.pageBreakBefore && !layout.atPageStart()) layout.breakPage()

    for (const run of paragraph.runs) {
      if (run.hasForeignContent) foreignRuns.push(run)

      let offset = 0
      let segment = ""
      let segmentStart = 0
      for (const token of run.tokens) {
        if (token.kind === "page-break") {
          layout.place(segment, segmentStart, run)
          layout.breakPage()
          segment = ""
          segmentStart = offset
          continue
        }
        segment += token.text
        offset += token.text.length
      }
      layout.place(segment, segmentStart, run)
    }

    layout.breakLine()
    if (paragraph.sectionBreak) layout.breakPage()
  }

  const pages = layout.finish().map(
    (items, index): Page => ({
      index,
      width: geometry.width,
      height: geometry.height,
      spans: arrangeSpans(items.map(toPositionedText), index),
      status: "native",
    })
  )

  return { pages, foreignRuns }
}

function toPositionedText({ lineHeight: _lineHeight, ...item }: LaidOutText): PositionedText {
  return item
}

// ============================================================================
// Metadata
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/** Element text from xml2js output with `explicitArray: false` */
function textOf(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim() || undefined
  if (isRecord(value) && typeof value._ === "string") return value._.trim() || undefined
  return undefined
}

/**
 * Reads title, author and dates from `docProps/core.xml`.
 * Missing or malformed properties yield empty metadata.
 */
export async function readCoreProperties(xml: string | undefined): Promise<DocumentMetadata> {
  if (!xml) return {}

  let parsed: unknown
  try {
    parsed = await parseStringPromise(xml, {
      explicitArray: false,
      tagNameProcessors: [processors.stripPrefix],
      trim: true,
    })
  } catch {
    return {}
  }

  const properties = isRecord(parsed) ? parsed.coreProperties : undefined
  if (!isRecord(properties)) return {}

  const metadata: DocumentMetadata = {}
  const title = textOf(properties.title)
  const author = textOf(properties.creator)
  const creationDate = textOf(properties.created)
  const modificationDate = textOf(properties.modified)
  if (title) metadata.title = title
  if (author) metadata.author = author
  if (creationDate) metadata.creationDate = creationDate
  if (modificationDate) metadata.modificationDate = modificationDate
  return metadata
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Opens a DOCX container and returns its main document part.
 *
 * @throws CorruptDocumentError - Not a ZIP archive or no `word/document.xml`
 */
export function openDocx(buffer: Buffer): { zip: AdmZip; documentXml: string } {
  let zip: AdmZip
  try {
    zip = new AdmZip(buffer)
  } catch (error) {
    throw new CorruptDocumentError("Could not open this Word document", [
      { message: error instanceof Error ? error.message : String(error) },
    ])
  }

  const entry = zip.getEntry(DOCUMENT_XML_PATH)
  if (!entry) {
    throw new CorruptDocumentError(`Word document has no ${DOCUMENT_XML_PATH} part`)
  }
  return { zip, documentXml: entry.getData().toString("utf-8") }
}

/**
 * Extracts positioned spans from a DOCX buffer.
 *
 * Deleted text (tracked changes) is excluded; inserted text is included.
 *
 * @throws CorruptDocumentError - Invalid or corrupt DOCX
 */
export async function extractDocx(buffer: Buffer): Promise<ExtractedPages> {
  const { zip, documentXml } = openDocx(buffer)
  const { pages, foreignRuns } = layoutDocumentXml(documentXml)
  const warnings: ExtractionWarning[] = []

  if (foreignRuns.length > 0) {
    warnings.push({
      type: "embedded_content",
      message: `${foreignRuns.length} run(s) contain drawings, text boxes or embedded objects whose text is not extracted`,
    })
  }

  const spanText = pages.flatMap((page) => page.spans.map((span) => span.text)).join("")
  try {
    const raw = await mammoth.extractRawText({ buffer })
    for (const message of raw.messages) {
      if (message.type === "warning") {
        warnings.push({ type: "docx_warning", message: message.message })
      }
    }
    const coverage = measureCoverage(raw.value, spanText)
    if (coverage < 1) {
      warnings.push({
        type: "docx_warning",
        message: `Positioned text covers ${(coverage * 100).toFixed(1)}% of the document's raw text`,
      })
    }
  } catch (error) {
    warnings.push({
      type: "docx_warning",
      message: `Raw text cross-check failed: ${error instanceof Error ? error.message : String(error)}`,
    })
  }

  const metadata = await readCoreProperties(
    zip.getEntry(CORE_PROPERTIES_PATH)?.getData().toString("utf-8")
  )

  return { pages, metadata, warnings }
}

export const docxHandler: FormatHandler = {
  format: "docx",
  extensions: [".docx"],
  extract: (buffer) => extractDocx(buffer),
}
