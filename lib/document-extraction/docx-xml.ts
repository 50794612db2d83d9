/**
 * @fileoverview WordprocessingML run scanner
 *
 * Locates paragraphs and runs in `word/document.xml` by offset so the same
 * scan drives both extraction (run → span) and annotation (rewrite a run in
 * place). The scanner works on the raw XML string; nothing is re-serialized,
 * which keeps every untouched byte of the part identical.
 *
 * @module lib/document-extraction/docx-xml
 */

export const DOCUMENT_XML_PATH = "word/document.xml"
export const CORE_PROPERTIES_PATH = "docProps/core.xml"

/** A piece of run content, in document order */
export type RunToken =
  | { kind: "text"; xml: string; text: string }
  | { kind: "symbol"; xml: string; text: string }
  | { kind: "page-break"; xml: string; text: "" }
  | { kind: "silent"; xml: string; text: "" }

export interface RunStyle {
  bold: boolean
  italic: boolean
  /** Points */
  fontSize?: number
  fontName?: string
}

export interface DocxRun {
  /** Position among all runs of the part */
  index: number
  paragraphIndex: number
  /** Offset of `<w:r` in the part */
  start: number
  /** Offset just past `</w:r>` */
  end: number
  openTag: string
  /** The `<w:rPr>` element, or "" */
  properties: string
  tokens: RunToken[]
  /** Concatenated token text; tabs and line breaks read as spaces */
  text: string
  style: RunStyle
  /** Drawings, text boxes, objects or other content without run text */
  hasForeignContent: boolean
}

export interface DocxParagraph {
  index: number
  start: number
  end: number
  pageBreakBefore: boolean
  /** Paragraph closes a section that starts a new page */
  sectionBreak: boolean
  runs: DocxRun[]
}

const PARAGRAPH_TAG_RE = /<w:p(?=[\s>/])[^>]*?(\/?)>|<\/w:p>/g
const RUN_TAG_RE = /<w:r(?=[\s>/])[^>]*?(\/?)>|<\/w:r>/g
const RUN_PROPERTIES_TAG_RE = /<w:rPr(?=[\s>/])[^>]*?(\/?)>|<\/w:rPr>/g
/** Text box bodies hold their own paragraphs; they are not run text */
const TEXT_BOX_RE = /<w:txbxContent\b[\s\S]*?<\/w:txbxContent>/g
const PARAGRAPH_PROPERTIES_RE = /^<w:p\b[^>]*>\s*<w:pPr(?:\s[^>]*)?>([\s\S]*?)<\/w:pPr>/

const RUN_TOKEN_RE =
  /<w:t(?:\s[^>]*)?>([\s\S]*?)<\/w:t>|<w:t(?:\s[^>]*)?\/>|<w:tab\s*\/>|<w:br\b([^>]*)\/>|<w:cr\s*\/>|<w:noBreakHyphen\s*\/>|<w:softHyphen\s*\/>|<w:lastRenderedPageBreak\s*\/>|<w:fldChar\b[^>]*\/>|<w:(instrText|delText|delInstrText)(?:\s[^>]*)?>[\s\S]*?<\/w:\3>/g

/**
 * Scans a document part into paragraphs and their top-level runs.
 */
export function scanDocumentXml(xml: string): DocxParagraph[] {
  const paragraphs: DocxParagraph[] = []
  let runIndex = 0

  for (const range of topLevelElements(xml, PARAGRAPH_TAG_RE)) {
    const paragraphXml = xml.slice(range.start, range.end)
    const properties = PARAGRAPH_PROPERTIES_RE.exec(paragraphXml)?.[1] ?? ""
    const index = paragraphs.length

    const runs: DocxRun[] = []
    for (const runRange of topLevelElements(paragraphXml, RUN_TAG_RE)) {
      runs.push(
        parseRun(
          paragraphXml.slice(runRange.start, runRange.end),
          range.start + runRange.start,
          runIndex++,
          index
        )
      )
    }

    paragraphs.push({
      index,
      start: range.start,
      end: range.end,
      pageBreakBefore: isOn(properties, "pageBreakBefore"),
      sectionBreak:
        /<w:sectPr\b/.test(properties) && !/<w:type\s+w:val="continuous"/.test(properties),
      runs,
    })
  }

  return paragraphs
}

/**
 * Finds outermost elements of one tag, tracking nesting depth so text boxes
 * (paragraphs and runs inside runs) stay inside their host element.
 */
function* topLevelElements(
  xml: string,
  tagPattern: RegExp
): Generator<{ start: number; end: number }> {
  const re = new RegExp(tagPattern.source, "g")
  let depth = 0
  let start = 0

  for (let match = re.exec(xml); match; match = re.exec(xml)) {
    const isClose = match[0].startsWith("</")
    const isSelfClosing = !isClose && match[1] === "/"

    if (isSelfClosing) {
      if (depth === 0) yield { start: match.index, end: match.index + match[0].length }
    } else if (isClose) {
      depth = Math.max(0, depth - 1)
      if (depth === 0) yield { start, end: match.index + match[0].length }
    } else {
      if (depth === 0) start = match.index
      depth++
    }
  }
}

function parseRun(runXml: string, start: number, index: number, paragraphIndex: number): DocxRun {
  const openTag = /^<w:r\b[^>]*>/.exec(runXml)?.[0] ?? "<w:r>"
  const selfClosing = openTag.endsWith("/>")
  const body = selfClosing ? "" : runXml.slice(openTag.length, runXml.length - "</w:r>".length)

  const { properties, rest } = splitRunProperties(body)
  const content = rest.replace(TEXT_BOX_RE, "")

  const tokens: RunToken[] = []
  const re = new RegExp(RUN_TOKEN_RE.source, "g")
  let leftover = ""
  let cursor = 0
  for (let match = re.exec(content); match; match = re.exec(content)) {
    leftover += content.slice(cursor, match.index)
    cursor = match.index + match[0].length
    tokens.push(toToken(match))
  }
  leftover += content.slice(cursor)

  return {
    index,
    paragraphIndex,
    start,
    end: start + runXml.length,
    openTag,
    properties,
    tokens,
    text: tokens.map((t) => t.text).join(""),
    style: parseRunStyle(properties),
    hasForeignContent: leftover.includes("<"),
  }
}

/**
 * Takes `<w:rPr>` off the front of a run body. Only a first child counts;
 * an rPr further in belongs to a run nested in a text box.
 */
function splitRunProperties(body: string): { properties: string; rest: string } {
  const first = topLevelElements(body, RUN_PROPERTIES_TAG_RE).next()
  if (first.done || body.slice(0, first.value.start).trim() !== "") {
    return { properties: "", rest: body }
  }
  const { start, end } = first.value
  return { properties: body.slice(start, end), rest: body.slice(0, start) + body.slice(end) }
}

function toToken(match: RegExpExecArray): RunToken {
  const xml = match[0]
  if (/^<w:t[\s>/]/.test(xml)) {
    return xml.endsWith("/>")
      ? { kind: "silent", xml, text: "" }
      : { kind: "text", xml, text: decodeXmlText(match[1] ?? "") }
  }
  if (xml.startsWith("<w:tab") || xml.startsWith("<w:cr")) {
    return { kind: "symbol", xml, text: " " }
  }
  if (xml.startsWith("<w:br")) {
    return /w:type="page"/.test(match[2] ?? "")
      ? { kind: "page-break", xml, text: "" }
      : { kind: "symbol", xml, text: " " }
  }
  if (xml.startsWith("<w:noBreakHyphen")) {
    return { kind: "symbol", xml, text: "-" }
  }
  return { kind: "silent", xml, text: "" }
}

function parseRunStyle(runProperties: string): RunStyle {
  const properties = runProperties.replace(/<w:rPrChange\b[\s\S]*<\/w:rPrChange>/, "")
  const size = /<w:sz\s+w:val="(\d+)"/.exec(properties)?.[1]
  const font = /<w:rFonts\b[^>]*\bw:ascii="([^"]*)"/.exec(properties)?.[1]
  return {
    bold: isOn(properties, "b"),
    italic: isOn(properties, "i"),
    // w:sz is in half-points
    ...(size && { fontSize: Number(size) / 2 }),
    ...(font && { fontName: font }),
  }
}

/** Toggle properties: present and not switched off with val=0/false/off */
function isOn(properties: string, element: string): boolean {
  const match = new RegExp(`<w:${element}(?:\\s+w:val="([^"]*)")?\\s*/>`).exec(properties)
  if (!match) return false
  return match[1] === undefined || !["0", "false", "off"].includes(match[1])
}

const XML_ENTITIES: Record<string, string> = {
  lt: "<",
  gt: ">",
  amp: "&",
  quot: '"',
  apos: "'",
}

const XML_REFERENCE_RE = /&(?:#x([0-9a-fA-F]+)|#(\d+)|(lt|gt|amp|quot|apos));/g

/** Decodes character and entity references in one pass */
export function decodeXmlText(value: string): string {
  return value.replace(XML_REFERENCE_RE, (reference, hex?: string, dec?: string, name?: string) => {
    if (hex) return String.fromCodePoint(parseInt(hex, 16))
    if (dec) return String.fromCodePoint(parseInt(dec, 10))
    return (name && XML_ENTITIES[name]) ?? reference
  })
}

export function encodeXmlText(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;")
}
