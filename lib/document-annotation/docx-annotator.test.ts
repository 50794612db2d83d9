import { describe, it, expect } from "vitest"
import AdmZip from "adm-zip"
import { matchCodes } from "@/lib/code-matching/match-codes"
import { DEFAULT_COLOR_MAP } from "@/lib/config/defaults"
import { DOCUMENT_XML_PATH, scanDocumentXml } from "@/lib/document-extraction/docx-xml"
import { extractDocument } from "@/lib/document-extraction/extract-document"
import type { Document } from "@/lib/document-extraction/types"
import {
  createTestDatabase,
  createTestDocx,
  docxParagraph,
  TEST_MATCH_OPTIONS,
} from "@/test/factories"
import { annotateDocx, splitRun, withHighlight } from "./docx-annotator"

const options = { colorMap: DEFAULT_COLOR_MAP, ocrMarginFactor: 0.5 }

const database = createTestDatabase([
  ["52.212-4", "OK", "Contract Terms"],
  ["252.204-7012", "Remove", "Safeguarding"],
])

function firstRun(paragraphXml: string) {
  const run = scanDocumentXml(paragraphXml)[0]?.runs[0]
  if (!run) throw new Error("No run in fixture")
  return run
}

function documentXmlOf(bytes: Buffer): string {
  return new AdmZip(bytes).getEntry(DOCUMENT_XML_PATH)?.getData().toString("utf-8") ?? ""
}

function spanText(document: Document): string {
  return document.pages.flatMap((page) => page.spans.map((span) => span.text)).join("")
}

describe("withHighlight", () => {
  it("creates run properties when there are none", () => {
    expect(withHighlight("", "yellow")).toBe('<w:rPr><w:highlight w:val="yellow"/></w:rPr>')
    expect(withHighlight("<w:rPr/>", "yellow")).toBe('<w:rPr><w:highlight w:val="yellow"/></w:rPr>')
  })

  it("keeps schema order", () => {
    expect(withHighlight('<w:rPr><w:b/><w:lang w:val="en-US"/></w:rPr>', "green")).toBe(
      '<w:rPr><w:b/><w:highlight w:val="green"/><w:lang w:val="en-US"/></w:rPr>'
    )
  })

  it("replaces an existing highlight", () => {
    expect(withHighlight('<w:rPr><w:highlight w:val="red"/></w:rPr>', "green")).toBe(
      '<w:rPr><w:highlight w:val="green"/></w:rPr>'
    )
  })

  it("leaves tracked formatting changes alone", () => {
    const tracked = '<w:rPrChange w:id="1"><w:rPr><w:highlight w:val="red"/></w:rPr></w:rPrChange>'

    expect(withHighlight(`<w:rPr><w:b/>${tracked}</w:rPr>`, "green")).toBe(
      `<w:rPr><w:b/><w:highlight w:val="green"/>${tracked}</w:rPr>`
    )
  })
})

describe("splitRun", () => {
  it("splits text at highlight boundaries", () => {
    const run = firstRun("<w:p><w:r><w:rPr><w:b/></w:rPr><w:t>See 52.212-4 now</w:t></w:r></w:p>")

    expect(splitRun(run, [{ start: 4, end: 12, color: "green" }])).toBe(
      '<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve">See </w:t></w:r>' +
        '<w:r><w:rPr><w:b/><w:highlight w:val="green"/></w:rPr><w:t xml:space="preserve">52.212-4</w:t></w:r>' +
        '<w:r><w:rPr><w:b/></w:rPr><w:t xml:space="preserve"> now</w:t></w:r>'
    )
  })

  it("keeps tabs with the text around them", () => {
    const run = firstRun("<w:p><w:r><w:t>A</w:t><w:tab/><w:t>52.212-4</w:t></w:r></w:p>")

    expect(splitRun(run, [{ start: 2, end: 10, color: "green" }])).toBe(
      '<w:r><w:t xml:space="preserve">A</w:t><w:tab/></w:r>' +
        '<w:r><w:rPr><w:highlight w:val="green"/></w:rPr><w:t xml:space="preserve">52.212-4</w:t></w:r>'
    )
  })
})

describe("annotateDocx", () => {
  it("highlights matched run pieces without changing the text", async () => {
    const bytes = createTestDocx(
      docxParagraph("Offerors shall comply with FAR 52.212-4 and 52.999-1.") +
        docxParagraph({ text: "DFARS 252.204-7012", bold: true })
    )
    const document = await extractDocument(bytes, "sow.docx", { textDensityThreshold: 0 })
    const matches = matchCodes(document, database, TEST_MATCH_OPTIONS)

    const { bytes: annotated, summary } = await annotateDocx(bytes, matches, options)
    const xml = documentXmlOf(annotated)

    expect(summary).toEqual({ highlights: 3, skipped: 0, errors: [], warnings: [] })
    expect(xml).toContain(
      '<w:r><w:rPr><w:highlight w:val="green"/></w:rPr><w:t xml:space="preserve">52.212-4</w:t></w:r>'
    )
    expect(xml).toContain(
      '<w:r><w:rPr><w:highlight w:val="lightGray"/></w:rPr><w:t xml:space="preserve">52.999-1</w:t></w:r>'
    )
    expect(xml).toContain(
      '<w:r><w:rPr><w:b/><w:highlight w:val="red"/></w:rPr><w:t xml:space="preserve">252.204-7012</w:t></w:r>'
    )

    const reread = await extractDocument(annotated, "sow.docx", { textDensityThreshold: 0 })
    expect(spanText(reread)).toBe(spanText(document))
    expect(matchCodes(reread, database, TEST_MATCH_OPTIONS).map((m) => m.code)).toEqual(
      matches.map((m) => m.code)
    )
  })

  it("highlights runs with embedded content whole", async () => {
    const bytes = createTestDocx(docxParagraph({ text: "Clause 52.212-4", extra: "<w:drawing/>" }))
    const document = await extractDocument(bytes, "sow.docx", { textDensityThreshold: 0 })

    const { bytes: annotated } = await annotateDocx(
      bytes,
      matchCodes(document, database, TEST_MATCH_OPTIONS),
      options
    )

    expect(documentXmlOf(annotated)).toContain(
      '<w:r><w:rPr><w:highlight w:val="green"/></w:rPr><w:t xml:space="preserve">Clause 52.212-4</w:t><w:drawing/></w:r>'
    )
  })
})
