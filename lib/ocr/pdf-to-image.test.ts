import { describe, it, expect, vi, beforeEach } from "vitest"
import { renderPdfPages, scaleForDpi } from "./pdf-to-image"

const { pdfDocument, pdf } = vi.hoisted(() => {
  const pdfDocument = {
    length: 3,
    getPage: vi.fn(async (pageNumber: number) => Buffer.from([pageNumber])),
    destroy: vi.fn(async () => {}),
  }
  return { pdfDocument, pdf: vi.fn(async () => pdfDocument) }
})

vi.mock("pdf-to-img", () => ({ pdf }))

async function collect(pages: AsyncIterable<{ pageIndex: number; image: Uint8Array }>) {
  const indices: number[] = []
  for await (const page of pages) indices.push(page.pageIndex)
  return indices
}

describe("renderPdfPages", () => {
  beforeEach(() => {
    pdfDocument.getPage.mockClear()
    pdfDocument.destroy.mockClear()
  })

  it("renders requested pages that exist and releases the document", async () => {
    const indices = await collect(renderPdfPages(Buffer.from("%PDF"), [0, 2, 7], scaleForDpi(300)))

    expect(indices).toEqual([0, 2])
    expect(pdf).toHaveBeenCalledWith(Buffer.from("%PDF"), { scale: 300 / 72 })
    expect(pdfDocument.getPage.mock.calls).toEqual([[1], [3]])
    expect(pdfDocument.destroy).toHaveBeenCalledTimes(1)
  })

  it("releases the document when the caller stops early", async () => {
    for await (const page of renderPdfPages(Buffer.from("%PDF"), [0, 1, 2], 1)) {
      expect(page.image).toEqual(new Uint8Array([1]))
      break
    }

    expect(pdfDocument.getPage).toHaveBeenCalledTimes(1)
    expect(pdfDocument.destroy).toHaveBeenCalledTimes(1)
  })

  it("releases the document when a page fails to render", async () => {
    pdfDocument.getPage.mockRejectedValueOnce(new Error("bad page"))

    await expect(collect(renderPdfPages(Buffer.from("%PDF"), [0], 1))).rejects.toThrow("bad page")
    expect(pdfDocument.destroy).toHaveBeenCalledTimes(1)
  })
})
