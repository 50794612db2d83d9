/**
 * @fileoverview Tesseract.js engine
 * @module lib/ocr/tesseract-worker
 *
 * Workers are memory-intensive - always terminate after use.
 */

import type { OcrEngine, OcrEngineFactory, OcrWord } from "./types"

export interface TesseractEngineOptions {
  /** Tesseract language code(s), e.g. "eng" or "eng+fra" */
  language: string
  /** Directory or URL holding `<lang>.traineddata`; tesseract.js downloads it otherwise */
  langPath?: string
}

/**
 * Create an OCR engine backed by one Tesseract worker.
 *
 * @example
 * ```ts
 * const engine = await createTesseractEngine({ language: "eng" })
 * try {
 *   const words = await engine.recognize(png)
 * } finally {
 *   await engine.terminate()
 * }
 * ```
 */
export async function createTesseractEngine(options: TesseractEngineOptions): Promise<OcrEngine> {
  // Dynamic import to keep tesseract.js out of runs that never OCR
  const { createWorker, OEM } = await import("tesseract.js")

  const worker = await createWorker(options.language, OEM.LSTM_ONLY, {
    ...(options.langPath && { langPath: options.langPath }),
  })

  return {
    async recognize(image: Uint8Array): Promise<OcrWord[]> {
      // Tesseract.js accepts Buffer but not Uint8Array directly
      const imageBuffer = Buffer.isBuffer(image) ? image : Buffer.from(image)
      const result = await worker.recognize(imageBuffer)

      return result.data.words.map((word) => ({
        text: word.text,
        bbox: { x0: word.bbox.x0, y0: word.bbox.y0, x1: word.bbox.x1, y1: word.bbox.y1 },
        // Tesseract confidence is 0-100
        confidence: word.confidence / 100,
      }))
    },
    async terminate(): Promise<void> {
      await worker.terminate()
    },
  }
}

export function tesseractEngineFactory(options: TesseractEngineOptions): OcrEngineFactory {
  return () => createTesseractEngine(options)
}
