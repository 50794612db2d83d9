/**
 * @fileoverview Format handler registry
 * @module lib/document-extraction/handlers
 */

import { docxHandler } from "./docx-extractor"
import { pdfHandler } from "./pdf-extractor"
import type { DocumentFormat, FormatHandler } from "./types"

/** One handler per supported format; adding a format means adding an entry */
export const FORMAT_HANDLERS: Readonly<Record<DocumentFormat, FormatHandler>> = {
  pdf: pdfHandler,
  docx: docxHandler,
}

/** Format claimed by a file extension (lowercase, with dot) */
export function formatForExtension(extension: string): DocumentFormat | undefined {
  return Object.values(FORMAT_HANDLERS).find((handler) =>
    handler.extensions.includes(extension.toLowerCase())
  )?.format
}
