/**
 * @fileoverview Format detection from file signature and extension
 * @module lib/document-extraction/detect-format
 */

import AdmZip from "adm-zip"
import path from "path"
import { CorruptDocumentError, UnsupportedFormatError } from "@/lib/errors"
import { DOCUMENT_XML_PATH } from "./docx-xml"
import { formatForExtension } from "./handlers"
import type { DocumentFormat } from "./types"

const PDF_SIGNATURE = "%PDF-"
/** PDF readers accept the header anywhere in the first kilobyte */
const PDF_SIGNATURE_WINDOW = 1024
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04]

export type Signature = DocumentFormat | "zip" | "unknown"

/**
 * Classifies the leading bytes of a file. A ZIP archive is only `docx` when
 * it carries a WordprocessingML main part.
 */
export function readSignature(buffer: Buffer): Signature {
  const head = buffer.subarray(0, PDF_SIGNATURE_WINDOW).toString("latin1")
  if (head.includes(PDF_SIGNATURE)) return "pdf"

  if (ZIP_SIGNATURE.every((byte, i) => buffer[i] === byte)) {
    try {
      return new AdmZip(buffer).getEntry(DOCUMENT_XML_PATH) ? "docx" : "zip"
    } catch {
      return "zip"
    }
  }

  return "unknown"
}

/**
 * Resolves the format of a file. The signature wins over the extension;
 * a known extension whose content does not match raises `CorruptDocumentError`.
 *
 * @throws UnsupportedFormatError - Neither signature nor extension is supported
 * @throws CorruptDocumentError - Extension claims a format the bytes contradict
 */
export function detectFormat(filePath: string, buffer: Buffer): DocumentFormat {
  const extension = path.extname(filePath).toLowerCase()
  const claimed = formatForExtension(extension)
  const signature = readSignature(buffer)

  if (signature === "pdf" || signature === "docx") return signature

  if (claimed) {
    throw new CorruptDocumentError(
      `${path.basename(filePath)} has a ${extension} extension but its content is not a valid ${claimed.toUpperCase()} file`
    )
  }

  throw new UnsupportedFormatError(
    `Unsupported document format: ${extension || path.basename(filePath)}`
  )
}

export function isSupportedExtension(filePath: string): boolean {
  return formatForExtension(path.extname(filePath)) !== undefined
}
