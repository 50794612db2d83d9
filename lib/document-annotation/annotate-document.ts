/**
 * @fileoverview Executed copy generation
 * @module lib/document-annotation/annotate-document
 */

import { mkdir, writeFile } from "fs/promises"
import path from "path"
import type { CodeMatch } from "@/lib/code-matching/types"
import type { Document } from "@/lib/document-extraction/types"
import { logger } from "@/lib/logger"
import { annotateDocx } from "./docx-annotator"
import { annotatePdf } from "./pdf-annotator"
import type { AnnotateOptions, AnnotatedDocument } from "./types"

/**
 * Highlights `matches` on a copy of the document's bytes, dispatching on
 * format. Text content is never altered.
 */
export async function annotateDocument(
  document: Document,
  bytes: Buffer,
  matches: readonly CodeMatch[],
  options: AnnotateOptions
): Promise<AnnotatedDocument> {
  const result =
    document.format === "pdf"
      ? await annotatePdf(document, bytes, matches, options)
      : await annotateDocx(bytes, matches, options)

  logger.info("Document annotated", {
    document: document.name,
    highlights: result.summary.highlights,
    skipped: result.summary.skipped,
    pageErrors: result.summary.errors.length,
  })
  for (const error of result.summary.errors) {
    logger.warn("Page annotation failed", {
      document: document.name,
      page: error.pageIndex + 1,
      error: error.message,
    })
  }
  return result
}

export function executedCopyName(documentStem: string, runLabel: string, format: Document["format"]): string {
  return `Executed_Highlights_${documentStem}_${runLabel}.${format}`
}

/**
 * Writes an Executed copy to `outputDir` and returns its path.
 */
export async function writeExecutedCopy(
  bytes: Buffer,
  outputDir: string,
  fileName: string
): Promise<string> {
  await mkdir(outputDir, { recursive: true })
  const target = path.join(outputDir, fileName)
  await writeFile(target, bytes)
  return target
}
