/**
 * @fileoverview Compliance review run
 *
 * Orchestrates one batch:
 * Sources → Database → (per document: Extract → OCR → Match → Annotate) → Matrix → Report
 *
 * Each document is processed in isolation. A document that cannot be read
 * is recorded as `failed` and the batch continues; page-level OCR or
 * annotation problems make it `partial`.
 *
 * @module lib/compliance-run/run-compliance
 */

import { readdir, writeFile } from "fs/promises"
import path from "path"
import pLimit from "p-limit"
import { collectUnknownCodes, matchCodes } from "@/lib/code-matching/match-codes"
import type { CodeMatch, MatchOptions } from "@/lib/code-matching/types"
import { buildComplianceRows } from "@/lib/compliance-matrix/rows"
import { writeComplianceMatrices } from "@/lib/compliance-matrix/workbook"
import type { ComplianceConfig } from "@/lib/config/types"
import {
  annotateDocument,
  executedCopyName,
  writeExecutedCopy,
} from "@/lib/document-annotation/annotate-document"
import { isSupportedExtension } from "@/lib/document-extraction/detect-format"
import {
  extractDocument,
  readDocumentBytes,
  type LoadDocumentOptions,
} from "@/lib/document-extraction/extract-document"
import type { Document } from "@/lib/document-extraction/types"
import { EmptyInputError, toAppError, type AppError } from "@/lib/errors"
import { documentStems, formatRunLabel } from "@/lib/file-names"
import { fmt, logger } from "@/lib/logger"
import { tesseractEngineFactory } from "@/lib/ocr/tesseract-worker"
import { OcrWorkerPool } from "@/lib/ocr/worker-pool"
import { buildDatabase } from "@/lib/regulatory-database/merge"
import { loadSourceTables } from "@/lib/regulatory-database/source-loader"
import type { RegulatoryDatabase } from "@/lib/regulatory-database/types"
import { map, partition, tryCatchWith } from "@/lib/result"
import type {
  DocumentOutcome,
  DocumentStatus,
  ReportedUnknownCode,
  RunDependencies,
  RunReport,
  SemanticReviewer,
} from "./types"

export const RUN_REPORT_FILE = "run-report.json"

// ============================================================================
// Inputs
// ============================================================================

/**
 * Solicitation files in name order. Hidden files, editor lock files
 * (`~$bid.docx`) and names matching a skip pattern are ignored.
 *
 * @throws EmptyInputError - Directory unreadable or without PDF/DOCX files
 */
export async function listSolicitations(
  dir: string,
  skipFilePatterns: readonly string[]
): Promise<string[]> {
  let names: string[]
  try {
    const entries = await readdir(dir, { withFileTypes: true })
    names = entries.filter((entry) => entry.isFile()).map((entry) => entry.name)
  } catch (error) {
    throw new EmptyInputError(
      `Solicitations directory could not be read: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  const patterns = skipFilePatterns.map((pattern) => pattern.toLowerCase())
  const files = names
    .filter((name) => !name.startsWith(".") && !name.startsWith("~"))
    .filter(isSupportedExtension)
    .filter((name) => !patterns.some((pattern) => name.toLowerCase().includes(pattern)))
    .sort()

  if (files.length === 0) {
    throw new EmptyInputError(`No PDF or DOCX files found in ${dir}`)
  }
  return files.map((name) => path.join(dir, name))
}

// ============================================================================
// Per-document processing
// ============================================================================

interface DocumentContext {
  config: ComplianceConfig
  database: RegulatoryDatabase
  matchOptions: MatchOptions
  loadOptions: LoadDocumentOptions
  reviewers: readonly SemanticReviewer[]
  runLabel: string
  stem: string
  now: () => Date
}

interface ReviewedDocument {
  outcome: DocumentOutcome
  document?: Document
  matches: CodeMatch[]
}

function failedOutcome(file: string, error: AppError, durationMs: number): DocumentOutcome {
  return {
    file,
    status: "failed",
    pages: 0,
    matches: 0,
    unknownCodes: 0,
    needsReview: 0,
    highlights: 0,
    semanticFindings: 0,
    errors: [error.toJSON()],
    warnings: [],
    durationMs,
  }
}

async function runReviewers(
  document: Document,
  matches: readonly CodeMatch[],
  reviewers: readonly SemanticReviewer[]
): Promise<{ findings: number; warnings: string[] }> {
  const results = await Promise.all(
    reviewers.map(async (reviewer) =>
      map(
        await tryCatchWith(() => reviewer.review(document, matches), toAppError),
        (findings) => findings.length
      )
    )
  )

  const warnings: string[] = []
  results.forEach((result, i) => {
    if (!result.ok) {
      warnings.push(`Semantic reviewer ${reviewers[i]?.name ?? i} failed: ${result.error.message}`)
    }
  })
  const { values } = partition(results)
  return { findings: values.reduce((sum, count) => sum + count, 0), warnings }
}

/**
 * Extracts, matches and annotates one document.
 *
 * @throws AppError - The document cannot be read or extracted
 */
async function reviewDocument(filePath: string, context: DocumentContext): Promise<ReviewedDocument> {
  const startedAt = context.now().getTime()
  const bytes = await readDocumentBytes(filePath)
  const document = await extractDocument(bytes, filePath, context.loadOptions)
  const matches = matchCodes(document, context.database, context.matchOptions)

  const errors: AppError[] = []
  const warnings = document.warnings.map((warning) =>
    warning.pageIndex === undefined ? warning.message : `Page ${warning.pageIndex + 1}: ${warning.message}`
  )
  let partial = document.pages.some((page) => page.status === "ocr-incomplete")

  let highlights = 0
  let executedCopy: string | undefined
  const annotated = await tryCatchWith(
    () =>
      annotateDocument(document, bytes, matches, {
        colorMap: context.config.colorMap,
        ocrMarginFactor: context.config.annotationOcrMarginFactor,
      }),
    toAppError
  )
  if (annotated.ok) {
    const { summary } = annotated.value
    highlights = summary.highlights
    errors.push(...summary.errors)
    warnings.push(...summary.warnings)
    if (summary.errors.length > 0) partial = true

    const written = await tryCatchWith(
      () =>
        writeExecutedCopy(
          annotated.value.bytes,
          context.config.outputDir,
          executedCopyName(context.stem, context.runLabel, document.format)
        ),
      toAppError
    )
    if (written.ok) {
      executedCopy = written.value
    } else {
      errors.push(written.error)
      partial = true
    }
  } else {
    // Matches still reach the matrix without an Executed copy
    errors.push(annotated.error)
    partial = true
  }

  const review = await runReviewers(document, matches, context.reviewers)
  warnings.push(...review.warnings)

  const status: DocumentStatus = partial ? "partial" : "success"
  return {
    document,
    matches,
    outcome: {
      file: document.name,
      status,
      documentId: document.id,
      contentHash: document.contentHash,
      format: document.format,
      extractionMethod: document.extractionMethod,
      pages: document.pages.length,
      matches: matches.length,
      unknownCodes: collectUnknownCodes(matches).length,
      needsReview: matches.filter((match) => match.needsReview).length,
      highlights,
      semanticFindings: review.findings,
      executedCopy,
      errors: errors.map((error) => error.toJSON()),
      warnings,
      durationMs: context.now().getTime() - startedAt,
    },
  }
}

// ============================================================================
// Run
// ============================================================================

/**
 * Runs a full compliance review and writes every output.
 *
 * Steps:
 * 1. Load source tables and build the clause database
 * 2. List solicitation documents
 * 3. Extract, match and annotate documents, `documentConcurrency` at a time
 * 4. Write the compliance matrix once every row is known
 * 5. Write `run-report.json`
 *
 * The OCR pool is always closed, also when the run fails.
 *
 * @throws EmptyDatabaseError - No usable source entries
 * @throws EmptyInputError - No solicitation documents
 */
export async function runCompliance(
  config: ComplianceConfig,
  deps: RunDependencies = {}
): Promise<RunReport> {
  const now = deps.now ?? (() => new Date())
  const started = now()
  const runLabel = deps.runLabel ?? formatRunLabel(started)

  logger.info("Compliance run started", {
    runLabel,
    databaseDir: config.databaseDir,
    solicitationsDir: config.solicitationsDir,
  })

  // Step 1: Clause database
  const sources = await loadSourceTables(config.databaseDir, {
    skipFilePatterns: config.skipFilePatterns,
  })
  const database = buildDatabase(sources.tables, {
    sourcePrecedenceOrder: config.sourcePrecedenceOrder,
    classificationAliases: config.classificationAliases,
    diagnostics: sources.diagnostics,
  })

  // Step 2: Inputs
  const files = await listSolicitations(config.solicitationsDir, config.skipFilePatterns)
  const stems = documentStems(files.map((file) => path.basename(file)))

  // Step 3: Documents
  const pool = new OcrWorkerPool(
    deps.ocrEngineFactory ??
      tesseractEngineFactory({ language: config.ocr.language, langPath: config.ocr.langPath }),
    config.ocr.poolSize
  )

  let reviewed: ReviewedDocument[]
  try {
    const limit = pLimit(config.documentConcurrency)
    const baseContext = {
      config,
      database,
      matchOptions: { grammar: config.codeGrammar, wrapJoinTolerance: config.wrapJoinTolerance },
      loadOptions: {
        textDensityThreshold: config.ocr.textDensityThreshold,
        ocr: { pool, settings: config.ocr, rasterize: deps.rasterize },
      },
      reviewers: deps.reviewers ?? [],
      runLabel,
      now,
    }

    reviewed = await Promise.all(
      files.map((file) =>
        limit(async (): Promise<ReviewedDocument> => {
          const name = path.basename(file)
          const documentStart = now().getTime()
          const result = await tryCatchWith(
            () => reviewDocument(file, { ...baseContext, stem: stems.get(name) ?? name }),
            toAppError
          )
          if (result.ok) return result.value

          logger.error(fmt`Document ${name} failed: ${result.error.message}`, { code: result.error.code })
          return { outcome: failedOutcome(name, result.error, now().getTime() - documentStart), matches: [] }
        })
      )
    )
  } finally {
    await pool.close()
  }

  // Step 4: Matrix
  const documents = reviewed.flatMap(({ document }) => (document ? [document] : []))
  const allMatches = reviewed.flatMap(({ matches }) => matches)
  const rows = buildComplianceRows(allMatches, documents)
  const matrices = await writeComplianceMatrices(rows, {
    outputDir: config.outputDir,
    runLabel,
    mode: config.matrixAggregationMode,
    colorMap: config.colorMap,
  })

  // Step 5: Report
  const names = new Map(documents.map((document) => [document.id, document.name]))
  const unknownCodes: ReportedUnknownCode[] = collectUnknownCodes(allMatches).map(
    ({ documentId, ...warning }) => ({ document: names.get(documentId) ?? documentId, ...warning })
  )
  const outcomes = reviewed.map(({ outcome }) => outcome)
  const reportPath = path.join(config.outputDir, RUN_REPORT_FILE)

  const report: RunReport = {
    runLabel,
    startedAt: started.toISOString(),
    durationMs: now().getTime() - started.getTime(),
    database: {
      fingerprint: database.fingerprint,
      sources: [...database.sources],
      entries: database.entries.size,
      conflicts: [...database.conflicts],
      diagnostics: [...database.diagnostics],
    },
    documents: outcomes,
    unknownCodes,
    outputs: {
      matrices,
      executedCopies: outcomes.flatMap(({ executedCopy }) => (executedCopy ? [executedCopy] : [])),
      report: reportPath,
    },
    totals: {
      documents: outcomes.length,
      success: outcomes.filter(({ status }) => status === "success").length,
      partial: outcomes.filter(({ status }) => status === "partial").length,
      failed: outcomes.filter(({ status }) => status === "failed").length,
      matches: allMatches.length,
    },
  }

  await writeFile(reportPath, JSON.stringify(report, null, 2) + "\n", "utf-8")

  logger.info("Compliance run finished", {
    runLabel,
    documents: report.totals.documents,
    success: report.totals.success,
    partial: report.totals.partial,
    failed: report.totals.failed,
    matches: report.totals.matches,
    unknownCodes: unknownCodes.length,
    durationMs: report.durationMs,
  })

  return report
}
