/**
 * @fileoverview Configuration file schema
 *
 * The file uses snake_case keys; `parseConfig` returns the camelCase
 * `ComplianceConfig` the pipeline consumes.
 *
 * @module lib/config/schema
 */

import os from "os"
import path from "path"
import { z } from "zod"
import { ConfigurationError, type ErrorDetail } from "@/lib/errors"
import {
  DEFAULT_CLASSIFICATION_ALIASES,
  DEFAULT_CODE_GRAMMAR,
  DEFAULT_COLOR_MAP,
  DEFAULT_SKIP_FILE_PATTERNS,
  DEFAULT_SOURCE_PRECEDENCE,
} from "./defaults"
import type { CodeFamilyGrammar, ComplianceConfig } from "./types"

const argbSchema = z
  .string()
  .regex(/^[0-9A-Fa-f]{8}$/, "Expected an ARGB hex color such as FFC6EFCE")
  .transform((value) => value.toUpperCase())

const colorEntrySchema = z.object({
  fill: argbSchema,
  highlight: z.enum([
    "yellow",
    "green",
    "red",
    "cyan",
    "magenta",
    "blue",
    "lightGray",
    "darkGray",
    "darkYellow",
  ]),
})

const codeClassificationSchema = z.enum(["OK", "Conditional", "Remove"])

export const configFileSchema = z
  .object({
    database_dir: z.string().min(1).default("Database"),
    solicitations_dir: z.string().min(1).default("Solicitations"),
    output_dir: z.string().min(1).default("Output"),

    ocr_text_density_threshold: z.number().int().nonnegative().default(50),
    ocr_dpi: z.number().int().min(72).max(600).default(300),
    ocr_confidence_floor: z.number().min(0).max(1).default(0.6),
    ocr_language: z.string().min(1).default("eng"),
    ocr_lang_path: z.string().min(1).optional(),
    ocr_pool_size: z.number().int().positive().optional(),
    max_ocr_pages: z.number().int().positive().default(100),

    source_precedence_order: z.array(z.string().min(1)).default(DEFAULT_SOURCE_PRECEDENCE),
    classification_aliases: z
      .record(z.string(), codeClassificationSchema)
      .default(DEFAULT_CLASSIFICATION_ALIASES),
    code_grammar_per_family: z
      .record(z.string(), z.string().min(1))
      .default(DEFAULT_CODE_GRAMMAR),
    wrap_join_tolerance: z
      .object({
        max_line_gap: z.number().int().min(1).default(1),
        same_line_gap_ratio: z.number().nonnegative().default(0.3),
      })
      .default({ max_line_gap: 1, same_line_gap_ratio: 0.3 }),
    color_map: z
      .object({
        OK: colorEntrySchema,
        Conditional: colorEntrySchema,
        Remove: colorEntrySchema,
        Unknown: colorEntrySchema,
      })
      .default(DEFAULT_COLOR_MAP),
    matrix_aggregation_mode: z.enum(["per-run", "per-document"]).default("per-run"),

    document_concurrency: z.number().int().positive().default(4),
    annotation_ocr_margin_factor: z.number().nonnegative().default(0.5),
    skip_file_patterns: z.array(z.string().min(1)).default(DEFAULT_SKIP_FILE_PATTERNS),
  })
  .strict()

export type ConfigFile = z.infer<typeof configFileSchema>

/**
 * Validates a raw configuration object and resolves it against `baseDir`.
 *
 * @throws ConfigurationError - Schema violations or uncompilable grammars
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): ComplianceConfig {
  const parsed = configFileSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    throw ConfigurationError.fromZodError(parsed.error)
  }
  const file = parsed.data

  const codeGrammar = compileGrammar(file.code_grammar_per_family)

  // Alias keys are matched case-insensitively
  const classificationAliases = Object.fromEntries(
    Object.entries(file.classification_aliases).map(([alias, value]) => [
      alias.trim().toLowerCase(),
      value,
    ])
  )

  return Object.freeze({
    databaseDir: path.resolve(baseDir, file.database_dir),
    solicitationsDir: path.resolve(baseDir, file.solicitations_dir),
    outputDir: path.resolve(baseDir, file.output_dir),
    ocr: {
      textDensityThreshold: file.ocr_text_density_threshold,
      dpi: file.ocr_dpi,
      confidenceFloor: file.ocr_confidence_floor,
      language: file.ocr_language,
      langPath: file.ocr_lang_path,
      poolSize: file.ocr_pool_size ?? os.availableParallelism(),
      maxPages: file.max_ocr_pages,
    },
    sourcePrecedenceOrder: file.source_precedence_order,
    classificationAliases,
    codeGrammar,
    wrapJoinTolerance: {
      maxLineGap: file.wrap_join_tolerance.max_line_gap,
      sameLineGapRatio: file.wrap_join_tolerance.same_line_gap_ratio,
    },
    colorMap: file.color_map,
    matrixAggregationMode: file.matrix_aggregation_mode,
    documentConcurrency: file.document_concurrency,
    annotationOcrMarginFactor: file.annotation_ocr_margin_factor,
    skipFilePatterns: file.skip_file_patterns,
  })
}

function compileGrammar(families: Record<string, string>): CodeFamilyGrammar[] {
  const details: ErrorDetail[] = []
  const grammar: CodeFamilyGrammar[] = []

  for (const [family, source] of Object.entries(families)) {
    const field = `code_grammar_per_family.${family}`
    let pattern: RegExp
    try {
      pattern = new RegExp(source, "u")
    } catch (error) {
      details.push({
        field,
        message: error instanceof Error ? error.message : "Invalid regular expression",
      })
      continue
    }
    if (pattern.test("")) {
      details.push({ field, message: "Pattern must not match the empty string" })
      continue
    }
    grammar.push({ family, source })
  }

  if (details.length > 0) {
    throw new ConfigurationError("Invalid code grammar", details)
  }
  if (grammar.length === 0) {
    throw new ConfigurationError("At least one code family grammar is required", [
      { field: "code_grammar_per_family", message: "Empty" },
    ])
  }
  return grammar
}
