/**
 * @fileoverview Default configuration values
 *
 * The rubric (which codes are OK, Conditional or Remove) is data from the
 * source tables; only the spelling of those values is configured here.
 *
 * @module lib/config/defaults
 */

import type { ColorMap, CodeClassification } from "./types"

/** Clause code shapes per agency family, in tie-break order */
export const DEFAULT_CODE_GRAMMAR: Record<string, string> = {
  FAR: String.raw`52\.\d{3}-\d{1,3}`,
  DFARS: String.raw`252\.\d{3}-\d{4}`,
  NASA: String.raw`1852\.\d{3}-\d{1,3}`,
  AGENCY: String.raw`\d{3,4}\.\d{3}-\d{1,4}`,
}

export const DEFAULT_SOURCE_PRECEDENCE = ["FAR", "DFARS", "NASA"]

/** Case-insensitive spellings seen in sponsor rubric columns */
export const DEFAULT_CLASSIFICATION_ALIASES: Record<string, CodeClassification> = {
  ok: "OK",
  c: "Conditional",
  conditional: "Conditional",
  remove: "Remove",
  r: "Remove",
}

export const DEFAULT_COLOR_MAP: ColorMap = {
  OK: { fill: "FFC6EFCE", highlight: "green" },
  Conditional: { fill: "FFFFEB9C", highlight: "yellow" },
  Remove: { fill: "FFFFC7CE", highlight: "red" },
  Unknown: { fill: "FFD9D9D9", highlight: "lightGray" },
}

/** File name fragments never treated as source tables */
export const DEFAULT_SKIP_FILE_PATTERNS = ["Definitions", "Contract Ts&Cs Matrix"]

export const DEFAULT_CONFIG_FILE = "compliance.config.json"
