/**
 * @fileoverview Run configuration
 * @module lib/config
 */

export type {
  Classification,
  CodeClassification,
  ClassificationColor,
  ColorMap,
  CodeFamilyGrammar,
  ComplianceConfig,
  DocxHighlightColor,
  MatrixAggregationMode,
  OcrSettings,
  WrapJoinTolerance,
} from "./types"
export { DEFAULT_COLOR_MAP, DEFAULT_CODE_GRAMMAR } from "./defaults"
export { parseConfig, configFileSchema, type ConfigFile } from "./schema"
export { loadConfig, type LoadConfigOptions } from "./load-config"
