/**
 * @fileoverview Regulatory clause database
 * @module lib/regulatory-database
 */

export * from "./types"
export { canonicalizeCode } from "./canonicalize"
export {
  cleanHeader,
  isSourceFile,
  loadSourceTables,
  mapHeaders,
  readSourceTable,
  tableFromRows,
  MAX_CODE_LENGTH,
  SOURCE_EXTENSIONS,
  type LoadedSources,
  type LoadSourcesOptions,
  type SheetRow,
} from "./source-loader"
export {
  buildDatabase,
  lookupCode,
  rankSources,
  resolveClassification,
  serializeDatabase,
  type BuildDatabaseOptions,
} from "./merge"
