/**
 * @fileoverview Compliance run orchestration
 * @module lib/compliance-run
 */

export * from "./types"
export { listSolicitations, runCompliance, RUN_REPORT_FILE } from "./run-compliance"
