#!/usr/bin/env npx tsx
/**
 * Compliance Review Script
 *
 * Reviews every solicitation in the configured directory and writes the
 * compliance matrix, Executed copies and run report.
 *
 * Usage: npm run compliance -- [path/to/compliance.config.json]
 */

import { config } from "dotenv"
config()

import * as Sentry from "@sentry/node"

async function main() {
  // After dotenv, so SENTRY_DSN from .env is seen
  await import("../instrument")
  const { loadConfig } = await import("@/lib/config/load-config")
  const { runCompliance } = await import("@/lib/compliance-run/run-compliance")

  const settings = await loadConfig({ path: process.argv[2] })
  const report = await runCompliance(settings)

  console.log(`\nRun ${report.runLabel}`)
  console.log(`  Database: ${report.database.entries} codes from ${report.database.sources.join(", ")}`)
  if (report.database.conflicts.length > 0) {
    console.log(`  Conflicts resolved: ${report.database.conflicts.length}`)
  }
  console.log(
    `  Documents: ${report.totals.success} ok, ${report.totals.partial} partial, ${report.totals.failed} failed`
  )
  console.log(`  Matches: ${report.totals.matches} (${report.unknownCodes.length} unknown codes)`)

  for (const outcome of report.documents.filter((d) => d.status !== "success")) {
    console.log(`  ${outcome.status.toUpperCase()} ${outcome.file}`)
    for (const error of outcome.errors) console.log(`    ${error.code}: ${error.message}`)
  }

  for (const matrix of report.outputs.matrices) console.log(`  Matrix: ${matrix.path}`)
  console.log(`  Report: ${report.outputs.report}`)

  return report.totals.failed > 0 ? 2 : 0
}

main()
  .then(async (code) => {
    await Sentry.flush(2000)
    process.exit(code)
  })
  .catch(async (error: unknown) => {
    const { toAppError } = await import("@/lib/errors")
    const appError = toAppError(error)
    console.error(`${appError.code}: ${appError.message}`)
    for (const detail of appError.details ?? []) {
      console.error(`  ${detail.field ? `${detail.field}: ` : ""}${detail.message}`)
    }
    Sentry.captureException(error)
    await Sentry.flush(2000)
    process.exit(1)
  })
