/**
 * @fileoverview Configuration loading
 * @module lib/config/load-config
 */

import { readFile } from "fs/promises"
import path from "path"
import { ConfigurationError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { DEFAULT_CONFIG_FILE } from "./defaults"
import { parseConfig } from "./schema"
import type { ComplianceConfig } from "./types"

export interface LoadConfigOptions {
  /** Explicit config path; a missing file is then an error */
  path?: string
  /** Directory used when no path is given (default: process.cwd()) */
  cwd?: string
}

/**
 * Loads the run configuration.
 *
 * Resolution order: `options.path`, then the `COMPLIANCE_CONFIG` environment
 * variable, then `compliance.config.json` in `cwd`. Only the last may be
 * absent, in which case every default applies. Relative directories in the
 * file resolve against the file's own directory.
 *
 * @throws ConfigurationError - Unreadable, malformed or invalid file
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ComplianceConfig> {
  const cwd = options.cwd ?? process.cwd()
  const explicit = options.path ?? process.env.COMPLIANCE_CONFIG
  const configPath = path.resolve(cwd, explicit ?? DEFAULT_CONFIG_FILE)

  let contents: string
  try {
    contents = await readFile(configPath, "utf-8")
  } catch (error) {
    if (!explicit && isNotFound(error)) {
      logger.info("No configuration file found, using defaults", { configPath })
      return parseConfig({}, cwd)
    }
    throw new ConfigurationError(`Could not read configuration file ${configPath}`)
  }

  let raw: unknown
  try {
    raw = JSON.parse(contents)
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${configPath} is not valid JSON`, [
      { message: error instanceof Error ? error.message : String(error) },
    ])
  }

  const config = parseConfig(raw, path.dirname(configPath))
  logger.info("Configuration loaded", {
    configPath,
    families: config.codeGrammar.map((g) => g.family).join(","),
    aggregation: config.matrixAggregationMode,
  })
  return config
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}
