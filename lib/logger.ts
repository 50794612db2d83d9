import * as Sentry from "@sentry/node";

/**
 * Run logger, backed by Sentry's structured logs.
 *
 * Nothing is sent until `instrument.ts` has called `Sentry.init` with a DSN,
 * so library code can log freely in tests and offline runs.
 *
 * Attributes are flat key/value pairs; pass counts and names, not whole
 * documents or match lists.
 *
 * @example
 * ```ts
 * logger.info("Codes matched", { document: "rfp.pdf", matches: 42 });
 * logger.warn(fmt`OCR confidence low on page ${page} of ${name}`);
 * ```
 */
export const logger = Sentry.logger;

export const fmt = Sentry.logger.fmt;
