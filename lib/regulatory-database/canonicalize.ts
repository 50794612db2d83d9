/**
 * @fileoverview Canonical clause keys
 * @module lib/regulatory-database/canonicalize
 */

/** Hyphen, dash and minus code points that survive NFKC */
const DASH_VARIANTS = /[\u2010-\u2015\u2212\u2043\uFE58]/g
const SEPARATOR_SPACING = /\s*([.-])\s*/g
const REPEATED_SEPARATORS = /([.-])[.-]+/g
const EDGE_SEPARATORS = /^[.-]+|[.-]+$/g

/**
 * Normalizes a clause code for lookup and merging.
 *
 * NFKC, uppercase, trim, dash variants to `-`, no whitespace around
 * separators, other internal whitespace to `-`, repeated separators
 * collapsed, no leading or trailing separators.
 *
 * @example
 * canonicalizeCode(" 52.212 – 4 ") // "52.212-4"
 */
export function canonicalizeCode(raw: string): string {
  return raw
    .normalize("NFKC")
    .toUpperCase()
    .trim()
    .replace(DASH_VARIANTS, "-")
    .replace(SEPARATOR_SPACING, "$1")
    .replace(/\s+/g, "-")
    .replace(REPEATED_SEPARATORS, "$1")
    .replace(EDGE_SEPARATORS, "")
}
