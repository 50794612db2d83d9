/**
 * @fileoverview Clause code matching
 * @module lib/code-matching
 */

export * from "./types"
export { compileFamilies, findCandidates, resolveOverlaps, type CodeCandidate, type CompiledFamily } from "./grammar"
export {
  classifyJoin,
  lineAdvance,
  linearizeDocument,
  segmentsInRange,
  type LinearSegment,
  type LinearText,
  type WrapCheck,
} from "./linearize"
export { collectUnknownCodes, compareMatches, matchCodes } from "./match-codes"
