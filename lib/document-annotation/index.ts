/**
 * @fileoverview Non-destructive highlighting of matched codes
 * @module lib/document-annotation
 */

export * from "./types"
export { annotateDocument, executedCopyName, writeExecutedCopy } from "./annotate-document"
export { addHighlight, annotatePdf, ANNOTATION_AUTHOR } from "./pdf-annotator"
export { annotateDocx, highlightWholeRun, splitRun, withHighlight, type RunHighlight } from "./docx-annotator"
export { argbToRgb, clampBox, fragmentBox, inflateOcrBox, toUserSpace, type CropBox } from "./geometry"
