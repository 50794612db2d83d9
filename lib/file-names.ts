/**
 * @fileoverview Output file naming
 * @module lib/file-names
 */

import path from "path"

const UNSAFE_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f]/g

/**
 * Makes a string safe to use as part of a file name on any platform.
 */
export function safeFileComponent(value: string): string {
  return value.replace(UNSAFE_CHARACTERS, "_").replace(/\s+/g, " ").trim() || "document"
}

/**
 * Name stem used for a document's outputs. Documents sharing a stem (say
 * `rfp.pdf` and `rfp.docx`) keep their extension in it.
 */
export function documentStems(names: readonly string[]): Map<string, string> {
  const counts = new Map<string, number>()
  for (const name of names) {
    const stem = path.parse(name).name
    counts.set(stem, (counts.get(stem) ?? 0) + 1)
  }

  return new Map(
    names.map((name) => {
      const { name: stem, ext } = path.parse(name)
      const unique = (counts.get(stem) ?? 0) > 1 && ext ? `${stem}_${ext.slice(1)}` : stem
      return [name, safeFileComponent(unique)]
    })
  )
}

/** Local time as `YYYYMMDD_HHMMSS` */
export function formatRunLabel(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0")
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}
