import type { EntryType } from "../core/types"

export interface NameParts {
  base: string
  ext: string // includes the leading dot, "" when there is none
}

/**
 * Split a file name at its last dot. A leading dot (".env") or trailing
 * dot ("notes.") does not start an extension.
 */
export function splitExtension(name: string): NameParts {
  const dot = name.lastIndexOf(".")
  if (dot <= 0 || dot === name.length - 1) return { base: name, ext: "" }
  return { base: name.slice(0, dot), ext: name.slice(dot) }
}

/**
 * Apply a base-name function to an entry name. Files keep their extension
 * verbatim; folders are transformed whole.
 */
export function renameEntry(name: string, type: EntryType, fn: (base: string) => string): string {
  if (type === "folder") return fn(name)
  const { base, ext } = splitExtension(name)
  return fn(base) + ext
}
