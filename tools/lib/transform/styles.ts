/**
 * styles.ts - Case style functions over a base name (no extension)
 */

import type { CaseStyle } from "../core/types"
import { camelBoundaries, SEPARATORS, type BoundaryStrategy } from "./boundaries"

export interface WordOptions {
  // re-tokenize for lower and upper too (split <T>)
  force?: boolean
  strategy?: BoundaryStrategy
}

/**
 * Break a name into words: separators first, then humps inside each part,
 * so "my XMLParser" is my|XML|Parser.
 */
export function words(text: string, options: WordOptions = {}): string[] {
  const strategy = options.strategy ?? camelBoundaries
  return strategy.split(text)
}

export function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
}

function alternate(text: string): string {
  let upper = false
  let out = ""
  for (const char of text) {
    if (char.toLowerCase() === char.toUpperCase()) {
      out += char
      continue
    }
    out += upper ? char.toUpperCase() : char.toLowerCase()
    upper = !upper
  }
  return out
}

const STYLES: Readonly<Record<CaseStyle, (parts: string[]) => string>> = {
  snake: (parts) => parts.map((w) => w.toLowerCase()).join("_"),
  kebab: (parts) => parts.map((w) => w.toLowerCase()).join("-"),
  title: (parts) => parts.map(capitalize).join(" "),
  camel: (parts) => parts.map((w, i) => (i === 0 ? w.toLowerCase() : capitalize(w))).join(""),
  pascal: (parts) => parts.map(capitalize).join(""),
  lower: (parts) => parts.join("").toLowerCase(),
  upper: (parts) => parts.join("").toUpperCase(),
  sentence: (parts) => parts.map((w, i) => (i === 0 ? capitalize(w) : w.toLowerCase())).join(" "),
  start: (parts) => parts.map((w) => w.charAt(0).toUpperCase() + w.slice(1)).join(" "),
  studly: (parts) => alternate(parts.join("")),
}

/**
 * Apply a case style to a base name. lower and upper fold the text as-is;
 * every other style re-tokenizes first.
 */
export function applyStyle(style: CaseStyle, text: string, options: WordOptions = {}): string {
  if (!options.force) {
    if (style === "lower") return text.toLowerCase()
    if (style === "upper") return text.toUpperCase()
  }
  return STYLES[style](words(text, options))
}

const CLEAN_DISALLOWED = /[^\p{L}\p{N}_\s.-]/gu

/**
 * Drop everything but letters, digits, "_", whitespace, "." and "-", collapse
 * whitespace runs, and trim whitespace, dots and hyphens from both ends.
 */
export function clean(text: string): string {
  return text
    .replace(CLEAN_DISALLOWED, "")
    .replace(/\s+/gu, " ")
    .replace(/^[\s.-]+|[\s.-]+$/gu, "")
}
