/**
 * boundaries.ts - Word boundary detection for case transforms
 *
 * A strategy turns one name into words. Callers only see the interface, so
 * the hump rules can be swapped (e.g. to split digit runs) without touching
 * the transforms.
 */

export interface BoundaryStrategy {
  name: string
  split(text: string): string[]
}

// whitespace, underscore and hyphen separate words
export const SEPARATORS = /[\s_-]+/u

// run of 2+ capitals followed by Capital+lower: XMLDocument -> XML|Document
const UPPER_RUN = /(\p{Lu}{2,})(\p{Lu}\p{Ll})/gu
// lower followed by upper: featureWish -> feature|Wish
const LOWER_UPPER = /(\p{Ll})(\p{Lu})/gu
const LETTER_DIGIT = /(\p{L})(\p{N})/gu
const DIGIT_LETTER = /(\p{N})(\p{L})/gu

function splitOnSeparators(text: string): string[] {
  return text.split(SEPARATORS).filter((word) => word !== "")
}

function splitHumps(word: string): string[] {
  return word.replace(UPPER_RUN, "$1 $2").replace(LOWER_UPPER, "$1 $2").split(" ")
}

export const separatorBoundaries: BoundaryStrategy = {
  name: "separators",
  split: splitOnSeparators,
}

export const camelBoundaries: BoundaryStrategy = {
  name: "camel",
  split(text) {
    return splitOnSeparators(text).flatMap(splitHumps)
  },
}

/** camel rules plus a boundary at every letter/digit transition */
export const digitAwareBoundaries: BoundaryStrategy = {
  name: "digit-aware",
  split(text) {
    return splitOnSeparators(text)
      .flatMap(splitHumps)
      .flatMap((word) => word.replace(LETTER_DIGIT, "$1 $2").replace(DIGIT_LETTER, "$1 $2").split(" "))
  },
}

export const boundaryStrategies: Readonly<Record<string, BoundaryStrategy>> = {
  separators: separatorBoundaries,
  camel: camelBoundaries,
  "digit-aware": digitAwareBoundaries,
}
