/**
 * registry.ts - Name transforms and their registry
 *
 * Every transform maps a base name (extension already stripped) to a new
 * base name. Named case styles are registered once at load; transforms that
 * take operands (change, regex, prefix, split) come from factories.
 */

import { CompileError, err, ok, type Result } from "../core/errors"
import { CaseStyle, type Command } from "../core/types"
import type { BoundaryStrategy } from "./boundaries"
import { applyStyle, clean } from "./styles"

export interface Transform {
  name: string
  description: string
  apply(base: string): string
}

const transforms = new Map<string, Transform>()

/**
 * Register a transform. A later registration with the same name replaces
 * the earlier one.
 */
export function registerTransform(transform: Transform): void {
  transforms.set(transform.name, transform)
}

export function getTransform(name: string): Transform | null {
  return transforms.get(name) ?? null
}

export function listTransforms(): Transform[] {
  return [...transforms.values()].sort((a, b) => a.name.localeCompare(b.name))
}

const STYLE_DESCRIPTIONS: Readonly<Record<CaseStyle, string>> = {
  snake: "lowercase words joined with _",
  kebab: "lowercase words joined with -",
  title: "Capitalized Words Joined With Spaces",
  camel: "firstWordLowerRestCapitalized",
  pascal: "EveryWordCapitalized",
  lower: "fold to lowercase",
  upper: "fold to uppercase",
  sentence: "First word capitalized, rest lowercase",
  start: "Every Word Capitalized, rest of each word kept",
  studly: "aLtErNaTiNg letter case",
}

export function styleTransform(style: CaseStyle, strategy?: BoundaryStrategy): Transform {
  return {
    name: style,
    description: STYLE_DESCRIPTIONS[style],
    apply: (base) => applyStyle(style, base, { strategy }),
  }
}

export function splitTransform(style: CaseStyle, strategy?: BoundaryStrategy): Transform {
  return {
    name: `split ${style}`,
    description: `split every hump, then ${STYLE_DESCRIPTIONS[style]}`,
    apply: (base) => applyStyle(style, base, { force: true, strategy }),
  }
}

export function changeTransform(from: string, to: string): Transform {
  return {
    name: "change",
    description: `replace every "${from}" with "${to}"`,
    apply: (base) => base.split(from).join(to),
  }
}

export function prefixTransform(prefix: string): Transform {
  return {
    name: "prefix",
    description: `strip a leading "${prefix}"`,
    apply: (base) => (base.startsWith(prefix) ? base.slice(prefix.length) : base),
  }
}

/**
 * Compile a global regex substitution. The replacement supports $1 and
 * $<name> references.
 */
export function regexTransform(pattern: string, replacement: string): Result<Transform, CompileError> {
  let regex: RegExp
  try {
    regex = new RegExp(pattern, "g")
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e)
    return err(new CompileError(`Invalid regex: ${detail}`, "REGEX", pattern))
  }
  return ok({
    name: "regex",
    description: `replace /${pattern}/g with "${replacement}"`,
    apply: (base) => base.replace(regex, replacement),
  })
}

export const cleanTransform: Transform = {
  name: "clean",
  description: "drop special characters, collapse whitespace, trim",
  apply: clean,
}

for (const style of CaseStyle.options) registerTransform(styleTransform(style))
registerTransform(cleanTransform)

export interface BuildOptions {
  strategy?: BoundaryStrategy
}

/**
 * Build the transform a command renames with, or null for commands that
 * do not rename (move, copy, remove, ...).
 */
export function buildTransform(command: Command, options: BuildOptions = {}): Result<Transform | null, CompileError> {
  switch (command.type) {
    case "case":
      if (options.strategy) return ok(styleTransform(command.style, options.strategy))
      return ok(getTransform(command.style) ?? styleTransform(command.style))
    case "split":
      return ok(splitTransform(command.style, options.strategy))
    case "clean":
      return ok(getTransform("clean") ?? cleanTransform)
    case "change":
      return ok(changeTransform(command.old, command.new))
    case "regex":
      return regexTransform(command.pattern, command.replacement)
    case "prefix":
      return ok(prefixTransform(command.prefix))
    default:
      return ok(null)
  }
}
