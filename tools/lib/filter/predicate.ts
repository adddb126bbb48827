/**
 * predicate.ts - Compile filter clauses into a pure predicate over file metadata
 *
 * All clauses AND together. Literals are validated here, so a bad size,
 * date or type fails before any file is looked at.
 */

import { minimatch } from "minimatch"
import { CompileError, err, ok, type Result } from "../core/errors"
import type { EntryType, FileMetadata, FilterClause } from "../core/types"
import { defaultGroups, type GroupRegistry } from "../grammar/groups"
import { dayKey, parseDay, parseDepth, parseSize } from "./literals"

export type Predicate = (meta: FileMetadata) => boolean

export interface CompileOptions {
  ignoreCase?: boolean // NAME only
  groups?: GroupRegistry
}

const TYPE_ALIASES: Readonly<Record<string, EntryType>> = {
  file: "file",
  folder: "folder",
  dir: "folder",
  directory: "folder",
  symlink: "symlink",
  link: "symlink",
  other: "other",
}

const GLOB_CHARS = /[*?[{]/

// order is negative, zero or positive as actual sorts before, with or after expected
function satisfies(order: number, comparator: FilterClause["comparator"]): boolean {
  switch (comparator) {
    case ">":
      return order > 0
    case "<":
      return order < 0
    default:
      return order === 0
  }
}

function orderOf(actual: string, expected: string): number {
  if (actual === expected) return 0
  return actual < expected ? -1 : 1
}

/**
 * Expand FOR clauses that were not already expanded by the parser
 */
export function expandGroups(clauses: FilterClause[], groups: GroupRegistry = defaultGroups): Result<FilterClause[], CompileError> {
  const expanded: FilterClause[] = []
  for (const clause of clauses) {
    if (clause.keyword !== "FOR") {
      expanded.push(clause)
      continue
    }
    const members = groups.resolve(clause.value)
    if (!members) return err(new CompileError(`Unknown group: ${clause.value}`, "FOR", clause.value))
    expanded.push(...members)
  }
  return ok(expanded)
}

function compileName(value: string, ignoreCase: boolean): Predicate {
  if (GLOB_CHARS.test(value)) {
    return (meta) => minimatch(meta.name, value, { dot: true, nocase: ignoreCase })
  }
  if (ignoreCase) {
    const needle = value.toLowerCase()
    return (meta) => meta.name.toLowerCase().includes(needle)
  }
  return (meta) => meta.name.includes(value)
}

export function compileClause(clause: FilterClause, options: CompileOptions = {}): Result<Predicate, CompileError> {
  const { keyword, comparator, value } = clause

  switch (keyword) {
    case "NAME":
      return ok(compileName(value, options.ignoreCase ?? false))

    case "TYPE": {
      const wanted = new Set<EntryType>()
      for (const part of value.split(",")) {
        const type = TYPE_ALIASES[part.trim().toLowerCase()]
        if (!type) {
          return err(new CompileError(`Invalid type: ${part} (expected file, folder, symlink or other)`, "TYPE", value))
        }
        wanted.add(type)
      }
      return ok((meta) => wanted.has(meta.type))
    }

    case "EXT": {
      const suffixes = value.split(",").map((ext) => `.${ext.replace(/^\./, "")}`)
      return ok((meta) => suffixes.some((suffix) => meta.name.length > suffix.length && meta.name.endsWith(suffix)))
    }

    case "SIZE": {
      const bytes = parseSize(value)
      if (!bytes.ok) return bytes
      const limit = bytes.value
      return ok((meta) => satisfies(meta.size - limit, comparator))
    }

    case "DEPTH": {
      const depth = parseDepth(value)
      if (!depth.ok) return depth
      const level = depth.value
      return ok((meta) => satisfies(meta.depth - level, comparator))
    }

    case "MODIFIED":
    case "ACCESSED": {
      const day = parseDay(value, keyword)
      if (!day.ok) return day
      const target = day.value
      const pick = keyword === "MODIFIED" ? (meta: FileMetadata) => meta.modified : (meta: FileMetadata) => meta.accessed
      return ok((meta) => satisfies(orderOf(dayKey(pick(meta)), target), comparator))
    }

    case "FOR":
      return err(new CompileError("FOR clauses must be expanded before compiling", "FOR", value))
  }
}

/**
 * Compile clauses into a single predicate. No clauses selects everything.
 */
export function compile(clauses: FilterClause[], options: CompileOptions = {}): Result<Predicate, CompileError> {
  const expanded = expandGroups(clauses, options.groups)
  if (!expanded.ok) return expanded

  const predicates: Predicate[] = []
  for (const clause of expanded.value) {
    const compiled = compileClause(clause, options)
    if (!compiled.ok) return compiled
    predicates.push(compiled.value)
  }

  return ok((meta) => predicates.every((predicate) => predicate(meta)))
}
