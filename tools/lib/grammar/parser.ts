/**
 * parser.ts - Positional command grammar
 *
 *   <COMMAND> <PATH> [FILTER]* [ROUTE]* [FLAG]*
 *
 * Single pass, no backtracking. PATH falls back to "." when the token after
 * the command is already a filter, route or flag. A parse failure is
 * reported before anything is scanned or touched.
 */

import { ParseError, err, ok, type Result } from "../core/errors"
import {
  CaseStyle,
  FilterKeyword,
  OutputFormat,
  type Command,
  type FilterClause,
  type FlagSet,
  type ParsedCommand,
  type RouteClause,
} from "../core/types"
import { defaultGroups, type GroupRegistry } from "./groups"
import { tokenize } from "./tokenizer"

export interface ParseOptions {
  groups?: GroupRegistry
}

const FLAG_LETTERS: Readonly<Record<string, keyof FlagSet>> = {
  r: "recursive",
  p: "preview",
  f: "force",
  I: "interactive",
  T: "tui",
  u: "undo",
  a: "hidden",
  i: "ignoreCase",
}

// Keywords that only take ":" (ordered comparisons make no sense for them)
const COLON_ONLY = new Set<FilterKeyword>(["NAME", "TYPE", "EXT", "FOR"])

const ROUTE_PATTERN = /^(TO|INTO|FORMAT):/
const FILTER_PATTERN = /^([A-Z]+)([:<>])(.*)$/s

const FORMAT_ALIASES: Readonly<Record<string, OutputFormat>> = {
  json: "json",
  csv: "csv",
  yaml: "yaml",
  yml: "yaml",
  text: "text",
  txt: "text",
}

export function isRouteToken(token: string): boolean {
  return ROUTE_PATTERN.test(token)
}

export function isFilterToken(token: string): boolean {
  return !isRouteToken(token) && FILTER_PATTERN.test(token)
}

export function isFlagToken(token: string): boolean {
  return token.length > 1 && token.startsWith("-")
}

function isOperandToken(token: string | undefined): token is string {
  return token !== undefined && !isRouteToken(token) && !isFilterToken(token) && !isFlagToken(token)
}

export function emptyFlags(): FlagSet {
  return {
    recursive: false,
    preview: false,
    force: false,
    interactive: false,
    tui: false,
    undo: false,
    hidden: false,
    ignoreCase: false,
  }
}

/**
 * Parse a raw command line (or pre-split tokens) into a typed command
 */
export function parse(input: string | string[], options: ParseOptions = {}): Result<ParsedCommand, ParseError> {
  let tokens: string[]
  if (typeof input === "string") {
    const tokenized = tokenize(input)
    if (!tokenized.ok) return tokenized
    tokens = tokenized.value
  } else {
    tokens = input
  }

  const groups = options.groups ?? defaultGroups
  if (!groups.isFrozen) groups.freeze()

  const head = parseCommand(tokens)
  if (!head.ok) return head
  let { command, next: i } = head.value

  // PATH
  let path = "."
  const pathToken = tokens[i]
  if (isOperandToken(pathToken)) {
    if (pathToken === "") {
      return err(new ParseError("MissingOperand", "PATH cannot be empty"))
    }
    path = pathToken
    i++
  }

  // Explicit destination for move/copy
  if (command.type === "move" || command.type === "copy") {
    const dest = tokens[i]
    if (!isOperandToken(dest) || dest === "") {
      return err(new ParseError("MissingOperand", `${command.type.toUpperCase()} needs a destination after PATH`))
    }
    command = { ...command, destination: dest }
    i++
  }

  const filters: FilterClause[] = []
  const routes: RouteClause[] = []
  const flags = emptyFlags()
  // 0 = filters, 1 = routes, 2 = flags; sections never go backwards
  let section = 0

  for (; i < tokens.length; i++) {
    const token = tokens[i] ?? ""

    if (isFlagToken(token)) {
      section = 2
      const applied = applyFlags(token, flags)
      if (!applied.ok) return applied
      continue
    }

    if (isRouteToken(token)) {
      if (section > 1) return outOfOrder(token, "Routes must come before flags")
      section = 1
      const route = parseRoute(token, routes)
      if (!route.ok) return route
      routes.push(route.value)
      continue
    }

    if (isFilterToken(token)) {
      if (section > 0) return outOfOrder(token, "Filters must come before routes and flags")
      const clauses = parseFilter(token, groups)
      if (!clauses.ok) return clauses
      filters.push(...clauses.value)
      continue
    }

    return err(new ParseError("UnexpectedToken", `Unexpected token: ${token}`, token))
  }

  return ok({ command, path, filters, routes, flags })
}

function outOfOrder(token: string, message: string): Result<never, ParseError> {
  return err(new ParseError("UnexpectedToken", `${message}: ${token}`, token))
}

interface CommandHead {
  command: Command
  next: number
}

function usage(message: string): Result<never, ParseError> {
  return err(new ParseError("MissingOperand", message))
}

function isInto(token: string | undefined): boolean {
  return token !== undefined && token.toUpperCase() === "INTO"
}

function parseCommand(tokens: string[]): Result<CommandHead, ParseError> {
  const first = tokens[0]
  if (first === undefined) return usage("Empty command")

  const keyword = first.toLowerCase()
  const style = CaseStyle.safeParse(keyword)
  if (style.success) {
    return ok({ command: { type: "case", style: style.data }, next: 1 })
  }

  switch (keyword) {
    case "clean":
      return ok({ command: { type: "clean" }, next: 1 })

    case "split": {
      const target = tokens[1]
      if (target === undefined) return usage("Usage: SPLIT <style>")
      const splitStyle = CaseStyle.safeParse(target.toLowerCase())
      if (!splitStyle.success) return err(ParseError.unknownCommand(`split ${target}`))
      return ok({ command: { type: "split", style: splitStyle.data }, next: 2 })
    }

    case "change": {
      const [, from, into, to] = tokens
      if (from === undefined || !isInto(into) || to === undefined) {
        return usage('Usage: CHANGE "<old>" INTO "<new>"')
      }
      if (from === "") return usage("CHANGE needs non-empty text to replace")
      return ok({ command: { type: "change", old: from, new: to, removal: to === "" }, next: 4 })
    }

    case "regex": {
      const [, pattern, into, replacement] = tokens
      if (pattern === undefined || !isInto(into) || replacement === undefined) {
        return usage('Usage: REGEX "<pattern>" INTO "<replacement>"')
      }
      if (pattern === "") return usage("REGEX needs a non-empty pattern")
      return ok({ command: { type: "regex", pattern, replacement }, next: 4 })
    }

    case "prefix": {
      const prefix = tokens[1]
      if (prefix === undefined || prefix === "") return usage('Usage: PREFIX "<text>"')
      return ok({ command: { type: "prefix", prefix }, next: 2 })
    }

    case "move":
    case "mv":
      return ok({ command: { type: "move", destination: "" }, next: 1 })
    case "copy":
    case "cp":
      return ok({ command: { type: "copy", destination: "" }, next: 1 })
    case "remove":
    case "rm":
      return ok({ command: { type: "remove" }, next: 1 })
    case "mkdir":
      return ok({ command: { type: "createDir" }, next: 1 })
    case "touch":
      return ok({ command: { type: "createFile" }, next: 1 })
    case "list":
    case "ls":
      return ok({ command: { type: "list" }, next: 1 })
    case "group":
      return ok({ command: { type: "group" }, next: 1 })
    case "flatten":
      return ok({ command: { type: "flatten" }, next: 1 })

    default:
      return err(ParseError.unknownCommand(first))
  }
}

/**
 * Parse KEYWORD:value, KEYWORD>value or KEYWORD<value.
 * FOR:<group> expands into the group's clauses.
 */
export function parseFilter(raw: string, groups: GroupRegistry = defaultGroups): Result<FilterClause[], ParseError> {
  const match = FILTER_PATTERN.exec(raw)
  const keywordText = match?.[1] ?? raw
  const comparator = match?.[2]
  const value = match?.[3] ?? ""

  const keyword = FilterKeyword.safeParse(keywordText)
  if (!keyword.success || comparator === undefined) {
    return err(ParseError.malformedFilter(keywordText, raw, "unknown keyword"))
  }
  if (comparator !== ":" && COLON_ONLY.has(keyword.data)) {
    return err(ParseError.malformedFilter(keyword.data, raw, `${keyword.data} only supports ':'`))
  }
  if (value === "") {
    return err(ParseError.malformedFilter(keyword.data, raw, "missing value"))
  }

  if (keyword.data === "FOR") {
    const expanded = groups.resolve(value)
    if (!expanded) {
      return err(ParseError.malformedFilter("FOR", raw, `unknown group; known: ${groups.names().join(", ")}`))
    }
    return ok(expanded)
  }

  if (keyword.data === "EXT") {
    const exts = value.split(",").map((ext) => ext.trim().replace(/^\./, ""))
    if (exts.some((ext) => ext === "")) {
      return err(ParseError.malformedFilter("EXT", raw, "empty extension"))
    }
    return ok([{ keyword: "EXT", comparator: ":", value: exts.join(",") }])
  }

  return ok([{ keyword: keyword.data, comparator: comparator === ":" ? ":" : comparator === ">" ? ">" : "<", value }])
}

/**
 * Parse TO:tool[:arg1,arg2], INTO:path or FORMAT:kind
 */
export function parseRoute(raw: string, seen: readonly RouteClause[] = []): Result<RouteClause, ParseError> {
  const colon = raw.indexOf(":")
  const key = raw.slice(0, colon)
  const value = raw.slice(colon + 1)

  switch (key) {
    case "TO": {
      const argsAt = value.indexOf(":")
      const tool = argsAt === -1 ? value : value.slice(0, argsAt)
      if (tool.trim() === "") return err(ParseError.malformedRoute(raw, "missing tool name"))
      const args =
        argsAt === -1
          ? []
          : value
              .slice(argsAt + 1)
              .split(",")
              .map((arg) => arg.trim())
              .filter((arg) => arg !== "")
      return ok({ type: "to", tool, args })
    }

    case "INTO":
      if (value === "") return err(ParseError.malformedRoute(raw, "missing output path"))
      return ok({ type: "into", path: value })

    case "FORMAT": {
      const format = FORMAT_ALIASES[value.toLowerCase()]
      if (!format) return err(ParseError.malformedRoute(raw, "expected json, csv, yaml or text"))
      if (seen.some((r) => r.type === "format")) {
        return err(ParseError.malformedRoute(raw, "FORMAT given more than once"))
      }
      return ok({ type: "format", format })
    }

    default:
      return err(ParseError.malformedRoute(raw))
  }
}

function applyFlags(token: string, flags: FlagSet): Result<FlagSet, ParseError> {
  for (const letter of token.slice(1)) {
    const flag = FLAG_LETTERS[letter]
    if (!flag) return err(ParseError.unknownFlag(letter))
    flags[flag] = true
  }
  return ok(flags)
}
