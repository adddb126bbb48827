/**
 * errors.ts - Typed failures and the Result shape used across the core
 *
 * Every error carries a code; the entry point maps codes to exit statuses:
 *   0 success, 1 general error, 2 parse error, 3 file-operation error
 */

export type Result<T, E extends Error = MvkitError> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

export type ErrorCode = "parse" | "compile" | "execution" | "delegation" | "history" | "config" | "usage"

export abstract class MvkitError extends Error {
  abstract readonly code: ErrorCode

  get exitCode(): number {
    switch (this.code) {
      case "parse":
      case "compile":
        return 2
      case "execution":
        return 3
      default:
        return 1
    }
  }
}

export type ParseErrorKind =
  | "UnknownCommand"
  | "MalformedFilter"
  | "MalformedRoute"
  | "UnknownFlag"
  | "UnexpectedToken"
  | "MissingOperand"
  | "UnterminatedQuote"

export class ParseError extends MvkitError {
  readonly code = "parse"

  constructor(
    readonly kind: ParseErrorKind,
    message: string,
    readonly token?: string,
    readonly keyword?: string
  ) {
    super(message)
    this.name = "ParseError"
  }

  static unknownCommand(token: string): ParseError {
    return new ParseError("UnknownCommand", `Unknown command: ${token}`, token)
  }

  static malformedFilter(keyword: string, raw: string, detail?: string): ParseError {
    const suffix = detail ? ` (${detail})` : ""
    return new ParseError("MalformedFilter", `Malformed filter ${keyword}: ${raw}${suffix}`, raw, keyword)
  }

  static malformedRoute(raw: string, detail?: string): ParseError {
    const suffix = detail ? ` (${detail})` : ""
    return new ParseError("MalformedRoute", `Malformed route: ${raw}${suffix}`, raw)
  }

  static unknownFlag(char: string): ParseError {
    return new ParseError("UnknownFlag", `Unknown flag: -${char}`, char)
  }
}

export class CompileError extends MvkitError {
  readonly code = "compile"

  constructor(
    message: string,
    readonly keyword?: string,
    readonly value?: string
  ) {
    super(message)
    this.name = "CompileError"
  }
}

export class ExecutionError extends MvkitError {
  readonly code = "execution"

  constructor(
    message: string,
    readonly path?: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = "ExecutionError"
  }
}

export class DelegationError extends MvkitError {
  readonly code = "delegation"

  constructor(
    message: string,
    readonly tool: string,
    readonly exitStatus: number | null = null,
    readonly stderr = ""
  ) {
    super(message)
    this.name = "DelegationError"
  }
}

export class HistoryError extends MvkitError {
  readonly code = "history"

  constructor(message: string) {
    super(message)
    this.name = "HistoryError"
  }
}

export class ConfigError extends MvkitError {
  readonly code = "config"

  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

// A valid request this build does not carry out (external REPL/TUI)
export class UsageError extends MvkitError {
  readonly code = "usage"

  constructor(message: string) {
    super(message)
    this.name = "UsageError"
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
