import { CompileError, err, ok, type Result } from "../core/errors"

const SIZE_UNITS: Readonly<Record<string, number>> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
}

/**
 * Parse a size literal like "500KB" or "2MB" into bytes (1024-based).
 * A bare integer is taken as bytes.
 */
export function parseSize(literal: string): Result<number, CompileError> {
  const match = /^(\d+)\s*([a-z]*)$/i.exec(literal.trim())
  const digits = match?.[1]
  if (!match || digits === undefined) {
    return err(new CompileError(`Invalid size: ${literal} (expected e.g. 500KB, 2MB)`, "SIZE", literal))
  }
  const unit = (match[2] ?? "").toUpperCase() || "B"
  const multiplier = SIZE_UNITS[unit]
  if (multiplier === undefined) {
    return err(new CompileError(`Invalid size unit: ${unit} (expected B, KB, MB, GB or TB)`, "SIZE", literal))
  }
  return ok(Number.parseInt(digits, 10) * multiplier)
}

/**
 * Validate a YYYY-MM-DD literal and return it as a sortable day key
 */
export function parseDay(literal: string, keyword = "MODIFIED"): Result<string, CompileError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(literal)
  if (!match) {
    return err(new CompileError(`Invalid date: ${literal} (expected YYYY-MM-DD)`, keyword, literal))
  }
  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const probe = new Date(year, month - 1, day)
  if (probe.getFullYear() !== year || probe.getMonth() !== month - 1 || probe.getDate() !== day) {
    return err(new CompileError(`Invalid date: ${literal} is not a calendar day`, keyword, literal))
  }
  return ok(literal)
}

/**
 * Local calendar day of a timestamp as YYYY-MM-DD
 */
export function dayKey(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0")
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

export function parseDepth(literal: string): Result<number, CompileError> {
  if (!/^\d+$/.test(literal)) {
    return err(new CompileError(`Invalid depth: ${literal} (expected a non-negative integer)`, "DEPTH", literal))
  }
  return ok(Number.parseInt(literal, 10))
}

/**
 * Human-readable byte count (1024-based), used in text listings
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  const units = ["KB", "MB", "GB", "TB"]
  let value = bytes / 1024
  let unit = 0
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024
    unit++
  }
  return `${value.toFixed(1)} ${units[unit]}`
}
