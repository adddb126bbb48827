import { ParseError, err, ok, type Result } from "../core/errors"

/**
 * Split a raw command line into tokens
 *
 * - Unquoted whitespace separates tokens
 * - "double" and 'single' quotes group text, including spaces
 * - Backslash escapes the next character (inside or outside quotes)
 * - "" yields an empty token
 */
export function tokenize(raw: string): Result<string[], ParseError> {
  const tokens: string[] = []
  let current = ""
  let inToken = false
  let quote: '"' | "'" | null = null

  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i)

    if (ch === "\\" && i + 1 < raw.length) {
      current += raw.charAt(i + 1)
      inToken = true
      i++
      continue
    }

    if (quote) {
      if (ch === quote) {
        quote = null
      } else {
        current += ch
      }
      continue
    }

    if (ch === '"' || ch === "'") {
      quote = ch
      inToken = true
      continue
    }

    if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current)
        current = ""
        inToken = false
      }
      continue
    }

    current += ch
    inToken = true
  }

  if (quote) {
    return err(new ParseError("UnterminatedQuote", `Unterminated ${quote} quote in: ${raw}`, raw))
  }
  if (inToken) tokens.push(current)

  return ok(tokens)
}
