import { describe, test, expect } from "vitest"
import { tokenize } from "../../tools/lib/grammar/tokenizer"

function tokens(raw: string): string[] {
  const result = tokenize(raw)
  if (!result.ok) throw result.error
  return result.value
}

describe("tokenize", () => {
  test("splits on runs of whitespace", () => {
    expect(tokens("snake  ./notes\tEXT:md -r")).toEqual(["snake", "./notes", "EXT:md", "-r"])
  })

  test("double and single quotes group spaces", () => {
    expect(tokens(`kebab "My Docs" 'NAME:Read Me'`)).toEqual(["kebab", "My Docs", "NAME:Read Me"])
  })

  test("quotes can sit inside a token", () => {
    expect(tokens(`NAME:"Document Template"*`)).toEqual(["NAME:Document Template*"])
  })

  test("empty quotes yield an empty token", () => {
    expect(tokens(`change "IMG_" INTO ""`)).toEqual(["change", "IMG_", "INTO", ""])
  })

  test("backslash escapes quotes and spaces", () => {
    expect(tokens(`a\\ b "say \\"hi\\"" \\\\`)).toEqual(["a b", 'say "hi"', "\\"])
  })

  test("single quotes keep double quotes literally", () => {
    expect(tokens(`'he said "no"'`)).toEqual(['he said "no"'])
  })

  test("empty input yields no tokens", () => {
    expect(tokens("   ")).toEqual([])
  })

  test("unterminated quote is an error", () => {
    const result = tokenize(`snake "unfinished`)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe("UnterminatedQuote")
      expect(result.error.exitCode).toBe(2)
    }
  })
})
