import { describe, test, expect } from "vitest"
import yaml from "js-yaml"
import type { FileMetadata, PlannedOperation } from "../../tools/lib/core/types"
import { SubprocessDelegate, delegateArgs, delegateInput } from "../../tools/lib/route/delegate"
import { hasDelegation, resolve } from "../../tools/lib/route/dispatch"
import { entriesListing, planListing, serialize } from "../../tools/lib/route/serializers"

const op: PlannedOperation = {
  opId: "rename-0000abcd",
  kind: "rename",
  source: "/d/a.txt",
  destination: "/d/b.txt",
  state: "Ready",
}

const conflict: PlannedOperation = {
  opId: "rename-0000beef",
  kind: "rename",
  source: "/d/c.txt",
  destination: "/d/b.txt",
  state: "Conflict",
  reason: "duplicate_target",
}

describe("resolve", () => {
  test("routes become effects in order, FORMAT applying to INTO", () => {
    expect(
      resolve([
        { type: "to", tool: "grep", args: ["-n"] },
        { type: "into", path: "out.json" },
        { type: "format", format: "json" },
      ])
    ).toEqual([
      { kind: "delegate", tool: "grep", args: ["-n"] },
      { kind: "write", path: "out.json", format: "json" },
    ])
  })

  test("INTO without FORMAT writes text", () => {
    expect(resolve([{ type: "into", path: "out.txt" }])).toEqual([{ kind: "write", path: "out.txt", format: "text" }])
  })

  test("FORMAT alone prints", () => {
    const effects = resolve([{ type: "format", format: "csv" }])
    expect(effects).toEqual([{ kind: "print", format: "csv" }])
    expect(hasDelegation(effects)).toBe(false)
  })

  test("no routes, no effects", () => {
    expect(resolve([])).toEqual([])
  })
})

describe("serialize", () => {
  const listing = planListing("snake", ".", [op, conflict])

  test("csv has a header and one line per operation", () => {
    expect(serialize(listing, "csv").split("\n")).toEqual([
      "source,destination,kind,state,reason",
      "/d/a.txt,/d/b.txt,rename,Ready,",
      "/d/c.txt,/d/b.txt,rename,Conflict,duplicate_target",
    ])
  })

  test("json carries command, path and rows", () => {
    expect(JSON.parse(serialize(listing, "json"))).toEqual({
      command: "snake",
      path: ".",
      rows: [
        { source: "/d/a.txt", destination: "/d/b.txt", kind: "rename", state: "Ready", reason: "" },
        { source: "/d/c.txt", destination: "/d/b.txt", kind: "rename", state: "Conflict", reason: "duplicate_target" },
      ],
    })
  })

  test("yaml loads back to the same rows", () => {
    const text = serialize(listing, "yaml")
    expect(text.split("\n")[0]).toBe("command: snake")
    expect(yaml.load(text)).toEqual(JSON.parse(serialize(listing, "json")))
  })

  test("text shows state, kind and target", () => {
    expect(serialize(listing, "text").split("\n")).toEqual([
      "[Ready] rename /d/a.txt -> /d/b.txt",
      "[Conflict] rename /d/c.txt -> /d/b.txt (duplicate_target)",
    ])
  })

  test("entry listings show type, size and path", () => {
    const entry: FileMetadata = {
      path: "/d/a.txt",
      relativePath: "a.txt",
      name: "a.txt",
      type: "file",
      size: 2048,
      depth: 1,
      modified: new Date(Date.UTC(2024, 2, 15)),
      accessed: new Date(Date.UTC(2024, 2, 15)),
      identity: "1:2",
    }
    const entries = entriesListing("list", ".", [entry])
    expect(serialize(entries, "text")).toBe(`file${" ".repeat(8)}2.0 KB  a.txt`)
    expect(serialize(entries, "csv").split("\n")).toEqual(["path,type,size,modified", "a.txt,file,2048,2024-03-15T00:00:00.000Z"])
  })
})

describe("delegation", () => {
  test("scan path goes first, paths go on stdin one per line", () => {
    expect(delegateArgs("./notes", ["-n"])).toEqual(["./notes", "-n"])
    expect(delegateInput(["/a", "/b"])).toBe("/a\n/b\n")
    expect(delegateInput([])).toBe("")
  })

  test("subprocess receives stdin and returns stdout", () => {
    const result = new SubprocessDelegate().invoke({
      tool: process.execPath,
      args: ["-e", "process.stdin.pipe(process.stdout)"],
      input: "/a\n/b\n",
    })
    expect(result).toEqual({ ok: true, value: { stdout: "/a\n/b\n", stderr: "", exitStatus: 0 } })
  })

  test("non-zero exit is a delegation error with stderr verbatim", () => {
    const result = new SubprocessDelegate().invoke({
      tool: process.execPath,
      args: ["-e", "process.stderr.write('boom'); process.exit(3)"],
      input: "",
    })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.exitStatus).toBe(3)
      expect(result.error.stderr).toBe("boom")
      expect(result.error.exitCode).toBe(1)
    }
  })

  test("a missing tool is a delegation error", () => {
    const result = new SubprocessDelegate().invoke({ tool: "mvkit-test-no-such-tool", args: [], input: "" })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.tool).toBe("mvkit-test-no-such-tool")
      expect(result.error.exitStatus).toBeNull()
    }
  })
})
