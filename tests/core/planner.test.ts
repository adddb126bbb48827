import { describe, test, expect } from "vitest"
import { emptyFlags } from "../../tools/lib/grammar/parser"
import { plan, probePaths, type PlanContext } from "../../tools/lib/core/planner"
import type { Command, EntryType, ExistingEntry, FileMetadata, FlagSet } from "../../tools/lib/core/types"
import { buildTransform, type Transform } from "../../tools/lib/transform/registry"

const ROOT = "/work"

function entry(relativePath: string, type: EntryType = "file", identity = `1:${relativePath}`): FileMetadata {
  const name = relativePath.split("/").pop() ?? relativePath
  return {
    path: `${ROOT}/${relativePath}`,
    relativePath,
    name,
    type,
    size: 1,
    depth: relativePath.split("/").length,
    modified: new Date(2024, 0, 1),
    accessed: new Date(2024, 0, 1),
    identity,
  }
}

function context(existing: Record<string, ExistingEntry> = {}, fields: Partial<PlanContext> = {}): PlanContext {
  return { root: ROOT, rootType: "folder", existing: new Map(Object.entries(existing)), ...fields }
}

function flags(fields: Partial<FlagSet> = {}): FlagSet {
  return { ...emptyFlags(), ...fields }
}

function transform(command: Command): Transform | null {
  const result = buildTransform(command)
  if (!result.ok) throw result.error
  return result.value
}

const snake: Command = { type: "case", style: "snake" }

describe("transform plans", () => {
  test("renames within the same folder", () => {
    const ops = plan([entry("My File.txt")], snake, flags(), context(), { transform: transform(snake) })
    expect(ops).toHaveLength(1)
    expect(ops[0]).toMatchObject({ kind: "rename", source: "/work/My File.txt", destination: "/work/my_file.txt", state: "Ready" })
    expect(ops[0]?.opId).toMatch(/^rename-[0-9a-f]{8}$/)
  })

  test("an unchanged name is a NoOp", () => {
    const ops = plan([entry("already_snake.md")], snake, flags(), context(), { transform: transform(snake) })
    expect(ops[0]?.state).toBe("NoOp")
  })

  test("existing target is a conflict unless forced", () => {
    const existing = { "/work/my_file.txt": { identity: "9:9", type: "file" as const } }
    const blocked = plan([entry("My File.txt")], snake, flags(), context(existing), { transform: transform(snake) })
    expect(blocked[0]).toMatchObject({ state: "Conflict", reason: "target_exists" })

    const forced = plan([entry("My File.txt")], snake, flags({ force: true }), context(existing), { transform: transform(snake) })
    expect(forced[0]?.state).toBe("OverwriteAllowed")
  })

  test("same identity at the target is a case-only rename", () => {
    const existing = { "/work/readme.md": { identity: "1:README.md", type: "file" as const } }
    const lower: Command = { type: "case", style: "lower" }
    const ops = plan([entry("README.md")], lower, flags(), context(existing), { transform: transform(lower) })
    expect(ops[0]?.state).toBe("Ready")
  })

  test("two sources mapping to one target: the later one conflicts", () => {
    const ops = plan([entry("My File.txt"), entry("my-file.txt")], snake, flags(), context(), { transform: transform(snake) })
    expect(ops.map((op) => [op.source, op.state, op.reason])).toEqual([
      ["/work/My File.txt", "Ready", undefined],
      ["/work/my-file.txt", "Conflict", "duplicate_target"],
    ])
  })

  test("an empty result is an invalid name", () => {
    const change: Command = { type: "change", old: "IMG_", new: "", removal: true }
    const ops = plan([entry("IMG_.jpg"), entry("IMG_1.jpg")], change, flags(), context(), { transform: transform(change) })
    expect(ops[0]).toMatchObject({ source: "/work/IMG_.jpg", state: "Conflict", reason: "invalid_name" })
    expect(ops[1]).toMatchObject({ destination: "/work/1.jpg", state: "Ready" })
  })

  test("deepest entries are renamed first", () => {
    const ops = plan([entry("Top Dir", "folder"), entry("Top Dir/Inner File.md")], snake, flags(), context(), {
      transform: transform(snake),
    })
    expect(ops.map((op) => op.destination)).toEqual(["/work/Top Dir/inner_file.md", "/work/top_dir"])
  })
})

describe("move, copy and remove plans", () => {
  const move: Command = { type: "move", destination: "/archive" }

  test("destination mirrors the path below PATH", () => {
    const ops = plan([entry("a.txt"), entry("sub", "folder")], move, flags(), context({}, { destination: "/archive" }))
    expect(ops.map((op) => [op.kind, op.destination, op.state])).toEqual([
      ["move", "/archive/a.txt", "Ready"],
      ["move", "/archive/sub", "Ready"],
    ])
  })

  test("entries under a selected folder are covered by it", () => {
    const ops = plan([entry("sub", "folder"), entry("sub/b.txt")], move, flags(), context({}, { destination: "/archive" }))
    expect(ops.map((op) => op.source)).toEqual(["/work/sub"])
  })

  test("a single file moves into an existing folder or onto DEST itself", () => {
    const file = { ...entry("a.txt"), depth: 0 }
    const single = { rootType: "file" as const, root: "/work/a.txt", destination: "/archive" }

    const into = plan([file], move, flags(), context({ "/archive": { identity: "5:5", type: "folder" } }, single))
    expect(into[0]?.destination).toBe("/archive/a.txt")

    const onto = plan([file], move, flags(), context({}, single))
    expect(onto[0]?.destination).toBe("/archive")
  })

  test("copying a folder needs -r", () => {
    const copy: Command = { type: "copy", destination: "/archive" }
    const ops = plan([entry("sub", "folder")], copy, flags(), context({}, { destination: "/archive" }))
    expect(ops[0]).toMatchObject({ state: "Conflict", reason: "is_directory" })
    const recursive = plan([entry("sub", "folder")], copy, flags({ recursive: true }), context({}, { destination: "/archive" }))
    expect(recursive[0]?.state).toBe("Ready")
  })

  test("a folder cannot move into itself", () => {
    const inside: Command = { type: "move", destination: "/work/sub/nested" }
    const ops = plan([entry("sub", "folder")], inside, flags(), context({}, { destination: "/work/sub/nested" }))
    expect(ops[0]).toMatchObject({ state: "Conflict", reason: "inside_source" })
  })

  test("removing a folder needs -r; files have no destination", () => {
    const remove: Command = { type: "remove" }
    const ops = plan([entry("a.txt"), entry("sub", "folder")], remove, flags(), context())
    expect(ops.map((op) => [op.kind, op.destination, op.state, op.reason])).toEqual([
      ["remove", undefined, "Ready", undefined],
      ["remove", undefined, "Conflict", "is_directory"],
    ])
  })
})

describe("create, group and flatten plans", () => {
  test("mkdir and touch target PATH", () => {
    const missing = context({}, { root: "/work/new", rootType: null })
    expect(plan([], { type: "createDir" }, flags(), missing)[0]).toMatchObject({ kind: "createDir", destination: "/work/new", state: "Ready" })

    const present = context({ "/work/new": { identity: "3:3", type: "folder" } }, { root: "/work/new", rootType: "folder" })
    expect(plan([], { type: "createDir" }, flags(), present)[0]?.state).toBe("NoOp")
    expect(plan([], { type: "createFile" }, flags(), present)[0]).toMatchObject({ state: "Conflict", reason: "target_exists" })
  })

  test("group creates one folder per base name and moves files into it", () => {
    const ops = plan([entry("song.mp3"), entry("song.txt"), entry("cover.jpg"), entry("sub", "folder")], { type: "group" }, flags(), context())
    expect(ops.map((op) => [op.kind, op.source, op.destination])).toEqual([
      ["createDir", "/work/cover", "/work/cover"],
      ["move", "/work/cover.jpg", "/work/cover/cover.jpg"],
      ["createDir", "/work/song", "/work/song"],
      ["move", "/work/song.mp3", "/work/song/song.mp3"],
      ["move", "/work/song.txt", "/work/song/song.txt"],
    ])
    expect(ops.every((op) => op.state === "Ready")).toBe(true)
  })

  test("group reuses an existing folder and refuses a file in the way", () => {
    const existing = {
      "/work/song": { identity: "7:7", type: "folder" as const },
      "/work/notes": { identity: "1:notes", type: "file" as const },
    }
    const ops = plan([entry("song.mp3"), entry("notes")], { type: "group" }, flags(), context(existing))
    expect(ops.map((op) => [op.kind, op.source, op.state, op.reason])).toEqual([
      ["createDir", "/work/notes", "Conflict", "target_exists"],
      ["move", "/work/notes", "Conflict", "target_exists"],
      ["move", "/work/song.mp3", "Ready", undefined],
    ])
  })

  test("flatten moves nested files up to PATH", () => {
    const ops = plan([entry("a.txt"), entry("sub", "folder"), entry("sub/b.txt"), entry("sub/deep/a.txt")], { type: "flatten" }, flags(), context({ "/work/a.txt": { identity: "1:a.txt", type: "file" } }))
    expect(ops.map((op) => [op.source, op.destination, op.state, op.reason])).toEqual([
      ["/work/sub/b.txt", "/work/b.txt", "Ready", undefined],
      ["/work/sub/deep/a.txt", "/work/a.txt", "Conflict", "target_exists"],
    ])
  })

  test("list plans nothing", () => {
    expect(plan([entry("a.txt")], { type: "list" }, flags(), context())).toEqual([])
  })
})

describe("probePaths", () => {
  test("collects destinations, DEST and DEST/<name>", () => {
    const file = { ...entry("a.txt"), depth: 0 }
    const single = { root: "/work/a.txt", rootType: "file" as const, destination: "/archive" }
    const draft = plan([file], { type: "move", destination: "/archive" }, flags(), context({}, single))
    expect(probePaths(draft, single).sort()).toEqual(["/archive", "/archive/a.txt", "/work/a.txt"])
  })
})
