import { describe, test, expect, beforeEach, afterEach } from "vitest"
import fs from "fs"
import os from "os"
import path from "path"
import { currentIdentity, probe, scan } from "../../tools/lib/scan/crawler"
import { WorkerPool } from "../../tools/lib/scan/worker-pool"

let root: string

function setupFixtures() {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "mvkit-scan-"))
  fs.writeFileSync(path.join(root, "a.md"), "alpha")
  fs.writeFileSync(path.join(root, ".hidden"), "")
  fs.mkdirSync(path.join(root, "sub"))
  fs.writeFileSync(path.join(root, "sub", "b.txt"), "bravo!")
  fs.mkdirSync(path.join(root, "sub", "deep"))
  fs.writeFileSync(path.join(root, "sub", "deep", "c.txt"), "")
}

function cleanupFixtures() {
  fs.rmSync(root, { recursive: true, force: true })
}

beforeEach(setupFixtures)
afterEach(cleanupFixtures)

describe("scan", () => {
  test("non-recursive scan lists direct children, hidden entries skipped", async () => {
    const result = await scan(root)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.rootType).toBe("folder")
    expect(result.value.entries.map((e) => [e.relativePath, e.type, e.depth])).toEqual([
      ["a.md", "file", 1],
      ["sub", "folder", 1],
    ])
  })

  test("recursive scan walks everything, sorted by path", async () => {
    const result = await scan(root, { recursive: true, concurrency: 2 })
    if (!result.ok) throw result.error
    expect(result.value.entries.map((e) => [e.relativePath, e.depth])).toEqual([
      ["a.md", 1],
      ["sub", 1],
      [path.join("sub", "b.txt"), 2],
      [path.join("sub", "deep"), 2],
      [path.join("sub", "deep", "c.txt"), 3],
    ])
    const b = result.value.entries.find((e) => e.name === "b.txt")
    expect(b?.size).toBe(6)
  })

  test("includeHidden keeps dot entries", async () => {
    const result = await scan(root, { includeHidden: true })
    if (!result.ok) throw result.error
    expect(result.value.entries.map((e) => e.name)).toEqual([".hidden", "a.md", "sub"])
  })

  test("a file root is a single entry at depth 0", async () => {
    const result = await scan(path.join(root, "a.md"))
    if (!result.ok) throw result.error
    expect(result.value.rootType).toBe("file")
    expect(result.value.entries).toHaveLength(1)
    expect(result.value.entries[0]?.depth).toBe(0)
    expect(result.value.entries[0]?.size).toBe(5)
  })

  test("symlinks are reported, not followed", async () => {
    fs.symlinkSync(path.join(root, "sub"), path.join(root, "link"))
    const result = await scan(root, { recursive: true })
    if (!result.ok) throw result.error
    const link = result.value.entries.find((e) => e.name === "link")
    expect(link?.type).toBe("symlink")
    expect(result.value.entries.filter((e) => e.name === "b.txt")).toHaveLength(1)
  })

  test("a missing root is an execution error", async () => {
    const result = await scan(path.join(root, "missing"))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.exitCode).toBe(3)
  })
})

describe("probe", () => {
  test("reports identity and type of existing paths only", async () => {
    const found = await probe([path.join(root, "a.md"), path.join(root, "sub"), path.join(root, "nope")])
    expect(found.size).toBe(2)
    expect(found.get(path.join(root, "sub"))?.type).toBe("folder")
    expect(found.get(path.join(root, "a.md"))?.identity).toBe(currentIdentity(path.join(root, "a.md")))
    expect(currentIdentity(path.join(root, "nope"))).toBeNull()
  })
})

describe("WorkerPool", () => {
  test("never runs more tasks than its limit", async () => {
    const pool = new WorkerPool(2)
    let running = 0
    let peak = 0
    const task = async (value: number) => {
      running++
      peak = Math.max(peak, running)
      await new Promise((resolve) => setTimeout(resolve, 5))
      running--
      return value
    }
    const results = await Promise.all([1, 2, 3, 4, 5].map((n) => pool.execute(() => task(n))))
    expect(results).toEqual([1, 2, 3, 4, 5])
    expect(peak).toBe(2)
    expect(pool.getStats()).toEqual({ active: 0, queued: 0, max: 2 })
  })

  test("a failing task rejects without blocking the queue", async () => {
    const pool = new WorkerPool(1)
    const failing = pool.execute(() => Promise.reject(new Error("nope")))
    const next = pool.execute(() => Promise.resolve("ok"))
    await expect(failing).rejects.toThrow("nope")
    await expect(next).resolves.toBe("ok")
  })
})
