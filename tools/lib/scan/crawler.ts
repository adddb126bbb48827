/**
 * crawler.ts - Metadata snapshot of a scan root
 *
 * Entries are read with lstat, so symlinks are reported as symlinks and
 * never followed. The snapshot is taken once; later stages work from it.
 */

import { lstatSync, type Stats } from "fs"
import { lstat, readdir } from "fs/promises"
import path from "path"
import { ExecutionError, describeError, err, ok, type Result } from "../core/errors"
import type { EntryType, ExistingEntry, FileMetadata } from "../core/types"
import { DEFAULT_MAX_WORKERS, WorkerPool } from "./worker-pool"

export interface ScanOptions {
  recursive?: boolean
  includeHidden?: boolean
  concurrency?: number
}

export interface ScanResult {
  root: string // absolute
  rootType: EntryType
  entries: FileMetadata[] // sorted by path
}

export function entryType(stats: Stats): EntryType {
  if (stats.isSymbolicLink()) return "symlink"
  if (stats.isDirectory()) return "folder"
  if (stats.isFile()) return "file"
  return "other"
}

export function identityOf(stats: Stats): string {
  return `${stats.dev}:${stats.ino}`
}

function toMetadata(absPath: string, relativePath: string, depth: number, stats: Stats): FileMetadata {
  const type = entryType(stats)
  return {
    path: absPath,
    relativePath,
    name: path.basename(absPath),
    type,
    size: type === "folder" ? 0 : stats.size,
    depth,
    modified: stats.mtime,
    accessed: stats.atime,
    identity: identityOf(stats),
  }
}

function byPath(a: FileMetadata, b: FileMetadata): number {
  if (a.path === b.path) return 0
  return a.path < b.path ? -1 : 1
}

/**
 * Scan a root. A root naming a file (or symlink) yields that single entry at
 * depth 0; a folder yields its children (depth 1), and with `recursive`
 * everything below. Unreadable subfolders are skipped with a log line; an
 * unreadable root is an error.
 */
export async function scan(root: string, options: ScanOptions = {}): Promise<Result<ScanResult, ExecutionError>> {
  const absRoot = path.resolve(root)

  let rootStats: Stats
  try {
    rootStats = await lstat(absRoot)
  } catch (e) {
    return err(new ExecutionError(`Cannot access ${root}: ${describeError(e)}`, absRoot, e))
  }

  const rootType = entryType(rootStats)
  if (rootType !== "folder") {
    return ok({ root: absRoot, rootType, entries: [toMetadata(absRoot, path.basename(absRoot), 0, rootStats)] })
  }

  const pool = new WorkerPool(options.concurrency ?? DEFAULT_MAX_WORKERS)
  const entries: FileMetadata[] = []

  async function walk(dir: string, depth: number): Promise<void> {
    let names: string[]
    try {
      names = await pool.execute(() => readdir(dir))
    } catch (e) {
      if (dir === absRoot) throw e
      console.error(`[scanner] Skipping unreadable folder ${dir}: ${describeError(e)}`)
      return
    }

    const children: Promise<void>[] = []
    for (const name of names) {
      if (!options.includeHidden && name.startsWith(".")) continue
      const full = path.join(dir, name)
      children.push(
        pool
          .execute(() => lstat(full))
          .then(
            async (stats) => {
              const meta = toMetadata(full, path.relative(absRoot, full), depth, stats)
              entries.push(meta)
              if (meta.type === "folder" && options.recursive) await walk(full, depth + 1)
            },
            (e: unknown) => {
              console.error(`[scanner] Skipping ${full}: ${describeError(e)}`)
            }
          )
      )
    }
    await Promise.all(children)
  }

  try {
    await walk(absRoot, 1)
  } catch (e) {
    return err(new ExecutionError(`Cannot read ${root}: ${describeError(e)}`, absRoot, e))
  }

  entries.sort(byPath)
  return ok({ root: absRoot, rootType, entries })
}

/**
 * What currently exists at each of the given paths (lstat, not followed).
 * Absent paths are left out of the map.
 */
export async function probe(paths: Iterable<string>): Promise<Map<string, ExistingEntry>> {
  const unique = [...new Set(paths)]
  const found = new Map<string, ExistingEntry>()
  await Promise.all(
    unique.map(async (p) => {
      const stats = await lstat(p).catch(() => null)
      if (stats) found.set(p, { identity: identityOf(stats), type: entryType(stats) })
    })
  )
  return found
}

/**
 * Current identity of a path, or null when nothing is there
 */
export function currentIdentity(p: string): string | null {
  try {
    return identityOf(lstatSync(p))
  } catch {
    return null
  }
}
