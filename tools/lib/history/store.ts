/**
 * store.ts - Persistent operation history
 *
 * Entries live in an arena keyed by sequence id and are persisted as an
 * append-only JSONL log:
 *
 *   {"type":"entry","entry":{...}}   one executed batch
 *   {"type":"revert","id":3,"opId":...} one op of batch 3 was reverted
 *   {"type":"undo","id":3,"at":...}  batch 3 was undone
 *   {"type":"evict","id":1,"at":...} batch 1 fell out of the window
 *   {"type":"meta","nextId":7}       header written by compaction
 *
 * Backups for batch N live under backups/N/<opId>/. Evicting or undoing a
 * batch deletes its backup folder. A batch whose entry could not be written
 * has its folder renamed to backups/unrecorded-<ms>/, which is never
 * collected.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, readdirSync, renameSync, rmSync, writeFileSync } from "fs"
import { basename, dirname, join } from "path"
import { HistoryError, describeError, err, ok, type Result } from "../core/errors"
import { HistoryRecord, type AppliedOperation, type BackupRecord, type HistoryEntry } from "../core/types"

export interface HistoryStoreOptions {
  root: string // directory holding history.jsonl and backups/
  maxSize: number
}

export interface EntryDraft {
  command: string
  operations: AppliedOperation[]
  backups: BackupRecord[]
}

const NUMERIC = /^\d+$/

export class HistoryStore {
  readonly logPath: string
  readonly backupDir: string
  readonly maxSize: number

  private readonly entries = new Map<number, HistoryEntry>()
  private nextId = 1
  private loadError: HistoryError | null = null

  constructor(options: HistoryStoreOptions) {
    this.logPath = join(options.root, "history.jsonl")
    this.backupDir = join(options.root, "backups")
    this.maxSize = Math.max(1, options.maxSize)
  }

  /**
   * Replay the log into memory and collect orphaned backups. A log that does
   * not parse leaves the store unusable: nothing can be recorded or undone.
   */
  load(): Result<void, HistoryError> {
    this.entries.clear()
    this.nextId = 1
    this.loadError = null

    if (existsSync(this.logPath)) {
      let content: string
      try {
        content = readFileSync(this.logPath, "utf-8")
      } catch (e) {
        return this.fail(`Cannot read history log ${this.logPath}: ${describeError(e)}`)
      }

      const lines = content.split("\n")
      for (const [index, line] of lines.entries()) {
        if (line.trim() === "") continue
        let json: unknown
        try {
          json = JSON.parse(line)
        } catch {
          return this.fail(`Corrupt history log ${this.logPath}: line ${index + 1} is not JSON`)
        }
        const record = HistoryRecord.safeParse(json)
        if (!record.success) {
          return this.fail(`Corrupt history log ${this.logPath}: line ${index + 1} is not a history record`)
        }
        this.apply(record.data)
      }
    }

    this.collectOrphans()
    return ok(undefined)
  }

  private fail(message: string): Result<never, HistoryError> {
    this.entries.clear()
    this.loadError = new HistoryError(message)
    return err(this.loadError)
  }

  private apply(record: HistoryRecord): void {
    switch (record.type) {
      case "meta":
        this.nextId = Math.max(this.nextId, record.nextId)
        break
      case "entry":
        this.entries.set(record.entry.id, record.entry)
        this.nextId = Math.max(this.nextId, record.entry.id + 1)
        break
      case "revert": {
        const entry = this.entries.get(record.id)
        if (entry && !entry.reverted.includes(record.opId)) entry.reverted.push(record.opId)
        break
      }
      case "undo": {
        const entry = this.entries.get(record.id)
        if (entry) entry.undone = true
        break
      }
      case "evict":
        this.entries.delete(record.id)
        break
    }
  }

  get healthy(): boolean {
    return this.loadError === null
  }

  get error(): HistoryError | null {
    return this.loadError
  }

  /**
   * Folder the next batch keeps its backups in. Batches that cannot be
   * recorded get a folder of their own that is never collected.
   */
  batchDir(): string {
    if (this.loadError) return join(this.backupDir, `unrecorded-${Date.now()}`)
    return join(this.backupDir, String(this.nextId))
  }

  list(): HistoryEntry[] {
    return [...this.entries.values()].sort((a, b) => a.id - b.id)
  }

  get(id: number): HistoryEntry | null {
    return this.entries.get(id) ?? null
  }

  /**
   * Most recent entry that has not been undone
   */
  latestUndoable(): HistoryEntry | null {
    let latest: HistoryEntry | null = null
    for (const entry of this.entries.values()) {
      if (!entry.undone && (latest === null || entry.id > latest.id)) latest = entry
    }
    return latest
  }

  /**
   * Append a batch with the next sequence id, then evict the oldest entries
   * beyond maxSize.
   */
  record(draft: EntryDraft): Result<HistoryEntry, HistoryError> {
    if (this.loadError) return err(this.loadError)

    const entry: HistoryEntry = {
      id: this.nextId,
      createdAt: new Date().toISOString(),
      command: draft.command,
      operations: draft.operations,
      backups: draft.backups,
      reverted: [],
      undone: false,
    }

    const appended = this.append({ type: "entry", entry })
    if (!appended.ok) return appended

    this.entries.set(entry.id, entry)
    this.nextId = entry.id + 1

    const evicted = this.evictOverflow()
    if (!evicted.ok) return evicted
    return ok(entry)
  }

  markUndone(id: number): Result<void, HistoryError> {
    if (this.loadError) return err(this.loadError)
    const entry = this.entries.get(id)
    if (!entry) return err(new HistoryError(`No history entry ${id}`))

    const appended = this.append({ type: "undo", id, at: new Date().toISOString() })
    if (!appended.ok) return appended
    entry.undone = true
    this.deleteBackups(id)
    return ok(undefined)
  }

  /**
   * Note that one operation of a batch has been reverted, so an undo that
   * stops partway resumes after it.
   */
  markReverted(id: number, opId: string): Result<void, HistoryError> {
    if (this.loadError) return err(this.loadError)
    const entry = this.entries.get(id)
    if (!entry) return err(new HistoryError(`No history entry ${id}`))
    if (entry.reverted.includes(opId)) return ok(undefined)

    const appended = this.append({ type: "revert", id, opId })
    if (!appended.ok) return appended
    entry.reverted.push(opId)
    return ok(undefined)
  }

  /**
   * Move the backups of a batch that could not be recorded out of the
   * numbered folders, so orphan collection leaves them alone. Returns the
   * folder they now live in.
   */
  setAside(batchDir: string): Result<string, HistoryError> {
    if (!existsSync(batchDir) || !NUMERIC.test(basename(batchDir))) return ok(batchDir)
    const target = join(this.backupDir, `unrecorded-${Date.now()}`)
    try {
      renameSync(batchDir, target)
    } catch (e) {
      return err(new HistoryError(`Cannot keep backups of unrecorded batch ${batchDir}: ${describeError(e)}`))
    }
    return ok(target)
  }

  private evictOverflow(): Result<void, HistoryError> {
    const ids = this.list().map((entry) => entry.id)
    const overflow = ids.slice(0, Math.max(0, ids.length - this.maxSize))
    if (overflow.length === 0) return ok(undefined)

    for (const id of overflow) {
      const appended = this.append({ type: "evict", id, at: new Date().toISOString() })
      if (!appended.ok) return appended
      this.entries.delete(id)
      this.deleteBackups(id)
    }
    return this.compact()
  }

  /**
   * Rewrite the log as a meta header plus the live entries. The new log is
   * written beside the old one and renamed over it.
   */
  compact(): Result<void, HistoryError> {
    if (this.loadError) return err(this.loadError)
    const records: HistoryRecord[] = [
      { type: "meta", nextId: this.nextId },
      ...this.list().map((entry): HistoryRecord => ({ type: "entry", entry })),
    ]
    const tmp = `${this.logPath}.tmp`
    try {
      writeFileSync(tmp, records.map((r) => JSON.stringify(r)).join("\n") + "\n")
      renameSync(tmp, this.logPath)
    } catch (e) {
      return err(new HistoryError(`Cannot compact history log: ${describeError(e)}`))
    }
    return ok(undefined)
  }

  private append(record: HistoryRecord): Result<void, HistoryError> {
    try {
      mkdirSync(dirname(this.logPath), { recursive: true })
      appendFileSync(this.logPath, JSON.stringify(record) + "\n")
    } catch (e) {
      return err(new HistoryError(`Cannot write history log ${this.logPath}: ${describeError(e)}`))
    }
    return ok(undefined)
  }

  private deleteBackups(id: number): void {
    rmSync(join(this.backupDir, String(id)), { recursive: true, force: true })
  }

  /**
   * Remove numeric backup folders no live, undoable entry refers to
   */
  private collectOrphans(): void {
    if (!existsSync(this.backupDir)) return
    let removed = 0
    for (const name of readdirSync(this.backupDir)) {
      if (!NUMERIC.test(name)) continue
      const entry = this.entries.get(Number(name))
      if (entry && !entry.undone) continue
      rmSync(join(this.backupDir, name), { recursive: true, force: true })
      removed++
    }
    if (removed > 0) console.error(`[history] Removed ${removed} orphaned backup folder(s)`)
  }
}
