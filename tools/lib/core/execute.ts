/**
 * execute.ts - Apply a plan, record it, and undo recorded batches
 *
 * Every mutation is re-validated against the plan first: a source whose
 * identity changed, or a destination that appeared since planning, skips
 * that operation only. The first I/O failure stops the batch; whatever was
 * applied before it is still recorded so it can be undone.
 */

import { cpSync, existsSync, mkdirSync, renameSync, rmSync, rmdirSync, writeFileSync } from "fs"
import path from "path"
import type { HistoryStore } from "../history/store"
import { currentIdentity } from "../scan/crawler"
import { ExecutionError, HistoryError, describeError, err, ok, type Result } from "./errors"
import { isActionable } from "./planner"
import type { AppliedOperation, BackupRecord, BatchStatus, HistoryEntry, PlannedOperation } from "./types"

export interface ExecuteOptions {
  store: HistoryStore
  command: string // raw command line, kept in history
  preview?: boolean
}

export interface SkippedOperation {
  op: PlannedOperation
  reason: string
}

export interface ExecutionReport {
  status: BatchStatus
  preview: boolean
  plan: PlannedOperation[]
  applied: AppliedOperation[]
  skipped: SkippedOperation[]
  failure?: { op: PlannedOperation; error: ExecutionError }
  entry?: HistoryEntry
  recordError?: HistoryError
  unrecordedBackups?: string // where the backups of an unrecorded batch were kept
}

export interface UndoReport {
  entry: HistoryEntry
  reverted: number
}

/**
 * Move a path, falling back to copy + delete across filesystems
 */
function relocate(from: string, to: string): void {
  try {
    renameSync(from, to)
  } catch (e) {
    if (!(e instanceof Error) || !("code" in e) || e.code !== "EXDEV") throw e
    cpSync(from, to, { recursive: true, verbatimSymlinks: true })
    rmSync(from, { recursive: true, force: true })
  }
}

/**
 * Create the missing parent folders of `target`, outermost first
 */
function ensureParents(target: string): string[] {
  const missing: string[] = []
  let dir = path.dirname(target)
  while (!existsSync(dir)) {
    missing.unshift(dir)
    const parent = path.dirname(dir)
    if (parent === dir) break
    dir = parent
  }
  for (const folder of missing) mkdirSync(folder)
  return missing
}

class Batch {
  readonly applied: AppliedOperation[] = []
  readonly backups: BackupRecord[] = []

  constructor(private readonly backupRoot: string) {}

  backup(op: PlannedOperation, original: string): BackupRecord {
    const backupPath = path.join(this.backupRoot, op.opId, path.basename(original))
    mkdirSync(path.dirname(backupPath), { recursive: true })
    relocate(original, backupPath)
    const record = { originalPath: original, backupPath }
    this.backups.push(record)
    return record
  }

  restore(record: BackupRecord): void {
    relocate(record.backupPath, record.originalPath)
    this.backups.splice(this.backups.indexOf(record), 1)
  }

  parents(op: PlannedOperation, target: string): void {
    for (const [index, folder] of ensureParents(target).entries()) {
      this.applied.push({ opId: `${op.opId}-parent${index}`, kind: "createDir", source: folder, destination: folder, overwrote: false })
    }
  }

  run(op: PlannedOperation): void {
    const { kind, source } = op
    const destination = op.destination ?? source
    const overwrite = op.state === "OverwriteAllowed"
    let backup: BackupRecord | undefined

    switch (kind) {
      case "rename":
      case "move":
      case "copy": {
        this.parents(op, destination)
        if (overwrite && currentIdentity(destination) !== null) backup = this.backup(op, destination)
        try {
          if (kind === "copy") cpSync(source, destination, { recursive: true, verbatimSymlinks: true, errorOnExist: true, force: false })
          else relocate(source, destination)
        } catch (e) {
          if (backup) this.restore(backup)
          throw e
        }
        break
      }
      case "remove":
        backup = this.backup(op, source)
        break
      case "createDir":
        this.parents(op, destination)
        mkdirSync(destination)
        break
      case "createFile":
        this.parents(op, destination)
        writeFileSync(destination, "", { flag: "wx" })
        break
    }

    this.applied.push({ opId: op.opId, kind, source, destination: op.destination, overwrote: backup !== undefined && kind !== "remove", backup })
  }
}

/**
 * Why a planned operation can no longer run as planned, or null
 */
function drift(op: PlannedOperation): string | null {
  if (op.sourceIdentity !== undefined && currentIdentity(op.source) !== op.sourceIdentity) {
    return "source changed since planning"
  }
  if (op.state === "Ready" && op.destination !== undefined) {
    const occupant = currentIdentity(op.destination)
    if (occupant !== null && occupant !== op.sourceIdentity) return "destination appeared since planning"
  }
  return null
}

/**
 * Execute a plan. Preview writes nothing; apply runs every Ready and
 * OverwriteAllowed operation in order and records what was applied.
 */
export function execute(plan: PlannedOperation[], options: ExecuteOptions): ExecutionReport {
  const preview = options.preview ?? false
  const report: ExecutionReport = { status: "nothing", preview, plan, applied: [], skipped: [] }
  if (preview) return report

  const batchDir = options.store.batchDir()
  const batch = new Batch(batchDir)

  for (const op of plan) {
    if (!isActionable(op)) continue
    const reason = drift(op)
    if (reason) {
      console.error(`[executor] Skipping ${op.source}: ${reason}`)
      report.skipped.push({ op, reason })
      continue
    }
    try {
      batch.run(op)
    } catch (e) {
      const error = new ExecutionError(`${op.kind} ${op.source} failed: ${describeError(e)}`, op.source, e)
      console.error(`[executor] ${error.message}; stopping batch`)
      report.failure = { op, error }
      break
    }
  }

  report.applied = batch.applied
  if (batch.applied.length === 0) return report
  report.status = report.failure ? "partial" : "complete"

  const recorded = options.store.record({ command: options.command, operations: batch.applied, backups: batch.backups })
  if (recorded.ok) report.entry = recorded.value
  else {
    console.error(`[executor] Batch not recorded: ${recorded.error.message}`)
    report.recordError = recorded.error
    if (batch.backups.length > 0) {
      const kept = options.store.setAside(batchDir)
      if (kept.ok) {
        console.error(`[executor] Backups kept in ${kept.value}`)
        report.unrecordedBackups = kept.value
      } else console.error(`[executor] ${kept.error.message}`)
    }
  }
  return report
}

/**
 * Refuse to restore onto a path something else occupies now
 */
function ensureVacant(target: string, self: string | null = null): void {
  const occupant = currentIdentity(target)
  if (occupant !== null && occupant !== self) throw new Error(`${target} is occupied; move it away and undo again`)
}

function revert(op: AppliedOperation): void {
  const destination = op.destination ?? op.source
  switch (op.kind) {
    case "rename":
    case "move": {
      const moved = currentIdentity(destination)
      if (moved === null) throw new Error(`${destination} no longer exists`)
      ensureVacant(op.source, moved)
      relocate(destination, op.source)
      if (op.backup) relocate(op.backup.backupPath, op.backup.originalPath)
      break
    }
    case "copy":
      rmSync(destination, { recursive: true, force: true })
      if (op.backup) relocate(op.backup.backupPath, op.backup.originalPath)
      break
    case "remove":
      if (!op.backup) throw new Error(`no backup recorded for ${op.source}`)
      ensureVacant(op.backup.originalPath)
      ensureParents(op.backup.originalPath)
      relocate(op.backup.backupPath, op.backup.originalPath)
      break
    case "createDir":
      rmdirSync(destination)
      break
    case "createFile":
      rmSync(destination)
      break
  }
}

/**
 * Undo the most recent batch that has not been undone: reverse its
 * operations in reverse order, restore backups, then mark it undone. Each
 * reverted operation is recorded as it goes, so an undo that stops partway
 * picks up where it left off next time.
 */
export function undo(store: HistoryStore): Result<UndoReport> {
  if (store.error) return err(store.error)
  const entry = store.latestUndoable()
  if (!entry) return err(new HistoryError("Nothing to undo"))

  let reverted = 0
  for (const op of [...entry.operations].reverse()) {
    if (entry.reverted.includes(op.opId)) continue
    try {
      revert(op)
    } catch (e) {
      return err(
        new ExecutionError(
          `Undo of #${entry.id} stopped at ${op.kind} ${op.source} after ${reverted} operation(s): ${describeError(e)}`,
          op.source,
          e
        )
      )
    }
    const noted = store.markReverted(entry.id, op.opId)
    if (!noted.ok) return noted
    reverted++
  }

  const marked = store.markUndone(entry.id)
  if (!marked.ok) return marked
  return ok({ entry, reverted })
}
