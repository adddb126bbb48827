/**
 * session.ts - One invocation end to end
 *
 *   parse -> compile -> scan -> select -> (delegate | plan -> execute) -> effects
 *
 * The session never prints. It returns what happened, plus the text produced
 * by FORMAT routes; the CLI decides how to show the rest.
 */

import { writeFileSync } from "fs"
import path from "path"
import { compile } from "../filter/predicate"
import type { GroupRegistry } from "../grammar/groups"
import { parse } from "../grammar/parser"
import type { HistoryStore } from "../history/store"
import { delegateArgs, delegateInput, type Delegate, type DelegateOutput } from "../route/delegate"
import { hasDelegation, resolve, type Effect } from "../route/dispatch"
import { entriesListing, planListing, serialize, type Listing } from "../route/serializers"
import { probe, scan } from "../scan/crawler"
import type { BoundaryStrategy } from "../transform/boundaries"
import { buildTransform } from "../transform/registry"
import { ExecutionError, UsageError, describeError, err, ok, type MvkitError, type Result } from "./errors"
import { execute, undo, type ExecutionReport, type UndoReport } from "./execute"
import { plan, probePaths, type PlanContext } from "./planner"
import type { FileMetadata, HistoryEntry, ParsedCommand, PlannedOperation } from "./types"

export interface SessionDeps {
  store: HistoryStore
  delegate: Delegate
  cwd?: string
  groups?: GroupRegistry
  strategy?: BoundaryStrategy
  scanConcurrency?: number
  includeHidden?: boolean
}

export interface RunOutcome {
  exitCode: number
  parsed?: ParsedCommand
  selection: FileMetadata[]
  plan: PlannedOperation[]
  report?: ExecutionReport
  undo?: UndoReport
  delegated: DelegateOutput[]
  printed: string[] // output of FORMAT routes without INTO
  written: string[] // files written by INTO routes
  error?: MvkitError
}

function outcome(fields: Partial<RunOutcome> = {}): RunOutcome {
  return { exitCode: 0, selection: [], plan: [], delegated: [], printed: [], written: [], ...fields }
}

function failed(error: MvkitError, fields: Partial<RunOutcome> = {}): RunOutcome {
  return outcome({ ...fields, exitCode: error.exitCode, error })
}

/**
 * Quote tokens back into a single command line for history
 */
export function renderCommand(raw: string | string[]): string {
  if (typeof raw === "string") return raw.trim()
  return raw.map((token) => (token === "" || /[\s"'\\]/.test(token) ? JSON.stringify(token) : token)).join(" ")
}

function commandLabel(parsed: ParsedCommand): string {
  const { command } = parsed
  if (command.type === "case") return command.style
  if (command.type === "split") return `split ${command.style}`
  return command.type
}

/**
 * Render a listing through every print/write effect. Returns the printed
 * text and written paths, or an error from a failed write.
 */
function emit(
  listing: Listing,
  effects: Effect[],
  cwd: string
): { printed: string[]; written: string[]; error?: ExecutionError } {
  const printed: string[] = []
  const written: string[] = []
  for (const effect of effects) {
    if (effect.kind === "print") printed.push(serialize(listing, effect.format))
    if (effect.kind === "write") {
      const target = path.resolve(cwd, effect.path)
      try {
        writeFileSync(target, serialize(listing, effect.format) + "\n")
      } catch (e) {
        return { printed, written, error: new ExecutionError(`Cannot write ${target}: ${describeError(e)}`, target, e) }
      }
      written.push(target)
    }
  }
  return { printed, written }
}

export async function run(raw: string | string[], deps: SessionDeps): Promise<RunOutcome> {
  const cwd = deps.cwd ?? process.cwd()

  const parsedResult = parse(raw, { groups: deps.groups })
  if (!parsedResult.ok) return failed(parsedResult.error)
  const parsed = parsedResult.value
  const { command, flags } = parsed

  if (flags.undo) {
    const undone = undo(deps.store)
    if (!undone.ok) return failed(undone.error, { parsed })
    return outcome({ parsed, undo: undone.value })
  }
  if (flags.interactive || flags.tui) {
    const mode = flags.tui ? "-T (full-screen browser)" : "-I (interactive shell)"
    return failed(new UsageError(`${mode} is provided by a separate program; run the command without it`), { parsed })
  }

  const predicate = compile(parsed.filters, { ignoreCase: flags.ignoreCase, groups: deps.groups })
  if (!predicate.ok) return failed(predicate.error, { parsed })
  const transform = buildTransform(command, { strategy: deps.strategy })
  if (!transform.ok) return failed(transform.error, { parsed })

  const root = path.resolve(cwd, parsed.path)
  const destination =
    command.type === "move" || command.type === "copy" ? path.resolve(cwd, command.destination) : undefined
  const creates = command.type === "createDir" || command.type === "createFile"

  let selection: FileMetadata[] = []
  let rootType: PlanContext["rootType"] = null
  if (creates) {
    rootType = (await probe([root])).get(root)?.type ?? null
  } else {
    const scanned = await scan(root, {
      recursive: flags.recursive || command.type === "flatten",
      includeHidden: flags.hidden || deps.includeHidden,
      concurrency: deps.scanConcurrency,
    })
    if (!scanned.ok) return failed(scanned.error, { parsed })
    rootType = scanned.value.rootType
    selection = scanned.value.entries.filter(predicate.value)
  }

  // preview writes nothing, INTO included: its report goes to stdout instead
  const effects = resolve(parsed.routes).map(
    (effect): Effect => (flags.preview && effect.kind === "write" ? { kind: "print", format: effect.format } : effect)
  )

  if (hasDelegation(effects) || command.type === "list") {
    const delegated: DelegateOutput[] = []
    for (const effect of effects) {
      if (effect.kind !== "delegate") continue
      const result = deps.delegate.invoke({
        tool: effect.tool,
        args: delegateArgs(parsed.path, effect.args),
        input: delegateInput(selection.map((entry) => entry.path)),
      })
      if (!result.ok) return failed(result.error, { parsed, selection, delegated })
      delegated.push(result.value)
    }
    const emitted = emit(entriesListing(commandLabel(parsed), parsed.path, selection), effects, cwd)
    const fields = { parsed, selection, delegated, printed: emitted.printed, written: emitted.written }
    return emitted.error ? failed(emitted.error, fields) : outcome(fields)
  }

  const context = { root, rootType, destination }
  const draft = plan(selection, command, flags, { ...context, existing: new Map() }, { transform: transform.value })
  const existing = await probe(probePaths(draft, context))
  const operations = plan(selection, command, flags, { ...context, existing }, { transform: transform.value })

  const report = execute(operations, { store: deps.store, command: renderCommand(raw), preview: flags.preview })
  const emitted = emit(planListing(commandLabel(parsed), parsed.path, operations), effects, cwd)
  const fields = { parsed, selection, plan: operations, report, printed: emitted.printed, written: emitted.written }

  if (report.failure) return failed(report.failure.error, fields)
  if (emitted.error) return failed(emitted.error, fields)
  return outcome(fields)
}

export interface HistoryRow {
  id: number
  createdAt: string
  command: string
  operations: number
  undone: boolean
}

/**
 * Recorded batches, newest first
 */
export function listHistory(store: HistoryStore): HistoryRow[] {
  return store
    .list()
    .reverse()
    .map((entry: HistoryEntry) => ({
      id: entry.id,
      createdAt: entry.createdAt,
      command: entry.command,
      operations: entry.operations.length,
      undone: entry.undone,
    }))
}

/**
 * `--limit` for the history listing: absent means all entries
 */
export function parseLimit(raw: string | undefined): Result<number | undefined, UsageError> {
  if (raw === undefined) return ok(undefined)
  const limit = Number(raw)
  if (!Number.isInteger(limit) || limit < 1) {
    return err(new UsageError(`Invalid --limit: ${raw} (expected a positive integer)`))
  }
  return ok(limit)
}
