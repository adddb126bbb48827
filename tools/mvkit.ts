#!/usr/bin/env tsx
/**
 * mvkit.ts - Batch rename, move and organize files with a small command grammar
 *
 *   <COMMAND> <PATH> [FILTER]* [ROUTE]* [FLAG]*
 *
 * Commands:
 *   (default) <words...>   - Run a command line, e.g. snake ./notes EXT:md -rp
 *   undo                   - Undo the most recent batch
 *   history [--json]       - List recorded batches
 *   transforms             - List named case transforms
 *
 * Examples:
 *   mvkit kebab . "NAME:Document Template*"
 *   mvkit change "IMG_" INTO "" ./photos EXT:jpg -p
 *   mvkit move ./inbox ./archive MODIFIED<2024-01-01 -r
 *   mvkit list . FOR:notes FORMAT:json
 *   mvkit remove ./build -rf
 */

import { Command } from "commander"
import { realpathSync } from "fs"
import { fileURLToPath } from "url"
import { loadConfig, type Config } from "./lib/config"
import { describeError, type MvkitError } from "./lib/core/errors"
import { undo } from "./lib/core/execute"
import { listHistory, parseLimit, run, type RunOutcome } from "./lib/core/session"
import type { PlannedOperation } from "./lib/core/types"
import { HistoryStore } from "./lib/history/store"
import { SubprocessDelegate } from "./lib/route/delegate"
import { entriesListing, serialize } from "./lib/route/serializers"
import { listTransforms } from "./lib/transform/registry"

// ANSI colors
const RESET = "\x1b[0m"
const BOLD = "\x1b[1m"
const DIM = "\x1b[2m"
const RED = "\x1b[31m"
const GREEN = "\x1b[32m"
const YELLOW = "\x1b[33m"
const BLUE = "\x1b[34m"
const CYAN = "\x1b[36m"

const info = (msg: string) => console.log(`${BLUE}→${RESET} ${msg}`)
const success = (msg: string) => console.log(`${GREEN}✓${RESET} ${msg}`)
const warn = (msg: string) => console.log(`${YELLOW}⚠${RESET} ${msg}`)
const error = (msg: string) => console.error(`${RED}✗${RESET} ${msg}`)

function fail(e: MvkitError): void {
  error(e.message)
  process.exitCode = e.exitCode
}

/**
 * Load config and open the history store. A corrupt log is reported but
 * does not stop commands from running.
 */
function openStore(): { config: Config; store: HistoryStore } | null {
  const config = loadConfig()
  if (!config.ok) {
    fail(config.error)
    return null
  }
  const store = new HistoryStore({ root: config.value.root, maxSize: config.value.maxHistorySize })
  const loaded = store.load()
  if (!loaded.ok) warn(`${loaded.error.message}; undo is unavailable`)
  return { config: config.value, store }
}

const STATE_COLORS: Record<PlannedOperation["state"], string> = {
  Ready: GREEN,
  NoOp: DIM,
  Conflict: RED,
  OverwriteAllowed: YELLOW,
}

function printOperation(op: PlannedOperation, cwd: string): void {
  const rel = (p: string) => (p.startsWith(cwd + "/") ? p.slice(cwd.length + 1) : p)
  const color = STATE_COLORS[op.state]
  const target = op.destination !== undefined && op.destination !== op.source ? ` ${DIM}→${RESET} ${rel(op.destination)}` : ""
  const reason = op.reason ? ` ${DIM}(${op.reason})${RESET}` : ""
  console.log(`  ${color}${op.state.padEnd(16)}${RESET} ${op.kind.padEnd(10)} ${rel(op.source)}${target}${reason}`)
}

function report(outcome: RunOutcome, cwd: string): void {
  for (const text of outcome.printed) console.log(text)
  for (const file of outcome.written) info(`Wrote ${file}`)
  for (const output of outcome.delegated) if (output.stdout) process.stdout.write(output.stdout)

  if (outcome.undo) {
    const { entry, reverted } = outcome.undo
    success(`Undid #${entry.id} (${reverted} operation(s)): ${entry.command}`)
  }

  const parsed = outcome.parsed
  if (parsed && parsed.command.type === "list" && outcome.printed.length === 0 && outcome.written.length === 0) {
    if (outcome.selection.length === 0) info("No entries matched")
    else console.log(serialize(entriesListing("list", parsed.path, outcome.selection), "text"))
  }
  if (outcome.delegated.length > 0) info(`Delegated ${outcome.selection.length} path(s)`)

  const result = outcome.report
  if (result) {
    if (outcome.printed.length === 0) {
      const visible = result.plan.filter((op) => op.state !== "NoOp")
      for (const op of visible) printOperation(op, cwd)
      const unchanged = result.plan.length - visible.length
      if (unchanged > 0) console.log(`  ${DIM}${unchanged} unchanged${RESET}`)
    }

    const conflicts = result.plan.filter((op) => op.state === "Conflict").length
    const pending = result.plan.filter((op) => op.state === "Ready" || op.state === "OverwriteAllowed").length

    if (result.preview) info(`${BOLD}Preview${RESET}: ${pending} operation(s) would run, nothing was changed`)
    else if (result.status === "complete") {
      success(`Applied ${result.applied.length} operation(s)${result.entry ? ` ${CYAN}#${result.entry.id}${RESET}` : ""}`)
    } else if (result.status === "partial") {
      warn(`Stopped after ${result.applied.length} operation(s); applied operations were kept`)
    } else if (pending === 0 && conflicts === 0) info("Nothing to do")

    if (conflicts > 0) warn(`${conflicts} conflict(s) skipped; use -f to overwrite existing targets`)
    for (const skipped of result.skipped) warn(`Skipped ${skipped.op.source}: ${skipped.reason}`)
    if (result.recordError) warn(`Batch was not recorded (${result.recordError.message}); it cannot be undone`)
    if (result.unrecordedBackups) warn(`Backups of replaced or removed entries were kept in ${result.unrecordedBackups}`)
  }

  if (outcome.error) fail(outcome.error)
}

async function cmdRun(words: string[]): Promise<void> {
  const opened = openStore()
  if (!opened) return
  const { config, store } = opened
  const cwd = process.cwd()
  const outcome = await run(words, {
    store,
    delegate: new SubprocessDelegate({ cwd }),
    cwd,
    scanConcurrency: config.scanConcurrency,
    includeHidden: config.includeHidden,
  })
  report(outcome, cwd)
}

function cmdUndo(): void {
  const opened = openStore()
  if (!opened) return
  const result = undo(opened.store)
  if (!result.ok) {
    fail(result.error)
    return
  }
  success(`Undid #${result.value.entry.id} (${result.value.reverted} operation(s)): ${result.value.entry.command}`)
}

function cmdHistory(options: { json?: boolean; limit?: string }): void {
  const opened = openStore()
  if (!opened) return
  if (opened.store.error) {
    fail(opened.store.error)
    return
  }
  const limit = parseLimit(options.limit)
  if (!limit.ok) {
    fail(limit.error)
    return
  }
  const rows = listHistory(opened.store).slice(0, limit.value)

  if (options.json) {
    console.log(JSON.stringify(rows, null, 2))
    return
  }
  if (rows.length === 0) {
    info("No history yet")
    return
  }
  for (const row of rows) {
    const when = new Date(row.createdAt).toLocaleString()
    const state = row.undone ? ` ${DIM}(undone)${RESET}` : ""
    console.log(`${CYAN}#${String(row.id).padEnd(4)}${RESET} ${DIM}${when}${RESET}  ${row.command}  ${DIM}${row.operations} op(s)${RESET}${state}`)
  }
}

function cmdTransforms(): void {
  for (const transform of listTransforms()) {
    console.log(`  ${BOLD}${transform.name.padEnd(10)}${RESET} ${transform.description}`)
  }
}

// ============================================================================
// CLI with Commander.js
// ============================================================================

const program = new Command()

program.name("mvkit").description("Batch rename, move and organize files").version("0.1.0")

program
  .command("run", { isDefault: true })
  .description("Run a command line: <COMMAND> <PATH> [FILTER]* [ROUTE]* [FLAG]*")
  .argument("<words...>", "command words")
  .allowUnknownOption()
  .allowExcessArguments()
  .action(async (words: string[]) => {
    await cmdRun(words)
  })

program.command("undo").description("Undo the most recent batch").action(cmdUndo)

program
  .command("history")
  .description("List recorded batches, newest first")
  .option("--json", "JSON output")
  .option("-n, --limit <num>", "Max entries")
  .action(cmdHistory)

program.command("transforms").description("List named case transforms").action(cmdTransforms)

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  if (argv.length === 0) {
    program.outputHelp()
    return
  }
  await program.parseAsync(["node", "mvkit", ...argv])
}

function invokedDirectly(): boolean {
  const script = process.argv[1]
  if (!script) return false
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

if (invokedDirectly()) {
  main().catch((e: unknown) => {
    error(describeError(e))
    process.exitCode = 1
  })
}
