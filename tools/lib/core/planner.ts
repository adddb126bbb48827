/**
 * planner.ts - Turn a selection and a command into an ordered operation plan
 *
 * Pure: everything it knows about the filesystem comes from the scan
 * entries and the `existing` map in the context. Conflicts are operations
 * in state Conflict, never thrown.
 */

import { createHash } from "crypto"
import path from "path"
import type { Transform } from "../transform/registry"
import { renameEntry, splitExtension } from "../transform/extension"
import type {
  Command,
  ConflictReason,
  EntryType,
  ExistingEntry,
  FileMetadata,
  FlagSet,
  OperationKind,
  OperationState,
  PlannedOperation,
} from "./types"

export interface PlanContext {
  root: string // absolute PATH
  rootType: EntryType | null // null when PATH does not exist (mkdir/touch)
  destination?: string // absolute DEST for move/copy
  existing: ReadonlyMap<string, ExistingEntry>
}

export interface PlanOptions {
  transform?: Transform | null
}

interface Candidate {
  kind: OperationKind
  source: string
  destination?: string
  sourceType?: EntryType
  sourceIdentity?: string
  preset?: { state: OperationState; reason?: ConflictReason }
}

/**
 * Generate a stable operation id
 */
function generateOpId(kind: OperationKind, source: string, destination: string | undefined, index: number): string {
  const hash = createHash("sha256")
    .update(`${kind}:${source}:${destination ?? ""}:${index}`)
    .digest("hex")
    .slice(0, 8)
  return `${kind}-${hash}`
}

function isInside(child: string, parent: string): boolean {
  return child.startsWith(parent.endsWith(path.sep) ? parent : parent + path.sep)
}

function conflict(reason: ConflictReason): Candidate["preset"] {
  return { state: "Conflict", reason }
}

/**
 * Drop entries that sit under another selected folder
 */
function topLevel(entries: FileMetadata[]): FileMetadata[] {
  const folders = entries.filter((e) => e.type === "folder").map((e) => e.path)
  return entries.filter((entry) => !folders.some((folder) => folder !== entry.path && isInside(entry.path, folder)))
}

function byDepthDesc(a: FileMetadata, b: FileMetadata): number {
  if (a.depth !== b.depth) return b.depth - a.depth
  if (a.path === b.path) return 0
  return a.path < b.path ? -1 : 1
}

function transformCandidates(entries: FileMetadata[], transform: Transform): Candidate[] {
  return [...entries].sort(byDepthDesc).map((entry) => {
    let newBase = ""
    const newName = renameEntry(entry.name, entry.type, (base) => {
      newBase = transform.apply(base)
      return newBase
    })
    const destination = path.join(path.dirname(entry.path), newName)
    const invalid = newBase === "" || newName.includes("/") || newName === "." || newName === ".."
    return {
      kind: "rename",
      source: entry.path,
      destination: invalid ? path.dirname(entry.path) + path.sep + newName : destination,
      sourceType: entry.type,
      sourceIdentity: entry.identity,
      preset: invalid ? conflict("invalid_name") : undefined,
    }
  })
}

function relocateCandidates(
  entries: FileMetadata[],
  kind: "move" | "copy",
  flags: FlagSet,
  context: PlanContext
): Candidate[] {
  const dest = context.destination ?? context.root
  const intoFolder = context.existing.get(dest)?.type === "folder"

  return topLevel(entries).map((entry) => {
    let destination: string
    if (context.rootType === "folder") destination = path.join(dest, entry.relativePath)
    else destination = intoFolder ? path.join(dest, entry.name) : dest

    let preset: Candidate["preset"]
    if (entry.type === "folder" && kind === "copy" && !flags.recursive) preset = conflict("is_directory")
    else if (entry.type === "folder" && isInside(destination, entry.path)) preset = conflict("inside_source")

    return {
      kind,
      source: entry.path,
      destination,
      sourceType: entry.type,
      sourceIdentity: entry.identity,
      preset,
    }
  })
}

function removeCandidates(entries: FileMetadata[], flags: FlagSet): Candidate[] {
  return topLevel(entries).map((entry) => ({
    kind: "remove",
    source: entry.path,
    sourceType: entry.type,
    sourceIdentity: entry.identity,
    preset: entry.type === "folder" && !flags.recursive ? conflict("is_directory") : undefined,
  }))
}

function createCandidate(kind: "createDir" | "createFile", context: PlanContext): Candidate {
  const wanted: EntryType = kind === "createDir" ? "folder" : "file"
  const existing = context.existing.get(context.root)
  let preset: Candidate["preset"]
  if (existing) preset = existing.type === wanted ? { state: "NoOp" } : conflict("target_exists")
  return { kind, source: context.root, destination: context.root, preset }
}

function groupCandidates(entries: FileMetadata[], context: PlanContext): Candidate[] {
  const groups = new Map<string, FileMetadata[]>()
  for (const entry of entries) {
    if (entry.type !== "file" || entry.depth !== 1) continue
    const { base } = splitExtension(entry.name)
    const members = groups.get(base) ?? []
    members.push(entry)
    groups.set(base, members)
  }

  const candidates: Candidate[] = []
  for (const [base, members] of [...groups].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    const folder = path.join(context.root, base)
    const existing = context.existing.get(folder)
    const blocked = existing !== undefined && existing.type !== "folder"

    if (!existing || blocked) {
      candidates.push({
        kind: "createDir",
        source: folder,
        destination: folder,
        preset: blocked ? conflict("target_exists") : undefined,
      })
    }
    for (const entry of members) {
      candidates.push({
        kind: "move",
        source: entry.path,
        destination: path.join(folder, entry.name),
        sourceType: entry.type,
        sourceIdentity: entry.identity,
        preset: blocked ? conflict("target_exists") : undefined,
      })
    }
  }
  return candidates
}

function flattenCandidates(entries: FileMetadata[], context: PlanContext): Candidate[] {
  return entries
    .filter((entry) => entry.type !== "folder" && entry.depth > 1)
    .map((entry) => ({
      kind: "move",
      source: entry.path,
      destination: path.join(context.root, entry.name),
      sourceType: entry.type,
      sourceIdentity: entry.identity,
    }))
}

function buildCandidates(
  entries: FileMetadata[],
  command: Command,
  flags: FlagSet,
  context: PlanContext,
  options: PlanOptions
): Candidate[] {
  switch (command.type) {
    case "move":
    case "copy":
      return relocateCandidates(entries, command.type, flags, context)
    case "remove":
      return removeCandidates(entries, flags)
    case "createDir":
    case "createFile":
      return [createCandidate(command.type, context)]
    case "group":
      return groupCandidates(entries, context)
    case "flatten":
      return flattenCandidates(entries, context)
    case "list":
      return []
    default:
      return options.transform ? transformCandidates(entries, options.transform) : []
  }
}

/**
 * Build the plan. Conflict rules, in order: preset verdicts (invalid name,
 * folder without -r, ...), destination == source is a NoOp, a repeated
 * destination is a duplicate, an occupied destination with another
 * identity is target_exists unless forced.
 */
export function plan(
  entries: FileMetadata[],
  command: Command,
  flags: FlagSet,
  context: PlanContext,
  options: PlanOptions = {}
): PlannedOperation[] {
  const candidates = buildCandidates(entries, command, flags, context, options)
  const targets = new Set<string>()

  return candidates.map((candidate, index): PlannedOperation => {
    const { preset, ...fields } = candidate
    const op = { opId: generateOpId(candidate.kind, candidate.source, candidate.destination, index), ...fields }

    if (preset) return { ...op, ...preset }

    const destination = candidate.destination
    if (destination === undefined) return { ...op, state: "Ready" }
    if (candidate.kind !== "createDir" && candidate.kind !== "createFile" && destination === candidate.source) {
      return { ...op, state: "NoOp" }
    }

    if (targets.has(destination)) return { ...op, state: "Conflict", reason: "duplicate_target" }
    targets.add(destination)

    const existing = context.existing.get(destination)
    if (existing && existing.identity !== candidate.sourceIdentity) {
      return flags.force ? { ...op, state: "OverwriteAllowed" } : { ...op, state: "Conflict", reason: "target_exists" }
    }
    return { ...op, state: "Ready" }
  })
}

/**
 * Paths whose current state decides the plan: every destination of a draft
 * plan, DEST itself, and DEST/<name> for a single-file move or copy.
 */
export function probePaths(draft: PlannedOperation[], context: Omit<PlanContext, "existing">): string[] {
  const paths = new Set<string>()
  if (context.destination) paths.add(context.destination)
  paths.add(context.root)
  for (const op of draft) {
    if (op.destination === undefined) continue
    paths.add(op.destination)
    if (op.destination === context.destination) paths.add(path.join(op.destination, path.basename(op.source)))
  }
  return [...paths]
}

export function isActionable(op: PlannedOperation): boolean {
  return op.state === "Ready" || op.state === "OverwriteAllowed"
}
