import { z } from "zod"

// Case styles the transformation engine knows by name
export const CaseStyle = z.enum([
  "snake",
  "kebab",
  "title",
  "camel",
  "pascal",
  "lower",
  "upper",
  "sentence",
  "start",
  "studly",
])
export type CaseStyle = z.infer<typeof CaseStyle>

// One parsed invocation carries exactly one command variant
export const Command = z.discriminatedUnion("type", [
  z.object({ type: z.literal("case"), style: CaseStyle }),
  z.object({ type: z.literal("clean") }),
  z.object({ type: z.literal("split"), style: CaseStyle }),
  z.object({
    type: z.literal("change"),
    old: z.string(),
    new: z.string(),
    removal: z.boolean(), // reporting only: new === ""
  }),
  z.object({ type: z.literal("regex"), pattern: z.string(), replacement: z.string() }),
  z.object({ type: z.literal("prefix"), prefix: z.string() }),
  z.object({ type: z.literal("move"), destination: z.string() }),
  z.object({ type: z.literal("copy"), destination: z.string() }),
  z.object({ type: z.literal("remove") }),
  z.object({ type: z.literal("createDir") }),
  z.object({ type: z.literal("createFile") }),
  z.object({ type: z.literal("list") }),
  z.object({ type: z.literal("group") }),
  z.object({ type: z.literal("flatten") }),
])
export type Command = z.infer<typeof Command>

export const FilterKeyword = z.enum(["NAME", "TYPE", "EXT", "SIZE", "DEPTH", "MODIFIED", "ACCESSED", "FOR"])
export type FilterKeyword = z.infer<typeof FilterKeyword>

export const Comparator = z.enum([":", ">", "<"])
export type Comparator = z.infer<typeof Comparator>

export const FilterClause = z.object({
  keyword: FilterKeyword,
  comparator: Comparator,
  value: z.string(),
})
export type FilterClause = z.infer<typeof FilterClause>

export const OutputFormat = z.enum(["json", "csv", "yaml", "text"])
export type OutputFormat = z.infer<typeof OutputFormat>

export const RouteClause = z.discriminatedUnion("type", [
  z.object({ type: z.literal("to"), tool: z.string(), args: z.array(z.string()) }),
  z.object({ type: z.literal("into"), path: z.string() }),
  z.object({ type: z.literal("format"), format: OutputFormat }),
])
export type RouteClause = z.infer<typeof RouteClause>

export const FlagSet = z.object({
  recursive: z.boolean().default(false),
  preview: z.boolean().default(false),
  force: z.boolean().default(false),
  interactive: z.boolean().default(false),
  tui: z.boolean().default(false),
  undo: z.boolean().default(false),
  hidden: z.boolean().default(false),
  ignoreCase: z.boolean().default(false),
})
export type FlagSet = z.infer<typeof FlagSet>

export const ParsedCommand = z.object({
  command: Command,
  path: z.string(),
  filters: z.array(FilterClause),
  routes: z.array(RouteClause),
  flags: FlagSet,
})
export type ParsedCommand = z.infer<typeof ParsedCommand>

export const EntryType = z.enum(["file", "folder", "symlink", "other"])
export type EntryType = z.infer<typeof EntryType>

// Snapshot of one filesystem entry, taken at scan time
export interface FileMetadata {
  path: string // absolute
  relativePath: string // relative to the scan root; a file root is its own name
  name: string
  type: EntryType
  size: number
  depth: number // direct children of the scan root are depth 1
  modified: Date
  accessed: Date
  identity: string // "dev:ino"
}

// What currently occupies a path, as seen by probe()
export interface ExistingEntry {
  identity: string
  type: EntryType
}

export const OperationKind = z.enum(["rename", "move", "copy", "remove", "createDir", "createFile"])
export type OperationKind = z.infer<typeof OperationKind>

export const OperationState = z.enum(["Ready", "NoOp", "Conflict", "OverwriteAllowed"])
export type OperationState = z.infer<typeof OperationState>

export const ConflictReason = z.enum([
  "target_exists",
  "duplicate_target",
  "invalid_name",
  "is_directory",
  "source_missing",
  "inside_source",
])
export type ConflictReason = z.infer<typeof ConflictReason>

export const PlannedOperation = z.object({
  opId: z.string(),
  kind: OperationKind,
  source: z.string(),
  destination: z.string().optional(),
  state: OperationState,
  reason: ConflictReason.optional(),
  sourceType: EntryType.optional(),
  sourceIdentity: z.string().optional(), // identity at plan time, re-checked before mutation
})
export type PlannedOperation = z.infer<typeof PlannedOperation>

export const BackupRecord = z.object({
  originalPath: z.string(),
  backupPath: z.string(),
})
export type BackupRecord = z.infer<typeof BackupRecord>

// What actually happened to one planned operation
export const AppliedOperation = z.object({
  opId: z.string(),
  kind: OperationKind,
  source: z.string(),
  destination: z.string().optional(),
  overwrote: z.boolean().default(false),
  backup: BackupRecord.optional(),
})
export type AppliedOperation = z.infer<typeof AppliedOperation>

export const HistoryEntry = z.object({
  id: z.number().int().positive(), // monotonically increasing sequence id
  createdAt: z.string(),
  command: z.string(),
  operations: z.array(AppliedOperation),
  backups: z.array(BackupRecord),
  reverted: z.array(z.string()).default([]), // opIds already reverted by an undo that stopped partway
  undone: z.boolean().default(false),
})
export type HistoryEntry = z.infer<typeof HistoryEntry>

// Lines of the append-only history log
export const HistoryRecord = z.discriminatedUnion("type", [
  z.object({ type: z.literal("meta"), nextId: z.number().int().positive() }),
  z.object({ type: z.literal("entry"), entry: HistoryEntry }),
  z.object({ type: z.literal("revert"), id: z.number().int().positive(), opId: z.string() }),
  z.object({ type: z.literal("undo"), id: z.number().int().positive(), at: z.string() }),
  z.object({ type: z.literal("evict"), id: z.number().int().positive(), at: z.string() }),
])
export type HistoryRecord = z.infer<typeof HistoryRecord>

export const BatchStatus = z.enum(["nothing", "complete", "partial"])
export type BatchStatus = z.infer<typeof BatchStatus>
