/**
 * serializers.ts - Render a listing as json, csv, yaml or text
 */

import yaml from "js-yaml"
import Papa from "papaparse"
import type { FileMetadata, OutputFormat, PlannedOperation } from "../core/types"
import { formatBytes } from "../filter/literals"

export type Cell = string | number

export interface Listing {
  command: string
  path: string
  fields: string[]
  rows: Record<string, Cell>[]
}

export const ENTRY_FIELDS = ["path", "type", "size", "modified"]
export const PLAN_FIELDS = ["source", "destination", "kind", "state", "reason"]

export function entriesListing(command: string, path: string, entries: FileMetadata[]): Listing {
  return {
    command,
    path,
    fields: ENTRY_FIELDS,
    rows: entries.map((entry) => ({
      path: entry.relativePath || entry.name,
      type: entry.type,
      size: entry.size,
      modified: entry.modified.toISOString(),
    })),
  }
}

export function planListing(command: string, path: string, plan: PlannedOperation[]): Listing {
  return {
    command,
    path,
    fields: PLAN_FIELDS,
    rows: plan.map((op) => ({
      source: op.source,
      destination: op.destination ?? "",
      kind: op.kind,
      state: op.state,
      reason: op.reason ?? "",
    })),
  }
}

function toText(listing: Listing): string {
  if (listing.fields.includes("path") && listing.fields.includes("size")) {
    return listing.rows
      .map((row) => {
        const size = typeof row.size === "number" ? formatBytes(row.size) : ""
        return `${String(row.type ?? "").padEnd(7)} ${size.padStart(10)}  ${row.path ?? ""}`
      })
      .join("\n")
  }
  return listing.rows
    .map((row) => {
      const target = row.destination ? ` -> ${row.destination}` : ""
      const reason = row.reason ? ` (${row.reason})` : ""
      return `[${row.state}] ${row.kind} ${row.source}${target}${reason}`
    })
    .join("\n")
}

export function serialize(listing: Listing, format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify({ command: listing.command, path: listing.path, rows: listing.rows }, null, 2)
    case "csv":
      return Papa.unparse(
        { fields: listing.fields, data: listing.rows.map((row) => listing.fields.map((field) => row[field] ?? "")) },
        { newline: "\n" }
      )
    case "yaml":
      return yaml.dump({ command: listing.command, path: listing.path, rows: listing.rows }, { indent: 2, lineWidth: -1 })
    case "text":
      return toText(listing)
  }
}
