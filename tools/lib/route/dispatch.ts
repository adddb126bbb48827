import type { OutputFormat, RouteClause } from "../core/types"

export type Effect =
  | { kind: "delegate"; tool: string; args: string[] }
  | { kind: "write"; path: string; format: OutputFormat }
  | { kind: "print"; format: OutputFormat }

/**
 * Turn route clauses into effects. FORMAT applies to every INTO; FORMAT
 * without INTO prints to stdout. Delegations keep their order.
 */
export function resolve(routes: readonly RouteClause[]): Effect[] {
  let format: OutputFormat | undefined
  for (const route of routes) {
    if (route.type === "format") format = route.format
  }

  const effects: Effect[] = []
  let wrote = false
  for (const route of routes) {
    if (route.type === "to") {
      effects.push({ kind: "delegate", tool: route.tool, args: [...route.args] })
    } else if (route.type === "into") {
      wrote = true
      effects.push({ kind: "write", path: route.path, format: format ?? "text" })
    }
  }

  if (format && !wrote) effects.push({ kind: "print", format })
  return effects
}

export function hasDelegation(effects: readonly Effect[]): boolean {
  return effects.some((effect) => effect.kind === "delegate")
}
