/**
 * groups.ts - Semantic groups for FOR:<group>
 *
 * A group is a fixed bundle of filter clauses. It is expanded once, when the
 * command is parsed, into clauses indistinguishable from literal ones.
 */

import { CompileError, err, ok, type Result } from "../core/errors"
import type { FilterClause } from "../core/types"

function clause(keyword: FilterClause["keyword"], value: string): FilterClause {
  return { keyword, comparator: ":", value }
}

const BUILTIN_GROUPS: ReadonlyMap<string, readonly FilterClause[]> = new Map([
  ["notes", [clause("EXT", "md"), clause("TYPE", "file")]],
  ["media", [clause("EXT", "jpg,png,gif,webm,mp4,jpeg,webp,svg"), clause("TYPE", "file")]],
  ["scripts", [clause("EXT", "sh,py,rb,pl,rs,js,ts,bash,zsh"), clause("TYPE", "file")]],
  ["projects", [clause("TYPE", "folder"), clause("NAME", "{src,build,docs,target,dist,bin}")]],
  ["configs", [clause("EXT", "conf,ini,yaml,yml,toml,json,config,cfg"), clause("TYPE", "file")]],
])

/**
 * Registry of semantic groups: the built-ins plus user groups layered on top.
 *
 * User groups must be registered before the registry is used for parsing;
 * once frozen, the set of groups cannot change for the rest of the session.
 */
export class GroupRegistry {
  private readonly userGroups = new Map<string, readonly FilterClause[]>()
  private frozen = false

  register(name: string, clauses: FilterClause[]): Result<void, CompileError> {
    const key = name.toLowerCase()
    if (this.frozen) {
      return err(new CompileError(`Group registry is frozen; cannot register "${name}"`, "FOR", name))
    }
    if (BUILTIN_GROUPS.has(key)) {
      return err(new CompileError(`Cannot redefine built-in group "${name}"`, "FOR", name))
    }
    if (clauses.some((c) => c.keyword === "FOR")) {
      return err(new CompileError(`Group "${name}" cannot reference other groups`, "FOR", name))
    }
    this.userGroups.set(key, [...clauses])
    return ok(undefined)
  }

  freeze(): this {
    this.frozen = true
    return this
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  resolve(name: string): FilterClause[] | null {
    const key = name.toLowerCase()
    const clauses = BUILTIN_GROUPS.get(key) ?? this.userGroups.get(key)
    return clauses ? clauses.map((c) => ({ ...c })) : null
  }

  names(): string[] {
    return [...BUILTIN_GROUPS.keys(), ...this.userGroups.keys()]
  }
}

export const defaultGroups = new GroupRegistry().freeze()
