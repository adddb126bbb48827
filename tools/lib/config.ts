/**
 * config.ts - Configuration root and user settings
 *
 * Root: $MVKIT_HOME, else $XDG_CONFIG_HOME/mvkit, else ~/.config/mvkit.
 * An optional config.json there overrides the defaults;
 * MVKIT_MAX_HISTORY overrides maxHistorySize.
 */

import { existsSync, readFileSync } from "fs"
import { homedir } from "os"
import { join } from "path"
import { z } from "zod"
import { ConfigError, describeError, err, ok, type Result } from "./core/errors"

export const UserConfig = z
  .object({
    maxHistorySize: z.number().int().min(1).default(50),
    scanConcurrency: z.number().int().min(1).max(64).default(8),
    includeHidden: z.boolean().default(false),
  })
  .strict()
export type UserConfig = z.infer<typeof UserConfig>

export interface Config extends UserConfig {
  root: string
  historyPath: string
  backupDir: string
}

type Env = Record<string, string | undefined>

export function configRoot(env: Env = process.env): string {
  if (env.MVKIT_HOME) return env.MVKIT_HOME
  const base = env.XDG_CONFIG_HOME || join(env.HOME || homedir(), ".config")
  return join(base, "mvkit")
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ")
}

/**
 * Load configuration. A missing config.json means defaults; one that is not
 * valid JSON or does not match the schema is a ConfigError.
 */
export function loadConfig(env: Env = process.env): Result<Config, ConfigError> {
  const root = configRoot(env)
  const file = join(root, "config.json")

  let raw: unknown = {}
  if (existsSync(file)) {
    try {
      raw = JSON.parse(readFileSync(file, "utf-8"))
    } catch (e) {
      return err(new ConfigError(`Cannot read ${file}: ${describeError(e)}`))
    }
  }

  const parsed = UserConfig.safeParse(raw)
  if (!parsed.success) {
    return err(new ConfigError(`Invalid ${file}: ${formatIssues(parsed.error)}`))
  }

  let maxHistorySize = parsed.data.maxHistorySize
  const override = env.MVKIT_MAX_HISTORY
  if (override !== undefined && override !== "") {
    const value = Number(override)
    if (!Number.isInteger(value) || value < 1) {
      return err(new ConfigError(`Invalid MVKIT_MAX_HISTORY: ${override} (expected a positive integer)`))
    }
    maxHistorySize = value
  }

  return ok({
    ...parsed.data,
    maxHistorySize,
    root,
    historyPath: join(root, "history.jsonl"),
    backupDir: join(root, "backups"),
  })
}
