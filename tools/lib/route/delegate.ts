/**
 * delegate.ts - Hand a selected file set to an external tool
 *
 * The core only sees the Delegate interface. The subprocess adapter runs the
 * tool synchronously with the selected paths on stdin, one per line.
 */

import { spawnSync } from "child_process"
import { DelegationError, err, ok, type Result } from "../core/errors"

export interface DelegateRequest {
  tool: string
  args: string[]
  input: string
}

export interface DelegateOutput {
  stdout: string
  stderr: string
  exitStatus: number
}

export interface Delegate {
  invoke(request: DelegateRequest): Result<DelegateOutput, DelegationError>
}

export interface SubprocessOptions {
  cwd?: string
  timeoutMs?: number
}

/**
 * Runs the tool as a child process. A tool that cannot be started or exits
 * non-zero is a DelegationError carrying its stderr verbatim. No retry.
 */
export class SubprocessDelegate implements Delegate {
  constructor(private readonly options: SubprocessOptions = {}) {}

  invoke({ tool, args, input }: DelegateRequest): Result<DelegateOutput, DelegationError> {
    const result = spawnSync(tool, args, {
      input,
      cwd: this.options.cwd,
      timeout: this.options.timeoutMs,
      encoding: "utf-8",
      maxBuffer: 50 * 1024 * 1024,
    })

    if (result.error) {
      return err(new DelegationError(`Failed to run ${tool}: ${result.error.message}`, tool))
    }

    const stdout = result.stdout ?? ""
    const stderr = result.stderr ?? ""
    if (result.status !== 0) {
      const status = result.status === null ? `signal ${result.signal ?? "unknown"}` : `status ${result.status}`
      return err(new DelegationError(`${tool} exited with ${status}`, tool, result.status, stderr))
    }

    return ok({ stdout, stderr, exitStatus: 0 })
  }
}

/**
 * Build the argument vector for a delegation: the scan path first, then the
 * user's own arguments.
 */
export function delegateArgs(path: string, userArgs: readonly string[]): string[] {
  return [path, ...userArgs]
}

export function delegateInput(paths: readonly string[]): string {
  return paths.length === 0 ? "" : `${paths.join("\n")}\n`
}
