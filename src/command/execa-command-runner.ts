import { execa } from "execa"

import {
  formatCommand,
  type CommandArgs,
  type CommandResult,
  type CommandRunner,
} from "./command-runner.js"

// Pod logs can exceed execa's default 100 MB buffer; output is never truncated.
export const EXEC_OPTIONS = { reject: false, maxBuffer: Number.POSITIVE_INFINITY } as const

export interface ExecaCommandRunnerConfig {
  /** Maps a tool name ("openstack", "kubectl") to the binary that should run it. */
  binaries?: Readonly<Record<string, string | null>>
  onCommand?: (command: string) => void
}

export class ExecaCommandRunner implements CommandRunner {
  constructor(private readonly config: ExecaCommandRunnerConfig = {}) {}

  private resolveBinary(tool: string): string {
    return this.config.binaries?.[tool] ?? tool
  }

  async run(args: CommandArgs): Promise<CommandResult> {
    const [tool, ...rest] = args
    if (tool === undefined) {
      throw new Error("Cannot run an empty command")
    }
    const command = formatCommand(args)
    this.config.onCommand?.(command)

    const result = await execa(this.resolveBinary(tool), rest, EXEC_OPTIONS)
    if (!result.failed) {
      return { ok: true, command, output: result.stdout.trim() }
    }

    const stderr = result.stderr.trim()
    let reason = stderr
    if (!reason) {
      reason = result instanceof Error ? result.message : `exit code ${String(result.exitCode)}`
    }
    return { ok: false, command, reason, exitCode: result.exitCode ?? null }
  }
}
