export type CommandArgs = readonly string[]

export type CommandResult =
  | { ok: true; command: string; output: string }
  | { ok: false; command: string; reason: string; exitCode: number | null }

export interface CommandRunner {
  /** Runs one external command to completion. Never rejects for a failing process. */
  run(args: CommandArgs): Promise<CommandResult>
}

export const FAILURE_PREFIX = "ERROR: "

export const formatCommand = (args: CommandArgs): string => args.join(" ")

/**
 * Text stored as an artifact for a command: its output, or the failure reason behind
 * `ERROR: ` so a failed lookup still shows up in the collected tree.
 */
export const resultText = (result: CommandResult): string =>
  result.ok ? result.output : `${FAILURE_PREFIX}${result.reason}`
