import type { z } from "zod"

import type { CommandResult } from "./command-runner.js"

/** `raw` is the decoded value in the order the command printed it; `data` is the validated view. */
export type JsonOutcome<T> = { ok: true; data: T; raw: unknown } | { ok: false; message: string }

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .slice(0, 3)
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ")

/**
 * Parses the output of a `-f json` / `-o json` command. A failed command never reaches
 * `JSON.parse`, so an error message cannot be mistaken for data.
 */
export const parseCommandJson = <TSchema extends z.ZodTypeAny>(
  result: CommandResult,
  schema: TSchema,
): JsonOutcome<z.output<TSchema>> => {
  if (!result.ok) {
    return { ok: false, message: `\`${result.command}\` failed: ${result.reason}` }
  }

  let raw: unknown
  try {
    raw = JSON.parse(result.output)
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error)
    return { ok: false, message: `Invalid JSON from \`${result.command}\`: ${detail}` }
  }

  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    return {
      ok: false,
      message: `Unexpected JSON shape from \`${result.command}\`: ${describeIssues(parsed.error)}`,
    }
  }
  return { ok: true, data: parsed.data, raw }
}
