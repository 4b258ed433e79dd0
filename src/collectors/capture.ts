import type { ArtifactSpec } from "../artifacts/artifact-store.js"
import {
  resultText,
  type CommandArgs,
  type CommandResult,
} from "../command/command-runner.js"
import type { CollectionStep } from "../diagnostics/report.js"
import { getErrorMessage } from "../utils/errors.js"
import type { ArtifactTarget, CollectContext } from "./types.js"

const relativeArtifactPath = (spec: ArtifactSpec): string =>
  spec.category ? `${spec.category}/${spec.fileName}` : spec.fileName

export const recordFailure = (
  ctx: CollectContext,
  step: CollectionStep,
  target: string | null,
  message: string,
): void => {
  ctx.log.warn(`[${step}] ${target ? `${target}: ` : ""}${message}`)
  ctx.report.recordFailure({ step, target, message })
}

/**
 * Writes one artifact and records it. A filesystem error is recorded as a step failure so
 * the remaining steps still run.
 */
export const saveArtifact = async (
  ctx: CollectContext,
  step: CollectionStep,
  target: string | null,
  spec: ArtifactSpec,
  source: CommandResult | null = null,
): Promise<boolean> => {
  const path = relativeArtifactPath(spec)
  try {
    await ctx.store.write(spec)
  } catch (error: unknown) {
    recordFailure(ctx, step, target, `Could not write ${path}: ${getErrorMessage(error)}`)
    return false
  }
  ctx.report.recordArtifact({ path, command: source?.command ?? null, ok: source?.ok ?? true })
  return true
}

/** Runs a command and stores its text (or its `ERROR: ` text) under `artifact`. */
export const captureCommand = async (
  ctx: CollectContext,
  step: CollectionStep,
  target: string | null,
  args: CommandArgs,
  artifact: ArtifactTarget,
): Promise<CommandResult> => {
  const result = await ctx.runner.run(args)
  if (!result.ok) {
    ctx.log.error(`Command failed: ${result.command}\n${result.reason}`)
  }
  await saveArtifact(ctx, step, target, { ...artifact, payload: resultText(result) }, result)
  return result
}
