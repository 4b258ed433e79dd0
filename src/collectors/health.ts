import { captureCommand } from "./capture.js"
import type { CollectContext } from "./types.js"

export const collectHealthChecks = async (ctx: CollectContext): Promise<void> => {
  ctx.log.info("Collecting service health")
  for (const check of ctx.variant.healthChecks) {
    await captureCommand(ctx, "health", check.name, check.args, {
      category: "health",
      fileName: `${check.name}.txt`,
    })
  }
}
