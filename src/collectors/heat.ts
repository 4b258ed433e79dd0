import { toFileComponent } from "../artifacts/artifact-store.js"
import { parseCommandJson } from "../command/json.js"
import { stackResourceListSchema } from "../schema/openstack.js"
import { captureCommand, recordFailure } from "./capture.js"
import type { CollectContext } from "./types.js"

export const collectStack = async (ctx: CollectContext, stackId: string): Promise<void> => {
  ctx.log.info(`Collecting heat data for stack ${stackId}`)
  await captureCommand(ctx, "heat", stackId, ["openstack", "stack", "show", stackId], {
    category: "heat",
    fileName: "stack_show.txt",
  })
  await captureCommand(ctx, "heat", stackId, ["openstack", "stack", "resource", "list", stackId], {
    category: "heat",
    fileName: "stack_resources.txt",
  })

  const resources = parseCommandJson(
    await ctx.runner.run(["openstack", "stack", "resource", "list", stackId, "-f", "json"]),
    stackResourceListSchema,
  )
  if (!resources.ok) {
    recordFailure(ctx, "heat", stackId, `Could not parse Heat resource list: ${resources.message}`)
    return
  }

  for (const resource of resources.data) {
    const name = resource.resource_name
    if (!name) {
      continue
    }
    await captureCommand(
      ctx,
      "heat",
      name,
      ["openstack", "stack", "resource", "show", stackId, name],
      { category: "heat", fileName: `resource_${toFileComponent(name)}.txt` },
    )
  }
}
