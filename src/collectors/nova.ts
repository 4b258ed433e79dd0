import { parseCommandJson } from "../command/json.js"
import { serverDetailSchema, type ServerDetail } from "../schema/openstack.js"
import { extractId } from "../utils/extract-id.js"
import { captureCommand, recordFailure } from "./capture.js"
import type { CollectContext } from "./types.js"

/**
 * Server detail, event history and migrations of a VM. Returns the parsed
 * `server show -f json` so later steps do not ask for it again, or null when it is unusable.
 */
export const collectServer = async (
  ctx: CollectContext,
  vmId: string,
): Promise<ServerDetail | null> => {
  ctx.log.info(`Collecting nova data for VM ${vmId}`)

  await captureCommand(
    ctx,
    "nova",
    vmId,
    ["openstack", "server", "show", vmId, ...ctx.variant.serverShowArgs],
    { category: "nova", fileName: "server_show.txt" },
  )
  await captureCommand(ctx, "nova", vmId, ["openstack", "server", "event", "list", vmId], {
    category: "nova",
    fileName: "server_events.txt",
  })
  await captureCommand(
    ctx,
    "nova",
    vmId,
    ["openstack", "server", "migration", "list", "--server", vmId],
    { category: "nova", fileName: "migrations.txt" },
  )

  const detail = parseCommandJson(
    await ctx.runner.run(["openstack", "server", "show", vmId, "-f", "json"]),
    serverDetailSchema,
  )
  if (!detail.ok) {
    recordFailure(ctx, "nova", vmId, `Failed to parse VM details: ${detail.message}`)
    return null
  }
  return detail.data
}

export const collectImageAndFlavor = async (
  ctx: CollectContext,
  vmId: string,
  server: ServerDetail,
): Promise<void> => {
  const imageId = extractId(server["image"])
  const flavorId = extractId(server["flavor"])
  ctx.log.debug(`image_id = ${imageId ?? "none"}, flavor_id = ${flavorId ?? "none"}`)

  if (imageId) {
    await captureCommand(ctx, "image-flavor", vmId, ["openstack", "image", "show", imageId], {
      category: "glance",
      fileName: "image_show.txt",
    })
  }
  if (flavorId) {
    await captureCommand(ctx, "image-flavor", vmId, ["openstack", "flavor", "show", flavorId], {
      category: "nova",
      fileName: "flavor_show.txt",
    })
  }
}
