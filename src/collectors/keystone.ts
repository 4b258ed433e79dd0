import { captureCommand } from "./capture.js"
import type { CollectContext } from "./types.js"

export const collectKeystoneUser = async (ctx: CollectContext, user: string): Promise<void> => {
  ctx.log.info(`Collecting keystone data for user ${user}`)
  await captureCommand(ctx, "keystone", user, ["openstack", "user", "show", user], {
    category: "keystone",
    fileName: "user_show.txt",
  })
  await captureCommand(
    ctx,
    "keystone",
    user,
    ["openstack", "role", "assignment", "list", "--user", user, "--names"],
    { category: "keystone", fileName: "user_role_assignments.txt" },
  )
}
