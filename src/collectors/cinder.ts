import { toFileComponent } from "../artifacts/artifact-store.js"
import { attachedVolumesSchema, type ServerDetail } from "../schema/openstack.js"
import { captureCommand, recordFailure, saveArtifact } from "./capture.js"
import type { CollectContext } from "./types.js"

// Older clients prefix the attribute with its API extension name.
const VOLUME_ATTRIBUTES = ["os-extended-volumes:volumes_attached", "volumes_attached"] as const

const readAttachedVolumes = (server: ServerDetail): unknown => {
  for (const attribute of VOLUME_ATTRIBUTES) {
    if (server[attribute] !== undefined) {
      return server[attribute]
    }
  }
  return []
}

export const collectVolumes = async (
  ctx: CollectContext,
  vmId: string,
  server: ServerDetail,
): Promise<void> => {
  const raw = readAttachedVolumes(server)
  const parsed = attachedVolumesSchema.safeParse(raw)
  if (!parsed.success) {
    recordFailure(ctx, "volumes", vmId, "Attached volume list is not a list of volumes")
    return
  }

  const attached = parsed.data
  await saveArtifact(ctx, "volumes", vmId, {
    category: "cinder",
    fileName: "attached_volumes.txt",
    payload: JSON.stringify(raw, null, 2),
  })

  for (const volume of attached) {
    if (!volume.id) {
      continue
    }
    await captureCommand(ctx, "volumes", volume.id, ["openstack", "volume", "show", volume.id], {
      category: "cinder",
      fileName: `volume_${toFileComponent(volume.id)}.txt`,
    })
  }
}
