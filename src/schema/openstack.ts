import { z } from "zod"

// Only the fields the collectors read are declared; everything else passes through untouched.

export const serverDetailSchema = z.record(z.string(), z.unknown())

export type ServerDetail = z.infer<typeof serverDetailSchema>

export const attachedVolumesSchema = z.array(
  z.object({ id: z.string().nullish() }).passthrough(),
)

export const portRowSchema = z
  .object({
    ID: z.string().nullish(),
    "Network ID": z.string().nullish(),
    "Security Group": z.unknown().optional(),
    "Security Groups": z.unknown().optional(),
  })
  .passthrough()

export const portListSchema = z.array(portRowSchema)

export type PortRow = z.infer<typeof portRowSchema>

export const portDetailSchema = z
  .object({
    security_group_ids: z.unknown().optional(),
  })
  .passthrough()

export type PortDetail = z.infer<typeof portDetailSchema>

export const stackResourceListSchema = z.array(
  z.object({ resource_name: z.string().nullish() }).passthrough(),
)
