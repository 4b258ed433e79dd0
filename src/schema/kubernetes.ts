import { z } from "zod"

const containerSchema = z.object({ name: z.string() }).passthrough()

export const podSchema = z
  .object({
    metadata: z.object({ name: z.string() }).passthrough(),
    spec: z
      .object({
        containers: z.array(containerSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough()

export const podListSchema = z
  .object({
    items: z.array(podSchema),
  })
  .passthrough()

export type Pod = z.infer<typeof podSchema>
