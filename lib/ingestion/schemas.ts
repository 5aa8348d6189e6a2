import { z } from "zod"

/** Producer → worker queue message. */
export const IngestJobMessageSchema = z.object({
  path: z.string().min(1),
  batch: z.string().min(1),
  hash: z.string().min(1).optional(),
})
