import { z } from "zod"
import type { ProgressEvent } from "@/lib/ports/types"

export const ProgressEventSchema = z.object({
  file: z.string(),
  status: z.enum(["PROCESSING", "SKIPPED", "COMPLETED", "FAILED"]),
  progress: z.string().optional(),
  error: z.string().optional(),
})

export function batchChannel(batchId: string): string {
  return `batch:${batchId}`
}

/** Decode a published message; anything that is not a progress event yields null. */
export function decodeProgressEvent(raw: string): ProgressEvent | null {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    return null
  }
  const parsed = ProgressEventSchema.safeParse(data)
  return parsed.success ? parsed.data : null
}
