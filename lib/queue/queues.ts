import { Queue, type QueueOptions } from "bullmq"
import { INGEST_QUEUE_NAME } from "@/lib/config/settings"
import type { IngestJobMessage } from "@/lib/ports/types"
import { createRedisConnection } from "./redis"

export const INGEST_JOB_NAME = "ingest-document"

// No automatic retries: a failed document is released in the ledger and resubmitted by the user
const ingestQueueOptions: Partial<QueueOptions> = {
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: {
      count: 100, // Keep last 100 completed jobs
      age: 24 * 60 * 60, // Keep for 24 hours
    },
    removeOnFail: {
      count: 500, // Keep last 500 failed jobs for debugging
      age: 7 * 24 * 60 * 60, // Keep for 7 days
    },
  },
}

let ingestQueue: Queue<IngestJobMessage> | null = null

/**
 * Get or create the ingestion queue
 * Only creates queue at runtime, not on import
 */
export function getIngestQueue(): Queue<IngestJobMessage> {
  if (!ingestQueue) {
    ingestQueue = new Queue<IngestJobMessage>(INGEST_QUEUE_NAME, {
      connection: createRedisConnection(),
      ...ingestQueueOptions,
    })
  }
  return ingestQueue
}

/**
 * Add an ingestion job to the queue
 */
export async function queueIngestion(message: IngestJobMessage): Promise<string | undefined> {
  const job = await getIngestQueue().add(INGEST_JOB_NAME, message)
  return job.id
}

/**
 * Close the queue connection gracefully
 */
export async function closeIngestQueue(): Promise<void> {
  if (ingestQueue) {
    await ingestQueue.close()
    ingestQueue = null
  }
}
