import type { IJobQueue } from "@/lib/ports/job-queue"
import type { IngestJobMessage } from "@/lib/ports/types"
import { queueIngestion } from "@/lib/queue/queues"
import { logger } from "@/lib/utils/logger"

/** IJobQueue on the BullMQ ingestion queue. */
export class BullMQJobQueue implements IJobQueue {
  async enqueue(message: IngestJobMessage): Promise<void> {
    const jobId = await queueIngestion(message)
    logger.info("Job queued", { service: "job-queue", batchId: message.batch, file: message.path, jobId })
  }
}
