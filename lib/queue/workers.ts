import { type Job, Worker } from "bullmq"
import { INGEST_QUEUE_NAME } from "@/lib/config/settings"
import type { IngestionOutcome, IngestionPipeline } from "@/lib/ingestion/pipeline"
import type { IngestJobMessage } from "@/lib/ports/types"
import { logger } from "@/lib/utils/logger"
import { createRedisConnection } from "./redis"

const log = logger.child({ service: "ingest-worker" })

// Worker instances
const workers: Worker[] = []

/**
 * Start the ingestion worker.
 * One job at a time; a job is acknowledged only once `processJob` returns.
 * Job failures are recorded in the ledger by the pipeline, so the processor
 * only throws when the ledger itself is unreachable.
 */
export function startIngestionWorker(pipeline: IngestionPipeline): Worker<IngestJobMessage, IngestionOutcome> {
  const worker = new Worker<IngestJobMessage, IngestionOutcome>(
    INGEST_QUEUE_NAME,
    async (job: Job<IngestJobMessage>) => pipeline.processJob(job.data),
    {
      connection: createRedisConnection(),
      concurrency: 1,
    }
  )

  worker.on("completed", (job, outcome) => {
    log.info("Job finished", { jobId: job.id, status: outcome.status, batchId: job.data.batch, file: job.data.path })
  })

  worker.on("failed", (job, error) => {
    log.error("Job crashed", error, { jobId: job?.id })
  })

  worker.on("error", (error) => {
    log.error("Worker error", error)
  })

  workers.push(worker)
  log.info("Worker listening", { queue: INGEST_QUEUE_NAME })
  return worker
}

/**
 * Stop all workers gracefully
 */
export async function stopWorkers(): Promise<void> {
  log.info("Stopping workers...")
  await Promise.all(workers.map((w) => w.close()))
  workers.length = 0
  log.info("All workers stopped")
}
