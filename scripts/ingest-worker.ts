#!/usr/bin/env tsx
/**
 * Ingestion worker.
 * Consumes the ingestion queue one document at a time.
 *
 * Usage: npm run worker
 * Waits for Redis and ArangoDB with exponential backoff before taking jobs;
 * SIGINT / SIGTERM finish the current job and close connections.
 */

// Load .env.local / .env before any imports that read process.env at module scope.
import "./load-env"

import { createIngestionPipeline, getContainer } from "@/lib/di/container"
import { closeIngestQueue } from "@/lib/queue/queues"
import { closeRedis, getRedis } from "@/lib/queue/redis"
import { startIngestionWorker, stopWorkers } from "@/lib/queue/workers"
import { logger } from "@/lib/utils/logger"
import { sleep } from "@/lib/utils/retry"

const MAX_RETRY_MS = 60_000
const INITIAL_BACKOFF_MS = 1_000

const log = logger.child({ service: "ingest-worker" })

async function waitForInfrastructure(): Promise<void> {
  const container = getContainer()
  let backoff = INITIAL_BACKOFF_MS
  let attempt = 0

  while (true) {
    attempt++
    try {
      await getRedis().ping()
      await container.graphStore.bootstrap()
      return
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error)
      if (backoff >= MAX_RETRY_MS) {
        log.error("Max retries reached", error)
        throw error
      }
      log.warn(`Connection attempt ${attempt} failed, retrying in ${backoff}ms`, { errorMessage: message })
      await sleep(backoff)
      backoff = Math.min(backoff * 2, MAX_RETRY_MS)
    }
  }
}

async function shutdown(signal: string): Promise<void> {
  log.info("Shutting down", { signal })
  await stopWorkers()
  await closeIngestQueue()
  await closeRedis()
  process.exit(0)
}

async function main(): Promise<void> {
  await waitForInfrastructure()
  const pipeline = createIngestionPipeline(getContainer())
  startIngestionWorker(pipeline)
  log.info("Ingestion worker started. Waiting for jobs...")

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        log.error("Shutdown failed", err)
        process.exit(1)
      })
    })
  }
}

main().catch((err: unknown) => {
  log.error("Worker failed", err)
  process.exit(1)
})
