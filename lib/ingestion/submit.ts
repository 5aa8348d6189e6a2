/**
 * Producer side of ingestion: hash, dedup, enqueue. Never waits on processing.
 */

import { createHash } from "node:crypto"
import { v4 as uuidv4 } from "uuid"
import type { JobLedger } from "@/lib/ledger/job-ledger"
import type { IDocumentLoader } from "@/lib/ports/document-loader"
import type { IJobQueue } from "@/lib/ports/job-queue"
import { logger } from "@/lib/utils/logger"

export interface SubmissionResult {
  file: string
  status: "queued" | "skipped"
  message: string
  hash: string
}

export interface BatchSubmission {
  batchId: string
  results: SubmissionResult[]
}

export interface SubmitDeps {
  loader: IDocumentLoader
  ledger: JobLedger
  queue: IJobQueue
}

export function contentHash(bytes: Buffer): string {
  return createHash("md5").update(bytes).digest("hex")
}

export class DocumentSubmitter {
  private readonly log = logger.child({ service: "submit" })

  constructor(private readonly deps: SubmitDeps) {}

  /**
   * Claim the file's content hash and enqueue it. Content already queued or
   * ingested is reported as skipped and not enqueued.
   */
  async submitDocument(path: string, batchId: string = uuidv4()): Promise<SubmissionResult> {
    const hash = contentHash(await this.deps.loader.readBytes(path))

    if (!(await this.deps.ledger.claimHash(hash))) {
      this.log.info("Duplicate file detected", { batchId, file: path, hash })
      return { file: path, status: "skipped", message: "Duplicate file", hash }
    }

    try {
      await this.deps.queue.enqueue({ path, batch: batchId, hash })
    } catch (error: unknown) {
      await this.deps.ledger.releaseHash(hash)
      throw error
    }
    return { file: path, status: "queued", message: "Processing started", hash }
  }

  /** Submit several files under one new batch id. */
  async submitBatch(paths: string[]): Promise<BatchSubmission> {
    const batchId = uuidv4()
    const results: SubmissionResult[] = []
    for (const path of paths) {
      results.push(await this.submitDocument(path, batchId))
    }
    this.log.info("Batch submitted", {
      batchId,
      queued: results.filter((r) => r.status === "queued").length,
      skipped: results.filter((r) => r.status === "skipped").length,
    })
    return { batchId, results }
  }
}
