/**
 * Job and content-hash ledger on top of ILedgerStore.
 *
 *   job:{batch}:{path}  PROCESSING | COMPLETED | FAILED: {message}
 *   hash:{contentHash}  QUEUED | COMPLETED   (deleted when a job fails)
 *
 * The hash entry guards duplicate submissions; the job entry is what status
 * queries read.
 */

import type { ILedgerStore } from "@/lib/ports/ledger-store"
import type { HashState, JobStatus } from "@/lib/ports/types"

export const JOB_KEY_PREFIX = "job:"
export const HASH_KEY_PREFIX = "hash:"

const FAILED_PREFIX = "FAILED: "

export function jobKey(batch: string, path: string): string {
  return `${JOB_KEY_PREFIX}${batch}:${path}`
}

export function hashKey(contentHash: string): string {
  return `${HASH_KEY_PREFIX}${contentHash}`
}

/** Parse a stored job value. Unknown values read as null. */
export function parseJobValue(batch: string, file: string, value: string): JobStatus | null {
  if (value === "PROCESSING" || value === "COMPLETED") {
    return { file, batch, state: value }
  }
  if (value.startsWith("FAILED")) {
    const error = value.startsWith(FAILED_PREFIX) ? value.slice(FAILED_PREFIX.length) : ""
    return { file, batch, state: "FAILED", error }
  }
  return null
}

export class JobLedger {
  constructor(private readonly store: ILedgerStore) {}

  async markProcessing(batch: string, path: string): Promise<void> {
    await this.store.set(jobKey(batch, path), "PROCESSING")
  }

  async markCompleted(batch: string, path: string): Promise<void> {
    await this.store.set(jobKey(batch, path), "COMPLETED")
  }

  async markFailed(batch: string, path: string, message: string): Promise<void> {
    await this.store.set(jobKey(batch, path), `${FAILED_PREFIX}${message}`)
  }

  async getJobStatus(batch: string, path: string): Promise<JobStatus | null> {
    const value = await this.store.get(jobKey(batch, path))
    return value === null ? null : parseJobValue(batch, path, value)
  }

  async getHashState(contentHash: string): Promise<HashState | null> {
    const value = await this.store.get(hashKey(contentHash))
    return value === "QUEUED" || value === "COMPLETED" ? value : null
  }

  /** Claim a hash for a new submission. False when it is already queued or ingested. */
  async claimHash(contentHash: string): Promise<boolean> {
    return this.store.setIfNotExists(hashKey(contentHash), "QUEUED")
  }

  async completeHash(contentHash: string): Promise<void> {
    await this.store.set(hashKey(contentHash), "COMPLETED")
  }

  /** Release a hash so the same content can be submitted again. */
  async releaseHash(contentHash: string): Promise<void> {
    await this.store.delete(hashKey(contentHash))
  }

  /** Remove every job and hash entry. Returns the number of keys deleted. */
  async clear(): Promise<number> {
    const hashes = await this.store.deleteByPrefix(HASH_KEY_PREFIX)
    const jobs = await this.store.deleteByPrefix(JOB_KEY_PREFIX)
    return hashes + jobs
  }
}
