import { beforeEach, describe, expect, it } from "vitest"
import { InMemoryDocumentLoader, InMemoryJobQueue, InMemoryLedgerStore } from "@/lib/di/fakes"
import { contentHash, DocumentSubmitter } from "@/lib/ingestion/submit"
import { JobLedger } from "@/lib/ledger/job-ledger"
import type { IJobQueue } from "@/lib/ports/job-queue"

const HELLO_MD5 = "5d41402abc4b2a76b9719d911017c592"

describe("contentHash", () => {
  it("is the hex MD5 of the bytes", () => {
    expect(contentHash(Buffer.from("hello"))).toBe(HELLO_MD5)
  })
})

describe("DocumentSubmitter", () => {
  let loader: InMemoryDocumentLoader
  let ledgerStore: InMemoryLedgerStore
  let ledger: JobLedger
  let queue: InMemoryJobQueue
  let submitter: DocumentSubmitter

  beforeEach(() => {
    loader = new InMemoryDocumentLoader().add("a.txt", "hello").add("copy.txt", "hello").add("b.txt", "world")
    ledgerStore = new InMemoryLedgerStore()
    ledger = new JobLedger(ledgerStore)
    queue = new InMemoryJobQueue()
    submitter = new DocumentSubmitter({ loader, ledger, queue })
  })

  it("claims the hash and enqueues new content", async () => {
    const result = await submitter.submitDocument("a.txt", "b1")

    expect(result).toEqual({ file: "a.txt", status: "queued", message: "Processing started", hash: HELLO_MD5 })
    expect(queue.messages).toEqual([{ path: "a.txt", batch: "b1", hash: HELLO_MD5 }])
    await expect(ledger.getHashState(HELLO_MD5)).resolves.toBe("QUEUED")
  })

  it("skips content that is already queued, whatever the file name", async () => {
    await submitter.submitDocument("a.txt", "b1")
    const duplicate = await submitter.submitDocument("copy.txt", "b2")

    expect(duplicate).toEqual({ file: "copy.txt", status: "skipped", message: "Duplicate file", hash: HELLO_MD5 })
    expect(queue.messages).toHaveLength(1)
  })

  it("skips content that was already ingested", async () => {
    await ledger.completeHash(HELLO_MD5)
    await expect(submitter.submitDocument("a.txt")).resolves.toMatchObject({ status: "skipped" })
    expect(queue.messages).toHaveLength(0)
  })

  it("accepts content again once a failed job released its hash", async () => {
    await submitter.submitDocument("a.txt", "b1")
    await ledger.releaseHash(HELLO_MD5)

    await expect(submitter.submitDocument("a.txt", "b2")).resolves.toMatchObject({ status: "queued" })
    expect(queue.messages.map((m) => m.batch)).toEqual(["b1", "b2"])
  })

  it("releases the hash when enqueueing fails", async () => {
    const brokenQueue: IJobQueue = {
      enqueue: async () => {
        throw new Error("queue unavailable")
      },
    }
    const failing = new DocumentSubmitter({ loader, ledger, queue: brokenQueue })

    await expect(failing.submitDocument("a.txt")).rejects.toThrow("queue unavailable")
    await expect(ledger.getHashState(HELLO_MD5)).resolves.toBeNull()
  })

  it("propagates unreadable files", async () => {
    await expect(submitter.submitDocument("missing.pdf")).rejects.toThrow("ENOENT")
    expect(ledgerStore.entries.size).toBe(0)
  })

  it("submits a batch under one batch id", async () => {
    const { batchId, results } = await submitter.submitBatch(["a.txt", "b.txt", "copy.txt"])

    expect(results.map((r) => [r.file, r.status])).toEqual([
      ["a.txt", "queued"],
      ["b.txt", "queued"],
      ["copy.txt", "skipped"],
    ])
    expect(queue.messages.map((m) => m.batch)).toEqual([batchId, batchId])
    expect(batchId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
  })
})
