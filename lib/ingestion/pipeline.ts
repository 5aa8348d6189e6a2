/**
 * Document ingestion: one queued job → pages → summary → chunks → graph
 * triples + contextualized vectors.
 *
 * Safe under at-least-once delivery. Chunk ids derive from the batch and the
 * chunk index and every store write is an upsert, so a replayed job rewrites
 * the same records; a job whose content hash is already COMPLETED is skipped.
 */

import { v5 as uuidv5 } from "uuid"
import type { JobLedger } from "@/lib/ledger/job-ledger"
import type { ResilientModelProvider } from "@/lib/llm/resilient-provider"
import { buildContextualHeaderPrompt } from "@/lib/llm/prompts"
import type { IDocumentLoader } from "@/lib/ports/document-loader"
import type { IGraphStore } from "@/lib/ports/graph-store"
import type { INotificationBus } from "@/lib/ports/notification-bus"
import type { IngestJobMessage, ProgressEvent } from "@/lib/ports/types"
import type { IVectorStore } from "@/lib/ports/vector-store"
import { errorMessage } from "@/lib/utils/errors"
import { type Logger, logger } from "@/lib/utils/logger"
import { RecursiveTextChunker } from "./chunker"
import { buildPageMap, PageLocator } from "./page-map"
import { IngestJobMessageSchema } from "./schemas"
import { recursiveSummarize } from "./summarizer"

export interface IngestionDeps {
  provider: ResilientModelProvider
  graphStore: IGraphStore
  vectorStore: IVectorStore
  ledger: JobLedger
  notifications: INotificationBus
  loader: IDocumentLoader
  chunker?: RecursiveTextChunker
}

export type IngestionOutcome =
  | { status: "invalid"; reason: string }
  | { status: "skipped" }
  | { status: "completed"; chunks: number; indexed: number }
  | { status: "failed"; error: string }

/** Deterministic chunk id shared by the vector point and the graph node. */
export function chunkId(batch: string, index: number): string {
  return uuidv5(`${batch}_${index}`, uuidv5.DNS)
}

export class IngestionPipeline {
  private readonly chunker: RecursiveTextChunker
  private readonly log = logger.child({ service: "ingestion" })

  constructor(private readonly deps: IngestionDeps) {
    this.chunker = deps.chunker ?? new RecursiveTextChunker()
  }

  async processJob(raw: unknown): Promise<IngestionOutcome> {
    const parsed = IngestJobMessageSchema.safeParse(raw)
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => `${i.path.join(".") || "message"}: ${i.message}`).join("; ")
      this.log.error("Invalid message format, dropping", undefined, { reason })
      return { status: "invalid", reason }
    }

    const message: IngestJobMessage = parsed.data
    const { path, batch, hash } = message
    const log = this.log.child({ batchId: batch, file: path })
    const { ledger } = this.deps
    const publish = (event: Omit<ProgressEvent, "file">): Promise<void> =>
      this.deps.notifications.publish(batch, { file: path, ...event })

    try {
      await ledger.markProcessing(batch, path)
      await publish({ status: "PROCESSING", progress: "Started processing..." })
      log.info("Started")

      if (hash && (await ledger.getHashState(hash)) === "COMPLETED") {
        log.info("Skipping already completed file")
        await publish({ status: "SKIPPED", progress: "Already processed." })
        await ledger.markCompleted(batch, path)
        return { status: "skipped" }
      }

      const { chunks, indexed } = await this.ingest(message, log, publish)

      await ledger.markCompleted(batch, path)
      if (hash) await ledger.completeHash(hash)
      await publish({ status: "COMPLETED", progress: "Done" })
      log.info("Completed", { chunks, indexed })
      return { status: "completed", chunks, indexed }
    } catch (error: unknown) {
      const reason = errorMessage(error)
      log.error("Failed", error)
      try {
        await ledger.markFailed(batch, path, reason)
      } catch (markError: unknown) {
        log.error("Could not record job failure", markError)
      }
      if (hash) {
        log.info("Releasing deduplication lock", { hash })
        await ledger.releaseHash(hash)
      }
      await publish({ status: "FAILED", error: reason })
      return { status: "failed", error: reason }
    }
  }

  private async ingest(
    { path, batch }: IngestJobMessage,
    log: Logger,
    publish: (event: Omit<ProgressEvent, "file">) => Promise<void>
  ): Promise<{ chunks: number; indexed: number }> {
    const { provider, graphStore, vectorStore, loader } = this.deps

    const pages = await loader.load(path)
    const pageMap = buildPageMap(pages)
    if (pages.length === 0 || pageMap.fullText.trim().length === 0) {
      throw new Error(`File could not be loaded or is empty: ${path}`)
    }

    await publish({ status: "PROCESSING", progress: "Generating Document Summary..." })
    const summary = await recursiveSummarize(pageMap.fullText, provider)

    const chunks = this.chunker.split(pageMap.fullText)
    const total = chunks.length
    await publish({ status: "PROCESSING", progress: `Processing ${total} Chunks (Graph + Vector)...` })

    const locator = new PageLocator(pageMap)
    let indexed = 0

    for (const [index, chunkText] of chunks.entries()) {
      const id = chunkId(batch, index)
      await publish({ status: "PROCESSING", progress: `Processing Chunk ${index + 1}/${total}...` })

      try {
        const graph = await provider.extractGraph(chunkText)
        const mentioned = new Set<string>()
        for (const rel of graph.relationships) {
          await graphStore.upsertTriple(rel.source, rel.relation, rel.target)
          mentioned.add(rel.source)
          mentioned.add(rel.target)
        }
        if (mentioned.size > 0) {
          await graphStore.linkChunkToEntities(id, [...mentioned], path)
          log.debug("Linked chunk to entities", { chunkIndex: index, entities: mentioned.size })
        }
      } catch (error: unknown) {
        log.warn("Graph extraction failed", { chunkIndex: index, errorMessage: errorMessage(error) })
      }

      const pageNumber = locator.locate(chunkText)

      try {
        const header = await provider.generate(buildContextualHeaderPrompt(summary, chunkText))
        const content = `CONTEXT: ${header.trim()}\n\nCONTENT: ${chunkText}`
        const vector = await provider.embed(content)
        await vectorStore.upsert(id, content, vector, {
          source: path,
          batch,
          chunk_index: index,
          chunk_id: id,
          page_number: pageNumber,
        })
        indexed++
      } catch (error: unknown) {
        log.error("Vector indexing failed", error, { chunkIndex: index })
      }
    }

    return { chunks: total, indexed }
  }
}
