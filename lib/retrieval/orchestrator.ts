/**
 * RetrievalOrchestrator - federated graph + vector search for one question.
 *
 *   refine → extract entities → graph expansion ┐
 *                              vector search ───┴→ pool → rerank → synthesize
 *
 * `vector` mode skips entity extraction and graph expansion; `graph` mode
 * skips vector search. The whole pipeline retries as a unit.
 */

import { z } from "zod"
import { RETRIEVAL_LIMITS, RETRIEVAL_RETRY } from "@/lib/config/settings"
import { buildSynthesisPrompt } from "@/lib/llm/prompts"
import type { ResilientModelProvider } from "@/lib/llm/resilient-provider"
import type { IGraphStore } from "@/lib/ports/graph-store"
import type { IReranker } from "@/lib/ports/reranker"
import type { RankedCandidate, RetrievalCandidate, RetrievalMode, Triple } from "@/lib/ports/types"
import type { IVectorStore } from "@/lib/ports/vector-store"
import { ValidationError, validationErrorFromZod } from "@/lib/utils/errors"
import { logger } from "@/lib/utils/logger"
import { type RetryOptions, withRetry } from "@/lib/utils/retry"
import { dedupeTriples, expandEntities, formatTriples } from "./graph-context"

export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, "Query must not be empty"),
  sourceFilter: z.string().min(1).optional(),
  mode: z.enum(["hybrid", "vector", "graph"]).default("hybrid"),
})

export type SearchRequest = z.input<typeof SearchRequestSchema>

export interface SearchSource {
  source: string
  text: string
  score: number
  chunkIndex: number
  pageNumber: number
}

export interface SearchDebug {
  mode: RetrievalMode
  originalQuery: string
  refinedQuery: string
  promptSent: string
  candidateCounts: {
    vector: number
    graph: number
    total: number
    reranked: number
  }
  providerUsed: string
}

export interface SearchResult {
  answer: string
  sources: SearchSource[]
  /** Entities extracted from the question. Empty in vector mode. */
  graphContext: string[]
  debug: SearchDebug
}

export interface RetrievalDeps {
  provider: ResilientModelProvider
  graphStore: IGraphStore
  vectorStore: IVectorStore
  reranker: IReranker
  retry?: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs">
}

function finite(value: unknown, fallback: number): number {
  const n = typeof value === "number" ? value : typeof value === "string" ? parseFloat(value) : NaN
  return Number.isFinite(n) ? n : fallback
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length
}

function formatPassages(candidates: RankedCandidate[]): string {
  return candidates.map((c) => `- ${c.text} (Src: ${c.metadata.source})`).join("\n")
}

export class RetrievalOrchestrator {
  private readonly log = logger.child({ service: "retrieval" })

  constructor(private readonly deps: RetrievalDeps) {}

  /** Validate the request, then run the pipeline with retries. Validation errors are not retried. */
  async search(request: SearchRequest): Promise<SearchResult> {
    const parsed = SearchRequestSchema.safeParse(request)
    if (!parsed.success) {
      throw validationErrorFromZod("Invalid search request", parsed.error)
    }
    const { query, sourceFilter, mode } = parsed.data

    return withRetry(() => this.run(query, mode, sourceFilter), {
      attempts: RETRIEVAL_RETRY.attempts,
      baseDelayMs: RETRIEVAL_RETRY.baseDelayMs,
      maxDelayMs: RETRIEVAL_RETRY.maxDelayMs,
      ...this.deps.retry,
      retryIf: (error) => !(error instanceof ValidationError),
      label: "retrieval.search",
    })
  }

  private async run(query: string, mode: RetrievalMode, sourceFilter?: string): Promise<SearchResult> {
    const { provider, vectorStore, reranker } = this.deps

    try {
      const refinedQuery = wordCount(query) < RETRIEVAL_LIMITS.refineBelowWords ? await provider.refine(query) : query

      let entities: string[] = []
      let triples: Triple[] = []
      let graphCandidates: RetrievalCandidate[] = []
      if (mode !== "vector") {
        entities = (await provider.extractEntities(refinedQuery)).slice(0, RETRIEVAL_LIMITS.maxQueryEntities)
        this.log.info("Extracted entities", { entities })
        if (entities.length > 0) {
          const expansion = await this.expandGraph(entities, sourceFilter)
          triples = expansion.triples
          graphCandidates = expansion.candidates
        }
      }

      let vectorCandidates: RetrievalCandidate[] = []
      if (mode !== "graph") {
        const queryVector = await provider.embed(refinedQuery)
        const hits = await vectorStore.search(queryVector, RETRIEVAL_LIMITS.vectorTopK, sourceFilter)
        vectorCandidates = hits.map((h) => ({ id: h.id, text: h.payload.text, metadata: h.payload }))
      }

      const seen = new Set<string>()
      const pool: RetrievalCandidate[] = []
      for (const candidate of [...vectorCandidates, ...graphCandidates]) {
        if (seen.has(candidate.id)) continue
        seen.add(candidate.id)
        pool.push(candidate)
      }
      this.log.info("Unified reranking pool", { mode, pool: pool.length })

      let reranked: RankedCandidate[] = []
      if (pool.length === 0) {
        this.log.warn("No documents found, skipping rerank", { mode })
      } else {
        reranked = await reranker.rerank(refinedQuery, pool)
      }
      const top = reranked.slice(0, RETRIEVAL_LIMITS.rerankTopN)

      const promptSent = buildSynthesisPrompt({
        originalQuery: query,
        refinedQuery,
        graphContext: mode === "vector" ? null : formatTriples(triples),
        passages: formatPassages(top),
        modeLabel: mode.toUpperCase(),
      })
      const synthesis = await provider.generateWithMeta(promptSent, undefined, { channel: "cloud" })

      return {
        answer: synthesis.text.trim(),
        sources: top.map((c) => ({
          source: c.metadata.source,
          text: c.text,
          score: finite(c.score, 0),
          chunkIndex: finite(c.metadata.chunk_index, 0),
          pageNumber: finite(c.metadata.page_number, 1),
        })),
        graphContext: entities,
        debug: {
          mode,
          originalQuery: query,
          refinedQuery,
          promptSent,
          candidateCounts: {
            vector: vectorCandidates.length,
            graph: graphCandidates.length,
            total: pool.length,
            reranked: reranked.length,
          },
          providerUsed: synthesis.provider,
        },
      }
    } catch (error: unknown) {
      this.log.error("Retrieval failed", error, { mode })
      throw error
    }
  }

  /** Neighbors ∪ paths → expanded entity set → mentioning chunks → payloads. */
  private async expandGraph(
    entities: string[],
    sourceFilter?: string
  ): Promise<{ triples: Triple[]; candidates: RetrievalCandidate[] }> {
    const { graphStore, vectorStore } = this.deps

    const [neighbors, paths] = await Promise.all([graphStore.queryNeighbors(entities), graphStore.findPaths(entities)])
    const triples = dedupeTriples(neighbors, paths)
    const expanded = expandEntities(entities, triples, RETRIEVAL_LIMITS.maxExpandedEntities)
    this.log.info("Expanded graph search entities", { entities: expanded, triples: triples.length })

    try {
      const chunkIds = new Set<string>()
      for (const entity of expanded) {
        for (const id of await graphStore.chunksForEntity(entity, sourceFilter)) {
          chunkIds.add(id)
        }
      }
      const topIds = [...chunkIds].slice(0, RETRIEVAL_LIMITS.maxGraphChunks)
      const points = await vectorStore.getByIds(topIds)
      this.log.info("Retrieved chunk payloads via graph", { linked: chunkIds.size, retrieved: points.length })
      return { triples, candidates: points.map((p) => ({ id: p.id, text: p.payload.text, metadata: p.payload })) }
    } catch (error: unknown) {
      this.log.error("Error fetching graph chunks", error)
      return { triples, candidates: [] }
    }
  }
}
