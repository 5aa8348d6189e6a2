/**
 * HttpCrossEncoderReranker - IReranker backed by a cross-encoder served over
 * HTTP (text-embeddings-inference style):
 *
 *   POST {baseUrl}/rerank  { query, texts }  →  [{ index, score }, …]
 *
 * Every candidate comes back with a score; candidates the server leaves out
 * score 0. Output is sorted by score, highest first.
 */

import { z } from "zod"
import { getRerankerUrl } from "@/lib/config/settings"
import type { IReranker } from "@/lib/ports/reranker"
import type { RankedCandidate, RetrievalCandidate } from "@/lib/ports/types"
import { MalformedResponseError, TransientInfrastructureError } from "@/lib/utils/errors"
import { type RetryOptions, withRetry } from "@/lib/utils/retry"

const RERANK_TIMEOUT_MS = 30_000

const RerankResponseSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    score: z.number(),
  })
)

export interface HttpCrossEncoderRerankerOptions {
  baseUrl?: string
  fetchImpl?: typeof fetch
  retry?: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs">
}

export class HttpCrossEncoderReranker implements IReranker {
  private readonly baseUrl: string
  private readonly fetchImpl: typeof fetch
  private readonly retry: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs">

  constructor(options: HttpCrossEncoderRerankerOptions = {}) {
    this.baseUrl = (options.baseUrl ?? getRerankerUrl()).replace(/\/+$/, "")
    this.fetchImpl = options.fetchImpl ?? fetch
    this.retry = options.retry ?? {}
  }

  async rerank(query: string, candidates: RetrievalCandidate[]): Promise<RankedCandidate[]> {
    if (candidates.length === 0) return []

    const scores = await withRetry(
      async () => {
        const res = await this.fetchImpl(`${this.baseUrl}/rerank`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ query, texts: candidates.map((c) => c.text) }),
          signal: AbortSignal.timeout(RERANK_TIMEOUT_MS),
        })
        if (!res.ok) {
          const message = `Reranker error: ${res.status}`
          if (res.status === 429 || res.status >= 500) throw new TransientInfrastructureError(message, res.status)
          throw new Error(message)
        }
        const parsed = RerankResponseSchema.safeParse(await res.json())
        if (!parsed.success) {
          throw new MalformedResponseError(`Reranker response has an unexpected shape: ${parsed.error.message}`)
        }
        return parsed.data
      },
      { ...this.retry, label: "reranker.rerank" }
    )

    const byIndex = new Map<number, number>()
    for (const { index, score } of scores) {
      if (index < candidates.length && Number.isFinite(score)) byIndex.set(index, score)
    }
    return candidates
      .map((candidate, i) => ({ ...candidate, score: byIndex.get(i) ?? 0 }))
      .sort((a, b) => b.score - a.score)
  }
}
