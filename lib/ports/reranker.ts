import type { RankedCandidate, RetrievalCandidate } from "./types"

export interface IReranker {
  /** Score every candidate against the query; highest score first. */
  rerank(query: string, candidates: RetrievalCandidate[]): Promise<RankedCandidate[]>
}
