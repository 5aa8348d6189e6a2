/**
 * Vector store port - chunk vectors with cosine similarity.
 * The collection is created lazily with the configured dimensionality.
 */

import type { ChunkPayload, HealthStatus, VectorHit, VectorPoint } from "./types"

export interface IVectorStore {
  upsert(id: string, text: string, vector: number[], metadata: Omit<ChunkPayload, "text">): Promise<void>
  /** Nearest neighbours, best first. `sourceFilter` matches `payload.source` exactly. */
  search(vector: number[], limit: number, sourceFilter?: string): Promise<VectorHit[]>
  /** Empty input returns [] without a round-trip. */
  getByIds(ids: string[]): Promise<VectorPoint[]>
  /** Distinct `source` values across stored chunks. */
  listSources(): Promise<string[]>
  clear(): Promise<void>
  healthCheck(): Promise<HealthStatus>
}
