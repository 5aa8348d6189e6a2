import type { HealthStatus, Triple } from "./types"

/**
 * Graph store port - flat Entity / Chunk model.
 *
 * Entity lookups are case-insensitive substring matches. Read methods never
 * throw: a failed query is logged and yields an empty result, since graph
 * results only enrich a query path that can fall back to vectors.
 */
export interface IGraphStore {
  bootstrap(): Promise<void>
  healthCheck(): Promise<HealthStatus>

  /** Idempotent: repeated identical triples collapse to one edge. */
  upsertTriple(subject: string, relation: string, object: string): Promise<void>
  /** Create the Chunk node and a MENTIONS edge to each entity. */
  linkChunkToEntities(chunkId: string, entities: string[], source?: string): Promise<void>

  /** Outgoing edges of every entity whose name contains one of `entityNames`. */
  queryNeighbors(entityNames: string[]): Promise<Triple[]>
  /** Direct edges, either direction, between two members of the set. Never self-loops. */
  findPaths(entityNames: string[]): Promise<Triple[]>
  chunksForEntity(entityName: string, sourceFilter?: string): Promise<string[]>

  /** Full wipe. */
  reset(): Promise<void>
}
