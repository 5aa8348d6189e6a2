/**
 * Domain types shared across all ports.
 * No external dependencies - used by port interfaces and adapters.
 */

export interface Page {
  text: string
  /** 1-based. */
  pageNumber: number
}

/** A (subject, relation, object) graph fact. */
export interface Triple {
  from: string
  relation: string
  to: string
}

/** Payload stored next to every chunk vector. Keys match the stored column names. */
export interface ChunkPayload {
  text: string
  source: string
  batch: string
  chunk_index: number
  chunk_id: string
  page_number: number
  [key: string]: unknown
}

export interface VectorHit {
  id: string
  score: number
  payload: ChunkPayload
}

export interface VectorPoint {
  id: string
  payload: ChunkPayload
}

export interface RetrievalCandidate {
  id: string
  text: string
  metadata: ChunkPayload
}

export interface RankedCandidate extends RetrievalCandidate {
  score: number
}

export interface ExtractedEntity {
  name: string
  type?: string
}

export interface ExtractedRelationship {
  source: string
  relation: string
  target: string
}

export interface ExtractedGraph {
  entities: ExtractedEntity[]
  relationships: ExtractedRelationship[]
}

export type RetrievalMode = "hybrid" | "vector" | "graph"

export interface HealthStatus {
  status: "up" | "down"
  latencyMs?: number
}

// ── Ledger & progress ─────────────────────────────────────────────────────────

export type JobState = "PROCESSING" | "COMPLETED" | "FAILED"

export interface JobStatus {
  file: string
  batch: string
  state: JobState
  error?: string
}

export type HashState = "QUEUED" | "COMPLETED"

export type ProgressStatus = "PROCESSING" | "SKIPPED" | "COMPLETED" | "FAILED"

export interface ProgressEvent {
  file: string
  status: ProgressStatus
  progress?: string
  error?: string
}

/** Producer → worker queue message. */
export interface IngestJobMessage {
  path: string
  batch: string
  hash?: string
}
