/**
 * In-memory fakes for every port (testing).
 * Semantics mirror the production adapters: case-insensitive substring entity
 * lookups, idempotent upserts, cosine similarity, prefix deletes.
 */

import type { ChannelFactory } from "@/lib/llm/channels"
import type { ProviderConfig } from "@/lib/llm/config"
import { NOT_FOUND_ANSWER, SYSTEM_PROMPTS } from "@/lib/llm/prompts"
import { ResilientModelProvider } from "@/lib/llm/resilient-provider"
import { matchesAny, sanitizeRelation } from "@/lib/graph/relation"
import type { IDocumentLoader } from "@/lib/ports/document-loader"
import type { IGraphStore } from "@/lib/ports/graph-store"
import type { IJobQueue } from "@/lib/ports/job-queue"
import type { ILedgerStore } from "@/lib/ports/ledger-store"
import type { GenerateParams, IEmbedder, IModelChannel } from "@/lib/ports/llm-provider"
import type { INotificationBus } from "@/lib/ports/notification-bus"
import type { IReranker } from "@/lib/ports/reranker"
import type {
  ChunkPayload,
  HealthStatus,
  IngestJobMessage,
  Page,
  ProgressEvent,
  RankedCandidate,
  RetrievalCandidate,
  Triple,
  VectorHit,
  VectorPoint,
} from "@/lib/ports/types"
import type { IVectorStore } from "@/lib/ports/vector-store"
import { TransientInfrastructureError } from "@/lib/utils/errors"
import { sleep } from "@/lib/utils/retry"

const UP: HealthStatus = { status: "up", latencyMs: 0 }

// ── Graph ────────────────────────────────────────────────────────────────────

export class InMemoryGraphStore implements IGraphStore {
  readonly entities = new Set<string>()
  readonly relations = new Map<string, Triple>()
  readonly chunks = new Map<string, string>()
  readonly mentions = new Map<string, Set<string>>()

  async bootstrap(): Promise<void> {}
  async healthCheck(): Promise<HealthStatus> {
    return UP
  }

  async upsertTriple(subject: string, relation: string, object: string): Promise<void> {
    const type = sanitizeRelation(relation)
    this.entities.add(subject)
    this.entities.add(object)
    this.relations.set(`${subject}\u0000${type}\u0000${object}`, { from: subject, relation: type, to: object })
  }

  async linkChunkToEntities(chunkId: string, entities: string[], source?: string): Promise<void> {
    this.chunks.set(chunkId, source ?? "Unknown")
    const linked = this.mentions.get(chunkId) ?? new Set<string>()
    for (const name of entities) {
      this.entities.add(name)
      linked.add(name)
    }
    this.mentions.set(chunkId, linked)
  }

  async queryNeighbors(entityNames: string[]): Promise<Triple[]> {
    return [...this.relations.values()].filter((t) => matchesAny(t.from, entityNames)).slice(0, 50)
  }

  async findPaths(entityNames: string[]): Promise<Triple[]> {
    if (entityNames.filter(Boolean).length < 2) return []
    return [...this.relations.values()]
      .filter((t) => t.from !== t.to && matchesAny(t.from, entityNames) && matchesAny(t.to, entityNames))
      .slice(0, 20)
  }

  async chunksForEntity(entityName: string, sourceFilter?: string): Promise<string[]> {
    if (!entityName) return []
    const ids: string[] = []
    for (const [chunkId, names] of this.mentions) {
      if (sourceFilter && this.chunks.get(chunkId) !== sourceFilter) continue
      if ([...names].some((n) => matchesAny(n, [entityName]))) ids.push(chunkId)
    }
    return ids
  }

  async reset(): Promise<void> {
    this.entities.clear()
    this.relations.clear()
    this.chunks.clear()
    this.mentions.clear()
  }
}

// ── Vectors ──────────────────────────────────────────────────────────────────

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0, normA = 0, normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0)
    normA += (a[i] ?? 0) * (a[i] ?? 0)
    normB += (b[i] ?? 0) * (b[i] ?? 0)
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB)
  return denom > 0 ? dot / denom : 0
}

export class InMemoryVectorStore implements IVectorStore {
  readonly points = new Map<string, { vector: number[]; payload: ChunkPayload }>()
  /** Every id list passed to getByIds, including empty ones. */
  readonly getByIdsCalls: string[][] = []

  async upsert(id: string, text: string, vector: number[], metadata: Omit<ChunkPayload, "text">): Promise<void> {
    this.points.set(id, { vector, payload: { ...metadata, text } })
  }

  async search(vector: number[], limit: number, sourceFilter?: string): Promise<VectorHit[]> {
    const hits: VectorHit[] = []
    for (const [id, point] of this.points) {
      if (sourceFilter && point.payload.source !== sourceFilter) continue
      hits.push({ id, score: cosineSimilarity(vector, point.vector), payload: point.payload })
    }
    hits.sort((a, b) => b.score - a.score)
    return hits.slice(0, limit)
  }

  async getByIds(ids: string[]): Promise<VectorPoint[]> {
    this.getByIdsCalls.push([...ids])
    const points: VectorPoint[] = []
    for (const id of ids) {
      const point = this.points.get(id)
      if (point) points.push({ id, payload: point.payload })
    }
    return points
  }

  async listSources(): Promise<string[]> {
    return [...new Set([...this.points.values()].map((p) => p.payload.source))].sort()
  }

  async clear(): Promise<void> {
    this.points.clear()
  }

  async healthCheck(): Promise<HealthStatus> {
    return UP
  }
}

// ── Ledger ───────────────────────────────────────────────────────────────────

export class InMemoryLedgerStore implements ILedgerStore {
  readonly entries = new Map<string, string>()

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null
  }
  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value)
  }
  async setIfNotExists(key: string, value: string): Promise<boolean> {
    if (this.entries.has(key)) return false
    this.entries.set(key, value)
    return true
  }
  async delete(key: string): Promise<void> {
    this.entries.delete(key)
  }
  async deleteByPrefix(prefix: string): Promise<number> {
    let deleted = 0
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key)
        deleted++
      }
    }
    return deleted
  }
  async healthCheck(): Promise<HealthStatus> {
    return UP
  }
}

// ── Notifications ────────────────────────────────────────────────────────────

export class InMemoryNotificationBus implements INotificationBus {
  readonly published: Array<{ batchId: string; event: ProgressEvent }> = []

  constructor(private readonly pollIntervalMs = 5) {}

  async publish(batchId: string, event: ProgressEvent): Promise<void> {
    this.published.push({ batchId, event })
  }

  /** Events for one batch, in publish order. */
  eventsFor(batchId: string): ProgressEvent[] {
    return this.published.filter((p) => p.batchId === batchId).map((p) => p.event)
  }

  async *subscribe(batchId: string, options: { signal?: AbortSignal } = {}): AsyncIterable<ProgressEvent> {
    let cursor = this.published.length
    while (!options.signal?.aborted) {
      while (cursor < this.published.length) {
        const next = this.published[cursor]
        cursor++
        if (next && next.batchId === batchId) yield next.event
      }
      await sleep(this.pollIntervalMs)
    }
  }
}

// ── Documents & queue ────────────────────────────────────────────────────────

export class InMemoryDocumentLoader implements IDocumentLoader {
  private readonly documents = new Map<string, Page[] | Error>()

  /** Register a document. Plain strings become a single page. */
  add(path: string, content: string | Page[]): this {
    this.documents.set(path, typeof content === "string" ? [{ text: content, pageNumber: 1 }] : content)
    return this
  }

  /** Register a file whose bytes are readable but whose parse fails. */
  addCorrupt(path: string, reason = "Invalid PDF structure"): this {
    this.documents.set(path, new Error(reason))
    return this
  }

  async readBytes(path: string): Promise<Buffer> {
    const doc = this.documents.get(path)
    if (doc === undefined) throw new Error(`ENOENT: no such file or directory, open '${path}'`)
    if (doc instanceof Error) return Buffer.from(`corrupt:${path}`)
    return Buffer.from(doc.map((p) => p.text).join("\f"))
  }

  async load(path: string): Promise<Page[]> {
    const doc = this.documents.get(path)
    if (doc === undefined) throw new Error(`ENOENT: no such file or directory, open '${path}'`)
    if (doc instanceof Error) throw doc
    return doc
  }
}

export class InMemoryJobQueue implements IJobQueue {
  readonly messages: IngestJobMessage[] = []

  async enqueue(message: IngestJobMessage): Promise<void> {
    this.messages.push(message)
  }
}

// ── Reranker ─────────────────────────────────────────────────────────────────

function terms(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]{3,}/g) ?? []
}

/** Scores by the share of query terms present in the candidate. */
export class FakeReranker implements IReranker {
  readonly calls: Array<{ query: string; candidates: RetrievalCandidate[] }> = []

  async rerank(query: string, candidates: RetrievalCandidate[]): Promise<RankedCandidate[]> {
    this.calls.push({ query, candidates })
    const queryTerms = new Set(terms(query))
    return candidates
      .map((c) => {
        const text = new Set(terms(c.text))
        const hits = [...queryTerms].filter((t) => text.has(t)).length
        return { ...c, score: queryTerms.size > 0 ? hits / queryTerms.size : 0 }
      })
      .sort((a, b) => b.score - a.score)
  }
}

// ── Models ───────────────────────────────────────────────────────────────────

export type ModelHandler = (params: GenerateParams) => string | Promise<string>

function between(text: string, start: string, end: string): string {
  const from = text.indexOf(start)
  if (from === -1) return ""
  const rest = text.slice(from + start.length)
  const to = rest.indexOf(end)
  return (to === -1 ? rest : rest.slice(0, to)).trim()
}

/**
 * Deterministic stand-in for a language model, routed on the system prompt
 * and prompt shape. Synthesis echoes the passages it was given, or the
 * not-found answer when there are none.
 */
export const defaultModelReply: ModelHandler = ({ prompt, system }) => {
  if (system === SYSTEM_PROMPTS.queryExpander) {
    return `"What are the definitions, categories, or examples of ${between(prompt, "Term: '", "'")}?"`
  }
  if (system === SYSTEM_PROMPTS.entityExtractor) return "None"
  if (system === SYSTEM_PROMPTS.graphExtractor) return '{"entities": [], "relationships": []}'
  if (prompt.startsWith("Merge these two summaries:")) return "Merged summary."
  if (prompt.includes("Document Text:")) return "Document summary."
  if (prompt.startsWith("<document_context>")) return "Chunk header."
  if (prompt.includes("[Relevant Knowledge")) {
    const passages = between(prompt, ")]\n", "\n\nYour Answer:")
    return passages ? `From the documents: ${passages}` : NOT_FOUND_ANSWER
  }
  return "ok"
}

export class ScriptedModelChannel implements IModelChannel {
  available = true
  readonly calls: GenerateParams[] = []

  constructor(
    readonly name: string,
    readonly model: string,
    private handler: ModelHandler = defaultModelReply
  ) {}

  setHandler(handler: ModelHandler): void {
    this.handler = handler
  }

  async isAvailable(): Promise<boolean> {
    return this.available
  }

  async generate(params: GenerateParams): Promise<string> {
    this.calls.push(params)
    return this.handler(params)
  }
}

/** A local channel whose backend cannot be reached. */
export class UnreachableModelChannel implements IModelChannel {
  generateCalls = 0

  constructor(
    readonly name: string,
    readonly model: string,
    /** Report the model as installed, so the failure shows up on generate. */
    private readonly advertise = false
  ) {}

  async isAvailable(): Promise<boolean> {
    return this.advertise
  }

  async generate(): Promise<string> {
    this.generateCalls++
    throw new TransientInfrastructureError("connect ECONNREFUSED 127.0.0.1:11434")
  }
}

/** Hashed bag-of-words embedding: shared words → higher cosine similarity. */
export class HashingEmbedder implements IEmbedder {
  readonly calls: string[] = []

  constructor(
    readonly name = "fake",
    readonly model = "hashing-64",
    private readonly dimension = 64
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text)
    const vec = new Array<number>(this.dimension).fill(0)
    for (const term of terms(text)) {
      let hash = 0
      for (let i = 0; i < term.length; i++) {
        hash = ((hash << 5) - hash + term.charCodeAt(i)) | 0
      }
      const bucket = Math.abs(hash) % this.dimension
      vec[bucket] = (vec[bucket] ?? 0) + 1
    }
    return vec
  }
}

export const TEST_PROVIDER_CONFIG: ProviderConfig = {
  provider: "openai",
  apiKey: "test-secret",
  model: "gpt-4o",
  embeddingModel: "text-embedding-3-small",
  useLocalLlm: true,
  ollamaBaseUrl: "http://localhost:11434",
  localModel: "mistral",
}

export interface FakeModels {
  provider: ResilientModelProvider
  local: IModelChannel
  cloud: ScriptedModelChannel
  embedder: HashingEmbedder
}

/** A real ResilientModelProvider wired to fake channels. */
export function createFakeModels(
  options: { local?: IModelChannel; cloud?: ScriptedModelChannel; config?: Partial<ProviderConfig> } = {}
): FakeModels {
  const local = options.local ?? new ScriptedModelChannel("ollama", "mistral")
  const cloud = options.cloud ?? new ScriptedModelChannel("openai", "gpt-4o")
  const embedder = new HashingEmbedder()
  const factory: ChannelFactory = (config) => ({
    config,
    local: config.useLocalLlm ? local : null,
    cloud,
    embedder,
  })
  const provider = new ResilientModelProvider({ ...TEST_PROVIDER_CONFIG, ...options.config }, factory)
  return { provider, local, cloud, embedder }
}
