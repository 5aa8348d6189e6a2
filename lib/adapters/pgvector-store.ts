/**
 * PgVectorStore - IVectorStore implementation on PostgreSQL + pgvector.
 *
 * One row per chunk. Similarity is cosine: `1 - (embedding <=> query)`.
 * The extension and table are created on first use with the configured
 * dimensionality; a table created under a different provider keeps its width,
 * so switching to an embedder of another size needs a reset first.
 */

import { Pool } from "pg"
import { getPostgresConfig } from "@/lib/config/settings"
import type { IVectorStore } from "@/lib/ports/vector-store"
import type { ChunkPayload, HealthStatus, VectorHit, VectorPoint } from "@/lib/ports/types"
import { logger } from "@/lib/utils/logger"

type ChunkRow = {
  id: string
  text: string
  source: string
  batch: string
  chunk_index: number
  chunk_id: string
  page_number: number
}

type ScoredChunkRow = ChunkRow & { score: number | string | null }

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

function toVectorLiteral(vector: number[]): string {
  return `[${vector.join(",")}]`
}

function toPayload(row: ChunkRow): ChunkPayload {
  return {
    text: row.text,
    source: row.source,
    batch: row.batch,
    chunk_index: row.chunk_index,
    chunk_id: row.chunk_id,
    page_number: row.page_number,
  }
}

/** pgvector returns NaN distance for zero vectors; never let that leak out. */
function toScore(value: number | string | null): number {
  const n = typeof value === "string" ? parseFloat(value) : value ?? 0
  return Number.isFinite(n) ? n : 0
}

export interface PgVectorStoreOptions {
  dimension: number
  connectionString?: string
  table?: string
  pool?: Pool
}

export class PgVectorStore implements IVectorStore {
  private readonly pool: Pool
  private readonly table: string
  private readonly dimension: number
  private ensured: Promise<void> | null = null
  private readonly log = logger.child({ service: "pgvector-store" })

  constructor(options: PgVectorStoreOptions) {
    const defaults = getPostgresConfig()
    const table = options.table ?? defaults.table
    if (!IDENTIFIER.test(table)) {
      throw new Error(`Invalid vector table name: ${table}`)
    }
    this.table = table
    this.dimension = options.dimension
    this.pool = options.pool ?? new Pool({ connectionString: options.connectionString ?? defaults.connectionString, max: 5 })
  }

  private ensureTable(): Promise<void> {
    if (!this.ensured) {
      this.ensured = (async () => {
        await this.pool.query("CREATE EXTENSION IF NOT EXISTS vector")
        await this.pool.query(
          `CREATE TABLE IF NOT EXISTS ${this.table} (
            id TEXT PRIMARY KEY,
            text TEXT NOT NULL,
            source TEXT NOT NULL,
            batch TEXT NOT NULL,
            chunk_index INTEGER NOT NULL,
            chunk_id TEXT NOT NULL,
            page_number INTEGER NOT NULL,
            embedding vector(${this.dimension}) NOT NULL,
            created_at TIMESTAMPTZ NOT NULL DEFAULT now()
          )`
        )
        await this.pool.query(`CREATE INDEX IF NOT EXISTS ${this.table}_source_idx ON ${this.table} (source)`)
        this.log.info("Vector table ready", { table: this.table, dimension: this.dimension })
      })().catch((error: unknown) => {
        this.ensured = null
        throw error
      })
    }
    return this.ensured
  }

  async upsert(id: string, text: string, vector: number[], metadata: Omit<ChunkPayload, "text">): Promise<void> {
    await this.ensureTable()
    await this.pool.query(
      `INSERT INTO ${this.table} (id, text, source, batch, chunk_index, chunk_id, page_number, embedding)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8::vector)
       ON CONFLICT (id) DO UPDATE SET
         text = EXCLUDED.text,
         source = EXCLUDED.source,
         batch = EXCLUDED.batch,
         chunk_index = EXCLUDED.chunk_index,
         chunk_id = EXCLUDED.chunk_id,
         page_number = EXCLUDED.page_number,
         embedding = EXCLUDED.embedding`,
      [
        id,
        text,
        metadata.source,
        metadata.batch,
        metadata.chunk_index,
        metadata.chunk_id,
        metadata.page_number,
        toVectorLiteral(vector),
      ]
    )
  }

  async search(vector: number[], limit: number, sourceFilter?: string): Promise<VectorHit[]> {
    await this.ensureTable()
    const params: unknown[] = [toVectorLiteral(vector), limit]
    let where = ""
    if (sourceFilter) {
      params.push(sourceFilter)
      where = "WHERE source = $3"
    }
    const result = await this.pool.query<ScoredChunkRow>(
      `SELECT id, text, source, batch, chunk_index, chunk_id, page_number,
              1 - (embedding <=> $1::vector) AS score
       FROM ${this.table}
       ${where}
       ORDER BY embedding <=> $1::vector
       LIMIT $2`,
      params
    )
    return result.rows.map((row) => ({ id: row.id, score: toScore(row.score), payload: toPayload(row) }))
  }

  async getByIds(ids: string[]): Promise<VectorPoint[]> {
    if (ids.length === 0) return []
    await this.ensureTable()
    const result = await this.pool.query<ChunkRow>(
      `SELECT id, text, source, batch, chunk_index, chunk_id, page_number
       FROM ${this.table}
       WHERE id = ANY($1::text[])`,
      [ids]
    )
    return result.rows.map((row) => ({ id: row.id, payload: toPayload(row) }))
  }

  async listSources(): Promise<string[]> {
    await this.ensureTable()
    const result = await this.pool.query<{ source: string }>(
      `SELECT DISTINCT source FROM ${this.table} ORDER BY source`
    )
    return result.rows.map((row) => row.source)
  }

  async clear(): Promise<void> {
    await this.pool.query(`DROP TABLE IF EXISTS ${this.table}`)
    this.ensured = null
    this.log.info("Vector table dropped", { table: this.table })
  }

  async healthCheck(): Promise<HealthStatus> {
    const start = Date.now()
    try {
      await this.pool.query("SELECT 1")
      return { status: "up", latencyMs: Date.now() - start }
    } catch {
      return { status: "down", latencyMs: Date.now() - start }
    }
  }

  async close(): Promise<void> {
    await this.pool.end()
  }
}
