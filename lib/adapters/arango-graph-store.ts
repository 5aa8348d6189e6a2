/**
 * ArangoGraphStore - IGraphStore implementation using ArangoDB.
 *
 * Layout:
 *   entities  (document) - { _key: sha1(name), name }
 *   chunks    (document) - { _key: chunkId, source }
 *   relations (edge)     - entities → entities, { type } holds the sanitized relation token
 *   mentions  (edge)     - chunks → entities
 *
 * Every caller-supplied value travels as an AQL bind parameter; only
 * collection names are interpolated.
 */

import { aql, Database } from "arangojs"
import { getArangoConfig, RETRIEVAL_LIMITS } from "@/lib/config/settings"
import { entityKey, relationKey, sanitizeRelation } from "@/lib/graph/relation"
import type { IGraphStore } from "@/lib/ports/graph-store"
import type { HealthStatus, Triple } from "@/lib/ports/types"
import { logger } from "@/lib/utils/logger"

const DOC_COLLECTIONS = ["entities", "chunks"] as const
const EDGE_COLLECTIONS = ["relations", "mentions"] as const

function lowerNames(names: string[]): string[] {
  return [...new Set(names.filter((n) => n.length > 0).map((n) => n.toLowerCase()))]
}

export class ArangoGraphStore implements IGraphStore {
  private dbInstance: Database | null = null
  private ready: Promise<Database> | null = null
  private readonly log = logger.child({ service: "arango-graph-store" })

  constructor(private readonly config = getArangoConfig()) {}

  private getDb(): Database {
    if (!this.dbInstance) {
      const { url, databaseName, username, password } = this.config
      this.dbInstance = new Database({ url, databaseName, auth: { username, password } })
    }
    return this.dbInstance
  }

  /** Database handle with collections in place; bootstrap runs once per instance. */
  private getReadyDb(): Promise<Database> {
    if (!this.ready) {
      this.ready = this.bootstrap()
        .then(() => this.getDb())
        .catch((error: unknown) => {
          this.ready = null
          throw error
        })
    }
    return this.ready
  }

  async bootstrap(): Promise<void> {
    const { url, databaseName, username, password } = this.config
    try {
      const system = new Database({ url, auth: { username, password } })
      const existing = await system.listDatabases()
      if (!existing.includes(databaseName)) {
        await system.createDatabase(databaseName)
      }

      const db = this.getDb()
      for (const name of DOC_COLLECTIONS) {
        const col = db.collection(name)
        if (!(await col.exists())) await db.createCollection(name)
      }
      for (const name of EDGE_COLLECTIONS) {
        const col = db.collection(name)
        if (!(await col.exists())) await db.createEdgeCollection(name)
      }
      await db.collection("entities").ensureIndex({ type: "persistent", fields: ["name"], name: "idx_entities_name" })
      await db.collection("chunks").ensureIndex({ type: "persistent", fields: ["source"], name: "idx_chunks_source" })
    } catch (error: unknown) {
      this.log.error("Graph bootstrap failed", error)
      throw error
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    const start = Date.now()
    try {
      await this.getDb().listCollections()
      return { status: "up", latencyMs: Date.now() - start }
    } catch {
      return { status: "down", latencyMs: Date.now() - start }
    }
  }

  private async upsertEntity(db: Database, name: string): Promise<string> {
    const key = entityKey(name)
    await db.query(aql`
      UPSERT { _key: ${key} }
        INSERT { _key: ${key}, name: ${name} }
        UPDATE {}
        IN entities
    `)
    return key
  }

  async upsertTriple(subject: string, relation: string, object: string): Promise<void> {
    const db = await this.getReadyDb()
    const type = sanitizeRelation(relation)
    const fromKey = await this.upsertEntity(db, subject)
    const toKey = await this.upsertEntity(db, object)
    const edgeKey = relationKey(subject, type, object)
    await db.query(aql`
      UPSERT { _key: ${edgeKey} }
        INSERT { _key: ${edgeKey}, _from: CONCAT("entities/", ${fromKey}), _to: CONCAT("entities/", ${toKey}), type: ${type} }
        UPDATE {}
        IN relations
    `)
  }

  async linkChunkToEntities(chunkId: string, entities: string[], source?: string): Promise<void> {
    const db = await this.getReadyDb()
    const chunkSource = source ?? "Unknown"
    await db.query(aql`
      UPSERT { _key: ${chunkId} }
        INSERT { _key: ${chunkId}, source: ${chunkSource} }
        UPDATE { source: ${chunkSource} }
        IN chunks
    `)
    for (const name of new Set(entities)) {
      const toKey = await this.upsertEntity(db, name)
      const edgeKey = relationKey(chunkId, "MENTIONS", name)
      await db.query(aql`
        UPSERT { _key: ${edgeKey} }
          INSERT { _key: ${edgeKey}, _from: CONCAT("chunks/", ${chunkId}), _to: CONCAT("entities/", ${toKey}) }
          UPDATE {}
          IN mentions
      `)
    }
  }

  async queryNeighbors(entityNames: string[]): Promise<Triple[]> {
    const names = lowerNames(entityNames)
    if (names.length === 0) return []
    try {
      const db = await this.getReadyDb()
      const cursor = await db.query<Triple>(aql`
        FOR n IN entities
          FILTER LENGTH(FOR q IN ${names} FILTER CONTAINS(LOWER(n.name), q) LIMIT 1 RETURN 1) > 0
          FOR m, r IN 1..1 OUTBOUND n relations
            LIMIT ${RETRIEVAL_LIMITS.neighborLimit}
            RETURN { from: n.name, relation: r.type, to: m.name }
      `)
      return await cursor.all()
    } catch (error: unknown) {
      this.log.error("Neighbor query failed", error, { entities: names })
      return []
    }
  }

  async findPaths(entityNames: string[]): Promise<Triple[]> {
    const names = lowerNames(entityNames)
    if (names.length < 2) return []
    try {
      const db = await this.getReadyDb()
      const cursor = await db.query<Triple>(aql`
        LET lowered = ${names}
        FOR r IN relations
          FILTER r._from != r._to
          LET a = DOCUMENT(r._from)
          LET b = DOCUMENT(r._to)
          FILTER a != null AND b != null
          FILTER LENGTH(FOR q IN lowered FILTER CONTAINS(LOWER(a.name), q) LIMIT 1 RETURN 1) > 0
          FILTER LENGTH(FOR q IN lowered FILTER CONTAINS(LOWER(b.name), q) LIMIT 1 RETURN 1) > 0
          LIMIT ${RETRIEVAL_LIMITS.pathLimit}
          RETURN { from: a.name, relation: r.type, to: b.name }
      `)
      const triples = await cursor.all()
      return triples.filter((t) => t.from !== t.to)
    } catch (error: unknown) {
      this.log.error("Path query failed", error, { entities: names })
      return []
    }
  }

  async chunksForEntity(entityName: string, sourceFilter?: string): Promise<string[]> {
    if (!entityName) return []
    try {
      const db = await this.getReadyDb()
      const filter = sourceFilter ?? null
      const cursor = await db.query<string>(aql`
        FOR e IN entities
          FILTER CONTAINS(LOWER(e.name), ${entityName.toLowerCase()})
          FOR c IN 1..1 INBOUND e mentions
            FILTER ${filter} == null OR c.source == ${filter}
            RETURN DISTINCT c._key
      `)
      return await cursor.all()
    } catch (error: unknown) {
      this.log.error("Chunk lookup failed", error, { entity: entityName })
      return []
    }
  }

  async reset(): Promise<void> {
    const db = await this.getReadyDb()
    for (const name of [...EDGE_COLLECTIONS, ...DOC_COLLECTIONS]) {
      await db.collection(name).truncate()
    }
    this.log.info("Graph reset")
  }
}
