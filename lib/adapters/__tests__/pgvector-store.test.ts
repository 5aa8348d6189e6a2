import { Pool } from "pg"
import { describe, expect, it, vi } from "vitest"
import { PgVectorStore } from "@/lib/adapters/pgvector-store"

interface Statement {
  sql: string
  params: unknown
}

/** A pg Pool whose queries are recorded and answered from `rowsFor`; it never connects. */
function recordingPool(rowsFor: (sql: string) => unknown[] = () => []): { pool: Pool; statements: Statement[] } {
  const pool = new Pool()
  const statements: Statement[] = []
  vi.spyOn(pool, "query").mockImplementation((async (sql: string, params?: unknown[]) => {
    statements.push({ sql, params })
    return { rows: rowsFor(sql) }
  }) as never)
  return { pool, statements }
}

const ROW = {
  id: "c1",
  text: "Acme is headquartered in Paris.",
  source: "acme.pdf",
  batch: "b1",
  chunk_index: 0,
  chunk_id: "c1",
  page_number: 2,
}

describe("PgVectorStore", () => {
  it("rejects table names that are not plain identifiers", () => {
    const { pool } = recordingPool()
    expect(() => new PgVectorStore({ dimension: 3, table: "chunks; DROP TABLE users", pool })).toThrow(
      "Invalid vector table name"
    )
  })

  it("creates the extension and table once, with the configured width", async () => {
    const { pool, statements } = recordingPool()
    const store = new PgVectorStore({ dimension: 3, table: "chunks", pool })

    await store.search([0.1, 0.2, 0.3], 5)
    await store.search([0.1, 0.2, 0.3], 5)

    const ddl = statements.filter((s) => s.sql.startsWith("CREATE"))
    expect(ddl).toHaveLength(3)
    expect(ddl[0]?.sql).toBe("CREATE EXTENSION IF NOT EXISTS vector")
    expect(ddl[1]?.sql).toContain("embedding vector(3) NOT NULL")
  })

  it("searches by cosine similarity and normalizes scores", async () => {
    const { pool, statements } = recordingPool((sql) =>
      sql.includes("AS score")
        ? [
            { ...ROW, score: "0.83" },
            { ...ROW, id: "c2", chunk_id: "c2", score: null },
            { ...ROW, id: "c3", chunk_id: "c3", score: "NaN" },
          ]
        : []
    )
    const store = new PgVectorStore({ dimension: 3, table: "chunks", pool })

    const hits = await store.search([0.1, 0.2, 0.3], 5)

    expect(hits.map((h) => [h.id, h.score])).toEqual([
      ["c1", 0.83],
      ["c2", 0],
      ["c3", 0],
    ])
    expect(hits[0]?.payload).toEqual({
      text: ROW.text,
      source: "acme.pdf",
      batch: "b1",
      chunk_index: 0,
      chunk_id: "c1",
      page_number: 2,
    })
    const select = statements.find((s) => s.sql.includes("AS score"))
    expect(select?.params).toEqual(["[0.1,0.2,0.3]", 5])
    expect(select?.sql).not.toContain("WHERE")
  })

  it("binds the source filter as a parameter", async () => {
    const { pool, statements } = recordingPool()
    const store = new PgVectorStore({ dimension: 3, table: "chunks", pool })

    await store.search([1, 0, 0], 20, "acme.pdf")

    const select = statements.find((s) => s.sql.includes("AS score"))
    expect(select?.params).toEqual(["[1,0,0]", 20, "acme.pdf"])
    expect(select?.sql).toContain("WHERE source = $3")
  })

  it("upserts on the chunk id", async () => {
    const { pool, statements } = recordingPool()
    const store = new PgVectorStore({ dimension: 2, table: "chunks", pool })

    await store.upsert("c1", ROW.text, [0.5, 0.5], {
      source: "acme.pdf",
      batch: "b1",
      chunk_index: 0,
      chunk_id: "c1",
      page_number: 2,
    })

    const insert = statements.find((s) => s.sql.startsWith("INSERT"))
    expect(insert?.sql).toContain("ON CONFLICT (id) DO UPDATE")
    expect(insert?.params).toEqual(["c1", ROW.text, "acme.pdf", "b1", 0, "c1", 2, "[0.5,0.5]"])
  })

  it("returns no points for an empty id list without querying", async () => {
    const { pool, statements } = recordingPool()
    const store = new PgVectorStore({ dimension: 3, table: "chunks", pool })

    await expect(store.getByIds([])).resolves.toEqual([])
    expect(statements).toHaveLength(0)
  })

  it("recreates the table after a clear", async () => {
    const { pool, statements } = recordingPool()
    const store = new PgVectorStore({ dimension: 3, table: "chunks", pool })

    await store.listSources()
    await store.clear()
    await store.listSources()

    expect(statements.map((s) => s.sql.split(/\s+/).slice(0, 2).join(" "))).toEqual([
      "CREATE EXTENSION",
      "CREATE TABLE",
      "CREATE INDEX",
      "SELECT DISTINCT",
      "DROP TABLE",
      "CREATE EXTENSION",
      "CREATE TABLE",
      "CREATE INDEX",
      "SELECT DISTINCT",
    ])
  })

  it("reports down when the database is unreachable", async () => {
    const pool = new Pool()
    vi.spyOn(pool, "query").mockImplementation((async () => {
      throw new Error("connect ECONNREFUSED")
    }) as never)
    const store = new PgVectorStore({ dimension: 3, table: "chunks", pool })

    await expect(store.healthCheck()).resolves.toMatchObject({ status: "down" })
  })
})
