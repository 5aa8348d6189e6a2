import { Database } from "arangojs"
import { afterEach, describe, expect, it, vi } from "vitest"
import { ArangoGraphStore } from "@/lib/adapters/arango-graph-store"
import type { Triple } from "@/lib/ports/types"

interface RecordedQuery {
  query: string
  bindVars: Record<string, unknown>
}

const CONFIG = { url: "http://arango.test:8529", databaseName: "rag_test", username: "root", password: "test-secret" }

/**
 * An ArangoGraphStore whose bootstrap is skipped and whose AQL is recorded
 * instead of sent. `rowsFor` answers each query by its text.
 */
function recordingStore(rowsFor: (query: string) => unknown[] = () => []): {
  store: ArangoGraphStore
  queries: RecordedQuery[]
} {
  const store = new ArangoGraphStore(CONFIG)
  const queries: RecordedQuery[] = []
  vi.spyOn(store, "bootstrap").mockResolvedValue(undefined)
  vi.spyOn(Database.prototype, "query").mockImplementation((async (q: RecordedQuery) => {
    queries.push({ query: q.query, bindVars: q.bindVars })
    const rows = rowsFor(q.query)
    return { all: async () => rows }
  }) as never)
  return { store, queries }
}

function boundValues(q: RecordedQuery | undefined): unknown[] {
  return q ? Object.values(q.bindVars) : []
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe("ArangoGraphStore", () => {
  it("binds the sanitized relation token when upserting a triple", async () => {
    const { store, queries } = recordingStore()

    await store.upsertTriple("Acme Corp", "based in!", "Paris")

    expect(queries).toHaveLength(3)
    expect(boundValues(queries[0])).toContain("Acme Corp")
    expect(boundValues(queries[1])).toContain("Paris")
    expect(queries[2]?.query).toContain("IN relations")
    expect(boundValues(queries[2])).toContain("BASEDIN")
    expect(boundValues(queries[2])).not.toContain("based in!")
  })

  it("links a chunk once per distinct entity", async () => {
    const { store, queries } = recordingStore()

    await store.linkChunkToEntities("chunk-1", ["Acme", "Paris", "Acme"], "docs/acme.txt")

    expect(queries[0]?.query).toContain("IN chunks")
    expect(boundValues(queries[0])).toEqual(expect.arrayContaining(["chunk-1", "docs/acme.txt"]))
    expect(queries.filter((q) => q.query.includes("IN mentions"))).toHaveLength(2)
  })

  it("binds lowercased names for neighbor lookups", async () => {
    const rows: Triple[] = [{ from: "Acme Corp", relation: "BASED_IN", to: "Paris" }]
    const { store, queries } = recordingStore(() => rows)

    await expect(store.queryNeighbors(["ACME", "", "Acme"])).resolves.toEqual(rows)

    expect(queries).toHaveLength(1)
    expect(boundValues(queries[0])).toContainEqual(["acme"])
    expect(boundValues(queries[0])).toContain(50)
  })

  it("issues no path query for fewer than two names", async () => {
    const { store, queries } = recordingStore()

    await expect(store.findPaths(["Acme"])).resolves.toEqual([])
    await expect(store.findPaths(["Acme", ""])).resolves.toEqual([])
    await expect(store.findPaths(["Acme", "ACME"])).resolves.toEqual([])

    expect(queries).toHaveLength(0)
  })

  it("drops self-loops from path results", async () => {
    const { store, queries } = recordingStore(() => [
      { from: "Acme Corp", relation: "BASED_IN", to: "Paris" },
      { from: "Paris", relation: "SAME_AS", to: "Paris" },
    ])

    const triples = await store.findPaths(["Acme", "Paris"])

    expect(triples).toEqual([{ from: "Acme Corp", relation: "BASED_IN", to: "Paris" }])
    expect(queries[0]?.query).toContain("r._from != r._to")
    expect(boundValues(queries[0])).toContainEqual(["acme", "paris"])
    expect(boundValues(queries[0])).toContain(20)
  })

  it("passes the source filter to chunk lookups", async () => {
    const { store, queries } = recordingStore(() => ["chunk-1"])

    await expect(store.chunksForEntity("Acme", "docs/acme.txt")).resolves.toEqual(["chunk-1"])
    await store.chunksForEntity("Acme")

    expect(boundValues(queries[0])).toEqual(expect.arrayContaining(["acme", "docs/acme.txt"]))
    expect(boundValues(queries[1])).toContain(null)
    expect(boundValues(queries[1])).not.toContain("docs/acme.txt")
  })

  it("resolves read queries to empty results when the database rejects them", async () => {
    const store = new ArangoGraphStore(CONFIG)
    vi.spyOn(store, "bootstrap").mockResolvedValue(undefined)
    vi.spyOn(Database.prototype, "query").mockRejectedValue(new Error("connect ECONNREFUSED"))

    await expect(store.queryNeighbors(["Acme"])).resolves.toEqual([])
    await expect(store.findPaths(["Acme", "Paris"])).resolves.toEqual([])
    await expect(store.chunksForEntity("Acme")).resolves.toEqual([])
  })

  it("raises when bootstrap fails during a write", async () => {
    const store = new ArangoGraphStore(CONFIG)
    vi.spyOn(store, "bootstrap").mockRejectedValue(new Error("unauthorized"))

    await expect(store.upsertTriple("Acme", "BASED_IN", "Paris")).rejects.toThrow("unauthorized")
  })
})
