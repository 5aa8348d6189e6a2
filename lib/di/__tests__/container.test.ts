/**
 * DI Container Factory Tests
 *
 * Verifies createTestContainer returns every port and supports overrides.
 */
import { describe, expect, it } from "vitest"

import {
  createDocumentSubmitter,
  createIngestionPipeline,
  createRetrievalOrchestrator,
  createTestContainer,
} from "@/lib/di/container"
import { InMemoryGraphStore } from "@/lib/di/fakes"
import { IngestionPipeline } from "@/lib/ingestion/pipeline"
import { DocumentSubmitter } from "@/lib/ingestion/submit"
import { RetrievalOrchestrator } from "@/lib/retrieval/orchestrator"

const CONTAINER_KEYS = [
  "modelProvider",
  "graphStore",
  "vectorStore",
  "ledgerStore",
  "notifications",
  "reranker",
  "documentLoader",
  "jobQueue",
] as const

describe("createTestContainer", () => {
  it("returns every container key", () => {
    const container = createTestContainer()
    for (const key of CONTAINER_KEYS) {
      expect(container[key]).toBeDefined()
    }
  })

  it("returns distinct values (no shared instances between keys)", () => {
    const container = createTestContainer()
    const unique = new Set(CONTAINER_KEYS.map((k) => container[k]))
    expect(unique.size).toBe(CONTAINER_KEYS.length)
  })

  it("supports overrides for individual keys", () => {
    const graphStore = new InMemoryGraphStore()
    const container = createTestContainer({ graphStore })

    expect(container.graphStore).toBe(graphStore)
    expect(container.vectorStore).toBeDefined()
  })

  it("returns fresh instances on each call", () => {
    const a = createTestContainer()
    const b = createTestContainer()
    expect(a.graphStore).not.toBe(b.graphStore)
    expect(a.ledgerStore).not.toBe(b.ledgerStore)
  })
})

describe("service factories", () => {
  it("wire services from a container", () => {
    const container = createTestContainer()
    expect(createRetrievalOrchestrator(container)).toBeInstanceOf(RetrievalOrchestrator)
    expect(createIngestionPipeline(container)).toBeInstanceOf(IngestionPipeline)
    expect(createDocumentSubmitter(container)).toBeInstanceOf(DocumentSubmitter)
  })
})
