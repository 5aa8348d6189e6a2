/**
 * DI container - production and test factories.
 *
 * Production adapters are constructed on first property access, so importing
 * the container never opens a connection to Redis, ArangoDB or PostgreSQL.
 */

import { BullMQJobQueue } from "@/lib/adapters/bullmq-job-queue"
import { ArangoGraphStore } from "@/lib/adapters/arango-graph-store"
import { FileDocumentLoader } from "@/lib/adapters/file-document-loader"
import { HttpCrossEncoderReranker } from "@/lib/adapters/http-cross-encoder-reranker"
import { PgVectorStore } from "@/lib/adapters/pgvector-store"
import { RedisLedgerStore } from "@/lib/adapters/redis-ledger-store"
import { RedisNotificationBus } from "@/lib/adapters/redis-notification-bus"
import { DocumentSubmitter } from "@/lib/ingestion/submit"
import { IngestionPipeline } from "@/lib/ingestion/pipeline"
import { JobLedger } from "@/lib/ledger/job-ledger"
import { getEmbeddingDimension, loadProviderConfig } from "@/lib/llm/config"
import { ResilientModelProvider } from "@/lib/llm/resilient-provider"
import type { IDocumentLoader } from "@/lib/ports/document-loader"
import type { IGraphStore } from "@/lib/ports/graph-store"
import type { IJobQueue } from "@/lib/ports/job-queue"
import type { ILedgerStore } from "@/lib/ports/ledger-store"
import type { INotificationBus } from "@/lib/ports/notification-bus"
import type { IReranker } from "@/lib/ports/reranker"
import type { IVectorStore } from "@/lib/ports/vector-store"
import { RetrievalOrchestrator } from "@/lib/retrieval/orchestrator"

import {
  createFakeModels,
  FakeReranker,
  InMemoryDocumentLoader,
  InMemoryGraphStore,
  InMemoryJobQueue,
  InMemoryLedgerStore,
  InMemoryNotificationBus,
  InMemoryVectorStore,
} from "@/lib/di/fakes"

export interface Container {
  modelProvider: ResilientModelProvider
  graphStore: IGraphStore
  vectorStore: IVectorStore
  ledgerStore: ILedgerStore
  notifications: INotificationBus
  reranker: IReranker
  documentLoader: IDocumentLoader
  jobQueue: IJobQueue
}

let productionContainer: Container | null = null

function createLazyProductionContainer(): Container {
  const cache: Partial<Container> = {}
  return {
    get modelProvider(): ResilientModelProvider {
      if (!cache.modelProvider) {
        cache.modelProvider = new ResilientModelProvider(loadProviderConfig())
      }
      return cache.modelProvider
    },
    get graphStore(): IGraphStore {
      if (!cache.graphStore) {
        cache.graphStore = new ArangoGraphStore()
      }
      return cache.graphStore
    },
    get vectorStore(): IVectorStore {
      if (!cache.vectorStore) {
        const { provider } = loadProviderConfig()
        cache.vectorStore = new PgVectorStore({ dimension: getEmbeddingDimension(provider) })
      }
      return cache.vectorStore
    },
    get ledgerStore(): ILedgerStore {
      if (!cache.ledgerStore) {
        cache.ledgerStore = new RedisLedgerStore()
      }
      return cache.ledgerStore
    },
    get notifications(): INotificationBus {
      if (!cache.notifications) {
        cache.notifications = new RedisNotificationBus()
      }
      return cache.notifications
    },
    get reranker(): IReranker {
      if (!cache.reranker) {
        cache.reranker = new HttpCrossEncoderReranker()
      }
      return cache.reranker
    },
    get documentLoader(): IDocumentLoader {
      if (!cache.documentLoader) {
        cache.documentLoader = new FileDocumentLoader()
      }
      return cache.documentLoader
    },
    get jobQueue(): IJobQueue {
      if (!cache.jobQueue) {
        cache.jobQueue = new BullMQJobQueue()
      }
      return cache.jobQueue
    },
  }
}

export function getContainer(): Container {
  if (!productionContainer) {
    productionContainer = createLazyProductionContainer()
  }
  return productionContainer
}

export function createTestContainer(overrides?: Partial<Container>): Container {
  return {
    modelProvider: createFakeModels().provider,
    graphStore: new InMemoryGraphStore(),
    vectorStore: new InMemoryVectorStore(),
    ledgerStore: new InMemoryLedgerStore(),
    notifications: new InMemoryNotificationBus(),
    reranker: new FakeReranker(),
    documentLoader: new InMemoryDocumentLoader(),
    jobQueue: new InMemoryJobQueue(),
    ...overrides,
  }
}

// ── Services ─────────────────────────────────────────────────────────────────

export function createRetrievalOrchestrator(container: Container): RetrievalOrchestrator {
  return new RetrievalOrchestrator({
    provider: container.modelProvider,
    graphStore: container.graphStore,
    vectorStore: container.vectorStore,
    reranker: container.reranker,
  })
}

export function createIngestionPipeline(container: Container): IngestionPipeline {
  return new IngestionPipeline({
    provider: container.modelProvider,
    graphStore: container.graphStore,
    vectorStore: container.vectorStore,
    ledger: new JobLedger(container.ledgerStore),
    notifications: container.notifications,
    loader: container.documentLoader,
  })
}

export function createDocumentSubmitter(container: Container): DocumentSubmitter {
  return new DocumentSubmitter({
    loader: container.documentLoader,
    ledger: new JobLedger(container.ledgerStore),
    queue: container.jobQueue,
  })
}
