import type { JobLedger } from "@/lib/ledger/job-ledger"
import type { IGraphStore } from "@/lib/ports/graph-store"
import type { ILedgerStore } from "@/lib/ports/ledger-store"
import type { HealthStatus } from "@/lib/ports/types"
import type { IVectorStore } from "@/lib/ports/vector-store"
import { logger } from "@/lib/utils/logger"

export interface CorpusDeps {
  graphStore: IGraphStore
  vectorStore: IVectorStore
  ledger: JobLedger
  ledgerStore: ILedgerStore
}

export interface HealthReport {
  graph: HealthStatus
  vector: HealthStatus
  ledger: HealthStatus
}

/** Distinct source paths that have at least one indexed chunk. */
export async function listDocuments(deps: Pick<CorpusDeps, "vectorStore">): Promise<string[]> {
  return deps.vectorStore.listSources()
}

/**
 * Wipe vectors, the graph and every job / hash ledger entry. In-flight jobs
 * are not cancelled; whatever they write after the reset stays.
 */
export async function resetCorpus(deps: CorpusDeps): Promise<{ ledgerKeysDeleted: number }> {
  await deps.vectorStore.clear()
  await deps.graphStore.reset()
  const ledgerKeysDeleted = await deps.ledger.clear()
  logger.info("System reset", { service: "admin", ledgerKeysDeleted })
  return { ledgerKeysDeleted }
}

export async function healthChecks(deps: CorpusDeps): Promise<HealthReport> {
  const [graph, vector, ledger] = await Promise.all([
    deps.graphStore.healthCheck(),
    deps.vectorStore.healthCheck(),
    deps.ledgerStore.healthCheck(),
  ])
  return { graph, vector, ledger }
}
