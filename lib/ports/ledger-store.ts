import type { HealthStatus } from "./types"

/** String key-value store behind the job / dedup ledger. */
export interface ILedgerStore {
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<void>
  /** Atomic set-if-not-exists. Returns true if the key was set, false if it already existed. */
  setIfNotExists(key: string, value: string): Promise<boolean>
  delete(key: string): Promise<void>
  /** Delete all keys starting with `prefix`. Returns count deleted. */
  deleteByPrefix(prefix: string): Promise<number>
  healthCheck(): Promise<HealthStatus>
}
