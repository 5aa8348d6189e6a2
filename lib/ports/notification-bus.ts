import type { ProgressEvent } from "./types"

/**
 * Best-effort progress feed. Events published before a subscription are not
 * replayed and nothing is delivered without a subscriber; the ledger is the
 * source of truth.
 */
export interface INotificationBus {
  publish(batchId: string, event: ProgressEvent): Promise<void>
  /** Live events for a batch until `signal` aborts. */
  subscribe(batchId: string, options?: { signal?: AbortSignal }): AsyncIterable<ProgressEvent>
}
