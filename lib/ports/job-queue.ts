import type { IngestJobMessage } from "./types"

/** Producer side of the ingestion queue. */
export interface IJobQueue {
  enqueue(message: IngestJobMessage): Promise<void>
}
