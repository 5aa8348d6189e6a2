import type { Page } from "./types"

export interface IDocumentLoader {
  /** Parse a document into ordered pages. An unreadable file rejects. */
  load(path: string): Promise<Page[]>
  /** Raw bytes, used for content hashing at submission time. */
  readBytes(path: string): Promise<Buffer>
}
