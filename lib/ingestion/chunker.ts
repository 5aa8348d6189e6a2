/**
 * Recursive character splitter.
 *
 * Splits on the first separator present in the text (paragraph, line, word,
 * character), recursing into pieces that are still too long, then greedily
 * merges pieces back up to `chunkSize` with `chunkOverlap` characters carried
 * between neighbours. Separators stay attached to the start of the piece that
 * follows them and chunks are trimmed, so every chunk is a substring of the
 * input.
 */

import { CHUNK_OVERLAP, CHUNK_SIZE } from "@/lib/config/settings"
import { logger } from "@/lib/utils/logger"

export const DEFAULT_SEPARATORS = ["\n\n", "\n", " ", ""] as const

export interface ChunkerOptions {
  chunkSize?: number
  chunkOverlap?: number
  separators?: readonly string[]
}

function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === "") return Array.from(text)
  const parts = text.split(separator)
  const pieces = [parts[0] ?? ""]
  for (let i = 1; i < parts.length; i++) {
    pieces.push(separator + (parts[i] ?? ""))
  }
  return pieces.filter((p) => p.length > 0)
}

export class RecursiveTextChunker {
  readonly chunkSize: number
  readonly chunkOverlap: number
  private readonly separators: readonly string[]

  constructor(options: ChunkerOptions = {}) {
    this.chunkSize = options.chunkSize ?? CHUNK_SIZE
    this.chunkOverlap = options.chunkOverlap ?? CHUNK_OVERLAP
    this.separators = options.separators ?? DEFAULT_SEPARATORS
    if (this.chunkOverlap >= this.chunkSize) {
      throw new Error(`Chunk overlap (${this.chunkOverlap}) must be smaller than chunk size (${this.chunkSize})`)
    }
  }

  split(text: string): string[] {
    return this.splitRecursive(text, this.separators)
  }

  private splitRecursive(text: string, separators: readonly string[]): string[] {
    let separator = separators[separators.length - 1] ?? ""
    let rest: readonly string[] = []
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i] ?? ""
      if (candidate === "") {
        separator = candidate
        break
      }
      if (text.includes(candidate)) {
        separator = candidate
        rest = separators.slice(i + 1)
        break
      }
    }

    const chunks: string[] = []
    let pending: string[] = []
    for (const piece of splitKeepingSeparator(text, separator)) {
      if (piece.length < this.chunkSize) {
        pending.push(piece)
        continue
      }
      if (pending.length > 0) {
        chunks.push(...this.merge(pending))
        pending = []
      }
      if (rest.length === 0) {
        chunks.push(piece)
      } else {
        chunks.push(...this.splitRecursive(piece, rest))
      }
    }
    if (pending.length > 0) chunks.push(...this.merge(pending))
    return chunks
  }

  private merge(pieces: string[]): string[] {
    const chunks: string[] = []
    let window: string[] = []
    let total = 0

    const flush = (): void => {
      const chunk = window.join("").trim()
      if (chunk) chunks.push(chunk)
    }

    for (const piece of pieces) {
      if (total + piece.length > this.chunkSize) {
        if (total > this.chunkSize) {
          logger.warn("Created a chunk longer than the chunk size", {
            service: "chunker",
            length: total,
            chunkSize: this.chunkSize,
          })
        }
        if (window.length > 0) {
          flush()
          while (total > this.chunkOverlap || (total + piece.length > this.chunkSize && total > 0)) {
            const dropped = window.shift()
            total -= dropped?.length ?? total
          }
        }
      }
      window.push(piece)
      total += piece.length
    }
    flush()
    return chunks
  }
}

export function splitText(text: string, options?: ChunkerOptions): string[] {
  return new RecursiveTextChunker(options).split(text)
}
