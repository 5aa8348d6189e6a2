import type { Page } from "@/lib/ports/types"

export const PAGE_SEPARATOR = "\n\n"

export interface PageRange {
  /** Inclusive start offset in the full text. */
  start: number
  /** Exclusive end offset, separator included. */
  end: number
  pageNumber: number
}

export interface PageMap {
  fullText: string
  ranges: PageRange[]
}

/**
 * Concatenate pages, each followed by a blank line, and record the span each
 * page occupies. Only trailing whitespace is trimmed, so offsets stay valid.
 */
export function buildPageMap(pages: Page[]): PageMap {
  let fullText = ""
  const ranges: PageRange[] = []
  for (const page of pages) {
    const start = fullText.length
    fullText += page.text + PAGE_SEPARATOR
    ranges.push({ start, end: fullText.length, pageNumber: page.pageNumber })
  }
  return { fullText: fullText.trimEnd(), ranges }
}

/** Page containing `offset`, or null when it falls outside every range. */
export function pageAt(map: PageMap, offset: number): number | null {
  for (const range of map.ranges) {
    if (range.start <= offset && offset < range.end) return range.pageNumber
  }
  return null
}

/**
 * Resolves chunk pages in document order. Each lookup searches from just past
 * the previous match, so a repeated passage maps to its next occurrence; a
 * chunk that cannot be found inherits the previous chunk's page.
 */
export class PageLocator {
  private cursor = 0
  private lastPage: number

  constructor(private readonly map: PageMap) {
    this.lastPage = map.ranges[0]?.pageNumber ?? 1
  }

  locate(chunk: string): number {
    const found = this.map.fullText.indexOf(chunk, this.cursor)
    if (found === -1) return this.lastPage
    this.cursor = found + 1
    const page = pageAt(this.map, found)
    if (page !== null) this.lastPage = page
    return this.lastPage
  }
}
