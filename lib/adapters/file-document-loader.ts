/**
 * FileDocumentLoader - IDocumentLoader over the local filesystem.
 * PDFs are split into pages with pdf-parse; anything else is read as UTF-8
 * text and treated as a single page.
 */

import { readFile } from "node:fs/promises"
import { extname } from "node:path"
import type { IDocumentLoader } from "@/lib/ports/document-loader"
import type { Page } from "@/lib/ports/types"

async function loadPdfPages(buffer: Buffer): Promise<Page[]> {
  // Loaded on demand; pdf.js is heavy and only the worker needs it
  const { PDFParse } = await import("pdf-parse")
  const parser = new PDFParse({ data: new Uint8Array(buffer) })
  try {
    const result = await parser.getText()
    return result.pages.map((page) => ({ text: page.text, pageNumber: page.num }))
  } finally {
    await parser.destroy()
  }
}

export class FileDocumentLoader implements IDocumentLoader {
  async readBytes(path: string): Promise<Buffer> {
    return readFile(path)
  }

  async load(path: string): Promise<Page[]> {
    const buffer = await this.readBytes(path)
    if (extname(path).toLowerCase() === ".pdf") {
      return loadPdfPages(buffer)
    }
    const text = buffer.toString("utf-8")
    return text.length > 0 ? [{ text, pageNumber: 1 }] : []
  }
}
