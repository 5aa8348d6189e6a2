import type { Triple } from "@/lib/ports/types"

export const NO_RELATIONSHIPS = "No relationships found."

function tripleKey(t: Triple): string {
  return `${t.from}\u0000${t.relation}\u0000${t.to}`
}

/** Union of triple lists, first occurrence kept, order preserved. */
export function dedupeTriples(...lists: Triple[][]): Triple[] {
  const seen = new Set<string>()
  const result: Triple[] = []
  for (const list of lists) {
    for (const t of list) {
      const key = tripleKey(t)
      if (seen.has(key)) continue
      seen.add(key)
      result.push(t)
    }
  }
  return result
}

/** Seed entities followed by every triple endpoint, deduplicated, capped at `limit`. */
export function expandEntities(seeds: string[], triples: Triple[], limit: number): string[] {
  const expanded = new Set<string>(seeds)
  for (const t of triples) {
    expanded.add(t.from)
    expanded.add(t.to)
  }
  return [...expanded].slice(0, limit)
}

export function formatTriples(triples: Triple[]): string {
  if (triples.length === 0) return NO_RELATIONSHIPS
  return triples.map((t) => `- ${t.from} -[${t.relation}]-> ${t.to}`).join("\n")
}
