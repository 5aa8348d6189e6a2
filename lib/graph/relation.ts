import { createHash } from "node:crypto"

/**
 * Reduce a relation label to an edge-type token: ASCII letters, digits and
 * underscores, uppercased. "managed by" → "MANAGEDBY", "part_of" → "PART_OF".
 * Labels with no usable characters fall back to RELATED_TO.
 */
export function sanitizeRelation(relation: string): string {
  const token = relation.replace(/[^A-Za-z0-9_]/g, "").toUpperCase()
  return token || "RELATED_TO"
}

/** Stable document key for an entity name. Names are case-sensitive. */
export function entityKey(name: string): string {
  return createHash("sha1").update(name).digest("hex")
}

export function relationKey(fromName: string, relation: string, toName: string): string {
  return createHash("sha1").update(`${fromName}\u0000${relation}\u0000${toName}`).digest("hex")
}

/** Case-insensitive substring match of a stored name against any query name. */
export function matchesAny(name: string, queries: readonly string[]): boolean {
  const lower = name.toLowerCase()
  return queries.some((q) => q.length > 0 && lower.includes(q.toLowerCase()))
}
