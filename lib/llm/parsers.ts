/**
 * Parsers for model output that is supposed to be structured but often
 * arrives wrapped in code fences, quoted, or slightly off-shape.
 */

import { z } from "zod"
import type { ExtractedGraph } from "@/lib/ports/types"
import { MalformedResponseError } from "@/lib/utils/errors"
import { NO_ENTITY_SENTINEL } from "./prompts"

const MAX_QUERY_ENTITIES = 3

const GraphExtractionSchema = z.object({
  entities: z
    .array(
      z.union([
        z.object({ name: z.string(), type: z.string().optional() }),
        z.string().transform((name) => ({ name })),
      ])
    )
    .default([]),
  relationships: z
    .array(
      z.object({
        source: z.string().optional(),
        relation: z.string().optional(),
        target: z.string().optional(),
      })
    )
    .default([]),
})

/** Remove ```json / ``` fences around a model reply. */
export function stripCodeFences(raw: string): string {
  return raw.replace(/```json/gi, "").replace(/```/g, "").trim()
}

/**
 * Parse a graph extraction reply. Relationships missing an endpoint or a
 * relation are dropped. Empty replies yield an empty graph; non-JSON or
 * wrongly shaped replies throw MalformedResponseError.
 */
export function parseGraphExtraction(raw: string): ExtractedGraph {
  const cleaned = stripCodeFences(raw)
  if (!cleaned) return { entities: [], relationships: [] }

  let data: unknown
  try {
    data = JSON.parse(cleaned)
  } catch {
    throw new MalformedResponseError("Graph extraction is not valid JSON", raw)
  }

  const parsed = GraphExtractionSchema.safeParse(data)
  if (!parsed.success) {
    throw new MalformedResponseError(`Graph extraction has an unexpected shape: ${parsed.error.message}`, raw)
  }

  const relationships: ExtractedGraph["relationships"] = []
  for (const r of parsed.data.relationships) {
    const source = r.source?.trim()
    const relation = r.relation?.trim()
    const target = r.target?.trim()
    if (source && relation && target) {
      relationships.push({ source, relation, target })
    }
  }

  return {
    entities: parsed.data.entities.filter((e) => e.name.trim().length > 0),
    relationships,
  }
}

function stripQuotes(value: string): string {
  return value.trim().replace(/^["'`]+|["'`]+$/g, "").trim()
}

/**
 * Parse the entity extractor's reply: a JSON array, or failing that a comma /
 * newline separated list. The "None" sentinel yields []. At most three names.
 */
export function parseEntityList(raw: string): string[] {
  const cleaned = stripCodeFences(raw)
  if (!cleaned || stripQuotes(cleaned).toLowerCase() === NO_ENTITY_SENTINEL) return []

  let names: string[] | null = null
  if (cleaned.startsWith("[")) {
    try {
      const data: unknown = JSON.parse(cleaned)
      if (Array.isArray(data)) {
        names = data.filter((v): v is string => typeof v === "string")
      }
    } catch {
      names = null
    }
  }
  if (names === null) {
    names = cleaned.replace(/^\[|\]$/g, "").split(/[,\n]/)
  }

  const seen = new Set<string>()
  const result: string[] = []
  for (const candidate of names) {
    const name = stripQuotes(candidate.replace(/^\s*(?:[-*•]|\d+\.)\s*/, ""))
    if (!name || name.toLowerCase() === NO_ENTITY_SENTINEL || seen.has(name)) continue
    seen.add(name)
    result.push(name)
    if (result.length === MAX_QUERY_ENTITIES) break
  }
  return result
}

/** Unwrap a single-line model reply such as `"What is X?"`. */
export function cleanSingleLine(raw: string): string {
  return stripQuotes(raw)
}
