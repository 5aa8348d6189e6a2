import { describe, expect, it } from "vitest"
import { entityKey, matchesAny, relationKey, sanitizeRelation } from "@/lib/graph/relation"

describe("sanitizeRelation", () => {
  it("uppercases and keeps word characters", () => {
    expect(sanitizeRelation("located_in")).toBe("LOCATED_IN")
    expect(sanitizeRelation("managed by")).toBe("MANAGEDBY")
    expect(sanitizeRelation("PART-OF")).toBe("PARTOF")
  })

  it("neutralises query syntax in model-supplied labels", () => {
    const hostile = [
      "OWNS]->(x) DETACH DELETE x //",
      "'; DROP TABLE chunks; --",
      "REL` RETURN 1 //",
      '"}) FOR d IN entities REMOVE d IN entities',
      "{{7*7}}",
      "$where: 1 == 1",
    ]
    for (const label of hostile) {
      expect(sanitizeRelation(label)).toMatch(/^[A-Z0-9_]+$/)
    }
    expect(sanitizeRelation("'; DROP TABLE chunks; --")).toBe("DROPTABLECHUNKS")
  })

  it("falls back to RELATED_TO for labels with nothing usable", () => {
    expect(sanitizeRelation("")).toBe("RELATED_TO")
    expect(sanitizeRelation("--> <--")).toBe("RELATED_TO")
    expect(sanitizeRelation("関係")).toBe("RELATED_TO")
  })
})

describe("entity and relation keys", () => {
  it("are stable and case-sensitive", () => {
    expect(entityKey("Acme")).toBe(entityKey("Acme"))
    expect(entityKey("Acme")).not.toBe(entityKey("acme"))
    expect(entityKey("Acme")).toMatch(/^[0-9a-f]{40}$/)
  })

  it("distinguish the direction of a relation", () => {
    expect(relationKey("Acme", "OWNS", "Beta")).not.toBe(relationKey("Beta", "OWNS", "Acme"))
    expect(relationKey("Acme", "OWNS", "Beta")).toBe(relationKey("Acme", "OWNS", "Beta"))
  })
})

describe("matchesAny", () => {
  it("matches case-insensitive substrings", () => {
    expect(matchesAny("Acme Corporation", ["acme"])).toBe(true)
    expect(matchesAny("Paris", ["Berlin", "PAR"])).toBe(true)
    expect(matchesAny("Paris", ["Berlin"])).toBe(false)
  })

  it("ignores empty query names", () => {
    expect(matchesAny("Paris", [""])).toBe(false)
  })
})
