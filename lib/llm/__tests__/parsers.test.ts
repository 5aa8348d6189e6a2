import { describe, expect, it } from "vitest"
import { cleanSingleLine, parseEntityList, parseGraphExtraction, stripCodeFences } from "@/lib/llm/parsers"
import { MalformedResponseError } from "@/lib/utils/errors"

describe("stripCodeFences", () => {
  it("removes json fences", () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}')
    expect(stripCodeFences('```\n["x"]\n```')).toBe('["x"]')
  })
})

describe("parseGraphExtraction", () => {
  it("parses a fenced reply", () => {
    const raw = `\`\`\`json
{"entities": [{"name": "Acme", "type": "ORG"}, "Paris"],
 "relationships": [{"source": "Acme", "target": "Paris", "relation": "LOCATED_IN"}]}
\`\`\``
    expect(parseGraphExtraction(raw)).toEqual({
      entities: [{ name: "Acme", type: "ORG" }, { name: "Paris" }],
      relationships: [{ source: "Acme", relation: "LOCATED_IN", target: "Paris" }],
    })
  })

  it("drops relationships missing an endpoint or a relation", () => {
    const raw = JSON.stringify({
      entities: [],
      relationships: [
        { source: "Acme", target: "Paris", relation: "" },
        { source: "Acme", relation: "OWNS" },
        { source: " Bob ", target: "Acme", relation: "WORKS_AT" },
      ],
    })
    expect(parseGraphExtraction(raw).relationships).toEqual([{ source: "Bob", relation: "WORKS_AT", target: "Acme" }])
  })

  it("defaults missing lists to empty", () => {
    expect(parseGraphExtraction("{}")).toEqual({ entities: [], relationships: [] })
    expect(parseGraphExtraction("   ")).toEqual({ entities: [], relationships: [] })
  })

  it("rejects replies that are not JSON", () => {
    expect(() => parseGraphExtraction("Sure! Here is the graph:")).toThrow(MalformedResponseError)
  })

  it("rejects wrongly shaped JSON", () => {
    expect(() => parseGraphExtraction('{"relationships": "none"}')).toThrow(MalformedResponseError)
  })
})

describe("parseEntityList", () => {
  it("reads a JSON array", () => {
    expect(parseEntityList('["Requirements Analysis", "Security"]')).toEqual(["Requirements Analysis", "Security"])
  })

  it("reads a comma separated list with quotes", () => {
    expect(parseEntityList("'Acme', \"Paris\"")).toEqual(["Acme", "Paris"])
  })

  it("reads a bulleted list", () => {
    expect(parseEntityList("- Acme\n- Paris\n2. Berlin")).toEqual(["Acme", "Paris", "Berlin"])
  })

  it("maps the None sentinel to an empty list", () => {
    expect(parseEntityList("None")).toEqual([])
    expect(parseEntityList("'none'")).toEqual([])
    expect(parseEntityList("")).toEqual([])
  })

  it("keeps at most three distinct names", () => {
    expect(parseEntityList('["A", "A", "B", "C", "D"]')).toEqual(["A", "B", "C"])
  })
})

describe("cleanSingleLine", () => {
  it("strips surrounding quotes and whitespace", () => {
    expect(cleanSingleLine('  "What are the definitions of NFR?"\n')).toBe("What are the definitions of NFR?")
  })
})
