import { describe, expect, it } from "vitest"
import { buildPageMap, pageAt, PageLocator } from "@/lib/ingestion/page-map"

describe("buildPageMap", () => {
  const map = buildPageMap([
    { text: "Alpha page.", pageNumber: 1 },
    { text: "Beta page.", pageNumber: 2 },
    { text: "Gamma page.\n\n", pageNumber: 3 },
  ])

  it("joins pages with blank lines and trims only the end", () => {
    expect(map.fullText).toBe("Alpha page.\n\nBeta page.\n\nGamma page.")
  })

  it("records the span of each page", () => {
    expect(map.ranges).toEqual([
      { start: 0, end: 13, pageNumber: 1 },
      { start: 13, end: 25, pageNumber: 2 },
      { start: 25, end: 40, pageNumber: 3 },
    ])
  })

  it("maps offsets to pages", () => {
    expect(pageAt(map, 0)).toBe(1)
    expect(pageAt(map, 12)).toBe(1)
    expect(pageAt(map, 13)).toBe(2)
    expect(pageAt(map, 25)).toBe(3)
    expect(pageAt(map, 100)).toBeNull()
  })

  it("keeps leading whitespace so offsets stay valid", () => {
    expect(buildPageMap([{ text: "  indented", pageNumber: 1 }]).fullText).toBe("  indented")
  })
})

describe("PageLocator", () => {
  it("maps a repeated passage to its next occurrence", () => {
    const locator = new PageLocator(
      buildPageMap([
        { text: "Intro. Same text.", pageNumber: 1 },
        { text: "Same text. More.", pageNumber: 2 },
      ])
    )
    expect(locator.locate("Same text.")).toBe(1)
    expect(locator.locate("Same text.")).toBe(2)
  })

  it("never moves backwards", () => {
    const locator = new PageLocator(
      buildPageMap([
        { text: "Intro.", pageNumber: 1 },
        { text: "Body.", pageNumber: 2 },
      ])
    )
    expect(locator.locate("Body.")).toBe(2)
    expect(locator.locate("Intro.")).toBe(2)
  })

  it("gives an unlocatable chunk the previous chunk's page", () => {
    const locator = new PageLocator(buildPageMap([{ text: "Only text.", pageNumber: 5 }]))
    expect(locator.locate("rewritten chunk")).toBe(5)
    expect(new PageLocator(buildPageMap([])).locate("anything")).toBe(1)
  })
})
