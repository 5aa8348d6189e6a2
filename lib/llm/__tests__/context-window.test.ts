import { describe, expect, it, vi } from "vitest"
import { DEFAULT_CONTEXT_WINDOW } from "@/lib/llm/config"
import { parseContextWindow, probeContextWindow } from "@/lib/llm/context-window"

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
}

describe("parseContextWindow", () => {
  it("prefers the structured context length", () => {
    expect(parseContextWindow({ details: { context_length: 8192 }, parameters: "num_ctx 2048" })).toBe(8192)
  })

  it("reads num_ctx from the parameters block", () => {
    expect(parseContextWindow({ parameters: 'stop "[INST]"\nnum_ctx                        16384' })).toBe(16384)
  })

  it("falls back to the raw modelfile", () => {
    expect(parseContextWindow({ modelfile: "FROM mistral\nPARAMETER num_ctx 32768\n" })).toBe(32768)
  })

  it("returns null when nothing usable is reported", () => {
    expect(parseContextWindow({})).toBeNull()
    expect(parseContextWindow({ details: { context_length: "0" } })).toBeNull()
    expect(parseContextWindow("not an object")).toBeNull()
  })
})

describe("probeContextWindow", () => {
  it("posts the model name to /api/show", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ details: { context_length: 8192 } }))

    await expect(probeContextWindow("http://ollama:11434", "mistral", fetchImpl)).resolves.toBe(8192)
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    const [url, init] = fetchImpl.mock.calls[0]!
    expect(url).toBe("http://ollama:11434/api/show")
    expect(init?.body).toBe(JSON.stringify({ name: "mistral" }))
  })

  it("uses the default when the server answers with an error", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: "model not found" }, 404))
    await expect(probeContextWindow("http://ollama:11434", "mistral", fetchImpl)).resolves.toBe(DEFAULT_CONTEXT_WINDOW)
  })

  it("uses the default when the server is unreachable", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"))
    await expect(probeContextWindow("http://ollama:11434", "mistral", fetchImpl)).resolves.toBe(DEFAULT_CONTEXT_WINDOW)
  })

  it("uses the default when the window is not reported", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ license: "apache" }))
    await expect(probeContextWindow("http://ollama:11434", "mistral", fetchImpl)).resolves.toBe(DEFAULT_CONTEXT_WINDOW)
  })
})
