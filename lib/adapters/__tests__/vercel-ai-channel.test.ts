import { MockEmbeddingModelV1, MockLanguageModelV1 } from "ai/test"
import { describe, expect, it } from "vitest"
import { createCloudModels, VercelAIChannel, VercelAIEmbedder } from "@/lib/adapters/vercel-ai-channel"
import { TEST_PROVIDER_CONFIG } from "@/lib/di/fakes"
import { MalformedResponseError } from "@/lib/utils/errors"

const NO_RETRY = { attempts: 1, baseDelayMs: 0 }

function textModel(text: string): { model: MockLanguageModelV1; systems: unknown[] } {
  const systems: unknown[] = []
  const model = new MockLanguageModelV1({
    doGenerate: async (options) => {
      systems.push(options.prompt.find((m) => m.role === "system")?.content)
      return {
        rawCall: { rawPrompt: null, rawSettings: {} },
        finishReason: "stop",
        usage: { promptTokens: 10, completionTokens: 5 },
        text,
      }
    },
  })
  return { model, systems }
}

describe("createCloudModels", () => {
  it("builds handles for the configured models", () => {
    const { languageModel, embeddingModel } = createCloudModels(TEST_PROVIDER_CONFIG)
    expect(languageModel.modelId).toBe("gpt-4o")
    expect(embeddingModel.modelId).toBe("text-embedding-3-small")
  })

  it("uses deployment names for Azure", () => {
    const { languageModel } = createCloudModels({
      ...TEST_PROVIDER_CONFIG,
      provider: "azure",
      model: "chat-prod",
      endpoint: "https://example.openai.azure.com/",
    })
    expect(languageModel.modelId).toBe("chat-prod")
  })
})

describe("VercelAIChannel", () => {
  it("returns the generated text", async () => {
    const { model } = textModel("Paris")
    const channel = new VercelAIChannel("openai", "gpt-4o", model, NO_RETRY)

    await expect(channel.isAvailable()).resolves.toBe(true)
    await expect(channel.generate({ prompt: "Where is Acme?", system: "Be brief." })).resolves.toBe("Paris")
  })

  it("appends the JSON instruction to the system prompt", async () => {
    const { model, systems } = textModel("{}")
    const channel = new VercelAIChannel("openai", "gpt-4o", model, NO_RETRY)

    await channel.generate({ prompt: "extract", system: "You extract graphs.", json: true })
    await channel.generate({ prompt: "extract", json: true })

    expect(systems).toEqual([
      "You extract graphs.\n\nRespond with a single JSON object and nothing else.",
      "Respond with a single JSON object and nothing else.",
    ])
  })
})

describe("VercelAIEmbedder", () => {
  it("returns the embedding", async () => {
    const model = new MockEmbeddingModelV1<string>({ doEmbed: async () => ({ embeddings: [[0.1, 0.2, 0.3]] }) })
    const embedder = new VercelAIEmbedder("openai", "text-embedding-3-small", model, NO_RETRY)

    await expect(embedder.embed("hello")).resolves.toEqual([0.1, 0.2, 0.3])
  })

  it("rejects an empty embedding", async () => {
    const model = new MockEmbeddingModelV1<string>({ doEmbed: async () => ({ embeddings: [[]] }) })
    const embedder = new VercelAIEmbedder("openai", "text-embedding-3-small", model, NO_RETRY)

    await expect(embedder.embed("hello")).rejects.toBeInstanceOf(MalformedResponseError)
  })
})
