/**
 * VercelAIChannel / VercelAIEmbedder - the cloud/capable channel and the
 * embedder, built on the Vercel AI SDK.
 *
 * Provider selection is driven by `ProviderConfig` (see `lib/llm/config.ts`):
 *   openai  - @ai-sdk/openai
 *   google  - @ai-sdk/google
 *   azure   - @ai-sdk/azure (model / embeddingModel are deployment names)
 *   ollama  - @ai-sdk/openai pointed at Ollama's OpenAI-compatible /v1 endpoint
 *
 * The SDK's own retries are disabled; `withRetry` owns backoff so only
 * transient failures are retried.
 */

import { createAzure } from "@ai-sdk/azure"
import { createGoogleGenerativeAI } from "@ai-sdk/google"
import { createOpenAI } from "@ai-sdk/openai"
import { embed, type EmbeddingModel, generateText, type LanguageModel } from "ai"
import { RETRY_BASE_DELAY_MS, RETRY_MAX_ATTEMPTS, type ProviderConfig } from "@/lib/llm/config"
import type { GenerateParams, IEmbedder, IModelChannel } from "@/lib/ports/llm-provider"
import { MalformedResponseError } from "@/lib/utils/errors"
import { type RetryOptions, withRetry } from "@/lib/utils/retry"

type ChannelRetry = Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs">

const DEFAULT_RETRY: ChannelRetry = { attempts: RETRY_MAX_ATTEMPTS, baseDelayMs: RETRY_BASE_DELAY_MS }

const JSON_INSTRUCTION = "Respond with a single JSON object and nothing else."

export interface CloudModels {
  languageModel: LanguageModel
  embeddingModel: EmbeddingModel<string>
}

/** Return SDK model handles for the configured provider. */
export function createCloudModels(config: ProviderConfig): CloudModels {
  switch (config.provider) {
    case "openai": {
      const provider = createOpenAI({ apiKey: config.apiKey })
      return {
        languageModel: provider(config.model),
        embeddingModel: provider.textEmbeddingModel(config.embeddingModel),
      }
    }
    case "google": {
      const provider = createGoogleGenerativeAI({ apiKey: config.apiKey })
      return {
        languageModel: provider(config.model),
        embeddingModel: provider.textEmbeddingModel(config.embeddingModel),
      }
    }
    case "azure": {
      const provider = createAzure({
        apiKey: config.apiKey,
        apiVersion: config.apiVersion,
        ...(config.endpoint ? { baseURL: `${config.endpoint.replace(/\/+$/, "")}/openai/deployments` } : {}),
      })
      return {
        languageModel: provider(config.model),
        embeddingModel: provider.textEmbeddingModel(config.embeddingModel),
      }
    }
    case "ollama": {
      const provider = createOpenAI({
        baseURL: `${config.ollamaBaseUrl.replace(/\/+$/, "")}/v1`,
        apiKey: "ollama",
      })
      return {
        languageModel: provider(config.model),
        embeddingModel: provider.textEmbeddingModel(config.embeddingModel),
      }
    }
  }
}

export class VercelAIChannel implements IModelChannel {
  constructor(
    readonly name: string,
    readonly model: string,
    private readonly languageModel: LanguageModel,
    private readonly retry: ChannelRetry = DEFAULT_RETRY
  ) {}

  /** Remote APIs are assumed reachable; failures surface through retries. */
  async isAvailable(): Promise<boolean> {
    return true
  }

  async generate(params: GenerateParams): Promise<string> {
    const system = params.json
      ? [params.system, JSON_INSTRUCTION].filter(Boolean).join("\n\n")
      : params.system

    const result = await withRetry(
      () =>
        generateText({
          model: this.languageModel,
          prompt: params.prompt,
          ...(system ? { system } : {}),
          temperature: 0,
          maxRetries: 0,
        }),
      { ...this.retry, label: `${this.name}.generate(${this.model})` }
    )
    return result.text
  }
}

export class VercelAIEmbedder implements IEmbedder {
  constructor(
    readonly name: string,
    readonly model: string,
    private readonly embeddingModel: EmbeddingModel<string>,
    private readonly retry: ChannelRetry = DEFAULT_RETRY
  ) {}

  async embed(text: string): Promise<number[]> {
    const result = await withRetry(
      () => embed({ model: this.embeddingModel, value: text, maxRetries: 0 }),
      { ...this.retry, label: `${this.name}.embed(${this.model})` }
    )
    if (result.embedding.length === 0) {
      throw new MalformedResponseError(`Empty embedding from ${this.name}/${this.model}`)
    }
    return result.embedding
  }
}
