/**
 * ResilientModelProvider - local-first text generation with cloud fallback,
 * plus the embedder for the configured provider.
 *
 * The active channel set is an immutable snapshot. `switchProvider` builds a
 * new one and swaps the reference; each call reads the reference once at the
 * start, so an in-flight request never sees a half-applied configuration.
 */

import type { ExtractedGraph } from "@/lib/ports/types"
import type { IModelChannel } from "@/lib/ports/llm-provider"
import {
  errorMessage,
  MalformedResponseError,
  ModelUnavailableError,
  ValidationError,
  validationErrorFromZod,
} from "@/lib/utils/errors"
import { logger } from "@/lib/utils/logger"
import { type ChannelFactory, createModelChannels, type ModelChannels } from "./channels"
import {
  applyProviderSwitch,
  type LLMProviderType,
  maskSecret,
  type ProviderConfig,
  type ProviderSwitch,
  ProviderSwitchSchema,
} from "./config"
import { cleanSingleLine, parseEntityList, parseGraphExtraction } from "./parsers"
import {
  buildEntityPrompt,
  buildGraphExtractionPrompt,
  buildMergeSummariesPrompt,
  buildRefinePrompt,
  buildSummaryPrompt,
  SYSTEM_PROMPTS,
} from "./prompts"

export type ChannelPreference = "auto" | "cloud"

export interface GenerateOptions {
  /** "auto" tries the local channel first when enabled; "cloud" skips it. */
  channel?: ChannelPreference
  json?: boolean
}

export interface GenerationResult {
  text: string
  /** `provider/model` of the channel that produced the text. */
  provider: string
}

export interface ProviderDescription {
  provider: LLMProviderType
  model: string
  embeddingModel: string
  apiKey: string
  endpoint?: string
  apiVersion?: string
  useLocalLlm: boolean
  localModel: string
  ollamaBaseUrl: string
}

function channelLabel(channel: IModelChannel): string {
  return `${channel.name}/${channel.model}`
}

export class ResilientModelProvider {
  private channels: ModelChannels
  private readonly log = logger.child({ service: "model-provider" })

  constructor(
    config: ProviderConfig,
    private readonly factory: ChannelFactory = createModelChannels
  ) {
    this.channels = factory(config)
  }

  get activeProvider(): LLMProviderType {
    return this.channels.config.provider
  }

  /** Current configuration with the API key masked. */
  describe(): ProviderDescription {
    const { config } = this.channels
    return {
      provider: config.provider,
      model: config.model,
      embeddingModel: config.embeddingModel,
      apiKey: maskSecret(config.apiKey),
      endpoint: config.endpoint,
      apiVersion: config.apiVersion,
      useLocalLlm: config.useLocalLlm,
      localModel: config.localModel,
      ollamaBaseUrl: config.ollamaBaseUrl,
    }
  }

  /**
   * Validate a settings update and swap in a freshly built channel set.
   * A failed build leaves the previous set active.
   */
  switchProvider(update: ProviderSwitch): ProviderDescription {
    const parsed = ProviderSwitchSchema.safeParse(update)
    if (!parsed.success) {
      throw validationErrorFromZod("Invalid provider settings", parsed.error)
    }
    const next = this.factory(applyProviderSwitch({ ...this.channels.config }, parsed.data))
    this.channels = next
    this.log.info("Provider switched", {
      provider: next.config.provider,
      model: next.config.model,
      useLocalLlm: next.config.useLocalLlm,
    })
    return this.describe()
  }

  async generate(prompt: string, system?: string, options: GenerateOptions = {}): Promise<string> {
    const result = await this.generateWithMeta(prompt, system, options)
    return result.text
  }

  async generateWithMeta(prompt: string, system?: string, options: GenerateOptions = {}): Promise<GenerationResult> {
    const channels = this.channels
    const params = { prompt, system, json: options.json }

    const local = (options.channel ?? "auto") === "auto" ? channels.local : null
    if (local) {
      if (await local.isAvailable()) {
        try {
          const text = await local.generate(params)
          return { text, provider: channelLabel(local) }
        } catch (error: unknown) {
          this.log.warn("Local generation failed, switching to cloud", {
            model: local.model,
            errorMessage: errorMessage(error),
          })
        }
      } else {
        this.log.info("Local model unavailable, using cloud", { model: local.model })
      }
    }

    try {
      const text = await channels.cloud.generate(params)
      return { text, provider: channelLabel(channels.cloud) }
    } catch (error: unknown) {
      if (error instanceof MalformedResponseError || error instanceof ValidationError) throw error
      this.log.error("Cloud generation failed, no channel left", error, { model: channels.cloud.model })
      throw new ModelUnavailableError(channelLabel(channels.cloud), errorMessage(error))
    }
  }

  /** Expand a short query into a broad question. */
  async refine(text: string): Promise<string> {
    const reply = await this.generate(buildRefinePrompt(text), SYSTEM_PROMPTS.queryExpander)
    const refined = cleanSingleLine(reply)
    return refined || text
  }

  /** Up to three entity / concept names from a question. */
  async extractEntities(text: string): Promise<string[]> {
    const reply = await this.generate(buildEntityPrompt(text), SYSTEM_PROMPTS.entityExtractor)
    return parseEntityList(reply)
  }

  /** Entities and relationships in a chunk. Throws MalformedResponseError on unusable output. */
  async extractGraph(text: string): Promise<ExtractedGraph> {
    const reply = await this.generate(buildGraphExtractionPrompt(text), SYSTEM_PROMPTS.graphExtractor, { json: true })
    return parseGraphExtraction(reply)
  }

  async summarize(text: string): Promise<string> {
    return this.generate(buildSummaryPrompt(text), SYSTEM_PROMPTS.default)
  }

  async mergeSummaries(first: string, second: string): Promise<string> {
    return this.generate(buildMergeSummariesPrompt(first, second), SYSTEM_PROMPTS.default)
  }

  /** Always the configured provider's embedder, so vector width never changes mid-corpus. */
  async embed(text: string): Promise<number[]> {
    const channels = this.channels
    return channels.embedder.embed(text)
  }
}
