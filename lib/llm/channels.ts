import { OllamaChannel } from "@/lib/adapters/ollama-channel"
import { createCloudModels, VercelAIChannel, VercelAIEmbedder } from "@/lib/adapters/vercel-ai-channel"
import type { IEmbedder, IModelChannel } from "@/lib/ports/llm-provider"
import type { ProviderConfig } from "./config"

/**
 * One immutable set of model clients. A reconfiguration builds a new set;
 * calls already holding the old one finish against it.
 */
export interface ModelChannels {
  readonly config: Readonly<ProviderConfig>
  /** Null when the local toggle is off. */
  readonly local: IModelChannel | null
  readonly cloud: IModelChannel
  readonly embedder: IEmbedder
}

export type ChannelFactory = (config: ProviderConfig) => ModelChannels

export const createModelChannels: ChannelFactory = (config) => {
  const frozen = Object.freeze({ ...config })
  const { languageModel, embeddingModel } = createCloudModels(frozen)
  return Object.freeze({
    config: frozen,
    local: frozen.useLocalLlm
      ? new OllamaChannel({ baseUrl: frozen.ollamaBaseUrl, model: frozen.localModel })
      : null,
    cloud: new VercelAIChannel(frozen.provider, frozen.model, languageModel),
    embedder: new VercelAIEmbedder(frozen.provider, frozen.embeddingModel, embeddingModel),
  })
}
