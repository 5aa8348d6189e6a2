/**
 * Model channel ports. A channel is one backend for text generation; an
 * embedder turns text into a vector. The resilient provider composes a local
 * and a cloud channel plus one embedder into a swappable set.
 */

export interface GenerateParams {
  prompt: string
  system?: string
  /** Ask the backend for a JSON object response. */
  json?: boolean
}

export interface IModelChannel {
  /** Provider name, e.g. "ollama", "openai". */
  readonly name: string
  readonly model: string
  /** Cheap probe: can this channel serve its model right now? Never throws. */
  isAvailable(): Promise<boolean>
  generate(params: GenerateParams): Promise<string>
}

export interface IEmbedder {
  readonly name: string
  readonly model: string
  embed(text: string): Promise<number[]>
}
