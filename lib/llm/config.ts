/**
 * Centralized model configuration.
 *
 * ALL model names, provider settings and endpoint defaults live here.
 * To switch providers or models, edit this file or the env - no other
 * source file should hardcode model names or API key env vars.
 *
 * Environment overrides (all optional):
 *   LLM_PROVIDER            - Cloud channel: "openai" | "google" | "azure" | "ollama" (default: openai)
 *   OPENAI_API_KEY          - OpenAI key
 *   GEMINI_API_KEY          - Google Gemini key
 *   AZURE_OPENAI_API_KEY    - Azure OpenAI key
 *   AZURE_OPENAI_ENDPOINT   - Azure resource endpoint (https://<resource>.openai.azure.com)
 *   AZURE_OPENAI_API_VERSION
 *   AZURE_OPENAI_DEPLOYMENT_NAME / AZURE_OPENAI_EMBEDDING_DEPLOYMENT_NAME
 *   OLLAMA_URL              - Ollama base URL (default: http://localhost:11434)
 *   SMALL_MODEL             - Local (fast) model (default: mistral)
 *   BIG_MODEL               - Cloud (capable) model override
 *   EMBEDDING_MODEL         - Embedding model override
 *   USE_LOCAL_LLM           - "true" to prefer the local channel for generation
 *   LLM_RETRY_MAX_ATTEMPTS / LLM_RETRY_BASE_DELAY_MS
 */

import { z } from "zod"

// ── Provider ──────────────────────────────────────────────────────────────────

export const LLM_PROVIDERS = ["openai", "google", "azure", "ollama"] as const

export type LLMProviderType = (typeof LLM_PROVIDERS)[number]

export interface ProviderConfig {
  provider: LLMProviderType
  apiKey?: string
  /** Cloud (capable) generation model, or the Azure chat deployment. */
  model: string
  /** Embedding model, or the Azure embedding deployment. */
  embeddingModel: string
  /** Azure resource endpoint. */
  endpoint?: string
  apiVersion?: string
  /** Prefer the local channel for generation. */
  useLocalLlm: boolean
  ollamaBaseUrl: string
  /** Local (fast) generation model served by Ollama. */
  localModel: string
}

// ── Models ────────────────────────────────────────────────────────────────────

/** Default model names per provider when no env override is set. */
const PROVIDER_MODEL_DEFAULTS: Record<LLMProviderType, { model: string; embedding: string }> = {
  openai: { model: "gpt-4o", embedding: "text-embedding-3-small" },
  google: { model: "gemini-2.0-flash", embedding: "text-embedding-004" },
  azure: { model: "gpt-4o", embedding: "text-embedding-3-small" },
  ollama: { model: "mistral", embedding: "nomic-embed-text" },
}

/** Vector width produced by each provider's default embedder. */
const PROVIDER_EMBEDDING_DIMENSIONS: Record<LLMProviderType, number> = {
  openai: 1536,
  google: 768,
  azure: 1536,
  ollama: 768,
}

export const DEFAULT_OLLAMA_URL = "http://localhost:11434"
export const DEFAULT_LOCAL_MODEL = "mistral"

/** Fallback context window when the local backend does not report one. */
export const DEFAULT_CONTEXT_WINDOW = 4096
/** Prompts sent to the local channel are cut to this many characters per context token. */
export const CHARS_PER_CONTEXT_TOKEN = 3

// ── Timeouts & retries ───────────────────────────────────────────────────────

export const LOCAL_PROBE_TIMEOUT_MS = 5_000
export const LOCAL_GENERATE_TIMEOUT_MS = 120_000

export const RETRY_MAX_ATTEMPTS = parseInt(process.env.LLM_RETRY_MAX_ATTEMPTS ?? "3", 10)
export const RETRY_BASE_DELAY_MS = parseInt(process.env.LLM_RETRY_BASE_DELAY_MS ?? "1000", 10)

function isProvider(value: string): value is LLMProviderType {
  return (LLM_PROVIDERS as readonly string[]).includes(value)
}

export function parseProvider(value: string | undefined): LLMProviderType {
  const lower = (value ?? "openai").toLowerCase()
  return isProvider(lower) ? lower : "openai"
}

/** API key for a provider, read from its own env var. */
export function getProviderApiKey(provider: LLMProviderType, env: NodeJS.ProcessEnv = process.env): string | undefined {
  switch (provider) {
    case "openai":
      return env.OPENAI_API_KEY
    case "google":
      return env.GEMINI_API_KEY
    case "azure":
      return env.AZURE_OPENAI_API_KEY
    case "ollama":
      return undefined
  }
}

export function getEmbeddingDimension(provider: LLMProviderType, env: NodeJS.ProcessEnv = process.env): number {
  const override = env.EMBEDDING_DIMENSION
  if (override) return parseInt(override, 10)
  return PROVIDER_EMBEDDING_DIMENSIONS[provider]
}

/** Build the startup configuration from the environment. */
export function loadProviderConfig(env: NodeJS.ProcessEnv = process.env): ProviderConfig {
  const provider = parseProvider(env.LLM_PROVIDER)
  const defaults = PROVIDER_MODEL_DEFAULTS[provider]
  const localModel = env.SMALL_MODEL ?? DEFAULT_LOCAL_MODEL

  return {
    provider,
    apiKey: getProviderApiKey(provider, env),
    model:
      provider === "azure"
        ? env.AZURE_OPENAI_DEPLOYMENT_NAME ?? defaults.model
        : provider === "ollama"
          ? localModel
          : env.BIG_MODEL ?? defaults.model,
    embeddingModel:
      provider === "azure"
        ? env.AZURE_OPENAI_EMBEDDING_DEPLOYMENT_NAME ?? defaults.embedding
        : env.EMBEDDING_MODEL ?? defaults.embedding,
    endpoint: env.AZURE_OPENAI_ENDPOINT,
    apiVersion: env.AZURE_OPENAI_API_VERSION,
    useLocalLlm: (env.USE_LOCAL_LLM ?? "false").toLowerCase() === "true",
    ollamaBaseUrl: env.OLLAMA_URL ?? DEFAULT_OLLAMA_URL,
    localModel,
  }
}

// ── Runtime reconfiguration ──────────────────────────────────────────────────

export const ProviderSwitchSchema = z.object({
  provider: z.enum(LLM_PROVIDERS),
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  apiVersion: z.string().min(1).optional(),
  deployment: z.string().min(1).optional(),
  embeddingDeployment: z.string().min(1).optional(),
  useLocalLlm: z.boolean().optional(),
})

export type ProviderSwitch = z.infer<typeof ProviderSwitchSchema>

/**
 * Merge a settings update into the current configuration. Fields the update
 * leaves out keep their current value when the provider is unchanged and fall
 * back to the new provider's defaults otherwise.
 */
export function applyProviderSwitch(
  current: ProviderConfig,
  update: ProviderSwitch,
  env: NodeJS.ProcessEnv = process.env
): ProviderConfig {
  const sameProvider = update.provider === current.provider
  const defaults = PROVIDER_MODEL_DEFAULTS[update.provider]
  const base: ProviderConfig = sameProvider
    ? current
    : {
        ...current,
        provider: update.provider,
        apiKey: getProviderApiKey(update.provider, env),
        model: update.provider === "ollama" ? current.localModel : defaults.model,
        embeddingModel: defaults.embedding,
      }

  return {
    ...base,
    apiKey: update.apiKey ?? base.apiKey,
    model: update.deployment ?? update.model ?? base.model,
    embeddingModel: update.embeddingDeployment ?? base.embeddingModel,
    endpoint: update.endpoint ?? base.endpoint,
    apiVersion: update.apiVersion ?? base.apiVersion,
    useLocalLlm: update.useLocalLlm ?? base.useLocalLlm,
  }
}

/** `sk-abcdef12` → `sk-***12`. Short or empty secrets are returned as-is. */
export function maskSecret(secret: string | undefined): string {
  if (!secret) return ""
  if (secret.length <= 5) return secret
  return `${secret.slice(0, 3)}***${secret.slice(-2)}`
}
