/**
 * OllamaChannel - the local/fast generation channel, talking to Ollama's
 * native HTTP API (not the OpenAI-compatible one) so it can probe installed
 * models, read the context window and request JSON-formatted output.
 *
 * Endpoints:
 *   GET  /api/tags      - installed models (availability probe)
 *   POST /api/show      - model details (context window probe)
 *   POST /api/generate  - non-streaming generation
 */

import {
  CHARS_PER_CONTEXT_TOKEN,
  LOCAL_GENERATE_TIMEOUT_MS,
  LOCAL_PROBE_TIMEOUT_MS,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
} from "@/lib/llm/config"
import { probeContextWindow } from "@/lib/llm/context-window"
import type { GenerateParams, IModelChannel } from "@/lib/ports/llm-provider"
import { MalformedResponseError, TransientInfrastructureError } from "@/lib/utils/errors"
import { readField } from "@/lib/utils/json"
import { logger } from "@/lib/utils/logger"
import { type RetryOptions, withRetry } from "@/lib/utils/retry"

const TRANSIENT_HTTP_STATUS = new Set([408, 429, 500, 502, 503, 504])

export interface OllamaChannelOptions {
  baseUrl: string
  model: string
  fetchImpl?: typeof fetch
  retry?: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs">
}

/** `name` entries from a `/api/tags` body. */
export function listInstalledModels(body: unknown): string[] {
  const models = readField(body, "models")
  if (!Array.isArray(models)) return []
  const names: string[] = []
  for (const m of models) {
    const name = readField(m, "name")
    if (typeof name === "string") names.push(name)
  }
  return names
}

export class OllamaChannel implements IModelChannel {
  readonly name = "ollama"
  readonly model: string
  private readonly baseUrl: string
  private readonly fetchImpl: typeof fetch
  private readonly retry: Pick<RetryOptions, "attempts" | "baseDelayMs" | "maxDelayMs">
  private readonly log = logger.child({ service: "ollama-channel" })
  /** Discovered once per channel instance, then reused. */
  private contextWindow: Promise<number> | null = null

  constructor(options: OllamaChannelOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "")
    this.model = options.model
    this.fetchImpl = options.fetchImpl ?? fetch
    this.retry = options.retry ?? { attempts: RETRY_MAX_ATTEMPTS, baseDelayMs: RETRY_BASE_DELAY_MS }
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(LOCAL_PROBE_TIMEOUT_MS),
      })
      if (!res.ok) {
        this.log.warn("Model listing failed", { status: res.status })
        return false
      }
      const installed = listInstalledModels(await res.json())
      const exists = installed.some((name) => name.includes(this.model))
      if (!exists) {
        this.log.warn("Local model not found", { model: this.model, available: installed })
      }
      return exists
    } catch (error: unknown) {
      this.log.warn("Failed to check local model availability", {
        errorMessage: error instanceof Error ? error.message : String(error),
      })
      return false
    }
  }

  getContextWindow(): Promise<number> {
    if (!this.contextWindow) {
      this.contextWindow = probeContextWindow(this.baseUrl, this.model, this.fetchImpl).then((window) => {
        this.log.info("Local context limit detected", { model: this.model, contextWindow: window })
        return window
      })
    }
    return this.contextWindow
  }

  async generate(params: GenerateParams): Promise<string> {
    const contextWindow = await this.getContextWindow()
    const safePrompt = params.prompt.slice(0, contextWindow * CHARS_PER_CONTEXT_TOKEN)

    const payload: Record<string, unknown> = {
      model: this.model,
      prompt: safePrompt,
      system: params.system ?? "",
      stream: false,
      options: { num_ctx: contextWindow, temperature: 0.1 },
    }
    if (params.json) payload.format = "json"

    return withRetry(
      async () => {
        const res = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(LOCAL_GENERATE_TIMEOUT_MS),
        })
        if (!res.ok) {
          const detail = await res.text().catch(() => "")
          const message = `Ollama error: ${res.status} ${detail}`.trim()
          if (TRANSIENT_HTTP_STATUS.has(res.status)) {
            throw new TransientInfrastructureError(message, res.status)
          }
          throw new Error(message)
        }
        const response = readField(await res.json(), "response")
        if (typeof response !== "string") {
          throw new MalformedResponseError("Ollama response has no text")
        }
        return response
      },
      { ...this.retry, label: `ollama.generate(${this.model})` }
    )
  }
}
