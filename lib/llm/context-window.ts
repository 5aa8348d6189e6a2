/**
 * Context-window discovery for the local (Ollama) channel.
 *
 * `POST /api/show` reports the window in different places depending on the
 * Ollama version: structured `details.context_length`, a `num_ctx` line in
 * `parameters`, or the raw Modelfile. Anything else falls back to the default.
 */

import { DEFAULT_CONTEXT_WINDOW, LOCAL_PROBE_TIMEOUT_MS } from "./config"
import { readField } from "@/lib/utils/json"
import { logger } from "@/lib/utils/logger"

const CTX_PATTERN = /num_ctx\s+(\d+)/

const log = logger.child({ service: "context-window" })

function toPositiveInt(value: unknown): number | null {
  const n = typeof value === "string" ? parseInt(value, 10) : typeof value === "number" ? value : NaN
  return Number.isInteger(n) && n > 0 ? n : null
}

/** Extract the context window from an `/api/show` response body. */
export function parseContextWindow(body: unknown): number | null {
  const structured = toPositiveInt(readField(readField(body, "details"), "context_length"))
  if (structured !== null) return structured

  for (const field of ["parameters", "modelfile"]) {
    const text = readField(body, field)
    if (typeof text === "string") {
      const match = CTX_PATTERN.exec(text)
      const parsed = match ? toPositiveInt(match[1]) : null
      if (parsed !== null) return parsed
    }
  }
  return null
}

/** Probe the Ollama instance. Never throws; returns the default on any failure. */
export async function probeContextWindow(
  baseUrl: string,
  model: string,
  fetchImpl: typeof fetch = fetch
): Promise<number> {
  try {
    const res = await fetchImpl(`${baseUrl}/api/show`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ name: model }),
      signal: AbortSignal.timeout(LOCAL_PROBE_TIMEOUT_MS),
    })
    if (!res.ok) {
      log.warn("Could not fetch model info, using default context window", { model, status: res.status })
      return DEFAULT_CONTEXT_WINDOW
    }
    const body: unknown = await res.json()
    const window = parseContextWindow(body)
    if (window === null) {
      log.info("Model context not explicit, using default", { model, contextWindow: DEFAULT_CONTEXT_WINDOW })
      return DEFAULT_CONTEXT_WINDOW
    }
    return window
  } catch (error: unknown) {
    log.warn("Context window probe failed, using default", {
      model,
      errorMessage: error instanceof Error ? error.message : String(error),
    })
    return DEFAULT_CONTEXT_WINDOW
  }
}
