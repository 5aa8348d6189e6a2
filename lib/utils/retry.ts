import { isTransientError } from "./errors"
import { logger } from "./logger"

export interface RetryOptions {
  /** Total attempts including the first one. */
  attempts?: number
  baseDelayMs?: number
  maxDelayMs?: number
  /** Which errors earn another attempt. Defaults to transient failures only. */
  retryIf?: (error: unknown) => boolean
  label?: string
}

export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Run `fn` with exponential backoff + jitter.
 * Errors rejected by `retryIf` propagate immediately, untouched; the last
 * error is rethrown once attempts run out.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3)
  const baseDelayMs = options.baseDelayMs ?? 1000
  const maxDelayMs = options.maxDelayMs ?? 10_000
  const retryIf = options.retryIf ?? isTransientError

  let lastError: unknown
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn()
    } catch (error: unknown) {
      lastError = error
      if (!retryIf(error) || attempt === attempts - 1) {
        throw error
      }
      const exponentialMs = baseDelayMs * Math.pow(2, attempt)
      const jitterMs = Math.random() * baseDelayMs * 0.5
      const delayMs = Math.min(exponentialMs + jitterMs, maxDelayMs)
      logger.warn(`${options.label ?? "operation"} failed, retrying`, {
        service: "retry",
        attempt: attempt + 1,
        attempts,
        delayMs: Math.round(delayMs),
        errorMessage: error instanceof Error ? error.message : String(error),
      })
      await sleep(delayMs)
    }
  }
  throw lastError
}
