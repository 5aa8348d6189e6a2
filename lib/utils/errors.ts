import { APICallError } from "ai"
import type { ZodError } from "zod"

export class AppError extends Error {
  constructor(
    message: string,
    public code: string = "APP_ERROR",
    public details?: Record<string, unknown>
  ) {
    super(message)
    this.name = "AppError"
    Error.captureStackTrace(this, this.constructor)
  }
}

/** Missing job fields, bad request shape, oversized input. Never retried. */
export class ValidationError extends AppError {
  constructor(message: string, public fields?: Record<string, string[]>) {
    super(message, "VALIDATION_ERROR")
    this.name = "ValidationError"
  }
}

/** Collect zod issues by dotted path. Root-level issues land under "_". */
export function validationErrorFromZod(message: string, error: ZodError): ValidationError {
  const fields: Record<string, string[]> = {}
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "_"
    fields[key] = [...(fields[key] ?? []), issue.message]
  }
  return new ValidationError(message, fields)
}

/** Network / timeout / 5xx against a backing store or model channel. */
export class TransientInfrastructureError extends AppError {
  constructor(message: string, public statusCode?: number) {
    super(message, "TRANSIENT_INFRASTRUCTURE")
    this.name = "TransientInfrastructureError"
  }
}

/** Every channel that could serve a generation request has failed. */
export class ModelUnavailableError extends AppError {
  constructor(public model: string, reason: string) {
    super(`Model ${model} unavailable: ${reason}`, "MODEL_UNAVAILABLE")
    this.name = "ModelUnavailableError"
  }
}

/** A backend answered, but with something we cannot use. Passed through without retry. */
export class MalformedResponseError extends AppError {
  constructor(message: string, public raw?: string) {
    super(message, "MALFORMED_RESPONSE")
    this.name = "MalformedResponseError"
  }
}

const TRANSIENT_STATUS = new Set([408, 425, 429, 500, 502, 503, 504])

const TRANSIENT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
])

function readCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined
  const code = error.code
  return typeof code === "string" ? code : undefined
}

/**
 * Classify an error as transient (worth retrying) or not.
 * fetch() surfaces connection failures as `TypeError("fetch failed")` with the
 * socket error on `cause`, so the cause chain is walked as well.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof MalformedResponseError || error instanceof ValidationError) return false
  if (error instanceof ModelUnavailableError) return false
  if (error instanceof TransientInfrastructureError) return true
  if (APICallError.isInstance(error)) {
    return error.isRetryable || (error.statusCode != null && TRANSIENT_STATUS.has(error.statusCode))
  }
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") return true
    const code = readCode(error)
    if (code && TRANSIENT_CODES.has(code)) return true
    if (error instanceof TypeError && error.message === "fetch failed") return true
    if (error.cause !== undefined && error.cause !== error) return isTransientError(error.cause)
  }
  return false
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
