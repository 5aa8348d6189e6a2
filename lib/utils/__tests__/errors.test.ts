import { describe, expect, it } from "vitest"
import { z } from "zod"
import {
  errorMessage,
  isTransientError,
  MalformedResponseError,
  ModelUnavailableError,
  TransientInfrastructureError,
  ValidationError,
  validationErrorFromZod,
} from "@/lib/utils/errors"

describe("isTransientError", () => {
  it("classifies infrastructure errors as transient", () => {
    expect(isTransientError(new TransientInfrastructureError("503", 503))).toBe(true)
  })

  it("never retries validation, malformed or unavailable errors", () => {
    expect(isTransientError(new ValidationError("bad"))).toBe(false)
    expect(isTransientError(new MalformedResponseError("bad json"))).toBe(false)
    expect(isTransientError(new ModelUnavailableError("mistral", "not installed"))).toBe(false)
  })

  it("walks the cause chain of fetch failures", () => {
    const socketError = Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" })
    const fetchError = new TypeError("request failed", { cause: socketError })
    expect(isTransientError(fetchError)).toBe(true)
  })

  it("treats undici's bare fetch failure as transient", () => {
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true)
  })

  it("treats timeouts as transient", () => {
    const timeout = new Error("The operation was aborted due to timeout")
    timeout.name = "TimeoutError"
    expect(isTransientError(timeout)).toBe(true)
  })

  it("leaves ordinary errors and non-errors alone", () => {
    expect(isTransientError(new Error("boom"))).toBe(false)
    expect(isTransientError("boom")).toBe(false)
    expect(isTransientError(null)).toBe(false)
  })
})

describe("validationErrorFromZod", () => {
  it("groups issues by dotted path", () => {
    const schema = z.object({ path: z.string().min(1), nested: z.object({ batch: z.string() }) })
    const result = schema.safeParse({ path: "", nested: { batch: 4 } })
    if (result.success) throw new Error("expected a parse failure")

    const error = validationErrorFromZod("Invalid job", result.error)

    expect(error).toBeInstanceOf(ValidationError)
    expect(error.code).toBe("VALIDATION_ERROR")
    expect(error.message).toBe("Invalid job")
    expect(Object.keys(error.fields ?? {}).sort()).toEqual(["nested.batch", "path"])
  })

  it("puts root-level issues under _", () => {
    const result = z.string().safeParse(42)
    if (result.success) throw new Error("expected a parse failure")

    expect(Object.keys(validationErrorFromZod("Invalid", result.error).fields ?? {})).toEqual(["_"])
  })
})

describe("errorMessage", () => {
  it("reads Error messages and stringifies everything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom")
    expect(errorMessage(42)).toBe("42")
  })
})
