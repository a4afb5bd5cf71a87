import { BaseError, serializeError } from "../base-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-03-02T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("BaseError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("rate limited", {
        code: "rate_limited",
        context: { retryAfterMs: 250 },
        isRetryable: true,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "rate_limited",
        message: "rate limited",
        context: { retryAfterMs: 250 },
        isRetryable: true,
        isOperational: true,
        timestamp: "2024-03-02T08:00:00.000Z",
      })
    })

    it("omits stack unless requested", () => {
      const err = new BaseError("boom", { code: "boom" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("serializes the cause chain", () => {
      const root = new Error("connection reset")
      const outer = new BaseError("fetch failed", { code: "fetch_failed", cause: root })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("unknown")
      expect(serialized.cause?.message).toBe("connection reset")
      expect("cause" in serializeError(root)).toBe(false)
    })
  })

  describe("plain errors", () => {
    it("uses the unknown code and marks them non-operational", () => {
      const serialized = serializeError(new TypeError("bad input"))

      expect(serialized).toEqual({
        name: "TypeError",
        code: "unknown",
        message: "bad input",
        context: {},
        isRetryable: false,
        isOperational: false,
        timestamp: "2024-03-02T08:00:00.000Z",
      })
    })

    it("reports the error's own canRetry() verdict", () => {
      class Transient extends Error {
        canRetry() {
          return true
        }
      }

      expect(serializeError(new Transient("flaky")).isRetryable).toBe(true)
    })
  })

  describe("non-error values", () => {
    it("keeps a thrown string as the message", () => {
      const serialized = serializeError("nope")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("nope")
      expect(serialized.context).toEqual({ value: "nope" })
    })

    it("keeps other values in context", () => {
      const serialized = serializeError({ status: 503 })

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: { status: 503 } })
    })
  })
})
