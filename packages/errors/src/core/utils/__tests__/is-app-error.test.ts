import { BaseError } from "../../base-error"
import { isAppError } from "../is-app-error"

const complete = () => ({
  name: "UpstreamError",
  message: "503 from upstream",
  code: "upstream",
  context: { status: 503 },
  isRetryable: true,
  isOperational: true,
  timestamp: new Date(),
})

describe("isAppError", () => {
  it("accepts BaseError and its subclasses", () => {
    class UpstreamError extends BaseError<"upstream"> {
      constructor() {
        super("503 from upstream", { code: "upstream", isRetryable: true })
      }
    }

    expect(isAppError(new BaseError("x", { code: "x" }))).toBe(true)
    expect(isAppError(new UpstreamError())).toBe(true)
  })

  it("accepts duck-typed objects with every field", () => {
    expect(isAppError(complete())).toBe(true)
  })

  it.each([null, undefined, "error", 500, new Error("plain")])(
    "rejects %s",
    (value) => {
      expect(isAppError(value)).toBe(false)
    },
  )

  it.each([
    "name",
    "message",
    "code",
    "context",
    "isRetryable",
    "isOperational",
    "timestamp",
  ] as const)("rejects objects missing %s", (field) => {
    const obj: Record<string, unknown> = complete()
    delete obj[field]

    expect(isAppError(obj)).toBe(false)
  })

  it("rejects an invalid timestamp", () => {
    expect(isAppError({ ...complete(), timestamp: new Date("invalid") })).toBe(false)
  })
})
