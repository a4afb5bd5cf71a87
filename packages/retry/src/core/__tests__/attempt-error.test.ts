import {
  fatal,
  intoInner,
  mapAttemptError,
  maybeRetryable,
  onTimeout,
  timedOut,
} from "../attempt-error"

describe("attempt error helpers", () => {
  it("tags errors", () => {
    expect(maybeRetryable("ECONNRESET")).toEqual({ kind: "maybe_retryable", error: "ECONNRESET" })
    expect(fatal("EACCES")).toEqual({ kind: "fatal", error: "EACCES" })
    expect(timedOut("ETIMEDOUT")).toEqual({ kind: "timed_out", lastError: "ETIMEDOUT" })
  })

  it("unwraps every tag", () => {
    expect(intoInner(maybeRetryable(1))).toBe(1)
    expect(intoInner(fatal(2))).toBe(2)
    expect(intoInner(timedOut(3))).toBe(3)
  })

  it("maps the error and keeps the tag", () => {
    const toCode = (status: number) => `HTTP_${status}`

    expect(mapAttemptError(maybeRetryable(503), toCode)).toEqual(maybeRetryable("HTTP_503"))
    expect(mapAttemptError(fatal(404), toCode)).toEqual(fatal("HTTP_404"))
    expect(mapAttemptError(timedOut(504), toCode)).toEqual(timedOut("HTTP_504"))
  })

  it("re-tags only timed_out errors", () => {
    const transform = vi.fn((lastError: string) => maybeRetryable(lastError))

    expect(onTimeout(timedOut("ETIMEDOUT"), transform)).toEqual(maybeRetryable("ETIMEDOUT"))
    expect(onTimeout(fatal("EACCES"), transform)).toEqual(fatal("EACCES"))
    expect(onTimeout(maybeRetryable("EAGAIN"), transform)).toEqual(maybeRetryable("EAGAIN"))
    expect(transform).toHaveBeenCalledTimes(1)
  })
})
