import { BackoffOptions } from "@ebb/backoff"
import { FakeClock } from "@ebb/clock"
import { BaseError } from "@ebb/errors"
import type { Logger } from "@ebb/logger"
import { mock } from "vitest-mock-extended"
import { fatal, maybeRetryable, timedOut } from "../../core/attempt-error"
import { Backoff } from "../../core/backoff"
import { TransientError } from "../../tests/utils/transient-error"
import { logAttemptError } from "../log-attempt-error"

describe("logAttemptError", () => {
  it("logs the tag and the serialized error at warn", () => {
    const logger = mock<Logger>()

    logAttemptError<TransientError>(logger)(maybeRetryable(new TransientError("ECONNRESET")))

    expect(logger.warn).toHaveBeenCalledWith("attempt failed", {
      kind: "maybe_retryable",
      err: expect.objectContaining({
        name: "TransientError",
        code: "unknown",
        message: "ECONNRESET",
        isRetryable: true,
      }),
    })
  })

  it("honours message and level", () => {
    const logger = mock<Logger>()
    const observe = logAttemptError<BaseError>(logger, {
      message: "sync gave up",
      level: "error",
    })

    observe(fatal(new BaseError("quota exhausted", { code: "quota_exhausted" })))

    expect(logger.warn).not.toHaveBeenCalled()
    expect(logger.error).toHaveBeenCalledWith("sync gave up", {
      kind: "fatal",
      err: expect.objectContaining({ code: "quota_exhausted", message: "quota exhausted" }),
    })
  })

  it("logs thrown non-errors", () => {
    const logger = mock<Logger>()

    logAttemptError<string>(logger, { level: "debug" })(timedOut("EPIPE"))

    expect(logger.debug).toHaveBeenCalledWith("attempt failed", {
      kind: "timed_out",
      err: expect.objectContaining({ name: "NonErrorThrown", message: "EPIPE" }),
    })
  })

  it("includes the stack when asked", () => {
    const logger = mock<Logger>()

    logAttemptError<Error>(logger, { includeStack: true })(maybeRetryable(new Error("EAGAIN")))

    expect(logger.warn).toHaveBeenCalledWith("attempt failed", {
      kind: "maybe_retryable",
      err: expect.objectContaining({ stack: expect.stringContaining("EAGAIN") }),
    })
  })

  it("plugs into inspect", async () => {
    const logger = mock<Logger>()
    const backoff = Backoff.startUnlimited<TransientError>(BackoffOptions.DEFAULT, {
      clock: new FakeClock(0),
    })

    const decision = (await backoff.tryAsync(Promise.reject(new TransientError("EAGAIN"))))
      .inspect(logAttemptError(logger))
      .orRetry()

    expect(decision).toEqual({ kind: "retry" })
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })
})
