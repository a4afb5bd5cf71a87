import { BackoffError } from "../backoff-error"
import { BackoffOptions } from "../options"
import { BackoffSchedule } from "../schedule"

describe("BackoffOptions", () => {
  it("has the documented defaults", () => {
    expect(BackoffOptions.DEFAULT.toJSON()).toEqual({
      multiplier: 2,
      jitter: 0.25,
      initialJitter: 0,
      initialDelay: 150,
      maxDelay: 60_000,
    })
  })

  it("returns what each setter stored", () => {
    const options = BackoffOptions.DEFAULT.multiplier(3)
      .jitter(0.1)
      .initialJitter(0.5)
      .initialDelay(1_000)
      .maxDelay(30_000)

    expect(options.getMultiplier()).toBe(3)
    expect(options.getJitter()).toBe(0.1)
    expect(options.getInitialJitter()).toBe(0.5)
    expect(options.getInitialDelay()).toBe(1_000)
    expect(options.getMaxDelay()).toBe(30_000)
  })

  it("keeps out-of-range fractions as given", () => {
    const options = BackoffOptions.DEFAULT.jitter(4).initialJitter(-1).multiplier(0.5)

    expect(options.getJitter()).toBe(4)
    expect(options.getInitialJitter()).toBe(-1)
    expect(options.getMultiplier()).toBe(0.5)
  })

  it("leaves the receiver untouched", () => {
    const base = BackoffOptions.DEFAULT
    const changed = base.initialDelay(500)

    expect(changed).not.toBe(base)
    expect(base.getInitialDelay()).toBe(150)
  })

  it("is frozen", () => {
    expect(Object.isFrozen(BackoffOptions.DEFAULT)).toBe(true)
    expect(Object.isFrozen(BackoffOptions.DEFAULT.toJSON())).toBe(true)
  })

  it("accepts an unbounded maxDelay", () => {
    expect(BackoffOptions.DEFAULT.maxDelay(Number.POSITIVE_INFINITY).getMaxDelay()).toBe(
      Number.POSITIVE_INFINITY,
    )
  })

  it.each([-1, Number.NaN])("rejects %s as a duration", (value) => {
    expect(() => BackoffOptions.DEFAULT.initialDelay(value)).toThrow(BackoffError)
    expect(() => BackoffOptions.DEFAULT.maxDelay(value)).toThrow(
      expect.objectContaining({ code: "invalid_option", context: { option: "maxDelay", value } }),
    )
  })

  it("compares by value", () => {
    const a = BackoffOptions.DEFAULT.jitter(0).initialDelay(1_000)
    const b = BackoffOptions.DEFAULT.initialDelay(1_000).jitter(0)

    expect(a.equals(b)).toBe(true)
    expect(a.equals(BackoffOptions.DEFAULT)).toBe(false)
    expect(BackoffOptions.DEFAULT.multiplier(Number.NaN).equals(
      BackoffOptions.DEFAULT.multiplier(Number.NaN),
    )).toBe(true)
  })

  it("builds a schedule over itself", () => {
    const options = BackoffOptions.DEFAULT.jitter(0)
    const schedule = options.toSchedule()

    expect(schedule).toBeInstanceOf(BackoffSchedule)
    expect(schedule.options).toBe(options)
  })
})
