import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/** Longest delay a single Node.js timer honours; longer ones fire immediately. */
export const MAX_TIMER_MS: Milliseconds = 2 ** 31 - 1

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (!(ms > 0)) return Promise.resolve()

    return this.sleepUntil(this.nowMs() + ms, signal)
  }

  async sleepUntil(at: UnixMs, signal?: AbortSignal): Promise<void> {
    let remaining = at - this.nowMs()

    while (remaining > 0 && !signal?.aborted) {
      await this.timer(Math.min(remaining, MAX_TIMER_MS), signal)
      remaining = at - this.nowMs()
    }
  }

  sleepSync(ms: Milliseconds): void {
    if (!(ms > 0)) return

    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms)
  }

  sleepUntilSync(at: UnixMs): void {
    let remaining = at - this.nowMs()

    while (remaining > 0) {
      this.sleepSync(remaining)
      remaining = at - this.nowMs()
    }
  }

  private timer(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer)
        resolve()
      }

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      }, ms)

      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }
}
