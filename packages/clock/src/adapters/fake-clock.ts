import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Deterministic clock for tests.
 *
 * Sleeps never wait: they jump the clock forward to the target instant and
 * record how far it moved in {@link FakeClock.sleeps}.
 */
export class FakeClock implements Clock {
  private time: UnixMs

  /** Length of every sleep taken so far, oldest first. */
  readonly sleeps: Milliseconds[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.sleepSync(ms)
  }

  async sleepUntil(at: UnixMs, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.sleepUntilSync(at)
  }

  sleepSync(ms: Milliseconds): void {
    this.sleepUntilSync(this.time + ms)
  }

  sleepUntilSync(at: UnixMs): void {
    if (!(at > this.time)) return

    this.sleeps.push(at - this.time)
    this.time = at
  }
}
