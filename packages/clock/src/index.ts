export { FakeClock } from "./adapters/fake-clock"
export { MAX_TIMER_MS, SystemClock } from "./adapters/system-clock"
export type { BlockingSleeper, Clock, Sleeper, TimeSource } from "./ports/clock"
export type * from "./ports/time"
