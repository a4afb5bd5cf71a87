export { DotenvOptionsSource, type DotenvOptionsSourceOptions } from "./adapters/dotenv/dotenv-options-source"
export { EnvOptionsSource, type EnvOptionsSourceOptions } from "./adapters/env/env-options-source"
export { ObjectOptionsSource } from "./adapters/object/object-options-source"
export { replayRandom, systemRandom } from "./adapters/random"
export { BackoffError, type BackoffErrorCode } from "./core/backoff-error"
export {
  LoadedBackoffOptions,
  type LoadBackoffOptionsParams,
  loadBackoffOptions,
} from "./core/config/load-options"
export {
  type BackoffOptionKey,
  type BackoffOptionsInput,
  backoffOptionKeys,
  backoffOptionsSchema,
} from "./core/config/options-schema"
export { MAX_DURATION, saturatingAdd, saturatingScale } from "./core/duration"
export { applyJitter, resolveJitterFactor } from "./core/jitter"
export { BackoffOptions, type BackoffOptionsValues } from "./core/options"
export {
  BackoffSchedule,
  type DeadlineExceeded,
  type ScheduleResult,
} from "./core/schedule"
export type { OptionsSource } from "./ports/options-source"
export type { RandomSource } from "./ports/random-source"
