/**
 * A source of raw backoff settings.
 *
 * A source only *loads* values. Validation, coercion and merging happen in
 * `loadBackoffOptions`; sources are applied in order and later ones win.
 */
export interface OptionsSource {
  /**
   * Name recorded as the provenance of every key this source supplies.
   * Example: "env", "dotenv:.env.backoff", "object:overrides"
   */
  readonly name: string

  /**
   * Keys are bare setting names (`MULTIPLIER`, `INITIAL_DELAY_MS`, ...).
   * An `undefined` value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
