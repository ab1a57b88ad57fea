/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen in `loadConfig`.
 * They are applied in order, later sources overriding earlier ones.
 */
export interface ConfigSource {
  /**
   * Name used for provenance, e.g. "env" or "dotenv:.env".
   */
  readonly name: string

  /**
   * Load a flat record of values. `undefined` means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
