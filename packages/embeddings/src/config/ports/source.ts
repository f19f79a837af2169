/**
 * Where raw configuration values come from. Sources only load; validation,
 * coercion and merging happen in `loadConfig`.
 *
 * Sources are applied in order and later sources win. A key whose value is
 * `undefined` counts as not provided.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. `"env"` or `"dotenv:.env"`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
