/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ REDIS_URL: z.string().default("redis://localhost:6379") }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.REDIS_URL      // "redis://cache:6379"
 * config.explain("REDIS_URL") // "dotenv:.env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that supplied the final value for `key`, or
   * `"default"` when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that supplied at least one value, in application order. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not define. */
  unknownKeys(): string[]
}
