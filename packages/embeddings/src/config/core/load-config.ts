import { type ZodType, z } from "zod"
import { ConfigurationError } from "../../errors/embedding-cache-errors"
import { EnvSource } from "../adapters/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** @default [new EnvSource()] */
  sources?: readonly ConfigSource[]
}

/**
 * Merges `sources` in order, validates the result against `schema` and
 * records which source supplied each key.
 *
 * @throws {ConfigurationError} with zod's readable report when validation fails.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw ConfigurationError.invalid("configuration", z.prettifyError(result.error), result.error)
  }

  const schemaProvenance = new Map(
    Object.keys(result.data).map((key) => [key, provenance.get(key) ?? "default"] as const),
  )

  return new Config<T>(result.data, schemaProvenance, new Set(Object.keys(merged)))
}
