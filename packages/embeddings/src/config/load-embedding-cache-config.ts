import { DotenvSource } from "./adapters/dotenv-source"
import { EnvSource } from "./adapters/env-source"
import { ObjectSource } from "./adapters/object-source"
import { loadConfig } from "./core/load-config"
import type { IConfig } from "./ports/config"
import type { ConfigSource } from "./ports/source"
import {
  type BackendConfig,
  type EmbeddingCacheConfig,
  type EnvConfig,
  envSchema,
} from "./schema"

export type LoadEmbeddingCacheConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>

  /** Raw variable values applied after every other source. */
  overrides?: Partial<Record<keyof EnvConfig, unknown>>

  /** @default ".env" */
  envFile?: string

  /** @default process.cwd() */
  cwd?: string
}

function mapBackend(env: EnvConfig): BackendConfig {
  switch (env.EMBED_CACHE_BACKEND) {
    case "memory":
      return { kind: "memory" }
    case "fs":
      return { kind: "fs", rootDir: env.EMBED_CACHE_FS_ROOT }
    case "redis":
      return {
        kind: "redis",
        url: env.REDIS_URL,
        keyPrefix: env.REDIS_KEY_PREFIX,
        batchSize: env.REDIS_BATCH_SIZE,
        ...(env.REDIS_DATABASE !== undefined && { database: env.REDIS_DATABASE }),
      }
  }
}

export function mapEnvToConfig(env: EnvConfig): EmbeddingCacheConfig {
  return {
    cache: {
      namespace: env.EMBED_CACHE_NAMESPACE,
      keyAlgorithm: env.EMBED_CACHE_KEY_ALGORITHM,
      precision: env.EMBED_CACHE_PRECISION,
      readErrorPolicy: env.EMBED_CACHE_READ_ERROR_POLICY,
      queryCache: env.EMBED_CACHE_QUERY_CACHE,
      ...(env.EMBED_CACHE_DIMENSIONS !== undefined && { dimensions: env.EMBED_CACHE_DIMENSIONS }),
      ...(env.EMBED_CACHE_TTL_MS !== undefined && { ttlMs: env.EMBED_CACHE_TTL_MS }),
      ...(env.EMBED_CACHE_BATCH_SIZE !== undefined && { batchSize: env.EMBED_CACHE_BATCH_SIZE }),
    },
    backend: mapBackend(env),
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Loads the raw variables from `.env`, the environment and `overrides`, in
 * that order of precedence (last wins).
 */
export async function loadEnvConfig(
  options: LoadEmbeddingCacheConfigOptions = {},
): Promise<IConfig<EnvConfig>> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: options.envFile ?? ".env", required: false, cwd: options.cwd }),
    new EnvSource({ env: options.env ?? process.env }),
  ]

  if (options.overrides) sources.push(new ObjectSource(options.overrides))

  return loadConfig({ schema: envSchema, sources })
}

export async function loadEmbeddingCacheConfig(
  options: LoadEmbeddingCacheConfigOptions = {},
): Promise<EmbeddingCacheConfig> {
  const { value } = await loadEnvConfig(options)

  return mapEnvToConfig(value)
}
