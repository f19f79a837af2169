import { type LogLevelName, logLevelNames } from "@embedcache/logger"
import { z } from "zod"
import { type VectorPrecision, vectorPrecisions } from "../core/codec/vector-codec"
import {
  type ReadErrorPolicy,
  readErrorPolicies,
} from "../core/embedder/cache-backed-embeddings-options"
import { type KeyAlgorithm, keyAlgorithms } from "../core/keys/key-encoder"

export const cacheBackends = ["memory", "fs", "redis"] as const

export type CacheBackend = (typeof cacheBackends)[number]

const positiveInt = z.coerce.number().int().positive()

export const envSchema = z.object({
  EMBED_CACHE_NAMESPACE: z.string().default(""),
  EMBED_CACHE_BACKEND: z.enum(cacheBackends).default("memory"),
  EMBED_CACHE_FS_ROOT: z.string().min(1).default(".embedding-cache"),
  EMBED_CACHE_KEY_ALGORITHM: z.enum(keyAlgorithms).default("sha256"),
  EMBED_CACHE_PRECISION: z.enum(vectorPrecisions).default("float64"),
  EMBED_CACHE_DIMENSIONS: positiveInt.optional(),
  EMBED_CACHE_TTL_MS: positiveInt.optional(),
  EMBED_CACHE_BATCH_SIZE: positiveInt.optional(),
  EMBED_CACHE_READ_ERROR_POLICY: z.enum(readErrorPolicies).default("throw"),
  EMBED_CACHE_QUERY_CACHE: z.stringbool().default(false),

  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_DATABASE: z.coerce.number().int().nonnegative().optional(),
  REDIS_KEY_PREFIX: z.string().default("embedcache:"),
  REDIS_BATCH_SIZE: positiveInt.default(500),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type BackendConfig =
  | { kind: "memory" }
  | { kind: "fs"; rootDir: string }
  | {
      kind: "redis"
      url: string
      database?: number
      keyPrefix: string
      batchSize: number
    }

export type EmbeddingCacheConfig = {
  cache: {
    namespace: string
    keyAlgorithm: KeyAlgorithm
    precision: VectorPrecision
    dimensions?: number
    ttlMs?: number
    batchSize?: number
    readErrorPolicy: ReadErrorPolicy
    /** Cache `embedQuery` results in the document store. */
    queryCache: boolean
  }
  backend: BackendConfig
  logging: {
    level: LogLevelName
    prettify: boolean
  }
}
