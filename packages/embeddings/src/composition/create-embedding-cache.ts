import {
  type BytesKeyValueStore,
  type Clock,
  createFsBytesStore,
  createMemoryBytesStore,
  createRedisBytesStore,
  createRedisClient,
  type RedisBytesClient,
  SystemClock,
} from "@embedcache/kv"
import { createPinoLogger, type Logger } from "@embedcache/logger"
import type { EmbeddingCacheConfig } from "../config/schema"
import { CacheBackedEmbeddings } from "../core/embedder/cache-backed-embeddings"
import { DOCUMENT_STORE } from "../core/embedder/cache-backed-embeddings-options"
import type { EmbeddingProvider } from "../ports/embedding-provider"

export type CreateEmbeddingCacheOptions = {
  config: EmbeddingCacheConfig
  provider: EmbeddingProvider

  /** @default a pino logger built from `config.logging` */
  logger?: Logger

  /**
   * Client for the Redis backend. When omitted, one is created from
   * `config.backend`. The caller owns `connect()` / `quit()` of the returned
   * client in both cases.
   */
  redisClient?: RedisBytesClient

  clock?: Clock
}

export type EmbeddingCache = {
  embeddings: CacheBackedEmbeddings
  store: BytesKeyValueStore

  /** Present for the Redis backend only. */
  redisClient?: RedisBytesClient
}

export function createEmbeddingCache(options: CreateEmbeddingCacheOptions): EmbeddingCache {
  const { config, provider } = options
  const clock = options.clock ?? new SystemClock()
  const logger =
    options.logger ??
    createPinoLogger(
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: "embedding-cache" },
    )

  const { store, redisClient } = createStore(config, clock, options.redisClient)
  const { cache } = config

  const embeddings = CacheBackedEmbeddings.fromStore(provider, store, {
    namespace: cache.namespace,
    keyEncoder: cache.keyAlgorithm,
    precision: cache.precision,
    readErrorPolicy: cache.readErrorPolicy,
    logger: logger.child({ store: config.backend.kind }),
    clock,
    ...(cache.queryCache && { queryStore: DOCUMENT_STORE }),
    ...(cache.dimensions !== undefined && { dimensions: cache.dimensions }),
    ...(cache.ttlMs !== undefined && { ttl: cache.ttlMs }),
    ...(cache.batchSize !== undefined && { batchSize: cache.batchSize }),
  })

  return { embeddings, store, ...(redisClient && { redisClient }) }
}

function createStore(
  config: EmbeddingCacheConfig,
  clock: Clock,
  givenClient: RedisBytesClient | undefined,
): { store: BytesKeyValueStore; redisClient?: RedisBytesClient } {
  const { backend } = config

  switch (backend.kind) {
    case "memory":
      return { store: createMemoryBytesStore({ clock }) }

    case "fs":
      return { store: createFsBytesStore({ rootDir: backend.rootDir, clock }) }

    case "redis": {
      const client =
        givenClient ??
        createRedisClient({
          url: backend.url,
          ...(backend.database !== undefined && { database: backend.database }),
        })

      return {
        store: createRedisBytesStore({
          client,
          opts: { keyspacePrefix: backend.keyPrefix, batchSize: backend.batchSize },
        }),
        redisClient: client,
      }
    }
  }
}
