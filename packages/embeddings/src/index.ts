export {
  type CreateEmbeddingCacheOptions,
  createEmbeddingCache,
  type EmbeddingCache,
} from "./composition/create-embedding-cache"
export { DotenvSource, type DotenvSourceOptions } from "./config/adapters/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./config/adapters/env-source"
export { ObjectSource } from "./config/adapters/object-source"
export { type LoadConfigOptions, loadConfig } from "./config/core/load-config"
export {
  type LoadEmbeddingCacheConfigOptions,
  loadEmbeddingCacheConfig,
  loadEnvConfig,
  mapEnvToConfig,
} from "./config/load-embedding-cache-config"
export type { IConfig } from "./config/ports/config"
export type { ConfigSource } from "./config/ports/source"
export {
  type BackendConfig,
  type CacheBackend,
  cacheBackends,
  type EmbeddingCacheConfig,
  type EnvConfig,
  envSchema,
} from "./config/schema"
export {
  createVectorCodec,
  VectorCodec,
  type VectorCodecOptions,
  type VectorPrecision,
  vectorPrecisions,
} from "./core/codec/vector-codec"
export {
  CacheBackedEmbeddings,
  type CacheBackedEmbeddingsDeps,
  type CacheBackedEmbeddingsSettings,
} from "./core/embedder/cache-backed-embeddings"
export {
  type CacheBackedEmbeddingsOptions,
  DOCUMENT_STORE,
  type ReadErrorPolicy,
  readErrorPolicies,
} from "./core/embedder/cache-backed-embeddings-options"
export {
  createKeyEncoder,
  HashKeyEncoder,
  type KeyAlgorithm,
  type KeyHashFunction,
  keyAlgorithms,
} from "./core/keys/key-encoder"
export {
  ConfigurationError,
  DeserializationError,
  EmbeddingCacheError,
  type EmbeddingCacheErrorCode,
  ProviderError,
  type StoreOperation,
  StoreReadError,
  StoreWriteError,
} from "./errors/embedding-cache-errors"
export type { EmbeddingProvider, EmbeddingVector } from "./ports/embedding-provider"
export type { DecodedKey, KeyEncoder } from "./ports/key-encoder"
