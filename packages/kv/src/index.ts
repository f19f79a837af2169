export { createFsBytesStore, type CreateFsBytesStoreOptions } from "./adapters/fs/create"
export {
  FileSystemBytesKeyValueStore,
  type FsKvStoreDeps,
  type FsKvStoreOptions,
} from "./adapters/fs/fs-bytes-kv-store"
export { createMemoryBytesStore, type CreateMemoryBytesStoreOptions } from "./adapters/memory/create"
export {
  MemoryBytesKeyValueStore,
  type MemoryKvStoreDeps,
  type MemoryKvStoreOptions,
} from "./adapters/memory/memory-bytes-kv-store"
export {
  type CreateRedisBytesStoreOptions,
  createRedisBytesStore,
  createRedisClient,
  type RedisBytesClientOptions,
} from "./adapters/redis/create"
export { RedisBytesKeyValueStore, type RedisKvStoreOptions } from "./adapters/redis/redis-bytes-kv-store"
export type { RedisBytesClient, RedisBytesMulti, RedisTtl } from "./adapters/redis/redis-client"
export { chunks, lastWriteWins, unique } from "./core/keys/unique"
export { type Clock, FakeClock, type Milliseconds, SystemClock } from "./core/time/clock"
export type { BytesKeyValueStore } from "./ports/bytes-kv-store"
export type { Codec } from "./ports/codec"
export type { KvKey } from "./ports/kv-key"
export type { KvSetOptions, KvTtl } from "./ports/kv-options"
export type { KvFound, KvNotFound, KvResult } from "./ports/kv-result"
export type { KeyValueStore } from "./ports/kv-store"
export type { KvEntry } from "./ports/kv-value"
