import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import { RedisBytesKeyValueStore, type RedisKvStoreOptions } from "./redis-bytes-kv-store"
import type { RedisBytesClient } from "./redis-client"

export type RedisBytesClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * Creates a node-redis client that returns blob replies as `Buffer`s.
 *
 * @remarks
 * Caller owns `client.connect()` / `client.quit()`.
 */
export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  return createClient({ ...options, url: options.url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}

export type CreateRedisBytesStoreOptions = {
  client: RedisBytesClient
  opts: RedisKvStoreOptions
}

export function createRedisBytesStore(options: CreateRedisBytesStoreOptions): BytesKeyValueStore {
  return new RedisBytesKeyValueStore(options.client, options.opts)
}
