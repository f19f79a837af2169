import { type Clock, SystemClock } from "../../core/time/clock"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import { MemoryBytesKeyValueStore, type MemoryKvStoreOptions } from "./memory-bytes-kv-store"

export type CreateMemoryBytesStoreOptions = MemoryKvStoreOptions & {
  clock?: Clock
}

export function createMemoryBytesStore(
  options: CreateMemoryBytesStoreOptions = {},
): BytesKeyValueStore {
  const { clock = new SystemClock(), ...opts } = options

  return new MemoryBytesKeyValueStore({ clock }, opts)
}
