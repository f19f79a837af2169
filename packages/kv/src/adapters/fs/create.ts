import { type Clock, SystemClock } from "../../core/time/clock"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import { FileSystemBytesKeyValueStore, type FsKvStoreOptions } from "./fs-bytes-kv-store"

export type CreateFsBytesStoreOptions = FsKvStoreOptions & {
  clock?: Clock
}

export function createFsBytesStore(options: CreateFsBytesStoreOptions): BytesKeyValueStore {
  const { clock = new SystemClock(), ...opts } = options

  return new FileSystemBytesKeyValueStore({ clock }, opts)
}
