import type { KvKey } from "./kv-key"

export type KvEntry<T> = readonly [KvKey, T]
