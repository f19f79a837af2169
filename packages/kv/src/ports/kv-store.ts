import type { KvKey } from "./kv-key"
import type { KvSetOptions } from "./kv-options"
import type { KvResult } from "./kv-result"
import type { KvEntry } from "./kv-value"

/**
 * Key-value storage with batch access and key enumeration.
 *
 * @remarks
 * - A present key always holds a complete value; adapters never expose a
 *   half-written entry.
 * - Writes to the same key are last-write-wins.
 * - I/O and connection failures are thrown, so callers can tell them apart
 *   from a missing key.
 */
export interface KeyValueStore<T> {
  /**
   * Retrieve a value by key.
   */
  get(key: KvKey): Promise<KvResult<T>>

  /**
   * Store a value, overwriting any existing one.
   */
  set(key: KvKey, value: T, opts?: Partial<KvSetOptions>): Promise<void>

  /**
   * Delete a value. Deleting a missing key is a no-op.
   */
  delete(key: KvKey): Promise<void>

  /**
   * Check whether a live entry exists.
   */
  has(key: KvKey): Promise<boolean>

  /**
   * Retrieve multiple values.
   *
   * @remarks
   * - One result per distinct key; a missing key yields `not_found` and never
   *   fails the call.
   * - Implementations should batch where possible.
   */
  getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>>

  /**
   * Store multiple values.
   *
   * @remarks
   * - Each entry is written atomically; the batch as a whole is not.
   * - Duplicate keys resolve to the last entry.
   * - All entries share the same write options.
   */
  setMany(entries: readonly KvEntry<T>[], opts?: Partial<KvSetOptions>): Promise<void>

  /**
   * Delete multiple values. Missing keys are skipped.
   */
  deleteMany(keys: readonly KvKey[]): Promise<void>

  /**
   * Enumerate live keys, optionally only those starting with `prefix`.
   *
   * @remarks
   * - Lazy: keys are produced while iterating, not collected up front.
   * - Every call starts a fresh pass over the store's current contents.
   * - Order is adapter-defined.
   */
  keys(prefix?: string): AsyncIterable<KvKey>
}
