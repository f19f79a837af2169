import { lastWriteWins, unique } from "../../core/keys/unique"
import type { Clock, Milliseconds } from "../../core/time/clock"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions, KvTtl } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"

export type MemoryKvStoreOptions = {
  /**
   * Maximum number of entries retained in the store.
   *
   * If set and the limit is reached, writes of new keys throw.
   */
  maxEntries?: number
}

export type MemoryKvStoreDeps = {
  clock: Clock
}

type MemoryKvStoreEntry = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

/**
 * Process-local store. Contents are lost on exit, so it suits tests and
 * short-lived jobs rather than a cache that should survive restarts.
 */
export class MemoryBytesKeyValueStore implements BytesKeyValueStore {
  private readonly store = new Map<KvKey, MemoryKvStoreEntry>()

  public constructor(
    private readonly deps: MemoryKvStoreDeps,
    private readonly opts: MemoryKvStoreOptions = {},
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    const entry = this.getLiveEntry(key)
    if (!entry) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(entry.value) }
  }

  async set(key: KvKey, value: Uint8Array, opts?: Partial<KvSetOptions>): Promise<void> {
    this.enforceMaxEntries(key)

    const existing = this.getLiveEntry(key)
    const expiresAtMs = opts?.ttl ? this.computeExpiresAt(opts.ttl) : existing?.expiresAtMs

    this.store.set(key, {
      value: new Uint8Array(value),
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })
  }

  async delete(key: KvKey): Promise<void> {
    this.store.delete(key)
  }

  async has(key: KvKey): Promise<boolean> {
    return this.getLiveEntry(key) !== undefined
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const key of unique(keys)) {
      out.set(key, await this.get(key))
    }

    return out
  }

  async setMany(
    entries: readonly KvEntry<Uint8Array>[],
    opts?: Partial<KvSetOptions>,
  ): Promise<void> {
    for (const [key, value] of lastWriteWins(entries)) {
      await this.set(key, value, opts)
    }
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    for (const key of keys) {
      this.store.delete(key)
    }
  }

  async *keys(prefix = ""): AsyncGenerator<KvKey> {
    for (const key of [...this.store.keys()]) {
      if (!key.startsWith(prefix)) continue
      if (this.getLiveEntry(key)) yield key
    }
  }

  private getLiveEntry(key: KvKey): MemoryKvStoreEntry | undefined {
    const entry = this.store.get(key)
    if (!entry) return undefined

    if (this.isExpired(entry)) {
      this.store.delete(key)
      return undefined
    }

    return entry
  }

  private enforceMaxEntries(key: KvKey): void {
    if (this.opts.maxEntries === undefined) return
    if (this.store.has(key)) return

    this.purgeExpired()

    if (this.store.size >= this.opts.maxEntries) {
      throw new Error(
        `MemoryBytesKeyValueStore: max entries (${this.opts.maxEntries}) exceeded`,
      )
    }
  }

  private purgeExpired(): void {
    for (const [key, entry] of this.store) {
      if (this.isExpired(entry)) this.store.delete(key)
    }
  }

  private isExpired(entry: MemoryKvStoreEntry): boolean {
    if (entry.expiresAtMs === undefined) return false

    return this.deps.clock.nowMs() >= entry.expiresAtMs
  }

  private computeExpiresAt(ttl: KvTtl): Milliseconds {
    return this.deps.clock.nowMs() + ttl.milliseconds
  }
}
