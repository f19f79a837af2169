import { assertChunkSize, chunks, lastWriteWins, unique } from "../../core/keys/unique"
import type { BytesKeyValueStore } from "../../ports/bytes-kv-store"
import type { KvKey } from "../../ports/kv-key"
import type { KvSetOptions, KvTtl } from "../../ports/kv-options"
import type { KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"
import type { RedisBytesClient, RedisTtl } from "./redis-client"

export type RedisKvStoreOptions = {
  /**
   * Maximum number of keys processed in a single Redis operation when using
   * bulk methods (`getMany`, `setMany`, `deleteMany`). Also used as the
   * SCAN `COUNT` hint for `keys()`.
   *
   * Typical values are in the range of 500–2000.
   */
  batchSize: number

  /**
   * Prepended to every key before it reaches Redis and stripped again by
   * `keys()`. Lets several stores share one database.
   */
  keyspacePrefix: string
}

const GLOB_SPECIAL = /[*?[\]\\]/g

export class RedisBytesKeyValueStore implements BytesKeyValueStore {
  public constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisKvStoreOptions,
  ) {
    assertChunkSize(opts.batchSize)
  }

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    const buffer = await this.client.get(this.fullKey(key))

    return this.createKvResult(buffer)
  }

  async set(key: KvKey, value: Uint8Array, opts?: Partial<KvSetOptions>): Promise<void> {
    await this.client.set(this.fullKey(key), this.toBuffer(value), this.toRedisTtl(opts?.ttl))
  }

  async delete(key: KvKey): Promise<void> {
    await this.client.del(this.fullKey(key))
  }

  async has(key: KvKey): Promise<boolean> {
    const exists = await this.client.exists(this.fullKey(key))

    return exists === 1
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const batch of chunks(unique(keys), this.opts.batchSize)) {
      const buffers = await this.client.mGet(batch.map((k) => this.fullKey(k)))

      for (const [i, key] of batch.entries()) {
        out.set(key, this.createKvResult(buffers[i] ?? null))
      }
    }

    return out
  }

  async setMany(
    entries: readonly KvEntry<Uint8Array>[],
    opts?: Partial<KvSetOptions>,
  ): Promise<void> {
    const ttl = this.toRedisTtl(opts?.ttl)

    for (const batch of chunks(lastWriteWins(entries), this.opts.batchSize)) {
      const tx = this.client.multi()

      for (const [key, value] of batch) {
        tx.set(this.fullKey(key), this.toBuffer(value), ttl)
      }

      await tx.exec()
    }
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    for (const batch of chunks(unique(keys), this.opts.batchSize)) {
      await this.client.del(batch.map((k) => this.fullKey(k)))
    }
  }

  /**
   * Walks the keyspace with SCAN. Keys written while the walk is in progress
   * may or may not be reported; each key is reported at most once per call.
   */
  async *keys(prefix = ""): AsyncGenerator<KvKey> {
    const match = `${this.escapeGlob(this.fullKey(prefix))}*`
    const seen = new Set<string>()
    let cursor = "0"

    do {
      const reply = await this.client.scan(cursor, { MATCH: match, COUNT: this.opts.batchSize })
      cursor = reply.cursor.toString()

      for (const raw of reply.keys) {
        const key = raw.toString().slice(this.opts.keyspacePrefix.length)
        if (seen.has(key)) continue

        seen.add(key)
        yield key
      }
    } while (cursor !== "0")
  }

  private toRedisTtl(ttl: KvTtl | undefined): RedisTtl {
    return ttl ? { PX: ttl.milliseconds } : { KEEPTTL: true }
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private createKvResult(buffer: Buffer | null): KvResult<Uint8Array> {
    if (buffer === null) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(buffer) }
  }

  private escapeGlob(pattern: string): string {
    return pattern.replace(GLOB_SPECIAL, (c) => `\\${c}`)
  }

  private fullKey(k: KvKey): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}
