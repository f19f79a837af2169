import {
  type BytesKeyValueStore,
  type Clock,
  chunks,
  type KvEntry,
  type KvKey,
  type KvResult,
  type KvSetOptions,
  SystemClock,
  unique,
} from "@embedcache/kv"
import { type Logger, NullLogger } from "@embedcache/logger"
import {
  DeserializationError,
  ProviderError,
  StoreReadError,
  StoreWriteError,
} from "../../errors/embedding-cache-errors"
import type { EmbeddingProvider, EmbeddingVector } from "../../ports/embedding-provider"
import type { KeyEncoder } from "../../ports/key-encoder"
import { VectorCodec } from "../codec/vector-codec"
import { HashKeyEncoder } from "../keys/key-encoder"
import {
  type CacheBackedEmbeddingsOptions,
  DOCUMENT_STORE,
  parseCacheBackedEmbeddingsOptions,
  type ReadErrorPolicy,
} from "./cache-backed-embeddings-options"

type Compute = (texts: readonly string[]) => Promise<readonly EmbeddingVector[]>

/** A store together with the encoder of the keys it holds for this cache. */
type Partition = {
  store: BytesKeyValueStore
  keyEncoder: KeyEncoder
}

type LookupStats = {
  requested: number
  distinct: number
  hits: number
  misses: number
}

export type CacheBackedEmbeddingsDeps = {
  provider: EmbeddingProvider
  documents: Partition
  /** Absent when queries are not cached. */
  queries?: Partition
  codec: VectorCodec
  logger: Logger
  clock: Clock
}

export type CacheBackedEmbeddingsSettings = {
  dimensions?: number
  ttl?: number
  batchSize?: number
  readErrorPolicy: ReadErrorPolicy
}

/**
 * Embedding provider decorator that stores every computed vector under a
 * content-derived key and serves repeats from the store.
 *
 * @remarks
 * - Texts are deduplicated per call; the provider sees each distinct miss
 *   once, in first-seen order.
 * - Nothing is written for a batch whose computation fails.
 * - Fresh vectors are returned in their stored representation, so a value
 *   read back later is identical to the one returned now.
 * - No lock spans the provider call: two concurrent calls missing the same
 *   text both compute it, and the last write wins.
 * - Query embeddings never share keys with document embeddings. When the
 *   document store is reused for queries, they live under the
 *   `<namespace>:query` namespace.
 */
export class CacheBackedEmbeddings implements EmbeddingProvider {
  private readonly logger: Logger
  private readonly writeOptions: Partial<KvSetOptions>

  constructor(
    private readonly deps: CacheBackedEmbeddingsDeps,
    private readonly settings: CacheBackedEmbeddingsSettings,
  ) {
    this.logger = deps.logger.child({
      module: "cache-backed-embeddings",
      namespace: deps.documents.keyEncoder.namespace,
    })
    this.writeOptions =
      settings.ttl === undefined
        ? {}
        : { ttl: { kind: "milliseconds", milliseconds: settings.ttl } }
  }

  /**
   * Wraps `provider` with a cache persisted in `store`.
   *
   * @throws {ConfigurationError} if `provider`, `store` or `options` fail
   * validation.
   */
  static fromStore(
    provider: EmbeddingProvider,
    store: BytesKeyValueStore,
    options: CacheBackedEmbeddingsOptions = {},
  ): CacheBackedEmbeddings {
    const args = parseCacheBackedEmbeddingsOptions(provider, store, options)
    const opts = args.options
    const documents = {
      store: args.store,
      keyEncoder: new HashKeyEncoder(opts.namespace, opts.keyEncoder),
    }
    const queryStore = opts.queryStore === DOCUMENT_STORE ? args.store : opts.queryStore
    const queryKeyEncoder =
      queryStore === args.store
        ? new HashKeyEncoder(`${opts.namespace}:query`, opts.keyEncoder)
        : documents.keyEncoder

    return new CacheBackedEmbeddings(
      {
        provider: args.provider,
        documents,
        ...(queryStore !== undefined && {
          queries: { store: queryStore, keyEncoder: queryKeyEncoder },
        }),
        codec: new VectorCodec({
          precision: opts.precision,
          ...(opts.dimensions !== undefined && { dimensions: opts.dimensions }),
        }),
        logger: opts.logger ?? new NullLogger(),
        clock: opts.clock ?? new SystemClock(),
      },
      {
        readErrorPolicy: opts.readErrorPolicy,
        ...(opts.dimensions !== undefined && { dimensions: opts.dimensions }),
        ...(opts.ttl !== undefined && { ttl: opts.ttl }),
        ...(opts.batchSize !== undefined && { batchSize: opts.batchSize }),
      },
    )
  }

  get namespace(): string {
    return this.deps.documents.keyEncoder.namespace
  }

  async embedDocuments(texts: readonly string[]): Promise<EmbeddingVector[]> {
    return this.embedThroughStore("embedDocuments", this.deps.documents, texts, (missed) =>
      this.deps.provider.embedDocuments(missed),
    )
  }

  /**
   * Embeds a single query. Uncached unless a query store was configured.
   */
  async embedQuery(text: string): Promise<EmbeddingVector> {
    const { provider, queries } = this.deps
    if (!queries) return provider.embedQuery(text)

    const [vector] = await this.embedThroughStore("embedQuery", queries, [text], async () => [
      await provider.embedQuery(text),
    ])

    if (vector === undefined) {
      throw ProviderError.resultCountMismatch({
        namespace: this.namespace,
        expected: 1,
        received: 0,
      })
    }

    return vector
  }

  /**
   * Keys of this namespace in the document store, produced lazily.
   */
  async *keys(): AsyncGenerator<KvKey> {
    yield* this.namespaceKeys(this.deps.documents)
  }

  /**
   * Deletes every document and query entry of this cache. Other namespaces
   * sharing the stores are untouched.
   *
   * @returns Number of keys removed.
   */
  async clear(): Promise<number> {
    const { documents, queries } = this.deps

    let removed = await this.clearPartition(documents)
    if (queries) removed += await this.clearPartition(queries)

    this.logger.info("Cleared namespace", { operation: "clear", removed })

    return removed
  }

  private async embedThroughStore(
    operation: string,
    { store, keyEncoder }: Partition,
    texts: readonly string[],
    compute: Compute,
  ): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return []

    const startedAt = this.deps.clock.nowMs()
    const distinct = unique(texts)
    const keyByText = new Map<string, KvKey>(
      distinct.map((text) => [text, keyEncoder.encode(text)]),
    )

    const cached = await this.readEntries(store, [...keyByText.values()])
    const vectors = new Map<string, EmbeddingVector>()
    const missed: string[] = []

    for (const [text, key] of keyByText) {
      const entry = cached.get(key)

      if (entry?.kind === "found") vectors.set(text, this.decodeEntry(key, entry.value))
      else missed.push(text)
    }

    const { batchSize } = this.settings
    const batches = batchSize ? chunks(missed, batchSize) : [missed]

    for (const batch of batches) {
      if (batch.length === 0) continue

      const computed = this.normalize(await compute(batch), batch.length)
      const entries: KvEntry<Uint8Array>[] = []

      for (const [i, text] of batch.entries()) {
        const vector = computed[i]
        const key = keyByText.get(text)
        if (vector === undefined || key === undefined) continue

        vectors.set(text, vector)
        entries.push([key, this.deps.codec.encode(vector)])
      }

      await this.writeEntries(store, entries)
    }

    this.logStats(operation, startedAt, {
      requested: texts.length,
      distinct: distinct.length,
      hits: distinct.length - missed.length,
      misses: missed.length,
    })

    return texts.map((text) => {
      const vector = vectors.get(text)
      if (vector === undefined) {
        throw ProviderError.resultCountMismatch({
          namespace: this.namespace,
          expected: distinct.length,
          received: vectors.size,
        })
      }
      return vector
    })
  }

  /**
   * Validates provider output and converts it to the stored representation.
   */
  private normalize(vectors: readonly EmbeddingVector[], expected: number): EmbeddingVector[] {
    if (!Array.isArray(vectors) || vectors.length !== expected) {
      throw ProviderError.resultCountMismatch({
        namespace: this.namespace,
        expected,
        received: Array.isArray(vectors) ? vectors.length : 0,
      })
    }

    const { codec } = this.deps
    const { dimensions } = this.settings

    return vectors.map((vector, index) => {
      const invalid = (reason: "empty" | "non_finite" | "dimension_mismatch") =>
        ProviderError.invalidVector({
          namespace: this.namespace,
          index,
          reason,
          dimensions: vector.length,
          ...(dimensions !== undefined && { expectedDimensions: dimensions }),
        })

      if (vector.length === 0) throw invalid("empty")
      if (dimensions !== undefined && vector.length !== dimensions) {
        throw invalid("dimension_mismatch")
      }
      if (codec.findInvalidElement(vector) !== -1) throw invalid("non_finite")

      return codec.decode(codec.encode(vector))
    })
  }

  private async readEntries(
    store: BytesKeyValueStore,
    keys: readonly KvKey[],
  ): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    try {
      return await store.getMany(keys)
    } catch (err) {
      if (this.settings.readErrorPolicy === "miss") {
        this.logger.warn("Cache read failed, computing the batch without the cache", {
          err,
          operation: "getMany",
          requested: keys.length,
        })
        return new Map()
      }

      throw StoreReadError.wrap({
        namespace: this.namespace,
        operation: "getMany",
        keyCount: keys.length,
        cause: err,
      })
    }
  }

  private async writeEntries(
    store: BytesKeyValueStore,
    entries: readonly KvEntry<Uint8Array>[],
  ): Promise<void> {
    try {
      await store.setMany(entries, this.writeOptions)
    } catch (err) {
      throw StoreWriteError.wrap({
        namespace: this.namespace,
        operation: "setMany",
        keyCount: entries.length,
        cause: err,
      })
    }
  }

  private decodeEntry(key: KvKey, bytes: Uint8Array): EmbeddingVector {
    try {
      return this.deps.codec.decode(bytes)
    } catch (err) {
      if (err instanceof DeserializationError) throw DeserializationError.forEntry(key, err)
      throw err
    }
  }

  private async *namespaceKeys({ store, keyEncoder }: Partition): AsyncGenerator<KvKey> {
    const iterator = store.keys(keyEncoder.keyPrefix())[Symbol.asyncIterator]()

    while (true) {
      let next: IteratorResult<KvKey>

      try {
        next = await iterator.next()
      } catch (err) {
        throw StoreReadError.wrap({ namespace: this.namespace, operation: "keys", cause: err })
      }

      if (next.done) return
      if (keyEncoder.decode(next.value) !== undefined) yield next.value
    }
  }

  private async clearPartition(partition: Partition): Promise<number> {
    // Collected before deleting: SCAN-style enumerations may skip or repeat
    // keys while the keyspace changes underneath them.
    const keys: KvKey[] = []
    for await (const key of this.namespaceKeys(partition)) keys.push(key)

    if (keys.length === 0) return 0

    try {
      await partition.store.deleteMany(keys)
    } catch (err) {
      throw StoreWriteError.wrap({
        namespace: this.namespace,
        operation: "deleteMany",
        keyCount: keys.length,
        cause: err,
      })
    }

    return keys.length
  }

  private logStats(operation: string, startedAt: number, stats: LookupStats): void {
    this.logger.debug("Embedded batch", {
      operation,
      ...stats,
      durationMs: this.deps.clock.nowMs() - startedAt,
    })
  }
}
