import type { BytesKeyValueStore, Clock } from "@embedcache/kv"
import type { Logger } from "@embedcache/logger"
import { z } from "zod"
import { ConfigurationError } from "../../errors/embedding-cache-errors"
import type { EmbeddingProvider } from "../../ports/embedding-provider"
import { vectorPrecisions } from "../codec/vector-codec"
import { keyAlgorithms, type KeyHashFunction } from "../keys/key-encoder"

export const readErrorPolicies = ["throw", "miss"] as const

export type ReadErrorPolicy = (typeof readErrorPolicies)[number]

/** Reuse the document store for query embeddings. */
export const DOCUMENT_STORE = "document-store"

const isObjectWith = (value: unknown, methods: readonly string[]): boolean =>
  typeof value === "object" &&
  value !== null &&
  methods.every((m) => typeof Reflect.get(value, m) === "function")

const storeSchema = z.custom<BytesKeyValueStore>(
  (v) => isObjectWith(v, ["get", "getMany", "setMany", "deleteMany", "keys"]),
  "expected a BytesKeyValueStore",
)

const providerSchema = z.custom<EmbeddingProvider>(
  (v) => isObjectWith(v, ["embedDocuments", "embedQuery"]),
  "expected an EmbeddingProvider",
)

const positiveInt = z.number().int().positive()

export const cacheBackedEmbeddingsOptionsSchema = z.object({
  namespace: z.string().default(""),
  queryStore: z.union([z.literal(DOCUMENT_STORE), storeSchema]).optional(),
  keyEncoder: z
    .union([
      z.enum(keyAlgorithms),
      z.custom<KeyHashFunction>((v) => typeof v === "function", "expected a hash function"),
    ])
    .default("sha256"),
  precision: z.enum(vectorPrecisions).default("float64"),
  dimensions: positiveInt.optional(),
  ttl: positiveInt.optional(),
  batchSize: positiveInt.optional(),
  readErrorPolicy: z.enum(readErrorPolicies).default("throw"),
  logger: z
    .custom<Logger>((v) => isObjectWith(v, ["debug", "info", "warn", "child"]), "expected a Logger")
    .optional(),
  clock: z.custom<Clock>((v) => isObjectWith(v, ["nowMs"]), "expected a Clock").optional(),
})

export type CacheBackedEmbeddingsOptions = z.input<typeof cacheBackedEmbeddingsOptionsSchema>

const fromStoreArgsSchema = z.object({
  provider: providerSchema,
  store: storeSchema,
  options: cacheBackedEmbeddingsOptionsSchema,
})

export type ResolvedFromStoreArgs = z.output<typeof fromStoreArgsSchema>

/**
 * Validates everything `fromStore` receives, so a bad provider, store or
 * option fails at construction rather than on the first call.
 *
 * @throws {ConfigurationError}
 */
export function parseCacheBackedEmbeddingsOptions(
  provider: EmbeddingProvider,
  store: BytesKeyValueStore,
  options: CacheBackedEmbeddingsOptions,
): ResolvedFromStoreArgs {
  const result = fromStoreArgsSchema.safeParse({ provider, store, options })

  if (!result.success) {
    throw ConfigurationError.invalid(
      "cache-backed embeddings options",
      z.prettifyError(result.error),
      result.error,
    )
  }

  return result.data
}
