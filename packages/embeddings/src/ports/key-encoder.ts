import type { KvKey } from "@embedcache/kv"

export type DecodedKey = {
  namespace: string
  digest: string
}

/**
 * Maps text to the store key its embedding lives under.
 *
 * @remarks
 * Keys are `namespace:digest`, or the bare digest for the empty namespace.
 * The raw text never appears in a key.
 */
export interface KeyEncoder {
  readonly namespace: string

  encode(text: string): KvKey

  /**
   * Splits a key produced by this encoder. Returns `undefined` for keys of
   * another namespace or with a digest this encoder could not have produced.
   */
  decode(key: KvKey): DecodedKey | undefined

  /** Prefix shared by every key of the namespace. */
  keyPrefix(): string
}
