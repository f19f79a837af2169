import { createHash } from "node:crypto"
import type { KvKey } from "@embedcache/kv"
import { ConfigurationError } from "../../errors/embedding-cache-errors"
import type { DecodedKey, KeyEncoder } from "../../ports/key-encoder"

export const keyAlgorithms = ["sha1", "sha256", "sha512", "blake2b512"] as const

export type KeyAlgorithm = (typeof keyAlgorithms)[number]

/** Caller-supplied digest function. Must be deterministic across processes. */
export type KeyHashFunction = (text: string) => string

const SEPARATOR = ":"

const HEX_LENGTH: Record<KeyAlgorithm, number> = {
  sha1: 40,
  sha256: 64,
  sha512: 128,
  blake2b512: 128,
}

export class HashKeyEncoder implements KeyEncoder {
  private readonly hash: KeyHashFunction
  private readonly isDigest: (digest: string) => boolean

  constructor(
    readonly namespace: string,
    hash: KeyAlgorithm | KeyHashFunction = "sha256",
  ) {
    if (typeof hash === "function") {
      this.hash = hash
      this.isDigest = (digest) => digest.length > 0 && !digest.includes(SEPARATOR)
    } else {
      const pattern = new RegExp(`^[0-9a-f]{${HEX_LENGTH[hash]}}$`)
      this.hash = (text) => createHash(hash).update(text, "utf8").digest("hex")
      this.isDigest = (digest) => pattern.test(digest)
    }
  }

  encode(text: string): KvKey {
    const digest = this.hash(text)

    if (!this.isDigest(digest)) {
      throw ConfigurationError.invalid(
        "key hash function",
        `expected a non-empty digest without "${SEPARATOR}", got ${JSON.stringify(digest)}`,
      )
    }

    return `${this.keyPrefix()}${digest}`
  }

  decode(key: KvKey): DecodedKey | undefined {
    const at = key.lastIndexOf(SEPARATOR)
    if (at === 0) return undefined

    const namespace = at === -1 ? "" : key.slice(0, at)
    const digest = key.slice(at + 1)

    if (namespace !== this.namespace || !this.isDigest(digest)) return undefined

    return { namespace, digest }
  }

  keyPrefix(): string {
    return this.namespace === "" ? "" : `${this.namespace}${SEPARATOR}`
  }
}

export function createKeyEncoder(
  namespace: string,
  hash: KeyAlgorithm | KeyHashFunction = "sha256",
): KeyEncoder {
  return new HashKeyEncoder(namespace, hash)
}
