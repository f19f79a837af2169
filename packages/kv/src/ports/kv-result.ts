export type KvFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type KvNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of a lookup. Backend failures are thrown, never reported as `not_found`.
 */
export type KvResult<T> = KvFound<T> | KvNotFound
