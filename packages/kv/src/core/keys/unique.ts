/** Distinct items in first-seen order. */
export function unique<T>(items: readonly T[]): T[] {
  return [...new Set(items)]
}

/** Last entry per key wins, in the order keys were first seen. */
export function lastWriteWins<K, V>(entries: readonly (readonly [K, V])[]): [K, V][] {
  return [...new Map<K, V>(entries.map(([k, v]) => [k, v])).entries()]
}

/**
 * Consecutive slices of at most `size` items.
 *
 * @throws {RangeError} if `size` is not a positive integer.
 */
export function* chunks<T>(items: readonly T[], size: number): Generator<readonly T[]> {
  assertChunkSize(size)

  for (let i = 0; i < items.length; i += size) {
    yield items.slice(i, i + size)
  }
}

export function assertChunkSize(size: number): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`)
  }
}
