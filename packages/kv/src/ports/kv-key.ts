/**
 * Key of an entry in a KV store.
 *
 * @remarks
 * Cache keys are `namespace:digest` strings; adapters may encode them for
 * their medium (file names, keyspace prefixes) but must hand the original
 * string back from `keys()`.
 */
export type KvKey = string
