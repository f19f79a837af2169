export type RedisTtl = { PX: number } | { KEEPTTL: true }

export type RedisScanOptions = {
  MATCH?: string
  COUNT?: number
}

/**
 * Subset of the node-redis client used by the store, with blob replies
 * mapped to `Buffer`.
 *
 * @remarks
 * Under that mapping SCAN may hand back cursors and keys as `Buffer`s, so
 * both shapes are accepted.
 */
export type RedisBytesClient = {
  get(key: string): Promise<Buffer | null>
  mGet(keys: readonly string[]): Promise<(Buffer | null)[]>

  exists(keys: string | readonly string[]): Promise<number>

  set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): Promise<unknown>

  del(keys: string | readonly string[]): Promise<number>

  scan(
    cursor: string,
    opts?: RedisScanOptions,
  ): Promise<{ cursor: string | Buffer; keys: (string | Buffer)[] }>

  multi(): RedisBytesMulti

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  readonly isOpen: boolean
}

export type RedisBytesMulti = {
  set(key: string, value: Uint8Array | Buffer, opts?: RedisTtl): unknown
  exec(): Promise<unknown>
}
