import type { Milliseconds } from "../core/time/clock"

type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }

export type KvTtl = MillisecondsTtl

export interface KvSetOptions {
  /**
   * Optional time-to-live for the written entries.
   *
   * @remarks
   * Expired entries read as `not_found`. Writing without a TTL keeps the TTL
   * an existing entry already has.
   */
  readonly ttl?: KvTtl
}
