/**
 * Bidirectional transform between a typed value and the bytes a
 * {@link BytesKeyValueStore} holds.
 *
 * @remarks
 * Codecs are pure and deterministic. Adapters treat codec output as opaque
 * bytes and never depend on a codec themselves.
 *
 * `decode` must throw on input it did not produce instead of guessing, so
 * corrupt entries surface as errors rather than as wrong values.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  decode(bytes: Uint8Array): T
}
