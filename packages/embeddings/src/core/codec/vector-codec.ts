import type { Codec } from "@embedcache/kv"
import { DeserializationError } from "../../errors/embedding-cache-errors"
import type { EmbeddingVector } from "../../ports/embedding-provider"

export const vectorPrecisions = ["float64", "float32"] as const

export type VectorPrecision = (typeof vectorPrecisions)[number]

const MAGIC = [0x45, 0x56, 0x45, 0x43] // "EVEC"
const FORMAT_VERSION = 1
const HEADER_BYTES = 12

const WIDTH: Record<VectorPrecision, number> = {
  float64: 8,
  float32: 4,
}

export type VectorCodecOptions = {
  /** @default "float64" */
  precision?: VectorPrecision

  /** When set, decoding a vector of any other length fails. */
  dimensions?: number
}

/**
 * Binary vector format, little endian:
 *
 * | offset | size | field                          |
 * |--------|------|--------------------------------|
 * | 0      | 4    | magic `EVEC`                   |
 * | 4      | 1    | format version (`1`)           |
 * | 5      | 1    | element width (`8` or `4`)     |
 * | 6      | 2    | reserved, zero                 |
 * | 8      | 4    | dimension count (uint32)       |
 * | 12     | n*w  | IEEE-754 elements              |
 *
 * Decoding reads the width from the header, so entries written at either
 * precision stay readable after the precision setting changes.
 */
export class VectorCodec implements Codec<EmbeddingVector> {
  private readonly width: number

  constructor(private readonly opts: VectorCodecOptions = {}) {
    this.width = WIDTH[opts.precision ?? "float64"]
  }

  encode(vector: EmbeddingVector): Uint8Array {
    const bytes = new Uint8Array(HEADER_BYTES + vector.length * this.width)
    const view = new DataView(bytes.buffer)

    bytes.set(MAGIC, 0)
    view.setUint8(4, FORMAT_VERSION)
    view.setUint8(5, this.width)
    view.setUint32(8, vector.length, true)

    for (const [i, value] of vector.entries()) {
      if (!this.isRepresentable(value)) {
        throw new RangeError(`Vector element ${i} is not a finite ${this.width * 8}-bit float`)
      }

      const offset = HEADER_BYTES + i * this.width
      if (this.width === 8) view.setFloat64(offset, value, true)
      else view.setFloat32(offset, value, true)
    }

    return bytes
  }

  /**
   * Index of the first element that would not survive encoding (NaN,
   * infinities, or values beyond float32 range at that precision), or -1.
   */
  findInvalidElement(vector: EmbeddingVector): number {
    return vector.findIndex((value) => !this.isRepresentable(value))
  }

  decode(bytes: Uint8Array): EmbeddingVector {
    if (bytes.byteLength < HEADER_BYTES) {
      throw DeserializationError.malformed("truncated header", { byteLength: bytes.byteLength })
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)

    if (MAGIC.some((b, i) => bytes[i] !== b)) {
      throw DeserializationError.malformed("bad magic")
    }

    const version = view.getUint8(4)
    if (version !== FORMAT_VERSION) {
      throw DeserializationError.malformed("unsupported format version", { version })
    }

    const width = view.getUint8(5)
    if (width !== 8 && width !== 4) {
      throw DeserializationError.malformed("unsupported element width", { width })
    }

    if (view.getUint16(6, true) !== 0) {
      throw DeserializationError.malformed("reserved bytes are set")
    }

    const dimensions = view.getUint32(8, true)
    const expectedLength = HEADER_BYTES + dimensions * width
    if (bytes.byteLength !== expectedLength) {
      throw DeserializationError.malformed("length does not match header", {
        byteLength: bytes.byteLength,
        expectedLength,
      })
    }

    if (this.opts.dimensions !== undefined && dimensions !== this.opts.dimensions) {
      throw DeserializationError.malformed("unexpected dimension count", {
        dimensions,
        expectedDimensions: this.opts.dimensions,
      })
    }

    const vector = new Array<number>(dimensions)
    for (let i = 0; i < dimensions; i++) {
      const offset = HEADER_BYTES + i * width
      vector[i] = width === 8 ? view.getFloat64(offset, true) : view.getFloat32(offset, true)
    }

    if (!vector.every(Number.isFinite)) {
      throw DeserializationError.malformed("non-finite element")
    }

    return vector
  }

  private isRepresentable(value: number): boolean {
    return Number.isFinite(this.width === 4 ? Math.fround(value) : value)
  }
}

export function createVectorCodec(opts: VectorCodecOptions = {}): VectorCodec {
  return new VectorCodec(opts)
}
