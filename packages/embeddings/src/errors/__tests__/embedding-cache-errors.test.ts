import { BaseError, serializeError } from "@embedcache/errors"
import {
  ConfigurationError,
  DeserializationError,
  EmbeddingCacheError,
  ProviderError,
  StoreReadError,
  StoreWriteError,
} from "../embedding-cache-errors"

describe("embedding cache errors", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("belong to the EmbeddingCacheError family", () => {
    const errors = [
      ProviderError.resultCountMismatch({ namespace: "m", expected: 2, received: 1 }),
      StoreReadError.wrap({ namespace: "m", operation: "getMany", cause: new Error("x") }),
      StoreWriteError.wrap({ namespace: "m", operation: "setMany", keyCount: 1, cause: "x" }),
      DeserializationError.malformed("bad magic"),
      ConfigurationError.invalid("options", "details"),
    ]

    for (const err of errors) {
      expect(err).toBeInstanceOf(EmbeddingCacheError)
      expect(err).toBeInstanceOf(BaseError)
    }
  })

  it("names errors after their class", () => {
    expect(DeserializationError.malformed("bad magic").name).toBe("DeserializationError")
  })

  it("marks store failures retryable and contract violations not", () => {
    const cause = new Error("timeout")

    expect(StoreReadError.wrap({ namespace: "m", operation: "keys", cause }).isRetryable).toBe(true)
    expect(
      StoreWriteError.wrap({ namespace: "m", operation: "deleteMany", keyCount: 3, cause })
        .isRetryable,
    ).toBe(true)
    expect(
      ProviderError.invalidVector({ namespace: "m", index: 0, reason: "empty", dimensions: 0 })
        .isRetryable,
    ).toBe(false)
  })

  it("keeps the backend error as cause without copying it into the context", () => {
    const cause = new Error("ECONNRESET")
    const err = StoreReadError.wrap({ namespace: "m", operation: "getMany", keyCount: 4, cause })

    expect(err.cause).toBe(cause)
    expect(err.context).toStrictEqual({ namespace: "m", operation: "getMany", keyCount: 4 })
    expect(err.message).toBe("Cache store read failed during getMany")
  })

  it("adds the entry key when wrapping a decode failure", () => {
    const inner = DeserializationError.malformed("bad magic", { byteLength: 20 })
    const err = DeserializationError.forEntry("m:abc", inner)

    expect(err.message).toBe('Cache entry "m:abc" could not be decoded')
    expect(err.context).toStrictEqual({ reason: "bad magic", byteLength: 20, key: "m:abc" })
    expect(err.isOperational).toBe(false)
    expect(err.cause).toBe(inner)
  })

  it("serializes with its cause chain", () => {
    const err = StoreWriteError.wrap({
      namespace: "m",
      operation: "setMany",
      keyCount: 1,
      cause: new Error("disk full"),
    })

    expect(serializeError(err)).toStrictEqual({
      name: "StoreWriteError",
      code: "store_write_failed",
      message: "Cache store write failed during setMany",
      context: { namespace: "m", operation: "setMany", keyCount: 1 },
      isOperational: true,
      isRetryable: true,
      timestamp: "2024-01-15T10:30:00.000Z",
      cause: {
        name: "Error",
        code: "unknown",
        message: "disk full",
        context: {},
        isOperational: false,
        isRetryable: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      },
    })
  })

  it("puts the readable report into configuration errors", () => {
    const err = ConfigurationError.invalid("configuration", "✖ Invalid input\n  → at LOG_LEVEL")

    expect(err.message).toBe("Invalid configuration:\n✖ Invalid input\n  → at LOG_LEVEL")
    expect(err.code).toBe("invalid_configuration")
    expect(err.context).toStrictEqual({ subject: "configuration" })
  })
})
