import { BaseError, serializeError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("applies defaults", () => {
      const err = new BaseError("store unavailable", { code: "store_read_failed" })

      expect(err.message).toBe("store unavailable")
      expect(err.code).toBe("store_read_failed")
      expect(err.name).toBe("BaseError")
      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("keeps cause, flags and a frozen copy of the context", () => {
      const cause = new Error("ECONNREFUSED")
      const context = { namespace: "model-a" }

      const err = new BaseError("wrapped", {
        code: "store_read_failed",
        context,
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
      expect(err.context).toEqual({ namespace: "model-a" })
      expect(err.context).not.toBe(context)
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("uses the subclass name", () => {
      class CorruptEntryError extends BaseError<"corrupt_entry"> {}

      const err = new CorruptEntryError("bad bytes", { code: "corrupt_entry" })

      expect(err.name).toBe("CorruptEntryError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
      expect(err.stack).toContain("CorruptEntryError")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized shape", () => {
      const err = new BaseError("bad bytes", {
        code: "deserialization_failed",
        context: { key: "ns:abc" },
        isOperational: false,
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "deserialization_failed",
        message: "bad bytes",
        context: { key: "ns:abc" },
        isOperational: false,
        isRetryable: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("follows the cause chain through BaseError and Error", () => {
    const root = new Error("socket closed")
    const outer = new BaseError("read failed", { code: "store_read_failed", cause: root })

    const serialized = serializeError(outer)

    expect(serialized.cause).toEqual({
      name: "Error",
      code: "unknown",
      message: "socket closed",
      context: {},
      isOperational: false,
      isRetryable: false,
      timestamp: "2024-01-15T10:30:00.000Z",
    })
  })

  it("omits the stack unless requested", () => {
    const err = new BaseError("x", { code: "test" })

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })

  it("wraps non-Error values", () => {
    expect(serializeError("boom")).toMatchObject({
      name: "NonErrorThrown",
      message: "boom",
      context: {},
    })
    expect(serializeError({ status: 500 })).toMatchObject({
      name: "NonErrorThrown",
      message: "Unknown error",
      context: { value: { status: 500 } },
    })
  })
})
