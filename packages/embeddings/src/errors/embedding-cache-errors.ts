import { BaseError, type ErrorContext } from "@embedcache/errors"

export type EmbeddingCacheErrorCode =
  | "provider_contract_violation"
  | "store_read_failed"
  | "store_write_failed"
  | "deserialization_failed"
  | "invalid_configuration"

/**
 * Common base of every error raised by the cache layer itself. Errors thrown
 * by the wrapped provider are not converted and pass through as they are.
 */
export class EmbeddingCacheError<
  C extends EmbeddingCacheErrorCode = EmbeddingCacheErrorCode,
> extends BaseError<C> {}

export class ProviderError extends EmbeddingCacheError<"provider_contract_violation"> {
  static resultCountMismatch(input: {
    namespace: string
    expected: number
    received: number
  }): ProviderError {
    return new ProviderError(
      `Embedding provider returned ${input.received} vectors for ${input.expected} texts`,
      {
        code: "provider_contract_violation",
        context: { ...input },
        isRetryable: false,
      },
    )
  }

  static invalidVector(input: {
    namespace: string
    index: number
    reason: "empty" | "non_finite" | "dimension_mismatch"
    dimensions: number
    expectedDimensions?: number
  }): ProviderError {
    return new ProviderError(`Embedding provider returned an invalid vector (${input.reason})`, {
      code: "provider_contract_violation",
      context: { ...input },
      isRetryable: false,
    })
  }
}

export type StoreOperation = "getMany" | "setMany" | "keys" | "deleteMany"

export class StoreReadError extends EmbeddingCacheError<"store_read_failed"> {
  static wrap(input: {
    namespace: string
    operation: StoreOperation
    keyCount?: number
    cause: unknown
  }): StoreReadError {
    const { cause, ...context } = input

    return new StoreReadError(`Cache store read failed during ${input.operation}`, {
      code: "store_read_failed",
      context,
      cause,
      isRetryable: true,
    })
  }
}

export class StoreWriteError extends EmbeddingCacheError<"store_write_failed"> {
  static wrap(input: {
    namespace: string
    operation: StoreOperation
    keyCount: number
    cause: unknown
  }): StoreWriteError {
    const { cause, ...context } = input

    return new StoreWriteError(`Cache store write failed during ${input.operation}`, {
      code: "store_write_failed",
      context,
      cause,
      isRetryable: true,
    })
  }
}

/**
 * Stored bytes exist but are not a vector this codec can read. Never
 * reported as a miss: it points at corruption or a foreign writer.
 */
export class DeserializationError extends EmbeddingCacheError<"deserialization_failed"> {
  static malformed(reason: string, context: ErrorContext = {}): DeserializationError {
    return new DeserializationError(`Malformed embedding entry: ${reason}`, {
      code: "deserialization_failed",
      context: { reason, ...context },
      isRetryable: false,
      isOperational: false,
    })
  }

  static forEntry(key: string, cause: DeserializationError): DeserializationError {
    return new DeserializationError(`Cache entry "${key}" could not be decoded`, {
      code: "deserialization_failed",
      context: { ...cause.context, key },
      cause,
      isRetryable: false,
      isOperational: false,
    })
  }
}

export class ConfigurationError extends EmbeddingCacheError<"invalid_configuration"> {
  static invalid(subject: string, details: string, cause?: unknown): ConfigurationError {
    return new ConfigurationError(`Invalid ${subject}:\n${details}`, {
      code: "invalid_configuration",
      context: { subject },
      ...(cause !== undefined && { cause }),
      isRetryable: false,
    })
  }
}
