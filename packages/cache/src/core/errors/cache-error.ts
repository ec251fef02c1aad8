export type CacheErrorKind =
  | "table_not_found"
  | "bucket_not_found"
  | "invalid_input"
  | "throughput_exceeded"
  | "client_creation_failed"
  | "client_error"
  | "key_already_exists"
  | "not_a_number"
  | "unsupported_value_type"
  | "batch_retry_exhausted"
  | "invalid_config"

export type ClientErrorKind =
  | "client_error"
  | "invalid_input"
  | "throughput_exceeded"
  | "client_creation_failed"

/**
 * Structured data attached to an error (keys, table names, store codes).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type CacheErrorOptions<C extends CacheErrorKind = CacheErrorKind> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

type SubclassOptions = Omit<CacheErrorOptions, "code">

export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

export class CacheError<C extends CacheErrorKind = CacheErrorKind> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: CacheErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

/**
 * Catch-all for store failures; also the parent of the client-side kinds.
 */
export class ClientError<C extends ClientErrorKind = ClientErrorKind> extends CacheError<C> {}

export class InvalidInputError extends ClientError<"invalid_input"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "invalid_input" })
  }
}

export class ThroughputExceededError extends ClientError<"throughput_exceeded"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { isRetryable: true, ...options, code: "throughput_exceeded" })
  }
}

export class ClientCreationFailedError extends ClientError<"client_creation_failed"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "client_creation_failed" })
  }
}

export class TableNotFoundError extends CacheError<"table_not_found"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "table_not_found" })
  }

  static forTable(table: string, cause?: unknown): TableNotFoundError {
    return new TableNotFoundError(`Table ${table} does not exist`, {
      context: { table },
      cause,
    })
  }
}

export class BucketNotFoundError extends CacheError<"bucket_not_found"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "bucket_not_found" })
  }

  static forBucket(bucket: string, cause?: unknown): BucketNotFoundError {
    return new BucketNotFoundError(`Bucket ${bucket} does not exist`, {
      context: { bucket },
      cause,
    })
  }
}

export class KeyAlreadyExistsError extends CacheError<"key_already_exists"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "key_already_exists" })
  }

  static forKey(key: string, table: string, cause?: unknown): KeyAlreadyExistsError {
    return new KeyAlreadyExistsError(`Key ${key} already exists in table ${table}`, {
      context: { key, table },
      cause,
    })
  }
}

export class NotANumberError extends CacheError<"not_a_number"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "not_a_number" })
  }

  static forValue(key: string, value: unknown): NotANumberError {
    return new NotANumberError(`Value stored at ${key} is not a number: ${describeValue(value)}`, {
      context: { key, valueType: describeType(value) },
    })
  }
}

export class UnsupportedValueTypeError extends CacheError<"unsupported_value_type"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { ...options, code: "unsupported_value_type" })
  }

  static forValue(value: unknown): UnsupportedValueTypeError {
    const valueType = describeType(value)

    return new UnsupportedValueTypeError(
      `Unsupported value type ${valueType}: ${describeValue(value)}`,
      { context: { valueType } },
    )
  }

  static forTag(tag: string): UnsupportedValueTypeError {
    return new UnsupportedValueTypeError(`Unsupported stored attribute type ${tag}`, {
      context: { tag },
    })
  }
}

/**
 * Unprocessed batch items were still pending when the retry budget ran out.
 */
export class BatchRetryExhaustedError extends CacheError<"batch_retry_exhausted"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { isRetryable: true, ...options, code: "batch_retry_exhausted" })
  }

  static after(input: {
    operation: string
    attempts: number
    elapsedMs: number
    pending: number
    reason: "max_attempts" | "max_elapsed"
  }): BatchRetryExhaustedError {
    return new BatchRetryExhaustedError(
      `${input.operation}: ${input.pending} unprocessed item(s) remain after ${input.attempts} attempt(s) in ${input.elapsedMs}ms`,
      { context: { ...input } },
    )
  }
}

export class ConfigValidationError extends CacheError<"invalid_config"> {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, { isOperational: false, ...options, code: "invalid_config" })
  }
}

export function isCacheError(err: unknown): err is CacheError {
  return err instanceof CacheError
}

export function describeType(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (typeof value === "object") return value.constructor?.name ?? "object"

  return typeof value
}

function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`

  const text = typeof value === "string" ? JSON.stringify(value) : String(value)

  return text.length > 80 ? `${text.slice(0, 77)}...` : text
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a JSON-safe shape, cause chain included.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof CacheError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      timestamp: new Date().toISOString(),
      isRetryable: false,
      isOperational: false,
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    timestamp: new Date().toISOString(),
    isRetryable: false,
    isOperational: false,
  }
}
