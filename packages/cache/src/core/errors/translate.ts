import {
  BucketNotFoundError,
  CacheError,
  type CacheErrorKind,
  ClientCreationFailedError,
  ClientError,
  type ErrorContext,
  InvalidInputError,
  KeyAlreadyExistsError,
  TableNotFoundError,
  ThroughputExceededError,
} from "./cache-error"

/**
 * Error code, message and HTTP status read off a store service exception.
 */
export type StoreFault = Readonly<{
  code: string
  message: string
  httpStatus?: number
}>

export type StoreSource = "table" | "blob"

export type TranslateScope = Readonly<{
  source: StoreSource
  /** Cache operation in flight; `"connect"` while clients are being created. */
  operation: string
  context?: ErrorContext
}>

export type Translation = Readonly<{
  kind: CacheErrorKind
  message: string
}>

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: CacheError }

const CONDITIONAL_CHECK_FAILED = "ConditionalCheckFailedException"

const tableCodes: Readonly<Record<string, CacheErrorKind>> = {
  ResourceNotFoundException: "table_not_found",
  ValidationException: "invalid_input",
  ProvisionedThroughputExceededException: "throughput_exceeded",
}

const missingBucketCodes = new Set(["404", "NotFound", "NoSuchBucket"])

/**
 * Extract a {@link StoreFault} from an AWS SDK service exception.
 *
 * @returns `undefined` when `err` did not come back from the store.
 */
export function readStoreFault(err: unknown): StoreFault | undefined {
  if (!(err instanceof Error) || !("$metadata" in err)) return undefined

  const httpStatus = readHttpStatus(err.$metadata)

  return {
    code: err.name,
    message: err.message,
    ...(httpStatus !== undefined && { httpStatus }),
  }
}

/**
 * Map a store fault to an error kind. Pure: the message is carried over as is.
 */
export function classifyStoreFault(fault: StoreFault, scope: TranslateScope): Translation {
  if (
    scope.source === "blob" &&
    (fault.httpStatus === 404 || missingBucketCodes.has(fault.code))
  ) {
    return { kind: "bucket_not_found", message: fault.message }
  }

  if (fault.code === CONDITIONAL_CHECK_FAILED && scope.operation === "add") {
    return { kind: "key_already_exists", message: fault.message }
  }

  const kind = scope.source === "table" ? tableCodes[fault.code] : undefined

  return { kind: kind ?? "client_error", message: fault.message }
}

export function toCacheError(
  translation: Translation,
  options: { cause?: unknown; context?: ErrorContext } = {},
): CacheError {
  const { message } = translation

  switch (translation.kind) {
    case "table_not_found":
      return new TableNotFoundError(message, options)
    case "bucket_not_found":
      return new BucketNotFoundError(message, options)
    case "invalid_input":
      return new InvalidInputError(message, options)
    case "throughput_exceeded":
      return new ThroughputExceededError(message, options)
    case "key_already_exists":
      return new KeyAlreadyExistsError(message, options)
    case "client_creation_failed":
      return new ClientCreationFailedError(message, options)
    default:
      return new ClientError(message, { ...options, code: "client_error" })
  }
}

/**
 * Turn anything thrown by a store call into a {@link CacheError}.
 */
export function translateError(err: unknown, scope: TranslateScope): CacheError {
  if (err instanceof CacheError) return err

  const fault = readStoreFault(err)
  const message = err instanceof Error ? err.message : String(err)

  if (!fault) {
    const kind = scope.operation === "connect" ? "client_creation_failed" : "client_error"

    return toCacheError(
      { kind, message },
      { cause: err, context: { ...scope.context, source: scope.source, operation: scope.operation } },
    )
  }

  return toCacheError(classifyStoreFault(fault, scope), {
    cause: err,
    context: {
      ...scope.context,
      source: scope.source,
      operation: scope.operation,
      storeCode: fault.code,
    },
  })
}

/**
 * Run a store call and return its translated outcome instead of throwing.
 */
export async function attempt<T>(fn: () => Promise<T>, scope: TranslateScope): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() }
  } catch (err) {
    return { ok: false, error: translateError(err, scope) }
  }
}

/**
 * Run a store call, throwing the translated error on failure.
 */
export async function guard<T>(fn: () => Promise<T>, scope: TranslateScope): Promise<T> {
  const outcome = await attempt(fn, scope)
  if (!outcome.ok) throw outcome.error

  return outcome.value
}

/**
 * A conditional write was rejected because its condition did not hold.
 */
export function isConditionFailure(err: CacheError): boolean {
  return err.context.storeCode === CONDITIONAL_CHECK_FAILED
}

function readHttpStatus(metadata: unknown): number | undefined {
  if (typeof metadata !== "object" || metadata === null) return undefined
  if (!("httpStatusCode" in metadata)) return undefined

  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined
}
