export {
  type CreateMemoryTableCacheOptions,
  createMemoryTableCache,
  type OpenTableCacheDeps,
  openTableCache,
  withTableCache,
} from "./adapters/create"
export {
  DynamoDbTableClient,
  type DynamoDbTableClientDeps,
} from "./adapters/dynamodb/dynamodb-table-client"
export {
  MemoryTableClient,
  type MemoryTableClientOptions,
  type MemoryTableDefinition,
} from "./adapters/memory/memory-table-client"
export { loadCacheConfig, mapEnvToConfig } from "./config/load-cache-config"
export { type CacheConfig, type EnvConfig, envSchema } from "./config/schema"
export {
  BATCH_GET_LIMIT,
  BATCH_WRITE_LIMIT,
  type BatchRetryPolicy,
  DEFAULT_BATCH_RETRY,
} from "./core/batch/batch-executor"
export { type Delay, type DelayPolicy, type LinearDelayOptions, linearDelay } from "./core/batch/delay-policy"
export { decodeValue, encodeValue, isNumericText } from "./core/codec/typed-value"
export {
  BatchRetryExhaustedError,
  BucketNotFoundError,
  CacheError,
  type CacheErrorKind,
  ClientCreationFailedError,
  ClientError,
  ConfigValidationError,
  type ErrorContext,
  InvalidInputError,
  isCacheError,
  KeyAlreadyExistsError,
  NotANumberError,
  type SerializedError,
  serializeError,
  TableNotFoundError,
  ThroughputExceededError,
  UnsupportedValueTypeError,
} from "./core/errors/cache-error"
export {
  classifyStoreFault,
  readStoreFault,
  type StoreFault,
  type Translation,
  translateError,
} from "./core/errors/translate"
export { itemSize, MAX_ITEM_BYTES } from "./core/overflow/item-size"
export { type CacheColumns, DEFAULT_COLUMNS } from "./core/schema/cache-item"
export { SerializedCache } from "./core/serialized-cache"
export { JsonSerializer, StringSerializer, type ValueParser } from "./core/serializers"
export {
  defaultKeyBuilder,
  TableCache,
  type TableCacheDeps,
  type TableCacheOptions,
} from "./core/table-cache"
export { type Clock, FakeClock, SystemClock } from "./core/time/clock"
export type { CacheEntry } from "./ports/cache-entry"
export type { CacheKey, KeyBuilder } from "./ports/cache-key"
export { type CacheSetOptions, type CacheTtl, KEY_NOT_FOUND, NO_TTL } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { CacheValue, TypedValue } from "./ports/cache-value"
export type { Serializer } from "./ports/serializer"
export type { TableClient } from "./ports/table-client"
export type { EpochSeconds, Milliseconds, Seconds } from "./ports/time"
export type { ValueCache } from "./ports/value-cache"
