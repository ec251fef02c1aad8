import type { WriteRequest } from "@aws-sdk/client-dynamodb"
import { createNullLogger, type Logger } from "@tablecache/logger"
import type { BlobRef, BlobStorage } from "@tablecache/storage"
import type { CacheEntry } from "../ports/cache-entry"
import type { CacheKey, KeyBuilder } from "../ports/cache-key"
import { type CacheSetOptions, type CacheTtl, KEY_NOT_FOUND, NO_TTL } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type { CacheValue } from "../ports/cache-value"
import type { TableClient } from "../ports/table-client"
import type { EpochSeconds } from "../ports/time"
import type { ValueCache } from "../ports/value-cache"
import { BatchExecutor, type BatchRetryPolicy, DEFAULT_BATCH_RETRY } from "./batch/batch-executor"
import { decodeValue, encodeValue, isNumericText } from "./codec/typed-value"
import {
  ClientError,
  InvalidInputError,
  KeyAlreadyExistsError,
  NotANumberError,
} from "./errors/cache-error"
import { attempt, guard, isConditionFailure, type TranslateScope } from "./errors/translate"
import { itemSize, MAX_ITEM_BYTES } from "./overflow/item-size"
import { decodePayload, OverflowStore } from "./overflow/overflow-store"
import { ReadPath } from "./read/read-path"
import {
  type AttributeMap,
  type CacheColumns,
  DEFAULT_COLUMNS,
  ItemSchema,
  type StoredRecord,
} from "./schema/cache-item"
import { type Clock, SystemClock, toEpochSeconds } from "./time/clock"
import { isLive, resolveExpiry } from "./time/expiry"

/** Page size of the scan behind `clear`. */
const CLEAR_PAGE_SIZE = 25

export type TableCacheDeps = {
  client: TableClient
  /** Enables overflow of oversized values. Requires `bucketName`. */
  blobs?: BlobStorage
  clock?: Clock
  logger?: Logger
  /** Extra resources owned by the cache, released by `close()` after the table client. */
  release?: () => void | Promise<void>
}

export type TableCacheOptions = {
  tableName: string
  bucketName?: string
  /** Shown by `toString()`. */
  region?: string
  columns?: Partial<CacheColumns>
  namespace?: string
  keyBuilder?: KeyBuilder
  batchRetry?: Partial<BatchRetryPolicy>
}

export const defaultKeyBuilder: KeyBuilder = (key, namespace) => `${namespace}${key}`

/**
 * Cache semantics on top of a DynamoDB-style table: logical expiry on every
 * read, chunked batches with unprocessed-item retry, overflow of oversized
 * values to blob storage and a stable error taxonomy.
 *
 * @remarks
 * The cache owns its table client (and any `release` hook) from construction
 * on; `close()` releases them exactly once.
 */
export class TableCache implements ValueCache<CacheValue> {
  private readonly client: TableClient
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly schema: ItemSchema
  private readonly reads: ReadPath
  private readonly batches: BatchExecutor
  private readonly overflow: OverflowStore | undefined
  private readonly keyBuilder: KeyBuilder
  private closing: Promise<void> | undefined

  readonly tableName: string
  readonly namespace: string

  constructor(
    private readonly deps: TableCacheDeps,
    private readonly options: TableCacheOptions,
  ) {
    if (deps.blobs && !options.bucketName) {
      throw new InvalidInputError("blob storage was provided without a bucketName")
    }

    this.client = deps.client
    this.clock = deps.clock ?? new SystemClock()
    this.tableName = options.tableName
    this.namespace = options.namespace ?? ""
    this.keyBuilder = options.keyBuilder ?? defaultKeyBuilder
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "table-cache",
      table: options.tableName,
      ...(options.bucketName !== undefined && { bucket: options.bucketName }),
    })
    this.schema = new ItemSchema({ ...DEFAULT_COLUMNS, ...options.columns })
    this.reads = new ReadPath(
      { client: this.client, schema: this.schema },
      { tableName: this.tableName },
    )
    this.batches = new BatchExecutor(
      { client: this.client, clock: this.clock, logger: this.logger },
      { tableName: this.tableName, retry: { ...DEFAULT_BATCH_RETRY, ...options.batchRetry } },
    )
    this.overflow =
      deps.blobs && options.bucketName
        ? new OverflowStore(
            { blobs: deps.blobs, logger: this.logger },
            { tableName: this.tableName, bucket: options.bucketName },
          )
        : undefined
  }

  async get(key: CacheKey): Promise<CacheResult<CacheValue>> {
    this.assertOpen()

    const record = await this.reads.fetchLive(this.keyFor(key), this.nowSeconds(), "get")
    if (!record) return { kind: "miss" }

    return this.materialize(record, "get")
  }

  async multiGet(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<CacheValue>>> {
    this.assertOpen()

    const storeKeys = [...new Set(keys.map((key) => this.keyFor(key)))]
    const items = await this.batches.getItems(
      storeKeys.map((key) => this.schema.keyOf(key)),
      "multiGet",
    )

    const now = this.nowSeconds()
    const live = new Map<string, StoredRecord>()
    for (const item of items) {
      const record = this.schema.read(item)
      if (isLive(record.expiresAt, now)) live.set(record.key, record)
    }

    const resolved = new Map<string, CacheResult<CacheValue>>()
    for (const [storeKey, record] of live) {
      resolved.set(storeKey, await this.materialize(record, "multiGet"))
    }

    const out = new Map<CacheKey, CacheResult<CacheValue>>()
    for (const key of keys) {
      out.set(key, resolved.get(this.keyFor(key)) ?? { kind: "miss" })
    }

    return out
  }

  async set(key: CacheKey, value: CacheValue, opts?: Partial<CacheSetOptions>): Promise<void> {
    this.assertOpen()

    await this.write(this.keyFor(key), value, this.expiryFor(opts?.ttl), "set")
  }

  async multiSet(
    entries: readonly CacheEntry<CacheValue>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    this.assertOpen()

    const expiresAt = this.expiryFor(opts?.ttl)

    const latest = new Map<string, CacheValue>()
    for (const [key, value] of entries) {
      latest.set(this.keyFor(key), value)
    }

    const puts: WriteRequest[] = []
    const oversized: [string, CacheValue][] = []

    for (const [storeKey, value] of latest) {
      const item = this.schema.build(storeKey, encodeValue(value), expiresAt)

      if (itemSize(item) > MAX_ITEM_BYTES) {
        oversized.push([storeKey, value])
      } else {
        puts.push({ PutRequest: { Item: item } })
      }
    }

    if (oversized.length > 0 && !this.overflow) {
      throw new InvalidInputError(
        `Item size has exceeded the maximum allowed size for ${oversized.length} entr${oversized.length === 1 ? "y" : "ies"}`,
        { context: { keys: oversized.map(([key]) => key), maxItemBytes: MAX_ITEM_BYTES } },
      )
    }

    // inline puts replace spilled records without returning them; spills reuse the blob key
    const spilledKeys = new Set(oversized.map(([key]) => key))
    const superseded = (await this.findBlobOwners([...latest.keys()], "multiSet")).filter(
      (record) => !spilledKeys.has(record.key),
    )

    await this.batches.writeItems(puts, "multiSet")
    await this.releaseRecords(superseded, "multiSet")

    for (const [storeKey, value] of oversized) {
      await this.spill(storeKey, value, expiresAt, "multiSet")
    }
  }

  async add(key: CacheKey, value: CacheValue, opts?: Partial<CacheSetOptions>): Promise<void> {
    this.assertOpen()

    const storeKey = this.keyFor(key)
    const item = this.schema.build(storeKey, encodeValue(value), this.expiryFor(opts?.ttl))

    const outcome = await attempt(
      () =>
        this.client.putItem({
          TableName: this.tableName,
          Item: item,
          // an expired item the sweeper has not removed yet does not count
          ConditionExpression: "attribute_not_exists(#pk) OR #ttl <= :now",
          ExpressionAttributeNames: { "#pk": this.schema.columns.key, "#ttl": this.schema.columns.ttl },
          ExpressionAttributeValues: { ":now": { N: String(this.nowSeconds()) } },
          ...(this.overflow && { ReturnValues: "ALL_OLD" as const }),
        }),
      this.scope("add", storeKey),
    )

    if (!outcome.ok) {
      if (outcome.error instanceof KeyAlreadyExistsError) {
        throw KeyAlreadyExistsError.forKey(storeKey, this.tableName, outcome.error.cause)
      }
      throw outcome.error
    }

    await this.releaseSuperseded(outcome.value.Attributes, "add")
  }

  async delete(key: CacheKey): Promise<boolean> {
    this.assertOpen()

    const storeKey = this.keyFor(key)
    const res = await guard(
      () =>
        this.client.deleteItem({
          TableName: this.tableName,
          Key: this.schema.keyOf(storeKey),
          ReturnValues: "ALL_OLD",
        }),
      this.scope("delete", storeKey),
    )

    if (!res.Attributes) return false

    const record = this.schema.read(res.Attributes)
    await this.releaseRecords([record], "delete")

    return isLive(record.expiresAt, this.nowSeconds())
  }

  async multiDelete(keys: readonly CacheKey[]): Promise<void> {
    this.assertOpen()

    const storeKeys = [...new Set(keys.map((key) => this.keyFor(key)))]

    // batch deletes cannot return old attributes
    const owners = await this.findBlobOwners(storeKeys, "multiDelete")

    await this.batches.writeItems(
      storeKeys.map((key) => ({ DeleteRequest: { Key: this.schema.keyOf(key) } })),
      "multiDelete",
    )

    await this.releaseRecords(owners, "multiDelete")
  }

  async clear(namespace: string = this.namespace): Promise<number> {
    this.assertOpen()

    const { ProjectionExpression, ExpressionAttributeNames } = this.schema.releaseProjection()

    let removed = 0
    let startKey: AttributeMap | undefined

    do {
      const page = await guard(
        () =>
          this.client.scan({
            TableName: this.tableName,
            ProjectionExpression,
            ExpressionAttributeNames,
            Limit: CLEAR_PAGE_SIZE,
            ...(namespace !== "" && {
              FilterExpression: "begins_with(#pk, :namespace)",
              ExpressionAttributeValues: { ":namespace": { S: namespace } },
            }),
            ...(startKey && { ExclusiveStartKey: startKey }),
          }),
        this.scope("clear"),
      )

      const records = (page.Items ?? []).map((item) => this.schema.read(item))

      if (records.length > 0) {
        await this.batches.writeItems(
          records.map((record) => ({ DeleteRequest: { Key: this.schema.keyOf(record.key) } })),
          "clear",
        )
        await this.releaseRecords(records, "clear")
        removed += records.length
      }

      startKey = page.LastEvaluatedKey
    } while (startKey)

    return removed
  }

  async exists(key: CacheKey): Promise<boolean> {
    this.assertOpen()

    const record = await this.reads.fetchExpiry(this.keyFor(key), this.nowSeconds(), "exists")

    return record !== undefined
  }

  /**
   * @remarks
   * Numeric items are updated atomically in the store. Items holding a value
   * of another type are read, converted and written back in process, which is
   * not atomic: concurrent increments of such an item can lose updates.
   */
  async increment(key: CacheKey, delta = 1): Promise<number> {
    this.assertOpen()

    if (!Number.isFinite(delta)) {
      throw new InvalidInputError(`delta must be a finite number (got ${delta})`)
    }

    const storeKey = this.keyFor(key)
    const { columns } = this.schema

    const outcome = await attempt(
      () =>
        this.client.updateItem({
          TableName: this.tableName,
          Key: this.schema.keyOf(storeKey),
          UpdateExpression: "SET #val = if_not_exists(#val, :start) + :delta",
          ConditionExpression: "attribute_not_exists(#ttl) OR #ttl > :now",
          ExpressionAttributeNames: { "#val": columns.value, "#ttl": columns.ttl },
          ExpressionAttributeValues: {
            ":start": { N: "0" },
            ":delta": { N: String(delta) },
            ":now": { N: String(this.nowSeconds()) },
          },
          ReturnValues: "UPDATED_NEW",
        }),
      this.scope("increment", storeKey),
    )

    if (outcome.ok) {
      const updated = outcome.value.Attributes?.[columns.value]
      const value = updated ? decodeValue(updated) : delta

      return typeof value === "number" ? value : Number(value)
    }

    // logically expired: start over as if the key were absent
    if (isConditionFailure(outcome.error)) {
      await this.write(storeKey, delta, undefined, "increment")
      return delta
    }

    if (!(outcome.error instanceof InvalidInputError)) throw outcome.error

    return this.incrementInProcess(storeKey, delta)
  }

  async expire(key: CacheKey, ttl?: CacheTtl): Promise<boolean> {
    this.assertOpen()

    const storeKey = this.keyFor(key)
    const expiresAt = this.expiryFor(ttl)
    const { columns } = this.schema

    const outcome = await attempt(
      () =>
        this.client.updateItem({
          TableName: this.tableName,
          Key: this.schema.keyOf(storeKey),
          UpdateExpression: expiresAt === undefined ? "REMOVE #ttl" : "SET #ttl = :ttl",
          ConditionExpression: "attribute_exists(#pk) AND (attribute_not_exists(#ttl) OR #ttl > :now)",
          ExpressionAttributeNames: { "#pk": columns.key, "#ttl": columns.ttl },
          ExpressionAttributeValues: {
            ":now": { N: String(this.nowSeconds()) },
            ...(expiresAt !== undefined && { ":ttl": { N: String(expiresAt) } }),
          },
        }),
      this.scope("expire", storeKey),
    )

    if (outcome.ok) return true
    if (isConditionFailure(outcome.error)) return false

    throw outcome.error
  }

  async ttl(key: CacheKey): Promise<number> {
    this.assertOpen()

    const now = this.nowSeconds()
    const record = await this.reads.fetchExpiry(this.keyFor(key), now, "ttl")

    if (!record) return KEY_NOT_FOUND
    if (record.expiresAt === undefined) return NO_TTL

    return record.expiresAt - now
  }

  async close(): Promise<void> {
    this.closing ??= this.release()

    await this.closing
  }

  toString(): string {
    const region = this.options.region ?? "local"
    const bucket = this.overflow ? `, bucket=${this.overflow.bucket}` : ""

    return `TableCache (${region}:${this.tableName}${bucket})`
  }

  private async release(): Promise<void> {
    try {
      await this.client.close()
    } finally {
      await this.deps.release?.()
      this.logger.info("cache closed")
    }
  }

  private async write(
    storeKey: string,
    value: CacheValue,
    expiresAt: EpochSeconds | undefined,
    operation: string,
  ): Promise<void> {
    const item = this.schema.build(storeKey, encodeValue(value), expiresAt)

    // without blob storage the store itself rejects the oversized item
    if (this.overflow && itemSize(item) > MAX_ITEM_BYTES) {
      await this.spill(storeKey, value, expiresAt, operation)
      return
    }

    const previous = await guard(
      () =>
        this.client.putItem({
          TableName: this.tableName,
          Item: item,
          ...(this.overflow && { ReturnValues: "ALL_OLD" as const }),
        }),
      this.scope(operation, storeKey),
    )

    await this.releaseSuperseded(previous.Attributes, operation)
  }

  private async spill(
    storeKey: string,
    value: CacheValue,
    expiresAt: EpochSeconds | undefined,
    operation: string,
  ): Promise<void> {
    if (!this.overflow) throw new InvalidInputError("overflow storage is not configured")

    const ref = await this.overflow.spill(storeKey, value, operation)
    const reference = this.schema.build(storeKey, { S: ref.key }, expiresAt, ref.bucket)

    await guard(
      () => this.client.putItem({ TableName: this.tableName, Item: reference }),
      this.scope(operation, storeKey),
    )

    this.logger.debug("value spilled to blob storage", {
      operation,
      key: storeKey,
      blobKey: ref.key,
    })
  }

  private async incrementInProcess(storeKey: string, delta: number): Promise<number> {
    const record = await this.reads.fetchLive(storeKey, this.nowSeconds(), "increment")
    const current = record ? await this.materialize(record, "increment") : { kind: "miss" as const }

    if (!record || current.kind === "miss") {
      await this.write(storeKey, delta, undefined, "increment")
      return delta
    }

    const base = toNumber(current.value)
    if (base === undefined) throw NotANumberError.forValue(storeKey, current.value)

    const next = base + delta
    await this.write(storeKey, next, record.expiresAt, "increment")

    return next
  }

  private async materialize(
    record: StoredRecord,
    operation: string,
  ): Promise<CacheResult<CacheValue>> {
    if (!record.value) return { kind: "miss" }

    const blobKey = record.value.S
    if (record.overflowRef === undefined || blobKey === undefined) {
      return { kind: "hit", value: decodeValue(record.value) }
    }

    if (!this.overflow) {
      throw new ClientError(
        `Value of ${record.key} lives in bucket ${record.overflowRef} but no blob storage is configured`,
        { code: "client_error", context: { key: record.key, bucket: record.overflowRef } },
      )
    }

    return this.overflow.resolve({ bucket: record.overflowRef, key: blobKey }, operation)
  }

  private async releaseSuperseded(
    previous: AttributeMap | undefined,
    operation: string,
  ): Promise<void> {
    if (!previous) return

    await this.releaseRecords([this.schema.read(previous)], operation)
  }

  /**
   * Records among `storeKeys` whose value lives in blob storage. Empty when
   * overflow is not configured.
   */
  private async findBlobOwners(
    storeKeys: readonly string[],
    operation: string,
  ): Promise<StoredRecord[]> {
    if (!this.overflow || storeKeys.length === 0) return []

    const items = await this.batches.getItems(
      storeKeys.map((key) => this.schema.keyOf(key)),
      operation,
      this.schema.releaseProjection(),
    )

    return items.map((item) => this.schema.read(item)).filter((record) => blobRefOf(record) !== undefined)
  }

  private async releaseRecords(records: readonly StoredRecord[], operation: string): Promise<void> {
    const refs = records.map(blobRefOf).filter((ref): ref is BlobRef => ref !== undefined)
    if (refs.length === 0) return

    if (!this.overflow) {
      this.logger.warn("leaked overflow blobs: no blob storage configured", {
        operation,
        blobKeys: refs.map((ref) => ref.key),
      })
      return
    }

    await this.overflow.release(refs, operation)
  }

  private keyFor(key: CacheKey): string {
    return this.keyBuilder(key, this.namespace)
  }

  private expiryFor(ttl: CacheTtl | undefined): EpochSeconds | undefined {
    return resolveExpiry(ttl, this.clock.nowMs())
  }

  private nowSeconds(): EpochSeconds {
    return toEpochSeconds(this.clock.nowMs())
  }

  private scope(operation: string, key?: string): TranslateScope {
    return {
      source: "table",
      operation,
      context: { table: this.tableName, ...(key !== undefined && { key }) },
    }
  }

  private assertOpen(): void {
    if (this.closing) {
      throw new ClientError(`${this.toString()} is closed`, { code: "client_error" })
    }
  }
}

function blobRefOf(record: StoredRecord): BlobRef | undefined {
  const key = record.value?.S
  if (record.overflowRef === undefined || key === undefined) return undefined

  return { bucket: record.overflowRef, key }
}

function toNumber(value: CacheValue): number | undefined {
  if (typeof value === "number") return value

  const text =
    typeof value === "string"
      ? value.trim()
      : value instanceof Uint8Array
        ? toText(value)?.trim()
        : undefined

  return text !== undefined && isNumericText(text) ? Number(text) : undefined
}

function toText(bytes: Uint8Array): string | undefined {
  const decoded = decodePayload(bytes)

  return typeof decoded === "string" ? decoded : undefined
}
