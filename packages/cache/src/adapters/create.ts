import { DynamoDBClient } from "@aws-sdk/client-dynamodb"
import { S3Client } from "@aws-sdk/client-s3"
import { createLogger, type Logger } from "@tablecache/logger"
import {
  type BlobStorage,
  createMemoryBlobStorage,
  createS3BlobStorage,
  type MemoryBlobStorage,
} from "@tablecache/storage"
import type { CacheConfig } from "../config/schema"
import { linearDelay } from "../core/batch/delay-policy"
import { BucketNotFoundError, TableNotFoundError } from "../core/errors/cache-error"
import { attempt, guard, translateError } from "../core/errors/translate"
import { DEFAULT_COLUMNS } from "../core/schema/cache-item"
import { TableCache, type TableCacheDeps, type TableCacheOptions } from "../core/table-cache"
import type { Clock } from "../core/time/clock"
import type { TableClient } from "../ports/table-client"
import { DynamoDbTableClient } from "./dynamodb/dynamodb-table-client"
import { MemoryTableClient, type MemoryTableClientOptions } from "./memory/memory-table-client"

export type OpenTableCacheDeps = {
  logger?: Logger
  clock?: Clock
  /**
   * Prebuilt SDK clients; the cache takes ownership of them. An S3 client
   * passed without `config.blobs` is destroyed right away.
   */
  dynamodb?: DynamoDBClient
  s3?: S3Client
}

type Clients = {
  dynamodb: DynamoDBClient
  s3: S3Client | undefined
}

/**
 * Build the store clients, check that the table (and bucket, when configured)
 * exist and return a cache that owns the clients.
 *
 * @throws ClientCreationFailedError when a client cannot be built.
 * @throws TableNotFoundError / BucketNotFoundError when a resource is missing.
 */
export async function openTableCache(
  config: CacheConfig,
  deps: OpenTableCacheDeps = {},
): Promise<TableCache> {
  const logger =
    deps.logger ??
    createLogger(
      { level: config.log.level, prettify: config.log.prettify },
      { service: "tablecache" },
    )

  const clients = buildClients(config, deps)
  const table = new DynamoDbTableClient({ client: clients.dynamodb })
  const blobs =
    clients.s3 && config.blobs
      ? createS3BlobStorage({
          client: clients.s3,
          ...(config.blobs.keyspacePrefix !== undefined && {
            keyspacePrefix: config.blobs.keyspacePrefix,
          }),
        })
      : undefined

  try {
    await verifyResources(config, table, blobs)
  } catch (err) {
    clients.dynamodb.destroy()
    clients.s3?.destroy()
    throw err
  }

  const cache = new TableCache(
    {
      client: table,
      logger,
      ...(blobs && { blobs }),
      ...(deps.clock && { clock: deps.clock }),
      ...(clients.s3 && { release: () => clients.s3?.destroy() }),
    },
    {
      ...cacheOptions(config),
      ...(config.blobs && { bucketName: config.blobs.bucket }),
    },
  )

  logger.info("cache opened", {
    table: config.table.name,
    region: config.client.region,
    ...(config.blobs && { bucket: config.blobs.bucket }),
  })

  return cache
}

/**
 * Open a cache, run `fn` with it and close it whether `fn` succeeds or not.
 */
export async function withTableCache<T>(
  config: CacheConfig,
  fn: (cache: TableCache) => Promise<T>,
  deps: OpenTableCacheDeps = {},
): Promise<T> {
  const cache = await openTableCache(config, deps)

  try {
    return await fn(cache)
  } finally {
    await cache.close()
  }
}

export type CreateMemoryTableCacheOptions = Partial<TableCacheOptions> & {
  table?: MemoryTableClientOptions
  /** Provisions an in-memory bucket of this name and enables overflow. */
  bucketName?: string
}

/**
 * A cache over an in-process table (and bucket), for tests and local runs.
 */
export function createMemoryTableCache(
  options: CreateMemoryTableCacheOptions = {},
  deps: Partial<Omit<TableCacheDeps, "client" | "blobs">> = {},
): { cache: TableCache; client: MemoryTableClient; blobs: MemoryBlobStorage | undefined } {
  const { table, ...cacheOptions } = options
  const tableName = cacheOptions.tableName ?? "cache"
  const keyColumn = cacheOptions.columns?.key ?? DEFAULT_COLUMNS.key

  const client = new MemoryTableClient({
    ...table,
    tables: [...(table?.tables ?? []), { name: tableName, keyColumn }],
  })
  const blobs = cacheOptions.bucketName
    ? createMemoryBlobStorage({ buckets: [cacheOptions.bucketName] })
    : undefined

  const cache = new TableCache(
    { ...deps, client, ...(blobs && { blobs }) },
    { ...cacheOptions, tableName },
  )

  return { cache, client, blobs }
}

function buildClients(config: CacheConfig, deps: OpenTableCacheDeps): Clients {
  const { region, endpoint } = config.client

  if (!config.blobs) deps.s3?.destroy()

  try {
    const dynamodb = deps.dynamodb ?? new DynamoDBClient({ region, ...(endpoint && { endpoint }) })
    const s3 = config.blobs
      ? (deps.s3 ??
        new S3Client({ region, ...(endpoint && { endpoint, forcePathStyle: true }) }))
      : undefined

    return { dynamodb, s3 }
  } catch (err) {
    throw translateError(err, {
      source: "table",
      operation: "connect",
      context: { region, ...(endpoint && { endpoint }) },
    })
  }
}

async function verifyResources(
  config: CacheConfig,
  table: TableClient,
  blobs: BlobStorage | undefined,
): Promise<void> {
  const tableName = config.table.name

  const described = await attempt(() => table.describeTable({ TableName: tableName }), {
    source: "table",
    operation: "connect",
    context: { table: tableName },
  })

  if (!described.ok) {
    if (described.error instanceof TableNotFoundError) {
      throw TableNotFoundError.forTable(tableName, described.error.cause)
    }
    throw described.error
  }

  if (!blobs || !config.blobs) return

  const bucket = config.blobs.bucket
  const exists = await guard(() => blobs.bucketExists(bucket), {
    source: "blob",
    operation: "connect",
    context: { bucket },
  })

  if (!exists) throw BucketNotFoundError.forBucket(bucket)
}

function cacheOptions(config: CacheConfig): TableCacheOptions {
  const { batch } = config

  return {
    tableName: config.table.name,
    region: config.client.region,
    columns: config.table.columns,
    namespace: config.table.namespace,
    batchRetry: {
      maxAttempts: batch.maxAttempts,
      delay: linearDelay({
        base: { milliseconds: batch.backoffMs },
        increment: { milliseconds: batch.backoffMs },
      }),
      ...(batch.maxElapsedMs !== undefined && { maxElapsedMs: batch.maxElapsedMs }),
    },
  }
}
