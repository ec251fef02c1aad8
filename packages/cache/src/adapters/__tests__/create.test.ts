import { HeadBucketCommand, NotFound, PutObjectCommand, S3Client } from "@aws-sdk/client-s3"
import type { CacheConfig } from "../../config/schema"
import { BucketNotFoundError, TableNotFoundError } from "../../core/errors/cache-error"
import { DEFAULT_COLUMNS } from "../../core/schema/cache-item"
import { FakeClock } from "../../core/time/clock"
import { numberedEntries, T0 } from "../../tests/utils/cache-test-helpers"
import { createFakeDynamoDbClient } from "../../tests/utils/fake-dynamodb-client"
import { RecordingLogger } from "../../tests/utils/recording-logger"
import { createMemoryTableCache, openTableCache, withTableCache } from "../create"
import { MemoryTableClient, type MemoryTableClientOptions } from "../memory/memory-table-client"

const BUCKET = "cache-overflow"

function config(overrides: Partial<CacheConfig> = {}): CacheConfig {
  return {
    client: { region: "us-east-1" },
    table: { name: "cache", columns: { ...DEFAULT_COLUMNS }, namespace: "" },
    batch: { maxAttempts: 3, backoffMs: 10 },
    log: { level: "info", prettify: false },
    ...overrides,
  }
}

function fakeS3(buckets: readonly string[]) {
  const client = new S3Client({
    region: "us-east-1",
    credentials: { accessKeyId: "test", secretAccessKey: "test-secret" },
  })

  const sent: unknown[] = []

  const handle = async (command: unknown): Promise<unknown> => {
    sent.push(command)
    if (command instanceof HeadBucketCommand && buckets.includes(command.input.Bucket ?? "")) {
      return {}
    }
    if (command instanceof PutObjectCommand && buckets.includes(command.input.Bucket ?? "")) {
      return {}
    }
    throw new NotFound({ $metadata: { httpStatusCode: 404 }, message: "NotFound" })
  }

  vi.spyOn(client, "send").mockImplementation(handle)
  const destroy = vi.spyOn(client, "destroy")

  return { client, destroy, sent }
}

function setup(options: Omit<MemoryTableClientOptions, "tables"> = {}, withTable = true) {
  const memory = new MemoryTableClient({
    ...options,
    tables: withTable ? [{ name: "cache", keyColumn: DEFAULT_COLUMNS.key }] : [],
  })
  const dynamodb = createFakeDynamoDbClient(memory)
  const clock = new FakeClock(T0)
  const logger = new RecordingLogger()

  return { memory, dynamodb, clock, logger }
}

describe("openTableCache", () => {
  it("opens a working cache over the given clients", async () => {
    const { dynamodb, clock, logger } = setup()

    const cache = await openTableCache(config(), { dynamodb: dynamodb.client, clock, logger })
    await cache.set("k", "v")

    expect(await cache.get("k")).toStrictEqual({ kind: "hit", value: "v" })
    expect(cache.toString()).toBe("TableCache (us-east-1:cache)")
    expect(logger.at("info")).toStrictEqual([
      { level: "info", message: "cache opened", meta: { table: "cache", region: "us-east-1" } },
    ])
  })

  it("applies the configured batch backoff", async () => {
    const { dynamodb, clock, logger } = setup({ maxItemsPerBatchWriteCall: 10 })
    const cache = await openTableCache(config(), { dynamodb: dynamodb.client, clock, logger })

    await cache.multiSet(numberedEntries(25))

    expect(clock.sleeps).toStrictEqual([10, 20])
  })

  it("fails with TableNotFound and releases the client when the table is missing", async () => {
    const { dynamodb, clock, logger } = setup({}, false)

    const err = await openTableCache(config(), { dynamodb: dynamodb.client, clock, logger }).catch(
      (e: unknown) => e,
    )

    expect(err).toBeInstanceOf(TableNotFoundError)
    expect(err).toMatchObject({ message: "Table cache does not exist", context: { table: "cache" } })
    expect(dynamodb.destroy).toHaveBeenCalledTimes(1)
  })

  it("fails with BucketNotFound when the overflow bucket is missing", async () => {
    const { dynamodb, clock, logger } = setup()
    const s3 = fakeS3([])

    await expect(
      openTableCache(config({ blobs: { bucket: BUCKET } }), {
        dynamodb: dynamodb.client,
        s3: s3.client,
        clock,
        logger,
      }),
    ).rejects.toThrow(new BucketNotFoundError(`Bucket ${BUCKET} does not exist`))
    expect(dynamodb.destroy).toHaveBeenCalledTimes(1)
    expect(s3.destroy).toHaveBeenCalledTimes(1)
  })

  it("owns both clients once open", async () => {
    const { dynamodb, clock, logger } = setup()
    const s3 = fakeS3([BUCKET])

    const cache = await openTableCache(config({ blobs: { bucket: BUCKET } }), {
      dynamodb: dynamodb.client,
      s3: s3.client,
      clock,
      logger,
    })

    expect(cache.toString()).toBe(`TableCache (us-east-1:cache, bucket=${BUCKET})`)

    await cache.close()
    await cache.close()

    expect(dynamodb.destroy).toHaveBeenCalledTimes(1)
    expect(s3.destroy).toHaveBeenCalledTimes(1)
  })

  it("destroys an S3 client it was given when no bucket is configured", async () => {
    const { dynamodb, clock, logger } = setup()
    const s3 = fakeS3([BUCKET])

    const cache = await openTableCache(config(), {
      dynamodb: dynamodb.client,
      s3: s3.client,
      clock,
      logger,
    })

    expect(s3.destroy).toHaveBeenCalledTimes(1)
    expect(s3.sent).toStrictEqual([])
    expect(cache.toString()).toBe("TableCache (us-east-1:cache)")

    await cache.close()
    expect(s3.destroy).toHaveBeenCalledTimes(1)
  })

  it("writes overflow objects under the configured keyspace prefix", async () => {
    const { dynamodb, clock, logger } = setup()
    const s3 = fakeS3([BUCKET])

    const cache = await openTableCache(
      config({ blobs: { bucket: BUCKET, keyspacePrefix: "tablecache" } }),
      { dynamodb: dynamodb.client, s3: s3.client, clock, logger },
    )
    await cache.set("k", "x".repeat(500 * 1024))

    const put = s3.sent.find((command) => command instanceof PutObjectCommand)
    expect(put).toBeInstanceOf(PutObjectCommand)
    if (!(put instanceof PutObjectCommand)) return
    expect(put.input.Key).toBe("tablecache/cache/k")
  })
})

describe("withTableCache", () => {
  it("returns what the callback returns and closes the cache", async () => {
    const { dynamodb, clock, logger } = setup()

    const count = await withTableCache(
      config(),
      async (cache) => {
        await cache.multiSet(numberedEntries(3))
        return cache.clear()
      },
      { dynamodb: dynamodb.client, clock, logger },
    )

    expect(count).toBe(3)
    expect(dynamodb.destroy).toHaveBeenCalledTimes(1)
  })

  it("closes the cache when the callback fails", async () => {
    const { dynamodb, clock, logger } = setup()
    const failure = new Error("callback failed")

    await expect(
      withTableCache(
        config(),
        async () => {
          throw failure
        },
        { dynamodb: dynamodb.client, clock, logger },
      ),
    ).rejects.toBe(failure)
    expect(dynamodb.destroy).toHaveBeenCalledTimes(1)
  })
})

describe("createMemoryTableCache", () => {
  it("provisions the table and, on request, the bucket", () => {
    const plain = createMemoryTableCache({ tableName: "sessions" })
    const overflow = createMemoryTableCache({ bucketName: BUCKET })

    expect(plain.client.size("sessions")).toBe(0)
    expect(plain.blobs).toBeUndefined()
    expect(overflow.blobs?.size(BUCKET)).toBe(0)
    expect(overflow.cache.toString()).toBe(`TableCache (local:cache, bucket=${BUCKET})`)
  })
})
