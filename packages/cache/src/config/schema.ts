import { type LogLevelName, logLevelNames } from "@tablecache/logger"
import { z } from "zod/mini"
import type { CacheColumns } from "../core/schema/cache-item"
import type { Milliseconds } from "../ports/time"

const nonEmpty = () => z.string().check(z.minLength(1))

export const envSchema = z.object({
  CACHE_TABLE_NAME: nonEmpty(),
  CACHE_BUCKET_NAME: z.optional(nonEmpty()),
  CACHE_BUCKET_PREFIX: z.optional(nonEmpty()),

  CACHE_REGION: z._default(nonEmpty(), "us-east-1"),
  CACHE_ENDPOINT_URL: z.optional(z.url()),

  CACHE_KEY_COLUMN: z._default(nonEmpty(), "cache_key"),
  CACHE_VALUE_COLUMN: z._default(nonEmpty(), "cache_value"),
  CACHE_TTL_COLUMN: z._default(nonEmpty(), "ttl"),
  CACHE_OVERFLOW_COLUMN: z._default(nonEmpty(), "overflow_ref"),
  CACHE_NAMESPACE: z._default(z.string(), ""),

  CACHE_BATCH_MAX_ATTEMPTS: z._default(z.coerce.number().check(z.gte(1), z.multipleOf(1)), 10),
  CACHE_BATCH_BACKOFF_MS: z._default(z.coerce.number().check(z.gte(0)), 1000),
  CACHE_BATCH_MAX_ELAPSED_MS: z.optional(z.coerce.number().check(z.gte(0))),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type CacheConfig = {
  client: {
    region: string
    /** Local DynamoDB / S3 compatible endpoint. */
    endpoint?: string
  }

  table: {
    name: string
    columns: CacheColumns
    namespace: string
  }

  /** Present when values over the item size limit may overflow to blob storage. */
  blobs?: {
    bucket: string
    /** Prepended to every object key in the bucket. */
    keyspacePrefix?: string
  }

  batch: {
    maxAttempts: number
    /** Delay before the first resubmission; each further one waits this much longer. */
    backoffMs: Milliseconds
    maxElapsedMs?: Milliseconds
  }

  log: {
    level: LogLevelName
    prettify: boolean
  }
}
