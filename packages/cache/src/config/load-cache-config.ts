import { z } from "zod/mini"
import { ConfigValidationError } from "../core/errors/cache-error"
import { type CacheConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): CacheConfig {
  return {
    client: {
      region: env.CACHE_REGION,
      ...(env.CACHE_ENDPOINT_URL !== undefined && { endpoint: env.CACHE_ENDPOINT_URL }),
    },
    table: {
      name: env.CACHE_TABLE_NAME,
      columns: {
        key: env.CACHE_KEY_COLUMN,
        value: env.CACHE_VALUE_COLUMN,
        ttl: env.CACHE_TTL_COLUMN,
        overflowRef: env.CACHE_OVERFLOW_COLUMN,
      },
      namespace: env.CACHE_NAMESPACE,
    },
    ...(env.CACHE_BUCKET_NAME !== undefined && {
      blobs: {
        bucket: env.CACHE_BUCKET_NAME,
        ...(env.CACHE_BUCKET_PREFIX !== undefined && {
          keyspacePrefix: env.CACHE_BUCKET_PREFIX,
        }),
      },
    }),
    batch: {
      maxAttempts: env.CACHE_BATCH_MAX_ATTEMPTS,
      backoffMs: env.CACHE_BATCH_BACKOFF_MS,
      ...(env.CACHE_BATCH_MAX_ELAPSED_MS !== undefined && {
        maxElapsedMs: env.CACHE_BATCH_MAX_ELAPSED_MS,
      }),
    },
    log: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Read the cache configuration from environment variables.
 *
 * @throws ConfigValidationError listing every invalid variable.
 */
export function loadCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  const result = envSchema.safeParse(env)

  if (!result.success) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { context: { variables: result.error.issues.map((issue) => issue.path.map(String).join(".")) } },
    )
  }

  return mapEnvToConfig(result.data)
}
