import type { KeysAndAttributes, WriteRequest } from "@aws-sdk/client-dynamodb"
import type { Logger } from "@tablecache/logger"
import type { TableClient } from "../../ports/table-client"
import type { Milliseconds } from "../../ports/time"
import { BatchRetryExhaustedError } from "../errors/cache-error"
import { guard } from "../errors/translate"
import type { AttributeMap } from "../schema/cache-item"
import type { Clock } from "../time/clock"
import { type DelayPolicy, linearDelay } from "./delay-policy"

/** Store limit on keys per BatchGetItem call. */
export const BATCH_GET_LIMIT = 100

/** Store limit on requests per BatchWriteItem call. */
export const BATCH_WRITE_LIMIT = 25

export type BatchRetryPolicy = {
  /** Calls per chunk, the first one included. */
  maxAttempts: number
  delay: DelayPolicy
  /** Optional deadline per chunk, measured from its first call. */
  maxElapsedMs?: Milliseconds
}

export const DEFAULT_BATCH_RETRY: Readonly<BatchRetryPolicy> = {
  maxAttempts: 10,
  delay: linearDelay({ base: { milliseconds: 1000 }, increment: { milliseconds: 1000 } }),
}

export type BatchExecutorDeps = {
  client: TableClient
  clock: Clock
  logger: Logger
}

export type BatchExecutorOptions = {
  tableName: string
  retry: BatchRetryPolicy
}

type Projection = Pick<KeysAndAttributes, "ProjectionExpression" | "ExpressionAttributeNames">

/**
 * Splits batch requests into store-sized chunks and resubmits whatever the
 * store hands back as unprocessed, with backoff, until the retry policy gives up.
 */
export class BatchExecutor {
  constructor(
    private readonly deps: BatchExecutorDeps,
    private readonly options: BatchExecutorOptions,
  ) {
    if (!Number.isInteger(options.retry.maxAttempts) || options.retry.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1 (got ${options.retry.maxAttempts})`)
    }
  }

  /**
   * Fetch items by key. Missing keys are simply absent from the result, whose
   * order is unrelated to the order of `keys`.
   */
  async getItems(
    keys: readonly AttributeMap[],
    operation: string,
    projection?: Projection,
  ): Promise<AttributeMap[]> {
    const { tableName } = this.options
    const items: AttributeMap[] = []

    for (const batch of chunk(keys, BATCH_GET_LIMIT)) {
      await this.drain(operation, batch, async (pending) => {
        const res = await guard(
          () =>
            this.deps.client.batchGetItem({
              RequestItems: { [tableName]: { Keys: [...pending], ...projection } },
            }),
          { source: "table", operation, context: { table: tableName } },
        )

        items.push(...(res.Responses?.[tableName] ?? []))

        return res.UnprocessedKeys?.[tableName]?.Keys ?? []
      })
    }

    return items
  }

  async writeItems(requests: readonly WriteRequest[], operation: string): Promise<void> {
    const { tableName } = this.options

    for (const batch of chunk(requests, BATCH_WRITE_LIMIT)) {
      await this.drain(operation, batch, async (pending) => {
        const res = await guard(
          () => this.deps.client.batchWriteItem({ RequestItems: { [tableName]: [...pending] } }),
          { source: "table", operation, context: { table: tableName } },
        )

        return res.UnprocessedItems?.[tableName] ?? []
      })
    }
  }

  private async drain<T>(
    operation: string,
    initial: readonly T[],
    submit: (pending: readonly T[]) => Promise<readonly T[]>,
  ): Promise<void> {
    const { clock, logger } = this.deps
    const { maxAttempts, delay, maxElapsedMs } = this.options.retry
    const startedAt = clock.nowMs()

    let pending = initial

    for (let attempt = 1; ; attempt++) {
      pending = await submit(pending)
      if (pending.length === 0) return

      const elapsedMs = clock.nowMs() - startedAt
      const delayMs = delay.getDelay(attempt - 1).milliseconds
      const outOfAttempts = attempt >= maxAttempts
      const outOfTime = maxElapsedMs !== undefined && elapsedMs + delayMs > maxElapsedMs

      if (outOfAttempts || outOfTime) {
        throw BatchRetryExhaustedError.after({
          operation,
          attempts: attempt,
          elapsedMs,
          pending: pending.length,
          reason: outOfAttempts ? "max_attempts" : "max_elapsed",
        })
      }

      logger.warn("resubmitting unprocessed batch items", {
        operation,
        attempt,
        pending: pending.length,
        delayMs,
      })

      await clock.sleep(delayMs)
    }
  }
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}
