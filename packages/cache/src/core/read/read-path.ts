import type { TableClient } from "../../ports/table-client"
import type { EpochSeconds } from "../../ports/time"
import { guard } from "../errors/translate"
import type { ItemSchema, StoredRecord } from "../schema/cache-item"
import { isLive } from "../time/expiry"

export type ReadPathDeps = {
  client: TableClient
  schema: ItemSchema
}

export type ReadPathOptions = {
  tableName: string
}

/**
 * Point reads that hide logically expired items.
 *
 * @remarks
 * The store sweeps expired items in the background, possibly days late, so
 * every read filters on the TTL attribute itself.
 */
export class ReadPath {
  constructor(
    private readonly deps: ReadPathDeps,
    private readonly options: ReadPathOptions,
  ) {}

  /**
   * Fetch the live item stored under `key`.
   */
  async fetchLive(
    key: string,
    now: EpochSeconds,
    operation: string,
  ): Promise<StoredRecord | undefined> {
    const { client, schema } = this.deps
    const { columns } = schema

    const res = await guard(
      () =>
        client.query({
          TableName: this.options.tableName,
          KeyConditionExpression: "#pk = :key",
          FilterExpression: "attribute_not_exists(#ttl) OR #ttl > :now",
          ExpressionAttributeNames: { "#pk": columns.key, "#ttl": columns.ttl },
          ExpressionAttributeValues: {
            ":key": { S: key },
            ":now": { N: String(now) },
          },
          Limit: 1,
        }),
      { source: "table", operation, context: { table: this.options.tableName, key } },
    )

    const item = res.Items?.[0]

    return item ? schema.read(item) : undefined
  }

  /**
   * Point read of the key and expiry of a live item, leaving its value in the
   * table. Liveness is checked here rather than by a filter.
   */
  async fetchExpiry(
    key: string,
    now: EpochSeconds,
    operation: string,
  ): Promise<StoredRecord | undefined> {
    const { client, schema } = this.deps

    const res = await guard(
      () =>
        client.getItem({
          TableName: this.options.tableName,
          Key: schema.keyOf(key),
          ProjectionExpression: "#pk, #ttl",
          ExpressionAttributeNames: { "#pk": schema.columns.key, "#ttl": schema.columns.ttl },
        }),
      { source: "table", operation, context: { table: this.options.tableName, key } },
    )

    if (!res.Item) return undefined

    const record = schema.read(res.Item)

    return isLive(record.expiresAt, now) ? record : undefined
  }
}
