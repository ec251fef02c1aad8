import type { AttributeValue } from "@aws-sdk/client-dynamodb"
import type { TypedValue } from "../../ports/cache-value"
import type { EpochSeconds } from "../../ports/time"

export type AttributeMap = Record<string, AttributeValue>

/**
 * Attribute names of a cache item.
 */
export type CacheColumns = {
  /** Partition key (string). */
  key: string
  value: string
  /** Absolute expiry in epoch seconds; also the store's native TTL attribute. */
  ttl: string
  /** Bucket holding the payload when the value lives out of line. */
  overflowRef: string
}

export const DEFAULT_COLUMNS: Readonly<CacheColumns> = {
  key: "cache_key",
  value: "cache_value",
  ttl: "ttl",
  overflowRef: "overflow_ref",
}

export type StoredRecord = {
  key: string
  value?: AttributeValue
  expiresAt?: EpochSeconds
  overflowRef?: string
}

export class ItemSchema {
  constructor(readonly columns: Readonly<CacheColumns>) {}

  keyOf(key: string): AttributeMap {
    return { [this.columns.key]: { S: key } }
  }

  build(
    key: string,
    value: TypedValue,
    expiresAt?: EpochSeconds,
    overflowRef?: string,
  ): AttributeMap {
    return {
      [this.columns.key]: { S: key },
      [this.columns.value]: value,
      ...(expiresAt !== undefined && { [this.columns.ttl]: { N: String(expiresAt) } }),
      ...(overflowRef !== undefined && { [this.columns.overflowRef]: { S: overflowRef } }),
    }
  }

  read(item: AttributeMap): StoredRecord {
    const value = item[this.columns.value]
    const ttl = item[this.columns.ttl]?.N
    const overflowRef = item[this.columns.overflowRef]?.S

    return {
      key: item[this.columns.key]?.S ?? "",
      ...(value !== undefined && { value }),
      ...(ttl !== undefined && { expiresAt: Number(ttl) }),
      ...(overflowRef !== undefined && { overflowRef }),
    }
  }

  /**
   * Projection covering everything needed to release an item's blob.
   */
  releaseProjection(): { ProjectionExpression: string; ExpressionAttributeNames: Record<string, string> } {
    return {
      ProjectionExpression: "#pk, #val, #ovf",
      ExpressionAttributeNames: {
        "#pk": this.columns.key,
        "#val": this.columns.value,
        "#ovf": this.columns.overflowRef,
      },
    }
  }
}
