/**
 * A live item. Spilled values are read back from blob storage before a hit
 * is returned, so `value` is always the full value.
 */
export type CacheHit<T> = {
  kind: "hit"
  value: T
}

/**
 * No item, an item whose ttl has passed, or a spilled item whose blob is gone.
 */
export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss
