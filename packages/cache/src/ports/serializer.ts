import type { CacheValue } from "./cache-value"

/**
 * Converts application values to and from the plain values the cache stores.
 */
export interface Serializer<T> {
  serialize(value: T): CacheValue
  deserialize(value: CacheValue): T
}
