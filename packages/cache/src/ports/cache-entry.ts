import type { CacheKey } from "./cache-key"

/** One key/value pair of a `multiSet` batch. Later duplicates of a key win. */
export type CacheEntry<T> = readonly [CacheKey, T]
