/**
 * Key as the caller passes it, before the namespace is applied.
 */
export type CacheKey = string

/**
 * Builds the key that is actually stored from a caller key and the cache namespace.
 */
export type KeyBuilder = (key: CacheKey, namespace: string) => string
