/**
 * Plain values the cache stores natively.
 *
 * @remarks
 * Anything richer goes through a {@link Serializer} first.
 */
export type CacheValue = string | number | boolean | Uint8Array | null

/**
 * Tagged wire form of a {@link CacheValue}. Exactly one tag is populated.
 */
export type TypedValue =
  | { S: string }
  | { N: string }
  | { B: Uint8Array }
  | { BOOL: boolean }
  | { NULL: true }
