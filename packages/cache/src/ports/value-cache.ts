import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"
import type { CacheValue } from "./cache-value"

/**
 * ValueCache is a remote cache of plain values with logical expiry.
 *
 * @remarks
 * - An entry past its expiry is never returned, even while the backing store
 *   still holds it.
 * - Keys are namespaced by the implementation; callers pass logical keys.
 * - Every failure surfaces as a `CacheError`; raw store errors never escape.
 */
export interface ValueCache<T = CacheValue> {
  /**
   * Retrieve a value. A stored `null` is a hit.
   */
  get(key: CacheKey): Promise<CacheResult<T>>

  /**
   * Retrieve many values at once.
   *
   * @remarks
   * - The returned map is keyed by the requested keys, in request order.
   * - Expired entries are misses, exactly as in {@link get}.
   */
  multiGet(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>>

  /**
   * Store a value, overwriting any previous entry.
   *
   * @param opts Optional write options (e.g. TTL).
   */
  set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void>

  /**
   * Store many values. All entries share the same write options.
   *
   * @remarks
   * When the same key appears more than once the last entry wins.
   */
  multiSet(entries: readonly CacheEntry<T>[], opts?: Partial<CacheSetOptions>): Promise<void>

  /**
   * Store a value only when no live entry exists for the key.
   *
   * @throws KeyAlreadyExistsError when a live entry is present.
   */
  add(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void>

  /**
   * Delete an entry.
   *
   * @returns `true` when a live entry was removed.
   */
  delete(key: CacheKey): Promise<boolean>

  multiDelete(keys: readonly CacheKey[]): Promise<void>

  /**
   * Delete every entry under a namespace (the cache namespace by default).
   *
   * @remarks
   * Implemented as a full table scan; not meant for hot paths.
   *
   * @returns Number of stored records removed, expired ones included.
   */
  clear(namespace?: string): Promise<number>

  exists(key: CacheKey): Promise<boolean>

  /**
   * Add `delta` to a numeric entry, creating it at `delta` when absent.
   *
   * @throws NotANumberError when the stored value cannot be read as a number.
   */
  increment(key: CacheKey, delta?: number): Promise<number>

  /**
   * Change the expiry of a live entry. Omitting `ttl` makes it permanent.
   *
   * @returns `false` when there is no live entry to update.
   */
  expire(key: CacheKey, ttl?: CacheSetOptions["ttl"]): Promise<boolean>

  /**
   * Seconds until expiry, `NO_TTL` for a permanent entry or `KEY_NOT_FOUND`.
   */
  ttl(key: CacheKey): Promise<number>

  /**
   * Release the underlying clients. Calling it again is a no-op.
   */
  close(): Promise<void>
}
