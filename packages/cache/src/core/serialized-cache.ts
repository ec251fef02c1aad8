import type { CacheEntry } from "../ports/cache-entry"
import type { CacheKey } from "../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type { CacheValue } from "../ports/cache-value"
import type { Serializer } from "../ports/serializer"
import type { ValueCache } from "../ports/value-cache"

/**
 * Typed view over a {@link ValueCache} of plain values.
 */
export class SerializedCache<T> implements ValueCache<T> {
  constructor(
    private readonly cache: ValueCache<CacheValue>,
    private readonly serializer: Serializer<T>,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<T>> {
    return this.decodeResult(await this.cache.get(key))
  }

  async multiGet(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>> {
    const res = await this.cache.multiGet(keys)

    const out = new Map<CacheKey, CacheResult<T>>()
    for (const [k, v] of res.entries()) {
      out.set(k, this.decodeResult(v))
    }

    return out
  }

  async set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void> {
    await this.cache.set(key, this.serializer.serialize(value), opts)
  }

  async multiSet(entries: readonly CacheEntry<T>[], opts?: Partial<CacheSetOptions>): Promise<void> {
    const encoded: readonly CacheEntry<CacheValue>[] = entries.map(
      ([k, v]) => [k, this.serializer.serialize(v)] as const,
    )
    await this.cache.multiSet(encoded, opts)
  }

  async add(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void> {
    await this.cache.add(key, this.serializer.serialize(value), opts)
  }

  delete(key: CacheKey): Promise<boolean> {
    return this.cache.delete(key)
  }

  multiDelete(keys: readonly CacheKey[]): Promise<void> {
    return this.cache.multiDelete(keys)
  }

  clear(namespace?: string): Promise<number> {
    return this.cache.clear(namespace)
  }

  exists(key: CacheKey): Promise<boolean> {
    return this.cache.exists(key)
  }

  increment(key: CacheKey, delta?: number): Promise<number> {
    return this.cache.increment(key, delta)
  }

  expire(key: CacheKey, ttl?: CacheTtl): Promise<boolean> {
    return this.cache.expire(key, ttl)
  }

  ttl(key: CacheKey): Promise<number> {
    return this.cache.ttl(key)
  }

  close(): Promise<void> {
    return this.cache.close()
  }

  private decodeResult(res: CacheResult<CacheValue>): CacheResult<T> {
    if (res.kind === "miss") return res

    return { kind: "hit", value: this.serializer.deserialize(res.value) }
  }
}
