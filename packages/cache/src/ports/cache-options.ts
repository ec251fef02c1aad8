import type { Milliseconds, Seconds } from "./time"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type UntilDateTtl = { kind: "until"; expiresAt: Date }

/**
 * Lifetime of a cached entry. A zero-length duration means "never expires".
 */
export type CacheTtl = SecondsTtl | MillisecondsTtl | UntilDateTtl

export type CacheSetOptions = {
  ttl: CacheTtl
}

/** `ttl()` result for a live entry that never expires. */
export const NO_TTL = -1

/** `ttl()` result for a key that is absent or logically expired. */
export const KEY_NOT_FOUND = -2
