import type { CacheTtl } from "../../ports/cache-options"
import type { EpochSeconds, Milliseconds } from "../../ports/time"
import { InvalidInputError } from "../errors/cache-error"
import { toEpochSeconds } from "./clock"

/**
 * Absolute expiry instant for a TTL, or `undefined` when the entry never expires.
 * Durations round up to the next whole second; absolute dates round down.
 *
 * @throws InvalidInputError for negative or non-finite durations and invalid dates.
 */
export function resolveExpiry(
  ttl: CacheTtl | undefined,
  nowMs: Milliseconds,
): EpochSeconds | undefined {
  if (ttl === undefined) return undefined

  switch (ttl.kind) {
    case "seconds":
      return fromDuration(ttl.seconds * 1000, nowMs)
    case "milliseconds":
      return fromDuration(ttl.milliseconds, nowMs)
    case "until": {
      const at = ttl.expiresAt.getTime()
      if (!Number.isFinite(at)) throw new InvalidInputError("ttl.expiresAt is not a valid date")

      return toEpochSeconds(at)
    }
  }
}

function fromDuration(durationMs: Milliseconds, nowMs: Milliseconds): EpochSeconds | undefined {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    throw new InvalidInputError(`ttl must be a finite, non-negative duration (got ${durationMs}ms)`, {
      context: { durationMs },
    })
  }

  if (durationMs === 0) return undefined

  // Rounded up: an entry lives at least as long as asked, never expires early.
  return Math.ceil((nowMs + durationMs) / 1000)
}

/**
 * Whether an entry with this expiry is still visible at `now`.
 */
export function isLive(expiresAt: EpochSeconds | undefined, now: EpochSeconds): boolean {
  return expiresAt === undefined || expiresAt > now
}
