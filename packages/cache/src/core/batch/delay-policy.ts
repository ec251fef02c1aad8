import type { Milliseconds } from "../../ports/time"

export type Delay = { milliseconds: Milliseconds }

/**
 * Delay before the next attempt; attempt is 0-indexed.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}

export interface LinearDelayOptions {
  base: Delay

  /** Amount to add per attempt */
  increment: Delay

  /** Ceiling for a single delay. */
  max?: Delay
}

export function linearDelay(opts: LinearDelayOptions): DelayPolicy {
  const { base, increment, max } = opts

  for (const [name, delay] of [
    ["base", base],
    ["increment", increment],
    ["max", max],
  ] as const) {
    if (delay && (!Number.isFinite(delay.milliseconds) || delay.milliseconds < 0)) {
      throw new RangeError(`${name}.milliseconds must be finite and >= 0 (got ${delay.milliseconds})`)
    }
  }

  return {
    getDelay(attempt: number): Delay {
      const raw = base.milliseconds + increment.milliseconds * Math.max(0, attempt)
      const capped = max ? Math.min(raw, max.milliseconds) : raw

      return { milliseconds: Math.floor(capped) }
    },
  }
}
