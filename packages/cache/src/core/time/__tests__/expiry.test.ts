import { T0 } from "../../../tests/utils/cache-test-helpers"
import { InvalidInputError } from "../../errors/cache-error"
import { FakeClock, toEpochSeconds } from "../clock"
import { isLive, resolveExpiry } from "../expiry"

describe("resolveExpiry", () => {
  it("returns nothing without a ttl", () => {
    expect(resolveExpiry(undefined, T0)).toBeUndefined()
  })

  it("adds durations to now", () => {
    expect(resolveExpiry({ kind: "seconds", seconds: 60 }, T0)).toBe(1_700_000_060)
    expect(resolveExpiry({ kind: "milliseconds", milliseconds: 1500 }, T0)).toBe(1_700_000_002)
  })

  it("rounds a duration up so the entry never expires early", () => {
    expect(resolveExpiry({ kind: "seconds", seconds: 1 }, T0 + 999)).toBe(1_700_000_002)
    expect(resolveExpiry({ kind: "milliseconds", milliseconds: 1 }, T0)).toBe(1_700_000_001)
    expect(isLive(1_700_000_002, toEpochSeconds(T0 + 1999))).toBe(true)
  })

  it("rounds an absolute date down", () => {
    expect(resolveExpiry({ kind: "until", expiresAt: new Date(T0 + 1500) }, T0)).toBe(
      1_700_000_001,
    )
  })

  it("treats a zero duration as no expiry", () => {
    expect(resolveExpiry({ kind: "seconds", seconds: 0 }, T0)).toBeUndefined()
    expect(resolveExpiry({ kind: "milliseconds", milliseconds: 0 }, T0)).toBeUndefined()
  })

  it("uses an absolute date as is", () => {
    expect(resolveExpiry({ kind: "until", expiresAt: new Date(T0 + 90_000) }, T0)).toBe(
      1_700_000_090,
    )
  })

  it("rejects negative and non-finite durations", () => {
    expect(() => resolveExpiry({ kind: "seconds", seconds: -1 }, T0)).toThrow(
      "ttl must be a finite, non-negative duration (got -1000ms)",
    )
    expect(() => resolveExpiry({ kind: "seconds", seconds: Number.NaN }, T0)).toThrow(
      InvalidInputError,
    )
  })

  it("rejects invalid dates", () => {
    expect(() => resolveExpiry({ kind: "until", expiresAt: new Date("nope") }, T0)).toThrow(
      "ttl.expiresAt is not a valid date",
    )
  })
})

describe("isLive", () => {
  it("is live without an expiry", () => {
    expect(isLive(undefined, 100)).toBe(true)
  })

  it("expires at the expiry second itself", () => {
    expect(isLive(100, 99)).toBe(true)
    expect(isLive(100, 100)).toBe(false)
    expect(isLive(100, 101)).toBe(false)
  })
})

describe("FakeClock", () => {
  it("advances on sleep and records each delay", async () => {
    const clock = new FakeClock(T0)

    await clock.sleep(250)
    await clock.sleep(-5)

    expect(clock.nowMs()).toBe(T0 + 250)
    expect(clock.sleeps).toStrictEqual([250, -5])
  })

  it("floors to whole epoch seconds", () => {
    expect(toEpochSeconds(T0 + 999)).toBe(1_700_000_000)
  })
})
