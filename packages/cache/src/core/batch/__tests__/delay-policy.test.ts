import { linearDelay } from "../delay-policy"

describe("linearDelay", () => {
  it("returns the base delay on attempt 0", () => {
    const policy = linearDelay({
      base: { milliseconds: 1000 },
      increment: { milliseconds: 1000 },
    })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 1000 })
  })

  it("adds the increment on each attempt", () => {
    const policy = linearDelay({
      base: { milliseconds: 100 },
      increment: { milliseconds: 50 },
    })

    expect([0, 1, 2, 3].map((n) => policy.getDelay(n).milliseconds)).toEqual([100, 150, 200, 250])
  })

  it("caps at max", () => {
    const policy = linearDelay({
      base: { milliseconds: 1000 },
      increment: { milliseconds: 1000 },
      max: { milliseconds: 2500 },
    })

    expect(policy.getDelay(1)).toEqual({ milliseconds: 2000 })
    expect(policy.getDelay(5)).toEqual({ milliseconds: 2500 })
  })

  it("treats negative attempts as attempt 0", () => {
    const policy = linearDelay({
      base: { milliseconds: 100 },
      increment: { milliseconds: 50 },
    })

    expect(policy.getDelay(-3)).toEqual({ milliseconds: 100 })
  })

  it("rejects negative or non-finite delays", () => {
    expect(() =>
      linearDelay({ base: { milliseconds: -1 }, increment: { milliseconds: 0 } }),
    ).toThrow("base.milliseconds must be finite and >= 0 (got -1)")
    expect(() =>
      linearDelay({ base: { milliseconds: 0 }, increment: { milliseconds: Number.NaN } }),
    ).toThrow(RangeError)
  })
})
