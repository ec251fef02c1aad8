import type { EpochSeconds, Milliseconds } from "../../ports/time"

export interface Clock {
  nowMs(): Milliseconds
  sleep(ms: Milliseconds): Promise<void>
}

export class SystemClock implements Clock {
  nowMs(): Milliseconds {
    return Date.now()
  }

  sleep(ms: Milliseconds): Promise<void> {
    if (ms <= 0) return Promise.resolve()

    return new Promise((resolve) => {
      setTimeout(resolve, ms)
    })
  }
}

/**
 * Manually driven clock. `sleep` advances time instead of waiting and records
 * each requested delay.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  readonly sleeps: Milliseconds[] = []

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds): Promise<void> {
    this.sleeps.push(ms)
    this.advance(Math.max(0, ms))
  }
}

export function toEpochSeconds(ms: Milliseconds): EpochSeconds {
  return Math.floor(ms / 1000)
}
