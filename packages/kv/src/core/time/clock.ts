export type Milliseconds = number

export interface Clock {
  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export class SystemClock implements Clock {
  nowMs(): Milliseconds {
    return Date.now()
  }
}

/**
 * Manually driven clock for expiry tests.
 */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }
}
