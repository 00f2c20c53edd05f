export interface Clock {
  now(): number; // ms epoch
}

export class SystemClock implements Clock {
  now() { return Date.now(); }
}

/**
 * Never goes backwards: a wall-clock step back (NTP, manual change) is clamped
 * to the last value handed out.
 */
export class MonotonicClock implements Clock {
  private last = Number.NEGATIVE_INFINITY;

  constructor(private readonly source: Clock = new SystemClock()) {}

  now() {
    const t = this.source.now();
    if (t > this.last) this.last = t;
    return this.last;
  }
}
