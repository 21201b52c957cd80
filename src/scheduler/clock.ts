/** Epoch-millisecond clock. */
export type Clock = () => number;

/** A clock that only moves when told to; drives virtual-time test runs. */
export class ManualClock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): number {
    this.current += Math.max(0, ms);
    return this.current;
  }

  /** Move forward to `ms`; never moves backwards. */
  advanceTo(ms: number): number {
    this.current = Math.max(this.current, ms);
    return this.current;
  }

  /** A bound Clock function reading this clock. */
  asClock(): Clock {
    return () => this.current;
  }
}
