/**
 * Per-driver circuit breaker.
 *
 * States: CLOSED → OPEN → HALF_OPEN → CLOSED.
 *
 * - CLOSED: calls pass; outcomes are kept in a sliding time window. When
 *   the window holds at least `minimumCalls` and the failure ratio exceeds
 *   `failureRatio`, the circuit opens.
 * - OPEN: calls fail fast with CircuitOpenError, the driver is not invoked.
 *   After `cooldownMs` the next call moves the circuit to HALF_OPEN.
 * - HALF_OPEN: exactly one trial call passes. Success closes the circuit,
 *   failure reopens it with a fresh cooldown. Calls admitted while still
 *   CLOSED that finish now are ignored.
 *
 * Only provider-health failures count: a permanent provider rejection or a
 * local contract/credential error means the provider (or we) answered, so
 * they are recorded as successes.
 */

import { BreakerConfig, DEFAULT_BREAKER_CONFIG } from '../config';
import { OrchestratorError, ProviderError, driverUnavailableError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { Clock } from '../scheduler/clock';

export enum CircuitState {
  Closed = 'CLOSED',
  Open = 'OPEN',
  HalfOpen = 'HALF_OPEN',
}

export class CircuitOpenError extends OrchestratorError {
  constructor(
    public readonly driverId: string,
    public readonly retryAfterMs: number,
  ) {
    super(driverUnavailableError(driverId, retryAfterMs));
    this.name = 'CircuitOpenError';
  }
}

/** Default failure classifier: transient provider trouble only. */
export function countsAsBreakerFailure(err: unknown): boolean {
  if (err instanceof ProviderError) return err.retryable;
  if (err instanceof OrchestratorError) return false;
  return true;
}

export interface CircuitBreakerOptions {
  config?: Partial<BreakerConfig>;
  now?: Clock;
  logger?: Logger;
  isFailure?: (err: unknown) => boolean;
}

export interface CircuitSnapshot {
  state: CircuitState;
  calls: number;
  failures: number;
  openedAt?: number;
}

interface Outcome {
  at: number;
  failed: boolean;
}

export class CircuitBreaker {
  private readonly config: BreakerConfig;
  private readonly now: Clock;
  private readonly log: Logger;
  private readonly isFailure: (err: unknown) => boolean;

  private state: CircuitState = CircuitState.Closed;
  private outcomes: Outcome[] = [];
  private openedAt = 0;
  private trialInFlight = false;

  constructor(
    public readonly driverId: string,
    options: CircuitBreakerOptions = {},
  ) {
    this.config = { ...DEFAULT_BREAKER_CONFIG, ...options.config };
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ component: 'circuit-breaker', driverId });
    this.isFailure = options.isFailure ?? countsAsBreakerFailure;
  }

  /** Current state, after applying an elapsed cooldown. */
  getState(): CircuitState {
    this.refresh(this.now());
    return this.state;
  }

  /** Whether a call issued now would reach the driver. Does not claim the trial slot. */
  isCallPermitted(): boolean {
    const state = this.getState();
    if (state === CircuitState.Closed) return true;
    if (state === CircuitState.HalfOpen) return !this.trialInFlight;
    return false;
  }

  /** Milliseconds until the circuit admits a call; 0 when it does now. */
  retryAfterMs(): number {
    if (this.isCallPermitted()) return 0;
    if (this.state === CircuitState.Open) {
      return Math.max(0, this.openedAt + this.config.cooldownMs - this.now());
    }
    return this.config.cooldownMs;
  }

  /** Run `fn` through the breaker. */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const state = this.getState();
    if (state === CircuitState.Open) {
      throw new CircuitOpenError(this.driverId, this.retryAfterMs());
    }

    const isTrial = state === CircuitState.HalfOpen;
    if (isTrial) {
      if (this.trialInFlight) {
        throw new CircuitOpenError(this.driverId, this.config.cooldownMs);
      }
      this.trialInFlight = true;
    }

    try {
      const result = await fn();
      this.record(false, isTrial);
      return result;
    } catch (err) {
      this.record(this.isFailure(err), isTrial);
      throw err;
    } finally {
      if (isTrial) this.trialInFlight = false;
    }
  }

  snapshot(): CircuitSnapshot {
    const now = this.now();
    this.refresh(now);
    this.prune(now);
    return {
      state: this.state,
      calls: this.outcomes.length,
      failures: this.outcomes.filter((o) => o.failed).length,
      openedAt: this.state === CircuitState.Closed ? undefined : this.openedAt,
    };
  }

  private record(failed: boolean, isTrial: boolean): void {
    const now = this.now();

    if (this.state !== CircuitState.Closed && !isTrial) {
      // A call admitted before the circuit opened finished late; only the
      // trial decides what happens next.
      return;
    }

    if (this.state === CircuitState.HalfOpen) {
      if (failed) {
        this.open(now, 'trial call failed');
      } else {
        this.state = CircuitState.Closed;
        this.outcomes = [];
        this.log.info('Circuit closed after successful trial call');
      }
      return;
    }

    if (this.state === CircuitState.Open) return;

    this.outcomes.push({ at: now, failed });
    this.prune(now);

    const calls = this.outcomes.length;
    const failures = this.outcomes.filter((o) => o.failed).length;
    if (failed && calls >= this.config.minimumCalls && failures / calls > this.config.failureRatio) {
      this.open(now, `${failures}/${calls} calls failed within ${this.config.windowMs}ms`);
    }
  }

  private open(now: number, reason: string): void {
    this.state = CircuitState.Open;
    this.openedAt = now;
    this.outcomes = [];
    this.log.warn('Circuit opened', { reason, cooldownMs: this.config.cooldownMs });
  }

  private refresh(now: number): void {
    if (this.state === CircuitState.Open && now - this.openedAt >= this.config.cooldownMs) {
      this.state = CircuitState.HalfOpen;
      this.log.info('Circuit half-open; allowing one trial call');
    }
  }

  private prune(now: number): void {
    const cutoff = now - this.config.windowMs;
    this.outcomes = this.outcomes.filter((o) => o.at > cutoff);
  }
}

/**
 * One breaker per driver id, created on first use. A failing provider
 * never affects another driver's breaker.
 */
export class CircuitBreakerRegistry {
  private breakers = new Map<string, CircuitBreaker>();

  constructor(private readonly options: CircuitBreakerOptions = {}) {}

  get(driverId: string): CircuitBreaker {
    let breaker = this.breakers.get(driverId);
    if (!breaker) {
      breaker = new CircuitBreaker(driverId, this.options);
      this.breakers.set(driverId, breaker);
    }
    return breaker;
  }

  snapshot(): Record<string, CircuitSnapshot> {
    const result: Record<string, CircuitSnapshot> = {};
    for (const [driverId, breaker] of this.breakers) {
      result[driverId] = breaker.snapshot();
    }
    return result;
  }
}
