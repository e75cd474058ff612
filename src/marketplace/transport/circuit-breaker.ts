export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
  maxCooldownMs: number;
}

export interface CircuitSnapshot {
  endpoint: string;
  state: CircuitState;
  recentFailures: number;
  cooldownMs: number;
  openUntil: number | null;
}

/**
 * Per-endpoint breaker. Opens after `failureThreshold` consecutive failures
 * inside `windowMs`; after the cool-down one probe is let through. A failed
 * probe reopens with a doubled cool-down (capped at `maxCooldownMs`).
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures: number[] = [];
  private cooldownMs: number;
  private openUntil: number | null = null;
  private probeInFlight = false;

  constructor(
    readonly endpoint: string,
    private readonly options: CircuitBreakerOptions,
    private readonly now: () => number,
  ) {
    this.cooldownMs = options.cooldownMs;
  }

  /** Whether a call may go out now. In HALF_OPEN only one probe is admitted. */
  tryAcquire(): boolean {
    if (this.state === 'CLOSED') return true;
    if (this.state === 'OPEN') {
      if (this.openUntil !== null && this.now() >= this.openUntil) {
        this.state = 'HALF_OPEN';
        this.probeInFlight = true;
        return true;
      }
      return false;
    }
    if (this.probeInFlight) return false;
    this.probeInFlight = true;
    return true;
  }

  recordSuccess() {
    this.failures = [];
    this.probeInFlight = false;
    if (this.state !== 'CLOSED') {
      this.state = 'CLOSED';
      this.openUntil = null;
      this.cooldownMs = this.options.cooldownMs;
    }
  }

  recordFailure() {
    const current = this.now();
    if (this.state === 'HALF_OPEN') {
      this.probeInFlight = false;
      this.open(Math.min(this.cooldownMs * 2, this.options.maxCooldownMs));
      return;
    }
    if (this.state === 'OPEN') return;
    this.failures = this.failures.filter((at) => current - at < this.options.windowMs);
    this.failures.push(current);
    if (this.failures.length >= this.options.failureThreshold) {
      this.open(this.cooldownMs);
    }
  }

  /** Outcome that says nothing about endpoint health (e.g. HTTP 429); frees the probe slot. */
  release() {
    this.probeInFlight = false;
  }

  isOpen() {
    return this.state === 'OPEN' && this.openUntil !== null && this.now() < this.openUntil;
  }

  remainingOpenMs() {
    if (this.openUntil === null) return 0;
    return Math.max(0, this.openUntil - this.now());
  }

  snapshot(): CircuitSnapshot {
    return {
      endpoint: this.endpoint,
      state: this.state,
      recentFailures: this.failures.length,
      cooldownMs: this.cooldownMs,
      openUntil: this.openUntil,
    };
  }

  private open(cooldownMs: number) {
    this.state = 'OPEN';
    this.cooldownMs = cooldownMs;
    this.openUntil = this.now() + cooldownMs;
    this.failures = [];
  }
}

/** Breakers keyed by endpoint template, shared by every caller. */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly options: CircuitBreakerOptions,
    private readonly now: () => number,
  ) {}

  get(endpoint: string): CircuitBreaker {
    let breaker = this.breakers.get(endpoint);
    if (!breaker) {
      breaker = new CircuitBreaker(endpoint, this.options, this.now);
      this.breakers.set(endpoint, breaker);
    }
    return breaker;
  }

  snapshots(): CircuitSnapshot[] {
    return [...this.breakers.values()].map((breaker) => breaker.snapshot());
  }

  openEndpoints(): string[] {
    return [...this.breakers.values()].filter((breaker) => breaker.isOpen()).map((breaker) => breaker.endpoint);
  }
}
