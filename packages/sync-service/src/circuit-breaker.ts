export type CircuitBreakerConfig = {
  enabled?: boolean;
  /** Consecutive availability failures that open the circuit (default: 5) */
  failureThreshold?: number;
  /** Cool-down before one trial call is let through (default: 60000ms) */
  openMs?: number;
};

export type CircuitState =
  | { phase: 'closed'; failures: number }
  | { phase: 'open'; retryInMs: number }
  | { phase: 'trial' };

type Phase =
  | { kind: 'closed'; failures: number }
  | { kind: 'open'; since: number }
  | { kind: 'trial'; inFlight: boolean };

/** Per-gateway breaker; absent unless configured with `enabled: true`. */
export class CircuitBreaker {
  private phase: Phase = { kind: 'closed', failures: 0 };

  private constructor(
    private readonly threshold: number,
    private readonly openMs: number
  ) {}

  static fromConfig(cfg?: CircuitBreakerConfig): CircuitBreaker | null {
    if (cfg?.enabled !== true) return null;
    return new CircuitBreaker(Math.max(1, cfg.failureThreshold ?? 5), Math.max(1, cfg.openMs ?? 60_000));
  }

  allows(now = Date.now()): boolean {
    switch (this.phase.kind) {
      case 'closed':
        return true;
      case 'open':
        if (now - this.phase.since < this.openMs) return false;
        this.phase = { kind: 'trial', inFlight: false };
        return true;
      case 'trial':
        return !this.phase.inFlight;
    }
  }

  recordStart(): void {
    if (this.phase.kind === 'trial') this.phase = { kind: 'trial', inFlight: true };
  }

  recordSuccess(): void {
    this.phase = { kind: 'closed', failures: 0 };
  }

  recordFailure(now = Date.now()): void {
    if (this.phase.kind === 'open') return;
    // A failed trial reopens at once.
    const failures = this.phase.kind === 'closed' ? this.phase.failures + 1 : this.threshold;
    this.phase =
      failures >= this.threshold ? { kind: 'open', since: now } : { kind: 'closed', failures };
  }

  state(now = Date.now()): CircuitState {
    switch (this.phase.kind) {
      case 'closed':
        return { phase: 'closed', failures: this.phase.failures };
      case 'open':
        return { phase: 'open', retryInMs: Math.max(0, this.openMs - (now - this.phase.since)) };
      case 'trial':
        return { phase: 'trial' };
    }
  }
}
