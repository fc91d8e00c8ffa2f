/**
 * CircuitBreaker - Stop calling a peer that keeps failing
 *
 * STATE MACHINE:
 *   closed    --(failureThreshold consecutive failures)--> open
 *   open      --(cooldownMs elapsed)-->                    half-open
 *   half-open --(trial succeeds)-->                        closed
 *   half-open --(trial fails)-->                           open
 *
 * While open, tryAcquire() returns false and the caller fails fast without
 * touching the network. In half-open exactly one trial call is admitted;
 * everyone else keeps failing fast until that trial settles.
 *
 * Each instance owns its state. Calls sharing one breaker report their verdicts
 * after awaits, so a slow call admitted before a transition can settle after it.
 * Every transition starts a new epoch; callers pass the epoch they were admitted
 * in, and verdicts from an earlier epoch are ignored.
 */

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  failureThreshold: number;
  cooldownMs: number;
  /** Clock, injectable for tests */
  now?: () => number;
  /** Called on every state change */
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  openUntil: number | null;
}

export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly onStateChange?: (from: CircuitState, to: CircuitState) => void;

  private currentState: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private openUntil: number | null = null;
  private trialInFlight = false;
  private currentEpoch = 0;

  constructor(options: CircuitBreakerOptions) {
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold <= 0) {
      throw new Error('Circuit breaker failureThreshold must be a positive integer');
    }
    if (options.cooldownMs < 0) {
      throw new Error('Circuit breaker cooldownMs must not be negative');
    }
    this.failureThreshold = options.failureThreshold;
    this.cooldownMs = options.cooldownMs;
    this.now = options.now ?? Date.now;
    this.onStateChange = options.onStateChange;
  }

  /**
   * Current state, moving open -> half-open if the cooldown has elapsed
   */
  get state(): CircuitState {
    if (this.currentState === 'open' && this.openUntil !== null && this.now() >= this.openUntil) {
      this.transition('half-open');
    }
    return this.currentState;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  /**
   * Bumped on every state change; read it right after tryAcquire()
   */
  get epoch(): number {
    return this.currentEpoch;
  }

  /**
   * Ask permission to make one call
   *
   * @returns false when the call must fail fast
   */
  tryAcquire(): boolean {
    switch (this.state) {
      case 'closed':
        return true;
      case 'open':
        return false;
      case 'half-open':
        if (this.trialInFlight) {
          return false;
        }
        this.trialInFlight = true;
        return true;
    }
  }

  recordSuccess(admittedIn: number = this.currentEpoch): void {
    if (admittedIn !== this.currentEpoch) {
      return;
    }
    this.consecutiveFailures = 0;
    this.trialInFlight = false;
    if (this.currentState !== 'closed') {
      this.openUntil = null;
      this.transition('closed');
    }
  }

  recordFailure(admittedIn: number = this.currentEpoch): void {
    if (admittedIn !== this.currentEpoch) {
      return;
    }
    this.consecutiveFailures += 1;

    if (this.currentState === 'half-open') {
      this.trialInFlight = false;
      this.open();
      return;
    }

    if (this.currentState === 'closed' && this.consecutiveFailures >= this.failureThreshold) {
      this.open();
    }
  }

  /**
   * Give back a half-open trial slot without a verdict (the caller cancelled)
   */
  releaseTrial(admittedIn: number = this.currentEpoch): void {
    if (admittedIn !== this.currentEpoch) {
      return;
    }
    this.trialInFlight = false;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openUntil: this.openUntil,
    };
  }

  private open(): void {
    this.openUntil = this.now() + this.cooldownMs;
    this.transition('open');
  }

  private transition(to: CircuitState): void {
    const from = this.currentState;
    if (from === to) {
      return;
    }
    this.currentState = to;
    this.currentEpoch += 1;
    this.onStateChange?.(from, to);
  }
}
