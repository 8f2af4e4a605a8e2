import type { CircuitBreakerConfig } from '../config/types.js';
import type { CircuitState } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('circuit-breaker');

export type TransitionListener = (backendId: string, from: CircuitState, to: CircuitState) => void;

/**
 * Failure isolation for a single backend.
 *
 * closed    -> open       after `failureThreshold` consecutive failures
 * open      -> half-open  lazily, on the first check after `resetTimeoutSecs`
 * half-open -> closed     when the single trial request succeeds
 * half-open -> open       when it fails (timeout restarts)
 *
 * Every method runs to completion without awaiting, so transitions are
 * atomic with respect to other in-flight requests.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failures = 0;
  private openedAt = 0;
  private trialInFlight = false;
  private readonly resetTimeoutMs: number;

  constructor(
    readonly backendId: string,
    private readonly config: CircuitBreakerConfig,
    private readonly onTransition?: TransitionListener,
  ) {
    this.resetTimeoutMs = config.resetTimeoutSecs * 1000;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Current state without side effects. An expired open circuit still reports
   * `open` until the next eligibility check moves it.
   */
  getState(): CircuitState {
    return this.config.enabled ? this.state : 'closed';
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  /**
   * Whether a request may be sent now. Performs the lazy open -> half-open move.
   */
  canAttempt(now = Date.now()): boolean {
    if (!this.config.enabled) return true;

    if (this.state === 'open') {
      if (now - this.openedAt < this.resetTimeoutMs) return false;
      this.transition('half-open');
      this.trialInFlight = false;
    }

    if (this.state === 'half-open') {
      return !this.trialInFlight;
    }

    return true;
  }

  /**
   * Claim the right to send a request. In half-open state only the first
   * caller gets the trial slot.
   */
  acquire(now = Date.now()): boolean {
    if (!this.canAttempt(now)) return false;
    if (this.config.enabled && this.state === 'half-open') {
      this.trialInFlight = true;
    }
    return true;
  }

  recordSuccess(): void {
    if (!this.config.enabled) return;

    if (this.state === 'half-open') {
      this.failures = 0;
      this.trialInFlight = false;
      this.transition('closed');
      log.info(`Circuit for ${this.backendId} closed after successful trial request`);
    } else if (this.state === 'closed') {
      this.failures = 0;
    }
    // A late success from a request started before the circuit opened does not close it.
  }

  recordFailure(now = Date.now()): void {
    if (!this.config.enabled) return;

    if (this.state === 'closed') {
      this.failures++;
      if (this.failures >= this.config.failureThreshold) {
        this.open(now);
        log.warn(`Circuit for ${this.backendId} opened after ${this.failures} consecutive failures`);
      }
    } else if (this.state === 'half-open') {
      this.failures++;
      this.open(now);
      log.warn(`Circuit for ${this.backendId} re-opened: trial request failed`);
    } else {
      log.debug(`Failure recorded for ${this.backendId} while circuit already open`);
    }
  }

  /**
   * Give back a half-open trial slot without a verdict (the request was
   * abandoned by the client, not failed by the backend).
   */
  release(): void {
    if (this.state === 'half-open') {
      this.trialInFlight = false;
    }
  }

  forceClose(): void {
    this.failures = 0;
    this.trialInFlight = false;
    if (this.state !== 'closed') {
      this.transition('closed');
      log.info(`Circuit for ${this.backendId} force-closed`);
    }
  }

  private open(now: number): void {
    this.openedAt = now;
    this.trialInFlight = false;
    this.transition('open');
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.onTransition?.(this.backendId, from, to);
  }
}

/**
 * Owns one breaker per backend id, created on first use.
 */
export class CircuitBreakerRegistry {
  private breakers = new Map<string, CircuitBreaker>();

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly onTransition?: TransitionListener,
  ) {
    if (!config.enabled) {
      log.info('Circuit breaking disabled (pass-through mode)');
    }
  }

  get(backendId: string): CircuitBreaker {
    let breaker = this.breakers.get(backendId);
    if (!breaker) {
      breaker = new CircuitBreaker(backendId, this.config, this.onTransition);
      this.breakers.set(backendId, breaker);
      log.debug(`Created circuit breaker for ${backendId}`);
    }
    return breaker;
  }

  has(backendId: string): boolean {
    return this.breakers.has(backendId);
  }

  states(): Record<string, CircuitState> {
    const result: Record<string, CircuitState> = {};
    for (const [id, breaker] of this.breakers) {
      result[id] = breaker.getState();
    }
    return result;
  }

  openCount(): number {
    let count = 0;
    for (const breaker of this.breakers.values()) {
      if (breaker.getState() === 'open') count++;
    }
    return count;
  }

  forceClose(backendId: string): boolean {
    const breaker = this.breakers.get(backendId);
    if (!breaker) return false;
    breaker.forceClose();
    return true;
  }
}
