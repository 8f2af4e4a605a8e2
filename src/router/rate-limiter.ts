import type { RateLimitConfig } from '../config/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('rate-limiter');

const GLOBAL_IDENTITY = '*';

interface Bucket {
  tokens: number;
  refilledAt: number;
  lastSeenAt: number;
}

export interface AdmitResult {
  allowed: boolean;
  /** Seconds until one token is available again; 0 when allowed. */
  retryAfterSecs: number;
}

/**
 * Token-bucket admission control keyed by client identity.
 *
 * Buckets are created full on first sight of an identity, refill at
 * `requestsPerSecond` up to `burstSize`, and are swept once idle for longer
 * than `idleTimeoutSecs`. With `perIp` off every caller shares one bucket.
 */
export class RateLimiter {
  private buckets = new Map<string, Bucket>();
  private lastSweepAt = Date.now();
  private readonly idleMs: number;

  constructor(private readonly config: RateLimitConfig) {
    this.idleMs = config.idleTimeoutSecs * 1000;
    log.info(
      `Rate limiting ${config.enabled ? 'enabled' : 'disabled'}: ${config.requestsPerSecond} req/s, burst ${config.burstSize}${config.perIp ? ', per IP' : ''}`,
    );
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Take one token for the identity. The refill, check and decrement run
   * without yielding, so concurrent requests can never overdraw a bucket.
   */
  admit(identity: string): AdmitResult {
    if (!this.config.enabled) {
      return { allowed: true, retryAfterSecs: 0 };
    }

    const now = Date.now();
    this.sweepIfDue(now);

    const key = this.config.perIp ? identity : GLOBAL_IDENTITY;
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = { tokens: this.config.burstSize, refilledAt: now, lastSeenAt: now };
      this.buckets.set(key, bucket);
    } else {
      const elapsedSecs = (now - bucket.refilledAt) / 1000;
      bucket.tokens = Math.min(this.config.burstSize, bucket.tokens + elapsedSecs * this.config.requestsPerSecond);
      bucket.refilledAt = now;
      bucket.lastSeenAt = now;
    }

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, retryAfterSecs: 0 };
    }

    const retryAfterSecs = Math.max(1, Math.ceil((1 - bucket.tokens) / this.config.requestsPerSecond));
    log.debug(`Rate limited: ${key} (retry after ${retryAfterSecs}s)`);
    return { allowed: false, retryAfterSecs };
  }

  private sweepIfDue(now: number): void {
    if (now - this.lastSweepAt < this.idleMs) return;
    this.lastSweepAt = now;
    this.sweep(now);
  }

  /**
   * Drop buckets idle longer than the idle timeout. Returns the number removed.
   */
  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      if (now - bucket.lastSeenAt > this.idleMs) {
        this.buckets.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      log.debug(`Swept ${removed} idle rate-limit buckets`);
    }
    return removed;
  }

  /**
   * Clear all bucket state.
   */
  clearAll(): void {
    this.buckets.clear();
  }

  /**
   * Number of tracked identities.
   */
  get size(): number {
    return this.buckets.size;
  }
}
