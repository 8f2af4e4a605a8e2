import type { LoadBalancingStrategy } from '../config/types.js';
import type { Backend } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('load-balancer');

export type EligibilityCheck = (backend: Backend) => boolean;

/**
 * Picks one backend out of a candidate set.
 *
 * Candidates failing `isEligible` (open circuits) are never chosen. Backends
 * in `exclude` (already tried by this request) are skipped as long as some
 * other eligible backend remains.
 */
export class LoadBalancer {
  private cursors = new Map<string, number>();

  constructor(
    readonly strategy: LoadBalancingStrategy,
    private readonly random: () => number = Math.random,
  ) {
    log.info(`Load balancing strategy: ${strategy}`);
  }

  select(
    key: string,
    candidates: readonly Backend[],
    isEligible: EligibilityCheck,
    exclude: ReadonlySet<string> = new Set(),
  ): Backend | undefined {
    let pool = candidates.filter(b => isEligible(b));
    if (this.strategy === 'weighted_random') {
      pool = pool.filter(b => b.weight > 0);
    }
    if (pool.length === 0) return undefined;

    const untried = pool.filter(b => !exclude.has(b.id));
    const allowed = untried.length > 0 ? untried : pool;

    let selected: Backend | undefined;
    switch (this.strategy) {
      case 'round_robin':
        selected = this.roundRobin(key, candidates, new Set(allowed.map(b => b.id)));
        break;
      case 'random':
        selected = allowed[Math.floor(this.random() * allowed.length)];
        break;
      case 'weighted_random':
        selected = this.weightedRandom(allowed);
        break;
    }

    if (selected) {
      log.debug(`Selected ${selected.id} (${this.strategy}, ${allowed.length}/${candidates.length} allowed)`);
    }
    return selected;
  }

  /**
   * Walk the full candidate list from the key's cursor and take the first
   * allowed backend; the cursor moves just past it. Skipped backends do not
   * consume extra cursor steps.
   */
  private roundRobin(key: string, candidates: readonly Backend[], allowed: ReadonlySet<string>): Backend | undefined {
    const n = candidates.length;
    const cursor = (this.cursors.get(key) ?? 0) % n;
    for (let i = 0; i < n; i++) {
      const idx = (cursor + i) % n;
      const backend = candidates[idx];
      if (backend && allowed.has(backend.id)) {
        this.cursors.set(key, (idx + 1) % n);
        return backend;
      }
    }
    return undefined;
  }

  private weightedRandom(pool: readonly Backend[]): Backend | undefined {
    const total = pool.reduce((sum, b) => sum + b.weight, 0);
    if (total <= 0) return undefined;

    const target = this.random() * total;
    let cumulative = 0;
    for (const backend of pool) {
      cumulative += backend.weight;
      if (target < cumulative) return backend;
    }
    // Floating-point edge: target landed exactly on the total.
    return pool[pool.length - 1];
  }
}
