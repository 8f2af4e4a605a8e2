import type { CachingConfig } from '../config/types.js';
import type { RoutingStrategy } from '../router/types.js';
import type { ChatCompletionBody } from './types.js';
import { canonicalJson, sha256Base64Url } from '../utils/hash.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('response-cache');

/** Body fields that change what a model generates. Everything else is ignored for keying. */
const FINGERPRINT_FIELDS = [
  'messages',
  'model',
  'temperature',
  'top_p',
  'max_tokens',
  'frequency_penalty',
  'presence_penalty',
  'stop',
] as const;

/**
 * A successful upstream response, stored after the request completes.
 * Streamed responses are stored as their raw SSE text.
 */
export interface CachedResponse {
  status: number;
  contentType: string;
  body: string;
  backendId: string;
  label: string;
  createdAt: number;
  /** UTF-8 length of `body`. */
  sizeBytes: number;
}

export interface FingerprintInput {
  policy: string;
  strategy: RoutingStrategy;
  /** Manual model hint, when the client gave one. */
  model?: string;
  stream: boolean;
  body: ChatCompletionBody;
}

interface InflightEntry {
  promise: Promise<CachedResponse>;
  resolve: (response: CachedResponse) => void;
  reject: (error: Error) => void;
}

/**
 * Response cache keyed by request fingerprint, with TTL expiry and LRU
 * eviction at `maxSize`. Map insertion order doubles as recency order: a hit
 * moves its entry to the back.
 *
 * Requests that arrive while an identical one is in flight await its result
 * instead of going upstream a second time.
 */
export class ResponseCache {
  private entries = new Map<string, CachedResponse>();
  private inflight = new Map<string, InflightEntry>();
  private readonly ttlMs: number;

  constructor(private readonly config: CachingConfig) {
    this.ttlMs = config.ttlSeconds * 1000;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Stable fingerprint of the parts of a request that determine its answer.
   */
  computeKey(input: FingerprintInput): string {
    const reduced: Record<string, unknown> = {};
    for (const field of FINGERPRINT_FIELDS) {
      reduced[field] = input.body[field];
    }
    return sha256Base64Url(canonicalJson({
      policy: input.policy,
      strategy: input.strategy,
      model: input.model,
      stream: input.stream,
      body: reduced,
    }));
  }

  /**
   * Look up a stored response. Expired entries are removed on sight.
   */
  get(key: string, now = Date.now()): CachedResponse | undefined {
    if (!this.config.enabled) return undefined;
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (now - entry.createdAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    log.debug(`Cache hit: ${key}`);
    return entry;
  }

  set(key: string, response: CachedResponse): void {
    if (!this.config.enabled || this.config.maxSize <= 0) return;

    this.entries.delete(key);
    if (this.entries.size >= this.config.maxSize) {
      this.pruneExpired(response.createdAt);
    }
    while (this.entries.size >= this.config.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      log.debug(`Cache evicted: ${oldest.value}`);
    }
    this.entries.set(key, response);
  }

  /**
   * Join an identical in-flight request, or register this one as the leader.
   */
  markInflight(key: string): { isWaiting: true; promise: Promise<CachedResponse> } | { isWaiting: false } {
    const existing = this.inflight.get(key);
    if (existing) {
      log.debug(`In-flight join: ${key}`);
      return { isWaiting: true, promise: existing.promise };
    }

    let resolve!: (response: CachedResponse) => void;
    let reject!: (error: Error) => void;
    const promise = new Promise<CachedResponse>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    // Waiters attach their own handlers; nobody may have joined.
    promise.catch((err: unknown) => log.debug(`In-flight ${key} failed: ${String(err)}`));

    this.inflight.set(key, { promise, resolve, reject });
    return { isWaiting: false };
  }

  /**
   * The leader finished successfully: store the response and release waiters.
   */
  complete(key: string, response: CachedResponse): void {
    const entry = this.inflight.get(key);
    if (entry) {
      this.inflight.delete(key);
      entry.resolve(response);
    }
    this.set(key, response);
  }

  /**
   * The leader failed or was abandoned. Nothing is stored; waiters are
   * rejected and go upstream themselves.
   */
  removeInflight(key: string, error?: Error): void {
    const entry = this.inflight.get(key);
    if (entry) {
      this.inflight.delete(key);
      entry.reject(error ?? new Error('Request failed'));
    }
  }

  private pruneExpired(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now - entry.createdAt >= this.ttlMs) {
        this.entries.delete(key);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /** Sum of the stored bodies' sizes. */
  get totalBytes(): number {
    let total = 0;
    for (const entry of this.entries.values()) total += entry.sizeBytes;
    return total;
  }

  get inflightSize(): number {
    return this.inflight.size;
  }

  clearAll(): void {
    for (const entry of this.inflight.values()) {
      entry.reject(new Error('Cache cleared'));
    }
    this.inflight.clear();
    this.entries.clear();
  }
}
