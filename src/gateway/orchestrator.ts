import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { GatewayConfig } from '../config/types.js';
import type { Backend, LabelDecision, Policy, RoutingHints, RoutingStrategy } from '../router/types.js';
import type { BackendStream, ChatCompletionBody, FetchLike } from '../proxy/types.js';
import { ROUTER_EXTENSIONS } from '../proxy/types.js';
import type { CachedResponse } from '../proxy/response-cache.js';
import type { AttemptResult, RequestOutcome } from '../metrics/collector.js';
import { PolicyResolver } from '../router/policy-resolver.js';
import { RateLimiter } from '../router/rate-limiter.js';
import { CircuitBreakerRegistry } from '../router/circuit-breaker.js';
import { LoadBalancer } from '../router/load-balancer.js';
import { ResponseCache } from '../proxy/response-cache.js';
import { BackendClient } from '../proxy/backend-client.js';
import { withRetry, isTransient } from '../proxy/retry.js';
import { sanitizeMessages, sanitizeText } from '../proxy/sanitize.js';
import { ClassifierClient } from '../classifier/client.js';
import { AgentSelector } from '../classifier/agent.js';
import { latestUserText } from '../classifier/types.js';
import { MetricsCollector } from '../metrics/collector.js';
import {
  CacheUnavailableError,
  ClassificationUnavailableError,
  ClientDisconnectedError,
  GatewayError,
  InvalidRequestError,
  NoEligibleBackendError,
  RateLimitedError,
  UpstreamError,
  UpstreamExhaustedError,
  toGatewayError,
} from './errors.js';
import { VERSION } from '../version.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('gateway');

export interface GatewayRequest {
  body: ChatCompletionBody;
  hints?: RoutingHints;
  /** Caller address used for per-IP rate limiting. */
  clientIp?: string;
  /** The client sent `Cache-Control: no-cache` or `no-store`. */
  noCache?: boolean;
  signal?: AbortSignal;
  requestId?: string;
}

export type CacheStatus = 'HIT' | 'MISS' | 'BYPASS';

export interface RouteInfo {
  requestId: string;
  policy: string;
  label: string;
  backendId: string;
  cache: CacheStatus;
  attempts: number;
  decision?: LabelDecision;
}

export interface GatewayResponse {
  kind: 'response';
  route: RouteInfo;
  status: number;
  contentType: string;
  body: string;
}

export interface GatewayStream {
  kind: 'stream';
  route: RouteInfo;
  status: number;
  contentType: string;
  chunks: AsyncIterable<string>;
}

export type GatewayResult = GatewayResponse | GatewayStream;

export interface GatewayDeps {
  fetch?: FetchLike;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  metrics?: MetricsCollector;
}

export interface GatewayStatus {
  status: 'ok' | 'degraded';
  version: string;
  uptimeSecs: number;
  defaultPolicy: string;
  policies: Array<{ name: string; kind: Policy['kind']; labels: string[] }>;
  circuits: Record<string, string>;
  openCircuits: number;
  cache: { enabled: boolean; size: number; bytes: number; inflight: number };
  rateLimiter: { enabled: boolean; trackedClients: number };
  activeUpstreamRequests: number;
}

/**
 * Per-request state threaded through the pipeline.
 */
interface RequestContext {
  requestId: string;
  policy: Policy;
  resolver: PolicyResolver;
  config: GatewayConfig;
  startMs: number;
  signal?: AbortSignal;
  decision?: LabelDecision;
  attempts: number;
  tried: Set<string>;
  lastError?: UpstreamError;
}

interface CacheSlot {
  key: string;
  /** This request registered the in-flight entry and must settle it. */
  leader: boolean;
}

function outcomeOf(err: GatewayError): RequestOutcome {
  if (err instanceof RateLimitedError) return 'rate_limited';
  if (err instanceof ClientDisconnectedError) return 'client_disconnected';
  return 'error';
}

/**
 * Copy of the client body as sent to one backend: the backend's model,
 * sanitized messages, routing fields removed.
 */
export function upstreamBody(body: ChatCompletionBody, backend: Backend): ChatCompletionBody {
  const forwarded: ChatCompletionBody = {
    ...body,
    model: backend.model,
    messages: sanitizeMessages(body.messages),
  };
  for (const key of ROUTER_EXTENSIONS) delete forwarded[key];
  delete forwarded['cache'];
  return forwarded;
}

/**
 * Settles with `promise`, or rejects with ClientDisconnectedError as soon as
 * `signal` aborts.
 */
function unlessAborted<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new ClientDisconnectedError());
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ClientDisconnectedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

async function* replay(body: string): AsyncGenerator<string> {
  yield body;
}

/**
 * The request pipeline: admit, resolve policy, consult the cache, choose a
 * label, then forward under retry with load balancing and circuit breaking.
 */
export class Gateway {
  private resolver: PolicyResolver;
  private config: GatewayConfig;
  private readonly limiter: RateLimiter;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly balancer: LoadBalancer;
  private readonly cache: ResponseCache;
  private readonly client: BackendClient;
  private readonly classifier: ClassifierClient;
  private readonly agent: AgentSelector;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly startedAt = Date.now();
  readonly metrics: MetricsCollector;

  constructor(config: GatewayConfig, deps: GatewayDeps = {}) {
    this.config = config;
    this.resolver = new PolicyResolver(config);
    this.metrics = deps.metrics ?? new MetricsCollector();
    this.limiter = new RateLimiter(config.security.rateLimit);
    this.breakers = new CircuitBreakerRegistry(config.circuitBreaker, (backendId, from, to) => {
      log.info(`Circuit ${backendId}: ${from} -> ${to}`);
      this.metrics.recordCircuitTransition(backendId, to);
    });
    this.balancer = new LoadBalancer(config.loadBalancingStrategy, deps.random);
    this.cache = new ResponseCache(config.caching);
    this.client = new BackendClient({ maxConcurrent: config.server.connectionPoolSize, fetch: deps.fetch });
    this.classifier = new ClassifierClient(deps.fetch);
    this.agent = new AgentSelector(this.client);
    this.sleep = deps.sleep;
  }

  /**
   * Swap in a new configuration snapshot. Policies, retry and timeout
   * settings take effect for requests that start afterwards; limiter, cache
   * and breaker state are kept.
   */
  reload(config: GatewayConfig): void {
    const resolver = new PolicyResolver(config);
    this.resolver = resolver;
    this.config = config;
    log.info(`Configuration reloaded: ${resolver.getAll().length} policies`);
  }

  get defaultPolicy(): string {
    return this.resolver.defaultPolicy;
  }

  async handle(request: GatewayRequest): Promise<GatewayResult> {
    const requestId = request.requestId ?? randomUUID();
    const startMs = performance.now();
    const resolver = this.resolver;
    const hints = request.hints ?? {};
    let policyName = hints.policy?.trim() || resolver.defaultPolicy;

    try {
      const admission = this.limiter.admit(request.clientIp ?? 'unknown');
      if (!admission.allowed) {
        this.metrics.recordRateLimited();
        throw new RateLimitedError(admission.retryAfterSecs);
      }

      const policy = resolver.resolve(hints.policy);
      policyName = policy.name;
      const ctx: RequestContext = {
        requestId,
        policy,
        resolver,
        config: this.config,
        startMs,
        ...(request.signal ? { signal: request.signal } : {}),
        attempts: 0,
        tried: new Set(),
      };

      const result = await this.route(ctx, request, hints);
      if (result.kind === 'response') {
        this.metrics.recordRequest(policy.name, 'success', performance.now() - startMs);
        log.info(`${requestId} ${policy.name}/${result.route.label} -> ${result.route.backendId} (${result.route.cache})`);
      }
      return result;
    } catch (err) {
      const error = toGatewayError(err);
      this.metrics.recordError(error.type);
      this.metrics.recordRequest(policyName, outcomeOf(error), performance.now() - startMs);
      if (error.status >= 500) {
        log.error(`${requestId} failed: ${error.message}`, error.cause);
      } else {
        log.warn(`${requestId} rejected: ${error.type} ${error.message}`);
      }
      throw error;
    }
  }

  private async route(ctx: RequestContext, request: GatewayRequest, hints: RoutingHints): Promise<GatewayResult> {
    const manualLabel = this.manualLabel(ctx, request.body, hints);
    const strategy: RoutingStrategy = manualLabel !== undefined ? 'manual' : 'classifier';
    const stream = request.body.stream === true;

    const slot = await this.claimCache(ctx, request, hints, strategy, manualLabel, stream);
    if (slot && 'hit' in slot) {
      return this.fromCache(ctx, slot.hit, stream);
    }

    try {
      const decision = await this.chooseLabel(ctx, request, manualLabel);
      ctx.decision = decision;
      const candidates = ctx.resolver.candidates(ctx.policy, decision.label);
      const timeoutMs = ctx.config.server.requestTimeoutSecs * 1000;
      const callOptions = { timeoutMs, ...(ctx.signal ? { signal: ctx.signal } : {}) };

      if (stream) {
        const { backend, value } = await this.forward(ctx, decision.label, candidates, b =>
          this.client.stream(b, upstreamBody(request.body, b), callOptions), { streaming: true });
        this.metrics.recordModelRequest(backend.model);
        const route = this.routeInfo(ctx, backend, slot ? 'MISS' : 'BYPASS');
        return {
          kind: 'stream',
          route,
          status: value.status,
          contentType: value.contentType,
          chunks: this.relay(ctx, backend, value, slot),
        };
      }

      const { backend, value: response } = await this.forward(ctx, decision.label, candidates, b =>
        this.client.complete(b, upstreamBody(request.body, b), callOptions));
      this.metrics.recordModelRequest(backend.model);
      if (response.usage) this.metrics.recordTokens(backend.id, response.usage);

      if (slot) {
        this.store(slot, {
          status: response.status,
          contentType: response.contentType,
          body: response.body,
          backendId: backend.id,
          label: decision.label,
          createdAt: Date.now(),
          sizeBytes: Buffer.byteLength(response.body),
        });
      }
      return {
        kind: 'response',
        route: this.routeInfo(ctx, backend, slot ? 'MISS' : 'BYPASS'),
        status: response.status,
        contentType: response.contentType,
        body: response.body,
      };
    } catch (err) {
      if (slot?.leader) {
        this.cache.removeInflight(slot.key, err instanceof Error ? err : new Error(String(err)));
      }
      throw err;
    }
  }

  /**
   * A model hint routes manually: the extension's `model`, or a top-level
   * `model` naming one of the policy's routing keys.
   */
  private manualLabel(ctx: RequestContext, body: ChatCompletionBody, hints: RoutingHints): string | undefined {
    if (hints.strategy === 'classifier') return undefined;
    const hinted = hints.model?.trim();
    if (hinted) return hinted;

    const model = typeof body.model === 'string' ? body.model.trim() : '';
    if (hints.strategy === 'manual') {
      if (!model) throw new InvalidRequestError('routing_strategy "manual" requires a model');
      return model;
    }
    return model && ctx.resolver.hasLabel(ctx.policy, model) ? model : undefined;
  }

  /**
   * Look the request up in the cache, joining an identical in-flight request
   * when there is one. Returns undefined when caching is bypassed.
   */
  private async claimCache(
    ctx: RequestContext,
    request: GatewayRequest,
    hints: RoutingHints,
    strategy: RoutingStrategy,
    manualLabel: string | undefined,
    stream: boolean,
  ): Promise<CacheSlot | { hit: CachedResponse } | undefined> {
    const bypass = !this.cache.enabled
      || hints.cache === false
      || request.body['cache'] === false
      || request.noCache === true;
    if (bypass) {
      this.metrics.recordCacheLookup('bypass');
      return undefined;
    }

    let key: string;
    try {
      key = this.cache.computeKey({
        policy: ctx.policy.name,
        strategy,
        ...(manualLabel !== undefined ? { model: manualLabel } : {}),
        stream,
        body: request.body,
      });
    } catch (err) {
      this.cacheUnavailable('fingerprint failed', err);
      this.metrics.recordCacheLookup('bypass');
      return undefined;
    }

    const hit = this.cache.get(key);
    if (hit) return { hit };

    const inflight = this.cache.markInflight(key);
    if (!inflight.isWaiting) {
      this.metrics.recordCacheLookup('miss');
      return { key, leader: true };
    }

    try {
      return { hit: await unlessAborted(inflight.promise, ctx.signal) };
    } catch (err) {
      if (err instanceof ClientDisconnectedError) throw err;
      log.debug(`${ctx.requestId}: in-flight request failed (${err instanceof Error ? err.message : String(err)}), proceeding`);
      this.metrics.recordCacheLookup('miss');
      return { key, leader: false };
    }
  }

  private fromCache(ctx: RequestContext, entry: CachedResponse, stream: boolean): GatewayResult {
    this.metrics.recordCacheLookup('hit');
    const route: RouteInfo = {
      requestId: ctx.requestId,
      policy: ctx.policy.name,
      label: entry.label,
      backendId: entry.backendId,
      cache: 'HIT',
      attempts: 0,
    };
    if (stream) {
      return { kind: 'stream', route, status: entry.status, contentType: entry.contentType, chunks: replay(entry.body) };
    }
    return { kind: 'response', route, status: entry.status, contentType: entry.contentType, body: entry.body };
  }

  private store(slot: CacheSlot, entry: CachedResponse): void {
    try {
      if (slot.leader) {
        this.cache.complete(slot.key, entry);
      } else {
        this.cache.set(slot.key, entry);
      }
      this.metrics.setCacheSize(this.cache.size);
    } catch (err) {
      this.cacheUnavailable('store failed', err);
    }
  }

  private cacheUnavailable(what: string, err: unknown): void {
    const error = new CacheUnavailableError(`Response cache ${what}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    this.metrics.recordError(error.type);
    log.warn(error.message);
  }

  /**
   * Manual hint, else the classifier or agent. When classification is
   * unavailable the policy's fallback label is used if it has one.
   */
  private async chooseLabel(ctx: RequestContext, request: GatewayRequest, manualLabel: string | undefined): Promise<LabelDecision> {
    const { policy } = ctx;
    if (manualLabel !== undefined) {
      this.metrics.recordClassification(policy.name, 'manual');
      return { label: manualLabel, source: 'manual' };
    }

    const text = sanitizeText(latestUserText(request.body.messages));
    const options = {
      timeoutMs: policy.timeoutMs ?? ctx.config.server.requestTimeoutSecs * 1000,
      ...(ctx.signal ? { signal: ctx.signal } : {}),
    };

    try {
      if (policy.kind === 'classifier') {
        const result = await this.classifier.classify(policy, text, options);
        this.metrics.recordClassification(policy.name, 'classifier', result.classifiedInMs);
        return {
          label: result.label,
          source: 'classifier',
          ...(result.confidence !== undefined ? { confidence: result.confidence } : {}),
        };
      }
      const result = await this.agent.select(policy, text, options);
      this.metrics.recordClassification(policy.name, 'agent', result.classifiedInMs);
      return { label: result.label, source: 'agent' };
    } catch (err) {
      if (!(err instanceof ClassificationUnavailableError)) throw err;
      this.metrics.recordClassification(policy.name, 'unavailable');

      const fallback = ctx.resolver.fallbackLabel(policy);
      if (fallback === undefined) throw err;
      this.metrics.recordError(err.type);
      this.metrics.recordClassification(policy.name, 'fallback');
      log.warn(`${ctx.requestId}: ${err.message}; using fallback "${fallback}"`);
      return { label: fallback, source: 'fallback' };
    }
  }

  /**
   * Select a backend and call it, retrying transient failures on another
   * selection. Backends already tried by this request are avoided while
   * untried ones remain. A streamed attempt is recorded by `relay` once the
   * body has been read.
   */
  private async forward<T>(
    ctx: RequestContext,
    label: string,
    candidates: readonly Backend[],
    call: (backend: Backend) => Promise<T>,
    options: { streaming?: boolean } = {},
  ): Promise<{ backend: Backend; value: T }> {
    const key = `${ctx.policy.name}/${label}`;

    return withRetry(async () => {
      const backend = this.balancer.select(key, candidates, b => this.breakers.get(b.id).canAttempt(), ctx.tried);
      if (!backend) throw this.noBackend(ctx, label);
      const breaker = this.breakers.get(backend.id);
      if (!breaker.acquire()) throw this.noBackend(ctx, label);

      ctx.tried.add(backend.id);
      ctx.attempts++;
      this.metrics.recordSelection(backend.id);
      const attemptStart = performance.now();

      try {
        const value = await call(backend);
        breaker.recordSuccess();
        if (!options.streaming) this.metrics.recordAttempt(backend.id, 'success', performance.now() - attemptStart);
        return { backend, value };
      } catch (err) {
        const elapsed = performance.now() - attemptStart;
        if (isTransient(err)) {
          breaker.recordFailure();
          ctx.lastError = err;
          this.metrics.recordAttempt(backend.id, 'transient', elapsed);
          this.metrics.recordError(err.type);
        } else if (err instanceof UpstreamError) {
          // The backend answered; a permanent rejection says nothing about its health.
          breaker.recordSuccess();
          this.metrics.recordAttempt(backend.id, 'permanent', elapsed);
        } else {
          breaker.release();
          this.metrics.recordAttempt(backend.id, 'aborted', elapsed);
        }
        throw err;
      }
    }, {
      ...ctx.config.retry,
      ...(ctx.signal ? { signal: ctx.signal } : {}),
      ...(this.sleep ? { sleep: this.sleep } : {}),
      onRetry: (attempt, delayMs) => {
        this.metrics.recordRetry(ctx.policy.name);
        log.info(`${ctx.requestId}: retrying after attempt ${attempt} in ${delayMs}ms`);
      },
    });
  }

  /**
   * Every circuit is open. Once attempts have failed the request counts as
   * exhausted rather than unroutable.
   */
  private noBackend(ctx: RequestContext, label: string): GatewayError {
    if (ctx.lastError) return new UpstreamExhaustedError(ctx.attempts, ctx.lastError);
    return new NoEligibleBackendError(ctx.policy.name, label);
  }

  /**
   * Pass upstream chunks through while buffering them for the cache. Only a
   * stream that ends cleanly is stored.
   */
  private async *relay(
    ctx: RequestContext,
    backend: Backend,
    upstream: BackendStream,
    slot: CacheSlot | undefined,
  ): AsyncGenerator<string> {
    let buffered = '';
    let completed = false;
    // Stays as-is when the consumer stops reading early.
    let outcome: RequestOutcome = 'client_disconnected';
    let attempt: AttemptResult = 'aborted';

    try {
      for await (const chunk of upstream.chunks) {
        if (slot) buffered += chunk;
        yield chunk;
      }
      completed = true;
      outcome = 'success';
      attempt = 'success';
    } catch (err) {
      const error = toGatewayError(err);
      if (!(error instanceof ClientDisconnectedError)) {
        outcome = 'error';
        if (isTransient(err)) {
          this.breakers.get(backend.id).recordFailure();
          attempt = 'transient';
        }
      }
      this.metrics.recordError(error.type);
      log.warn(`${ctx.requestId}: stream from ${backend.id} ended early: ${error.message}`);
      throw error;
    } finally {
      if (slot) {
        if (completed) {
          this.store(slot, {
            status: upstream.status,
            contentType: upstream.contentType,
            body: buffered,
            backendId: backend.id,
            label: ctx.decision?.label ?? backend.routingKey,
            createdAt: Date.now(),
            sizeBytes: Buffer.byteLength(buffered),
          });
        } else if (slot.leader) {
          this.cache.removeInflight(slot.key, new Error('Stream did not complete'));
        }
      }
      this.metrics.recordRequest(ctx.policy.name, outcome, performance.now() - ctx.startMs);
      this.metrics.recordAttempt(backend.id, attempt, performance.now() - upstream.startMs);
    }
  }

  private routeInfo(ctx: RequestContext, backend: Backend, cache: CacheStatus): RouteInfo {
    return {
      requestId: ctx.requestId,
      policy: ctx.policy.name,
      label: ctx.decision?.label ?? backend.routingKey,
      backendId: backend.id,
      cache,
      attempts: ctx.attempts,
      ...(ctx.decision ? { decision: ctx.decision } : {}),
    };
  }

  status(): GatewayStatus {
    const openCircuits = this.breakers.openCount();
    return {
      status: openCircuits > 0 ? 'degraded' : 'ok',
      version: VERSION,
      uptimeSecs: Math.round((Date.now() - this.startedAt) / 1000),
      defaultPolicy: this.resolver.defaultPolicy,
      policies: this.resolver.getAll().map(p => ({ name: p.name, kind: p.kind, labels: [...p.labels] })),
      circuits: this.breakers.states(),
      openCircuits,
      cache: {
        enabled: this.cache.enabled,
        size: this.cache.size,
        bytes: this.cache.totalBytes,
        inflight: this.cache.inflightSize,
      },
      rateLimiter: { enabled: this.limiter.enabled, trackedClients: this.limiter.size },
      activeUpstreamRequests: this.client.activeRequests,
    };
  }

  /** Routing keys of every policy, as an OpenAI model list. */
  models(): Array<{ id: string; object: 'model'; owned_by: string }> {
    const seen = new Set<string>();
    const models: Array<{ id: string; object: 'model'; owned_by: string }> = [];
    for (const policy of this.resolver.getAll()) {
      for (const label of policy.labels) {
        if (seen.has(label)) continue;
        seen.add(label);
        models.push({ id: label, object: 'model', owned_by: policy.name });
      }
    }
    return models;
  }

  /**
   * Force a backend's circuit closed. Returns false for unknown backends.
   */
  resetCircuit(backendId: string): boolean {
    if (!this.breakers.has(backendId) && !this.resolver.findBackend(backendId)) return false;
    this.breakers.get(backendId).forceClose();
    return true;
  }
}
