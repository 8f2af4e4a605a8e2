import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { CircuitState, LabelSource } from '../router/types.js';
import type { TokenUsage } from '../proxy/types.js';

export type RequestOutcome = 'success' | 'error' | 'rate_limited' | 'client_disconnected';
export type CacheResult = 'hit' | 'miss' | 'bypass';
export type AttemptResult = 'success' | 'transient' | 'permanent' | 'aborted';
export type ClassificationOutcome = LabelSource | 'unavailable';

const CIRCUIT_STATE_VALUE: Record<CircuitState, number> = {
  closed: 0,
  'half-open': 1,
  open: 2,
};

const LATENCY_BUCKETS = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 120];

/**
 * Prometheus instruments for the request pipeline. Each collector owns its
 * registry, so several gateways (and tests) never share series.
 */
export class MetricsCollector {
  readonly registry = new Registry();

  private readonly requests: Counter<'policy' | 'outcome'>;
  private readonly errors: Counter<'type'>;
  private readonly modelRequests: Counter<'model'>;
  private readonly rateLimited: Counter;
  private readonly cacheLookups: Counter<'result'>;
  private readonly cacheSize: Gauge;
  private readonly classifications: Counter<'policy' | 'outcome'>;
  private readonly selections: Counter<'backend'>;
  private readonly attempts: Counter<'backend' | 'result'>;
  private readonly retries: Counter<'policy'>;
  private readonly circuitTransitions: Counter<'backend' | 'to'>;
  private readonly circuitState: Gauge<'backend'>;
  private readonly tokens: Counter<'backend' | 'kind'>;
  private readonly requestLatency: Histogram<'policy'>;
  private readonly classificationLatency: Histogram<'policy'>;
  private readonly backendLatency: Histogram<'backend'>;

  constructor(options: { collectDefaults?: boolean } = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry, prefix: 'switchyard_' });
    }
    const registers = [this.registry];

    this.requests = new Counter({
      name: 'switchyard_requests_total',
      help: 'Requests handled, by policy and outcome',
      labelNames: ['policy', 'outcome'],
      registers,
    });
    this.errors = new Counter({
      name: 'switchyard_errors_total',
      help: 'Errors by type, including recovered ones',
      labelNames: ['type'],
      registers,
    });
    this.modelRequests = new Counter({
      name: 'switchyard_model_requests_total',
      help: 'Requests served per upstream model',
      labelNames: ['model'],
      registers,
    });
    this.rateLimited = new Counter({
      name: 'switchyard_rate_limited_total',
      help: 'Requests rejected by the rate limiter',
      registers,
    });
    this.cacheLookups = new Counter({
      name: 'switchyard_cache_lookups_total',
      help: 'Response cache lookups by result',
      labelNames: ['result'],
      registers,
    });
    this.cacheSize = new Gauge({
      name: 'switchyard_cache_entries',
      help: 'Entries currently held by the response cache',
      registers,
    });
    this.classifications = new Counter({
      name: 'switchyard_classifications_total',
      help: 'Label decisions by policy and source',
      labelNames: ['policy', 'outcome'],
      registers,
    });
    this.selections = new Counter({
      name: 'switchyard_backend_selections_total',
      help: 'Times the load balancer picked each backend',
      labelNames: ['backend'],
      registers,
    });
    this.attempts = new Counter({
      name: 'switchyard_backend_attempts_total',
      help: 'Upstream attempts by backend and result',
      labelNames: ['backend', 'result'],
      registers,
    });
    this.retries = new Counter({
      name: 'switchyard_retries_total',
      help: 'Retries scheduled after transient failures',
      labelNames: ['policy'],
      registers,
    });
    this.circuitTransitions = new Counter({
      name: 'switchyard_circuit_transitions_total',
      help: 'Circuit breaker state changes',
      labelNames: ['backend', 'to'],
      registers,
    });
    this.circuitState = new Gauge({
      name: 'switchyard_circuit_state',
      help: 'Circuit state per backend (0 closed, 1 half-open, 2 open)',
      labelNames: ['backend'],
      registers,
    });
    this.tokens = new Counter({
      name: 'switchyard_tokens_total',
      help: 'Token usage reported by backends',
      labelNames: ['backend', 'kind'],
      registers,
    });
    this.requestLatency = new Histogram({
      name: 'switchyard_request_duration_seconds',
      help: 'End-to-end request latency',
      labelNames: ['policy'],
      buckets: LATENCY_BUCKETS,
      registers,
    });
    this.classificationLatency = new Histogram({
      name: 'switchyard_classification_duration_seconds',
      help: 'Classifier and agent latency',
      labelNames: ['policy'],
      buckets: LATENCY_BUCKETS,
      registers,
    });
    this.backendLatency = new Histogram({
      name: 'switchyard_backend_duration_seconds',
      help: 'Upstream call latency per backend',
      labelNames: ['backend'],
      buckets: LATENCY_BUCKETS,
      registers,
    });
  }

  recordRequest(policy: string, outcome: RequestOutcome, durationMs: number): void {
    this.requests.inc({ policy, outcome });
    this.requestLatency.observe({ policy }, durationMs / 1000);
  }

  recordError(type: string): void {
    this.errors.inc({ type });
  }

  recordModelRequest(model: string): void {
    this.modelRequests.inc({ model });
  }

  recordRateLimited(): void {
    this.rateLimited.inc();
  }

  recordCacheLookup(result: CacheResult): void {
    this.cacheLookups.inc({ result });
  }

  setCacheSize(size: number): void {
    this.cacheSize.set(size);
  }

  recordClassification(policy: string, outcome: ClassificationOutcome, durationMs?: number): void {
    this.classifications.inc({ policy, outcome });
    if (durationMs !== undefined) {
      this.classificationLatency.observe({ policy }, durationMs / 1000);
    }
  }

  recordSelection(backend: string): void {
    this.selections.inc({ backend });
  }

  recordAttempt(backend: string, result: AttemptResult, durationMs: number): void {
    this.attempts.inc({ backend, result });
    this.backendLatency.observe({ backend }, durationMs / 1000);
  }

  recordRetry(policy: string): void {
    this.retries.inc({ policy });
  }

  recordCircuitTransition(backend: string, to: CircuitState): void {
    this.circuitTransitions.inc({ backend, to });
    this.circuitState.set({ backend }, CIRCUIT_STATE_VALUE[to]);
  }

  recordTokens(backend: string, usage: TokenUsage): void {
    if (usage.promptTokens) this.tokens.inc({ backend, kind: 'prompt' }, usage.promptTokens);
    if (usage.completionTokens) this.tokens.inc({ backend, kind: 'completion' }, usage.completionTokens);
  }

  /** Prometheus text exposition of every series. */
  async render(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
