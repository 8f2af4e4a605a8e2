export type ErrorSource = 'router' | 'classifier' | 'llm_provider' | 'client' | 'infrastructure';

export type GatewayErrorType =
  | 'policy_not_found'
  | 'unresolved_label'
  | 'classification_unavailable'
  | 'no_eligible_backend'
  | 'upstream_transient'
  | 'upstream_permanent'
  | 'upstream_exhausted'
  | 'rate_limited'
  | 'cache_unavailable'
  | 'invalid_request'
  | 'unauthorized'
  | 'invalid_api_key'
  | 'payload_too_large'
  | 'not_found'
  | 'client_disconnected'
  | 'internal_error';

export interface ErrorBody {
  error: {
    type: GatewayErrorType;
    message: string;
    source: ErrorSource;
    status: number;
    details?: Record<string, unknown>;
  };
}

/**
 * Base class for every failure the gateway reports to a client.
 * Carries the HTTP status and a machine-readable type.
 */
export class GatewayError extends Error {
  readonly type: GatewayErrorType;
  readonly status: number;
  readonly source: ErrorSource;

  constructor(type: GatewayErrorType, status: number, source: ErrorSource, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GatewayError';
    this.type = type;
    this.status = status;
    this.source = source;
  }

  protected details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toErrorBody(): ErrorBody {
    const details = this.details();
    return {
      error: {
        type: this.type,
        message: this.message,
        source: this.source,
        status: this.status,
        ...(details ? { details } : {}),
      },
    };
  }
}

export class PolicyNotFoundError extends GatewayError {
  constructor(readonly policy: string) {
    super('policy_not_found', 404, 'router', `Policy not found: ${policy}`);
    this.name = 'PolicyNotFoundError';
  }
}

export class UnresolvedLabelError extends GatewayError {
  constructor(readonly policy: string, readonly label: string) {
    super('unresolved_label', 404, 'router', `Label "${label}" does not resolve to a backend in policy ${policy}`);
    this.name = 'UnresolvedLabelError';
  }
}

export class ClassificationUnavailableError extends GatewayError {
  constructor(readonly policy: string, reason: string, options?: { cause?: unknown }) {
    super('classification_unavailable', 503, 'classifier', `Classification unavailable for policy ${policy}: ${reason}`, options);
    this.name = 'ClassificationUnavailableError';
  }
}

export class NoEligibleBackendError extends GatewayError {
  constructor(readonly policy: string, readonly label: string) {
    super('no_eligible_backend', 503, 'router', `No eligible backend for "${label}" in policy ${policy} (all circuits open)`);
    this.name = 'NoEligibleBackendError';
  }
}

/**
 * Error raised by the outbound backend client. `transient` failures are
 * retried and count against the backend's circuit; permanent ones surface
 * with the upstream status.
 */
export class UpstreamError extends GatewayError {
  readonly transient: boolean;
  readonly upstreamStatus: number | undefined;
  readonly backend: string;
  readonly body: string | undefined;

  constructor(backend: string, message: string, opts: { transient: boolean; upstreamStatus?: number; body?: string; cause?: unknown }) {
    super(
      opts.transient ? 'upstream_transient' : 'upstream_permanent',
      opts.transient ? 502 : (opts.upstreamStatus ?? 502),
      'llm_provider',
      message,
      { cause: opts.cause },
    );
    this.name = 'UpstreamError';
    this.transient = opts.transient;
    this.upstreamStatus = opts.upstreamStatus;
    this.backend = backend;
    this.body = opts.body;
  }

  protected override details(): Record<string, unknown> {
    return {
      backend: this.backend,
      ...(this.upstreamStatus !== undefined ? { upstreamStatus: this.upstreamStatus } : {}),
    };
  }
}

export class UpstreamExhaustedError extends GatewayError {
  constructor(readonly attempts: number, readonly lastError: Error) {
    super('upstream_exhausted', 502, 'llm_provider', `Upstream failed after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
    this.name = 'UpstreamExhaustedError';
  }

  protected override details(): Record<string, unknown> {
    return { attempts: this.attempts, lastError: this.lastError.message };
  }
}

export class RateLimitedError extends GatewayError {
  constructor(readonly retryAfterSecs: number) {
    super('rate_limited', 429, 'client', 'Rate limit exceeded');
    this.name = 'RateLimitedError';
  }
}

export class CacheUnavailableError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('cache_unavailable', 500, 'infrastructure', message, options);
    this.name = 'CacheUnavailableError';
  }
}

export class InvalidRequestError extends GatewayError {
  constructor(message: string) {
    super('invalid_request', 400, 'client', message);
    this.name = 'InvalidRequestError';
  }
}

export class UnauthorizedError extends GatewayError {
  constructor(type: 'unauthorized' | 'invalid_api_key', message: string) {
    super(type, 401, 'client', message);
    this.name = 'UnauthorizedError';
  }
}

export class PayloadTooLargeError extends GatewayError {
  constructor(limit: number) {
    super('payload_too_large', 413, 'client', `Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

export class ClientDisconnectedError extends GatewayError {
  constructor() {
    // 499 is the conventional "client closed request" status; it is never written to a socket.
    super('client_disconnected', 499, 'client', 'Client disconnected before the response completed');
    this.name = 'ClientDisconnectedError';
  }
}

export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new GatewayError('internal_error', 500, 'infrastructure', message, { cause: err });
}
