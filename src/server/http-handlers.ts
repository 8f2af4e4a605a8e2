import type http from 'node:http';
import type { GatewayConfig } from '../config/types.js';
import type { Gateway, GatewayStream, RouteInfo } from '../gateway/orchestrator.js';
import { GatewayError, RateLimitedError, toGatewayError } from '../gateway/errors.js';
import { parseChatRequest } from './parsed-request.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http');

export interface HandlerDeps {
  gateway: Gateway;
  /** Current configuration snapshot; read per request so reloads apply. */
  config: () => Readonly<GatewayConfig>;
}

export const ROUTER_HEADERS = [
  'X-Router-Policy',
  'X-Router-Label',
  'X-Router-Backend',
  'X-Router-Cache',
  'X-Router-Request-Id',
] as const;

// ─── GET /health ───────────────────────────────────────────────────────

export function handleHealth(_req: http.IncomingMessage, res: http.ServerResponse): void {
  sendJson(res, 200, { status: 'ok' });
}

// ─── GET /health/readiness ─────────────────────────────────────────────

export function handleReadiness(_req: http.IncomingMessage, res: http.ServerResponse, deps: HandlerDeps): void {
  const status = deps.gateway.status();
  sendJson(res, 200, {
    status: status.status,
    version: status.version,
    uptime: status.uptimeSecs,
    circuits: status.circuits,
    openCircuits: status.openCircuits,
    cache: status.cache,
  });
}

// ─── GET /v1/models ────────────────────────────────────────────────────

export function handleModels(_req: http.IncomingMessage, res: http.ServerResponse, deps: HandlerDeps): void {
  sendJson(res, 200, { object: 'list', data: deps.gateway.models() });
}

// ─── POST /v1/chat/completions ─────────────────────────────────────────

export async function handleChatCompletions(
  body: unknown,
  req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: HandlerDeps,
  requestId: string,
): Promise<void> {
  const parsed = parseChatRequest(body);

  // A client that hangs up aborts classifier and backend calls in flight.
  const abort = new AbortController();
  const onClose = () => {
    if (!res.writableFinished) abort.abort();
  };
  res.on('close', onClose);

  try {
    const result = await deps.gateway.handle({
      body: parsed.body,
      hints: parsed.hints,
      clientIp: getClientIp(req, deps.config().security.rateLimit.trustProxy),
      noCache: wantsNoCache(req),
      signal: abort.signal,
      requestId,
    });

    if (result.kind === 'stream') {
      await relayStream(res, result);
      return;
    }

    res.writeHead(result.status, {
      ...routerHeaders(result.route),
      'Content-Type': result.contentType,
      'Content-Length': Buffer.byteLength(result.body),
    });
    res.end(result.body);
  } finally {
    res.off('close', onClose);
  }
}

// ─── Streaming ─────────────────────────────────────────────────────────

async function relayStream(res: http.ServerResponse, result: GatewayStream): Promise<void> {
  res.writeHead(result.status, {
    ...routerHeaders(result.route),
    'Content-Type': result.contentType,
    'Cache-Control': 'no-cache',
    'Connection': 'keep-alive',
  });

  try {
    for await (const chunk of result.chunks) {
      if (res.destroyed) break;
      res.write(chunk);
    }
  } catch (err) {
    const error = toGatewayError(err);
    log.error(`Stream ${result.route.requestId} failed`, err);
    if (!res.destroyed) {
      res.write(`data: ${JSON.stringify(error.toErrorBody())}\n\n`);
    }
  } finally {
    if (!res.writableEnded) res.end();
  }
}

// ─── Helpers ───────────────────────────────────────────────────────────

/**
 * Socket address of the caller. `X-Forwarded-For` is client-supplied, so its
 * first hop is only taken when a trusted reverse proxy sets it.
 */
export function getClientIp(req: http.IncomingMessage, trustProxy = false): string {
  if (trustProxy) {
    const forwarded = req.headers['x-forwarded-for'];
    const value = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    const first = value?.split(',')[0]?.trim();
    if (first) return first;
  }
  return req.socket.remoteAddress || 'unknown';
}

export function wantsNoCache(req: http.IncomingMessage): boolean {
  const header = req.headers['cache-control'];
  if (!header) return false;
  return header
    .split(',')
    .map(d => d.trim().toLowerCase())
    .some(d => d === 'no-cache' || d === 'no-store');
}

export function routerHeaders(route: RouteInfo): Record<string, string> {
  return {
    'X-Router-Policy': route.policy,
    'X-Router-Label': route.label,
    'X-Router-Backend': route.backendId,
    'X-Router-Cache': route.cache,
    'X-Router-Request-Id': route.requestId,
  };
}

export function sendJson(
  res: http.ServerResponse,
  status: number,
  data: unknown,
  headers: Record<string, string> = {},
): void {
  const body = JSON.stringify(data, null, 2);
  res.writeHead(status, {
    ...headers,
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}

export function sendError(res: http.ServerResponse, err: GatewayError, requestId?: string): void {
  const headers: Record<string, string> = {};
  if (requestId) headers['X-Router-Request-Id'] = requestId;
  if (err instanceof RateLimitedError) headers['Retry-After'] = String(err.retryAfterSecs);
  sendJson(res, err.status, err.toErrorBody(), headers);
}
