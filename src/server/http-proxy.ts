import http from 'node:http';
import crypto from 'node:crypto';
import { GatewayError, InvalidRequestError, PayloadTooLargeError, toGatewayError } from '../gateway/errors.js';
import { authorize } from './auth.js';
import type { HandlerDeps } from './http-handlers.js';
import {
  ROUTER_HEADERS,
  handleChatCompletions,
  handleHealth,
  handleModels,
  handleReadiness,
  sendError,
} from './http-handlers.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http-proxy');

export type HttpProxyDeps = HandlerDeps;

export function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const declared = Number(req.headers['content-length']);
    if (Number.isFinite(declared) && declared > limit) {
      reject(new PayloadTooLargeError(limit));
      req.resume();
      return;
    }

    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!tooLarge) resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new InvalidRequestError(`Request body is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function applyCors(req: http.IncomingMessage, res: http.ServerResponse, origins: readonly string[]): void {
  const origin = req.headers['origin'];
  if (origins.includes('*')) {
    res.setHeader('Access-Control-Allow-Origin', '*');
  } else if (origin && origins.includes(origin)) {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Vary', 'Origin');
  } else {
    return;
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, Cache-Control');
  res.setHeader('Access-Control-Expose-Headers', [...ROUTER_HEADERS, 'Retry-After'].join(', '));
}

async function dispatchRequest(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  deps: HttpProxyDeps,
  requestId: string,
): Promise<void> {
  const config = deps.config();
  const url = new URL(req.url ?? '/', 'http://localhost');
  const method = req.method ?? 'GET';

  applyCors(req, res, config.server.corsOrigins);
  if (method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    return;
  }

  authorize(req, url, config.security.apiKeys);

  if (method === 'GET' && url.pathname === '/health') {
    handleHealth(req, res);
  } else if (method === 'GET' && url.pathname === '/health/readiness') {
    handleReadiness(req, res, deps);
  } else if (method === 'GET' && url.pathname === '/v1/models') {
    handleModels(req, res, deps);
  } else if (method === 'POST' && url.pathname === '/v1/chat/completions') {
    const raw = await readBody(req, config.server.maxBodyBytes);
    await handleChatCompletions(parseJson(raw), req, res, deps, requestId);
  } else {
    throw new GatewayError('not_found', 404, 'client', `No route for ${method} ${url.pathname}`);
  }
}

/**
 * OpenAI-compatible HTTP front end. Every failure is answered with the
 * gateway's JSON error body; a request is never left without a response.
 */
export function createHttpProxy(deps: HttpProxyDeps): http.Server {
  return http.createServer((req, res) => {
    const requestId = crypto.randomUUID();
    dispatchRequest(req, res, deps, requestId).catch((err: unknown) => {
      const error = toGatewayError(err);
      if (error.status >= 500) {
        log.error(`${req.method ?? 'GET'} ${req.url ?? '/'} failed`, err);
      } else {
        log.debug(`${req.method ?? 'GET'} ${req.url ?? '/'} -> ${error.status} ${error.type}`);
      }
      if (res.destroyed) return;
      if (res.headersSent) {
        if (!res.writableEnded) res.end();
        return;
      }
      sendError(res, error, requestId);
    });
  });
}
