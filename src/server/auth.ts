import type http from 'node:http';
import crypto from 'node:crypto';
import { UnauthorizedError } from '../gateway/errors.js';

/**
 * API key from `Authorization: Bearer <key>` (or the bare header value), or
 * from the `api_key` / `api-key` query parameter.
 */
export function extractApiKey(req: http.IncomingMessage, url: URL): string | undefined {
  const header = req.headers['authorization'];
  if (typeof header === 'string' && header.trim()) {
    const value = header.trim();
    return value.startsWith('Bearer ') ? value.slice(7).trim() : value;
  }
  return url.searchParams.get('api_key') ?? url.searchParams.get('api-key') ?? undefined;
}

function keysMatch(candidate: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(candidate).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

export function isPublicPath(pathname: string): boolean {
  return pathname === '/health' || pathname.startsWith('/health/');
}

/**
 * Throws UnauthorizedError unless auth is off, the path is public, or the
 * request carries one of the configured keys.
 */
export function authorize(req: http.IncomingMessage, url: URL, apiKeys: readonly string[]): void {
  if (apiKeys.length === 0 || isPublicPath(url.pathname)) return;

  const key = extractApiKey(req, url);
  if (!key) {
    throw new UnauthorizedError('unauthorized', 'Missing API key');
  }
  if (!apiKeys.some(expected => keysMatch(key, expected))) {
    throw new UnauthorizedError('invalid_api_key', 'Invalid API key');
  }
}
