import type http from 'node:http';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { createHttpProxy } from '../../../src/server/http-proxy.js';
import { Gateway } from '../../../src/gateway/orchestrator.js';
import type { FetchLike } from '../../../src/proxy/types.js';
import { completion, jsonResponse, listen, shutdown, testConfig } from '../../fixtures.js';

const SSE = 'data: {"choices":[{"delta":{"content":"hi"}}]}\n\ndata: [DONE]\n\n';

const backends = vi.fn<FetchLike>(async (input, init) => {
  const host = new URL(input).host;
  if (host === 'chat.test') {
    const body: unknown = JSON.parse(String(init.body));
    const streaming = typeof body === 'object' && body !== null && 'stream' in body && body.stream === true;
    return streaming
      ? new Response(SSE, { status: 200, headers: { 'Content-Type': 'text/event-stream' } })
      : jsonResponse(200, completion('hello'));
  }
  throw new Error(`unexpected upstream ${input}`);
});

const chat = {
  messages: [{ role: 'user', content: 'hi' }],
  'llm-router': { model: 'chat' },
};

let server: http.Server | undefined;

afterEach(async () => {
  if (server) await shutdown(server);
  server = undefined;
  backends.mockClear();
});

async function start(overrides: Record<string, unknown> = {}): Promise<string> {
  const config = testConfig(overrides);
  server = createHttpProxy({ gateway: new Gateway(config, { fetch: backends }), config: () => config });
  return listen(server);
}

function post(base: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(`${base}/v1/chat/completions`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

describe('createHttpProxy', () => {
  it('answers health checks', async () => {
    const base = await start();

    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });

    const ready = await fetch(`${base}/health/readiness`);
    expect(await ready.json()).toMatchObject({ status: 'ok', openCircuits: 0 });
  });

  it('lists models', async () => {
    const base = await start();

    const res = await fetch(`${base}/v1/models`);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ object: 'list' });
    expect(body).toHaveProperty('data.length', 5);
  });

  it('relays a completion with routing headers', async () => {
    const base = await start();

    const res = await post(base, chat);

    expect(res.status).toBe(200);
    expect(res.headers.get('x-router-policy')).toBe('task');
    expect(res.headers.get('x-router-backend')).toBe('task/chat#0');
    expect(res.headers.get('x-router-cache')).toBe('MISS');
    expect(await res.json()).toEqual(completion('hello'));

    const again = await post(base, chat);
    expect(again.headers.get('x-router-cache')).toBe('HIT');
    expect(backends).toHaveBeenCalledTimes(1);
  });

  it('skips the cache for Cache-Control: no-cache', async () => {
    const base = await start();

    await post(base, chat);
    const res = await post(base, chat, { 'Cache-Control': 'no-cache' });

    expect(res.headers.get('x-router-cache')).toBe('BYPASS');
    expect(backends).toHaveBeenCalledTimes(2);
  });

  it('streams server-sent events', async () => {
    const base = await start();

    const res = await post(base, { ...chat, stream: true });

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/event-stream');
    expect(await res.text()).toBe(SSE);
  });

  it('reports invalid bodies as 400', async () => {
    const base = await start();

    const broken = await post(base, '{ nope');
    expect(broken.status).toBe(400);
    expect(await broken.json()).toMatchObject({ error: { type: 'invalid_request', source: 'client', status: 400 } });

    const empty = await post(base, { messages: [] });
    expect(await empty.json()).toMatchObject({
      error: { message: 'Invalid request body: messages: messages must not be empty' },
    });
  });

  it('rejects oversized bodies', async () => {
    const base = await start({ server: { maxBodyBytes: 16 } });

    const res = await post(base, chat);

    expect(res.status).toBe(413);
    expect(await res.json()).toMatchObject({ error: { type: 'payload_too_large' } });
  });

  it('requires an API key when keys are configured', async () => {
    const base = await start({ security: { apiKeys: ['test-secret'] } });

    const missing = await fetch(`${base}/v1/models`);
    expect(missing.status).toBe(401);
    expect(await missing.json()).toMatchObject({ error: { type: 'unauthorized' } });

    const ok = await fetch(`${base}/v1/models`, { headers: { Authorization: 'Bearer test-secret' } });
    expect(ok.status).toBe(200);

    const health = await fetch(`${base}/health`);
    expect(health.status).toBe(200);
  });

  it('sends Retry-After when rate limited', async () => {
    const base = await start({ security: { rateLimit: { burstSize: 1, requestsPerSecond: 1 } } });

    await post(base, chat);
    const res = await post(base, chat);

    expect(res.status).toBe(429);
    expect(res.headers.get('retry-after')).toBe('1');
    expect(res.headers.get('x-router-request-id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('does not let X-Forwarded-For pick a fresh rate-limit bucket', async () => {
    const base = await start({ security: { rateLimit: { burstSize: 1, requestsPerSecond: 0.01, perIp: true } } });

    const first = await post(base, chat, { 'X-Forwarded-For': '198.51.100.1' });
    const second = await post(base, chat, { 'X-Forwarded-For': '198.51.100.2' });

    expect(first.status).toBe(200);
    expect(second.status).toBe(429);
  });

  it('buckets by the forwarded address behind a trusted proxy', async () => {
    const base = await start({
      security: { rateLimit: { burstSize: 1, requestsPerSecond: 0.01, perIp: true, trustProxy: true } },
    });

    const first = await post(base, chat, { 'X-Forwarded-For': '198.51.100.1' });
    const other = await post(base, chat, { 'X-Forwarded-For': '198.51.100.2' });
    const repeat = await post(base, chat, { 'X-Forwarded-For': '198.51.100.1' });

    expect(first.status).toBe(200);
    expect(other.status).toBe(200);
    expect(repeat.status).toBe(429);
  });

  it('answers preflight requests', async () => {
    const base = await start();

    const res = await fetch(`${base}/v1/chat/completions`, { method: 'OPTIONS' });

    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('returns 404 for unknown routes', async () => {
    const base = await start();

    const res = await fetch(`${base}/v2/anything`);

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: { type: 'not_found', message: 'No route for GET /v2/anything' } });
  });
});
