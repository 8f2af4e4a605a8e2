import { describe, it, expect, vi } from 'vitest';
import { BackendClient, chatCompletionsUrl, extractUsage, isTransientStatus } from '../../../src/proxy/backend-client.js';
import type { FetchLike, UpstreamTarget } from '../../../src/proxy/types.js';
import { ClientDisconnectedError, UpstreamError } from '../../../src/gateway/errors.js';
import { completion, jsonResponse, stalledStream } from '../../fixtures.js';

const target: UpstreamTarget = {
  id: 'task/chat#0',
  apiBase: 'http://chat.test/',
  apiKey: 'test-secret',
  model: 'chat-model',
};

const body = { model: 'chat-model', messages: [{ role: 'user', content: 'hi' }] };
const options = { timeoutMs: 1_000 };

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => { throw new Error('expected a rejection'); },
    (err: unknown) => err,
  );
}

describe('chatCompletionsUrl', () => {
  it('appends the OpenAI path, once', () => {
    expect(chatCompletionsUrl('http://chat.test')).toBe('http://chat.test/v1/chat/completions');
    expect(chatCompletionsUrl('http://chat.test/')).toBe('http://chat.test/v1/chat/completions');
    expect(chatCompletionsUrl('http://chat.test/v1/')).toBe('http://chat.test/v1/chat/completions');
  });
});

describe('isTransientStatus', () => {
  it('treats 408, 429 and 5xx as transient', () => {
    expect([408, 429, 500, 502, 503].every(isTransientStatus)).toBe(true);
    expect([400, 401, 403, 404, 422].some(isTransientStatus)).toBe(false);
  });
});

describe('extractUsage', () => {
  it('reads OpenAI usage fields', () => {
    expect(extractUsage(JSON.stringify(completion('x')))).toEqual({
      promptTokens: 3,
      completionTokens: 5,
      totalTokens: 8,
    });
  });

  it('returns undefined for bodies without usage', () => {
    expect(extractUsage('not json')).toBeUndefined();
    expect(extractUsage('{"choices":[]}')).toBeUndefined();
  });
});

describe('BackendClient', () => {
  it('posts the body with bearer auth and returns the response', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse(200, completion('hello')));
    const client = new BackendClient({ maxConcurrent: 4, fetch: fetchFn });

    const response = await client.complete(target, body, options);

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('http://chat.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(init?.body).toBe(JSON.stringify(body));
    expect(response.backendId).toBe('task/chat#0');
    expect(response.status).toBe(200);
    expect(response.body).toBe(JSON.stringify(completion('hello')));
    expect(response.usage).toEqual({ promptTokens: 3, completionTokens: 5, totalTokens: 8 });
  });

  it('omits the Authorization header when the backend has no key', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse(200, completion('hello')));
    const client = new BackendClient({ maxConcurrent: 4, fetch: fetchFn });
    await client.complete({ ...target, apiKey: '' }, body, options);
    expect(fetchFn.mock.calls[0]?.[1].headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('classifies 5xx responses as transient', async () => {
    const client = new BackendClient({
      maxConcurrent: 4,
      fetch: async () => new Response('overloaded', { status: 503 }),
    });
    const err = await failure(client.complete(target, body, options));

    expect(err).toBeInstanceOf(UpstreamError);
    if (err instanceof UpstreamError) {
      expect(err.transient).toBe(true);
      expect(err.upstreamStatus).toBe(503);
      expect(err.body).toBe('overloaded');
      expect(err.type).toBe('upstream_transient');
    }
  });

  it('classifies 4xx responses as permanent with the upstream status', async () => {
    const client = new BackendClient({
      maxConcurrent: 4,
      fetch: async () => new Response('{"error":"bad"}', { status: 400 }),
    });
    const err = await failure(client.complete(target, body, options));

    expect(err).toBeInstanceOf(UpstreamError);
    if (err instanceof UpstreamError) {
      expect(err.transient).toBe(false);
      expect(err.status).toBe(400);
      expect(err.type).toBe('upstream_permanent');
    }
  });

  it('treats network errors as transient', async () => {
    const client = new BackendClient({
      maxConcurrent: 4,
      fetch: async () => { throw new TypeError('fetch failed'); },
    });
    const err = await failure(client.complete(target, body, options));

    expect(err).toBeInstanceOf(UpstreamError);
    if (err instanceof UpstreamError) {
      expect(err.transient).toBe(true);
      expect(err.message).toBe('Backend task/chat#0 unreachable: fetch failed');
    }
  });

  it('times out calls that take too long', async () => {
    const client = new BackendClient({
      maxConcurrent: 4,
      fetch: (_url, init) => new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      }),
    });
    const err = await failure(client.complete(target, body, { timeoutMs: 20 }));

    expect(err).toBeInstanceOf(UpstreamError);
    if (err instanceof UpstreamError) {
      expect(err.transient).toBe(true);
      expect(err.message).toBe('Backend task/chat#0 timed out after 20ms');
    }
  });

  it('does not call out for an already-aborted request', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse(200, completion('hello')));
    const client = new BackendClient({ maxConcurrent: 4, fetch: fetchFn });
    const controller = new AbortController();
    controller.abort();

    await expect(client.complete(target, body, { ...options, signal: controller.signal }))
      .rejects.toBeInstanceOf(ClientDisconnectedError);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('streams the upstream body as text chunks', async () => {
    const sse = 'data: {"choices":[{"delta":{"content":"hi"}}]}\n\ndata: [DONE]\n\n';
    const client = new BackendClient({
      maxConcurrent: 4,
      fetch: async () => new Response(sse, { status: 200, headers: { 'Content-Type': 'text/event-stream' } }),
    });

    const stream = await client.stream(target, { ...body, stream: true }, options);
    let text = '';
    for await (const chunk of stream.chunks) text += chunk;

    expect(stream.contentType).toBe('text/event-stream');
    expect(text).toBe(sse);
    expect(client.activeRequests).toBe(0);
  });

  it('times out a stream that stalls after its first chunk', async () => {
    const client = new BackendClient({ maxConcurrent: 4, fetch: async () => stalledStream('data: partial\n\n') });

    const stream = await client.stream(target, { ...body, stream: true }, { timeoutMs: 50 });
    const received: string[] = [];
    const err = await failure((async () => {
      for await (const chunk of stream.chunks) received.push(chunk);
    })());

    expect(received).toEqual(['data: partial\n\n']);
    expect(err).toBeInstanceOf(UpstreamError);
    if (err instanceof UpstreamError) {
      expect(err.transient).toBe(true);
      expect(err.message).toBe('Backend task/chat#0 timed out after 50ms');
    }
    expect(client.activeRequests).toBe(0);
  });

  it('ends a stalled stream when the client goes away', async () => {
    const client = new BackendClient({ maxConcurrent: 4, fetch: async () => stalledStream('data: partial\n\n') });
    const controller = new AbortController();

    const stream = await client.stream(target, { ...body, stream: true }, { timeoutMs: 60_000, signal: controller.signal });
    const iterator = stream.chunks[Symbol.asyncIterator]();
    await iterator.next();
    const pending = iterator.next();
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(ClientDisconnectedError);
    expect(client.activeRequests).toBe(0);
  });

  it('gives back the slot of a stream nobody reads once the deadline passes', async () => {
    const client = new BackendClient({ maxConcurrent: 4, fetch: async () => stalledStream('data: partial\n\n') });

    await client.stream(target, { ...body, stream: true }, { timeoutMs: 20 });
    expect(client.activeRequests).toBe(1);

    await new Promise(resolve => setTimeout(resolve, 60));
    expect(client.activeRequests).toBe(0);
  });

  it('bounds concurrent upstream calls', async () => {
    let open!: () => void;
    const gate = new Promise<void>(resolve => { open = resolve; });
    const fetchFn = vi.fn<FetchLike>(async () => {
      await gate;
      return jsonResponse(200, completion('hello'));
    });
    const client = new BackendClient({ maxConcurrent: 1, fetch: fetchFn });

    const first = client.complete(target, body, options);
    const second = client.complete(target, body, options);
    await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledTimes(1));
    expect(client.activeRequests).toBe(1);

    open();
    await Promise.all([first, second]);
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(client.activeRequests).toBe(0);
  });
});
