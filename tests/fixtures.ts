import type { Server } from 'node:http';
import type { GatewayConfig } from '../src/config/types.js';
import type { Backend } from '../src/router/types.js';
import { buildConfig } from '../src/config/index.js';

export const CLASSIFIER_URL = 'http://classifier.test/v2/models/task/infer';

/**
 * Two policies: `task` (classifier, with a replicated `code` label and an
 * `Other` fallback) and `agent` (agentic, no fallback).
 */
export function testConfig(overrides: Record<string, unknown> = {}): GatewayConfig {
  return buildConfig({
    policies: [
      {
        name: 'task',
        url: CLASSIFIER_URL,
        timeoutSecs: 2,
        llms: [
          { name: 'chat', apiBase: 'http://chat.test', apiKey: 'test-secret', model: 'chat-model' },
          { name: 'code', apiBase: 'http://code-a.test', apiKey: 'test-secret', model: 'code-model' },
          { name: 'code', apiBase: 'http://code-b.test', apiKey: 'test-secret', model: 'code-model' },
          { name: 'Other', apiBase: 'http://other.test', apiKey: 'test-secret', model: 'general-model' },
        ],
      },
      {
        name: 'agent',
        agentModel: { apiBase: 'http://agent.test', apiKey: 'test-secret', model: 'router-model' },
        availableLlms: [
          { name: 'Fast model', identifier: 'fast', apiBase: 'http://fast.test', model: 'fast-model' },
          { name: 'Smart model', identifier: 'smart', apiBase: 'http://smart.test', model: 'smart-model' },
        ],
      },
    ],
    defaultPolicy: 'task',
    ...overrides,
  }, {});
}

export function makeBackend(id: string, weight = 1): Backend {
  return {
    id,
    policy: 'p',
    name: 'llm',
    routingKey: 'llm',
    apiBase: `http://${id}.test`,
    apiKey: '',
    model: 'm',
    weight,
  };
}

/** Deterministic stand-in for Math.random: 0, 1/n, 2/n, ... wrapping at n. */
export function gridRandom(n: number): () => number {
  let i = 0;
  return () => (i++ % n) / n;
}

export function jsonResponse(status: number, data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function completion(content: string, usage = { prompt_tokens: 3, completion_tokens: 5, total_tokens: 8 }): unknown {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage,
  };
}

/** Start a server on an ephemeral loopback port and return its base URL. */
export async function listen(server: Server): Promise<string> {
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

export async function shutdown(server: Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

/** An SSE response that sends `first` and then never ends. */
export function stalledStream(first: string): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode(first));
    },
  });
  return new Response(body, { status: 200, headers: { 'Content-Type': 'text/event-stream' } });
}
