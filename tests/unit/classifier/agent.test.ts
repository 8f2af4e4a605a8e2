import { describe, it, expect, vi } from 'vitest';
import { AgentSelector, buildAgentPrompt, matchIdentifier, normalizeReply } from '../../../src/classifier/agent.js';
import { BackendClient } from '../../../src/proxy/backend-client.js';
import { PolicyResolver } from '../../../src/router/policy-resolver.js';
import type { AgenticPolicy } from '../../../src/router/types.js';
import type { FetchLike } from '../../../src/proxy/types.js';
import { ClassificationUnavailableError } from '../../../src/gateway/errors.js';
import { completion, jsonResponse, testConfig } from '../../fixtures.js';

function agentPolicy(): AgenticPolicy {
  const policy = new PolicyResolver(testConfig()).resolve('agent');
  if (policy.kind !== 'agentic') throw new Error('expected an agentic policy');
  return policy;
}

describe('agent prompt and reply handling', () => {
  const policy = agentPolicy();

  it('lists each identifier with its name', () => {
    expect(buildAgentPrompt(policy)).toBe([
      'You route user requests to the most suitable model.',
      'Available models (identifier: name):',
      'fast: Fast model',
      'smart: Smart model',
      'Reply with exactly one identifier from the list and nothing else.',
    ].join('\n'));
  });

  it('normalizes quotes, backticks, punctuation and case', () => {
    expect(normalizeReply('  "Fast."  ')).toBe('fast');
    expect(normalizeReply('`smart`')).toBe('smart');
    expect(normalizeReply("'SMART'!")).toBe('smart');
  });

  it('accepts exactly one identifier', () => {
    expect(matchIdentifier(policy, 'Smart!')).toBe('smart');
    expect(matchIdentifier(policy, 'fast or smart')).toBeUndefined();
    expect(matchIdentifier(policy, 'medium')).toBeUndefined();
  });
});

describe('AgentSelector', () => {
  const policy = agentPolicy();

  it('asks the agent model and returns its choice', async () => {
    const fetchFn = vi.fn<FetchLike>(async () => jsonResponse(200, completion('fast')));
    const selector = new AgentSelector(new BackendClient({ maxConcurrent: 2, fetch: fetchFn }));

    const result = await selector.select(policy, 'quick question', { timeoutMs: 1_000 });

    expect(result.label).toBe('fast');
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('http://agent.test/v1/chat/completions');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'router-model',
      messages: [
        { role: 'system', content: buildAgentPrompt(policy) },
        { role: 'user', content: 'quick question' },
      ],
      temperature: 0,
      max_tokens: 32,
      stream: false,
    });
  });

  it('rejects a reply that names no configured model', async () => {
    const selector = new AgentSelector(new BackendClient({
      maxConcurrent: 2,
      fetch: async () => jsonResponse(200, completion('medium')),
    }));
    await expect(selector.select(policy, 'hi', { timeoutMs: 1_000 }))
      .rejects.toThrow('Classification unavailable for policy agent: agent reply does not name exactly one model');
  });

  it('reports transport failures as unavailable', async () => {
    const selector = new AgentSelector(new BackendClient({
      maxConcurrent: 2,
      fetch: async () => new Response('down', { status: 503 }),
    }));
    await expect(selector.select(policy, 'hi', { timeoutMs: 1_000 }))
      .rejects.toBeInstanceOf(ClassificationUnavailableError);
  });
});
