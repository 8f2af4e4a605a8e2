import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import type { AgenticPolicy } from '../router/types.js';
import type { BackendClient } from '../proxy/backend-client.js';
import type { ChatCompletionBody } from '../proxy/types.js';
import type { ClassificationResult, ClassifyOptions } from './types.js';
import { ClassificationUnavailableError, ClientDisconnectedError } from '../gateway/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('agent');

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
  })).min(1),
});

export function buildAgentPrompt(policy: AgenticPolicy): string {
  const seen = new Set<string>();
  const lines: string[] = [];
  for (const backend of policy.backends) {
    if (seen.has(backend.routingKey)) continue;
    seen.add(backend.routingKey);
    lines.push(`${backend.routingKey}: ${backend.name}`);
  }
  return [
    'You route user requests to the most suitable model.',
    'Available models (identifier: name):',
    ...lines,
    'Reply with exactly one identifier from the list and nothing else.',
  ].join('\n');
}

/**
 * Trim, strip wrapping quotes/backticks and trailing punctuation, lower-case.
 */
export function normalizeReply(reply: string): string {
  return reply.replace(/^[\s"'`]+|[\s"'`.,;:!?]+$/g, '').toLowerCase();
}

/**
 * Maps the agent's reply onto one of the policy identifiers. Anything that
 * is not exactly one identifier is rejected.
 */
export function matchIdentifier(policy: AgenticPolicy, reply: string): string | undefined {
  const normalized = normalizeReply(reply);
  const matches = policy.labels.filter(label => label.toLowerCase() === normalized);
  return matches.length === 1 ? matches[0] : undefined;
}

/**
 * Asks the policy's agent model which backend should serve a request.
 */
export class AgentSelector {
  constructor(private readonly client: BackendClient) {}

  async select(policy: AgenticPolicy, text: string, options: ClassifyOptions): Promise<ClassificationResult> {
    const startMs = performance.now();
    const body: ChatCompletionBody = {
      model: policy.agent.model,
      messages: [
        { role: 'system', content: buildAgentPrompt(policy) },
        { role: 'user', content: text },
      ],
      temperature: 0,
      max_tokens: 32,
      stream: false,
    };

    let raw: string;
    try {
      const response = await this.client.complete(policy.agent, body, options);
      raw = response.body;
    } catch (err) {
      if (err instanceof ClientDisconnectedError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      log.warn(`Agent for ${policy.name} failed: ${reason}`);
      throw new ClassificationUnavailableError(policy.name, `agent call failed: ${reason}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ClassificationUnavailableError(policy.name, 'agent response is not JSON', { cause: err });
    }
    const completion = completionSchema.safeParse(parsed);
    const content = completion.success ? completion.data.choices[0]?.message.content : undefined;
    if (!content) {
      throw new ClassificationUnavailableError(policy.name, 'agent response has no content');
    }

    const label = matchIdentifier(policy, content);
    if (!label) {
      log.warn(`Agent for ${policy.name} chose an unknown model: "${content.slice(0, 80)}"`);
      throw new ClassificationUnavailableError(policy.name, 'agent reply does not name exactly one model');
    }
    return { label, classifiedInMs: Math.round(performance.now() - startMs) };
  }
}
