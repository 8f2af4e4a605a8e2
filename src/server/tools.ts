import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Gateway } from '../gateway/orchestrator.js';
import type { ChatCompletionBody } from '../proxy/types.js';
import type { RoutingHints } from '../router/types.js';
import { toGatewayError } from '../gateway/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('tools');

const completionContentSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
  })).min(1),
});

/**
 * Assistant text of a chat completion body, or the raw body when it does
 * not have the OpenAI shape.
 */
export function completionText(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    log.debug(`Completion body is not JSON: ${err instanceof Error ? err.message : String(err)}`);
    return body;
  }
  const result = completionContentSchema.safeParse(parsed);
  return result.success ? (result.data.choices[0]?.message.content ?? '') : body;
}

export function registerTools(server: McpServer, gateway: Gateway): void {
  // Tool 1: route_chat - send a conversation through the full pipeline
  server.tool(
    'route_chat',
    'Send chat messages through the gateway: policy resolution, classification, load balancing, retries and caching. Returns the model reply plus routing metadata.',
    {
      messages: z.array(z.object({
        role: z.enum(['system', 'user', 'assistant']),
        content: z.string(),
      })).min(1).describe('Conversation messages in chronological order'),

      policy: z.string().optional()
        .describe('Routing policy name; the default policy when omitted'),

      model: z.string().optional()
        .describe('Routing key to use directly, bypassing classification'),

      maxTokens: z.number().int().positive().optional()
        .describe('Maximum tokens to generate'),

      temperature: z.number().min(0).max(2).optional()
        .describe('Sampling temperature'),

      cache: z.boolean().optional()
        .describe('Set false to skip the response cache'),
    },
    async ({ messages, policy, model, maxTokens, temperature, cache }) => {
      const body: ChatCompletionBody = { messages: messages.map(m => ({ role: m.role, content: m.content })) };
      if (maxTokens !== undefined) body.max_tokens = maxTokens;
      if (temperature !== undefined) body.temperature = temperature;

      const hints: RoutingHints = {};
      if (policy !== undefined) hints.policy = policy;
      if (model !== undefined) {
        hints.model = model;
        hints.strategy = 'manual';
      }
      if (cache !== undefined) hints.cache = cache;

      try {
        const result = await gateway.handle({ body, hints, clientIp: 'mcp' });
        if (result.kind !== 'response') {
          return { content: [{ type: 'text' as const, text: 'Unexpected streaming result' }], isError: true };
        }
        return {
          content: [{
            type: 'text' as const,
            text: JSON.stringify({
              response: completionText(result.body),
              routing: {
                requestId: result.route.requestId,
                policy: result.route.policy,
                label: result.route.label,
                labelSource: result.route.decision?.source ?? 'cache',
                confidence: result.route.decision?.confidence ?? null,
                backend: result.route.backendId,
                cache: result.route.cache,
                attempts: result.route.attempts,
              },
            }, null, 2),
          }],
        };
      } catch (err) {
        const error = toGatewayError(err);
        log.error('route_chat failed', err);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(error.toErrorBody(), null, 2) }],
          isError: true,
        };
      }
    },
  );

  // Tool 2: gateway_status - policies, circuits, cache and limiter
  server.tool(
    'gateway_status',
    'Show configured policies, circuit breaker states, response cache and rate limiter sizes.',
    {},
    async () => ({
      content: [{ type: 'text' as const, text: JSON.stringify(gateway.status(), null, 2) }],
    }),
  );

  // Tool 3: reset_circuit - force a backend back into service
  server.tool(
    'reset_circuit',
    'Force the circuit breaker of one backend closed. Backend ids look like "<policy>/<label>#<index>".',
    {
      backendId: z.string().min(1).describe('Backend id as shown by gateway_status'),
    },
    async ({ backendId }) => {
      const reset = gateway.resetCircuit(backendId);
      return {
        content: [{
          type: 'text' as const,
          text: reset ? `Circuit for ${backendId} is closed.` : `Unknown backend: ${backendId}`,
        }],
        ...(reset ? {} : { isError: true }),
      };
    },
  );
}
