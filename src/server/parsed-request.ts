import { z } from 'zod';
import type { ChatCompletionBody } from '../proxy/types.js';
import type { RoutingHints } from '../router/types.js';
import { InvalidRequestError } from '../gateway/errors.js';

const messageSchema = z.object({
  role: z.string().min(1),
  content: z.unknown().optional(),
}).passthrough();

const routerExtensionSchema = z.object({
  policy: z.string().optional(),
  // "triton" names the classifier service and means the same thing.
  routing_strategy: z.enum(['triton', 'classifier', 'manual'])
    .transform(strategy => (strategy === 'triton' ? 'classifier' : strategy))
    .optional(),
  model: z.string().optional(),
  cache: z.boolean().optional(),
});

const chatBodySchema = z.object({
  model: z.string().optional(),
  messages: z.array(messageSchema).min(1, 'messages must not be empty'),
  stream: z.boolean().optional(),
  temperature: z.number().optional(),
  top_p: z.number().optional(),
  max_tokens: z.number().int().positive().optional(),
  cache: z.boolean().optional(),
  'nim-llm-router': routerExtensionSchema.optional(),
  'llm-router': routerExtensionSchema.optional(),
}).passthrough();

export interface ParsedRequest {
  body: ChatCompletionBody;
  hints: RoutingHints;
  stream: boolean;
}

/**
 * Validate an OpenAI chat completion body and pull out the routing
 * extension. Unknown fields are kept for forwarding.
 */
export function parseChatRequest(raw: unknown): ParsedRequest {
  const parsed = chatBodySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidRequestError(`Invalid request body: ${where}${issue?.message ?? 'malformed'}`);
  }

  const body: ChatCompletionBody = parsed.data;
  const extension = parsed.data['nim-llm-router'] ?? parsed.data['llm-router'];
  const hints: RoutingHints = {};
  if (extension?.policy !== undefined) hints.policy = extension.policy;
  if (extension?.routing_strategy !== undefined) hints.strategy = extension.routing_strategy;
  if (extension?.model !== undefined) hints.model = extension.model;
  if (extension?.cache !== undefined) hints.cache = extension.cache;

  return { body, hints, stream: parsed.data.stream === true };
}
