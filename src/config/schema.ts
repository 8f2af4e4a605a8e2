import { z } from 'zod';

const logLevel = z.enum(['debug', 'info', 'warn', 'error']);

export const loadBalancingStrategySchema = z.enum(['round_robin', 'random', 'weighted_random']);

const llmSchema = z.object({
  name: z.string().trim().min(1, 'llm name must not be empty'),
  identifier: z.string().trim().min(1).optional(),
  apiBase: z.string().trim().min(1, 'apiBase must not be empty'),
  apiKey: z.string().default(''),
  model: z.string().trim().min(1, 'model must not be empty'),
  weight: z.number().nonnegative('weight must be >= 0').optional(),
});

const classifierPolicySchema = z.object({
  name: z.string().trim().min(1, 'policy name must not be empty'),
  url: z.string().url(),
  timeoutSecs: z.number().positive().optional(),
  llms: z.array(llmSchema).min(1, 'policy needs at least one llm'),
});

const agentModelSchema = z.object({
  apiBase: z.string().trim().min(1),
  apiKey: z.string().default(''),
  model: z.string().trim().min(1),
});

const agenticPolicySchema = z.object({
  name: z.string().trim().min(1, 'policy name must not be empty'),
  agentModel: agentModelSchema,
  timeoutSecs: z.number().positive().optional(),
  availableLlms: z.array(
    llmSchema.extend({ identifier: z.string().trim().min(1, 'agentic llms need an identifier') }),
  ).min(1, 'agentic policy needs at least one llm'),
});

export const policySchema = z.union([classifierPolicySchema, agenticPolicySchema]);

export const gatewayConfigSchema = z.object({
  policies: z.array(policySchema).min(1, 'at least one policy is required'),
  defaultPolicy: z.string().trim().min(1),
  server: z.object({
    host: z.string(),
    port: z.number().int().min(0).max(65535),
    corsOrigins: z.array(z.string()),
    connectionPoolSize: z.number().int().positive(),
    requestTimeoutSecs: z.number().positive(),
    maxBodyBytes: z.number().int().positive(),
  }),
  security: z.object({
    apiKeys: z.array(z.string()),
    rateLimit: z.object({
      enabled: z.boolean(),
      requestsPerSecond: z.number().positive(),
      burstSize: z.number().int().positive(),
      perIp: z.boolean(),
      trustProxy: z.boolean(),
      idleTimeoutSecs: z.number().positive(),
    }),
  }),
  logging: z.object({
    level: logLevel,
    json: z.boolean(),
  }),
  caching: z.object({
    enabled: z.boolean(),
    ttlSeconds: z.number().positive(),
    maxSize: z.number().int().positive(),
  }),
  retry: z.object({
    maxRetries: z.number().int().min(0),
    initialBackoffMs: z.number().min(0),
    maxBackoffMs: z.number().min(0),
  }),
  circuitBreaker: z.object({
    enabled: z.boolean(),
    failureThreshold: z.number().int().positive(),
    resetTimeoutSecs: z.number().min(0),
  }),
  loadBalancingStrategy: loadBalancingStrategySchema,
  metrics: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(0).max(65535),
  }),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.policies.forEach((policy, index) => {
    if (seen.has(policy.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['policies', index, 'name'],
        message: `duplicate policy name "${policy.name}"`,
      });
    }
    seen.add(policy.name);
  });
  if (!seen.has(config.defaultPolicy)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['defaultPolicy'],
      message: `defaultPolicy "${config.defaultPolicy}" does not name a configured policy`,
    });
  }
});
