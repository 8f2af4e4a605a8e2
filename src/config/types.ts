import type { z } from 'zod';
import type { gatewayConfigSchema, loadBalancingStrategySchema, policySchema } from './schema.js';

export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;

export type PolicyConfig = z.infer<typeof policySchema>;

export type LoadBalancingStrategy = z.infer<typeof loadBalancingStrategySchema>;

export type LogLevel = GatewayConfig['logging']['level'];

export type ServerConfig = GatewayConfig['server'];
export type RateLimitConfig = GatewayConfig['security']['rateLimit'];
export type CachingConfig = GatewayConfig['caching'];
export type RetryConfig = GatewayConfig['retry'];
export type CircuitBreakerConfig = GatewayConfig['circuitBreaker'];
