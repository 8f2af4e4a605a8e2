import path from 'node:path';
import os from 'node:os';
import type { GatewayConfig } from './types.js';

const configDir = process.env['SWITCHYARD_CONFIG_DIR']
  ?? path.join(os.homedir(), '.config', 'switchyard');

export const defaults: Omit<GatewayConfig, 'policies' | 'defaultPolicy'> = {
  server: {
    host: '0.0.0.0',
    port: 8084,
    corsOrigins: ['*'],
    connectionPoolSize: 100,
    requestTimeoutSecs: 180,
    maxBodyBytes: 10 * 1024 * 1024,
  },
  security: {
    apiKeys: [],
    rateLimit: {
      enabled: true,
      requestsPerSecond: 50,
      burstSize: 100,
      perIp: true,
      trustProxy: false,
      idleTimeoutSecs: 300,
    },
  },
  logging: {
    level: 'info',
    json: false,
  },
  caching: {
    enabled: true,
    ttlSeconds: 3600,
    maxSize: 5000,
  },
  retry: {
    maxRetries: 3,
    initialBackoffMs: 500,
    maxBackoffMs: 5000,
  },
  circuitBreaker: {
    enabled: true,
    failureThreshold: 5,
    resetTimeoutSecs: 30,
  },
  loadBalancingStrategy: 'round_robin',
  metrics: {
    enabled: true,
    port: 9090,
  },
};

export const defaultConfigPath = path.join(configDir, 'config.json');

export { configDir };
