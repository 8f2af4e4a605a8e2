import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { ConfigError, buildConfig, loadConfig, resolveSecret } from '../../../src/config/index.js';

const minimal = {
  defaultPolicy: 'task',
  policies: [{
    name: 'task',
    url: 'http://classifier.test/infer',
    llms: [{ name: 'chat', apiBase: 'http://chat.test', apiKey: '${CHAT_KEY}', model: 'chat-model' }],
  }],
};

describe('buildConfig', () => {
  it('fills in defaults', () => {
    const config = buildConfig(minimal, {});
    expect(config.server.port).toBe(8084);
    expect(config.server.requestTimeoutSecs).toBe(180);
    expect(config.security.rateLimit).toEqual({
      enabled: true,
      requestsPerSecond: 50,
      burstSize: 100,
      perIp: true,
      trustProxy: false,
      idleTimeoutSecs: 300,
    });
    expect(config.caching).toEqual({ enabled: true, ttlSeconds: 3600, maxSize: 5000 });
    expect(config.retry).toEqual({ maxRetries: 3, initialBackoffMs: 500, maxBackoffMs: 5000 });
    expect(config.circuitBreaker).toEqual({ enabled: true, failureThreshold: 5, resetTimeoutSecs: 30 });
    expect(config.loadBalancingStrategy).toBe('round_robin');
  });

  it('deep-merges partial sections from the file', () => {
    const config = buildConfig({ ...minimal, security: { rateLimit: { burstSize: 10 } } }, {});
    expect(config.security.rateLimit.burstSize).toBe(10);
    expect(config.security.rateLimit.requestsPerSecond).toBe(50);
    expect(config.security.apiKeys).toEqual([]);
  });

  it('applies environment overrides last', () => {
    const config = buildConfig({ ...minimal, server: { port: 7000 } }, {
      SWITCHYARD_PORT: '9000',
      SWITCHYARD_API_KEYS: 'key-one, key-two,',
      SWITCHYARD_LOG_LEVEL: 'debug',
      SWITCHYARD_RATE_LIMIT_RPS: '5',
      SWITCHYARD_JSON_LOGGING: 'true',
    });
    expect(config.server.port).toBe(9000);
    expect(config.security.apiKeys).toEqual(['key-one', 'key-two']);
    expect(config.logging).toEqual({ level: 'debug', json: true });
    expect(config.security.rateLimit.requestsPerSecond).toBe(5);
  });

  it('ignores non-numeric numeric overrides', () => {
    const config = buildConfig(minimal, { SWITCHYARD_PORT: 'eighty' });
    expect(config.server.port).toBe(8084);
  });

  it('resolves ${VAR} api keys from the environment', () => {
    const config = buildConfig(minimal, { CHAT_KEY: 'test-secret' });
    const policy = config.policies[0];
    expect(policy && 'llms' in policy ? policy.llms[0]?.apiKey : undefined).toBe('test-secret');
  });

  it('keeps unresolved references as they are', () => {
    const config = buildConfig(minimal, {});
    const policy = config.policies[0];
    expect(policy && 'llms' in policy ? policy.llms[0]?.apiKey : undefined).toBe('${CHAT_KEY}');
  });

  it('rejects duplicate policy names', () => {
    expect(() => buildConfig({ ...minimal, policies: [...minimal.policies, ...minimal.policies] }, {}))
      .toThrow('duplicate policy name "task"');
  });

  it('rejects a default policy that names no policy', () => {
    expect(() => buildConfig({ ...minimal, defaultPolicy: 'missing' }, {}))
      .toThrow('defaultPolicy "missing" does not name a configured policy');
  });

  it('rejects negative weights and empty backend fields', () => {
    const llm = { name: 'chat', apiBase: 'http://chat.test', model: 'chat-model' };
    const withLlm = (entry: Record<string, unknown>) => ({
      ...minimal,
      policies: [{ name: 'task', url: 'http://classifier.test/infer', llms: [entry] }],
    });
    expect(() => buildConfig(withLlm({ ...llm, weight: -1 }), {})).toThrow(ConfigError);
    expect(() => buildConfig(withLlm({ ...llm, apiBase: '' }), {})).toThrow(ConfigError);
    expect(() => buildConfig(withLlm({ ...llm, model: ' ' }), {})).toThrow(ConfigError);
  });

  it('requires identifiers on agentic backends', () => {
    const config = {
      defaultPolicy: 'agent',
      policies: [{
        name: 'agent',
        agentModel: { apiBase: 'http://agent.test', model: 'router-model' },
        availableLlms: [{ name: 'fast', apiBase: 'http://fast.test', model: 'fast-model' }],
      }],
    };
    expect(() => buildConfig(config, {})).toThrow(ConfigError);
  });

  it('rejects input that is not an object', () => {
    expect(() => buildConfig([], {})).toThrow('Configuration must be a JSON object');
  });
});

describe('resolveSecret', () => {
  it('only replaces whole ${VAR} references', () => {
    expect(resolveSecret('${A}', 'p/x', { A: 'test-secret' })).toBe('test-secret');
    expect(resolveSecret('prefix-${A}', 'p/x', { A: 'test-secret' })).toBe('prefix-${A}');
    expect(resolveSecret('plain', 'p/x', {})).toBe('plain');
  });
});

describe('loadConfig', () => {
  it('reads and validates a JSON file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchyard-config-'));
    const file = path.join(dir, 'config.json');
    try {
      fs.writeFileSync(file, JSON.stringify(minimal));
      const config = loadConfig({ path: file, env: { CHAT_KEY: 'test-secret' } });
      expect(config.defaultPolicy).toBe('task');
      expect(config.policies).toHaveLength(1);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('accepts the shipped example configuration', () => {
    const file = fileURLToPath(new URL('../../../config/config.example.json', import.meta.url));
    const config = loadConfig({ path: file, env: { CODE_API_KEY: 'test-secret' } });

    expect(config.policies.map(p => p.name)).toEqual(['task-router', 'agent-router']);
    const router = config.policies[0];
    expect(router && 'llms' in router ? router.llms[1]?.apiKey : undefined).toBe('test-secret');
  });

  it('reports unparseable files', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchyard-config-'));
    const file = path.join(dir, 'config.json');
    try {
      fs.writeFileSync(file, '{ not json');
      expect(() => loadConfig({ path: file, env: {} })).toThrow(ConfigError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing file', () => {
    const file = path.join(os.tmpdir(), 'switchyard-does-not-exist', 'config.json');
    expect(() => loadConfig({ path: file, env: {} })).toThrow(`Configuration file not found: ${file}`);
  });
});
