import fs from 'node:fs';
import type { ZodError } from 'zod';
import type { GatewayConfig } from './types.js';
import { gatewayConfigSchema } from './schema.js';
import { defaults, defaultConfigPath, configDir } from './defaults.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    log.warn(`Ignoring ${name}: "${raw}" is not a number`);
    return undefined;
  }
  return value;
}

/**
 * Environment overrides, expressed as a partial config so they go through
 * the same merge and validation as the file.
 */
function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const server: PlainObject = {};
  const rateLimit: PlainObject = {};
  const security: PlainObject = {};
  const logging: PlainObject = {};

  if (env['SWITCHYARD_HOST']) server['host'] = env['SWITCHYARD_HOST'];
  server['port'] = parseNumber('SWITCHYARD_PORT', env['SWITCHYARD_PORT']);
  server['requestTimeoutSecs'] = parseNumber('SWITCHYARD_REQUEST_TIMEOUT', env['SWITCHYARD_REQUEST_TIMEOUT']);

  if (env['SWITCHYARD_API_KEYS'] !== undefined) {
    security['apiKeys'] = env['SWITCHYARD_API_KEYS'].split(',').map(k => k.trim()).filter(k => k.length > 0);
  }
  rateLimit['requestsPerSecond'] = parseNumber('SWITCHYARD_RATE_LIMIT_RPS', env['SWITCHYARD_RATE_LIMIT_RPS']);
  security['rateLimit'] = rateLimit;

  if (env['SWITCHYARD_LOG_LEVEL']) logging['level'] = env['SWITCHYARD_LOG_LEVEL'];
  if (env['SWITCHYARD_JSON_LOGGING'] !== undefined) {
    logging['json'] = env['SWITCHYARD_JSON_LOGGING'] === 'true';
  }

  return { server, security, logging };
}

const ENV_REF = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/;

/**
 * Replace `${VAR}` API key references with their environment values.
 * Unresolvable references are left in place.
 */
export function resolveSecret(value: string, owner: string, env: NodeJS.ProcessEnv): string {
  const match = ENV_REF.exec(value);
  if (!match) return value;
  const name = match[1] ?? '';
  const resolved = env[name];
  if (resolved === undefined) {
    log.warn(`Environment variable ${name} referenced by ${owner} is not set`);
    return value;
  }
  log.debug(`Resolved environment variable ${name} for ${owner}`);
  return resolved;
}

function resolveSecrets(config: GatewayConfig, env: NodeJS.ProcessEnv): GatewayConfig {
  const policies = config.policies.map(policy => {
    if ('agentModel' in policy) {
      return {
        ...policy,
        agentModel: {
          ...policy.agentModel,
          apiKey: resolveSecret(policy.agentModel.apiKey, `${policy.name}/agent`, env),
        },
        availableLlms: policy.availableLlms.map(llm => ({
          ...llm,
          apiKey: resolveSecret(llm.apiKey, `${policy.name}/${llm.name}`, env),
        })),
      };
    }
    return {
      ...policy,
      llms: policy.llms.map(llm => ({
        ...llm,
        apiKey: resolveSecret(llm.apiKey, `${policy.name}/${llm.name}`, env),
      })),
    };
  });
  return { ...config, policies };
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build a validated configuration from an already-parsed file object.
 */
export function buildConfig(fileConfig: unknown, env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  if (!isPlainObject(fileConfig)) {
    throw new ConfigError('Configuration must be a JSON object');
  }
  const merged = deepMerge(deepMerge(defaults, fileConfig), envOverrides(env));
  const parsed = gatewayConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return resolveSecrets(parsed.data, env);
}

export function loadConfig(options: LoadConfigOptions = {}): GatewayConfig {
  const env = options.env ?? process.env;
  const configPath = options.path ?? env['SWITCHYARD_CONFIG'] ?? defaultConfigPath;

  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  log.info(`Loading configuration from ${configPath}`);
  const raw = fs.readFileSync(configPath, 'utf-8');
  let fileConfig: unknown;
  try {
    fileConfig = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return buildConfig(fileConfig, env);
}

export { configDir, defaultConfigPath };
export type { GatewayConfig, PolicyConfig, LogLevel, LoadBalancingStrategy } from './types.js';
