import type { GatewayConfig, PolicyConfig } from '../config/types.js';
import type { Backend, Policy } from './types.js';
import { PolicyNotFoundError, UnresolvedLabelError } from '../gateway/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('policy-resolver');

const FALLBACK_LABELS = ['default', 'unknown', 'other'];

interface LlmEntry {
  name: string;
  identifier?: string;
  apiBase: string;
  apiKey: string;
  model: string;
  weight?: number;
}

function buildBackends(policyName: string, llms: LlmEntry[]): Backend[] {
  return llms.map((llm, index) => {
    const routingKey = llm.identifier ?? llm.name;
    return {
      id: `${policyName}/${routingKey}#${index}`,
      policy: policyName,
      name: llm.name,
      ...(llm.identifier !== undefined ? { identifier: llm.identifier } : {}),
      routingKey,
      apiBase: llm.apiBase,
      apiKey: llm.apiKey,
      model: llm.model,
      weight: llm.weight ?? 1,
    };
  });
}

function distinctLabels(backends: Backend[]): string[] {
  return [...new Set(backends.map(b => b.routingKey))];
}

export function buildPolicy(config: PolicyConfig): Policy {
  const timeoutMs = config.timeoutSecs !== undefined ? config.timeoutSecs * 1000 : undefined;
  if ('agentModel' in config) {
    const backends = buildBackends(config.name, config.availableLlms);
    return {
      kind: 'agentic',
      name: config.name,
      backends,
      labels: distinctLabels(backends),
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      agent: {
        id: `${config.name}/agent`,
        apiBase: config.agentModel.apiBase,
        apiKey: config.agentModel.apiKey,
        model: config.agentModel.model,
      },
    };
  }
  const backends = buildBackends(config.name, config.llms);
  return {
    kind: 'classifier',
    name: config.name,
    backends,
    labels: distinctLabels(backends),
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    classifierUrl: config.url,
  };
}

/**
 * Read-only catalogue of policies built from one configuration snapshot.
 */
export class PolicyResolver {
  private readonly policies: ReadonlyMap<string, Policy>;
  readonly defaultPolicy: string;

  constructor(config: Pick<GatewayConfig, 'policies' | 'defaultPolicy'>) {
    const policies = new Map<string, Policy>();
    for (const policyConfig of config.policies) {
      policies.set(policyConfig.name.trim(), buildPolicy(policyConfig));
    }
    this.policies = policies;
    this.defaultPolicy = config.defaultPolicy.trim();
    if (!policies.has(this.defaultPolicy)) {
      throw new PolicyNotFoundError(this.defaultPolicy);
    }
    log.info(`Loaded ${policies.size} policies (default: ${this.defaultPolicy})`);
  }

  resolve(name?: string): Policy {
    const key = name?.trim() || this.defaultPolicy;
    const policy = this.policies.get(key);
    if (!policy) {
      throw new PolicyNotFoundError(key);
    }
    return policy;
  }

  getAll(): Policy[] {
    return Array.from(this.policies.values());
  }

  hasLabel(policy: Policy, label: string): boolean {
    return policy.labels.includes(label);
  }

  /**
   * Backends serving a label. More than one entry means replicas of the
   * same logical model.
   */
  candidates(policy: Policy, label: string): Backend[] {
    const matches = policy.backends.filter(b => b.routingKey === label);
    if (matches.length === 0) {
      throw new UnresolvedLabelError(policy.name, label);
    }
    return matches;
  }

  fallbackLabel(policy: Policy): string | undefined {
    for (const wanted of FALLBACK_LABELS) {
      const match = policy.backends.find(b =>
        b.routingKey.toLowerCase() === wanted || b.name.toLowerCase() === wanted,
      );
      if (match) return match.routingKey;
    }
    return undefined;
  }

  findBackend(id: string): Backend | undefined {
    for (const policy of this.policies.values()) {
      const backend = policy.backends.find(b => b.id === id);
      if (backend) return backend;
    }
    return undefined;
  }
}
