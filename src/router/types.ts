export interface Backend {
  /** Unique within the process: `<policy>/<routingKey>#<index>`. */
  id: string;
  policy: string;
  name: string;
  identifier?: string;
  /** Label or agent identifier that selects this backend. */
  routingKey: string;
  apiBase: string;
  apiKey: string;
  model: string;
  weight: number;
}

export interface AgentModel {
  id: string;
  apiBase: string;
  apiKey: string;
  model: string;
}

interface PolicyBase {
  name: string;
  backends: readonly Backend[];
  /** Distinct routing keys in declaration order. */
  labels: readonly string[];
  timeoutMs?: number;
}

export interface ClassifierPolicy extends PolicyBase {
  kind: 'classifier';
  classifierUrl: string;
}

export interface AgenticPolicy extends PolicyBase {
  kind: 'agentic';
  agent: AgentModel;
}

export type Policy = ClassifierPolicy | AgenticPolicy;

export type RoutingStrategy = 'classifier' | 'manual';

export interface RoutingHints {
  policy?: string;
  strategy?: RoutingStrategy;
  model?: string;
  cache?: boolean;
}

export type CircuitState = 'closed' | 'open' | 'half-open';

export type LabelSource = 'manual' | 'classifier' | 'agent' | 'fallback';

export interface LabelDecision {
  label: string;
  source: LabelSource;
  confidence?: number;
}
