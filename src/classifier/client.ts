import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import type { ClassifierPolicy } from '../router/types.js';
import type { FetchLike } from '../proxy/types.js';
import type { ClassificationResult, ClassifyOptions } from './types.js';
import { ClassificationUnavailableError, ClientDisconnectedError } from '../gateway/errors.js';
import { deadline } from '../utils/deadline.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('classifier');

const inferResponseSchema = z.object({
  outputs: z.array(z.object({
    name: z.string().optional(),
    datatype: z.string().optional(),
    data: z.array(z.unknown()),
  })).min(1),
});

/** Builds the KServe v2 / Triton `infer` request for one text input. */
export function buildInferRequest(text: string): Record<string, unknown> {
  return {
    inputs: [{ name: 'INPUT', datatype: 'BYTES', shape: [1, 1], data: [[text]] }],
  };
}

function flatten(data: readonly unknown[]): unknown[] {
  return data.flatMap(item => (Array.isArray(item) ? flatten(item) : [item]));
}

/**
 * Reads the label out of an infer response. String output is the label
 * itself; numeric output is one score per label, in the policy's label order.
 */
export function parseInferResponse(policy: ClassifierPolicy, payload: unknown): { label: string; confidence?: number } {
  const parsed = inferResponseSchema.safeParse(payload);
  const output = parsed.success ? parsed.data.outputs[0] : undefined;
  if (!output) {
    throw new ClassificationUnavailableError(policy.name, 'malformed classifier response');
  }

  const values = flatten(output.data);
  const first = values[0];
  if (typeof first === 'string') {
    const label = first.trim();
    if (!label) throw new ClassificationUnavailableError(policy.name, 'classifier returned an empty label');
    return { label };
  }

  const scores = values.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
  if (scores.length === 0 || scores.length !== values.length) {
    throw new ClassificationUnavailableError(policy.name, 'classifier output is neither a label nor scores');
  }

  let best = 0;
  for (let i = 1; i < scores.length; i++) {
    if ((scores[i] ?? -Infinity) > (scores[best] ?? -Infinity)) best = i;
  }
  const label = policy.labels[best];
  if (label === undefined) {
    throw new ClassificationUnavailableError(
      policy.name,
      `score index ${best} is out of range for ${policy.labels.length} labels`,
    );
  }
  return { label, confidence: scores[best] };
}

/**
 * Client for the external classification service. One attempt per call;
 * every failure surfaces as ClassificationUnavailableError so the caller can
 * fall back.
 */
export class ClassifierClient {
  private readonly fetchFn: FetchLike;

  constructor(fetchFn?: FetchLike) {
    this.fetchFn = fetchFn ?? ((input, init) => fetch(input, init));
  }

  async classify(policy: ClassifierPolicy, text: string, options: ClassifyOptions): Promise<ClassificationResult> {
    const startMs = performance.now();
    const limit = deadline(options.timeoutMs, options.signal);

    let payload: unknown;
    try {
      const response = await this.fetchFn(policy.classifierUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildInferRequest(text)),
        signal: limit.signal,
      });
      if (!response.ok) {
        throw new ClassificationUnavailableError(policy.name, `classifier returned ${response.status}`);
      }
      payload = await response.json();
    } catch (err) {
      if (options.signal?.aborted) throw new ClientDisconnectedError();
      if (err instanceof ClassificationUnavailableError) throw err;
      const reason = limit.timedOut()
        ? `timed out after ${options.timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      log.warn(`Classifier for ${policy.name} failed: ${reason}`);
      throw new ClassificationUnavailableError(policy.name, reason, { cause: err });
    } finally {
      limit.clear();
    }

    const { label, confidence } = parseInferResponse(policy, payload);
    const classifiedInMs = Math.round(performance.now() - startMs);
    log.debug(`Classified for ${policy.name}: ${label}${confidence !== undefined ? ` (${confidence.toFixed(3)})` : ''} in ${classifiedInMs}ms`);
    return { label, ...(confidence !== undefined ? { confidence } : {}), classifiedInMs };
  }
}
