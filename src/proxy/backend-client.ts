import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import type {
  BackendResponse,
  BackendStream,
  CallOptions,
  ChatCompletionBody,
  FetchLike,
  TokenUsage,
  UpstreamTarget,
} from './types.js';
import { ClientDisconnectedError, GatewayError, UpstreamError } from '../gateway/errors.js';
import { Semaphore } from '../utils/semaphore.js';
import { deadline } from '../utils/deadline.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('backend-client');

const usageSchema = z.object({
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
    total_tokens: z.number().optional(),
  }),
});

/** 408, 429 and every 5xx are worth retrying on another attempt. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Chat completions endpoint for a backend base URL. Bases that already end
 * in `/v1` are not given a second one.
 */
export function chatCompletionsUrl(apiBase: string): string {
  const base = apiBase.replace(/\/+$/, '');
  return base.endsWith('/v1') ? `${base}/chat/completions` : `${base}/v1/chat/completions`;
}

export function extractUsage(body: string): TokenUsage | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    log.debug(`Response body is not JSON, skipping usage: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
  const result = usageSchema.safeParse(parsed);
  if (!result.success) return undefined;
  const { usage } = result.data;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

interface OpenCall {
  response: Response;
  /** Aborts on the call's deadline or when the client goes away. */
  signal: AbortSignal;
  timedOut: () => boolean;
  /** Stop the timeout and detach from the client signal. */
  settle: () => void;
}

/**
 * Outbound OpenAI-compatible client. Concurrency across all backends is
 * bounded by `maxConcurrent`; a streaming call holds its slot until the
 * stream is fully read, abandoned or timed out.
 */
export class BackendClient {
  private readonly semaphore: Semaphore;
  private readonly fetchFn: FetchLike;

  constructor(options: { maxConcurrent: number; fetch?: FetchLike }) {
    this.semaphore = new Semaphore(options.maxConcurrent);
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get activeRequests(): number {
    return this.semaphore.inUse;
  }

  async complete(target: UpstreamTarget, body: ChatCompletionBody, options: CallOptions): Promise<BackendResponse> {
    const release = await this.semaphore.acquire();
    const startMs = performance.now();
    try {
      const { response, timedOut, settle } = await this.open(target, body, options);
      let text: string;
      try {
        text = await response.text();
      } catch (err) {
        throw this.failure(target, err, options, timedOut());
      } finally {
        settle();
      }
      return {
        backendId: target.id,
        status: response.status,
        contentType: response.headers.get('content-type') ?? 'application/json',
        body: text,
        latencyMs: Math.round(performance.now() - startMs),
        usage: extractUsage(text),
      };
    } finally {
      release();
    }
  }

  /**
   * Opens a streaming call. The timeout covers the whole call, body
   * included: a stream still open when it fires is cancelled and fails as a
   * transient upstream error.
   */
  async stream(target: UpstreamTarget, body: ChatCompletionBody, options: CallOptions): Promise<BackendStream> {
    const release = await this.semaphore.acquire();
    const startMs = performance.now();
    let call: OpenCall;
    try {
      call = await this.open(target, body, options);
    } catch (err) {
      release();
      throw err;
    }

    const reader = call.response.body?.getReader();
    if (!reader) {
      call.settle();
      release();
      throw new UpstreamError(target.id, `Backend ${target.id} returned no response body`, { transient: true });
    }

    const { signal: callSignal, timedOut, settle } = call;
    let started = false;
    let finished = false;
    const finish = () => {
      if (finished) return;
      finished = true;
      callSignal.removeEventListener('abort', onAbort);
      settle();
      release();
    };

    // Fires on the deadline and on client abort alike; a pending read then ends.
    // A stream nobody started reading gives its slot back here.
    const onAbort = () => {
      reader.cancel().catch((err: unknown) => log.debug(`Stream cancel failed for ${target.id}: ${String(err)}`));
      if (!started) finish();
    };
    if (callSignal.aborted) onAbort();
    else callSignal.addEventListener('abort', onAbort, { once: true });

    const clientSignal = options.signal;
    const id = target.id;
    const timeoutMs = options.timeoutMs;
    const chunks = async function* (): AsyncGenerator<string> {
      started = true;
      const decoder = new TextDecoder();
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (callSignal.aborted) throw new Error('stream interrupted');
          if (done) break;
          if (value) yield decoder.decode(value, { stream: true });
        }
        const tail = decoder.decode();
        if (tail) yield tail;
      } catch (err) {
        if (clientSignal?.aborted) throw new ClientDisconnectedError();
        if (timedOut()) {
          log.warn(`Stream from ${id} timed out after ${timeoutMs}ms`);
          throw new UpstreamError(id, `Backend ${id} timed out after ${timeoutMs}ms`, { transient: true, cause: err });
        }
        throw new UpstreamError(id, `Stream from ${id} broke: ${err instanceof Error ? err.message : String(err)}`, {
          transient: true,
          cause: err,
        });
      } finally {
        reader.releaseLock();
        finish();
      }
    };

    return {
      backendId: target.id,
      status: call.response.status,
      contentType: call.response.headers.get('content-type') ?? 'text/event-stream',
      chunks: chunks(),
      startMs,
    };
  }

  private async open(target: UpstreamTarget, body: ChatCompletionBody, options: CallOptions): Promise<OpenCall> {
    if (options.signal?.aborted) throw new ClientDisconnectedError();

    const limit = deadline(options.timeoutMs, options.signal);
    const settle = () => limit.clear();

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (target.apiKey) {
      headers['Authorization'] = `Bearer ${target.apiKey}`;
    }

    let response: Response;
    try {
      response = await this.fetchFn(chatCompletionsUrl(target.apiBase), {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: limit.signal,
      });
    } catch (err) {
      settle();
      throw this.failure(target, err, options, limit.timedOut());
    }

    if (!response.ok) {
      let errorText = '';
      try {
        errorText = await response.text();
      } catch (err) {
        log.debug(`Could not read error body from ${target.id}: ${err instanceof Error ? err.message : String(err)}`);
      }
      settle();
      const transient = isTransientStatus(response.status);
      log.warn(`Backend ${target.id} returned ${response.status}${transient ? ' (transient)' : ''}`);
      throw new UpstreamError(target.id, `Backend ${target.id} returned ${response.status}`, {
        transient,
        upstreamStatus: response.status,
        body: errorText,
      });
    }

    return { response, signal: limit.signal, timedOut: limit.timedOut, settle };
  }

  private failure(target: UpstreamTarget, err: unknown, options: CallOptions, timedOut = false): Error {
    if (options.signal?.aborted) return new ClientDisconnectedError();
    if (err instanceof GatewayError) return err;
    const reason = err instanceof Error ? err.message : String(err);
    if (timedOut) {
      return new UpstreamError(target.id, `Backend ${target.id} timed out after ${options.timeoutMs}ms`, {
        transient: true,
        cause: err,
      });
    }
    return new UpstreamError(target.id, `Backend ${target.id} unreachable: ${reason}`, { transient: true, cause: err });
  }
}
