export interface ChatMessage {
  role: string;
  content?: unknown;
  [key: string]: unknown;
}

/**
 * OpenAI chat completion request body. Fields the gateway does not interpret
 * are forwarded untouched.
 */
export interface ChatCompletionBody {
  model?: string;
  messages: ChatMessage[];
  stream?: boolean;
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  [key: string]: unknown;
}

/** Where an outbound chat completion is sent. */
export interface UpstreamTarget {
  id: string;
  apiBase: string;
  apiKey: string;
  model: string;
}

export interface TokenUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface BackendResponse {
  backendId: string;
  status: number;
  contentType: string;
  body: string;
  latencyMs: number;
  usage?: TokenUsage;
}

export interface BackendStream {
  backendId: string;
  status: number;
  contentType: string;
  /** Decoded text chunks of the upstream SSE body. */
  chunks: AsyncIterable<string>;
  startMs: number;
}

export interface CallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Body fields carrying routing instructions; never forwarded upstream. The
 * first is the canonical name, the second a shorter alias.
 */
export const ROUTER_EXTENSIONS = ['nim-llm-router', 'llm-router'] as const;
