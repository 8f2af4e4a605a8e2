import type { ChatMessage } from '../proxy/types.js';

export interface ClassificationResult {
  label: string;
  /** Winning score, when the classifier returns scores rather than a label. */
  confidence?: number;
  classifiedInMs: number;
}

export interface ClassifyOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Text that is classified: the content of the latest user message, with
 * text parts of structured content joined by newlines.
 */
export function latestUserText(messages: readonly ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role === 'user') return contentText(message.content);
  }
  return '';
}

export function contentText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';
  const items: unknown[] = content;
  const parts: string[] = [];
  for (const part of items) {
    if (typeof part === 'string') {
      parts.push(part);
    } else if (part !== null && typeof part === 'object' && 'text' in part && typeof part.text === 'string') {
      parts.push(part.text);
    }
  }
  return parts.join('\n');
}
