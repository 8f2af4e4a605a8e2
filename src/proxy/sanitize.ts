import type { ChatMessage } from './types.js';

// Unicode tag characters (U+E0020..U+E007F) are invisible and break some model servers.
const TAG_CHARS = /[\u{E0020}-\u{E007F}]/gu;

const REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/[‘’]/g, "'"],
  [/[“”]/g, '"'],
  [/—/g, '--'],
  [/–/g, '-'],
  [/…/g, '...'],
];

export function sanitizeText(text: string): string {
  let out = text.replace(TAG_CHARS, '');
  for (const [pattern, replacement] of REPLACEMENTS) {
    out = out.replace(pattern, replacement);
  }
  return out;
}

/**
 * Returns copies of the messages with string contents sanitized. Structured
 * (array) contents are passed through as they are.
 */
export function sanitizeMessages(messages: readonly ChatMessage[]): ChatMessage[] {
  return messages.map(m => (typeof m.content === 'string'
    ? { ...m, content: sanitizeText(m.content) }
    : { ...m }));
}
