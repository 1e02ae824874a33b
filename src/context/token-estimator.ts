import type { ConversationMessage } from './types.js';

/** Rough chars-per-token ratio for English prose. */
export const CHARS_PER_TOKEN = 4;

export function estimateTokensLocally(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/** The text that gets counted: one `role: content` line per message. */
export function flattenMessages(messages: readonly ConversationMessage[]): string {
  return messages.map((m) => `${m.role}: ${m.content}`).join('\n');
}
