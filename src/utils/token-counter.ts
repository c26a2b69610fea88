// Token counting utility for context management
// Keeps the history sent to the reasoning model under the context budget

import type { ProviderMessage } from '../providers/types.js';

// Approximate token counting based on character count
// Rule of thumb: ~4 characters per token for English text
const CHARS_PER_TOKEN = 4;

// Approximate overhead per message for role and formatting
const MESSAGE_OVERHEAD = 4;

/**
 * Count approximate tokens in a string
 * This is a simple heuristic - for accurate counting, use a provider tokenizer
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  const baseTokens = Math.ceil(text.length / CHARS_PER_TOKEN);

  // Tokens often break on whitespace
  const whitespaceBoost = (text.match(/\s+/g) || []).length * 0.1;

  // Punctuation-heavy text (JSON observations) tokenizes worse
  const specialCharBoost = (text.match(/[^\w\s]/g) || []).length * 0.05;

  return Math.ceil(baseTokens + whitespaceBoost + specialCharBoost);
}

export function countMessagesTokens(messages: ProviderMessage[]): number {
  let total = 0;

  for (const msg of messages) {
    total += MESSAGE_OVERHEAD;
    total += countTokens(msg.content);
  }

  return total;
}

export const MAX_CONTEXT_TOKENS = 32000;

/**
 * Build context messages within token limits
 * System prompts and the current exchange are always kept. Earlier exchanges are
 * added whole, newest first, until the budget runs out, then restored to
 * chronological order.
 */
export function buildContextMessages(
  systemPrompts: string[],
  current: ProviderMessage[],
  earlier: ProviderMessage[][] = [],
  maxTokens: number = MAX_CONTEXT_TOKENS
): { messages: ProviderMessage[]; tokenCount: number; truncated: boolean } {
  const system: ProviderMessage[] = systemPrompts.map(content => ({ role: 'system', content }));
  let tokenCount = countMessagesTokens(system) + countMessagesTokens(current);
  let truncated = false;

  const kept: ProviderMessage[][] = [];

  for (let i = earlier.length - 1; i >= 0; i--) {
    const exchange = earlier[i];
    const tokens = countMessagesTokens(exchange);
    if (tokenCount + tokens <= maxTokens) {
      kept.unshift(exchange);
      tokenCount += tokens;
    } else {
      truncated = true;
      break;
    }
  }

  return {
    messages: [...system, ...kept.flat(), ...current],
    tokenCount,
    truncated,
  };
}
