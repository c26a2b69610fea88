// Reasoning context
// Turns the session history into provider messages. Pure: same history, same messages.

import type { ProviderMessage } from '../../providers/types.js';
import { buildContextMessages, MAX_CONTEXT_TOKENS } from '../../utils/token-counter.js';
import type { Turn } from '../memory/types.js';
import type { ToolDescriptor } from '../tools/types.js';
import { buildSystemPrompt, FORMAT_REMINDER } from './prompts.js';

export interface ReasoningContextOptions {
  formatReminder?: boolean;
  maxContextTokens?: number;
}

function decisionMessage(payload: Record<string, unknown>): ProviderMessage {
  return { role: 'assistant', content: JSON.stringify(payload) };
}

/**
 * Map turns to chat messages.
 * A thought is folded into the decision that follows it, so the model sees its own
 * earlier replies in the same JSON shape it is asked to produce.
 */
export function turnsToMessages(turns: readonly Turn[]): ProviderMessage[] {
  const messages: ProviderMessage[] = [];
  let pendingThought: string | undefined;

  const withThought = (payload: Record<string, unknown>) => {
    const message = decisionMessage(pendingThought ? { thought: pendingThought, ...payload } : payload);
    pendingThought = undefined;
    return message;
  };

  for (const turn of turns) {
    switch (turn.type) {
      case 'user_message':
        if (pendingThought) messages.push(withThought({}));
        messages.push({ role: 'user', content: turn.text });
        break;
      case 'agent_thought':
        if (pendingThought) messages.push(withThought({}));
        pendingThought = turn.text;
        break;
      case 'tool_call':
        messages.push(withThought({ action: { tool: turn.tool, args: turn.args } }));
        break;
      case 'tool_result':
        if (pendingThought) messages.push(withThought({}));
        messages.push({
          role: 'user',
          content: `Observation from ${turn.tool} (${turn.success ? 'ok' : 'failed'}):\n${turn.output}`,
        });
        break;
      case 'final_answer':
        messages.push(withThought({ final_answer: turn.text }));
        break;
    }
  }

  if (pendingThought) {
    messages.push(withThought({}));
  }

  return messages;
}

/** Split history into exchanges, each opening with a user message */
export function splitExchanges(history: readonly Turn[]): Turn[][] {
  const exchanges: Turn[][] = [];
  let current: Turn[] | undefined;

  for (const turn of history) {
    if (!current || turn.type === 'user_message') {
      current = [];
      exchanges.push(current);
    }
    current.push(turn);
  }

  return exchanges;
}

/**
 * Messages for one reasoning call. The exchange in progress goes out whole;
 * only earlier exchanges are dropped when the history outgrows the budget.
 */
export function buildReasoningMessages(
  history: readonly Turn[],
  tools: ToolDescriptor[],
  options: ReasoningContextOptions = {}
): ProviderMessage[] {
  const exchanges = splitExchanges(history);
  const current = turnsToMessages(exchanges.pop() ?? []);
  if (options.formatReminder) {
    current.push({ role: 'user', content: FORMAT_REMINDER });
  }

  const { messages } = buildContextMessages(
    [buildSystemPrompt(tools)],
    current,
    exchanges.map(exchange => turnsToMessages(exchange)),
    options.maxContextTokens ?? MAX_CONTEXT_TOKENS,
  );
  return messages;
}
