// Conversation turn types
// One immutable unit of conversation or reasoning history per turn

import type { AgentErrorCode } from '../../utils/errors.js';

interface TurnBase {
  /** Position in the session, starting at 0 */
  index: number;
  /** ISO timestamp of the append */
  at: string;
}

export interface UserMessageTurn extends TurnBase {
  type: 'user_message';
  text: string;
}

export interface AgentThoughtTurn extends TurnBase {
  type: 'agent_thought';
  text: string;
}

export interface ToolCallTurn extends TurnBase {
  type: 'tool_call';
  callId: string;
  tool: string;
  args: Readonly<Record<string, unknown>>;
}

export interface ToolResultTurn extends TurnBase {
  type: 'tool_result';
  /** null for observations that did not come from a tool call (format errors) */
  callId: string | null;
  tool: string;
  success: boolean;
  output: string;
  errorCode?: AgentErrorCode;
}

export type DegradedReason = 'loop_bound_exceeded' | 'format_error';

export interface FinalAnswerTurn extends TurnBase {
  type: 'final_answer';
  text: string;
  degraded: boolean;
  degradedReason?: DegradedReason;
}

export type Turn = UserMessageTurn | AgentThoughtTurn | ToolCallTurn | ToolResultTurn | FinalAnswerTurn;

export type TurnType = Turn['type'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** What callers hand to `append`; the memory stamps index and time */
export type TurnInput = DistributiveOmit<Turn, 'index' | 'at'>;

export interface SessionSnapshot {
  id: string;
  createdAt: string;
  turns: readonly Turn[];
}
