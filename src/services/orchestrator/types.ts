// Orchestrator Types

import type { Provider } from '../../providers/types.js';
import type { FormatError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type { DegradedReason } from '../memory/types.js';
import type { ToolRegistry } from '../tools/registry.js';

/** The orchestrator's working unit for one reasoning iteration */
export type QueryPlanStep =
  | {
      kind: 'act';
      thought?: string;
      tool: string;
      args: Record<string, unknown>;
    }
  | {
      kind: 'finish';
      thought?: string;
      answer: string;
    };

export type ParsedDecision =
  | { ok: true; step: QueryPlanStep }
  | { ok: false; error: FormatError };

export type OrchestratorState = 'thinking' | 'acting' | 'observing' | 'done';

export interface OrchestratorOptions {
  provider: Provider;
  registry: ToolRegistry;
  model?: string;
  /** Upper bound on reasoning calls per user turn */
  maxIterations?: number;
  toolTimeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  maxContextTokens?: number;
  logger?: Logger;
}

export interface TurnOptions {
  signal?: AbortSignal;
}

export interface ThinkOptions extends TurnOptions {
  formatReminder?: boolean;
}

export interface TurnOutcome {
  status: 'completed' | 'degraded';
  answer: string;
  /** Reasoning calls made during the turn */
  iterations: number;
  toolCalls: number;
  degradedReason?: DegradedReason;
}
