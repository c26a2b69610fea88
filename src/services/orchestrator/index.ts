// Orchestrator Module - Main exports

export { ReasoningOrchestrator, DEFAULT_MAX_ITERATIONS, hasOpenExchange } from './orchestrator.js';
export { parseDecision } from './parser.js';
export { buildReasoningMessages, turnsToMessages } from './context.js';
export { buildSystemPrompt, RESPONSE_FORMAT_CHECK } from './prompts.js';
export type {
  OrchestratorOptions,
  OrchestratorState,
  ParsedDecision,
  QueryPlanStep,
  TurnOptions,
  TurnOutcome,
} from './types.js';
