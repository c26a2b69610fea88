// Reasoning Orchestrator
// Bounded ReAct loop: think → act → observe until the model answers or a stop condition hits.
// All state lives in the ConversationMemory; the orchestrator itself holds none between calls.

import type { Provider } from '../../providers/types.js';
import {
  CollaboratorUnavailableError,
  FormatError,
  LoopBoundExceeded,
  TurnAbortedError,
  isAbortError,
} from '../../utils/errors.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import { MAX_CONTEXT_TOKENS } from '../../utils/token-counter.js';
import type { ConversationMemory } from '../memory/conversation-memory.js';
import type { DegradedReason, Turn } from '../memory/types.js';
import { composeBestEffortAnswer } from '../synthesizer.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { InvocationResult } from '../tools/types.js';
import { buildReasoningMessages } from './context.js';
import { parseDecision } from './parser.js';
import { RESPONSE_FORMAT_CHECK } from './prompts.js';
import type {
  OrchestratorOptions,
  OrchestratorState,
  ParsedDecision,
  QueryPlanStep,
  ThinkOptions,
  TurnOptions,
  TurnOutcome,
} from './types.js';

export const DEFAULT_MAX_ITERATIONS = 8;

// Consecutive unreadable replies tolerated before a forced stop
const MAX_FORMAT_FAILURES = 2;

export class ReasoningOrchestrator {
  private provider: Provider;
  private registry: ToolRegistry;
  private model: string;
  private maxIterations: number;
  private toolTimeoutMs: number;
  private temperature: number;
  private maxTokens: number;
  private maxContextTokens: number;
  private logger: Logger;

  constructor(options: OrchestratorOptions) {
    this.provider = options.provider;
    this.registry = options.registry;
    this.model = options.model || options.provider.defaultModel;
    this.maxIterations = Math.max(1, options.maxIterations ?? DEFAULT_MAX_ITERATIONS);
    this.toolTimeoutMs = options.toolTimeoutMs ?? 30000;
    this.temperature = options.temperature ?? 0;
    this.maxTokens = options.maxTokens ?? 2048;
    this.maxContextTokens = options.maxContextTokens ?? MAX_CONTEXT_TOKENS;
    this.logger = options.logger ?? componentLogger('orchestrator');
  }

  /** Append the user's message and reason until an answer is reached */
  async runTurn(memory: ConversationMemory, userInput: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    memory.append({ type: 'user_message', text: userInput });
    return this.drive(memory, options);
  }

  /**
   * Continue the latest exchange when it has no final answer yet,
   * e.g. after the reasoning model was unreachable.
   */
  async resumeTurn(memory: ConversationMemory, options: TurnOptions = {}): Promise<TurnOutcome> {
    if (!hasOpenExchange(memory.history())) {
      throw new Error('There is no unanswered message to resume');
    }
    return this.drive(memory, options);
  }

  /**
   * One THINKING step: a pure function of the history and the model's reply.
   * Throws CollaboratorUnavailableError when the model cannot be reached.
   */
  async think(history: readonly Turn[], options: ThinkOptions = {}): Promise<ParsedDecision> {
    const messages = buildReasoningMessages(history, this.registry.list(), {
      formatReminder: options.formatReminder,
      maxContextTokens: this.maxContextTokens,
    });

    let content: string;
    try {
      const response = await this.provider.sendChat(messages, {
        model: this.model,
        maxTokens: this.maxTokens,
        temperature: this.temperature,
        signal: options.signal,
      });
      content = response.content;
    } catch (error) {
      if (options.signal?.aborted || isAbortError(error)) {
        throw new TurnAbortedError();
      }
      throw new CollaboratorUnavailableError(`Reasoning provider "${this.provider.name}"`, { cause: error });
    }

    return parseDecision(content);
  }

  private async drive(memory: ConversationMemory, options: TurnOptions): Promise<TurnOutcome> {
    const log = this.logger.child({ sessionId: memory.sessionId });
    let state: OrchestratorState = 'thinking';
    let iterations = 0;
    let toolCalls = 0;
    let formatFailures = 0;
    let step: Extract<QueryPlanStep, { kind: 'act' }> | undefined;
    let callId = '';
    let observation: InvocationResult | undefined;
    let outcome: TurnOutcome | undefined;

    while (state !== 'done') {
      switch (state) {
        case 'thinking': {
          if (options.signal?.aborted) {
            throw new TurnAbortedError();
          }

          if (iterations >= this.maxIterations) {
            const bound = new LoopBoundExceeded(this.maxIterations);
            log.warn({ code: bound.code, iterations }, bound.message);
            outcome = this.forceStop(memory, 'loop_bound_exceeded', iterations, toolCalls);
            state = 'done';
            break;
          }

          iterations++;
          const decision = await this.think(memory.history(), {
            formatReminder: formatFailures > 0,
            signal: options.signal,
          });

          if (!decision.ok) {
            formatFailures++;
            this.recordFormatError(memory, decision.error);
            log.warn({ iteration: iterations, formatFailures }, decision.error.message);

            if (formatFailures >= MAX_FORMAT_FAILURES) {
              outcome = this.forceStop(memory, 'format_error', iterations, toolCalls);
              state = 'done';
            }
            break;
          }

          formatFailures = 0;
          if (decision.step.thought) {
            memory.append({ type: 'agent_thought', text: decision.step.thought });
          }

          if (decision.step.kind === 'finish') {
            memory.append({ type: 'final_answer', text: decision.step.answer, degraded: false });
            outcome = { status: 'completed', answer: decision.step.answer, iterations, toolCalls };
            state = 'done';
            break;
          }

          step = decision.step;
          state = 'acting';
          break;
        }

        case 'acting': {
          if (!step) {
            throw new Error('Acting without a planned step');
          }
          // The call and its result are recorded as one unit; cancellation
          // is only honoured at the next THINKING phase
          toolCalls++;
          callId = `call_${memory.size}`;
          memory.append({ type: 'tool_call', callId, tool: step.tool, args: step.args });
          log.debug({ iteration: iterations, tool: step.tool, args: step.args }, 'Invoking tool');
          observation = await this.registry.invoke(step.tool, step.args, {
            timeoutMs: this.toolTimeoutMs,
            signal: options.signal,
          });
          state = 'observing';
          break;
        }

        case 'observing': {
          if (!step || !observation) {
            throw new Error('Observing without a tool result');
          }
          memory.append({
            type: 'tool_result',
            callId,
            tool: step.tool,
            success: observation.success,
            output: observation.content,
            ...(observation.success ? {} : { errorCode: observation.error.code }),
          });
          log.debug(
            { iteration: iterations, tool: step.tool, success: observation.success, durationMs: observation.durationMs },
            'Tool finished',
          );
          step = undefined;
          observation = undefined;
          state = 'thinking';
          break;
        }
      }
    }

    if (!outcome) {
      throw new Error('Reasoning loop ended without an outcome');
    }
    log.info({ status: outcome.status, iterations: outcome.iterations, toolCalls: outcome.toolCalls }, 'Turn finished');
    return outcome;
  }

  private recordFormatError(memory: ConversationMemory, error: FormatError): void {
    memory.append({
      type: 'tool_result',
      callId: null,
      tool: RESPONSE_FORMAT_CHECK,
      success: false,
      output: `Error (${error.code}): ${error.message}`,
      errorCode: error.code,
    });
  }

  private forceStop(
    memory: ConversationMemory,
    reason: DegradedReason,
    iterations: number,
    toolCalls: number,
  ): TurnOutcome {
    const answer = composeBestEffortAnswer(memory.history(), reason);
    memory.append({ type: 'final_answer', text: answer, degraded: true, degradedReason: reason });
    return { status: 'degraded', answer, iterations, toolCalls, degradedReason: reason };
  }
}

/** True when the latest user message has not been answered yet */
export function hasOpenExchange(turns: readonly Turn[]): boolean {
  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    if (turn.type === 'final_answer') return false;
    if (turn.type === 'user_message') return true;
  }
  return false;
}
