// Answer Synthesizer
// Turns a finished session into the response handed to the client. Pure functions of the turns.

import type { DegradedReason, SessionSnapshot, Turn } from './memory/types.js';

export interface TraceStep {
  step: number;
  thought?: string;
  action?: {
    tool: string;
    args: Readonly<Record<string, unknown>>;
  };
  observation?: {
    tool: string;
    success: boolean;
    output: string;
  };
}

export interface SynthesizedAnswer {
  sessionId: string;
  answer: string;
  status: 'completed' | 'degraded' | 'pending';
  degradedReason?: DegradedReason;
  trace?: TraceStep[];
}

export interface SynthesizeOptions {
  includeTrace?: boolean;
}

const OBSERVATION_PREVIEW_CHARS = 600;

const DEGRADED_PREFIX: Record<DegradedReason, string> = {
  loop_bound_exceeded: 'I could not finish working through this question within the allowed number of steps.',
  format_error: 'I could not settle on a well-formed answer for this question.',
};

/** Turns from the latest user message onward */
export function latestExchange(turns: readonly Turn[]): readonly Turn[] {
  for (let i = turns.length - 1; i >= 0; i--) {
    if (turns[i].type === 'user_message') {
      return turns.slice(i);
    }
  }
  return turns;
}

function preview(text: string): string {
  return text.length > OBSERVATION_PREVIEW_CHARS ? `${text.slice(0, OBSERVATION_PREVIEW_CHARS)}…` : text;
}

/**
 * Best-effort answer for a forced stop: whatever the tools returned successfully
 * during the latest exchange, or an apology when there is nothing to show.
 */
export function composeBestEffortAnswer(turns: readonly Turn[], reason: DegradedReason): string {
  const findings = latestExchange(turns).filter(
    (turn): turn is Extract<Turn, { type: 'tool_result' }> =>
      turn.type === 'tool_result' && turn.success && turn.callId !== null,
  );

  if (findings.length === 0) {
    return `${DEGRADED_PREFIX[reason]} No data was found yet. Please try rephrasing the question.`;
  }

  const lines = findings.map(turn => `- ${turn.tool}: ${preview(turn.output)}`);
  return `${DEGRADED_PREFIX[reason]} Here is what I found so far:\n${lines.join('\n')}`;
}

/** Group the latest exchange into thought/action/observation steps */
export function buildReasoningTrace(turns: readonly Turn[]): TraceStep[] {
  const steps: TraceStep[] = [];
  let current: TraceStep | undefined;

  const open = (): TraceStep => {
    current = { step: steps.length + 1 };
    steps.push(current);
    return current;
  };

  for (const turn of latestExchange(turns)) {
    switch (turn.type) {
      case 'agent_thought':
        current = open();
        current.thought = turn.text;
        break;
      case 'tool_call': {
        const target = current && !current.action && !current.observation ? current : open();
        target.action = { tool: turn.tool, args: turn.args };
        break;
      }
      case 'tool_result': {
        const target = current && !current.observation ? current : open();
        target.observation = { tool: turn.tool, success: turn.success, output: turn.output };
        current = undefined;
        break;
      }
      case 'final_answer':
      case 'user_message':
        current = undefined;
        break;
    }
  }

  return steps;
}

/** Markdown rendering of a trace */
export function renderTrace(trace: readonly TraceStep[]): string {
  return trace
    .map(step => {
      const parts = [`### Step ${step.step}`];
      if (step.thought) {
        parts.push(`**Thought:** ${step.thought}`);
      }
      if (step.action) {
        parts.push(`**Tool:** ${step.action.tool}`);
        parts.push(`**Arguments:**\n\`\`\`json\n${JSON.stringify(step.action.args, null, 2)}\n\`\`\``);
      }
      if (step.observation) {
        const label = step.observation.success ? 'Response' : 'Error';
        parts.push(`**${label}:**\n\`\`\`\n${step.observation.output}\n\`\`\``);
      }
      return parts.join('\n\n');
    })
    .join('\n\n');
}

export function synthesizeAnswer(snapshot: SessionSnapshot, options: SynthesizeOptions = {}): SynthesizedAnswer {
  const exchange = latestExchange(snapshot.turns);
  const last = exchange[exchange.length - 1];

  const response: SynthesizedAnswer =
    last?.type === 'final_answer'
      ? {
          sessionId: snapshot.id,
          answer: last.text,
          status: last.degraded ? 'degraded' : 'completed',
          ...(last.degradedReason ? { degradedReason: last.degradedReason } : {}),
        }
      : { sessionId: snapshot.id, answer: '', status: 'pending' };

  if (options.includeTrace) {
    response.trace = buildReasoningTrace(snapshot.turns);
  }
  return response;
}
