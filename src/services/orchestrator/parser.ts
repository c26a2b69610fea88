// Decision Parser
// The only place that reads the reasoning model's free text. Everything past this
// point works on a typed QueryPlanStep.

import { z } from 'zod';
import { FormatError } from '../../utils/errors.js';
import { extractJsonObject } from '../../utils/json.js';
import type { ParsedDecision } from './types.js';

function parseArgsString(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value ?? {};
  }
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

const ActionSchema = z.object({
  tool: z.string().trim().min(1),
  args: z.preprocess(parseArgsString, z.record(z.unknown())),
});

const EnvelopeSchema = z.object({
  thought: z.string().nullish(),
  action: ActionSchema.nullish(),
  final_answer: z.string().nullish(),
  // Bare {"tool": ..., "args": ...} replies
  tool: z.string().trim().min(1).nullish(),
  args: z.unknown(),
});

export function parseDecision(raw: string): ParsedDecision {
  const json = extractJsonObject(raw);
  if (!json) {
    return { ok: false, error: new FormatError('Reply did not contain a JSON object', raw) };
  }

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    const issues = envelope.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, error: new FormatError(`Reply JSON has the wrong shape: ${issues.join('; ')}`, raw) };
  }

  const { thought, final_answer: finalAnswer } = envelope.data;
  let action = envelope.data.action;

  if (!action && envelope.data.tool) {
    const bare = ActionSchema.safeParse({ tool: envelope.data.tool, args: envelope.data.args });
    if (!bare.success) {
      return { ok: false, error: new FormatError('Tool arguments must be a JSON object', raw) };
    }
    action = bare.data;
  }

  const answer = finalAnswer?.trim();

  if (action && answer) {
    return { ok: false, error: new FormatError('Reply contained both an action and a final answer', raw) };
  }

  const cleanThought = thought?.trim() || undefined;

  if (action) {
    return {
      ok: true,
      step: { kind: 'act', thought: cleanThought, tool: action.tool, args: action.args },
    };
  }

  if (answer) {
    return {
      ok: true,
      step: { kind: 'finish', thought: cleanThought, answer },
    };
  }

  return { ok: false, error: new FormatError('Reply had neither an action nor a final answer', raw) };
}
