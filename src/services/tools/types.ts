// Tool system types and interfaces
// A tool pairs a prompt-facing description with zod contracts for its input and output

import type { z } from 'zod';
import type { AgentErrorCode } from '../../utils/errors.js';

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[];
  default?: string | number | boolean;
}

export interface ToolContext {
  /** Aborted when the invocation times out or the turn is cancelled */
  signal: AbortSignal;
}

export interface ToolSpec<TInput, TOutput> {
  name: string;
  description: string;
  parameters: ToolParameter[];
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  outputSchema: z.ZodType<TOutput, z.ZodTypeDef, unknown>;
  execute: (args: TInput, context: ToolContext) => Promise<TOutput>;
}

/** What the registry hands out: the contract of a tool without its executor */
export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: ToolParameter[];
  inputSchema: z.ZodTypeAny;
  outputSchema: z.ZodTypeAny;
}

export interface InvokeOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface InvocationBase {
  tool: string;
  /** Observation text as it is recorded in the session */
  content: string;
  durationMs: number;
}

export interface InvocationSuccess extends InvocationBase {
  success: true;
  output: unknown;
}

export interface InvocationFailure extends InvocationBase {
  success: false;
  error: {
    code: AgentErrorCode;
    message: string;
  };
}

export type InvocationResult = InvocationSuccess | InvocationFailure;
