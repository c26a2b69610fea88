// Tool Registry - Central registry for the agent's tools
// Tools are registered once on startup; invoke() validates, runs and never throws

import type { z } from 'zod';
import {
  SchemaValidationError,
  ToolExecutionError,
  ToolTimeoutError,
  toAgentError,
} from '../../utils/errors.js';
import { toObservationText } from '../../utils/json.js';
import type {
  InvocationResult,
  InvokeOptions,
  ToolContext,
  ToolDescriptor,
  ToolSpec,
} from './types.js';

interface RegisteredTool {
  descriptor: ToolDescriptor;
  run: (args: unknown, context: ToolContext) => Promise<unknown>;
}

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

const DEFAULT_TIMEOUT_MS = 30000;

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  register<TInput, TOutput>(spec: ToolSpec<TInput, TOutput>): void {
    if (this.tools.has(spec.name)) {
      throw new Error(`Tool "${spec.name}" is already registered`);
    }

    const run = async (args: unknown, context: ToolContext): Promise<unknown> => {
      const input = spec.inputSchema.safeParse(args);
      if (!input.success) {
        const issues = formatZodIssues(input.error);
        throw new SchemaValidationError(`Invalid arguments for "${spec.name}": ${issues.join('; ')}`, issues);
      }

      const output = await spec.execute(input.data, context);

      const checked = spec.outputSchema.safeParse(output);
      if (!checked.success) {
        throw new ToolExecutionError(
          `Tool "${spec.name}" returned output that does not match its schema: ${formatZodIssues(checked.error).join('; ')}`,
        );
      }
      return checked.data;
    };

    this.tools.set(spec.name, {
      descriptor: {
        name: spec.name,
        description: spec.description,
        parameters: spec.parameters,
        inputSchema: spec.inputSchema,
        outputSchema: spec.outputSchema,
      },
      run,
    });
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name)?.descriptor;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Registered tools in registration order */
  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), tool => tool.descriptor);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  async invoke(name: string, args: unknown, options: InvokeOptions = {}): Promise<InvocationResult> {
    const startTime = Date.now();
    const tool = this.tools.get(name);

    try {
      if (!tool) {
        throw new SchemaValidationError(
          `Unknown tool "${name}". Available tools: ${this.names().join(', ') || 'none'}`,
        );
      }

      const output = await this.runWithTimeout(name, tool, args, options);

      return {
        tool: name,
        success: true,
        output,
        content: toObservationText(output),
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const agentError = toAgentError(error);
      return {
        tool: name,
        success: false,
        error: { code: agentError.code, message: agentError.message },
        content: `Error (${agentError.code}): ${agentError.message}`,
        durationMs: Date.now() - startTime,
      };
    }
  }

  private async runWithTimeout(
    name: string,
    tool: RegisteredTool,
    args: unknown,
    options: InvokeOptions,
  ): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const onAbort = () => controller.abort(options.signal?.reason);

    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ToolTimeoutError(name, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([tool.run(args, { signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
