import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ToolRegistry } from '../registry.js';
import type { ToolSpec } from '../types.js';
import { QueryError } from '../../../utils/errors.js';

const EchoInput = z.object({ text: z.string().min(1), times: z.number().int().min(1).default(1) });
const EchoOutput = z.object({ echoed: z.string() });

function echoTool(name = 'echo'): ToolSpec<z.output<typeof EchoInput>, z.output<typeof EchoOutput>> {
  return {
    name,
    description: 'Repeats the text',
    parameters: [
      { name: 'text', type: 'string', description: 'Text to repeat', required: true },
      { name: 'times', type: 'number', description: 'Repetitions', required: false, default: 1 },
    ],
    inputSchema: EchoInput,
    outputSchema: EchoOutput,
    execute: async args => ({ echoed: args.text.repeat(args.times) }),
  };
}

describe('Tool Registry', () => {
  it('should register and retrieve tools', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool());

    expect(registry.has('echo')).toBe(true);
    expect(registry.get('echo')?.description).toBe('Repeats the text');
    expect(registry.get('missing')).toBeUndefined();
  });

  it('should list tools in registration order', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool('zeta'));
    registry.register(echoTool('alpha'));
    registry.register(echoTool('mid'));

    expect(registry.list().map(t => t.name)).toEqual(['zeta', 'alpha', 'mid']);
    expect(registry.names()).toEqual(['zeta', 'alpha', 'mid']);
    expect(registry.size).toBe(3);
  });

  it('should refuse duplicate names', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool());

    expect(() => registry.register(echoTool())).toThrow('Tool "echo" is already registered');
  });

  it('should validate arguments and return the output', async () => {
    const registry = new ToolRegistry();
    registry.register(echoTool());

    const result = await registry.invoke('echo', { text: 'ab', times: 2 });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.output).toEqual({ echoed: 'abab' });
    expect(result.content).toBe('{"echoed":"abab"}');
  });

  it('should return a schema validation failure instead of running the tool', async () => {
    const registry = new ToolRegistry();
    let runs = 0;
    registry.register({
      ...echoTool(),
      execute: async args => {
        runs++;
        return { echoed: args.text };
      },
    });

    const result = await registry.invoke('echo', { text: '' });

    expect(runs).toBe(0);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('schema_validation');
    expect(result.content).toBe(
      'Error (schema_validation): Invalid arguments for "echo": text: String must contain at least 1 character(s)',
    );
  });

  it('should report unknown tools as schema validation failures', async () => {
    const registry = new ToolRegistry();
    registry.register(echoTool());

    const result = await registry.invoke('search_web', { q: 'x' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toEqual({
      code: 'schema_validation',
      message: 'Unknown tool "search_web". Available tools: echo',
    });
  });

  it('should capture errors thrown by the tool', async () => {
    const registry = new ToolRegistry();
    registry.register({
      ...echoTool(),
      execute: async () => {
        throw new QueryError('no such table: films');
      },
    });
    registry.register({
      ...echoTool('crashy'),
      execute: async () => {
        throw new TypeError('undefined is not a function');
      },
    });

    const queryFailure = await registry.invoke('echo', { text: 'x' });
    const crash = await registry.invoke('crashy', { text: 'x' });

    expect(queryFailure.success).toBe(false);
    expect(crash.success).toBe(false);
    if (queryFailure.success || crash.success) return;
    expect(queryFailure.error.code).toBe('query_error');
    expect(crash.error).toEqual({ code: 'tool_error', message: 'undefined is not a function' });
  });

  it('should reject output that breaks the output schema', async () => {
    const registry = new ToolRegistry();
    registry.register({
      name: 'counter',
      description: 'Counts to three',
      parameters: [],
      inputSchema: z.object({}),
      outputSchema: z.object({ count: z.number().max(2) }),
      execute: async () => ({ count: 3 }),
    });

    const result = await registry.invoke('counter', {});

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('tool_error');
    expect(result.error.message).toBe(
      'Tool "counter" returned output that does not match its schema: count: Number must be less than or equal to 2',
    );
  });

  it('should time out slow tools and abort their signal', async () => {
    const registry = new ToolRegistry();
    let aborted = false;
    registry.register({
      ...echoTool('slow'),
      execute: (_args, context) =>
        new Promise<{ echoed: string }>(resolve => {
          context.signal.addEventListener('abort', () => {
            aborted = true;
          });
          setTimeout(() => resolve({ echoed: 'late' }), 200);
        }),
    });

    const result = await registry.invoke('slow', { text: 'x' }, { timeoutMs: 20 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toEqual({ code: 'timeout', message: 'Tool "slow" did not finish within 20ms' });
    expect(aborted).toBe(true);
  });
});
