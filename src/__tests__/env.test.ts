import { describe, it, expect, vi, afterEach } from 'vitest';
import { parsePositiveInt } from '../env.js';

describe('parsePositiveInt', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads a positive integer', () => {
    expect(parsePositiveInt('1500', 30000, 'TOOL_TIMEOUT_MS')).toBe(1500);
  });

  it('uses the default when the variable is unset', () => {
    expect(parsePositiveInt(undefined, 30000, 'TOOL_TIMEOUT_MS')).toBe(30000);
  });

  it('falls back to the default for zero, negative and non-numeric values', () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(parsePositiveInt('0', 30000, 'TOOL_TIMEOUT_MS')).toBe(30000);
    expect(parsePositiveInt('-5', 3600000, 'SESSION_TTL_MS')).toBe(3600000);
    expect(parsePositiveInt('soon', 8, 'AGENT_MAX_ITERATIONS')).toBe(8);
    expect(errors).toHaveBeenCalledWith('Invalid TOOL_TIMEOUT_MS "0", using default 30000');
    expect(errors).toHaveBeenCalledTimes(3);
  });
});
