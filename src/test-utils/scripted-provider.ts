// Scripted reasoning provider for tests
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from '../providers/types.js';

export type ScriptStep = string | Error | ((messages: ProviderMessage[], options: ProviderOptions) => string);

export class ScriptedProvider implements Provider {
  readonly name = 'scripted';
  readonly defaultModel = 'scripted-model';
  readonly calls: Array<{ messages: ProviderMessage[]; options: ProviderOptions }> = [];
  private cursor = 0;

  /** Once the script runs out the last step repeats */
  constructor(private script: ScriptStep[]) {
    if (script.length === 0) {
      throw new Error('ScriptedProvider needs at least one step');
    }
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    this.calls.push({ messages: structuredClone(messages), options });
    const step = this.script[Math.min(this.cursor, this.script.length - 1)];
    this.cursor++;

    if (step instanceof Error) {
      throw step;
    }
    const content = typeof step === 'function' ? step(messages, options) : step;
    return {
      content,
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    };
  }
}

export function act(tool: string, args: Record<string, unknown>, thought?: string): string {
  return JSON.stringify({ ...(thought ? { thought } : {}), action: { tool, args } });
}

export function finish(answer: string, thought?: string): string {
  return JSON.stringify({ ...(thought ? { thought } : {}), final_answer: answer });
}
