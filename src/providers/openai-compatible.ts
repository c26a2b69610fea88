// OpenAI-compatible Provider
// OpenAI, DeepSeek and Gemini all expose the chat completions API, so one client covers them

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';

export interface OpenAICompatibleConfig {
  name: string;
  apiKey: string;
  baseURL?: string;
  defaultModel: string;
  timeoutMs?: number;
  maxRetries?: number;
}

function toChatMessage(message: ProviderMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAICompatibleProvider implements Provider {
  name: string;
  defaultModel: string;
  private client: OpenAI;

  constructor(config: OpenAICompatibleConfig) {
    if (!config.apiKey) {
      throw new Error(`API key for provider "${config.name}" not configured`);
    }

    this.name = config.name;
    this.defaultModel = config.defaultModel;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL || undefined,
      timeout: config.timeoutMs ?? 180000,
      maxRetries: config.maxRetries ?? 2,
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const completion = await this.client.chat.completions.create(
      {
        model: options.model || this.defaultModel,
        messages: messages.map(toChatMessage),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
      },
      { signal: options.signal },
    );

    const message = completion.choices[0]?.message;

    return {
      content: message?.content ?? '',
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
    };
  }
}
