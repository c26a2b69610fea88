// Provider factory
// Builds the reasoning collaborator handle that gets injected into the orchestrator

import type { Provider } from './types.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import { env, isProviderConfigured, type ReasoningProviderName } from '../env.js';

const DEFAULT_MODELS: Record<ReasoningProviderName, string> = {
  openai: 'gpt-4o-mini',
  deepseek: 'deepseek-chat',
  gemini: 'gemini-2.0-flash',
};

export function createProvider(name: ReasoningProviderName = env.REASONING_PROVIDER): Provider {
  if (!isProviderConfigured(name)) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  const defaultModel = env.REASONING_MODEL || DEFAULT_MODELS[name];
  const timeoutMs = env.REASONING_TIMEOUT_MS;

  switch (name) {
    case 'openai':
      return new OpenAICompatibleProvider({
        name,
        apiKey: env.OPENAI_API_KEY,
        baseURL: env.OPENAI_BASE_URL,
        defaultModel,
        timeoutMs,
      });
    case 'deepseek':
      return new OpenAICompatibleProvider({
        name,
        apiKey: env.DEEPSEEK_API_KEY,
        baseURL: 'https://api.deepseek.com/v1',
        defaultModel,
        timeoutMs,
      });
    case 'gemini':
      return new OpenAICompatibleProvider({
        name,
        apiKey: env.GEMINI_API_KEY,
        baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai/',
        defaultModel,
        timeoutMs,
      });
  }
}

export { OpenAICompatibleProvider } from './openai-compatible.js';
export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ProviderUsage } from './types.js';
