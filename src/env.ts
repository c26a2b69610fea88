// Environment configuration for the movie query API
// Load provider credentials, data store locations and agent limits from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

export function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

// Values outside [0, max] fall back to the default
function parseFraction(value: string | undefined, defaultValue: number, name: string, max = 1): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > max) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export type ReasoningProviderName = 'openai' | 'deepseek' | 'gemini';

function parseProviderName(value: string | undefined): ReasoningProviderName {
  const name = strEnv(value, 'openai').toLowerCase();
  if (name === 'openai' || name === 'deepseek' || name === 'gemini') {
    return name;
  }
  console.error(`Unknown REASONING_PROVIDER "${name}", using openai`);
  return 'openai';
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Reasoning model
  REASONING_PROVIDER: parseProviderName(process.env.REASONING_PROVIDER),
  REASONING_MODEL: strEnv(process.env.REASONING_MODEL),
  REASONING_TEMPERATURE: parseFraction(process.env.REASONING_TEMPERATURE, 0, 'REASONING_TEMPERATURE', 2),
  REASONING_TIMEOUT_MS: parsePositiveInt(process.env.REASONING_TIMEOUT_MS, 180000, 'REASONING_TIMEOUT_MS'),

  // OpenAI (also used for embeddings)
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),
  EMBEDDING_MODEL: strEnv(process.env.EMBEDDING_MODEL, 'text-embedding-3-small'),

  // OpenAI-compatible endpoints
  DEEPSEEK_API_KEY: strEnv(process.env.DEEPSEEK_API_KEY),
  GEMINI_API_KEY: strEnv(process.env.GEMINI_API_KEY),

  // Pre-built data stores
  MOVIES_DB_PATH: strEnv(process.env.MOVIES_DB_PATH, './data/movies.db'),
  VECTOR_INDEX_PATH: strEnv(process.env.VECTOR_INDEX_PATH, './data/movies.index.json'),

  // Agent loop
  AGENT_MAX_ITERATIONS: parsePositiveInt(process.env.AGENT_MAX_ITERATIONS, 8, 'AGENT_MAX_ITERATIONS'),
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS'),
  MAX_CONTEXT_TOKENS: parsePositiveInt(process.env.MAX_CONTEXT_TOKENS, 32000, 'MAX_CONTEXT_TOKENS'),

  // Retrieval and queries
  RETRIEVAL_TOP_K: parsePositiveInt(process.env.RETRIEVAL_TOP_K, 5, 'RETRIEVAL_TOP_K'),
  RETRIEVAL_MIN_SIMILARITY: parseFraction(process.env.RETRIEVAL_MIN_SIMILARITY, 0, 'RETRIEVAL_MIN_SIMILARITY'),
  QUERY_MAX_ROWS: parsePositiveInt(process.env.QUERY_MAX_ROWS, 25, 'QUERY_MAX_ROWS'),

  // Sessions
  SESSION_TTL_MS: parsePositiveInt(process.env.SESSION_TTL_MS, 60 * 60 * 1000, 'SESSION_TTL_MS'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: ReasoningProviderName): boolean {
  switch (provider) {
    case 'openai':
      return !!env.OPENAI_API_KEY;
    case 'deepseek':
      return !!env.DEEPSEEK_API_KEY;
    case 'gemini':
      return !!env.GEMINI_API_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(): ReasoningProviderName[] {
  const providers: ReasoningProviderName[] = ['openai', 'deepseek', 'gemini'];
  return providers.filter(isProviderConfigured);
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  console.log('Movie Query API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Configured providers: ${configured.join(', ') || 'none'}`);
  console.log(`  Reasoning provider: ${env.REASONING_PROVIDER}${env.REASONING_MODEL ? ` (${env.REASONING_MODEL})` : ''}`);
  console.log(`  Embedding model: ${env.EMBEDDING_MODEL}`);
  console.log(`  Movies database: ${env.MOVIES_DB_PATH}`);
  console.log(`  Vector index: ${env.VECTOR_INDEX_PATH}`);
  console.log(`  Max agent iterations: ${env.AGENT_MAX_ITERATIONS}`);
  console.log(`  Tool timeout ms: ${env.TOOL_TIMEOUT_MS}`);
  console.log(`  Retrieval top-k: ${env.RETRIEVAL_TOP_K}`);
  if (env.RETRIEVAL_MIN_SIMILARITY > 0) {
    console.log(`  Retrieval similarity floor: ${env.RETRIEVAL_MIN_SIMILARITY}`);
  }
}
