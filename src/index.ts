// Movie Query API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { buildServer } from './app.js';
import { openMovieStore } from './db.js';
import { env, logConfiguration } from './env.js';
import { createProvider } from './providers/index.js';
import { OpenAIEmbedder } from './services/embeddings.js';
import { MovieQueryExecutor } from './services/movies/query-executor.js';
import { QueryTranslator } from './services/movies/query-translator.js';
import { ReasoningOrchestrator } from './services/orchestrator/index.js';
import { InMemoryVectorIndex, SemanticRetriever } from './services/retrieval.js';
import { SessionManager } from './services/sessions.js';
import { createMovieToolRegistry } from './services/tools/index.js';

const provider = createProvider();
const store = openMovieStore(env.MOVIES_DB_PATH);

const registry = createMovieToolRegistry({
  executor: new MovieQueryExecutor(store, { defaultLimit: env.QUERY_MAX_ROWS }),
  translator: new QueryTranslator(provider, { model: env.REASONING_MODEL || undefined }),
  retriever: new SemanticRetriever({
    embedder: new OpenAIEmbedder(env.EMBEDDING_MODEL, env.OPENAI_API_KEY, env.OPENAI_BASE_URL),
    // Loaded on first search so the API starts while the index is still being built
    index: () => InMemoryVectorIndex.load(env.VECTOR_INDEX_PATH),
    defaultK: env.RETRIEVAL_TOP_K,
    minSimilarity: env.RETRIEVAL_MIN_SIMILARITY,
  }),
});

const orchestrator = new ReasoningOrchestrator({
  provider,
  registry,
  model: env.REASONING_MODEL || undefined,
  maxIterations: env.AGENT_MAX_ITERATIONS,
  toolTimeoutMs: env.TOOL_TIMEOUT_MS,
  temperature: env.REASONING_TEMPERATURE,
  maxContextTokens: env.MAX_CONTEXT_TOKENS,
});

const sessions = new SessionManager({ ttlMs: env.SESSION_TTL_MS });

const server = await buildServer(
  { sessions, orchestrator, registry },
  {
    logger: {
      level: env.LOG_LEVEL,
      ...(env.NODE_ENV === 'production'
        ? {}
        : {
            transport: {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            },
          }),
    },
  },
);

server.addHook('onClose', async () => {
  store.close();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    server.log.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      err => {
        server.log.error(err);
        process.exit(1);
      },
    );
  });
}

// Start server
try {
  await server.listen({ port: env.PORT, host: env.HOST });
  console.log(`🎬 Movie Query API listening on http://${env.HOST}:${env.PORT}`);
  console.log(`📊 Health: http://${env.HOST}:${env.PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
