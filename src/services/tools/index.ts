// Tool System Initialization
// Registers the movie tools; registration order is the order the model sees them in

import { ToolRegistry } from './registry.js';
import { createStructuredQueryTool } from './structured-query-tool.js';
import { createSemanticSearchTool } from './semantic-search-tool.js';
import type { MovieQueryExecutor } from '../movies/query-executor.js';
import type { QueryTranslator } from '../movies/query-translator.js';
import type { SemanticRetriever } from '../retrieval.js';
import { componentLogger } from '../../utils/logger.js';

export { ToolRegistry, formatZodIssues } from './registry.js';
export { STRUCTURED_QUERY_TOOL } from './structured-query-tool.js';
export { SEMANTIC_SEARCH_TOOL } from './semantic-search-tool.js';
export type {
  ToolSpec,
  ToolDescriptor,
  ToolParameter,
  ToolContext,
  InvocationResult,
  InvokeOptions,
} from './types.js';

export interface MovieToolDeps {
  executor: MovieQueryExecutor;
  translator: QueryTranslator;
  retriever: SemanticRetriever;
}

export function createMovieToolRegistry(deps: MovieToolDeps): ToolRegistry {
  const log = componentLogger('tools');
  const registry = new ToolRegistry();

  registry.register(createStructuredQueryTool(deps.executor, deps.translator));
  registry.register(createSemanticSearchTool(deps.retriever));

  log.info({ tools: registry.names() }, `Tool system initialized with ${registry.size} tool(s)`);
  return registry;
}
