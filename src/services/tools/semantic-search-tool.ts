// Semantic Search Tool
// Plot, theme and "movies like ..." lookups over the overview embedding index

import { z } from 'zod';
import { RetrievedDocumentSchema, type SemanticRetriever } from '../retrieval.js';
import type { ToolSpec } from './types.js';

export const SEMANTIC_SEARCH_TOOL = 'semantic_search';

export const MAX_SEARCH_K = 20;

export const SemanticSearchArgsSchema = z.object({
  query: z.string().trim().min(1),
  k: z.number().int().min(0).max(MAX_SEARCH_K).optional(),
});

export type SemanticSearchArgs = z.output<typeof SemanticSearchArgsSchema>;

export const SemanticSearchOutputSchema = z.object({
  query: z.string(),
  expandedQuery: z.string().optional(),
  documents: z.array(RetrievedDocumentSchema),
});

export type SemanticSearchOutput = z.output<typeof SemanticSearchOutputSchema>;

export function createSemanticSearchTool(
  retriever: SemanticRetriever
): ToolSpec<SemanticSearchArgs, SemanticSearchOutput> {
  return {
    name: SEMANTIC_SEARCH_TOOL,
    description:
      'Find movies whose plot overview is semantically similar to a text query. Use this for themes, plot ' +
      'elements, moods and descriptions rather than exact values. Phrase the query as a short plot-like ' +
      'description distilled from the question.',
    parameters: [
      {
        name: 'query',
        type: 'string',
        description: 'Search text describing the plot or theme to look for',
        required: true,
      },
      {
        name: 'k',
        type: 'number',
        description: `Number of results to return (0-${MAX_SEARCH_K}, default: ${retriever.defaultK})`,
        required: false,
        default: retriever.defaultK,
      },
    ],
    inputSchema: SemanticSearchArgsSchema,
    outputSchema: SemanticSearchOutputSchema,
    execute: async (args, context) => retriever.searchWithExpansion(args.query, args.k, context.signal),
  };
}
