// Structured Query Tool
// Exact lookups, filters, ranges and rankings over the movie table

import { z } from 'zod';
import { MovieRecordSchema } from '../movies/schema.js';
import {
  FILTER_OPERATORS,
  MovieFilterSchema,
  type MovieQueryExecutor,
} from '../movies/query-executor.js';
import type { QueryTranslator } from '../movies/query-translator.js';
import type { ToolSpec } from './types.js';

export const STRUCTURED_QUERY_TOOL = 'structured_query';

// Field names stay plain strings here so unknown columns surface as query errors
export const StructuredQueryArgsSchema = z
  .object({
    request: z.string().trim().min(1).optional(),
    filter: MovieFilterSchema.optional(),
  })
  .refine(args => args.request !== undefined || args.filter !== undefined, {
    message: 'Provide either "filter" or "request"',
  });

export type StructuredQueryArgs = z.output<typeof StructuredQueryArgsSchema>;

export const StructuredQueryOutputSchema = z.object({
  filter: MovieFilterSchema,
  count: z.number().int().nonnegative(),
  truncated: z.boolean(),
  rows: z.array(MovieRecordSchema),
});

export type StructuredQueryOutput = z.output<typeof StructuredQueryOutputSchema>;

export function createStructuredQueryTool(
  executor: MovieQueryExecutor,
  translator: QueryTranslator
): ToolSpec<StructuredQueryArgs, StructuredQueryOutput> {
  return {
    name: STRUCTURED_QUERY_TOOL,
    description:
      'Look up movies by exact or numeric criteria: titles, years, ratings, runtimes, genres, directors, cast, ' +
      'votes and box office. Supports filtering, sorting and top-N rankings. Pass a JSON "filter" when you can ' +
      'express the criteria directly, otherwise a natural-language "request".',
    parameters: [
      {
        name: 'filter',
        type: 'object',
        description:
          '{"conditions":[{"field","op","value"}],"match":"all"|"any","sort":{"field","direction"},"limit"}. ' +
          `Operators: ${FILTER_OPERATORS.join(', ')}. Fields: title, year, certificate, runtime, genre, rating, ` +
          'overview, metaScore, director, cast, votes, gross.',
        required: false,
      },
      {
        name: 'request',
        type: 'string',
        description: 'Natural-language description of the lookup, used when no filter is given',
        required: false,
      },
    ],
    inputSchema: StructuredQueryArgsSchema,
    outputSchema: StructuredQueryOutputSchema,
    execute: async (args, context) => {
      const filter = args.filter ?? (await translator.translate(args.request ?? '', context.signal));
      const result = await executor.execute(filter);

      return {
        filter,
        count: result.count,
        truncated: result.truncated,
        rows: result.rows,
      };
    },
  };
}
