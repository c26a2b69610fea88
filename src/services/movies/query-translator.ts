// Query Translator
// Turns a natural-language sub-request into a MovieFilter using the reasoning provider

import type { Provider } from '../../providers/types.js';
import { QueryError, isAbortError } from '../../utils/errors.js';
import { extractJsonObject } from '../../utils/json.js';
import { describeMovieFields } from './schema.js';
import { FILTER_OPERATORS, MovieFilterSchema, type MovieFilter } from './query-executor.js';

export function buildTranslationPrompt(): string {
  return `You translate questions about a movie database into a JSON filter.

Fields:
${describeMovieFields()}

Filter format (raw JSON, no markdown):
{"conditions":[{"field":"<field>","op":"<op>","value":<string or number>}],"match":"all"|"any","sort":{"field":"<field>","direction":"asc"|"desc"},"limit":<1-100>}

Operators: ${FILTER_OPERATORS.join(', ')}.
Rules:
- Text fields take eq, neq, contains or starts_with; numeric fields take eq, neq, gt, gte, lt or lte.
- Use "contains" for genre, overview and partial names.
- Use "cast" for actors; it matches any of the lead stars.
- "sort" and "limit" are optional; use them for "top", "best", "latest" style questions.
- Box office shorthands: 500M means 500000000.
- Output ONLY the JSON object.`;
}

export interface QueryTranslatorOptions {
  model?: string;
  maxTokens?: number;
}

export class QueryTranslator {
  constructor(private provider: Provider, private options: QueryTranslatorOptions = {}) {}

  async translate(request: string, signal?: AbortSignal): Promise<MovieFilter> {
    let content: string;
    try {
      const response = await this.provider.sendChat(
        [
          { role: 'system', content: buildTranslationPrompt() },
          { role: 'user', content: request },
        ],
        {
          model: this.options.model || this.provider.defaultModel,
          maxTokens: this.options.maxTokens ?? 400,
          temperature: 0,
          signal,
        },
      );
      content = response.content;
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new QueryError(`Could not translate request into a movie filter: ${message}`, { cause: error });
    }

    const json = extractJsonObject(content);
    if (!json) {
      throw new QueryError('Could not translate request into a movie filter: reply was not JSON');
    }

    const parsed = MovieFilterSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'filter'}: ${issue.message}`);
      throw new QueryError(`Malformed filter: ${issues.join('; ')}`);
    }

    return parsed.data;
  }
}
