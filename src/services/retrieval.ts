/**
 * Retrieval Service
 * Semantic search over the pre-built movie overview index using cosine similarity
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Embedder } from './embeddings.js';
import { RetrievalError, isAbortError } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';

export interface IndexedDocument {
  ref: string;
  title: string;
  text: string;
  vector: number[];
}

export interface VectorMatch {
  document: IndexedDocument;
  /** Insertion position in the index; breaks score ties */
  position: number;
  score: number;
}

export interface VectorIndex {
  readonly size: number;
  readonly dimensions: number;
  readonly model?: string;
  search(vector: number[], k: number): VectorMatch[];
}

export const RetrievedDocumentSchema = z.object({
  ref: z.string(),
  title: z.string(),
  score: z.number(),
  snippet: z.string(),
});

export type RetrievedDocument = z.infer<typeof RetrievedDocumentSchema>;

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dotProduct / (normA * normB);
}

const IndexFileSchema = z.object({
  model: z.string().optional(),
  documents: z.array(
    z.object({
      ref: z.union([z.string(), z.number()]).transform(String),
      title: z.string(),
      text: z.string(),
      vector: z.array(z.number()).min(1),
    }),
  ),
});

export class InMemoryVectorIndex implements VectorIndex {
  readonly dimensions: number;

  constructor(private documents: IndexedDocument[], readonly model?: string) {
    this.dimensions = documents[0]?.vector.length ?? 0;
    for (const doc of documents) {
      if (doc.vector.length !== this.dimensions) {
        throw new Error(`Document ${doc.ref} has ${doc.vector.length} dimensions, expected ${this.dimensions}`);
      }
    }
  }

  static async load(path: string): Promise<InMemoryVectorIndex> {
    const raw = await readFile(path, 'utf-8');
    const parsed = IndexFileSchema.parse(JSON.parse(raw));
    return new InMemoryVectorIndex(parsed.documents, parsed.model);
  }

  get size(): number {
    return this.documents.length;
  }

  search(vector: number[], k: number): VectorMatch[] {
    const matches = this.documents.map((document, position) => ({
      document,
      position,
      score: cosineSimilarity(vector, document.vector),
    }));

    matches.sort((a, b) => b.score - a.score || a.position - b.position);
    return matches.slice(0, k);
  }
}

// Expansions applied when a search comes back empty
const SYNONYMS: Record<string, string[]> = {
  death: ['dying', 'murder', 'dead', 'kill', 'fatal'],
  dream: ['dreams', 'subconscious', 'sleep'],
  robot: ['android', 'AI', 'machine', 'cyborg'],
};

export function expandSemanticQuery(query: string): string {
  const lower = query.toLowerCase();
  const expansions = Object.entries(SYNONYMS)
    .filter(([keyword]) => lower.includes(keyword))
    .flatMap(([, synonyms]) => synonyms);

  if (expansions.length === 0) {
    return query;
  }
  return `${query} (${expansions.join(' OR ')})`;
}

function toSnippet(text: string, maxChars = 240): string {
  if (text.length <= maxChars) return text;
  const cut = text.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(' ');
  return `${(lastSpace > maxChars / 2 ? cut.slice(0, lastSpace) : cut).trimEnd()}…`;
}

export interface SemanticRetrieverOptions {
  embedder: Embedder;
  /** A ready index, or a loader that is retried until it succeeds */
  index: VectorIndex | (() => Promise<VectorIndex>);
  defaultK?: number;
  /** Drop matches scoring below this; 0 disables the floor */
  minSimilarity?: number;
  logger?: Logger;
}

export interface ExpandedSearchResult {
  query: string;
  expandedQuery?: string;
  documents: RetrievedDocument[];
}

export class SemanticRetriever {
  private index: VectorIndex | null;
  private loadIndex: (() => Promise<VectorIndex>) | null;
  private embedder: Embedder;
  readonly defaultK: number;
  private minSimilarity: number;
  private logger: Logger;

  constructor(options: SemanticRetrieverOptions) {
    this.embedder = options.embedder;
    this.defaultK = options.defaultK ?? 5;
    this.minSimilarity = options.minSimilarity ?? 0;
    this.logger = options.logger ?? componentLogger('retrieval');

    if (typeof options.index === 'function') {
      this.index = null;
      this.loadIndex = options.index;
    } else {
      this.index = options.index;
      this.loadIndex = null;
    }
  }

  private async resolveIndex(): Promise<VectorIndex> {
    if (this.index) {
      return this.index;
    }
    if (!this.loadIndex) {
      throw new RetrievalError('Vector index is unavailable');
    }

    try {
      const index = await this.loadIndex();
      if (index.model && index.model !== this.embedder.model) {
        this.logger.warn(
          { indexModel: index.model, embeddingModel: this.embedder.model },
          'Vector index was built with a different embedding model',
        );
      }
      this.index = index;
      return index;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RetrievalError(`Vector index is unavailable: ${message}`, { cause: error });
    }
  }

  /**
   * Top-k documents by descending similarity, ties in index order.
   * k = 0 returns nothing without touching the index.
   */
  async search(text: string, k: number = this.defaultK, signal?: AbortSignal): Promise<RetrievedDocument[]> {
    if (!Number.isInteger(k) || k < 0) {
      throw new RetrievalError(`k must be a non-negative integer, got ${k}`);
    }
    if (k === 0) {
      return [];
    }

    const index = await this.resolveIndex();
    if (index.size === 0) {
      return [];
    }

    let vector: number[];
    try {
      vector = await this.embedder.embed(text, signal);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new RetrievalError(`Could not embed search text: ${message}`, { cause: error });
    }

    if (vector.length !== index.dimensions) {
      throw new RetrievalError(
        `Query embedding has ${vector.length} dimensions but the index has ${index.dimensions}`,
      );
    }

    return index
      .search(vector, k)
      .filter(match => this.minSimilarity <= 0 || match.score >= this.minSimilarity)
      .map(match => ({
        ref: match.document.ref,
        title: match.document.title,
        score: match.score,
        snippet: toSnippet(match.document.text),
      }));
  }

  /** Search, and retry once with synonym expansion when nothing comes back */
  async searchWithExpansion(text: string, k: number = this.defaultK, signal?: AbortSignal): Promise<ExpandedSearchResult> {
    const documents = await this.search(text, k, signal);
    if (documents.length > 0 || k === 0) {
      return { query: text, documents };
    }

    const expandedQuery = expandSemanticQuery(text);
    if (expandedQuery === text) {
      return { query: text, documents };
    }

    this.logger.debug({ query: text, expandedQuery }, 'Retrying semantic search with expanded query');
    return {
      query: text,
      expandedQuery,
      documents: await this.search(expandedQuery, k, signal),
    };
  }
}
