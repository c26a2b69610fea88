/**
 * Embedding Service
 * Generates query embeddings with the OpenAI embeddings API.
 * The model must match the one the vector index was built with.
 */

import OpenAI from 'openai';

export interface Embedder {
  readonly model: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;

  constructor(
    public readonly model: string,
    apiKey: string,
    baseURL?: string
  ) {
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY not set - query embeddings cannot be generated');
    }
    this.client = new OpenAI({ apiKey, baseURL: baseURL || undefined });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: text,
        encoding_format: 'float',
      },
      { signal },
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error('Embedding response contained no vectors');
    }
    return embedding;
  }
}
