// Deterministic bag-of-words embedder for tests
import type { Embedder } from '../services/embeddings.js';
import { InMemoryVectorIndex, type IndexedDocument } from '../services/retrieval.js';

export const TEST_VOCABULARY = [
  'dream',
  'subconscious',
  'thief',
  'space',
  'wormhole',
  'robot',
  'consciousness',
  'prison',
  'redemption',
  'undercover',
  'police',
  'gang',
  'vigilante',
  'anarchy',
  'kidnapping',
  'ransom',
];

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z]+/g) ?? [];
}

export class FakeEmbedder implements Embedder {
  readonly model = 'fake-bow';
  calls: string[] = [];
  failWith: Error | null = null;

  constructor(private vocabulary: string[] = TEST_VOCABULARY) {}

  get dimensions(): number {
    return this.vocabulary.length;
  }

  vectorFor(text: string): number[] {
    const tokens = tokenize(text);
    // Substring match: "dreams" counts towards "dream", "imprisoned" towards "prison"
    return this.vocabulary.map(word => tokens.filter(token => token.includes(word)).length);
  }

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.vectorFor(text);
  }
}

export interface TestDocument {
  ref: string;
  title: string;
  text: string;
}

export function buildTestIndex(embedder: FakeEmbedder, documents: TestDocument[]): InMemoryVectorIndex {
  const indexed: IndexedDocument[] = documents.map(doc => ({ ...doc, vector: embedder.vectorFor(doc.text) }));
  return new InMemoryVectorIndex(indexed, embedder.model);
}
