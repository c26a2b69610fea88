import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  InMemoryVectorIndex,
  SemanticRetriever,
  cosineSimilarity,
  expandSemanticQuery,
} from '../retrieval.js';
import { RetrievalError } from '../../utils/errors.js';
import { FakeEmbedder, buildTestIndex } from '../../test-utils/fake-embedder.js';

describe('Retrieval Service', () => {
  const embedder = new FakeEmbedder(['space', 'dream']);
  const index = buildTestIndex(embedder, [
    { ref: 'a', title: 'Star Drift', text: 'Lost in space' },
    { ref: 'b', title: 'Night Walk', text: 'A long dream' },
    { ref: 'c', title: 'Orbit Sleep', text: 'A space dream' },
    { ref: 'd', title: 'Void', text: 'Deep space' },
  ]);

  describe('cosineSimilarity', () => {
    it('should score identical directions as 1 and orthogonal ones as 0', () => {
      expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it('should refuse vectors of different lengths', () => {
      expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have the same length');
    });
  });

  describe('SemanticRetriever', () => {
    it('should return documents by descending similarity, ties in index order', async () => {
      const retriever = new SemanticRetriever({ embedder, index });

      const documents = await retriever.search('space', 3);

      expect(documents.map(d => d.ref)).toEqual(['a', 'd', 'c']);
      for (let i = 1; i < documents.length; i++) {
        expect(documents[i].score).toBeLessThanOrEqual(documents[i - 1].score);
      }
    });

    it('should return nothing for k = 0 without embedding the text', async () => {
      const counting = new FakeEmbedder(['space', 'dream']);
      const retriever = new SemanticRetriever({ embedder: counting, index });

      expect(await retriever.search('space', 0)).toEqual([]);
      expect(counting.calls).toEqual([]);
    });

    it('should reject a negative or fractional k', async () => {
      const retriever = new SemanticRetriever({ embedder, index });

      await expect(retriever.search('space', -1)).rejects.toThrow('k must be a non-negative integer, got -1');
      await expect(retriever.search('space', 1.5)).rejects.toBeInstanceOf(RetrievalError);
    });

    it('should return an empty list when nothing clears the similarity floor', async () => {
      const retriever = new SemanticRetriever({ embedder, index, minSimilarity: 0.5 });

      expect(await retriever.search('comedy', 5)).toEqual([]);
    });

    it('should fail with RetrievalError when the index cannot be loaded', async () => {
      const retriever = new SemanticRetriever({
        embedder,
        index: async () => {
          throw new Error('ENOENT: no such file');
        },
      });

      await expect(retriever.search('space', 2)).rejects.toThrow('Vector index is unavailable: ENOENT: no such file');
    });

    it('should keep trying the loader until the index is available', async () => {
      let attempts = 0;
      const retriever = new SemanticRetriever({
        embedder,
        index: async () => {
          attempts++;
          if (attempts === 1) throw new Error('still building');
          return index;
        },
      });

      await expect(retriever.search('space', 1)).rejects.toBeInstanceOf(RetrievalError);
      const documents = await retriever.search('space', 1);

      expect(documents.map(d => d.ref)).toEqual(['a']);
      expect(attempts).toBe(2);
    });

    it('should fail with RetrievalError when the embedder fails or disagrees on dimensions', async () => {
      const failing = new FakeEmbedder(['space', 'dream']);
      failing.failWith = new Error('rate limited');
      const wide = new FakeEmbedder(['space', 'dream', 'robot']);

      await expect(new SemanticRetriever({ embedder: failing, index }).search('space', 1)).rejects.toThrow(
        'Could not embed search text: rate limited',
      );
      await expect(new SemanticRetriever({ embedder: wide, index }).search('space', 1)).rejects.toThrow(
        'Query embedding has 3 dimensions but the index has 2',
      );
    });

    it('should retry an empty search with synonyms', async () => {
      const synonymEmbedder = new FakeEmbedder(['android']);
      const retriever = new SemanticRetriever({
        embedder: synonymEmbedder,
        index: buildTestIndex(synonymEmbedder, [{ ref: 'x', title: 'Circuit Heart', text: 'An android learns to love' }]),
        minSimilarity: 0.1,
      });

      const result = await retriever.searchWithExpansion('robot uprising', 3);

      expect(result.expandedQuery).toBe('robot uprising (android OR AI OR machine OR cyborg)');
      expect(result.documents.map(d => d.title)).toEqual(['Circuit Heart']);
      expect(synonymEmbedder.calls).toEqual(['robot uprising', 'robot uprising (android OR AI OR machine OR cyborg)']);
    });
  });

  describe('expandSemanticQuery', () => {
    it('should leave queries without known keywords untouched', () => {
      expect(expandSemanticQuery('heist comedy')).toBe('heist comedy');
      expect(expandSemanticQuery('Death at sea')).toBe('Death at sea (dying OR murder OR dead OR kill OR fatal)');
    });
  });

  describe('InMemoryVectorIndex.load', () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it('should read documents and the embedding model from an index file', async () => {
      dir = await mkdtemp(join(tmpdir(), 'movie-index-'));
      const path = join(dir, 'index.json');
      await writeFile(
        path,
        JSON.stringify({
          model: 'fake-bow',
          documents: [
            { ref: 7, title: 'Hera Pheri', text: 'A ransom call', vector: [0, 1] },
            { ref: '1', title: 'Inception', text: 'Dreams', vector: [1, 0] },
          ],
        }),
      );

      const loaded = await InMemoryVectorIndex.load(path);

      expect(loaded.size).toBe(2);
      expect(loaded.dimensions).toBe(2);
      expect(loaded.model).toBe('fake-bow');
      expect(loaded.search([0, 1], 1).map(m => m.document.ref)).toEqual(['7']);
    });

    it('should reject documents with mismatched dimensions', () => {
      expect(
        () =>
          new InMemoryVectorIndex([
            { ref: '1', title: 'A', text: 'a', vector: [1, 0] },
            { ref: '2', title: 'B', text: 'b', vector: [1] },
          ]),
      ).toThrow('Document 2 has 1 dimensions, expected 2');
    });
  });
});
