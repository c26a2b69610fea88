import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MovieQueryExecutor, compileFilter, MovieFilterSchema } from '../query-executor.js';
import type { MovieStore } from '../../../db.js';
import { QueryError } from '../../../utils/errors.js';
import { createTestMovieStore, loadFixtureMovies } from '../../../test-utils/movie-db.js';

describe('MovieQueryExecutor', () => {
  let store: MovieStore;
  let executor: MovieQueryExecutor;

  beforeEach(() => {
    store = createTestMovieStore();
    executor = new MovieQueryExecutor(store, { defaultLimit: 25 });
  });

  afterEach(() => {
    store.close();
  });

  it('finds a known title with its year', async () => {
    const result = await executor.execute({ conditions: [{ field: 'title', value: 'Inception' }] });

    expect(result.count).toBe(1);
    expect(result.truncated).toBe(false);
    expect(result.rows).toHaveLength(1);
    expect(result.rows[0]).toMatchObject({
      title: 'Inception',
      year: 2010,
      rating: 8.8,
      director: 'Christopher Nolan',
      cast: ['Leonardo DiCaprio', 'Joseph Gordon-Levitt', 'Elliot Page', 'Ken Watanabe'],
    });
  });

  it('returns an empty result, not an error, when nothing matches', async () => {
    const result = await executor.execute({ conditions: [{ field: 'year', value: 9999 }] });

    expect(result).toEqual({ rows: [], count: 0, truncated: false });
  });

  it('matches text case-insensitively', async () => {
    const result = await executor.execute({ conditions: [{ field: 'title', value: 'the dark knight' }] });

    expect(result.rows.map(r => r.title)).toEqual(['The Dark Knight']);
  });

  it('searches every lead-star column for cast lookups', async () => {
    const result = await executor.execute({
      conditions: [{ field: 'cast', op: 'contains', value: 'DiCaprio' }],
    });

    expect(result.rows.map(r => r.title)).toEqual(['Inception', 'The Departed']);
  });

  it('sorts and limits rankings, reporting the full count', async () => {
    const result = await executor.execute({
      conditions: [{ field: 'director', value: 'Christopher Nolan' }],
      sort: { field: 'rating', direction: 'desc' },
      limit: 2,
    });

    expect(result.rows.map(r => r.title)).toEqual(['The Dark Knight', 'Inception']);
    expect(result.count).toBe(3);
    expect(result.truncated).toBe(true);
  });

  it('combines conditions with match "any"', async () => {
    const result = await executor.execute({
      conditions: [
        { field: 'year', value: 1994 },
        { field: 'year', value: 2006 },
      ],
      match: 'any',
    });

    expect(result.rows.map(r => r.title)).toEqual(['The Shawshank Redemption', 'The Departed']);
  });

  it('reads the not-available sentinel as null and skips it in comparisons', async () => {
    const heraPheri = await executor.execute({ conditions: [{ field: 'title', value: 'Hera Pheri' }] });
    expect(heraPheri.rows[0].metaScore).toBeNull();
    expect(heraPheri.rows[0].gross).toBeNull();

    const lowGross = await executor.execute({ conditions: [{ field: 'gross', op: 'lt', value: 30000000 }] });
    expect(lowGross.rows.map(r => r.title)).toEqual(['The Shawshank Redemption', 'Ex Machina']);
  });

  it('skips the not-available text value in text comparisons', async () => {
    const withUnrated = createTestMovieStore([
      ...loadFixtureMovies(),
      { id: 8, series_title: 'Unrated Film', certificate: 'Not Available', star1: 'Not Available' },
    ]);
    const local = new MovieQueryExecutor(withUnrated);

    try {
      const containsA = await local.execute({ conditions: [{ field: 'certificate', op: 'contains', value: 'A' }] });
      expect(containsA.rows.map(r => r.title)).toEqual([
        'Inception',
        'The Dark Knight',
        'Interstellar',
        'The Shawshank Redemption',
        'Ex Machina',
        'The Departed',
      ]);

      const startsWithN = await local.execute({ conditions: [{ field: 'certificate', op: 'starts_with', value: 'N' }] });
      expect(startsWithN.count).toBe(0);

      const notUA = await local.execute({ conditions: [{ field: 'certificate', op: 'neq', value: 'UA' }] });
      expect(notUA.rows.map(r => r.title)).toEqual(['The Shawshank Redemption', 'The Departed', 'Hera Pheri']);

      const unrated = await local.execute({ conditions: [{ field: 'title', value: 'Unrated Film' }] });
      expect(unrated.rows[0].certificate).toBeNull();
      expect(unrated.rows[0].cast).toEqual([]);
    } finally {
      withUnrated.close();
    }
  });

  it('excludes a movie from a negated cast lookup only when the actor is listed', async () => {
    const result = await executor.execute({ conditions: [{ field: 'cast', op: 'neq', value: 'tabu' }] });

    expect(result.count).toBe(6);
    expect(result.rows.map(r => r.title)).not.toContain('Hera Pheri');
  });

  it('puts missing values last when sorting ascending', async () => {
    const result = await executor.execute({ sort: { field: 'metaScore', direction: 'asc' } });

    expect(result.rows[0].title).toBe('Inception');
    expect(result.rows[result.rows.length - 1].title).toBe('Hera Pheri');
  });

  it('accepts numeric strings for numeric fields', async () => {
    const result = await executor.execute({ conditions: [{ field: 'year', op: 'gte', value: '2014' }] });

    expect(result.rows.map(r => r.title)).toEqual(['Interstellar', 'Ex Machina']);
  });

  it('raises QueryError for unknown columns', async () => {
    await expect(executor.execute({ conditions: [{ field: 'budget', value: 5 }] })).rejects.toThrow(
      'Unknown column "budget". Available fields: title, year, certificate, runtime, genre, rating, overview, metaScore, director, cast, votes, gross',
    );
  });

  it('raises QueryError for malformed filters', async () => {
    await expect(
      executor.execute({ conditions: [{ field: 'year', op: 'between', value: 2000 }] }),
    ).rejects.toBeInstanceOf(QueryError);
    await expect(executor.execute({ conditions: [{ field: 'year', value: 'recent' }] })).rejects.toThrow(
      'Field "year" is numeric but got "recent"',
    );
    await expect(
      executor.execute({ conditions: [{ field: 'rating', op: 'contains', value: 8 }] }),
    ).rejects.toThrow('Operator "contains" is not valid for numeric field "rating"');
  });

  it('wraps store failures in QueryError', async () => {
    const broken: MovieStore = {
      select: () => {
        throw new Error('database is locked');
      },
      close: () => {},
    };
    const failing = new MovieQueryExecutor(broken);

    await expect(failing.execute({})).rejects.toThrow('Query failed: database is locked');
  });
});

describe('compileFilter', () => {
  it('builds parameterised SQL with escaped LIKE patterns', () => {
    const filter = MovieFilterSchema.parse({
      conditions: [{ field: 'title', op: 'starts_with', value: '100%' }],
    });

    const { select, count } = compileFilter(filter, 10);

    expect(select.sql).toBe(
      "SELECT id, poster_link, series_title, released_year, certificate, runtime, genre, imdb_rating, overview, meta_score, director, star1, star2, star3, star4, no_of_votes, gross FROM movies WHERE ((series_title <> 'Not Available' AND series_title LIKE ? ESCAPE '\\')) ORDER BY id ASC LIMIT ?",
    );
    expect(select.params).toEqual(['100\\%%', 10]);
    expect(count).toEqual({
      sql: "SELECT COUNT(*) AS total FROM movies WHERE ((series_title <> 'Not Available' AND series_title LIKE ? ESCAPE '\\'))",
      params: ['100\\%%'],
    });
  });

  it('requires every star column to differ for a negated cast condition', () => {
    const filter = MovieFilterSchema.parse({
      conditions: [{ field: 'cast', op: 'neq', value: 'Tabu' }],
    });

    const { count } = compileFilter(filter, 5);

    expect(count.sql).toBe(
      "SELECT COUNT(*) AS total FROM movies WHERE (NOT (star1 = ? COLLATE NOCASE OR star2 = ? COLLATE NOCASE OR star3 = ? COLLATE NOCASE OR star4 = ? COLLATE NOCASE) AND (star1 <> 'Not Available' OR star2 <> 'Not Available' OR star3 <> 'Not Available' OR star4 <> 'Not Available'))",
    );
    expect(count.params).toEqual(['Tabu', 'Tabu', 'Tabu', 'Tabu']);
  });

  it('refuses to sort by cast', () => {
    const filter = MovieFilterSchema.parse({ sort: { field: 'cast' } });

    expect(() => compileFilter(filter, 5)).toThrow('Cannot sort by "cast"');
  });
});
