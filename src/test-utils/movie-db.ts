// In-memory movies database for tests
import { readFileSync } from 'fs';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { SqliteMovieStore } from '../db.js';
import { MOVIE_COLUMNS } from '../services/movies/schema.js';

export const MOVIES_DDL = `
CREATE TABLE movies (
  id INTEGER PRIMARY KEY,
  poster_link TEXT,
  series_title TEXT NOT NULL,
  released_year INTEGER,
  certificate TEXT,
  runtime INTEGER,
  genre TEXT,
  imdb_rating REAL,
  overview TEXT,
  meta_score INTEGER,
  director TEXT,
  star1 TEXT,
  star2 TEXT,
  star3 TEXT,
  star4 TEXT,
  no_of_votes INTEGER,
  gross INTEGER
)`;

const FixtureRowSchema = z.record(z.union([z.string(), z.number(), z.null()]));

export type FixtureMovie = z.infer<typeof FixtureRowSchema>;

export function loadFixtureMovies(): FixtureMovie[] {
  const raw = readFileSync(new URL('./fixtures/movies.json', import.meta.url), 'utf-8');
  return z.array(FixtureRowSchema).parse(JSON.parse(raw));
}

/** A fresh in-memory database seeded with the fixture movies */
export function createTestMovieStore(movies: FixtureMovie[] = loadFixtureMovies()): SqliteMovieStore {
  const db = new Database(':memory:');
  db.exec(MOVIES_DDL);

  const insert = db.prepare(
    `INSERT INTO movies (${MOVIE_COLUMNS.join(', ')}) VALUES (${MOVIE_COLUMNS.map(column => `@${column}`).join(', ')})`,
  );
  const insertAll = db.transaction((rows: FixtureMovie[]) => {
    for (const row of rows) {
      insert.run(Object.fromEntries(MOVIE_COLUMNS.map(column => [column, row[column] ?? null])));
    }
  });
  insertAll(movies);

  return new SqliteMovieStore(db);
}
