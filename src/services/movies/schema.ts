// Movie dataset schema
// Maps the public field names the agent sees onto the columns of the `movies` table

import { z } from 'zod';

export type FieldKind = 'text' | 'number';

export interface MovieField {
  kind: FieldKind;
  /** Columns that back the field; `cast` spans the four lead stars */
  columns: readonly string[];
  description: string;
}

export const MOVIE_FIELDS = {
  title: { kind: 'text', columns: ['series_title'], description: 'Movie name' },
  year: { kind: 'number', columns: ['released_year'], description: 'Year of release' },
  certificate: { kind: 'text', columns: ['certificate'], description: 'Age rating' },
  runtime: { kind: 'number', columns: ['runtime'], description: 'Duration in minutes' },
  genre: { kind: 'text', columns: ['genre'], description: 'Comma separated genres, e.g. "Action, Sci-Fi"' },
  rating: { kind: 'number', columns: ['imdb_rating'], description: 'IMDb rating (0-10)' },
  overview: { kind: 'text', columns: ['overview'], description: 'Short plot summary' },
  metaScore: { kind: 'number', columns: ['meta_score'], description: 'Metacritic score (0-100)' },
  director: { kind: 'text', columns: ['director'], description: "Director's name" },
  cast: { kind: 'text', columns: ['star1', 'star2', 'star3', 'star4'], description: 'Lead actors' },
  votes: { kind: 'number', columns: ['no_of_votes'], description: 'Total number of votes' },
  gross: { kind: 'number', columns: ['gross'], description: 'Box office earnings in US dollars' },
} as const satisfies Record<string, MovieField>;

export type MovieFieldName = keyof typeof MOVIE_FIELDS;

export function isMovieField(name: string): name is MovieFieldName {
  return Object.prototype.hasOwnProperty.call(MOVIE_FIELDS, name);
}

/** Numeric columns hold this value when the dataset had nothing to offer */
export const NOT_AVAILABLE = -999;

/** Text columns hold this value when the dataset had nothing to offer */
export const TEXT_NOT_AVAILABLE = 'Not Available';

export const MOVIE_COLUMNS = [
  'id',
  'poster_link',
  'series_title',
  'released_year',
  'certificate',
  'runtime',
  'genre',
  'imdb_rating',
  'overview',
  'meta_score',
  'director',
  'star1',
  'star2',
  'star3',
  'star4',
  'no_of_votes',
  'gross',
] as const;

const numericColumn = z
  .number()
  .nullable()
  .transform(value => (value === null || value === NOT_AVAILABLE ? null : value));

const textColumn = z
  .string()
  .nullable()
  .transform(value => (value === null || value === '' || value === TEXT_NOT_AVAILABLE ? null : value));

/** A raw row as better-sqlite3 returns it */
export const MovieRowSchema = z.object({
  id: z.number().int(),
  poster_link: textColumn,
  series_title: z.string(),
  released_year: numericColumn,
  certificate: textColumn,
  runtime: numericColumn,
  genre: textColumn,
  imdb_rating: numericColumn,
  overview: textColumn,
  meta_score: numericColumn,
  director: textColumn,
  star1: textColumn,
  star2: textColumn,
  star3: textColumn,
  star4: textColumn,
  no_of_votes: numericColumn,
  gross: numericColumn,
});

export type MovieRow = z.infer<typeof MovieRowSchema>;

export const MovieRecordSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  year: z.number().nullable(),
  certificate: z.string().nullable(),
  runtime: z.number().nullable(),
  genre: z.string().nullable(),
  rating: z.number().nullable(),
  overview: z.string().nullable(),
  metaScore: z.number().nullable(),
  director: z.string().nullable(),
  cast: z.array(z.string()),
  votes: z.number().nullable(),
  gross: z.number().nullable(),
  posterLink: z.string().nullable(),
});

export type MovieRecord = z.infer<typeof MovieRecordSchema>;

export function toMovieRecord(row: MovieRow): MovieRecord {
  return {
    id: row.id,
    title: row.series_title,
    year: row.released_year,
    certificate: row.certificate,
    runtime: row.runtime,
    genre: row.genre,
    rating: row.imdb_rating,
    overview: row.overview,
    metaScore: row.meta_score,
    director: row.director,
    cast: [row.star1, row.star2, row.star3, row.star4].filter((star): star is string => star !== null),
    votes: row.no_of_votes,
    gross: row.gross,
    posterLink: row.poster_link,
  };
}

/** Field catalogue as shown to the reasoning model */
export function describeMovieFields(): string {
  return Object.entries(MOVIE_FIELDS)
    .map(([name, field]) => `- \`${name}\` (${field.kind}) → ${field.description}`)
    .join('\n');
}
