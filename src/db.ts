// Movie database client (better-sqlite3, read-only)
import Database from 'better-sqlite3';

export type SqlParam = string | number;

/** The relational store as the query executor sees it */
export interface MovieStore {
  select(sql: string, params: SqlParam[]): unknown[];
  close(): void;
}

export class SqliteMovieStore implements MovieStore {
  constructor(private db: Database.Database) {}

  select(sql: string, params: SqlParam[]): unknown[] {
    return this.db.prepare(sql).all(...params);
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Open the pre-built movies database.
 * The file is owned by the ingestion job; this service never writes to it.
 */
export function openMovieStore(path: string): SqliteMovieStore {
  const db = new Database(path, { readonly: true, fileMustExist: true });
  return new SqliteMovieStore(db);
}
