/**
 * Structured Query Executor
 * Compiles a MovieFilter into one parameterised SELECT against the movies table.
 * Read-only: nothing here issues anything but SELECT.
 */

import { z } from 'zod';
import type { MovieStore, SqlParam } from '../../db.js';
import { QueryError } from '../../utils/errors.js';
import {
  MOVIE_COLUMNS,
  MOVIE_FIELDS,
  MovieRowSchema,
  NOT_AVAILABLE,
  TEXT_NOT_AVAILABLE,
  isMovieField,
  toMovieRecord,
  type MovieRecord,
} from './schema.js';

export const FILTER_OPERATORS = ['eq', 'neq', 'gt', 'gte', 'lt', 'lte', 'contains', 'starts_with'] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

/** Hard ceiling on rows handed back to the agent, whatever the filter asks for */
export const MAX_QUERY_ROWS = 100;

export const FilterConditionSchema = z.object({
  field: z.string().min(1),
  op: z.enum(FILTER_OPERATORS).default('eq'),
  value: z.union([z.string(), z.number()]),
});

export const MovieFilterSchema = z.object({
  conditions: z.array(FilterConditionSchema).max(12).default([]),
  match: z.enum(['all', 'any']).default('all'),
  sort: z
    .object({
      field: z.string().min(1),
      direction: z.enum(['asc', 'desc']).default('desc'),
    })
    .optional(),
  limit: z.number().int().min(1).max(MAX_QUERY_ROWS).optional(),
});

export type MovieFilterInput = z.input<typeof MovieFilterSchema>;
export type MovieFilter = z.output<typeof MovieFilterSchema>;
export type FilterCondition = z.output<typeof FilterConditionSchema>;

export interface QueryResult {
  rows: MovieRecord[];
  /** Total number of matching records, before the row limit */
  count: number;
  truncated: boolean;
}

interface SqlFragment {
  sql: string;
  params: SqlParam[];
}

const COMPARISON_SQL: Record<'eq' | 'neq' | 'gt' | 'gte' | 'lt' | 'lte', string> = {
  eq: '=',
  neq: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

const CountRowSchema = z.object({ total: z.number().int() });

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

function resolveField(name: string) {
  if (!isMovieField(name)) {
    throw new QueryError(
      `Unknown column "${name}". Available fields: ${Object.keys(MOVIE_FIELDS).join(', ')}`,
    );
  }
  return MOVIE_FIELDS[name];
}

function toNumber(condition: FilterCondition): number {
  const { value } = condition;
  if (typeof value === 'number') return value;
  if (/^-?\d+(\.\d+)?$/.test(value.trim())) return Number(value);
  throw new QueryError(`Field "${condition.field}" is numeric but got "${value}"`);
}

function compileCondition(condition: FilterCondition): SqlFragment {
  const field = resolveField(condition.field);
  const { op } = condition;

  if (field.kind === 'number') {
    if (op === 'contains' || op === 'starts_with') {
      throw new QueryError(`Operator "${op}" is not valid for numeric field "${condition.field}"`);
    }
    const column = field.columns[0];
    return {
      sql: `(${column} <> ${NOT_AVAILABLE} AND ${column} ${COMPARISON_SQL[op]} ?)`,
      params: [toNumber(condition)],
    };
  }

  const text = String(condition.value);
  let perColumn: string;
  let param: string;

  switch (op) {
    case 'eq':
    case 'neq':
      perColumn = '= ? COLLATE NOCASE';
      param = text;
      break;
    case 'contains':
      perColumn = "LIKE ? ESCAPE '\\'";
      param = `%${escapeLike(text)}%`;
      break;
    case 'starts_with':
      perColumn = "LIKE ? ESCAPE '\\'";
      param = `${escapeLike(text)}%`;
      break;
    default:
      throw new QueryError(`Operator "${op}" is not valid for text field "${condition.field}"`);
  }

  const params = field.columns.map(() => param);
  const known = (column: string) => `${column} <> '${TEXT_NOT_AVAILABLE}'`;

  if (op === 'neq') {
    // No backing column may equal the value, and at least one must hold a known value
    return {
      sql: `(NOT (${field.columns.map(column => `${column} ${perColumn}`).join(' OR ')}) AND (${field.columns.map(known).join(' OR ')}))`,
      params,
    };
  }

  return {
    sql: `(${field.columns.map(column => `(${known(column)} AND ${column} ${perColumn})`).join(' OR ')})`,
    params,
  };
}

function compileOrder(filter: MovieFilter): string {
  if (!filter.sort) {
    return 'ORDER BY id ASC';
  }

  const field = resolveField(filter.sort.field);
  if (field.columns.length > 1) {
    throw new QueryError(`Cannot sort by "${filter.sort.field}"`);
  }

  const column = field.columns[0];
  const direction = filter.sort.direction === 'asc' ? 'ASC' : 'DESC';
  if (field.kind === 'number') {
    // Missing values sort last in either direction
    return `ORDER BY (${column} = ${NOT_AVAILABLE}) ASC, ${column} ${direction}, id ASC`;
  }
  return `ORDER BY ${column} COLLATE NOCASE ${direction}, id ASC`;
}

export function compileFilter(filter: MovieFilter, limit: number): { select: SqlFragment; count: SqlFragment } {
  const fragments = filter.conditions.map(compileCondition);
  const joiner = filter.match === 'any' ? ' OR ' : ' AND ';
  const where = fragments.length > 0 ? `WHERE ${fragments.map(f => f.sql).join(joiner)}` : '';
  const params = fragments.flatMap(f => f.params);
  const order = compileOrder(filter);

  return {
    select: {
      sql: `SELECT ${MOVIE_COLUMNS.join(', ')} FROM movies ${where} ${order} LIMIT ?`.replace(/\s+/g, ' ').trim(),
      params: [...params, limit],
    },
    count: {
      sql: `SELECT COUNT(*) AS total FROM movies ${where}`.trim(),
      params,
    },
  };
}

export class MovieQueryExecutor {
  private defaultLimit: number;

  constructor(private store: MovieStore, options: { defaultLimit?: number } = {}) {
    this.defaultLimit = Math.min(options.defaultLimit || 25, MAX_QUERY_ROWS);
  }

  async execute(input: MovieFilterInput): Promise<QueryResult> {
    const parsed = MovieFilterSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'filter'}: ${issue.message}`);
      throw new QueryError(`Malformed filter: ${issues.join('; ')}`);
    }

    const filter = parsed.data;
    const limit = Math.min(filter.limit ?? this.defaultLimit, MAX_QUERY_ROWS);
    const { select, count } = compileFilter(filter, limit);

    let rawRows: unknown[];
    let rawCount: unknown[];
    try {
      rawRows = this.store.select(select.sql, select.params);
      rawCount = this.store.select(count.sql, count.params);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new QueryError(`Query failed: ${message}`, { cause: error });
    }

    const rows: MovieRecord[] = [];
    for (const raw of rawRows) {
      const row = MovieRowSchema.safeParse(raw);
      if (!row.success) {
        throw new QueryError('Movie store returned a row with an unexpected shape');
      }
      rows.push(toMovieRecord(row.data));
    }

    const total = CountRowSchema.safeParse(rawCount[0]);
    const matched = total.success ? total.data.total : rows.length;

    return {
      rows,
      count: matched,
      truncated: matched > rows.length,
    };
  }
}
