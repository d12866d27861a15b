// Typed accessors for pg result rows

import type { QueryResultRow } from 'pg';

export function readString(row: QueryResultRow, column: string): string {
  const value: unknown = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column '${column}' is not text`);
  }
  return value;
}

export function readNullableString(row: QueryResultRow, column: string): string | null {
  const value: unknown = row[column];
  return typeof value === 'string' ? value : null;
}

/**
 * pg returns BIGINT and COUNT(*) as strings
 */
export function readNumber(row: QueryResultRow, column: string): number {
  const value: unknown = row[column];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
    throw new Error(`Column '${column}' is not numeric`);
  }
  return parsed;
}

export function readBoolean(row: QueryResultRow, column: string): boolean {
  return row[column] === true;
}

export function readNullableDate(row: QueryResultRow, column: string): Date | null {
  const value: unknown = row[column];
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string') {
    return new Date(value);
  }
  return null;
}

export function readDate(row: QueryResultRow, column: string): Date {
  const value = readNullableDate(row, column);
  if (!value) {
    throw new Error(`Column '${column}' is not a timestamp`);
  }
  return value;
}

/**
 * jsonb arrives parsed; text columns holding JSON are parsed here
 */
export function readJson(row: QueryResultRow, column: string): unknown {
  const value: unknown = row[column];
  return typeof value === 'string' ? JSON.parse(value) : value;
}
