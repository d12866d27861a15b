/**
 * SourceConnector Contract
 *
 * Uniform read access over the three source variants. Containers are sheets for
 * workbooks and tables for relational sources.
 */

import type { DataSourceKind } from '../models/data-source';

export type SourceValue = string | number | boolean | Date | null;

export type SourceRow = Record<string, SourceValue>;

export interface ColumnSample {
  name: string;
  samples: SourceValue[];
}

export interface SourceConnector {
  readonly kind: DataSourceKind;

  listContainers(): Promise<string[]>;

  /**
   * Ordered columns of a container with up to sampleSize values each
   */
  readSchema(container: string, sampleSize: number): Promise<ColumnSample[]>;

  /**
   * Rows restricted to the given columns, in source order. Every iteration
   * re-reads the source from the start.
   */
  fetchRows(container: string, columns: string[]): AsyncIterable<SourceRow>;

  close(): Promise<void>;
}

export const DEFAULT_SAMPLE_SIZE = 100;

/**
 * Wrap an async generator factory so each for-await starts a fresh read
 */
export function restartable<T>(factory: () => AsyncGenerator<T>): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator]: () => factory()
  };
}

/**
 * Group a row stream into fixed-size batches; the last batch may be short
 */
export async function* inBatches<T>(rows: AsyncIterable<T>, batchSize: number): AsyncGenerator<T[]> {
  if (batchSize < 1) {
    throw new Error(`batchSize must be at least 1, got ${batchSize}`);
  }

  let batch: T[] = [];
  for await (const row of rows) {
    batch.push(row);
    if (batch.length >= batchSize) {
      yield batch;
      batch = [];
    }
  }

  if (batch.length > 0) {
    yield batch;
  }
}

export function isEmptyValue(value: SourceValue | undefined): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === 'string') {
    return value.trim().length === 0;
  }
  if (typeof value === 'number') {
    return Number.isNaN(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime());
  }
  return false;
}

/**
 * Project a full source record onto the selected columns; absent columns become null
 */
export function projectRow(record: Record<string, unknown>, columns: string[]): SourceRow {
  const row: SourceRow = {};
  for (const column of columns) {
    row[column] = toSourceValue(record[column]);
  }
  return row;
}

export function toSourceValue(value: unknown): SourceValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('hex');
  }
  return JSON.stringify(value);
}
