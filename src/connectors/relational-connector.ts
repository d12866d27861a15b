/**
 * Relational SourceConnector
 *
 * Reads PostgreSQL tables through the shared DatabaseConnectionManager. Metadata
 * reads and row pages are idempotent and go through ErrorHandler.withRetry.
 * Containers are "schema.table" names.
 */

import type { QueryResult, QueryResultRow } from 'pg';
import { ConfigurationInvalidError, type ErrorHandler } from '../lib/error-handler';
import {
  classifyDatabaseError,
  quoteIdentifier,
  type DatabaseConnectionManager
} from '../lib/database-connections';
import type { Logger } from '../lib/logger';
import type { RelationalSource } from '../models/data-source';
import {
  projectRow,
  restartable,
  toSourceValue,
  type ColumnSample,
  type SourceConnector,
  type SourceRow
} from './source-connector';

export interface RelationalConnectorOptions {
  /** Rows per page when streaming a table */
  pageSize: number;
  /** Attempts for each metadata read or page, first try included */
  maxAttempts: number;
  /** Client acquisition timeout */
  acquireTimeoutMs: number;
}

const SYSTEM_SCHEMAS = ['pg_catalog', 'information_schema'];

export interface TableReference {
  schema: string;
  table: string;
}

export function parseContainer(container: string): TableReference {
  const parts = container.split('.');
  if (parts.length === 1 && parts[0]) {
    return { schema: 'public', table: parts[0] };
  }
  if (parts.length === 2 && parts[0] && parts[1]) {
    return { schema: parts[0], table: parts[1] };
  }
  throw new ConfigurationInvalidError(`Invalid table reference '${container}'; expected schema.table`, { container });
}

function qualified(ref: TableReference): string {
  return `${quoteIdentifier(ref.schema)}.${quoteIdentifier(ref.table)}`;
}

export class RelationalConnector implements SourceConnector {
  readonly kind = 'relational' as const;
  private readonly connectionName: string;

  constructor(
    private readonly source: RelationalSource,
    private readonly connections: DatabaseConnectionManager,
    private readonly errorHandler: ErrorHandler,
    private readonly logger: Logger,
    private readonly options: RelationalConnectorOptions
  ) {
    this.connectionName = source.database
      ? connections.forDatabase(source.connectionRef, source.database)
      : source.connectionRef;
  }

  /**
   * Databases visible on the server of this connection
   */
  async listDatabases(): Promise<string[]> {
    const result = await this.read(
      'list databases',
      'SELECT datname FROM pg_database WHERE datistemplate = false AND datallowconn = true ORDER BY datname'
    );
    return result.rows.map(row => String(row.datname));
  }

  async listContainers(): Promise<string[]> {
    const result = await this.read(
      'list tables',
      `SELECT table_schema, table_name
         FROM information_schema.tables
        WHERE table_type = 'BASE TABLE'
          AND table_schema <> ALL($1::text[])
        ORDER BY table_schema, table_name`,
      [SYSTEM_SCHEMAS]
    );
    return result.rows.map(row => `${String(row.table_schema)}.${String(row.table_name)}`);
  }

  async readSchema(container: string, sampleSize: number): Promise<ColumnSample[]> {
    const ref = parseContainer(container);

    const columns = await this.read(
      'read columns',
      `SELECT column_name
         FROM information_schema.columns
        WHERE table_schema = $1 AND table_name = $2
        ORDER BY ordinal_position`,
      [ref.schema, ref.table]
    );

    const names = columns.rows.map(row => String(row.column_name));
    if (names.length === 0) {
      throw new ConfigurationInvalidError(`Table '${container}' not found or has no columns`, { container });
    }

    const sample = await this.read(
      'sample rows',
      `SELECT * FROM ${qualified(ref)} LIMIT $1`,
      [sampleSize]
    );

    return names.map(name => ({
      name,
      samples: sample.rows.map(row => toSourceValue(row[name]))
    }));
  }

  fetchRows(container: string, columns: string[]): AsyncIterable<SourceRow> {
    const ref = parseContainer(container);
    const pageSize = this.options.pageSize;
    const columnList = columns.map(quoteIdentifier).join(', ');
    // physical order is the table's read order; pages stay stable while reading
    const text = `SELECT ${columnList} FROM ${qualified(ref)} ORDER BY ctid LIMIT $1 OFFSET $2`;
    const readPage = (offset: number): Promise<QueryResult<QueryResultRow>> =>
      this.read(`read ${container} @${offset}`, text, [pageSize, offset]);

    return restartable(async function* () {
      let offset = 0;
      for (;;) {
        const page = await readPage(offset);
        for (const row of page.rows) {
          yield projectRow(row, columns);
        }
        if (page.rows.length < pageSize) {
          return;
        }
        offset += pageSize;
      }
    });
  }

  async close(): Promise<void> {
    // pools belong to the DatabaseConnectionManager
  }

  private async read(operationName: string, text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>> {
    const result = await this.errorHandler.withRetry(
      () => this.connections.withClient(
        this.connectionName,
        async client => {
          try {
            return await client.query(text, params);
          } catch (error) {
            throw classifyDatabaseError(error, { connection: this.connectionName, operation: operationName });
          }
        },
        this.options.acquireTimeoutMs
      ),
      `${this.source.connectionRef}: ${operationName}`,
      { maxAttempts: this.options.maxAttempts }
    );

    this.logger.debug('Relational read', { operation: operationName, rows: result.rows.length });
    return result;
  }
}
