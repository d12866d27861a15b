/**
 * PostgreSQL business-data writer: table DDL from logical column types and
 * one transaction per batch.
 */

import {
  BatchRejectedError,
  BatchTransportError,
  ConfigurationInvalidError,
  ConnectTimeoutError,
  SourceUnreachableError,
  errorCodeOf,
  type MigrationBaseError
} from '../lib/error-handler';
import { classifyDatabaseError, quoteIdentifier, type SqlClient, type SqlExecutor } from '../lib/database-connections';
import type { Logger } from '../lib/logger';
import { parseSqlType, type ParsedSqlType } from '../models/column-config';
import type { BatchWriteRequest, BatchWriter, TableDefinition } from './destination-stores';

/** Bookkeeping columns added to every business table */
export const ROW_ID_COLUMN = '_row_id';
export const EXECUTION_ID_COLUMN = '_execution_id';
export const LOADED_AT_COLUMN = '_loaded_at';

/** Serialization failures, deadlocks, too many connections and server shutdowns */
const TRANSIENT_SQLSTATES = ['40001', '40P01', '53300', '57P01', '57P02', '57P03'];

/** pg accepts at most 65535 bind parameters per statement */
const MAX_BIND_PARAMETERS = 60000;

export function toPostgresType(type: ParsedSqlType): string {
  switch (type.base) {
    case 'BIT':
      return 'BOOLEAN';
    case 'TINYINT':
    case 'SMALLINT':
      return 'SMALLINT';
    case 'INT':
      return 'INTEGER';
    case 'BIGINT':
      return 'BIGINT';
    case 'DECIMAL':
      return 'NUMERIC';
    case 'FLOAT':
      return 'DOUBLE PRECISION';
    case 'MONEY':
      return 'NUMERIC(19,4)';
    case 'DATE':
      return 'DATE';
    case 'DATETIME':
      return 'TIMESTAMP';
    case 'NVARCHAR':
      return type.length === 'MAX' || type.length === null ? 'TEXT' : `VARCHAR(${type.length})`;
  }
}

function columnDdl(definition: TableDefinition): string[] {
  return definition.columns.map(column => {
    const parsed = parseSqlType(column.sqlType);
    if (!parsed) {
      throw new ConfigurationInvalidError(`Unsupported SQL type '${column.sqlType}' for column '${column.name}'`, {
        table: definition.table,
        column: column.name
      });
    }
    return `${quoteIdentifier(column.name)} ${toPostgresType(parsed)}${column.nullable ? '' : ' NOT NULL'}`;
  });
}

export function createTableStatement(definition: TableDefinition): string {
  const columns = [
    `${quoteIdentifier(ROW_ID_COLUMN)} BIGSERIAL PRIMARY KEY`,
    `${quoteIdentifier(EXECUTION_ID_COLUMN)} UUID NOT NULL`,
    `${quoteIdentifier(LOADED_AT_COLUMN)} TIMESTAMP NOT NULL DEFAULT NOW()`,
    ...columnDdl(definition)
  ];
  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(definition.table)} (\n  ${columns.join(',\n  ')}\n)`;
}

/**
 * Multi-row INSERT statements for one batch, split to respect the bind parameter limit
 */
export function insertStatements(request: BatchWriteRequest): Array<{ text: string; params: unknown[] }> {
  const columns = [EXECUTION_ID_COLUMN, ...request.columns];
  const rowsPerStatement = Math.max(1, Math.floor(MAX_BIND_PARAMETERS / columns.length));
  const columnList = columns.map(quoteIdentifier).join(', ');
  const statements: Array<{ text: string; params: unknown[] }> = [];

  for (let start = 0; start < request.rows.length; start += rowsPerStatement) {
    const chunk = request.rows.slice(start, start + rowsPerStatement);
    const params: unknown[] = [];
    const tuples = chunk.map(row => {
      const placeholders = columns.map(column => {
        params.push(column === EXECUTION_ID_COLUMN ? request.executionId : row[column] ?? null);
        return `$${params.length}`;
      });
      return `(${placeholders.join(', ')})`;
    });

    statements.push({
      text: `INSERT INTO ${quoteIdentifier(request.table)} (${columnList}) VALUES ${tuples.join(', ')}`,
      params
    });
  }

  return statements;
}

/**
 * Connection-level failures are worth retrying; data errors (22xxx, 23xxx, ...) are not
 */
export function isTransient(error: unknown, cause: MigrationBaseError): boolean {
  if (cause instanceof ConnectTimeoutError || cause instanceof SourceUnreachableError) {
    return true;
  }
  const code = errorCodeOf(error);
  if (code !== undefined && (code.startsWith('08') || TRANSIENT_SQLSTATES.includes(code))) {
    return true;
  }
  return error instanceof Error && /connection terminated/i.test(error.message);
}

export class PgBatchWriter implements BatchWriter {
  constructor(private readonly db: SqlExecutor, private readonly logger: Logger) {}

  async ensureTable(definition: TableDefinition): Promise<void> {
    const ddl = columnDdl(definition);

    await this.db.transaction(async client => {
      await client.query(createTableStatement(definition));
      // tables created by an earlier configuration may lack newly selected columns
      for (const column of ddl) {
        await client.query(`ALTER TABLE ${quoteIdentifier(definition.table)} ADD COLUMN IF NOT EXISTS ${column.replace(/ NOT NULL$/, '')}`);
      }
    });

    this.logger.debug('Destination table ready', { table: definition.table, connection: this.db.name });
  }

  async writeBatch(request: BatchWriteRequest): Promise<number> {
    if (request.rows.length === 0) {
      return 0;
    }

    try {
      return await this.db.transaction(async (client: SqlClient) => {
        let written = 0;
        for (const statement of insertStatements(request)) {
          const result = await client.query(statement.text, statement.params);
          written += result.rowCount ?? 0;
        }
        return written;
      });
    } catch (error) {
      const cause = classifyDatabaseError(error, { table: request.table });
      const context = {
        table: request.table,
        rows: request.rows.length,
        connection: this.db.name,
        cause_code: cause.errorCode,
        sqlstate: errorCodeOf(error)
      };
      if (isTransient(error, cause)) {
        throw new BatchTransportError(`Batch write to '${request.table}' failed: ${cause.message}`, context);
      }
      throw new BatchRejectedError(`Batch write to '${request.table}' was rejected: ${cause.message}`, context);
    }
  }
}
