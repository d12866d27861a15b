/**
 * Audit-log store. Entries are opened when a run starts and finalized exactly once;
 * finalized rows are never rewritten.
 */

import type { QueryResultRow } from 'pg';
import type { SqlExecutor } from '../lib/database-connections';
import type { Logger } from '../lib/logger';
import { ExecutionLogModel, type ExecutionLogEntry, type RunOutcome } from '../models/execution-log';
import { isStrictness } from '../models/migration-process';
import type { ExecutionLogStore } from './destination-stores';
import { readDate, readJson, readNullableDate, readNumber, readString } from './row-readers';

const RUN_OUTCOMES: RunOutcome[] = ['running', 'completed', 'failed', 'cancelled'];

function isRunOutcome(value: unknown): value is RunOutcome {
  return RUN_OUTCOMES.some(outcome => outcome === value);
}

export class PgExecutionLogStore implements ExecutionLogStore {
  private readonly tableName = 'migration_execution_log';

  constructor(private readonly db: SqlExecutor, private readonly logger: Logger) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        id UUID PRIMARY KEY,
        process_id UUID NOT NULL,
        process_name VARCHAR(255) NOT NULL,
        process_version INTEGER NOT NULL,
        strictness VARCHAR(10) NOT NULL,
        started_at TIMESTAMPTZ NOT NULL,
        finished_at TIMESTAMPTZ,
        outcome VARCHAR(20) NOT NULL,
        rows_read BIGINT NOT NULL DEFAULT 0,
        rows_written BIGINT NOT NULL DEFAULT 0,
        rows_rejected BIGINT NOT NULL DEFAULT 0,
        batches_written INTEGER NOT NULL DEFAULT 0,
        failure_reason JSONB,
        rejected_samples JSONB NOT NULL DEFAULT '[]'::jsonb
      )
    `);
    await this.db.query(
      `CREATE INDEX IF NOT EXISTS idx_${this.tableName}_process ON ${this.tableName} (process_id, started_at DESC)`
    );
  }

  async open(entry: ExecutionLogEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO ${this.tableName} (
         id, process_id, process_name, process_version, strictness, started_at, outcome
       ) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [entry.id, entry.processId, entry.processName, entry.processVersion, entry.strictness, entry.startedAt, entry.outcome]
    );
  }

  async finalize(entry: ExecutionLogEntry): Promise<void> {
    const result = await this.db.query(
      `UPDATE ${this.tableName} SET
         finished_at = $2, outcome = $3, rows_read = $4, rows_written = $5, rows_rejected = $6,
         batches_written = $7, failure_reason = $8, rejected_samples = $9
       WHERE id = $1 AND finished_at IS NULL`,
      [
        entry.id,
        entry.finishedAt,
        entry.outcome,
        entry.rowsRead,
        entry.rowsWritten,
        entry.rowsRejected,
        entry.batchesWritten,
        entry.failureReason ? JSON.stringify(entry.failureReason) : null,
        JSON.stringify(entry.rejectedSamples)
      ]
    );

    if ((result.rowCount ?? 0) === 0) {
      throw new Error(`Execution log ${entry.id} is missing or already finalized`);
    }

    this.logger.debug('Execution log finalized', { execution_id: entry.id, outcome: entry.outcome });
  }

  async listForProcess(processId: string, limit: number = 20): Promise<ExecutionLogEntry[]> {
    const result = await this.db.query(
      `SELECT * FROM ${this.tableName} WHERE process_id = $1 ORDER BY started_at DESC LIMIT $2`,
      [processId, limit]
    );
    return result.rows.map(row => this.mapDatabaseRow(row));
  }

  private mapDatabaseRow(row: QueryResultRow): ExecutionLogEntry {
    const outcome = readString(row, 'outcome');
    const strictness = readString(row, 'strictness');
    if (!isRunOutcome(outcome) || !isStrictness(strictness)) {
      throw new Error(`Execution log ${readString(row, 'id')} has unknown outcome '${outcome}'`);
    }

    return {
      id: readString(row, 'id'),
      processId: readString(row, 'process_id'),
      processName: readString(row, 'process_name'),
      processVersion: readNumber(row, 'process_version'),
      strictness,
      startedAt: readDate(row, 'started_at'),
      finishedAt: readNullableDate(row, 'finished_at'),
      outcome,
      rowsRead: readNumber(row, 'rows_read'),
      rowsWritten: readNumber(row, 'rows_written'),
      rowsRejected: readNumber(row, 'rows_rejected'),
      batchesWritten: readNumber(row, 'batches_written'),
      failureReason: ExecutionLogModel.restoreReason(readJson(row, 'failure_reason')),
      rejectedSamples: ExecutionLogModel.restoreSamples(readJson(row, 'rejected_samples'))
    };
  }
}
