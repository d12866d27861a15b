/**
 * Operational-config store for migration processes.
 * Column configuration and source are stored as jsonb; the name column is unique.
 */

import type { QueryResultRow } from 'pg';
import { ConfigurationInvalidError, errorCodeOf } from '../lib/error-handler';
import type { SqlExecutor } from '../lib/database-connections';
import type { Logger } from '../lib/logger';
import { ColumnConfigModel } from '../models/column-config';
import { DataSourceModel } from '../models/data-source';
import {
  isProcessLifecycle,
  isProcessStatus,
  isStrictness,
  type MigrationProcess,
  type ProcessStatus
} from '../models/migration-process';
import type { ProcessRepository } from './destination-stores';
import {
  readBoolean,
  readDate,
  readJson,
  readNullableDate,
  readNullableString,
  readNumber,
  readString
} from './row-readers';

const UNIQUE_VIOLATION = '23505';

const PROCESS_COLUMNS = `id, name, description, observations, source, columns, status, lifecycle, strictness,
  order_independent, destination_table, version, last_run, created_at, updated_at`;

export class PgProcessRepository implements ProcessRepository {
  private readonly tableName = 'migration_processes';

  constructor(private readonly db: SqlExecutor, private readonly logger: Logger) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        id UUID PRIMARY KEY,
        name VARCHAR(255) NOT NULL UNIQUE,
        description TEXT,
        observations TEXT,
        source JSONB NOT NULL,
        columns JSONB NOT NULL DEFAULT '[]'::jsonb,
        status VARCHAR(20) NOT NULL,
        lifecycle VARCHAR(20) NOT NULL DEFAULT 'Activo',
        strictness VARCHAR(10) NOT NULL DEFAULT 'lenient',
        order_independent BOOLEAN NOT NULL DEFAULT FALSE,
        destination_table VARCHAR(128),
        version INTEGER NOT NULL DEFAULT 0,
        last_run TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  }

  async insert(process: MigrationProcess): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO ${this.tableName} (${PROCESS_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)`,
        this.toParams(process)
      );
    } catch (error) {
      if (errorCodeOf(error) === UNIQUE_VIOLATION) {
        throw new ConfigurationInvalidError(`A process named '${process.name}' already exists`, { name: process.name });
      }
      throw error;
    }

    this.logger.info('Migration process created', { process_id: process.id, name: process.name });
  }

  async update(process: MigrationProcess, expectedStatus?: ProcessStatus): Promise<boolean> {
    const params = this.toParams(process);
    let condition = 'id = $1';
    if (expectedStatus) {
      params.push(expectedStatus);
      condition += ` AND status = $${params.length}`;
    }

    const result = await this.db.query(
      `UPDATE ${this.tableName} SET
         name = $2, description = $3, observations = $4, source = $5, columns = $6, status = $7,
         lifecycle = $8, strictness = $9, order_independent = $10, destination_table = $11,
         version = $12, last_run = $13, created_at = $14, updated_at = $15
       WHERE ${condition}`,
      params
    );

    return (result.rowCount ?? 0) > 0;
  }

  async updateRunState(process: MigrationProcess, expectedStatus: ProcessStatus): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE ${this.tableName} SET status = $2, version = $3, last_run = $4, updated_at = $5
       WHERE id = $1 AND status = $6`,
      [process.id, process.status, process.version, process.lastRun, process.updatedAt, expectedStatus]
    );

    return (result.rowCount ?? 0) > 0;
  }

  async findById(id: string): Promise<MigrationProcess | null> {
    const result = await this.db.query(`SELECT ${PROCESS_COLUMNS} FROM ${this.tableName} WHERE id = $1`, [id]);
    return result.rows.length > 0 ? this.mapDatabaseRow(result.rows[0]) : null;
  }

  async findByName(name: string): Promise<MigrationProcess | null> {
    const result = await this.db.query(`SELECT ${PROCESS_COLUMNS} FROM ${this.tableName} WHERE name = $1`, [name]);
    return result.rows.length > 0 ? this.mapDatabaseRow(result.rows[0]) : null;
  }

  async list(includeDeleted: boolean = false): Promise<MigrationProcess[]> {
    const filter = includeDeleted ? '' : `WHERE lifecycle <> 'Eliminado'`;
    const result = await this.db.query(`SELECT ${PROCESS_COLUMNS} FROM ${this.tableName} ${filter} ORDER BY name`);
    return result.rows.map(row => this.mapDatabaseRow(row));
  }

  private toParams(process: MigrationProcess): unknown[] {
    return [
      process.id,
      process.name,
      process.description,
      process.observations,
      JSON.stringify(process.source),
      JSON.stringify(process.columns),
      process.status,
      process.lifecycle,
      process.strictness,
      process.orderIndependent,
      process.destinationTable,
      process.version,
      process.lastRun,
      process.createdAt,
      process.updatedAt
    ];
  }

  private mapDatabaseRow(row: QueryResultRow): MigrationProcess {
    const status = readString(row, 'status');
    const lifecycle = readString(row, 'lifecycle');
    const strictness = readString(row, 'strictness');

    if (!isProcessStatus(status) || !isProcessLifecycle(lifecycle) || !isStrictness(strictness)) {
      throw new ConfigurationInvalidError(`Stored process '${readString(row, 'name')}' has an unknown status`, {
        status,
        lifecycle,
        strictness
      });
    }

    return {
      id: readString(row, 'id'),
      name: readString(row, 'name'),
      description: readNullableString(row, 'description'),
      observations: readNullableString(row, 'observations'),
      source: DataSourceModel.restore(readJson(row, 'source')),
      columns: ColumnConfigModel.restoreList(readJson(row, 'columns')),
      status,
      lifecycle,
      strictness,
      orderIndependent: readBoolean(row, 'order_independent'),
      destinationTable: readNullableString(row, 'destination_table'),
      version: readNumber(row, 'version'),
      lastRun: readNullableDate(row, 'last_run'),
      createdAt: readDate(row, 'created_at'),
      updatedAt: readDate(row, 'updated_at')
    };
  }
}
