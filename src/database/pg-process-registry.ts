// Administrative mirror of migration processes, written next to the business data

import type { SqlExecutor } from '../lib/database-connections';
import type { Logger } from '../lib/logger';
import type { ProcessRegistryEntry } from '../models/process-registry-entry';
import type { ProcessRegistry } from './destination-stores';

export class PgProcessRegistry implements ProcessRegistry {
  private readonly tableName = 'process_registry';

  constructor(private readonly db: SqlExecutor, private readonly logger: Logger) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        name VARCHAR(255) PRIMARY KEY,
        source_type VARCHAR(10) NOT NULL,
        source_ref TEXT NOT NULL,
        containers TEXT NOT NULL,
        destination TEXT NOT NULL,
        status VARCHAR(20) NOT NULL,
        lifecycle VARCHAR(20) NOT NULL,
        version INTEGER NOT NULL,
        notes TEXT,
        description TEXT,
        last_run TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      )
    `);
  }

  async upsert(entry: ProcessRegistryEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO ${this.tableName} (
         name, source_type, source_ref, containers, destination, status, lifecycle,
         version, notes, description, last_run, created_at, updated_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
       ON CONFLICT (name) DO UPDATE SET
         source_type = EXCLUDED.source_type,
         source_ref = EXCLUDED.source_ref,
         containers = EXCLUDED.containers,
         destination = EXCLUDED.destination,
         status = EXCLUDED.status,
         lifecycle = EXCLUDED.lifecycle,
         version = EXCLUDED.version,
         notes = EXCLUDED.notes,
         description = EXCLUDED.description,
         last_run = EXCLUDED.last_run,
         updated_at = EXCLUDED.updated_at`,
      [
        entry.name,
        entry.sourceType,
        entry.sourceRef,
        entry.containers.join(', '),
        entry.destination,
        entry.status,
        entry.lifecycle,
        entry.version,
        entry.notes,
        entry.description,
        entry.lastRun,
        entry.createdAt,
        entry.updatedAt
      ]
    );
  }

  async markDeleted(name: string, at: Date): Promise<void> {
    const result = await this.db.query(
      `UPDATE ${this.tableName} SET lifecycle = 'Eliminado', updated_at = $2 WHERE name = $1`,
      [name, at]
    );
    if ((result.rowCount ?? 0) === 0) {
      this.logger.warn('Registry entry not found while deleting process', { name });
    }
  }
}
