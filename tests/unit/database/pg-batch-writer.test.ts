/**
 * Unit Tests: PgBatchWriter
 * DDL and INSERT text plus per-batch transactions over a fake executor
 */

import {
  PgBatchWriter,
  createTableStatement,
  insertStatements,
  toPostgresType
} from '../../../src/database/pg-batch-writer';
import { BatchRejectedError, BatchTransportError, ConfigurationInvalidError } from '../../../src/lib/error-handler';
import { parseSqlType } from '../../../src/models/column-config';
import { fakeExecutor, quietLogger, result } from '../../helpers/fakes';

const DEFINITION = {
  table: 'Proceso_Ventas',
  columns: [
    { name: 'id', sqlType: 'INT', nullable: false },
    { name: 'nombre', sqlType: 'NVARCHAR(50)', nullable: true },
    { name: 'activo', sqlType: 'BIT', nullable: true }
  ]
};

function pgType(sqlType: string): string {
  const parsed = parseSqlType(sqlType);
  if (!parsed) {
    throw new Error(`unparsable ${sqlType}`);
  }
  return toPostgresType(parsed);
}

describe('DDL', () => {
  test('maps logical types to PostgreSQL types', () => {
    expect(['BIT', 'TINYINT', 'INT', 'BIGINT', 'DECIMAL', 'FLOAT', 'DATE', 'DATETIME', 'NVARCHAR(20)', 'NVARCHAR(MAX)'].map(pgType))
      .toEqual(['BOOLEAN', 'SMALLINT', 'INTEGER', 'BIGINT', 'NUMERIC', 'DOUBLE PRECISION', 'DATE', 'TIMESTAMP', 'VARCHAR(20)', 'TEXT']);
  });

  test('creates the table with bookkeeping columns first', () => {
    expect(createTableStatement(DEFINITION)).toBe([
      'CREATE TABLE IF NOT EXISTS "Proceso_Ventas" (',
      '  "_row_id" BIGSERIAL PRIMARY KEY,',
      '  "_execution_id" UUID NOT NULL,',
      '  "_loaded_at" TIMESTAMP NOT NULL DEFAULT NOW(),',
      '  "id" INTEGER NOT NULL,',
      '  "nombre" VARCHAR(50),',
      '  "activo" BOOLEAN',
      ')'
    ].join('\n'));
  });

  test('unknown column types are a configuration error', () => {
    expect(() => createTableStatement({ table: 't', columns: [{ name: 'x', sqlType: 'NOPE', nullable: true }] }))
      .toThrow(ConfigurationInvalidError);
  });
});

describe('insertStatements', () => {
  test('binds the execution id and NULL for missing values', () => {
    expect(insertStatements({
      table: 't',
      columns: ['id', 'nombre'],
      rows: [{ id: 1, nombre: 'Ana' }, { id: 2 }],
      executionId: 'exec-1'
    })).toEqual([
      {
        text: 'INSERT INTO "t" ("_execution_id", "id", "nombre") VALUES ($1, $2, $3), ($4, $5, $6)',
        params: ['exec-1', 1, 'Ana', 'exec-1', 2, null]
      }
    ]);
  });

  test('splits wide batches under the bind parameter limit', () => {
    const columns = Array.from({ length: 5999 }, (_, index) => `c${index}`);
    const statements = insertStatements({
      table: 't',
      columns,
      rows: Array.from({ length: 25 }, () => ({})),
      executionId: 'exec-1'
    });

    expect(statements.map(statement => statement.params.length)).toEqual([60000, 60000, 30000]);
  });
});

describe('PgBatchWriter', () => {
  test('writes a batch in one transaction', async () => {
    const db = fakeExecutor('warehouse');
    db.client.query.mockResolvedValue(result([], 2));
    const writer = new PgBatchWriter(db, quietLogger());

    const written = await writer.writeBatch({ table: 't', columns: ['id'], rows: [{ id: 1 }, { id: 2 }], executionId: 'exec-1' });

    expect(written).toBe(2);
    expect(db.client.query.mock.calls.map(call => call[0])).toEqual([
      'BEGIN',
      'INSERT INTO "t" ("_execution_id", "id") VALUES ($1, $2), ($3, $4)',
      'COMMIT'
    ]);
  });

  test('an empty batch writes nothing', async () => {
    const db = fakeExecutor('warehouse');
    const writer = new PgBatchWriter(db, quietLogger());

    expect(await writer.writeBatch({ table: 't', columns: ['id'], rows: [], executionId: 'exec-1' })).toBe(0);
    expect(db.client.query).not.toHaveBeenCalled();
  });

  test('failed inserts roll back and surface as BatchTransportError', async () => {
    const db = fakeExecutor('warehouse');
    db.client.query.mockImplementation(async (text: string) => {
      if (text.startsWith('INSERT')) {
        throw Object.assign(new Error('connection reset'), { code: 'ECONNRESET' });
      }
      return result();
    });
    const writer = new PgBatchWriter(db, quietLogger());

    const attempt = writer.writeBatch({ table: 't', columns: ['id'], rows: [{ id: 1 }], executionId: 'exec-1' });

    await expect(attempt).rejects.toBeInstanceOf(BatchTransportError);
    await expect(attempt).rejects.toThrow("Batch write to 't' failed: connection reset");
    expect(db.client.query.mock.calls.map(call => call[0])).toContain('ROLLBACK');
  });

  test('data errors are rejected without being treated as transport failures', async () => {
    const db = fakeExecutor('warehouse');
    db.client.query.mockImplementation(async (text: string) => {
      if (text.startsWith('INSERT')) {
        throw Object.assign(new Error('value too long for type character varying(5)'), { code: '22001' });
      }
      return result();
    });
    const writer = new PgBatchWriter(db, quietLogger());

    const attempt = writer.writeBatch({ table: 't', columns: ['id'], rows: [{ id: 1 }], executionId: 'exec-1' });

    await expect(attempt).rejects.toBeInstanceOf(BatchRejectedError);
    await expect(attempt).rejects.toThrow("Batch write to 't' was rejected: value too long for type character varying(5)");
  });

  test('deadlocks and dropped connections stay retryable', async () => {
    for (const code of ['40P01', '08006']) {
      const db = fakeExecutor('warehouse');
      db.client.query.mockImplementation(async (text: string) => {
        if (text.startsWith('INSERT')) {
          throw Object.assign(new Error('try again'), { code });
        }
        return result();
      });

      await expect(new PgBatchWriter(db, quietLogger()).writeBatch({ table: 't', columns: ['id'], rows: [{ id: 1 }], executionId: 'exec-1' }))
        .rejects.toBeInstanceOf(BatchTransportError);
    }
  });

  test('ensureTable creates the table and adds missing columns as nullable', async () => {
    const db = fakeExecutor('warehouse');
    const writer = new PgBatchWriter(db, quietLogger());

    await writer.ensureTable(DEFINITION);

    expect(db.client.query.mock.calls.map(call => call[0])).toEqual([
      'BEGIN',
      createTableStatement(DEFINITION),
      'ALTER TABLE "Proceso_Ventas" ADD COLUMN IF NOT EXISTS "id" INTEGER',
      'ALTER TABLE "Proceso_Ventas" ADD COLUMN IF NOT EXISTS "nombre" VARCHAR(50)',
      'ALTER TABLE "Proceso_Ventas" ADD COLUMN IF NOT EXISTS "activo" BOOLEAN',
      'COMMIT'
    ]);
  });
});
