// PostgreSQL-backed destination connection

import type { SqlExecutor } from '../lib/database-connections';
import type { Logger } from '../lib/logger';
import type { DestinationConnection } from './destination-stores';
import { PgBatchWriter } from './pg-batch-writer';
import { PgExecutionLogStore } from './pg-execution-log-store';
import { PgProcessRegistry } from './pg-process-registry';
import { PgProcessRepository } from './pg-process-repository';

export function createPgDestination(id: string, db: SqlExecutor, logger: Logger): DestinationConnection {
  return {
    id,
    batches: new PgBatchWriter(db, logger),
    executionLogs: new PgExecutionLogStore(db, logger),
    processes: new PgProcessRepository(db, logger),
    registry: new PgProcessRegistry(db, logger)
  };
}
