/**
 * In-process stand-ins for the destination stores, used instead of PostgreSQL in tests
 */

import { BatchRejectedError, BatchTransportError, ConfigurationInvalidError } from '../../src/lib/error-handler';
import type {
  BatchWriteRequest,
  BatchWriter,
  DestinationConnection,
  ExecutionLogStore,
  ProcessRegistry,
  ProcessRepository,
  TableDefinition
} from '../../src/database/destination-stores';
import type { ExecutionLogEntry } from '../../src/models/execution-log';
import type { MigrationProcess, ProcessStatus } from '../../src/models/migration-process';
import type { ProcessRegistryEntry } from '../../src/models/process-registry-entry';
import type { DestinationRow } from '../../src/services/row-transformer';

function copy(process: MigrationProcess): MigrationProcess {
  return { ...process, columns: process.columns.map(column => ({ ...column })) };
}

export class InMemoryProcessRepository implements ProcessRepository {
  readonly rows = new Map<string, MigrationProcess>();
  schemaCreated = false;
  /** Run state writes fail, as when the control database drops mid-run */
  failRunStateUpdates = false;

  async ensureSchema(): Promise<void> {
    this.schemaCreated = true;
  }

  async insert(process: MigrationProcess): Promise<void> {
    if (Array.from(this.rows.values()).some(stored => stored.name === process.name)) {
      throw new ConfigurationInvalidError(`A process named '${process.name}' already exists`, { name: process.name });
    }
    this.rows.set(process.id, copy(process));
  }

  async update(process: MigrationProcess, expectedStatus?: ProcessStatus): Promise<boolean> {
    const current = this.rows.get(process.id);
    if (!current || (expectedStatus && current.status !== expectedStatus)) {
      return false;
    }
    this.rows.set(process.id, copy(process));
    return true;
  }

  async updateRunState(process: MigrationProcess, expectedStatus: ProcessStatus): Promise<boolean> {
    if (this.failRunStateUpdates) {
      throw new Error('process store unavailable');
    }
    const current = this.rows.get(process.id);
    if (!current || current.status !== expectedStatus) {
      return false;
    }
    this.rows.set(process.id, {
      ...current,
      status: process.status,
      version: process.version,
      lastRun: process.lastRun,
      updatedAt: process.updatedAt
    });
    return true;
  }

  async findById(id: string): Promise<MigrationProcess | null> {
    const stored = this.rows.get(id);
    return stored ? copy(stored) : null;
  }

  async findByName(name: string): Promise<MigrationProcess | null> {
    const stored = Array.from(this.rows.values()).find(process => process.name === name);
    return stored ? copy(stored) : null;
  }

  async list(includeDeleted: boolean = false): Promise<MigrationProcess[]> {
    return Array.from(this.rows.values())
      .filter(process => includeDeleted || process.lifecycle !== 'Eliminado')
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(copy);
  }
}

export class InMemoryExecutionLogStore implements ExecutionLogStore {
  readonly entries = new Map<string, ExecutionLogEntry>();
  schemaCreated = false;
  failOpen = false;

  async ensureSchema(): Promise<void> {
    this.schemaCreated = true;
  }

  async open(entry: ExecutionLogEntry): Promise<void> {
    if (this.failOpen) {
      throw new Error('audit log unavailable');
    }
    this.entries.set(entry.id, entry);
  }

  async finalize(entry: ExecutionLogEntry): Promise<void> {
    const stored = this.entries.get(entry.id);
    if (!stored || stored.finishedAt !== null) {
      throw new Error(`Execution log ${entry.id} is missing or already finalized`);
    }
    this.entries.set(entry.id, entry);
  }

  async listForProcess(processId: string, limit: number = 20): Promise<ExecutionLogEntry[]> {
    return Array.from(this.entries.values())
      .filter(entry => entry.processId === processId)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, limit);
  }
}

export interface StoredTable {
  definition: TableDefinition;
  rows: Array<DestinationRow & { _execution_id: string }>;
}

export class InMemoryBatchWriter implements BatchWriter {
  readonly tables = new Map<string, StoredTable>();
  attempts = 0;
  inFlight = 0;
  maxInFlight = 0;
  /** Requests matching this predicate fail with a transport error */
  failWhen: (request: BatchWriteRequest) => boolean = () => false;
  /** Requests matching this predicate are refused by the destination */
  rejectWhen: (request: BatchWriteRequest) => boolean = () => false;
  /** Called after every successful write */
  onWrite: (request: BatchWriteRequest) => void = () => undefined;

  async ensureTable(definition: TableDefinition): Promise<void> {
    if (!this.tables.has(definition.table)) {
      this.tables.set(definition.table, { definition, rows: [] });
    }
  }

  async writeBatch(request: BatchWriteRequest): Promise<number> {
    this.attempts++;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      // yield so concurrent writes overlap
      await new Promise(resolve => setImmediate(resolve));

      if (this.failWhen(request)) {
        throw new BatchTransportError(`Batch write to '${request.table}' failed: connection reset`, { table: request.table });
      }
      if (this.rejectWhen(request)) {
        throw new BatchRejectedError(`Batch write to '${request.table}' was rejected: value too long`, { table: request.table });
      }

      const table = this.tables.get(request.table);
      if (!table) {
        throw new Error(`Table ${request.table} does not exist`);
      }
      for (const row of request.rows) {
        table.rows.push({ ...row, _execution_id: request.executionId });
      }
      this.onWrite(request);
      return request.rows.length;
    } finally {
      this.inFlight--;
    }
  }

  rowsOf(table: string): DestinationRow[] {
    return this.tables.get(table)?.rows ?? [];
  }
}

export class InMemoryProcessRegistry implements ProcessRegistry {
  readonly entries = new Map<string, ProcessRegistryEntry>();
  schemaCreated = false;
  failUpserts = false;

  async ensureSchema(): Promise<void> {
    this.schemaCreated = true;
  }

  async upsert(entry: ProcessRegistryEntry): Promise<void> {
    if (this.failUpserts) {
      throw new Error('registry unavailable');
    }
    this.entries.set(entry.name, entry);
  }

  async markDeleted(name: string, at: Date): Promise<void> {
    const entry = this.entries.get(name);
    if (entry) {
      this.entries.set(name, { ...entry, lifecycle: 'Eliminado', updatedAt: at });
    }
  }
}

export class InMemoryDestination implements DestinationConnection {
  readonly batches = new InMemoryBatchWriter();
  readonly executionLogs = new InMemoryExecutionLogStore();
  readonly processes = new InMemoryProcessRepository();
  readonly registry = new InMemoryProcessRegistry();

  constructor(readonly id: string) {}
}
