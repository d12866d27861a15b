/**
 * Destination store contracts. A DestinationConnection bundles the stores reachable
 * through one physical connection; the DataTransferRouter picks which one each
 * entity type uses.
 */

import type { EntityType } from '../models/destination-role';
import type { ExecutionLogEntry } from '../models/execution-log';
import type { MigrationProcess, ProcessStatus } from '../models/migration-process';
import type { ProcessRegistryEntry } from '../models/process-registry-entry';
import type { DataTransferRouter } from '../services/data-transfer-router';
import type { DestinationRow } from '../services/row-transformer';

export interface DestinationColumn {
  name: string;
  sqlType: string;
  nullable: boolean;
}

export interface TableDefinition {
  table: string;
  columns: DestinationColumn[];
}

export interface BatchWriteRequest {
  table: string;
  columns: string[];
  rows: DestinationRow[];
  executionId: string;
}

export interface BatchWriter {
  /** Create the business table, or add columns it is missing */
  ensureTable(definition: TableDefinition): Promise<void>;

  /** Write all rows in one transaction; returns rows written */
  writeBatch(request: BatchWriteRequest): Promise<number>;
}

export interface ProcessRepository {
  ensureSchema(): Promise<void>;

  /** Fails when the name is already taken */
  insert(process: MigrationProcess): Promise<void>;

  /**
   * Persist the process. With expectedStatus the write only happens when the stored
   * status still matches; returns whether a row was updated.
   */
  update(process: MigrationProcess, expectedStatus?: ProcessStatus): Promise<boolean>;

  /**
   * Record a run state change. Only status, version, last run and updated-at are
   * written, and only while the stored status is still expectedStatus.
   */
  updateRunState(process: MigrationProcess, expectedStatus: ProcessStatus): Promise<boolean>;

  findById(id: string): Promise<MigrationProcess | null>;
  findByName(name: string): Promise<MigrationProcess | null>;
  list(includeDeleted?: boolean): Promise<MigrationProcess[]>;
}

export interface ExecutionLogStore {
  ensureSchema(): Promise<void>;

  /** Record a run as started */
  open(entry: ExecutionLogEntry): Promise<void>;

  /** Store the final state of a run; an entry can be finalized once */
  finalize(entry: ExecutionLogEntry): Promise<void>;

  listForProcess(processId: string, limit?: number): Promise<ExecutionLogEntry[]>;
}

export interface ProcessRegistry {
  ensureSchema(): Promise<void>;
  upsert(entry: ProcessRegistryEntry): Promise<void>;
  markDeleted(name: string, at: Date): Promise<void>;
}

export interface DestinationConnection {
  id: string;
  batches: BatchWriter;
  executionLogs: ExecutionLogStore;
  processes: ProcessRepository;
  registry: ProcessRegistry;
}

/**
 * The store each entity type persists through, resolved once through its declared role
 */
export interface ResolvedStores {
  processes: ProcessRepository;
  executionLogs: ExecutionLogStore;
  batches: BatchWriter;
  registry: ProcessRegistry;
}

/** Connection id per entity type, for roles mapped to several connections */
export type PinnedConnections = Partial<Record<EntityType, string>>;

export function resolveStores(
  router: DataTransferRouter<DestinationConnection>,
  pinned: PinnedConnections = {}
): ResolvedStores {
  return {
    processes: router.resolve('MigrationProcess', 'operational-config', pinned.MigrationProcess).processes,
    executionLogs: router.resolve('ExecutionLogEntry', 'audit-log', pinned.ExecutionLogEntry).executionLogs,
    batches: router.resolve('MigratedRow', 'business-data', pinned.MigratedRow).batches,
    registry: router.resolve('ProcessRegistryEntry', 'business-data', pinned.ProcessRegistryEntry).registry
  };
}

/**
 * Create the tables behind each resolved store
 */
export async function initializeStores(stores: ResolvedStores): Promise<void> {
  await stores.processes.ensureSchema();
  await stores.executionLogs.ensureSchema();
  await stores.registry.ensureSchema();
}
