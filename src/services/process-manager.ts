/**
 * ProcessManager Service
 *
 * Configuration-side facade over the operational-config store: create processes,
 * load and infer columns, edit and validate ColumnConfigs, and gate readiness.
 * Every persisted change is mirrored to the process registry.
 */

import {
  ConfigurationInvalidError,
  ProcessNotFoundError,
  ProcessStateError
} from '../lib/error-handler';
import type { Logger } from '../lib/logger';
import { CloudShareConnector } from '../connectors/cloud-share-connector';
import type { ConnectorFactory } from '../connectors';
import type { SourceConnector } from '../connectors/source-connector';
import type { ResolvedStores } from '../database/destination-stores';
import {
  ColumnConfigModel,
  columnKey,
  type ColumnConfig,
  type ColumnConfigCreateInput
} from '../models/column-config';
import { DataSourceModel, type DataSource, type DataSourceCreateInput } from '../models/data-source';
import type { ExecutionLogEntry } from '../models/execution-log';
import {
  MigrationProcessModel,
  type MigrationProcess,
  type PersistedProcessConfiguration,
  type Strictness
} from '../models/migration-process';
import { ProcessRegistryEntryModel } from '../models/process-registry-entry';
import {
  validateColumnConfigs,
  validateRename,
  summarizeValidation,
  type ProcessValidationResult,
  type RenameValidationRequest,
  type RenameValidationResponse
} from './column-config-validator';
import type { SchemaInferenceEngine, InferenceRequest, InferenceResponse, InferredColumnType } from './schema-inference-engine';

export interface CreateProcessInput {
  name: string;
  source: DataSourceCreateInput;
  description?: string;
  observations?: string;
  strictness?: Strictness;
  orderIndependent?: boolean;
  destinationTable?: string;
}

export interface ColumnPatch {
  rename?: string;
  sqlType?: string;
  nullable?: boolean;
  /** Raw user entry; blank becomes the NULL sentinel */
  defaultValue?: string | null;
  selected?: boolean;
}

export interface ProcessManagerDependencies {
  stores: ResolvedStores;
  connectorFor: ConnectorFactory;
  inference: SchemaInferenceEngine;
  logger: Logger;
  clock?: () => Date;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export class ProcessManager {
  private readonly stores: ResolvedStores;
  private readonly connectorFor: ConnectorFactory;
  private readonly inference: SchemaInferenceEngine;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(deps: ProcessManagerDependencies) {
    this.stores = deps.stores;
    this.connectorFor = deps.connectorFor;
    this.inference = deps.inference;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
  }

  async createProcess(input: CreateProcessInput): Promise<MigrationProcess> {
    const process = MigrationProcessModel.create(
      {
        name: input.name,
        source: DataSourceModel.create(input.source),
        description: input.description,
        observations: input.observations,
        strictness: input.strictness,
        orderIndependent: input.orderIndependent,
        destinationTable: input.destinationTable
      },
      this.clock()
    );

    const existing = await this.stores.processes.findByName(process.name);
    if (existing) {
      throw new ConfigurationInvalidError(`A process named '${process.name}' already exists`, { name: process.name });
    }

    await this.stores.processes.insert(process);
    await this.mirror(process);
    return process;
  }

  /**
   * Look a process up by id or by (normalized) name
   */
  async getProcess(reference: string): Promise<MigrationProcess> {
    const process = UUID_PATTERN.test(reference)
      ? await this.stores.processes.findById(reference)
      : await this.stores.processes.findByName(MigrationProcessModel.normalizeName(reference));

    if (!process) {
      throw new ProcessNotFoundError(reference);
    }
    return process;
  }

  listProcesses(includeDeleted: boolean = false): Promise<MigrationProcess[]> {
    return this.stores.processes.list(includeDeleted);
  }

  async listContainers(reference: string): Promise<string[]> {
    const process = await this.getProcess(reference);
    return this.withConnector(process.source, connector => connector.listContainers());
  }

  /**
   * Fresh read of a container's columns with a type suggestion for each
   */
  async inferContainer(reference: string, container: string): Promise<InferredColumnType[]> {
    const process = await this.getProcess(reference);
    const schema = await this.withConnector(process.source, connector =>
      connector.readSchema(container, this.inference.sampleSize)
    );
    return this.inference.inferColumns(schema);
  }

  async respondToInference(reference: string, request: InferenceRequest): Promise<InferenceResponse> {
    const process = await this.getProcess(reference);
    const schema = await this.withConnector(process.source, connector =>
      connector.readSchema(request.container, this.inference.sampleSize)
    );
    return this.inference.respond(request, schema);
  }

  /**
   * Apply inference suggestions to a container's columns. Columns already configured
   * keep their rename and selection; type, nullability and default are replaced.
   */
  async applyInference(reference: string, container: string, columnNames?: string[]): Promise<MigrationProcess> {
    const process = await this.getProcess(reference);
    const suggestions = await this.inferContainer(process.id, container);
    const wanted = columnNames ? new Set(columnNames) : null;

    const byKey = new Map(process.columns.map(column => [ColumnConfigModel.key(column), column]));
    for (const suggestion of suggestions) {
      if (wanted && !wanted.has(suggestion.name)) {
        continue;
      }
      const current = byKey.get(columnKey(container, suggestion.name));
      // a suggested '' default is the literal empty string, which only a nullable column may carry
      const emptyTextDefault = suggestion.suggestedDefault === '';
      const applied = ColumnConfigModel.create({
        container,
        originalName: suggestion.name,
        rename: current?.rename,
        sqlType: suggestion.sqlType,
        confidence: suggestion.confidence,
        nullable: suggestion.nullable || emptyTextDefault,
        selected: current?.selected
      });
      byKey.set(ColumnConfigModel.key(applied), { ...applied, defaultValue: suggestion.suggestedDefault });
    }

    if (wanted) {
      const found = new Set(suggestions.map(suggestion => suggestion.name));
      const missing = Array.from(wanted).filter(name => !found.has(name));
      if (missing.length > 0) {
        throw new ConfigurationInvalidError(`Columns not found in '${container}': ${missing.join(', ')}`, { container, missing });
      }
    }

    return this.saveColumns(process, Array.from(byKey.values()));
  }

  /**
   * Replace the whole column set
   */
  async updateColumns(reference: string, columns: ColumnConfigCreateInput[]): Promise<MigrationProcess> {
    const process = await this.getProcess(reference);
    return this.saveColumns(process, columns.map(column => ColumnConfigModel.create(column)));
  }

  async updateColumn(reference: string, container: string, originalName: string, patch: ColumnPatch): Promise<MigrationProcess> {
    const process = await this.getProcess(reference);
    const key = columnKey(container, originalName);
    const index = process.columns.findIndex(column => ColumnConfigModel.key(column) === key);
    if (index < 0) {
      throw new ConfigurationInvalidError(`Column '${originalName}' is not configured for '${container}'`, { container, originalName });
    }

    let column = process.columns[index];
    if (patch.sqlType !== undefined && patch.sqlType !== column.sqlType) {
      column = ColumnConfigModel.withSqlType(column, patch.sqlType, 1);
    }
    column = {
      ...column,
      rename: patch.rename ?? column.rename,
      nullable: patch.nullable ?? column.nullable,
      selected: patch.selected ?? column.selected,
      defaultValue: patch.defaultValue !== undefined
        ? ColumnConfigModel.normalizeDefaultInput(patch.defaultValue)
        : column.defaultValue
    };

    const columns = [...process.columns];
    columns[index] = column;
    return this.saveColumns(process, columns);
  }

  async validate(reference: string): Promise<ProcessValidationResult> {
    const process = await this.getProcess(reference);
    return validateColumnConfigs(process.columns);
  }

  validateRename(request: RenameValidationRequest): RenameValidationResponse {
    return validateRename(request);
  }

  /**
   * Validation gate: a process becomes Listo only with a valid, non-empty configuration
   */
  async markReady(reference: string): Promise<MigrationProcess> {
    const process = await this.getProcess(reference);
    if (process.status === 'Listo') {
      return process;
    }

    const validation = validateColumnConfigs(process.columns);
    if (validation.columns.length === 0) {
      throw new ProcessStateError(`Process '${process.name}' has no selected columns`, { processId: process.id });
    }
    if (!validation.valid) {
      throw new ConfigurationInvalidError(`Process '${process.name}' has an invalid column configuration`, {
        processId: process.id,
        ...summarizeValidation(validation)
      });
    }

    const ready = MigrationProcessModel.transition(process, 'Listo', this.clock());
    return this.persist(ready, process.status);
  }

  async activate(reference: string): Promise<MigrationProcess> {
    const process = await this.getProcess(reference);
    return this.persist(MigrationProcessModel.withLifecycle(process, 'Activo', this.clock()), process.status);
  }

  async deactivate(reference: string): Promise<MigrationProcess> {
    const process = await this.getProcess(reference);
    return this.persist(MigrationProcessModel.withLifecycle(process, 'Inactivo', this.clock()), process.status);
  }

  /**
   * Logical delete; the process and its history stay in storage
   */
  async softDelete(reference: string): Promise<MigrationProcess> {
    const process = await this.getProcess(reference);
    if (process.status === 'En_Ejecucion') {
      throw new ProcessStateError(`Process '${process.name}' cannot be deleted while running`, { processId: process.id });
    }

    const now = this.clock();
    const deleted = MigrationProcessModel.withLifecycle(process, 'Eliminado', now);
    if (!await this.stores.processes.update(deleted, process.status)) {
      throw new ProcessStateError(`Process '${process.name}' changed while it was being deleted`, { processId: process.id });
    }
    await this.stores.registry.markDeleted(deleted.name, now);
    this.logger.info('Migration process deleted', { process_id: deleted.id, name: deleted.name });
    return deleted;
  }

  /**
   * Re-check a cloud share link and stamp validatedAt
   */
  async revalidateSource(reference: string): Promise<MigrationProcess> {
    const process = await this.getProcess(reference);
    const connector = this.connectorFor(process.source);
    try {
      if (!(connector instanceof CloudShareConnector)) {
        throw new ConfigurationInvalidError(`Process '${process.name}' does not read from a shared link`, { processId: process.id });
      }
      const source = await connector.validate(this.clock());
      return await this.persist({ ...process, source, updatedAt: this.clock() }, process.status);
    } finally {
      await connector.close();
    }
  }

  async listRuns(reference: string, limit?: number): Promise<ExecutionLogEntry[]> {
    const process = await this.getProcess(reference);
    return this.stores.executionLogs.listForProcess(process.id, limit);
  }

  async persistedConfiguration(reference: string): Promise<PersistedProcessConfiguration> {
    return MigrationProcessModel.toPersisted(await this.getProcess(reference));
  }

  private async saveColumns(process: MigrationProcess, columns: ColumnConfig[]): Promise<MigrationProcess> {
    const updated = MigrationProcessModel.withColumns(process, columns, this.clock());
    return this.persist(updated, process.status);
  }

  /**
   * Store the process, guarded against a concurrent status change
   */
  private async persist(process: MigrationProcess, expectedStatus: MigrationProcess['status']): Promise<MigrationProcess> {
    const stored = await this.stores.processes.update(process, expectedStatus);
    if (!stored) {
      throw new ProcessStateError(`Process '${process.name}' changed while it was being updated`, {
        processId: process.id,
        expectedStatus
      });
    }
    await this.mirror(process);
    return process;
  }

  private async mirror(process: MigrationProcess): Promise<void> {
    await this.stores.registry.upsert(ProcessRegistryEntryModel.fromProcess(process));
  }

  private async withConnector<T>(source: DataSource, operation: (connector: SourceConnector) => Promise<T>): Promise<T> {
    const connector = this.connectorFor(source);
    try {
      return await operation(connector);
    } finally {
      await connector.close();
    }
  }
}
