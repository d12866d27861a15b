/**
 * MigrationProcess Model
 * Named, reusable migration configuration with its status state machine
 */

import { v4 as uuidv4 } from 'uuid';
import { ProcessStateError } from '../lib/error-handler';
import { normalizeIdentifier } from '../services/column-config-validator';
import { ColumnConfigModel, type ColumnConfig } from './column-config';
import { DataSourceModel, type DataSource } from './data-source';

export type ProcessStatus =
  | 'Borrador'
  | 'Configurado'
  | 'Listo'
  | 'En_Ejecucion'
  | 'Completado'
  | 'Fallido';

export type ProcessLifecycle = 'Activo' | 'Inactivo' | 'Eliminado';

export type Strictness = 'strict' | 'lenient';

export interface MigrationProcess {
  id: string;
  name: string;
  description: string | null;
  observations: string | null;
  source: DataSource;
  columns: ColumnConfig[];
  status: ProcessStatus;
  lifecycle: ProcessLifecycle;
  strictness: Strictness;
  orderIndependent: boolean;
  destinationTable: string | null;
  version: number;
  lastRun: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface MigrationProcessCreateInput {
  name: string;
  source: DataSource;
  description?: string;
  observations?: string;
  columns?: ColumnConfig[];
  strictness?: Strictness;
  orderIndependent?: boolean;
  destinationTable?: string;
}

/**
 * Configuration shape exchanged with storage and the UI layer
 */
export interface PersistedProcessConfiguration {
  name: string;
  source_ref: string;
  selected_columns: Record<string, string[]>;
  column_mappings: Record<string, Record<string, {
    rename: string;
    sql_type: string;
    nullable: boolean;
    default: string | null;
  }>>;
  status: ProcessStatus;
  version: number;
  last_run: string | null;
}

export const PROCESS_NAME_MAX_LENGTH = 255;

const PROCESS_STATUSES: ProcessStatus[] = ['Borrador', 'Configurado', 'Listo', 'En_Ejecucion', 'Completado', 'Fallido'];
const LIFECYCLES: ProcessLifecycle[] = ['Activo', 'Inactivo', 'Eliminado'];

export function isProcessStatus(value: unknown): value is ProcessStatus {
  return PROCESS_STATUSES.some(status => status === value);
}

export function isProcessLifecycle(value: unknown): value is ProcessLifecycle {
  return LIFECYCLES.some(lifecycle => lifecycle === value);
}

export function isStrictness(value: unknown): value is Strictness {
  return value === 'strict' || value === 'lenient';
}

const STATUS_TRANSITIONS: Record<ProcessStatus, ProcessStatus[]> = {
  Borrador: ['Configurado'],
  Configurado: ['Listo', 'Borrador'],
  Listo: ['En_Ejecucion', 'Configurado'],
  En_Ejecucion: ['Completado', 'Fallido'],
  Completado: ['Listo', 'Configurado'],
  Fallido: ['Listo', 'Configurado']
};

export class MigrationProcessModel {
  static create(input: MigrationProcessCreateInput, now: Date = new Date()): MigrationProcess {
    const name = MigrationProcessModel.normalizeName(input.name);
    if (!name) {
      throw new Error('Process name cannot be empty');
    }

    const columns = (input.columns ?? []).map(column => ({ ...column }));

    return {
      id: uuidv4(),
      name,
      description: input.description ?? null,
      observations: input.observations ?? null,
      source: input.source,
      columns,
      status: columns.length > 0 ? 'Configurado' : 'Borrador',
      lifecycle: 'Activo',
      strictness: input.strictness ?? 'lenient',
      orderIndependent: input.orderIndependent ?? false,
      destinationTable: input.destinationTable ? normalizeIdentifier(input.destinationTable) : null,
      version: 0,
      lastRun: null,
      createdAt: now,
      updatedAt: now
    };
  }

  static normalizeName(name: string): string {
    return normalizeIdentifier(name, PROCESS_NAME_MAX_LENGTH);
  }

  static canTransition(from: ProcessStatus, to: ProcessStatus): boolean {
    return STATUS_TRANSITIONS[from].includes(to);
  }

  static transition(process: MigrationProcess, to: ProcessStatus, now: Date = new Date()): MigrationProcess {
    if (process.lifecycle === 'Eliminado') {
      throw new ProcessStateError(`Process '${process.name}' is deleted`, { processId: process.id });
    }
    if (!MigrationProcessModel.canTransition(process.status, to)) {
      throw new ProcessStateError(
        `Invalid status transition for '${process.name}': ${process.status} -> ${to}`,
        { processId: process.id, from: process.status, to }
      );
    }
    return { ...process, status: to, updatedAt: now };
  }

  /**
   * Successful completion bumps the version and stamps the last run
   */
  static complete(process: MigrationProcess, now: Date = new Date()): MigrationProcess {
    return {
      ...MigrationProcessModel.transition(process, 'Completado', now),
      version: process.version + 1,
      lastRun: now
    };
  }

  static fail(process: MigrationProcess, now: Date = new Date()): MigrationProcess {
    return {
      ...MigrationProcessModel.transition(process, 'Fallido', now),
      lastRun: now
    };
  }

  /**
   * Any column edit invalidates readiness: the process drops back to Configurado
   */
  static withColumns(process: MigrationProcess, columns: ColumnConfig[], now: Date = new Date()): MigrationProcess {
    if (process.status === 'En_Ejecucion') {
      throw new ProcessStateError(`Process '${process.name}' cannot be edited while running`, { processId: process.id });
    }
    if (process.lifecycle === 'Eliminado') {
      throw new ProcessStateError(`Process '${process.name}' is deleted`, { processId: process.id });
    }
    return {
      ...process,
      columns: columns.map(column => ({ ...column })),
      status: columns.length > 0 ? 'Configurado' : 'Borrador',
      updatedAt: now
    };
  }

  static withLifecycle(process: MigrationProcess, lifecycle: ProcessLifecycle, now: Date = new Date()): MigrationProcess {
    if (process.lifecycle === 'Eliminado' && lifecycle !== 'Eliminado') {
      throw new ProcessStateError(`Process '${process.name}' is deleted and cannot be restored`, { processId: process.id });
    }
    return { ...process, lifecycle, updatedAt: now };
  }

  static isRunnable(process: MigrationProcess): boolean {
    return process.lifecycle === 'Activo' && process.status === 'Listo';
  }

  static selectedColumns(process: MigrationProcess): ColumnConfig[] {
    return process.columns.filter(column => column.selected);
  }

  /**
   * Containers in configuration order, each with its selected columns
   */
  static containers(process: MigrationProcess): Array<{ container: string; columns: ColumnConfig[] }> {
    const grouped = new Map<string, ColumnConfig[]>();
    for (const column of MigrationProcessModel.selectedColumns(process)) {
      const list = grouped.get(column.container) ?? [];
      list.push(column);
      grouped.set(column.container, list);
    }
    return Array.from(grouped.entries()).map(([container, columns]) => ({ container, columns }));
  }

  /**
   * Destination table for one container: the configured table, suffixed per
   * container when the process reads more than one
   */
  static destinationTableFor(process: MigrationProcess, container: string): string {
    const base = process.destinationTable ?? normalizeIdentifier(`Proceso_${process.name}`);
    const containerCount = MigrationProcessModel.containers(process).length;
    if (containerCount <= 1) {
      return base;
    }
    return normalizeIdentifier(`${base}_${container}`);
  }

  static toPersisted(process: MigrationProcess): PersistedProcessConfiguration {
    const selected: PersistedProcessConfiguration['selected_columns'] = {};
    const mappings: PersistedProcessConfiguration['column_mappings'] = {};

    for (const column of process.columns) {
      if (column.selected) {
        selected[column.container] = [...(selected[column.container] || []), column.originalName];
      }
      if (!mappings[column.container]) {
        mappings[column.container] = {};
      }
      mappings[column.container][column.originalName] = {
        rename: column.rename,
        sql_type: column.sqlType,
        nullable: column.nullable,
        default: column.defaultValue
      };
    }

    return {
      name: process.name,
      source_ref: DataSourceModel.describe(process.source),
      selected_columns: selected,
      column_mappings: mappings,
      status: process.status,
      version: process.version,
      last_run: process.lastRun ? process.lastRun.toISOString() : null
    };
  }

  /**
   * Rebuild column configs from the persisted mapping shape
   */
  static columnsFromPersisted(configuration: PersistedProcessConfiguration): ColumnConfig[] {
    const columns: ColumnConfig[] = [];
    for (const [container, mapping] of Object.entries(configuration.column_mappings)) {
      const selected = new Set(configuration.selected_columns[container] ?? []);
      for (const [originalName, entry] of Object.entries(mapping)) {
        columns.push({
          ...ColumnConfigModel.create({
            container,
            originalName,
            rename: entry.rename,
            sqlType: entry.sql_type,
            nullable: entry.nullable,
            selected: selected.has(originalName)
          }),
          // persisted defaults are already normalized; '' must survive as ''
          defaultValue: entry.default
        });
      }
    }
    return columns;
  }
}
