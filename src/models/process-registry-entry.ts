/**
 * ProcessRegistryEntry Model
 * Administrative mirror of a process, kept beside the business data for other systems
 */

import { DataSourceModel } from './data-source';
import { MigrationProcessModel, type MigrationProcess, type ProcessLifecycle, type ProcessStatus } from './migration-process';

export type RegistrySourceType = 'EXCEL' | 'CSV' | 'CLOUD' | 'SQL';

export interface ProcessRegistryEntry {
  name: string;
  sourceType: RegistrySourceType;
  sourceRef: string;
  containers: string[];
  destination: string;
  status: ProcessStatus;
  lifecycle: ProcessLifecycle;
  version: number;
  notes: string | null;
  description: string | null;
  lastRun: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export class ProcessRegistryEntryModel {
  static sourceType(process: MigrationProcess): RegistrySourceType {
    switch (process.source.kind) {
      case 'local-file':
        return /\.(csv|txt)$/i.test(process.source.path) ? 'CSV' : 'EXCEL';
      case 'cloud-share':
        return 'CLOUD';
      case 'relational':
        return 'SQL';
    }
  }

  static fromProcess(process: MigrationProcess): ProcessRegistryEntry {
    const containers = MigrationProcessModel.containers(process).map(group => group.container);

    return {
      name: process.name,
      sourceType: ProcessRegistryEntryModel.sourceType(process),
      sourceRef: DataSourceModel.describe(process.source),
      containers,
      destination: containers.map(container => MigrationProcessModel.destinationTableFor(process, container)).join(', ')
        || MigrationProcessModel.destinationTableFor(process, ''),
      status: process.status,
      lifecycle: process.lifecycle,
      version: process.version,
      notes: process.observations,
      description: process.description,
      lastRun: process.lastRun,
      createdAt: process.createdAt,
      updatedAt: process.updatedAt
    };
  }
}
