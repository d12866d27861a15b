/**
 * DataSource Model
 * Tagged variant identifying where a migration reads from
 */

import { v4 as uuidv4 } from 'uuid';

export type DataSourceKind = 'local-file' | 'cloud-share' | 'relational';

export interface LocalFileSource {
  kind: 'local-file';
  id: string;
  path: string;
  displayName: string;
}

export interface CloudShareSource {
  kind: 'cloud-share';
  id: string;
  shareUrl: string;
  displayName: string;
  validatedAt: Date | null;
}

export interface RelationalSource {
  kind: 'relational';
  id: string;
  /** Connection identifier resolved by the DatabaseConnectionManager */
  connectionRef: string;
  database: string | null;
  table: string | null;
}

export type DataSource = LocalFileSource | CloudShareSource | RelationalSource;

export type DataSourceCreateInput =
  | { kind: 'local-file'; path: string; displayName?: string }
  | { kind: 'cloud-share'; shareUrl: string; displayName: string }
  | { kind: 'relational'; connectionRef: string; database?: string; table?: string };

const SPREADSHEET_EXTENSIONS = ['.xlsx', '.xlsm', '.xls', '.csv', '.txt'];

export class DataSourceModel {
  static create(input: DataSourceCreateInput): DataSource {
    switch (input.kind) {
      case 'local-file': {
        if (!input.path || input.path.trim().length === 0) {
          throw new Error('path is required for local-file sources');
        }
        const lower = input.path.toLowerCase();
        if (!SPREADSHEET_EXTENSIONS.some(ext => lower.endsWith(ext))) {
          throw new Error(`Unsupported file type: ${input.path}. Must be one of: ${SPREADSHEET_EXTENSIONS.join(', ')}`);
        }
        return Object.freeze({
          kind: 'local-file',
          id: uuidv4(),
          path: input.path,
          displayName: input.displayName ?? input.path.split(/[\\/]/).pop() ?? input.path
        });
      }

      case 'cloud-share': {
        DataSourceModel.assertShareUrl(input.shareUrl);
        if (!input.displayName || input.displayName.trim().length === 0) {
          throw new Error('displayName is required for cloud-share sources');
        }
        return Object.freeze({
          kind: 'cloud-share',
          id: uuidv4(),
          shareUrl: input.shareUrl.trim(),
          displayName: input.displayName.trim(),
          validatedAt: null
        });
      }

      case 'relational': {
        if (!input.connectionRef) {
          throw new Error('connectionRef is required for relational sources');
        }
        return Object.freeze({
          kind: 'relational',
          id: uuidv4(),
          connectionRef: input.connectionRef,
          database: input.database ?? null,
          table: input.table ?? null
        });
      }
    }
  }

  /**
   * The only permitted mutation: stamping a successful re-validation of the share URL
   */
  static markValidated(source: CloudShareSource, at: Date = new Date()): CloudShareSource {
    return Object.freeze({ ...source, validatedAt: at });
  }

  static assertShareUrl(shareUrl: string): void {
    let parsed: URL;
    try {
      parsed = new URL(shareUrl.trim());
    } catch {
      throw new Error(`Invalid share URL: ${shareUrl}`);
    }
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      throw new Error(`Share URL must use http or https: ${shareUrl}`);
    }
  }

  /**
   * Rebuild a source read back from storage, keeping its id
   */
  static restore(raw: unknown): DataSource {
    if (typeof raw !== 'object' || raw === null || !('kind' in raw) || !('id' in raw) || typeof raw.id !== 'string') {
      throw new Error('Stored data source is missing kind or id');
    }
    const record: object = raw;
    const text = (key: string): string | null => {
      const value: unknown = key in record ? Reflect.get(record, key) : undefined;
      return typeof value === 'string' ? value : null;
    };

    switch (raw.kind) {
      case 'local-file': {
        const filePath = text('path');
        if (!filePath) {
          throw new Error('Stored local-file source has no path');
        }
        return Object.freeze({ kind: 'local-file', id: raw.id, path: filePath, displayName: text('displayName') ?? filePath });
      }
      case 'cloud-share': {
        const shareUrl = text('shareUrl');
        if (!shareUrl) {
          throw new Error('Stored cloud-share source has no shareUrl');
        }
        const validatedAt = text('validatedAt');
        return Object.freeze({
          kind: 'cloud-share',
          id: raw.id,
          shareUrl,
          displayName: text('displayName') ?? shareUrl,
          validatedAt: validatedAt ? new Date(validatedAt) : null
        });
      }
      case 'relational': {
        const connectionRef = text('connectionRef');
        if (!connectionRef) {
          throw new Error('Stored relational source has no connectionRef');
        }
        return Object.freeze({ kind: 'relational', id: raw.id, connectionRef, database: text('database'), table: text('table') });
      }
      default:
        throw new Error(`Unknown data source kind: ${String(raw.kind)}`);
    }
  }

  /**
   * Human-readable reference used in the persisted configuration and registry mirror
   */
  static describe(source: DataSource): string {
    switch (source.kind) {
      case 'local-file':
        return source.path;
      case 'cloud-share':
        return source.displayName;
      case 'relational':
        return source.table ? `${source.connectionRef}:${source.table}` : source.connectionRef;
    }
  }
}
