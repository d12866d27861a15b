/**
 * SourceConnector factory: one connector per DataSource variant
 */

import type { AxiosInstance } from 'axios';
import type { ErrorHandler } from '../lib/error-handler';
import type { DatabaseConnectionManager } from '../lib/database-connections';
import type { Logger } from '../lib/logger';
import type { DataSource } from '../models/data-source';
import { CloudShareConnector } from './cloud-share-connector';
import { LocalFileConnector } from './local-file-connector';
import { RelationalConnector } from './relational-connector';
import type { SourceConnector } from './source-connector';

export interface ConnectorDependencies {
  logger: Logger;
  errorHandler: ErrorHandler;
  connections: DatabaseConnectionManager;
  cloudFetchTimeoutMs: number;
  relationalPageSize: number;
  metadataRetryAttempts: number;
  acquireTimeoutMs: number;
  /** Directory relative local paths resolve against */
  baseDirectory?: string;
  http?: AxiosInstance;
}

export type ConnectorFactory = (source: DataSource) => SourceConnector;

export function createConnectorFactory(deps: ConnectorDependencies): ConnectorFactory {
  return (source: DataSource): SourceConnector => {
    switch (source.kind) {
      case 'local-file':
        return new LocalFileConnector(source, deps.logger, deps.baseDirectory);
      case 'cloud-share':
        return new CloudShareConnector(source, deps.logger, {
          fetchTimeoutMs: deps.cloudFetchTimeoutMs,
          http: deps.http
        });
      case 'relational':
        return new RelationalConnector(source, deps.connections, deps.errorHandler, deps.logger, {
          pageSize: deps.relationalPageSize,
          maxAttempts: deps.metadataRetryAttempts,
          acquireTimeoutMs: deps.acquireTimeoutMs
        });
    }
  };
}

export * from './source-connector';
export { CloudShareConnector, toDirectDownloadUrl } from './cloud-share-connector';
export { LocalFileConnector } from './local-file-connector';
export { RelationalConnector, parseContainer } from './relational-connector';
