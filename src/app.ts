/**
 * Application wiring: builds every component once from an AppConfig and passes
 * dependencies explicitly. Routing is checked here, so a bad role table fails at startup.
 */

import type { AxiosInstance } from 'axios';
import type { AppConfig } from './config/migration-config';
import { createConnectorFactory, type ConnectorFactory } from './connectors';
import { createPgDestination } from './database/pg-destination';
import {
  initializeStores,
  resolveStores,
  type DestinationConnection,
  type PinnedConnections,
  type ResolvedStores
} from './database/destination-stores';
import { DatabaseConnectionManager, type PoolFactory } from './lib/database-connections';
import { ErrorHandler } from './lib/error-handler';
import { Logger } from './lib/logger';
import { DataTransferRouter } from './services/data-transfer-router';
import { MigrationExecutor } from './services/migration-executor';
import { ProcessManager } from './services/process-manager';
import { SchemaInferenceEngine } from './services/schema-inference-engine';

export interface AppOptions {
  logger?: Logger;
  poolFactory?: PoolFactory;
  /** Pre-built destinations by connection id, used instead of pg-backed ones */
  destinations?: Record<string, DestinationConnection>;
  pinned?: PinnedConnections;
  http?: AxiosInstance;
  baseDirectory?: string;
  clock?: () => Date;
}

export interface MigrationApp {
  config: AppConfig;
  logger: Logger;
  errorHandler: ErrorHandler;
  connections: DatabaseConnectionManager;
  router: DataTransferRouter<DestinationConnection>;
  stores: ResolvedStores;
  connectorFor: ConnectorFactory;
  inference: SchemaInferenceEngine;
  processes: ProcessManager;
  executor: MigrationExecutor;
  close(): Promise<void>;
}

export function createApp(config: AppConfig, options: AppOptions = {}): MigrationApp {
  const logger = options.logger ?? new Logger({
    level: config.logging.level,
    enableFile: config.logging.enableFileLogging,
    logDirectory: config.logging.logDirectory,
    enableStructuredLogging: config.logging.structured
  });

  const errorHandler = new ErrorHandler(logger, {
    maxRetryAttempts: config.execution.maxRetryAttempts + 1,
    retryDelayMs: config.execution.retryBaseDelayMs,
    maxRetryDelayMs: config.execution.maxRetryDelayMs
  });

  const connections = new DatabaseConnectionManager(config.connections, logger, options.poolFactory);

  const router = new DataTransferRouter<DestinationConnection>(config.destinations, id => {
    const prebuilt = options.destinations?.[id];
    if (prebuilt) {
      return prebuilt;
    }
    return connections.hasConnection(id) ? createPgDestination(id, connections.executor(id), logger) : undefined;
  });

  const stores = resolveStores(router, options.pinned);

  const connectorFor = createConnectorFactory({
    logger,
    errorHandler,
    connections,
    cloudFetchTimeoutMs: config.cloud.fetchTimeoutMs,
    relationalPageSize: config.execution.batchSize,
    metadataRetryAttempts: config.execution.maxRetryAttempts + 1,
    acquireTimeoutMs: config.execution.queryTimeoutMs,
    baseDirectory: options.baseDirectory,
    http: options.http
  });

  const inference = new SchemaInferenceEngine(config.inference);

  const processes = new ProcessManager({ stores, connectorFor, inference, logger, clock: options.clock });

  const executor = new MigrationExecutor({
    stores,
    connectorFor,
    errorHandler,
    logger,
    settings: {
      batchSize: config.execution.batchSize,
      maxRetryAttempts: config.execution.maxRetryAttempts,
      retryBaseDelayMs: config.execution.retryBaseDelayMs,
      maxRetryDelayMs: config.execution.maxRetryDelayMs,
      maxConcurrentRuns: config.execution.maxConcurrentRuns,
      parallelBatchLimit: config.execution.parallelBatchLimit,
      rejectedSampleLimit: config.execution.rejectedSampleLimit
    },
    clock: options.clock
  });

  return {
    config,
    logger,
    errorHandler,
    connections,
    router,
    stores,
    connectorFor,
    inference,
    processes,
    executor,
    close: () => connections.closeAll()
  };
}

/**
 * Create the store tables; called once by entry points before serving requests
 */
export async function initializeApp(app: MigrationApp): Promise<void> {
  await initializeStores(app.stores);
  app.logger.info('Destination stores ready', { connections: app.router.connectionIds() });
}
