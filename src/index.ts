export { createApp, initializeApp } from './app';
export type { AppOptions, MigrationApp } from './app';
export { loadConfig, loadEnvironment, validateConfig } from './config/migration-config';
export type { AppConfig, ExecutionConfig, InferenceConfig } from './config/migration-config';

export { createConnectorFactory } from './connectors';
export type { ConnectorFactory } from './connectors';
export { LocalFileConnector } from './connectors/local-file-connector';
export { CloudShareConnector } from './connectors/cloud-share-connector';
export { RelationalConnector } from './connectors/relational-connector';
export type { SourceConnector, SourceRow, SourceValue, ColumnSample } from './connectors/source-connector';

export { ColumnConfigModel } from './models/column-config';
export type { ColumnConfig } from './models/column-config';
export { DataSourceModel } from './models/data-source';
export type { DataSource } from './models/data-source';
export { MigrationProcessModel } from './models/migration-process';
export type { MigrationProcess, ProcessStatus, ProcessLifecycle } from './models/migration-process';
export { ExecutionLogModel } from './models/execution-log';
export type { ExecutionLogEntry, RejectedRowSample } from './models/execution-log';

export { SchemaInferenceEngine } from './services/schema-inference-engine';
export { validateColumnConfigs, validateRename, normalizeIdentifier } from './services/column-config-validator';
export { DataTransferRouter } from './services/data-transfer-router';
export { MigrationExecutor } from './services/migration-executor';
export type { RunResult } from './services/migration-executor';
export { ProcessManager } from './services/process-manager';

export * from './lib/error-handler';
export { Logger } from './lib/logger';
