/**
 * Configuration Management
 *
 * Builds one typed configuration object from environment variables and the
 * destination role table. Nothing is read at module load; callers build the
 * config once at startup and pass it to constructors.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../lib/error-handler';
import type { DatabaseConfig } from '../lib/database-connections';
import { LogLevel, parseLogLevel } from '../lib/logger';
import {
  DEFAULT_ENTITY_ROLES,
  type DestinationRoleConfig,
  type EntityRoleTable,
  type RoleTable
} from '../models/destination-role';

export type Environment = 'development' | 'staging' | 'production' | 'test';

export interface ExecutionConfig {
  batchSize: number;
  /** Retries after the first attempt of a batch write */
  maxRetryAttempts: number;
  retryBaseDelayMs: number;
  maxRetryDelayMs: number;
  maxConcurrentRuns: number;
  parallelBatchLimit: number;
  queryTimeoutMs: number;
  rejectedSampleLimit: number;
}

export interface InferenceConfig {
  sampleSize: number;
  matchThreshold: number;
  lowConfidenceThreshold: number;
}

export interface AppConfig {
  environment: Environment;
  connections: Record<string, DatabaseConfig>;
  destinations: DestinationRoleConfig;
  execution: ExecutionConfig;
  inference: InferenceConfig;
  cloud: {
    fetchTimeoutMs: number;
  };
  logging: {
    level: LogLevel;
    enableFileLogging: boolean;
    logDirectory: string;
    structured: boolean;
  };
}

export interface LoadConfigOptions {
  /** Role table location; defaults to DESTINATION_ROLES_FILE or config/destination-roles.json */
  rolesFile?: string;
  /** Already-parsed role table, used instead of reading a file */
  destinations?: DestinationRoleConfig;
}

type Env = Record<string, string | undefined>;

const ENVIRONMENTS: Environment[] = ['development', 'staging', 'production', 'test'];

/**
 * Load .env into process.env. Called explicitly by entry points.
 */
export function loadEnvironment(envFile?: string): void {
  dotenv.config(envFile ? { path: envFile } : undefined);
}

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got '${raw}'`, { setting: name });
  }
  return value;
}

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got '${raw}'`, { setting: name });
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
}

/**
 * Environment prefix for a connection id: "warehouse" -> "WAREHOUSE_DB_*"
 */
export function connectionEnvPrefix(connectionId: string): string {
  return `${connectionId.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_DB`;
}

/**
 * Connection settings for one id, or null when its host is not configured
 */
export function readConnection(env: Env, connectionId: string, queryTimeoutMs: number): DatabaseConfig | null {
  const prefix = connectionEnvPrefix(connectionId);
  const host = env[`${prefix}_HOST`];
  if (!host) {
    return null;
  }

  return {
    host,
    port: readInteger(env, `${prefix}_PORT`, 5432),
    database: env[`${prefix}_NAME`] || 'postgres',
    user: env[`${prefix}_USER`] || 'postgres',
    password: env[`${prefix}_PASSWORD`] || '',
    ssl: readBoolean(env, `${prefix}_SSL`, false),
    max: readInteger(env, `${prefix}_POOL_SIZE`, 10),
    connectionTimeoutMillis: readInteger(env, `${prefix}_TIMEOUT`, 30000),
    idleTimeoutMillis: readInteger(env, `${prefix}_IDLE_TIMEOUT`, 10000),
    statementTimeoutMillis: queryTimeoutMs
  };
}

function isStringArrayRecord(value: unknown): value is Record<string, string[]> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    entry => Array.isArray(entry) && entry.every(item => typeof item === 'string')
  );
}

/**
 * Validate the parsed role file shape. Entity declarations default to the built-in table.
 */
export function parseDestinationRoles(raw: unknown, source: string): DestinationRoleConfig {
  if (typeof raw !== 'object' || raw === null || !('roles' in raw)) {
    throw new ConfigurationError(`${source}: expected an object with a "roles" table`, { file: source });
  }

  const roles: unknown = raw.roles;
  if (!isStringArrayRecord(roles)) {
    throw new ConfigurationError(`${source}: "roles" must map role names to connection id lists`, { file: source });
  }

  let entities: EntityRoleTable = { ...DEFAULT_ENTITY_ROLES };
  if ('entities' in raw && raw.entities !== undefined) {
    const declared: unknown = raw.entities;
    if (!isStringArrayRecord(declared)) {
      throw new ConfigurationError(`${source}: "entities" must map entity types to role lists`, { file: source });
    }
    entities = declared;
  }

  const table: RoleTable = {};
  for (const [role, ids] of Object.entries(roles)) {
    table[role] = [...ids];
  }

  return { roles: table, entities };
}

export function readDestinationRoles(file: string): DestinationRoleConfig {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read destination role table ${file}: ${error instanceof Error ? error.message : String(error)}`, { file });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Destination role table ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, { file });
  }

  return parseDestinationRoles(parsed, file);
}

function connectionIds(env: Env, destinations: DestinationRoleConfig): string[] {
  const ids = new Set<string>();
  for (const list of Object.values(destinations.roles)) {
    list.forEach(id => ids.add(id));
  }
  (env.SOURCE_CONNECTIONS || '')
    .split(',')
    .map(id => id.trim())
    .filter(id => id.length > 0)
    .forEach(id => ids.add(id));
  return Array.from(ids);
}

/**
 * Build and validate the application configuration
 */
export function loadConfig(env: Env = process.env, options: LoadConfigOptions = {}): AppConfig {
  const rolesFile = options.rolesFile
    ?? env.DESTINATION_ROLES_FILE
    ?? path.resolve(process.cwd(), 'config', 'destination-roles.json');
  const destinations = options.destinations ?? readDestinationRoles(rolesFile);

  const queryTimeoutMs = readInteger(env, 'QUERY_TIMEOUT_MS', 30000);

  const connections: Record<string, DatabaseConfig> = {};
  for (const id of connectionIds(env, destinations)) {
    const connection = readConnection(env, id, queryTimeoutMs);
    if (connection) {
      connections[id] = connection;
    }
  }

  const environment = env.NODE_ENV || 'development';
  if (!ENVIRONMENTS.some(candidate => candidate === environment)) {
    throw new ConfigurationError(`Invalid environment: ${environment}. Must be one of: ${ENVIRONMENTS.join(', ')}`);
  }

  const config: AppConfig = {
    environment: ENVIRONMENTS.find(candidate => candidate === environment) ?? 'development',
    connections,
    destinations,
    execution: {
      batchSize: readInteger(env, 'BATCH_SIZE', 500),
      maxRetryAttempts: readInteger(env, 'MAX_RETRY_ATTEMPTS', 3),
      retryBaseDelayMs: readInteger(env, 'RETRY_BASE_DELAY_MS', 1000),
      maxRetryDelayMs: readInteger(env, 'MAX_RETRY_DELAY_MS', 30000),
      maxConcurrentRuns: readInteger(env, 'MAX_CONCURRENT_RUNS', 4),
      parallelBatchLimit: readInteger(env, 'PARALLEL_BATCH_LIMIT', 4),
      queryTimeoutMs,
      rejectedSampleLimit: readInteger(env, 'REJECTED_SAMPLE_LIMIT', 50)
    },
    inference: {
      sampleSize: readInteger(env, 'SAMPLE_SIZE', 100),
      matchThreshold: readNumber(env, 'INFERENCE_MATCH_THRESHOLD', 1.0),
      lowConfidenceThreshold: readNumber(env, 'INFERENCE_LOW_CONFIDENCE', 0.8)
    },
    cloud: {
      fetchTimeoutMs: readInteger(env, 'CLOUD_FETCH_TIMEOUT_MS', 60000)
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      enableFileLogging: readBoolean(env, 'ENABLE_FILE_LOGGING', false),
      logDirectory: env.LOG_DIRECTORY || './logs',
      structured: readBoolean(env, 'STRUCTURED_LOGGING', false)
    }
  };

  validateConfig(config);
  return config;
}

/**
 * Validates the configuration and throws descriptive errors for issues
 */
export function validateConfig(cfg: AppConfig): void {
  const { execution, inference } = cfg;

  if (execution.batchSize < 1 || execution.batchSize > 10000) {
    throw new ConfigurationError(`Invalid batch size: ${execution.batchSize}. Must be between 1 and 10000.`, { setting: 'BATCH_SIZE' });
  }

  if (execution.maxRetryAttempts < 0 || execution.maxRetryAttempts > 10) {
    throw new ConfigurationError(`Invalid retry bound: ${execution.maxRetryAttempts}. Must be between 0 and 10.`, { setting: 'MAX_RETRY_ATTEMPTS' });
  }

  if (execution.retryBaseDelayMs < 0 || execution.maxRetryDelayMs < execution.retryBaseDelayMs) {
    throw new ConfigurationError('Retry delays must be non-negative and MAX_RETRY_DELAY_MS at least RETRY_BASE_DELAY_MS', { setting: 'RETRY_BASE_DELAY_MS' });
  }

  if (execution.maxConcurrentRuns < 1 || execution.maxConcurrentRuns > 64) {
    throw new ConfigurationError(`Invalid max concurrent runs: ${execution.maxConcurrentRuns}. Must be between 1 and 64.`, { setting: 'MAX_CONCURRENT_RUNS' });
  }

  if (execution.parallelBatchLimit < 1 || execution.parallelBatchLimit > 32) {
    throw new ConfigurationError(`Invalid parallel batch limit: ${execution.parallelBatchLimit}. Must be between 1 and 32.`, { setting: 'PARALLEL_BATCH_LIMIT' });
  }

  if (execution.queryTimeoutMs < 1) {
    throw new ConfigurationError('QUERY_TIMEOUT_MS must be positive', { setting: 'QUERY_TIMEOUT_MS' });
  }

  if (execution.rejectedSampleLimit < 0 || execution.rejectedSampleLimit > 1000) {
    throw new ConfigurationError(`Invalid rejected sample limit: ${execution.rejectedSampleLimit}. Must be between 0 and 1000.`, { setting: 'REJECTED_SAMPLE_LIMIT' });
  }

  if (inference.sampleSize < 1 || inference.sampleSize > 10000) {
    throw new ConfigurationError(`Invalid sample size: ${inference.sampleSize}. Must be between 1 and 10000.`, { setting: 'SAMPLE_SIZE' });
  }

  if (inference.matchThreshold <= 0 || inference.matchThreshold > 1) {
    throw new ConfigurationError(`Invalid match threshold: ${inference.matchThreshold}. Must be in (0, 1].`, { setting: 'INFERENCE_MATCH_THRESHOLD' });
  }

  for (const [name, connection] of Object.entries(cfg.connections)) {
    if (connection.port < 1 || connection.port > 65535) {
      throw new ConfigurationError(`Invalid port for connection '${name}': ${connection.port}`, { connection: name });
    }
  }
}

/**
 * Returns a safe configuration object for logging (with passwords masked)
 */
export function getConfigForLogging(cfg: AppConfig): Record<string, unknown> {
  const connections: Record<string, unknown> = {};
  for (const [name, connection] of Object.entries(cfg.connections)) {
    connections[name] = { ...connection, password: '***masked***' };
  }

  return {
    environment: cfg.environment,
    connections,
    destinations: cfg.destinations,
    execution: cfg.execution,
    inference: cfg.inference,
    cloud: cfg.cloud,
    logging: cfg.logging
  };
}
