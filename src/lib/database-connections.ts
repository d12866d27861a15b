// Database Connection Utility
// Named pg pools for relational sources and destination roles

import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg';
import {
  AuthenticationError,
  ConfigurationError,
  ConnectTimeoutError,
  SourceUnreachableError,
  classifyError,
  errorCodeOf,
  type ErrorContext,
  type MigrationBaseError
} from './error-handler';
import type { Logger } from './logger';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
  /** Per-statement timeout applied by the server */
  statementTimeoutMillis?: number;
}

export interface ConnectionPoolStats {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
}

/**
 * The subset of a pg client the pipeline uses
 */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>>;
  release(err?: Error | boolean): void;
}

/**
 * The subset of a pg Pool the pipeline uses; tests supply in-process fakes
 */
export interface SqlPool {
  query(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>>;
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

/**
 * Query and transaction access bound to one named connection
 */
export interface SqlExecutor {
  readonly name: string;
  query(text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>>;
  transaction<T>(operation: (client: SqlClient) => Promise<T>): Promise<T>;
}

export type PoolFactory = (name: string, config: DatabaseConfig) => SqlPool;

const AUTH_SQLSTATES = ['28000', '28P01'];
const UNREACHABLE_CODES = ['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ECONNRESET', '3D000'];
const TIMEOUT_CODES = ['ETIMEDOUT', '57014'];

/**
 * Map pg and socket failures onto the connector taxonomy
 */
export function classifyDatabaseError(error: unknown, context: ErrorContext = {}): MigrationBaseError {
  const code = errorCodeOf(error);
  const message = error instanceof Error ? error.message : String(error);

  if (code && AUTH_SQLSTATES.includes(code)) {
    return new AuthenticationError(message, { sqlstate: code, ...context });
  }
  if ((code && TIMEOUT_CODES.includes(code)) || /timeout|timed out/i.test(message)) {
    return new ConnectTimeoutError(message, { code, ...context });
  }
  if (code && UNREACHABLE_CODES.includes(code)) {
    return new SourceUnreachableError(message, { code, ...context });
  }
  return classifyError(error, context);
}

/**
 * Double embedded quotes so any identifier can be used safely in DDL and reads
 */
export function quoteIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

/**
 * Quote "schema.table" or "table" references
 */
export function quoteQualifiedName(name: string): string {
  return name.split('.').map(quoteIdentifier).join('.');
}

function createPgPool(name: string, config: DatabaseConfig): SqlPool {
  const poolConfig: PoolConfig = {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max || 10,
    idleTimeoutMillis: config.idleTimeoutMillis || 30000,
    connectionTimeoutMillis: config.connectionTimeoutMillis || 30000,
    statement_timeout: config.statementTimeoutMillis,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
    application_name: `tabular-migrator:${name}`
  };

  return new Pool(poolConfig);
}

export class DatabaseConnectionManager {
  private pools: Map<string, SqlPool> = new Map();
  private configs: Map<string, DatabaseConfig> = new Map();
  private logger: Logger;
  private poolFactory: PoolFactory;

  constructor(configs: Record<string, DatabaseConfig>, logger: Logger, poolFactory: PoolFactory = createPgPool) {
    this.logger = logger;
    this.poolFactory = poolFactory;

    for (const [name, config] of Object.entries(configs)) {
      const validation = DatabaseConnectionManager.validateConfig(config);
      if (!validation.valid) {
        throw new ConfigurationError(`Invalid config for '${name}': ${validation.errors.join(', ')}`, { connection: name });
      }
      this.configs.set(name, config);
    }
  }

  hasConnection(name: string): boolean {
    return this.configs.has(name);
  }

  connectionNames(): string[] {
    return Array.from(this.configs.keys());
  }

  getConfig(name: string): DatabaseConfig {
    const config = this.configs.get(name);
    if (!config) {
      throw new ConfigurationError(`Database configuration '${name}' not found`, { connection: name });
    }
    return config;
  }

  /**
   * Register a sibling of an existing connection pointing at another database
   * on the same server, and return its name
   */
  forDatabase(name: string, database: string): string {
    const base = this.getConfig(name);
    if (base.database === database) {
      return name;
    }

    const derived = `${name}/${database}`;
    if (!this.configs.has(derived)) {
      this.configs.set(derived, { ...base, database });
    }
    return derived;
  }

  /**
   * Get or lazily create the pool for a connection
   */
  getPool(name: string): SqlPool {
    const existing = this.pools.get(name);
    if (existing) {
      return existing;
    }

    const pool = this.poolFactory(name, this.getConfig(name));
    if (pool instanceof Pool) {
      pool.on('error', (err) => {
        this.logger.error(`Database pool error for '${name}'`, err, { connection: name });
      });
    }

    this.pools.set(name, pool);
    this.logger.debug(`Created database pool '${name}'`, { connection: name });
    return pool;
  }

  /**
   * Acquire a client, run the operation and always release it.
   * Acquisition that exceeds timeoutMs fails with ConnectTimeout.
   */
  async withClient<T>(name: string, operation: (client: SqlClient) => Promise<T>, timeoutMs?: number): Promise<T> {
    const pool = this.getPool(name);
    const client = await acquireWithTimeout(pool, timeoutMs ?? this.getConfig(name).connectionTimeoutMillis ?? 30000, name);

    try {
      return await operation(client);
    } finally {
      client.release();
    }
  }

  /**
   * Execute a function within a transaction
   */
  async transaction<T>(name: string, operation: (client: SqlClient) => Promise<T>): Promise<T> {
    return this.withClient(name, client => runInTransaction(client, operation));
  }

  async query(name: string, text: string, params?: unknown[]): Promise<QueryResult<QueryResultRow>> {
    try {
      return await this.getPool(name).query(text, params);
    } catch (error) {
      throw classifyDatabaseError(error, { connection: name });
    }
  }

  executor(name: string): SqlExecutor {
    this.getConfig(name);
    return {
      name,
      query: (text: string, params?: unknown[]) => this.query(name, text, params),
      transaction: <T>(operation: (client: SqlClient) => Promise<T>) => this.transaction(name, operation)
    };
  }

  /**
   * Test database connectivity
   */
  async testConnection(name: string): Promise<{ success: boolean; latency?: number; error?: string }> {
    try {
      const startTime = Date.now();
      await this.query(name, 'SELECT 1');
      return { success: true, latency: Date.now() - startTime };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error'
      };
    }
  }

  getPoolStats(name: string): ConnectionPoolStats | null {
    const pool = this.pools.get(name);
    if (!(pool instanceof Pool)) {
      return null;
    }
    return {
      totalCount: pool.totalCount,
      idleCount: pool.idleCount,
      waitingCount: pool.waitingCount
    };
  }

  /**
   * Close every pool; failures are logged and the remaining pools still close
   */
  async closeAll(): Promise<void> {
    const closing = Array.from(this.pools.entries()).map(async ([name, pool]) => {
      try {
        await pool.end();
        this.logger.debug(`Closed database pool: ${name}`);
      } catch (error) {
        this.logger.error(`Error closing pool ${name}`, error instanceof Error ? error : undefined);
      }
    });

    await Promise.all(closing);
    this.pools.clear();
  }

  static validateConfig(config: DatabaseConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!config.host) errors.push('Host is required');
    if (!config.port || config.port < 1 || config.port > 65535) {
      errors.push('Port must be between 1 and 65535');
    }
    if (!config.database) errors.push('Database name is required');
    if (!config.user) errors.push('User is required');

    if (config.max !== undefined && (config.max < 1 || config.max > 100)) {
      errors.push('Max connections must be between 1 and 100');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}

export async function runInTransaction<T>(client: SqlClient, operation: (client: SqlClient) => Promise<T>): Promise<T> {
  await client.query('BEGIN');
  try {
    const result = await operation(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  }
}

async function acquireWithTimeout(pool: SqlPool, timeoutMs: number, name: string): Promise<SqlClient> {
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;

  const acquisition = pool.connect();
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new ConnectTimeoutError(`Timed out after ${timeoutMs}ms acquiring a connection from '${name}'`, { connection: name, timeout_ms: timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([acquisition, timeout]);
  } catch (error) {
    if (timedOut) {
      // a client that arrives after the deadline goes straight back to the pool
      void acquisition.then(client => client.release(), () => undefined);
      throw error;
    }
    throw classifyDatabaseError(error, { connection: name });
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
