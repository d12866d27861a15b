/**
 * Unit Tests: Configuration Management
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  connectionEnvPrefix,
  getConfigForLogging,
  loadConfig,
  parseDestinationRoles,
  readDestinationRoles
} from '../../../src/config/migration-config';
import { ConfigurationError } from '../../../src/lib/error-handler';
import { LogLevel } from '../../../src/lib/logger';
import type { DestinationRoleConfig } from '../../../src/models/destination-role';

const DESTINATIONS: DestinationRoleConfig = {
  roles: { 'operational-config': ['control'], 'audit-log': ['control'], 'business-data': ['warehouse'] },
  entities: { MigrationProcess: ['operational-config'] }
};

describe('loadConfig', () => {
  test('applies defaults when the environment is empty', () => {
    const config = loadConfig({}, { destinations: DESTINATIONS });

    expect(config.environment).toBe('development');
    expect(config.connections).toEqual({});
    expect(config.execution).toEqual({
      batchSize: 500,
      maxRetryAttempts: 3,
      retryBaseDelayMs: 1000,
      maxRetryDelayMs: 30000,
      maxConcurrentRuns: 4,
      parallelBatchLimit: 4,
      queryTimeoutMs: 30000,
      rejectedSampleLimit: 50
    });
    expect(config.inference).toEqual({ sampleSize: 100, matchThreshold: 1, lowConfidenceThreshold: 0.8 });
    expect(config.logging.level).toBe(LogLevel.INFO);
  });

  test('reads one connection per id from prefixed variables', () => {
    const config = loadConfig(
      {
        NODE_ENV: 'test',
        CONTROL_DB_HOST: 'localhost',
        CONTROL_DB_PASSWORD: 'test-secret',
        WAREHOUSE_DB_HOST: 'db.internal',
        WAREHOUSE_DB_PORT: '6543',
        WAREHOUSE_DB_SSL: 'true',
        SOURCE_CONNECTIONS: 'legacy, ',
        LEGACY_DB_HOST: 'legacy.internal',
        QUERY_TIMEOUT_MS: '5000',
        LOG_LEVEL: 'warning'
      },
      { destinations: DESTINATIONS }
    );

    expect(Object.keys(config.connections)).toEqual(['control', 'warehouse', 'legacy']);
    expect(config.connections.warehouse).toEqual({
      host: 'db.internal',
      port: 6543,
      database: 'postgres',
      user: 'postgres',
      password: '',
      ssl: true,
      max: 10,
      connectionTimeoutMillis: 30000,
      idleTimeoutMillis: 10000,
      statementTimeoutMillis: 5000
    });
    expect(config.logging.level).toBe(LogLevel.WARN);
    expect(getConfigForLogging(config).connections).toMatchObject({ control: { password: '***masked***' } });
  });

  test('rejects malformed or out-of-range settings', () => {
    expect(() => loadConfig({ BATCH_SIZE: 'lots' }, { destinations: DESTINATIONS }))
      .toThrow("BATCH_SIZE must be an integer, got 'lots'");
    expect(() => loadConfig({ BATCH_SIZE: '0' }, { destinations: DESTINATIONS }))
      .toThrow('Invalid batch size: 0. Must be between 1 and 10000.');
    expect(() => loadConfig({ NODE_ENV: 'qa' }, { destinations: DESTINATIONS }))
      .toThrow('Invalid environment: qa. Must be one of: development, staging, production, test');
    expect(() => loadConfig({ INFERENCE_MATCH_THRESHOLD: '1.5' }, { destinations: DESTINATIONS }))
      .toThrow('Invalid match threshold: 1.5. Must be in (0, 1].');
  });

  test('connection prefixes are upper-cased with separators replaced', () => {
    expect(connectionEnvPrefix('legacy-erp')).toBe('LEGACY_ERP_DB');
  });
});

describe('destination role table', () => {
  test('entities default to the built-in declarations', () => {
    expect(parseDestinationRoles({ roles: { 'audit-log': ['control'] } }, 'roles.json')).toEqual({
      roles: { 'audit-log': ['control'] },
      entities: {
        MigrationProcess: ['operational-config'],
        ExecutionLogEntry: ['audit-log'],
        MigratedRow: ['business-data'],
        ProcessRegistryEntry: ['business-data']
      }
    });
  });

  test('rejects the wrong shape', () => {
    expect(() => parseDestinationRoles([], 'roles.json')).toThrow('roles.json: expected an object with a "roles" table');
    expect(() => parseDestinationRoles({ roles: { 'audit-log': 'control' } }, 'roles.json'))
      .toThrow('roles.json: "roles" must map role names to connection id lists');
  });

  test('reads the role table from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'roles-'));
    const file = path.join(dir, 'roles.json');
    try {
      fs.writeFileSync(file, JSON.stringify({ roles: { 'business-data': ['warehouse'] }, entities: { MigratedRow: ['business-data'] } }));
      expect(readDestinationRoles(file)).toEqual({
        roles: { 'business-data': ['warehouse'] },
        entities: { MigratedRow: ['business-data'] }
      });

      fs.writeFileSync(file, '{ nope');
      expect(() => readDestinationRoles(file)).toThrow(ConfigurationError);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test('the shipped table routes control data and business data apart', () => {
    const shipped = readDestinationRoles(path.resolve(__dirname, '../../../config/destination-roles.json'));
    expect(shipped.roles).toEqual({
      'operational-config': ['control'],
      'audit-log': ['control'],
      'business-data': ['warehouse']
    });
  });
});
