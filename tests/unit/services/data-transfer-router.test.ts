/**
 * Unit Tests: DataTransferRouter
 * Role table validation at construction and entity routing
 */

import { RoutingError } from '../../../src/lib/error-handler';
import { DataTransferRouter } from '../../../src/services/data-transfer-router';
import type { DestinationRoleConfig } from '../../../src/models/destination-role';

interface FakeConnection {
  id: string;
}

const TABLE: DestinationRoleConfig = {
  roles: {
    'operational-config': ['control'],
    'audit-log': ['control'],
    'business-data': ['warehouse', 'archive']
  },
  entities: {
    MigrationProcess: ['operational-config'],
    ExecutionLogEntry: ['audit-log'],
    MigratedRow: ['business-data']
  }
};

function build(config: DestinationRoleConfig = TABLE, known: string[] = ['control', 'warehouse', 'archive']) {
  const resolve = jest.fn((id: string): FakeConnection | undefined => (known.includes(id) ? { id } : undefined));
  return { router: new DataTransferRouter<FakeConnection>(config, resolve), resolve };
}

describe('DataTransferRouter', () => {
  test('resolves each connection once, even when shared by roles', () => {
    const { router, resolve } = build();

    expect(resolve.mock.calls.map(call => call[0])).toEqual(['control', 'warehouse', 'archive']);
    expect(router.connectionIds()).toEqual(['control', 'warehouse', 'archive']);
    expect(router.resolve('MigrationProcess', 'operational-config')).toBe(router.resolve('ExecutionLogEntry', 'audit-log'));
  });

  test('routes an entity to the connection of its role', () => {
    const { router } = build();
    expect(router.resolve('MigrationProcess', 'operational-config')).toEqual({ id: 'control' });
  });

  test('a role with several connections needs an explicit id', () => {
    const { router } = build();

    expect(() => router.resolve('MigratedRow', 'business-data'))
      .toThrow('Role \'business-data\' maps to 2 connections; pass a connection id');
    expect(router.resolve('MigratedRow', 'business-data', 'archive')).toEqual({ id: 'archive' });
    expect(() => router.resolve('MigratedRow', 'business-data', 'control'))
      .toThrow("Connection 'control' is not mapped to role 'business-data'");
  });

  test('rejects routes the entity is not declared for', () => {
    const { router } = build();

    expect(() => router.resolve('MigratedRow', 'audit-log')).toThrow(RoutingError);
    expect(() => router.resolve('MigratedRow', 'audit-log')).toThrow("Entity 'MigratedRow' is not declared for role 'audit-log'");
    expect(() => router.resolve('ProcessRegistryEntry', 'business-data'))
      .toThrow("Entity 'ProcessRegistryEntry' is not declared for role 'business-data'");
  });

  test('construction fails on an inconsistent table', () => {
    expect(() => build({ roles: { 'shadow-copy': ['control'] }, entities: {} }))
      .toThrow("Unknown destination role 'shadow-copy'");
    expect(() => build({ roles: { 'audit-log': [] }, entities: {} }))
      .toThrow("Destination role 'audit-log' has no connections");
    expect(() => build({ roles: { 'audit-log': ['missing'] }, entities: {} }))
      .toThrow("Destination role 'audit-log' references unconfigured connection 'missing'");
    expect(() => build({ roles: { 'audit-log': ['control'] }, entities: { Invoice: ['audit-log'] } }))
      .toThrow("Unknown entity type 'Invoice'");
    expect(() => build({ roles: { 'audit-log': ['control'] }, entities: { MigrationProcess: ['operational-config'] } }))
      .toThrow("Entity 'MigrationProcess' references undeclared role 'operational-config'");
  });

  test('describe lists every entity route with its connections', () => {
    const { router } = build();

    expect(router.describe()).toEqual([
      { entityType: 'MigrationProcess', role: 'operational-config', connectionIds: ['control'] },
      { entityType: 'ExecutionLogEntry', role: 'audit-log', connectionIds: ['control'] },
      { entityType: 'MigratedRow', role: 'business-data', connectionIds: ['warehouse', 'archive'] }
    ]);
    expect(router.rolesFor('MigratedRow')).toEqual(['business-data']);
    expect(router.rolesFor('ProcessRegistryEntry')).toEqual([]);
  });
});
