/**
 * Destination roles and the entity types that persist through them
 */

export const DESTINATION_ROLES = ['operational-config', 'audit-log', 'business-data'] as const;

export type DestinationRole = typeof DESTINATION_ROLES[number];

export const ENTITY_TYPES = ['MigrationProcess', 'ExecutionLogEntry', 'MigratedRow', 'ProcessRegistryEntry'] as const;

export type EntityType = typeof ENTITY_TYPES[number];

export type RoleTable = Record<string, string[]>;

export type EntityRoleTable = Record<string, string[]>;

export interface DestinationRoleConfig {
  roles: RoleTable;
  entities: EntityRoleTable;
}

export const DEFAULT_ENTITY_ROLES: Record<EntityType, DestinationRole[]> = {
  MigrationProcess: ['operational-config'],
  ExecutionLogEntry: ['audit-log'],
  MigratedRow: ['business-data'],
  ProcessRegistryEntry: ['business-data']
};

export function isDestinationRole(value: string): value is DestinationRole {
  return DESTINATION_ROLES.some(role => role === value);
}

export function isEntityType(value: string): value is EntityType {
  return ENTITY_TYPES.some(entityType => entityType === value);
}
