/**
 * DataTransferRouter Service
 *
 * Static role -> connection table plus the roles each entity type may use.
 * Built once at startup; any inconsistency fails construction.
 */

import { RoutingError } from '../lib/error-handler';
import {
  isDestinationRole,
  isEntityType,
  type DestinationRole,
  type DestinationRoleConfig,
  type EntityType
} from '../models/destination-role';

export interface RouteDescription {
  entityType: EntityType;
  role: DestinationRole;
  connectionIds: string[];
}

export class DataTransferRouter<TConnection> {
  private readonly roleConnections: ReadonlyMap<DestinationRole, readonly string[]>;
  private readonly entityRoles: ReadonlyMap<EntityType, readonly DestinationRole[]>;
  private readonly connections: ReadonlyMap<string, TConnection>;

  /**
   * @param resolveConnection builds (or looks up) the physical connection for an id;
   *   returns undefined when the id is not configured
   */
  constructor(
    config: DestinationRoleConfig,
    resolveConnection: (connectionId: string) => TConnection | undefined
  ) {
    const roleConnections = new Map<DestinationRole, readonly string[]>();
    const connections = new Map<string, TConnection>();

    for (const [role, ids] of Object.entries(config.roles)) {
      if (!isDestinationRole(role)) {
        throw new RoutingError(`Unknown destination role '${role}'`, { role });
      }
      if (ids.length === 0) {
        throw new RoutingError(`Destination role '${role}' has no connections`, { role });
      }
      for (const id of ids) {
        if (!connections.has(id)) {
          const connection = resolveConnection(id);
          if (connection === undefined) {
            throw new RoutingError(`Destination role '${role}' references unconfigured connection '${id}'`, { role, connectionId: id });
          }
          connections.set(id, connection);
        }
      }
      roleConnections.set(role, Object.freeze([...new Set(ids)]));
    }

    const entityRoles = new Map<EntityType, readonly DestinationRole[]>();
    for (const [entity, roles] of Object.entries(config.entities)) {
      if (!isEntityType(entity)) {
        throw new RoutingError(`Unknown entity type '${entity}'`, { entityType: entity });
      }
      const declared: DestinationRole[] = [];
      for (const role of roles) {
        if (!isDestinationRole(role) || !roleConnections.has(role)) {
          throw new RoutingError(`Entity '${entity}' references undeclared role '${role}'`, { entityType: entity, role });
        }
        declared.push(role);
      }
      entityRoles.set(entity, Object.freeze(declared));
    }

    this.roleConnections = roleConnections;
    this.entityRoles = entityRoles;
    this.connections = connections;
  }

  /**
   * Resolve the connection for an entity written under a role. A role mapped to
   * several connections requires connectionId.
   */
  resolve(entityType: EntityType, role: DestinationRole, connectionId?: string): TConnection {
    const allowed = this.entityRoles.get(entityType);
    if (!allowed || !allowed.includes(role)) {
      throw new RoutingError(`Entity '${entityType}' is not declared for role '${role}'`, { entityType, role });
    }

    const ids = this.roleConnections.get(role) ?? [];
    let id: string;

    if (connectionId !== undefined) {
      if (!ids.includes(connectionId)) {
        throw new RoutingError(`Connection '${connectionId}' is not mapped to role '${role}'`, { entityType, role, connectionId });
      }
      id = connectionId;
    } else if (ids.length === 1) {
      id = ids[0];
    } else {
      throw new RoutingError(
        `Role '${role}' maps to ${ids.length} connections; pass a connection id`,
        { entityType, role, candidates: [...ids] }
      );
    }

    const connection = this.connections.get(id);
    if (connection === undefined) {
      throw new RoutingError(`Connection '${id}' is not available`, { role, connectionId: id });
    }
    return connection;
  }

  /**
   * Roles an entity type is allowed to use
   */
  rolesFor(entityType: EntityType): DestinationRole[] {
    return [...(this.entityRoles.get(entityType) ?? [])];
  }

  describe(): RouteDescription[] {
    const routes: RouteDescription[] = [];
    for (const [entityType, roles] of this.entityRoles) {
      for (const role of roles) {
        routes.push({ entityType, role, connectionIds: [...(this.roleConnections.get(role) ?? [])] });
      }
    }
    return routes;
  }

  connectionIds(): string[] {
    return Array.from(this.connections.keys());
  }
}
