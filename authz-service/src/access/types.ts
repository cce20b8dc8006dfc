/**
 * Authorization Types
 *
 * Entities, mutation inputs and the per-call context shared by the store,
 * the permission cache and the service.
 */

// ═══════════════════════════════════════════════════════════════════
// Entities
// ═══════════════════════════════════════════════════════════════════

export type EntityStatus = 'enabled' | 'disabled';

export const ENTITY_STATUSES: readonly EntityStatus[] = ['enabled', 'disabled'];

interface Timestamps {
  createdAt: Date;
  updatedAt: Date;
  /** Tombstone; set rows are invisible to every query */
  deletedAt: Date | null;
}

export interface Role extends Timestamps {
  id: number;
  /** Unique among non-deleted roles, case-sensitive */
  name: string;
  description: string;
  status: EntityStatus;
  /** Attached grants, populated by getRole / getRoleByName */
  permissions?: Permission[];
}

export interface Permission extends Timestamps {
  id: number;
  name: string;
  resource: string;
  action: string;
  description: string;
  status: EntityStatus;
}

export interface UserRoleAssignment {
  userId: number;
  roleId: number;
  createdAt: Date;
}

export interface RolePermissionGrant {
  roleId: number;
  permissionId: number;
  createdAt: Date;
}

// ═══════════════════════════════════════════════════════════════════
// Inputs
// ═══════════════════════════════════════════════════════════════════

export interface CreateRoleInput {
  name: string;
  description?: string;
  /** Defaults to 'enabled' */
  status?: EntityStatus;
}

/** Only supplied fields change */
export type UpdateRoleInput = Partial<CreateRoleInput>;

export interface CreatePermissionInput {
  name: string;
  resource: string;
  action: string;
  description?: string;
  /** Defaults to 'enabled' */
  status?: EntityStatus;
}

export type UpdatePermissionInput = Partial<CreatePermissionInput>;

/** A fully-resolved role row as handed to the store on insert */
export type NewRole = Pick<Role, 'name' | 'description' | 'status'>;

export type NewPermission = Pick<Permission, 'name' | 'resource' | 'action' | 'description' | 'status'>;

export interface Page<T> {
  items: T[];
  total: number;
}

// ═══════════════════════════════════════════════════════════════════
// Context & Policy
// ═══════════════════════════════════════════════════════════════════

/**
 * Per-call context. `signal` bounds the synchronous storage path only;
 * background cache work never observes it.
 */
export interface OperationContext {
  signal?: AbortSignal;
}

/**
 * What happens to cached permission sets when a role's grants change.
 * - ttl-only: nothing; holders see the change when their entry expires
 * - fan-out: every holder of the role is invalidated
 */
export type InvalidationPolicy = 'ttl-only' | 'fan-out';

export const INVALIDATION_POLICIES: readonly InvalidationPolicy[] = ['ttl-only', 'fan-out'];
