/**
 * Authorization Service
 *
 * Role and permission management plus the permission check, over an
 * EntityStore and a PermissionCache.
 *
 * Cache consistency:
 * - assignRole / revokeRole / assignRoles invalidate the user's entry
 * - grant changes on a role (assign/revoke permission, delete role) only
 *   invalidate holders under the 'fan-out' policy; under 'ttl-only' they
 *   become visible when each holder's entry expires
 *
 * @example
 * ```typescript
 * const service = new AuthorizationService(store, { cache, executor });
 *
 * const editor = await service.createRole(ctx, { name: 'editor' });
 * const write = await service.createPermission(ctx, { name: 'posts.write', resource: 'posts', action: 'write' });
 * await service.assignPermission(ctx, editor.id, write.id);
 * await service.assignRole(ctx, 42, editor.id);
 *
 * await service.checkPermission(ctx, 42, 'posts', 'write'); // true
 * ```
 */

// External packages
import { type } from 'arktype';
import { isValidToken } from 'permission-resolver';

// Internal imports
import type { Cache } from '../databases/cache.js';
import type { Executor } from '../common/executor.js';
import { AuthzError } from '../common/errors.js';
import { createChildLogger, type Logger } from '../common/logger.js';
import { validateId, validateInput } from '../common/validation.js';
import { PermissionCache } from './permission-cache.js';
import type { EntityStore } from './store.js';
import type {
  CreatePermissionInput,
  CreateRoleInput,
  InvalidationPolicy,
  OperationContext,
  Page,
  Permission,
  Role,
  UpdatePermissionInput,
  UpdateRoleInput,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Input Schemas
// ═══════════════════════════════════════════════════════════════════

const CreateRoleSchema = type({
  name: 'string',
  'description?': 'string',
  'status?': "'enabled' | 'disabled'",
});

const UpdateRoleSchema = type({
  'name?': 'string',
  'description?': 'string',
  'status?': "'enabled' | 'disabled'",
});

const CreatePermissionSchema = type({
  name: 'string',
  resource: 'string',
  action: 'string',
  'description?': 'string',
  'status?': "'enabled' | 'disabled'",
});

const UpdatePermissionSchema = type({
  'name?': 'string',
  'resource?': 'string',
  'action?': 'string',
  'description?': 'string',
  'status?': "'enabled' | 'disabled'",
});

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function assertTokens(resource: string, action: string): void {
  if (!isValidToken(resource) || !isValidToken(action)) {
    throw new AuthzError('InvalidPermissionFormat', { resource, action });
  }
}

function normalizePage(page: number, pageSize: number): [number, number] {
  const safePage = Number.isFinite(page) && page >= 1 ? Math.floor(page) : 1;
  const safeSize = Number.isFinite(pageSize) && pageSize >= 1
    ? Math.min(Math.floor(pageSize), MAX_PAGE_SIZE)
    : DEFAULT_PAGE_SIZE;
  return [safePage, safeSize];
}

// ═══════════════════════════════════════════════════════════════════
// Service
// ═══════════════════════════════════════════════════════════════════

export interface AuthorizationServiceOptions {
  cache?: Cache | null;
  executor?: Executor | null;
  /** Cached permission set lifetime in seconds (default: 3600) */
  ttlSeconds?: number;
  /** Default: 'ttl-only' */
  invalidation?: InvalidationPolicy;
  log?: Logger;
}

export class AuthorizationService {
  private readonly permissionCache: PermissionCache;
  private readonly log: Logger;
  readonly invalidation: InvalidationPolicy;

  constructor(
    private readonly store: EntityStore,
    options: AuthorizationServiceOptions = {},
  ) {
    this.log = options.log ?? createChildLogger({ metadata: { component: 'authorization' } });
    this.invalidation = options.invalidation ?? 'ttl-only';
    this.permissionCache = new PermissionCache(store, {
      cache: options.cache,
      executor: options.executor,
      ttlSeconds: options.ttlSeconds,
    });
  }

  /** Swap or remove the cache backend at runtime */
  setCache(cache: Cache | null): void {
    this.permissionCache.setCache(cache);
  }

  /** Swap or remove the background executor at runtime */
  setExecutor(executor: Executor | null): void {
    this.permissionCache.setExecutor(executor);
  }

  /** Cache coordinator, for diagnostics */
  get cache(): PermissionCache {
    return this.permissionCache;
  }

  // ─────────────────────────────────────────────────────────────────
  // Roles
  // ─────────────────────────────────────────────────────────────────

  async createRole(ctx: OperationContext, input: CreateRoleInput): Promise<Role> {
    const { name, description = '', status = 'enabled' } = validateInput(CreateRoleSchema(input));
    if (isBlank(name)) {
      throw new AuthzError('EmptyRoleName');
    }
    if (await this.store.getRoleByName(ctx, name)) {
      throw new AuthzError('RoleAlreadyExists', { name });
    }

    const role = await this.store.createRole(ctx, { name, description, status });
    this.log.info('Role created', { roleId: role.id, name });
    return role;
  }

  async getRole(ctx: OperationContext, id: number): Promise<Role> {
    const role = await this.getExistingRole(ctx, id);
    return { ...role, permissions: await this.store.getRolePermissions(ctx, role.id) };
  }

  async getRoleByName(ctx: OperationContext, name: string): Promise<Role> {
    const role = await this.store.getRoleByName(ctx, name);
    if (!role) {
      throw new AuthzError('RoleNotFound', { name });
    }
    return { ...role, permissions: await this.store.getRolePermissions(ctx, role.id) };
  }

  async listRoles(ctx: OperationContext, page = 1, pageSize = DEFAULT_PAGE_SIZE): Promise<Page<Role>> {
    return this.store.listRoles(ctx, ...normalizePage(page, pageSize));
  }

  /**
   * Partial update. Name uniqueness is only re-checked when the name changes.
   * Concurrent updates are last-writer-wins.
   */
  async updateRole(ctx: OperationContext, id: number, input: UpdateRoleInput): Promise<Role> {
    const changes = validateInput(UpdateRoleSchema(input));
    const current = await this.getExistingRole(ctx, id);

    if (changes.name !== undefined && changes.name !== current.name) {
      if (isBlank(changes.name)) {
        throw new AuthzError('EmptyRoleName');
      }
      if (await this.store.getRoleByName(ctx, changes.name)) {
        throw new AuthzError('RoleAlreadyExists', { name: changes.name });
      }
    }

    const updated: Role = {
      ...current,
      name: changes.name ?? current.name,
      description: changes.description ?? current.description,
      status: changes.status ?? current.status,
      updatedAt: new Date(),
    };
    if (!(await this.store.updateRole(ctx, updated))) {
      throw new AuthzError('RoleNotFound', { roleId: id });
    }
    this.log.info('Role updated', { roleId: id, fields: Object.keys(changes) });
    return updated;
  }

  async deleteRole(ctx: OperationContext, id: number): Promise<void> {
    const role = await this.getExistingRole(ctx, id);

    const holders = this.invalidation === 'fan-out' ? await this.store.getRoleUsers(ctx, id) : [];
    await this.store.deleteRole(ctx, id);
    this.log.info('Role deleted', { roleId: id, name: role.name });
    await this.permissionCache.invalidateUsers(holders);
  }

  // ─────────────────────────────────────────────────────────────────
  // Permissions
  // ─────────────────────────────────────────────────────────────────

  async createPermission(ctx: OperationContext, input: CreatePermissionInput): Promise<Permission> {
    const { name, resource, action, description = '', status = 'enabled' } =
      validateInput(CreatePermissionSchema(input));
    if (isBlank(name)) {
      throw new AuthzError('EmptyPermissionName');
    }
    assertTokens(resource, action);
    if (await this.store.getPermissionByName(ctx, name)) {
      throw new AuthzError('PermissionAlreadyExists', { name });
    }

    const permission = await this.store.createPermission(ctx, { name, resource, action, description, status });
    this.log.info('Permission created', { permissionId: permission.id, name, resource, action });
    return permission;
  }

  async getPermission(ctx: OperationContext, id: number): Promise<Permission> {
    const permission = await this.store.getPermissionById(ctx, validateId(id, 'permissionId'));
    if (!permission) {
      throw new AuthzError('PermissionNotFound', { permissionId: id });
    }
    return permission;
  }

  async listPermissions(ctx: OperationContext, page = 1, pageSize = DEFAULT_PAGE_SIZE): Promise<Page<Permission>> {
    return this.store.listPermissions(ctx, ...normalizePage(page, pageSize));
  }

  async updatePermission(ctx: OperationContext, id: number, input: UpdatePermissionInput): Promise<Permission> {
    const changes = validateInput(UpdatePermissionSchema(input));
    const current = await this.store.getPermissionById(ctx, validateId(id, 'permissionId'));
    if (!current) {
      throw new AuthzError('PermissionNotFound', { permissionId: id });
    }

    if (changes.name !== undefined && changes.name !== current.name) {
      if (isBlank(changes.name)) {
        throw new AuthzError('EmptyPermissionName');
      }
      if (await this.store.getPermissionByName(ctx, changes.name)) {
        throw new AuthzError('PermissionAlreadyExists', { name: changes.name });
      }
    }

    const updated: Permission = {
      ...current,
      name: changes.name ?? current.name,
      resource: changes.resource ?? current.resource,
      action: changes.action ?? current.action,
      description: changes.description ?? current.description,
      status: changes.status ?? current.status,
      updatedAt: new Date(),
    };
    assertTokens(updated.resource, updated.action);

    if (!(await this.store.updatePermission(ctx, updated))) {
      throw new AuthzError('PermissionNotFound', { permissionId: id });
    }
    this.log.info('Permission updated', { permissionId: id, fields: Object.keys(changes) });
    return updated;
  }

  async deletePermission(ctx: OperationContext, id: number): Promise<void> {
    const permission = await this.store.getPermissionById(ctx, validateId(id, 'permissionId'));
    if (!permission) {
      throw new AuthzError('PermissionNotFound', { permissionId: id });
    }
    await this.store.deletePermission(ctx, id);
    this.log.info('Permission deleted', { permissionId: id, name: permission.name });
  }

  // ─────────────────────────────────────────────────────────────────
  // User ↔ Role
  // ─────────────────────────────────────────────────────────────────

  async assignRole(ctx: OperationContext, userId: number, roleId: number): Promise<void> {
    await this.store.assignRoleToUser(ctx, validateId(userId, 'userId'), validateId(roleId, 'roleId'));
    this.log.info('Role assigned', { userId, roleId });
    await this.permissionCache.invalidateUser(userId);
  }

  /**
   * Assigns in order and stops at the first failure. The user's cache entry
   * is invalidated once if anything was assigned.
   */
  async assignRoles(ctx: OperationContext, userId: number, roleIds: readonly number[]): Promise<void> {
    validateId(userId, 'userId');
    let assigned = 0;

    try {
      for (const roleId of roleIds) {
        await this.store.assignRoleToUser(ctx, userId, validateId(roleId, 'roleId'));
        assigned++;
      }
    } finally {
      if (assigned > 0) {
        this.log.info('Roles assigned', { userId, roleIds: roleIds.slice(0, assigned) });
        await this.permissionCache.invalidateUser(userId);
      }
    }
  }

  /** Revoking a role the user does not hold succeeds */
  async revokeRole(ctx: OperationContext, userId: number, roleId: number): Promise<void> {
    await this.store.removeRoleFromUser(ctx, validateId(userId, 'userId'), validateId(roleId, 'roleId'));
    this.log.info('Role revoked', { userId, roleId });
    await this.permissionCache.invalidateUser(userId);
  }

  async getUserRoles(ctx: OperationContext, userId: number): Promise<Role[]> {
    return this.store.getUserRoles(ctx, validateId(userId, 'userId'));
  }

  async getRoleUsers(ctx: OperationContext, roleId: number): Promise<number[]> {
    await this.getExistingRole(ctx, roleId);
    return this.store.getRoleUsers(ctx, roleId);
  }

  // ─────────────────────────────────────────────────────────────────
  // Role ↔ Permission
  // ─────────────────────────────────────────────────────────────────

  async assignPermission(ctx: OperationContext, roleId: number, permissionId: number): Promise<void> {
    await this.store.assignPermissionToRole(ctx, validateId(roleId, 'roleId'), validateId(permissionId, 'permissionId'));
    this.log.info('Permission assigned', { roleId, permissionId });
    await this.invalidateRoleHolders(ctx, roleId);
  }

  async revokePermission(ctx: OperationContext, roleId: number, permissionId: number): Promise<void> {
    await this.store.removePermissionFromRole(ctx, validateId(roleId, 'roleId'), validateId(permissionId, 'permissionId'));
    this.log.info('Permission revoked', { roleId, permissionId });
    await this.invalidateRoleHolders(ctx, roleId);
  }

  async getRolePermissions(ctx: OperationContext, roleId: number): Promise<Permission[]> {
    await this.getExistingRole(ctx, roleId);
    return this.store.getRolePermissions(ctx, roleId);
  }

  // ─────────────────────────────────────────────────────────────────
  // Checks
  // ─────────────────────────────────────────────────────────────────

  /**
   * Denial is `false`, never an error. Store failures on a cache miss
   * propagate.
   */
  async checkPermission(ctx: OperationContext, userId: number, resource: string, action: string): Promise<boolean> {
    return this.permissionCache.checkPermission(ctx, validateId(userId, 'userId'), resource, action);
  }

  /**
   * Same as checkPermission, but a denial throws PermissionDenied
   */
  async requirePermission(ctx: OperationContext, userId: number, resource: string, action: string): Promise<void> {
    if (!(await this.checkPermission(ctx, userId, resource, action))) {
      throw new AuthzError('PermissionDenied', { userId, resource, action });
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private async getExistingRole(ctx: OperationContext, roleId: number): Promise<Role> {
    const role = await this.store.getRoleById(ctx, validateId(roleId, 'roleId'));
    if (!role) {
      throw new AuthzError('RoleNotFound', { roleId });
    }
    return role;
  }

  private async invalidateRoleHolders(ctx: OperationContext, roleId: number): Promise<void> {
    if (this.invalidation !== 'fan-out') return;
    await this.permissionCache.invalidateUsers(await this.store.getRoleUsers(ctx, roleId));
  }
}
