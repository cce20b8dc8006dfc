/**
 * Entity Store
 *
 * Persistence for roles, permissions and the two relations between them and
 * users. The service only talks to the `EntityStore` interface; MongoDB is the
 * shipped implementation.
 */

// External packages
import { MongoServerError, type Collection, type Db, type Document } from 'mongodb';

// Internal imports
import { AuthzError } from '../common/errors.js';
import { createChildLogger } from '../common/logger.js';
import type {
  EntityStatus,
  NewPermission,
  NewRole,
  OperationContext,
  Page,
  Permission,
  Role,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════
// Contract
// ═══════════════════════════════════════════════════════════════════

/**
 * Getters return null for absent or tombstoned rows. Every call checks
 * `ctx.signal` before touching storage.
 */
export interface EntityStore {
  // Roles
  createRole(ctx: OperationContext, role: NewRole): Promise<Role>;
  getRoleById(ctx: OperationContext, id: number): Promise<Role | null>;
  getRoleByName(ctx: OperationContext, name: string): Promise<Role | null>;
  listRoles(ctx: OperationContext, page: number, pageSize: number): Promise<Page<Role>>;
  /** Writes name, description, status and updatedAt of the given row */
  updateRole(ctx: OperationContext, role: Role): Promise<boolean>;
  deleteRole(ctx: OperationContext, id: number): Promise<boolean>;

  // Permissions
  createPermission(ctx: OperationContext, permission: NewPermission): Promise<Permission>;
  getPermissionById(ctx: OperationContext, id: number): Promise<Permission | null>;
  getPermissionByName(ctx: OperationContext, name: string): Promise<Permission | null>;
  listPermissions(ctx: OperationContext, page: number, pageSize: number): Promise<Page<Permission>>;
  updatePermission(ctx: OperationContext, permission: Permission): Promise<boolean>;
  deletePermission(ctx: OperationContext, id: number): Promise<boolean>;

  // User ↔ Role
  /** Throws RoleNotFound for a missing role; an existing pair is a no-op */
  assignRoleToUser(ctx: OperationContext, userId: number, roleId: number): Promise<void>;
  /** Removing an absent pair succeeds */
  removeRoleFromUser(ctx: OperationContext, userId: number, roleId: number): Promise<void>;
  getUserRoles(ctx: OperationContext, userId: number): Promise<Role[]>;
  /**
   * Enabled, non-deleted permissions reachable through the user's
   * non-deleted roles, distinct. Role status is not considered.
   */
  getUserPermissions(ctx: OperationContext, userId: number): Promise<Permission[]>;

  // Role ↔ Permission
  /** Throws RoleNotFound / PermissionNotFound; an existing pair is a no-op */
  assignPermissionToRole(ctx: OperationContext, roleId: number, permissionId: number): Promise<void>;
  removePermissionFromRole(ctx: OperationContext, roleId: number, permissionId: number): Promise<void>;
  getRolePermissions(ctx: OperationContext, roleId: number): Promise<Permission[]>;
  getRoleUsers(ctx: OperationContext, roleId: number): Promise<number[]>;

  /** Exact (resource, action) existence through the join; wildcards are not expanded */
  userHasPermission(ctx: OperationContext, userId: number, resource: string, action: string): Promise<boolean>;
}

/**
 * Throws the signal's reason (an AbortError by default) once cancelled
 */
export function checkpoint(ctx: OperationContext): void {
  ctx.signal?.throwIfAborted();
}

// ═══════════════════════════════════════════════════════════════════
// MongoDB Documents
// ═══════════════════════════════════════════════════════════════════

export const COLLECTIONS = {
  roles: 'rbac_roles',
  permissions: 'rbac_permissions',
  userRoles: 'rbac_user_roles',
  rolePermissions: 'rbac_role_permissions',
  counters: 'rbac_counters',
} as const;

interface BaseDocument {
  _id: number;
  name: string;
  description: string;
  status: EntityStatus;
  deleted: boolean;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

type RoleDocument = BaseDocument;

interface PermissionDocument extends BaseDocument {
  resource: string;
  action: string;
}

interface UserRoleDocument {
  userId: number;
  roleId: number;
  createdAt: Date;
}

interface RolePermissionDocument {
  roleId: number;
  permissionId: number;
  createdAt: Date;
}

interface CounterDocument {
  _id: string;
  seq: number;
}

function toRole({ _id, name, description, status, createdAt, updatedAt, deletedAt }: RoleDocument): Role {
  return { id: _id, name, description, status, createdAt, updatedAt, deletedAt };
}

function toPermission(doc: PermissionDocument): Permission {
  const { _id, name, resource, action, description, status, createdAt, updatedAt, deletedAt } = doc;
  return { id: _id, name, resource, action, description, status, createdAt, updatedAt, deletedAt };
}

function isDuplicateKey(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === 11000;
}

// ═══════════════════════════════════════════════════════════════════
// MongoDB Store
// ═══════════════════════════════════════════════════════════════════

export class MongoEntityStore implements EntityStore {
  private readonly log = createChildLogger({ metadata: { component: 'entity-store' } });

  private readonly roles: Collection<RoleDocument>;
  private readonly permissions: Collection<PermissionDocument>;
  private readonly userRoles: Collection<UserRoleDocument>;
  private readonly rolePermissions: Collection<RolePermissionDocument>;
  private readonly counters: Collection<CounterDocument>;

  constructor(db: Db) {
    this.roles = db.collection<RoleDocument>(COLLECTIONS.roles);
    this.permissions = db.collection<PermissionDocument>(COLLECTIONS.permissions);
    this.userRoles = db.collection<UserRoleDocument>(COLLECTIONS.userRoles);
    this.rolePermissions = db.collection<RolePermissionDocument>(COLLECTIONS.rolePermissions);
    this.counters = db.collection<CounterDocument>(COLLECTIONS.counters);
  }

  /**
   * Create indexes. Safe to call on every start.
   */
  async initialize(): Promise<void> {
    const liveOnly = { partialFilterExpression: { deleted: false } };

    await Promise.all([
      this.roles.createIndex({ name: 1 }, { unique: true, ...liveOnly }),
      this.permissions.createIndex({ name: 1 }, { unique: true, ...liveOnly }),
      this.userRoles.createIndex({ userId: 1, roleId: 1 }, { unique: true }),
      this.userRoles.createIndex({ roleId: 1 }),
      this.rolePermissions.createIndex({ roleId: 1, permissionId: 1 }, { unique: true }),
      this.rolePermissions.createIndex({ permissionId: 1 }),
    ]);

    this.log.debug('Entity store indexes ensured');
  }

  // ─────────────────────────────────────────────────────────────────
  // Ids
  // ─────────────────────────────────────────────────────────────────

  private async nextId(sequence: 'roles' | 'permissions'): Promise<number> {
    const counter = await this.counters.findOneAndUpdate(
      { _id: sequence },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: 'after' },
    );
    if (!counter) {
      throw new Error(`Counter "${sequence}" was not returned after upsert`);
    }
    return counter.seq;
  }

  // ─────────────────────────────────────────────────────────────────
  // Role Operations
  // ─────────────────────────────────────────────────────────────────

  async createRole(ctx: OperationContext, role: NewRole): Promise<Role> {
    checkpoint(ctx);
    const now = new Date();
    const doc: RoleDocument = {
      _id: await this.nextId('roles'),
      ...role,
      deleted: false,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    };

    try {
      await this.roles.insertOne(doc);
    } catch (error) {
      if (isDuplicateKey(error)) throw new AuthzError('RoleAlreadyExists', { name: role.name });
      throw error;
    }
    return toRole(doc);
  }

  async getRoleById(ctx: OperationContext, id: number): Promise<Role | null> {
    checkpoint(ctx);
    const doc = await this.roles.findOne({ _id: id, deleted: false });
    return doc ? toRole(doc) : null;
  }

  async getRoleByName(ctx: OperationContext, name: string): Promise<Role | null> {
    checkpoint(ctx);
    const doc = await this.roles.findOne({ name, deleted: false });
    return doc ? toRole(doc) : null;
  }

  async listRoles(ctx: OperationContext, page: number, pageSize: number): Promise<Page<Role>> {
    checkpoint(ctx);
    const [docs, total] = await Promise.all([
      this.roles.find({ deleted: false }).sort({ _id: 1 }).skip((page - 1) * pageSize).limit(pageSize).toArray(),
      this.roles.countDocuments({ deleted: false }),
    ]);
    return { items: docs.map(toRole), total };
  }

  async updateRole(ctx: OperationContext, role: Role): Promise<boolean> {
    checkpoint(ctx);
    try {
      const result = await this.roles.updateOne(
        { _id: role.id, deleted: false },
        { $set: { name: role.name, description: role.description, status: role.status, updatedAt: role.updatedAt } },
      );
      return result.matchedCount > 0;
    } catch (error) {
      if (isDuplicateKey(error)) throw new AuthzError('RoleAlreadyExists', { name: role.name });
      throw error;
    }
  }

  async deleteRole(ctx: OperationContext, id: number): Promise<boolean> {
    checkpoint(ctx);
    const now = new Date();
    const result = await this.roles.updateOne(
      { _id: id, deleted: false },
      { $set: { deleted: true, deletedAt: now, updatedAt: now } },
    );
    return result.modifiedCount > 0;
  }

  // ─────────────────────────────────────────────────────────────────
  // Permission Operations
  // ─────────────────────────────────────────────────────────────────

  async createPermission(ctx: OperationContext, permission: NewPermission): Promise<Permission> {
    checkpoint(ctx);
    const now = new Date();
    const doc: PermissionDocument = {
      _id: await this.nextId('permissions'),
      ...permission,
      deleted: false,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    };

    try {
      await this.permissions.insertOne(doc);
    } catch (error) {
      if (isDuplicateKey(error)) throw new AuthzError('PermissionAlreadyExists', { name: permission.name });
      throw error;
    }
    return toPermission(doc);
  }

  async getPermissionById(ctx: OperationContext, id: number): Promise<Permission | null> {
    checkpoint(ctx);
    const doc = await this.permissions.findOne({ _id: id, deleted: false });
    return doc ? toPermission(doc) : null;
  }

  async getPermissionByName(ctx: OperationContext, name: string): Promise<Permission | null> {
    checkpoint(ctx);
    const doc = await this.permissions.findOne({ name, deleted: false });
    return doc ? toPermission(doc) : null;
  }

  async listPermissions(ctx: OperationContext, page: number, pageSize: number): Promise<Page<Permission>> {
    checkpoint(ctx);
    const [docs, total] = await Promise.all([
      this.permissions.find({ deleted: false }).sort({ _id: 1 }).skip((page - 1) * pageSize).limit(pageSize).toArray(),
      this.permissions.countDocuments({ deleted: false }),
    ]);
    return { items: docs.map(toPermission), total };
  }

  async updatePermission(ctx: OperationContext, permission: Permission): Promise<boolean> {
    checkpoint(ctx);
    const { id, name, resource, action, description, status, updatedAt } = permission;
    try {
      const result = await this.permissions.updateOne(
        { _id: id, deleted: false },
        { $set: { name, resource, action, description, status, updatedAt } },
      );
      return result.matchedCount > 0;
    } catch (error) {
      if (isDuplicateKey(error)) throw new AuthzError('PermissionAlreadyExists', { name });
      throw error;
    }
  }

  async deletePermission(ctx: OperationContext, id: number): Promise<boolean> {
    checkpoint(ctx);
    const now = new Date();
    const result = await this.permissions.updateOne(
      { _id: id, deleted: false },
      { $set: { deleted: true, deletedAt: now, updatedAt: now } },
    );
    return result.modifiedCount > 0;
  }

  // ─────────────────────────────────────────────────────────────────
  // User ↔ Role
  // ─────────────────────────────────────────────────────────────────

  async assignRoleToUser(ctx: OperationContext, userId: number, roleId: number): Promise<void> {
    if (!(await this.getRoleById(ctx, roleId))) {
      throw new AuthzError('RoleNotFound', { roleId });
    }
    checkpoint(ctx);
    await this.userRoles.updateOne(
      { userId, roleId },
      { $setOnInsert: { userId, roleId, createdAt: new Date() } },
      { upsert: true },
    );
  }

  async removeRoleFromUser(ctx: OperationContext, userId: number, roleId: number): Promise<void> {
    checkpoint(ctx);
    await this.userRoles.deleteOne({ userId, roleId });
  }

  async getUserRoles(ctx: OperationContext, userId: number): Promise<Role[]> {
    checkpoint(ctx);
    const docs = await this.userRoles
      .aggregate<RoleDocument>([
        { $match: { userId } },
        { $lookup: { from: COLLECTIONS.roles, localField: 'roleId', foreignField: '_id', as: 'role' } },
        { $unwind: '$role' },
        { $match: { 'role.deleted': false } },
        { $replaceRoot: { newRoot: '$role' } },
        { $sort: { _id: 1 } },
      ])
      .toArray();
    return docs.map(toRole);
  }

  async getUserPermissions(ctx: OperationContext, userId: number): Promise<Permission[]> {
    checkpoint(ctx);
    const docs = await this.userRoles.aggregate<PermissionDocument>(userPermissionsPipeline(userId)).toArray();
    return docs.map(toPermission);
  }

  // ─────────────────────────────────────────────────────────────────
  // Role ↔ Permission
  // ─────────────────────────────────────────────────────────────────

  async assignPermissionToRole(ctx: OperationContext, roleId: number, permissionId: number): Promise<void> {
    if (!(await this.getRoleById(ctx, roleId))) {
      throw new AuthzError('RoleNotFound', { roleId });
    }
    if (!(await this.getPermissionById(ctx, permissionId))) {
      throw new AuthzError('PermissionNotFound', { permissionId });
    }
    checkpoint(ctx);
    await this.rolePermissions.updateOne(
      { roleId, permissionId },
      { $setOnInsert: { roleId, permissionId, createdAt: new Date() } },
      { upsert: true },
    );
  }

  async removePermissionFromRole(ctx: OperationContext, roleId: number, permissionId: number): Promise<void> {
    checkpoint(ctx);
    await this.rolePermissions.deleteOne({ roleId, permissionId });
  }

  async getRolePermissions(ctx: OperationContext, roleId: number): Promise<Permission[]> {
    checkpoint(ctx);
    const docs = await this.rolePermissions
      .aggregate<PermissionDocument>([
        { $match: { roleId } },
        { $lookup: { from: COLLECTIONS.permissions, localField: 'permissionId', foreignField: '_id', as: 'permission' } },
        { $unwind: '$permission' },
        { $match: { 'permission.deleted': false } },
        { $replaceRoot: { newRoot: '$permission' } },
        { $sort: { _id: 1 } },
      ])
      .toArray();
    return docs.map(toPermission);
  }

  async getRoleUsers(ctx: OperationContext, roleId: number): Promise<number[]> {
    checkpoint(ctx);
    const docs = await this.userRoles.find({ roleId }).sort({ userId: 1 }).toArray();
    return docs.map(({ userId }) => userId);
  }

  async userHasPermission(ctx: OperationContext, userId: number, resource: string, action: string): Promise<boolean> {
    checkpoint(ctx);
    const match = await this.userRoles
      .aggregate([
        ...userPermissionsPipeline(userId),
        { $match: { resource, action } },
        { $limit: 1 },
      ])
      .toArray();
    return match.length > 0;
  }
}

/**
 * user_roles → roles → role_permissions → permissions, live rows only,
 * one document per distinct permission ordered by id
 */
function userPermissionsPipeline(userId: number): Document[] {
  return [
    { $match: { userId } },
    { $lookup: { from: COLLECTIONS.roles, localField: 'roleId', foreignField: '_id', as: 'role' } },
    { $unwind: '$role' },
    { $match: { 'role.deleted': false } },
    { $lookup: { from: COLLECTIONS.rolePermissions, localField: 'roleId', foreignField: 'roleId', as: 'grant' } },
    { $unwind: '$grant' },
    { $lookup: { from: COLLECTIONS.permissions, localField: 'grant.permissionId', foreignField: '_id', as: 'permission' } },
    { $unwind: '$permission' },
    { $match: { 'permission.deleted': false, 'permission.status': 'enabled' } },
    { $group: { _id: '$permission._id', permission: { $first: '$permission' } } },
    { $replaceRoot: { newRoot: '$permission' } },
    { $sort: { _id: 1 } },
  ];
}
