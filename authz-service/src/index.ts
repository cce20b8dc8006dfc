/**
 * authz-service
 *
 * RBAC authorization: role/permission management over MongoDB and a
 * read-through permission cache (Redis or in-process).
 *
 * @packageDocumentation
 */

// ═══════════════════════════════════════════════════════════════════
// Access
// ═══════════════════════════════════════════════════════════════════

export {
  AuthorizationService,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  type AuthorizationServiceOptions,
} from './access/authorization-service.js';

export {
  PermissionCache,
  permissionCacheKey,
  CACHE_KEY_PREFIX,
  CACHE_TTL_SECONDS,
  CACHE_POOL,
  type PermissionCacheOptions,
} from './access/permission-cache.js';

export { MongoEntityStore, COLLECTIONS, checkpoint, type EntityStore } from './access/store.js';

export {
  ENTITY_STATUSES,
  INVALIDATION_POLICIES,
  type EntityStatus,
  type Role,
  type Permission,
  type UserRoleAssignment,
  type RolePermissionGrant,
  type CreateRoleInput,
  type UpdateRoleInput,
  type CreatePermissionInput,
  type UpdatePermissionInput,
  type NewRole,
  type NewPermission,
  type Page,
  type OperationContext,
  type InvalidationPolicy,
} from './access/types.js';

// ═══════════════════════════════════════════════════════════════════
// Cache Backends
// ═══════════════════════════════════════════════════════════════════

export type { Cache } from './databases/cache.js';
export { MemoryCache, type MemoryCacheOptions } from './databases/memory-cache.js';
export { RedisCache, type RedisCommands } from './databases/redis-cache.js';
export { connectRedis, getRedis, closeRedis, type RedisClient, type RedisConfig } from './databases/redis.js';
export { connectDatabase, getDatabase, closeDatabase, type MongoConfig } from './databases/mongodb.js';

// ═══════════════════════════════════════════════════════════════════
// Common
// ═══════════════════════════════════════════════════════════════════

export {
  TaskExecutor,
  TaskRejectedError,
  type Executor,
  type Task,
  type PoolOptions,
  type PoolStats,
  type RejectionReason,
} from './common/executor.js';

export { AuthzError, isAuthzError, getErrorMessage, normalizeError } from './common/errors.js';
export {
  AUTHZ_ERRORS,
  AUTHZ_ERROR_CODES,
  ERROR_KINDS,
  type AuthzErrorCode,
  type AuthzErrorKind,
} from './common/error-codes.js';

export {
  logger,
  configureLogger,
  setLogLevel,
  createChildLogger,
  subscribeToLogs,
  type Logger,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LogSubscriber,
  type LoggerConfig,
} from './common/logger.js';

export { validateInput, validateId } from './common/validation.js';

// ═══════════════════════════════════════════════════════════════════
// Configuration & Bootstrap
// ═══════════════════════════════════════════════════════════════════

export {
  loadConfig,
  redactConfig,
  ConfigValidationError,
  ENV_BINDINGS,
  type AuthzConfig,
  type LoadConfigOptions,
} from './config.js';
export { AUTHZ_CONFIG_DEFAULTS, type ConfigSection, type ConfigDefault } from './config-defaults.js';
export { createAuthorization, type Authorization, type AuthorizationDependencies } from './bootstrap.js';
