/**
 * permission-resolver
 *
 * Flat RBAC permission resolution over canonical `resource:action` strings.
 * Pure functions, no I/O.
 *
 * @example
 * ```typescript
 * import { allows, toPermissionSet } from 'permission-resolver';
 *
 * const granted = toPermissionSet([{ resource: 'posts', action: '*' }]);
 * allows(granted, { resource: 'posts', action: 'delete' }); // true
 * allows(granted, { resource: 'users', action: 'read' });   // false
 * ```
 *
 * @packageDocumentation
 */

export type {
  PermissionRequest,
  PermissionLike,
  ParsedPermission,
  PermissionSetInput,
  PermissionChecker,
} from './types.js';

export {
  WILDCARD,
  SEPARATOR,
  ALL_PERMISSIONS,
  isValidToken,
  toPermissionString,
  parsePermissionString,
  toPermissionSet,
} from './permission.js';

export {
  allows,
  matchedBy,
  grantingPermissions,
  createPermissionChecker,
} from './resolver.js';
