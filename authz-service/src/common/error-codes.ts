/**
 * Authorization Error Codes
 *
 * Each code belongs to one kind; callers branch on the kind,
 * clients and logs carry the code.
 */

// ═══════════════════════════════════════════════════════════════════
// Codes
// ═══════════════════════════════════════════════════════════════════

export const AUTHZ_ERRORS = {
  // Role
  RoleNotFound: 'RoleNotFound',
  RoleAlreadyExists: 'RoleAlreadyExists',
  RoleDisabled: 'RoleDisabled',
  EmptyRoleName: 'EmptyRoleName',

  // Permission
  PermissionNotFound: 'PermissionNotFound',
  PermissionAlreadyExists: 'PermissionAlreadyExists',
  PermissionDisabled: 'PermissionDisabled',
  EmptyPermissionName: 'EmptyPermissionName',
  InvalidPermissionFormat: 'InvalidPermissionFormat',

  // User
  UserNotFound: 'UserNotFound',

  // Input
  InvalidInput: 'InvalidInput',

  // Check
  PermissionDenied: 'PermissionDenied',
} as const;

export type AuthzErrorCode = typeof AUTHZ_ERRORS[keyof typeof AUTHZ_ERRORS];

export const AUTHZ_ERROR_CODES = Object.values(AUTHZ_ERRORS);

// ═══════════════════════════════════════════════════════════════════
// Kinds
// ═══════════════════════════════════════════════════════════════════

export type AuthzErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'InvalidFormat'
  | 'Disabled'
  | 'PermissionDenied';

export const ERROR_KINDS: Record<AuthzErrorCode, AuthzErrorKind> = {
  RoleNotFound: 'NotFound',
  PermissionNotFound: 'NotFound',
  UserNotFound: 'NotFound',
  RoleAlreadyExists: 'AlreadyExists',
  PermissionAlreadyExists: 'AlreadyExists',
  EmptyRoleName: 'InvalidFormat',
  EmptyPermissionName: 'InvalidFormat',
  InvalidPermissionFormat: 'InvalidFormat',
  InvalidInput: 'InvalidFormat',
  RoleDisabled: 'Disabled',
  PermissionDisabled: 'Disabled',
  PermissionDenied: 'PermissionDenied',
};
