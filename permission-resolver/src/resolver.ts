/**
 * permission-resolver - Resolver
 *
 * Decides allow/deny for a (resource, action) request against a user's
 * effective permission set. A request is granted by exactly three entries:
 *
 *   resource:action   exact match
 *   resource:*        every action on the resource
 *   *:*               everything
 *
 * `*:action` is not a grant.
 */

import type { PermissionChecker, PermissionRequest, PermissionSetInput } from './types.js';
import { ALL_PERMISSIONS, WILDCARD, toPermissionString } from './permission.js';

function asSet(permissions: PermissionSetInput): ReadonlySet<string> {
  return permissions instanceof Set ? permissions : new Set(permissions);
}

/**
 * The three entries that would grant the request, most specific first
 */
export function grantingPermissions(request: PermissionRequest): [string, string, string] {
  return [
    toPermissionString(request.resource, request.action),
    toPermissionString(request.resource, WILDCARD),
    ALL_PERMISSIONS,
  ];
}

/**
 * Check a request against an effective permission set
 *
 * @example
 * allows(['posts:*'], { resource: 'posts', action: 'delete' }) // true
 * allows(['*:read'], { resource: 'users', action: 'read' })    // false
 */
export function allows(permissions: PermissionSetInput, request: PermissionRequest): boolean {
  const set = asSet(permissions);
  return grantingPermissions(request).some(candidate => set.has(candidate));
}

/**
 * Which entry granted the request, or null when denied
 */
export function matchedBy(permissions: PermissionSetInput, request: PermissionRequest): string | null {
  const set = asSet(permissions);
  return grantingPermissions(request).find(candidate => set.has(candidate)) ?? null;
}

/**
 * Build the set once, check many requests
 *
 * @example
 * const can = createPermissionChecker(['posts:write']);
 * can('posts', 'write'); // true
 */
export function createPermissionChecker(permissions: PermissionSetInput): PermissionChecker {
  const set = new Set(permissions);
  return (resource, action) => allows(set, { resource, action });
}
