/**
 * permission-resolver - Canonical Permission Strings
 *
 * Format: resource:action
 * Examples:
 *   - posts:write   - Write posts
 *   - posts:*       - Every action on posts
 *   - *:*           - Super admin
 */

import type { ParsedPermission, PermissionLike } from './types.js';

export const WILDCARD = '*';
export const SEPARATOR = ':';
export const ALL_PERMISSIONS = `${WILDCARD}${SEPARATOR}${WILDCARD}`;

/**
 * A resource or action token: non-empty, no separator, no whitespace
 */
export function isValidToken(token: string): boolean {
  return token.length > 0 && !token.includes(SEPARATOR) && !/\s/.test(token);
}

/**
 * Build the canonical string
 *
 * @example
 * toPermissionString('posts', 'write')                      // 'posts:write'
 * toPermissionString({ resource: 'posts', action: '*' })    // 'posts:*'
 */
export function toPermissionString(resourceOrPermission: string | PermissionLike, action?: string): string {
  if (typeof resourceOrPermission === 'object') {
    return `${resourceOrPermission.resource}${SEPARATOR}${resourceOrPermission.action}`;
  }
  return `${resourceOrPermission}${SEPARATOR}${action ?? ''}`;
}

/**
 * Parse a canonical string into its tokens
 *
 * @example
 * parsePermissionString('posts:write')
 * // { resource: 'posts', action: 'write', original: 'posts:write', valid: true }
 */
export function parsePermissionString(value: string): ParsedPermission {
  const parts = value.split(SEPARATOR);

  if (parts.length !== 2) {
    return {
      resource: parts[0] ?? '',
      action: parts[1] ?? '',
      original: value,
      valid: false,
    };
  }

  const [resource, action] = parts;
  return {
    resource,
    action,
    original: value,
    valid: isValidToken(resource) && isValidToken(action),
  };
}

/**
 * Serialize stored permissions into the ordered, de-duplicated list
 * that is cached per user. First occurrence wins the position.
 */
export function toPermissionSet(permissions: Iterable<PermissionLike>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const permission of permissions) {
    const value = toPermissionString(permission);
    if (!seen.has(value)) {
      seen.add(value);
      result.push(value);
    }
  }

  return result;
}
