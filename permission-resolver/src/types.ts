/**
 * permission-resolver - Type Definitions
 */

/**
 * A requested (resource, action) pair, e.g. `{ resource: 'posts', action: 'write' }`
 */
export interface PermissionRequest {
  resource: string;
  action: string;
}

/**
 * Anything carrying a resource/action pair (stored permission rows included)
 */
export type PermissionLike = Readonly<PermissionRequest>;

/**
 * Parsed canonical permission string
 */
export interface ParsedPermission {
  resource: string;
  action: string;
  /** Original string */
  original: string;
  /** Exactly one separator and two valid tokens */
  valid: boolean;
}

/**
 * Effective permission set as handed to the resolver.
 * Arrays come from storage or the cache, sets from `createPermissionChecker`.
 */
export type PermissionSetInput = readonly string[] | ReadonlySet<string>;

export type PermissionChecker = (resource: string, action: string) => boolean;
