/**
 * Error Handling Utilities
 *
 * - Generic error utilities (getErrorMessage, normalizeError)
 * - AuthzError, the typed error every authorization operation throws
 */

import { ERROR_KINDS, type AuthzErrorCode, type AuthzErrorKind } from './error-codes.js';

// ═══════════════════════════════════════════════════════════════════
// Generic Error Utilities
// ═══════════════════════════════════════════════════════════════════

/**
 * Extract error message from any error type
 *
 * @example
 * ```typescript
 * try {
 *   await store.getUserPermissions(ctx, userId);
 * } catch (error) {
 *   log.error('Permission lookup failed', { error: getErrorMessage(error) });
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Create a standardized error object from any error type
 */
export function normalizeError(error: unknown): { message: string; code?: string; stack?: string } {
  if (error instanceof AuthzError) {
    return { message: error.message, code: error.code, stack: error.stack };
  }
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: getErrorMessage(error) };
}

// ═══════════════════════════════════════════════════════════════════
// Authorization Errors
// ═══════════════════════════════════════════════════════════════════

/**
 * Typed authorization error. The message is the code; context lives in
 * `details`.
 *
 * @example
 * ```typescript
 * if (!role) {
 *   throw new AuthzError('RoleNotFound', { roleId: id });
 * }
 * ```
 */
export class AuthzError extends Error {
  readonly code: AuthzErrorCode;
  readonly kind: AuthzErrorKind;
  readonly details: Record<string, unknown>;

  constructor(code: AuthzErrorCode, details: Record<string, unknown> = {}) {
    super(code);
    this.name = 'AuthzError';
    this.code = code;
    this.kind = ERROR_KINDS[code];
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthzError);
    }
  }
}

/**
 * Narrow an unknown error to AuthzError, optionally of one kind
 *
 * @example
 * ```typescript
 * if (isAuthzError(error, 'NotFound')) return null;
 * ```
 */
export function isAuthzError(error: unknown, kind?: AuthzErrorKind): error is AuthzError {
  return error instanceof AuthzError && (kind === undefined || error.kind === kind);
}
