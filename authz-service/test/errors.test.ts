/**
 * Errors - Test Suite
 */

import { describe, it, expect } from 'vitest';
import { AuthzError, isAuthzError, getErrorMessage, normalizeError } from '../src/common/errors.js';
import { AUTHZ_ERRORS, AUTHZ_ERROR_CODES, ERROR_KINDS } from '../src/common/error-codes.js';

describe('AuthzError', () => {
  it('should carry code, kind and details', () => {
    const error = new AuthzError('RoleNotFound', { roleId: 7 });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AuthzError');
    expect(error.message).toBe('RoleNotFound');
    expect(error.code).toBe(AUTHZ_ERRORS.RoleNotFound);
    expect(error.kind).toBe('NotFound');
    expect(error.details).toEqual({ roleId: 7 });
  });

  it('should default details to an empty object', () => {
    expect(new AuthzError('EmptyRoleName').details).toEqual({});
  });

  it('should map every code to a kind', () => {
    for (const code of AUTHZ_ERROR_CODES) {
      expect(ERROR_KINDS[code]).toBeDefined();
    }
    expect(ERROR_KINDS.PermissionAlreadyExists).toBe('AlreadyExists');
    expect(ERROR_KINDS.InvalidPermissionFormat).toBe('InvalidFormat');
    expect(ERROR_KINDS.PermissionDisabled).toBe('Disabled');
    expect(ERROR_KINDS.PermissionDenied).toBe('PermissionDenied');
  });
});

describe('isAuthzError', () => {
  it('should narrow by class and optional kind', () => {
    const error: unknown = new AuthzError('PermissionNotFound');

    expect(isAuthzError(error)).toBe(true);
    expect(isAuthzError(error, 'NotFound')).toBe(true);
    expect(isAuthzError(error, 'AlreadyExists')).toBe(false);
    expect(isAuthzError(new Error('PermissionNotFound'))).toBe(false);
  });
});

describe('getErrorMessage', () => {
  it('should read messages from any thrown value', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage({ message: 'shaped' })).toBe('shaped');
    expect(getErrorMessage(42)).toBe('42');
  });
});

describe('normalizeError', () => {
  it('should include the code for authorization errors', () => {
    const normalized = normalizeError(new AuthzError('RoleDisabled'));
    expect(normalized).toMatchObject({ message: 'RoleDisabled', code: 'RoleDisabled' });
    expect(normalized.stack).toBeDefined();
  });

  it('should keep only the message for non-errors', () => {
    expect(normalizeError('oops')).toEqual({ message: 'oops' });
  });
});
