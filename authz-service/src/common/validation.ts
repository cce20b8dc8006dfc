/**
 * Validation Utilities
 *
 * arktype schemas return either the value or an errors object; these helpers
 * turn the errors into an AuthzError.
 */

import { type } from 'arktype';
import { AuthzError } from './errors.js';
import type { AuthzErrorCode } from './error-codes.js';

type ValidationErrors = InstanceType<typeof type.errors>;

/**
 * Unwrap a schema result or throw
 *
 * @example
 * ```typescript
 * const schema = type({ name: 'string' });
 * const input = validateInput(schema(raw));
 * ```
 */
export function validateInput<T>(
  schemaResult: T | ValidationErrors,
  code: AuthzErrorCode = 'InvalidInput',
): T {
  if (schemaResult instanceof type.errors) {
    throw new AuthzError(code, { problems: schemaResult.summary });
  }
  return schemaResult;
}

/**
 * Ids are positive safe integers
 */
export function validateId(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new AuthzError('InvalidInput', { [field]: value, problems: `${field} must be a positive integer` });
  }
  return value;
}
