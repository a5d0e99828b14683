/**
 * @fileoverview Type Guards and Runtime Validation Utilities
 *
 * Narrowing helpers for data that crosses a trust boundary: LLM output,
 * HTTP bodies, JSON files on disk and entity maps produced by either
 * recognition engine.
 */

/**
 * Type guard for checking if a value is a string
 */
export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Type guard for checking if a value is a non-empty (after trimming) string
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Type guard for checking if a value is a finite number
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

/**
 * Type guard for checking if a value is a plain mapping (not null, not an array)
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function isErrorWithCode(error: unknown): error is { code: string } {
  return isObject(error) && isString(error.code);
}

/**
 * Node system errors carry `code` and sometimes `path`; `ENOENT` is the one
 * the launchers and file tools branch on.
 */
export function isNodeSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && isErrorWithCode(error);
}

export function isValidLogLevel(value: unknown): value is 'ERROR' | 'WARN' | 'INFO' | 'DEBUG' | 'TRACE' {
  return isString(value) && ['ERROR', 'WARN', 'INFO', 'DEBUG', 'TRACE'].includes(value);
}

/**
 * Coerce an entity value into a number.
 * Accepts numbers and numeric strings; anything else yields undefined.
 */
export function toNumber(value: unknown): number | undefined {
  if (isNumber(value)) {
    return value;
  }
  if (isString(value) && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Coerce an entity value into an integer, truncating toward zero.
 */
export function toInteger(value: unknown): number | undefined {
  const parsed = toNumber(value);
  return parsed === undefined ? undefined : Math.trunc(parsed);
}

/**
 * Validate that the listed fields are present and non-null on an object.
 * Returns the missing field names in declaration order.
 */
export function findMissingFields(
  obj: Record<string, unknown>,
  requiredFields: readonly string[]
): string[] {
  return requiredFields.filter((field) => obj[field] === undefined || obj[field] === null || obj[field] === '');
}
