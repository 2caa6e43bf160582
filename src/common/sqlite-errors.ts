import { QueryFailedError } from 'typeorm';
import { DuplicateError } from './errors';

const UNIQUE_FAILURE = /UNIQUE constraint failed: ([\w.]+(?:, [\w.]+)*)/;

/**
 * Recognises SQLite unique and primary-key failures and reports the first
 * column named in the message.
 */
export function uniqueViolation(
  error: unknown,
  values: Record<string, unknown> = {},
) {
  if (!(error instanceof QueryFailedError)) {
    return null;
  }
  const match = UNIQUE_FAILURE.exec(error.message);
  if (!match) {
    return null;
  }
  const qualified = match[1].split(',')[0].trim();
  const field = qualified.includes('.')
    ? qualified.slice(qualified.indexOf('.') + 1)
    : qualified;
  const value = values[field];
  return {
    field,
    value: value === undefined || value === null ? '' : String(value),
  };
}

/** Re-throws unique violations as DuplicateError, everything else unchanged. */
export function rethrowUniqueViolation(
  error: unknown,
  values: Record<string, unknown> = {},
): never {
  const violation = uniqueViolation(error, values);
  if (violation) {
    throw new DuplicateError(violation.field, violation.value);
  }
  throw error;
}
