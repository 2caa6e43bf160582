import { ValidationError } from './errors';

export const PHONE_PATTERN = /^[6-9]\d{9}$/;
export const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@(gmail\.com|yahoo\.com)$/;
export const PERSON_NAME_PATTERN = /^[A-Za-z ]+$/;

export function requireText(value: unknown, field: string) {
  if (typeof value !== 'string' || !value.trim()) {
    throw new ValidationError(field, `${field} is required.`);
  }
  return value.trim();
}

export function optionalText(value: unknown) {
  if (typeof value !== 'string') {
    return null;
  }
  return value.trim() || null;
}

export function requirePersonName(value: unknown, field = 'name') {
  const name = requireText(value, field);
  if (!PERSON_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      field,
      `${field} may contain only letters and spaces.`,
    );
  }
  return name;
}

export function requirePhone(value: unknown, field = 'phone') {
  const phone = requireText(value, field);
  if (!PHONE_PATTERN.test(phone)) {
    throw new ValidationError(
      field,
      `${field} must be 10 digits starting with 6-9.`,
    );
  }
  return phone;
}

export function optionalPhone(value: unknown, field = 'phone') {
  return optionalText(value) === null ? null : requirePhone(value, field);
}

export function requireEmail(value: unknown, field = 'email') {
  const email = requireText(value, field);
  if (!EMAIL_PATTERN.test(email)) {
    throw new ValidationError(
      field,
      `${field} must be a gmail.com or yahoo.com address.`,
    );
  }
  return email;
}

export function optionalEmail(value: unknown, field = 'email') {
  return optionalText(value) === null ? null : requireEmail(value, field);
}

export function requireNonNegativeNumber(value: unknown, field: string) {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    throw new ValidationError(field, `${field} must be a number >= 0.`);
  }
  return parsed;
}

export function requireNonNegativeInteger(value: unknown, field: string) {
  const parsed = requireNonNegativeNumber(value, field);
  if (!Number.isInteger(parsed)) {
    throw new ValidationError(field, `${field} must be a whole number.`);
  }
  return parsed;
}

export function requirePositiveInteger(value: unknown, field: string) {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (
    typeof parsed !== 'number' ||
    !Number.isInteger(parsed) ||
    parsed <= 0
  ) {
    throw new ValidationError(field, `${field} must be a positive whole number.`);
  }
  return parsed;
}
