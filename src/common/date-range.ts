import { Between, LessThanOrEqual, MoreThanOrEqual } from 'typeorm';
import { ValidationError } from './errors';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export type DateRangeQuery = {
  from?: string;
  to?: string;
};

function parseBoundary(value: string | undefined, field: string, endOfDay: boolean) {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }
  const parsed = new Date(
    DATE_ONLY.test(trimmed)
      ? `${trimmed}T${endOfDay ? '23:59:59.999' : '00:00:00.000'}Z`
      : trimmed,
  );
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(field, `${field} must be a date (YYYY-MM-DD).`);
  }
  return parsed;
}

/** Inclusive range; a date-only `to` covers that whole (UTC) day. */
export function parseDateRange(query: DateRangeQuery) {
  return {
    from: parseBoundary(query.from, 'from', false),
    to: parseBoundary(query.to, 'to', true),
  };
}

export function dateRangeOperator(range: { from?: Date; to?: Date }) {
  if (range.from && range.to) {
    return Between(range.from, range.to);
  }
  if (range.from) {
    return MoreThanOrEqual(range.from);
  }
  if (range.to) {
    return LessThanOrEqual(range.to);
  }
  return undefined;
}

/** YYYY-MM-DD in UTC. */
export const toDateKey = (value: Date) => value.toISOString().slice(0, 10);
