import { ValidationError } from '../errors.js';

// ISO date-time without an offset: taken as UTC
const ZONELESS_ISO = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const EPOCH_MILLIS = /^-?\d+$/;
// Trailing RFC 2822 comment such as "(UTC)" or "(PDT)"
const TRAILING_COMMENT = /\s*\([^)]*\)\s*$/;

function checked(date: Date, original: unknown): Date {
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Unparseable timestamp: ${String(original)}`, { value: String(original) });
  }
  return date;
}

/**
 * Convert a source timestamp to a UTC instant.
 *
 * - Date: copied
 * - number, or a string of digits: epoch milliseconds
 * - ISO-8601 without an offset: UTC
 * - anything else (RFC 2822, ISO with offset): Date parsing
 */
export function normalizeTimestamp(value: string | number | Date): Date {
  if (value instanceof Date) return checked(new Date(value.getTime()), value);
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new ValidationError(`Unparseable timestamp: ${value}`);
    return checked(new Date(value), value);
  }

  const text = value.trim();
  if (text === '') throw new ValidationError('Empty timestamp');
  if (EPOCH_MILLIS.test(text)) return checked(new Date(Number(text)), value);
  if (ZONELESS_ISO.test(text)) return checked(new Date(text.replace(' ', 'T') + 'Z'), value);
  return checked(new Date(text.replace(TRAILING_COMMENT, '')), value);
}
