/**
 * Argument checks shared by the search operations. All run before any I/O.
 */

import { InvalidInputError } from '../utils/errors.js';

export function requireText(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new InvalidInputError(`${field} must not be empty`, field, 'EMPTY_QUERY');
  }
  return trimmed;
}

export function checkIntRange(value: number, min: number, max: number, field: string): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidInputError(
      `${field} must be an integer between ${min} and ${max}, got ${value}`,
      field,
      'OUT_OF_RANGE',
    );
  }
  return value;
}

export function checkNumberRange(value: number, min: number, max: number, field: string): number {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new InvalidInputError(
      `${field} must be between ${min} and ${max}, got ${value}`,
      field,
      'OUT_OF_RANGE',
    );
  }
  return value;
}

/**
 * Accept YYYY-MM-DD or a full ISO timestamp; return the calendar date.
 */
export function normalizeDate(value: string | undefined, field: string): string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const match = /^(\d{4})-(\d{2})-(\d{2})(?:$|T)/.exec(value.trim());
  if (!match) {
    throw new InvalidInputError(`${field} must be an ISO date (YYYY-MM-DD), got "${value}"`, field);
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (
    date.getUTCFullYear() !== Number(y) ||
    date.getUTCMonth() !== Number(m) - 1 ||
    date.getUTCDate() !== Number(d)
  ) {
    throw new InvalidInputError(`${field} is not a real calendar date: "${value}"`, field);
  }
  return `${y}-${m}-${d}`;
}

export function checkDateRange(dateFrom: string | undefined, dateTo: string | undefined): void {
  if (dateFrom && dateTo && dateFrom > dateTo) {
    throw new InvalidInputError(`date_from ${dateFrom} is after date_to ${dateTo}`, 'date_from');
  }
}
