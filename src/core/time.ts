/**
 * Time utilities for consistent date handling
 */

import { differenceInCalendarDays, format, isValid, parseISO, startOfDay } from 'date-fns';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export function getCurrentDate(): Date {
  return new Date();
}

export function getReferenceDate(date: Date = getCurrentDate()): Date {
  return startOfDay(date);
}

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function parseDate(dateStr: string): Date {
  return parseISO(dateStr);
}

export function isIsoDateString(value: string): boolean {
  return ISO_DATE_PATTERN.test(value.trim()) && isValid(parseISO(value.trim()));
}

/**
 * Coerces a cell value to a Date. Strings must be ISO-8601; numbers and
 * booleans are never treated as dates.
 */
export function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value === 'string' && isIsoDateString(value)) {
    return parseISO(value.trim());
  }
  return null;
}

export function ageInDays(referenceDate: Date, value: Date): number {
  return differenceInCalendarDays(referenceDate, value);
}

export function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}
