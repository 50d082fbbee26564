/**
 * Time utilities for consistent date handling
 */

import { format, isValid, parseISO } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function parseDate(dateStr: string): Date {
  return parseISO(dateStr);
}

export function isValidTimestamp(value: string): boolean {
  return isValid(parseDate(value));
}

export function getRunId(date: Date, hash: string): string {
  return `${formatDate(date)}__${hash.substring(0, 8)}`;
}
