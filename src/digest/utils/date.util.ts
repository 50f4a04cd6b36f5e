import { TimeStruct } from '../types/digest.types';

const HOUR_MS = 1000 * 60 * 60;

export function isTimeStruct(value: unknown): value is TimeStruct {
  return (
    Array.isArray(value) &&
    value.length >= 6 &&
    value
      .slice(0, 6)
      .every((part) => typeof part === 'number' && Number.isInteger(part))
  );
}

/**
 * Builds a UTC date from the first six fields of a time struct. Out-of-range
 * fields (month 13, February 30, second 61) yield `null` instead of rolling
 * over into the next unit.
 */
export function timeStructToDate(value: unknown): Date | null {
  if (!isTimeStruct(value)) {
    return null;
  }
  const [year, month, day, hour, minute, second] = value;
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return null;
  }
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) {
    return null;
  }
  if (second < 0 || second > 59) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function toTimeStruct(date: Date): number[] {
  return [
    date.getUTCFullYear(),
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  ];
}

export function computeAgeHours(publishedAt: Date, now: Date): number {
  return (now.getTime() - publishedAt.getTime()) / HOUR_MS;
}

export function formatLogTimestamp(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  const hh = String(date.getUTCHours()).padStart(2, '0');
  const mm = String(date.getUTCMinutes()).padStart(2, '0');
  const ss = String(date.getUTCSeconds()).padStart(2, '0');
  return `${y}-${m}-${d} ${hh}:${mm}:${ss}`;
}

export function formatDigestDate(date: Date): string {
  return `${formatLogTimestamp(date).slice(0, 16)} UTC`;
}
