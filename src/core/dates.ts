import { DateKey } from './types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function toDateKey(date: Date): DateKey {
  return date.toISOString().slice(0, 10);
}

export function isDateKey(value: string): boolean {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) return false;
  const parsed = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return toDateKey(parsed) === value;
}

export function addDays(key: DateKey, days: number): DateKey {
  if (!isDateKey(key)) {
    throw new RangeError(`Invalid date key "${key}"`);
  }
  const base = Date.parse(`${key}T00:00:00.000Z`);
  return toDateKey(new Date(base + days * MS_PER_DAY));
}

export function laterOf(a: Date | null, b: Date | null): Date | null {
  if (a === null) return b;
  if (b === null) return a;
  return a.getTime() >= b.getTime() ? a : b;
}
