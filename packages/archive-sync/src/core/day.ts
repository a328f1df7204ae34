import type { Day, DayRange } from '../types.js';

const MS_PER_DAY = 86_400_000;
const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Days since the Unix epoch. Used as the binary-search axis; everything
 * persisted or passed across module boundaries uses the `YYYY-MM-DD` form.
 */
export type DayIndex = number;

export function isDay(value: string): boolean {
  const match = DAY_PATTERN.exec(value);
  if (!match) return false;
  const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return formatDay(ms) === value;
}

/** UTC day of an epoch-millisecond timestamp. */
export function formatDay(ms: number): Day {
  return new Date(ms).toISOString().slice(0, 10);
}

export function toDayIndex(day: Day): DayIndex {
  return Math.floor(dayStartMs(day) / MS_PER_DAY);
}

export function fromDayIndex(index: DayIndex): Day {
  return formatDay(index * MS_PER_DAY);
}

export function addDays(day: Day, count: number): Day {
  return fromDayIndex(toDayIndex(day) + count);
}

export function dayStartMs(day: Day): number {
  const match = DAY_PATTERN.exec(day);
  if (!match) throw new Error(`Invalid day: ${day}`);
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

/** Last millisecond of the day. */
export function dayEndMs(day: Day): number {
  return dayStartMs(day) + MS_PER_DAY - 1;
}

/** `20250131` for `2025-01-31`. */
export function compactDay(day: Day): string {
  return day.replace(/-/g, '');
}

export function expandCompactDay(compact: string): Day | null {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(compact);
  if (!match) return null;
  const day = `${match[1]}-${match[2]}-${match[3]}`;
  return isDay(day) ? day : null;
}

export function singleDay(day: Day): DayRange {
  return { start: day, end: day };
}

export function inRange(day: Day, range: DayRange | undefined): boolean {
  if (range === undefined) return true;
  return day >= range.start && day <= range.end;
}

export function spanDays(range: DayRange): number {
  return toDayIndex(range.end) - toDayIndex(range.start) + 1;
}

export function* iterateDays(range: DayRange): Generator<Day> {
  const last = toDayIndex(range.end);
  for (let i = toDayIndex(range.start); i <= last; i++) {
    yield fromDayIndex(i);
  }
}

/** Intersection of two ranges, or null when they do not overlap. */
export function clampRange(range: DayRange, bound: DayRange): DayRange | null {
  const start = range.start > bound.start ? range.start : bound.start;
  const end = range.end < bound.end ? range.end : bound.end;
  return start <= end ? { start, end } : null;
}

/** ISO-8601 Zulu, second precision: `2025-01-31T12:00:00Z`. */
export function toZulu(ms: number): string {
  return new Date(Math.floor(ms / 1000) * 1000).toISOString().replace('.000Z', 'Z');
}
