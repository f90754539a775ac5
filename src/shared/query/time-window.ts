/**
 * =============================================================================
 * TIME-WINDOW AGGREGATOR
 * =============================================================================
 *
 * A record is inside a window iff createdAt >= reference - hours.
 *
 * The reference instant comes from one injectable Clock and is read once per
 * operation, then passed down, so every row of a response is judged against
 * the same cutoff.
 * =============================================================================
 */

import { Predicate } from './predicate';

const MS_PER_HOUR = 60 * 60 * 1000;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function windowStart(reference: Date, hours: number): Date {
  return new Date(reference.getTime() - hours * MS_PER_HOUR);
}

export function isWithinWindow(createdAt: string, reference: Date, hours: number): boolean {
  const ms = Date.parse(createdAt);
  return !Number.isNaN(ms) && ms >= windowStart(reference, hours).getTime();
}

/**
 * Rows created inside the window, in their original order
 */
export function withinWindow<T extends { createdAt: string }>(
  reference: Date,
  hours: number,
  rows: readonly T[]
): T[] {
  return rows.filter(row => isWithinWindow(row.createdAt, reference, hours));
}

/**
 * The same window expressed as a store predicate (open upper bound)
 */
export function windowPredicate<F extends string>(field: F, reference: Date, hours: number): Predicate<F> {
  return { kind: 'range', field, from: windowStart(reference, hours) };
}

export interface FrequencyEntry {
  value: string;
  count: number;
}

/**
 * Values ranked by frequency, most frequent first; equal counts ordered by
 * value ascending. `limit` undefined returns every distinct value.
 */
export function rankByFrequency(values: readonly string[], limit?: number): FrequencyEntry[] {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  const ranked = [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((left, right) =>
      right.count - left.count ||
      (left.value < right.value ? -1 : left.value > right.value ? 1 : 0)
    );

  return limit === undefined ? ranked : ranked.slice(0, limit);
}

/**
 * Human-readable age of a record, e.g. "3 hours ago"
 */
export function describeElapsed(createdAt: string, reference: Date): string {
  const elapsedSeconds = Math.floor((reference.getTime() - Date.parse(createdAt)) / 1000);
  const days = Math.floor(elapsedSeconds / 86400);
  const seconds = elapsedSeconds - days * 86400;

  if (days > 0) return `${days} days ago`;
  if (seconds >= 3600) return `${Math.floor(seconds / 3600)} hours ago`;
  if (seconds >= 60) return `${Math.floor(seconds / 60)} minutes ago`;
  return 'Just now';
}
