/**
 * @fileoverview Date and duration helpers for the aggregators.
 * @module @tasklink/clickup/dates
 */

import { ValidationError } from '@tasklink/errors';
import type { DateInput } from './types.js';

const MS_PER_SECOND = 1000;
const SECONDS_PER_DAY = 86400;

/**
 * Convert a date input to epoch milliseconds. Tuples are read as local time
 * with a 1-based month.
 */
export function toEpochMs(input: DateInput): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new ValidationError('Invalid date', { date: [`${input} is not a finite number`] });
    }
    return input;
  }
  if (input instanceof Date) {
    const time = input.getTime();
    if (Number.isNaN(time)) {
      throw new ValidationError('Invalid date', { date: ['invalid Date'] });
    }
    return time;
  }
  const [year, month, day, hour = 0, minute = 0, second = 0] = input;
  return new Date(year, month - 1, day, hour, minute, second).getTime();
}

/**
 * Local midnight on the first day of `now`'s month, in epoch milliseconds.
 */
export function startOfMonth(now: Date = new Date()): number {
  return new Date(now.getFullYear(), now.getMonth(), 1).getTime();
}

/**
 * Render a duration as `H:MM:SS`, or `N day(s), H:MM:SS` from 24 hours up.
 * Fractions of a second are dropped.
 *
 * @example
 * ```typescript
 * formatDuration(5_400_000); // '1:30:00'
 * formatDuration(90_061_000); // '1 day, 1:01:01'
 * ```
 */
export function formatDuration(ms: number): string {
  const sign = ms < 0 ? '-' : '';
  const totalSeconds = Math.floor(Math.abs(ms) / MS_PER_SECOND);
  const days = Math.floor(totalSeconds / SECONDS_PER_DAY);
  const rest = totalSeconds % SECONDS_PER_DAY;
  const hours = Math.floor(rest / 3600);
  const minutes = Math.floor((rest % 3600) / 60);
  const seconds = rest % 60;
  const clock = `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
  if (days === 0) {
    return `${sign}${clock}`;
  }
  return `${sign}${days} ${days === 1 ? 'day' : 'days'}, ${clock}`;
}
