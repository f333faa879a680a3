/**
 * Week-Window Calculator
 *
 * Derives the boundaries of a tracked week from any date inside it.
 *
 * Two conventions exist:
 * - monday: week_start is the most recent Monday, week_end = week_start + 6
 * - sunday: only the upcoming Sunday (or the date itself) is stored
 *
 * Both produce the same Sunday for a given date, so week_start is always
 * reported as week_end - 6 and can be used as the entry key either way.
 */

import { addDays, getISODay, subDays } from 'date-fns';
import { IsoDate } from '../models/table';
import { formatIsoDate, parseDateSafe } from './row-normalizer';

export type WeekConvention = 'monday' | 'sunday';

export interface WeekWindow {
  week_start: IsoDate;
  week_end: IsoDate;
}

/**
 * Weekday index with Monday = 0 ... Sunday = 6
 */
export function weekdayIndex(date: Date): number {
  return getISODay(date) - 1;
}

/**
 * Convert an ISO calendar date into a local midnight Date
 */
export function toLocalDate(value: IsoDate): Date {
  const [year, month, day] = value.split('-').map(Number);
  return new Date(year, month - 1, day);
}

/**
 * Upcoming Sunday, or the date itself when it is a Sunday
 */
export function getSundayWeekEnd(date: Date): IsoDate {
  return formatIsoDate(addDays(date, 6 - weekdayIndex(date)));
}

/**
 * Monday-to-Sunday window containing the date
 */
export function getMondayWeekWindow(date: Date): WeekWindow {
  const start = subDays(date, weekdayIndex(date));
  return {
    week_start: formatIsoDate(start),
    week_end: formatIsoDate(addDays(start, 6)),
  };
}

/**
 * Window for a date under the configured convention
 *
 * @param date - Any date inside the week; defaults to today
 */
export function getWeekWindow(
  date: Date | IsoDate = new Date(),
  convention: WeekConvention = 'monday'
): WeekWindow {
  const local = typeof date === 'string' ? toLocalDate(date) : date;

  if (convention === 'sunday') {
    const weekEnd = getSundayWeekEnd(local);
    return {
      week_start: formatIsoDate(subDays(toLocalDate(weekEnd), 6)),
      week_end: weekEnd,
    };
  }

  return getMondayWeekWindow(local);
}

/**
 * Fill whichever boundary a stored row is missing.
 * Rows written under the sunday convention have no week_start.
 */
export function completeWeekWindow(
  weekStart: IsoDate | null,
  weekEnd: IsoDate | null
): { week_start: IsoDate | null; week_end: IsoDate | null } {
  if (weekStart && !weekEnd) {
    return { week_start: weekStart, week_end: formatIsoDate(addDays(toLocalDate(weekStart), 6)) };
  }
  if (weekEnd && !weekStart) {
    return { week_start: formatIsoDate(subDays(toLocalDate(weekEnd), 6)), week_end: weekEnd };
  }
  return { week_start: weekStart, week_end: weekEnd };
}

/**
 * Parse a user supplied date string; null when it is not a date
 */
export function parseWeekDate(value: string): Date | null {
  const iso = parseDateSafe(value);
  return iso ? toLocalDate(iso) : null;
}
