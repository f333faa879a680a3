/**
 * Week-Window Calculator Tests
 */

import { describe, it, expect } from '@jest/globals';
import { addDays, getISODay } from 'date-fns';
import {
  completeWeekWindow,
  getMondayWeekWindow,
  getSundayWeekEnd,
  getWeekWindow,
  parseWeekDate,
  toLocalDate,
  weekdayIndex,
} from '../../src/utils/week-window';
import { formatIsoDate } from '../../src/utils/row-normalizer';

describe('Week-Window Calculator', () => {
  describe('weekdayIndex', () => {
    it('should number Monday as 0 and Sunday as 6', () => {
      expect(weekdayIndex(toLocalDate('2024-03-04'))).toBe(0);
      expect(weekdayIndex(toLocalDate('2024-03-10'))).toBe(6);
    });
  });

  describe('getSundayWeekEnd', () => {
    it('should return the upcoming Sunday', () => {
      expect(getSundayWeekEnd(toLocalDate('2024-03-04'))).toBe('2024-03-10');
      expect(getSundayWeekEnd(toLocalDate('2024-03-06'))).toBe('2024-03-10');
    });

    it('should return the date itself on a Sunday', () => {
      expect(getSundayWeekEnd(toLocalDate('2024-03-10'))).toBe('2024-03-10');
    });

    it('should always land on a Sunday within six days after the date', () => {
      let day = toLocalDate('2024-02-20');
      for (let i = 0; i < 21; i++) {
        const weekEnd = getSundayWeekEnd(day);
        const iso = formatIsoDate(day);

        expect(getISODay(toLocalDate(weekEnd))).toBe(7);
        expect(iso <= weekEnd).toBe(true);
        expect(weekEnd <= formatIsoDate(addDays(day, 6))).toBe(true);

        day = addDays(day, 1);
      }
    });
  });

  describe('getMondayWeekWindow', () => {
    it('should span Monday to Sunday', () => {
      expect(getMondayWeekWindow(toLocalDate('2024-03-06'))).toEqual({
        week_start: '2024-03-04',
        week_end: '2024-03-10',
      });
    });

    it('should cross a year boundary', () => {
      expect(getMondayWeekWindow(toLocalDate('2024-12-31'))).toEqual({
        week_start: '2024-12-30',
        week_end: '2025-01-05',
      });
    });

    it('should always start on a Monday at or before the date', () => {
      let day = toLocalDate('2024-02-20');
      for (let i = 0; i < 21; i++) {
        const window = getMondayWeekWindow(day);
        const start = toLocalDate(window.week_start);
        const iso = formatIsoDate(day);

        expect(getISODay(start)).toBe(1);
        expect(window.week_start <= iso).toBe(true);
        expect(iso <= window.week_end).toBe(true);
        expect(window.week_end).toBe(formatIsoDate(addDays(start, 6)));

        day = addDays(day, 1);
      }
    });
  });

  describe('getWeekWindow', () => {
    it('should use the monday convention by default', () => {
      expect(getWeekWindow('2024-03-10')).toEqual({
        week_start: '2024-03-04',
        week_end: '2024-03-10',
      });
    });

    it('should give the same window under both conventions', () => {
      expect(getWeekWindow('2024-03-07', 'sunday')).toEqual(getWeekWindow('2024-03-07', 'monday'));
    });

    it('should default to the current week', () => {
      jest.useFakeTimers();
      jest.setSystemTime(new Date(2024, 2, 6, 12, 0, 0));

      expect(getWeekWindow()).toEqual({ week_start: '2024-03-04', week_end: '2024-03-10' });

      jest.useRealTimers();
    });
  });

  describe('completeWeekWindow', () => {
    it('should derive the missing boundary', () => {
      expect(completeWeekWindow('2024-03-04', null)).toEqual({
        week_start: '2024-03-04',
        week_end: '2024-03-10',
      });
      expect(completeWeekWindow(null, '2024-03-10')).toEqual({
        week_start: '2024-03-04',
        week_end: '2024-03-10',
      });
    });

    it('should leave complete or empty windows alone', () => {
      expect(completeWeekWindow(null, null)).toEqual({ week_start: null, week_end: null });
      expect(completeWeekWindow('2024-03-04', '2024-03-10')).toEqual({
        week_start: '2024-03-04',
        week_end: '2024-03-10',
      });
    });
  });

  describe('parseWeekDate', () => {
    it('should parse supported formats into local dates', () => {
      expect(parseWeekDate('06/03/2024')).toEqual(new Date(2024, 2, 6));
    });

    it('should return null for text that is not a date', () => {
      expect(parseWeekDate('next week')).toBeNull();
    });
  });
});
