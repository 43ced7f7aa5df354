import { describe, it, expect } from 'vitest';
import {
  DEFAULT_STATION_TIMEZONE,
  addDaysToDate,
  createZonedDate,
  fixedClock,
  formatZonedDate,
  formatZonedDateTime,
  getDayName,
  getZoneOffset,
  getZonedISOString,
  getZonedMinutesOfDay,
  isValidDateString,
  minutesBetween,
  minutesToTime,
  parseTimeToMinutes
} from '../../server/utils/dateUtils';

describe('Date Utilities - Production Code Tests', () => {

  describe('DEFAULT_STATION_TIMEZONE constant', () => {
    it('should be set to Asia/Colombo', () => {
      expect(DEFAULT_STATION_TIMEZONE).toBe('Asia/Colombo');
    });
  });

  describe('getZoneOffset', () => {
    it('should return the half-hour offset for Colombo', () => {
      expect(getZoneOffset('2026-03-04', 'Asia/Colombo')).toBe('+05:30');
    });

    it('should return a zero offset for UTC', () => {
      expect(getZoneOffset('2026-03-04', 'UTC')).toBe('+00:00');
    });

    it('should follow daylight saving changes', () => {
      expect(getZoneOffset('2026-01-15', 'America/Los_Angeles')).toBe('-08:00');
      expect(getZoneOffset('2026-07-15', 'America/Los_Angeles')).toBe('-07:00');
    });
  });

  describe('getZonedISOString / createZonedDate', () => {
    it('should append seconds and the station offset', () => {
      expect(getZonedISOString('2026-03-04', '09:00', 'Asia/Colombo')).toBe('2026-03-04T09:00:00+05:30');
    });

    it('should keep explicit seconds', () => {
      expect(getZonedISOString('2026-03-04', '09:00:30', 'Asia/Colombo')).toBe('2026-03-04T09:00:30+05:30');
    });

    it('should convert station wall-clock time to the UTC instant', () => {
      expect(createZonedDate('2026-03-04', '09:00', 'Asia/Colombo').toISOString()).toBe('2026-03-04T03:30:00.000Z');
    });
  });

  describe('Zoned formatting', () => {
    const instant = new Date('2026-03-04T20:15:00.000Z');

    it('should report the local date after midnight', () => {
      expect(formatZonedDate(instant, 'Asia/Colombo')).toBe('2026-03-05');
    });

    it('should format local date and time', () => {
      expect(formatZonedDateTime(instant, 'Asia/Colombo')).toBe('2026-03-05 01:45');
    });

    it('should count minutes since local midnight', () => {
      expect(getZonedMinutesOfDay(instant, 'Asia/Colombo')).toBe(105);
    });
  });

  describe('addDaysToDate', () => {
    it('should add days correctly', () => {
      expect(addDaysToDate('2026-01-15', 5)).toBe('2026-01-20');
    });

    it('should handle month rollover', () => {
      expect(addDaysToDate('2026-02-27', 3)).toBe('2026-03-02');
    });

    it('should handle year rollover', () => {
      expect(addDaysToDate('2025-12-30', 5)).toBe('2026-01-04');
    });

    it('should handle negative days', () => {
      expect(addDaysToDate('2026-01-15', -5)).toBe('2026-01-10');
    });
  });

  describe('isValidDateString', () => {
    it('should accept a real calendar date', () => {
      expect(isValidDateString('2026-03-04')).toBe(true);
      expect(isValidDateString('2028-02-29')).toBe(true);
    });

    it('should reject impossible dates and other formats', () => {
      expect(isValidDateString('2026-02-29')).toBe(false);
      expect(isValidDateString('2026-13-01')).toBe(false);
      expect(isValidDateString('2026-3-4')).toBe(false);
      expect(isValidDateString('04/03/2026')).toBe(false);
    });
  });

  describe('getDayName', () => {
    it('should name weekdays without depending on the host timezone', () => {
      expect(getDayName('2026-03-01')).toBe('Sunday');
      expect(getDayName('2026-03-04')).toBe('Wednesday');
      expect(getDayName('2026-01-01')).toBe('Thursday');
      expect(getDayName('2026-02-28')).toBe('Saturday');
    });
  });

  describe('Minute helpers', () => {
    it('should convert between HH:MM and minutes', () => {
      expect(parseTimeToMinutes('13:30')).toBe(810);
      expect(parseTimeToMinutes(null)).toBe(0);
      expect(minutesToTime(810)).toBe('13:30');
      expect(minutesToTime(540)).toBe('09:00');
    });

    it('should count whole minutes between instants', () => {
      const from = new Date('2026-03-04T03:25:00.000Z');
      expect(minutesBetween(from, new Date('2026-03-04T05:00:30.000Z'))).toBe(95);
      expect(minutesBetween(from, new Date('2026-03-04T03:00:00.000Z'))).toBe(0);
    });
  });

  describe('fixedClock', () => {
    it('should always return the frozen instant as a fresh Date', () => {
      const clock = fixedClock('2026-03-02T02:30:00.000Z');
      const first = clock.now();
      first.setFullYear(2030);
      expect(clock.now().toISOString()).toBe('2026-03-02T02:30:00.000Z');
    });
  });
});
