import {
  addDays,
  formatDisplayDate,
  formatShortDate,
  formatTimeOfDay,
  getLocalDateString,
  getLocalDayWindow,
  getWeekdayName,
  parseLocalDate,
  secondsToListeningTime,
  toUnixSeconds,
} from '../../src/backend/utils/timestamps';

describe('Timestamps Utility', () => {
  describe('parseLocalDate', () => {
    it('should parse YYYY-MM-DD into local midnight', () => {
      const result = parseLocalDate('2024-01-15');

      expect(result).not.toBeNull();
      expect(result?.getFullYear()).toBe(2024);
      expect(result?.getMonth()).toBe(0);
      expect(result?.getDate()).toBe(15);
      expect(result?.getHours()).toBe(0);
    });

    it('should reject impossible dates', () => {
      expect(parseLocalDate('2024-02-30')).toBeNull();
      expect(parseLocalDate('2023-13-01')).toBeNull();
    });

    it('should reject other formats', () => {
      expect(parseLocalDate('01/15/2024')).toBeNull();
      expect(parseLocalDate('2024-1-15')).toBeNull();
      expect(parseLocalDate('')).toBeNull();
    });

    it('should accept leap days', () => {
      expect(parseLocalDate('2024-02-29')).not.toBeNull();
    });
  });

  describe('getLocalDayWindow', () => {
    it('should span local midnight to one second before the next midnight', () => {
      const result = getLocalDayWindow('2024-01-15');

      expect(result.from).toBe(toUnixSeconds(new Date(2024, 0, 15)));
      expect(result.to).toBe(toUnixSeconds(new Date(2024, 0, 16)) - 1);
    });

    it('should throw for invalid dates', () => {
      expect(() => getLocalDayWindow('not-a-date')).toThrow(
        'Invalid date: not-a-date'
      );
    });
  });

  describe('addDays and getLocalDateString', () => {
    it('should roll over month and year boundaries', () => {
      const start = new Date(2023, 11, 29);

      expect(getLocalDateString(addDays(start, 0))).toBe('2023-12-29');
      expect(getLocalDateString(addDays(start, 3))).toBe('2024-01-01');
      expect(getLocalDateString(addDays(start, 6))).toBe('2024-01-04');
    });
  });

  describe('formatting', () => {
    it('should name the weekday', () => {
      // 2024-01-15 was a Monday
      expect(getWeekdayName(new Date(2024, 0, 15))).toBe('Monday');
      expect(getWeekdayName(new Date(2024, 0, 21))).toBe('Sunday');
    });

    it('should format short dates as MM/DD', () => {
      expect(formatShortDate(new Date(2024, 0, 5))).toBe('01/05');
    });

    it('should format display dates as MM-DD-YYYY', () => {
      expect(formatDisplayDate('2024-01-15')).toBe('01-15-2024');
    });

    it('should return unparsable display dates unchanged', () => {
      expect(formatDisplayDate('yesterday')).toBe('yesterday');
    });

    it('should format a timestamp as local HH:MM:SS', () => {
      const timestamp = toUnixSeconds(new Date(2024, 0, 15, 9, 5, 7));

      expect(formatTimeOfDay(timestamp)).toBe('09:05:07');
    });
  });

  describe('secondsToListeningTime', () => {
    it('should split seconds into hours, minutes and seconds', () => {
      expect(secondsToListeningTime(560)).toEqual({
        hours: 0,
        minutes: 9,
        seconds: 20,
        totalSeconds: 560,
      });
    });

    it('should handle multiple hours', () => {
      expect(secondsToListeningTime(7384)).toEqual({
        hours: 2,
        minutes: 3,
        seconds: 4,
        totalSeconds: 7384,
      });
    });

    it('should handle zero', () => {
      expect(secondsToListeningTime(0)).toEqual({
        hours: 0,
        minutes: 0,
        seconds: 0,
        totalSeconds: 0,
      });
    });
  });
});
